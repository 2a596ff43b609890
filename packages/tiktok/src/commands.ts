import { TokenManager, type RefreshReport } from "./auth.js";
import type { UploaderConfig } from "./config.js";
import { DbTokenStore } from "./db-token-store.js";
import { UploadDriver, createUploadSteps, type JobResult } from "./driver.js";
import { loadJobs, type RejectedJob } from "./jobs.js";
import { JsonFileTokenStore } from "./json-token-store.js";
import type { TokenStore } from "./token-store.js";

export const DEFAULT_JOB_FILE = "videos_to_upload.json";

export const USAGE = `Usage:
  reelpost upload [jobs.json]   Upload every job in the queue (default: ${DEFAULT_JOB_FILE})
  reelpost refresh              Refresh stored tokens that are expired or about to expire`;

export function createTokenStore(config: UploaderConfig): TokenStore {
  return config.tokenStore === "db"
    ? new DbTokenStore()
    : new JsonFileTokenStore(config.tokenFile);
}

export function createTokenManager(
  config: UploaderConfig,
  store: TokenStore = createTokenStore(config),
): TokenManager {
  return new TokenManager(store, {
    apiBase: config.apiBase,
    clientKey: config.clientKey,
    clientSecret: config.clientSecret,
    safetyMarginMs: config.tokenSafetyMarginMs,
    timeoutMs: config.requestTimeoutMs,
  });
}

export function formatJobResult(result: JobResult): string {
  const { job, outcome } = result;
  if (outcome.success) {
    return `OK      ${job.videoPath} (${job.userId}) publish_id=${outcome.publishId} privacy=${outcome.privacyLevel}`;
  }
  const publishId = outcome.reason.publishId
    ? ` publish_id=${outcome.reason.publishId}`
    : "";
  return `FAILED  ${job.videoPath} (${job.userId}) [${outcome.reason.kind}]${publishId} ${outcome.reason.message}`;
}

export function formatRejectedJob(rejected: RejectedJob): string {
  return `SKIPPED job #${rejected.index} [${rejected.error.kind}] ${rejected.error.message}`;
}

export function formatRefreshReport(report: RefreshReport): string {
  switch (report.outcome) {
    case "valid":
      return `VALID     ${report.userId} until ${report.expiry?.toISOString() ?? "?"}`;
    case "refreshed":
      return `REFRESHED ${report.userId} until ${report.expiry?.toISOString() ?? "?"}`;
    case "reauth_required":
      return `REAUTH    ${report.userId} refresh token expired, authorize again`;
    case "failed":
      return `FAILED    ${report.userId} ${report.error ?? ""}`.trimEnd();
  }
}

/** Returns the process exit code: 0 only if every queued job was published */
export async function runUpload(
  config: UploaderConfig,
  jobFile: string,
): Promise<number> {
  const { jobs, rejected } = await loadJobs(jobFile);
  console.log(
    `[Uploader] Loaded ${jobs.length} job(s) from ${jobFile}` +
      (rejected.length > 0 ? `, ${rejected.length} rejected` : ""),
  );

  const driver = new UploadDriver({
    tokens: createTokenManager(config),
    steps: createUploadSteps(config),
    maxRetries: config.maxRetries,
    retryBaseMs: config.retryBaseMs,
  });
  const results = await driver.run(jobs);

  console.log("\n=== Upload summary ===");
  for (const entry of rejected) console.log(formatRejectedJob(entry));
  for (const result of results) console.log(formatJobResult(result));

  const published = results.filter((result) => result.outcome.success).length;
  const failed = results.length - published + rejected.length;
  console.log(`\n${published} published, ${failed} failed`);

  return failed === 0 ? 0 : 1;
}

export async function runRefresh(config: UploaderConfig): Promise<number> {
  const reports = await createTokenManager(config).refreshExpiredTokens();
  if (reports.length === 0) {
    console.log("[TikTok] No stored tokens");
    return 0;
  }
  for (const report of reports) console.log(formatRefreshReport(report));

  const needsAttention = reports.filter(
    (report) => report.outcome === "failed" || report.outcome === "reauth_required",
  );
  return needsAttention.length === 0 ? 0 : 1;
}
