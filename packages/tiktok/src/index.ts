export * from "./types.js";
export * from "./errors.js";
export { loadConfig, type UploaderConfig } from "./config.js";
export { withRetry, backoffDelayMs, type RetryOptions, type Sleep } from "./retry.js";
export { DEFAULT_CHUNK_CONSTRAINTS, planChunks, plannedBytes } from "./chunk-planner.js";
export {
  queryCreatorInfo,
  selectBestPrivacyLevel,
  getUploadConstraints,
} from "./creator-info.js";
export { buildInitBody, initializeUpload } from "./session.js";
export { contentRange, transmitChunks } from "./transmitter.js";
export { fetchPublishStatus, finalizeUpload } from "./finalizer.js";
export {
  MemoryTokenStore,
  type RejectedTokenEntry,
  type TokenListing,
  type TokenStore,
} from "./token-store.js";
export { JsonFileTokenStore } from "./json-token-store.js";
export { DbTokenStore } from "./db-token-store.js";
export {
  TokenManager,
  toAccessToken,
  type TokenProvider,
  type TokenManagerOptions,
  type RefreshReport,
} from "./auth.js";
export { buildTitle, loadJobs, parseJobs, type LoadedJobs, type RejectedJob } from "./jobs.js";
export {
  UploadDriver,
  createUploadSteps,
  resolvePostInfo,
  type FailureReason,
  type JobOutcome,
  type JobResult,
  type UploadSteps,
} from "./driver.js";
export { runRefresh, runUpload } from "./commands.js";
