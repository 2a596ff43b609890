import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AuthError, TimeoutError } from "./errors.js";
import { fetchPublishStatus, finalizeUpload } from "./finalizer.js";
import type { UploadSession } from "./types.js";

// Mock fetch
const mockFetch = vi.fn();

let clock = 0;
const now = () => clock;
const sleep = vi.fn(async (ms: number) => {
  clock += ms;
});

function makeSession(mode: UploadSession["mode"] = "direct"): UploadSession {
  return {
    publishId: "p_test",
    uploadUrl: "https://upload.test/video/p_test",
    totalSize: 200,
    chunkSize: 64,
    chunkCount: 3,
    mode,
    accessToken: {
      value: "test-access-token",
      expiresAt: new Date("2030-01-01T00:00:00Z"),
      userId: "user-1",
    },
    status: "UPLOADING",
  };
}

function statusResponse(data: Record<string, unknown>): Promise<Response> {
  return Promise.resolve(
    new Response(JSON.stringify({ data, error: { code: "ok", message: "" } })),
  );
}

const options = {
  apiBase: "https://api.test",
  timeoutMs: 1_000,
  pollIntervalMs: 5_000,
  pollTimeoutMs: 60_000,
  sleep,
  now,
};

beforeEach(() => {
  clock = 0;
  sleep.mockClear();
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("fetchPublishStatus", () => {
  it("should POST the publish id with the session token", async () => {
    mockFetch.mockImplementationOnce(() => statusResponse({ status: "PROCESSING_UPLOAD" }));

    await expect(fetchPublishStatus(makeSession(), options)).resolves.toEqual({
      status: "PROCESSING_UPLOAD",
    });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://api.test/v2/post/publish/status/fetch/");
    expect(init.headers.Authorization).toBe("Bearer test-access-token");
    expect(init.body).toBe(JSON.stringify({ publish_id: "p_test" }));
  });
});

describe("finalizeUpload", () => {
  it("should poll until PUBLISH_COMPLETE", async () => {
    mockFetch
      .mockImplementationOnce(() => statusResponse({ status: "PROCESSING_UPLOAD" }))
      .mockImplementationOnce(() => statusResponse({ status: "PROCESSING_DOWNLOAD" }))
      .mockImplementationOnce(() =>
        statusResponse({
          status: "PUBLISH_COMPLETE",
          publicaly_available_post_id: [12345, "7300000000000000001"],
        }),
      );
    const session = makeSession();

    const result = await finalizeUpload(session, options);

    expect(result).toEqual({
      status: "PUBLISHED",
      publishId: "p_test",
      publicPostIds: ["12345", "7300000000000000001"],
    });
    expect(session.status).toBe("PUBLISHED");
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(5_000);
  });

  it("should keep every digit of a 19-digit post id", async () => {
    mockFetch.mockImplementationOnce(() =>
      Promise.resolve(
        new Response(
          '{"data":{"status":"PUBLISH_COMPLETE","publicaly_available_post_id":[7324567890123456789]},"error":{"code":"ok","message":""}}',
        ),
      ),
    );

    const result = await finalizeUpload(makeSession(), options);

    expect(result).toEqual({
      status: "PUBLISHED",
      publishId: "p_test",
      publicPostIds: ["7324567890123456789"],
    });
  });

  it("should report FAILED with the platform's reason", async () => {
    mockFetch.mockImplementationOnce(() =>
      statusResponse({ status: "FAILED", fail_reason: "file_format_check_failed" }),
    );
    const session = makeSession();

    const result = await finalizeUpload(session, options);

    expect(result).toEqual({
      status: "FAILED",
      publishId: "p_test",
      failReason: "file_format_check_failed",
    });
    expect(session.status).toBe("FAILED");
  });

  it("should throw TimeoutError when no terminal status arrives in time", async () => {
    mockFetch.mockImplementation(() => statusResponse({ status: "PROCESSING_UPLOAD" }));

    const error = await finalizeUpload(makeSession(), options).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      kind: "Timeout",
      publishId: "p_test",
      lastStatus: "PROCESSING_UPLOAD",
      message: "Publish status for p_test still PROCESSING_UPLOAD after 60000ms",
    });
    expect(mockFetch).toHaveBeenCalledTimes(12);
  });

  it("should keep polling through transient errors", async () => {
    mockFetch
      .mockImplementationOnce(() => Promise.resolve(new Response("oops", { status: 500 })))
      .mockImplementationOnce(() => statusResponse({ status: "PUBLISH_COMPLETE" }));

    const result = await finalizeUpload(makeSession(), options);

    expect(result.status).toBe("PUBLISHED");
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("should stop on a non-transient error", async () => {
    mockFetch.mockImplementationOnce(() =>
      Promise.resolve(
        new Response(
          JSON.stringify({ error: { code: "access_token_invalid", message: "Token expired" } }),
          { status: 401 },
        ),
      ),
    );

    await expect(finalizeUpload(makeSession(), options)).rejects.toBeInstanceOf(AuthError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should treat SEND_TO_USER_INBOX as done for inbox uploads", async () => {
    mockFetch.mockImplementation(() => statusResponse({ status: "SEND_TO_USER_INBOX" }));

    const result = await finalizeUpload(makeSession("inbox"), options);

    expect(result).toEqual({ status: "PUBLISHED", publishId: "p_test", publicPostIds: undefined });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("should keep waiting on SEND_TO_USER_INBOX for direct posts", async () => {
    mockFetch
      .mockImplementationOnce(() => statusResponse({ status: "SEND_TO_USER_INBOX" }))
      .mockImplementationOnce(() => statusResponse({ status: "PUBLISH_COMPLETE" }));

    const result = await finalizeUpload(makeSession("direct"), options);

    expect(result.status).toBe("PUBLISHED");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });
});
