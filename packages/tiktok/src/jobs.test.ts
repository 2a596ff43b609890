import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { IOError, InvalidInputError } from "./errors.js";
import { buildTitle, loadJobs, parseJobs } from "./jobs.js";

describe("buildTitle", () => {
  it("should append tags as hashtags", () => {
    expect(buildTitle("Sunset over the bay", ["travel", "#sunset"])).toBe(
      "Sunset over the bay #travel #sunset",
    );
  });

  it("should skip blank parts", () => {
    expect(buildTitle("  ", [" ", "cats"])).toBe("#cats");
    expect(buildTitle("No tags here", [])).toBe("No tags here");
  });
});

describe("parseJobs", () => {
  it("should map snake_case entries to upload jobs", () => {
    const { jobs, rejected } = parseJobs(
      [
        {
          user_id: "user-1",
          video_path: "clips/a.mp4",
          description: "First clip",
          tags: ["one"],
          privacy_level: "SELF_ONLY",
          disable_comment: true,
          video_cover_timestamp_ms: 1000,
          is_aigc: true,
          duration_sec: 42,
        },
      ],
      "/data/queue",
    );

    expect(rejected).toEqual([]);
    expect(jobs).toEqual([
      {
        userId: "user-1",
        videoPath: "/data/queue/clips/a.mp4",
        description: "First clip",
        tags: ["one"],
        post: {
          privacyLevel: "SELF_ONLY",
          disableComment: true,
          disableDuet: undefined,
          disableStitch: undefined,
          videoCoverTimestampMs: 1000,
          brandContentToggle: undefined,
          brandOrganicToggle: undefined,
          isAigc: true,
          durationSec: 42,
        },
      },
    ]);
  });

  it("should keep absolute video paths", () => {
    const { jobs } = parseJobs(
      [{ user_id: "u", video_path: "/videos/b.mp4", description: "" }],
      "/data/queue",
    );

    expect(jobs[0].videoPath).toBe("/videos/b.mp4");
    expect(jobs[0].tags).toEqual([]);
  });

  it("should reject malformed entries individually", () => {
    const { jobs, rejected } = parseJobs(
      [
        { user_id: "ok", video_path: "a.mp4", description: "fine" },
        { video_path: "b.mp4", description: "no user" },
        "not an object",
        { user_id: "u", video_path: "c.mp4", description: "x", privacy_level: "EVERYONE" },
      ],
      "/q",
    );

    expect(jobs.map((job) => job.userId)).toEqual(["ok"]);
    expect(rejected.map((entry) => entry.index)).toEqual([1, 2, 3]);
    expect(rejected.every((entry) => entry.error instanceof InvalidInputError)).toBe(true);
    expect(rejected[0].error.message).toBe("Job #1 is malformed: user_id Required");
  });

  it("should refuse a queue that is not an array", () => {
    expect(() => parseJobs({ user_id: "u" }, "/q")).toThrow(
      "Job queue must be a JSON array of upload jobs",
    );
  });
});

describe("loadJobs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "jobs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should resolve video paths against the queue file's directory", async () => {
    const file = join(dir, "videos_to_upload.json");
    await writeFile(
      file,
      JSON.stringify([
        { user_id: "user-1", video_path: "a.mp4", description: "A", tags: ["x"] },
      ]),
    );

    const { jobs } = await loadJobs(file);

    expect(jobs[0].videoPath).toBe(join(dir, "a.mp4"));
  });

  it("should raise IOError when the queue file is missing", async () => {
    await expect(loadJobs(join(dir, "missing.json"))).rejects.toBeInstanceOf(IOError);
  });

  it("should raise InvalidInputError for invalid JSON", async () => {
    const file = join(dir, "broken.json");
    await writeFile(file, "[{");

    await expect(loadJobs(file)).rejects.toBeInstanceOf(InvalidInputError);
  });
});
