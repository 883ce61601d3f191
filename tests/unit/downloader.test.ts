import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { NotFoundError } from "../../src/core/errors";
import type { Highlight } from "../../src/domain/models";
import { planAudioDownload, planHighlightsDownload, planStoriesDownload } from "../../src/orchestration/download-planner";
import { assetFileName, downloadPlan } from "../../src/services/downloader";
import { FakeStatsClient, makeReel, makeStory } from "../helpers/fake-stats-client";

const NOW = new Date(2026, 0, 2, 3, 4, 5);

function highlight(id: string, title: string): Highlight {
  return { id, title, owner: "demo", mediaCount: 2, createdAt: null, pinned: false };
}

describe("assetFileName", () => {
  it("should number files and keep shortcodes case-sensitive", () => {
    expect(assetFileName(3, "AbC_1", "video", ".mp4")).toBe("03_AbC_1.mp4");
    expect(assetFileName(12, "a/b", "image", ".jpg")).toBe("12_a-b.jpg");
    expect(assetFileName(1, null, "image", ".jpg")).toBe("01_image.jpg");
  });
});

describe("download planning", () => {
  it("should skip stories without a file url", () => {
    const plan = planStoriesDownload("demo", [makeStory("s1"), makeStory("s2", { imageUrl: null })]);

    expect(plan.assets).toHaveLength(1);
    expect(plan.assets[0]).toMatchObject({ index: 1, code: "s1", extension: ".jpg", group: null });
    expect(plan.details).toEqual({ username: "demo", storyCount: 2 });
  });

  it("should refuse an audio download when the reel has no track", () => {
    expect(() => planAudioDownload({ reel: makeReel("R1"), assets: [], audio: null })).toThrow(NotFoundError);
  });
});

describe("downloadPlan", () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "reelscope-download-"));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it("should put highlight items in per-highlight folders and describe them in metadata.json", async () => {
    const client = new FakeStatsClient();
    client.highlightItems.set("h1", [
      makeStory("s1"),
      makeStory("s2", { isVideo: true, code: "Cde2", videoUrl: "https://cdn.example.test/s2.mp4" }),
    ]);
    client.binaries.set("https://cdn.example.test/s1.jpg", new Uint8Array([1, 2, 3]));
    client.binaries.set("https://cdn.example.test/s2.mp4", new Uint8Array([4, 5]));

    const plan = await planHighlightsDownload(client, "demo", [highlight("h1", "Travel Trips"), highlight("h2", "Food")], {
      titleFilter: "TRAVEL",
    });
    const result = await downloadPlan(plan, client, { outputDir, now: NOW });

    expect(client.count("getHighlightItems:")).toBe(1);
    expect(result.outputDir).toBe(path.join(outputDir, "downloads", "demo_20260102_030405"));
    expect(result.files.map((f) => path.relative(result.outputDir, f.path))).toEqual([
      path.join("travel-trips_h1", "01_s1.jpg"),
      path.join("travel-trips_h1", "02_Cde2.mp4"),
    ]);
    expect(Array.from(await fs.readFile(result.files[1]?.path ?? ""))).toEqual([4, 5]);

    const metadata = JSON.parse(await fs.readFile(result.metadataPath, "utf8"));
    expect(metadata.downloadKind).toBe("highlights");
    expect(metadata.createdAt).toBe(NOW.toISOString());
    expect(metadata.details.highlights).toEqual([{ id: "h1", title: "Travel Trips", mediaCount: 2 }]);
    expect(metadata.files[0]).toEqual({
      path: path.join("travel-trips_h1", "01_s1.jpg"),
      kind: "image",
      url: "https://cdn.example.test/s1.jpg",
      code: "s1",
      group: "travel-trips_h1",
    });
  });

  it("should fail when a file cannot be fetched", async () => {
    const client = new FakeStatsClient();
    const plan = planStoriesDownload("demo", [makeStory("missing")]);

    await expect(downloadPlan(plan, client, { outputDir, now: NOW })).rejects.toBeInstanceOf(NotFoundError);
  });
});
