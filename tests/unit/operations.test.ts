import { describe, it, expect } from "vitest";
import { existsSync } from "fs";
import os from "os";
import path from "path";
import { DataApiError, ExportTargetMissingError, UnresolvedTargetError } from "../../src/core/errors";
import { Operations } from "../../src/orchestration/operations";
import { SessionContext } from "../../src/services/session-context";
import { FakeStatsClient, makeFollower, makeProfile, makeReel, makeStory } from "../helpers/fake-stats-client";

const NOW = new Date("2026-03-04T05:06:07.000Z");

function setup(outputDir = path.join(os.tmpdir(), "reelscope-ops-unused")) {
  const client = new FakeStatsClient().addProfile(makeProfile("demo", { followerCount: 5000 }));
  const context = new SessionContext("test-model");
  const ops = new Operations({ client, context, outputDir, now: () => NOW });
  return { client, context, ops };
}

describe("Operations", () => {
  describe("profileStats", () => {
    it("should answer the current profile from the session unless refresh is set", async () => {
      const { client, context, ops } = setup();
      client.stories.set("demo", [makeStory("s1"), makeStory("s2")]);

      const fresh = await ops.profileStats("demo", { refresh: true });
      const cached = await ops.profileStats("@demo");

      expect(fresh.fromSession).toBe(false);
      expect(fresh.profile.storiesCount).toBe(2);
      expect(fresh.profile.hasStories).toBe(true);
      expect(cached.fromSession).toBe(true);
      expect(cached.profile).toBe(fresh.profile);
      expect(client.count("getProfile:")).toBe(1);
      expect(context.snapshotBudget()).toEqual({ pageRequests: 1, profileLookups: 1, mediaLookups: 0, cacheHits: 1 });
    });

    it("should return the profile without stories when the stories lookup fails", async () => {
      const { client, ops } = setup();
      client.failures.set("getStories:demo", new DataApiError("stories unavailable", "http_500", 500));

      const { profile } = await ops.profileStats("demo");

      expect(profile.username).toBe("demo");
      expect(profile.storiesCount).toBeNull();
      expect(profile.hasStories).toBeNull();
      expect(profile.storiesError).toBe("stories unavailable");
    });
  });

  describe("stats", () => {
    it("should route reel links to reel stats and make the reel current", async () => {
      const { client, context, ops } = setup();
      client.addReel(makeReel("R1", { views: 1234 }));

      const result = await ops.stats("https://www.instagram.com/reel/R1/");

      expect(result.kind).toBe("reel");
      expect(context.currentMedia?.shortcode).toBe("R1");
      expect(context.snapshotBudget().mediaLookups).toBe(1);
    });

    it("should resolve a search index to the listed profile", async () => {
      const { client, context, ops } = setup();
      client.searchResults = [
        {
          resultType: "profile",
          id: "1",
          username: "demo",
          fullName: null,
          shortcode: null,
          mediaUrl: null,
          verified: false,
          private: false,
          caption: null,
        },
      ];

      await ops.search("demo account");
      const result = await ops.stats("1");

      expect(result.kind).toBe("profile");
      expect(context.currentProfile?.username).toBe("demo");
      expect(context.lastCollection?.kind).toBe("search_results");
    });
  });

  describe("topFollowers", () => {
    it("should sample at most sample_size followers and rank at most top_n", async () => {
      const { client, context, ops } = setup();
      const followers = Array.from({ length: 40 }, (_, i) => makeFollower(`f${i}`));
      followers.forEach((f, i) => client.addProfile(makeProfile(f.username, { followerCount: 1000 - i })));
      client.setFollowers("demo", followers, 40);

      const first = await ops.topFollowers("demo", { sampleSize: 25, topN: 10 });
      const lookupsAfterFirst = context.snapshotBudget().profileLookups;
      const second = await ops.topFollowers("demo", { sampleSize: 25, topN: 10 });

      expect(first.enrichedCount + first.cacheHitsUsed).toBeLessThanOrEqual(25);
      expect(first.ranked).toHaveLength(10);
      const counts = first.ranked.map((u) => u.followerCount);
      expect(counts).toEqual([...counts].sort((a, b) => b - a));
      expect(context.snapshotBudget().profileLookups).toBe(lookupsAfterFirst);
      expect(second.ranked).toEqual(first.ranked);
      expect(context.lastCollection?.kind).toBe("top_followers");
      expect(context.lastCollection?.filenameHint).toBe("demo-top-followers");
    });

    it("should leave the session untouched when a fetch fails", async () => {
      const { client, context, ops } = setup();
      client.failures.set("getFollowersPage:demo:", new DataApiError("upstream down", "http_503", 503));

      await expect(ops.topFollowers("demo")).rejects.toThrow("upstream down");
      expect(context.currentProfile).toBeNull();
      expect(context.lastCollection).toBeNull();
    });
  });

  describe("lastReelMetric", () => {
    it("should read the newest reel of the current profile from the session", async () => {
      const { client, context, ops } = setup();
      client.profileReels.set("demo", [makeReel("NEW", { views: 900 }), makeReel("OLD", { views: 50 })]);

      await ops.recentReels("demo");
      const reelCalls = client.count("getReelsByFilter:");
      const result = await ops.lastReelMetric(null, "views");

      expect(result).toMatchObject({ target: "demo", metric: "views", value: 900 });
      expect(client.count("getReelsByFilter:")).toBe(reelCalls);
      expect(context.currentMedia?.shortcode).toBe("NEW");
    });

    it("should ignore reels of other accounts looked up since the list was loaded", async () => {
      const { client, ops } = setup();
      client.profileReels.set("demo", [
        makeReel("DEMONEW", { views: 900, publishedAt: "2026-03-01T00:00:00.000Z" }),
        makeReel("DEMOOLD", { views: 50, publishedAt: "2026-02-01T00:00:00.000Z" }),
      ]);
      client.addReel(makeReel("OTHERX", { owner: "other", views: 7, publishedAt: "2026-03-03T00:00:00.000Z" }));

      await ops.recentReels("demo");
      await ops.reel("https://www.instagram.com/reel/OTHERX/");
      const result = await ops.lastReelMetric("demo", "views");

      expect(result.value).toBe(900);
      expect(result.reel.shortcode).toBe("DEMONEW");
      expect(client.count("getReelsByFilter:")).toBe(1);
    });

    it("should fetch the reel list when only single reels of the profile were looked up", async () => {
      const { client, ops } = setup();
      client.addReel(makeReel("DEMOOLD", { owner: "demo", views: 50, publishedAt: "2026-02-01T00:00:00.000Z" }));
      client.profileReels.set("demo", [makeReel("DEMONEW", { views: 900, publishedAt: "2026-03-01T00:00:00.000Z" })]);

      await ops.reel("https://www.instagram.com/reel/DEMOOLD/");
      const result = await ops.lastReelMetric("demo", "views");

      expect(result.reel.shortcode).toBe("DEMONEW");
      expect(client.count("getReelsByFilter:")).toBe(1);
    });

    it("should ask for a target when nothing is loaded", async () => {
      const { ops } = setup();
      await expect(ops.lastReelMetric(null, "likes")).rejects.toBeInstanceOf(UnresolvedTargetError);
    });
  });

  describe("rankLikers", () => {
    it("should require a reel when none is given or current", async () => {
      const { ops } = setup();
      await expect(ops.rankLikers([])).rejects.toBeInstanceOf(UnresolvedTargetError);
    });
  });

  describe("exportLast", () => {
    it("should fail without writing anything when no list was loaded", async () => {
      const outputDir = path.join(os.tmpdir(), `reelscope-export-missing-${process.pid}-${Date.now()}`);
      const { ops } = setup(outputDir);

      await expect(ops.exportLast("csv", "latest-reels")).rejects.toBeInstanceOf(ExportTargetMissingError);
      expect(existsSync(outputDir)).toBe(false);
    });
  });
});
