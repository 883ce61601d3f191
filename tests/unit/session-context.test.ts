import { describe, it, expect } from "vitest";
import type { ProfileStats } from "../../src/domain/models";
import { resolveTarget } from "../../src/domain/target";
import { HISTORY_CAPACITY, RECENT_REELS_CAPACITY, SessionContext } from "../../src/services/session-context";
import { makeProfile, makeReel } from "../helpers/fake-stats-client";

function stats(username: string): ProfileStats {
  return {
    ...makeProfile(username),
    hasStories: null,
    storiesCount: null,
    storiesError: null,
    fetchedAt: "2026-01-01T00:00:00.000Z",
  };
}

describe("SessionContext", () => {
  it("should resolve an omitted target to the reel fetched last", () => {
    const context = new SessionContext("test-model");
    context.setProfile(stats("owner"));
    context.setMedia(makeReel("R1", { owner: "owner" }));

    expect(resolveTarget("", context)).toEqual({ kind: "media", shortcode: "R1" });
  });

  it("should drop the current reel when switching to another profile", () => {
    const context = new SessionContext("test-model");
    context.setProfile(stats("first"));
    context.setMedia(makeReel("R1"));
    context.setProfile(stats("second"));

    expect(context.currentMedia).toBeNull();
    expect(context.recentReels).toEqual([]);
  });

  it("should keep recent reels newest first without duplicates", () => {
    const context = new SessionContext("test-model");
    context.setMedia(makeReel("A"));
    context.setMedia(makeReel("B"));
    context.setMedia(makeReel("A"));

    expect(context.recentReels.map((r) => r.shortcode)).toEqual(["A", "B"]);
  });

  it("should not treat photo posts as reels", () => {
    const context = new SessionContext("test-model");
    context.setMedia(makeReel("P1", { productType: "feed", mediaType: 1 }));

    expect(context.currentMedia?.shortcode).toBe("P1");
    expect(context.recentReels).toEqual([]);
  });

  it("should cap recent reels and history", () => {
    const context = new SessionContext("test-model");
    for (let i = 0; i < RECENT_REELS_CAPACITY + 5; i++) context.pushRecentReel(makeReel(`R${i}`));
    for (let i = 0; i < HISTORY_CAPACITY + 3; i++) context.appendHistory("user", `q${i}`);

    expect(context.recentReels).toHaveLength(RECENT_REELS_CAPACITY);
    expect(context.recentReels[0]?.shortcode).toBe(`R${RECENT_REELS_CAPACITY + 4}`);
    expect(context.history).toHaveLength(HISTORY_CAPACITY);
    expect(context.recentHistory(2).map((t) => t.content)).toEqual([`q${HISTORY_CAPACITY + 1}`, `q${HISTORY_CAPACITY + 2}`]);
  });

  it("should accumulate budget counters and cache profiles by normalized name", () => {
    const context = new SessionContext("test-model");
    context.recordBudget({ pageRequests: 2, cacheHits: 1 });
    context.recordBudget({ pageRequests: 1, profileLookups: 3 });
    context.cacheProfile(makeProfile("mixed.case"));

    expect(context.snapshotBudget()).toEqual({ pageRequests: 3, profileLookups: 3, mediaLookups: 0, cacheHits: 1 });
    expect(context.getCachedProfile("@Mixed.Case")?.username).toBe("mixed.case");
  });

  it("should number search results in the agent context", () => {
    const context = new SessionContext("test-model");
    context.setSearch({
      kind: "search_results",
      entries: [
        {
          resultType: "profile",
          id: "1",
          username: "found",
          fullName: null,
          shortcode: null,
          mediaUrl: null,
          verified: false,
          private: false,
          caption: null,
        },
      ],
      fetchedAt: "2026-01-01T00:00:00.000Z",
      filenameHint: "search-found",
      metadata: {},
    });

    const snapshot = context.toAgentContext();
    expect(snapshot.last_search).toEqual([{ index: 1, type: "profile", username: "found", shortcode: null }]);
    expect(snapshot.last_collection).toEqual({ kind: "search_results", count: 1, filename_hint: "search-found" });
    expect(snapshot.model).toBe("test-model");
  });

  it("should clear everything on reset", () => {
    const context = new SessionContext("test-model");
    context.setProfile(stats("owner"));
    context.recordBudget({ cacheHits: 4 });
    context.reset();

    expect(context.currentProfile).toBeNull();
    expect(context.cachedProfileCount).toBe(0);
    expect(context.snapshotBudget().cacheHits).toBe(0);
  });
});
