import { describe, it, expect } from "vitest";
import { executeTool, toolDefinitions } from "../../src/llm/tools";
import { Operations } from "../../src/orchestration/operations";
import { SessionContext } from "../../src/services/session-context";
import { FakeStatsClient, makeProfile, makeReel } from "../helpers/fake-stats-client";

function setup() {
  const client = new FakeStatsClient().addProfile(makeProfile("demo", { followerCount: 5000 }));
  client.addReel(makeReel("Abc12", { owner: "demo", views: 40 }));
  const ops = new Operations({ client, context: new SessionContext("test-model"), outputDir: "unused" });
  return { client, ops };
}

describe("tools", () => {
  it("should leave target and reel arguments optional in the definitions", () => {
    const required = new Map(
      toolDefinitions().map((definition) => [definition.name, definition.parameters.required])
    );

    for (const name of [
      "get_profile_stats",
      "get_reel_stats",
      "get_recent_reels",
      "get_followers_page",
      "get_top_followers",
      "download_profile_stories",
      "download_profile_highlights",
    ]) {
      expect(required.get(name)).toEqual([]);
    }
    expect(required.get("search_instagram")).toEqual(["query"]);
  });

  it("should answer for the current profile when the target is omitted", async () => {
    const { client, ops } = setup();
    await ops.profileStats("demo", { refresh: true });

    const outcome = await executeTool("get_profile_stats", "{}", { ops });

    expect(outcome).toMatchObject({ ok: true, data: { fromSession: true, profile: { username: "demo" } } });
    expect(client.count("getProfile:")).toBe(1);
  });

  it("should use the current reel when the reel argument is omitted", async () => {
    const { ops } = setup();
    await ops.reel("https://www.instagram.com/reel/Abc12/");

    const outcome = await executeTool("get_reel_stats", "{}", { ops });

    expect(outcome).toMatchObject({ ok: true, data: { shortcode: "Abc12", views: 40 } });
  });
});
