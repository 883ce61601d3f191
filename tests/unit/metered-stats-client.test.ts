import { describe, it, expect } from "vitest";
import { ConfigError, DataApiError, NotFoundError } from "../../src/core/errors";
import { MeteredStatsClient } from "../../src/services/metered-stats-client";
import { SessionContext } from "../../src/services/session-context";
import { FakeStatsClient, makeProfile, makeReel } from "../helpers/fake-stats-client";

function setup() {
  const inner = new FakeStatsClient().addProfile(makeProfile("demo"));
  const context = new SessionContext("test-model");
  return { inner, context, client: new MeteredStatsClient(inner, context) };
}

describe("MeteredStatsClient", () => {
  it("should charge one unit per call by kind", async () => {
    const { inner, context, client } = setup();
    inner.addReel(makeReel("Abc12"));

    await client.getProfile("demo");
    await client.getReel("Abc12");
    await client.search("coffee", 5);

    expect(context.snapshotBudget()).toEqual({ pageRequests: 1, profileLookups: 1, mediaLookups: 1, cacheHits: 0 });
  });

  it("should charge calls that fail upstream", async () => {
    const { context, client } = setup();

    await expect(client.getProfile("ghost")).rejects.toBeInstanceOf(NotFoundError);

    expect(context.snapshotBudget().profileLookups).toBe(1);
  });

  it("should not charge calls stopped by a missing access key", async () => {
    const { inner, context, client } = setup();
    inner.failures.set("getProfile:demo", new ConfigError("HIKERAPI_KEY is not set"));

    await expect(client.getProfile("demo")).rejects.toBeInstanceOf(ConfigError);

    expect(context.snapshotBudget().profileLookups).toBe(0);
  });

  it("should charge a reel page request that fails", async () => {
    const { inner, context, client } = setup();
    inner.failures.set("getReelsByFilter:demo", new DataApiError("HTTP 500", "http_500", 500));
    let seen = 0;

    await expect(
      client.getReelsByFilter(makeProfile("demo"), { limit: 5, maxPages: 1, onPageRequest: () => seen++ })
    ).rejects.toBeInstanceOf(DataApiError);

    expect(context.snapshotBudget().pageRequests).toBe(1);
    expect(seen).toBe(1);
  });
});
