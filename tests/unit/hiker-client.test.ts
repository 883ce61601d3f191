import { describe, it, expect } from "vitest";
import {
  ConfigError,
  DataApiError,
  MalformedResponseError,
  RateLimitError,
  UnauthorizedError,
} from "../../src/core/errors";
import { HikerApiClient } from "../../src/platforms/instagram/hiker-client";
import { makeProfile } from "../helpers/fake-stats-client";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

/** Answers requests from a queue and keeps the requested URLs. */
function queuedFetch(responses: Response[]) {
  const urls: URL[] = [];
  const fetchImpl = async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    urls.push(new URL(input instanceof Request ? input.url : input));
    const next = responses.shift();
    if (!next) throw new Error("no response queued");
    return next;
  };
  return { urls, fetchImpl };
}

function clientWith(responses: Response[], accessKey: string | null = "test-hiker-key") {
  const { urls, fetchImpl } = queuedFetch(responses);
  const client = new HikerApiClient({
    accessKey,
    baseUrl: "https://data.example.test/",
    timeoutMs: 1000,
    fetchImpl,
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 },
  });
  return { client, urls };
}

describe("HikerApiClient", () => {
  it("should send the access key as a query parameter and parse the profile", async () => {
    const { client, urls } = clientWith([jsonResponse({ pk: "42", username: "Demo", follower_count: 1500 })]);

    const profile = await client.getProfile("demo");

    expect(profile.username).toBe("demo");
    expect(profile.followerCount).toBe(1500);
    expect(urls[0]?.origin + (urls[0]?.pathname ?? "")).toBe("https://data.example.test/v1/user/by/username");
    expect(urls[0]?.searchParams.get("username")).toBe("demo");
    expect(urls[0]?.searchParams.get("access_key")).toBe("test-hiker-key");
  });

  it("should refuse to call the API without an access key", async () => {
    const { client, urls } = clientWith([], null);

    await expect(client.getProfile("demo")).rejects.toBeInstanceOf(ConfigError);
    expect(urls).toHaveLength(0);
  });

  it("should map auth and rate limit responses without retrying", async () => {
    const unauthorized = clientWith([jsonResponse({ detail: "bad key" }, 401)]);
    await expect(unauthorized.client.getProfile("demo")).rejects.toThrow(
      new UnauthorizedError("Data API rejected the access key: HTTP 401 (bad key)")
    );
    expect(unauthorized.urls).toHaveLength(1);

    const limited = clientWith([jsonResponse({}, 429)]);
    await expect(limited.client.getProfile("demo")).rejects.toBeInstanceOf(RateLimitError);
    expect(limited.urls).toHaveLength(1);
  });

  it("should retry server errors", async () => {
    const { client, urls } = clientWith([
      jsonResponse({ detail: "busy" }, 503),
      jsonResponse({ pk: "42", username: "demo" }),
    ]);

    await expect(client.getProfile("demo")).resolves.toMatchObject({ username: "demo" });
    expect(urls).toHaveLength(2);
  });

  it("should give up after the last attempt with the HTTP status", async () => {
    const { client, urls } = clientWith([jsonResponse({}, 500), jsonResponse({}, 502), jsonResponse({}, 500)]);

    const error = await client.getProfile("demo").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataApiError);
    expect(error).toMatchObject({ code: "http_500", status: 500 });
    expect(urls).toHaveLength(3);
  });

  it("should reject bodies that are not JSON", async () => {
    const { client } = clientWith([new Response("<html>oops</html>", { status: 200 })]);

    await expect(client.getProfile("demo")).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("should read the followers cursor from the page payload", async () => {
    const { client, urls } = clientWith([
      jsonResponse({
        response: { users: [{ pk: "7", username: "fan" }] },
        next_page_id: "page-2",
      }),
    ]);

    const page = await client.getFollowersPage(makeProfile("demo"), "page-1");

    expect(page.followers.map((f) => f.username)).toEqual(["fan"]);
    expect(page.nextCursor).toBe("page-2");
    expect(urls[0]?.searchParams.get("user_id")).toBe("id-demo");
    expect(urls[0]?.searchParams.get("page_id")).toBe("page-1");
  });
});
