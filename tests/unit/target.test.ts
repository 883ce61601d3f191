import { describe, it, expect } from "vitest";
import type { SearchResult } from "../../src/domain/models";
import {
  extractProfileUsername,
  extractReelShortcode,
  mediaUrl,
  resolveMediaTarget,
  resolveProfileTarget,
  resolveTarget,
  type ResolverContext,
} from "../../src/domain/target";

const emptyContext = (): ResolverContext => ({ currentProfile: null, currentMedia: null, lastSearch: [] });

function searchResult(overrides: Partial<SearchResult>): SearchResult {
  return {
    resultType: "unknown",
    id: null,
    username: null,
    fullName: null,
    shortcode: null,
    mediaUrl: null,
    verified: false,
    private: false,
    caption: null,
    ...overrides,
  };
}

describe("extractProfileUsername", () => {
  it("should normalize URL, @handle and bare forms to the same username", () => {
    const forms = [
      "https://www.instagram.com/Some.User/?igsh=abc",
      "instagram.com/some.user",
      "@Some.User",
      "some.user",
      "https://instagram.com/stories/some.user/3141592653/",
    ];
    expect(forms.map(extractProfileUsername)).toEqual(Array(forms.length).fill("some.user"));
  });

  it("should reject reserved paths, foreign hosts and malformed handles", () => {
    expect(extractProfileUsername("https://www.instagram.com/explore/")).toBeNull();
    expect(extractProfileUsername("https://example.com/some.user")).toBeNull();
    expect(extractProfileUsername("some user")).toBeNull();
    expect(extractProfileUsername("a/b")).toBeNull();
    expect(extractProfileUsername("")).toBeNull();
  });
});

describe("extractReelShortcode", () => {
  it("should read reel, post and tv links", () => {
    expect(extractReelShortcode("https://www.instagram.com/reel/AbC_12-x/?igsh=1")).toBe("AbC_12-x");
    expect(extractReelShortcode("instagram.com/p/XYZ123/")).toBe("XYZ123");
    expect(extractReelShortcode("https://www.instagram.com/tv/Tv0001")).toBe("Tv0001");
  });

  it("should ignore profile links and other hosts", () => {
    expect(extractReelShortcode("https://www.instagram.com/some.user/")).toBeNull();
    expect(extractReelShortcode("https://example.com/reel/AbC123/")).toBeNull();
  });
});

describe("resolveTarget", () => {
  it("should resolve an empty or pronoun target to the current reel first", () => {
    const context: ResolverContext = {
      currentProfile: { username: "owner" },
      currentMedia: { shortcode: "R1" },
      lastSearch: [],
    };
    expect(resolveTarget("", context)).toEqual({ kind: "media", shortcode: "R1" });
    expect(resolveTarget("this", context)).toEqual({ kind: "media", shortcode: "R1" });
    expect(resolveTarget(undefined, context)).toEqual({ kind: "media", shortcode: "R1" });
  });

  it("should fall back to the current profile when no reel is current", () => {
    const context: ResolverContext = { currentProfile: { username: "owner" }, currentMedia: null, lastSearch: [] };
    expect(resolveTarget("it", context)).toEqual({ kind: "profile", username: "owner" });
  });

  it("should be unresolved with nothing in the session", () => {
    expect(resolveTarget("that", emptyContext()).kind).toBe("unresolved");
  });

  it("should pick numbered entries of the last search", () => {
    const context: ResolverContext = {
      currentProfile: null,
      currentMedia: null,
      lastSearch: [
        searchResult({ resultType: "profile", username: "First.One" }),
        searchResult({ resultType: "media", shortcode: "Media2" }),
      ],
    };
    expect(resolveTarget("1", context)).toEqual({ kind: "profile", username: "first.one" });
    expect(resolveTarget("2", context)).toEqual({ kind: "media", shortcode: "Media2" });
  });

  it("should prefer a reel link over session state", () => {
    const context: ResolverContext = { currentProfile: { username: "owner" }, currentMedia: null, lastSearch: [] };
    expect(resolveTarget("https://www.instagram.com/reel/New123/", context)).toEqual({ kind: "media", shortcode: "New123" });
  });
});

describe("resolveProfileTarget", () => {
  it("should use the current profile for pronouns even when a reel is current", () => {
    const context: ResolverContext = {
      currentProfile: { username: "owner" },
      currentMedia: { shortcode: "R1" },
      lastSearch: [],
    };
    expect(resolveProfileTarget("this", context)).toEqual({ kind: "profile", username: "owner" });
  });

  it("should reject reel links", () => {
    const target = resolveProfileTarget("https://www.instagram.com/reel/ABCDE/", emptyContext());
    expect(target.kind).toBe("unresolved");
  });
});

describe("resolveMediaTarget", () => {
  it("should read a bare token as a shortcode", () => {
    expect(resolveMediaTarget("Ab-cd_12", emptyContext())).toEqual({ kind: "media", shortcode: "Ab-cd_12" });
  });

  it("should reject tokens that can only be usernames", () => {
    const target = resolveMediaTarget("ab.c", emptyContext());
    expect(target).toEqual({ kind: "unresolved", reason: '"ab.c" points to a profile, not a reel.' });
  });

  it("should use the current reel when the target is omitted", () => {
    const context: ResolverContext = { currentProfile: null, currentMedia: { shortcode: "R9" }, lastSearch: [] };
    expect(resolveMediaTarget(null, context)).toEqual({ kind: "media", shortcode: "R9" });
  });
});

describe("mediaUrl", () => {
  it("should link clips to /reel/ and everything else to /p/", () => {
    expect(mediaUrl("Abc", "clips")).toBe("https://www.instagram.com/reel/Abc/");
    expect(mediaUrl("Abc", "carousel_container")).toBe("https://www.instagram.com/p/Abc/");
  });
});
