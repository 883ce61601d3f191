import { normalizeUsername } from "../core/normalize";
import type { SearchResult } from "./models";

export type Target =
  | { kind: "profile"; username: string }
  | { kind: "media"; shortcode: string }
  | { kind: "unresolved"; reason: string };

export type ProfileTarget = Extract<Target, { kind: "profile" }>;
export type MediaTarget = Extract<Target, { kind: "media" }>;

/** The slice of session state the resolver reads. */
export interface ResolverContext {
  currentProfile: { username: string } | null;
  currentMedia: { shortcode: string } | null;
  lastSearch: SearchResult[];
}

const PRONOUNS = new Set(["this", "that", "these", "it", "current"]);
const RESERVED_SEGMENTS = new Set(["reel", "reels", "p", "tv", "stories", "explore", "accounts", "developer"]);
const MEDIA_PATH = /^\/(?:reel|reels|p|tv)\/([A-Za-z0-9_-]+)/;
const USERNAME = /^[A-Za-z0-9._]+$/;
const BARE_SHORTCODE = /^[A-Za-z0-9_-]{5,}$/;
const INSTAGRAM_HOST = /(^|\.)instagram\.com$/i;

function parseUrl(raw: string): URL | null {
  const candidate = /^https?:\/\//i.test(raw) ? raw : /^(www\.)?instagram\.com\//i.test(raw) ? `https://${raw}` : null;
  if (!candidate) return null;
  try {
    return new URL(candidate);
  } catch {
    return null;
  }
}

export function extractReelShortcode(input: string): string | null {
  const url = parseUrl(input.trim());
  if (!url || !INSTAGRAM_HOST.test(url.hostname)) return null;
  const match = MEDIA_PATH.exec(url.pathname);
  return match?.[1] ?? null;
}

export function extractProfileUsername(input: string): string | null {
  const raw = input.trim();
  if (!raw) return null;

  const url = parseUrl(raw);
  if (url) {
    if (!INSTAGRAM_HOST.test(url.hostname)) return null;
    const segments = url.pathname.split("/").filter(Boolean);
    const first = segments[0];
    if (!first) return null;
    // stories/<user>/<story id>
    const candidate = first.toLowerCase() === "stories" ? segments[1] : first;
    if (!candidate || RESERVED_SEGMENTS.has(candidate.toLowerCase())) return null;
    return USERNAME.test(candidate) ? normalizeUsername(candidate) : null;
  }

  if (raw.includes("/") || raw.includes(":")) return null;
  const handle = raw.startsWith("@") ? raw.slice(1) : raw;
  if (!handle || !USERNAME.test(handle)) return null;
  if (RESERVED_SEGMENTS.has(handle.toLowerCase())) return null;
  return normalizeUsername(handle);
}

function fromSearchResult(result: SearchResult): Target | null {
  if (result.resultType === "profile" && result.username) {
    return { kind: "profile", username: normalizeUsername(result.username) };
  }
  if (result.resultType === "media" && result.shortcode) {
    return { kind: "media", shortcode: result.shortcode };
  }
  return null;
}

function fromContext(context: ResolverContext): Target {
  if (context.currentMedia) return { kind: "media", shortcode: context.currentMedia.shortcode };
  if (context.currentProfile) return { kind: "profile", username: context.currentProfile.username };
  return { kind: "unresolved", reason: "No current profile or reel in this session yet." };
}

/**
 * Resolves a raw user-supplied target against the session snapshot.
 * Order: reel URL, search index, pronoun or empty input, profile forms.
 */
export function resolveTarget(input: string | null | undefined, context: ResolverContext): Target {
  const raw = (input ?? "").trim();

  const shortcode = extractReelShortcode(raw);
  if (shortcode) return { kind: "media", shortcode };

  if (/^\d{1,3}$/.test(raw)) {
    const index = Number(raw);
    const picked = index >= 1 ? context.lastSearch[index - 1] : undefined;
    if (picked) {
      const target = fromSearchResult(picked);
      if (target) return target;
    }
  }

  if (!raw || PRONOUNS.has(raw.toLowerCase())) return fromContext(context);

  const username = extractProfileUsername(raw);
  if (username) return { kind: "profile", username };

  return { kind: "unresolved", reason: `Could not recognise "${raw}" as a profile or reel.` };
}

/** Like resolveTarget, but pronouns prefer the current profile and media targets are rejected. */
export function resolveProfileTarget(input: string | null | undefined, context: ResolverContext): ProfileTarget | Extract<Target, { kind: "unresolved" }> {
  const raw = (input ?? "").trim();
  if (!raw || PRONOUNS.has(raw.toLowerCase())) {
    if (context.currentProfile) return { kind: "profile", username: context.currentProfile.username };
    return { kind: "unresolved", reason: "No current profile in this session yet." };
  }
  const target = resolveTarget(raw, context);
  if (target.kind === "media") {
    return { kind: "unresolved", reason: `"${raw}" points to a reel, not a profile.` };
  }
  return target;
}

export function resolveMediaTarget(input: string | null | undefined, context: ResolverContext): MediaTarget | Extract<Target, { kind: "unresolved" }> {
  const raw = (input ?? "").trim();
  if (!raw || PRONOUNS.has(raw.toLowerCase())) {
    if (context.currentMedia) return { kind: "media", shortcode: context.currentMedia.shortcode };
    return { kind: "unresolved", reason: "No current reel in this session yet." };
  }
  const target = resolveTarget(raw, context);
  if (target.kind === "media") return target;
  // Where a reel is expected, a bare token is read as a shortcode.
  if (BARE_SHORTCODE.test(raw) && !/^\d+$/.test(raw)) {
    return { kind: "media", shortcode: raw };
  }
  if (target.kind === "profile") {
    return { kind: "unresolved", reason: `"${raw}" points to a profile, not a reel.` };
  }
  return target;
}

export function profileUrl(username: string): string {
  return `https://www.instagram.com/${normalizeUsername(username)}/`;
}

export function mediaUrl(shortcode: string, productType?: string | null): string {
  const segment = productType === "clips" ? "reel" : "p";
  return `https://www.instagram.com/${segment}/${shortcode}/`;
}
