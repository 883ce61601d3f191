import type {
  BudgetCounters,
  Comment,
  DownloadResult,
  Highlight,
  Liker,
  RankedUser,
  ReelStats,
  SearchResult,
  Story,
} from "../domain/models";
import type { ExportResult } from "../services/exporter";
import type {
  FollowersResult,
  MediaListResult,
  ProfileListResult,
  ProfileStatsResult,
  RankLikersResult,
  ReelMetricResult,
  ReelsResult,
  SearchOutcome,
  StatsResult,
  TopFollowersResult,
} from "../orchestration/operations";

const num = (value: number) => value.toLocaleString("en-US");
const pct = (value: number | null) => (value === null ? "n/a" : `${value.toFixed(2)}%`);
const orDash = (value: string | null | undefined) => (value && value.trim() ? value : "-");

function oneLine(text: string | null, max = 80): string {
  if (!text) return "";
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

function handle(user: { username: string; verified: boolean; private: boolean }): string {
  const flags = [user.verified ? "verified" : null, user.private ? "private" : null].filter(Boolean);
  return flags.length > 0 ? `@${user.username} (${flags.join(", ")})` : `@${user.username}`;
}

export function renderProfile({ profile, fromSession }: ProfileStatsResult): string {
  const lines = [
    `${handle(profile)}${profile.fullName ? ` · ${profile.fullName}` : ""}`,
    `  Followers: ${num(profile.followerCount)}`,
    `  Following: ${num(profile.followingCount)}`,
    `  Posts:     ${num(profile.postCount)}`,
  ];
  if (profile.storiesCount !== null) {
    lines.push(`  Stories:   ${profile.storiesCount > 0 ? `${profile.storiesCount} active` : "none"}`);
  } else if (profile.storiesError) {
    lines.push(`  Stories:   unavailable (${profile.storiesError})`);
  }
  if (profile.biography) lines.push(`  Bio:       ${oneLine(profile.biography)}`);
  if (profile.externalUrl) lines.push(`  Link:      ${profile.externalUrl}`);
  lines.push(fromSession ? `  (from session, fetched ${profile.fetchedAt})` : `  Fetched:   ${profile.fetchedAt}`);
  return lines.join("\n");
}

export function renderReel(reel: ReelStats): string {
  const lines = [
    `${reel.url}${reel.owner ? ` by @${reel.owner}` : ""}`,
    `  Views:      ${num(reel.views)}`,
    `  Likes:      ${num(reel.likes)}`,
    `  Comments:   ${num(reel.comments)}`,
    `  Saves:      ${num(reel.saves)}`,
    `  Engagement: ${pct(reel.engagementRate)}`,
    `  Viral:      ${reel.viralIndex.toFixed(2)} (${reel.viralStatus.replace("_", " ")})`,
    `  Published:  ${orDash(reel.publishedAt)}`,
  ];
  if (reel.reelKind !== "unknown") lines.push(`  Kind:       ${reel.reelKind}`);
  if (reel.caption) lines.push(`  Caption:    ${oneLine(reel.caption)}`);
  return lines.join("\n");
}

export function renderStats(result: StatsResult): string {
  return result.kind === "reel" ? renderReel(result.result) : renderProfile(result.result);
}

function reelRow(reel: ReelStats, index: number): string {
  return `${String(index + 1).padStart(2)}. ${reel.shortcode}  ${orDash(reel.publishedAt)}  views ${num(reel.views)}  likes ${num(reel.likes)}  comments ${num(reel.comments)}  ER ${pct(reel.engagementRate)}`;
}

export function renderReels(result: ReelsResult): string {
  const scope = result.daysBack ? `from the last ${result.daysBack} days` : "latest";
  if (result.reels.length === 0) return `No reels ${scope} for @${result.profile.username}.`;
  return [
    `Reels of @${result.profile.username} (${scope}, ${result.reels.length} shown, ${result.pagesUsed} page(s) read):`,
    ...result.reels.map(reelRow),
  ].join("\n");
}

export function renderReelMetric(result: ReelMetricResult): string {
  const value = result.value === null ? "n/a" : typeof result.value === "number" ? num(result.value) : result.value;
  return `Latest reel of @${result.target} (${result.reel.shortcode}): ${result.metric} = ${value}`;
}

function userRow(user: { username: string; fullName: string | null; verified: boolean; private: boolean }, index: number): string {
  return `${String(index + 1).padStart(2)}. ${handle(user)}${user.fullName ? ` · ${user.fullName}` : ""}`;
}

export function renderFollowers(result: FollowersResult): string {
  const lines = [`Followers of @${result.profile.username} (${result.followers.length}):`, ...result.followers.map(userRow)];
  if (result.nextPageId) lines.push(`Next page: followers ${result.profile.username} ${result.followers.length} ${result.nextPageId}`);
  return lines.join("\n");
}

function rankedRow(user: RankedUser): string {
  const liked = user.likedCount > 0 ? `  liked ${user.likedCount}` : "";
  return `${String(user.rank).padStart(2)}. ${handle(user)}  followers ${num(user.followerCount)}${liked}`;
}

function sampleFooter(result: { sampledCount: number; enrichedCount: number; cacheHitsUsed: number; truncated: boolean; truncationReason: string | null }): string {
  const parts = [
    `Approximate: ranked from a sample of ${result.sampledCount}`,
    `${result.enrichedCount} looked up, ${result.cacheHitsUsed} from cache`,
  ];
  if (result.truncated) parts.push(`stopped early (${result.truncationReason ?? "unknown"})`);
  return parts.join("; ") + ".";
}

export function renderTopFollowers(result: TopFollowersResult): string {
  if (result.ranked.length === 0) return `No followers could be ranked for @${result.profile.username}. ${sampleFooter(result)}`;
  return [`Top followers of @${result.profile.username}:`, ...result.ranked.map(rankedRow), sampleFooter(result)].join("\n");
}

export function renderRankedLikers(result: RankLikersResult): string {
  const sources = result.sourceMedia.map((m) => m.shortcode).join(", ");
  if (result.ranked.length === 0) return `No likers could be ranked for ${sources}. ${sampleFooter(result)}`;
  return [`Likers of ${sources} by follower count:`, ...result.ranked.map(rankedRow), sampleFooter(result)].join("\n");
}

function cappedHeader(label: string, result: MediaListResult<unknown>): string {
  const count = result.capped ? `${result.items.length} of ${num(result.available)}` : `${result.items.length}`;
  return `${label} of ${result.media.shortcode} (${count}):`;
}

export function renderComments(result: MediaListResult<Comment>): string {
  if (result.items.length === 0) return `No comments on ${result.media.shortcode}.`;
  return [
    cappedHeader("Comments", result),
    ...result.items.map(
      (c, i) => `${String(i + 1).padStart(2)}. @${orDash(c.username)}: ${oneLine(c.text)}${c.likeCount > 0 ? `  (${num(c.likeCount)} likes)` : ""}`
    ),
  ].join("\n");
}

export function renderLikers(result: MediaListResult<Liker>): string {
  if (result.items.length === 0) return `No likers returned for ${result.media.shortcode}.`;
  return [cappedHeader("Likers", result), ...result.items.map(userRow)].join("\n");
}

export function renderStories(result: ProfileListResult<Story>): string {
  if (result.items.length === 0) return `@${result.profile.username} has no active stories.`;
  return [
    `Stories of @${result.profile.username} (${result.items.length} of ${result.available}):`,
    ...result.items.map((s, i) => `${String(i + 1).padStart(2)}. ${s.isVideo ? "video" : "image"}  ${orDash(s.publishedAt)}  ${orDash(s.code ?? s.id)}`),
  ].join("\n");
}

export function renderHighlights(result: ProfileListResult<Highlight>): string {
  if (result.items.length === 0) return `@${result.profile.username} has no highlights.`;
  return [
    `Highlights of @${result.profile.username} (${result.items.length} of ${result.available}):`,
    ...result.items.map((h, i) => `${String(i + 1).padStart(2)}. ${orDash(h.title)}  ${h.mediaCount} item(s)  id ${h.id}`),
  ].join("\n");
}

function searchRow(result: SearchResult, index: number): string {
  const n = `${String(index + 1).padStart(2)}.`;
  if (result.resultType === "profile" && result.username) {
    return `${n} ${handle({ username: result.username, verified: result.verified, private: result.private })}${result.fullName ? ` · ${result.fullName}` : ""}`;
  }
  if (result.resultType === "media" && result.shortcode) return `${n} ${result.mediaUrl ?? result.shortcode}  ${oneLine(result.caption, 60)}`;
  return `${n} ${orDash(result.fullName ?? result.id)}`;
}

export function renderSearch(outcome: SearchOutcome): string {
  if (outcome.results.length === 0) return `Nothing found for "${outcome.query}".`;
  return [
    `Results for "${outcome.query}" (pick one by number):`,
    ...outcome.results.map(searchRow),
    ...(outcome.moreAvailable ? ["More results are available; narrow the query to see them."] : []),
  ].join("\n");
}

export function renderExport(result: ExportResult): string {
  return [`Exported ${result.entryCount} ${result.kind} entries as ${result.format.toUpperCase()}:`, `  ${result.path}`, `  ${result.metadataPath}`].join("\n");
}

export function renderDownload(result: DownloadResult): string {
  if (result.files.length === 0) return `Nothing to download for ${result.targetLabel}. Metadata written to ${result.metadataPath}`;
  return `Downloaded ${result.files.length} file(s) for ${result.targetLabel} into ${result.outputDir}`;
}

export function renderBudget(budget: BudgetCounters, cachedProfiles: number): string {
  return [
    "Data API usage this session:",
    `  Page requests:   ${budget.pageRequests}`,
    `  Profile lookups: ${budget.profileLookups}`,
    `  Media lookups:   ${budget.mediaLookups}`,
    `  Cache hits:      ${budget.cacheHits}`,
    `  Cached profiles: ${cachedProfiles}`,
  ].join("\n");
}

export function renderJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
