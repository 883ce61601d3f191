import { logger } from "../core/logger";
import { NotFoundError, RateLimitError } from "../core/errors";
import { normalizeUsername } from "../core/normalize";
import type { Liker, ProfileSummary, RankedUser, ReelStats, SampleResult } from "../domain/models";
import type { FollowersPage, StatsClient } from "../platforms/adapter";
import type { SessionContext } from "../services/session-context";

export interface TopFollowersOptions {
  sampleSize: number;
  topN: number;
  maxPages: number;
  signal?: AbortSignal;
}

export interface RankLikersOptions {
  /** Likers taken from each media. */
  limit: number;
  topN: number;
  signal?: AbortSignal;
}

interface Candidate {
  username: string;
  userId: string | null;
  likedShortcodes: string[];
}

interface EnrichOutcome {
  enriched: Array<{ candidate: Candidate; profile: ProfileSummary }>;
  lookups: number;
  cacheHits: number;
  truncationReason: string | null;
}

/**
 * Resolves each candidate to a full profile, session cache first. Runs one call
 * at a time and checks the signal before every call. A rate limit or abort
 * ends enrichment early with whatever was collected so far.
 */
async function enrich(
  client: StatsClient,
  context: SessionContext,
  candidates: Candidate[],
  signal: AbortSignal | undefined
): Promise<EnrichOutcome> {
  const outcome: EnrichOutcome = { enriched: [], lookups: 0, cacheHits: 0, truncationReason: null };

  for (const candidate of candidates) {
    if (signal?.aborted) {
      outcome.truncationReason = "cancelled";
      break;
    }

    const cached = context.getCachedProfile(candidate.username);
    if (cached) {
      context.recordBudget({ cacheHits: 1 });
      outcome.cacheHits++;
      outcome.enriched.push({ candidate, profile: cached });
      continue;
    }

    // Counted per attempt, including lookups that end in 404 or 429.
    outcome.lookups++;
    try {
      const profile = candidate.userId
        ? await client.getProfileById(candidate.userId, signal)
        : await client.getProfile(candidate.username, signal);
      context.cacheProfile(profile);
      outcome.enriched.push({ candidate, profile });
    } catch (error) {
      if (error instanceof RateLimitError) {
        logger.warn({ username: candidate.username, done: outcome.enriched.length }, "Rate limited during enrichment");
        outcome.truncationReason = "rate_limited";
        break;
      }
      if (signal?.aborted) {
        outcome.truncationReason = "cancelled";
        break;
      }
      if (error instanceof NotFoundError) {
        logger.debug({ username: candidate.username }, "Sampled account no longer exists, skipping");
        continue;
      }
      throw error;
    }
  }

  return outcome;
}

function rank(enriched: EnrichOutcome["enriched"], topN: number): RankedUser[] {
  // Array.prototype.sort is stable, so ties keep sample order.
  return [...enriched]
    .sort((a, b) => b.profile.followerCount - a.profile.followerCount)
    .slice(0, Math.max(0, topN))
    .map(({ candidate, profile }, i) => ({
      rank: i + 1,
      userId: profile.userId ?? candidate.userId,
      username: profile.username,
      fullName: profile.fullName,
      followerCount: profile.followerCount,
      followingCount: profile.followingCount,
      postCount: profile.postCount,
      verified: profile.verified,
      private: profile.private,
      likedCount: candidate.likedShortcodes.length,
      likedShortcodes: candidate.likedShortcodes,
    }));
}

export async function estimateTopFollowers(
  client: StatsClient,
  context: SessionContext,
  target: ProfileSummary,
  options: TopFollowersOptions
): Promise<SampleResult> {
  const sampleSize = Math.max(0, Math.floor(options.sampleSize));
  const topN = Math.min(Math.max(0, Math.floor(options.topN)), sampleSize);
  const maxPages = Math.max(1, Math.floor(options.maxPages));

  const sample: Candidate[] = [];
  const seen = new Set<string>();
  let cursor: string | null = null;
  let pagesUsed = 0;
  let leftoverOnPage = false;

  while (sample.length < sampleSize && pagesUsed < maxPages) {
    const page: FollowersPage = await client.getFollowersPage(target, cursor, options.signal);
    pagesUsed++;
    cursor = page.nextCursor;

    for (const follower of page.followers) {
      if (sample.length >= sampleSize) {
        leftoverOnPage = true;
        break;
      }
      const key = normalizeUsername(follower.username);
      if (seen.has(key)) continue;
      seen.add(key);
      sample.push({ username: key, userId: null, likedShortcodes: [] });
    }
    if (!cursor) break;
  }

  logger.debug({ target: target.username, sampled: sample.length, pagesUsed }, "Follower sample collected");

  const outcome = await enrich(client, context, sample, options.signal);
  return {
    target: target.username,
    sampledCount: sample.length,
    enrichedCount: outcome.lookups,
    cacheHitsUsed: outcome.cacheHits,
    ranked: rank(outcome.enriched, topN),
    budgetUsed: context.snapshotBudget(),
    truncated: outcome.truncationReason !== null,
    truncationReason: outcome.truncationReason,
    hasMore: cursor !== null || leftoverOnPage,
    pagesUsed,
    approximate: true,
  };
}

export async function rankLikersByFollowers(
  client: StatsClient,
  context: SessionContext,
  media: ReelStats[],
  options: RankLikersOptions
): Promise<SampleResult> {
  const byUserId = new Map<string, Candidate>();
  let hasMore = false;

  for (const item of media) {
    const likers = await client.getLikers(item, options.limit, options.signal);
    if (likers.items.length < likers.available) hasMore = true;
    for (const liker of likers.items) {
      const candidate = byUserId.get(liker.userId) ?? addCandidate(byUserId, liker);
      if (!candidate.likedShortcodes.includes(item.shortcode)) candidate.likedShortcodes.push(item.shortcode);
    }
  }

  const candidates = [...byUserId.values()];
  const topN = Math.min(Math.max(0, Math.floor(options.topN)), candidates.length);
  const outcome = await enrich(client, context, candidates, options.signal);

  return {
    target: media.map((m) => m.shortcode).join(","),
    sampledCount: candidates.length,
    enrichedCount: outcome.lookups,
    cacheHitsUsed: outcome.cacheHits,
    ranked: rank(outcome.enriched, topN),
    budgetUsed: context.snapshotBudget(),
    truncated: outcome.truncationReason !== null,
    truncationReason: outcome.truncationReason,
    hasMore,
    pagesUsed: media.length,
    approximate: true,
  };
}

function addCandidate(map: Map<string, Candidate>, liker: Liker): Candidate {
  const candidate: Candidate = { username: normalizeUsername(liker.username), userId: liker.userId, likedShortcodes: [] };
  map.set(liker.userId, candidate);
  return candidate;
}
