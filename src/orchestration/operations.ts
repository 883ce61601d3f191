import { logger } from "../core/logger";
import { NotFoundError, UnresolvedTargetError } from "../core/errors";
import type {
  Collection,
  Comment,
  DownloadResult,
  FollowerSummary,
  Highlight,
  Liker,
  ProfileStats,
  ProfileSummary,
  ReelStats,
  SampleResult,
  SearchResult,
  Story,
} from "../domain/models";
import { resolveMediaTarget, resolveProfileTarget, resolveTarget } from "../domain/target";
import type { StatsClient } from "../platforms/adapter";
import { MeteredStatsClient } from "../services/metered-stats-client";
import type { SessionContext } from "../services/session-context";
import { exportCollection, type ExportFormat, type ExportResult } from "../services/exporter";
import { downloadPlan } from "../services/downloader";
import { estimateTopFollowers, rankLikersByFollowers } from "./budget-sampler";
import {
  planAudioDownload,
  planHighlightsDownload,
  planMediaDownload,
  planStoriesDownload,
} from "./download-planner";

export const REEL_METRICS = [
  "likes",
  "views",
  "comments",
  "saves",
  "engagement_rate",
  "viral_index",
  "published_at",
] as const;
export type ReelMetric = (typeof REEL_METRICS)[number];

export interface OperationsDeps {
  client: StatsClient;
  context: SessionContext;
  outputDir: string;
  now?: () => Date;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ProfileStatsResult {
  profile: ProfileStats;
  fromSession: boolean;
}

export interface ReelsResult {
  profile: ProfileSummary;
  reels: ReelStats[];
  pagesUsed: number;
  scanned: number;
  nextCursor: string | null;
  limit: number;
  daysBack: number | null;
}

export interface FollowersResult {
  profile: ProfileSummary;
  followers: FollowerSummary[];
  pageId: string | null;
  nextPageId: string | null;
}

export interface TopFollowersResult extends SampleResult {
  profile: ProfileSummary;
}

export interface MediaListResult<T> {
  media: ReelStats;
  items: T[];
  available: number;
  capped: boolean;
}

export interface RankLikersResult extends SampleResult {
  sourceMedia: Array<{ shortcode: string; likes: number }>;
}

export interface ProfileListResult<T> {
  profile: ProfileSummary;
  items: T[];
  available: number;
}

export interface SearchOutcome {
  query: string;
  results: SearchResult[];
  moreAvailable: boolean;
}

export interface ReelMetricResult {
  target: string;
  metric: ReelMetric;
  value: string | number | null;
  reel: ReelStats;
}

export type StatsResult = { kind: "profile"; result: ProfileStatsResult } | { kind: "reel"; result: ReelStats };

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, Math.floor(value)));

function withSessionFields(summary: ProfileSummary, fetchedAt: string): ProfileStats {
  return { ...summary, hasStories: null, storiesCount: null, storiesError: null, fetchedAt };
}

function metricValue(reel: ReelStats, metric: ReelMetric): string | number | null {
  switch (metric) {
    case "likes":
      return reel.likes;
    case "views":
      return reel.views;
    case "comments":
      return reel.comments;
    case "saves":
      return reel.saves;
    case "engagement_rate":
      return reel.engagementRate;
    case "viral_index":
      return reel.viralIndex;
    case "published_at":
      return reel.publishedAt;
  }
}

/**
 * The single implementation of every capability. Direct commands and agent
 * tools both call these methods, so the session ends up in the same state
 * whichever path asked. Session updates happen only after all fetches of an
 * operation have succeeded.
 */
export class Operations {
  readonly client: StatsClient;
  readonly context: SessionContext;
  private readonly outputDir: string;
  private readonly now: () => Date;

  constructor(deps: OperationsDeps) {
    this.context = deps.context;
    this.client = new MeteredStatsClient(deps.client, deps.context);
    this.outputDir = deps.outputDir;
    this.now = deps.now ?? (() => new Date());
  }

  private remember<T>(result: T): T {
    this.context.lastResult = result;
    return result;
  }

  private profileUsername(input: string | null | undefined): string {
    const target = resolveProfileTarget(input, this.context);
    if (target.kind === "unresolved") throw new UnresolvedTargetError(target.reason);
    return target.username;
  }

  private mediaShortcode(input: string | null | undefined): string {
    const target = resolveMediaTarget(input, this.context);
    if (target.kind === "unresolved") throw new UnresolvedTargetError(target.reason);
    return target.shortcode;
  }

  /** Session copy first (counted as a cache hit), then a profile lookup. */
  private async loadProfile(input: string | null | undefined, signal?: AbortSignal): Promise<ProfileSummary> {
    const username = this.profileUsername(input);
    const known =
      this.context.currentProfile?.username === username
        ? this.context.currentProfile
        : this.context.getCachedProfile(username);
    if (known) {
      this.context.recordBudget({ cacheHits: 1 });
      return known;
    }
    return this.client.getProfile(username, signal);
  }

  private async loadMedia(input: string | null | undefined, signal?: AbortSignal): Promise<ReelStats> {
    const shortcode = this.mediaShortcode(input);
    const known =
      this.context.currentMedia?.shortcode === shortcode
        ? this.context.currentMedia
        : this.context.recentReels.find((reel) => reel.shortcode === shortcode);
    if (known) {
      this.context.recordBudget({ cacheHits: 1 });
      return known;
    }
    return this.client.getReel(shortcode, signal);
  }

  /** Makes `profile` current unless it already is, keeping richer stats already held. */
  private adoptProfile(profile: ProfileSummary): void {
    if (this.context.currentProfile?.username === profile.username) {
      this.context.cacheProfile(profile);
      return;
    }
    this.context.setProfile(withSessionFields(profile, this.now().toISOString()));
  }

  private adoptMedia(media: ReelStats): void {
    if (this.context.currentMedia?.shortcode !== media.shortcode) this.context.setMedia(media);
  }

  private collection(collection: Collection): void {
    this.context.setCollection(collection);
  }

  async stats(input: string, options: CallOptions = {}): Promise<StatsResult> {
    const target = resolveTarget(input, this.context);
    switch (target.kind) {
      case "media":
        return { kind: "reel", result: await this.fetchReel(target.shortcode, options.signal) };
      case "profile":
        return { kind: "profile", result: await this.fetchProfileStats(target.username, options.signal) };
      case "unresolved":
        throw new UnresolvedTargetError(target.reason);
    }
  }

  /**
   * Profile with a stories count. Without `refresh`, a request for the current
   * profile is answered from the session snapshot.
   */
  async profileStats(
    input: string | null | undefined,
    options: CallOptions & { refresh?: boolean } = {}
  ): Promise<ProfileStatsResult> {
    const username = this.profileUsername(input);
    const current = this.context.currentProfile;
    if (!options.refresh && current?.username === username) {
      this.context.recordBudget({ cacheHits: 1 });
      return this.remember({ profile: current, fromSession: true });
    }
    return this.fetchProfileStats(username, options.signal);
  }

  private async fetchProfileStats(username: string, signal?: AbortSignal): Promise<ProfileStatsResult> {
    const summary = await this.client.getProfile(username, signal);
    let storiesCount: number | null = null;
    let storiesError: string | null = null;
    try {
      storiesCount = (await this.client.getStories(summary, signal)).length;
    } catch (error) {
      if (signal?.aborted) throw error;
      storiesError = error instanceof Error ? error.message : String(error);
      logger.warn({ username, error: storiesError }, "Stories lookup failed, returning profile without it");
    }

    const profile: ProfileStats = {
      ...summary,
      hasStories: storiesCount === null ? null : storiesCount > 0,
      storiesCount,
      storiesError,
      fetchedAt: this.now().toISOString(),
    };
    this.context.setProfile(profile);
    return this.remember({ profile, fromSession: false });
  }

  reel(input: string | null | undefined, options: CallOptions = {}): Promise<ReelStats> {
    return this.fetchReel(this.mediaShortcode(input), options.signal);
  }

  private async fetchReel(shortcode: string, signal?: AbortSignal): Promise<ReelStats> {
    const reel = await this.client.getReel(shortcode, signal);
    this.context.setMedia(reel);
    return this.remember(reel);
  }

  async profileReels(
    input: string | null | undefined,
    options: CallOptions & { limit?: number; daysBack?: number | null; maxPages?: number } = {}
  ): Promise<ReelsResult> {
    const limit = clamp(options.limit ?? 12, 1, 20);
    const daysBack = options.daysBack ? clamp(options.daysBack, 1, 30) : null;
    const profile = await this.loadProfile(input, options.signal);
    const page = await this.client.getReelsByFilter(
      profile,
      { limit, daysBack, maxPages: clamp(options.maxPages ?? 3, 1, 5), now: this.now() },
      options.signal
    );

    // Clip payloads may leave the owner out; every reel on this page is the profile's.
    const reels = page.reels.map((reel) => (reel.owner ? reel : { ...reel, owner: profile.username }));

    this.adoptProfile(profile);
    this.context.setRecentReels(reels, profile.username);
    this.collection({
      kind: "reels",
      entries: reels,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${profile.username}-reels`,
      metadata: { username: profile.username, limit, daysBack, pagesUsed: page.pagesUsed, scanned: page.scanned },
    });

    return this.remember({
      profile,
      reels,
      pagesUsed: page.pagesUsed,
      scanned: page.scanned,
      nextCursor: page.nextCursor,
      limit,
      daysBack,
    });
  }

  recentReels(input: string | null | undefined, options: CallOptions & { limit?: number } = {}): Promise<ReelsResult> {
    return this.profileReels(input, { ...options, daysBack: null, maxPages: 2 });
  }

  async lastReelMetric(
    input: string | null | undefined,
    metric: ReelMetric,
    options: CallOptions = {}
  ): Promise<ReelMetricResult> {
    const raw = input?.trim() || this.context.currentProfile?.username || this.context.currentMedia?.owner || null;
    if (!raw) throw new UnresolvedTargetError("Provide a username or profile link, or load a profile first.");
    const username = this.profileUsername(raw);

    let latest: ReelStats | null | undefined = this.context.latestOwnReel(username);
    if (latest) {
      this.context.recordBudget({ cacheHits: 1 });
    } else {
      latest = (await this.recentReels(username, options)).reels[0];
    }
    if (!latest) throw new NotFoundError(`No reels found for @${username}.`, "latest_reel_not_found");

    this.context.setMedia(latest);
    return this.remember({ target: username, metric, value: metricValue(latest, metric), reel: latest });
  }

  async followers(
    input: string | null | undefined,
    options: CallOptions & { limit?: number; pageId?: string | null } = {}
  ): Promise<FollowersResult> {
    const profile = await this.loadProfile(input, options.signal);
    const page = await this.client.getFollowersPage(profile, options.pageId ?? null, options.signal);
    const followers = page.followers.slice(0, clamp(options.limit ?? 25, 1, 50));

    this.adoptProfile(profile);
    this.collection({
      kind: "followers",
      entries: followers,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${profile.username}-followers`,
      metadata: { username: profile.username, pageId: options.pageId ?? null, nextPageId: page.nextCursor },
    });
    return this.remember({ profile, followers, pageId: options.pageId ?? null, nextPageId: page.nextCursor });
  }

  async topFollowers(
    input: string | null | undefined,
    options: CallOptions & { sampleSize?: number; topN?: number; maxPages?: number } = {}
  ): Promise<TopFollowersResult> {
    const profile = await this.loadProfile(input, options.signal);
    const sample = await estimateTopFollowers(this.client, this.context, profile, {
      sampleSize: clamp(options.sampleSize ?? 20, 1, 50),
      topN: clamp(options.topN ?? 10, 0, 50),
      maxPages: clamp(options.maxPages ?? 1, 1, 4),
      signal: options.signal,
    });

    this.adoptProfile(profile);
    this.collection({
      kind: "top_followers",
      entries: sample.ranked,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${profile.username}-top-followers`,
      metadata: {
        username: profile.username,
        sampledCount: sample.sampledCount,
        enrichedCount: sample.enrichedCount,
        cacheHitsUsed: sample.cacheHitsUsed,
        truncated: sample.truncated,
        truncationReason: sample.truncationReason,
        hasMore: sample.hasMore,
        approximate: true,
      },
    });
    return this.remember({ ...sample, profile });
  }

  async comments(
    input: string | null | undefined,
    options: CallOptions & { limit?: number } = {}
  ): Promise<MediaListResult<Comment>> {
    const media = await this.loadMedia(input, options.signal);
    const list = await this.client.getComments(media, clamp(options.limit ?? 20, 1, 50), options.signal);

    this.adoptMedia(media);
    this.collection({
      kind: "comments",
      entries: list.items,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${media.shortcode}-comments`,
      metadata: { shortcode: media.shortcode, available: list.available },
    });
    return this.remember({ media, items: list.items, available: list.available, capped: list.items.length < list.available });
  }

  async likers(
    input: string | null | undefined,
    options: CallOptions & { limit?: number } = {}
  ): Promise<MediaListResult<Liker>> {
    const media = await this.loadMedia(input, options.signal);
    const list = await this.client.getLikers(media, clamp(options.limit ?? 50, 1, 1000), options.signal);

    this.adoptMedia(media);
    this.collection({
      kind: "likers",
      entries: list.items,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${media.shortcode}-likers`,
      metadata: { shortcode: media.shortcode, available: list.available },
    });
    return this.remember({ media, items: list.items, available: list.available, capped: list.items.length < list.available });
  }

  async rankLikers(
    inputs: string[],
    options: CallOptions & { topN?: number; limit?: number } = {}
  ): Promise<RankLikersResult> {
    const wanted = inputs.map((i) => i.trim()).filter(Boolean);
    const media: ReelStats[] = [];
    if (wanted.length === 0) {
      if (!this.context.currentMedia) {
        throw new UnresolvedTargetError("Provide one or more reel links or load a reel first.");
      }
      this.context.recordBudget({ cacheHits: 1 });
      media.push(this.context.currentMedia);
    }

    const seen = new Set<string>();
    for (const input of wanted) {
      const item = await this.loadMedia(input, options.signal);
      if (seen.has(item.shortcode)) continue;
      seen.add(item.shortcode);
      media.push(item);
    }

    const sample = await rankLikersByFollowers(this.client, this.context, media, {
      limit: clamp(options.limit ?? 50, 1, 1000),
      topN: clamp(options.topN ?? 10, 0, 100),
      signal: options.signal,
    });
    const sourceMedia = media.map((m) => ({ shortcode: m.shortcode, likes: m.likes }));

    const last = media[media.length - 1];
    if (last) this.adoptMedia(last);
    this.collection({
      kind: "ranked_likers",
      entries: sample.ranked,
      fetchedAt: this.now().toISOString(),
      filenameHint: "top-media-likers-by-followers",
      metadata: {
        sourceMedia,
        uniqueLikers: sample.sampledCount,
        enrichedCount: sample.enrichedCount,
        cacheHitsUsed: sample.cacheHitsUsed,
        truncated: sample.truncated,
        truncationReason: sample.truncationReason,
        approximate: true,
      },
    });
    return this.remember({ ...sample, sourceMedia });
  }

  async stories(
    input: string | null | undefined,
    options: CallOptions & { limit?: number } = {}
  ): Promise<ProfileListResult<Story>> {
    const profile = await this.loadProfile(input, options.signal);
    const all = await this.client.getStories(profile, options.signal);
    const limit = clamp(options.limit ?? 0, 0, 50);
    const items = limit === 0 ? all : all.slice(0, limit);

    this.adoptProfile(profile);
    this.collection({
      kind: "stories",
      entries: items,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${profile.username}-stories`,
      metadata: { username: profile.username, available: all.length },
    });
    return this.remember({ profile, items, available: all.length });
  }

  async highlights(
    input: string | null | undefined,
    options: CallOptions & { limit?: number } = {}
  ): Promise<ProfileListResult<Highlight>> {
    const profile = await this.loadProfile(input, options.signal);
    const all = await this.client.getHighlights(profile, options.signal);
    const limit = clamp(options.limit ?? 0, 0, 50);
    const items = limit === 0 ? all : all.slice(0, limit);

    this.adoptProfile(profile);
    this.collection({
      kind: "highlights",
      entries: items,
      fetchedAt: this.now().toISOString(),
      filenameHint: `${profile.username}-highlights`,
      metadata: { username: profile.username, available: all.length },
    });
    return this.remember({ profile, items, available: all.length });
  }

  async search(query: string, options: CallOptions & { limit?: number } = {}): Promise<SearchOutcome> {
    const text = query.trim();
    if (!text) throw new UnresolvedTargetError("Search query is required.", "invalid_query");
    const page = await this.client.search(text, clamp(options.limit ?? 10, 1, 20), options.signal);

    this.context.setSearch({
      kind: "search_results",
      entries: page.results,
      fetchedAt: this.now().toISOString(),
      filenameHint: `search-${text}`,
      metadata: { query: text, moreAvailable: page.moreAvailable },
    });
    return this.remember({ query: text, results: page.results, moreAvailable: page.moreAvailable });
  }

  /** Exports the session's last collection; nothing else is exportable. */
  async exportLast(format: ExportFormat, filenameHint?: string | null): Promise<ExportResult> {
    const result = await exportCollection(this.context.lastCollection, format, {
      outputDir: this.outputDir,
      filenameHint,
      now: this.now(),
    });
    return this.remember(result);
  }

  async downloadMedia(input: string | null | undefined, options: CallOptions = {}): Promise<DownloadResult> {
    const content = await this.client.getMediaContent(this.mediaShortcode(input), options.signal);
    const result = await downloadPlan(planMediaDownload(content), this.client, this.downloadOptions(options));
    this.context.setMedia(content.reel);
    return this.finishDownload(result);
  }

  async downloadAudio(input: string | null | undefined, options: CallOptions = {}): Promise<DownloadResult> {
    const content = await this.client.getMediaContent(this.mediaShortcode(input), options.signal);
    const result = await downloadPlan(planAudioDownload(content), this.client, this.downloadOptions(options));
    this.context.setMedia(content.reel);
    return this.finishDownload(result);
  }

  async downloadStories(
    input: string | null | undefined,
    options: CallOptions & { limit?: number } = {}
  ): Promise<DownloadResult> {
    const profile = await this.loadProfile(input, options.signal);
    const stories = await this.client.getStories(profile, options.signal);
    const limit = clamp(options.limit ?? 0, 0, 50);
    const plan = planStoriesDownload(profile.username, limit === 0 ? stories : stories.slice(0, limit));
    const result = await downloadPlan(plan, this.client, this.downloadOptions(options));
    this.adoptProfile(profile);
    return this.finishDownload(result);
  }

  async downloadHighlights(
    input: string | null | undefined,
    options: CallOptions & { titleFilter?: string | null; limit?: number } = {}
  ): Promise<DownloadResult> {
    const profile = await this.loadProfile(input, options.signal);
    const highlights = await this.client.getHighlights(profile, options.signal);
    const limit = clamp(options.limit ?? 0, 0, 50);
    const plan = await planHighlightsDownload(
      this.client,
      profile.username,
      limit === 0 ? highlights : highlights.slice(0, limit),
      { titleFilter: options.titleFilter, signal: options.signal }
    );
    const result = await downloadPlan(plan, this.client, this.downloadOptions(options));
    this.adoptProfile(profile);
    return this.finishDownload(result);
  }

  private downloadOptions(options: CallOptions) {
    return { outputDir: this.outputDir, now: this.now(), signal: options.signal };
  }

  private finishDownload(result: DownloadResult): DownloadResult {
    this.context.setDownload(result);
    return this.remember(result);
  }
}
