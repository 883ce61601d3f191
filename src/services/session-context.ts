import type {
  BudgetCounters,
  Collection,
  CollectionOf,
  DownloadResult,
  ProfileStats,
  ProfileSummary,
  ReelStats,
  SearchResult,
} from "../domain/models";
import type { ResolverContext } from "../domain/target";
import { normalizeUsername } from "../core/normalize";

export const RECENT_REELS_CAPACITY = 20;
export const HISTORY_CAPACITY = 20;

export type ChatRole = "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

const emptyBudget = (): BudgetCounters => ({
  pageRequests: 0,
  profileLookups: 0,
  mediaLookups: 0,
  cacheHits: 0,
});

function isReel(media: ReelStats): boolean {
  return media.productType === "clips" || media.mediaType === 2;
}

/**
 * Conversational state for one interactive session. Passed by reference to
 * every operation; holds no I/O.
 */
export class SessionContext implements ResolverContext {
  currentProfile: ProfileStats | null = null;
  currentMedia: ReelStats | null = null;
  recentReels: ReelStats[] = [];
  /** Username whose own reel list filled recentReels, if any. */
  reelListOwner: string | null = null;
  lastCollection: Collection | null = null;
  lastSearchCollection: CollectionOf<"search_results"> | null = null;
  lastDownload: DownloadResult | null = null;
  lastResult: unknown = null;
  history: ChatTurn[] = [];

  private budget: BudgetCounters = emptyBudget();
  private profileCache = new Map<string, ProfileSummary>();

  constructor(public currentModel: string) {}

  get lastSearch(): SearchResult[] {
    return this.lastSearchCollection?.entries ?? [];
  }

  setProfile(profile: ProfileStats): void {
    const previous = this.currentProfile?.username;
    if (previous && previous !== profile.username) {
      this.currentMedia = null;
      this.recentReels = [];
      this.reelListOwner = null;
    }
    this.currentProfile = profile;
    this.cacheProfile(profile);
  }

  setMedia(media: ReelStats): void {
    this.currentMedia = media;
    if (isReel(media)) this.pushRecentReel(media);
  }

  /** Newest first; an existing entry for the same reel moves to the front. */
  pushRecentReel(reel: ReelStats): void {
    const key = reel.id ?? reel.shortcode;
    const rest = this.recentReels.filter((r) => (r.id ?? r.shortcode) !== key);
    this.recentReels = [reel, ...rest].slice(0, RECENT_REELS_CAPACITY);
  }

  setRecentReels(reels: ReelStats[], owner: string): void {
    this.recentReels = reels.slice(0, RECENT_REELS_CAPACITY);
    this.reelListOwner = owner;
  }

  /**
   * Newest reel owned by `username`, only once that profile's reel list was
   * loaded. Reels looked up one by one can be older than the latest.
   */
  latestOwnReel(username: string): ReelStats | null {
    if (this.reelListOwner !== username) return null;
    const owned = this.recentReels.filter((reel) => reel.owner?.toLowerCase() === username);
    const publishedMs = (reel: ReelStats) => (reel.publishedAt ? Date.parse(reel.publishedAt) : Number.NEGATIVE_INFINITY);
    let latest: ReelStats | null = null;
    for (const reel of owned) {
      if (!latest || publishedMs(reel) > publishedMs(latest)) latest = reel;
    }
    return latest;
  }

  setCollection(collection: Collection): void {
    this.lastCollection = collection;
  }

  setSearch(collection: CollectionOf<"search_results">): void {
    this.lastSearchCollection = collection;
    this.lastCollection = collection;
  }

  setDownload(result: DownloadResult): void {
    this.lastDownload = result;
  }

  recordBudget(delta: Partial<BudgetCounters>): void {
    this.budget = {
      pageRequests: this.budget.pageRequests + Math.max(0, delta.pageRequests ?? 0),
      profileLookups: this.budget.profileLookups + Math.max(0, delta.profileLookups ?? 0),
      mediaLookups: this.budget.mediaLookups + Math.max(0, delta.mediaLookups ?? 0),
      cacheHits: this.budget.cacheHits + Math.max(0, delta.cacheHits ?? 0),
    };
  }

  snapshotBudget(): BudgetCounters {
    return { ...this.budget };
  }

  cacheProfile(profile: ProfileSummary): void {
    this.profileCache.set(normalizeUsername(profile.username), profile);
  }

  getCachedProfile(username: string): ProfileSummary | null {
    return this.profileCache.get(normalizeUsername(username)) ?? null;
  }

  get cachedProfileCount(): number {
    return this.profileCache.size;
  }

  appendHistory(role: ChatRole, content: string): void {
    this.history.push({ role, content });
    if (this.history.length > HISTORY_CAPACITY) {
      this.history = this.history.slice(-HISTORY_CAPACITY);
    }
  }

  recentHistory(turns: number): ChatTurn[] {
    return turns > 0 ? this.history.slice(-turns) : [];
  }

  reset(): void {
    this.currentProfile = null;
    this.currentMedia = null;
    this.recentReels = [];
    this.reelListOwner = null;
    this.lastCollection = null;
    this.lastSearchCollection = null;
    this.lastDownload = null;
    this.lastResult = null;
    this.history = [];
    this.budget = emptyBudget();
    this.profileCache.clear();
  }

  toAgentContext(): Record<string, unknown> {
    const profile = this.currentProfile;
    const media = this.currentMedia;
    return {
      current_profile: profile
        ? {
            username: profile.username,
            full_name: profile.fullName,
            followers: profile.followerCount,
            following: profile.followingCount,
            posts: profile.postCount,
            verified: profile.verified,
            private: profile.private,
            stories_count: profile.storiesCount,
            fetched_at: profile.fetchedAt,
          }
        : null,
      current_media: media ? reelDigest(media) : null,
      recent_reels: this.recentReels.slice(0, 5).map(reelDigest),
      recent_reels_count: this.recentReels.length,
      last_collection: this.lastCollection
        ? {
            kind: this.lastCollection.kind,
            count: this.lastCollection.entries.length,
            filename_hint: this.lastCollection.filenameHint,
          }
        : null,
      last_search: this.lastSearch.slice(0, 10).map((result, index) => ({
        index: index + 1,
        type: result.resultType,
        username: result.username,
        shortcode: result.shortcode,
      })),
      last_download: this.lastDownload
        ? {
            kind: this.lastDownload.downloadKind,
            target: this.lastDownload.targetLabel,
            files: this.lastDownload.files.length,
            output_dir: this.lastDownload.outputDir,
          }
        : null,
      budget: this.snapshotBudget(),
      model: this.currentModel,
    };
  }
}

function reelDigest(reel: ReelStats): Record<string, unknown> {
  return {
    shortcode: reel.shortcode,
    url: reel.url,
    owner: reel.owner,
    views: reel.views,
    likes: reel.likes,
    comments: reel.comments,
    saves: reel.saves,
    engagement_rate: reel.engagementRate,
    viral_index: reel.viralIndex,
    viral_status: reel.viralStatus,
    published_at: reel.publishedAt,
    reel_kind: reel.reelKind,
  };
}
