import type {
  Comment,
  FollowerSummary,
  Highlight,
  Liker,
  MediaContent,
  ProfileSummary,
  ReelStats,
  SearchResult,
  Story,
} from "../domain/models";

export interface ReelFilterOptions {
  limit: number;
  daysBack?: number | null;
  maxPages: number;
  pageSize?: number;
  now?: Date;
  /** Called before each page request, including one that then fails. */
  onPageRequest?: () => void;
}

export interface ReelPage {
  reels: ReelStats[];
  pagesUsed: number;
  scanned: number;
  nextCursor: string | null;
}

export interface FollowersPage {
  followers: FollowerSummary[];
  nextCursor: string | null;
}

export interface CappedList<T> {
  items: T[];
  /** Count reported by the media itself; the endpoint may return fewer. */
  available: number;
}

export interface SearchPage {
  results: SearchResult[];
  moreAvailable: boolean;
}

/**
 * One method per data capability. Implementations are stateless request/response
 * wrappers; session caching and budget accounting live above this layer.
 */
export interface StatsClient {
  readonly provider: string;

  getProfile(username: string, signal?: AbortSignal): Promise<ProfileSummary>;

  getProfileById(userId: string, signal?: AbortSignal): Promise<ProfileSummary>;

  getReel(shortcode: string, signal?: AbortSignal): Promise<ReelStats>;

  getMediaContent(shortcode: string, signal?: AbortSignal): Promise<MediaContent>;

  getReelsByFilter(profile: ProfileSummary, options: ReelFilterOptions, signal?: AbortSignal): Promise<ReelPage>;

  getFollowersPage(profile: ProfileSummary, cursor?: string | null, signal?: AbortSignal): Promise<FollowersPage>;

  getComments(media: ReelStats, limit: number, signal?: AbortSignal): Promise<CappedList<Comment>>;

  getLikers(media: ReelStats, limit: number, signal?: AbortSignal): Promise<CappedList<Liker>>;

  getStories(profile: ProfileSummary, signal?: AbortSignal): Promise<Story[]>;

  getHighlights(profile: ProfileSummary, signal?: AbortSignal): Promise<Highlight[]>;

  getHighlightItems(highlightId: string, signal?: AbortSignal): Promise<Story[]>;

  search(query: string, limit: number, signal?: AbortSignal): Promise<SearchPage>;

  /** Fetches a binary asset (CDN URL) for downloads. */
  fetchBinary(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}
