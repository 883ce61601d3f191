import { env, type AppConfig } from "../../core/config";
import { logger } from "../../core/logger";
import {
  ConfigError,
  DataApiError,
  MalformedResponseError,
  NotFoundError,
  RateLimitError,
  UnauthorizedError,
} from "../../core/errors";
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, type RetryOptions } from "../../core/retry";
import { asRecord, asRecordArray, asStr } from "../../core/normalize";
import type {
  Comment,
  Highlight,
  Liker,
  MediaContent,
  ProfileSummary,
  ReelStats,
  SearchResult,
  Story,
} from "../../domain/models";
import type {
  CappedList,
  FollowersPage,
  ReelFilterOptions,
  ReelPage,
  SearchPage,
  StatsClient,
} from "../adapter";
import {
  extractAudioTrack,
  extractMediaAssets,
  parseComment,
  parseFollower,
  parseHighlight,
  parseLiker,
  parseProfile,
  parseReel,
  parseSearchItem,
  parseStory,
} from "./parsers";

type QueryValue = string | number | boolean | null | undefined;

export interface HikerClientOptions {
  accessKey: string | null;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

const DOWNLOAD_TIMEOUT_MS = 60000;
const REEL_PAGE_SIZE = 12;
const DAY_SECONDS = 86400;

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

function isTransient(error: unknown): boolean {
  if (!(error instanceof DataApiError) || error.code === "cancelled") return false;
  return error.status === undefined || error.status >= 500;
}

export class HikerApiClient implements StatsClient {
  readonly provider = "hikerapi";
  private readonly fetchImpl: typeof fetch;
  private readonly retry: RetryOptions;

  constructor(private readonly options: HikerClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retry = { ...(options.retry ?? DEFAULT_RETRY_OPTIONS), shouldRetry: isTransient };
  }

  static fromConfig(config: AppConfig = env): HikerApiClient {
    return new HikerApiClient({
      accessKey: config.hikerAccessKey,
      baseUrl: config.HIKERAPI_BASE_URL,
      timeoutMs: config.HIKERAPI_TIMEOUT_MS,
    });
  }

  async getProfile(username: string, signal?: AbortSignal): Promise<ProfileSummary> {
    const payload = asRecord(await this.request("/v1/user/by/username", { username }, signal));
    const profile = payload ? parseProfile(payload, username) : null;
    if (!profile) throw new MalformedResponseError("Unexpected profile payload from the data API.");
    return profile;
  }

  async getProfileById(userId: string, signal?: AbortSignal): Promise<ProfileSummary> {
    const payload = asRecord(await this.request("/v1/user/by/id", { id: userId }, signal));
    const profile = payload ? parseProfile(payload) : null;
    if (!profile) throw new MalformedResponseError(`Unexpected profile payload for user id ${userId}.`);
    return profile;
  }

  async getReel(shortcode: string, signal?: AbortSignal): Promise<ReelStats> {
    return (await this.getMediaContent(shortcode, signal)).reel;
  }

  async getMediaContent(shortcode: string, signal?: AbortSignal): Promise<MediaContent> {
    const payload = asRecord(await this.request("/v1/media/by/code", { code: shortcode }, signal));
    const reel = payload ? parseReel(payload, new Date().toISOString(), shortcode) : null;
    if (!payload || !reel) throw new MalformedResponseError("Unexpected media payload from the data API.");
    return { reel, assets: extractMediaAssets(payload), audio: extractAudioTrack(payload) };
  }

  async getReelsByFilter(profile: ProfileSummary, options: ReelFilterOptions, signal?: AbortSignal): Promise<ReelPage> {
    const userId = this.requireUserId(profile);
    const limit = clamp(options.limit, 1, 20);
    const maxPages = clamp(options.maxPages, 1, 5);
    const pageSize = clamp(options.pageSize ?? REEL_PAGE_SIZE, 1, 24);
    const nowSeconds = (options.now ?? new Date()).getTime() / 1000;
    const cutoff = options.daysBack ? nowSeconds - clamp(options.daysBack, 1, 30) * DAY_SECONDS : null;
    const fetchedAt = new Date().toISOString();

    const reels: ReelStats[] = [];
    const seen = new Set<string>();
    let cursor: string | null = null;
    let pagesUsed = 0;
    let scanned = 0;

    this.requireAccessKey();
    while (pagesUsed < maxPages && reels.length < limit) {
      options.onPageRequest?.();
      const raw: unknown = await this.request(
        "/v1/user/clips/chunk",
        { user_id: userId, end_cursor: cursor, page_size: pageSize },
        signal
      );
      if (!Array.isArray(raw) || raw.length !== 2) {
        throw new MalformedResponseError("Unexpected clips page payload from the data API.");
      }
      pagesUsed++;
      cursor = asStr(raw[1]);

      let reachedCutoff = false;
      for (const item of asRecordArray(raw[0])) {
        scanned++;
        const reel = parseReel(item, fetchedAt);
        if (!reel || seen.has(reel.shortcode)) continue;
        seen.add(reel.shortcode);
        const publishedSeconds = reel.publishedAt ? Date.parse(reel.publishedAt) / 1000 : null;
        if (cutoff !== null && publishedSeconds !== null && publishedSeconds < cutoff) {
          reachedCutoff = true;
          continue;
        }
        reels.push(reel);
        if (reels.length >= limit) break;
      }

      if (reachedCutoff || !cursor) break;
    }

    reels.sort((a, b) => Date.parse(b.publishedAt ?? "0") - Date.parse(a.publishedAt ?? "0"));
    return { reels: reels.slice(0, limit), pagesUsed, scanned, nextCursor: cursor };
  }

  async getFollowersPage(profile: ProfileSummary, cursor?: string | null, signal?: AbortSignal): Promise<FollowersPage> {
    const userId = this.requireUserId(profile);
    const payload = asRecord(await this.request("/g2/user/followers", { user_id: userId, page_id: cursor }, signal));
    const response = payload ? asRecord(payload.response) : null;
    if (!payload || !response) {
      throw new MalformedResponseError("Unexpected followers page payload from the data API.");
    }

    const followers = asRecordArray(response.users).flatMap((user) => parseFollower(user) ?? []);
    return {
      followers,
      nextCursor: asStr(payload.next_page_id) ?? asStr(response.next_max_id),
    };
  }

  async getComments(media: ReelStats, limit: number, signal?: AbortSignal): Promise<CappedList<Comment>> {
    const raw = await this.request("/v1/media/comments", { id: this.requireMediaId(media) }, signal);
    if (!Array.isArray(raw)) throw new MalformedResponseError("Unexpected comments payload from the data API.");
    const comments = asRecordArray(raw).map(parseComment);
    return { items: comments.slice(0, clamp(limit, 1, 50)), available: media.comments };
  }

  async getLikers(media: ReelStats, limit: number, signal?: AbortSignal): Promise<CappedList<Liker>> {
    const raw = await this.request("/v1/media/likers", { id: this.requireMediaId(media) }, signal);
    if (!Array.isArray(raw)) throw new MalformedResponseError("Unexpected likers payload from the data API.");
    const likers = asRecordArray(raw).flatMap((item) => parseLiker(item) ?? []);
    return { items: likers.slice(0, Math.max(1, limit)), available: media.likes };
  }

  async getStories(profile: ProfileSummary, signal?: AbortSignal): Promise<Story[]> {
    const raw = await this.request("/v1/user/stories", { user_id: this.requireUserId(profile) }, signal);
    const record = asRecord(raw);
    const items = Array.isArray(raw) ? raw : record && Array.isArray(record.items) ? record.items : null;
    if (!items) throw new MalformedResponseError("Unexpected stories payload from the data API.");
    return asRecordArray(items).map(parseStory);
  }

  async getHighlights(profile: ProfileSummary, signal?: AbortSignal): Promise<Highlight[]> {
    const raw = await this.request("/v1/user/highlights", { user_id: this.requireUserId(profile) }, signal);
    if (!Array.isArray(raw)) throw new MalformedResponseError("Unexpected highlights payload from the data API.");
    return asRecordArray(raw).flatMap((item) => parseHighlight(item) ?? []);
  }

  async getHighlightItems(highlightId: string, signal?: AbortSignal): Promise<Story[]> {
    const payload = asRecord(await this.request("/v1/highlight/by/id", { id: highlightId }, signal));
    if (!payload) throw new MalformedResponseError("Unexpected highlight payload from the data API.");
    return asRecordArray(payload.items).map(parseStory);
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchPage> {
    const payload = asRecord(await this.request("/gql/topsearch", { query: query.trim(), flat: true }, signal));
    if (!payload) throw new MalformedResponseError("Unexpected search payload from the data API.");
    const results: SearchResult[] = asRecordArray(payload.items).map(parseSearchItem);
    return {
      results: results.slice(0, clamp(limit, 1, 50)),
      moreAvailable: Boolean(payload.more_available),
    };
  }

  async fetchBinary(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.send(url, DOWNLOAD_TIMEOUT_MS, signal);
    if (!response.ok) {
      throw new DataApiError(`Content download failed with HTTP ${response.status}`, "download_failed", response.status);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  private requireUserId(profile: ProfileSummary): string {
    if (!profile.userId) {
      throw new MalformedResponseError(`Profile @${profile.username} has no user id in the data API response.`);
    }
    return profile.userId;
  }

  private requireMediaId(media: ReelStats): string {
    // Composite ids look like "<pk>_<owner id>"; the list endpoints take the numeric pk.
    const pk = media.id?.split("_")[0];
    if (!pk) throw new MalformedResponseError(`Media ${media.shortcode} has no numeric id.`);
    return pk;
  }

  private requireAccessKey(): string {
    const accessKey = this.options.accessKey;
    if (!accessKey) {
      throw new ConfigError("HIKERAPI_TOKEN or HIKERAPI_KEY is missing. Add one to the .env file and run 'reload'.");
    }
    return accessKey;
  }

  private async request(path: string, params: Record<string, QueryValue>, signal?: AbortSignal): Promise<unknown> {
    const accessKey = this.requireAccessKey();

    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, "")}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== null && value !== undefined && value !== "") url.searchParams.set(key, String(value));
    }
    url.searchParams.set("access_key", accessKey);

    return retryWithBackoff(
      async () => {
        const response = await this.send(url.toString(), this.options.timeoutMs, signal);
        logger.debug({ path, status: response.status }, "Data API response");
        if (!response.ok) throw await this.toHttpError(response);
        try {
          return await response.json();
        } catch {
          throw new MalformedResponseError(`Data API returned a non-JSON body for ${path}.`);
        }
      },
      { ...this.retry, signal },
      `hikerapi ${path}`
    );
  }

  private async send(url: string, timeoutMs: number, signal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await this.fetchImpl(url, { signal: controller.signal, headers: { accept: "application/json" } });
    } catch (error) {
      if (signal?.aborted) throw new DataApiError("Request cancelled", "cancelled");
      if (error instanceof Error && error.name === "AbortError") {
        throw new DataApiError(`Request timed out after ${timeoutMs}ms`, "timeout");
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new DataApiError(`Data API request failed: ${message}`, "network_error");
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async toHttpError(response: Response): Promise<Error> {
    let detail: string | null = null;
    try {
      const body = asRecord(await response.json());
      detail = body ? asStr(body.detail) ?? asStr(body.message) : null;
    } catch {
      detail = null;
    }
    const suffix = detail ? ` (${detail})` : "";

    switch (response.status) {
      case 401:
      case 403:
        return new UnauthorizedError(`Data API rejected the access key: HTTP ${response.status}${suffix}`);
      case 404:
        return new NotFoundError(`Not found on the data API${suffix}`);
      case 429:
        return new RateLimitError(`Data API rate limit reached${suffix}`);
      default:
        return new DataApiError(`Data API HTTP ${response.status}${suffix}`, `http_${response.status}`, response.status);
    }
  }
}
