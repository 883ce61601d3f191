import { ConfigError } from "../core/errors";
import type { BudgetCounters, ProfileSummary, ReelStats } from "../domain/models";
import type { ReelFilterOptions, StatsClient } from "../platforms/adapter";
import type { SessionContext } from "./session-context";

/**
 * Wraps a StatsClient so each upstream round trip lands in the session budget.
 * Failed calls are charged too (a 404 or 429 is still a metered request);
 * only a missing access key, which stops the call before any request, is not.
 */
export class MeteredStatsClient implements StatsClient {
  readonly provider: string;

  constructor(
    private readonly inner: StatsClient,
    private readonly context: SessionContext
  ) {
    this.provider = inner.provider;
  }

  private async metered<T>(delta: Partial<BudgetCounters>, call: () => Promise<T>): Promise<T> {
    let sent = true;
    try {
      return await call();
    } catch (error) {
      if (error instanceof ConfigError) sent = false;
      throw error;
    } finally {
      if (sent) this.context.recordBudget(delta);
    }
  }

  getProfile(username: string, signal?: AbortSignal) {
    return this.metered({ profileLookups: 1 }, () => this.inner.getProfile(username, signal));
  }

  getProfileById(userId: string, signal?: AbortSignal) {
    return this.metered({ profileLookups: 1 }, () => this.inner.getProfileById(userId, signal));
  }

  getReel(shortcode: string, signal?: AbortSignal) {
    return this.metered({ mediaLookups: 1 }, () => this.inner.getReel(shortcode, signal));
  }

  getMediaContent(shortcode: string, signal?: AbortSignal) {
    return this.metered({ mediaLookups: 1 }, () => this.inner.getMediaContent(shortcode, signal));
  }

  getReelsByFilter(profile: ProfileSummary, options: ReelFilterOptions, signal?: AbortSignal) {
    const onPageRequest = () => {
      this.context.recordBudget({ pageRequests: 1 });
      options.onPageRequest?.();
    };
    return this.inner.getReelsByFilter(profile, { ...options, onPageRequest }, signal);
  }

  getFollowersPage(profile: ProfileSummary, cursor?: string | null, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.getFollowersPage(profile, cursor, signal));
  }

  getComments(media: ReelStats, limit: number, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.getComments(media, limit, signal));
  }

  getLikers(media: ReelStats, limit: number, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.getLikers(media, limit, signal));
  }

  getStories(profile: ProfileSummary, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.getStories(profile, signal));
  }

  getHighlights(profile: ProfileSummary, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.getHighlights(profile, signal));
  }

  getHighlightItems(highlightId: string, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.getHighlightItems(highlightId, signal));
  }

  search(query: string, limit: number, signal?: AbortSignal) {
    return this.metered({ pageRequests: 1 }, () => this.inner.search(query, limit, signal));
  }

  // CDN downloads are not data API calls.
  fetchBinary(url: string, signal?: AbortSignal) {
    return this.inner.fetchBinary(url, signal);
  }
}
