import type {
  AudioTrack,
  Comment,
  FollowerSummary,
  Highlight,
  Liker,
  MediaAsset,
  ProfileSummary,
  ReelKind,
  ReelStats,
  SearchResult,
  Story,
  ViralStatus,
} from "../../domain/models";
import { mediaUrl } from "../../domain/target";
import { asInt, asRecord, asStr, firstTruthy, toUtcIso } from "../../core/normalize";

type Payload = Record<string, unknown>;

const VIRAL_MIN_VIEWS = 1000;

/**
 * Trial reels are served without a reshare counter; published reels carry one.
 * Bump the version when the upstream payload stops behaving this way.
 */
export const REEL_KIND_HEURISTIC = {
  version: 1,
  classify(media: Payload): ReelKind {
    if ("reshare_count" in media) return "main";
    if (asStr(media.product_type) === "clips") return "trial";
    return "unknown";
  },
} as const;

export function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function calculateVirality(
  views: number,
  likes: number,
  comments: number,
  saves: number
): { viralIndex: number; viralStatus: ViralStatus } {
  if (views < VIRAL_MIN_VIEWS) return { viralIndex: 0, viralStatus: "insufficient_data" };

  const viralIndex = round((100 * (likes + 3 * comments + 4 * saves)) / views, 2);
  let viralStatus: ViralStatus = "non_viral";
  if (viralIndex >= 10) viralStatus = "viral";
  else if (viralIndex >= 6) viralStatus = "strong";
  else if (viralIndex >= 3) viralStatus = "normal";
  else if (viralIndex >= 1) viralStatus = "weak";
  return { viralIndex, viralStatus };
}

export function engagementRate(views: number, likes: number, comments: number, saves: number): number | null {
  if (views <= 0) return null;
  return round((likes + comments + saves) / views, 4);
}

function ownerOf(payload: Payload): Payload {
  return asRecord(payload.user) ?? asRecord(payload.owner) ?? {};
}

function idOf(payload: Payload): string | null {
  return asStr(firstTruthy(payload.pk, payload.id));
}

export function parseProfile(user: Payload, fallbackUsername?: string): ProfileSummary | null {
  const username = asStr(user.username) ?? fallbackUsername ?? null;
  if (!username) return null;
  return {
    userId: idOf(user),
    username: username.toLowerCase(),
    fullName: asStr(user.full_name),
    followerCount: Math.max(0, asInt(firstTruthy(user.follower_count, user.followers))),
    followingCount: Math.max(0, asInt(firstTruthy(user.following_count, user.following))),
    postCount: Math.max(0, asInt(firstTruthy(user.media_count, user.posts))),
    verified: Boolean(user.is_verified),
    private: Boolean(user.is_private),
    biography: asStr(user.biography),
    externalUrl: asStr(user.external_url),
    profilePicUrl: asStr(user.profile_pic_url),
  };
}

export function parseReel(media: Payload, fetchedAt: string, fallbackShortcode?: string): ReelStats | null {
  const shortcode = asStr(media.code) ?? fallbackShortcode ?? null;
  if (!shortcode) return null;

  const views = Math.max(
    0,
    asInt(firstTruthy(media.play_count, media.video_view_count, media.view_count, media.content_views_count))
  );
  const likes = Math.max(0, asInt(firstTruthy(media.like_count, media.likes)));
  const comments = Math.max(0, asInt(firstTruthy(media.comment_count, media.comments)));
  const saves = Math.max(
    0,
    asInt(firstTruthy(media.save_count, media.saved_count, media.saves_count, media.bookmark_count))
  );

  const owner = ownerOf(media);
  const captionRecord = asRecord(media.caption);
  const caption = (captionRecord ? asStr(captionRecord.text) : null) ?? asStr(media.caption_text) ?? asStr(media.title);
  const productType = asStr(media.product_type);
  const mediaType = typeof media.media_type === "number" ? Math.trunc(media.media_type) : null;

  return {
    id: idOf(media),
    shortcode,
    url: mediaUrl(shortcode, productType),
    owner: asStr(owner.username)?.toLowerCase() ?? asStr(media.username),
    ownerId: idOf(owner),
    productType,
    mediaType,
    caption,
    views,
    likes,
    comments,
    saves,
    engagementRate: engagementRate(views, likes, comments, saves),
    ...calculateVirality(views, likes, comments, saves),
    publishedAt: toUtcIso(firstTruthy(media.taken_at, media.taken_at_ts, media.created_time, media.timestamp)),
    reelKind: REEL_KIND_HEURISTIC.classify(media),
    fetchedAt,
  };
}

export function parseComment(comment: Payload): Comment {
  const user = asRecord(comment.user) ?? {};
  return {
    id: idOf(comment),
    text: asStr(comment.text),
    likeCount: Math.max(0, asInt(firstTruthy(comment.comment_like_count, comment.like_count))),
    createdAt: toUtcIso(firstTruthy(comment.created_at_utc, comment.created_at, comment.created_at_ts)),
    userId: idOf(user),
    username: asStr(user.username),
    fullName: asStr(user.full_name),
    verified: Boolean(user.is_verified),
    private: Boolean(user.is_private),
    parentCommentId: asStr(comment.parent_comment_id),
  };
}

export function parseLiker(item: Payload): Liker | null {
  const userId = idOf(item);
  const username = asStr(item.username);
  if (!userId || !username) return null;
  return {
    userId,
    username,
    fullName: asStr(item.full_name),
    verified: Boolean(item.is_verified),
    private: Boolean(item.is_private),
    profilePicUrl: asStr(item.profile_pic_url),
  };
}

export function parseFollower(user: Payload): FollowerSummary | null {
  const username = asStr(user.username);
  if (!username) return null;
  return {
    userId: idOf(user),
    username,
    fullName: asStr(user.full_name),
    verified: Boolean(user.is_verified),
    private: Boolean(user.is_private),
    profilePicUrl: asStr(user.profile_pic_url),
    hasStoryRing: asRecord(user.reel) !== null,
  };
}

export function parseSearchItem(item: Payload): SearchResult {
  const typename = asStr(item.__typename);
  const username = asStr(item.username);
  const shortcode = asStr(item.code);

  let resultType: SearchResult["resultType"] = "unknown";
  if (typename === "XDTUserDict" || username) resultType = "profile";
  else if (typename === "XDTMediaDict" || shortcode) resultType = "media";

  return {
    resultType,
    id: asStr(firstTruthy(item.id, item.pk, item.strong_id__)),
    username: username ?? asStr(ownerOf(item).username),
    fullName: asStr(item.full_name),
    shortcode,
    mediaUrl: shortcode ? mediaUrl(shortcode, "clips") : null,
    verified: Boolean(item.is_verified),
    private: Boolean(item.is_private),
    caption: asStr(item.caption_text) ?? asStr(item.title),
  };
}

export function parseStory(story: Payload): Story {
  const videoUrl = asStr(story.video_url) ?? bestVideoUrl(story.video_versions);
  const imageUrl = asStr(story.thumbnail_url) ?? bestImageUrl(story.image_versions);
  return {
    id: idOf(story),
    code: asStr(story.code),
    owner: asStr(asRecord(story.user)?.username),
    mediaType: typeof story.media_type === "number" ? Math.trunc(story.media_type) : null,
    publishedAt: toUtcIso(story.taken_at),
    isVideo: videoUrl !== null,
    videoUrl,
    imageUrl,
  };
}

export function parseHighlight(highlight: Payload): Highlight | null {
  const id = idOf(highlight);
  if (!id) return null;
  return {
    id,
    title: asStr(highlight.title),
    owner: asStr(asRecord(highlight.user)?.username),
    mediaCount: Math.max(0, asInt(highlight.media_count)),
    createdAt: toUtcIso(highlight.created_at),
    pinned: Boolean(highlight.is_pinned_highlight),
  };
}

function bestCandidate(candidates: unknown, dimension: "width" | "height"): string | null {
  if (!Array.isArray(candidates)) return null;
  let bestUrl: string | null = null;
  let bestSize = -1;
  for (const candidate of candidates) {
    const record = asRecord(candidate);
    const url = record ? asStr(record.url) : null;
    if (!record || !url) continue;
    const size = asInt(record[dimension]);
    if (size >= bestSize) {
      bestSize = size;
      bestUrl = url;
    }
  }
  return bestUrl;
}

export function bestImageUrl(candidates: unknown): string | null {
  const direct = bestCandidate(candidates, "width");
  if (direct) return direct;
  // image_versions2 shape: { candidates: [...] }
  const nested = asRecord(candidates);
  return nested ? bestCandidate(nested.candidates, "width") : null;
}

export function bestVideoUrl(candidates: unknown): string | null {
  return bestCandidate(candidates, "height");
}

const KNOWN_EXTENSIONS = new Set([".mp4", ".jpg", ".jpeg", ".png", ".webp", ".m4a", ".mp3", ".aac"]);

export function guessExtension(url: string, fallback: string): string {
  try {
    const pathname = new URL(url).pathname;
    const dot = pathname.lastIndexOf(".");
    const ext = dot >= 0 ? pathname.slice(dot).toLowerCase() : "";
    return KNOWN_EXTENSIONS.has(ext) ? ext : fallback;
  } catch {
    return fallback;
  }
}

function imageOf(payload: Payload): string | null {
  return bestImageUrl(payload.image_versions) ?? bestImageUrl(payload.image_versions2) ?? asStr(payload.thumbnail_url);
}

function videoOf(payload: Payload): string | null {
  return asStr(payload.video_url) ?? bestVideoUrl(payload.video_versions);
}

export function extractMediaAssets(media: Payload): MediaAsset[] {
  const code = asStr(media.code);
  const resources = Array.isArray(media.resources) ? media.resources : Array.isArray(media.carousel_media) ? media.carousel_media : [];
  const assets: MediaAsset[] = [];

  const push = (video: string | null, image: string | null, index: number) => {
    const url = video ?? image;
    if (!url) return;
    assets.push({
      url,
      kind: video ? "video" : "image",
      index,
      code,
      extension: guessExtension(url, video ? ".mp4" : ".jpg"),
      group: null,
    });
  };

  if (resources.length > 0) {
    resources.forEach((resource, i) => {
      const record = asRecord(resource);
      if (record) push(videoOf(record), imageOf(record), i + 1);
    });
  } else {
    push(videoOf(media), imageOf(media), 1);
  }
  return assets;
}

function nested(value: unknown, ...path: string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    const record = asRecord(current);
    if (!record) return undefined;
    current = record[key];
  }
  return current;
}

export function extractAudioTrack(media: Payload): AudioTrack | null {
  const clips = asRecord(media.clips_metadata) ?? {};
  const original = nested(clips, "original_sound_info");
  const music = nested(clips, "music_info", "music_asset_info");

  const url =
    asStr(nested(original, "progressive_download_url")) ??
    asStr(nested(original, "fast_start_progressive_download_url")) ??
    asStr(nested(music, "progressive_download_url")) ??
    asStr(nested(music, "fast_start_progressive_download_url")) ??
    asStr(nested(music, "preview_audio_url"));
  if (!url) return null;

  return {
    title:
      asStr(nested(music, "title")) ?? asStr(nested(original, "original_audio_title")) ?? asStr(media.code) ?? "audio",
    artist:
      asStr(nested(music, "display_artist")) ?? asStr(nested(music, "artist_name")) ?? asStr(ownerOf(media).username),
    url,
    extension: guessExtension(url, ".m4a"),
  };
}
