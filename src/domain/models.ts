import { z } from "zod";

export const ProfileSummarySchema = z.object({
  userId: z.string().nullable(),
  username: z.string().min(1),
  fullName: z.string().nullable(),
  followerCount: z.number().int().nonnegative(),
  followingCount: z.number().int().nonnegative(),
  postCount: z.number().int().nonnegative(),
  verified: z.boolean(),
  private: z.boolean(),
  biography: z.string().nullable(),
  externalUrl: z.string().nullable(),
  profilePicUrl: z.string().nullable(),
});
export type ProfileSummary = z.infer<typeof ProfileSummarySchema>;

export const ProfileStatsSchema = ProfileSummarySchema.extend({
  hasStories: z.boolean().nullable(),
  storiesCount: z.number().int().nonnegative().nullable(),
  storiesError: z.string().nullable(),
  fetchedAt: z.string(),
});
export type ProfileStats = z.infer<typeof ProfileStatsSchema>;

export const ViralStatusSchema = z.enum(["viral", "strong", "normal", "weak", "non_viral", "insufficient_data"]);
export type ViralStatus = z.infer<typeof ViralStatusSchema>;

export const ReelKindSchema = z.enum(["main", "trial", "unknown"]);
export type ReelKind = z.infer<typeof ReelKindSchema>;

export const ReelStatsSchema = z.object({
  id: z.string().nullable(),
  shortcode: z.string().min(1),
  url: z.string(),
  owner: z.string().nullable(),
  ownerId: z.string().nullable(),
  productType: z.string().nullable(),
  mediaType: z.number().int().nullable(),
  caption: z.string().nullable(),
  views: z.number().int().nonnegative(),
  likes: z.number().int().nonnegative(),
  comments: z.number().int().nonnegative(),
  saves: z.number().int().nonnegative(),
  engagementRate: z.number().nullable(),
  viralIndex: z.number(),
  viralStatus: ViralStatusSchema,
  publishedAt: z.string().nullable(),
  reelKind: ReelKindSchema,
  fetchedAt: z.string(),
});
export type ReelStats = z.infer<typeof ReelStatsSchema>;

export const CommentSchema = z.object({
  id: z.string().nullable(),
  text: z.string().nullable(),
  likeCount: z.number().int().nonnegative(),
  createdAt: z.string().nullable(),
  userId: z.string().nullable(),
  username: z.string().nullable(),
  fullName: z.string().nullable(),
  verified: z.boolean(),
  private: z.boolean(),
  parentCommentId: z.string().nullable(),
});
export type Comment = z.infer<typeof CommentSchema>;

export const LikerSchema = z.object({
  userId: z.string(),
  username: z.string(),
  fullName: z.string().nullable(),
  verified: z.boolean(),
  private: z.boolean(),
  profilePicUrl: z.string().nullable(),
});
export type Liker = z.infer<typeof LikerSchema>;

export const FollowerSummarySchema = z.object({
  userId: z.string().nullable(),
  username: z.string(),
  fullName: z.string().nullable(),
  verified: z.boolean(),
  private: z.boolean(),
  profilePicUrl: z.string().nullable(),
  hasStoryRing: z.boolean(),
});
export type FollowerSummary = z.infer<typeof FollowerSummarySchema>;

export const RankedUserSchema = z.object({
  rank: z.number().int().positive(),
  userId: z.string().nullable(),
  username: z.string(),
  fullName: z.string().nullable(),
  followerCount: z.number().int().nonnegative(),
  followingCount: z.number().int().nonnegative(),
  postCount: z.number().int().nonnegative(),
  verified: z.boolean(),
  private: z.boolean(),
  likedCount: z.number().int().nonnegative(),
  likedShortcodes: z.array(z.string()),
});
export type RankedUser = z.infer<typeof RankedUserSchema>;

export const SearchResultSchema = z.object({
  resultType: z.enum(["profile", "media", "unknown"]),
  id: z.string().nullable(),
  username: z.string().nullable(),
  fullName: z.string().nullable(),
  shortcode: z.string().nullable(),
  mediaUrl: z.string().nullable(),
  verified: z.boolean(),
  private: z.boolean(),
  caption: z.string().nullable(),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export const StorySchema = z.object({
  id: z.string().nullable(),
  code: z.string().nullable(),
  owner: z.string().nullable(),
  mediaType: z.number().int().nullable(),
  publishedAt: z.string().nullable(),
  isVideo: z.boolean(),
  videoUrl: z.string().nullable(),
  imageUrl: z.string().nullable(),
});
export type Story = z.infer<typeof StorySchema>;

export const HighlightSchema = z.object({
  id: z.string(),
  title: z.string().nullable(),
  owner: z.string().nullable(),
  mediaCount: z.number().int().nonnegative(),
  createdAt: z.string().nullable(),
  pinned: z.boolean(),
});
export type Highlight = z.infer<typeof HighlightSchema>;

export const BudgetCountersSchema = z.object({
  pageRequests: z.number().int().nonnegative(),
  profileLookups: z.number().int().nonnegative(),
  mediaLookups: z.number().int().nonnegative(),
  cacheHits: z.number().int().nonnegative(),
});
export type BudgetCounters = z.infer<typeof BudgetCountersSchema>;

export const COLLECTION_KINDS = [
  "reels",
  "comments",
  "likers",
  "followers",
  "top_followers",
  "ranked_likers",
  "search_results",
  "stories",
  "highlights",
] as const;
export const CollectionKindSchema = z.enum(COLLECTION_KINDS);
export type CollectionKind = z.infer<typeof CollectionKindSchema>;

interface CollectionBase {
  fetchedAt: string;
  filenameHint: string;
  metadata: Record<string, unknown>;
}

export type Collection =
  | (CollectionBase & { kind: "reels"; entries: ReelStats[] })
  | (CollectionBase & { kind: "comments"; entries: Comment[] })
  | (CollectionBase & { kind: "likers"; entries: Liker[] })
  | (CollectionBase & { kind: "followers"; entries: FollowerSummary[] })
  | (CollectionBase & { kind: "top_followers"; entries: RankedUser[] })
  | (CollectionBase & { kind: "ranked_likers"; entries: RankedUser[] })
  | (CollectionBase & { kind: "search_results"; entries: SearchResult[] })
  | (CollectionBase & { kind: "stories"; entries: Story[] })
  | (CollectionBase & { kind: "highlights"; entries: Highlight[] });

export type CollectionOf<K extends CollectionKind> = Extract<Collection, { kind: K }>;
export type CollectionEntry = Collection["entries"][number];

export const ENTRY_SCHEMAS = {
  reels: ReelStatsSchema,
  comments: CommentSchema,
  likers: LikerSchema,
  followers: FollowerSummarySchema,
  top_followers: RankedUserSchema,
  ranked_likers: RankedUserSchema,
  search_results: SearchResultSchema,
  stories: StorySchema,
  highlights: HighlightSchema,
} satisfies Record<CollectionKind, z.ZodTypeAny>;

export interface SampleResult {
  target: string;
  sampledCount: number;
  enrichedCount: number;
  cacheHitsUsed: number;
  ranked: RankedUser[];
  budgetUsed: BudgetCounters;
  truncated: boolean;
  truncationReason: string | null;
  hasMore: boolean;
  pagesUsed: number;
  approximate: true;
}

export const AssetKindSchema = z.enum(["video", "image", "audio"]);
export type AssetKind = z.infer<typeof AssetKindSchema>;

export interface MediaAsset {
  url: string;
  kind: AssetKind;
  index: number;
  code: string | null;
  extension: string;
  group: string | null;
}

export interface DownloadPlan {
  downloadKind: "media" | "media_audio" | "stories" | "highlights";
  targetLabel: string;
  assets: MediaAsset[];
  details: Record<string, unknown>;
}

export interface DownloadedFile {
  path: string;
  kind: AssetKind;
  url: string;
  code: string | null;
  group: string | null;
}

export interface DownloadResult {
  downloadKind: DownloadPlan["downloadKind"];
  targetLabel: string;
  outputDir: string;
  files: DownloadedFile[];
  metadataPath: string;
  createdAt: string;
}

export interface AudioTrack {
  title: string;
  artist: string | null;
  url: string;
  extension: string;
}

/** Everything a download needs from a single media lookup. */
export interface MediaContent {
  reel: ReelStats;
  assets: MediaAsset[];
  audio: AudioTrack | null;
}
