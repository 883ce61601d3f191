import { z } from "zod";
import { logger } from "../core/logger";
import { toErrorPayload } from "../core/errors";
import { REEL_METRICS, type Operations } from "../orchestration/operations";
import type { ToolDefinition } from "./contracts";

export interface ToolContext {
  ops: Operations;
  signal?: AbortSignal;
}

export interface ToolIssue {
  path: string;
  message: string;
}

export type ToolOutcome =
  | { ok: true; data: unknown }
  | { ok: false; error: string; message: string; hint?: string; issues?: ToolIssue[] };

interface ToolSpec<S extends z.ZodTypeAny> extends ToolDefinition {
  schema: S;
  execute(args: z.infer<S>, ctx: ToolContext): Promise<unknown>;
}

export interface RegisteredTool extends ToolDefinition {
  run(rawArguments: string, ctx: ToolContext): Promise<ToolOutcome>;
}

function invalidArguments(issues: ToolIssue[]): ToolOutcome {
  return { ok: false, error: "invalid_arguments", message: "Tool arguments failed validation.", issues };
}

function parseJsonArguments(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/** Binds a schema to its executor; arguments are validated before anything runs. */
function defineTool<S extends z.ZodTypeAny>(definition: ToolSpec<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    async run(rawArguments, ctx) {
      const json = parseJsonArguments(rawArguments);
      if (!json.ok) return invalidArguments([{ path: "", message: "Arguments are not valid JSON" }]);

      const parsed = definition.schema.safeParse(json.value);
      if (!parsed.success) {
        return invalidArguments(
          parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
        );
      }

      try {
        return { ok: true, data: await definition.execute(parsed.data, ctx) };
      } catch (error) {
        if (ctx.signal?.aborted) throw error;
        logger.debug({ tool: definition.name, error }, "Tool failed");
        return toErrorPayload(error);
      }
    },
  };
}

// JSON-schema fragments sent to the model.
const str = (description: string) => ({ type: "string", description });
const int = (description: string, minimum: number, maximum: number) => ({
  type: "integer",
  description,
  minimum,
  maximum,
});
const params = (properties: Record<string, unknown>, required: string[] = []) => ({
  type: "object",
  properties,
  required,
  additionalProperties: false,
});

const TARGET_DESC = "Profile link, @username or username. Omit or use 'this' for the current profile.";
const MEDIA_DESC = "Reel or post link, or shortcode. Omit or use 'this' for the current reel.";

const boundedInt = (min: number, max: number) => z.coerce.number().int().min(min).max(max);
const optionalText = z.string().nullish();

export const TOOLS: RegisteredTool[] = [
  defineTool({
    name: "get_session_context",
    description: "Return the current session context: current profile, current reel, recent reels, last list and budget.",
    parameters: params({}),
    schema: z.object({}).passthrough(),
    execute: async (_args, { ops }) => ops.context.toAgentContext(),
  }),
  defineTool({
    name: "search_instagram",
    description: "Keyword search for profiles, hashtags and places. Results are numbered for follow-up questions.",
    parameters: params({ query: str("Search text"), limit: int("Maximum results", 1, 20) }, ["query"]),
    schema: z.object({ query: z.string().min(1), limit: boundedInt(1, 20).nullish() }),
    execute: ({ query, limit }, { ops, signal }) => ops.search(query, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "get_profile_stats",
    description:
      "Profile statistics (followers, following, posts, stories). Answers from the session for the current profile unless refresh is true.",
    parameters: params(
      { target: str(TARGET_DESC), refresh: { type: "boolean", description: "Fetch fresh data even for the current profile" } }
    ),
    schema: z.object({ target: optionalText, refresh: z.boolean().nullish() }),
    execute: ({ target, refresh }, { ops, signal }) => ops.profileStats(target, { refresh: refresh ?? false, signal }),
  }),
  defineTool({
    name: "get_reel_stats",
    description: "Statistics of one reel or post: likes, views, comments, engagement rate and viral index.",
    parameters: params({ reel_url: str(MEDIA_DESC) }),
    schema: z.object({ reel_url: optionalText }),
    execute: ({ reel_url }, { ops, signal }) => ops.reel(reel_url, { signal }),
  }),
  defineTool({
    name: "get_recent_reels",
    description: "Latest reels of a profile, newest first.",
    parameters: params({ target: str(TARGET_DESC), limit: int("Number of reels", 1, 20) }),
    schema: z.object({ target: optionalText, limit: boundedInt(1, 20).nullish() }),
    execute: ({ target, limit }, { ops, signal }) => ops.recentReels(target, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "get_profile_reels",
    description: "Reels of a profile published within the last days_back days.",
    parameters: params({
      target: str(TARGET_DESC),
      limit: int("Number of reels", 1, 20),
      days_back: int("Only reels from the last N days", 1, 30),
    }),
    schema: z.object({ target: optionalText, limit: boundedInt(1, 20).nullish(), days_back: boundedInt(1, 30).nullish() }),
    execute: ({ target, limit, days_back }, { ops, signal }) =>
      ops.profileReels(target, { limit: limit ?? undefined, daysBack: days_back ?? null, signal }),
  }),
  defineTool({
    name: "get_followers_page",
    description: "One page of a profile's followers. Pass page_id from a previous result to continue.",
    parameters: params(
      { target: str(TARGET_DESC), limit: int("Followers to return", 1, 50), page_id: str("Cursor from a previous page") }
    ),
    schema: z.object({ target: optionalText, limit: boundedInt(1, 50).nullish(), page_id: optionalText }),
    execute: ({ target, limit, page_id }, { ops, signal }) =>
      ops.followers(target, { limit: limit ?? undefined, pageId: page_id ?? null, signal }),
  }),
  defineTool({
    name: "get_top_followers",
    description:
      "Approximate largest followers of a profile by follower count, from a bounded sample. The result is an estimate.",
    parameters: params(
      {
        target: str(TARGET_DESC),
        sample_size: int("Followers to sample", 5, 20),
        top_n: int("How many to return", 1, 10),
        max_pages: int("Follower pages to read", 1, 2),
      }
    ),
    schema: z.object({
      target: optionalText,
      sample_size: boundedInt(5, 20).nullish(),
      top_n: boundedInt(1, 10).nullish(),
      max_pages: boundedInt(1, 2).nullish(),
    }),
    execute: ({ target, sample_size, top_n, max_pages }, { ops, signal }) =>
      ops.topFollowers(target, {
        sampleSize: sample_size ?? undefined,
        topN: top_n ?? undefined,
        maxPages: max_pages ?? undefined,
        signal,
      }),
  }),
  defineTool({
    name: "get_media_comments",
    description: "Comments of a reel or post.",
    parameters: params({ media_url: str(MEDIA_DESC), limit: int("Comments to return", 1, 50) }),
    schema: z.object({ media_url: optionalText, limit: boundedInt(1, 50).nullish() }),
    execute: ({ media_url, limit }, { ops, signal }) => ops.comments(media_url, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "get_media_likers",
    description: "Accounts that liked a reel or post.",
    parameters: params({ media_url: str(MEDIA_DESC), limit: int("Likers to return", 1, 200) }),
    schema: z.object({ media_url: optionalText, limit: boundedInt(1, 200).nullish() }),
    execute: ({ media_url, limit }, { ops, signal }) => ops.likers(media_url, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "rank_media_likers_by_followers",
    description:
      "Rank the likers of one or more reels by their follower count. Approximate: only a bounded number of likers is enriched.",
    parameters: params({
      media_urls: { type: "array", items: { type: "string" }, description: "Reel links or shortcodes; omit for the current reel" },
      top_n: int("How many likers to return", 1, 100),
    }),
    schema: z.object({ media_urls: z.array(z.string()).nullish(), top_n: boundedInt(1, 100).nullish() }),
    execute: ({ media_urls, top_n }, { ops, signal }) =>
      ops.rankLikers(media_urls ?? [], { topN: top_n ?? undefined, signal }),
  }),
  defineTool({
    name: "get_profile_stories",
    description: "Active stories of a profile. limit 0 returns all.",
    parameters: params({ target: str(TARGET_DESC), limit: int("Stories to return, 0 for all", 0, 50) }),
    schema: z.object({ target: optionalText, limit: boundedInt(0, 50).nullish() }),
    execute: ({ target, limit }, { ops, signal }) => ops.stories(target, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "get_profile_highlights",
    description: "Highlight folders of a profile. limit 0 returns all.",
    parameters: params({ target: str(TARGET_DESC), limit: int("Highlights to return, 0 for all", 0, 50) }),
    schema: z.object({ target: optionalText, limit: boundedInt(0, 50).nullish() }),
    execute: ({ target, limit }, { ops, signal }) => ops.highlights(target, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "get_last_reel_metric",
    description: "One metric of the latest reel of a profile. Use for follow-ups like 'how many views did the last reel get'.",
    parameters: params(
      { target: str(TARGET_DESC), metric: { type: "string", enum: [...REEL_METRICS], description: "Metric to read" } },
      ["metric"]
    ),
    schema: z.object({ target: optionalText, metric: z.enum(REEL_METRICS) }),
    execute: ({ target, metric }, { ops, signal }) => ops.lastReelMetric(target, metric, { signal }),
  }),
  defineTool({
    name: "export_session_data",
    description: "Export the last list or ranking of the session to a CSV or JSON file.",
    parameters: params(
      {
        format: { type: "string", enum: ["csv", "json"], description: "File format" },
        filename_hint: str("Short name for the file"),
      },
      ["format"]
    ),
    schema: z.object({ format: z.enum(["csv", "json"]), filename_hint: optionalText }),
    execute: ({ format, filename_hint }, { ops }) => ops.exportLast(format, filename_hint),
  }),
  defineTool({
    name: "download_media_content",
    description: "Download the video and image files of a reel or post.",
    parameters: params({ media_url: str(MEDIA_DESC) }),
    schema: z.object({ media_url: optionalText }),
    execute: ({ media_url }, { ops, signal }) => ops.downloadMedia(media_url, { signal }),
  }),
  defineTool({
    name: "download_media_audio",
    description: "Download the audio track of a reel.",
    parameters: params({ media_url: str(MEDIA_DESC) }),
    schema: z.object({ media_url: optionalText }),
    execute: ({ media_url }, { ops, signal }) => ops.downloadAudio(media_url, { signal }),
  }),
  defineTool({
    name: "download_profile_stories",
    description: "Download the active stories of a profile. limit 0 downloads all.",
    parameters: params({ target: str(TARGET_DESC), limit: int("Stories to download, 0 for all", 0, 50) }),
    schema: z.object({ target: optionalText, limit: boundedInt(0, 50).nullish() }),
    execute: ({ target, limit }, { ops, signal }) => ops.downloadStories(target, { limit: limit ?? undefined, signal }),
  }),
  defineTool({
    name: "download_profile_highlights",
    description: "Download highlight folders of a profile, optionally only those whose title contains title_filter.",
    parameters: params(
      {
        target: str(TARGET_DESC),
        title_filter: str("Case-insensitive part of the highlight title"),
        limit_highlights: int("Highlights to download, 0 for all", 0, 50),
      }
    ),
    schema: z.object({ target: optionalText, title_filter: optionalText, limit_highlights: boundedInt(0, 50).nullish() }),
    execute: ({ target, title_filter, limit_highlights }, { ops, signal }) =>
      ops.downloadHighlights(target, { titleFilter: title_filter ?? null, limit: limit_highlights ?? undefined, signal }),
  }),
];

const byName = new Map(TOOLS.map((tool) => [tool.name, tool]));

export function toolDefinitions(): ToolDefinition[] {
  return TOOLS.map(({ name, description, parameters }) => ({ name, description, parameters }));
}

export async function executeTool(name: string, rawArguments: string, ctx: ToolContext): Promise<ToolOutcome> {
  const tool = byName.get(name);
  if (!tool) return { ok: false, error: "unknown_tool", message: `Unknown tool: ${name}` };
  return tool.run(rawArguments, ctx);
}
