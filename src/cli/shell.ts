import { env, loadConfig, type AppConfig } from "../core/config";
import { logger } from "../core/logger";
import { toErrorPayload } from "../core/errors";
import type { LLMClient } from "../llm/contracts";
import { runAgentTurn } from "../llm/agent";
import { OpenRouterClient } from "../llm/openrouter-client";
import { routeLine, type ArgValue, type CommandName } from "../orchestration/command-router";
import { Operations } from "../orchestration/operations";
import type { StatsClient } from "../platforms/adapter";
import { HikerApiClient } from "../platforms/instagram/hiker-client";
import { SessionContext } from "../services/session-context";
import { actionsText, helpText } from "./help";
import {
  renderBudget,
  renderComments,
  renderDownload,
  renderExport,
  renderFollowers,
  renderHighlights,
  renderJson,
  renderLikers,
  renderProfile,
  renderRankedLikers,
  renderReel,
  renderReels,
  renderSearch,
  renderStats,
  renderStories,
  renderTopFollowers,
} from "./render";

export interface ShellBackends {
  client: StatsClient;
  llm: LLMClient;
}

export type BackendFactory = (config: AppConfig) => ShellBackends;

export interface ShellOptions {
  config?: AppConfig;
  backends?: BackendFactory;
  /** Re-reads configuration for `reload`. */
  reloadConfig?: () => AppConfig;
  now?: () => Date;
}

export interface LineOutcome {
  output: string;
  exit: boolean;
}

const defaultBackends: BackendFactory = (config) => ({
  client: HikerApiClient.fromConfig(config),
  llm: OpenRouterClient.fromConfig(config),
});

type Args = Record<string, ArgValue>;

const str = (args: Args, name: string): string | undefined => {
  const value = args[name];
  return typeof value === "string" ? value : undefined;
};
const int = (args: Args, name: string): number | undefined => {
  const value = args[name];
  return typeof value === "number" ? value : undefined;
};
const list = (args: Args, name: string): string[] => {
  const value = args[name];
  return Array.isArray(value) ? value : typeof value === "string" ? [value] : [];
};

const done = (output: string): LineOutcome => ({ output, exit: false });

/** One interactive session: routes input lines and renders their results as text. */
export class CommandShell {
  private config: AppConfig;
  private llm: LLMClient;
  private ops: Operations;
  private readonly backends: BackendFactory;
  private readonly reloadConfig: () => AppConfig;
  private readonly now?: () => Date;

  constructor(options: ShellOptions = {}) {
    this.config = options.config ?? env;
    this.backends = options.backends ?? defaultBackends;
    this.reloadConfig = options.reloadConfig ?? loadConfig;
    this.now = options.now;
    const built = this.build();
    this.llm = built.llm;
    this.ops = built.ops;
  }

  get context(): SessionContext {
    return this.ops.context;
  }

  private build(): { llm: LLMClient; ops: Operations } {
    const { client, llm } = this.backends(this.config);
    const ops = new Operations({
      client,
      context: new SessionContext(this.config.OPENROUTER_CHAT_MODEL),
      outputDir: this.config.OUTPUT_DIR,
      now: this.now,
    });
    return { llm, ops };
  }

  async handle(line: string, signal?: AbortSignal): Promise<LineOutcome> {
    const action = routeLine(line);
    try {
      switch (action.type) {
        case "empty":
          return done("");
        case "usage":
          return done(action.message);
        case "agent": {
          const turn = await runAgentTurn(action.text, {
            llm: this.llm,
            ops: this.ops,
            maxSteps: this.config.AGENT_MAX_STEPS,
            signal,
          });
          return done(turn.answer);
        }
        case "direct":
          return await this.direct(action.name, action.args, signal);
      }
    } catch (error) {
      if (signal?.aborted) return done("Cancelled.");
      const payload = toErrorPayload(error);
      logger.debug({ line, error: payload.error }, "Command failed");
      return done(payload.hint ? `Error: ${payload.message}\n${payload.hint}` : `Error: ${payload.message}`);
    }
  }

  private async direct(name: CommandName, args: Args, signal?: AbortSignal): Promise<LineOutcome> {
    const ops = this.ops;
    const target = str(args, "target") ?? null;
    const media = str(args, "media") ?? null;
    const limit = int(args, "limit");

    switch (name) {
      case "help":
        return done(helpText());
      case "actions":
        return done(actionsText());
      case "context":
        return done(renderJson(this.context.toAgentContext()));
      case "budget":
        return done(renderBudget(this.context.snapshotBudget(), this.context.cachedProfileCount));
      case "last":
        return done(this.context.lastResult === null ? "Nothing yet." : renderJson(this.context.lastResult));
      case "model": {
        const id = str(args, "id");
        if (id) this.context.currentModel = id;
        return done(id ? `Model set to ${id}` : `Model: ${this.context.currentModel}`);
      }
      case "reload": {
        this.config = this.reloadConfig();
        const built = this.build();
        this.llm = built.llm;
        this.ops = built.ops;
        logger.info({ envFile: this.config.envFile, loaded: this.config.envFileLoaded }, "Configuration reloaded");
        return done(`Reloaded ${this.config.envFile}${this.config.envFileLoaded ? "" : " (file not found, using defaults)"}. Session reset.`);
      }
      case "exit":
        return { output: "Bye.", exit: true };
      case "stats":
        return done(renderStats(await ops.stats(target ?? "", { signal })));
      case "profile":
        return done(renderProfile(await ops.profileStats(target, { refresh: true, signal })));
      case "reel":
        return done(renderReel(await ops.reel(media, { signal })));
      case "reels":
        return done(renderReels(await ops.profileReels(target, { limit, daysBack: int(args, "days_back") ?? null, signal })));
      case "followers":
        return done(renderFollowers(await ops.followers(target, { limit, pageId: str(args, "page_id") ?? null, signal })));
      case "top-followers":
        return done(
          renderTopFollowers(
            await ops.topFollowers(target, {
              sampleSize: int(args, "sample_size"),
              topN: int(args, "top_n"),
              maxPages: int(args, "max_pages"),
              signal,
            })
          )
        );
      case "comments":
        return done(renderComments(await ops.comments(media, { limit, signal })));
      case "likers":
        return done(renderLikers(await ops.likers(media, { limit, signal })));
      case "rank-likers":
        return done(renderRankedLikers(await ops.rankLikers(list(args, "media"), { topN: int(args, "top_n"), signal })));
      case "stories":
        return done(renderStories(await ops.stories(target, { limit, signal })));
      case "highlights":
        return done(renderHighlights(await ops.highlights(target, { limit, signal })));
      case "search":
        return done(renderSearch(await ops.search(str(args, "query") ?? "", { signal })));
      case "export": {
        const format = str(args, "format") === "json" ? "json" : "csv";
        return done(renderExport(await ops.exportLast(format, str(args, "filename_hint"))));
      }
      case "download":
        return this.download(str(args, "kind"), target, str(args, "extra"), signal);
      case "ask":
        return done("Usage: ask <question...>");
    }
  }

  private async download(
    kind: string | undefined,
    target: string | null,
    extra: string | undefined,
    signal?: AbortSignal
  ): Promise<LineOutcome> {
    const ops = this.ops;
    switch (kind) {
      case "media":
        return done(renderDownload(await ops.downloadMedia(target, { signal })));
      case "audio":
        return done(renderDownload(await ops.downloadAudio(target, { signal })));
      case "stories": {
        if (extra !== undefined && !/^\d+$/.test(extra)) {
          return done("limit must be a non-negative integer. Usage: download stories [target] [limit]");
        }
        const limit = extra === undefined ? undefined : Number.parseInt(extra, 10);
        return done(renderDownload(await ops.downloadStories(target, { limit, signal })));
      }
      case "highlights":
        return done(renderDownload(await ops.downloadHighlights(target, { titleFilter: extra ?? null, signal })));
      default:
        return done("Usage: download <media|audio|stories|highlights> [target] [extra]");
    }
  }
}
