import { extractProfileUsername, extractReelShortcode } from "../domain/target";

export type ArgKind = "target" | "int" | "string";

export interface ArgSpec {
  name: string;
  kind: ArgKind;
  required?: boolean;
  /** Consumes every remaining token, joined by spaces. */
  rest?: boolean;
  choices?: readonly string[];
}

export interface CommandSpec {
  name: string;
  aliases?: readonly string[];
  args: readonly ArgSpec[];
  summary: string;
}

export const COMMANDS = [
  { name: "help", aliases: ["?"], args: [], summary: "show this help" },
  { name: "actions", args: [], summary: "list what the client can do" },
  { name: "context", args: [], summary: "show the session context" },
  { name: "budget", args: [], summary: "show data API usage for this session" },
  { name: "last", args: [], summary: "print the last result as JSON" },
  { name: "model", args: [{ name: "id", kind: "string" }], summary: "show or switch the chat model" },
  { name: "reload", args: [], summary: "re-read the .env file and reset the session" },
  { name: "exit", aliases: ["quit", "q"], args: [], summary: "leave" },
  { name: "stats", args: [{ name: "target", kind: "target", required: true }], summary: "profile or reel stats" },
  { name: "profile", args: [{ name: "target", kind: "target", required: true }], summary: "profile stats" },
  { name: "reel", args: [{ name: "media", kind: "target", required: true }], summary: "reel stats" },
  {
    name: "reels",
    args: [
      { name: "target", kind: "target", required: true },
      { name: "limit", kind: "int" },
      { name: "days_back", kind: "int" },
    ],
    summary: "latest reels, optionally from the last N days",
  },
  {
    name: "followers",
    args: [
      { name: "target", kind: "target", required: true },
      { name: "limit", kind: "int" },
      { name: "page_id", kind: "string" },
    ],
    summary: "one page of followers",
  },
  {
    name: "top-followers",
    aliases: ["top_followers", "topfollowers"],
    args: [
      { name: "target", kind: "target", required: true },
      { name: "sample_size", kind: "int" },
      { name: "top_n", kind: "int" },
      { name: "max_pages", kind: "int" },
    ],
    summary: "approximate biggest followers from a bounded sample",
  },
  {
    name: "comments",
    args: [
      { name: "media", kind: "target" },
      { name: "limit", kind: "int" },
    ],
    summary: "comments of a reel",
  },
  {
    name: "likers",
    args: [
      { name: "media", kind: "target" },
      { name: "limit", kind: "int" },
    ],
    summary: "likers of a reel",
  },
  {
    name: "rank-likers",
    aliases: ["rank_likers"],
    args: [
      { name: "media", kind: "target", rest: true },
      { name: "top_n", kind: "int" },
    ],
    summary: "rank likers of one or more reels by follower count",
  },
  {
    name: "stories",
    args: [
      { name: "target", kind: "target" },
      { name: "limit", kind: "int" },
    ],
    summary: "active stories",
  },
  {
    name: "highlights",
    args: [
      { name: "target", kind: "target" },
      { name: "limit", kind: "int" },
    ],
    summary: "highlight folders",
  },
  { name: "search", args: [{ name: "query", kind: "string", required: true, rest: true }], summary: "keyword search" },
  {
    name: "export",
    args: [
      { name: "format", kind: "string", required: true, choices: ["csv", "json"] },
      { name: "filename_hint", kind: "string" },
    ],
    summary: "export the last list or ranking",
  },
  {
    name: "download",
    args: [
      { name: "kind", kind: "string", required: true, choices: ["media", "audio", "stories", "highlights"] },
      { name: "target", kind: "target" },
      { name: "extra", kind: "string", rest: true },
    ],
    summary: "download media, audio, stories or highlights",
  },
  { name: "ask", args: [{ name: "question", kind: "string", required: true, rest: true }], summary: "ask the assistant" },
] as const satisfies readonly CommandSpec[];

export type CommandName = (typeof COMMANDS)[number]["name"];

export type ArgValue = string | number | string[];

export type Action =
  | { type: "direct"; name: CommandName; args: Record<string, ArgValue> }
  | { type: "agent"; text: string }
  | { type: "usage"; command: CommandName; message: string }
  | { type: "empty" };

const byToken = new Map<string, CommandSpec & { name: CommandName }>();
for (const command of COMMANDS) {
  byToken.set(command.name, command);
  if ("aliases" in command) {
    for (const alias of command.aliases) byToken.set(alias, command);
  }
}

export function usageOf(command: CommandSpec): string {
  const args = command.args.map((arg) => {
    const label = arg.choices ? arg.choices.join("|") : arg.rest ? `${arg.name}...` : arg.name;
    return arg.required ? `<${label}>` : `[${label}]`;
  });
  return [command.name, ...args].join(" ");
}

export function findCommand(token: string): (CommandSpec & { name: CommandName }) | undefined {
  return byToken.get(token.toLowerCase());
}

/** A line that is nothing but a profile/reel reference. */
export function isBareTarget(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || /\s/.test(trimmed)) return false;
  if (/instagram\.com\//i.test(trimmed)) return true;
  return extractReelShortcode(trimmed) !== null || extractProfileUsername(trimmed) !== null;
}

function parseInt10(token: string): number | null {
  return /^-?\d+$/.test(token) ? Number.parseInt(token, 10) : null;
}

type ParseOutcome = { ok: true; args: Record<string, ArgValue> } | { ok: false; message: string };

function parseArgs(command: CommandSpec, tokens: string[]): ParseOutcome {
  const args: Record<string, ArgValue> = {};
  let remaining = [...tokens];
  const params = command.args;

  for (const [i, param] of params.entries()) {
    if (param.rest) {
      // A trailing int param after a rest arg claims the last token when it is numeric.
      const tail = params.slice(i + 1);
      const tailInts: number[] = [];
      if (param.kind === "target" && tail.length === 1 && tail[0]?.kind === "int") {
        const last = remaining[remaining.length - 1];
        const parsed = last !== undefined ? parseInt10(last) : null;
        if (parsed !== null) {
          tailInts.push(parsed);
          remaining = remaining.slice(0, -1);
        }
      }
      if (remaining.length === 0 && param.required) return { ok: false, message: `missing ${param.name}` };
      if (remaining.length > 0) args[param.name] = param.kind === "target" ? remaining : remaining.join(" ");
      const tailParam = tail[0];
      if (tailParam && tailInts[0] !== undefined) args[tailParam.name] = tailInts[0];
      return { ok: true, args };
    }

    const token = remaining.shift();
    if (token === undefined) {
      if (param.required) return { ok: false, message: `missing ${param.name}` };
      continue;
    }

    if (param.kind === "int") {
      const value = parseInt10(token);
      if (value === null || value < 0) return { ok: false, message: `${param.name} must be a non-negative integer` };
      args[param.name] = value;
    } else if (param.choices) {
      const lowered = token.toLowerCase();
      if (!param.choices.includes(lowered)) {
        return { ok: false, message: `${param.name} must be one of ${param.choices.join(", ")}` };
      }
      args[param.name] = lowered;
    } else {
      args[param.name] = token;
    }
  }

  if (remaining.length > 0) return { ok: false, message: `unexpected argument "${remaining[0]}"` };
  return { ok: true, args };
}

/**
 * Maps one input line to an action. Known commands win, then bare
 * profile/reel references, and everything else goes to the assistant.
 */
export function routeLine(line: string): Action {
  const trimmed = line.trim();
  if (!trimmed) return { type: "empty" };

  const [head = "", ...tokens] = trimmed.split(/\s+/);
  const command = findCommand(head);
  if (command) {
    if (command.name === "ask") {
      const question = trimmed.slice(head.length).trim();
      if (!question) return { type: "usage", command: "ask", message: `Usage: ${usageOf(command)}` };
      return { type: "agent", text: question };
    }
    const parsed = parseArgs(command, tokens);
    if (!parsed.ok) {
      return { type: "usage", command: command.name, message: `${parsed.message}. Usage: ${usageOf(command)}` };
    }
    return { type: "direct", name: command.name, args: parsed.args };
  }

  if (isBareTarget(trimmed)) return { type: "direct", name: "stats", args: { target: trimmed } };

  return { type: "agent", text: trimmed };
}
