import { COMMANDS, usageOf } from "../orchestration/command-router";

const EXAMPLES = [
  "https://www.instagram.com/reel/<shortcode>/",
  "@username",
  "show me the latest 5 reels of this profile",
  "how many views did the last reel get?",
  "who are the biggest followers of this account?",
  "rank the likers of this reel by followers",
  "export that as csv",
];

export function helpText(): string {
  const rows = COMMANDS.map((command) => {
    const aliases = "aliases" in command ? ` (also: ${command.aliases.join(", ")})` : "";
    return { usage: usageOf(command), summary: `${command.summary}${aliases}` };
  });
  const width = Math.max(...rows.map((row) => row.usage.length));

  return [
    "Commands:",
    ...rows.map((row) => `  ${row.usage.padEnd(width)}  ${row.summary}`),
    "",
    "Targets: a profile link, @username, username, reel link, or a number from the last search.",
    "Omit the target (or say 'this') to use the current profile or reel.",
    "",
    "Anything else is sent to the assistant, for example:",
    ...EXAMPLES.map((example) => `  ${example}`),
  ].join("\n");
}

export function actionsText(): string {
  return [
    "What you can do:",
    "  - Profile stats: followers, following, posts, active stories",
    "  - Reel stats: views, likes, comments, saves, engagement rate, viral index",
    "  - Latest reels of a profile, optionally from the last N days",
    "  - Followers, one page at a time",
    "  - Approximate top followers and top likers by follower count (bounded samples)",
    "  - Comments and likers of a reel",
    "  - Stories and highlights of a profile",
    "  - Keyword search; pick a result by its number",
    "  - Export the last list or ranking to CSV or JSON",
    "  - Download reel media, reel audio, stories and highlights",
    "  - Ask questions in plain language; the assistant uses the same operations",
  ].join("\n");
}
