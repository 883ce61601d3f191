import { describe, it, expect } from "vitest";
import { findCommand, routeLine, usageOf } from "../../src/orchestration/command-router";

describe("routeLine", () => {
  it("should ignore blank input", () => {
    expect(routeLine("")).toEqual({ type: "empty" });
    expect(routeLine("   ")).toEqual({ type: "empty" });
  });

  it("should match commands and aliases case-insensitively", () => {
    expect(routeLine("help")).toEqual({ type: "direct", name: "help", args: {} });
    expect(routeLine("QUIT")).toEqual({ type: "direct", name: "exit", args: {} });
    expect(routeLine("q")).toEqual({ type: "direct", name: "exit", args: {} });
  });

  it("should parse positional integer arguments", () => {
    expect(routeLine("top-followers demo 25 10")).toEqual({
      type: "direct",
      name: "top-followers",
      args: { target: "demo", sample_size: 25, top_n: 10 },
    });
    expect(routeLine("reels demo 5 7")).toEqual({
      type: "direct",
      name: "reels",
      args: { target: "demo", limit: 5, days_back: 7 },
    });
  });

  it("should report usage when arguments do not fit", () => {
    expect(routeLine("reels demo abc")).toEqual({
      type: "usage",
      command: "reels",
      message: "limit must be a non-negative integer. Usage: reels <target> [limit] [days_back]",
    });
    expect(routeLine("reels")).toEqual({
      type: "usage",
      command: "reels",
      message: "missing target. Usage: reels <target> [limit] [days_back]",
    });
    expect(routeLine("stats a b")).toEqual({
      type: "usage",
      command: "stats",
      message: 'unexpected argument "b". Usage: stats <target>',
    });
    expect(routeLine("export xml")).toEqual({
      type: "usage",
      command: "export",
      message: "format must be one of csv, json. Usage: export <csv|json> [filename_hint]",
    });
  });

  it("should leave optional targets out when omitted", () => {
    expect(routeLine("comments")).toEqual({ type: "direct", name: "comments", args: {} });
    expect(routeLine("rank-likers")).toEqual({ type: "direct", name: "rank-likers", args: {} });
  });

  it("should collect several reels and a trailing top_n for rank-likers", () => {
    expect(routeLine("rank-likers https://www.instagram.com/reel/AAAAA1/ https://www.instagram.com/reel/BBBBB2/ 5")).toEqual({
      type: "direct",
      name: "rank-likers",
      args: {
        media: ["https://www.instagram.com/reel/AAAAA1/", "https://www.instagram.com/reel/BBBBB2/"],
        top_n: 5,
      },
    });
  });

  it("should join free text arguments", () => {
    expect(routeLine("search cute cats")).toEqual({ type: "direct", name: "search", args: { query: "cute cats" } });
    expect(routeLine("export CSV latest-reels")).toEqual({
      type: "direct",
      name: "export",
      args: { format: "csv", filename_hint: "latest-reels" },
    });
    expect(routeLine("download highlights demo travel trips")).toEqual({
      type: "direct",
      name: "download",
      args: { kind: "highlights", target: "demo", extra: "travel trips" },
    });
  });

  it("should treat a bare link or username as a stats request", () => {
    expect(routeLine("https://www.instagram.com/reel/Abc123/")).toEqual({
      type: "direct",
      name: "stats",
      args: { target: "https://www.instagram.com/reel/Abc123/" },
    });
    expect(routeLine("@demo")).toEqual({ type: "direct", name: "stats", args: { target: "@demo" } });
    expect(routeLine("demo")).toEqual({ type: "direct", name: "stats", args: { target: "demo" } });
  });

  it("should send questions to the assistant", () => {
    expect(routeLine("how many followers does demo have?")).toEqual({
      type: "agent",
      text: "how many followers does demo have?",
    });
    expect(routeLine("ask what changed since yesterday")).toEqual({ type: "agent", text: "what changed since yesterday" });
    expect(routeLine("ask")).toEqual({ type: "usage", command: "ask", message: "Usage: ask <question...>" });
  });
});

describe("usageOf", () => {
  it("should mark required, optional and repeated arguments", () => {
    const command = findCommand("rank-likers");
    expect(command && usageOf(command)).toBe("rank-likers [media...] [top_n]");
  });
});
