import { describe, it, expect } from "vitest";
import { env } from "../../src/core/config";
import { RateLimitError } from "../../src/core/errors";
import { CommandShell } from "../../src/cli/shell";
import { FakeStatsClient, makeProfile } from "../helpers/fake-stats-client";
import { answer, ScriptedLLM } from "../helpers/scripted-llm";

function setup(replies = [answer("Hi there.")]) {
  const client = new FakeStatsClient().addProfile(makeProfile("demo", { followerCount: 5000 }));
  const llm = new ScriptedLLM(replies);
  const shell = new CommandShell({
    config: { ...env, OPENROUTER_CHAT_MODEL: "test-model" },
    backends: () => ({ client, llm }),
    reloadConfig: () => ({ ...env, OPENROUTER_CHAT_MODEL: "reloaded-model", envFileLoaded: true }),
  });
  return { client, llm, shell };
}

describe("CommandShell", () => {
  it("should end the session on exit", async () => {
    const { shell } = setup();
    await expect(shell.handle("quit")).resolves.toEqual({ output: "Bye.", exit: true });
  });

  it("should show and switch the chat model", async () => {
    const { shell, llm } = setup();

    expect((await shell.handle("model")).output).toBe("Model: test-model");
    expect((await shell.handle("model other/model")).output).toBe("Model set to other/model");
    await shell.handle("what now?");
    expect(llm.requests[0]?.options.model).toBe("other/model");
  });

  it("should hand questions to the assistant", async () => {
    const { shell } = setup();
    await expect(shell.handle("who is demo?")).resolves.toEqual({ output: "Hi there.", exit: false });
  });

  it("should print usage for malformed commands", async () => {
    const { shell, client } = setup();

    const outcome = await shell.handle("reels demo abc");

    expect(outcome.output).toBe("limit must be a non-negative integer. Usage: reels <target> [limit] [days_back]");
    expect(client.calls).toEqual([]);
  });

  it("should turn failures into an error line with a hint", async () => {
    const { shell, client } = setup();
    client.failures.set("getProfile:demo", new RateLimitError("Too many requests"));

    const outcome = await shell.handle("profile demo");

    expect(outcome).toEqual({
      output:
        "Error: Too many requests\nThe data API is throttling requests. Narrow the scope (smaller sample or limit) and try again later.",
      exit: false,
    });
  });

  it("should report cancellation instead of the error", async () => {
    const { shell, client } = setup();
    client.failures.set("getProfile:demo", new Error("socket closed"));
    const controller = new AbortController();
    controller.abort();

    await expect(shell.handle("profile demo", controller.signal)).resolves.toEqual({ output: "Cancelled.", exit: false });
  });

  it("should check downloads of stories take a numeric limit", async () => {
    const { shell } = setup();
    expect((await shell.handle("download stories demo soon")).output).toBe(
      "limit must be a non-negative integer. Usage: download stories [target] [limit]"
    );
  });

  it("should reset the session on reload", async () => {
    const { shell } = setup();
    await shell.handle("profile demo");
    expect(shell.context.currentProfile?.username).toBe("demo");

    const outcome = await shell.handle("reload");

    expect(outcome.output).toBe(`Reloaded ${env.envFile}. Session reset.`);
    expect(shell.context.currentProfile).toBeNull();
    expect(shell.context.currentModel).toBe("reloaded-model");
  });
});
