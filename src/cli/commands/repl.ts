import readline from "readline/promises";
import type { Command } from "commander";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { CommandShell } from "../shell";
import { Spinner } from "../spinner";

const PROMPT = "reelscope> ";

async function runRepl(shell: CommandShell): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
  const spinner = new Spinner();
  let inFlight: AbortController | null = null;
  // Ctrl+D or Ctrl+C at the prompt closes the interface.
  const closed = new Promise<null>((resolve) => rl.once("close", () => resolve(null)));

  // Ctrl+C cancels the running command; at an idle prompt it leaves.
  rl.on("SIGINT", () => {
    if (inFlight) {
      inFlight.abort();
      return;
    }
    rl.close();
  });

  console.log("reelscope: Instagram stats in your terminal. Type 'help' for commands, 'exit' to leave.");
  if (!env.hikerAccessKey) console.log("Warning: HIKERAPI_KEY is not set; data commands will fail until it is.");

  try {
    for (;;) {
      const line = await Promise.race([
        rl.question(PROMPT).catch((error: unknown) => {
          logger.debug({ error }, "Prompt closed");
          return null;
        }),
        closed,
      ]);
      if (line === null) break;

      // Input stays open while a command runs so Ctrl+C reaches the SIGINT handler.
      inFlight = new AbortController();
      spinner.start("working");
      const outcome = await shell.handle(line, inFlight.signal).finally(() => {
        spinner.stop();
        inFlight = null;
      });

      if (outcome.output) console.log(outcome.output);
      if (outcome.exit) break;
    }
  } finally {
    rl.close();
  }
}

export const commands = (program: Command) => {
  program
    .command("repl", { isDefault: true })
    .description("Start the interactive session")
    .action(async () => {
      await runRepl(new CommandShell());
    });

  program
    .command("exec")
    .description("Run a single command or question and exit")
    .argument("<line...>", "Command line or question")
    .action(async (words: string[]) => {
      const shell = new CommandShell();
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once("SIGINT", onSigint);
      try {
        const outcome = await shell.handle(words.join(" "), controller.signal);
        if (outcome.output) console.log(outcome.output);
        if (outcome.output.startsWith("Error:")) process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    });
};
