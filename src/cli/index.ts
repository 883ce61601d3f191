#!/usr/bin/env -S npx tsx
import { Command } from "commander";
import { commands as replCommands } from "./commands/repl";

const program = new Command();

program.name("reelscope").description("Instagram analytics client with session memory and an AI assistant").version("0.1.0");

replCommands(program);

await program.parseAsync();
