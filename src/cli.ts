#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import { loadConfig, type CompletionPolicy, type ConfigOverrides, type HarvestConfig } from "./config.js";
import { describeError } from "./errors.js";
import {
  EXIT_CANCELLED,
  EXIT_FATAL,
  extractCommand,
  loginCommand,
  resetCommand,
  statusCommand
} from "./run.js";

interface ExtractOptions {
  filter?: string;
  policy?: CompletionPolicy;
  concurrency?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

async function withConfig(overrides: ConfigOverrides, body: (config: HarvestConfig) => Promise<number>) {
  let config: HarvestConfig;
  try {
    config = loadConfig(process.env, overrides);
  } catch (err) {
    console.error(`❌ ${describeError(err)}`);
    process.exitCode = EXIT_FATAL;
    return;
  }
  process.exitCode = await body(config);
}

// ---------------------------------------------------------------------------
// Cancellation: the first Ctrl-C lets the current round finish its commit, the second exits.

const controller = new AbortController();
process.on("SIGINT", () => {
  if (controller.signal.aborted) process.exit(EXIT_CANCELLED);
  console.warn("\n🛑 Stopping after the current step (Ctrl-C again to quit now) …");
  controller.abort();
});

const program = new Command();
program
  .name("league-harvest")
  .description("Archive finished Music League leagues, rounds, songs and votes into SQLite")
  .version("0.1.0");

program
  .command("login")
  .description("Sign in through the browser and save the session (reuses a valid one unless --force)")
  .option("--force", "discard the saved session first", false)
  .action(async (opts: { force: boolean }) => {
    await withConfig({}, (config) => loginCommand(config, { force: opts.force }));
  });

function extractionCommand(name: string, description: string, discover: "auto" | "always") {
  program
    .command(name)
    .description(description)
    .option("--filter <text>", "only leagues whose title contains this text (case-insensitive)")
    .addOption(new Option("--policy <policy>", "league completion policy").choices(["strict", "lenient"]))
    .option("--concurrency <n>", "rounds read in parallel within a league", parsePositiveInt)
    .action(async (opts: ExtractOptions) => {
      await withConfig(
        { nameFilter: opts.filter, completionPolicy: opts.policy, concurrency: opts.concurrency },
        (config) => extractCommand(config, { discover }, { signal: controller.signal })
      );
    });
}

extractionCommand("run", "Log in if needed → resume extraction from the saved checkpoints", "auto");
extractionCommand("update", "Like run, but re-read the league listing to pick up new leagues", "always");

program
  .command("reset")
  .description("Clear checkpoints for one league (or all) so they are extracted again")
  .argument("[collectionId]", "league id (32 hex characters); omit to clear everything")
  .option("--backup", "copy the database file before clearing", false)
  .action(async (collectionId: string | undefined, opts: { backup: boolean }) => {
    await withConfig({}, (config) => resetCommand(config, { collectionId, backup: opts.backup }));
  });

program
  .command("status")
  .description("Show extraction progress per league")
  .action(async () => {
    await withConfig({}, (config) => statusCommand(config));
  });

await program.parseAsync(process.argv);
