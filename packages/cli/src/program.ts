import { join } from "node:path";
import { Command } from "commander";
import { ArenaClient } from "@gridswarm/client";
import { AuthError, ConsoleLogger } from "@gridswarm/schemas";
import type { GameClient, Logger } from "@gridswarm/schemas";
import { listRecordings } from "@gridswarm/recorder";
import { availablePolicies, parseScript } from "@gridswarm/policies";
import type { CreateMessage } from "@gridswarm/policies";
import { loadConfig } from "./config.js";
import type { GridswarmConfig } from "./config.js";
import { formatScorecard, formatSummary, replayRecording, runBatch, splitList } from "./commands.js";

export interface ProgramDeps {
  env?: Record<string, string | undefined>;
  createClient?: (config: GridswarmConfig, logger: Logger) => GameClient;
  createLogger?: (config: GridswarmConfig) => Logger;
  createMessage?: CreateMessage;
  print?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

function defaultClient(config: GridswarmConfig, logger: Logger): GameClient {
  if (!config.apiKey) throw new AuthError("ARENA_API_KEY is not set");
  return new ArenaClient({ rootUrl: config.rootUrl, apiKey: config.apiKey, timeoutMs: config.timeoutMs, logger });
}

function parsePositiveInt(value: string, label: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const print = deps.print ?? ((line: string) => console.log(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });

  function setup() {
    const config = loadConfig(deps.env ?? process.env);
    const logger = deps.createLogger?.(config) ?? new ConsoleLogger("gridswarm", config.logLevel);
    return { config, logger };
  }

  function connect(config: GridswarmConfig, logger: Logger): GameClient {
    return (deps.createClient ?? defaultClient)(config, logger);
  }

  const program = new Command();
  program.name("gridswarm").description("Run decision policies against a grid game service").version("0.1.0");

  program.command("run").description("Play every selected game once and report the scorecard")
    .requiredOption("-a, --agent <policy>", `Policy name (${availablePolicies().join(", ")}) or a recording file`)
    .option("-g, --game <prefixes>", "Comma-separated game id prefixes")
    .option("-c, --concurrency <n>", "Plays in flight at once")
    .option("--max-actions <n>", "Local action ceiling for every play")
    .option("--tags <tags>", "Comma-separated scorecard tags")
    .option("--source-url <url>", "Scorecard source URL")
    .option("--script <actions>", "Actions for the scripted policy, e.g. RESET,ACTION1,ACTION6:3:4")
    .option("--model <name>", "Model for LLM policies")
    .option("--no-record", "Do not write recordings")
    .action(async (opts: {
      agent: string; game?: string; concurrency?: string; maxActions?: string; tags?: string;
      sourceUrl?: string; script?: string; model?: string; record: boolean;
    }) => {
      const { config, logger } = setup();
      const client = connect(config, logger);
      const controller = new AbortController();
      const onSigint = () => {
        logger.warn("Interrupted; finishing in-flight actions and closing the scorecard");
        controller.abort();
      };
      process.once("SIGINT", onSigint);
      try {
        const summary = await runBatch({
          client,
          policy: opts.agent,
          gamePrefixes: splitList(opts.game),
          concurrency: opts.concurrency ? parsePositiveInt(opts.concurrency, "concurrency") : config.concurrency,
          maxActions: opts.maxActions ? parsePositiveInt(opts.maxActions, "max actions") : undefined,
          tags: splitList(opts.tags),
          sourceUrl: opts.sourceUrl,
          record: opts.record,
          recordingsDir: config.recordingsDir,
          historyLimit: config.historyLimit,
          script: opts.script ? parseScript(opts.script) : undefined,
          apiKey: config.anthropicApiKey,
          model: opts.model,
          createMessage: deps.createMessage,
          logger,
          signal: controller.signal,
        });
        for (const line of formatSummary(summary)) print(line);
        if (summary.error) setExitCode(1);
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    });

  program.command("games").description("List the games the service offers").action(async () => {
    const { config, logger } = setup();
    const games = await connect(config, logger).listGames();
    for (const game of games) print(`${game.game_id}\t${game.title}`);
  });

  program.command("recordings").description("List recordings in the recordings directory").action(async () => {
    const { config } = setup();
    const names = await listRecordings(config.recordingsDir);
    if (names.length === 0) print(`No recordings in ${config.recordingsDir}`);
    for (const name of names) print(name);
  });

  program.command("scorecard").description("Show a scorecard")
    .argument("<card_id>", "Scorecard id")
    .argument("[game_id]", "Limit to one game")
    .action(async (cardId: string, gameId: string | undefined) => {
      const { config, logger } = setup();
      const card = await connect(config, logger).getScorecard(cardId, gameId);
      for (const line of formatScorecard(card)) print(line);
    });

  program.command("replay").description("Reproduce a recording offline against its recorded responses")
    .argument("<recording>", "Recording file name or path")
    .action(async (recording: string) => {
      const { config, logger } = setup();
      const path = recording.includes("/") ? recording : join(config.recordingsDir, recording);
      const result = await replayRecording(path, logger);
      const { outcome } = result;
      print(`Replayed ${result.replayed}/${result.recorded} actions: ${outcome.status}, state ${outcome.state}, score ${outcome.score}`);
      if (outcome.error) print(`Replay failed: ${outcome.error.message}`);
      if (outcome.status === "FAILED") setExitCode(1);
    });

  return program;
}
