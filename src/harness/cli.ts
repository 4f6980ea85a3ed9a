#!/usr/bin/env node
import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import { DEFAULT_LEVEL, DEFAULT_SEED } from "../shared/constants.js";
import { getLevel, listLevels } from "../levels/index.js";
import type { LevelTemplate } from "../sim/procgen.js";
import { generate, generationLog } from "../sim/procgen.js";
import type { Episode } from "../sim/episode.js";
import { abandonEpisode, createEpisode, stepEpisode } from "../sim/episode.js";
import { loadMissionText } from "../sim/missionFile.js";
import { genomeLevel } from "../sim/genome.js";
import { MAX_SEED, MIN_SEED, isValidSeed } from "../sim/rng.js";
import { GenerationError, MissionFormatError } from "../sim/violations.js";
import { parseAction } from "./actionParser.js";
import { buildObservation, renderObservationAsText } from "./obsRenderer.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  level: string;
  seed: number;
  mission: string | null;
  genome: string | null;
  script: string | null;
  maxSteps: number | null;
  list: boolean;
}

function fail(message: string): never {
  console.error(`ERROR: ${message}`);
  process.exit(1);
}

function parseArgs(): CliArgs {
  const argv = process.argv.slice(2);
  const opts: CliArgs = {
    level: DEFAULT_LEVEL,
    seed: DEFAULT_SEED,
    mission: null,
    genome: null,
    script: null,
    maxSteps: null,
    list: false,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--level":
        opts.level = argv[++i] ?? fail("--level requires a level name");
        break;
      case "--seed":
        opts.seed = Number(argv[++i]);
        if (!isValidSeed(opts.seed)) fail(`--seed requires an integer in [${MIN_SEED}, ${MAX_SEED}]`);
        break;
      case "--mission":
        opts.mission = argv[++i] ?? fail("--mission requires a JSON file");
        break;
      case "--genome":
        opts.genome = argv[++i] ?? fail("--genome requires a JSON file");
        break;
      case "--script":
        opts.script = argv[++i] ?? fail("--script requires a file");
        break;
      case "--max-steps":
        opts.maxSteps = parseInt(argv[++i], 10);
        if (Number.isNaN(opts.maxSteps) || opts.maxSteps < 1) fail("--max-steps requires a positive integer");
        break;
      case "--list":
        opts.list = true;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

function readFile(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail(`Could not read "${path}": ${message}`);
  }
}

function resolveTemplate(args: CliArgs): LevelTemplate {
  if (args.mission) {
    return loadMissionText(readFile(args.mission));
  }
  if (args.genome) {
    let data: unknown;
    try {
      data = JSON.parse(readFile(args.genome));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail(`Invalid genome JSON in "${args.genome}": ${message}`);
    }
    return genomeLevel(data);
  }
  return getLevel(args.level) ?? fail(`Unknown level "${args.level}". Use --list to see every level.`);
}

// ── Observation output ───────────────────────────────────────

/**
 * Emit the observation block to stdout, delimited for agent parsing.
 */
function emitObservation(episode: Episode): void {
  console.log("===OBSERVATION_START===");
  console.log(renderObservationAsText(buildObservation(episode)));
  console.log("===OBSERVATION_END===");
}

function printSummary(episode: Episode): void {
  console.log("");
  console.log("=== EPISODE OVER ===");
  console.log(`Result: ${episode.verdict.status.toUpperCase()}`);
  if (episode.verdict.status === "failure") {
    console.log(`Reason: ${episode.verdict.reason}`);
  }
  console.log(`Steps: ${episode.steps}/${episode.mission.maxSteps}`);
  console.log(`Reward: ${episode.reward.toFixed(3)}`);
}

/** Apply one input line. Returns false once the episode is over. */
function handleLine(episode: Episode, line: string): boolean {
  const result = parseAction(line);
  if (typeof result !== "string") {
    console.log(`===ERROR=== ${result.error}`);
    return true;
  }
  stepEpisode(episode, result);
  emitObservation(episode);
  return !episode.done;
}

// ── Script mode ──────────────────────────────────────────────

function runScript(scriptPath: string, episode: Episode): void {
  const rawLines = readFile(scriptPath)
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith("//"));

  emitObservation(episode);
  for (const line of rawLines) {
    if (!handleLine(episode, line)) break;
  }
  if (!episode.done) {
    abandonEpisode(episode, "script ended before the mission was complete");
  }
  printSummary(episode);
}

// ── Interactive stdin mode ───────────────────────────────────

async function runInteractive(episode: Episode): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: false,
  });

  emitObservation(episode);

  for await (const line of rl) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;

    if (trimmed.toLowerCase() === "quit" || trimmed.toLowerCase() === "exit") {
      console.log("Agent requested exit.");
      abandonEpisode(episode, "agent quit");
      break;
    }
    if (!handleLine(episode, trimmed)) break;
  }

  rl.close();
  if (!episode.done) {
    console.log("stdin closed.");
    abandonEpisode(episode, "input ended before the mission was complete");
  }
  printSummary(episode);
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.list) {
    for (const name of listLevels()) {
      console.log(name);
    }
    return;
  }

  const template = resolveTemplate(args);
  const mission = generate(
    args.maxSteps === null ? template : { ...template, maxSteps: args.maxSteps },
    args.seed,
  );

  console.log(`Grid Mission Harness v0.1`);
  console.log(`Level: ${mission.level}  Seed: ${mission.seed}  Max steps: ${mission.maxSteps}`);
  for (const entry of generationLog(mission)) {
    console.log(`[${entry.source}] ${entry.text}`);
  }
  console.log("");

  const episode = createEpisode(mission);
  if (args.script) {
    runScript(args.script, episode);
  } else {
    await runInteractive(episode);
  }
  process.exitCode = episode.verdict.status === "success" ? 0 : 1;
}

main().catch((err: unknown) => {
  if (err instanceof MissionFormatError) {
    for (const issue of err.issues) {
      console.error(`ERROR: ${issue}`);
    }
  } else if (err instanceof GenerationError) {
    console.error(`ERROR: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
