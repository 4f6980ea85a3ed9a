/**
 * Rejection-sampling mission generator.
 *
 * A level template builds one candidate mission into a fresh world. When any
 * step of the build returns a ConstraintViolation the whole attempt is thrown
 * away and the template runs again on the same random stream, so a seed
 * always reproduces the same sequence of attempts and the same mission.
 */
import type { World, LogEntry } from "../shared/types.js";
import { ObjectKind } from "../shared/types.js";
import { MAX_GENERATION_ATTEMPTS } from "../shared/constants.js";
import { MissionRandom } from "./rng.js";
import { addLog, createEmptyWorld } from "./state.js";
import { detachFromRoom } from "./rooms.js";
import type { MissionContext } from "./topology.js";
import type { Instruction } from "./instructions.js";
import { describeInstruction, navigationCount, validateInstruction } from "./instructions.js";
import type { Checked, ConstraintViolation } from "./violations.js";
import { GenerationBudgetExceeded, GenerationError, ViolationKind, isViolation, reject } from "./violations.js";

export interface LevelTemplate {
  name: string;
  rows: number;
  cols: number;
  roomSize: number;
  /** Step limit; derived from the instruction when absent. */
  maxSteps?: number;
  maxAttempts?: number;
  build(ctx: MissionContext): Checked<Instruction>;
}

export interface Mission {
  seed: number;
  level: string;
  world: World;
  instruction: Instruction;
  text: string;
  maxSteps: number;
  attempts: number;
}

export type AttemptResult =
  | { status: "ok"; world: World; instruction: Instruction; text: string }
  | { status: "retry"; violation: ConstraintViolation }
  | { status: "fatal"; error: GenerationError };

/**
 * Default step limit: room for the agent to cross the whole grid once per
 * navigation leg.
 */
export function defaultMaxSteps(template: LevelTemplate, instruction: Instruction): number {
  return navigationCount(instruction) * template.roomSize ** 2 * template.rows * template.cols;
}

function giveToAgent(world: World, id: string): Checked<null> {
  const obj = world.objects.get(id);
  if (!obj || obj.kind === ObjectKind.Door || !obj.pos) {
    return reject(ViolationKind.PlacementExhausted, `object ${id} cannot be handed to the agent`);
  }
  obj.pos = null;
  world.agent.carrying = obj.id;
  detachFromRoom(world, obj.id);
  return null;
}

function runBuild(template: LevelTemplate, ctx: MissionContext): Checked<Instruction> | GenerationError {
  try {
    return template.build(ctx);
  } catch (err) {
    if (err instanceof GenerationError) return err;
    throw err;
  }
}

/**
 * Run one build of a template. Fatal errors from the template (bad room
 * coordinates, a missing agent) are reported, not thrown.
 */
export function attemptMission(template: LevelTemplate, rng: MissionRandom, seed: number): AttemptResult {
  const world = createEmptyWorld(seed, template.rows, template.cols, template.roomSize, rng);
  const ctx: MissionContext = { world, rng };
  const built = runBuild(template, ctx);

  if (built instanceof GenerationError) {
    return { status: "fatal", error: built };
  }
  if (isViolation(built)) {
    return { status: "retry", violation: built };
  }
  if (!world.agent.pos) {
    return { status: "fatal", error: new GenerationError(`level ${template.name} never placed the agent`) };
  }

  const invalid = validateInstruction(world, built);
  if (invalid) {
    return { status: "retry", violation: invalid };
  }

  // Text is rendered while every object is still on the grid
  const text = describeInstruction(world, built);

  if (ctx.startCarrying !== undefined) {
    const handed = giveToAgent(world, ctx.startCarrying);
    if (isViolation(handed)) {
      return { status: "retry", violation: handed };
    }
  }

  return { status: "ok", world, instruction: built, text };
}

/**
 * Generate a mission for a level. Throws GenerationBudgetExceeded when no
 * attempt succeeds within the template's attempt budget.
 */
export function generate(template: LevelTemplate, seed: number): Mission {
  const rng = new MissionRandom(seed);
  const maxAttempts = template.maxAttempts ?? MAX_GENERATION_ATTEMPTS;
  const rejections: { attempt: number; violation: ConstraintViolation }[] = [];
  let lastViolation: ConstraintViolation | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = attemptMission(template, rng, seed);

    if (result.status === "fatal") {
      throw result.error;
    }
    if (result.status === "retry") {
      lastViolation = result.violation;
      rejections.push({ attempt, violation: result.violation });
      continue;
    }

    const { world, instruction, text } = result;
    for (const { attempt: n, violation } of rejections) {
      addLog(world, "procgen", `attempt ${n} rejected (${violation.violation}): ${violation.reason}`, n);
    }
    addLog(world, "procgen", `${template.name}: mission accepted on attempt ${attempt}`, attempt);

    return {
      seed,
      level: template.name,
      world,
      instruction,
      text,
      maxSteps: template.maxSteps ?? defaultMaxSteps(template, instruction),
      attempts: attempt,
    };
  }

  throw new GenerationBudgetExceeded(template.name, maxAttempts, lastViolation);
}

/** Generation log lines of a mission, oldest first. */
export function generationLog(mission: Mission): LogEntry[] {
  return mission.world.logs.filter((entry) => entry.source === "procgen");
}
