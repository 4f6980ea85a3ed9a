/**
 * Episode authority: owns the step counter and the step limit, applies
 * actions through the movement collaborator and feeds each committed delta
 * to the verifier.
 */
import type { ActionType, World, WorldDelta } from "../shared/types.js";
import { REWARD_STEP_PENALTY } from "../shared/constants.js";
import type { LevelTemplate, Mission } from "./procgen.js";
import { generate } from "./procgen.js";
import { applyAction } from "./step.js";
import { addLog } from "./state.js";
import { describeInstruction } from "./instructions.js";
import type { Verdict } from "./verifier.js";
import { Verifier } from "./verifier.js";

export interface Episode {
  mission: Mission;
  world: World;
  verifier: Verifier;
  steps: number;
  verdict: Verdict;
  reward: number;
  done: boolean;
}

export interface StepResult {
  delta: WorldDelta;
  verdict: Verdict;
  reward: number;
  done: boolean;
}

export function createEpisode(mission: Mission): Episode {
  return {
    mission,
    world: mission.world,
    verifier: new Verifier(mission.world, mission.instruction),
    steps: 0,
    verdict: { status: "pending" },
    reward: 0,
    done: false,
  };
}

/** Generate a mission and start an episode on it. */
export function startEpisode(template: LevelTemplate, seed: number): Episode {
  return createEpisode(generate(template, seed));
}

/**
 * Reward for finishing after `steps` of `maxSteps`: 1 for an instant finish,
 * falling linearly towards 0.1 at the step limit.
 */
export function successReward(steps: number, maxSteps: number): number {
  return 1 - REWARD_STEP_PENALTY * (steps / maxSteps);
}

function logChanges(episode: Episode, delta: WorldDelta): void {
  const { world, steps } = episode;
  for (const change of delta.changes) {
    const { before, after } = change;
    if (before?.doorState !== undefined && after?.doorState !== undefined && before.doorState !== after.doorState) {
      addLog(world, "step", `${after.color} door ${before.doorState} -> ${after.doorState}`, steps);
    } else if (before && !after) {
      addLog(world, "step", `${before.color} ${before.kind} opened`, steps);
    } else if (!before && after) {
      addLog(world, "step", `${after.color} ${after.kind} revealed`, steps);
    }
  }
}

function logVerdict(episode: Episode, verdict: Verdict): void {
  const { world, steps } = episode;
  switch (verdict.status) {
    case "ongoing":
      for (const node of verdict.completed) {
        addLog(world, "verifier", `completed: ${describeInstruction(world, node)}`, steps);
      }
      break;
    case "partial_success":
      addLog(world, "verifier", `strict goal reached: ${describeInstruction(world, verdict.node)}`, steps);
      break;
    case "success":
      addLog(world, "verifier", `mission complete: ${episode.mission.text}`, steps);
      break;
    case "failure":
      addLog(world, "verifier", `mission failed: ${verdict.reason}`, steps);
      break;
    case "pending":
      break;
  }
}

/**
 * Apply one action. Throws once the episode is over.
 */
export function stepEpisode(episode: Episode, action: ActionType): StepResult {
  if (episode.done) {
    throw new Error(`episode on ${episode.mission.level} has already ended`);
  }

  const delta = applyAction(episode.world, action);
  episode.steps++;
  logChanges(episode, delta);

  let verdict = episode.verifier.step(action, delta);
  if (verdict.status === "success" || verdict.status === "partial_success") {
    episode.reward = successReward(episode.steps, episode.mission.maxSteps);
    episode.done = true;
  } else if (episode.steps >= episode.mission.maxSteps) {
    logVerdict(episode, verdict);
    verdict = episode.verifier.terminate(`step limit of ${episode.mission.maxSteps} reached`);
    episode.done = true;
  }

  logVerdict(episode, verdict);
  episode.verdict = verdict;
  return { delta, verdict, reward: episode.reward, done: episode.done };
}

/**
 * End the episode early (an agent gave up, a driver hit its own limit).
 */
export function abandonEpisode(episode: Episode, reason: string): Verdict {
  if (!episode.done) {
    episode.verdict = episode.verifier.terminate(reason);
    episode.done = true;
    logVerdict(episode, episode.verdict);
  }
  return episode.verdict;
}
