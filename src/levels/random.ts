import type { LevelTemplate } from "../sim/procgen.js";
import { addDistractors, connectAll, placeAgent } from "../sim/topology.js";
import { checkObjsReachable } from "../sim/reachability.js";
import { randomInstruction } from "../sim/randomInstr.js";
import type { RandomInstrOptions } from "../sim/randomInstr.js";
import { isViolation } from "../sim/violations.js";
import { GRID_3X3 } from "./common.js";

export interface RandomMissionConfig {
  name?: string;
  numDists?: number;
  instr?: RandomInstrOptions;
}

/**
 * A connected 3x3 grid full of distractors, with a random instruction tree
 * over whatever ended up in it.
 */
export function randomMission(cfg: RandomMissionConfig = {}): LevelTemplate {
  const numDists = cfg.numDists ?? 18;
  return {
    name: cfg.name ?? "RandomMission",
    ...GRID_3X3,
    build(ctx) {
      const placed = placeAgent(ctx);
      if (isViolation(placed)) return placed;
      const connected = connectAll(ctx);
      if (isViolation(connected)) return connected;
      const dists = addDistractors(ctx, { count: numDists, allUnique: false });
      if (isViolation(dists)) return dists;

      const unreachable = checkObjsReachable(ctx.world);
      if (unreachable) return unreachable;

      return randomInstruction(ctx, { locations: true, ...cfg.instr });
    },
  };
}
