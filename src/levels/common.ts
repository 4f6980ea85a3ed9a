import type { WorldObject } from "../shared/types.js";
import type { ObjDesc } from "../sim/descriptors.js";
import type { LevelTemplate } from "../sim/procgen.js";

/** Descriptor naming an object by its kind and color. */
export function describe(obj: WorldObject): ObjDesc {
  return { type: obj.kind, color: obj.color };
}

/** Step budget used by most fixed-size levels: `factor` room areas. */
export function roomsOfSteps(factor: number, roomSize: number): number {
  return factor * roomSize ** 2;
}

export type LevelShape = Pick<LevelTemplate, "rows" | "cols" | "roomSize">;

export const GRID_3X3: LevelShape = { rows: 3, cols: 3, roomSize: 8 };
