/**
 * Random instruction sampler: draws descriptors that match at least one
 * object in the current world and combines them into instruction trees.
 */
import { ObjectKind } from "../shared/types.js";
import { COLOR_NAMES, ITEM_KINDS, LOC_NAMES, OBJECT_KINDS, RAND_OBJ_MAX_TRIES } from "../shared/constants.js";
import type { ObjDesc } from "./descriptors.js";
import { resolveDescriptor } from "./descriptors.js";
import type { Instruction } from "./instructions.js";
import { after, and, before, goTo, open, pickup, putNext } from "./instructions.js";
import type { MissionContext } from "./topology.js";
import type { Checked } from "./violations.js";
import { ViolationKind, isViolation, reject } from "./violations.js";

export type ActionKind = "goto" | "pickup" | "open" | "putnext";
export type InstrKind = "action" | "and" | "seq";

export const ACTION_KINDS: readonly ActionKind[] = ["goto", "pickup", "open", "putnext"];
export const INSTR_KINDS: readonly InstrKind[] = ["action", "and", "seq"];

export interface RandomInstrOptions {
  actionKinds?: readonly ActionKind[];
  instrKinds?: readonly InstrKind[];
  /** Allow location words in descriptors. */
  locations?: boolean;
}

/**
 * Draw a descriptor with a type, an optional color and an optional
 * location, retrying until it names at least one object.
 */
export function randObj(
  ctx: MissionContext,
  types: readonly ObjectKind[] = OBJECT_KINDS,
  locations = false,
): Checked<ObjDesc> {
  const { world, rng } = ctx;
  for (let tries = 0; tries < RAND_OBJ_MAX_TRIES; tries++) {
    const color = rng.elem([undefined, ...COLOR_NAMES]);
    const type = rng.elem(types);
    const desc: ObjDesc = { type };
    if (color !== undefined) desc.color = color;
    if (locations && rng.bool()) desc.loc = rng.elem(LOC_NAMES);

    if (resolveDescriptor(world, desc).length > 0) {
      return desc;
    }
  }
  return reject(
    ViolationKind.AmbiguousOrDegenerateDescriptor,
    `no matching ${types.join("/")} descriptor after ${RAND_OBJ_MAX_TRIES} draws`,
  );
}

function randAction(ctx: MissionContext, kind: ActionKind, locations: boolean): Checked<Instruction> {
  switch (kind) {
    case "goto": {
      const desc = randObj(ctx, OBJECT_KINDS, locations);
      return isViolation(desc) ? desc : goTo(desc);
    }
    case "pickup": {
      const desc = randObj(ctx, ITEM_KINDS, locations);
      return isViolation(desc) ? desc : pickup(desc);
    }
    case "open": {
      const desc = randObj(ctx, [ObjectKind.Door], locations);
      return isViolation(desc) ? desc : open(desc);
    }
    case "putnext": {
      const move = randObj(ctx, ITEM_KINDS, locations);
      if (isViolation(move)) return move;
      const fixed = randObj(ctx, OBJECT_KINDS, locations);
      return isViolation(fixed) ? fixed : putNext(move, fixed);
    }
  }
}

/**
 * Sample an instruction tree. "and" joins two actions; "seq" joins two
 * actions or conjunctions with before or after.
 */
export function randomInstruction(ctx: MissionContext, opts: RandomInstrOptions = {}): Checked<Instruction> {
  const actionKinds = opts.actionKinds ?? ACTION_KINDS;
  const instrKinds = opts.instrKinds ?? INSTR_KINDS;
  const locations = opts.locations ?? false;
  const { rng } = ctx;

  const kind = rng.elem(instrKinds);
  switch (kind) {
    case "action":
      return randAction(ctx, rng.elem(actionKinds), locations);

    case "and": {
      const a = randomInstruction(ctx, { actionKinds, instrKinds: ["action"], locations });
      if (isViolation(a)) return a;
      const b = randomInstruction(ctx, { actionKinds, instrKinds: ["action"], locations });
      return isViolation(b) ? b : and(a, b);
    }

    case "seq": {
      const a = randomInstruction(ctx, { actionKinds, instrKinds: ["action", "and"], locations });
      if (isViolation(a)) return a;
      const b = randomInstruction(ctx, { actionKinds, instrKinds: ["action", "and"], locations });
      if (isViolation(b)) return b;
      return rng.bool() ? before(a, b) : after(a, b);
    }
  }
}
