/**
 * Fixed-length integer vector encoding of a mission, for search and
 * evolutionary tooling. Layout (all integers):
 *
 *   [0] rows 1..3   [1] cols 1..3   [2] room size 4..8
 *   [3, 4] agent room (col, row)   [5, 6] agent cell inside the room   [7] direction
 *   [8..115]   18 object slots of (col, row, kind code, color, x, y)
 *   [116..187] 12 door slots of (col, row, side, color, locked 0/1, offset)
 *   [188] instruction mode
 *
 * A slot whose first value is -1 is unused.
 */
import { z } from "zod";
import type { ItemKind } from "../shared/types.js";
import { ObjectKind } from "../shared/types.js";
import { ALL_SIDES, COLOR_NAMES, ITEM_KINDS, OBJECT_CODES } from "../shared/constants.js";
import type { LevelTemplate } from "./procgen.js";
import type { Instruction } from "./instructions.js";
import { goTo, open, pickup, putNext } from "./instructions.js";
import { randomInstruction } from "./randomInstr.js";
import type { LayoutDoor, LayoutObject, MissionLayout } from "./missionFile.js";
import { buildLayout, checkLayout } from "./missionFile.js";
import type { Checked } from "./violations.js";
import { MissionFormatError, isViolation } from "./violations.js";

export const GENOME_LENGTH = 189;
const OBJECT_SLOTS = { start: 8, count: 18 };
const DOOR_SLOTS = { start: 116, count: 12 };
const SLOT_WIDTH = 6;
const MODE_INDEX = 188;

export enum GenomeMode {
  GoToObject = 0,
  PickupObject = 1,
  OpenDoor = 2,
  PutNext = 3,
  RandomGoTo = 4,
  Random = 5,
}

const KIND_BY_CODE = new Map<number, ItemKind>(ITEM_KINDS.map((kind): [number, ItemKind] => [OBJECT_CODES[kind], kind]));

const GenomeSchema = z.array(z.number().int()).length(GENOME_LENGTH);

export interface DecodedGenome {
  layout: MissionLayout;
  mode: GenomeMode;
}

function inRange(issues: string[], what: string, value: number, lo: number, hi: number): boolean {
  if (value < lo || value > hi) {
    issues.push(`${what} is ${value}, expected ${lo}..${hi}`);
    return false;
  }
  return true;
}

const GENOME_MODES: readonly GenomeMode[] = [
  GenomeMode.GoToObject,
  GenomeMode.PickupObject,
  GenomeMode.OpenDoor,
  GenomeMode.PutNext,
  GenomeMode.RandomGoTo,
  GenomeMode.Random,
];

function decodeMode(value: number): GenomeMode | null {
  return GENOME_MODES.find((mode) => mode === value) ?? null;
}

/**
 * Decode a genome into a layout and instruction mode. Every out-of-range
 * value is reported; nothing is clamped.
 */
export function decodeGenome(data: unknown): DecodedGenome {
  const parsed = GenomeSchema.safeParse(data);
  if (!parsed.success) {
    throw new MissionFormatError([`genome must be ${GENOME_LENGTH} integers`]);
  }
  const v = parsed.data;
  const issues: string[] = [];

  inRange(issues, "rows", v[0], 1, 3);
  inRange(issues, "cols", v[1], 1, 3);
  inRange(issues, "room size", v[2], 4, 8);
  inRange(issues, "agent direction", v[7], 0, 3);
  const colorCount = COLOR_NAMES.length;

  const objects: LayoutObject[] = [];
  for (let slot = 0; slot < OBJECT_SLOTS.count; slot++) {
    const i = OBJECT_SLOTS.start + slot * SLOT_WIDTH;
    if (v[i] === -1) continue;
    const kind = KIND_BY_CODE.get(v[i + 2]);
    if (kind === undefined) {
      issues.push(`object slot ${slot}: kind code ${v[i + 2]} is not a key (5), ball (6) or box (7)`);
      continue;
    }
    if (!inRange(issues, `object slot ${slot} color`, v[i + 3], 0, colorCount - 1)) continue;
    objects.push({
      room: [v[i], v[i + 1]],
      kind,
      color: COLOR_NAMES[v[i + 3]],
      pos: [v[i + 4], v[i + 5]],
    });
  }

  const doors: LayoutDoor[] = [];
  for (let slot = 0; slot < DOOR_SLOTS.count; slot++) {
    const i = DOOR_SLOTS.start + slot * SLOT_WIDTH;
    if (v[i] === -1) continue;
    const okSide = inRange(issues, `door slot ${slot} side`, v[i + 2], 0, 3);
    const okColor = inRange(issues, `door slot ${slot} color`, v[i + 3], 0, colorCount - 1);
    const okLocked = inRange(issues, `door slot ${slot} locked flag`, v[i + 4], 0, 1);
    if (!okSide || !okColor || !okLocked) continue;
    doors.push({
      room: [v[i], v[i + 1]],
      side: ALL_SIDES[v[i + 2]],
      color: COLOR_NAMES[v[i + 3]],
      locked: v[i + 4] === 1,
      offset: v[i + 5],
    });
  }

  const mode = decodeMode(v[MODE_INDEX]);
  if (mode === null) {
    issues.push(`instruction mode is ${v[MODE_INDEX]}, expected 0..5`);
  } else if ((mode === GenomeMode.GoToObject || mode === GenomeMode.PickupObject) && objects.length === 0) {
    issues.push("instruction mode needs at least one object");
  } else if (mode === GenomeMode.PutNext && objects.length < 2) {
    issues.push("instruction mode needs at least two objects");
  } else if (mode === GenomeMode.OpenDoor && doors.length === 0) {
    issues.push("instruction mode needs at least one door");
  }

  if (issues.length > 0 || mode === null) {
    throw new MissionFormatError(issues);
  }

  const layout: MissionLayout = {
    rows: v[0],
    cols: v[1],
    roomSize: v[2],
    agent: { room: [v[3], v[4]], pos: [v[5], v[6]], dir: ALL_SIDES[v[7]] },
    objects,
    doors,
  };
  const layoutIssues = checkLayout(layout);
  if (layoutIssues.length > 0) {
    throw new MissionFormatError(layoutIssues);
  }
  return { layout, mode };
}

/**
 * Build a level template from a genome. The layout is fixed; the target
 * objects and random instruction trees are drawn from the mission seed.
 */
export function genomeLevel(data: unknown, name = "Genome"): LevelTemplate {
  const { layout, mode } = decodeGenome(data);
  return {
    name,
    rows: layout.rows,
    cols: layout.cols,
    roomSize: layout.roomSize,
    build(ctx): Checked<Instruction> {
      const built = buildLayout(ctx, layout);
      if (isViolation(built)) return built;
      const { rng } = ctx;

      switch (mode) {
        case GenomeMode.GoToObject: {
          const obj = rng.elem(built.objects);
          return goTo({ type: obj.kind, color: obj.color });
        }
        case GenomeMode.PickupObject: {
          const obj = rng.elem(built.objects);
          return pickup({ type: obj.kind, color: obj.color });
        }
        case GenomeMode.OpenDoor: {
          const door = rng.elem(built.doors);
          return open({ type: ObjectKind.Door, color: door.color });
        }
        case GenomeMode.PutNext: {
          const [a, b] = rng.subset(built.objects, 2);
          return putNext({ type: a.kind, color: a.color }, { type: b.kind, color: b.color });
        }
        case GenomeMode.RandomGoTo:
          return randomInstruction(ctx, { actionKinds: ["goto"], locations: true });
        case GenomeMode.Random:
          return randomInstruction(ctx, { locations: true });
      }
    },
  };
}
