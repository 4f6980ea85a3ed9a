/**
 * Declarative missions: a fixed layout plus an instruction sentence, read
 * from JSON. The layout is shared with the genome decoder.
 */
import { z } from "zod";
import type { ItemObject, DoorObject, Position } from "../shared/types.js";
import { Color, ObjectKind, Side } from "../shared/types.js";
import { COLOR_NAMES, LOC_NAMES, OBJECT_KINDS, SIDE_NAMES } from "../shared/constants.js";
import type { LocName } from "../shared/constants.js";
import type { LevelTemplate } from "./procgen.js";
import type { MissionContext } from "./topology.js";
import { addDoor, putAgent, putObject } from "./topology.js";
import type { ObjDesc } from "./descriptors.js";
import { isDegenerate } from "./descriptors.js";
import type { Instruction } from "./instructions.js";
import { after, and, before, goTo, open, pickup, putNext } from "./instructions.js";
import type { Checked } from "./violations.js";
import { MissionFormatError, isViolation } from "./violations.js";

// ── Schema ───────────────────────────────────────────────────

const CellSchema = z.tuple([z.number().int(), z.number().int()]);

const ItemKindSchema = z.union([
  z.literal(ObjectKind.Key),
  z.literal(ObjectKind.Ball),
  z.literal(ObjectKind.Box),
]);

export const LayoutObjectSchema = z
  .object({
    room: CellSchema,
    kind: ItemKindSchema,
    color: z.nativeEnum(Color),
    pos: CellSchema,
  })
  .strict();

export const LayoutDoorSchema = z
  .object({
    room: CellSchema,
    side: z.nativeEnum(Side),
    color: z.nativeEnum(Color),
    locked: z.boolean(),
    offset: z.number().int(),
  })
  .strict();

export const MissionFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    rows: z.number().int().min(1),
    cols: z.number().int().min(1),
    roomSize: z.number().int().min(3),
    maxSteps: z.number().int().positive().optional(),
    agent: z
      .object({
        room: CellSchema,
        pos: CellSchema,
        dir: z.nativeEnum(Side),
      })
      .strict(),
    objects: z.array(LayoutObjectSchema).default([]),
    doors: z.array(LayoutDoorSchema).default([]),
    instruction: z.string().min(1),
  })
  .strict();

export type LayoutObject = z.infer<typeof LayoutObjectSchema>;
export type LayoutDoor = z.infer<typeof LayoutDoorSchema>;
export type MissionFile = z.infer<typeof MissionFileSchema>;

/** Everything about a mission except its instruction. */
export type MissionLayout = Omit<MissionFile, "instruction" | "name" | "maxSteps">;

// ── Layout checks ────────────────────────────────────────────

function inGrid(layout: MissionLayout, [col, row]: [number, number]): boolean {
  return col >= 0 && col < layout.cols && row >= 0 && row < layout.rows;
}

function isInterior(layout: MissionLayout, [x, y]: [number, number]): boolean {
  const hi = layout.roomSize - 2;
  return x >= 1 && x <= hi && y >= 1 && y <= hi;
}

function hasNeighbor(layout: MissionLayout, [col, row]: [number, number], side: Side): boolean {
  switch (side) {
    case Side.East:
      return col < layout.cols - 1;
    case Side.South:
      return row < layout.rows - 1;
    case Side.West:
      return col > 0;
    case Side.North:
      return row > 0;
  }
}

/** Key of the shared wall a door sits on, the same from both rooms. */
function wallKey([col, row]: [number, number], side: Side): string {
  switch (side) {
    case Side.East:
      return `v:${col}:${row}`;
    case Side.West:
      return `v:${col - 1}:${row}`;
    case Side.South:
      return `h:${col}:${row}`;
    case Side.North:
      return `h:${col}:${row - 1}`;
  }
}

export function toWorldPos(layout: MissionLayout, [col, row]: [number, number], [x, y]: [number, number]): Position {
  return { x: col * (layout.roomSize - 1) + x, y: row * (layout.roomSize - 1) + y };
}

/**
 * List every problem with a layout that would make it unbuildable. An empty
 * list means buildLayout() cannot fail.
 */
export function checkLayout(layout: MissionLayout): string[] {
  const issues: string[] = [];
  const cells = new Set<string>();
  const claim = (what: string, room: [number, number], pos: [number, number]) => {
    const world = toWorldPos(layout, room, pos);
    const key = `${world.x},${world.y}`;
    if (cells.has(key)) issues.push(`${what} shares cell (${world.x}, ${world.y}) with another object`);
    cells.add(key);
  };

  const { agent } = layout;
  if (!inGrid(layout, agent.room)) {
    issues.push(`agent room (${agent.room.join(", ")}) is outside the grid`);
  } else if (!isInterior(layout, agent.pos)) {
    issues.push(`agent position (${agent.pos.join(", ")}) is not an interior cell`);
  } else {
    claim("agent", agent.room, agent.pos);
  }

  layout.objects.forEach((obj, i) => {
    const what = `objects[${i}]`;
    if (!inGrid(layout, obj.room)) {
      issues.push(`${what}: room (${obj.room.join(", ")}) is outside the grid`);
    } else if (!isInterior(layout, obj.pos)) {
      issues.push(`${what}: position (${obj.pos.join(", ")}) is not an interior cell`);
    } else {
      claim(what, obj.room, obj.pos);
    }
  });

  const walls = new Set<string>();
  layout.doors.forEach((door, i) => {
    const what = `doors[${i}]`;
    if (!inGrid(layout, door.room)) {
      issues.push(`${what}: room (${door.room.join(", ")}) is outside the grid`);
      return;
    }
    if (!hasNeighbor(layout, door.room, door.side)) {
      issues.push(`${what}: no neighboring room to the ${SIDE_NAMES[door.side]}`);
      return;
    }
    if (door.offset < 1 || door.offset > layout.roomSize - 2) {
      issues.push(`${what}: offset ${door.offset} is outside [1, ${layout.roomSize - 2}]`);
      return;
    }
    const key = wallKey(door.room, door.side);
    if (walls.has(key)) issues.push(`${what}: wall already has a door`);
    walls.add(key);
  });

  return issues;
}

export interface BuiltLayout {
  objects: ItemObject[];
  doors: DoorObject[];
}

/**
 * Build a checked layout into the context's world. Nothing is drawn from
 * the random stream.
 */
export function buildLayout(ctx: MissionContext, layout: MissionLayout): Checked<BuiltLayout> {
  const built: BuiltLayout = { objects: [], doors: [] };

  for (const spec of layout.doors) {
    const [col, row] = spec.room;
    const door = addDoor(ctx, col, row, {
      side: spec.side,
      color: spec.color,
      locked: spec.locked,
      offset: spec.offset,
    });
    if (isViolation(door)) return door;
    built.doors.push(door);
  }

  for (const spec of layout.objects) {
    const obj = putObject(ctx, { kind: spec.kind, color: spec.color }, toWorldPos(layout, spec.room, spec.pos));
    if (isViolation(obj)) return obj;
    built.objects.push(obj);
  }

  const { agent } = layout;
  const placed = putAgent(ctx, toWorldPos(layout, agent.room, agent.pos), agent.dir);
  if (isViolation(placed)) return placed;
  return built;
}

// ── Instruction sentences ────────────────────────────────────

export type ParseResult = Instruction | { error: string };

const FILLER = new Set(["the", "a", "an", "in", "of", "you", "on", "your"]);

function isColor(token: string): token is Color {
  return COLOR_NAMES.some((c) => c === token);
}

function isKind(token: string): token is ObjectKind {
  return OBJECT_KINDS.some((k) => k === token);
}

function isLoc(token: string): token is LocName {
  return LOC_NAMES.some((l) => l === token);
}

function parseDescriptor(tokens: string[]): ObjDesc | { error: string } {
  const desc: ObjDesc = {};
  for (const token of tokens) {
    if (isColor(token)) desc.color = token;
    else if (isKind(token)) desc.type = token;
    else if (isLoc(token)) desc.loc = token;
    else if (token !== "object" && !FILLER.has(token)) {
      return { error: `unexpected word "${token}" in "${tokens.join(" ")}"` };
    }
  }
  if (isDegenerate(desc)) {
    return { error: `"${tokens.join(" ")}" does not name any object` };
  }
  return desc;
}

function parseAtomic(tokens: string[]): ParseResult {
  const [verb, second] = tokens;
  const withDesc = (rest: string[], make: (desc: ObjDesc) => Instruction): ParseResult => {
    const desc = parseDescriptor(rest);
    return "error" in desc ? desc : make(desc);
  };

  if (verb === "go" && second === "to") return withDesc(tokens.slice(2), (d) => goTo(d));
  if (verb === "pick" && second === "up") return withDesc(tokens.slice(2), (d) => pickup(d));
  if (verb === "open") return withDesc(tokens.slice(1), (d) => open(d));
  if (verb === "put") {
    const next = tokens.indexOf("next");
    if (next < 0 || tokens[next + 1] !== "to") {
      return { error: `expected "put X next to Y" in "${tokens.join(" ")}"` };
    }
    const move = parseDescriptor(tokens.slice(1, next));
    if ("error" in move) return move;
    const fixed = parseDescriptor(tokens.slice(next + 2));
    if ("error" in fixed) return fixed;
    return putNext(move, fixed);
  }
  return { error: `unknown instruction "${tokens.join(" ")}"` };
}

function parseTokens(tokens: string[]): ParseResult {
  if (tokens.length === 0) {
    return { error: "empty instruction" };
  }

  for (const [i, token] of tokens.entries()) {
    if (token === "then" || token === "after") {
      const skip = token === "after" && tokens[i + 1] === "you" ? 2 : 1;
      const a = parseTokens(tokens.slice(0, i));
      if ("error" in a) return a;
      const b = parseTokens(tokens.slice(i + skip));
      if ("error" in b) return b;
      return token === "then" ? before(a, b) : after(a, b);
    }
  }

  const i = tokens.indexOf("and");
  if (i >= 0) {
    const a = parseTokens(tokens.slice(0, i));
    if ("error" in a) return a;
    const b = parseTokens(tokens.slice(i + 1));
    if ("error" in b) return b;
    return and(a, b);
  }

  return parseAtomic(tokens);
}

/**
 * Parse an instruction sentence such as "open the red door, then pick up a
 * ball". Commas are ignored; "then" and "after you" bind loosest, "and"
 * binds tighter.
 */
export function parseInstruction(text: string): ParseResult {
  const tokens = text.toLowerCase().replace(/,/g, " ").split(/\s+/).filter((t) => t.length > 0);
  return parseTokens(tokens);
}

// ── Loading ──────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Turn a parsed mission file into a level template. The layout is fixed, so
 * the template gets a single attempt. Throws MissionFormatError listing
 * every problem found.
 */
export function loadMission(data: unknown): LevelTemplate {
  const parsed = MissionFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new MissionFormatError(formatIssues(parsed.error));
  }
  const file = parsed.data;

  const issues = checkLayout(file);
  const parsedInstr = parseInstruction(file.instruction);
  if ("error" in parsedInstr) {
    issues.push(`instruction: ${parsedInstr.error}`);
  }
  if (issues.length > 0 || "error" in parsedInstr) {
    throw new MissionFormatError(issues);
  }
  const instruction: Instruction = parsedInstr;

  return {
    name: file.name ?? "MissionFile",
    rows: file.rows,
    cols: file.cols,
    roomSize: file.roomSize,
    maxSteps: file.maxSteps,
    maxAttempts: 1,
    build(ctx) {
      const built = buildLayout(ctx, file);
      return isViolation(built) ? built : instruction;
    },
  };
}

/** Parse mission JSON text; see loadMission(). */
export function loadMissionText(text: string): LevelTemplate {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MissionFormatError([`invalid JSON: ${message}`]);
  }
  return loadMission(data);
}
