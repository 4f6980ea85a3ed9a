import type { Position } from "./types.js";
import { Color, ObjectKind, Side } from "./types.js";
import type { ItemKind } from "./types.js";

// ── Defaults ─────────────────────────────────────────────────
export const DEFAULT_SEED = 184201;
export const DEFAULT_LEVEL = "OpenTwoDoors";

// ── Palettes ─────────────────────────────────────────────────
export const COLOR_NAMES: readonly Color[] = [
  Color.Red,
  Color.Green,
  Color.Blue,
  Color.Purple,
  Color.Yellow,
  Color.Grey,
];

export const OBJECT_KINDS: readonly ObjectKind[] = [
  ObjectKind.Door,
  ObjectKind.Key,
  ObjectKind.Ball,
  ObjectKind.Box,
];

export const ITEM_KINDS: readonly ItemKind[] = [ObjectKind.Key, ObjectKind.Ball, ObjectKind.Box];

export const LOC_NAMES = ["left", "right", "front", "behind"] as const;
export type LocName = (typeof LOC_NAMES)[number];

/** Grid codes for object kinds, shared with the genome vector format. */
export const OBJECT_CODES: Record<ObjectKind, number> = {
  [ObjectKind.Door]: 4,
  [ObjectKind.Key]: 5,
  [ObjectKind.Ball]: 6,
  [ObjectKind.Box]: 7,
};

// ── Directions ───────────────────────────────────────────────
export const ALL_SIDES: readonly Side[] = [Side.East, Side.South, Side.West, Side.North];

// Indexed by Side: east, south, west, north
export const DIRECTION_VECTORS: readonly Position[] = [
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
  { x: 0, y: -1 },
];

export const OPPOSITE_SIDE: Record<Side, Side> = {
  [Side.East]: Side.West,
  [Side.South]: Side.North,
  [Side.West]: Side.East,
  [Side.North]: Side.South,
};

export const SIDE_NAMES: Record<Side, string> = {
  [Side.East]: "east",
  [Side.South]: "south",
  [Side.West]: "west",
  [Side.North]: "north",
};

// Turning left is counter-clockwise
export const TURN_LEFT: Record<Side, Side> = {
  [Side.East]: Side.North,
  [Side.South]: Side.East,
  [Side.West]: Side.South,
  [Side.North]: Side.West,
};

export const TURN_RIGHT: Record<Side, Side> = {
  [Side.East]: Side.South,
  [Side.South]: Side.West,
  [Side.West]: Side.North,
  [Side.North]: Side.East,
};

// ── Generation bounds ────────────────────────────────────────
export const MAX_GENERATION_ATTEMPTS = 1000;
export const PLACE_MAX_TRIES = 1000;
export const DISTRACTOR_MAX_TRIES = 100;
export const CONNECT_MAX_ITERATIONS = 5000;
export const RAND_OBJ_MAX_TRIES = 100;

// ── Episode ──────────────────────────────────────────────────
export const REWARD_STEP_PENALTY = 0.9;

// ── Glyphs (plain-text map) ──────────────────────────────────
export const GLYPHS = {
  floor: ".",
  wall: "#",
  openDoor: "/",
  closedDoor: "+",
  lockedDoor: "L",
  key: "k",
  ball: "o",
  box: "b",
} as const;

// Agent arrow, indexed by Side
export const AGENT_GLYPHS: readonly string[] = [">", "v", "<", "^"];
