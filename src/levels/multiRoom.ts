/**
 * Levels that need the agent to leave its starting room: locked doors,
 * keys in other rooms, corridors and multi-door orderings.
 */
import type { Color, WorldObject } from "../shared/types.js";
import { ObjectKind, Side } from "../shared/types.js";
import { COLOR_NAMES } from "../shared/constants.js";
import type { LevelTemplate } from "../sim/procgen.js";
import { after, before, open, pickup } from "../sim/instructions.js";
import {
  addDistractors, addDoor, addObject, connectAll, placeAgent, putObject, removeWall,
} from "../sim/topology.js";
import { isViolation } from "../sim/violations.js";
import { GRID_3X3, describe, roomsOfSteps } from "./common.js";

/** Unlock the door to the next room, then pick up the box behind it. */
export function unlockPickup(distractors: boolean): LevelTemplate {
  const roomSize = 6;
  return {
    name: distractors ? "UnlockPickupDist" : "UnlockPickup",
    rows: 1,
    cols: 2,
    roomSize,
    maxSteps: roomsOfSteps(8, roomSize),
    build(ctx) {
      const box = addObject(ctx, 1, 0, { kind: ObjectKind.Box });
      if (isViolation(box)) return box;
      const door = addDoor(ctx, 0, 0, { side: Side.East, locked: true });
      if (isViolation(door)) return door;
      const key = addObject(ctx, 0, 0, { kind: ObjectKind.Key, color: door.color });
      if (isViolation(key)) return key;
      if (distractors) {
        const dists = addDistractors(ctx, { count: 4 });
        if (isViolation(dists)) return dists;
      }
      const placed = placeAgent(ctx, { col: 0, row: 0, requireReachable: true });
      if (isViolation(placed)) return placed;
      return pickup(describe(box));
    },
  };
}

/** Same as UnlockPickup, with a ball blocking the locked door from inside. */
export function blockedUnlockPickup(): LevelTemplate {
  const roomSize = 6;
  return {
    name: "BlockedUnlockPickup",
    rows: 1,
    cols: 2,
    roomSize,
    maxSteps: roomsOfSteps(16, roomSize),
    build(ctx) {
      const box = addObject(ctx, 1, 0, { kind: ObjectKind.Box });
      if (isViolation(box)) return box;
      const door = addDoor(ctx, 0, 0, { side: Side.East, locked: true });
      if (isViolation(door)) return door;
      const blocker = putObject(
        ctx,
        { kind: ObjectKind.Ball, color: ctx.rng.color() },
        { x: door.pos.x - 1, y: door.pos.y },
      );
      if (isViolation(blocker)) return blocker;
      const key = addObject(ctx, 0, 0, { kind: ObjectKind.Key, color: door.color });
      if (isViolation(key)) return key;
      const placed = placeAgent(ctx, { col: 0, row: 0 });
      if (isViolation(placed)) return placed;
      return pickup({ type: ObjectKind.Box });
    },
  };
}

/**
 * Three rooms in a row. The key to the left door is in the right room, and
 * the key to the right door is in the middle room with the agent.
 */
export function unlockToUnlock(): LevelTemplate {
  const roomSize = 6;
  return {
    name: "UnlockToUnlock",
    rows: 1,
    cols: 3,
    roomSize,
    maxSteps: roomsOfSteps(30, roomSize),
    build(ctx) {
      const [colorA, colorB] = ctx.rng.subset(COLOR_NAMES, 2);

      const doorA = addDoor(ctx, 0, 0, { side: Side.East, color: colorA, locked: true });
      if (isViolation(doorA)) return doorA;
      const keyA = addObject(ctx, 2, 0, { kind: ObjectKind.Key, color: colorA });
      if (isViolation(keyA)) return keyA;

      const doorB = addDoor(ctx, 1, 0, { side: Side.East, color: colorB, locked: true });
      if (isViolation(doorB)) return doorB;
      const keyB = addObject(ctx, 1, 0, { kind: ObjectKind.Key, color: colorB });
      if (isViolation(keyB)) return keyB;

      const ball = addObject(ctx, 0, 0, { kind: ObjectKind.Ball });
      if (isViolation(ball)) return ball;

      const placed = placeAgent(ctx, { col: 1, row: 0, requireReachable: true });
      if (isViolation(placed)) return placed;
      return pickup({ type: ObjectKind.Ball });
    },
  };
}

/** Pick up an object in the room directly north of the start room. */
export function pickupAbove(): LevelTemplate {
  const roomSize = 6;
  return {
    name: "PickupAbove",
    ...GRID_3X3,
    roomSize,
    maxSteps: roomsOfSteps(8, roomSize),
    build(ctx) {
      const obj = addObject(ctx, 1, 0);
      if (isViolation(obj)) return obj;
      const door = addDoor(ctx, 1, 1, { side: Side.North, locked: false });
      if (isViolation(door)) return door;
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;
      const connected = connectAll(ctx);
      if (isViolation(connected)) return connected;
      return pickup(describe(obj));
    },
  };
}

export interface OpenTwoDoorsConfig {
  name: string;
  firstColor?: Color;
  secondColor?: Color;
  strict?: boolean;
}

/**
 * Open the west door, then the east door. The doors face away from each
 * other, so the agent cannot see the first one while opening the second.
 */
export function openTwoDoors(cfg: OpenTwoDoorsConfig): LevelTemplate {
  const roomSize = 6;
  return {
    name: cfg.name,
    ...GRID_3X3,
    roomSize,
    maxSteps: roomsOfSteps(20, roomSize),
    build(ctx) {
      const [drawnFirst, drawnSecond] = ctx.rng.subset(COLOR_NAMES, 2);
      const first = cfg.firstColor ?? drawnFirst;
      const second = cfg.secondColor ?? drawnSecond;

      const door1 = addDoor(ctx, 1, 1, { side: Side.West, color: first, locked: false });
      if (isViolation(door1)) return door1;
      const door2 = addDoor(ctx, 1, 1, { side: Side.East, color: second, locked: false });
      if (isViolation(door2)) return door2;

      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;

      return before(open(describe(door1), cfg.strict ?? false), open(describe(door2)));
    },
  };
}

/**
 * Pick up the only object, in a random room of a fully connected grid.
 */
export function findObj(roomSize: number): LevelTemplate {
  return {
    name: `FindObjS${roomSize}`,
    ...GRID_3X3,
    roomSize,
    maxSteps: roomsOfSteps(20, roomSize),
    build(ctx) {
      const col = ctx.rng.int(0, ctx.world.cols);
      const row = ctx.rng.int(0, ctx.world.rows);
      const obj = addObject(ctx, col, row);
      if (isViolation(obj)) return obj;
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;
      const connected = connectAll(ctx);
      if (isViolation(connected)) return connected;
      return pickup({ type: obj.kind });
    },
  };
}

/**
 * A ball behind a locked door on the east side; the middle column is one
 * long hallway and the key lies in a random room of the west column.
 */
export function keyCorridor(roomSize: number, rows: number): LevelTemplate {
  return {
    name: `KeyCorridorS${roomSize}R${rows}`,
    rows,
    cols: 3,
    roomSize,
    maxSteps: roomsOfSteps(30, roomSize),
    build(ctx) {
      for (let row = 1; row < rows; row++) {
        const opened = removeWall(ctx, 1, row, Side.North);
        if (isViolation(opened)) return opened;
      }

      const lockedRow = ctx.rng.int(0, rows);
      const door = addDoor(ctx, 2, lockedRow, { side: Side.West, locked: true });
      if (isViolation(door)) return door;
      const ball = addObject(ctx, 2, lockedRow, { kind: ObjectKind.Ball });
      if (isViolation(ball)) return ball;

      const key = addObject(ctx, 0, ctx.rng.int(0, rows), { kind: ObjectKind.Key, color: door.color });
      if (isViolation(key)) return key;

      const placed = placeAgent(ctx, { col: 1, row: Math.floor(rows / 2) });
      if (isViolation(placed)) return placed;
      const connected = connectAll(ctx);
      if (isViolation(connected)) return connected;

      return pickup({ type: ObjectKind.Ball });
    },
  };
}

/**
 * Several unlocked doors around the center room; open one, or two in a
 * given order.
 */
export function openDoorsOrder(numDoors: number, debug: boolean): LevelTemplate {
  const roomSize = 6;
  return {
    name: `OpenDoorsOrderN${numDoors}${debug ? "Debug" : ""}`,
    ...GRID_3X3,
    roomSize,
    maxSteps: roomsOfSteps(20, roomSize),
    build(ctx) {
      const colors = ctx.rng.subset(COLOR_NAMES, numDoors);
      const doors: WorldObject[] = [];
      for (const color of colors) {
        const door = addDoor(ctx, 1, 1, { color, locked: false });
        if (isViolation(door)) return door;
        doors.push(door);
      }
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;

      const [door1, door2] = ctx.rng.subset(doors, 2);
      const first = open(describe(door1), debug);
      const second = open(describe(door2), debug);
      switch (ctx.rng.int(0, 3)) {
        case 0:
          return first;
        case 1:
          return before(first, second);
        default:
          return after(first, second);
      }
    },
  };
}
