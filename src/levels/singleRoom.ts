/**
 * Levels played inside a single room: the agent starts in the room holding
 * every object the instruction talks about.
 */
import type { WorldObject } from "../shared/types.js";
import { Color, ObjectKind, Side } from "../shared/types.js";
import { ALL_SIDES, COLOR_NAMES, LOC_NAMES } from "../shared/constants.js";
import type { LevelTemplate } from "../sim/procgen.js";
import type { ObjDesc } from "../sim/descriptors.js";
import { goTo, open, pickup } from "../sim/instructions.js";
import {
  addDistractors, addDoor, addObject, placeAgent,
} from "../sim/topology.js";
import { checkObjsReachable } from "../sim/reachability.js";
import { ViolationKind, isViolation, reject } from "../sim/violations.js";
import { GRID_3X3, describe } from "./common.js";

export function goToRedBlueBall(roomSize = 8, numDists = 7): LevelTemplate {
  return {
    name: "GoToRedBlueBall",
    rows: 1,
    cols: 1,
    roomSize,
    build(ctx) {
      const placed = placeAgent(ctx);
      if (isViolation(placed)) return placed;

      const dists = addDistractors(ctx, { count: numDists, allUnique: false });
      if (isViolation(dists)) return dists;
      for (const dist of dists) {
        if (dist.kind === ObjectKind.Ball && (dist.color === Color.Blue || dist.color === Color.Red)) {
          return reject(ViolationKind.AmbiguousOrDegenerateDescriptor, "only one red or blue ball is allowed");
        }
      }

      const color = ctx.rng.elem([Color.Red, Color.Blue]);
      const ball = addObject(ctx, 0, 0, { kind: ObjectKind.Ball, color });
      if (isViolation(ball)) return ball;

      const unreachable = checkObjsReachable(ctx.world);
      if (unreachable) return unreachable;

      return goTo(describe(ball));
    },
  };
}

export function openRedDoor(): LevelTemplate {
  return {
    name: "OpenRedDoor",
    rows: 1,
    cols: 2,
    roomSize: 5,
    build(ctx) {
      const door = addDoor(ctx, 0, 0, { side: Side.East, color: Color.Red, locked: false });
      if (isViolation(door)) return door;
      const placed = placeAgent(ctx, { col: 0, row: 0 });
      if (isViolation(placed)) return placed;
      return open({ type: ObjectKind.Door, color: Color.Red });
    },
  };
}

export interface OpenDoorConfig {
  name: string;
  debug?: boolean;
  selectBy?: "color" | "loc";
}

/**
 * Four unlocked doors of distinct colors around the center room; the target
 * is named by color or by where it is relative to the agent.
 */
export function openDoor(cfg: OpenDoorConfig): LevelTemplate {
  return {
    name: cfg.name,
    ...GRID_3X3,
    build(ctx) {
      const colors = ctx.rng.subset(COLOR_NAMES, 4);
      const doors: WorldObject[] = [];
      for (const [i, color] of colors.entries()) {
        const door = addDoor(ctx, 1, 1, { side: ALL_SIDES[i], color, locked: false });
        if (isViolation(door)) return door;
        doors.push(door);
      }

      const selectBy = cfg.selectBy ?? ctx.rng.elem(["color", "loc"] as const);
      const target: ObjDesc =
        selectBy === "color"
          ? { type: ObjectKind.Door, color: doors[0].color }
          : { type: ObjectKind.Door, loc: ctx.rng.elem(LOC_NAMES) };

      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;
      return open(target, cfg.debug ?? false);
    },
  };
}

export function goToDoor(): LevelTemplate {
  return {
    name: "GoToDoor",
    ...GRID_3X3,
    roomSize: 7,
    build(ctx) {
      const doors: WorldObject[] = [];
      for (let i = 0; i < 4; i++) {
        const door = addDoor(ctx, 1, 1);
        if (isViolation(door)) return door;
        doors.push(door);
      }
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;

      const target = ctx.rng.elem(doors);
      return goTo({ type: ObjectKind.Door, color: target.color });
    },
  };
}

export function goToObjDoor(): LevelTemplate {
  return {
    name: "GoToObjDoor",
    ...GRID_3X3,
    build(ctx) {
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;

      const dists = addDistractors(ctx, { col: 1, row: 1, count: 8, allUnique: false });
      if (isViolation(dists)) return dists;
      const objs: WorldObject[] = [...dists];
      for (let i = 0; i < 4; i++) {
        const door = addDoor(ctx, 1, 1);
        if (isViolation(door)) return door;
        objs.push(door);
      }

      const unreachable = checkObjsReachable(ctx.world);
      if (unreachable) return unreachable;

      return goTo(describe(ctx.rng.elem(objs)));
    },
  };
}

/** Pick up an item, go to an item or door, or open a door. */
export function actionObjDoor(): LevelTemplate {
  return {
    name: "ActionObjDoor",
    ...GRID_3X3,
    roomSize: 7,
    build(ctx) {
      const dists = addDistractors(ctx, { col: 1, row: 1, count: 5 });
      if (isViolation(dists)) return dists;
      const objs: WorldObject[] = [...dists];
      for (let i = 0; i < 4; i++) {
        const door = addDoor(ctx, 1, 1, { locked: false });
        if (isViolation(door)) return door;
        objs.push(door);
      }

      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;

      const target = ctx.rng.elem(objs);
      const desc = describe(target);
      if (target.kind === ObjectKind.Door) {
        return ctx.rng.bool() ? goTo(desc) : open(desc);
      }
      return ctx.rng.bool() ? goTo(desc) : pickup(desc);
    },
  };
}

/** Fetch the key in the room and unlock its only door. */
export function unlockLocal(distractors: boolean): LevelTemplate {
  return {
    name: distractors ? "UnlockLocalDist" : "UnlockLocal",
    ...GRID_3X3,
    build(ctx) {
      const door = addDoor(ctx, 1, 1, { locked: true });
      if (isViolation(door)) return door;
      const key = addObject(ctx, 1, 1, { kind: ObjectKind.Key, color: door.color });
      if (isViolation(key)) return key;
      if (distractors) {
        const dists = addDistractors(ctx, { col: 1, row: 1, count: 3 });
        if (isViolation(dists)) return dists;
      }
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;
      return open({ type: ObjectKind.Door });
    },
  };
}

/** Unlock a door whose key is hidden in a box. */
export function keyInBox(): LevelTemplate {
  return {
    name: "KeyInBox",
    ...GRID_3X3,
    build(ctx) {
      const door = addDoor(ctx, 1, 1, { locked: true });
      if (isViolation(door)) return door;
      const box = addObject(ctx, 1, 1, {
        kind: ObjectKind.Box,
        color: ctx.rng.color(),
        contents: { kind: ObjectKind.Key, color: door.color },
      });
      if (isViolation(box)) return box;
      const placed = placeAgent(ctx, { col: 1, row: 1 });
      if (isViolation(placed)) return placed;
      return open({ type: ObjectKind.Door });
    },
  };
}

/**
 * Pick up an object named by type, color or both, among distractors.
 * The debug variant ends as soon as any matching pickup happens.
 */
export function pickupDist(debug: boolean): LevelTemplate {
  return {
    name: debug ? "PickupDistDebug" : "PickupDist",
    rows: 1,
    cols: 1,
    roomSize: 7,
    build(ctx) {
      const dists = addDistractors(ctx, { count: 5 });
      if (isViolation(dists)) return dists;
      const placed = placeAgent(ctx, { col: 0, row: 0 });
      if (isViolation(placed)) return placed;

      const target = ctx.rng.elem(dists);
      const selectBy = ctx.rng.elem(["type", "color", "both"] as const);
      const desc: ObjDesc = {};
      if (selectBy !== "color") desc.type = target.kind;
      if (selectBy !== "type") desc.color = target.color;
      return pickup(desc, debug);
    },
  };
}

/** Pick up the ball in an empty room of the given size. */
export function oneRoom(roomSize: number): LevelTemplate {
  return {
    name: `1RoomS${roomSize}`,
    rows: 1,
    cols: 1,
    roomSize,
    build(ctx) {
      const ball = addObject(ctx, 0, 0, { kind: ObjectKind.Ball });
      if (isViolation(ball)) return ball;
      const placed = placeAgent(ctx);
      if (isViolation(placed)) return placed;
      return pickup({ type: ObjectKind.Ball });
    },
  };
}
