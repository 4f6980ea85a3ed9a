/**
 * Two rooms side by side with the wall between them knocked down. Each
 * room gets its own set of distinct items, so an object picked from the
 * left set and one from the right set are never adjacent to begin with.
 */
import type { ItemObject } from "../shared/types.js";
import { Side } from "../shared/types.js";
import type { LevelTemplate } from "../sim/procgen.js";
import type { MissionContext } from "../sim/topology.js";
import { addDistractors, placeAgent, removeWall } from "../sim/topology.js";
import { before, putNext } from "../sim/instructions.js";
import type { Checked } from "../sim/violations.js";
import { GenerationError, isViolation } from "../sim/violations.js";
import { describe, roomsOfSteps } from "./common.js";

const MAX_OBJS_PER_ROOM = 9;

function checkShape(roomSize: number, objsPerRoom: number): void {
  if (roomSize < 4) {
    throw new GenerationError(`put-next levels need rooms of at least 4 cells, got ${roomSize}`);
  }
  if (objsPerRoom > MAX_OBJS_PER_ROOM) {
    throw new GenerationError(`at most ${MAX_OBJS_PER_ROOM} objects per room, got ${objsPerRoom}`);
  }
}

function buildTwoRooms(ctx: MissionContext, objsPerRoom: number): Checked<[ItemObject[], ItemObject[]]> {
  const placed = placeAgent(ctx, { col: 0, row: 0 });
  if (isViolation(placed)) return placed;

  const left = addDistractors(ctx, { col: 0, row: 0, count: objsPerRoom });
  if (isViolation(left)) return left;
  const right = addDistractors(ctx, { col: 1, row: 0, count: objsPerRoom });
  if (isViolation(right)) return right;

  const opened = removeWall(ctx, 0, 0, Side.East);
  if (isViolation(opened)) return opened;
  return [left, right];
}

/**
 * Put one object next to another from the other room. With `startCarrying`
 * the agent begins the episode holding the object to move.
 */
export function putNextLevel(roomSize: number, objsPerRoom: number, startCarrying = false): LevelTemplate {
  checkShape(roomSize, objsPerRoom);
  return {
    name: `PutNextS${roomSize}N${objsPerRoom}${startCarrying ? "Carrying" : ""}`,
    rows: 1,
    cols: 2,
    roomSize,
    maxSteps: roomsOfSteps(8, roomSize),
    build(ctx) {
      const sets = buildTwoRooms(ctx, objsPerRoom);
      if (isViolation(sets)) return sets;
      const [left, right] = sets;

      let moving = ctx.rng.elem(left);
      let fixed = ctx.rng.elem(right);
      if (ctx.rng.bool()) {
        [moving, fixed] = [fixed, moving];
      }

      if (startCarrying) {
        ctx.startCarrying = moving.id;
      }
      return putNext(describe(moving), describe(fixed));
    },
  };
}

/**
 * Move an object from each room next to one from the other room, in order.
 */
export function moveTwoAcross(roomSize: number, objsPerRoom: number): LevelTemplate {
  checkShape(roomSize, objsPerRoom);
  return {
    name: `MoveTwoAcrossS${roomSize}N${objsPerRoom}`,
    rows: 1,
    cols: 2,
    roomSize,
    maxSteps: roomsOfSteps(16, roomSize),
    build(ctx) {
      const sets = buildTwoRooms(ctx, objsPerRoom);
      if (isViolation(sets)) return sets;

      const [a, d] = ctx.rng.subset(sets[0], 2);
      const [b, c] = ctx.rng.subset(sets[1], 2);
      return before(putNext(describe(a), describe(b)), putNext(describe(c), describe(d)));
    },
  };
}
