/**
 * Object reachability from the agent's position.
 *
 * Doors that are open or merely closed can be walked through. A locked door
 * only counts as passable once a key of its color is reachable without
 * crossing it, so a key locked behind its own door makes everything beyond
 * that door unreachable.
 */
import type { World, Position, Color } from "../shared/types.js";
import { DoorState, ObjectKind, TileType } from "../shared/types.js";
import { ALL_SIDES } from "../shared/constants.js";
import { getObjectAt, isInBounds, offsetPos } from "./rooms.js";
import type { ConstraintViolation } from "./violations.js";
import { GenerationError, ViolationKind, reject } from "./violations.js";

const key = (pos: Position) => `${pos.x},${pos.y}`;

/**
 * Flood-fill from the agent, treating locked doors of the given colors as
 * passable. Object cells are reached but never expanded, except doors.
 */
function flood(world: World, start: Position, keyColors: Set<Color>): Set<string> {
  const reached = new Set<string>([key(start)]);
  const queue: Position[] = [start];

  for (let head = 0; head < queue.length; head++) {
    const cur = queue[head];
    for (const side of ALL_SIDES) {
      const next = offsetPos(cur, side);
      if (!isInBounds(world, next)) continue;
      const k = key(next);
      if (reached.has(k)) continue;
      if (world.tiles[next.y][next.x] === TileType.Wall) continue;
      reached.add(k);

      const obj = getObjectAt(world, next);
      if (!obj) {
        queue.push(next);
      } else if (obj.kind === ObjectKind.Door) {
        if (obj.state !== DoorState.Locked || keyColors.has(obj.color)) {
          queue.push(next);
        }
      }
    }
  }
  return reached;
}

/**
 * Cells reachable from the agent, unlocking doors as matching keys are found.
 */
export function findReachableCells(world: World): Set<string> {
  const start = world.agent.pos;
  if (!start) {
    throw new GenerationError("reachability checked before the agent was placed");
  }

  const keyColors = new Set<Color>();
  if (world.agent.carrying) {
    const carried = world.objects.get(world.agent.carrying);
    if (carried?.kind === ObjectKind.Key) keyColors.add(carried.color);
  }

  for (;;) {
    const reached = flood(world, start, keyColors);
    let grew = false;
    for (const [, obj] of world.objects) {
      if (!obj.pos || !reached.has(key(obj.pos))) continue;
      let color: Color | null = null;
      if (obj.kind === ObjectKind.Key) {
        color = obj.color;
      } else if (obj.kind === ObjectKind.Box && obj.contents?.kind === ObjectKind.Key) {
        color = obj.contents.color;
      }
      if (color !== null && !keyColors.has(color)) {
        keyColors.add(color);
        grew = true;
      }
    }
    if (!grew) return reached;
  }
}

/**
 * Verify that every object on the grid can be reached by the agent.
 * Returns the violation for the first unreachable object, or null.
 */
export function checkObjsReachable(world: World): ConstraintViolation | null {
  const reached = findReachableCells(world);
  for (const [, obj] of world.objects) {
    if (obj.pos && !reached.has(key(obj.pos))) {
      return reject(
        ViolationKind.UnreachableObject,
        `${obj.color} ${obj.kind} at (${obj.pos.x}, ${obj.pos.y}) is unreachable`,
      );
    }
  }
  return null;
}
