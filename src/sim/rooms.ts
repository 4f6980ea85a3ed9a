/**
 * Room and cell utility functions — shared by topology.ts, step.ts, and others.
 */
import type { World, Room, Position, WorldObject, Side } from "../shared/types.js";
import { TileType } from "../shared/types.js";
import { DIRECTION_VECTORS } from "../shared/constants.js";
import type { MissionRandom } from "./rng.js";
import { GenerationError } from "./violations.js";

/**
 * Look up a room by grid coordinates. Coordinates outside the grid are a
 * level configuration bug, not a sampling failure.
 */
export function getRoom(world: World, col: number, row: number): Room {
  if (col < 0 || col >= world.cols || row < 0 || row >= world.rows) {
    throw new GenerationError(`room (${col}, ${row}) is outside a ${world.cols}x${world.rows} grid`);
  }
  return world.rooms[row * world.cols + col];
}

/**
 * Find the room containing a world position. Cells on a shared wall belong
 * to the room to their east or south.
 */
export function getRoomAt(world: World, pos: Position): Room {
  const col = Math.min(Math.floor(pos.x / (world.roomSize - 1)), world.cols - 1);
  const row = Math.min(Math.floor(pos.y / (world.roomSize - 1)), world.rows - 1);
  return world.rooms[row * world.cols + col];
}

/** True when pos lies within the room's footprint, walls included. */
export function isInRoom(room: Room, pos: Position): boolean {
  return (
    pos.x >= room.top.x && pos.x < room.top.x + room.size &&
    pos.y >= room.top.y && pos.y < room.top.y + room.size
  );
}

export function isInBounds(world: World, pos: Position): boolean {
  return pos.x >= 0 && pos.x < world.width && pos.y >= 0 && pos.y < world.height;
}

export function samePos(a: Position | null, b: Position | null): boolean {
  return a !== null && b !== null && a.x === b.x && a.y === b.y;
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Find the object occupying a cell. Carried objects have no cell.
 */
export function getObjectAt(world: World, pos: Position): WorldObject | undefined {
  for (const [, obj] of world.objects) {
    if (samePos(obj.pos, pos)) {
      return obj;
    }
  }
  return undefined;
}

/**
 * A cell is free when it is floor, holds no object and is not the agent's.
 */
export function isCellFree(world: World, pos: Position): boolean {
  if (!isInBounds(world, pos)) return false;
  if (world.tiles[pos.y][pos.x] !== TileType.Floor) return false;
  if (getObjectAt(world, pos)) return false;
  if (samePos(world.agent.pos, pos)) return false;
  return true;
}

export function offsetPos(pos: Position, dir: Side): Position {
  const v = DIRECTION_VECTORS[dir];
  return { x: pos.x + v.x, y: pos.y + v.y };
}

/**
 * Cell directly in front of the agent, or null before the agent is placed.
 */
export function getFrontPos(world: World): Position | null {
  const pos = world.agent.pos;
  if (!pos) return null;
  return offsetPos(pos, world.agent.dir);
}

/**
 * Random interior (non-wall) cell of a room.
 */
export function randomInteriorPos(rng: MissionRandom, room: Room): Position {
  return {
    x: room.top.x + rng.int(1, room.size - 1),
    y: room.top.y + rng.int(1, room.size - 1),
  };
}

/**
 * Remove an object id from whichever room lists it.
 */
export function detachFromRoom(world: World, id: string): void {
  for (const room of world.rooms) {
    const idx = room.objects.indexOf(id);
    if (idx >= 0) {
      room.objects.splice(idx, 1);
      return;
    }
  }
}
