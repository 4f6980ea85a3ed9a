/**
 * Room topology builder: doors, openings, and placement of the agent and
 * items inside the room grid allocated by createEmptyWorld().
 *
 * Operations that can fail because of an unlucky draw return a
 * ConstraintViolation instead of throwing; the caller is expected to hand it
 * back to the rejection-sampling loop. Misuse (a room outside the grid, a
 * side with no neighbor) throws GenerationError.
 */
import type {
  World, Room, Position, Color, DoorObject, ItemObject, ItemSpec, ItemKind, ObjectId,
} from "../shared/types.js";
import { DoorState, ObjectKind, Side, TileType } from "../shared/types.js";
import {
  ALL_SIDES, COLOR_NAMES, OPPOSITE_SIDE, SIDE_NAMES,
  PLACE_MAX_TRIES, DISTRACTOR_MAX_TRIES, CONNECT_MAX_ITERATIONS,
} from "../shared/constants.js";
import type { MissionRandom } from "./rng.js";
import { nextObjectId, spawnItem } from "./state.js";
import {
  getRoom, getRoomAt, getObjectAt, isCellFree, manhattan, offsetPos, randomInteriorPos,
} from "./rooms.js";
import { checkObjsReachable } from "./reachability.js";
import type { Checked } from "./violations.js";
import { GenerationError, ViolationKind, isViolation, reject } from "./violations.js";

/** Everything a level template needs while it builds one attempt. */
export interface MissionContext {
  world: World;
  rng: MissionRandom;
  /** Item the agent holds when the episode starts; applied after validation. */
  startCarrying?: ObjectId;
}

function roomLabel(room: Room): string {
  return `room (${room.col}, ${room.row})`;
}

// ── Doors and walls ──────────────────────────────────────────

export interface DoorOptions {
  side?: Side;
  color?: Color;
  locked?: boolean;
  /** Cell offset along the wall, overriding the position drawn at allocation. */
  offset?: number;
}

/**
 * Position of a door `offset` cells along the given wall of a room.
 */
export function doorPosAtOffset(room: Room, side: Side, offset: number): Position {
  if (offset < 1 || offset > room.size - 2) {
    throw new GenerationError(`door offset ${offset} is outside the wall of ${roomLabel(room)}`);
  }
  const far = room.size - 1;
  switch (side) {
    case Side.East:
      return { x: room.top.x + far, y: room.top.y + offset };
    case Side.South:
      return { x: room.top.x + offset, y: room.top.y + far };
    case Side.West:
      return { x: room.top.x, y: room.top.y + offset };
    case Side.North:
      return { x: room.top.x + offset, y: room.top.y };
  }
}

/**
 * Add a door between a room and its neighbor. With no side given, one is
 * drawn among the walls that have a neighbor and no door or opening yet.
 */
export function addDoor(
  ctx: MissionContext,
  col: number,
  row: number,
  opts: DoorOptions = {},
): Checked<DoorObject> {
  const { world, rng } = ctx;
  const room = getRoom(world, col, row);

  let side = opts.side;
  if (side === undefined) {
    const free = ALL_SIDES.filter((s) => room.neighbors[s] !== null && room.links[s] === null);
    if (free.length === 0) {
      return reject(ViolationKind.DuplicateDoor, `${roomLabel(room)} has no free wall for a door`);
    }
    side = rng.elem(free);
  }

  const neighborIndex = room.neighbors[side];
  const defaultPos = room.doorPos[side];
  if (neighborIndex === null || defaultPos === null) {
    throw new GenerationError(`${roomLabel(room)} has no neighbor to the ${SIDE_NAMES[side]}`);
  }
  if (room.links[side] !== null) {
    return reject(
      ViolationKind.DuplicateDoor,
      `${roomLabel(room)} already has a door or opening on its ${SIDE_NAMES[side]} wall`,
    );
  }

  const color = opts.color ?? rng.color();
  const locked = opts.locked ?? rng.bool();
  const pos = opts.offset === undefined ? { ...defaultPos } : doorPosAtOffset(room, side, opts.offset);

  const link = world.doors.length;
  const door: DoorObject = {
    id: nextObjectId(world),
    kind: ObjectKind.Door,
    color,
    pos,
    state: locked ? DoorState.Locked : DoorState.Closed,
    link,
  };
  world.doors.push({ objectId: door.id, rooms: [room.index, neighborIndex], side });
  world.objects.set(door.id, door);
  world.tiles[pos.y][pos.x] = TileType.Floor;

  const neighbor = world.rooms[neighborIndex];
  room.links[side] = { kind: "door", door: link };
  neighbor.links[OPPOSITE_SIDE[side]] = { kind: "door", door: link };
  if (locked) {
    room.locked = true;
  }
  return door;
}

/**
 * Knock down the wall between a room and its neighbor. Removing a wall that
 * is already open does nothing.
 */
export function removeWall(ctx: MissionContext, col: number, row: number, side: Side): Checked<null> {
  const { world } = ctx;
  const room = getRoom(world, col, row);
  const neighborIndex = room.neighbors[side];
  if (neighborIndex === null) {
    throw new GenerationError(`${roomLabel(room)} has no neighbor to the ${SIDE_NAMES[side]}`);
  }

  const link = room.links[side];
  if (link?.kind === "opening") return null;
  if (link?.kind === "door") {
    return reject(
      ViolationKind.DuplicateDoor,
      `cannot remove the ${SIDE_NAMES[side]} wall of ${roomLabel(room)}: a door is there`,
    );
  }

  for (let i = 1; i < room.size - 1; i++) {
    const cell = doorPosAtOffset(room, side, i);
    world.tiles[cell.y][cell.x] = TileType.Floor;
  }

  room.links[side] = { kind: "opening" };
  world.rooms[neighborIndex].links[OPPOSITE_SIDE[side]] = { kind: "opening" };
  return null;
}

/**
 * Label each room with the id of its connected component, following doors
 * (locked or not) and openings.
 */
export function roomComponents(world: World): number[] {
  const labels: number[] = world.rooms.map(() => -1);
  let next = 0;
  for (const start of world.rooms) {
    if (labels[start.index] >= 0) continue;
    const stack = [start.index];
    labels[start.index] = next;
    while (stack.length > 0) {
      const idx = stack.pop();
      if (idx === undefined) break;
      const room = world.rooms[idx];
      for (const side of ALL_SIDES) {
        const nb = room.neighbors[side];
        if (nb === null || room.links[side] === null || labels[nb] >= 0) continue;
        labels[nb] = next;
        stack.push(nb);
      }
    }
    next++;
  }
  return labels;
}

export interface ConnectOptions {
  colors?: readonly Color[];
  maxIterations?: number;
}

/**
 * Add unlocked doors until every room is reachable from the agent's room.
 * Walls touching a locked room, and walls between rooms that are already
 * connected, are never given a door.
 */
export function connectAll(ctx: MissionContext, opts: ConnectOptions = {}): Checked<DoorObject[]> {
  const { world, rng } = ctx;
  const colors = opts.colors ?? COLOR_NAMES;
  const maxIterations = opts.maxIterations ?? CONNECT_MAX_ITERATIONS;
  const start = world.agent.pos ? getRoomAt(world, world.agent.pos).index : 0;
  const added: DoorObject[] = [];

  for (let itr = 0; ; itr++) {
    const labels = roomComponents(world);
    if (labels.every((label) => label === labels[start])) {
      return added;
    }
    if (itr >= maxIterations) {
      return reject(ViolationKind.UnreachableObject, `rooms still disconnected after ${maxIterations} iterations`);
    }

    const col = rng.int(0, world.cols);
    const row = rng.int(0, world.rows);
    const side = rng.elem(ALL_SIDES);
    const room = getRoom(world, col, row);
    const nb = room.neighbors[side];
    if (nb === null || room.links[side] !== null) continue;
    if (room.locked || world.rooms[nb].locked) continue;
    if (labels[room.index] === labels[nb]) continue;

    const door = addDoor(ctx, col, row, { side, color: rng.elem(colors), locked: false });
    if (isViolation(door)) return door;
    added.push(door);
  }
}

// ── Agent ────────────────────────────────────────────────────

export interface AgentPlacement {
  col?: number;
  row?: number;
  /** Reject the placement unless every object can be reached from it. */
  requireReachable?: boolean;
}

/**
 * Place the agent on a free interior cell, facing either an empty cell or a
 * wall, never an object.
 */
export function placeAgent(ctx: MissionContext, opts: AgentPlacement = {}): Checked<Position> {
  const { world, rng } = ctx;
  const col = opts.col ?? rng.int(0, world.cols);
  const row = opts.row ?? rng.int(0, world.rows);
  const room = getRoom(world, col, row);

  world.agent.pos = null;
  for (let tries = 0; tries < PLACE_MAX_TRIES; tries++) {
    const pos = randomInteriorPos(rng, room);
    if (!isCellFree(world, pos)) continue;
    const dir = rng.elem(ALL_SIDES);
    const front = offsetPos(pos, dir);
    if (getObjectAt(world, front)) continue;

    world.agent.pos = pos;
    world.agent.dir = dir;
    if (opts.requireReachable) {
      const unreachable = checkObjsReachable(world);
      if (unreachable) return unreachable;
    }
    return pos;
  }
  return reject(ViolationKind.PlacementExhausted, `no free cell for the agent in ${roomLabel(room)}`);
}

/**
 * Put the agent on an exact cell. Used by the declarative mission formats.
 */
export function putAgent(ctx: MissionContext, pos: Position, dir: Side): Checked<Position> {
  const { world } = ctx;
  world.agent.pos = null;
  if (!isCellFree(world, pos)) {
    return reject(ViolationKind.PlacementExhausted, `agent cell (${pos.x}, ${pos.y}) is not free`);
  }
  world.agent.pos = { ...pos };
  world.agent.dir = dir;
  return world.agent.pos;
}

// ── Items ────────────────────────────────────────────────────

export interface ObjectOptions {
  kind?: ItemKind;
  color?: Color;
  /** Item hidden inside a box until the box is toggled. */
  contents?: ItemSpec;
}

/**
 * Place a new item on a free interior cell of a room, away from the agent.
 */
export function addObject(
  ctx: MissionContext,
  col: number,
  row: number,
  opts: ObjectOptions = {},
): Checked<ItemObject> {
  const { world, rng } = ctx;
  const room = getRoom(world, col, row);
  const kind = opts.kind ?? rng.itemKind();
  const color = opts.color ?? rng.color();

  for (let tries = 0; tries < PLACE_MAX_TRIES; tries++) {
    const pos = randomInteriorPos(rng, room);
    if (!isCellFree(world, pos)) continue;
    if (world.agent.pos && manhattan(pos, world.agent.pos) < 2) continue;
    return spawnItem(world, { kind, color }, pos, opts.contents ?? null);
  }
  return reject(ViolationKind.PlacementExhausted, `no free cell for a ${color} ${kind} in ${roomLabel(room)}`);
}

/**
 * Place an item on an exact cell.
 */
export function putObject(
  ctx: MissionContext,
  spec: ItemSpec,
  pos: Position,
  contents: ItemSpec | null = null,
): Checked<ItemObject> {
  if (!isCellFree(ctx.world, pos)) {
    return reject(ViolationKind.PlacementExhausted, `cell (${pos.x}, ${pos.y}) is not free`);
  }
  return spawnItem(ctx.world, spec, pos, contents);
}

export interface DistractorOptions {
  col?: number;
  row?: number;
  count: number;
  /** Never repeat a (kind, color) pair already present in the world. */
  allUnique?: boolean;
}

/**
 * Scatter random items. The room is drawn per item when not given.
 */
export function addDistractors(ctx: MissionContext, opts: DistractorOptions): Checked<ItemObject[]> {
  const { world, rng } = ctx;
  const allUnique = opts.allUnique ?? true;

  const seen = new Set<string>();
  for (const [, obj] of world.objects) {
    if (obj.kind !== ObjectKind.Door) {
      seen.add(`${obj.kind}:${obj.color}`);
    }
  }

  const dists: ItemObject[] = [];
  while (dists.length < opts.count) {
    let spec: ItemSpec | null = null;
    for (let tries = 0; tries < DISTRACTOR_MAX_TRIES; tries++) {
      const color = rng.color();
      const kind = rng.itemKind();
      if (allUnique && seen.has(`${kind}:${color}`)) continue;
      spec = { kind, color };
      break;
    }
    if (!spec) {
      return reject(ViolationKind.PlacementExhausted, `no unused kind and color left for distractor ${dists.length + 1}`);
    }

    const col = opts.col ?? rng.int(0, world.cols);
    const row = opts.row ?? rng.int(0, world.rows);
    const dist = addObject(ctx, col, row, spec);
    if (isViolation(dist)) return dist;
    seen.add(`${dist.kind}:${dist.color}`);
    dists.push(dist);
  }
  return dists;
}
