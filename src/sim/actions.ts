import type { World, WorldObject, ObjectSnapshot, AgentPose, Position } from "../shared/types.js";
import { ActionType, DoorState, ObjectKind } from "../shared/types.js";
import { getFrontPos, getObjectAt, isCellFree, isInBounds } from "./rooms.js";
import { TileType } from "../shared/types.js";

/**
 * True when the agent can walk onto the cell: empty floor or an open door.
 */
export function isPassable(world: World, pos: Position): boolean {
  if (!isInBounds(world, pos)) return false;
  if (world.tiles[pos.y][pos.x] !== TileType.Floor) return false;
  const obj = getObjectAt(world, pos);
  return !obj || (obj.kind === ObjectKind.Door && obj.state === DoorState.Open);
}

/**
 * Check whether an action would change anything. Invalid actions are still
 * accepted by applyAction(); they just produce an empty delta.
 */
export function isValidAction(world: World, action: ActionType): boolean {
  const front = getFrontPos(world);
  if (!front) return false;
  const target = getObjectAt(world, front);

  switch (action) {
    case ActionType.Left:
    case ActionType.Right:
    case ActionType.Done:
      return true;
    case ActionType.Forward:
      return isPassable(world, front);
    case ActionType.Pickup:
      return world.agent.carrying === null && target !== undefined && target.kind !== ObjectKind.Door;
    case ActionType.Drop:
      return world.agent.carrying !== null && isCellFree(world, front);
    case ActionType.Toggle:
      if (!target) return false;
      if (target.kind === ObjectKind.Box) return true;
      if (target.kind !== ObjectKind.Door) return false;
      return target.state !== DoorState.Locked || carriesKeyFor(world, target.color);
  }
}

export function carriesKeyFor(world: World, color: string): boolean {
  if (!world.agent.carrying) return false;
  const carried = world.objects.get(world.agent.carrying);
  return carried?.kind === ObjectKind.Key && carried.color === color;
}

export function snapshotObject(world: World, obj: WorldObject): ObjectSnapshot {
  const snap: ObjectSnapshot = {
    kind: obj.kind,
    color: obj.color,
    pos: obj.pos ? { ...obj.pos } : null,
    carried: world.agent.carrying === obj.id,
  };
  if (obj.kind === ObjectKind.Door) {
    snap.doorState = obj.state;
  }
  return snap;
}

export function snapshotAgent(world: World): AgentPose {
  const pos = world.agent.pos;
  if (!pos) {
    throw new Error("agent has not been placed");
  }
  return { pos: { ...pos }, dir: world.agent.dir, carrying: world.agent.carrying };
}
