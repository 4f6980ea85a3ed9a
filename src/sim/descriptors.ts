/**
 * Object descriptors: partial references to objects by type, color and
 * location relative to the agent. A descriptor is a query, evaluated against
 * the live objects every time it is needed, since the agent moves and
 * objects are carried, dropped and destroyed.
 */
import type { World, WorldObject, Position, Color, ObjectKind } from "../shared/types.js";
import { DIRECTION_VECTORS } from "../shared/constants.js";
import type { LocName } from "../shared/constants.js";
import { getRoomAt, isInRoom } from "./rooms.js";

export interface ObjDesc {
  type?: ObjectKind;
  color?: Color;
  loc?: LocName;
}

/** A descriptor with no field set matches everything and cannot name a goal. */
export function isDegenerate(desc: ObjDesc): boolean {
  return desc.type === undefined && desc.color === undefined && desc.loc === undefined;
}

/**
 * Test one object against a descriptor, with the object standing at `at`.
 * Locations only match objects in the room the agent is currently in.
 */
export function matchesDescriptor(
  world: World,
  desc: ObjDesc,
  obj: WorldObject,
  at: Position | null,
): boolean {
  if (desc.type !== undefined && obj.kind !== desc.type) return false;
  if (desc.color !== undefined && obj.color !== desc.color) return false;
  if (desc.loc === undefined) return true;

  const agentPos = world.agent.pos;
  if (!agentPos || !at) return false;
  if (!isInRoom(getRoomAt(world, agentPos), at)) return false;

  const v = { x: at.x - agentPos.x, y: at.y - agentPos.y };
  const d1 = DIRECTION_VECTORS[world.agent.dir];
  const d2 = { x: -d1.y, y: d1.x };
  const along = v.x * d1.x + v.y * d1.y;
  const across = v.x * d2.x + v.y * d2.y;

  switch (desc.loc) {
    case "left":
      return across < 0;
    case "right":
      return across > 0;
    case "front":
      return along > 0;
    case "behind":
      return along < 0;
  }
}

/**
 * All objects on the grid that currently match a descriptor, in id order.
 * Carried objects have no cell and never match.
 */
export function resolveDescriptor(world: World, desc: ObjDesc): WorldObject[] {
  const matches: WorldObject[] = [];
  for (const [, obj] of world.objects) {
    if (obj.pos && matchesDescriptor(world, desc, obj, obj.pos)) {
      matches.push(obj);
    }
  }
  return matches;
}

/**
 * Render a descriptor as a noun phrase: "the red door", "a ball on your left".
 * The definite article is used when exactly one object matches.
 */
export function describeObject(world: World, desc: ObjDesc): string {
  let s: string = desc.type ?? "object";
  if (desc.color) s = `${desc.color} ${s}`;
  switch (desc.loc) {
    case "front":
      s += " in front of you";
      break;
    case "behind":
      s += " behind you";
      break;
    case "left":
    case "right":
      s += ` on your ${desc.loc}`;
      break;
    case undefined:
      break;
  }
  const article = resolveDescriptor(world, desc).length === 1 ? "the" : "a";
  return `${article} ${s}`;
}
