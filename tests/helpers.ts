import { MissionRandom } from "../src/sim/rng.js";
import { createEmptyWorld, spawnItem } from "../src/sim/state.js";
import type { MissionContext } from "../src/sim/topology.js";
import { addDoor } from "../src/sim/topology.js";
import type { Checked } from "../src/sim/violations.js";
import { isViolation } from "../src/sim/violations.js";
import type { Color, DoorObject, ItemKind, ItemObject, ObjectId, Side, World } from "../src/shared/types.js";
import { DoorState } from "../src/shared/types.js";

/** Fresh world with no doors, objects or agent. */
export function makeTestWorld(rows = 1, cols = 1, roomSize = 5, seed = 1): MissionContext {
  const rng = new MissionRandom(seed);
  const world = createEmptyWorld(seed, rows, cols, roomSize, rng);
  return { world, rng };
}

export function unwrap<T>(value: Checked<T>): T {
  if (isViolation(value)) {
    throw new Error(`unexpected violation: ${value.violation}: ${value.reason}`);
  }
  return value;
}

export function putItem(world: World, kind: ItemKind, color: Color, x: number, y: number): ItemObject {
  return spawnItem(world, { kind, color }, { x, y });
}

export function setAgent(world: World, x: number, y: number, dir: Side, carrying: ObjectId | null = null): void {
  world.agent.pos = { x, y };
  world.agent.dir = dir;
  world.agent.carrying = carrying;
}

/** Door on a wall at a fixed offset, in the given state. */
export function putDoor(
  ctx: MissionContext,
  col: number,
  row: number,
  side: Side,
  color: Color,
  state: DoorState = DoorState.Closed,
  offset = 2,
): DoorObject {
  const door = unwrap(addDoor(ctx, col, row, { side, color, locked: state === DoorState.Locked, offset }));
  door.state = state;
  return door;
}
