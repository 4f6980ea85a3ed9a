import type { World, WorldObject } from "../shared/types.js";
import { DoorState, ObjectKind, TileType } from "../shared/types.js";
import { AGENT_GLYPHS, GLYPHS } from "../shared/constants.js";
import { getObjectAt } from "../sim/rooms.js";

export function objectGlyph(obj: WorldObject): string {
  switch (obj.kind) {
    case ObjectKind.Door:
      if (obj.state === DoorState.Open) return GLYPHS.openDoor;
      return obj.state === DoorState.Locked ? GLYPHS.lockedDoor : GLYPHS.closedDoor;
    case ObjectKind.Key:
      return GLYPHS.key;
    case ObjectKind.Ball:
      return GLYPHS.ball;
    case ObjectKind.Box:
      return GLYPHS.box;
  }
}

/**
 * Render the world to a plain-text string (for headless/harness use).
 * The agent is drawn as an arrow pointing the way it faces.
 */
export function renderToString(world: World): string {
  const lines: string[] = [];
  const agent = world.agent;

  for (let y = 0; y < world.height; y++) {
    let row = "";
    for (let x = 0; x < world.width; x++) {
      const obj = getObjectAt(world, { x, y });
      if (agent.pos && agent.pos.x === x && agent.pos.y === y) {
        row += AGENT_GLYPHS[agent.dir];
      } else if (obj) {
        row += objectGlyph(obj);
      } else {
        row += world.tiles[y][x] === TileType.Wall ? GLYPHS.wall : GLYPHS.floor;
      }
    }
    lines.push(row);
  }

  return lines.join("\n");
}
