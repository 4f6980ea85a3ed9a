import type { World, Room, ObjectId, LogEntry, ItemObject, ItemSpec, Position } from "../shared/types.js";
import { ObjectKind, Side, TileType } from "../shared/types.js";
import type { MissionRandom } from "./rng.js";
import { getRoomAt } from "./rooms.js";

/**
 * Allocate a rows x cols grid of rooms. Rooms share their walls, so the
 * world is (roomSize - 1) * cols + 1 cells wide.
 *
 * Door positions are drawn here, once per shared wall, so that both rooms
 * agree on where a door between them would go.
 */
export function createEmptyWorld(
  seed: number,
  rows: number,
  cols: number,
  roomSize: number,
  rng: MissionRandom,
): World {
  const width = (roomSize - 1) * cols + 1;
  const height = (roomSize - 1) * rows + 1;

  const tiles: TileType[][] = [];
  for (let y = 0; y < height; y++) {
    tiles[y] = [];
    for (let x = 0; x < width; x++) {
      tiles[y][x] = TileType.Floor;
    }
  }

  const rooms: Room[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const top = { x: col * (roomSize - 1), y: row * (roomSize - 1) };
      rooms.push({
        index: row * cols + col,
        col,
        row,
        top,
        size: roomSize,
        neighbors: [null, null, null, null],
        doorPos: [null, null, null, null],
        links: [null, null, null, null],
        objects: [],
        locked: false,
      });

      // Outline walls
      for (let i = 0; i < roomSize; i++) {
        tiles[top.y][top.x + i] = TileType.Wall;
        tiles[top.y + roomSize - 1][top.x + i] = TileType.Wall;
        tiles[top.y + i][top.x] = TileType.Wall;
        tiles[top.y + i][top.x + roomSize - 1] = TileType.Wall;
      }
    }
  }

  for (const room of rooms) {
    const { col, row, top } = room;
    const lo = 1;
    const hi = roomSize - 1;
    if (col < cols - 1) {
      room.neighbors[Side.East] = room.index + 1;
      room.doorPos[Side.East] = { x: top.x + roomSize - 1, y: top.y + rng.int(lo, hi) };
    }
    if (row < rows - 1) {
      room.neighbors[Side.South] = room.index + cols;
      room.doorPos[Side.South] = { x: top.x + rng.int(lo, hi), y: top.y + roomSize - 1 };
    }
    if (col > 0) {
      const west = rooms[room.index - 1];
      room.neighbors[Side.West] = west.index;
      room.doorPos[Side.West] = west.doorPos[Side.East];
    }
    if (row > 0) {
      const north = rooms[room.index - cols];
      room.neighbors[Side.North] = north.index;
      room.doorPos[Side.North] = north.doorPos[Side.South];
    }
  }

  return {
    seed,
    rows,
    cols,
    roomSize,
    width,
    height,
    tiles,
    rooms,
    doors: [],
    objects: new Map(),
    agent: { pos: null, dir: Side.East, carrying: null },
    nextObjectId: 0,
    logs: [],
  };
}

export function nextObjectId(world: World): ObjectId {
  const id = `obj_${world.nextObjectId}`;
  world.nextObjectId++;
  return id;
}

/**
 * Create an item on a cell and register it with the room it lands in.
 * Only boxes keep contents.
 */
export function spawnItem(world: World, spec: ItemSpec, pos: Position, contents: ItemSpec | null = null): ItemObject {
  const item: ItemObject = {
    id: nextObjectId(world),
    kind: spec.kind,
    color: spec.color,
    pos,
    contents: spec.kind === ObjectKind.Box ? contents : null,
  };
  world.objects.set(item.id, item);
  getRoomAt(world, pos).objects.push(item.id);
  return item;
}

export function addLog(world: World, source: string, text: string, timestamp: number): LogEntry {
  const entry: LogEntry = {
    id: `log_${source}_${world.logs.length}`,
    timestamp,
    source,
    text,
    read: false,
  };
  world.logs.push(entry);
  return entry;
}
