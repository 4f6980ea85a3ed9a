import { describe, it, expect } from "vitest";
import {
  addDistractors, addDoor, addObject, connectAll, doorPosAtOffset, placeAgent, putAgent, putObject,
  removeWall, roomComponents,
} from "../src/sim/topology.js";
import { getObjectAt, getRoom, isCellFree, offsetPos } from "../src/sim/rooms.js";
import { GenerationError, ViolationKind, isViolation } from "../src/sim/violations.js";
import type { Position } from "../src/shared/types.js";
import { Color, DoorState, ObjectKind, Side, TileType } from "../src/shared/types.js";
import { makeTestWorld, putDoor, putItem, setAgent, unwrap } from "./helpers.js";

describe("createEmptyWorld", () => {
  it("lays out rooms that share their walls", () => {
    const { world } = makeTestWorld(1, 2, 5);

    expect(world.width).toBe(9);
    expect(world.height).toBe(5);
    expect(world.rooms).toHaveLength(2);
    expect(world.rooms[1].top).toEqual({ x: 4, y: 0 });
    expect(world.rooms[0].neighbors[Side.East]).toBe(1);
    expect(world.rooms[1].neighbors[Side.West]).toBe(0);
    expect(world.rooms[0].neighbors[Side.West]).toBeNull();
    expect(world.rooms[1].doorPos[Side.West]).toEqual(world.rooms[0].doorPos[Side.East]);
    expect(world.tiles[0][0]).toBe(TileType.Wall);
    expect(world.tiles[2][4]).toBe(TileType.Wall);
    expect(world.tiles[2][2]).toBe(TileType.Floor);
  });

  it("rejects room coordinates outside the grid", () => {
    const { world } = makeTestWorld(1, 2, 5);
    expect(() => getRoom(world, 2, 0)).toThrow(GenerationError);
  });
});

describe("addDoor", () => {
  it("links both rooms through a door on the shared wall", () => {
    const ctx = makeTestWorld(1, 2, 5);
    const door = unwrap(addDoor(ctx, 0, 0, { side: Side.East, color: Color.Red, locked: false, offset: 2 }));

    expect(door.pos).toEqual({ x: 4, y: 2 });
    expect(door.state).toBe(DoorState.Closed);
    expect(ctx.world.tiles[2][4]).toBe(TileType.Floor);
    expect(ctx.world.doors[0]).toEqual({ objectId: door.id, rooms: [0, 1], side: Side.East });
    expect(ctx.world.rooms[0].links[Side.East]).toEqual({ kind: "door", door: 0 });
    expect(ctx.world.rooms[1].links[Side.West]).toEqual({ kind: "door", door: 0 });
    expect(ctx.world.rooms[0].locked).toBe(false);
  });

  it("uses the position drawn at allocation when no offset is given", () => {
    const ctx = makeTestWorld(1, 2, 5);
    const door = unwrap(addDoor(ctx, 0, 0, { side: Side.East }));
    expect(door.pos).toEqual(ctx.world.rooms[0].doorPos[Side.East]);
  });

  it("marks the room locked when the door is locked", () => {
    const ctx = makeTestWorld(1, 2, 5);
    const door = unwrap(addDoor(ctx, 1, 0, { side: Side.West, locked: true }));
    expect(door.state).toBe(DoorState.Locked);
    expect(ctx.world.rooms[1].locked).toBe(true);
    expect(ctx.world.rooms[0].locked).toBe(false);
  });

  it("reports a duplicate door from either side of the wall", () => {
    const ctx = makeTestWorld(1, 2, 5);
    unwrap(addDoor(ctx, 0, 0, { side: Side.East }));

    const again = addDoor(ctx, 0, 0, { side: Side.East });
    const fromNeighbor = addDoor(ctx, 1, 0, { side: Side.West });
    expect(isViolation(again) && again.violation).toBe(ViolationKind.DuplicateDoor);
    expect(isViolation(fromNeighbor) && fromNeighbor.violation).toBe(ViolationKind.DuplicateDoor);
    expect(ctx.world.doors).toHaveLength(1);
  });

  it("reports a duplicate door when no free wall is left", () => {
    const ctx = makeTestWorld(1, 2, 5);
    unwrap(addDoor(ctx, 0, 0));
    const second = addDoor(ctx, 0, 0);
    expect(isViolation(second) && second.violation).toBe(ViolationKind.DuplicateDoor);
  });

  it("throws for a wall with no neighbor", () => {
    const ctx = makeTestWorld(1, 2, 5);
    expect(() => addDoor(ctx, 0, 0, { side: Side.West })).toThrow(GenerationError);
  });

  it("throws for an offset outside the wall", () => {
    const ctx = makeTestWorld(1, 2, 5);
    expect(() => addDoor(ctx, 0, 0, { side: Side.East, offset: 4 })).toThrow(GenerationError);
    expect(() => doorPosAtOffset(ctx.world.rooms[0], Side.East, 0)).toThrow(GenerationError);
  });
});

describe("removeWall", () => {
  it("clears the interior of the shared wall and records an opening", () => {
    const ctx = makeTestWorld(1, 2, 5);
    expect(removeWall(ctx, 0, 0, Side.East)).toBeNull();

    for (const y of [1, 2, 3]) {
      expect(ctx.world.tiles[y][4]).toBe(TileType.Floor);
    }
    expect(ctx.world.tiles[0][4]).toBe(TileType.Wall);
    expect(ctx.world.tiles[4][4]).toBe(TileType.Wall);
    expect(ctx.world.rooms[0].links[Side.East]).toEqual({ kind: "opening" });
    expect(ctx.world.rooms[1].links[Side.West]).toEqual({ kind: "opening" });
  });

  it("does nothing when the wall is already open", () => {
    const ctx = makeTestWorld(1, 2, 5);
    removeWall(ctx, 0, 0, Side.East);
    expect(removeWall(ctx, 1, 0, Side.West)).toBeNull();
    expect(ctx.world.rooms[0].links[Side.East]).toEqual({ kind: "opening" });
  });

  it("refuses to remove a wall holding a door", () => {
    const ctx = makeTestWorld(1, 2, 5);
    unwrap(addDoor(ctx, 0, 0, { side: Side.East }));
    const result = removeWall(ctx, 0, 0, Side.East);
    expect(isViolation(result) && result.violation).toBe(ViolationKind.DuplicateDoor);
  });
});

describe("connectAll", () => {
  it("connects every room with unlocked doors", () => {
    for (const seed of [1, 7, 42]) {
      const ctx = makeTestWorld(3, 3, 5, seed);
      const doors = unwrap(connectAll(ctx));

      const labels = roomComponents(ctx.world);
      expect(new Set(labels).size).toBe(1);
      expect(doors).toHaveLength(8);
      for (const door of doors) {
        expect(door.state).toBe(DoorState.Closed);
      }
    }
  });

  it("only uses the allowed colors", () => {
    const ctx = makeTestWorld(2, 2, 5, 3);
    const doors = unwrap(connectAll(ctx, { colors: [Color.Grey] }));
    expect(doors.every((d) => d.color === Color.Grey)).toBe(true);
  });

  it("never opens a wall of a locked room", () => {
    const ctx = makeTestWorld(1, 3, 5);
    unwrap(addDoor(ctx, 1, 0, { side: Side.East, locked: true }));

    const result = connectAll(ctx, { maxIterations: 50 });
    expect(isViolation(result) && result.violation).toBe(ViolationKind.UnreachableObject);
    expect(ctx.world.rooms[0].links[Side.East]).toBeNull();
  });
});

describe("placeAgent", () => {
  it("puts the agent on a free interior cell facing no object", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const ctx = makeTestWorld(1, 1, 5, seed);
      putItem(ctx.world, ObjectKind.Ball, Color.Red, 2, 2);
      const pos = unwrap(placeAgent(ctx));

      expect(pos.x).toBeGreaterThanOrEqual(1);
      expect(pos.x).toBeLessThanOrEqual(3);
      expect(pos.y).toBeGreaterThanOrEqual(1);
      expect(pos.y).toBeLessThanOrEqual(3);
      expect(pos).not.toEqual({ x: 2, y: 2 });
      expect(getObjectAt(ctx.world, offsetPos(pos, ctx.world.agent.dir))).toBeUndefined();
    }
  });

  it("reports exhaustion when the room is full", () => {
    const ctx = makeTestWorld(1, 1, 3);
    putItem(ctx.world, ObjectKind.Key, Color.Blue, 1, 1);
    const result = placeAgent(ctx);
    expect(isViolation(result) && result.violation).toBe(ViolationKind.PlacementExhausted);
    expect(ctx.world.agent.pos).toBeNull();
  });

  it("rejects a start that cannot reach every object when asked to", () => {
    const ctx = makeTestWorld(1, 2, 5);
    putDoor(ctx, 0, 0, Side.East, Color.Red, DoorState.Locked);
    putItem(ctx.world, ObjectKind.Ball, Color.Red, 6, 2);

    const result = placeAgent(ctx, { col: 0, row: 0, requireReachable: true });
    expect(isViolation(result) && result.violation).toBe(ViolationKind.UnreachableObject);
    expect(isViolation(result) && result.reason).toBe("red ball at (6, 2) is unreachable");

    // Without the check the same placement is accepted
    expect(isViolation(placeAgent(ctx, { col: 0, row: 0 }))).toBe(false);
  });

  it("accepts the start once the key is on the agent's side", () => {
    for (const seed of [1, 2, 3]) {
      const ctx = makeTestWorld(1, 2, 5, seed);
      putDoor(ctx, 0, 0, Side.East, Color.Red, DoorState.Locked);
      putItem(ctx.world, ObjectKind.Ball, Color.Red, 6, 2);
      putItem(ctx.world, ObjectKind.Key, Color.Red, 1, 1);

      const pos = unwrap(placeAgent(ctx, { col: 0, row: 0, requireReachable: true }));
      expect(pos.x).toBeLessThanOrEqual(3);
    }
  });
});

describe("putAgent", () => {
  it("places the agent on an exact free cell", () => {
    const ctx = makeTestWorld(1, 1, 5);
    expect(unwrap(putAgent(ctx, { x: 1, y: 3 }, Side.North))).toEqual({ x: 1, y: 3 });
    expect(ctx.world.agent.dir).toBe(Side.North);
  });

  it("refuses a wall cell", () => {
    const ctx = makeTestWorld(1, 1, 5);
    const result = putAgent(ctx, { x: 0, y: 2 }, Side.East);
    expect(isViolation(result) && result.violation).toBe(ViolationKind.PlacementExhausted);
  });
});

describe("addObject", () => {
  it("keeps new objects at least two steps from the agent", () => {
    const ctx = makeTestWorld(1, 1, 5);
    setAgent(ctx.world, 2, 2, Side.East);

    const cells: (Position | null)[] = [];
    for (let i = 0; i < 4; i++) {
      cells.push(unwrap(addObject(ctx, 0, 0)).pos);
    }
    expect(cells).toEqual(
      expect.arrayContaining([{ x: 1, y: 1 }, { x: 3, y: 1 }, { x: 1, y: 3 }, { x: 3, y: 3 }]),
    );

    const fifth = addObject(ctx, 0, 0);
    expect(isViolation(fifth) && fifth.violation).toBe(ViolationKind.PlacementExhausted);
  });

  it("registers the object with its room", () => {
    const ctx = makeTestWorld(1, 2, 5);
    const obj = unwrap(addObject(ctx, 1, 0, { kind: ObjectKind.Ball, color: Color.Purple }));
    expect(obj.kind).toBe(ObjectKind.Ball);
    expect(obj.color).toBe(Color.Purple);
    expect(ctx.world.rooms[1].objects).toEqual([obj.id]);
    expect(ctx.world.rooms[0].objects).toEqual([]);
  });

  it("keeps contents only for boxes", () => {
    const ctx = makeTestWorld(1, 1, 6);
    const contents = { kind: ObjectKind.Key, color: Color.Yellow } as const;
    const box = unwrap(addObject(ctx, 0, 0, { kind: ObjectKind.Box, contents }));
    const ball = unwrap(addObject(ctx, 0, 0, { kind: ObjectKind.Ball, contents }));
    expect(box.contents).toEqual(contents);
    expect(ball.contents).toBeNull();
  });
});

describe("putObject", () => {
  it("refuses occupied and wall cells", () => {
    const ctx = makeTestWorld(1, 1, 5);
    unwrap(putObject(ctx, { kind: ObjectKind.Key, color: Color.Red }, { x: 2, y: 2 }));

    const onTop = putObject(ctx, { kind: ObjectKind.Ball, color: Color.Red }, { x: 2, y: 2 });
    const onWall = putObject(ctx, { kind: ObjectKind.Ball, color: Color.Red }, { x: 0, y: 1 });
    expect(isViolation(onTop) && onTop.violation).toBe(ViolationKind.PlacementExhausted);
    expect(isViolation(onWall) && onWall.violation).toBe(ViolationKind.PlacementExhausted);
    expect(isCellFree(ctx.world, { x: 3, y: 3 })).toBe(true);
  });
});

describe("addDistractors", () => {
  it("never repeats a kind and color when all are unique (1000 seeds)", () => {
    for (let seed = 0; seed < 1000; seed++) {
      const ctx = makeTestWorld(1, 1, 8, seed);
      putItem(ctx.world, ObjectKind.Ball, Color.Red, 1, 1);
      const dists = unwrap(addDistractors(ctx, { count: 10 }));

      const pairs = new Set(dists.map((d) => `${d.kind}:${d.color}`));
      expect(pairs.size).toBe(10);
      expect(pairs.has("ball:red")).toBe(false);
    }
  });

  it("runs out of combinations after eighteen unique items", () => {
    const ctx = makeTestWorld(1, 1, 8);
    const result = addDistractors(ctx, { count: 19 });
    expect(isViolation(result) && result.violation).toBe(ViolationKind.PlacementExhausted);
  });

  it("stays inside the requested room", () => {
    const ctx = makeTestWorld(2, 2, 5, 9);
    const dists = unwrap(addDistractors(ctx, { col: 1, row: 1, count: 3, allUnique: false }));
    expect(ctx.world.rooms[3].objects).toEqual(dists.map((d) => d.id));
  });
});
