import { describe, it, expect } from "vitest";
import { describeObject, isDegenerate, resolveDescriptor } from "../src/sim/descriptors.js";
import {
  after, and, before, describeInstruction, goTo, navigationCount, open, pickup, putNext, validateInstruction,
} from "../src/sim/instructions.js";
import { ViolationKind } from "../src/sim/violations.js";
import { Color, ObjectKind, Side } from "../src/shared/types.js";
import { makeTestWorld, putDoor, putItem, setAgent } from "./helpers.js";

/**
 * 7x7 room, agent in the middle facing east:
 *   red ball ahead, green key behind, yellow box to the left, blue ball to the right.
 */
function compass() {
  const ctx = makeTestWorld(1, 1, 7);
  const { world } = ctx;
  setAgent(world, 3, 3, Side.East);
  const redBall = putItem(world, ObjectKind.Ball, Color.Red, 5, 3);
  const greenKey = putItem(world, ObjectKind.Key, Color.Green, 1, 3);
  const yellowBox = putItem(world, ObjectKind.Box, Color.Yellow, 3, 1);
  const blueBall = putItem(world, ObjectKind.Ball, Color.Blue, 3, 5);
  return { ctx, world, redBall, greenKey, yellowBox, blueBall };
}

describe("resolveDescriptor", () => {
  it("matches by type and color", () => {
    const { world, redBall, blueBall } = compass();
    expect(resolveDescriptor(world, { type: ObjectKind.Ball })).toEqual([redBall, blueBall]);
    expect(resolveDescriptor(world, { color: Color.Blue })).toEqual([blueBall]);
    expect(resolveDescriptor(world, { type: ObjectKind.Key, color: Color.Red })).toEqual([]);
  });

  it("matches locations relative to the agent's heading", () => {
    const { world, redBall, greenKey, yellowBox, blueBall } = compass();
    expect(resolveDescriptor(world, { loc: "front" })).toEqual([redBall]);
    expect(resolveDescriptor(world, { loc: "behind" })).toEqual([greenKey]);
    expect(resolveDescriptor(world, { loc: "left" })).toEqual([yellowBox]);
    expect(resolveDescriptor(world, { loc: "right" })).toEqual([blueBall]);
  });

  it("re-evaluates locations after the agent turns", () => {
    const { world, redBall, yellowBox } = compass();
    world.agent.dir = Side.North;
    expect(resolveDescriptor(world, { loc: "front" })).toEqual([yellowBox]);
    expect(resolveDescriptor(world, { loc: "right" })).toEqual([redBall]);
  });

  it("skips carried objects", () => {
    const { world, redBall, blueBall } = compass();
    redBall.pos = null;
    world.agent.carrying = redBall.id;
    expect(resolveDescriptor(world, { type: ObjectKind.Ball })).toEqual([blueBall]);
  });

  it("limits locations to the agent's room", () => {
    const ctx = makeTestWorld(1, 2, 5);
    setAgent(ctx.world, 2, 2, Side.East);
    putItem(ctx.world, ObjectKind.Ball, Color.Red, 6, 2);
    expect(resolveDescriptor(ctx.world, { type: ObjectKind.Ball, loc: "front" })).toEqual([]);
    expect(resolveDescriptor(ctx.world, { type: ObjectKind.Ball })).toHaveLength(1);
  });
});

describe("describeObject", () => {
  it("uses the definite article for a unique match", () => {
    const { world } = compass();
    expect(describeObject(world, { type: ObjectKind.Ball, color: Color.Red })).toBe("the red ball");
    expect(describeObject(world, { type: ObjectKind.Ball })).toBe("a ball");
    expect(describeObject(world, { type: ObjectKind.Box, color: Color.Green })).toBe("a green box");
  });

  it("renders locations", () => {
    const { world } = compass();
    expect(describeObject(world, { loc: "left" })).toBe("the object on your left");
    expect(describeObject(world, { type: ObjectKind.Key, loc: "behind" })).toBe("the key behind you");
    expect(describeObject(world, { type: ObjectKind.Ball, loc: "front" })).toBe("the ball in front of you");
  });

  it("flags a descriptor with no attributes", () => {
    expect(isDegenerate({})).toBe(true);
    expect(isDegenerate({ loc: "right" })).toBe(false);
  });
});

describe("describeInstruction", () => {
  it("joins combinators into a sentence", () => {
    const { world } = compass();
    const red = { type: ObjectKind.Ball, color: Color.Red };
    const box = { type: ObjectKind.Box };

    expect(describeInstruction(world, before(pickup(red), goTo(box)))).toBe(
      "pick up the red ball, then go to the box",
    );
    expect(describeInstruction(world, after(goTo(box), pickup(red)))).toBe(
      "go to the box after you pick up the red ball",
    );
    expect(describeInstruction(world, and(goTo(box), putNext(red, { type: ObjectKind.Key })))).toBe(
      "go to the box and put the red ball next to the key",
    );
  });

  it("counts navigation legs", () => {
    const instr = before(and(goTo({ color: Color.Red }), putNext({ color: Color.Blue }, { color: Color.Red })), pickup({ color: Color.Red }));
    expect(navigationCount(instr)).toBe(4);
  });
});

describe("validateInstruction", () => {
  it("accepts a goal that names an existing object", () => {
    const { world } = compass();
    expect(validateInstruction(world, goTo({ type: ObjectKind.Box }))).toBeNull();
  });

  it("rejects degenerate and unmatched descriptors", () => {
    const { world } = compass();
    expect(validateInstruction(world, goTo({}))?.violation).toBe(ViolationKind.AmbiguousOrDegenerateDescriptor);
    expect(validateInstruction(world, pickup({ color: Color.Purple }))?.reason).toBe(
      'no object matches "a purple object" for pickup',
    );
  });

  it("checks every leaf of a combinator", () => {
    const { world } = compass();
    const result = validateInstruction(world, before(goTo({ type: ObjectKind.Box }), goTo({ color: Color.Grey })));
    expect(result?.reason).toBe('no object matches "a grey object" for goto');
  });

  it("requires open to name a door and pickup to name an item", () => {
    const ctx = makeTestWorld(1, 2, 5);
    setAgent(ctx.world, 2, 2, Side.East);
    putDoor(ctx, 0, 0, Side.East, Color.Red);
    putItem(ctx.world, ObjectKind.Ball, Color.Red, 1, 1);

    expect(validateInstruction(ctx.world, open({ color: Color.Red }))).toBeNull();
    expect(validateInstruction(ctx.world, open({ type: ObjectKind.Ball }))?.reason).toBe("open target matches no door");
    expect(validateInstruction(ctx.world, pickup({ type: ObjectKind.Door }))?.reason).toBe(
      "pickup target matches only doors",
    );
  });

  it("rejects put-next goals that are already met or overlap", () => {
    const { world } = compass();
    putItem(world, ObjectKind.Key, Color.Red, 5, 4);

    expect(
      validateInstruction(world, putNext({ type: ObjectKind.Ball, color: Color.Red }, { type: ObjectKind.Key, color: Color.Red }))?.reason,
    ).toBe("put-next objects are already adjacent");
    expect(validateInstruction(world, putNext({ type: ObjectKind.Ball }, { color: Color.Blue }))?.reason).toBe(
      "an object matches both sides of put-next",
    );
    expect(validateInstruction(world, putNext({ color: Color.Green }, { color: Color.Yellow }))).toBeNull();
  });
});
