import { describe, it, expect } from "vitest";
import { randObj, randomInstruction } from "../src/sim/randomInstr.js";
import { atomicNodes, descriptorsOf } from "../src/sim/instructions.js";
import { resolveDescriptor } from "../src/sim/descriptors.js";
import { MAX_SEED, MissionRandom, isValidSeed } from "../src/sim/rng.js";
import { ViolationKind, isViolation } from "../src/sim/violations.js";
import { Color, DoorState, ObjectKind, Side } from "../src/shared/types.js";
import { makeTestWorld, putDoor, putItem, setAgent, unwrap } from "./helpers.js";

function furnished(seed: number) {
  const ctx = makeTestWorld(1, 2, 5, seed);
  putDoor(ctx, 0, 0, Side.East, Color.Yellow, DoorState.Closed);
  setAgent(ctx.world, 2, 2, Side.South);
  putItem(ctx.world, ObjectKind.Ball, Color.Red, 1, 1);
  putItem(ctx.world, ObjectKind.Key, Color.Blue, 3, 3);
  putItem(ctx.world, ObjectKind.Box, Color.Green, 6, 2);
  return ctx;
}

describe("randObj", () => {
  it("only returns descriptors that name something", () => {
    for (let seed = 0; seed < 50; seed++) {
      const ctx = furnished(seed);
      const desc = unwrap(randObj(ctx, undefined, true));
      expect(desc.type).toBeDefined();
      expect(resolveDescriptor(ctx.world, desc).length).toBeGreaterThan(0);
    }
  });

  it("gives up when no object of the requested kind exists", () => {
    const ctx = makeTestWorld(1, 1, 5);
    setAgent(ctx.world, 2, 2, Side.East);
    const result = randObj(ctx, [ObjectKind.Door]);
    expect(isViolation(result) && result.violation).toBe(ViolationKind.AmbiguousOrDegenerateDescriptor);
    expect(isViolation(result) && result.reason).toBe("no matching door descriptor after 100 draws");
  });
});

describe("randomInstruction", () => {
  it("builds trees whose leaves all resolve", () => {
    for (let seed = 0; seed < 50; seed++) {
      const ctx = furnished(seed);
      const instr = unwrap(randomInstruction(ctx, { locations: true }));
      for (const leaf of atomicNodes(instr)) {
        for (const desc of descriptorsOf(leaf)) {
          expect(resolveDescriptor(ctx.world, desc).length).toBeGreaterThan(0);
        }
      }
    }
  });

  it("respects the allowed action and instruction kinds", () => {
    for (let seed = 0; seed < 20; seed++) {
      const ctx = furnished(seed);
      const instr = unwrap(randomInstruction(ctx, { actionKinds: ["pickup"], instrKinds: ["and"] }));
      expect(instr.kind).toBe("and");
      for (const leaf of atomicNodes(instr)) {
        expect(leaf.kind).toBe("pickup");
        expect(leaf.kind === "pickup" && leaf.desc.type).not.toBe(ObjectKind.Door);
      }
    }
  });

  it("nests conjunctions only under sequences", () => {
    for (let seed = 0; seed < 20; seed++) {
      const ctx = furnished(seed);
      const instr = unwrap(randomInstruction(ctx, { actionKinds: ["goto"], instrKinds: ["seq"] }));
      expect(["before", "after"]).toContain(instr.kind);
      if (instr.kind !== "before" && instr.kind !== "after") continue;
      for (const child of [instr.a, instr.b]) {
        expect(["goto", "and"]).toContain(child.kind);
      }
    }
  });
});

describe("MissionRandom", () => {
  it("repeats its stream for a seed", () => {
    const a = new MissionRandom(9);
    const b = new MissionRandom(9);
    const draws = (rng: MissionRandom) => Array.from({ length: 20 }, () => rng.int(0, 1000));
    expect(draws(a)).toEqual(draws(b));
  });

  it("keeps draws within range and subsets distinct", () => {
    const rng = new MissionRandom(3);
    for (let i = 0; i < 200; i++) {
      const n = rng.int(2, 5);
      expect(n).toBeGreaterThanOrEqual(2);
      expect(n).toBeLessThan(5);
    }
    const picked = rng.subset([1, 2, 3, 4, 5, 6], 4);
    expect(new Set(picked).size).toBe(4);
  });

  it("rejects empty ranges and oversized subsets", () => {
    const rng = new MissionRandom(3);
    expect(() => rng.int(4, 4)).toThrow(RangeError);
    expect(() => rng.elem([])).toThrow("cannot draw from an empty list");
    expect(() => rng.subset([1, 2], 3)).toThrow("cannot draw 3 of 2 elements");
  });

  it("accepts only seeds that map to their own stream", () => {
    expect(isValidSeed(1)).toBe(true);
    expect(isValidSeed(184201)).toBe(true);
    expect(isValidSeed(MAX_SEED)).toBe(true);
    expect(isValidSeed(0)).toBe(false);
    expect(isValidSeed(-5)).toBe(false);
    expect(isValidSeed(MAX_SEED + 1)).toBe(false);
    expect(isValidSeed(2.5)).toBe(false);
    expect(isValidSeed(Number.NaN)).toBe(false);
  });
});
