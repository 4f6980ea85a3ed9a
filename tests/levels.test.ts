import { describe, it, expect } from "vitest";
import { getLevel, listLevels } from "../src/levels/index.js";
import { moveTwoAcross, putNextLevel } from "../src/levels/putNext.js";
import { generate } from "../src/sim/procgen.js";
import type { LevelTemplate } from "../src/sim/procgen.js";
import { validateInstruction } from "../src/sim/instructions.js";
import { isInBounds } from "../src/sim/rooms.js";
import { GenerationError } from "../src/sim/violations.js";
import { DoorState, ObjectKind } from "../src/shared/types.js";

function level(name: string): LevelTemplate {
  const template = getLevel(name);
  if (!template) throw new Error(`missing level ${name}`);
  return template;
}

describe("level registry", () => {
  it("has unique names", () => {
    const names = listLevels();
    expect(new Set(names).size).toBe(names.length);
    expect(names).toContain("GoToRedBlueBall");
    expect(names).toContain("PutNextS7N4Carrying");
    expect(names).toContain("RandomMission");
  });

  it("returns undefined for unknown names", () => {
    expect(getLevel("NoSuchLevel")).toBeUndefined();
  });
});

describe.each(listLevels())("level %s", (name) => {
  it("generates a valid mission for several seeds", () => {
    for (const seed of [1, 2, 3]) {
      const mission = generate(level(name), seed);
      const { world } = mission;

      expect(mission.level).toBe(name);
      expect(mission.text.length).toBeGreaterThan(0);
      expect(mission.maxSteps).toBeGreaterThan(0);
      expect(world.agent.pos).not.toBeNull();
      for (const [, obj] of world.objects) {
        if (obj.pos) expect(isInBounds(world, obj.pos)).toBe(true);
      }
      if (world.agent.carrying === null) {
        expect(validateInstruction(world, mission.instruction)).toBeNull();
      }
    }
  });
});

describe("level details", () => {
  it("hands the agent the object to move in carrying variants", () => {
    const mission = generate(level("PutNextS6N3Carrying"), 11);
    const carried = mission.world.agent.carrying;
    expect(carried).not.toBeNull();
    const obj = carried === null ? undefined : mission.world.objects.get(carried);
    expect(obj?.pos).toBeNull();
    expect(mission.instruction.kind).toBe("putnext");
  });

  it("starts the unlock levels with a locked door", () => {
    const mission = generate(level("UnlockLocal"), 4);
    const doors = [...mission.world.objects.values()].filter((obj) => obj.kind === ObjectKind.Door);
    expect(doors).toHaveLength(1);
    expect(doors[0].kind === ObjectKind.Door && doors[0].state).toBe(DoorState.Locked);
    expect(mission.text).toBe("open the door");
  });

  it("names the red or blue ball in GoToRedBlueBall", () => {
    const mission = generate(level("GoToRedBlueBall"), 8);
    expect(["go to the red ball", "go to the blue ball"]).toContain(mission.text);
  });

  it("rejects put-next shapes that cannot hold their objects", () => {
    expect(() => putNextLevel(3, 1)).toThrow(GenerationError);
    expect(() => moveTwoAcross(8, 10)).toThrow("at most 9 objects per room, got 10");
  });
});
