/**
 * Step-wise instruction verifier.
 *
 * One Verifier per mission. It mirrors the instruction tree with mutable
 * progress nodes and is fed every committed world delta, in order. It reads
 * the world to resolve descriptors and never writes to it.
 *
 * Ordering rule for Before/After: the second goal is only evaluated on steps
 * that come after the step on which the first goal completed, so an action
 * performed too early never counts.
 *
 * Descriptors with a location ("the ball on your left") are resolved once,
 * when the verifier is built, against the agent's starting pose. The agent
 * has to turn towards an object to act on it, so a location worked out at
 * action time would always read "front".
 */
import type { ObjectId, Position, World, WorldDelta, WorldObject } from "../shared/types.js";
import { ActionType, DoorState } from "../shared/types.js";
import type { ObjDesc } from "./descriptors.js";
import { matchesDescriptor, resolveDescriptor } from "./descriptors.js";
import type { AtomicInstruction, Instruction } from "./instructions.js";
import { descriptorsOf, isAtomic } from "./instructions.js";
import { manhattan, offsetPos, samePos } from "./rooms.js";

export type Verdict =
  | { status: "pending" }
  | { status: "ongoing"; completed: AtomicInstruction[] }
  | { status: "partial_success"; node: AtomicInstruction }
  | { status: "success" }
  | { status: "failure"; reason: string };

/** Which side of a node's parent it hangs from, "a" or "b" as in the instruction tree. */
export type TreeStep = "a" | "b";

/** Descriptor bound to the world the verifier watches. */
type Matcher = (obj: WorldObject) => boolean;

interface AtomicProgress {
  kind: "atomic";
  instr: AtomicInstruction;
  /** The goal's object; for PutNext, the object to move. */
  target: Matcher;
  /** PutNext only: the object to put it next to. */
  fixed: Matcher | null;
  done: boolean;
}

interface SequenceProgress {
  kind: "sequence";
  first: ProgressNode;
  second: ProgressNode;
  done: boolean;
}

interface AndProgress {
  kind: "and";
  a: ProgressNode;
  b: ProgressNode;
  done: boolean;
}

type ProgressNode = AtomicProgress | SequenceProgress | AndProgress;

function bindDescriptor(world: World, desc: ObjDesc): Matcher {
  if (desc.loc === undefined) {
    return (obj) => matchesDescriptor(world, desc, obj, null);
  }
  const ids = new Set<ObjectId>(resolveDescriptor(world, desc).map((obj) => obj.id));
  return (obj) => ids.has(obj.id);
}

function buildProgress(
  world: World,
  instr: Instruction,
  path: string,
  index: Map<string, ProgressNode>,
): ProgressNode {
  const child = (sub: Instruction, step: TreeStep) =>
    buildProgress(world, sub, path === "" ? step : `${path}.${step}`, index);

  let node: ProgressNode;
  if (isAtomic(instr)) {
    const [target, fixed] = descriptorsOf(instr).map((desc) => bindDescriptor(world, desc));
    node = { kind: "atomic", instr, target, fixed: fixed ?? null, done: false };
  } else if (instr.kind === "before") {
    node = { kind: "sequence", first: child(instr.a, "a"), second: child(instr.b, "b"), done: false };
  } else if (instr.kind === "after") {
    node = { kind: "sequence", first: child(instr.b, "b"), second: child(instr.a, "a"), done: false };
  } else {
    node = { kind: "and", a: child(instr.a, "a"), b: child(instr.b, "b"), done: false };
  }
  index.set(path, node);
  return node;
}

// ── Atomic conditions ────────────────────────────────────────

function hasNeighbor(world: World, matches: Matcher, exclude: WorldObject, near: Position): boolean {
  for (const [, obj] of world.objects) {
    if (obj.id === exclude.id || !obj.pos) continue;
    if (manhattan(obj.pos, near) === 1 && matches(obj)) {
      return true;
    }
  }
  return false;
}

function isSatisfied(world: World, node: AtomicProgress, action: ActionType, delta: WorldDelta): boolean {
  const { target, fixed } = node;
  switch (node.instr.kind) {
    case "goto": {
      const pose = delta.agentAfter;
      const front = offsetPos(pose.pos, pose.dir);
      for (const [, obj] of world.objects) {
        if (obj.pos && target(obj) && (samePos(obj.pos, front) || samePos(obj.pos, pose.pos))) {
          return true;
        }
      }
      return false;
    }

    case "open": {
      if (action !== ActionType.Toggle) return false;
      return delta.changes.some((change) => {
        if (!change.before || !change.after) return false;
        if (change.before.doorState === DoorState.Open || change.after.doorState !== DoorState.Open) return false;
        const obj = world.objects.get(change.objectId);
        return obj !== undefined && target(obj);
      });
    }

    case "pickup": {
      if (action !== ActionType.Pickup) return false;
      return delta.changes.some((change) => {
        if (!change.before || !change.after) return false;
        if (change.before.carried || !change.after.carried) return false;
        const obj = world.objects.get(change.objectId);
        return obj !== undefined && target(obj);
      });
    }

    case "putnext": {
      if (action !== ActionType.Drop || !fixed) return false;
      return delta.changes.some((change) => {
        if (!change.before?.carried || !change.after?.pos) return false;
        const obj = world.objects.get(change.objectId);
        if (!obj) return false;
        const at = change.after.pos;
        if (target(obj) && hasNeighbor(world, fixed, obj, at)) return true;
        return fixed(obj) && hasNeighbor(world, target, obj, at);
      });
    }
  }
}

// ── Verifier ─────────────────────────────────────────────────

export class Verifier {
  readonly instruction: Instruction;
  private readonly world: World;
  private readonly root: ProgressNode;
  private readonly index = new Map<string, ProgressNode>();
  private verdict: Verdict | null = null;

  constructor(world: World, instruction: Instruction) {
    this.world = world;
    this.instruction = instruction;
    this.root = buildProgress(world, instruction, "", this.index);
  }

  /** True once a terminal verdict has been reached. */
  get finished(): boolean {
    return this.verdict !== null;
  }

  /**
   * Evaluate one committed action. Must be called once per action, after
   * the world has been updated.
   */
  step(action: ActionType, delta: WorldDelta): Verdict {
    if (this.verdict) return this.verdict;

    const completed: AtomicInstruction[] = [];
    this.evaluate(this.root, action, delta, completed);

    if (this.root.done) {
      this.verdict = { status: "success" };
      return this.verdict;
    }
    const strictNode = completed.find((node) => node.strict);
    if (strictNode) {
      this.verdict = { status: "partial_success", node: strictNode };
      return this.verdict;
    }
    if (completed.length > 0) {
      return { status: "ongoing", completed };
    }
    return { status: "pending" };
  }

  /**
   * Signal from the episode authority that no more actions will come.
   */
  terminate(reason = "episode ended before the instruction was completed"): Verdict {
    if (!this.verdict) {
      this.verdict = { status: "failure", reason };
    }
    return this.verdict;
  }

  /**
   * Whether a node of the instruction tree has been completed. A node object
   * that appears more than once in the tree is done only once every
   * occurrence is; use isDoneAt to ask about a single occurrence.
   */
  isDone(instr: Instruction): boolean {
    const paths = this.pathsOf(instr);
    return paths.length > 0 && paths.every((path) => this.isDoneAt(path));
  }

  /** Whether the node reached by following `path` from the root is done. */
  isDoneAt(path: readonly TreeStep[]): boolean {
    return this.index.get(path.join("."))?.done ?? false;
  }

  private pathsOf(instr: Instruction): TreeStep[][] {
    const found: TreeStep[][] = [];
    const walk = (node: Instruction, path: TreeStep[]) => {
      if (node === instr) found.push(path);
      if (isAtomic(node)) return;
      walk(node.a, [...path, "a"]);
      walk(node.b, [...path, "b"]);
    };
    walk(this.instruction, []);
    return found;
  }

  /** Atomic goals completed so far, in tree order. */
  completedGoals(): AtomicInstruction[] {
    const out: AtomicInstruction[] = [];
    const walk = (node: ProgressNode) => {
      switch (node.kind) {
        case "atomic":
          if (node.done) out.push(node.instr);
          break;
        case "sequence":
          walk(node.first);
          walk(node.second);
          break;
        case "and":
          walk(node.a);
          walk(node.b);
          break;
      }
    };
    walk(this.root);
    return out;
  }

  private evaluate(node: ProgressNode, action: ActionType, delta: WorldDelta, completed: AtomicInstruction[]): void {
    if (node.done) return;
    switch (node.kind) {
      case "atomic":
        if (isSatisfied(this.world, node, action, delta)) {
          node.done = true;
          completed.push(node.instr);
        }
        return;

      case "sequence":
        // The second goal's clock starts on the step after the first completes
        if (node.first.done) {
          this.evaluate(node.second, action, delta, completed);
        } else {
          this.evaluate(node.first, action, delta, completed);
        }
        node.done = node.first.done && node.second.done;
        return;

      case "and":
        this.evaluate(node.a, action, delta, completed);
        this.evaluate(node.b, action, delta, completed);
        node.done = node.a.done && node.b.done;
        return;
    }
  }
}
