/**
 * Instruction AST: four atomic goals and three combinators.
 *
 * The tree is immutable once a mission is built. Progress through it is
 * tracked separately by the Verifier.
 */
import type { World } from "../shared/types.js";
import { ObjectKind } from "../shared/types.js";
import type { ObjDesc } from "./descriptors.js";
import { describeObject, isDegenerate, resolveDescriptor } from "./descriptors.js";
import { manhattan } from "./rooms.js";
import type { ConstraintViolation } from "./violations.js";
import { ViolationKind, reject } from "./violations.js";

export interface GoToInstr {
  kind: "goto";
  desc: ObjDesc;
  strict: boolean;
}

export interface OpenInstr {
  kind: "open";
  desc: ObjDesc;
  strict: boolean;
}

export interface PickupInstr {
  kind: "pickup";
  desc: ObjDesc;
  strict: boolean;
}

export interface PutNextInstr {
  kind: "putnext";
  move: ObjDesc;
  fixed: ObjDesc;
  strict: boolean;
}

/** A, then B. */
export interface BeforeInstr {
  kind: "before";
  a: Instruction;
  b: Instruction;
}

/** A after B: B first. */
export interface AfterInstr {
  kind: "after";
  a: Instruction;
  b: Instruction;
}

/** Both, in any order. */
export interface AndInstr {
  kind: "and";
  a: Instruction;
  b: Instruction;
}

export type AtomicInstruction = GoToInstr | OpenInstr | PickupInstr | PutNextInstr;
export type CombinatorInstruction = BeforeInstr | AfterInstr | AndInstr;
export type Instruction = AtomicInstruction | CombinatorInstruction;

// ── Constructors ─────────────────────────────────────────────

export function goTo(desc: ObjDesc, strict = false): GoToInstr {
  return { kind: "goto", desc, strict };
}

export function open(desc: ObjDesc, strict = false): OpenInstr {
  return { kind: "open", desc, strict };
}

export function pickup(desc: ObjDesc, strict = false): PickupInstr {
  return { kind: "pickup", desc, strict };
}

export function putNext(move: ObjDesc, fixed: ObjDesc, strict = false): PutNextInstr {
  return { kind: "putnext", move, fixed, strict };
}

export function before(a: Instruction, b: Instruction): BeforeInstr {
  return { kind: "before", a, b };
}

export function after(a: Instruction, b: Instruction): AfterInstr {
  return { kind: "after", a, b };
}

export function and(a: Instruction, b: Instruction): AndInstr {
  return { kind: "and", a, b };
}

export function isAtomic(instr: Instruction): instr is AtomicInstruction {
  return instr.kind === "goto" || instr.kind === "open" || instr.kind === "pickup" || instr.kind === "putnext";
}

// ── Traversal ────────────────────────────────────────────────

/** Atomic leaves in left-to-right order. */
export function atomicNodes(instr: Instruction): AtomicInstruction[] {
  if (isAtomic(instr)) return [instr];
  return [...atomicNodes(instr.a), ...atomicNodes(instr.b)];
}

export function descriptorsOf(instr: AtomicInstruction): ObjDesc[] {
  return instr.kind === "putnext" ? [instr.move, instr.fixed] : [instr.desc];
}

/**
 * Number of navigation legs the instruction needs; drives the step limit.
 */
export function navigationCount(instr: Instruction): number {
  switch (instr.kind) {
    case "goto":
    case "open":
    case "pickup":
      return 1;
    case "putnext":
      return 2;
    case "before":
    case "after":
    case "and":
      return navigationCount(instr.a) + navigationCount(instr.b);
  }
}

/**
 * Natural-language rendering, e.g. "open the red door, then pick up a ball".
 */
export function describeInstruction(world: World, instr: Instruction): string {
  switch (instr.kind) {
    case "goto":
      return `go to ${describeObject(world, instr.desc)}`;
    case "open":
      return `open ${describeObject(world, instr.desc)}`;
    case "pickup":
      return `pick up ${describeObject(world, instr.desc)}`;
    case "putnext":
      return `put ${describeObject(world, instr.move)} next to ${describeObject(world, instr.fixed)}`;
    case "before":
      return `${describeInstruction(world, instr.a)}, then ${describeInstruction(world, instr.b)}`;
    case "after":
      return `${describeInstruction(world, instr.a)} after you ${describeInstruction(world, instr.b)}`;
    case "and":
      return `${describeInstruction(world, instr.a)} and ${describeInstruction(world, instr.b)}`;
  }
}

// ── Generation-time validation ───────────────────────────────

function validateAtomic(world: World, instr: AtomicInstruction): ConstraintViolation | null {
  for (const desc of descriptorsOf(instr)) {
    if (isDegenerate(desc)) {
      return reject(ViolationKind.AmbiguousOrDegenerateDescriptor, `${instr.kind} has a descriptor with no attributes`);
    }
    if (resolveDescriptor(world, desc).length === 0) {
      return reject(
        ViolationKind.AmbiguousOrDegenerateDescriptor,
        `no object matches "${describeObject(world, desc)}" for ${instr.kind}`,
      );
    }
  }

  if (instr.kind === "open") {
    if (!resolveDescriptor(world, instr.desc).some((o) => o.kind === ObjectKind.Door)) {
      return reject(ViolationKind.AmbiguousOrDegenerateDescriptor, "open target matches no door");
    }
  }
  if (instr.kind === "pickup") {
    if (resolveDescriptor(world, instr.desc).every((o) => o.kind === ObjectKind.Door)) {
      return reject(ViolationKind.AmbiguousOrDegenerateDescriptor, "pickup target matches only doors");
    }
  }

  if (instr.kind === "putnext") {
    const moving = resolveDescriptor(world, instr.move);
    const fixed = resolveDescriptor(world, instr.fixed);
    const fixedIds = new Set(fixed.map((o) => o.id));
    if (moving.some((o) => fixedIds.has(o.id))) {
      return reject(
        ViolationKind.AmbiguousOrDegenerateDescriptor,
        "an object matches both sides of put-next",
      );
    }
    for (const a of moving) {
      for (const b of fixed) {
        if (a.pos && b.pos && manhattan(a.pos, b.pos) === 1) {
          return reject(ViolationKind.AmbiguousOrDegenerateDescriptor, "put-next objects are already adjacent");
        }
      }
    }
  }
  return null;
}

/**
 * Reject instructions that could never be satisfied, or are satisfied before
 * the agent does anything.
 */
export function validateInstruction(world: World, instr: Instruction): ConstraintViolation | null {
  if (isAtomic(instr)) return validateAtomic(world, instr);
  return validateInstruction(world, instr.a) ?? validateInstruction(world, instr.b);
}
