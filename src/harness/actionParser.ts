import { z } from "zod";
import type { World } from "../shared/types.js";
import { ActionType } from "../shared/types.js";
import { isValidAction } from "../sim/actions.js";
import type { HarnessAction, ValidAction } from "./types.js";

// ── Action names ─────────────────────────────────────────────

const ACTION_MAP: Record<string, ActionType> = {
  LEFT: ActionType.Left,
  RIGHT: ActionType.Right,
  FORWARD: ActionType.Forward,
  PICKUP: ActionType.Pickup,
  DROP: ActionType.Drop,
  TOGGLE: ActionType.Toggle,
  DONE: ActionType.Done,
};

const ACTION_LABELS: Record<ActionType, string> = {
  [ActionType.Left]: "Turn left",
  [ActionType.Right]: "Turn right",
  [ActionType.Forward]: "Move forward",
  [ActionType.Pickup]: "Pick up the object ahead",
  [ActionType.Drop]: "Drop the carried object ahead",
  [ActionType.Toggle]: "Open, close or unlock the door ahead, or open the box ahead",
  [ActionType.Done]: "Declare the mission done",
};

const HarnessActionSchema = z.object({ action: z.string().min(1) });

// ── Action parsing ───────────────────────────────────────────

/**
 * Parse a line from a driver into an ActionType or an error.
 *
 * Accepted input:
 *   {"action": "FORWARD"}
 *   forward
 */
export function parseAction(input: string): ActionType | { error: string } {
  const trimmed = input.trim();
  let parsed: HarnessAction;

  if (trimmed.startsWith("{")) {
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      return { error: `Invalid JSON: ${trimmed}` };
    }
    const result = HarnessActionSchema.safeParse(json);
    if (!result.success) {
      return { error: `Missing or invalid "action" field` };
    }
    parsed = result.data;
  } else {
    parsed = { action: trimmed };
  }

  const action = ACTION_MAP[parsed.action.toUpperCase()];
  if (action === undefined) {
    return { error: `Unknown action "${parsed.action}". Valid: ${Object.keys(ACTION_MAP).join(", ")}.` };
  }
  return action;
}

// ── Valid action enumeration ─────────────────────────────────

/**
 * Actions that would change something this step. DONE is always listed.
 */
export function getValidActions(world: World): ValidAction[] {
  const actions: ValidAction[] = [];
  for (const [name, action] of Object.entries(ACTION_MAP)) {
    if (isValidAction(world, action)) {
      actions.push({ action: name, description: describeAction(action) });
    }
  }
  return actions;
}

export function describeAction(action: ActionType): string {
  return ACTION_LABELS[action];
}
