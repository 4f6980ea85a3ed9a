// ── Harness types for scripted and interactive drivers ──────

/**
 * Structured observation of a running episode, rendered as text by
 * renderObservationAsText().
 */
export interface HarnessObservation {
  step: number;
  maxSteps: number;
  seed: number;
  level: string;
  mission: string;            // instruction text
  done: boolean;
  verdict: string;            // pending, ongoing, partial_success, success, failure
  reward: number;
  pos: { x: number; y: number };
  facing: string;             // east, south, west, north
  carrying: string | null;    // "red key" or null
  currentRoom: string;        // "(col, row)"
  front: string;              // what is in the cell ahead
  completedGoals: string[];
  mapText: string;
  poi: PoiEntry[];
  validActions: ValidAction[];
  recentLogs: string[];       // last 10 log messages
}

/**
 * An object in the agent's current room.
 */
export interface PoiEntry {
  id: string;
  kind: string;
  color: string;
  pos: { x: number; y: number };
  distance: number;           // manhattan distance from the agent
  state?: string;             // doors only
}

/**
 * A single action the agent can usefully take this step.
 */
export interface ValidAction {
  action: string;             // LEFT, RIGHT, FORWARD, PICKUP, DROP, TOGGLE, DONE
  description: string;
}

/**
 * An action submitted by a driver.
 */
export interface HarnessAction {
  action: string;
}
