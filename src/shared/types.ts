// ── Coordinates ──────────────────────────────────────────────
export interface Position {
  x: number;
  y: number;
}

/**
 * Wall side of a room, also used as the agent's facing direction.
 * Numeric values match the order of DIRECTION_VECTORS.
 */
export enum Side {
  East = 0,
  South = 1,
  West = 2,
  North = 3,
}

// ── Tiles ────────────────────────────────────────────────────
export enum TileType {
  Floor = "floor",
  Wall = "wall",
}

// ── Objects ──────────────────────────────────────────────────
export type ObjectId = string;

export enum Color {
  Red = "red",
  Green = "green",
  Blue = "blue",
  Purple = "purple",
  Yellow = "yellow",
  Grey = "grey",
}

export enum ObjectKind {
  Door = "door",
  Key = "key",
  Ball = "ball",
  Box = "box",
}

export type ItemKind = Exclude<ObjectKind, ObjectKind.Door>;

export enum DoorState {
  Open = "open",
  Closed = "closed",
  Locked = "locked",
}

/** Kind and color of an item that does not exist yet (box contents, distractor draws). */
export interface ItemSpec {
  kind: ItemKind;
  color: Color;
}

export interface DoorObject {
  id: ObjectId;
  kind: ObjectKind.Door;
  color: Color;
  pos: Position;
  state: DoorState;
  link: number; // index into World.doors
}

export interface ItemObject {
  id: ObjectId;
  kind: ItemKind;
  color: Color;
  pos: Position | null; // null while carried
  contents: ItemSpec | null; // boxes only
}

export type WorldObject = DoorObject | ItemObject;

// ── Rooms and doors ──────────────────────────────────────────
export type RoomLink =
  | { kind: "door"; door: number }
  | { kind: "opening" };

export interface Room {
  index: number;
  col: number;
  row: number;
  top: Position;
  size: number;
  neighbors: (number | null)[]; // indexed by Side
  doorPos: (Position | null)[]; // indexed by Side
  links: (RoomLink | null)[]; // indexed by Side
  objects: ObjectId[];
  locked: boolean; // construction bookkeeping: room holds a locked door
}

export interface DoorLink {
  objectId: ObjectId;
  rooms: [number, number];
  side: Side; // relative to rooms[0]
}

// ── Agent ────────────────────────────────────────────────────
export interface Agent {
  pos: Position | null; // null until placed
  dir: Side;
  carrying: ObjectId | null;
}

// ── Logs ─────────────────────────────────────────────────────
export interface LogEntry {
  id: string;
  timestamp: number; // attempt number during generation, step count during play
  source: string;
  text: string;
  read: boolean;
}

// ── World ────────────────────────────────────────────────────
export interface World {
  seed: number;
  rows: number;
  cols: number;
  roomSize: number;
  width: number;
  height: number;
  tiles: TileType[][];
  rooms: Room[];
  doors: DoorLink[];
  objects: Map<ObjectId, WorldObject>;
  agent: Agent;
  nextObjectId: number;
  logs: LogEntry[];
}

// ── Actions and deltas ───────────────────────────────────────
export enum ActionType {
  Left = "left",
  Right = "right",
  Forward = "forward",
  Pickup = "pickup",
  Drop = "drop",
  Toggle = "toggle",
  Done = "done",
}

export interface AgentPose {
  pos: Position;
  dir: Side;
  carrying: ObjectId | null;
}

export interface ObjectSnapshot {
  kind: ObjectKind;
  color: Color;
  pos: Position | null;
  carried: boolean;
  doorState?: DoorState;
}

export interface ObjectChange {
  objectId: ObjectId;
  before: ObjectSnapshot | null; // null: created by this action
  after: ObjectSnapshot | null; // null: destroyed by this action
}

export interface WorldDelta {
  action: ActionType;
  actor: "agent";
  agentBefore: AgentPose;
  agentAfter: AgentPose;
  changes: ObjectChange[];
}
