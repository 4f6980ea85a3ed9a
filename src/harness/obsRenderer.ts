import type { World, WorldObject } from "../shared/types.js";
import { ObjectKind } from "../shared/types.js";
import { SIDE_NAMES } from "../shared/constants.js";
import type { Episode } from "../sim/episode.js";
import { describeInstruction } from "../sim/instructions.js";
import { getFrontPos, getObjectAt, getRoomAt, isInRoom, manhattan } from "../sim/rooms.js";
import { renderToString } from "../render/terminal.js";
import { getValidActions } from "./actionParser.js";
import type { HarnessObservation, PoiEntry } from "./types.js";

function nameOf(obj: WorldObject): string {
  return `${obj.color} ${obj.kind}`;
}

function describeFront(world: World): string {
  const front = getFrontPos(world);
  if (!front) return "nothing";
  const obj = getObjectAt(world, front);
  if (obj) {
    return obj.kind === ObjectKind.Door ? `${obj.state} ${nameOf(obj)}` : nameOf(obj);
  }
  return world.tiles[front.y][front.x];
}

/**
 * Build a structured observation from the episode. The whole grid is
 * visible; points of interest are limited to the agent's room.
 */
export function buildObservation(episode: Episode): HarnessObservation {
  const { world, mission } = episode;
  const pos = world.agent.pos ?? { x: 0, y: 0 };
  const room = getRoomAt(world, pos);

  const poi: PoiEntry[] = [];
  for (const [, obj] of world.objects) {
    if (!obj.pos || !isInRoom(room, obj.pos)) continue;
    const entry: PoiEntry = {
      id: obj.id,
      kind: obj.kind,
      color: obj.color,
      pos: { ...obj.pos },
      distance: manhattan(pos, obj.pos),
    };
    if (obj.kind === ObjectKind.Door) entry.state = obj.state;
    poi.push(entry);
  }
  poi.sort((a, b) => a.distance - b.distance);

  const carried = world.agent.carrying ? world.objects.get(world.agent.carrying) : undefined;

  return {
    step: episode.steps,
    maxSteps: mission.maxSteps,
    seed: mission.seed,
    level: mission.level,
    mission: mission.text,
    done: episode.done,
    verdict: episode.verdict.status,
    reward: episode.reward,
    pos: { ...pos },
    facing: SIDE_NAMES[world.agent.dir],
    carrying: carried ? nameOf(carried) : null,
    currentRoom: `(${room.col}, ${room.row})`,
    front: describeFront(world),
    completedGoals: episode.verifier.completedGoals().map((goal) => describeInstruction(world, goal)),
    mapText: renderToString(world),
    poi,
    validActions: episode.done ? [] : getValidActions(world),
    recentLogs: world.logs.slice(-10).map((log) => `[${log.source}] ${log.text}`),
  };
}

/**
 * Render a HarnessObservation to a human/LLM-readable text block.
 */
export function renderObservationAsText(obs: HarnessObservation): string {
  const lines: string[] = [];

  // Header
  lines.push(`=== STEP ${obs.step}/${obs.maxSteps} | SEED ${obs.seed} | ${obs.level} ===`);
  lines.push(`MISSION: ${obs.mission}`);
  lines.push(
    `Room: ${obs.currentRoom} | Pos: (${obs.pos.x}, ${obs.pos.y}) | Facing: ${obs.facing} | Carrying: ${obs.carrying ?? "nothing"}`,
  );
  lines.push(`Ahead: ${obs.front}`);

  if (obs.done) {
    lines.push(`>>> ${obs.verdict.toUpperCase()} (reward ${obs.reward.toFixed(3)}) <<<`);
  }

  if (obs.completedGoals.length > 0) {
    lines.push("");
    lines.push("COMPLETED:");
    for (const goal of obs.completedGoals) {
      lines.push(`  + ${goal}`);
    }
  }

  // Map
  lines.push("");
  lines.push("MAP (arrow = you):");
  lines.push(obs.mapText);

  // POI
  if (obs.poi.length > 0) {
    lines.push("");
    lines.push("OBJECTS IN ROOM:");
    for (const p of obs.poi) {
      const state = p.state ? ` [${p.state}]` : "";
      lines.push(`  ${p.id.padEnd(8)} ${`${p.color} ${p.kind}`.padEnd(14)} (${p.pos.x},${p.pos.y}) dist=${p.distance}${state}`);
    }
  }

  // Valid actions
  if (obs.validActions.length > 0) {
    lines.push("");
    lines.push("VALID ACTIONS:");
    lines.push(`  ${obs.validActions.map((a) => a.action).join(" | ")}`);
  }

  // Recent logs
  if (obs.recentLogs.length > 0) {
    lines.push("");
    lines.push("RECENT LOGS:");
    for (const log of obs.recentLogs) {
      lines.push(`  ${log}`);
    }
  }

  return lines.join("\n");
}
