/**
 * Reference movement collaborator: applies one agent action to the world and
 * reports what changed. The verifier only ever sees the returned delta and
 * the committed world.
 */
import type { World, WorldDelta, ObjectChange } from "../shared/types.js";
import { ActionType, DoorState, ObjectKind } from "../shared/types.js";
import { TURN_LEFT, TURN_RIGHT } from "../shared/constants.js";
import { carriesKeyFor, isPassable, snapshotAgent, snapshotObject } from "./actions.js";
import { detachFromRoom, getFrontPos, getObjectAt, getRoomAt, isCellFree } from "./rooms.js";
import { spawnItem } from "./state.js";

/**
 * Apply an action, mutating the world. Actions that cannot be carried out
 * (walking into a wall, picking up nothing) leave the world as it was and
 * return a delta with no changes.
 */
export function applyAction(world: World, action: ActionType): WorldDelta {
  const agentBefore = snapshotAgent(world);
  const changes: ObjectChange[] = [];
  const agent = world.agent;
  const front = getFrontPos(world);
  const target = front ? getObjectAt(world, front) : undefined;

  switch (action) {
    case ActionType.Left:
      agent.dir = TURN_LEFT[agent.dir];
      break;

    case ActionType.Right:
      agent.dir = TURN_RIGHT[agent.dir];
      break;

    case ActionType.Forward:
      if (front && isPassable(world, front)) {
        agent.pos = front;
      }
      break;

    case ActionType.Pickup: {
      if (agent.carrying || !target || target.kind === ObjectKind.Door) break;
      const before = snapshotObject(world, target);
      target.pos = null;
      agent.carrying = target.id;
      detachFromRoom(world, target.id);
      changes.push({ objectId: target.id, before, after: snapshotObject(world, target) });
      break;
    }

    case ActionType.Drop: {
      if (!agent.carrying || !front || !isCellFree(world, front)) break;
      const carried = world.objects.get(agent.carrying);
      if (!carried || carried.kind === ObjectKind.Door) break;
      const before = snapshotObject(world, carried);
      carried.pos = front;
      agent.carrying = null;
      getRoomAt(world, front).objects.push(carried.id);
      changes.push({ objectId: carried.id, before, after: snapshotObject(world, carried) });
      break;
    }

    case ActionType.Toggle: {
      if (!target || !front) break;
      if (target.kind === ObjectKind.Door) {
        const before = snapshotObject(world, target);
        if (target.state === DoorState.Locked) {
          if (!carriesKeyFor(world, target.color)) break;
          target.state = DoorState.Open;
        } else {
          target.state = target.state === DoorState.Open ? DoorState.Closed : DoorState.Open;
        }
        changes.push({ objectId: target.id, before, after: snapshotObject(world, target) });
      } else if (target.kind === ObjectKind.Box) {
        // Opening a box destroys it and leaves its contents in its place
        const before = snapshotObject(world, target);
        world.objects.delete(target.id);
        detachFromRoom(world, target.id);
        changes.push({ objectId: target.id, before, after: null });
        if (target.contents) {
          const revealed = spawnItem(world, target.contents, front);
          changes.push({ objectId: revealed.id, before: null, after: snapshotObject(world, revealed) });
        }
      }
      break;
    }

    case ActionType.Done:
      break;
  }

  return {
    action,
    actor: "agent",
    agentBefore,
    agentAfter: snapshotAgent(world),
    changes,
  };
}
