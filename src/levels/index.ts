/**
 * Level registry: every named level template, looked up by name.
 */
import { Color } from "../shared/types.js";
import type { LevelTemplate } from "../sim/procgen.js";
import {
  actionObjDoor, goToDoor, goToObjDoor, goToRedBlueBall, keyInBox, oneRoom, openDoor, openRedDoor,
  pickupDist, unlockLocal,
} from "./singleRoom.js";
import {
  blockedUnlockPickup, findObj, keyCorridor, openDoorsOrder, openTwoDoors, pickupAbove, unlockPickup,
  unlockToUnlock,
} from "./multiRoom.js";
import { moveTwoAcross, putNextLevel } from "./putNext.js";
import { randomMission } from "./random.js";

const LEVELS: LevelTemplate[] = [
  goToRedBlueBall(),
  openRedDoor(),
  openDoor({ name: "OpenDoor" }),
  openDoor({ name: "OpenDoorDebug", debug: true }),
  openDoor({ name: "OpenDoorColor", selectBy: "color" }),
  openDoor({ name: "OpenDoorLoc", selectBy: "loc" }),
  goToDoor(),
  goToObjDoor(),
  actionObjDoor(),
  unlockLocal(false),
  unlockLocal(true),
  keyInBox(),
  unlockPickup(false),
  unlockPickup(true),
  blockedUnlockPickup(),
  unlockToUnlock(),
  pickupDist(false),
  pickupDist(true),
  pickupAbove(),
  openTwoDoors({ name: "OpenTwoDoors" }),
  openTwoDoors({ name: "OpenTwoDoorsDebug", strict: true }),
  openTwoDoors({ name: "OpenRedBlueDoors", firstColor: Color.Red, secondColor: Color.Blue }),
  openTwoDoors({ name: "OpenRedBlueDoorsDebug", firstColor: Color.Red, secondColor: Color.Blue, strict: true }),
  findObj(5),
  findObj(6),
  findObj(7),
  keyCorridor(3, 1),
  keyCorridor(3, 2),
  keyCorridor(3, 3),
  keyCorridor(4, 3),
  keyCorridor(5, 3),
  keyCorridor(6, 3),
  oneRoom(8),
  oneRoom(12),
  oneRoom(16),
  oneRoom(20),
  putNextLevel(4, 1),
  putNextLevel(5, 1),
  putNextLevel(5, 2),
  putNextLevel(6, 3),
  putNextLevel(7, 4),
  putNextLevel(5, 2, true),
  putNextLevel(6, 3, true),
  putNextLevel(7, 4, true),
  moveTwoAcross(5, 2),
  moveTwoAcross(8, 9),
  openDoorsOrder(2, false),
  openDoorsOrder(4, false),
  openDoorsOrder(2, true),
  openDoorsOrder(4, true),
  randomMission(),
];

const BY_NAME = new Map(LEVELS.map((level) => [level.name, level]));

export function listLevels(): string[] {
  return LEVELS.map((level) => level.name);
}

export function getLevel(name: string): LevelTemplate | undefined {
  return BY_NAME.get(name);
}
