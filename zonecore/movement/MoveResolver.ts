// zonecore/movement/MoveResolver.ts

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { DIR_TO_DELTA, Direction, EntityKind, PUSHABLE_KINDS } from "../shared/Kinds";
import { readList, readRecord, truthy } from "../shared/Metadata";
import { dragHitchedWagons } from "../containers/Wagons";
import { attemptPush, canMonsterPush, clearActivePush, isBeingPushedByOther, markActivePush } from "./PushResolver";

export interface MoveRequest {
  entity_id: string;
  direction?: unknown;
  dx?: unknown;
  dy?: unknown;
}

function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(DIR_TO_DELTA, value);
}

function clampStep(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

/** Named direction, else integer dx/dy clamped to a single step; anything else is no movement. */
export function intentDelta(data: { direction?: unknown; dx?: unknown; dy?: unknown }): [number, number] {
  if (isDirection(data.direction)) {
    const [dx, dy] = DIR_TO_DELTA[data.direction];
    return [dx, dy];
  }
  const dx = data.dx ?? 0;
  const dy = data.dy ?? 0;
  if (typeof dx !== "number" || typeof dy !== "number" || !Number.isInteger(dx) || !Number.isInteger(dy)) {
    return [0, 0];
  }
  return [clampStep(dx), clampStep(dy)];
}

/** Appends a step to the monster's recording when one is running. */
export function recordAction(ctx: TickContext, monster: ZoneEntity, action: string, dx: number, dy: number): void {
  const task = readRecord(monster.metadata.current_task);
  if (!truthy(task.is_recording)) return;
  const actions = readList(task.actions);
  actions.push({ action, dx, dy });
  ctx.setMetadata(monster, { ...monster.metadata, current_task: { ...task, actions } });
}

/** Steps the monster onto a free cell and tows its wagons. */
export function stepMonster(ctx: TickContext, monster: ZoneEntity, x: number, y: number): void {
  const oldX = monster.x;
  const oldY = monster.y;
  ctx.move(monster, x, y);
  dragHitchedWagons(ctx, monster, oldX, oldY);
}

export function isPushable(ctx: TickContext, entity: ZoneEntity): boolean {
  const kind = ctx.kindOf(entity);
  return kind !== null && PUSHABLE_KINDS.has(kind) && !truthy(entity.metadata.is_stored);
}

/**
 * Handles `move` and `push`: a step into open ground moves the monster, a
 * step into a pushable item pushes it.
 */
export function handleMove(ctx: TickContext, playerId: string, request: MoveRequest): void {
  const monster = ctx.get(request.entity_id);
  if (monster === null || monster.ownerId !== playerId) return;
  if (ctx.kindOf(monster) !== EntityKind.Monster) return;

  const [dx, dy] = intentDelta(request);
  if (dx === 0 && dy === 0) return;

  const newX = monster.x + dx;
  const newY = monster.y + dy;
  if (!ctx.inBounds(newX, newY, monster)) return;
  if (ctx.terrainBlocked(newX, newY)) return;

  const blocker = ctx.blockerFor(monster, newX, newY);
  if (blocker === null) {
    stepMonster(ctx, monster, newX, newY);
    recordAction(ctx, monster, "move", dx, dy);
    return;
  }

  if (!isPushable(ctx, blocker)) return;

  if (isBeingPushedByOther(blocker, monster.id)) {
    ctx.emit({ type: "blocked", message: "Item is already being pushed", target_player_id: playerId });
    return;
  }

  const check = canMonsterPush(ctx, monster, blocker);
  if (!check.ok) {
    ctx.emit({ type: "blocked", message: check.reason, target_player_id: playerId });
    return;
  }

  markActivePush(ctx, blocker, monster.id);
  const pushed = attemptPush(ctx, monster, blocker, dx, dy);
  clearActivePush(ctx, blocker);
  if (!pushed) return;

  recordAction(ctx, monster, "push", dx, dy);
  ctx.emit({ type: "push", entity_id: blocker.id, target_player_id: playerId });
}
