// zonecore/movement/PushResolver.ts
//
// Resolves where a pushed item ends up. Destinations are tried in order:
// workshop or gathering-spot interior, dispenser, delivery zone, wagon, open
// ground. Anything else in the way aborts the push, and a failed push leaves
// both the item and the mover where they were.

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { itemWeight } from "../items/ItemRules";
import { monsterCapacity } from "../monsters/MonsterStats";
import { depositIntoDispenser, markLastTransporter } from "../containers/Containers";
import { depositIntoWorkshop, isWorkshopInterior } from "../containers/Workshops";
import { dragHitchedWagons, loadItemIntoWagon, moveWagon } from "../containers/Wagons";
import { deliverItem } from "../economy/Delivery";

export type PushCheck = { ok: true } | { ok: false; reason: string };

export function canMonsterPush(ctx: TickContext, monster: ZoneEntity, item: ZoneEntity): PushCheck {
  const weight = itemWeight(item, ctx.catalog);
  const capacity = monsterCapacity(monster, ctx.now);
  if (weight > capacity) {
    return { ok: false, reason: `Item weight (${weight}) exceeds capacity (${capacity})` };
  }
  return { ok: true };
}

// ---------------------------------------------------------------------------
// Push claims
// ---------------------------------------------------------------------------

export function isBeingPushedByOther(item: ZoneEntity, pusherId: string): boolean {
  const current = item.metadata.being_pushed_by;
  if (current === undefined || current === null) return false;
  return String(current) !== pusherId;
}

export function markActivePush(ctx: TickContext, item: ZoneEntity, pusherId: string): void {
  ctx.setMetadata(item, { ...item.metadata, being_pushed_by: pusherId });
  ctx.activePushes.set(item.id, pusherId);
}

export function clearActivePush(ctx: TickContext, item: ZoneEntity): void {
  ctx.activePushes.delete(item.id);
  if (!("being_pushed_by" in item.metadata)) return;
  const metadata = { ...item.metadata };
  delete metadata.being_pushed_by;
  ctx.setMetadata(item, metadata);
}

/** Drops every claim still held at the end of a tick. */
export function clearActivePushes(ctx: TickContext): void {
  for (const itemId of [...ctx.activePushes.keys()]) {
    const item = ctx.get(itemId);
    if (item === null) {
      ctx.activePushes.delete(itemId);
      continue;
    }
    clearActivePush(ctx, item);
  }
}

// ---------------------------------------------------------------------------
// Push
// ---------------------------------------------------------------------------

/** Steps the mover after a successful push and tows its wagons behind it. */
function advanceMover(ctx: TickContext, mover: ZoneEntity, dx: number, dy: number): void {
  const oldX = mover.x;
  const oldY = mover.y;
  ctx.move(mover, oldX + dx, oldY + dy);
  dragHitchedWagons(ctx, mover, oldX, oldY);
}

export function attemptPush(ctx: TickContext, mover: ZoneEntity, pushed: ZoneEntity, dx: number, dy: number): boolean {
  const newX = pushed.x + dx;
  const newY = pushed.y + dy;
  if (!ctx.inBounds(newX, newY, pushed)) return false;
  if (ctx.terrainBlocked(newX, newY)) return false;

  const sourceDispenser = ctx.findAtKind(EntityKind.Dispenser, pushed.x, pushed.y);
  const targetWorkshop =
    ctx.findAtKind(EntityKind.Workshop, newX, newY) ?? ctx.findAtKind(EntityKind.Gathering, newX, newY);
  const targetDispenser = ctx.findAtKind(EntityKind.Dispenser, newX, newY);
  const targetDelivery = ctx.findAtKind(EntityKind.Delivery, newX, newY);
  const targetWagon = ctx.findAtKind(EntityKind.Wagon, newX, newY);

  const blockedBesides = (target: ZoneEntity | null): boolean =>
    ctx.blockerFor(pushed, newX, newY, target ? [mover.id, target.id] : [mover.id]) !== null;

  if (targetWorkshop !== null) {
    if (!isWorkshopInterior(ctx, targetWorkshop, newX, newY)) return false;
    if (blockedBesides(targetWorkshop)) return false;
    if (!depositIntoWorkshop(ctx, pushed, targetWorkshop, newX, newY)) return false;
    markLastTransporter(ctx, pushed, mover);
  } else if (targetDispenser !== null) {
    if (blockedBesides(targetDispenser)) return false;
    if (!depositIntoDispenser(ctx, pushed, targetDispenser, newX, newY)) return false;
    markLastTransporter(ctx, pushed, mover);
    ctx.touchedDispensers.add(targetDispenser.id);
  } else if (targetDelivery !== null) {
    if (blockedBesides(targetDelivery)) return false;
    if (!deliverItem(ctx, pushed, targetDelivery)) return false;
  } else if (targetWagon !== null && ctx.kindOf(pushed) === EntityKind.Item) {
    if (blockedBesides(targetWagon)) return false;
    if (!loadItemIntoWagon(ctx, pushed, targetWagon, newX, newY, mover)) return false;
  } else {
    if (blockedBesides(null)) return false;
    if (ctx.kindOf(pushed) === EntityKind.Wagon) {
      moveWagon(ctx, pushed, newX, newY);
    } else {
      ctx.move(pushed, newX, newY);
      markLastTransporter(ctx, pushed, mover);
    }
  }

  advanceMover(ctx, mover, dx, dy);
  if (sourceDispenser !== null) ctx.touchedDispensers.add(sourceDispenser.id);
  return true;
}
