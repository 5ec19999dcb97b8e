// zonecore/containers/Wagons.ts
//
// Wagons are unit-counted containers that move. Loaded items keep an offset
// from the wagon's anchor and are carried rigidly. A monster tows one hitched
// wagon, which may tow more through `next_wagon_id`.

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { cellRect } from "../shared/Geometry";
import { EntityKind } from "../shared/Kinds";
import { isRecord, readInt, readList, readRecord, readString } from "../shared/Metadata";
import type { Metadata } from "../shared/Metadata";
import { ensureItemSizeMetadata } from "../items/ItemRules";
import {
  claimedGoodType,
  containerCapacity,
  containerUsedUnits,
  itemContainerUnits,
  markLastTransporter,
  storedItems,
  typeMismatch,
} from "./Containers";

export function hitchedWagonId(monster: ZoneEntity): string | null {
  return readString(readRecord(monster.metadata.current_task).hitched_wagon_id);
}

export function loadItemIntoWagon(
  ctx: TickContext,
  item: ZoneEntity,
  wagon: ZoneEntity,
  slotX: number,
  slotY: number,
  transporter: ZoneEntity | null,
): boolean {
  if (typeMismatch(wagon, item)) {
    ctx.emit({ type: "wagon_reject", wagon_id: wagon.id, reason: "type_mismatch" });
    return false;
  }
  if (containerUsedUnits(ctx, wagon) + itemContainerUnits(item) > containerCapacity(wagon)) {
    ctx.emit({ type: "wagon_full", wagon_id: wagon.id });
    return false;
  }

  if (transporter !== null) markLastTransporter(ctx, item, transporter);

  const wagonMetadata = { ...wagon.metadata };
  const storedType = claimedGoodType(wagon, item);
  if (storedType) wagonMetadata.stored_good_type = storedType;

  const itemMetadata = { ...item.metadata };
  ensureItemSizeMetadata(itemMetadata, ctx.catalog);
  itemMetadata.is_stored = true;
  itemMetadata.container_id = wagon.id;
  itemMetadata.stored_role = "wagon";
  itemMetadata.stored_offset = { x: slotX - wagon.x, y: slotY - wagon.y };

  ctx.move(item, slotX, slotY);
  ctx.setMetadata(item, itemMetadata);

  const loaded = readList(wagonMetadata.loaded_item_ids).map(String);
  if (!loaded.includes(item.id)) loaded.push(item.id);
  wagonMetadata.loaded_item_ids = loaded;
  wagonMetadata.loaded_item_count = loaded.length;
  ctx.setMetadata(wagon, wagonMetadata);

  ctx.emit({ type: "wagon_loaded", wagon_id: wagon.id, entity_id: item.id });
  return true;
}

/** Moves a wagon and carries its stored items along at their offsets. */
export function moveWagon(ctx: TickContext, wagon: ZoneEntity, x: number, y: number): void {
  const oldX = wagon.x;
  const oldY = wagon.y;
  ctx.move(wagon, x, y);

  for (const item of storedItems(ctx, wagon)) {
    const storedOffset = item.metadata.stored_offset;
    let offset: Metadata;
    if (isRecord(storedOffset)) {
      offset = storedOffset;
    } else {
      // loaded without an offset: keep the current relative position
      offset = { x: item.x - oldX, y: item.y - oldY };
      ctx.setMetadata(item, { ...item.metadata, stored_offset: offset });
    }
    const dx = readInt(offset.x ?? 0, 0);
    const dy = readInt(offset.y ?? 0, 0);
    ctx.move(item, x + dx, y + dy);
  }
}

/** Head wagon first, following `next_wagon_id` links until a repeat or a gap. */
export function wagonChain(ctx: TickContext, head: ZoneEntity): ZoneEntity[] {
  const chain: ZoneEntity[] = [];
  const seen = new Set<string>();
  let current: ZoneEntity | null = head;
  while (current !== null && !seen.has(current.id)) {
    chain.push(current);
    seen.add(current.id);
    current = ctx.get(readString(current.metadata.next_wagon_id));
  }
  return chain;
}

/** After the monster left (oldX, oldY), each wagon in its chain takes the spot the one ahead vacated. */
export function dragHitchedWagons(ctx: TickContext, monster: ZoneEntity, oldX: number, oldY: number): void {
  const head = ctx.get(hitchedWagonId(monster));
  if (head === null || ctx.kindOf(head) !== EntityKind.Wagon) return;

  let prevX = oldX;
  let prevY = oldY;
  for (const wagon of wagonChain(ctx, head)) {
    const wagonX = wagon.x;
    const wagonY = wagon.y;
    moveWagon(ctx, wagon, prevX, prevY);
    prevX = wagonX;
    prevY = wagonY;
  }
}

/** First wagon touching one of the monster's four neighbouring cells. */
export function findAdjacentWagon(ctx: TickContext, monster: ZoneEntity): ZoneEntity | null {
  return ctx.findAdjacent(monster, EntityKind.Wagon);
}

/** First free, in-bounds, unblocked cell in the ring around the wagon, scanning columns left to right. */
export function findUnloadCell(ctx: TickContext, wagon: ZoneEntity): [number, number] | null {
  const rect = ctx.rectOf(wagon);
  for (let x = rect.x - 1; x < rect.x + rect.w + 1; x++) {
    for (let y = rect.y - 1; y < rect.y + rect.h + 1; y++) {
      const inside = x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
      if (inside) continue;
      if (x < 0 || y < 0 || x >= ctx.layout.width || y >= ctx.layout.height) continue;
      if (ctx.terrainBlocked(x, y)) continue;
      if (ctx.findBlocker(cellRect(x, y)) !== null) continue;
      return [x, y];
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Intent handlers
// ---------------------------------------------------------------------------

export function hitchWagon(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  const task = readRecord(monster.metadata.current_task);
  if (readString(task.hitched_wagon_id) !== null) {
    ctx.emit({ type: "error", message: "Monster is already hitched to a wagon", target_player_id: playerId });
    return;
  }

  const wagon = findAdjacentWagon(ctx, monster);
  if (wagon === null) {
    ctx.emit({ type: "error", message: "No wagon adjacent to monster", target_player_id: playerId });
    return;
  }

  const hitchedBy = readString(wagon.metadata.hitched_by);
  if (hitchedBy !== null && hitchedBy !== monster.id) {
    ctx.emit({ type: "error", message: "Wagon is already hitched", target_player_id: playerId });
    return;
  }

  ctx.setMetadata(monster, { ...monster.metadata, current_task: { ...task, hitched_wagon_id: wagon.id } });
  ctx.setMetadata(wagon, { ...wagon.metadata, hitched_by: monster.id });
  ctx.emit({ type: "wagon_hitched", wagon_id: wagon.id, target_player_id: playerId });
}

export function unhitchWagon(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  const task = readRecord(monster.metadata.current_task);
  const wagonId = readString(task.hitched_wagon_id);
  if (wagonId === null) {
    ctx.emit({ type: "error", message: "Monster is not hitched to any wagon", target_player_id: playerId });
    return;
  }

  const wagon = ctx.get(wagonId);
  if (wagon !== null && ctx.kindOf(wagon) === EntityKind.Wagon && wagon.metadata.hitched_by === monster.id) {
    const wagonMetadata = { ...wagon.metadata };
    delete wagonMetadata.hitched_by;
    ctx.setMetadata(wagon, wagonMetadata);
  }

  const nextTask = { ...task };
  delete nextTask.hitched_wagon_id;
  ctx.setMetadata(monster, { ...monster.metadata, current_task: nextTask });
  ctx.emit({ type: "wagon_unhitched", target_player_id: playerId });
}

export function unloadWagon(ctx: TickContext, playerId: string, monster: ZoneEntity): void {
  const wagonId = hitchedWagonId(monster);
  if (wagonId === null) {
    ctx.emit({ type: "error", message: "Monster is not hitched to any wagon", target_player_id: playerId });
    return;
  }

  const wagon = ctx.get(wagonId);
  if (wagon === null || ctx.kindOf(wagon) !== EntityKind.Wagon) {
    ctx.emit({ type: "error", message: "Hitched wagon not found", target_player_id: playerId });
    return;
  }

  const items = storedItems(ctx, wagon);
  if (items.length === 0) {
    ctx.emit({ type: "error", message: "Wagon has no items to unload", target_player_id: playerId });
    return;
  }

  const cell = findUnloadCell(ctx, wagon);
  if (cell === null) {
    ctx.emit({ type: "error", message: "No space to unload wagon", target_player_id: playerId });
    return;
  }

  const item = items[0];
  const itemMetadata: Metadata = { ...item.metadata, is_stored: false };
  delete itemMetadata.container_id;
  delete itemMetadata.stored_offset;
  delete itemMetadata.stored_role;
  ctx.move(item, cell[0], cell[1]);
  ctx.setMetadata(item, itemMetadata);

  const loaded = readList(wagon.metadata.loaded_item_ids)
    .map(String)
    .filter((id) => id !== item.id);
  ctx.setMetadata(wagon, { ...wagon.metadata, loaded_item_ids: loaded, loaded_item_count: loaded.length });

  ctx.emit({ type: "wagon_unloaded", wagon_id: wagon.id, entity_id: item.id, target_player_id: playerId });
}
