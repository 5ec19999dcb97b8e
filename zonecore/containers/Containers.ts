// zonecore/containers/Containers.ts
//
// Unit-counted storage shared by dispensers and wagons. Every stored item
// costs one unit; a container holds a single good type at a time.

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { DEFAULT_CONTAINER_CAPACITY, EntityKind } from "../shared/Kinds";
import { normalizeGoodTypeKey, readInt, truthy } from "../shared/Metadata";
import type { Metadata } from "../shared/Metadata";
import { ensureItemSizeMetadata } from "../items/ItemRules";

export function containerCapacity(container: ZoneEntity): number {
  const capacity = container.metadata.capacity;
  if (capacity === undefined || capacity === null) return DEFAULT_CONTAINER_CAPACITY;
  return Math.max(1, readInt(capacity, DEFAULT_CONTAINER_CAPACITY));
}

export function itemContainerUnits(_item: ZoneEntity): number {
  return 1;
}

/** Items stored in `container`, in entity order. */
export function storedItems(ctx: TickContext, container: ZoneEntity): ZoneEntity[] {
  return ctx.entities().filter(
    (entity) =>
      ctx.kindOf(entity) === EntityKind.Item &&
      truthy(entity.metadata.is_stored) &&
      entity.metadata.container_id === container.id,
  );
}

export function containerUsedUnits(ctx: TickContext, container: ZoneEntity): number {
  return storedItems(ctx, container).reduce((sum, item) => sum + itemContainerUnits(item), 0);
}

export function typeMismatch(container: ZoneEntity, item: ZoneEntity): boolean {
  const storedType = normalizeGoodTypeKey(container.metadata.stored_good_type);
  const itemType = normalizeGoodTypeKey(item.metadata.good_type);
  return storedType !== "" && itemType !== "" && storedType !== itemType;
}

export function containerAccepts(ctx: TickContext, container: ZoneEntity, item: ZoneEntity): boolean {
  if (typeMismatch(container, item)) return false;
  return containerUsedUnits(ctx, container) + itemContainerUnits(item) <= containerCapacity(container);
}

/** Stored type after accepting `item`: the existing type, else the item's. */
export function claimedGoodType(container: ZoneEntity, item: ZoneEntity): string | null {
  const storedType = normalizeGoodTypeKey(container.metadata.stored_good_type);
  if (storedType) return storedType;
  const itemType = normalizeGoodTypeKey(item.metadata.good_type);
  return itemType || null;
}

export function depositIntoDispenser(
  ctx: TickContext,
  item: ZoneEntity,
  dispenser: ZoneEntity,
  slotX: number,
  slotY: number,
): boolean {
  if (!containerAccepts(ctx, dispenser, item)) return false;

  const dispenserMetadata = { ...dispenser.metadata };
  const storedType = claimedGoodType(dispenser, item);
  if (storedType) dispenserMetadata.stored_good_type = storedType;

  const itemMetadata = { ...item.metadata };
  ensureItemSizeMetadata(itemMetadata, ctx.catalog);
  itemMetadata.is_stored = true;
  itemMetadata.container_id = dispenser.id;
  itemMetadata.stored_slot = { x: slotX, y: slotY };

  ctx.move(item, slotX, slotY);
  ctx.setMetadata(item, itemMetadata);
  ctx.setMetadata(dispenser, dispenserMetadata);

  ctx.emit({ type: "dispenser_deposit", entity_id: item.id, dispenser_id: dispenser.id });
  return true;
}

/**
 * Releases the first stored item of each touched dispenser onto its cell
 * when no loose item is sitting there.
 */
export function syncDispensers(ctx: TickContext): void {
  for (const dispenserId of ctx.touchedDispensers) {
    const dispenser = ctx.get(dispenserId);
    if (dispenser === null) continue;

    const stored: ZoneEntity[] = [];
    let visible = false;
    for (const entity of ctx.entities()) {
      if (ctx.kindOf(entity) !== EntityKind.Item) continue;
      const isStored = truthy(entity.metadata.is_stored);
      if (isStored && entity.metadata.container_id === dispenser.id) {
        stored.push(entity);
      } else if (!isStored && entity.x === dispenser.x && entity.y === dispenser.y) {
        visible = true;
      }
    }

    if (visible || stored.length === 0) continue;
    const item = stored[0];
    const metadata: Metadata = { ...item.metadata, is_stored: false };
    delete metadata.container_id;
    delete metadata.stored_slot;
    ctx.move(item, dispenser.x, dispenser.y);
    ctx.setMetadata(item, metadata);
  }
}

export function markLastTransporter(ctx: TickContext, item: ZoneEntity, transporter: ZoneEntity): void {
  const metadata: Metadata = { ...item.metadata, last_transporter_monster_id: transporter.id };
  if (transporter.ownerId !== null) metadata.last_transporter_player_id = transporter.ownerId;
  ctx.setMetadata(item, metadata);
}
