// zonecore/containers/Workshops.ts
//
// Workshop geometry. The outer ring of a workshop is wall; items are stored
// in the interior, and the interior's first column is the tool column.

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { Rect, rectsOverlap } from "../shared/Geometry";
import { DEFAULT_ITEM_SIZE, EntityKind } from "../shared/Kinds";
import { readInt, readList, readRecord, truthy } from "../shared/Metadata";
import {
  ensureItemSizeMetadata,
  goodTypeSize,
  isToolItem,
  itemSizeFromMetadata,
  maxDurabilityFor,
  toolTags,
} from "../items/ItemRules";
import { storedItems } from "./Containers";

export type StoredRole = "tool" | "input";

export interface InteriorBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function isGatheringSpot(ctx: TickContext, entity: ZoneEntity): boolean {
  return ctx.kindOf(entity) === EntityKind.Gathering || truthy(entity.metadata.gathering_good_type);
}

export function isCraftingStation(ctx: TickContext, entity: ZoneEntity): boolean {
  const kind = ctx.kindOf(entity);
  return kind === EntityKind.Workshop || kind === EntityKind.Gathering;
}

export function isWorkshopInterior(ctx: TickContext, workshop: ZoneEntity, x: number, y: number): boolean {
  const [width, height] = ctx.sizeOf(workshop);
  const relX = x - workshop.x;
  const relY = y - workshop.y;
  if (relX <= 0 || relY <= 0) return false;
  return relX < width - 1 && relY < height - 1;
}

export function isToolSlot(ctx: TickContext, workshop: ZoneEntity, x: number, y: number): boolean {
  return isWorkshopInterior(ctx, workshop, x, y) && x - workshop.x === 1;
}

/** Inclusive interior cell range. */
export function interiorBounds(ctx: TickContext, workshop: ZoneEntity): InteriorBounds {
  const rect = ctx.rectOf(workshop);
  return { minX: rect.x + 1, minY: rect.y + 1, maxX: rect.x + rect.w - 2, maxY: rect.y + rect.h - 2 };
}

/** Recipes a station may run: its locked good for a gathering spot, else every workshop recipe. */
export function stationRecipes(ctx: TickContext, workshop: ZoneEntity): GoodTypeEntry[] {
  if (isGatheringSpot(ctx, workshop)) {
    const recipe = ctx.catalog.recipe(workshop.metadata.gathering_good_type);
    return recipe ? [recipe] : [];
  }
  return ctx.catalog.allGoodTypes().filter((entry) => truthy(entry.requires_workshop));
}

/** Largest catalog footprint among goods matching any of the tag groups. */
export function maxSizeForTagGroups(ctx: TickContext, groups: readonly (readonly string[])[]): [number, number] {
  let maxW = DEFAULT_ITEM_SIZE[0];
  let maxH = DEFAULT_ITEM_SIZE[1];
  for (const group of groups) {
    const required = group.map((tag) => tag.toLowerCase());
    for (const entry of ctx.catalog.allGoodTypes()) {
      const tags = (entry.type_tags ?? []).map((tag) => tag.toLowerCase());
      if (!required.every((tag) => tags.includes(tag))) continue;
      const [w, h] = goodTypeSize(entry);
      maxW = Math.max(maxW, w);
      maxH = Math.max(maxH, h);
    }
  }
  return [maxW, maxH];
}

export function slotMaxSize(ctx: TickContext, workshop: ZoneEntity, role: StoredRole): [number, number] {
  const groups: string[][] = [];
  for (const recipe of stationRecipes(ctx, workshop)) {
    if (role === "tool") {
      // each required tool tag is its own group
      for (const tag of recipe.tools_required_tags ?? []) groups.push([tag]);
    } else {
      groups.push(...(recipe.input_goods_tags_required ?? []));
    }
  }
  return maxSizeForTagGroups(ctx, groups);
}

export function slotRole(ctx: TickContext, workshop: ZoneEntity, item: ZoneEntity, x: number, y: number): StoredRole {
  return isToolItem(item.metadata) && isToolSlot(ctx, workshop, x, y) ? "tool" : "input";
}

/** Footprint of a stored item at its recorded slot. */
export function storedItemRect(ctx: TickContext, item: ZoneEntity): Rect {
  const slot = readRecord(item.metadata.stored_slot);
  const [w, h] = itemSizeFromMetadata(item.metadata, ctx.catalog);
  return {
    x: readInt(slot.x ?? item.x, item.x),
    y: readInt(slot.y ?? item.y, item.y),
    w,
    h,
  };
}

export function itemFitsInWorkshop(
  ctx: TickContext,
  workshop: ZoneEntity,
  item: ZoneEntity,
  slotX: number,
  slotY: number,
  role: StoredRole,
): boolean {
  const [width, height] = itemSizeFromMetadata(item.metadata, ctx.catalog);
  const [maxW, maxH] = slotMaxSize(ctx, workshop, role);
  if (width > maxW || height > maxH) return false;

  const bounds = interiorBounds(ctx, workshop);
  if (slotX < bounds.minX || slotY < bounds.minY) return false;
  if (slotX + width - 1 > bounds.maxX || slotY + height - 1 > bounds.maxY) return false;

  const placed: Rect = { x: slotX, y: slotY, w: width, h: height };
  return storedItems(ctx, workshop).every((stored) => !rectsOverlap(placed, storedItemRect(ctx, stored)));
}

export function depositIntoWorkshop(
  ctx: TickContext,
  item: ZoneEntity,
  workshop: ZoneEntity,
  slotX: number,
  slotY: number,
): boolean {
  const role = slotRole(ctx, workshop, item, slotX, slotY);
  if (isGatheringSpot(ctx, workshop) && role !== "tool") return false;
  if (!itemFitsInWorkshop(ctx, workshop, item, slotX, slotY, role)) return false;

  const itemMetadata = { ...item.metadata };
  if (role === "tool") {
    const rawMax = itemMetadata.max_durability ?? maxDurabilityFor(itemMetadata, ctx.catalog);
    const maxDurability = readInt(rawMax, 100);
    itemMetadata.durability = readInt(itemMetadata.durability ?? maxDurability, maxDurability);
    itemMetadata.max_durability = maxDurability;
    itemMetadata.tool_tags = toolTags(itemMetadata);
  }
  ensureItemSizeMetadata(itemMetadata, ctx.catalog);
  itemMetadata.is_stored = true;
  itemMetadata.container_id = workshop.id;
  itemMetadata.stored_slot = { x: slotX, y: slotY };
  itemMetadata.stored_role = role;

  ctx.move(item, slotX, slotY);
  ctx.setMetadata(item, itemMetadata);

  const key = role === "tool" ? "tool_item_ids" : "input_item_ids";
  const ids = readList(workshop.metadata[key]);
  ids.push(item.id);
  ctx.setMetadata(workshop, { ...workshop.metadata, [key]: ids });

  ctx.emit({ type: "deposit", entity_id: item.id, workshop_id: workshop.id });
  return true;
}

/** Interior cell nearest the bottom-right corner; outputs are anchored there. */
export function outputAnchor(ctx: TickContext, workshop: ZoneEntity): [number, number] {
  const [width, height] = ctx.sizeOf(workshop);
  return [workshop.x + width - 2, workshop.y + height - 2];
}

/** Top-left for an output of the given size, or null when it does not fit the interior. */
export function outputPosition(
  ctx: TickContext,
  workshop: ZoneEntity,
  itemWidth: number,
  itemHeight: number,
): [number, number] | null {
  const [anchorX, anchorY] = outputAnchor(ctx, workshop);
  const bounds = interiorBounds(ctx, workshop);
  const x = anchorX - (itemWidth - 1);
  const y = anchorY - (itemHeight - 1);
  if (x < bounds.minX || y < bounds.minY) return null;
  if (x + itemWidth - 1 > bounds.maxX || y + itemHeight - 1 > bounds.maxY) return null;
  return [x, y];
}
