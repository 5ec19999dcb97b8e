// zonecore/crafting/Requirements.ts

import type { Catalog } from "../catalog/Catalog";
import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { readInt, truthy } from "../shared/Metadata";
import { itemTags, maxDurabilityFor, toolTags } from "../items/ItemRules";

export interface StoredItems {
  inputs: ZoneEntity[];
  tools: ZoneEntity[];
}

export interface MissingRequirements {
  missingInputs: string[][];
  missingTools: string[];
}

function storedIn(ctx: TickContext, container: ZoneEntity): ZoneEntity[] {
  return ctx.entities().filter(
    (entity) =>
      ctx.kindOf(entity) === EntityKind.Item &&
      entity.metadata.container_id === container.id &&
      truthy(entity.metadata.is_stored),
  );
}

/** Stored items of a workshop split by role; anything not marked as a tool is an input. */
export function workshopItems(ctx: TickContext, workshop: ZoneEntity): StoredItems {
  const inputs: ZoneEntity[] = [];
  const tools: ZoneEntity[] = [];
  for (const item of storedIn(ctx, workshop)) {
    if (item.metadata.stored_role === "tool") tools.push(item);
    else inputs.push(item);
  }
  return { inputs, tools };
}

/** Gathering spots only ever hold tools. */
export function gatheringTools(ctx: TickContext, spot: ZoneEntity): ZoneEntity[] {
  return storedIn(ctx, spot).filter((item) => item.metadata.stored_role === "tool");
}

function lowerGroup(group: readonly string[]): string[] {
  return group.map((tag) => String(tag).toLowerCase());
}

function hasItemWithTags(items: readonly ZoneEntity[], tags: readonly string[], catalog: Catalog): boolean {
  return items.some((item) => {
    const have = itemTags(item.metadata, catalog);
    return tags.every((tag) => have.includes(tag));
  });
}

export function toolDurability(tool: ZoneEntity, catalog: Catalog): number {
  const metadata = tool.metadata;
  let raw: unknown = metadata.durability;
  if (raw === undefined || raw === null) {
    raw = metadata.max_durability;
    if (raw === undefined || raw === null) raw = maxDurabilityFor(metadata, catalog);
  }
  return readInt(raw, 0);
}

function hasToolWithTag(tools: readonly ZoneEntity[], tag: string, catalog: Catalog): boolean {
  return tools.some((tool) => {
    if (toolDurability(tool, catalog) <= 0) return false;
    return toolTags(tool.metadata).some((t) => t.toLowerCase() === tag);
  });
}

export function findMissingRequirements(
  recipe: GoodTypeEntry,
  inputs: readonly ZoneEntity[],
  tools: readonly ZoneEntity[],
  catalog: Catalog,
): MissingRequirements {
  const missingInputs: string[][] = [];
  for (const group of recipe.input_goods_tags_required ?? []) {
    const tags = lowerGroup(group);
    if (!hasItemWithTags(inputs, tags, catalog)) missingInputs.push(tags);
  }

  const missingTools: string[] = [];
  for (const required of recipe.tools_required_tags ?? []) {
    const tag = String(required).toLowerCase();
    if (!hasToolWithTag(tools, tag, catalog)) missingTools.push(tag);
  }
  return { missingInputs, missingTools };
}

/** One input per required tag group, each item used at most once; null where nothing matches. */
export function matchInputItems(
  inputs: readonly ZoneEntity[],
  required: readonly (readonly string[])[],
  catalog: Catalog,
): (ZoneEntity | null)[] {
  const remaining = [...inputs];
  const matched: (ZoneEntity | null)[] = [];
  for (const group of required) {
    const tags = lowerGroup(group);
    const index = remaining.findIndex((item) => {
      const have = itemTags(item.metadata, catalog);
      return tags.every((tag) => have.includes(tag));
    });
    if (index === -1) {
      matched.push(null);
      continue;
    }
    matched.push(remaining[index]);
    remaining.splice(index, 1);
  }
  return matched;
}

/** Tags the output inherits from the inputs matched to each carry-over group, sorted. */
export function carriedOverTags(
  recipe: GoodTypeEntry,
  inputs: readonly ZoneEntity[],
  catalog: Catalog,
): string[] {
  const carryover = recipe.input_goods_tags_carryover ?? [];
  if (carryover.length === 0 || inputs.length === 0) return [];

  const matched = matchInputItems(inputs, recipe.input_goods_tags_required ?? [], catalog);
  const carried = new Set<string>();
  carryover.forEach((group, index) => {
    const item = index < matched.length ? matched[index] : null;
    if (!item) return;
    const have = itemTags(item.metadata, catalog);
    for (const tag of lowerGroup(group)) {
      if (have.includes(tag)) carried.add(tag);
    }
  });
  return [...carried].sort();
}
