// zonecore/items/ItemRules.ts
//
// Physical and economic properties of item entities: size, tags, tool
// detection, quality, weight, raw-material lineage and value.

import type { Catalog } from "../catalog/Catalog";
import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { ZoneEntity } from "../shared/Entity";
import { DEFAULT_ITEM_SIZE, EntityKind } from "../shared/Kinds";
import {
  isRecord,
  Metadata,
  readFloat,
  readInt,
  readList,
  readString,
  truthy,
} from "../shared/Metadata";
import { monsterStat } from "../monsters/MonsterStats";

export type RawMaterial = Record<string, unknown>;

export interface Lineage {
  rawMaterials: RawMaterial[];
  maxDepth: number;
}

const TOOL_KEYWORDS = ["hammer", "tongs", "anvil", "loom"];

function sizeFromList(value: unknown): [number, number] | null {
  if (!Array.isArray(value) || value.length < 2) return null;
  const width = readInt(value[0], DEFAULT_ITEM_SIZE[0]);
  const height = readInt(value[1], DEFAULT_ITEM_SIZE[1]);
  return [Math.max(1, width), Math.max(1, height)];
}

export function goodTypeSize(entry: GoodTypeEntry): [number, number] {
  return sizeFromList(entry.size) ?? [DEFAULT_ITEM_SIZE[0], DEFAULT_ITEM_SIZE[1]];
}

export function itemSizeFromMetadata(metadata: Metadata, catalog: Catalog): [number, number] {
  const stored = sizeFromList(metadata.size);
  if (stored) return stored;
  const entry = catalog.goodType(metadata.good_type);
  if (entry) return goodTypeSize(entry);
  return [DEFAULT_ITEM_SIZE[0], DEFAULT_ITEM_SIZE[1]];
}

/** Pins the catalog size onto an item before it is stored somewhere. */
export function ensureItemSizeMetadata(metadata: Metadata, catalog: Catalog): void {
  if ("size" in metadata) return;
  const entry = catalog.goodType(metadata.good_type);
  if (entry) {
    metadata.size = goodTypeSize(entry);
  }
}

export function isRawMaterialEntry(entry: GoodTypeEntry): boolean {
  return entry.raw_material_base_value !== undefined && entry.raw_material_base_value !== null;
}

export function isWorkshopEntry(entry: GoodTypeEntry): boolean {
  return (
    (entry.workshop_task_slots !== undefined && entry.workshop_task_slots !== null) ||
    (entry.workshop_task_tags !== undefined && entry.workshop_task_tags !== null)
  );
}

function goodTypeText(metadata: Metadata): string {
  const value = metadata.good_type;
  return value === undefined || value === null ? "" : String(value).trim().toLowerCase();
}

/**
 * Tags an item matches against recipe tag groups and delivery filters:
 * the catalog `type_tags` (or the good type's words plus the good type
 * itself when it is not in the catalog), then any carried-over tags.
 */
export function itemTags(metadata: Metadata, catalog: Catalog): string[] {
  const goodType = goodTypeText(metadata);
  const entry = catalog.goodType(goodType);
  const tags: string[] = [];

  if (entry) {
    tags.push(...(entry.type_tags ?? []).map((tag) => tag.toLowerCase()));
  } else if (goodType) {
    tags.push(...goodType.replace(/_/g, " ").split(/\s+/).filter(Boolean));
    if (!tags.includes(goodType)) tags.push(goodType);
  }

  for (const tag of readList(metadata.carried_over_tags)) {
    if (!truthy(tag)) continue;
    const value = String(tag).toLowerCase();
    if (!tags.includes(value)) tags.push(value);
  }
  return tags;
}

export function isToolItem(metadata: Metadata): boolean {
  const goodType = goodTypeText(metadata);
  if (goodType.includes("tool") || TOOL_KEYWORDS.some((kw) => goodType.includes(kw))) {
    return true;
  }
  return truthy(metadata.is_tool);
}

export function toolTags(metadata: Metadata): string[] {
  const tags = readList(metadata.tool_tags).map((tag) => String(tag));
  const goodType = goodTypeText(metadata);
  for (const keyword of TOOL_KEYWORDS) {
    if (goodType.includes(keyword) && !tags.includes(keyword)) tags.push(keyword);
  }
  return tags;
}

export function maxDurabilityFor(metadata: Metadata, catalog: Catalog): number {
  const entry = catalog.goodType(metadata.good_type);
  return entry && isWorkshopEntry(entry) ? 1000 : 100;
}

/** Qualities above 5 are percentages. */
export function normalizeQuality(quality: unknown): number {
  const value = readFloat(quality, Number.NaN);
  if (Number.isNaN(value)) return 0;
  return value > 5 ? value / 100 : value;
}

export function itemQuality(item: ZoneEntity | null): number {
  if (item === null) return 1;
  const raw = "quality" in item.metadata ? item.metadata.quality : 1;
  return Math.max(0, normalizeQuality(raw));
}

export function calculateItemWeight(entry: GoodTypeEntry, rawMaterials: readonly RawMaterial[]): number {
  if (isWorkshopEntry(entry)) return 100000;

  const storageVolume = entry.storage_volume ?? 1;
  if (isRawMaterialEntry(entry)) {
    const density = entry.raw_material_density;
    if (typeof density === "number") {
      return Math.max(1, Math.round(density * storageVolume));
    }
  }

  const densities: number[] = [];
  for (const material of rawMaterials) {
    if (material.density === undefined || material.density === null) continue;
    const density = readFloat(material.density, Number.NaN);
    if (!Number.isNaN(density)) densities.push(density);
  }
  if (densities.length > 0) {
    const avg = densities.reduce((sum, d) => sum + d, 0) / densities.length;
    return Math.max(1, Math.round(avg * storageVolume));
  }
  return Math.max(1, Math.round(storageVolume));
}

/** Stored weight, else wagon default, else computed from the catalog. */
export function itemWeight(entity: ZoneEntity, catalog: Catalog): number {
  const metadata = entity.metadata;
  if ("weight" in metadata) return readInt(metadata.weight, 1);
  if (readString(metadata.kind) === EntityKind.Wagon) return 10;

  const entry = catalog.goodType(metadata.good_type);
  if (entry) return calculateItemWeight(entry, storedRawMaterials(metadata));
  return 1;
}

export function rawMaterialEntry(entry: GoodTypeEntry): RawMaterial {
  return {
    good_type: entry.name,
    base_value: entry.raw_material_base_value ?? 0,
    density: entry.raw_material_density === undefined ? 0 : entry.raw_material_density,
  };
}

function storedRawMaterials(metadata: Metadata): RawMaterial[] {
  return readList(metadata.raw_materials).filter(isRecord);
}

/** Lineage carried by an existing item; raw goods without a stored list are their own lineage. */
export function itemRawMaterials(item: ZoneEntity, catalog: Catalog): Lineage {
  const stored = storedRawMaterials(item.metadata);
  if (stored.length > 0) {
    return { rawMaterials: stored, maxDepth: readInt(item.metadata.raw_material_max_depth, 0) };
  }
  const entry = catalog.goodType(item.metadata.good_type);
  if (entry && isRawMaterialEntry(entry)) {
    return { rawMaterials: [rawMaterialEntry(entry)], maxDepth: 0 };
  }
  return { rawMaterials: [], maxDepth: 0 };
}

/**
 * Raw materials behind a new output and its refinement depth. Depth is one
 * more than the deepest refined input, or 0 when every input is raw.
 */
export function rawMaterialLineage(
  entry: GoodTypeEntry,
  inputs: readonly ZoneEntity[],
  catalog: Catalog,
): Lineage {
  if (isRawMaterialEntry(entry)) {
    return { rawMaterials: [rawMaterialEntry(entry)], maxDepth: 0 };
  }

  const rawMaterials: RawMaterial[] = [];
  const refinedDepths: number[] = [];
  for (const item of inputs) {
    const inputEntry = catalog.goodType(item.metadata.good_type);
    const isRaw = inputEntry !== null && isRawMaterialEntry(inputEntry);
    const lineage = itemRawMaterials(item, catalog);
    rawMaterials.push(...lineage.rawMaterials);
    if (!isRaw) refinedDepths.push(lineage.maxDepth);
  }

  if (refinedDepths.length === 0) return { rawMaterials, maxDepth: 0 };
  return { rawMaterials, maxDepth: Math.max(...refinedDepths) + 1 };
}

export function applyValueModifier(value: number, crafter: ZoneEntity | null): number {
  if (crafter === null) return value;
  const cha = monsterStat(crafter, "cha", 10);
  return (value * (10 + cha / 2)) / 10;
}

export function calculateItemValue(
  entry: GoodTypeEntry,
  rawMaterials: readonly RawMaterial[],
  maxDepth: number,
  quality: unknown,
  crafter: ZoneEntity | null,
): number {
  const q = normalizeQuality(quality);

  if (isRawMaterialEntry(entry)) {
    const base = entry.raw_material_base_value ?? 0;
    return Math.trunc(base * Math.pow(q + 0.5, 0.5));
  }

  let rawValue = 0;
  for (const material of rawMaterials) {
    if (!truthy(material)) continue;
    rawValue += readFloat(material.base_value ?? 0, 0);
  }
  if (rawValue <= 0) return 0;

  const exponent = 0.5 + 0.5 * maxDepth;
  const value = Math.round(rawValue * Math.pow(q + 0.5, exponent));
  return Math.trunc(applyValueModifier(value, crafter));
}
