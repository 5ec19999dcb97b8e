// zonecore/catalog/CatalogTypes.ts
//
// Schemas for the static data files. A field with the wrong type is dropped
// (treated as absent) rather than rejecting the whole entry, so one bad value
// in a large tech tree does not disable the recipe.

import { z } from "zod";

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

const tagList = z.array(z.coerce.string());
const tagGroups = z.array(tagList);

export const GoodTypeSchema = z
  .object({
    name: z.string().trim().min(1),
    cost: lenient(z.number()),
    size: lenient(z.array(z.number()).min(2)),
    type_tags: lenient(tagList),
    storage_volume: lenient(z.number()),

    // Recipe side
    input_goods_tags_required: lenient(tagGroups),
    input_goods_tags_carryover: lenient(tagGroups),
    tools_required_tags: lenient(tagList),
    tools_weights: lenient(z.array(z.number())),
    primary_applied_skill: lenient(z.string().nullable()),
    secondary_applied_skills: lenient(tagList),
    transferable_skills: lenient(tagList),
    destabilizer_skills: lenient(tagList),
    relevant_ability_score: lenient(z.number()),
    difficulty_rating: lenient(z.number()),
    production_time: lenient(z.number()),
    quantity: lenient(z.number()),
    is_fixed_quantity: lenient(z.boolean()),
    value_added_shares: lenient(z.number()),
    has_quality: lenient(z.boolean()),
    requires_workshop: lenient(z.union([z.string(), z.boolean()])),

    // Raw material side
    raw_material_base_value: lenient(z.number().nullable()),
    raw_material_density: lenient(z.number().nullable()),

    // Present on goods that are themselves workshops
    workshop_task_slots: z.unknown().optional(),
    workshop_task_tags: z.unknown().optional(),
  })
  .passthrough();

export type GoodTypeEntry = z.infer<typeof GoodTypeSchema>;

export const GoodTypesFileSchema = z.object({
  good_types: z.array(z.unknown()).default([]),
});

const AbilityStatsSchema = z.object({
  str: lenient(z.number()),
  dex: lenient(z.number()),
  con: lenient(z.number()),
  int: lenient(z.number()),
  wis: lenient(z.number()),
  cha: lenient(z.number()),
});

export const MonsterTypeSchema = z
  .object({
    name: lenient(z.string()),
    cost: z.number().catch(0).default(0),
    stats: AbilityStatsSchema.catch({}).default({}),
    body_cap: lenient(z.number()),
    mind_cap: lenient(z.number()),
  })
  .passthrough();

export type MonsterTypeEntry = z.infer<typeof MonsterTypeSchema>;

export const MonsterTypesFileSchema = z.object({
  monster_types: z.record(z.unknown()),
});

export const SkillsFileSchema = z
  .object({
    transferable_skills: z.array(z.unknown()).catch([]).default([]),
    applied_skills: z.array(z.unknown()).catch([]).default([]),
    relevant_transferable_skills: z.record(z.array(z.unknown())).catch({}).default({}),
  })
  .passthrough();

export interface SkillDefs {
  transferable: string[];
  applied: string[];
  // applied skill -> transferable skills that speed up learning it
  relevant: Record<string, string[]>;
}

const CellSchema = z.array(z.number()).min(2);

export const StaticEntitySchema = z.object({
  kind: lenient(z.string()),
  x: z.number().int().catch(0).default(0),
  y: z.number().int().catch(0).default(0),
  width: z.number().int().catch(1).default(1),
  height: z.number().int().catch(1).default(1),
  metadata: z.record(z.unknown()).catch({}).default({}),
});

export type StaticEntityDef = z.infer<typeof StaticEntitySchema>;

export const ZoneDefSchema = z
  .object({
    name: z.string().min(1).catch("Starting Village").default("Starting Village"),
    width: z.number().int().positive().catch(100).default(100),
    height: z.number().int().positive().catch(100).default(100),
    spawn_points: z.array(z.object({ x: z.number().int(), y: z.number().int() })).catch([]).default([]),
    static_entities: z.array(StaticEntitySchema).catch([]).default([]),
    blocked: lenient(z.array(CellSchema)),
    blocked_cells: lenient(z.array(CellSchema)),
    terrain: lenient(z.object({ blocked: lenient(z.array(CellSchema)) }).passthrough()),
  })
  .passthrough();

export type ZoneDef = z.infer<typeof ZoneDefSchema>;
