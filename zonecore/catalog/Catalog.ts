// zonecore/catalog/Catalog.ts

import type { GoodTypeEntry, MonsterTypeEntry, SkillDefs, ZoneDef } from "./CatalogTypes";
import { DEFAULT_MONSTER_TYPES, defaultSkillDefs } from "./defaults";

export interface CatalogParts {
  goodTypes?: Iterable<GoodTypeEntry>;
  monsterTypes?: Record<string, MonsterTypeEntry>;
  skills?: SkillDefs;
  zones?: ZoneDef[];
}

/**
 * Read-only static data shared by every zone an engine ticks.
 *
 * Good types are keyed by lower-cased name; lookups tolerate underscores in
 * place of spaces, so "cotton_bolls" and "Cotton Bolls" find the same entry.
 */
export class Catalog {
  private readonly goodTypes = new Map<string, GoodTypeEntry>();
  private readonly monsterTypes = new Map<string, MonsterTypeEntry>();
  readonly skills: SkillDefs;
  readonly zones: readonly ZoneDef[];

  constructor(parts: CatalogParts = {}) {
    for (const entry of parts.goodTypes ?? []) {
      this.goodTypes.set(entry.name.toLowerCase(), entry);
    }
    const monsters = parts.monsterTypes ?? DEFAULT_MONSTER_TYPES;
    for (const [key, entry] of Object.entries(monsters)) {
      this.monsterTypes.set(key.toLowerCase(), entry);
    }
    this.skills = parts.skills ?? defaultSkillDefs();
    this.zones = parts.zones ?? [];
  }

  /** Recipe lookup as used by `select_recipe`: exact key first, then underscores as spaces. */
  recipe(recipeId: unknown): GoodTypeEntry | null {
    if (recipeId === null || recipeId === undefined) return null;
    const key = String(recipeId).trim().toLowerCase();
    const exact = this.goodTypes.get(key);
    if (exact) return exact;
    return this.goodTypes.get(key.replace(/_/g, " ").trim()) ?? null;
  }

  /** Good-type lookup for a stored item's `good_type` (usually the snake_case form). */
  goodType(goodType: unknown): GoodTypeEntry | null {
    if (typeof goodType !== "string" || goodType.length === 0) return null;
    const base = goodType.trim().toLowerCase();
    return this.goodTypes.get(base.replace(/_/g, " ")) ?? this.goodTypes.get(base) ?? null;
  }

  allGoodTypes(): GoodTypeEntry[] {
    return [...this.goodTypes.values()];
  }

  monsterType(key: string): MonsterTypeEntry | null {
    return this.monsterTypes.get(key.toLowerCase()) ?? null;
  }
}
