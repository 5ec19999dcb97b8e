// zonecore/skills/SkillProgression.ts
//
// Skill levels are stored raw; the effective value is the stored level minus
// `total_forgotten`. Learning is integrated in 10-second steps of crafting
// time, so longer crafts approach mastery (1.0) asymptotically.

import type { GoodTypeEntry, SkillDefs } from "../catalog/CatalogTypes";
import type { ZoneEntity } from "../shared/Entity";
import {
  Metadata,
  normalizeGoodTypeKey,
  normalizeSkillKey,
  readFloat,
  readList,
  readRecord,
  truthy,
} from "../shared/Metadata";
import { effectiveAbility } from "../monsters/MonsterStats";

export type SkillKind = "applied" | "specific";

export interface SkillMaps {
  applied: Record<string, unknown>;
  specific: Record<string, unknown>;
  totalForgotten: number;
  transferable: string[];
}

export interface SkillGainReport {
  specific_skill: string;
  specific_gain: number;
  primary_skill: string;
  primary_gain: number;
  secondary_gains: Record<string, number>;
  forgetting: number;
}

export function totalForgotten(metadata: Metadata): number {
  return readFloat(metadata.total_forgotten ?? 0, 0);
}

export function skillMaps(monster: ZoneEntity | null): SkillMaps {
  if (monster === null) {
    return { applied: {}, specific: {}, totalForgotten: 0, transferable: [] };
  }
  const skills = readRecord(monster.metadata.skills);
  return {
    applied: readRecord(skills.applied),
    specific: readRecord(skills.specific),
    totalForgotten: totalForgotten(monster.metadata),
    transferable: readList(skills.transferable)
      .filter(truthy)
      .map((s) => String(s)),
  };
}

/** Stored level for `key`, never below the forgotten floor. Unknown keys sit at the floor. */
export function totalLearned(forgotten: number, map: Record<string, unknown>, key: string): number {
  if (!(key in map)) return forgotten;
  const value = readFloat(map[key], forgotten);
  return value < forgotten ? forgotten : value;
}

export function skillValue(monster: ZoneEntity | null, key: string, kind: SkillKind): number {
  if (monster === null || !key) return 0;
  const forgotten = totalForgotten(monster.metadata);
  const map = readRecord(readRecord(monster.metadata.skills)[kind]);
  return Math.max(0, totalLearned(forgotten, map, key) - forgotten);
}

export function transferableSkillSet(monster: ZoneEntity | null): Set<string> {
  return new Set(skillMaps(monster).transferable.map(normalizeSkillKey));
}

function learningAbilityFactor(monster: ZoneEntity, now: Date): number {
  const intelligence = effectiveAbility(monster, 3, now);
  const con = effectiveAbility(monster, 2, now);
  return (intelligence * 0.8 + con * 0.2) / 20;
}

function steps(duration: number): number {
  return duration > 0 ? Math.floor(Math.trunc(duration) / 10) : 0;
}

export function specificLearning(
  monster: ZoneEntity | null,
  startingValue: number,
  duration: number,
  primaryValue: number,
  now: Date,
): number {
  if (monster === null || steps(duration) === 0) return 0;
  const factor = learningAbilityFactor(monster, now);
  let result = 0;
  for (let i = 0; i < steps(duration); i++) {
    const remaining = 1 - startingValue - result;
    result += 0.002 * remaining * factor * primaryValue;
  }
  return result;
}

export function primaryLearning(
  monster: ZoneEntity | null,
  startingValue: number,
  duration: number,
  recipe: GoodTypeEntry,
  skills: SkillDefs,
  now: Date,
): number {
  if (monster === null || steps(duration) === 0) return 0;
  const factor = learningAbilityFactor(monster, now);

  const primaryKey = normalizeSkillKey(recipe.primary_applied_skill);
  const relevant = new Set((skills.relevant[primaryKey] ?? []).map(normalizeSkillKey));
  const owned = transferableSkillSet(monster);
  let matching = 0;
  for (const skill of relevant) {
    if (owned.has(skill)) matching += 1;
  }
  const transferableFactor = 1 + matching / 4;

  let result = 0;
  for (let i = 0; i < steps(duration); i++) {
    const remaining = 1 - startingValue - result;
    result += 0.001 * remaining * factor * transferableFactor;
  }
  return result;
}

export function secondaryLearning(
  monster: ZoneEntity | null,
  startingValue: number,
  duration: number,
  now: Date,
): number {
  if (monster === null || steps(duration) === 0) return 0;
  const factor = learningAbilityFactor(monster, now);
  let result = 0;
  for (let i = 0; i < steps(duration); i++) {
    const remaining = 1 - startingValue - result;
    result += 0.0005 * remaining * factor;
  }
  return result;
}

export function forgetting(monster: ZoneEntity | null, duration: number, now: Date): number {
  if (monster === null || steps(duration) === 0) return 0;
  const factor = 1 - (effectiveAbility(monster, 4, now) / 20) * 0.25;
  let result = 0;
  for (let i = 0; i < steps(duration); i++) {
    result += 0.0001 * factor;
  }
  return result;
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Skill metadata after crafting `recipe` for `duration` game seconds, or null
 * when nothing is learned (no monster, no time, or a recipe without a
 * primary skill).
 */
export function applySkillGain(
  monster: ZoneEntity | null,
  recipe: GoodTypeEntry,
  duration: number,
  skills: SkillDefs,
  now: Date,
): { metadata: Metadata; report: SkillGainReport } | null {
  if (monster === null || duration <= 0) return null;

  const appliedKey = normalizeSkillKey(recipe.primary_applied_skill);
  const specificKey = normalizeGoodTypeKey(recipe.name);
  if (!appliedKey || !specificKey) return null;
  const secondaryKeys = (recipe.secondary_applied_skills ?? []).map(normalizeSkillKey).filter(Boolean);

  const metadata: Metadata = { ...monster.metadata };
  const stored = readRecord(metadata.skills);
  const applied = readRecord(stored.applied);
  const specific = readRecord(stored.specific);
  let forgotten = totalForgotten(metadata);

  const appliedTotal = totalLearned(forgotten, applied, appliedKey);
  const specificTotal = totalLearned(forgotten, specific, specificKey);
  const secondaryTotals = new Map<string, number>();
  for (const key of secondaryKeys) {
    secondaryTotals.set(key, totalLearned(forgotten, applied, key));
  }

  const appliedValue = Math.max(0, appliedTotal - forgotten);
  const specificValue = Math.max(0, specificTotal - forgotten);

  const specificGain = specificLearning(monster, specificValue, duration, appliedValue, now);
  const primaryGain = primaryLearning(monster, appliedValue, duration, recipe, skills, now);
  const secondaryGains: Record<string, number> = {};
  for (const [key, total] of secondaryTotals) {
    secondaryGains[key] = secondaryLearning(monster, Math.max(0, total - forgotten), duration, now);
  }
  const forgettingGain = forgetting(monster, duration, now);

  applied[appliedKey] = appliedTotal + primaryGain;
  specific[specificKey] = specificTotal + specificGain;
  for (const [key, total] of secondaryTotals) {
    applied[key] = total + (secondaryGains[key] ?? 0);
  }

  forgotten += forgettingGain;
  for (const map of [applied, specific]) {
    for (const key of Object.keys(map)) {
      map[key] = Math.max(readFloat(map[key], forgotten), forgotten);
    }
  }

  metadata.skills = { ...stored, applied, specific };
  metadata.total_forgotten = forgotten;

  const roundedSecondary: Record<string, number> = {};
  for (const [key, gain] of Object.entries(secondaryGains)) {
    roundedSecondary[key] = round6(gain);
  }

  return {
    metadata,
    report: {
      specific_skill: specificKey,
      specific_gain: round6(specificGain),
      primary_skill: appliedKey,
      primary_gain: round6(primaryGain),
      secondary_gains: roundedSecondary,
      forgetting: round6(forgettingGain),
    },
  };
}
