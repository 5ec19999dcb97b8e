// zonecore/crafting/CraftingRolls.ts
//
// Stochastic quality and quantity rolls plus crafting duration. Every random
// draw comes from the RandomSource passed in, so a seeded Rng replays a craft
// exactly.

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { ZoneEntity } from "../shared/Entity";
import { normalizeGoodTypeKey, normalizeSkillKey, readInt } from "../shared/Metadata";
import { itemQuality } from "../items/ItemRules";
import {
  effectiveAbility,
  effectiveProductionTime,
  effectiveQuality,
  effectiveQuantity,
} from "../monsters/MonsterStats";
import { skillValue, transferableSkillSet } from "../skills/SkillProgression";
import type { RandomSource } from "../utils/Rng";

export interface RollInputs {
  recipe: GoodTypeEntry;
  crafter: ZoneEntity | null;
  inputs: readonly ZoneEntity[];
  tools: readonly ZoneEntity[];
  rng: RandomSource;
  now: Date;
}

function average(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Recipe transferable skills the crafter also has. */
export function matchingTransferableCount(recipe: GoodTypeEntry, crafter: ZoneEntity | null): number {
  if (crafter === null) return 0;
  const wanted = new Set((recipe.transferable_skills ?? []).filter(Boolean).map(normalizeSkillKey));
  const owned = transferableSkillSet(crafter);
  let count = 0;
  for (const skill of wanted) {
    if (owned.has(skill)) count += 1;
  }
  return count;
}

/** Average of the secondary skills with the weakest `dropCount` removed. */
export function weightedSecondarySkillsAverage(
  recipe: GoodTypeEntry,
  crafter: ZoneEntity | null,
  dropCount: number,
): number {
  if (crafter === null) return 1;
  const secondary = recipe.secondary_applied_skills ?? [];
  if (secondary.length === 0) return 1;

  const values = secondary
    .map(normalizeSkillKey)
    .filter(Boolean)
    .map((key) => skillValue(crafter, key, "applied"))
    .sort((a, b) => a - b)
    .slice(dropCount);
  return values.length === 0 ? 1 : average(values);
}

/**
 * Tool qualities repeated by recipe weight (at least 1 each), with the
 * weakest 2 per matching transferable skill removed.
 */
export function weightedToolQualitiesAverage(
  recipe: GoodTypeEntry,
  tools: readonly ZoneEntity[],
  matchingTransferable: number,
): number {
  if (tools.length === 0) return 1;
  const weights = recipe.tools_weights ?? [];
  const qualities: number[] = [];
  tools.forEach((tool, index) => {
    const quality = itemQuality(tool);
    const weight = Math.max(1, index < weights.length ? readInt(weights[index], 1) : 1);
    for (let i = 0; i < weight; i++) qualities.push(quality);
  });
  qualities.sort((a, b) => a - b);
  const kept = qualities.slice(matchingTransferable * 2);
  return kept.length === 0 ? 1 : average(kept);
}

function abilityIndex(recipe: GoodTypeEntry): number {
  return readInt(recipe.relevant_ability_score ?? 0, 0);
}

export function rollQuality({ recipe, crafter, inputs, tools, rng, now }: RollInputs): number {
  const inputAverage = inputs.length === 0 ? 1 : average(inputs.map(itemQuality));
  if (crafter === null) return inputAverage;

  const matching = matchingTransferableCount(recipe, crafter);
  const secondaryAverage = weightedSecondarySkillsAverage(recipe, crafter, matching);
  const toolAverage = weightedToolQualitiesAverage(recipe, tools, matching);

  if (recipe.has_quality === false) {
    return (inputAverage + toolAverage) / 2;
  }

  const primary = skillValue(crafter, normalizeSkillKey(recipe.primary_applied_skill), "applied");
  const specific = skillValue(crafter, normalizeGoodTypeKey(recipe.name), "specific");
  const relevantAbility = effectiveAbility(crafter, abilityIndex(recipe), now);
  const difficulty = readInt(recipe.difficulty_rating ?? 1, 1) || 1;
  const abilityFactor = Math.min(1.2, relevantAbility / difficulty);

  let mu = inputAverage * primary * secondaryAverage;
  mu += toolAverage * specific * abilityFactor;

  const destabilizers = recipe.destabilizer_skills ?? [];
  const destabilizerAverage =
    destabilizers.length === 0
      ? 0
      : average(destabilizers.map((skill) => skillValue(crafter, normalizeSkillKey(skill), "applied")));

  const sigma = 0.1 + destabilizerAverage / 10;
  const result = Math.max(0, rng.gauss() * sigma + mu);
  return effectiveQuality(crafter, result, now);
}

export function rollQuantity({ recipe, crafter, tools, rng, now }: RollInputs): number {
  const mu = typeof recipe.quantity === "number" ? recipe.quantity : 1;
  if (crafter === null) return Math.max(1, Math.round(mu));

  const relevantAbility = effectiveAbility(crafter, abilityIndex(recipe), now);
  const primary = skillValue(crafter, normalizeSkillKey(recipe.primary_applied_skill), "applied");
  const specific = skillValue(crafter, normalizeGoodTypeKey(recipe.name), "specific");

  const matching = matchingTransferableCount(recipe, crafter);
  const toolAverage = weightedToolQualitiesAverage(recipe, tools, matching);
  const secondaryAverage = weightedSecondarySkillsAverage(recipe, crafter, matching);

  let sigma = mu * 0.05 * relevantAbility * primary * specific;
  sigma *= toolAverage * secondaryAverage;

  const rolled = Math.abs(rng.gauss() * sigma) + mu;
  return Math.max(1, Math.round(effectiveQuantity(crafter, rolled, now)));
}

/** Raw-material sub-type selection is not modelled; the recipe is returned as is. */
export function rollRawMaterialType(recipe: GoodTypeEntry): GoodTypeEntry {
  return recipe;
}

export function craftingDuration(recipe: GoodTypeEntry, crafter: ZoneEntity | null, now: Date): number {
  const base = readInt(recipe.production_time ?? 60, 60);
  const duration = Math.trunc(effectiveProductionTime(crafter, base, now));
  return Math.max(1, Number.isFinite(duration) ? duration : base);
}
