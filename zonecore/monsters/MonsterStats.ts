// zonecore/monsters/MonsterStats.ts

import type { ZoneEntity } from "../shared/Entity";
import { ABILITY_KEYS, GAME_TIME_MULTIPLIER } from "../shared/Kinds";
import { Metadata, parseTimestamp, readInt, readRecord } from "../shared/Metadata";

const SECONDS_PER_DAY = 24 * 60 * 60;

export function monsterStat(monster: ZoneEntity | null, key: string, fallback = 10): number {
  if (monster === null) return fallback;
  const stats = readRecord(monster.metadata.stats);
  return readInt(key in stats ? stats[key] : fallback, fallback);
}

/** +1 at 30 game-days of age, +2 at 60. */
export function ageBonus(metadata: Metadata, now: Date): number {
  const created = parseTimestamp(metadata.created_at);
  if (created === null) return 0;
  const realSeconds = (now.getTime() - created.getTime()) / 1000;
  const gameDays = (realSeconds * GAME_TIME_MULTIPLIER) / SECONDS_PER_DAY;
  if (gameDays >= 60) return 2;
  if (gameDays >= 30) return 1;
  return 0;
}

/** Ability by index into str/dex/con/int/wis/cha; 10 without a monster. */
export function effectiveAbility(monster: ZoneEntity | null, index: number, now: Date): number {
  if (monster === null) return 10;
  const clamped = Math.max(0, Math.min(Math.trunc(index) || 0, ABILITY_KEYS.length - 1));
  return monsterStat(monster, ABILITY_KEYS[clamped], 10) + ageBonus(monster.metadata, now);
}

/** Heaviest item weight the monster can push. */
export function monsterCapacity(monster: ZoneEntity, now: Date): number {
  return monsterStat(monster, "str", 8) + ageBonus(monster.metadata, now);
}

export function effectiveQuality(monster: ZoneEntity | null, quality: number, now: Date): number {
  if (monster === null) return quality;
  const wisPlusStr = effectiveAbility(monster, 4, now) + effectiveAbility(monster, 0, now) * 0.25;
  const distance = Math.max(1 - quality, 0);
  return quality + (wisPlusStr / 25) * distance * 0.25;
}

export function effectiveQuantity(monster: ZoneEntity | null, quantity: number, now: Date): number {
  if (monster === null) return quantity;
  let result = quantity;
  const strMultiplier = (effectiveAbility(monster, 0, now) - 10) / 10;
  result += Math.round(quantity * strMultiplier);
  const dexMultiplier = (effectiveAbility(monster, 1, now) - 10) / 10;
  result += Math.round(quantity * dexMultiplier * 0.25);
  return Math.max(result, 1);
}

export function effectiveProductionTime(monster: ZoneEntity | null, baseDuration: number, now: Date): number {
  if (monster === null) return baseDuration;
  let result = baseDuration;
  const dex = effectiveAbility(monster, 1, now);
  const intelligence = effectiveAbility(monster, 3, now);
  if (dex > 0) result *= 10 / dex;
  result *= 30 / (20 + intelligence);
  return result;
}
