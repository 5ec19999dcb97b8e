// zonecore/economy/Shares.ts
//
// Revenue-entitlement records carried by items. When an item is delivered its
// value is split between share holders in proportion to `count`.

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { ZoneEntity } from "../shared/Entity";
import { isRecord, Metadata, readFloat, readInt, readList, readString, truthy } from "../shared/Metadata";

export interface Share {
  monster_id: string | null;
  player_id: string | null;
  count: number;
  description: string;
}

const WORKSHOP_SHARE_WEIGHT = 8;

function idOrNull(value: unknown): string | null {
  return truthy(value) ? String(value) : null;
}

function displayName(metadata: Metadata, fallback: string): string {
  return readString(metadata.name) ?? readString(metadata.good_type) ?? fallback;
}

/**
 * Positive-count shares on an item. Items with none recorded fall back to a
 * single share for their producer, if they have one.
 */
export function itemShares(metadata: Metadata): Share[] {
  const shares: Share[] = [];
  for (const raw of readList(metadata.shares)) {
    if (!isRecord(raw)) continue;
    const count = readFloat(raw.count ?? 0, 0);
    if (count <= 0) continue;
    shares.push({
      monster_id: idOrNull(truthy(raw.monster_id) ? raw.monster_id : raw.monster),
      player_id: idOrNull(truthy(raw.player_id) ? raw.player_id : raw.owner_id),
      count,
      description: truthy(raw.description) ? String(raw.description) : "",
    });
  }
  if (shares.length > 0) return shares;

  const monsterId = idOrNull(metadata.producer_monster_id);
  const playerId = idOrNull(metadata.producer_player_id);
  if (monsterId || playerId) {
    shares.push({
      monster_id: monsterId,
      player_id: playerId,
      count: 1,
      description: `Produced ${displayName(metadata, "Item")}`,
    });
  }
  return shares;
}

/** Adds `count` to the matching share (same monster, player and description) or appends one. */
export function appendShare(
  shares: Share[],
  monsterId: string | null,
  playerId: string | null,
  count: number,
  description: string,
): void {
  if (count <= 0 || !(monsterId || playerId)) return;
  const existing = shares.find(
    (s) => s.monster_id === monsterId && s.player_id === playerId && s.description === description,
  );
  if (existing) {
    existing.count += count;
    return;
  }
  shares.push({ monster_id: monsterId, player_id: playerId, count, description });
}

function contributorTotals(shares: readonly Share[]): Map<string, { monsterId: string | null; playerId: string | null; count: number }> {
  const totals = new Map<string, { monsterId: string | null; playerId: string | null; count: number }>();
  for (const share of shares) {
    const key = JSON.stringify([share.monster_id, share.player_id]);
    const entry = totals.get(key);
    if (entry) entry.count += share.count;
    else totals.set(key, { monsterId: share.monster_id, playerId: share.player_id, count: share.count });
  }
  return totals;
}

/** Spreads `weight` shares across the contributors of `source` in proportion to their counts. */
function apportion(shares: Share[], source: readonly Share[], weight: number, description: string): void {
  const totals = contributorTotals(source);
  let sum = 0;
  for (const entry of totals.values()) sum += entry.count;
  if (sum <= 0) return;
  for (const entry of totals.values()) {
    appendShare(shares, entry.monsterId, entry.playerId, (weight * entry.count) / sum, description);
  }
}

export function buildOutputShares(
  recipe: GoodTypeEntry,
  crafter: ZoneEntity | null,
  tools: readonly ZoneEntity[],
  inputs: readonly ZoneEntity[],
  workshop: ZoneEntity | null,
): Share[] {
  const shares: Share[] = [];

  for (const item of inputs) {
    for (const share of itemShares(item.metadata)) {
      appendShare(shares, share.monster_id, share.player_id, share.count, share.description);
    }
  }

  const weights = recipe.tools_weights ?? [];
  tools.forEach((tool, index) => {
    const toolShares = itemShares(tool.metadata);
    if (toolShares.length === 0) return;
    const weight = Math.max(1, index < weights.length ? readInt(weights[index], 1) : 1);
    apportion(shares, toolShares, weight, `Contributed to ${displayName(tool.metadata, "tool")}`);
  });

  if (workshop !== null) {
    const name = readString(workshop.metadata.name) ?? readString(workshop.metadata.workshop_type) ?? "workshop";
    apportion(shares, itemShares(workshop.metadata), WORKSHOP_SHARE_WEIGHT, `Contributed to ${name}`);
  }

  if (crafter !== null) {
    const valueAdded = readInt(recipe.value_added_shares ?? 0, 0);
    if (valueAdded > 0) {
      appendShare(
        shares,
        crafter.id,
        crafter.ownerId,
        valueAdded,
        `Produced ${recipe.name || "Item"}`,
      );
    }
  }

  return shares;
}
