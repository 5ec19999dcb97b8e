// zonecore/economy/Delivery.ts

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { isRecord, readInt, readList, truthy } from "../shared/Metadata";
import { calculateItemValue, itemTags } from "../items/ItemRules";
import { Logger } from "../utils/logger";
import { creditRenown } from "./Commune";
import { itemShares } from "./Shares";

const log = Logger.scope("ECONOMY");

export interface ShareDistribution {
  player_id: string;
  monster_id: string | null;
  shares: number;
  renown: number;
  description: string;
}

/** Stored `value`, else the catalog value of the item as if crafted without a crafter. */
export function deliveryValue(ctx: TickContext, item: ZoneEntity): number {
  const metadata = item.metadata;
  const stored = readInt(metadata.value, Number.NaN);
  if (!Number.isNaN(stored)) return stored;

  const entry = ctx.catalog.goodType(metadata.good_type);
  if (!entry) return 0;
  const rawMaterials = readList(metadata.raw_materials).filter(isRecord);
  const maxDepth = readInt(metadata.raw_material_max_depth ?? 0, 0);
  return calculateItemValue(entry, rawMaterials, maxDepth, metadata.quality ?? 0, null);
}

function ownerOfMonster(ctx: TickContext, monsterId: string): string | null {
  for (const entity of ctx.entities()) {
    if (ctx.kindOf(entity) === EntityKind.Monster && entity.id === monsterId) {
      return entity.ownerId;
    }
  }
  return null;
}

/**
 * Delivers `item` into `delivery` when the zone accepts its tags: the value
 * is split between share holders, credited to their communes, and the item
 * is removed. Returns false when the zone refuses the item.
 */
export function deliverItem(ctx: TickContext, item: ZoneEntity, delivery: ZoneEntity): boolean {
  const itemMetadata = item.metadata;
  const accepted = truthy(delivery.metadata.dropoff_accepted_tags)
    ? delivery.metadata.dropoff_accepted_tags
    : delivery.metadata.accepted_tags;
  const acceptedTags = readList(accepted);
  if (acceptedTags.length > 0) {
    const acceptedSet = new Set(acceptedTags.filter(truthy).map((tag) => String(tag).toLowerCase()));
    if (!itemTags(itemMetadata, ctx.catalog).some((tag) => acceptedSet.has(tag))) return false;
  }

  const value = deliveryValue(ctx, item);
  const shares = itemShares(itemMetadata);
  let totalShares = shares.reduce((sum, share) => sum + share.count, 0);
  if (totalShares <= 0) totalShares = 1;

  const distribution: ShareDistribution[] = [];
  for (const share of shares) {
    if (share.count <= 0) continue;
    let playerId = share.player_id;
    if (!playerId && share.monster_id) playerId = ownerOfMonster(ctx, share.monster_id);
    if (!playerId) continue;

    const renown = Math.trunc((value * share.count) / totalShares);
    if (renown <= 0) continue;
    creditRenown(ctx, playerId, renown);
    distribution.push({
      player_id: playerId,
      monster_id: share.monster_id,
      shares: share.count,
      renown,
      description: share.description,
    });
  }

  const delivered = readList(delivery.metadata.delivered_items);
  delivered.push({
    good_type: itemMetadata.good_type ?? null,
    timestamp: ctx.now.toISOString(),
    value,
    contributors: distribution,
  });
  ctx.setMetadata(delivery, {
    ...delivery.metadata,
    delivered_items: delivered,
    delivered_count: delivered.length,
    last_share_distribution: distribution,
  });

  ctx.remove(item);
  ctx.emit({
    type: "delivery",
    entity_id: item.id,
    delivery_id: delivery.id,
    value,
    contributors: distribution,
  });
  log.debug(`Delivered ${String(itemMetadata.good_type ?? "item")} worth ${value}`, { deliveryId: delivery.id });
  return true;
}
