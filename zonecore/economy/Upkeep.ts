// zonecore/economy/Upkeep.ts

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { EntityKind, GAME_TIME_MULTIPLIER, UPKEEP_CYCLE_DAYS } from "../shared/Kinds";
import { parseTimestamp, readInt, readString, truthy } from "../shared/Metadata";
import { Logger } from "../utils/logger";
import { communeMetadata, ensureCommune, renownOf, setCommuneMetadata } from "./Commune";

const log = Logger.scope("ECONOMY");

const DEFAULT_UPKEEP_COST = 50;
const OVERDUE_KEYS = ["upkeep_overdue", "upkeep_overdue_since", "upkeep_required"] as const;

export function processUpkeep(ctx: TickContext): void {
  for (const monster of ctx.entities()) {
    if (ctx.kindOf(monster) !== EntityKind.Monster) continue;
    upkeepFor(ctx, monster);
  }
}

function upkeepFor(ctx: TickContext, monster: ZoneEntity): void {
  const ownerId = monster.ownerId;
  if (!ownerId) return;

  const metadata = { ...monster.metadata };
  const lastPaid = parseTimestamp(metadata.last_upkeep_paid) ?? parseTimestamp(metadata.created_at);
  if (lastPaid === null) return;

  const realSeconds = (ctx.now.getTime() - lastPaid.getTime()) / 1000;
  const gameDays = (realSeconds * GAME_TIME_MULTIPLIER) / 86400;

  if (gameDays < UPKEEP_CYCLE_DAYS) {
    let changed = false;
    for (const key of OVERDUE_KEYS) {
      if (key in metadata) {
        delete metadata[key];
        changed = true;
      }
    }
    if (changed) ctx.setMetadata(monster, metadata);
    return;
  }

  const monsterType = String(metadata.monster_type ?? "").toLowerCase();
  const cost = readInt(ctx.catalog.monsterType(monsterType)?.cost ?? DEFAULT_UPKEEP_COST, DEFAULT_UPKEEP_COST);
  if (cost <= 0) return;

  const commune = ensureCommune(ctx, ownerId);
  const account = communeMetadata(commune);
  const renown = renownOf(account);

  if (renown < cost) {
    let changed = false;
    if (!truthy(metadata.upkeep_overdue)) {
      metadata.upkeep_overdue = true;
      metadata.upkeep_overdue_since = readString(metadata.upkeep_overdue_since) ?? ctx.now.toISOString();
      changed = true;
    }
    if (metadata.upkeep_required !== cost) {
      metadata.upkeep_required = cost;
      changed = true;
    }
    if (changed) ctx.setMetadata(monster, metadata);
    return;
  }

  account.renown = renown - cost;
  setCommuneMetadata(ctx, commune, account);

  metadata.last_upkeep_paid = ctx.now.toISOString();
  for (const key of OVERDUE_KEYS) delete metadata[key];
  ctx.setMetadata(monster, metadata);
  log.debug(`Upkeep of ${cost} paid for monster ${monster.id} by ${ownerId}`);
}
