// zonecore/economy/Commune.ts
//
// A player's renown account. Communes are created lazily; a commune created
// earlier in the same tick is still pending and is updated in place.

import type { TickContext } from "../engine/TickContext";
import type { EntityCreate, ZoneEntity } from "../shared/Entity";
import { EntityKind, STARTING_RENOWN } from "../shared/Kinds";
import { Metadata, readInt } from "../shared/Metadata";

export type CommuneHandle =
  | { kind: "entity"; entity: ZoneEntity }
  | { kind: "pending"; create: EntityCreate };

export function findCommune(ctx: TickContext, ownerId: string): CommuneHandle | null {
  for (const entity of ctx.entities()) {
    if (ctx.kindOf(entity) === EntityKind.Commune && entity.ownerId === ownerId) {
      return { kind: "entity", entity };
    }
  }
  for (const create of ctx.creates) {
    if (create.ownerId === ownerId && create.metadata.kind === EntityKind.Commune) {
      return { kind: "pending", create };
    }
  }
  return null;
}

export function ensureCommune(ctx: TickContext, ownerId: string): CommuneHandle {
  const existing = findCommune(ctx, ownerId);
  if (existing !== null) return existing;
  const create = ctx.create({
    x: 0,
    y: 0,
    width: 0,
    height: 0,
    ownerId,
    metadata: { kind: EntityKind.Commune, renown: STARTING_RENOWN, total_renown_spent: 0 },
  });
  return { kind: "pending", create };
}

/** Copy of the commune's metadata with renown defaults filled in. */
export function communeMetadata(handle: CommuneHandle | null): Metadata {
  if (handle === null) {
    return { kind: EntityKind.Commune, renown: STARTING_RENOWN, total_renown_spent: 0 };
  }
  const source = handle.kind === "entity" ? handle.entity.metadata : handle.create.metadata;
  const metadata: Metadata = { ...source };
  if (!("renown" in metadata)) metadata.renown = STARTING_RENOWN;
  if (!("total_renown_spent" in metadata)) metadata.total_renown_spent = 0;
  metadata.kind = EntityKind.Commune;
  return metadata;
}

export function setCommuneMetadata(ctx: TickContext, handle: CommuneHandle, metadata: Metadata): void {
  if (!("kind" in metadata)) metadata.kind = EntityKind.Commune;
  if (handle.kind === "entity") ctx.setMetadata(handle.entity, metadata);
  else handle.create.metadata = metadata;
}

export function renownOf(metadata: Metadata): number {
  return readInt(metadata.renown ?? STARTING_RENOWN, STARTING_RENOWN);
}

export function creditRenown(ctx: TickContext, ownerId: string | null, amount: number): void {
  if (amount <= 0 || !ownerId) return;
  const handle = ensureCommune(ctx, ownerId);
  const metadata = communeMetadata(handle);
  metadata.renown = renownOf(metadata) + amount;
  setCommuneMetadata(ctx, handle, metadata);
}

/** Spawn prices rise 10% per 1000 renown spent, up to triple. */
export function costMultiplier(totalRenownSpent: number): number {
  return Math.min(3, 1 + (totalRenownSpent / 1000) * 0.1);
}

export function adjustedCost(baseCost: number, metadata: Metadata): number {
  const spent = readInt(metadata.total_renown_spent ?? 0, 0);
  return Math.trunc(baseCost * costMultiplier(spent));
}
