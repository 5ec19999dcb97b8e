// zonecore/monsters/Ownership.ts

import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { readString } from "../shared/Metadata";

export interface MonsterRef {
  monster_id?: unknown;
  entity_id?: unknown;
}

/**
 * The monster an intent acts through: `monster_id` when given, else
 * `entity_id`. Null unless it exists, is a monster and belongs to `playerId`.
 */
export function ownedMonster(ctx: TickContext, playerId: string, ref: MonsterRef): ZoneEntity | null {
  const id = readString(ref.monster_id) ?? readString(ref.entity_id);
  if (id === null) return null;
  const monster = ctx.get(id);
  if (monster === null) return null;
  if (monster.ownerId !== playerId) return null;
  if (ctx.kindOf(monster) !== EntityKind.Monster) return null;
  return monster;
}
