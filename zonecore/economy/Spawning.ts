// zonecore/economy/Spawning.ts

import type { MonsterTypeEntry } from "../catalog/CatalogTypes";
import type { TickContext } from "../engine/TickContext";
import { cellRect } from "../shared/Geometry";
import { EntityKind } from "../shared/Kinds";
import { Metadata, normalizeSkillKey, readInt, truthy } from "../shared/Metadata";
import { Logger } from "../utils/logger";
import { adjustedCost, communeMetadata, ensureCommune, findCommune, renownOf, setCommuneMetadata } from "./Commune";

const log = Logger.scope("ECONOMY");

const FALLBACK_SPAWN: [number, number] = [2, 2];

export interface SpawnRequest {
  monster_type?: unknown;
  name?: unknown;
  transferable_skills?: unknown;
}

/** First configured spawn point that is in bounds, open terrain and unoccupied. */
export function chooseSpawnPoint(ctx: TickContext): [number, number] {
  const points = ctx.layout.def?.spawn_points ?? [];
  const candidates = points.length > 0 ? points : [{ x: FALLBACK_SPAWN[0], y: FALLBACK_SPAWN[1] }];
  for (const { x, y } of candidates) {
    if (x < 0 || y < 0 || x >= ctx.layout.width || y >= ctx.layout.height) continue;
    if (ctx.terrainBlocked(x, y)) continue;
    if (ctx.findBlocker(cellRect(x, y)) === null) return [x, y];
  }
  return FALLBACK_SPAWN;
}

export function buildMonsterMetadata(
  name: string,
  monsterType: string,
  definition: MonsterTypeEntry,
  createdAt: Date,
  transferable: readonly string[] = [],
): Metadata {
  const stats = definition.stats ?? {};
  return {
    kind: EntityKind.Monster,
    name,
    monster_type: monsterType,
    stats: {
      str: Math.trunc(stats.str ?? 8),
      dex: Math.trunc(stats.dex ?? 8),
      con: Math.trunc(stats.con ?? 8),
      int: Math.trunc(stats.int ?? 8),
      wis: Math.trunc(stats.wis ?? 8),
      cha: Math.trunc(stats.cha ?? 8),
    },
    body_cap: Math.trunc(definition.body_cap ?? 100),
    mind_cap: Math.trunc(definition.mind_cap ?? 100),
    equipment: { body: [], mind: [] },
    skills: {
      transferable: [...transferable],
      applied: {},
      specific: {},
      last_used: {},
      last_decay_at: {},
    },
    total_forgotten: 0,
    current_task: {
      is_recording: false,
      is_playing: false,
      actions: [],
      play_index: 0,
    },
    online: true,
    created_at: createdAt.toISOString(),
  };
}

/**
 * Validated transferable skills in catalog spelling, or the error message
 * to report.
 */
export function resolveTransferableSkills(
  requested: unknown,
  catalogSkills: readonly string[],
): { ok: true; skills: string[] } | { ok: false; message: string } {
  if (!Array.isArray(requested)) {
    return { ok: false, message: "Transferable skills must be a list" };
  }
  if (requested.length !== 3) {
    return { ok: false, message: "Must select exactly 3 transferable skills" };
  }

  const lookup = new Map<string, string>();
  for (const skill of catalogSkills) lookup.set(normalizeSkillKey(skill), skill);

  const invalid: string[] = [];
  const skills: string[] = [];
  for (const skill of requested) {
    const match = truthy(skill) ? lookup.get(normalizeSkillKey(skill)) : undefined;
    if (match === undefined) invalid.push(String(skill));
    else skills.push(match);
  }
  if (invalid.length > 0) {
    return { ok: false, message: `Invalid transferable skills: ${invalid.join(", ")}` };
  }
  if (new Set(skills.map((s) => s.toLowerCase())).size !== skills.length) {
    return { ok: false, message: "Duplicate transferable skills selected" };
  }
  return { ok: true, skills };
}

export function handleSpawnMonster(ctx: TickContext, playerId: string, request: SpawnRequest): void {
  const monsterType = (truthy(request.monster_type) ? String(request.monster_type) : "goblin").toLowerCase();
  const name = truthy(request.name) ? String(request.name) : "Monster";

  const definition = ctx.catalog.monsterType(monsterType);
  if (definition === null) {
    ctx.emit({ type: "error", message: `Unknown monster type: ${monsterType}`, target_player_id: playerId });
    return;
  }

  const skills = resolveTransferableSkills(request.transferable_skills, ctx.catalog.skills.transferable);
  if (!skills.ok) {
    ctx.emit({ type: "error", message: skills.message, target_player_id: playerId });
    return;
  }

  const account = communeMetadata(findCommune(ctx, playerId));
  const cost = adjustedCost(readInt(definition.cost, 0), account);
  const renown = renownOf(account);
  if (renown < cost) {
    ctx.emit({ type: "error", message: `Not enough renown (${renown} < ${cost})`, target_player_id: playerId });
    return;
  }

  const commune = ensureCommune(ctx, playerId);
  const debited = communeMetadata(commune);
  debited.renown = renown - cost;
  debited.total_renown_spent = readInt(debited.total_renown_spent ?? 0, 0) + cost;
  setCommuneMetadata(ctx, commune, debited);

  const [x, y] = chooseSpawnPoint(ctx);
  const metadata = buildMonsterMetadata(name, monsterType, definition, ctx.now, skills.skills);
  ctx.create({ x, y, width: 1, height: 1, ownerId: playerId, metadata });

  ctx.emit({ type: "spawned", message: `Spawned ${name}`, target_player_id: playerId });
  log.debug(`Spawned ${monsterType} for ${playerId} at (${x}, ${y}) for ${cost} renown`);
}
