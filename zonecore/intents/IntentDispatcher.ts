// zonecore/intents/IntentDispatcher.ts

import type { TickContext } from "../engine/TickContext";
import type { Intent, ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { readString, truthy } from "../shared/Metadata";
import { ownedMonster, MonsterRef } from "../monsters/Ownership";
import { handleMove } from "../movement/MoveResolver";
import { startAutorepeat, startRecording, stopAutorepeatIntent, stopRecording } from "../movement/Recording";
import { handleSpawnMonster } from "../economy/Spawning";
import { handleSelectRecipe } from "../crafting/CraftingEngine";
import { hitchWagon, unhitchWagon, unloadWagon } from "../containers/Wagons";
import { Logger } from "../utils/logger";
import { ZONE_ACTIONS, ZoneIntent, ZoneIntentSchema } from "./IntentTypes";

const log = Logger.scope("INTENTS");

type MonsterHandler = (ctx: TickContext, playerId: string, monster: ZoneEntity) => void;

function withOwnedMonster(ctx: TickContext, playerId: string, ref: MonsterRef, handler: MonsterHandler): void {
  const monster = ownedMonster(ctx, playerId, ref);
  if (monster === null) return;
  handler(ctx, playerId, monster);
}

export function handleOwnerDisconnect(ctx: TickContext, playerId: string): void {
  for (const entity of ctx.entities()) {
    if (entity.ownerId !== playerId || ctx.kindOf(entity) !== EntityKind.Monster) continue;
    ctx.setMetadata(entity, { ...entity.metadata, online: false });
  }
  ctx.emit({ type: "disconnect", message: "Player disconnected", target_player_id: playerId });
}

/** Explicit `entity_id` target when it exists, else the first neighbour of the acting monster. */
export function handleInteract(ctx: TickContext, playerId: string, ref: MonsterRef): void {
  const monster = ownedMonster(ctx, playerId, ref);
  if (monster === null) return;

  const target = ctx.get(readString(ref.entity_id)) ?? ctx.findAdjacent(monster);
  if (target === null) {
    ctx.emit({ type: "message", message: "Nothing to interact with", target_player_id: playerId });
    return;
  }
  ctx.emit({ type: "interact", entity_id: target.id, target_player_id: playerId });
}

function dispatch(ctx: TickContext, playerId: string, intent: ZoneIntent): void {
  switch (intent.action) {
    case "move":
    case "push":
      handleMove(ctx, playerId, intent);
      return;
    case "spawn_monster":
      handleSpawnMonster(ctx, playerId, intent);
      return;
    case "owner_disconnect":
      handleOwnerDisconnect(ctx, intent.player_id);
      return;
    case "recording_start":
      withOwnedMonster(ctx, playerId, intent, startRecording);
      return;
    case "recording_stop":
      withOwnedMonster(ctx, playerId, intent, stopRecording);
      return;
    case "autorepeat_start":
      withOwnedMonster(ctx, playerId, intent, startAutorepeat);
      return;
    case "autorepeat_stop":
      withOwnedMonster(ctx, playerId, intent, stopAutorepeatIntent);
      return;
    case "select_recipe":
      handleSelectRecipe(ctx, playerId, intent);
      return;
    case "interact":
      handleInteract(ctx, playerId, intent);
      return;
    case "hitch_wagon":
      withOwnedMonster(ctx, playerId, intent, hitchWagon);
      return;
    case "unhitch_wagon":
      withOwnedMonster(ctx, playerId, intent, unhitchWagon);
      return;
    case "unload_wagon":
      withOwnedMonster(ctx, playerId, intent, unloadWagon);
      return;
    default: {
      const exhaustive: never = intent;
      return exhaustive;
    }
  }
}

/**
 * Applies intents in arrival order. Payloads that do not fit their action's
 * shape are skipped; an action name nobody handles earns the sender a warning.
 */
export function applyIntents(ctx: TickContext, intents: readonly Intent[]): void {
  for (const intent of intents) {
    const parsed = ZoneIntentSchema.safeParse(intent.data);
    if (parsed.success) {
      dispatch(ctx, intent.playerId, parsed.data);
      continue;
    }

    const action = intent.data.action;
    if (!truthy(action)) continue;
    if (typeof action === "string" && isKnownAction(action)) {
      log.debug(`Dropped malformed ${action} intent from ${intent.playerId}`);
      continue;
    }
    ctx.emit({
      type: "warning",
      message: `Unsupported action: ${String(action)}`,
      target_player_id: intent.playerId,
    });
  }
}

function isKnownAction(action: string): boolean {
  return ZONE_ACTIONS.has(action);
}
