// zonecore/crafting/CraftingEngine.ts
//
// Per-station crafting state machine:
//   idle  --(recipe selected, requirements met)-->  crafting
//   crafting  --(tick - started >= duration)-->  idle, outputs created
// Stations with a selected recipe start on their own as soon as the missing
// inputs and tools have been deposited.

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { TickContext } from "../engine/TickContext";
import type { ZoneEntity } from "../shared/Entity";
import { Metadata, normalizeGoodTypeKey, readBool, readInt, readString, truthy } from "../shared/Metadata";
import { isRawMaterialEntry, maxDurabilityFor } from "../items/ItemRules";
import { isCraftingStation, isGatheringSpot } from "../containers/Workshops";
import { ownedMonster } from "../monsters/Ownership";
import { applySkillGain } from "../skills/SkillProgression";
import { Logger } from "../utils/logger";
import { craftingDuration } from "./CraftingRolls";
import { createOutputItems } from "./OutputItems";
import { findMissingRequirements, gatheringTools, MissingRequirements, StoredItems, workshopItems } from "./Requirements";

const log = Logger.scope("CRAFTING");

export interface SelectRecipeRequest {
  workshop_id: string;
  recipe_id?: unknown;
  monster_id?: unknown;
  entity_id?: unknown;
}

function stationItems(ctx: TickContext, station: ZoneEntity): StoredItems {
  if (isGatheringSpot(ctx, station)) return { inputs: [], tools: gatheringTools(ctx, station) };
  return workshopItems(ctx, station);
}

function missingFor(ctx: TickContext, station: ZoneEntity, recipe: GoodTypeEntry, items: StoredItems): MissingRequirements {
  if (isGatheringSpot(ctx, station)) {
    return { missingInputs: [], missingTools: findMissingRequirements(recipe, [], items.tools, ctx.catalog).missingTools };
  }
  return findMissingRequirements(recipe, items.inputs, items.tools, ctx.catalog);
}

function recipeError(ctx: TickContext, station: ZoneEntity, recipe: GoodTypeEntry): string | null {
  if (isGatheringSpot(ctx, station) && !isRawMaterialEntry(recipe)) {
    return "Gathering spots can only produce raw materials";
  }
  const workshopType = station.metadata.workshop_type ?? "general";
  const required = recipe.requires_workshop;
  if (typeof required === "string") {
    if (required !== workshopType) return `Recipe requires ${required}`;
  } else if (required === true && !isCraftingStation(ctx, station)) {
    return "Recipe requires a workshop";
  }
  return null;
}

export function handleSelectRecipe(ctx: TickContext, playerId: string, request: SelectRecipeRequest): void {
  const station = ctx.get(request.workshop_id);
  if (station === null || !isCraftingStation(ctx, station)) return;

  // A named crafter must belong to the player.
  const crafter = ownedMonster(ctx, playerId, request);
  if (crafter === null && (readString(request.monster_id) ?? readString(request.entity_id)) !== null) return;

  let recipeId = request.recipe_id;
  const gatheringGood = station.metadata.gathering_good_type;
  if (truthy(gatheringGood)) {
    if (truthy(recipeId) && normalizeGoodTypeKey(recipeId) !== normalizeGoodTypeKey(gatheringGood)) {
      ctx.emit({ type: "error", message: `Gathering spot is locked to ${String(gatheringGood)}`, target_player_id: playerId });
      return;
    }
    recipeId = gatheringGood;
  }

  const recipe = ctx.catalog.recipe(recipeId);
  if (recipe === null) {
    ctx.emit({ type: "error", message: "Unknown recipe", target_player_id: playerId });
    return;
  }

  const rejection = recipeError(ctx, station, recipe);
  if (rejection !== null) {
    ctx.emit({ type: "error", message: rejection, target_player_id: playerId });
    return;
  }

  const { missingInputs, missingTools } = missingFor(ctx, station, recipe, stationItems(ctx, station));
  const metadata: Metadata = {
    ...station.metadata,
    selected_recipe_id: recipe.name,
    selected_recipe_name: recipe.name,
    missing_inputs: missingInputs,
    missing_tools: missingTools,
  };
  if (crafter !== null) metadata.crafter_monster_id = crafter.id;

  if (missingInputs.length === 0 && missingTools.length === 0) {
    const duration = craftingDuration(recipe, crafter, ctx.now);
    metadata.is_crafting = true;
    metadata.crafting_started_tick = ctx.tickNumber;
    metadata.crafting_duration = duration;
    metadata.base_duration = recipe.production_time ?? duration;
    metadata.primary_applied_skill = recipe.primary_applied_skill ?? null;
    ctx.emit({
      type: "crafting_started",
      workshop_id: station.id,
      recipe_name: recipe.name,
      target_player_id: playerId,
    });
  } else {
    metadata.is_crafting = false;
    delete metadata.crafting_started_tick;
    ctx.emit({
      type: "crafting_blocked",
      workshop_id: station.id,
      missing_inputs: missingInputs,
      missing_tools: missingTools,
      target_player_id: playerId,
    });
  }
  ctx.setMetadata(station, metadata);
}

/** Wears each tool by its recipe weight per unit produced; tools at zero are removed. Returns their names. */
export function consumeToolDurability(
  ctx: TickContext,
  tools: readonly ZoneEntity[],
  recipe: GoodTypeEntry,
  quantity: number,
): string[] {
  const depleted: string[] = [];
  const weights = recipe.tools_weights ?? [];
  const units = Math.max(1, quantity);

  tools.forEach((tool, index) => {
    const metadata = { ...tool.metadata };
    const maxDurability = readInt(metadata.max_durability ?? maxDurabilityFor(metadata, ctx.catalog), 100);
    let durability = readInt(metadata.durability ?? maxDurability, maxDurability);
    const weight = Math.max(1, index < weights.length ? readInt(weights[index], 1) : 1);

    durability -= weight * units;
    metadata.durability = durability;
    metadata.max_durability = maxDurability;
    if (durability <= 0) {
      ctx.remove(tool);
      depleted.push(readString(metadata.name) ?? readString(metadata.good_type) ?? "tool");
    } else {
      ctx.setMetadata(tool, metadata);
    }
  });
  return depleted;
}

/** Removes the inputs and returns their names. */
export function consumeInputs(ctx: TickContext, inputs: readonly ZoneEntity[]): string[] {
  return inputs.map((item) => {
    ctx.remove(item);
    return readString(item.metadata.name) ?? readString(item.metadata.good_type) ?? "item";
  });
}

export function processCrafting(ctx: TickContext): void {
  for (const station of ctx.entities()) {
    if (!isCraftingStation(ctx, station)) continue;
    advanceStation(ctx, station);
  }
}

function advanceStation(ctx: TickContext, station: ZoneEntity): void {
  const metadata: Metadata = { ...station.metadata };
  const gathering = isGatheringSpot(ctx, station);

  let recipeName: unknown = truthy(metadata.selected_recipe_name)
    ? metadata.selected_recipe_name
    : metadata.selected_recipe_id;
  if (gathering && truthy(metadata.gathering_good_type)) recipeName = metadata.gathering_good_type;

  let recipe: GoodTypeEntry | null = null;
  if (truthy(recipeName)) {
    recipe = ctx.catalog.recipe(recipeName);
    if (gathering && recipe) {
      if (!("selected_recipe_name" in metadata)) metadata.selected_recipe_name = recipe.name;
      if (!("selected_recipe_id" in metadata)) metadata.selected_recipe_id = recipe.name;
    }
  }

  const items = stationItems(ctx, station);
  let missing: MissingRequirements = { missingInputs: [], missingTools: [] };
  if (recipe) {
    missing = missingFor(ctx, station, recipe, items);
    metadata.missing_inputs = missing.missingInputs;
    metadata.missing_tools = missing.missingTools;
  }

  if (!readBool(metadata.is_crafting)) {
    const ready = missing.missingInputs.length === 0 && missing.missingTools.length === 0;
    if (recipe && ready && recipeError(ctx, station, recipe) === null) {
      const crafter = ctx.monsterById(metadata.crafter_monster_id);
      const duration = craftingDuration(recipe, crafter, ctx.now);
      metadata.is_crafting = true;
      metadata.crafting_started_tick = ctx.tickNumber;
      metadata.crafting_duration = duration;
      metadata.base_duration = recipe.production_time ?? duration;
      ctx.setMetadata(station, metadata);
    }
    return;
  }

  const duration = readInt(metadata.crafting_duration ?? 60, 60);
  const startedTick = readInt(metadata.crafting_started_tick, Number.NaN);
  if (Number.isNaN(startedTick)) {
    metadata.is_crafting = false;
    ctx.setMetadata(station, metadata);
    return;
  }

  if (ctx.tickNumber - startedTick < duration) {
    ctx.setMetadata(station, metadata);
    return;
  }

  if (recipe === null) {
    metadata.is_crafting = false;
    ctx.setMetadata(station, metadata);
    return;
  }

  completeCraft(ctx, station, metadata, recipe, items, duration);
}

function completeCraft(
  ctx: TickContext,
  station: ZoneEntity,
  metadata: Metadata,
  recipe: GoodTypeEntry,
  items: StoredItems,
  duration: number,
): void {
  const crafter = ctx.monsterById(metadata.crafter_monster_id);
  const gain = applySkillGain(crafter, recipe, duration, ctx.catalog.skills, ctx.now);
  if (crafter !== null && gain !== null) {
    ctx.setMetadata(crafter, gain.metadata);
    log.debug(`Skill gain for ${crafter.id}`, { ...gain.report });
  }

  const output = createOutputItems(ctx, { workshop: station, recipe, crafter, inputs: items.inputs, tools: items.tools });
  const depleted = consumeToolDurability(ctx, items.tools, recipe, output.quantity);
  const consumed = consumeInputs(ctx, items.inputs);
  if (depleted.length > 0) metadata.last_depleted_tools = depleted;

  metadata.is_crafting = false;
  metadata.crafting_completed_tick = ctx.tickNumber;
  metadata.input_item_ids = [];
  metadata.tool_item_ids = items.tools.filter((tool) => ctx.isLive(tool.id)).map((tool) => tool.id);
  ctx.setMetadata(station, metadata);

  ctx.emit({
    type: "crafting_complete",
    workshop_id: station.id,
    recipe_name: recipe.name,
    consumed_inputs: consumed,
  });
  log.debug(`${recipe.name} x${output.creates.length} completed at ${station.id}`, { tick: ctx.tickNumber });
}
