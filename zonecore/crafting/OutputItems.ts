// zonecore/crafting/OutputItems.ts

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import type { TickContext } from "../engine/TickContext";
import type { EntityCreate, ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { normalizeGoodTypeKey, readInt, readString } from "../shared/Metadata";
import {
  calculateItemValue,
  calculateItemWeight,
  goodTypeSize,
  isRawMaterialEntry,
  rawMaterialLineage,
} from "../items/ItemRules";
import { containerCapacity, containerUsedUnits } from "../containers/Containers";
import { outputAnchor, outputPosition } from "../containers/Workshops";
import { buildOutputShares } from "../economy/Shares";
import { carriedOverTags } from "./Requirements";
import { rollQuality, rollQuantity, rollRawMaterialType } from "./CraftingRolls";

export interface CraftOutput {
  creates: EntityCreate[];
  quantity: number;
}

export interface CraftBatch {
  workshop: ZoneEntity;
  recipe: GoodTypeEntry;
  crafter: ZoneEntity | null;
  inputs: readonly ZoneEntity[];
  tools: readonly ZoneEntity[];
}

function toolCreators(tools: readonly ZoneEntity[]): string[] {
  const creators: string[] = [];
  for (const tool of tools) {
    const id = readString(tool.metadata.producer_player_id) ?? readString(tool.metadata.creator_player_id);
    if (id !== null && !creators.includes(id)) creators.push(id);
  }
  return creators;
}

/**
 * Creates the output items of a finished craft at the workshop's output
 * anchor. Units that do not fit the interior are dropped. A dispenser on the
 * anchor cell takes units while its type and capacity allow.
 */
export function createOutputItems(ctx: TickContext, batch: CraftBatch): CraftOutput {
  const { workshop, recipe, crafter, inputs, tools } = batch;
  const [anchorX, anchorY] = outputAnchor(ctx, workshop);
  if (anchorX < 0 || anchorY < 0) return { creates: [], quantity: 0 };

  const rolls = { recipe, crafter, inputs, tools, rng: ctx.rng, now: ctx.now };
  const quantity = Math.max(
    1,
    recipe.is_fixed_quantity === true ? readInt(recipe.quantity ?? 1, 1) : rollQuantity(rolls),
  );

  const carried = carriedOverTags(recipe, inputs, ctx.catalog);
  const creators = toolCreators(tools);

  const dispenser = ctx.findAtKind(EntityKind.Dispenser, anchorX, anchorY);
  const dispenserMetadata = dispenser ? { ...dispenser.metadata } : null;
  const capacity = dispenser ? containerCapacity(dispenser) : 0;
  let usedUnits = dispenser ? containerUsedUnits(ctx, dispenser) : 0;
  let storedType = normalizeGoodTypeKey(dispenserMetadata?.stored_good_type);
  if (dispenserMetadata && storedType) dispenserMetadata.stored_good_type = storedType;

  const creates: EntityCreate[] = [];
  for (let unit = 0; unit < quantity; unit++) {
    const entry = isRawMaterialEntry(recipe) ? rollRawMaterialType(recipe) : recipe;
    const quality = rollQuality({ ...rolls, recipe: entry });
    const [width, height] = goodTypeSize(entry);
    const position = outputPosition(ctx, workshop, width, height);
    if (position === null) continue;

    const { rawMaterials, maxDepth } = rawMaterialLineage(entry, inputs, ctx.catalog);
    const weight = calculateItemWeight(entry, rawMaterials);
    const value = calculateItemValue(entry, rawMaterials, maxDepth, quality, crafter);
    const shares = buildOutputShares(recipe, crafter, tools, inputs, workshop);

    let stored = false;
    const outputType = normalizeGoodTypeKey(entry.name);
    if (dispenser && dispenserMetadata) {
      const mismatch = storedType !== "" && outputType !== "" && storedType !== outputType;
      if (!mismatch && usedUnits + 1 <= capacity) {
        stored = true;
        usedUnits += 1;
        if (!storedType && outputType) {
          storedType = outputType;
          dispenserMetadata.stored_good_type = outputType;
        }
      }
    }

    const name = entry.name || "Item";
    creates.push(
      ctx.create({
        x: position[0],
        y: position[1],
        width,
        height,
        ownerId: null,
        metadata: {
          kind: EntityKind.Item,
          name,
          good_type: normalizeGoodTypeKey(name),
          size: [width, height],
          quality,
          weight,
          value,
          carried_over_tags: carried,
          raw_materials: rawMaterials,
          raw_material_max_depth: maxDepth,
          crafted_at: ctx.now.toISOString(),
          producer_monster_id: crafter ? crafter.id : null,
          producer_player_id: crafter ? crafter.ownerId : null,
          tool_creator_player_ids: creators,
          shares,
          is_stored: stored,
          container_id: stored && dispenser ? dispenser.id : null,
          stored_slot: stored ? { x: anchorX, y: anchorY } : null,
          last_transporter_monster_id: crafter ? crafter.id : null,
          last_transporter_player_id: crafter ? crafter.ownerId : null,
        },
      }),
    );
  }

  if (dispenser && dispenserMetadata) ctx.setMetadata(dispenser, dispenserMetadata);
  return { creates, quantity };
}
