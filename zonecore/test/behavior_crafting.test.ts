// zonecore/test/behavior_crafting.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import { EntityStore } from "../core/EntityStore";
import type { Intent, TickResult, ZoneEntity } from "../shared/Entity";
import { readRecord } from "../shared/Metadata";
import {
  makeGatheringSpot,
  makeIntent,
  makeItem,
  makeMonster,
  makeWorkshop,
  makeWorldMarker,
  testCatalog,
  testEngine,
  ZONE_ID,
} from "./testUtils";

function seed(entities: ZoneEntity[]): EntityStore {
  const store = new EntityStore();
  for (const entity of entities) store.put(entity);
  return store;
}

function runner(store: EntityStore) {
  const engine = testEngine();
  return (tickNumber: number, intents: Intent[] = []): TickResult => {
    const result = engine.tick(ZONE_ID, store.snapshot(ZONE_ID), intents, tickNumber);
    store.apply(ZONE_ID, result);
    return result;
  };
}

function storedCotton(id: string, workshopId: string, x: number, y: number): ZoneEntity {
  return makeItem(id, {
    x,
    y,
    metadata: {
      good_type: "cotton_bolls",
      name: "Cotton Bolls",
      is_stored: true,
      container_id: workshopId,
      stored_slot: { x, y },
      stored_role: "input",
    },
  });
}

test("[behavior] a gathering spot completes only once its duration has elapsed", () => {
  const store = seed([makeWorldMarker(), makeGatheringSpot("g1", { x: 10, y: 4 })]);
  const tick = runner(store);

  const started = tick(1, [makeIntent("select_recipe", { workshop_id: "g1" })]);
  assert.deepEqual(started.extras, {
    events: [
      { type: "crafting_started", workshop_id: "g1", recipe_name: "Cotton Bolls", target_player_id: "player-1" },
    ],
  });
  const spot = store.get(ZONE_ID, "g1");
  assert.equal(spot?.metadata.is_crafting, true);
  assert.equal(spot?.metadata.crafting_started_tick, 1);
  assert.equal(spot?.metadata.crafting_duration, 60);

  const midway = tick(30);
  assert.deepEqual(midway.creates, []);
  assert.deepEqual(midway.extras, {});

  const almost = tick(60);
  assert.deepEqual(almost.creates, []);

  const done = tick(61);
  assert.equal(done.creates.length, 1);
  const output = done.creates[0];
  assert.equal(output.id, "new-1");
  assert.equal(output.x, 12);
  assert.equal(output.y, 6);
  assert.equal(output.metadata.good_type, "cotton_bolls");
  assert.equal(output.metadata.quality, 1);
  assert.equal(output.metadata.value, 4);
  assert.equal(output.metadata.weight, 1);
  assert.deepEqual(output.metadata.raw_materials, [{ good_type: "Cotton Bolls", base_value: 4, density: 0.5 }]);
  assert.deepEqual(output.metadata.shares, []);
  assert.equal(output.metadata.producer_monster_id, null);
  assert.deepEqual(done.extras, {
    events: [{ type: "crafting_complete", workshop_id: "g1", recipe_name: "Cotton Bolls", consumed_inputs: [] }],
  });

  const after = store.get(ZONE_ID, "g1");
  assert.equal(after?.metadata.is_crafting, false);
  assert.equal(after?.metadata.crafting_completed_tick, 61);
});

test("[behavior] a crafter shortens the duration by dexterity", () => {
  const store = seed([
    makeWorldMarker(),
    makeMonster("m1", { x: 3, y: 3 }),
    makeGatheringSpot("g1", { x: 10, y: 4 }),
  ]);
  const tick = runner(store);

  tick(1, [makeIntent("select_recipe", { workshop_id: "g1", monster_id: "m1" })]);
  const spot = store.get(ZONE_ID, "g1");
  assert.equal(spot?.metadata.crafting_duration, 33);
  assert.equal(spot?.metadata.base_duration, 60);
  assert.equal(spot?.metadata.crafter_monster_id, "m1");

  assert.deepEqual(tick(33).creates, []);
  const done = tick(34);
  assert.equal(done.creates.length, 1);
  assert.equal(done.creates[0].metadata.producer_monster_id, "m1");
  assert.deepEqual(done.creates[0].metadata.shares, [
    { monster_id: "m1", player_id: "player-1", count: 1, description: "Produced Cotton Bolls" },
  ]);

  const crafter = store.get(ZONE_ID, "m1");
  const applied = readRecord(readRecord(crafter?.metadata.skills).applied);
  assert.equal(typeof applied.gathering, "number");
  // three 10-second steps at wisdom 8
  let forgotten = 0;
  for (let i = 0; i < 3; i++) forgotten += 0.0001 * (1 - (8 / 20) * 0.25);
  assert.equal(crafter?.metadata.total_forgotten, forgotten);
});

test("[behavior] a workshop turns a stored input into a refined good", () => {
  const store = seed([
    makeWorldMarker(),
    makeMonster("m1", { x: 3, y: 3 }),
    makeWorkshop("ws", { x: 10, y: 2, metadata: { input_item_ids: ["c1"] } }),
    storedCotton("c1", "ws", 11, 4),
  ]);
  const tick = runner(store);

  tick(10, [makeIntent("select_recipe", { workshop_id: "ws", recipe_id: "cotton_thread", monster_id: "m1" })]);
  assert.equal(store.get(ZONE_ID, "ws")?.metadata.crafting_duration, 66);

  assert.deepEqual(tick(75).creates, []);
  const done = tick(76);

  assert.deepEqual(done.deletes, ["c1"]);
  assert.equal(done.creates.length, 1);
  const thread = done.creates[0];
  assert.equal(thread.x, 14);
  assert.equal(thread.y, 5);
  assert.equal(thread.metadata.good_type, "cotton_thread");
  assert.equal(thread.metadata.value, 5);
  assert.equal(thread.metadata.weight, 1);
  assert.equal(thread.metadata.raw_material_max_depth, 0);
  assert.deepEqual(thread.metadata.carried_over_tags, []);
  assert.deepEqual(thread.metadata.shares, [
    { monster_id: "m1", player_id: "player-1", count: 2, description: "Produced Cotton Thread" },
  ]);
  const quality = Number(thread.metadata.quality);
  assert.ok(quality > 0.1 && quality < 0.11, `quality ${quality}`);

  assert.deepEqual(done.extras, {
    events: [
      { type: "crafting_complete", workshop_id: "ws", recipe_name: "Cotton Thread", consumed_inputs: ["Cotton Bolls"] },
    ],
  });
  assert.deepEqual(store.get(ZONE_ID, "ws")?.metadata.input_item_ids, []);
});

const SPUN_YARN: GoodTypeEntry = {
  name: "Spun Yarn",
  size: [1, 1],
  type_tags: ["yarn", "textile"],
  input_goods_tags_required: [["cotton"]],
  tools_required_tags: ["spindle", "knife"],
  tools_weights: [3, 1],
  production_time: 5,
  quantity: 2,
  requires_workshop: true,
};

function storedTool(id: string, x: number, metadata: Record<string, unknown>): ZoneEntity {
  return makeItem(id, {
    x,
    y: 3,
    metadata: { is_stored: true, container_id: "ws", stored_slot: { x, y: 3 }, stored_role: "tool", ...metadata },
  });
}

test("[behavior] finished crafts wear tools down by weight and drop the spent ones", () => {
  const spindle = storedTool("t1", 11, { name: "Spindle", tool_tags: ["spindle"] });
  const knife = storedTool("t2", 12, { name: "Bone Knife", tool_tags: ["knife"], durability: 1, max_durability: 40 });
  const engine = testEngine({ catalog: testCatalog([SPUN_YARN]) });

  const done = engine.tick(
    ZONE_ID,
    [
      makeWorldMarker(),
      makeWorkshop("ws", {
        x: 10,
        y: 2,
        metadata: {
          selected_recipe_name: "Spun Yarn",
          is_crafting: true,
          crafting_started_tick: 1,
          crafting_duration: 5,
          input_item_ids: ["c1"],
          tool_item_ids: ["t1", "t2"],
        },
      }),
      spindle,
      knife,
      storedCotton("c1", "ws", 11, 4),
    ],
    [],
    6,
  );

  assert.equal(done.creates.length, 2);
  assert.deepEqual(done.deletes, ["t2", "c1"]);

  const worn = done.updates.find((u) => u.id === "t1");
  // no max_durability recorded: a plain tool starts from 100, less 3 per unit
  assert.deepEqual(worn?.metadata, { ...spindle.metadata, durability: 94, max_durability: 100 });

  const ws = done.updates.find((u) => u.id === "ws")?.metadata;
  assert.deepEqual(ws?.last_depleted_tools, ["Bone Knife"]);
  assert.deepEqual(ws?.tool_item_ids, ["t1"]);
  assert.deepEqual(ws?.input_item_ids, []);
  assert.equal(ws?.is_crafting, false);
  assert.equal(ws?.crafting_completed_tick, 6);
});

test("[behavior] selecting a recipe without its inputs reports what is missing", () => {
  const store = seed([makeWorldMarker(), makeWorkshop("ws", { x: 10, y: 2 })]);
  const tick = runner(store);

  const result = tick(1, [makeIntent("select_recipe", { workshop_id: "ws", recipe_id: "Iron Hammer" })]);

  assert.deepEqual(result.extras, {
    events: [
      {
        type: "crafting_blocked",
        workshop_id: "ws",
        missing_inputs: [["ore"]],
        missing_tools: ["hammer"],
        target_player_id: "player-1",
      },
    ],
  });
  const ws = store.get(ZONE_ID, "ws");
  assert.equal(ws?.metadata.is_crafting, false);
  assert.equal(ws?.metadata.selected_recipe_name, "Iron Hammer");
});

test("[behavior] a blocked workshop starts by itself once the inputs arrive", () => {
  const store = seed([makeWorldMarker(), makeWorkshop("ws", { x: 10, y: 2 })]);
  const tick = runner(store);

  tick(1, [makeIntent("select_recipe", { workshop_id: "ws", recipe_id: "cotton_thread" })]);
  assert.equal(store.get(ZONE_ID, "ws")?.metadata.is_crafting, false);

  store.put(storedCotton("c1", "ws", 11, 4));
  tick(2);
  const ws = store.get(ZONE_ID, "ws");
  assert.equal(ws?.metadata.is_crafting, true);
  assert.equal(ws?.metadata.crafting_started_tick, 2);
  assert.equal(ws?.metadata.crafting_duration, 120);
  assert.deepEqual(ws?.metadata.missing_inputs, []);
});

test("[behavior] recipe selection errors", () => {
  const store = seed([
    makeWorldMarker(),
    makeGatheringSpot("g1", { x: 10, y: 4 }),
    makeGatheringSpot("g2", { x: 2, y: 6, metadata: { gathering_good_type: "Cotton Thread" } }),
    makeWorkshop("ws", { x: 12, y: 0, metadata: { workshop_type: "smithy" } }),
    makeMonster("other", { x: 3, y: 3, ownerId: "player-2" }),
  ]);
  const tick = runner(store);

  const result = tick(1, [
    makeIntent("select_recipe", { workshop_id: "g1", recipe_id: "Iron Ore" }),
    makeIntent("select_recipe", { workshop_id: "g2" }),
    makeIntent("select_recipe", { workshop_id: "ws", recipe_id: "Unobtainium" }),
    makeIntent("select_recipe", { workshop_id: "ws", recipe_id: "cotton_thread", monster_id: "other" }),
  ]);

  assert.deepEqual(result.extras, {
    events: [
      { type: "error", message: "Gathering spot is locked to Cotton Bolls", target_player_id: "player-1" },
      { type: "error", message: "Gathering spots can only produce raw materials", target_player_id: "player-1" },
      { type: "error", message: "Unknown recipe", target_player_id: "player-1" },
    ],
  });
});
