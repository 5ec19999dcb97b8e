// zonecore/test/behavior_tickLoop.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { EntityStore } from "../core/EntityStore";
import { ZoneTickLoop } from "../core/ZoneTickLoop";
import { ZoneTickEngine } from "../engine/ZoneTickEngine";
import { ZoneTickError } from "../engine/ZoneTickError";
import type { Intent, TickResult, ZoneEntity, ZoneStateView } from "../shared/Entity";
import { makeIntent, makeItem, makeMonster, makeWorldMarker, testCatalog, testEngine, ZONE_ID } from "./testUtils";

class RejectingEngine extends ZoneTickEngine {
  seen: Intent[][] = [];

  tick(zoneId: string, _entities: readonly ZoneEntity[], intents: readonly Intent[], tickNumber: number): TickResult {
    this.seen.push([...intents]);
    throw new ZoneTickError("rejected", zoneId, tickNumber);
  }
}

function seededStore(entities: ZoneEntity[]): EntityStore {
  const store = new EntityStore();
  for (const entity of entities) store.put(entity);
  return store;
}

test("[behavior] the store applies creates, updates and deletes", () => {
  const store = seededStore([makeItem("i1", { x: 1, y: 1 }), makeItem("i2")]);

  store.apply(ZONE_ID, {
    creates: [{ id: "n1", x: 2, y: 2, width: 1, height: 1, ownerId: null, metadata: { kind: "item" } }],
    updates: [
      { id: "i1", x: 5, metadata: { kind: "item", good_type: "rope" } },
      { id: "ghost", x: 1 },
    ],
    deletes: ["i2"],
    extras: {},
  });

  assert.deepEqual(
    store.snapshot(ZONE_ID).map((e) => [e.id, e.x, e.y, e.metadata.good_type ?? null]),
    [
      ["i1", 5, 1, "rope"],
      ["n1", 2, 2, null],
    ],
  );
  assert.equal(store.get(ZONE_ID, "n1")?.zoneId, ZONE_ID);
  assert.equal(store.count("other-zone"), 0);
});

test("[behavior] snapshots are copies", () => {
  const store = seededStore([makeItem("i1")]);
  const [copy] = store.snapshot(ZONE_ID);
  copy.x = 99;
  assert.equal(store.get(ZONE_ID, "i1")?.x, 0);
});

test("[behavior] a loop step feeds queued intents and publishes the new state", () => {
  const store = seededStore([makeWorldMarker(), makeMonster("m1", { x: 3, y: 3 })]);
  const published: [string, number, ZoneStateView][] = [];
  const loop = new ZoneTickLoop(testEngine(), store, [ZONE_ID], {
    intervalMs: 1000,
    onTick: (zoneId, tick, state) => published.push([zoneId, tick, state]),
  });

  loop.enqueue(ZONE_ID, makeIntent("move", { entity_id: "m1", direction: "right" }));
  loop.enqueue(ZONE_ID, makeIntent("dance"));
  loop.step();
  loop.step();

  assert.equal(store.get(ZONE_ID, "m1")?.x, 4);
  assert.equal(loop.tickNumber(ZONE_ID), 2);
  assert.deepEqual(
    published.map(([zoneId, tick, state]) => [zoneId, tick, state.events?.length]),
    [
      [ZONE_ID, 1, 1],
      [ZONE_ID, 2, 0],
    ],
  );
  const entities = published[0][2].entities;
  assert.ok(Array.isArray(entities));
  assert.equal(entities.length, 2);
});

test("[behavior] a rejected tick leaves state alone and drops its intents", () => {
  const engine = new RejectingEngine({ catalog: testCatalog() });
  const store = seededStore([makeWorldMarker(), makeMonster("m1", { x: 3, y: 3 })]);
  let published = 0;
  const loop = new ZoneTickLoop(engine, store, [ZONE_ID], {
    intervalMs: 1000,
    onTick: () => {
      published += 1;
    },
  });

  loop.enqueue(ZONE_ID, makeIntent("move", { entity_id: "m1", direction: "right" }));
  loop.stepZone(ZONE_ID);
  loop.stepZone(ZONE_ID);

  assert.equal(published, 0);
  assert.equal(loop.tickNumber(ZONE_ID), 2);
  assert.deepEqual(
    engine.seen.map((intents) => intents.length),
    [1, 0],
  );
  assert.equal(store.get(ZONE_ID, "m1")?.x, 3);
});

test("[behavior] start and stop are idempotent", () => {
  const loop = new ZoneTickLoop(testEngine(), new EntityStore(), [], { intervalMs: 1 });
  loop.start();
  loop.start();
  loop.stop();
  loop.stop();
  assert.equal(loop.tickNumber(ZONE_ID), 0);
});
