// zonecore/test/behavior_upkeep.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { makeCommune, makeMonster, makeWorldMarker, NOW, testEngine, ZONE_ID } from "./testUtils";

// 100000 real seconds is about 34.7 game days, past the 28-day cycle.
const OVERDUE_SINCE = new Date(NOW.getTime() - 100_000 * 1000).toISOString();

test("[behavior] upkeep is charged to the owner's commune once a cycle has passed", () => {
  const monster = makeMonster("m1", { x: 3, y: 3, metadata: { created_at: OVERDUE_SINCE } });
  const result = testEngine().tick(ZONE_ID, [makeWorldMarker(), makeCommune("c1", "player-1"), monster], [], 1);

  assert.deepEqual(result.updates, [
    { id: "c1", metadata: { kind: "commune", renown: 950, total_renown_spent: 0 } },
    { id: "m1", metadata: { ...monster.metadata, last_upkeep_paid: NOW.toISOString() } },
  ]);
});

test("[behavior] upkeep opens a commune for an owner without one", () => {
  const monster = makeMonster("m1", { x: 3, y: 3, metadata: { created_at: OVERDUE_SINCE } });
  const result = testEngine().tick(ZONE_ID, [makeWorldMarker(), monster], [], 1);

  assert.deepEqual(result.creates, [
    {
      id: "new-1",
      x: 0,
      y: 0,
      width: 0,
      height: 0,
      ownerId: "player-1",
      metadata: { kind: "commune", renown: 950, total_renown_spent: 0 },
    },
  ]);
});

test("[behavior] unpaid upkeep marks the monster overdue", () => {
  const monster = makeMonster("m1", { x: 3, y: 3, metadata: { last_upkeep_paid: OVERDUE_SINCE } });
  const result = testEngine().tick(
    ZONE_ID,
    [makeWorldMarker(), makeCommune("c1", "player-1", { renown: 10 }), monster],
    [],
    1,
  );

  assert.deepEqual(result.updates, [
    {
      id: "m1",
      metadata: {
        ...monster.metadata,
        upkeep_overdue: true,
        upkeep_overdue_since: NOW.toISOString(),
        upkeep_required: 50,
      },
    },
  ]);
});

test("[behavior] overdue flags clear inside a paid cycle", () => {
  const monster = makeMonster("m1", {
    x: 3,
    y: 3,
    metadata: { last_upkeep_paid: NOW.toISOString(), upkeep_overdue: true, upkeep_required: 50 },
  });
  const result = testEngine().tick(ZONE_ID, [makeWorldMarker(), monster], [], 1);

  const expected = { ...monster.metadata };
  delete expected.upkeep_overdue;
  delete expected.upkeep_required;
  assert.deepEqual(result.updates, [{ id: "m1", metadata: expected }]);
});

test("[behavior] monsters without an owner pay nothing", () => {
  const monster = makeMonster("m1", { x: 3, y: 3, ownerId: null, metadata: { created_at: OVERDUE_SINCE } });
  const result = testEngine().tick(ZONE_ID, [makeWorldMarker(), monster], [], 1);

  assert.deepEqual(result.updates, []);
  assert.deepEqual(result.creates, []);
});
