// zonecore/test/behavior_recording_autorepeat.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { makeIntent, makeMonster, makeTerrain, makeWorldMarker, testEngine, ZONE_ID } from "./testUtils";

test("[behavior] moves made while recording are appended to the monster's task", () => {
  const engine = testEngine();
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3 })],
    [
      makeIntent("recording_start", { monster_id: "m1" }),
      makeIntent("move", { entity_id: "m1", direction: "right" }),
    ],
    1,
  );

  assert.equal(result.updates.length, 1);
  const update = result.updates[0];
  assert.equal(update.x, 4);
  assert.equal(update.y, 3);
  assert.deepEqual(update.metadata?.current_task, {
    is_recording: true,
    is_playing: false,
    actions: [{ action: "move", dx: 1, dy: 0 }],
  });
  assert.deepEqual(result.extras, {
    events: [{ type: "recording_started", target_player_id: "player-1" }],
  });
});

test("[behavior] recording_stop clears the recording flag and keeps the actions", () => {
  const engine = testEngine();
  const task = { is_recording: true, is_playing: false, actions: [{ action: "move", dx: 0, dy: 1 }] };
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3, metadata: { current_task: task } })],
    [makeIntent("recording_stop", { entity_id: "m1" })],
    1,
  );

  assert.deepEqual(result.updates[0].metadata?.current_task, { ...task, is_recording: false });
});

test("[behavior] autorepeat_start refuses an empty recording", () => {
  const engine = testEngine();
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3 })],
    [makeIntent("autorepeat_start", { monster_id: "m1" })],
    1,
  );

  assert.deepEqual(result.updates, []);
  assert.deepEqual(result.extras, {
    events: [{ type: "error", message: "No recorded actions to replay", target_player_id: "player-1" }],
  });
});

test("[behavior] autorepeat replays one step per tick and wraps the play index", () => {
  const engine = testEngine();
  const task = {
    is_recording: false,
    is_playing: true,
    play_index: 1,
    actions: [
      { action: "move", dx: 1, dy: 0 },
      { action: "move", dx: -1, dy: 0 },
    ],
  };
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 5, y: 3, metadata: { current_task: task } })],
    [],
    1,
  );

  assert.equal(result.updates.length, 1);
  assert.equal(result.updates[0].x, 4);
  assert.deepEqual(result.updates[0].metadata?.current_task, { ...task, play_index: 0 });
  assert.deepEqual(result.extras, { events: [{ type: "autorepeat_step", target_player_id: "player-1" }] });
});

test("[behavior] a blocked replay step stops playback without moving", () => {
  const engine = testEngine();
  const task = { is_playing: true, play_index: 0, actions: [{ action: "move", dx: 1, dy: 0 }] };
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3, metadata: { current_task: task } }), makeTerrain("t1", { x: 4, y: 3 })],
    [],
    1,
  );

  assert.equal(result.updates.length, 1);
  assert.equal(result.updates[0].x, undefined);
  assert.deepEqual(result.updates[0].metadata?.current_task, { ...task, is_playing: false });
  assert.deepEqual(result.extras, {});
});

test("[behavior] an out-of-range play index restarts from the first step", () => {
  const engine = testEngine();
  const task = { is_playing: true, play_index: 7, actions: [{ action: "move", dx: 0, dy: 1 }] };
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3, metadata: { current_task: task } })],
    [],
    1,
  );

  assert.equal(result.updates[0].y, 4);
  assert.deepEqual(result.updates[0].metadata?.current_task, { ...task, play_index: 0 });
});

test("[behavior] autorepeat_stop ends playback", () => {
  const engine = testEngine();
  const task = { is_playing: true, play_index: 0, actions: [{ action: "move", dx: 0, dy: 1 }] };
  const result = engine.tick(
    ZONE_ID,
    [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3, metadata: { current_task: task } })],
    [makeIntent("autorepeat_stop", { monster_id: "m1" })],
    1,
  );

  assert.deepEqual(result.updates[0].metadata?.current_task, { ...task, is_playing: false });
  assert.equal(result.updates[0].y, undefined);
  assert.deepEqual(result.extras, { events: [{ type: "autorepeat_stopped", target_player_id: "player-1" }] });
});
