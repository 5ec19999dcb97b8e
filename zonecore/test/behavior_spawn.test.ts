// zonecore/test/behavior_spawn.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { resolveTransferableSkills } from "../economy/Spawning";
import type { TickResult } from "../shared/Entity";
import {
  makeCommune,
  makeIntent,
  makeMonster,
  makeWorldMarker,
  NOW,
  testEngine,
  ZONE_ID,
} from "./testUtils";

const SKILLS = ["mathematics", "science", "engineering"];

function spawn(data: Record<string, unknown>, extra = [makeWorldMarker()]): TickResult {
  return testEngine().tick(ZONE_ID, extra, [makeIntent("spawn_monster", data)], 1);
}

test("[behavior] first spawn opens a commune and charges the base cost", () => {
  const result = spawn({ monster_type: "Goblin", name: "Gob", transferable_skills: SKILLS });

  assert.equal(result.creates.length, 2);
  assert.deepEqual(result.creates[0], {
    id: "new-1",
    x: 0,
    y: 0,
    width: 0,
    height: 0,
    ownerId: "player-1",
    metadata: { kind: "commune", renown: 950, total_renown_spent: 50 },
  });

  const monster = result.creates[1];
  assert.equal(monster.id, "new-2");
  assert.equal(monster.x, 3);
  assert.equal(monster.y, 3);
  assert.equal(monster.ownerId, "player-1");
  assert.equal(monster.metadata.monster_type, "goblin");
  assert.equal(monster.metadata.name, "Gob");
  assert.deepEqual(monster.metadata.stats, { str: 8, dex: 18, con: 10, int: 10, wis: 8, cha: 16 });
  assert.equal(monster.metadata.body_cap, 150);
  assert.equal(monster.metadata.created_at, NOW.toISOString());
  assert.deepEqual(monster.metadata.skills, {
    transferable: SKILLS,
    applied: {},
    specific: {},
    last_used: {},
    last_decay_at: {},
  });
  assert.deepEqual(result.extras, {
    events: [{ type: "spawned", message: "Spawned Gob", target_player_id: "player-1" }],
  });
});

test("[behavior] spawning without enough renown creates nothing", () => {
  const result = spawn({ monster_type: "orc", transferable_skills: SKILLS });

  assert.deepEqual(result.creates, []);
  assert.deepEqual(result.extras, {
    events: [{ type: "error", message: "Not enough renown (1000 < 2000)", target_player_id: "player-1" }],
  });
});

test("[behavior] the spawn price rises with renown already spent", () => {
  const result = spawn({ monster_type: "orc", transferable_skills: SKILLS }, [
    makeWorldMarker(),
    makeCommune("c1", "player-1", { renown: 5000, total_renown_spent: 1000 }),
  ]);

  assert.equal(result.creates.length, 1);
  assert.deepEqual(result.updates, [
    { id: "c1", metadata: { kind: "commune", renown: 2800, total_renown_spent: 3200 } },
  ]);
});

test("[behavior] an occupied spawn point falls back to (2, 2)", () => {
  const result = spawn({ transferable_skills: SKILLS }, [makeWorldMarker(), makeMonster("m1", { x: 3, y: 3 })]);

  const monster = result.creates[1];
  assert.equal(monster.x, 2);
  assert.equal(monster.y, 2);
  assert.equal(monster.metadata.name, "Monster");
  assert.equal(monster.metadata.monster_type, "goblin");
});

test("[behavior] unknown monster types are rejected", () => {
  const result = spawn({ monster_type: "dragon", transferable_skills: SKILLS });

  assert.deepEqual(result.creates, []);
  assert.deepEqual(result.extras, {
    events: [{ type: "error", message: "Unknown monster type: dragon", target_player_id: "player-1" }],
  });
});

test("[contract] transferable skill selection rules", () => {
  const catalogSkills = ["mathematics", "science", "engineering", "visual_art"];

  assert.deepEqual(resolveTransferableSkills("mathematics", catalogSkills), {
    ok: false,
    message: "Transferable skills must be a list",
  });
  assert.deepEqual(resolveTransferableSkills(["mathematics"], catalogSkills), {
    ok: false,
    message: "Must select exactly 3 transferable skills",
  });
  assert.deepEqual(resolveTransferableSkills(["mathematics", "science", "juggling"], catalogSkills), {
    ok: false,
    message: "Invalid transferable skills: juggling",
  });
  assert.deepEqual(resolveTransferableSkills(["science", "Science", "mathematics"], catalogSkills), {
    ok: false,
    message: "Duplicate transferable skills selected",
  });
  assert.deepEqual(resolveTransferableSkills(["Visual Art", "science", "mathematics"], catalogSkills), {
    ok: true,
    skills: ["visual_art", "science", "mathematics"],
  });
});
