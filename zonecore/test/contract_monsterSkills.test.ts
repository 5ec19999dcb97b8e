// zonecore/test/contract_monsterSkills.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { defaultSkillDefs } from "../catalog/defaults";
import { craftingDuration } from "../crafting/CraftingRolls";
import { adjustedCost, costMultiplier } from "../economy/Commune";
import {
  ageBonus,
  effectiveQuality,
  effectiveQuantity,
  monsterCapacity,
  monsterStat,
} from "../monsters/MonsterStats";
import { applySkillGain, skillValue } from "../skills/SkillProgression";
import { COTTON_BOLLS, makeMonster, NOW } from "./testUtils";

// One game day is 2880 real seconds.
function bornDaysAgo(gameDays: number): string {
  return new Date(NOW.getTime() - gameDays * 2880 * 1000).toISOString();
}

test("[contract] age bonus steps up at 30 and 60 game days", () => {
  assert.equal(ageBonus({ created_at: bornDaysAgo(20) }, NOW), 0);
  assert.equal(ageBonus({ created_at: bornDaysAgo(40) }, NOW), 1);
  assert.equal(ageBonus({ created_at: bornDaysAgo(70) }, NOW), 2);
  assert.equal(ageBonus({}, NOW), 0);
});

test("[contract] capacity is strength plus age", () => {
  assert.equal(monsterCapacity(makeMonster("m1"), NOW), 8);
  assert.equal(monsterCapacity(makeMonster("m1", { metadata: { created_at: bornDaysAgo(70) } }), NOW), 10);
  assert.equal(monsterStat(makeMonster("m1", { metadata: { stats: {} } }), "str", 8), 8);
});

test("[contract] abilities shape quality, quantity and duration", () => {
  const goblin = makeMonster("m1");
  const strong = makeMonster("m2", { metadata: { stats: { str: 18, dex: 10 } } });

  assert.equal(effectiveQuality(goblin, 0, NOW), 0.1);
  assert.equal(effectiveQuality(null, 0.4, NOW), 0.4);
  assert.equal(effectiveQuantity(strong, 2, NOW), 4);
  assert.equal(effectiveQuantity(null, 2, NOW), 2);
  assert.equal(craftingDuration(COTTON_BOLLS, goblin, NOW), 33);
  assert.equal(craftingDuration(COTTON_BOLLS, null, NOW), 60);
});

test("[contract] spawn prices rise with renown spent", () => {
  assert.equal(costMultiplier(0), 1);
  assert.equal(costMultiplier(1000), 1.1);
  assert.equal(costMultiplier(50000), 3);
  assert.equal(adjustedCost(2000, { total_renown_spent: 1000 }), 2200);
  assert.equal(adjustedCost(50, {}), 50);
});

test("[contract] crafting teaches the primary skill and forgets a little", () => {
  const goblin = makeMonster("m1");
  const gained = applySkillGain(goblin, COTTON_BOLLS, 33, defaultSkillDefs(), NOW);
  assert.ok(gained);

  assert.deepEqual(gained.report, {
    specific_skill: "cotton_bolls",
    specific_gain: 0,
    primary_skill: "gathering",
    primary_gain: 0.001499,
    secondary_gains: {},
    forgetting: 0.00027,
  });

  const after = { ...goblin, metadata: gained.metadata };
  assert.equal(skillValue(after, "cotton_bolls", "specific"), 0);
  assert.ok(Math.abs(skillValue(after, "gathering", "applied") - 0.00122925) < 1e-8);
  assert.equal("skills" in goblin.metadata, false);
});

test("[contract] matching transferable skills speed up primary learning", () => {
  const skills = { ...defaultSkillDefs(), relevant: { gathering: ["Outdoorsmonstership"] } };
  const monster = makeMonster("m1", { metadata: { skills: { transferable: ["outdoorsmonstership"] } } });

  const gained = applySkillGain(monster, COTTON_BOLLS, 10, skills, NOW);

  assert.equal(gained?.report.primary_gain, 0.000625);
});

test("[contract] no learning without a crafter or time", () => {
  assert.equal(applySkillGain(null, COTTON_BOLLS, 60, defaultSkillDefs(), NOW), null);
  assert.equal(applySkillGain(makeMonster("m1"), COTTON_BOLLS, 0, defaultSkillDefs(), NOW), null);
});

test("[contract] skill values never drop below zero", () => {
  const monster = makeMonster("m1", {
    metadata: { skills: { applied: { gathering: 0.1 } }, total_forgotten: 0.3 },
  });
  assert.equal(skillValue(monster, "gathering", "applied"), 0);
  assert.equal(skillValue(monster, "mining", "applied"), 0);
  assert.equal(skillValue(null, "gathering", "applied"), 0);
});
