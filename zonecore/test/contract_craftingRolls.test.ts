// zonecore/test/contract_craftingRolls.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import type { GoodTypeEntry } from "../catalog/CatalogTypes";
import { RollInputs, rollQuality, rollQuantity } from "../crafting/CraftingRolls";
import type { ZoneEntity } from "../shared/Entity";
import { Rng } from "../utils/Rng";
import { COTTON_BOLLS, makeItem, makeMonster, NOW, SequenceRandom } from "./testUtils";

// Cotton Bolls with two secondary skills and a spindle worth three times the knife.
const BOLLS: GoodTypeEntry = {
  ...COTTON_BOLLS,
  secondary_applied_skills: ["botany", "weaving"],
  tools_weights: [3, 1],
};

function goblin(transferable: string[] = [], stats?: Record<string, number>): ZoneEntity {
  return makeMonster("gob", {
    metadata: {
      ...(stats ? { stats } : {}),
      skills: {
        applied: { gathering: 0.5, botany: 0.75, weaving: 0.25 },
        specific: { cotton_bolls: 0.5 },
        transferable,
      },
    },
  });
}

const TOOLS = [makeItem("spindle", { metadata: { quality: 1 } }), makeItem("knife", { metadata: { quality: 0.5 } })];

function rolls(crafter: ZoneEntity | null, gauss: number[] = [], recipe: GoodTypeEntry = BOLLS): RollInputs {
  return { recipe, crafter, inputs: [], tools: TOOLS, rng: new SequenceRandom(gauss), now: NOW };
}

function near(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

test("[contract] quality blends skill, tools and dexterity, then the wisdom bonus", () => {
  // mu = 1 * 0.5 * avg(0.25, 0.75) + avg(0.5, 1, 1, 1) * 0.5 * min(1.2, 18 / 10) = 0.775
  // plus (8 + 8 * 0.25) / 25 * (1 - 0.775) * 0.25
  near(rollQuality(rolls(goblin())), 0.7975);
});

test("[contract] a matching transferable skill drops the weakest secondary skill and tools", () => {
  // weaving 0.25, the knife and one spindle slot no longer count
  // mu = 1 * 0.5 * 0.75 + 1 * 0.5 * 1.2 = 0.975
  near(rollQuality(rolls(goblin(["Outdoorsmonstership"]))), 0.9775);
  near(rollQuality(rolls(goblin(["Woodworking"]))), 0.7975);
});

test("[contract] quality noise is clamped at zero before the wisdom bonus", () => {
  near(rollQuality(rolls(goblin(), [-20])), 0.1);
  near(rollQuality(rolls(goblin(), [1])), 0.875 + 0.4 * 0.125 * 0.25);
});

test("[contract] quality without a crafter or quality flag averages inputs and tools", () => {
  const input = makeItem("bolls", { metadata: { quality: 0.5 } });
  assert.equal(rollQuality({ ...rolls(null), inputs: [input] }), 0.5);
  assert.equal(rollQuality(rolls(goblin(), [], { ...BOLLS, has_quality: false })), 0.9375);
});

test("[contract] quantity rolls upward by the absolute noise and crafter strength", () => {
  assert.equal(rollQuantity(rolls(goblin(), [0])), 1);
  // sigma = 1 * 0.05 * 18 * 0.5 * 0.5 * 1 * 0.75; |-20 * sigma| + 1 = 4.375
  assert.equal(rollQuantity(rolls(goblin(["outdoorsmonstership"]), [-20])), 4);
  // the weak skill and tool stay in: 1 + 20 * 0.225 * 0.875 * 0.5 = 2.96875
  assert.equal(rollQuantity(rolls(goblin(), [-20])), 3);
});

test("[contract] quantity never rolls below one", () => {
  const empty = { ...BOLLS, quantity: 0 };
  assert.equal(rollQuantity(rolls(null, [], { ...BOLLS, quantity: -3 })), 1);
  assert.equal(rollQuantity(rolls(goblin(), [0], empty)), 1);
  const feeble = goblin([], { str: 1, dex: 10, con: 10, int: 10, wis: 8, cha: 16 });
  assert.equal(rollQuantity(rolls(feeble, [0])), 1);
});

test("[contract] a seeded rng replays the same rolls", () => {
  const first = { ...rolls(goblin()), rng: new Rng("craft-seed") };
  const second = { ...rolls(goblin()), rng: new Rng("craft-seed") };
  assert.deepEqual([rollQuality(first), rollQuantity(first)], [rollQuality(second), rollQuantity(second)]);
});
