// zonecore/test/contract_shares.test.ts

import assert from "node:assert/strict";
import test from "node:test";

import { appendShare, buildOutputShares, itemShares, Share } from "../economy/Shares";
import { COTTON_THREAD, makeItem, makeMonster, makeWorkshop } from "./testUtils";

test("[contract] output shares split tools by weight and give the workshop eight", () => {
  const recipe = { ...COTTON_THREAD, tools_weights: [3, 1] };
  const crafter = makeMonster("m1");
  const bolls = makeItem("c1", {
    metadata: {
      name: "Cotton Bolls",
      shares: [{ monster_id: "m9", player_id: "player-9", count: 2, description: "Produced Cotton Bolls" }],
    },
  });
  const spindle = makeItem("t1", {
    metadata: {
      name: "Spindle",
      shares: [
        { player_id: "player-2", count: 1 },
        { player_id: "player-3", count: 3 },
      ],
    },
  });
  const knife = makeItem("t2", { metadata: { name: "Bone Knife", producer_player_id: "player-4" } });
  const plain = makeItem("t3", { metadata: { name: "Stick" } });
  const shed = makeWorkshop("ws", {
    metadata: {
      name: "Weaving Shed",
      shares: [
        { player_id: "player-5", count: 1 },
        { monster_id: "m7", player_id: "player-6", count: 1 },
      ],
    },
  });

  assert.deepEqual(buildOutputShares(recipe, crafter, [spindle, knife, plain], [bolls], shed), [
    { monster_id: "m9", player_id: "player-9", count: 2, description: "Produced Cotton Bolls" },
    { monster_id: null, player_id: "player-2", count: 0.75, description: "Contributed to Spindle" },
    { monster_id: null, player_id: "player-3", count: 2.25, description: "Contributed to Spindle" },
    { monster_id: null, player_id: "player-4", count: 1, description: "Contributed to Bone Knife" },
    { monster_id: null, player_id: "player-5", count: 4, description: "Contributed to Weaving Shed" },
    { monster_id: "m7", player_id: "player-6", count: 4, description: "Contributed to Weaving Shed" },
    { monster_id: "m1", player_id: "player-1", count: 2, description: "Produced Cotton Thread" },
  ]);
});

test("[contract] a tool past the weight list counts once", () => {
  const recipe = { ...COTTON_THREAD, tools_weights: [2], value_added_shares: 0 };
  const first = makeItem("t1", { metadata: { name: "Spindle", producer_player_id: "player-2" } });
  const second = makeItem("t2", { metadata: { name: "Spindle", producer_player_id: "player-2" } });

  assert.deepEqual(buildOutputShares(recipe, null, [first, second], [], null), [
    { monster_id: null, player_id: "player-2", count: 3, description: "Contributed to Spindle" },
  ]);
});

test("[contract] item shares skip empty counts and fall back to the producer", () => {
  assert.deepEqual(
    itemShares({ shares: [{ owner_id: "player-2", count: 0 }, { monster: "m3", owner_id: "player-3", count: 1.5 }] }),
    [{ monster_id: "m3", player_id: "player-3", count: 1.5, description: "" }],
  );
  assert.deepEqual(itemShares({ good_type: "cotton_bolls", producer_monster_id: "m1" }), [
    { monster_id: "m1", player_id: null, count: 1, description: "Produced cotton_bolls" },
  ]);
  assert.deepEqual(itemShares({}), []);
});

test("[contract] appending merges matching shares and ignores anonymous ones", () => {
  const shares: Share[] = [];
  appendShare(shares, "m1", "player-1", 1, "Produced Thread");
  appendShare(shares, "m1", "player-1", 0.5, "Produced Thread");
  appendShare(shares, null, null, 5, "Nobody");
  appendShare(shares, "m1", "player-1", 0, "Produced Thread");

  assert.deepEqual(shares, [{ monster_id: "m1", player_id: "player-1", count: 1.5, description: "Produced Thread" }]);
});
