// zonecore/catalog/defaults.ts
//
// Built-in fallbacks used when a data file is absent or unreadable.

import type { MonsterTypeEntry, SkillDefs, ZoneDef } from "./CatalogTypes";

export const DEFAULT_MONSTER_TYPES: Record<string, MonsterTypeEntry> = {
  cyclops: {
    name: "Cyclops",
    cost: 100,
    stats: { str: 18, dex: 10, con: 16, int: 8, wis: 10, cha: 8 },
    body_cap: 100,
    mind_cap: 100,
  },
  elf: {
    name: "Elf",
    cost: 150,
    stats: { str: 8, dex: 16, con: 10, int: 18, wis: 12, cha: 10 },
    body_cap: 50,
    mind_cap: 150,
  },
  goblin: {
    name: "Goblin",
    cost: 50,
    stats: { str: 8, dex: 18, con: 10, int: 10, wis: 8, cha: 16 },
    body_cap: 150,
    mind_cap: 50,
  },
  orc: {
    name: "Orc",
    cost: 2000,
    stats: { str: 16, dex: 10, con: 18, int: 8, wis: 10, cha: 8 },
    body_cap: 150,
    mind_cap: 50,
  },
  troll: {
    name: "Troll",
    cost: 1,
    stats: { str: 12, dex: 8, con: 14, int: 8, wis: 10, cha: 8 },
    body_cap: 1500,
    mind_cap: 1500,
  },
};

export const DEFAULT_TRANSFERABLE_SKILLS = [
  "mathematics",
  "science",
  "engineering",
  "writing",
  "visual_art",
  "music",
  "handcrafts",
  "athletics",
  "outdoorsmonstership",
  "social",
];

export const DEFAULT_APPLIED_SKILLS = [
  "hauling",
  "wagon_driving",
  "sericulture",
  "spinning",
  "weaving",
  "harvesting",
  "textiles",
  "threshing",
  "gathering",
  "dyeing",
  "prospecting",
  "chemistry",
  "milling",
  "confectionery",
  "firing",
  "pottery",
  "painting",
  "casting",
  "stone_carving",
  "carpentry",
  "blacksmithing",
];

export function defaultSkillDefs(): SkillDefs {
  return {
    transferable: [...DEFAULT_TRANSFERABLE_SKILLS],
    applied: [...DEFAULT_APPLIED_SKILLS],
    relevant: {},
  };
}

export function defaultZoneDef(): ZoneDef {
  return {
    name: "Starting Village",
    width: 60,
    height: 20,
    spawn_points: [{ x: 3, y: 3 }],
    static_entities: [],
  };
}
