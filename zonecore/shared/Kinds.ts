// zonecore/shared/Kinds.ts

export const EntityKind = {
  World: "world_marker",
  Commune: "commune",
  Monster: "monster",
  Item: "item",
  Workshop: "workshop",
  Gathering: "gathering_spot",
  Dispenser: "dispenser",
  Wagon: "wagon",
  Terrain: "terrain_block",
  Signpost: "signpost",
  Delivery: "delivery",
} as const;

export const BLOCKING_KINDS: ReadonlySet<string> = new Set<string>([
  EntityKind.Monster,
  EntityKind.Item,
  EntityKind.Workshop,
  EntityKind.Gathering,
  EntityKind.Dispenser,
  EntityKind.Wagon,
  EntityKind.Terrain,
  EntityKind.Delivery,
]);

export const PUSHABLE_KINDS: ReadonlySet<string> = new Set<string>([EntityKind.Item]);

export type Direction = "up" | "down" | "left" | "right";

export const DIR_TO_DELTA: Readonly<Record<Direction, readonly [number, number]>> = {
  up: [0, -1],
  down: [0, 1],
  left: [-1, 0],
  right: [1, 0],
};

export const ABILITY_KEYS = ["str", "dex", "con", "int", "wis", "cha"] as const;

export const DEFAULT_ITEM_SIZE: readonly [number, number] = [2, 1];
export const DEFAULT_CONTAINER_CAPACITY = 20;

export const GAME_TIME_MULTIPLIER = 30;
export const UPKEEP_CYCLE_DAYS = 28;
export const STARTING_RENOWN = 1000;
export const DEFAULT_ZONE_SIZE: readonly [number, number] = [100, 100];
