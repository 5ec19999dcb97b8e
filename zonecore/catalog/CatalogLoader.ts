// zonecore/catalog/CatalogLoader.ts
//
// Loads the static data directory once at engine construction:
//   zones/*.json                 zone definitions (sorted by file name)
//   tech_tree/good_types.json    { good_types: [...] }
//   monster_types.json           { monster_types: { key: {...} } }
//   skills.json                  { transferable_skills, applied_skills, relevant_transferable_skills }
// Any missing or unreadable file falls back to the built-in defaults.

import fs from "node:fs";
import path from "node:path";

import { Logger } from "../utils/logger";
import { normalizeSkillKey, truthy } from "../shared/Metadata";
import { Catalog } from "./Catalog";
import {
  GoodTypeEntry,
  GoodTypeSchema,
  GoodTypesFileSchema,
  MonsterTypeEntry,
  MonsterTypeSchema,
  MonsterTypesFileSchema,
  SkillDefs,
  SkillsFileSchema,
  ZoneDef,
  ZoneDefSchema,
} from "./CatalogTypes";
import { DEFAULT_MONSTER_TYPES, defaultSkillDefs } from "./defaults";

const log = Logger.scope("CATALOG");

function readJson(file: string): unknown {
  if (!fs.existsSync(file)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    log.warn("Unreadable data file", { file, err });
    return undefined;
  }
}

export function loadZoneDefs(dataDir: string): ZoneDef[] {
  const zoneDir = path.join(dataDir, "zones");
  if (!fs.existsSync(zoneDir)) return [];

  const defs: ZoneDef[] = [];
  const files = fs.readdirSync(zoneDir).filter((f) => f.endsWith(".json")).sort();
  for (const file of files) {
    const raw = readJson(path.join(zoneDir, file));
    const parsed = ZoneDefSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn("Invalid zone definition", { file });
      continue;
    }
    defs.push(parsed.data);
  }
  return defs;
}

export function loadGoodTypes(dataDir: string): GoodTypeEntry[] {
  const raw = readJson(path.join(dataDir, "tech_tree", "good_types.json"));
  if (raw === undefined) return [];

  const file = GoodTypesFileSchema.safeParse(raw);
  if (!file.success) {
    log.warn("good_types.json has no good_types list");
    return [];
  }

  const entries: GoodTypeEntry[] = [];
  let skipped = 0;
  for (const candidate of file.data.good_types) {
    const parsed = GoodTypeSchema.safeParse(candidate);
    if (parsed.success) {
      entries.push(parsed.data);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    log.warn("Skipped good types without a name", { skipped });
  }
  return entries;
}

export function loadMonsterTypes(dataDir: string): Record<string, MonsterTypeEntry> {
  const raw = readJson(path.join(dataDir, "monster_types.json"));
  const file = MonsterTypesFileSchema.safeParse(raw);
  if (!file.success) return { ...DEFAULT_MONSTER_TYPES };

  const resolved: Record<string, MonsterTypeEntry> = {};
  for (const [key, value] of Object.entries(file.data.monster_types)) {
    const parsed = MonsterTypeSchema.safeParse(value);
    if (!parsed.success) continue;
    resolved[key.toLowerCase()] = parsed.data;
  }
  return Object.keys(resolved).length > 0 ? resolved : { ...DEFAULT_MONSTER_TYPES };
}

function normalizeList(values: unknown[]): string[] {
  return values.filter(truthy).map(normalizeSkillKey);
}

export function loadSkillDefs(dataDir: string): SkillDefs {
  const raw = readJson(path.join(dataDir, "skills.json"));
  const file = SkillsFileSchema.safeParse(raw);
  if (!file.success) return defaultSkillDefs();

  const defaults = defaultSkillDefs();
  const transferable = normalizeList(file.data.transferable_skills);
  const applied = normalizeList(file.data.applied_skills);

  const relevant: Record<string, string[]> = {};
  for (const [key, values] of Object.entries(file.data.relevant_transferable_skills)) {
    if (!key) continue;
    relevant[normalizeSkillKey(key)] = normalizeList(values);
  }

  return {
    transferable: transferable.length > 0 ? transferable : defaults.transferable,
    applied: applied.length > 0 ? applied : defaults.applied,
    relevant,
  };
}

export function loadCatalog(dataDir: string): Catalog {
  const catalog = new Catalog({
    zones: loadZoneDefs(dataDir),
    goodTypes: loadGoodTypes(dataDir),
    monsterTypes: loadMonsterTypes(dataDir),
    skills: loadSkillDefs(dataDir),
  });

  log.info("Catalog loaded", {
    dataDir,
    zones: catalog.zones.length,
    goodTypes: catalog.allGoodTypes().length,
  });
  return catalog;
}
