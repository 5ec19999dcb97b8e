// zonecore/config/ZoneConfig.ts
//
// Host configuration. The engine itself never reads the environment; only
// the zone server calls loadZoneConfig().

import dotenv from "dotenv";
import { z } from "zod";

export class ConfigError extends Error {
  constructor(readonly keys: string[], message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const EnvSchema = z.object({
  ZONE_DATA_DIR: optionalText,
  ZONE_TICK_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  ZONE_WS_HOST: z.string().min(1).default("0.0.0.0"),
  ZONE_WS_PORT: z.coerce.number().int().min(0).max(65535).default(7788),
  ZONE_DB_URL: optionalText,
  ZONE_RNG_SEED: optionalText.pipe(z.coerce.number().int().optional()),
});

export interface ZoneConfig {
  dataDir: string | undefined;
  tickIntervalMs: number;
  host: string;
  port: number;
  dbUrl: string | undefined;
  rngSeed: number | undefined;
}

export function parseZoneConfig(env: NodeJS.ProcessEnv): ZoneConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigError(keys, `Invalid configuration: ${keys.join(", ")}`);
  }
  const e = parsed.data;
  return {
    dataDir: e.ZONE_DATA_DIR,
    tickIntervalMs: e.ZONE_TICK_INTERVAL_MS,
    host: e.ZONE_WS_HOST,
    port: e.ZONE_WS_PORT,
    dbUrl: e.ZONE_DB_URL,
    rngSeed: e.ZONE_RNG_SEED,
  };
}

/** Loads .env into process.env (existing values win) and validates it. */
export function loadZoneConfig(): ZoneConfig {
  dotenv.config();
  return parseZoneConfig(process.env);
}
