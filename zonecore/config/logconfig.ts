// zonecore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "info",
  TICK: "info",
  ENGINE: "info",
  ZONE: "info",
  CATALOG: "info",
  CRAFTING: "info",
  ECONOMY: "info",
  DB: "info",
  INTENTS: "info",
};

// Env is read on every call so tests and the server can flip LOG_LEVEL at runtime.
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override, e.g. LOG_SCOPE_CRAFTING=debug
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Global override
  const global = parseLevel(process.env.LOG_LEVEL);
  if (global) return global;

  // 3) Default table, then "info"
  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
