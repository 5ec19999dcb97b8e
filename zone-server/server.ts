// zone-server/server.ts

import http from "http";
import { WebSocketServer, WebSocket, RawData } from "ws";

import { loadZoneConfig, ZoneConfig } from "../zonecore/config/ZoneConfig";
import { EntityStore } from "../zonecore/core/EntityStore";
import { ZoneTickLoop } from "../zonecore/core/ZoneTickLoop";
import { createPool, testDbConnection } from "../zonecore/db/Database";
import { ZoneTickEngine } from "../zonecore/engine/ZoneTickEngine";
import type { ZoneStateView } from "../zonecore/shared/Entity";
import { Logger } from "../zonecore/utils/logger";
import { Rng } from "../zonecore/utils/Rng";
import { InMemoryZoneRegistry } from "../zonecore/zones/InMemoryZoneRegistry";
import { PostgresZoneRegistry } from "../zonecore/zones/PostgresZoneRegistry";
import type { ZoneRecord, ZoneRegistry } from "../zonecore/zones/ZoneRegistry";
import { parseClientMessage } from "./protocol";

const log = Logger.scope("SERVER");

interface Session {
  playerId: string;
  zoneId: string;
}

async function openRegistry(cfg: ZoneConfig): Promise<ZoneRegistry> {
  if (!cfg.dbUrl) {
    log.info("ZONE_DB_URL not set; using in-memory zone registry");
    return new InMemoryZoneRegistry();
  }
  const pool = createPool(cfg.dbUrl);
  if (!(await testDbConnection(pool))) {
    log.warn("Falling back to in-memory zone registry");
    await pool.end();
    return new InMemoryZoneRegistry();
  }
  return new PostgresZoneRegistry(pool);
}

function resolveZone(zones: readonly ZoneRecord[], wanted: string | undefined): ZoneRecord | null {
  if (wanted === undefined) return zones[0] ?? null;
  return zones.find((z) => z.id === wanted || z.name === wanted) ?? null;
}

function send(socket: WebSocket, payload: object): void {
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(JSON.stringify(payload));
}

function rawText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

async function main(): Promise<void> {
  const cfg = loadZoneConfig();
  log.info("Starting zone server...", { host: cfg.host, port: cfg.port, tickIntervalMs: cfg.tickIntervalMs });

  const engine = new ZoneTickEngine({
    dataDir: cfg.dataDir,
    rng: cfg.rngSeed !== undefined ? new Rng(cfg.rngSeed) : undefined,
  });
  const zones = await engine.initZones(await openRegistry(cfg));

  const store = new EntityStore();
  const sessions = new Map<WebSocket, Session>();

  const broadcast = (zoneId: string, state: ZoneStateView): void => {
    for (const [socket, session] of sessions) {
      if (session.zoneId !== zoneId) continue;
      send(socket, { type: "state", ...engine.getPlayerState(zoneId, session.playerId, state) });
    }
  };

  const loop = new ZoneTickLoop(
    engine,
    store,
    zones.map((z) => z.id),
    { intervalMs: cfg.tickIntervalMs, onTick: (zoneId, _tick, state) => broadcast(zoneId, state) },
  );

  const server = http.createServer();
  const wss = new WebSocketServer({ server });

  wss.on("connection", (socket: WebSocket) => {
    socket.on("message", (data: RawData) => {
      const message = parseClientMessage(rawText(data));
      if (message === null) {
        send(socket, { type: "error", message: "Malformed message" });
        return;
      }

      if (message.type === "hello") {
        const zone = resolveZone(zones, message.zone);
        if (zone === null) {
          send(socket, { type: "error", message: `Unknown zone: ${message.zone ?? ""}` });
          return;
        }
        sessions.set(socket, { playerId: message.player_id, zoneId: zone.id });
        log.info("Player joined", { playerId: message.player_id, zone: zone.name });
        send(socket, { type: "welcome", zone_id: zone.id, player_id: message.player_id });
        return;
      }

      const session = sessions.get(socket);
      if (!session) {
        send(socket, { type: "error", message: "Say hello first" });
        return;
      }
      loop.enqueue(session.zoneId, { playerId: session.playerId, data: message.data });
    });

    socket.on("close", () => {
      const session = sessions.get(socket);
      sessions.delete(socket);
      if (!session) return;
      loop.enqueue(session.zoneId, {
        playerId: session.playerId,
        data: { action: "owner_disconnect", player_id: session.playerId },
      });
      log.info("Player left", { playerId: session.playerId });
    });
  });

  loop.start();

  const shutdown = (): void => {
    loop.stop();
    wss.close();
    server.close();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  server.listen(cfg.port, cfg.host, () => {
    log.success("Zone server listening", { host: cfg.host, port: cfg.port, zones: zones.length });
  });
}

main().catch((err: unknown) => {
  log.error("Fatal error in zone server", err instanceof Error ? err : { err });
  process.exit(1);
});
