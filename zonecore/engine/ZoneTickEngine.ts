// zonecore/engine/ZoneTickEngine.ts
//
// Public entry point. One engine serves every zone it was initialised with;
// each tick is a pure function of (snapshot, intents, tick number, clock,
// rng) that returns a diff. The engine never writes to storage itself.

import path from "node:path";

import { Catalog } from "../catalog/Catalog";
import { loadCatalog } from "../catalog/CatalogLoader";
import type { ZoneDef } from "../catalog/CatalogTypes";
import { defaultZoneDef } from "../catalog/defaults";
import { processCrafting } from "../crafting/CraftingEngine";
import { syncDispensers } from "../containers/Containers";
import { processUpkeep } from "../economy/Upkeep";
import { applyIntents } from "../intents/IntentDispatcher";
import { processAutorepeat } from "../movement/Autorepeat";
import { clearActivePushes } from "../movement/PushResolver";
import type { Intent, TickResult, ZoneEntity, ZoneStateView } from "../shared/Entity";
import { DEFAULT_ZONE_SIZE } from "../shared/Kinds";
import { Logger } from "../utils/logger";
import { RandomSource, Rng } from "../utils/Rng";
import { uuidv4 } from "../utils/uuid";
import { bootstrapZone, findWorldMarker } from "../zones/ZoneBootstrap";
import type { ZoneRecord, ZoneRegistry } from "../zones/ZoneRegistry";
import { TickContext, ZoneLayout } from "./TickContext";
import { ZoneTickError } from "./ZoneTickError";

const log = Logger.scope("ENGINE");

export const DEFAULT_DATA_DIR = path.resolve(__dirname, "..", "data");

export interface ZoneTickEngineOptions {
  /** Preloaded catalog; wins over `dataDir`. */
  catalog?: Catalog;
  dataDir?: string;
  rng?: RandomSource;
  clock?: () => Date;
  idFactory?: () => string;
}

export interface TickOptions {
  rng?: RandomSource;
  now?: Date;
}

export class ZoneTickEngine {
  readonly catalog: Catalog;

  private readonly rng: RandomSource;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  private readonly defsById = new Map<string, ZoneDef>();
  private readonly sizesById = new Map<string, [number, number]>();
  private readonly initialized = new Set<string>();

  constructor(opts: ZoneTickEngineOptions = {}) {
    this.catalog = opts.catalog ?? loadCatalog(opts.dataDir ?? DEFAULT_DATA_DIR);
    this.rng = opts.rng ?? new Rng(Date.now());
    this.clock = opts.clock ?? (() => new Date());
    this.newId = opts.idFactory ?? uuidv4;
  }

  zoneDefs(): readonly ZoneDef[] {
    return this.catalog.zones.length > 0 ? this.catalog.zones : [defaultZoneDef()];
  }

  /** Looks up (or creates) a registry zone per definition and remembers id -> definition. */
  async initZones(registry: ZoneRegistry): Promise<ZoneRecord[]> {
    const zones: ZoneRecord[] = [];
    for (const def of this.zoneDefs()) {
      let zone = await registry.getZoneByName(def.name);
      if (zone === null) {
        zone = await registry.createZone({
          name: def.name,
          width: def.width,
          height: def.height,
          metadata: { source: "zonecore" },
        });
        log.info(`Created zone '${def.name}' (${zone.id})`);
      } else {
        log.info(`Using existing zone '${def.name}' (${zone.id})`);
      }
      this.registerZone(zone.id, def, zone.width, zone.height);
      zones.push(zone);
    }
    log.info("Zone engine initialized", { zones: zones.length });
    return zones;
  }

  /** Binds a zone id without a registry round-trip. */
  registerZone(zoneId: string, def: ZoneDef, width = def.width, height = def.height): void {
    this.defsById.set(zoneId, def);
    this.sizesById.set(zoneId, [width, height]);
  }

  layoutFor(zoneId: string): ZoneLayout {
    const def = this.defsById.get(zoneId) ?? null;
    const [width, height] = this.sizesById.get(zoneId) ?? DEFAULT_ZONE_SIZE;
    return { name: def?.name ?? "Starting Village", width, height, def };
  }

  tick(
    zoneId: string,
    entities: readonly ZoneEntity[],
    intents: readonly Intent[],
    tickNumber: number,
    opts: TickOptions = {},
  ): TickResult {
    const ctx = new TickContext(
      {
        zoneId,
        tickNumber,
        layout: this.layoutFor(zoneId),
        catalog: this.catalog,
        rng: opts.rng ?? this.rng,
        now: opts.now ?? this.clock(),
        newId: this.newId,
      },
      entities,
    );

    try {
      if (!this.initialized.has(zoneId) && findWorldMarker(entities) === null) bootstrapZone(ctx);

      applyIntents(ctx, intents);
      processAutorepeat(ctx);
      processCrafting(ctx);
      processUpkeep(ctx);
      clearActivePushes(ctx);
      syncDispensers(ctx);
    } catch (err) {
      if (err instanceof ZoneTickError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Tick ${tickNumber} failed for zone ${zoneId}`, err instanceof Error ? err : { error: message });
      throw new ZoneTickError(message, zoneId, tickNumber);
    }

    const result = ctx.finish();
    // a failed tick seeds again next time
    this.initialized.add(zoneId);
    return result;
  }

  /** Per-player projection: events for everyone plus those targeted at `playerId`. */
  getPlayerState(_zoneId: string, playerId: string, fullState: ZoneStateView): ZoneStateView {
    const state: ZoneStateView = { ...fullState };
    const events = fullState.events;
    if (events && events.length > 0) {
      state.events = events.filter((event) => {
        const target = event.target_player_id;
        return !target || target === playerId;
      });
    }
    state.viewer_id = playerId;
    return state;
  }
}
