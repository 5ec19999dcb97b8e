// zonecore/core/ZoneTickLoop.ts

import type { ZoneTickEngine } from "../engine/ZoneTickEngine";
import { ZoneTickError } from "../engine/ZoneTickError";
import type { Intent, ZoneEvent, ZoneStateView } from "../shared/Entity";
import { Logger } from "../utils/logger";
import type { EntityStore } from "./EntityStore";

export interface ZoneTickLoopConfig {
  intervalMs: number;

  /** Called after each applied tick with the zone's full (unfiltered) state. */
  onTick?: (zoneId: string, tickNumber: number, state: ZoneStateView) => void;
}

/**
 * Fixed-interval driver for a set of zones. Intents queue per zone between
 * ticks and are handed to the engine in arrival order.
 */
export class ZoneTickLoop {
  private readonly log = Logger.scope("TICK");
  private readonly intervalMs: number;

  private running = false;
  private handle: NodeJS.Timeout | null = null;

  private readonly queues = new Map<string, Intent[]>();
  private readonly ticks = new Map<string, number>();

  constructor(
    private readonly engine: ZoneTickEngine,
    private readonly store: EntityStore,
    private readonly zoneIds: readonly string[],
    private readonly cfg: ZoneTickLoopConfig,
  ) {
    this.intervalMs = Math.max(cfg.intervalMs, 10);
  }

  enqueue(zoneId: string, intent: Intent): void {
    const queue = this.queues.get(zoneId) ?? [];
    queue.push(intent);
    this.queues.set(zoneId, queue);
  }

  tickNumber(zoneId: string): number {
    return this.ticks.get(zoneId) ?? 0;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.info("Starting zone tick loop", { intervalMs: this.intervalMs, zones: this.zoneIds.length });
    this.handle = setInterval(() => this.step(), this.intervalMs);
    this.handle.unref();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
    }
    this.log.info("Zone tick loop stopped");
  }

  /** Runs one tick for every zone. */
  step(): void {
    for (const zoneId of this.zoneIds) {
      this.stepZone(zoneId);
    }
  }

  stepZone(zoneId: string): void {
    const intents = this.queues.get(zoneId) ?? [];
    this.queues.set(zoneId, []);
    const tickNumber = this.tickNumber(zoneId) + 1;
    this.ticks.set(zoneId, tickNumber);

    let events: ZoneEvent[];
    try {
      const result = this.engine.tick(zoneId, this.store.snapshot(zoneId), intents, tickNumber);
      this.store.apply(zoneId, result);
      events = result.extras.events ?? [];
    } catch (err) {
      if (!(err instanceof ZoneTickError)) throw err;
      this.log.error("Tick rejected; zone state unchanged", {
        zoneId: err.zoneId,
        tick: err.tickNumber,
        error: err.message,
        dropped: intents.length,
      });
      return;
    }

    this.cfg.onTick?.(zoneId, tickNumber, this.store.fullState(zoneId, tickNumber, events));
  }
}
