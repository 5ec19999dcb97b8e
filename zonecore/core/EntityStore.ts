// zonecore/core/EntityStore.ts
//
// In-memory entity tables, one per zone, that the host feeds into the
// engine and patches with the returned diff.

import type { TickResult, ZoneEntity, ZoneEvent, ZoneStateView } from "../shared/Entity";
import { Logger } from "../utils/logger";

const log = Logger.scope("TICK");

export class EntityStore {
  private zones = new Map<string, Map<string, ZoneEntity>>();

  private table(zoneId: string): Map<string, ZoneEntity> {
    let table = this.zones.get(zoneId);
    if (!table) {
      table = new Map();
      this.zones.set(zoneId, table);
    }
    return table;
  }

  /** Copies in insertion order, so the engine's snapshot order is stable. */
  snapshot(zoneId: string): ZoneEntity[] {
    return [...this.table(zoneId).values()].map((entity) => structuredClone(entity));
  }

  get(zoneId: string, id: string): ZoneEntity | undefined {
    return this.table(zoneId).get(id);
  }

  count(zoneId: string): number {
    return this.table(zoneId).size;
  }

  put(entity: ZoneEntity): void {
    this.table(entity.zoneId).set(entity.id, entity);
  }

  apply(zoneId: string, result: TickResult): void {
    const table = this.table(zoneId);

    for (const create of result.creates) {
      table.set(create.id, { zoneId, ...create, metadata: { ...create.metadata } });
    }

    for (const update of result.updates) {
      const entity = table.get(update.id);
      if (!entity) {
        log.warn("Update for unknown entity", { zoneId, id: update.id });
        continue;
      }
      if (update.x !== undefined) entity.x = update.x;
      if (update.y !== undefined) entity.y = update.y;
      if (update.width !== undefined) entity.width = update.width;
      if (update.height !== undefined) entity.height = update.height;
      if (update.metadata !== undefined) entity.metadata = update.metadata;
    }

    for (const id of result.deletes) {
      table.delete(id);
    }
  }

  fullState(zoneId: string, tickNumber: number, events: ZoneEvent[] = []): ZoneStateView {
    return {
      zone_id: zoneId,
      tick: tickNumber,
      entities: this.snapshot(zoneId),
      events,
    };
  }
}
