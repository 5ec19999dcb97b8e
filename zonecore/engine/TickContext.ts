// zonecore/engine/TickContext.ts
//
// Working set for one zone tick. Handlers mutate private copies of the
// snapshot entities through move/setMetadata/remove; finish() diffs the copies
// against the snapshot so only real changes leave the engine, one update per
// entity in first-touch order.

import { isDeepStrictEqual } from "node:util";

import type { Catalog } from "../catalog/Catalog";
import type { ZoneDef } from "../catalog/CatalogTypes";
import type { EntityCreate, EntityUpdate, TickResult, ZoneEntity, ZoneEvent } from "../shared/Entity";
import { cellRect, Rect, rectsOverlap } from "../shared/Geometry";
import { BLOCKING_KINDS, DIR_TO_DELTA, EntityKind } from "../shared/Kinds";
import { Metadata, readString, truthy } from "../shared/Metadata";
import { itemSizeFromMetadata } from "../items/ItemRules";
import type { RandomSource } from "../utils/Rng";
import { ZoneTickError } from "./ZoneTickError";

export interface ZoneLayout {
  name: string;
  width: number;
  height: number;
  def: ZoneDef | null;
}

export interface TickContextOptions {
  zoneId: string;
  tickNumber: number;
  layout: ZoneLayout;
  catalog: Catalog;
  rng: RandomSource;
  now: Date;
  newId: () => string;
}

type Positioned = Pick<ZoneEntity, "width" | "height" | "metadata">;

export class TickContext {
  readonly zoneId: string;
  readonly tickNumber: number;
  readonly layout: ZoneLayout;
  readonly catalog: Catalog;
  readonly rng: RandomSource;
  readonly now: Date;

  readonly events: ZoneEvent[] = [];
  readonly creates: EntityCreate[] = [];

  // item id -> id of the monster holding the push claim
  readonly activePushes = new Map<string, string>();
  readonly touchedDispensers = new Set<string>();

  private live: ZoneEntity[];
  private readonly byId = new Map<string, ZoneEntity>();
  private readonly originals = new Map<string, ZoneEntity>();
  private readonly touchOrder: string[] = [];
  private readonly touched = new Set<string>();
  private readonly deleted: string[] = [];
  private readonly newId: () => string;

  constructor(opts: TickContextOptions, snapshot: readonly ZoneEntity[]) {
    this.zoneId = opts.zoneId;
    this.tickNumber = opts.tickNumber;
    this.layout = opts.layout;
    this.catalog = opts.catalog;
    this.rng = opts.rng;
    this.now = opts.now;
    this.newId = opts.newId;

    for (const entity of snapshot) {
      if (this.byId.has(entity.id)) {
        throw new ZoneTickError(`Duplicate entity id ${entity.id}`, opts.zoneId, opts.tickNumber);
      }
      this.originals.set(entity.id, entity);
      this.byId.set(entity.id, structuredClone(entity));
    }
    this.live = [...this.byId.values()];
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  /** Live entities in snapshot order. Removal replaces the array, so iterating a previous result is safe. */
  entities(): readonly ZoneEntity[] {
    return this.live;
  }

  get(id: unknown): ZoneEntity | null {
    if (typeof id !== "string" || id.length === 0) return null;
    return this.byId.get(id) ?? null;
  }

  isLive(id: string): boolean {
    return this.byId.has(id);
  }

  kindOf(entity: { metadata: Metadata }): string | null {
    return readString(entity.metadata.kind);
  }

  monsterById(id: unknown): ZoneEntity | null {
    if (!truthy(id)) return null;
    const wanted = String(id);
    for (const entity of this.live) {
      if (this.kindOf(entity) === EntityKind.Monster && entity.id === wanted) return entity;
    }
    return null;
  }

  /** Footprint; 1x1 items take their size from metadata or the good-type catalog. */
  sizeOf(entity: Positioned): [number, number] {
    const width = entity.width > 0 ? entity.width : 1;
    const height = entity.height > 0 ? entity.height : 1;
    if (this.kindOf(entity) === EntityKind.Item && width === 1 && height === 1) {
      return itemSizeFromMetadata(entity.metadata, this.catalog);
    }
    return [width, height];
  }

  rectOf(entity: ZoneEntity): Rect {
    const [w, h] = this.sizeOf(entity);
    return { x: entity.x, y: entity.y, w, h };
  }

  isBlocking(entity: ZoneEntity): boolean {
    const metadata = entity.metadata;
    if (truthy(metadata.is_stored)) return false;
    if ("blocks_movement" in metadata) return truthy(metadata.blocks_movement);
    const kind = this.kindOf(entity);
    return kind !== null && BLOCKING_KINDS.has(kind);
  }

  /** First blocking entity overlapping `area`, skipping `ignore`. */
  findBlocker(area: Rect, ignore: ReadonlySet<string> = new Set()): ZoneEntity | null {
    for (const entity of this.live) {
      if (ignore.has(entity.id)) continue;
      if (!this.isBlocking(entity)) continue;
      if (rectsOverlap(area, this.rectOf(entity))) return entity;
    }
    return null;
  }

  /** Blocker for `mover` placed at (x, y) with its own footprint. */
  blockerFor(mover: ZoneEntity, x: number, y: number, alsoIgnore: string[] = []): ZoneEntity | null {
    const [w, h] = this.sizeOf(mover);
    return this.findBlocker({ x, y, w, h }, new Set([mover.id, ...alsoIgnore]));
  }

  findAtKind(kind: string, x: number, y: number): ZoneEntity | null {
    const cell = cellRect(x, y);
    for (const entity of this.live) {
      if (this.kindOf(entity) !== kind) continue;
      if (rectsOverlap(cell, this.rectOf(entity))) return entity;
    }
    return null;
  }

  findAdjacent(monster: ZoneEntity, kind?: string): ZoneEntity | null {
    for (const [dx, dy] of Object.values(DIR_TO_DELTA)) {
      const cell = cellRect(monster.x + dx, monster.y + dy);
      for (const entity of this.live) {
        if (entity.id === monster.id) continue;
        if (kind !== undefined && this.kindOf(entity) !== kind) continue;
        if (rectsOverlap(cell, this.rectOf(entity))) return entity;
      }
    }
    return null;
  }

  inBounds(x: number, y: number, entity: Positioned): boolean {
    const [w, h] = this.sizeOf(entity);
    if (x < 0 || y < 0) return false;
    return x + w <= this.layout.width && y + h <= this.layout.height;
  }

  terrainBlocked(x: number, y: number): boolean {
    const def = this.layout.def;
    if (!def) return false;
    const cells = [def.blocked, def.blocked_cells, def.terrain?.blocked].find(
      (list) => list !== undefined && list.length > 0,
    );
    return (cells ?? []).some((cell) => cell[0] === x && cell[1] === y);
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  move(entity: ZoneEntity, x: number, y: number): void {
    entity.x = x;
    entity.y = y;
    this.touch(entity);
  }

  setMetadata(entity: ZoneEntity, metadata: Metadata): void {
    entity.metadata = metadata;
    this.touch(entity);
  }

  remove(entity: ZoneEntity): void {
    if (!this.byId.delete(entity.id)) return;
    this.live = this.live.filter((e) => e.id !== entity.id);
    this.deleted.push(entity.id);
  }

  create(init: Omit<EntityCreate, "id">): EntityCreate {
    const created: EntityCreate = { id: this.newId(), ...init };
    this.creates.push(created);
    return created;
  }

  emit(event: ZoneEvent): void {
    this.events.push(event);
  }

  private touch(entity: ZoneEntity): void {
    if (this.touched.has(entity.id)) return;
    this.touched.add(entity.id);
    this.touchOrder.push(entity.id);
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  finish(): TickResult {
    const updates: EntityUpdate[] = [];
    for (const id of this.touchOrder) {
      const current = this.byId.get(id);
      const original = this.originals.get(id);
      if (!current || !original) continue;

      const update: EntityUpdate = { id };
      let changed = false;
      if (current.x !== original.x || current.y !== original.y) {
        update.x = current.x;
        update.y = current.y;
        changed = true;
      }
      if (!isDeepStrictEqual(current.metadata, original.metadata)) {
        update.metadata = current.metadata;
        changed = true;
      }
      if (changed) updates.push(update);
    }

    return {
      creates: this.creates,
      updates,
      deletes: [...this.deleted],
      extras: this.events.length > 0 ? { events: this.events } : {},
    };
  }
}
