// zonecore/zones/ZoneBootstrap.ts
//
// First-tick seeding for a zone that has no world marker yet: the marker,
// a one-cell terrain wall around the edge, a loose test item and the zone
// definition's static entities.

import type { StaticEntityDef } from "../catalog/CatalogTypes";
import type { TickContext } from "../engine/TickContext";
import type { EntityCreate, ZoneEntity } from "../shared/Entity";
import { EntityKind } from "../shared/Kinds";
import { Logger } from "../utils/logger";

const log = Logger.scope("ZONE");

type CreateSpec = Omit<EntityCreate, "id">;

export function findWorldMarker(entities: readonly ZoneEntity[]): ZoneEntity | null {
  return entities.find((e) => e.metadata.kind === EntityKind.World) ?? null;
}

export function boundaryBlocks(width: number, height: number): CreateSpec[] {
  if (width < 2 || height < 2) return [];
  const wall = (x: number, y: number, w: number, h: number): CreateSpec => ({
    x,
    y,
    width: w,
    height: h,
    ownerId: null,
    metadata: { kind: EntityKind.Terrain },
  });
  return [wall(0, 0, width, 1), wall(0, height - 1, width, 1), wall(0, 0, 1, height), wall(width - 1, 0, 1, height)];
}

export function staticEntityCreate(entry: StaticEntityDef): CreateSpec | null {
  const kind = entry.kind;
  if (!kind) return null;
  const metadata: Record<string, unknown> = { ...entry.metadata, kind };
  if ((kind === EntityKind.Workshop || kind === EntityKind.Gathering) && !("blocks_movement" in metadata)) {
    metadata.blocks_movement = false;
  }
  return { x: entry.x, y: entry.y, width: entry.width, height: entry.height, ownerId: null, metadata };
}

export function bootstrapZone(ctx: TickContext): void {
  const { name, width, height, def } = ctx.layout;

  ctx.create({
    x: 0,
    y: 0,
    width: 0,
    height: 0,
    ownerId: null,
    metadata: { kind: EntityKind.World, zone_name: name, width, height },
  });

  for (const block of boundaryBlocks(width, height)) ctx.create(block);

  ctx.create({
    x: 5,
    y: 5,
    width: 1,
    height: 1,
    ownerId: null,
    metadata: { kind: EntityKind.Item, good_type: "test_item", name: "Test Item", quality: 1.0, weight: 1 },
  });

  let statics = 0;
  for (const entry of def?.static_entities ?? []) {
    const create = staticEntityCreate(entry);
    if (create === null) continue;
    ctx.create(create);
    statics++;
  }

  log.info(`Bootstrapped zone '${name}'`, { zoneId: ctx.zoneId, width, height, statics });
}
