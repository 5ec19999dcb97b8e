// zonecore/zones/PostgresZoneRegistry.ts
//
// Backing table:
//   CREATE TABLE zones (
//     id uuid PRIMARY KEY DEFAULT gen_random_uuid(),
//     name text UNIQUE NOT NULL,
//     width int NOT NULL,
//     height int NOT NULL,
//     metadata jsonb NOT NULL DEFAULT '{}'
//   );

import { z } from "zod";

import { Logger } from "../utils/logger";
import type { NewZone, ZoneRecord, ZoneRegistry } from "./ZoneRegistry";

const log = Logger.scope("DB");

/** The slice of a pg Pool or PoolClient the registry needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const ZoneRowSchema = z.object({
  id: z.coerce.string(),
  name: z.string(),
  width: z.coerce.number().int(),
  height: z.coerce.number().int(),
  metadata: z.record(z.unknown()).nullable().catch(null),
});

function toRecord(row: unknown): ZoneRecord {
  const parsed = ZoneRowSchema.parse(row);
  return { ...parsed, metadata: parsed.metadata ?? {} };
}

export class PostgresZoneRegistry implements ZoneRegistry {
  constructor(private readonly db: Queryable) {}

  async getZoneByName(name: string): Promise<ZoneRecord | null> {
    const res = await this.db.query(
      `
        SELECT id, name, width, height, metadata
        FROM zones
        WHERE name = $1
      `,
      [name],
    );
    const row = res.rows[0];
    return row === undefined ? null : toRecord(row);
  }

  async createZone(zone: NewZone): Promise<ZoneRecord> {
    const res = await this.db.query(
      `
        INSERT INTO zones (name, width, height, metadata)
        VALUES ($1, $2, $3, $4)
        RETURNING id, name, width, height, metadata
      `,
      [zone.name, zone.width, zone.height, JSON.stringify(zone.metadata)],
    );
    const row = res.rows[0];
    if (row === undefined) {
      throw new Error(`Insert of zone '${zone.name}' returned no row`);
    }
    log.info("Created zone row", { name: zone.name });
    return toRecord(row);
  }
}
