// zonecore/zones/ZoneRegistry.ts

import type { Metadata } from "../shared/Metadata";

export interface ZoneRecord {
  id: string;
  name: string;
  width: number;
  height: number;
  metadata: Metadata;
}

export type NewZone = Omit<ZoneRecord, "id">;

/** Where zones live between server runs; looked up by unique name. */
export interface ZoneRegistry {
  getZoneByName(name: string): Promise<ZoneRecord | null>;
  createZone(zone: NewZone): Promise<ZoneRecord>;
}
