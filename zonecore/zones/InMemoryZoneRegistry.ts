// zonecore/zones/InMemoryZoneRegistry.ts

import { uuidv4 } from "../utils/uuid";
import type { NewZone, ZoneRecord, ZoneRegistry } from "./ZoneRegistry";

export class InMemoryZoneRegistry implements ZoneRegistry {
  private readonly byName = new Map<string, ZoneRecord>();

  constructor(private readonly newId: () => string = uuidv4) {}

  async getZoneByName(name: string): Promise<ZoneRecord | null> {
    return this.byName.get(name) ?? null;
  }

  async createZone(zone: NewZone): Promise<ZoneRecord> {
    if (this.byName.has(zone.name)) {
      throw new Error(`Zone '${zone.name}' already exists`);
    }
    const record: ZoneRecord = { id: this.newId(), ...zone, metadata: { ...zone.metadata } };
    this.byName.set(zone.name, record);
    return record;
  }

  list(): ZoneRecord[] {
    return [...this.byName.values()];
  }
}
