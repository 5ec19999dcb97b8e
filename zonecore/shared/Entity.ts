// zonecore/shared/Entity.ts

import type { Metadata } from "./Metadata";

/** A positioned grid object as handed to the engine for one tick. */
export interface ZoneEntity {
  id: string;
  zoneId: string;

  // Top-left cell and footprint
  x: number;
  y: number;
  width: number;
  height: number;

  ownerId: string | null;

  // Carries `kind` plus kind-specific fields; unknown fields are preserved.
  metadata: Metadata;
}

export interface EntityCreate {
  // Assigned by the engine so later steps of the same tick can address it
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  ownerId: string | null;
  metadata: Metadata;
}

export interface EntityUpdate {
  id: string;
  x?: number;
  y?: number;
  width?: number;
  height?: number;
  metadata?: Metadata;
}

export interface ZoneEvent {
  type: string;
  message?: string;
  target_player_id?: string | null;
  [key: string]: unknown;
}

export interface TickExtras {
  events?: ZoneEvent[];
}

export interface TickResult {
  creates: EntityCreate[];
  updates: EntityUpdate[];
  deletes: string[];
  extras: TickExtras;
}

/** A raw player intent; `data.action` names the handler. */
export interface Intent {
  playerId: string;
  data: Record<string, unknown>;
}

/** Full zone state as the host publishes it, before per-player filtering. */
export interface ZoneStateView {
  events?: ZoneEvent[];
  viewer_id?: string;
  [key: string]: unknown;
}
