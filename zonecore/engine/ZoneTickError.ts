// zonecore/engine/ZoneTickError.ts

/** Raised when a tick cannot be applied at all; no partial diff is returned. */
export class ZoneTickError extends Error {
  constructor(
    message: string,
    readonly zoneId: string,
    readonly tickNumber: number,
  ) {
    super(message);
    this.name = "ZoneTickError";
  }
}
