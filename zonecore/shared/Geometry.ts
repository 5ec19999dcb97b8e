// zonecore/shared/Geometry.ts

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.w && a.x + a.w > b.x && a.y < b.y + b.h && a.y + a.h > b.y;
}

export function cellRect(x: number, y: number): Rect {
  return { x, y, w: 1, h: 1 };
}
