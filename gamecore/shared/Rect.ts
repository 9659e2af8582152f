//gamecore/shared/Rect.ts

/** Axis-aligned rectangle; doubles as position + hitbox. */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Strict overlap: rectangles that only share an edge do not overlap. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h;
}

export function copyRect(r: Rect): Rect {
  return { x: r.x, y: r.y, w: r.w, h: r.h };
}
