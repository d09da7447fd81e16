import type { PdfRect, QuadPoints } from "../types";

const INT_MAX = 2147483647;

// X values sit on even indices, Y values on odd ones.
// Coordinates are truncated toward zero before they are compared; -0 becomes 0.
function minAt(points: QuadPoints, start: 0 | 1) {
  let min = INT_MAX;
  for (let i = start; i < points.length; i += 2) {
    if (points[i] < min) min = Math.trunc(points[i]) || 0;
  }
  return min;
}

// starts at 0, so a list of negative coordinates reports 0
function maxAt(points: QuadPoints, start: 0 | 1) {
  let max = 0;
  for (let i = start; i < points.length; i += 2) {
    if (points[i] > max) max = Math.trunc(points[i]) || 0;
  }
  return max;
}

export const minX = (points: QuadPoints) => minAt(points, 0);
export const minY = (points: QuadPoints) => minAt(points, 1);
export const maxX = (points: QuadPoints) => maxAt(points, 0);
export const maxY = (points: QuadPoints) => maxAt(points, 1);

export function rectToQuad(rect: PdfRect): number[] {
  const x0 = rect.x;
  const y0 = rect.y;
  const x1 = rect.x + rect.w;
  const y1 = rect.y + rect.h;
  return [x0, y0, x1, y0, x0, y1, x1, y1];
}

export function isQuadList(points: QuadPoints) {
  return points.length >= 8;
}

/**
 * Splits a flat list into 8-value quads. A trailing partial quad is dropped.
 */
export function splitQuads(points: QuadPoints): QuadPoints[] {
  const quads: QuadPoints[] = [];
  for (let n = 0; n + 8 <= points.length; n += 8) {
    quads.push(points.slice(n, n + 8));
  }
  return quads;
}
