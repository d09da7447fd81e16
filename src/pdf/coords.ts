import type { MarkupKind, PageSize, PixelRect, QuadPoints } from "../types";
import { maxX, maxY, minX, minY } from "./quads";

export const BORDER_WIDTH = 30;
export const SCALE_UP_FACTOR = 2;

// how much surrounding page to keep, relative to BORDER_WIDTH
export const CONTEXT_MULTIPLIER: Record<MarkupKind, number> = {
  none: 1,
  highlight: 1,
  popup: 2
};

/**
 * Pixel rectangle of the page raster to crop around the given quads.
 * Works on the union of every quad, adds the markup's context border and
 * keeps the result on the page.
 */
export function subImageRect(points: QuadPoints, page: PageSize, markup: MarkupKind): PixelRect {
  const x0 = minX(points);
  const y0 = minY(points);
  const scaledBorder = BORDER_WIDTH * CONTEXT_MULTIPLIER[markup];

  const x = Math.max(Math.round((x0 - scaledBorder) * SCALE_UP_FACTOR), 0);
  let y = Math.max(Math.round((y0 - scaledBorder) * SCALE_UP_FACTOR), 0);

  let width = Math.round((maxX(points) - x0 + 2 * scaledBorder) * SCALE_UP_FACTOR);
  width = Math.min(width, page.width - x);
  let height = Math.round((maxY(points) - y0 + 2 * scaledBorder) * SCALE_UP_FACTOR);
  height = Math.min(height, page.height - y);

  // PDF y grows upward from the bottom edge, raster y grows downward
  y = page.height - y - height;

  return { x, y, width, height };
}

/**
 * Position of one quad inside an already cropped subimage.
 * The flip uses the full page height since `subImage.y` is measured on the page.
 */
export function annotationRect(quad: QuadPoints, subImage: PixelRect, pageHeight: number): PixelRect {
  let x = minX(quad);
  let y = minY(quad);

  const width = Math.round((maxX(quad) - x) * SCALE_UP_FACTOR);
  const height = Math.round((maxY(quad) - y) * SCALE_UP_FACTOR);

  x *= SCALE_UP_FACTOR;
  y *= SCALE_UP_FACTOR;

  x -= subImage.x;
  y = pageHeight - y - subImage.y - height;

  return { x, y, width, height };
}

export function clipRect(rect: PixelRect, bounds: PageSize): PixelRect | null {
  const left = Math.max(rect.x, 0);
  const top = Math.max(rect.y, 0);
  const right = Math.min(rect.x + rect.width, bounds.width);
  const bottom = Math.min(rect.y + rect.height, bounds.height);
  if (right <= left || bottom <= top) return null;
  return { x: left, y: top, width: right - left, height: bottom - top };
}
