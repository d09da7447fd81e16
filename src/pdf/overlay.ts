import type { OverlayOptions } from "sharp";
import type { HighlightColor, PageRaster, PageSize, PixelRect } from "../types";
import { clipRect, SCALE_UP_FACTOR } from "./coords";
import { fromRaster, matchChannels, toRaster } from "./raster";

export const OUTLINE_WIDTH = 2 * SCALE_UP_FACTOR;

// #eaf9238c
export const DEFAULT_HIGHLIGHT_COLOR: HighlightColor = { r: 234, g: 249, b: 35, alpha: 140 };

export function hexToColor(color: string): HighlightColor | null {
  const value = color.replace("#", "").trim();
  if (!/^[0-9a-f]{6}([0-9a-f]{2})?$/i.test(value)) return null;
  const r = parseInt(value.slice(0, 2), 16);
  const g = parseInt(value.slice(2, 4), 16);
  const b = parseInt(value.slice(4, 6), 16);
  const alpha = value.length === 8 ? parseInt(value.slice(6, 8), 16) : 255;
  return { r, g, b, alpha };
}

function rgbaLayer(rect: PixelRect, paint: (x: number, y: number) => boolean, color: HighlightColor): OverlayOptions {
  const data = Buffer.alloc(rect.width * rect.height * 4);
  for (let row = 0; row < rect.height; row++) {
    for (let col = 0; col < rect.width; col++) {
      if (!paint(rect.x + col, rect.y + row)) continue;
      const i = (row * rect.width + col) * 4;
      data[i] = color.r;
      data[i + 1] = color.g;
      data[i + 2] = color.b;
      data[i + 3] = color.alpha;
    }
  }
  return { input: data, raw: { width: rect.width, height: rect.height, channels: 4 }, left: rect.x, top: rect.y };
}

/**
 * Translucent fill over `rect`, clipped to the crop.
 */
export function highlightLayer(rect: PixelRect, bounds: PageSize, color: HighlightColor): OverlayOptions | null {
  const visible = clipRect(rect, bounds);
  if (!visible) return null;
  return rgbaLayer(visible, () => true, color);
}

/**
 * Unfilled outline centred on the edges of `rect`, the way a 2-D canvas strokes a rectangle.
 */
export function outlineLayer(
  rect: PixelRect,
  bounds: PageSize,
  color: HighlightColor,
  strokeWidth = OUTLINE_WIDTH
): OverlayOptions | null {
  const half = Math.floor(strokeWidth / 2);
  const outer = {
    x: rect.x - half,
    y: rect.y - half,
    width: rect.width + strokeWidth,
    height: rect.height + strokeWidth
  };
  const inner = {
    x: rect.x + half,
    y: rect.y + half,
    width: rect.width - strokeWidth,
    height: rect.height - strokeWidth
  };
  const visible = clipRect(outer, bounds);
  if (!visible) return null;

  const insideInner = (x: number, y: number) =>
    inner.width > 0 &&
    inner.height > 0 &&
    x >= inner.x &&
    x < inner.x + inner.width &&
    y >= inner.y &&
    y < inner.y + inner.height;

  return rgbaLayer(visible, (x, y) => !insideInner(x, y), color);
}

/**
 * Comment box image stretched to exactly `rect`; only the part inside the crop is kept.
 */
export async function commentBoxLayer(
  asset: PageRaster,
  rect: PixelRect,
  bounds: PageSize
): Promise<OverlayOptions | null> {
  const visible = clipRect(rect, bounds);
  if (!visible) return null;

  let pipeline = fromRaster(asset).resize(rect.width, rect.height, { fit: "fill" }).ensureAlpha();
  if (visible.width !== rect.width || visible.height !== rect.height) {
    // extract after resize crops the stretched image
    pipeline = pipeline.extract({
      left: visible.x - rect.x,
      top: visible.y - rect.y,
      width: visible.width,
      height: visible.height
    });
  }
  const { data, info } = await toRaster(pipeline);
  return { input: data, raw: { width: info.width, height: info.height, channels: info.channels }, left: visible.x, top: visible.y };
}

/**
 * Composites the layers, in order, over `crop`. The result keeps the crop's channel count.
 */
export async function paintLayers(crop: PageRaster, layers: OverlayOptions[]): Promise<PageRaster> {
  if (layers.length === 0) return crop;
  const painted = await toRaster(fromRaster(crop).composite(layers));
  return await matchChannels(painted, crop.info.channels);
}
