import { describe, expect, it } from "vitest";
import type { OverlayOptions } from "sharp";
import {
  commentBoxLayer,
  DEFAULT_HIGHLIGHT_COLOR,
  hexToColor,
  highlightLayer,
  outlineLayer,
  paintLayers
} from "./overlay";
import { expectNear, pixel, solid } from "./testRaster";

const bounds = { width: 30, height: 30 };

function layerAlpha(layer: OverlayOptions, x: number, y: number) {
  if (!Buffer.isBuffer(layer.input) || !layer.raw) throw new Error("expected a raw layer");
  const col = x - (layer.left ?? 0);
  const row = y - (layer.top ?? 0);
  return layer.input[(row * layer.raw.width + col) * 4 + 3];
}

describe("hexToColor", () => {
  it("parses an rgba hex colour", () => {
    expect(hexToColor("#eaf9238c")).toEqual(DEFAULT_HIGHLIGHT_COLOR);
  });

  it("defaults to opaque", () => {
    expect(hexToColor("#112233")).toEqual({ r: 17, g: 34, b: 51, alpha: 255 });
  });

  it("rejects anything else", () => {
    expect(hexToColor("yellow")).toBeNull();
    expect(hexToColor("#12345")).toBeNull();
  });
});

describe("highlightLayer", () => {
  it("covers the rectangle", () => {
    const layer = highlightLayer({ x: 2, y: 3, width: 4, height: 5 }, bounds, DEFAULT_HIGHLIGHT_COLOR);
    expect(layer).toMatchObject({ left: 2, top: 3, raw: { width: 4, height: 5, channels: 4 } });
    if (!layer || !Buffer.isBuffer(layer.input)) throw new Error("expected a raw layer");
    expect(Array.from(layer.input.subarray(0, 4))).toEqual([234, 249, 35, 140]);
  });

  it("is clipped to the crop", () => {
    const layer = highlightLayer({ x: 26, y: -2, width: 10, height: 6 }, bounds, DEFAULT_HIGHLIGHT_COLOR);
    expect(layer).toMatchObject({ left: 26, top: 0, raw: { width: 4, height: 4 } });
  });

  it("is skipped outside the crop", () => {
    expect(highlightLayer({ x: 40, y: 0, width: 5, height: 5 }, bounds, DEFAULT_HIGHLIGHT_COLOR)).toBeNull();
  });
});

describe("outlineLayer", () => {
  const rect = { x: 4, y: 4, width: 10, height: 8 };

  it("strokes across the edges and leaves the inside clear", () => {
    const layer = outlineLayer(rect, bounds, DEFAULT_HIGHLIGHT_COLOR);
    if (!layer) throw new Error("expected a layer");
    expect(layer).toMatchObject({ left: 2, top: 2, raw: { width: 14, height: 12 } });
    expect(layerAlpha(layer, 2, 2)).toBe(140);
    expect(layerAlpha(layer, 5, 8)).toBe(140);
    expect(layerAlpha(layer, 15, 13)).toBe(140);
    expect(layerAlpha(layer, 6, 6)).toBe(0);
    expect(layerAlpha(layer, 9, 8)).toBe(0);
  });

  it("fills a rectangle thinner than the stroke", () => {
    const layer = outlineLayer({ x: 4, y: 4, width: 3, height: 3 }, bounds, DEFAULT_HIGHLIGHT_COLOR);
    if (!layer) throw new Error("expected a layer");
    expect(layerAlpha(layer, 5, 5)).toBe(140);
  });
});

describe("commentBoxLayer", () => {
  const blue = solid(2, 2, [0, 0, 255]);

  it("stretches the image over the rectangle", async () => {
    const layer = await commentBoxLayer(blue, { x: 1, y: 1, width: 6, height: 4 }, bounds);
    expect(layer).toMatchObject({ left: 1, top: 1, raw: { width: 6, height: 4, channels: 4 } });
  });

  it("keeps the visible part only", async () => {
    const layer = await commentBoxLayer(blue, { x: -2, y: 1, width: 6, height: 4 }, bounds);
    expect(layer).toMatchObject({ left: 0, top: 1, raw: { width: 4, height: 4 } });
  });
});

describe("paintLayers", () => {
  it("blends the highlight over the crop", async () => {
    const crop = solid(10, 10, [255, 255, 255]);
    const layer = highlightLayer({ x: 2, y: 2, width: 3, height: 3 }, crop.info, DEFAULT_HIGHLIGHT_COLOR);
    if (!layer) throw new Error("expected a layer");

    const painted = await paintLayers(crop, [layer]);
    expect(painted.info).toEqual({ width: 10, height: 10, channels: 3 });
    expectNear(pixel(painted, 3, 3), [243, 252, 134]);
    expectNear(pixel(painted, 0, 0), [255, 255, 255], 1);
    expectNear(pixel(painted, 5, 5), [255, 255, 255], 1);
  });

  it("returns the crop when there is nothing to paint", async () => {
    const crop = solid(4, 4, [1, 2, 3]);
    expect(await paintLayers(crop, [])).toBe(crop);
  });
});
