import type { PageRaster, RasterInfo } from "../types";

// in-memory page fixtures for the tests
export function makeRaster(
  width: number,
  height: number,
  channels: RasterInfo["channels"],
  fill: (x: number, y: number) => number[]
): PageRaster {
  const data = Buffer.alloc(width * height * channels);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.set(fill(x, y), (y * width + x) * channels);
    }
  }
  return { data, info: { width, height, channels } };
}

export function solid(width: number, height: number, color: number[]): PageRaster {
  return makeRaster(width, height, 3, () => color);
}

export function pixel(raster: PageRaster, x: number, y: number): number[] {
  const { width, channels } = raster.info;
  const i = (y * width + x) * channels;
  return Array.from(raster.data.subarray(i, i + channels));
}

export function expectNear(actual: number[], expected: number[], tolerance = 2) {
  if (actual.length !== expected.length) {
    throw new Error(`expected ${expected.length} channels, got ${actual.length}`);
  }
  actual.forEach((value, i) => {
    if (Math.abs(value - expected[i]) > tolerance) {
      throw new Error(`pixel [${actual.join(",")}] is not within ${tolerance} of [${expected.join(",")}]`);
    }
  });
}
