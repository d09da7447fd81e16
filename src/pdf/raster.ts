import sharp from "sharp";
import type { Sharp } from "sharp";
import type { PageRaster, PixelRect, RasterInfo } from "../types";

function asChannels(value: number): RasterInfo["channels"] {
  if (value === 1 || value === 2 || value === 3 || value === 4) return value;
  throw new Error(`Unsupported channel count: ${value}`);
}

export function fromRaster(raster: PageRaster): Sharp {
  const { width, height, channels } = raster.info;
  return sharp(raster.data, { raw: { width, height, channels } });
}

export async function toRaster(pipeline: Sharp): Promise<PageRaster> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    data,
    info: { width: info.width, height: info.height, channels: asChannels(info.channels) }
  };
}

/**
 * Decodes an encoded image (PNG, JPEG, ...) or an image file into raw pixels.
 */
export async function decodeImage(input: Buffer | Uint8Array | string): Promise<PageRaster> {
  return await toRaster(sharp(input));
}

export async function encodePng(raster: PageRaster): Promise<Buffer> {
  return await fromRaster(raster).png().toBuffer();
}

/**
 * Copies `rect` out of the page into a new raster with the same channel count.
 */
export async function extractRegion(page: PageRaster, rect: PixelRect): Promise<PageRaster> {
  return await toRaster(
    fromRaster(page).extract({ left: rect.x, top: rect.y, width: rect.width, height: rect.height })
  );
}

async function greyBand(raster: PageRaster): Promise<PageRaster> {
  const { channels } = raster.info;
  if (channels === 1) return raster;
  let grey = raster;
  if (channels >= 3) grey = await toRaster(fromRaster(raster).grayscale());
  // grey sits in band 0 whatever else the raw output carries
  if (grey.info.channels === 1) return grey;
  return await toRaster(fromRaster(grey).extractChannel(0));
}

async function alphaBand(raster: PageRaster): Promise<Buffer> {
  const { width, height, channels } = raster.info;
  if (channels === 1 || channels === 3) return Buffer.alloc(width * height, 255);
  const alpha = await toRaster(fromRaster(raster).extractChannel(channels - 1));
  return alpha.data;
}

/**
 * Brings `raster` to the given channel count: 1 grey, 2 grey and alpha, 3 colour, 4 colour and alpha.
 */
export async function matchChannels(raster: PageRaster, channels: RasterInfo["channels"]): Promise<PageRaster> {
  if (raster.info.channels === channels) return raster;
  const { width, height } = raster.info;

  if (channels === 1) return await greyBand(raster);
  if (channels === 2) {
    const grey = await greyBand(raster);
    const alpha = await alphaBand(raster);
    return await toRaster(fromRaster(grey).joinChannel(alpha, { raw: { width, height, channels: 1 } }));
  }

  let pipeline = fromRaster(raster).toColourspace("srgb");
  pipeline = channels === 4 ? pipeline.ensureAlpha() : pipeline.removeAlpha();
  return await toRaster(pipeline);
}
