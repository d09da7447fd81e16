import { randomUUID } from "node:crypto";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { DebugSink, Logger } from "./types";
import { encodePng } from "./pdf/raster";

/**
 * Sink that saves every produced snippet as `snippet-<random>.png` under `dir`.
 */
export function createFileDebugSink(dir: string, logger: Logger = console): DebugSink {
  return async (image) => {
    const output = path.resolve(dir, `snippet-${randomUUID()}.png`);
    logger.info(`Saving image to disk ${output}`);
    await writeFile(output, await encodePng(image));
  };
}
