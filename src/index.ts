import { loadConfig } from "./config";
import type { SnippetConfig } from "./config";
import { createFileDebugSink } from "./debug";
import { createSnippetExtractor } from "./pdf/subImage";
import type { SnippetExtractor } from "./pdf/subImage";
import type { Logger } from "./types";

export type * from "./types";
export { ConfigError, loadConfig } from "./config";
export type { SnippetConfig } from "./config";
export { createFileDebugSink } from "./debug";
export { annotationGeometry, pageAnnotations, snippetForAnnotation } from "./pdf/annotations";
export type { AnnotationGeometry } from "./pdf/annotations";
export { annotationRect, BORDER_WIDTH, clipRect, CONTEXT_MULTIPLIER, SCALE_UP_FACTOR, subImageRect } from "./pdf/coords";
export { DEFAULT_HIGHLIGHT_COLOR, hexToColor, OUTLINE_WIDTH } from "./pdf/overlay";
export { isQuadList, maxX, maxY, minX, minY, rectToQuad, splitQuads } from "./pdf/quads";
export { decodeImage, encodePng, extractRegion } from "./pdf/raster";
export { createSnippetExtractor } from "./pdf/subImage";
export type { SnippetExtractor, SnippetOptions } from "./pdf/subImage";

/**
 * Extractor wired from environment settings; saves every snippet to disk when debugging is on.
 */
export function createConfiguredExtractor(
  config: SnippetConfig = loadConfig(),
  logger: Logger = console
): SnippetExtractor {
  return createSnippetExtractor({
    highlightColor: config.highlightColor,
    debugSink: config.debug ? createFileDebugSink(config.debugDir, logger) : undefined,
    logger
  });
}
