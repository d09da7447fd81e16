import type { OverlayOptions } from "sharp";
import type { DebugSink, HighlightColor, Logger, MarkupKind, PageRaster, PdfRect, QuadPoints } from "../types";
import { annotationRect, subImageRect } from "./coords";
import { commentBoxLayer, DEFAULT_HIGHLIGHT_COLOR, highlightLayer, outlineLayer, paintLayers } from "./overlay";
import { isQuadList, rectToQuad, splitQuads } from "./quads";
import { extractRegion } from "./raster";

export type SnippetOptions = {
  highlightColor?: HighlightColor;
  debugSink?: DebugSink;
  logger?: Logger;
};

export type SnippetExtractor = {
  /** Crop around `rect` with no markup painted. */
  makePlainSubImage(page: PageRaster, rect: PdfRect): Promise<PageRaster | null>;
  /** Crop around every quad, each one filled with the highlight colour. */
  makeHighlightedSubImage(page: PageRaster, quadPoints: QuadPoints): Promise<PageRaster | null>;
  /** Wider crop around `rect` with the comment box, or its outline, drawn on it. */
  makePopupSubImage(page: PageRaster, rect: PdfRect, commentBox?: PageRaster | null): Promise<PageRaster | null>;
  makeSubImage(
    page: PageRaster,
    quadPoints: QuadPoints,
    markup: MarkupKind,
    commentBox?: PageRaster | null
  ): Promise<PageRaster | null>;
};

/**
 * Builds the snippet functions around fixed settings.
 * Every call resolves to `null` when there is nothing to crop.
 */
export function createSnippetExtractor(opts: SnippetOptions = {}): SnippetExtractor {
  const color = opts.highlightColor ?? DEFAULT_HIGHLIGHT_COLOR;
  const logger = opts.logger ?? console;
  const debugSink = opts.debugSink;

  async function emit(image: PageRaster) {
    if (!debugSink) return;
    try {
      await debugSink(image);
    } catch (err) {
      logger.error(err instanceof Error ? err.message : String(err));
    }
  }

  async function makeSubImage(
    page: PageRaster,
    quadPoints: QuadPoints,
    markup: MarkupKind,
    commentBox: PageRaster | null = null
  ): Promise<PageRaster | null> {
    if (!isQuadList(quadPoints)) return null;

    const { width: pageWidth, height: pageHeight } = page.info;
    const rect = subImageRect(quadPoints, { width: pageWidth, height: pageHeight }, markup);
    if (rect.width <= 0 || rect.height <= 0) {
      logger.warn(`Annotation lies outside the ${pageWidth}x${pageHeight} page, nothing to extract`);
      return null;
    }

    const crop = await extractRegion(page, rect);
    const bounds = { width: crop.info.width, height: crop.info.height };
    const layers: OverlayOptions[] = [];

    if (markup === "highlight") {
      for (const quad of splitQuads(quadPoints)) {
        const layer = highlightLayer(annotationRect(quad, rect, pageHeight), bounds, color);
        if (layer) layers.push(layer);
      }
    } else if (markup === "popup") {
      // popups carry a single quad built from the annotation rectangle
      const target = annotationRect(quadPoints, rect, pageHeight);
      const layer = commentBox
        ? await commentBoxLayer(commentBox, target, bounds)
        : outlineLayer(target, bounds, color);
      if (layer) layers.push(layer);
    }

    const image = await paintLayers(crop, layers);
    await emit(image);
    return image;
  }

  return {
    makePlainSubImage: (page, rect) => makeSubImage(page, rectToQuad(rect), "none"),
    makeHighlightedSubImage: (page, quadPoints) => makeSubImage(page, quadPoints, "highlight"),
    makePopupSubImage: (page, rect, commentBox) => makeSubImage(page, rectToQuad(rect), "popup", commentBox ?? null),
    makeSubImage
  };
}
