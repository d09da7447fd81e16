import { PDFArray, PDFDict, PDFName, PDFNumber } from "pdf-lib";
import type { PDFPage } from "pdf-lib";
import type { MarkupKind, PageRaster, PdfRect } from "../types";
import { rectToQuad } from "./quads";
import type { SnippetExtractor } from "./subImage";

export type AnnotationGeometry = {
  subtype: string;
  markup: MarkupKind;
  rect: PdfRect;
  quadPoints: number[];
};

const MARKUP_BY_SUBTYPE = new Map<string, MarkupKind>([
  ["Highlight", "highlight"],
  ["Popup", "popup"],
  ["Text", "popup"]
]);

function numbers(array: PDFArray | undefined): number[] {
  if (!array) return [];
  const out: number[] = [];
  for (const value of array.asArray()) {
    if (value instanceof PDFNumber) out.push(value.asNumber());
  }
  return out;
}

export function pageAnnotations(page: PDFPage): PDFDict[] {
  const annots = page.node.Annots();
  if (!annots) return [];
  const out: PDFDict[] = [];
  for (let i = 0; i < annots.size(); i++) {
    const annot = annots.lookup(i);
    if (annot instanceof PDFDict) out.push(annot);
  }
  return out;
}

/**
 * Reads Rect, QuadPoints and Subtype of a parsed annotation.
 * Returns null when the annotation has no usable Rect.
 */
export function annotationGeometry(annot: PDFDict): AnnotationGeometry | null {
  const rectValues = numbers(annot.lookupMaybe(PDFName.of("Rect"), PDFArray));
  if (rectValues.length !== 4) return null;

  // Rect corners may come in any order
  const [ax, ay, bx, by] = rectValues;
  const rect = {
    x: Math.min(ax, bx),
    y: Math.min(ay, by),
    w: Math.abs(bx - ax),
    h: Math.abs(by - ay)
  };

  const subtype = annot.lookupMaybe(PDFName.of("Subtype"), PDFName)?.decodeText() ?? "";
  const markup = MARKUP_BY_SUBTYPE.get(subtype) ?? "none";

  let quadPoints = rectToQuad(rect);
  if (markup === "highlight") {
    const quads = numbers(annot.lookupMaybe(PDFName.of("QuadPoints"), PDFArray));
    if (quads.length >= 8) quadPoints = quads;
  }

  return { subtype, markup, rect, quadPoints };
}

/**
 * Picks the snippet entry point matching the annotation's subtype.
 */
export async function snippetForAnnotation(
  extractor: SnippetExtractor,
  page: PageRaster,
  annot: PDFDict,
  commentBox?: PageRaster | null
): Promise<PageRaster | null> {
  const geometry = annotationGeometry(annot);
  if (!geometry) return null;

  switch (geometry.markup) {
    case "highlight":
      return await extractor.makeHighlightedSubImage(page, geometry.quadPoints);
    case "popup":
      return await extractor.makePopupSubImage(page, geometry.rect, commentBox);
    case "none":
      return await extractor.makePlainSubImage(page, geometry.rect);
  }
}
