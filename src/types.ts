export type MarkupKind = "none" | "highlight" | "popup";

export type PdfRect = { x: number; y: number; w: number; h: number };

// flat x,y list, 8 values per quadrilateral
export type QuadPoints = readonly number[];

export type PixelRect = { x: number; y: number; width: number; height: number };

export type PageSize = { width: number; height: number };

export type RasterInfo = {
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
};

export type PageRaster = {
  data: Buffer;
  info: RasterInfo;
};

export type HighlightColor = {
  r: number;
  g: number;
  b: number;
  alpha: number; // 0..255
};

export type Logger = Pick<Console, "info" | "warn" | "error">;

export type DebugSink = (image: PageRaster) => void | Promise<void>;
