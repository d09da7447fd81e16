import { z } from "zod";
import type { HighlightColor } from "./types";
import { DEFAULT_HIGHLIGHT_COLOR, hexToColor } from "./pdf/overlay";

export type SnippetConfig = {
  debug: boolean;
  debugDir: string;
  highlightColor: HighlightColor;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => (value ? value.toLowerCase() === "true" || value === "1" : false));

const envSchema = z.object({
  SNIPPET_DEBUG: booleanFlag,
  SNIPPET_DEBUG_DIR: z.string().trim().min(1).default("."),
  SNIPPET_HIGHLIGHT_COLOR: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return DEFAULT_HIGHLIGHT_COLOR;
      const color = hexToColor(value);
      if (!color) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected #rrggbb or #rrggbbaa" });
        return z.NEVER;
      }
      return color;
    })
});

/**
 * Reads the process-wide settings once, at start-up.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): SnippetConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return {
    debug: parsed.data.SNIPPET_DEBUG,
    debugDir: parsed.data.SNIPPET_DEBUG_DIR,
    highlightColor: parsed.data.SNIPPET_HIGHLIGHT_COLOR
  };
}
