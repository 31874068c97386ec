// =============================================================================
// Page Stream Schemas — Normalized per-page artifacts
// =============================================================================

import { z } from "zod";

export const PAGE_STREAM_MIME_TYPE = "application/vnd.pagefold.pages+json";

const base64Bytes = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9+/]+={0,2}$/, "must be base64")
  .transform((s) => new Uint8Array(Buffer.from(s, "base64")));

export const BoundingBoxSchema = z.object({
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
});
export type BoundingBox = z.infer<typeof BoundingBoxSchema>;

export const TextSpanSchema = z.object({
  text: z.string(),
  bbox: BoundingBoxSchema.optional(),
});
export type TextSpan = z.infer<typeof TextSpanSchema>;

export const RasterImageSchema = z.object({
  data: base64Bytes,
  mimeType: z.string().default("image/png"),
  bbox: BoundingBoxSchema.optional(),
});
export type RasterImage = z.infer<typeof RasterImageSchema>;

export const DrawingStatsSchema = z.object({
  curves: z.number().int().nonnegative().default(0),
  verticalLines: z.number().int().nonnegative().default(0),
  horizontalLines: z.number().int().nonnegative().default(0),
  rects: z.number().int().nonnegative().default(0),
});
export type DrawingStats = z.infer<typeof DrawingStatsSchema>;

export const PageLayoutSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  drawings: DrawingStatsSchema.default({}),
});
export type PageLayout = z.infer<typeof PageLayoutSchema>;

/** A table as rows of cells; `null` marks an empty cell. */
export const TableSchema = z.array(z.array(z.string().nullable()));
export type Table = z.infer<typeof TableSchema>;

export const NormalizedPageSchema = z.object({
  pageNumber: z.number().int().positive(),
  spans: z.array(TextSpanSchema).default([]),
  images: z.array(RasterImageSchema).default([]),
  tables: z.array(TableSchema).default([]),
  raster: RasterImageSchema,
  /** Missing layout forces the page to be treated as complex. */
  layout: PageLayoutSchema.optional(),
  /** Producer/creator string of the source file, copied onto every page. */
  producer: z.string().optional(),
});
export type NormalizedPage = z.infer<typeof NormalizedPageSchema>;

export const PageStreamSchema = z
  .object({
    producer: z.string().optional(),
    pages: z.array(NormalizedPageSchema),
  })
  .superRefine((stream, ctx) => {
    const seen = new Set<number>();
    for (const [i, page] of stream.pages.entries()) {
      if (seen.has(page.pageNumber)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["pages", i, "pageNumber"],
          message: `duplicate page number ${page.pageNumber}`,
        });
      }
      seen.add(page.pageNumber);
    }
  });
export type PageStream = z.infer<typeof PageStreamSchema>;

/** Joins a page's spans into the text that unit offsets point into. */
export function pageText(page: Pick<NormalizedPage, "spans">): string {
  return page.spans.map((s) => s.text).join("\n");
}
