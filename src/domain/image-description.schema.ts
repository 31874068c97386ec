// =============================================================================
// Image Description Schema — Structured caption returned by the vision model
// =============================================================================

import { z } from "zod";

export const ImageTypeSchema = z.enum(["icon", "shape", "logo", "picture", "information"]);
export type ImageType = z.infer<typeof ImageTypeSchema>;

export const ImageDescriptionSchema = z.object({
  imageType: ImageTypeSchema.describe(
    "icon, shape or logo for decorative graphics; picture for photos and illustrations; " +
      "information for charts, tables, diagrams and scanned text",
  ),
  description: z.string().describe("Full description; empty for icons, shapes and logos"),
});
export type ImageDescription = z.infer<typeof ImageDescriptionSchema>;

const DECORATIVE: ReadonlySet<ImageType> = new Set<ImageType>(["icon", "shape", "logo"]);

/** Decorative images carry no content worth describing. */
export function isDecorative(imageType: ImageType): boolean {
  return DECORATIVE.has(imageType);
}
