/**
 * Request Validation Schemas
 * Zod schemas for the convert form and the metadata query.
 */

import { z } from "zod";
import { TARGET_FORMATS } from "../../types/conversion.js";

export const convertSchema = z.object({
  format: z
    .string()
    .trim()
    .toLowerCase()
    .default("wav")
    .pipe(z.enum(TARGET_FORMATS, { errorMap: () => ({ message: "Unsupported output format." }) })),
  // Checkbox: present means confirmed, whatever its value
  rights: z.unknown().refine((value) => value !== undefined, {
    message: "You must confirm you have rights to this content.",
  }),
  file_url: z.string().trim().default(""),
});

export type ConvertFields = z.infer<typeof convertSchema>;

export const metaQuerySchema = z.object({
  link: z.string({ required_error: "Provide a link.", invalid_type_error: "Provide a link." }).trim().min(1, "Provide a link."),
});

export type MetaQuery = z.infer<typeof metaQuerySchema>;
