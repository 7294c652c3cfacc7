import { z } from "zod";
import { sanitizeMultilineText, sanitizeText } from "@/lib/utils/sanitize";
import { SlideSchema } from "@/lib/validators/output-schema";

export const SECTION_TITLE_MAX_CHARS = 120;
export const SECTION_CONTENT_MAX_CHARS = 8_000;
export const MAX_SECTIONS = 20;
export const PATCH_PROMPT_MAX_CHARS = 2_000;

export const SectionSchema = z
  .object({
    title: z.string().min(1).max(SECTION_TITLE_MAX_CHARS),
    content: z.string().min(1).max(SECTION_CONTENT_MAX_CHARS)
  })
  .strict();

export type Section = z.infer<typeof SectionSchema>;

export const GenerateRequestSchema = z
  .object({
    sections: z.array(SectionSchema).min(1, "セクションを1つ以上入力してください。").max(MAX_SECTIONS)
  })
  .strict();

export const PatchRequestSchema = z
  .object({
    slides: z.array(SlideSchema),
    prompt: z.string().max(PATCH_PROMPT_MAX_CHARS)
  })
  .strict();

export const ExportRequestSchema = z
  .object({
    slides: z.array(SlideSchema)
  })
  .strict();

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
export type PatchRequest = z.infer<typeof PatchRequestSchema>;
export type ExportRequest = z.infer<typeof ExportRequestSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Normalizes section text before validation: titles collapse to one line,
 * content keeps its line breaks. Anything that is not a section list passes
 * through untouched so the schema reports it.
 */
export function sanitizeGeneratePayload(payload: unknown): unknown {
  if (!isRecord(payload) || !Array.isArray(payload.sections)) {
    return payload;
  }

  return {
    ...payload,
    sections: payload.sections.map((section) => {
      if (!isRecord(section)) return section;
      return {
        ...section,
        title: typeof section.title === "string" ? sanitizeText(section.title) : section.title,
        content: typeof section.content === "string" ? sanitizeMultilineText(section.content) : section.content
      };
    })
  };
}
