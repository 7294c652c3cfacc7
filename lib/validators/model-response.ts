import type { z } from "zod";
import type { GeminiGenerateResult } from "@/lib/gemini/client";
import { parseJsonPayload, Result } from "@/lib/utils/json";
import { formatZodError } from "@/lib/validators/issues";
import { MessageLinePlanSchema, MessageLineSlide } from "@/lib/validators/output-schema";

/**
 * Decodes the stage-1 outline. Accepts fenced or bare JSON, shaped either as
 * `{ "slides": [...] }` or as the bare array.
 */
export function decodeMessageLinePlan(rawText: string): Result<MessageLineSlide[]> {
  const parsed = parseJsonPayload(rawText);
  if (!parsed.ok) {
    return { ok: false, error: `invalid JSON: ${parsed.error}` };
  }

  const candidate = Array.isArray(parsed.value) ? { slides: parsed.value } : parsed.value;
  const validated = MessageLinePlanSchema.safeParse(candidate);
  if (!validated.success) {
    return { ok: false, error: formatZodError(validated.error).join(" | ") };
  }

  return { ok: true, value: validated.data.slides };
}

/**
 * Accepts only a function-call result named `expectedName` whose arguments
 * satisfy `schema`. Free text, a missing call or a foreign name are errors.
 */
export function decodeStructuredResult<S extends z.ZodTypeAny>(
  result: Pick<GeminiGenerateResult, "rawText" | "functionCall">,
  expectedName: string,
  schema: S
): Result<z.output<S>> {
  const call = result.functionCall;
  if (!call) {
    return {
      ok: false,
      error: result.rawText ? "free text returned instead of a structured result" : "structured result missing"
    };
  }

  if (call.name !== expectedName) {
    return { ok: false, error: `unexpected structured result "${call.name}" (expected "${expectedName}")` };
  }

  const validated = schema.safeParse(call.args);
  if (!validated.success) {
    return { ok: false, error: formatZodError(validated.error).join(" | ") };
  }

  return { ok: true, value: validated.data };
}
