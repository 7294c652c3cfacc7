import { env, SafetyMode } from "@/lib/env";
import { callGeminiGenerateContent } from "@/lib/gemini/client";
import { SYSTEM_INSTRUCTION } from "@/lib/prompts/system-instruction";
import { buildSlideBodyPrompt } from "@/lib/prompts/user-template";
import { mapWithConcurrency } from "@/lib/utils/concurrency";
import type { Result } from "@/lib/utils/json";
import type { Section } from "@/lib/validators/input";
import { decodeStructuredResult } from "@/lib/validators/model-response";
import {
  MessageLineSlide,
  Slide,
  SLIDE_BODY_FUNCTION_NAME,
  SlideBodySchema,
  slideBodyJsonSchema
} from "@/lib/validators/output-schema";

export const MISSING_BODY_PLACEHOLDER = "（詳細を生成できませんでした。チャットで内容を追記してください）";

export interface BodyGenerationOptions {
  model?: string;
  safetyMode?: SafetyMode;
  signal?: AbortSignal;
  requestId?: string;
  concurrency?: number;
}

export interface BodyGenerationResult {
  slides: Slide[];
  /** Indices whose body fell back to the placeholder. */
  degradedIndices: number[];
}

async function requestSlideBody(
  slide: MessageLineSlide,
  index: number,
  plan: MessageLineSlide[],
  sections: Section[],
  options: BodyGenerationOptions
): Promise<Result<string[]>> {
  try {
    const result = await callGeminiGenerateContent({
      model: options.model ?? env.GEMINI_MODEL,
      safetyMode: options.safetyMode ?? env.DEFAULT_SAFETY_MODE,
      systemInstruction: SYSTEM_INSTRUCTION,
      userPrompt: buildSlideBodyPrompt({ slide, index, total: plan.length, sections }),
      functionDeclaration: {
        name: SLIDE_BODY_FUNCTION_NAME,
        description: "スライドのメッセージラインを裏付ける箇条書きを記録する",
        parameters: slideBodyJsonSchema
      },
      signal: options.signal
    });

    const decoded = decodeStructuredResult(result, SLIDE_BODY_FUNCTION_NAME, SlideBodySchema);
    return decoded.ok ? { ok: true, value: decoded.value.bullets } : decoded;
  } catch (error) {
    // A cancelled request stops the whole batch; anything else degrades this slide only.
    if (options.signal?.aborted) throw error;
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Stage 2: expands each planned slide with bullets grounded in the original
 * sections. Calls run through a bounded pool and are reassembled by index.
 */
export async function generateSlideBodies(
  plan: MessageLineSlide[],
  sections: Section[],
  options: BodyGenerationOptions = {}
): Promise<BodyGenerationResult> {
  const outcomes = await mapWithConcurrency(
    plan,
    options.concurrency ?? env.BODY_CONCURRENCY,
    async (slide, index) => {
      const body = await requestSlideBody(slide, index, plan, sections, options);
      if (body.ok) {
        return { slide: { title: slide.title, bullets: [slide.message_line, ...body.value] }, degraded: false };
      }

      console.warn(
        JSON.stringify({
          level: "warn",
          event: "body.fallback",
          requestId: options.requestId ?? null,
          index,
          title: slide.title,
          reason: body.error
        })
      );

      return {
        slide: { title: slide.title, bullets: [slide.message_line, MISSING_BODY_PLACEHOLDER] },
        degraded: true
      };
    }
  );

  return {
    slides: outcomes.map((outcome) => outcome.slide),
    degradedIndices: outcomes.flatMap((outcome, index) => (outcome.degraded ? [index] : []))
  };
}
