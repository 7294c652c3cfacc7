import { env, SafetyMode } from "@/lib/env";
import { InvalidInputError, MalformedResponseError, UpstreamUnavailableError } from "@/lib/errors";
import { callGeminiGenerateContent } from "@/lib/gemini/client";
import { SYSTEM_INSTRUCTION } from "@/lib/prompts/system-instruction";
import { buildMessageLinePrompt } from "@/lib/prompts/user-template";
import { RetryConfig, withRetry } from "@/lib/utils/retry";
import type { Section } from "@/lib/validators/input";
import { decodeMessageLinePlan } from "@/lib/validators/model-response";
import { MessageLineSlide, messageLinePlanJsonSchema } from "@/lib/validators/output-schema";

export interface MessageLineOptions {
  model?: string;
  safetyMode?: SafetyMode;
  signal?: AbortSignal;
  requestId?: string;
  retry?: Partial<Omit<RetryConfig, "signal" | "shouldRetry">>;
}

export function isRetryableGenerationError(error: unknown): boolean {
  if (error instanceof MalformedResponseError) return true;
  if (error instanceof UpstreamUnavailableError) return error.retryable;
  return false;
}

/**
 * Stage 1: a single call over the whole ES that returns the slide outline,
 * one message line per slide. All-or-nothing: after the retry budget is
 * spent the last error is thrown and no partial outline is returned.
 */
export async function generateMessageLines(
  sections: Section[],
  options: MessageLineOptions = {}
): Promise<MessageLineSlide[]> {
  if (sections.length === 0) {
    throw new InvalidInputError("セクションが空のため構成案を生成できません。");
  }

  const model = options.model ?? env.GEMINI_MODEL;
  const userPrompt = buildMessageLinePrompt(sections);

  return withRetry(
    async () => {
      const result = await callGeminiGenerateContent({
        model,
        safetyMode: options.safetyMode ?? env.DEFAULT_SAFETY_MODE,
        systemInstruction: SYSTEM_INSTRUCTION,
        userPrompt,
        responseSchema: messageLinePlanJsonSchema,
        signal: options.signal
      });

      const decoded = decodeMessageLinePlan(result.rawText);
      if (!decoded.ok) {
        throw new MalformedResponseError(`Message-line outline could not be decoded: ${decoded.error}`);
      }

      return decoded.value;
    },
    {
      maxRetries: env.GENERATION_MAX_RETRIES,
      onRetry: ({ attempt, delayMs, error }) => {
        console.warn(
          JSON.stringify({
            level: "warn",
            event: "message_lines.retry",
            requestId: options.requestId ?? null,
            attempt,
            delayMs,
            message: error instanceof Error ? error.message : String(error)
          })
        );
      },
      ...options.retry,
      shouldRetry: isRetryableGenerationError,
      signal: options.signal
    }
  );
}
