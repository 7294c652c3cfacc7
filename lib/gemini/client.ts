import { z } from "zod";
import { env, SafetyMode } from "@/lib/env";
import { isAbortError, isRetryableStatus, MalformedResponseError, UpstreamUnavailableError } from "@/lib/errors";
import { withDeadline } from "@/lib/utils/abort";

export interface GeminiFunctionDeclaration {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

interface GeminiGenerateParams {
  model: string;
  systemInstruction: string;
  userPrompt: string;
  safetyMode: SafetyMode;
  /** JSON response schema; mutually exclusive with `functionDeclaration`. */
  responseSchema?: Record<string, unknown>;
  /** Forces the model to answer through this single function call. */
  functionDeclaration?: GeminiFunctionDeclaration;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface GeminiFunctionCall {
  name: string;
  args?: unknown;
}

export interface GeminiGenerateResult {
  rawText: string;
  functionCall?: GeminiFunctionCall;
  usage?: GeminiUsage;
}

const GeminiUsageSchema = z.object({
  promptTokenCount: z.number().optional(),
  candidatesTokenCount: z.number().optional(),
  totalTokenCount: z.number().optional()
});

type GeminiUsage = z.infer<typeof GeminiUsageSchema>;

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z.object({ name: z.string(), args: z.unknown() }).optional()
                })
              )
              .optional()
          })
          .optional()
      })
    )
    .optional(),
  usageMetadata: GeminiUsageSchema.optional()
});

function normalizeModelName(model: string): string {
  return model.toLowerCase().replace(/\s+/g, "").trim();
}

function isModelNotFound(status: number, text: string): boolean {
  if (status !== 404) return false;
  const normalized = text.toLowerCase();
  return normalized.includes("model") && (normalized.includes("not found") || normalized.includes("notfound"));
}

function resolveSafetySettings(mode: SafetyMode): Array<Record<string, string>> {
  const threshold = mode === "strict" ? "BLOCK_LOW_AND_ABOVE" : "BLOCK_MEDIUM_AND_ABOVE";
  return [
    "HARM_CATEGORY_HARASSMENT",
    "HARM_CATEGORY_HATE_SPEECH",
    "HARM_CATEGORY_SEXUALLY_EXPLICIT",
    "HARM_CATEGORY_DANGEROUS_CONTENT"
  ].map((category) => ({ category, threshold }));
}

function buildRequestBody(params: GeminiGenerateParams): Record<string, unknown> {
  const generationConfig: Record<string, unknown> = { temperature: 0.4 };
  if (params.responseSchema) {
    generationConfig.responseMimeType = "application/json";
    generationConfig.responseSchema = params.responseSchema;
  }

  const body: Record<string, unknown> = {
    systemInstruction: {
      role: "system",
      parts: [{ text: params.systemInstruction }]
    },
    contents: [{ role: "user", parts: [{ text: params.userPrompt }] }],
    safetySettings: resolveSafetySettings(params.safetyMode),
    generationConfig
  };

  if (params.functionDeclaration) {
    body.tools = [{ functionDeclarations: [params.functionDeclaration] }];
    body.toolConfig = {
      functionCallingConfig: {
        mode: "ANY",
        allowedFunctionNames: [params.functionDeclaration.name]
      }
    };
  }

  return body;
}

async function requestGemini(
  params: GeminiGenerateParams,
  model: string,
  signal: AbortSignal,
  timeoutMs: number
): Promise<Response> {
  const endpoint = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent`;
  try {
    return await fetch(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": env.GEMINI_API_KEY
      },
      body: JSON.stringify(buildRequestBody(params)),
      signal
    });
  } catch (error) {
    // Caller cancellation propagates untouched; only our own deadline becomes an upstream failure.
    if (params.signal?.aborted) throw error;

    if (isAbortError(error)) {
      throw new UpstreamUnavailableError(`Gemini request timed out after ${timeoutMs} ms`, {
        retryable: true,
        cause: error
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new UpstreamUnavailableError(`Gemini request failed: ${message}`, { retryable: true, cause: error });
  }
}

export const MISSING_API_KEY_MESSAGE =
  "GEMINI_API_KEY が設定されていません。.env に GEMINI_API_KEY を設定してください。";

export function isGeminiConfigured(): boolean {
  return Boolean(env.GEMINI_API_KEY.trim());
}

export async function callGeminiGenerateContent(
  params: GeminiGenerateParams
): Promise<GeminiGenerateResult> {
  if (!isGeminiConfigured()) {
    throw new UpstreamUnavailableError(MISSING_API_KEY_MESSAGE);
  }

  const timeoutMs = params.timeoutMs ?? env.GEMINI_TIMEOUT_MS;
  const deadline = withDeadline(params.signal, timeoutMs);

  try {
    const requestedModel = params.model.trim();
    let response = await requestGemini(params, requestedModel, deadline.signal, timeoutMs);
    let errorText = response.ok ? "" : await response.text().catch(() => "");

    // Fallback if Gemini 3 is not enabled in this account/project.
    if (
      !response.ok &&
      isModelNotFound(response.status, errorText) &&
      normalizeModelName(requestedModel).includes("gemini-3")
    ) {
      response = await requestGemini(params, "gemini-2.5-pro", deadline.signal, timeoutMs);
      errorText = response.ok ? "" : await response.text().catch(() => "");
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError(`Gemini error (${response.status}): ${errorText.slice(0, 500)}`, {
        status: response.status,
        retryable: isRetryableStatus(response.status)
      });
    }

    const json: unknown = await response.json().catch(() => null);
    const parsed = GeminiResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new MalformedResponseError("Gemini response did not match the generateContent shape.");
    }

    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    const rawText = parts
      .map((part) => part.text ?? "")
      .join("\n")
      .trim();
    const functionCall = parts.find((part) => part.functionCall)?.functionCall;

    if (!rawText && !functionCall) {
      throw new MalformedResponseError("Gemini returned neither text nor a function call.");
    }

    return {
      rawText,
      functionCall,
      usage: parsed.data.usageMetadata
    };
  } finally {
    deadline.dispose();
  }
}
