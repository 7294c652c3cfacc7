import { env, SafetyMode } from "@/lib/env";
import { InvalidInputError, UpstreamUnavailableError } from "@/lib/errors";
import { isGeminiConfigured, MISSING_API_KEY_MESSAGE } from "@/lib/gemini/client";
import { generateSlideBodies } from "@/lib/services/body-generator";
import { generateMessageLines } from "@/lib/services/message-line-generator";
import type { Section } from "@/lib/validators/input";
import type { Slide } from "@/lib/validators/output-schema";

export interface GenerationHooks {
  onStage?: (stage: string, message: string) => void;
}

export interface GenerateDeckOptions {
  model?: string;
  safetyMode?: SafetyMode;
  signal?: AbortSignal;
  requestId?: string;
  hooks?: GenerationHooks;
}

export interface GenerateDeckResult {
  slides: Slide[];
  degradedIndices: number[];
  model: string;
}

export async function generateDeck(sections: Section[], options: GenerateDeckOptions = {}): Promise<GenerateDeckResult> {
  const { hooks } = options;

  if (sections.length === 0) {
    throw new InvalidInputError("セクションを1つ以上入力してください。");
  }

  if (!isGeminiConfigured()) {
    throw new UpstreamUnavailableError(MISSING_API_KEY_MESSAGE);
  }

  const model = options.model ?? env.GEMINI_MODEL;
  const shared = {
    model,
    safetyMode: options.safetyMode,
    signal: options.signal,
    requestId: options.requestId
  };

  hooks?.onStage?.("message_lines", "メッセージラインを生成しています。");
  const plan = await generateMessageLines(sections, shared);

  hooks?.onStage?.("bodies", `${plan.length}枚のスライドのボディを生成しています。`);
  const bodies = await generateSlideBodies(plan, sections, shared);

  hooks?.onStage?.("completed", "スライドの生成が完了しました。");
  return {
    slides: bodies.slides,
    degradedIndices: bodies.degradedIndices,
    model
  };
}
