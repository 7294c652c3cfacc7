import { beforeEach, describe, expect, it, vi } from "vitest";
import { UpstreamUnavailableError } from "@/lib/errors";
import { SLIDE_BODY_FUNCTION_NAME } from "@/lib/validators/output-schema";
import { samplePlan, sampleSections } from "@/tests/fixtures";

const mocks = vi.hoisted(() => ({
  callGeminiGenerateContent: vi.fn()
}));

vi.mock("@/lib/gemini/client", () => ({
  callGeminiGenerateContent: mocks.callGeminiGenerateContent
}));

import { generateSlideBodies, MISSING_BODY_PLACEHOLDER } from "@/lib/services/body-generator";

function bodyCall(bullets: string[]) {
  return { rawText: "", functionCall: { name: SLIDE_BODY_FUNCTION_NAME, args: { bullets } } };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("generateSlideBodies", () => {
  beforeEach(() => {
    mocks.callGeminiGenerateContent.mockReset();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("メッセージラインを先頭に、生成した箇条書きを続ける", async () => {
    mocks.callGeminiGenerateContent.mockResolvedValue(bodyCall(["背景", "具体例", "行動"]));

    const result = await generateSlideBodies(samplePlan, sampleSections);

    expect(result.degradedIndices).toEqual([]);
    expect(result.slides).toEqual(
      samplePlan.map((slide) => ({ title: slide.title, bullets: [slide.message_line, "背景", "具体例", "行動"] }))
    );
    const params = mocks.callGeminiGenerateContent.mock.calls[0][0];
    expect(params.functionDeclaration.name).toBe(SLIDE_BODY_FUNCTION_NAME);
    expect(params.responseSchema).toBeUndefined();
  });

  it("1枚の失敗は他のスライドに影響しない", async () => {
    mocks.callGeminiGenerateContent.mockImplementation(async (params: { userPrompt: string }) => {
      if (params.userPrompt.includes(`タイトル: ${samplePlan[1].title}`)) {
        return { rawText: "箇条書きではなく文章で答えます" };
      }
      return bodyCall(["根拠", "事例", "詳細"]);
    });

    const result = await generateSlideBodies(samplePlan, sampleSections);

    expect(result.slides).toHaveLength(3);
    expect(result.degradedIndices).toEqual([1]);
    expect(result.slides[1]).toEqual({
      title: samplePlan[1].title,
      bullets: [samplePlan[1].message_line, MISSING_BODY_PLACEHOLDER]
    });
    expect(result.slides[0].bullets).toEqual([samplePlan[0].message_line, "根拠", "事例", "詳細"]);
    expect(result.slides[2].bullets).toEqual([samplePlan[2].message_line, "根拠", "事例", "詳細"]);
  });

  it("呼び出しの例外もそのスライドだけのフォールバックになる", async () => {
    mocks.callGeminiGenerateContent
      .mockResolvedValueOnce(bodyCall(["a"]))
      .mockResolvedValueOnce(bodyCall(["b"]))
      .mockRejectedValueOnce(new UpstreamUnavailableError("busy", { status: 503, retryable: true }));

    const result = await generateSlideBodies(samplePlan, sampleSections, { concurrency: 1 });

    expect(result.degradedIndices).toEqual([2]);
    expect(result.slides.map((slide) => slide.bullets[1])).toEqual(["a", "b", MISSING_BODY_PLACEHOLDER]);
  });

  it("並列実行でも計画の順序を保つ", async () => {
    const delays = [30, 0, 10];
    mocks.callGeminiGenerateContent.mockImplementation(async (params: { userPrompt: string }) => {
      const index = samplePlan.findIndex((slide) => params.userPrompt.includes(`タイトル: ${slide.title}`));
      await delay(delays[index]);
      return bodyCall([`body-${index}`]);
    });

    const result = await generateSlideBodies(samplePlan, sampleSections, { concurrency: 3 });

    expect(result.slides.map((slide) => slide.title)).toEqual(samplePlan.map((slide) => slide.title));
    expect(result.slides.map((slide) => slide.bullets[1])).toEqual(["body-0", "body-1", "body-2"]);
  });

  it("リクエストが中断されたら全体を中断する", async () => {
    const controller = new AbortController();
    controller.abort();
    mocks.callGeminiGenerateContent.mockRejectedValue(new Error("aborted"));

    await expect(generateSlideBodies(samplePlan, sampleSections, { signal: controller.signal })).rejects.toThrow(
      "aborted"
    );
  });
});
