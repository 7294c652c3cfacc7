import { beforeEach, describe, expect, it, vi } from "vitest";
import { MalformedResponseError, UpstreamUnavailableError } from "@/lib/errors";
import { MISSING_API_KEY_MESSAGE } from "@/lib/gemini/client";
import { buildThreeSlides } from "@/tests/fixtures";

const mocks = vi.hoisted(() => {
  return {
    applyRateLimit: vi.fn(),
    generateDeck: vi.fn()
  };
});

vi.mock("@/lib/cache/rate-limit", () => ({
  applyRateLimit: mocks.applyRateLimit,
  rateLimitHeaders: () => ({})
}));

vi.mock("@/lib/services/generation-service", () => ({
  generateDeck: mocks.generateDeck
}));

import { POST } from "@/app/generate/route";

function buildRequest(body: unknown): Request {
  return new Request("http://localhost/generate", {
    method: "POST",
    headers: {
      "content-type": "application/json",
      "x-request-id": "req_test"
    },
    body: typeof body === "string" ? body : JSON.stringify(body)
  });
}

const validBody = {
  sections: [{ title: " 強み ", content: "チームを率いて\r\nプロジェクトを完遂した" }]
};

describe("POST /generate", () => {
  beforeEach(() => {
    mocks.generateDeck.mockReset();
    mocks.applyRateLimit.mockReturnValue({
      allowed: true,
      remaining: 19,
      resetInSeconds: 60,
      limit: 20
    });
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("200 で生成したスライドを返す", async () => {
    mocks.generateDeck.mockResolvedValue({ slides: buildThreeSlides(), degradedIndices: [], model: "gemini-2.5-flash" });

    const response = await POST(buildRequest(validBody));
    const payload: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(response.headers.get("x-request-id")).toBe("req_test");
    expect(payload).toEqual({ slides: buildThreeSlides() });
    expect(mocks.generateDeck).toHaveBeenCalledWith(
      [{ title: "強み", content: "チームを率いて\nプロジェクトを完遂した" }],
      expect.objectContaining({ requestId: "req_test" })
    );
  });

  it("セクションが空なら 400", async () => {
    const response = await POST(buildRequest({ sections: [] }));
    const payload: unknown = await response.json();

    expect(response.status).toBe(400);
    expect(payload).toEqual({
      error: "入力内容の検証に失敗しました。",
      details: ["sections: セクションを1つ以上入力してください。"],
      requestId: "req_test"
    });
    expect(mocks.generateDeck).not.toHaveBeenCalled();
  });

  it("JSONが壊れていれば 400", async () => {
    const response = await POST(buildRequest("{sections:"));
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "JSONの形式が正しくありません。", requestId: "req_test" });
  });

  it("APIキー未設定は 503 で設定方法を伝える", async () => {
    mocks.generateDeck.mockRejectedValue(new UpstreamUnavailableError(MISSING_API_KEY_MESSAGE));

    const response = await POST(buildRequest(validBody));

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: MISSING_API_KEY_MESSAGE, requestId: "req_test" });
  });

  it("解釈できない応答は 502", async () => {
    mocks.generateDeck.mockRejectedValue(new MalformedResponseError("bad outline"));

    const response = await POST(buildRequest(validBody));

    expect(response.status).toBe(502);
  });

  it("レート制限を超えたら 429", async () => {
    mocks.applyRateLimit.mockReturnValue({ allowed: false, remaining: 0, resetInSeconds: 30, limit: 20 });

    const response = await POST(buildRequest(validBody));

    expect(response.status).toBe(429);
    expect(mocks.generateDeck).not.toHaveBeenCalled();
  });
});
