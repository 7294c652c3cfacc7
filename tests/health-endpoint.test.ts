import { describe, expect, it } from "vitest";
import { GET } from "@/app/health/route";

describe("GET /health", () => {
  it("APIキーの設定状況とモデル名を返す", async () => {
    const response = await GET(new Request("http://localhost/health", { headers: { "x-request-id": "req_health" } }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      requestId: "req_health",
      ok: true,
      apiKeyConfigured: true,
      model: "gemini-2.5-flash"
    });
  });
});
