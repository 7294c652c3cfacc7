import { beforeEach, describe, expect, it, vi } from "vitest";
import { buildThreeSlides } from "@/tests/fixtures";
import { POST } from "@/app/patch/route";

function buildRequest(body: unknown): Request {
  return new Request("http://localhost/patch", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

describe("POST /patch", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  it("削除指示で最後のスライドを取り除く", async () => {
    const response = await POST(buildRequest({ slides: buildThreeSlides(), prompt: "2番目のスライドを削除して" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      slides: buildThreeSlides().slice(0, 2),
      command: "delete",
      applied: true
    });
  });

  it("変更がなかったことを applied で返す", async () => {
    const slides = [{ title: "自己紹介", bullets: ["メッセージ"] }];
    const response = await POST(buildRequest({ slides, prompt: "消して" }));

    expect(await response.json()).toEqual({ slides, command: "delete", applied: false });
  });

  it("prompt が無ければ 400", async () => {
    const response = await POST(buildRequest({ slides: buildThreeSlides() }));
    expect(response.status).toBe(400);
  });
});
