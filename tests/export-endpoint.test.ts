import { promises as fs } from "fs";
import { afterAll, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { env } from "@/lib/env";
import { buildThreeSlides } from "@/tests/fixtures";
import { POST } from "@/app/export/route";
import { GET } from "@/app/download/[filename]/route";

const ExportPayloadSchema = z.object({
  download_url: z.string(),
  filename: z.string()
});

function download(filename: string): Promise<Response> {
  return GET(new Request(`http://localhost/download/${filename}`), { params: { filename } });
}

describe("POST /export と GET /download", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterAll(async () => {
    await fs.rm(env.EXPORT_DIR, { recursive: true, force: true });
  });

  it(
    "書き出したファイルをダウンロードできる",
    async () => {
      const exportResponse = await POST(
        new Request("http://localhost/export", {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ slides: buildThreeSlides() })
        })
      );

      expect(exportResponse.status).toBe(200);
      const payload = ExportPayloadSchema.parse(await exportResponse.json());
      expect(payload.filename).toMatch(/^slide_[0-9a-f]{8}\.pptx$/);
      expect(payload.download_url).toBe(`/download/${payload.filename}`);

      const response = await download(payload.filename);
      const bytes = new Uint8Array(await response.arrayBuffer());

      expect(response.status).toBe(200);
      expect(response.headers.get("content-type")).toBe(
        "application/vnd.openxmlformats-officedocument.presentationml.presentation"
      );
      expect(response.headers.get("content-disposition")).toBe(`attachment; filename="${payload.filename}"`);
      expect(bytes[0]).toBe(0x50);
      expect(bytes[1]).toBe(0x4b);
    },
    30_000
  );

  it("存在しないファイルは 404", async () => {
    const response = await download("slide_00000000.pptx");

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: "ファイルが見つかりません。" });
  });

  it("生成した名前以外は 404", async () => {
    const response = await download("..%2F.env");
    expect(response.status).toBe(404);
  });

  it("スライドの形が不正なら 400", async () => {
    const response = await POST(
      new Request("http://localhost/export", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ slides: [{ title: "A" }] })
      })
    );
    expect(response.status).toBe(400);
  });
});
