import { saveArtifact } from "@/lib/services/artifact-store";
import { toPptxBuffer } from "@/lib/services/pptx-export";
import { getRequestId, jsonResponse, parseJsonBody } from "@/lib/utils/request";
import { ExportRequestSchema } from "@/lib/validators/input";

export const runtime = "nodejs";

export async function POST(request: Request): Promise<Response> {
  const requestId = getRequestId(request);

  const body = await parseJsonBody(request, ExportRequestSchema, requestId);
  if (!body.ok) {
    return body.response;
  }

  try {
    const buffer = await toPptxBuffer(body.data.slides);
    const artifact = await saveArtifact(buffer);

    console.info(
      JSON.stringify({
        level: "info",
        event: "export.success",
        requestId,
        filename: artifact.filename,
        slides: body.data.slides.length,
        bytes: buffer.byteLength
      })
    );

    return jsonResponse(
      {
        download_url: `/download/${artifact.filename}`,
        filename: artifact.filename
      },
      200,
      { "x-request-id": requestId }
    );
  } catch (error) {
    console.error(
      JSON.stringify({
        level: "error",
        event: "export.error",
        requestId,
        message: error instanceof Error ? error.message : "Unknown error"
      })
    );

    return jsonResponse({ error: "PPTXファイルの作成に失敗しました。", requestId }, 500, { "x-request-id": requestId });
  }
}
