import { patchSlides } from "@/lib/services/patch-engine";
import { getRequestId, jsonResponse, parseJsonBody } from "@/lib/utils/request";
import { PatchRequestSchema } from "@/lib/validators/input";

export const runtime = "nodejs";

export async function POST(request: Request): Promise<Response> {
  const requestId = getRequestId(request);

  const body = await parseJsonBody(request, PatchRequestSchema, requestId);
  if (!body.ok) {
    return body.response;
  }

  const result = patchSlides({ slides: body.data.slides }, body.data.prompt);

  console.info(
    JSON.stringify({
      level: "info",
      event: "patch.applied",
      requestId,
      command: result.command.kind,
      applied: result.applied,
      slides: result.state.slides.length
    })
  );

  return jsonResponse(
    {
      slides: result.state.slides,
      command: result.command.kind,
      applied: result.applied
    },
    200,
    { "x-request-id": requestId }
  );
}
