import { env } from "@/lib/env";
import { isGeminiConfigured } from "@/lib/gemini/client";
import { getRequestId, jsonResponse } from "@/lib/utils/request";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(request: Request): Promise<Response> {
  const requestId = getRequestId(request);
  const apiKeyConfigured = isGeminiConfigured();

  return jsonResponse(
    {
      requestId,
      ok: apiKeyConfigured,
      apiKeyConfigured,
      model: env.GEMINI_MODEL
    },
    200,
    { "x-request-id": requestId }
  );
}
