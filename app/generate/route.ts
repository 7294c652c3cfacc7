import { applyRateLimit, rateLimitHeaders } from "@/lib/cache/rate-limit";
import { MalformedResponseError, toHttpStatus, UpstreamUnavailableError } from "@/lib/errors";
import { MISSING_API_KEY_MESSAGE } from "@/lib/gemini/client";
import { generateDeck } from "@/lib/services/generation-service";
import { getClientIp, getRequestId, jsonResponse, parseJsonBody } from "@/lib/utils/request";
import { GenerateRequestSchema, sanitizeGeneratePayload } from "@/lib/validators/input";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const maxDuration = 120;

function toPublicMessage(error: unknown): string {
  if (error instanceof UpstreamUnavailableError && error.message === MISSING_API_KEY_MESSAGE) {
    return MISSING_API_KEY_MESSAGE;
  }
  if (error instanceof UpstreamUnavailableError) {
    return "AIサービスに接続できませんでした。時間をおいて再度お試しください。";
  }
  if (error instanceof MalformedResponseError) {
    return "AIの応答を解釈できなかったため、スライドを生成できませんでした。もう一度お試しください。";
  }
  return "スライド生成中にエラーが発生しました。入力内容を確認して再度お試しください。";
}

export async function POST(request: Request): Promise<Response> {
  const requestId = getRequestId(request);
  const ip = getClientIp(request);
  const startedAt = Date.now();

  const rateLimit = applyRateLimit(ip);
  if (!rateLimit.allowed) {
    return jsonResponse(
      {
        error: "リクエストが多すぎます。しばらくしてから再度お試しください。",
        requestId,
        limit: rateLimit.limit,
        resetInSeconds: rateLimit.resetInSeconds
      },
      429,
      { "x-request-id": requestId, ...rateLimitHeaders(rateLimit) }
    );
  }

  const body = await parseJsonBody(request, GenerateRequestSchema, requestId, sanitizeGeneratePayload);
  if (!body.ok) {
    return body.response;
  }

  console.info(
    JSON.stringify({
      level: "info",
      event: "generate.request",
      requestId,
      ip,
      sections: body.data.sections.length
    })
  );

  try {
    const result = await generateDeck(body.data.sections, {
      signal: request.signal,
      requestId,
      hooks: {
        onStage: (stage, message) => {
          console.info(JSON.stringify({ level: "info", event: "generate.stage", requestId, stage, message }));
        }
      }
    });

    console.info(
      JSON.stringify({
        level: "info",
        event: "generate.success",
        requestId,
        model: result.model,
        slides: result.slides.length,
        degradedIndices: result.degradedIndices,
        elapsedMs: Date.now() - startedAt
      })
    );

    return jsonResponse({ slides: result.slides }, 200, { "x-request-id": requestId, ...rateLimitHeaders(rateLimit) });
  } catch (error) {
    const rawMessage = error instanceof Error ? error.message : "Unknown error";
    const status = toHttpStatus(error);

    console.error(
      JSON.stringify({
        level: "error",
        event: "generate.error",
        requestId,
        ip,
        status,
        message: rawMessage,
        elapsedMs: Date.now() - startedAt
      })
    );

    return jsonResponse({ error: toPublicMessage(error), requestId }, status, { "x-request-id": requestId });
  }
}
