import { randomUUID } from "crypto";
import type { z } from "zod";
import { env } from "@/lib/env";
import { tryParseJson } from "@/lib/utils/json";
import { formatZodError } from "@/lib/validators/issues";

export function getRequestId(request: Request): string {
  return request.headers.get("x-request-id") ?? randomUUID();
}

export function getClientIp(request: Request): string {
  const forwarded = request.headers.get("x-forwarded-for");
  if (forwarded) {
    return forwarded.split(",")[0].trim();
  }

  const realIp = request.headers.get("x-real-ip");
  if (realIp) {
    return realIp.trim();
  }

  return "unknown";
}

export function jsonResponse(body: unknown, status = 200, headers?: HeadersInit): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json; charset=utf-8",
      ...headers
    }
  });
}

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: Response };

/**
 * Reads, size-checks, parses and validates a JSON body. Failures come back
 * as a ready 400/413 response carrying the request id.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  request: Request,
  schema: S,
  requestId: string,
  preprocess: (payload: unknown) => unknown = (payload) => payload
): Promise<ParsedBody<z.output<S>>> {
  const headers = { "x-request-id": requestId };

  let rawBody = "";
  try {
    rawBody = await request.text();
  } catch {
    return { ok: false, response: jsonResponse({ error: "リクエスト本文を読み取れませんでした。", requestId }, 400, headers) };
  }

  if (Buffer.byteLength(rawBody, "utf8") > env.MAX_REQUEST_BYTES) {
    return { ok: false, response: jsonResponse({ error: "リクエストが大きすぎます。", requestId }, 413, headers) };
  }

  const parsedJson = tryParseJson(rawBody);
  if (!parsedJson.ok) {
    return { ok: false, response: jsonResponse({ error: "JSONの形式が正しくありません。", requestId }, 400, headers) };
  }

  const validation = schema.safeParse(preprocess(parsedJson.value));
  if (!validation.success) {
    return {
      ok: false,
      response: jsonResponse(
        { error: "入力内容の検証に失敗しました。", details: formatZodError(validation.error), requestId },
        400,
        headers
      )
    };
  }

  return { ok: true, data: validation.data };
}
