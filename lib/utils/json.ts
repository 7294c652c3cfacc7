export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

const JSON_FENCE_REGEX = /```json\s*([\s\S]*?)```/i;
const ANY_FENCE_REGEX = /```[\w-]*\s*([\s\S]*?)```/;

/** Returns the body of the first fenced code block, preferring a `json` fence, or the trimmed text. */
export function extractFencedBlock(text: string): string {
  const match = JSON_FENCE_REGEX.exec(text) ?? ANY_FENCE_REGEX.exec(text);
  return match ? match[1].trim() : text.trim();
}

const JSON_OPENERS = [
  { open: "{", close: "}" },
  { open: "[", close: "]" }
] as const;

/**
 * Slices from each opener's first occurrence to its last matching closer,
 * earliest opener first. Without any opener the unfenced text is the only candidate.
 */
export function extractJsonCandidates(text: string): string[] {
  const unfenced = extractFencedBlock(text);
  const candidates = JSON_OPENERS.map(({ open, close }) => ({
    start: unfenced.indexOf(open),
    end: unfenced.lastIndexOf(close)
  }))
    .filter(({ start, end }) => start !== -1 && end > start)
    .sort((a, b) => a.start - b.start)
    .map(({ start, end }) => unfenced.slice(start, end + 1));

  return candidates.length > 0 ? candidates : [unfenced];
}

/** Parses the first candidate that is valid JSON; otherwise reports the earliest candidate's error. */
export function parseJsonPayload(text: string): Result<unknown> {
  const [first, ...rest] = extractJsonCandidates(text);
  const parsed = tryParseJson(first);
  if (parsed.ok) return parsed;

  for (const candidate of rest) {
    const retry = tryParseJson(candidate);
    if (retry.ok) return retry;
  }
  return parsed;
}

export function tryParseJson(raw: string): Result<unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : "Unknown JSON parse error"
    };
  }
}
