import type { Slide, SlidesState } from "@/lib/validators/output-schema";

export const NEW_SLIDE_TITLE = "新しいスライド";
export const NEW_SLIDE_BULLET = "内容を編集してください";
export const ANNOTATION_MARKER = "💡";

export const PATCH_KEYWORDS = {
  delete: ["削除", "消して", "delete"],
  append: ["追加", "add"],
  title: ["タイトル", "title"],
  change: ["変更", "change"],
  bullet: ["箇条書き", "bullet", "内容", "content"]
} as const;

export const TITLE_SEPARATORS = ["→", "->"] as const;

export type NoopReason = "empty_instruction" | "missing_separator" | "empty_title" | "empty_bullet";

export type PatchCommand =
  | { kind: "delete" }
  | { kind: "append" }
  | { kind: "retitle"; title: string }
  | { kind: "addBullet"; text: string }
  | { kind: "annotate"; text: string }
  | { kind: "noop"; reason: NoopReason };

export interface PatchResult {
  state: SlidesState;
  command: PatchCommand;
  /** False when the command left the deck unchanged. */
  applied: boolean;
}

interface PatchRule {
  matches: (normalized: string) => boolean;
  toCommand: (instruction: string) => PatchCommand;
}

function includesAny(normalized: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => normalized.includes(keyword));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function textAfterSeparator(instruction: string): string | null {
  let earliest: { index: number; length: number } | null = null;
  for (const separator of TITLE_SEPARATORS) {
    const index = instruction.indexOf(separator);
    if (index !== -1 && (!earliest || index < earliest.index)) {
      earliest = { index, length: separator.length };
    }
  }
  return earliest ? instruction.slice(earliest.index + earliest.length) : null;
}

const BULLET_KEYWORD_REGEX = new RegExp(PATCH_KEYWORDS.bullet.map(escapeRegExp).join("|"), "gi");

// Priority order is the array order: the first matching rule decides the command.
const PATCH_RULES: readonly PatchRule[] = [
  {
    matches: (normalized) => includesAny(normalized, PATCH_KEYWORDS.delete),
    toCommand: () => ({ kind: "delete" })
  },
  {
    matches: (normalized) => includesAny(normalized, PATCH_KEYWORDS.append),
    toCommand: () => ({ kind: "append" })
  },
  {
    matches: (normalized) =>
      includesAny(normalized, PATCH_KEYWORDS.title) && includesAny(normalized, PATCH_KEYWORDS.change),
    toCommand: (instruction) => {
      const remainder = textAfterSeparator(instruction);
      if (remainder === null) return { kind: "noop", reason: "missing_separator" };
      const title = remainder.trim();
      return title ? { kind: "retitle", title } : { kind: "noop", reason: "empty_title" };
    }
  },
  {
    matches: (normalized) => includesAny(normalized, PATCH_KEYWORDS.bullet),
    toCommand: (instruction) => {
      const text = instruction.replace(BULLET_KEYWORD_REGEX, "").trim();
      return text ? { kind: "addBullet", text } : { kind: "noop", reason: "empty_bullet" };
    }
  }
];

/**
 * Routes a chat instruction to exactly one command. Keyword matching is a
 * case-insensitive substring test; payloads keep the original casing.
 */
export function parsePatchCommand(instruction: string): PatchCommand {
  const trimmed = instruction.trim();
  if (!trimmed) {
    return { kind: "noop", reason: "empty_instruction" };
  }

  const normalized = trimmed.toLowerCase();
  const rule = PATCH_RULES.find((candidate) => candidate.matches(normalized));
  // Notes keep the instruction exactly as typed.
  return rule ? rule.toCommand(trimmed) : { kind: "annotate", text: instruction };
}

function cloneSlides(slides: Slide[]): Slide[] {
  return slides.map((slide) => ({ title: slide.title, bullets: [...slide.bullets] }));
}

function appendToLastSlide(slides: Slide[], bullet: string): Slide[] {
  const last = slides[slides.length - 1];
  return [...slides.slice(0, -1), { ...last, bullets: [...last.bullets, bullet] }];
}

export function applyPatchCommand(state: SlidesState, command: PatchCommand): SlidesState {
  const slides = cloneSlides(state.slides);

  switch (command.kind) {
    case "delete":
      // The deck never shrinks below one slide.
      return { slides: slides.length > 1 ? slides.slice(0, -1) : slides };
    case "append":
      return { slides: [...slides, { title: NEW_SLIDE_TITLE, bullets: [NEW_SLIDE_BULLET] }] };
    case "retitle":
      if (slides.length === 0) return { slides };
      return { slides: [{ ...slides[0], title: command.title }, ...slides.slice(1)] };
    case "addBullet":
      return { slides: slides.length > 1 ? appendToLastSlide(slides, command.text) : slides };
    case "annotate":
      return { slides: slides.length > 0 ? appendToLastSlide(slides, `${ANNOTATION_MARKER} ${command.text}`) : slides };
    case "noop":
      return { slides };
  }
}

function sameSlides(a: Slide[], b: Slide[]): boolean {
  return (
    a.length === b.length &&
    a.every(
      (slide, index) =>
        slide.title === b[index].title &&
        slide.bullets.length === b[index].bullets.length &&
        slide.bullets.every((bullet, bulletIndex) => bullet === b[index].bullets[bulletIndex])
    )
  );
}

export function patchSlides(state: SlidesState, instruction: string): PatchResult {
  const command = parsePatchCommand(instruction);
  const next = applyPatchCommand(state, command);
  return {
    state: next,
    command,
    applied: !sameSlides(state.slides, next.slides)
  };
}
