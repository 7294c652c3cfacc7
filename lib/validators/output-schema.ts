import { z } from "zod";

// No per-field caps: every deck /generate or /patch returns must be accepted
// again by /patch and /export. MAX_REQUEST_BYTES bounds the whole body.
export const SlideSchema = z
  .object({
    title: z.string(),
    bullets: z.array(z.string())
  })
  .strict();

export const SlidesStateSchema = z
  .object({
    slides: z.array(SlideSchema)
  })
  .strict();

export type Slide = z.infer<typeof SlideSchema>;
export type SlidesState = z.infer<typeof SlidesStateSchema>;

// Stage 1: one message line per planned slide.
export const MessageLineSlideSchema = z.object({
  title: z.string().trim().min(1),
  message_line: z.string().trim().min(1)
});

export const MessageLinePlanSchema = z.object({
  slides: z.array(MessageLineSlideSchema).min(1)
});

export type MessageLineSlide = z.infer<typeof MessageLineSlideSchema>;

export const messageLinePlanJsonSchema = {
  type: "object",
  properties: {
    slides: {
      type: "array",
      items: {
        type: "object",
        properties: {
          title: { type: "string" },
          message_line: { type: "string" }
        },
        required: ["title", "message_line"]
      }
    }
  },
  required: ["slides"]
} as const;

// Stage 2: body bullets returned through a forced function call.
export const SLIDE_BODY_FUNCTION_NAME = "record_slide_body";
export const SLIDE_BODY_MAX_BULLETS = 5;

export const SlideBodySchema = z.object({
  bullets: z
    .array(z.string())
    .transform((bullets) =>
      bullets
        .map((bullet) => bullet.trim())
        .filter(Boolean)
        .slice(0, SLIDE_BODY_MAX_BULLETS)
    )
    .pipe(z.array(z.string()).min(1))
});

export type SlideBody = z.infer<typeof SlideBodySchema>;

export const slideBodyJsonSchema = {
  type: "object",
  properties: {
    bullets: {
      type: "array",
      description: "メッセージラインを裏付ける箇条書き（背景・根拠 → 具体例・データ → 詳細 → 行動項目の順）",
      items: { type: "string" },
      minItems: 3,
      maxItems: SLIDE_BODY_MAX_BULLETS
    }
  },
  required: ["bullets"]
} as const;
