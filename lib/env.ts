import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  APP_URL: z.string().url().default("http://localhost:3000"),
  // The app boots without Gemini configured; /generate answers 503 until the key is set.
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  DEFAULT_SAFETY_MODE: z.enum(["normal", "strict"]).default("normal"),
  GENERATION_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  BODY_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(3),
  // Relative paths resolve against the process working directory.
  EXPORT_DIR: z.string().min(1).default("exports"),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(20),
  MAX_REQUEST_BYTES: z.coerce.number().int().positive().default(200_000)
});

export const env = EnvSchema.parse({
  NODE_ENV: process.env.NODE_ENV,
  APP_URL: process.env.APP_URL,
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
  GEMINI_TIMEOUT_MS: process.env.GEMINI_TIMEOUT_MS,
  DEFAULT_SAFETY_MODE: process.env.DEFAULT_SAFETY_MODE,
  GENERATION_MAX_RETRIES: process.env.GENERATION_MAX_RETRIES,
  BODY_CONCURRENCY: process.env.BODY_CONCURRENCY,
  EXPORT_DIR: process.env.EXPORT_DIR,
  RATE_LIMIT_PER_MINUTE: process.env.RATE_LIMIT_PER_MINUTE,
  MAX_REQUEST_BYTES: process.env.MAX_REQUEST_BYTES
});

export type SafetyMode = "normal" | "strict";
