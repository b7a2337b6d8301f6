/**
 * Forecast pipeline configuration.
 *
 * Everything is read from environment variables through getters so tests can
 * set process.env per case. Missing credentials are not an error here: a backend
 * without its key reports itself unavailable and the engine carries on.
 */

import { z } from "zod";

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const positiveIntWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const ForecastEnvSchema = z.object({
  OPENAI_API_KEY: optionalTrimmed,
  OPENAI_MODEL_NAME: optionalTrimmed,
  OCR_SERVICE_URL: optionalTrimmed,
  STORMGLASS_API_KEY: optionalTrimmed,
  STORMGLASS_BASE_URL: optionalTrimmed,
  VISION_TIMEOUT_MS: positiveIntWithDefault(60_000),
  OCR_TIMEOUT_MS: positiveIntWithDefault(30_000),
  DIRECT_API_TIMEOUT_MS: positiveIntWithDefault(20_000),
  SESSION_EXPIRY_MS: positiveIntWithDefault(300_000),
  OCR_POLICY: z.enum(["fallback", "always"]).optional().default("fallback"),
  TRIGGER_PHRASES: optionalTrimmed,
});

export type ForecastEnv = z.infer<typeof ForecastEnvSchema>;

/**
 * Parse and validate the forecast-related environment.
 * Throws a readable error listing every bad variable.
 */
export function loadForecastEnv(env: NodeJS.ProcessEnv = process.env): ForecastEnv {
  const result = ForecastEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid forecast configuration: ${details}`);
  }
  return result.data;
}

/**
 * Get the OpenAI model name to use for screenshot extraction.
 * Defaults to "gpt-4o-mini" (vision capable, cheap enough per request).
 */
export function getVisionModelName(env: NodeJS.ProcessEnv = process.env): string {
  return loadForecastEnv(env).OPENAI_MODEL_NAME ?? "gpt-4o-mini";
}

export function getStormglassBaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const baseUrl = loadForecastEnv(env).STORMGLASS_BASE_URL ?? "https://api.stormglass.io/v2";
  return baseUrl.replace(/\/+$/, "");
}

export function getOcrServiceBaseUrl(env: NodeJS.ProcessEnv = process.env): string | null {
  const baseUrl = loadForecastEnv(env).OCR_SERVICE_URL;
  return baseUrl ? baseUrl.replace(/\/+$/, "") : null;
}

export const DEFAULT_TRIGGER_PHRASES = ["forecast", "surf report", "прогноз"] as const;

/**
 * Phrases that open a session. Comma separated in TRIGGER_PHRASES, compared case-insensitively.
 */
export function getTriggerPhrases(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = loadForecastEnv(env).TRIGGER_PHRASES;
  if (!raw) return [...DEFAULT_TRIGGER_PHRASES];
  return raw
    .split(",")
    .map((phrase) => phrase.trim().toLowerCase())
    .filter(Boolean);
}
