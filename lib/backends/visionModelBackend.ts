/**
 * Vision model backend: reads a forecast screenshot with an OpenAI vision-capable
 * chat model.
 *
 * The model gets one fixed instruction and must answer with one JSON object of a
 * fixed shape. The first well-formed JSON object in the reply is validated with zod;
 * anything else is MalformedOutput. A null or non-numeric series element is kept
 * as NaN and fails that field's range check. No API key => BackendUnavailable, no request made.
 */

import OpenAI from "openai";
import { z } from "zod";
import type {
  CandidateResult,
  CandidateSample,
  ExtractionRequest,
} from "@/lib/forecast/types";
import { getErrorMessage, isAbortError, toLoggableError } from "@/lib/utils/error";
import { candidateFailure, candidateSuccess, type ExtractionBackend } from "./types";
import { findFirstJsonObject, normalizeTimeOfDay, parseDecimal, parseTideKind } from "./parsing";

/**
 * Narrow slice of the OpenAI client this backend calls. The real client satisfies it;
 * tests hand in a stub.
 */
export interface VisionCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export type VisionModelBackendOptions = {
  apiKey: string | null;
  model: string;
  timeoutMs: number;
  /** Defaults to a real OpenAI client built from apiKey */
  client?: VisionCompletionClient;
};

export const VISION_SYSTEM_PROMPT =
  "You are a precise surf forecast reader. Always respond with valid JSON only, no explanations.";

export const VISION_EXTRACTION_PROMPT = `This image is a screenshot of a surf forecast table for one day.

Read the hourly rows from left to right and the tide table. Copy numbers exactly as shown.
Use meters for wave height, seconds for period, kJ for wave power, m/s for wind speed.
If a row is not visible, return an empty array for it. Do not invent values.

RETURN JSON EXACTLY IN THIS FORMAT:

{
  "waveHeights": [1.2, 1.3],
  "wavePeriods": [11, 11.5],
  "wavePowers": [420, 460],
  "windSpeeds": [3.1, 4.0],
  "tides": [
    { "time": "06:14", "height": 1.9, "kind": "High" },
    { "time": "12:31", "height": 0.4, "kind": "Low" }
  ]
}

Return ONLY JSON.`;

// An unreadable element becomes NaN, so range checks drop only its field
const NumberLike = z.unknown().transform((value): number => {
  if (typeof value === "number") return value;
  if (typeof value === "string") return parseDecimal(value) ?? Number.NaN;
  return Number.NaN;
});

const Series = z.array(NumberLike).nullish().transform((values) => values ?? []);

const TideRow = z.object({
  time: z.string().transform(normalizeTimeOfDay),
  height: NumberLike,
  kind: z.string().transform((value, ctx) => {
    const kind = parseTideKind(value);
    if (!kind) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown tide kind: ${value}` });
      return z.NEVER;
    }
    return kind;
  }),
});

export const VisionPayloadSchema = z.object({
  waveHeights: Series,
  wavePeriods: Series,
  wavePowers: Series,
  windSpeeds: Series,
  tides: z.array(TideRow).nullish().transform((rows) => rows ?? []),
});

export type VisionPayload = z.infer<typeof VisionPayloadSchema>;

/**
 * Turn the model's reply text into a candidate sample, or null when the reply
 * carries no JSON object of the expected shape.
 */
export function parseVisionReply(replyText: string): CandidateSample | null {
  const json = findFirstJsonObject(replyText);
  if (json === null) return null;

  const parsed = VisionPayloadSchema.safeParse(json);
  if (!parsed.success) {
    console.warn("[Vision Backend] Reply JSON does not match schema:", parsed.error.issues.slice(0, 5));
    return null;
  }

  return {
    waveHeights: parsed.data.waveHeights,
    wavePeriods: parsed.data.wavePeriods,
    wavePowers: parsed.data.wavePowers,
    windSpeeds: parsed.data.windSpeeds,
    tideExtremes: parsed.data.tides,
    provenance: "VisionModel",
  };
}

/**
 * Guess the media type from magic bytes; forecast screenshots are PNG or JPEG.
 */
export function inferImageMediaType(image: Buffer): "image/png" | "image/jpeg" | "image/webp" {
  if (image.length >= 4 && image[0] === 0x89 && image[1] === 0x50 && image[2] === 0x4e && image[3] === 0x47) {
    return "image/png";
  }
  if (image.length >= 12 && image.subarray(0, 4).toString("ascii") === "RIFF" && image.subarray(8, 12).toString("ascii") === "WEBP") {
    return "image/webp";
  }
  return "image/jpeg";
}

export class VisionModelBackend implements ExtractionBackend {
  readonly provenance = "VisionModel" as const;
  readonly timeoutMs: number;
  private readonly apiKey: string | null;
  private readonly model: string;
  private client: VisionCompletionClient | null;

  constructor(options: VisionModelBackendOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.client = options.client ?? null;
  }

  isAvailable(): boolean {
    return this.client !== null || !!this.apiKey?.trim();
  }

  private getClient(): VisionCompletionClient | null {
    if (this.client) return this.client;
    const apiKey = this.apiKey?.trim();
    if (!apiKey) return null;
    // maxRetries 0: the engine owns the time budget
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    return this.client;
  }

  async extract(request: ExtractionRequest, signal: AbortSignal): Promise<CandidateResult> {
    const client = this.getClient();
    if (!client) {
      return candidateFailure(this.provenance, "BackendUnavailable", "OPENAI_API_KEY is not set");
    }
    if (!request.image || request.image.length === 0) {
      return candidateFailure(this.provenance, "BackendUnavailable", "No image to read");
    }

    const dataUrl = `data:${inferImageMediaType(request.image)};base64,${request.image.toString("base64")}`;

    let replyText: string | null | undefined;
    try {
      const response = await client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: VISION_SYSTEM_PROMPT },
            {
              role: "user",
              content: [
                { type: "text", text: VISION_EXTRACTION_PROMPT },
                { type: "image_url", image_url: { url: dataUrl } },
              ],
            },
          ],
          response_format: { type: "json_object" },
          temperature: 0.1,
        },
        { signal }
      );
      replyText = response.choices[0]?.message?.content;
    } catch (error) {
      if (isAbortError(error) || signal.aborted) {
        return candidateFailure(this.provenance, "Timeout", "Vision request aborted");
      }
      console.error("[Vision Backend] Request failed:", {
        model: this.model,
        date: request.date,
        imageSize: request.image.length,
        error: toLoggableError(error),
      });
      return candidateFailure(this.provenance, "BackendUnavailable", getErrorMessage(error));
    }

    if (!replyText) {
      console.warn("[Vision Backend] Empty response from model:", { model: this.model });
      return candidateFailure(this.provenance, "MalformedOutput", "Empty response from model");
    }

    const sample = parseVisionReply(replyText);
    if (!sample) {
      console.warn("[Vision Backend] Could not parse reply (first 300 chars):", replyText.substring(0, 300));
      return candidateFailure(this.provenance, "MalformedOutput", "Reply did not contain a forecast JSON object");
    }

    console.log("[Vision Backend] Parsed candidate:", {
      waveHeights: sample.waveHeights.length,
      wavePeriods: sample.wavePeriods.length,
      wavePowers: sample.wavePowers.length,
      windSpeeds: sample.windSpeeds.length,
      tideExtremes: sample.tideExtremes.length,
    });
    return candidateSuccess(sample);
  }
}
