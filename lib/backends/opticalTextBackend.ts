/**
 * Optical text backend: OCR over an enhanced copy of the screenshot, then fixed
 * regex patterns (see ocrPatterns.ts).
 *
 * Enhancement runs locally with sharp (grayscale, normalised levels, contrast boost,
 * sharpen). Recognition is delegated to the OCR microservice at OCR_SERVICE_URL:
 *
 *   POST {OCR_SERVICE_URL}/v1/ocr/text/upload   (multipart: file, lang)
 *   200 { "text": "...", "confidence": 0.83 }
 *
 * The engine only runs this backend when the vision backend is unavailable,
 * unless configured with ocrPolicy "always".
 */

import sharp from "sharp";
import { z } from "zod";
import type { CandidateResult, ExtractionRequest } from "@/lib/forecast/types";
import { getErrorMessage, isAbortError, toLoggableError } from "@/lib/utils/error";
import { candidateFailure, candidateSuccess, type ExtractionBackend } from "./types";
import { extractForecastFromOcrText } from "./ocrPatterns";

export type ImageEnhancer = (image: Buffer) => Promise<Buffer>;

export type OpticalTextBackendOptions = {
  /** OCR service base URL, null when not configured */
  serviceUrl: string | null;
  timeoutMs: number;
  /** Tesseract-style language list passed to the service */
  languages?: string;
  fetchImpl?: typeof fetch;
  enhance?: ImageEnhancer;
};

const OcrServiceResponseSchema = z.object({
  text: z.string(),
  confidence: z.union([z.number(), z.string()]).optional(),
});

/**
 * Boost contrast and sharpness before OCR. Small digits in forecast tables are
 * the usual casualty of screenshot compression.
 */
export async function enhanceForOcr(image: Buffer): Promise<Buffer> {
  return sharp(image)
    .grayscale()
    .normalise()
    .linear(1.4, -40)
    .sharpen({ sigma: 1.2 })
    .png()
    .toBuffer();
}

export class OpticalTextBackend implements ExtractionBackend {
  readonly provenance = "OpticalText" as const;
  readonly timeoutMs: number;
  private readonly serviceUrl: string | null;
  private readonly languages: string;
  private readonly fetchImpl: typeof fetch;
  private readonly enhance: ImageEnhancer;

  constructor(options: OpticalTextBackendOptions) {
    this.serviceUrl = options.serviceUrl ? options.serviceUrl.replace(/\/+$/, "") : null;
    this.timeoutMs = options.timeoutMs;
    this.languages = options.languages ?? "eng+rus";
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.enhance = options.enhance ?? enhanceForOcr;
  }

  isAvailable(): boolean {
    return this.serviceUrl !== null;
  }

  async extract(request: ExtractionRequest, signal: AbortSignal): Promise<CandidateResult> {
    if (!this.serviceUrl) {
      return candidateFailure(this.provenance, "BackendUnavailable", "OCR_SERVICE_URL is not set");
    }
    if (!request.image || request.image.length === 0) {
      return candidateFailure(this.provenance, "BackendUnavailable", "No image to read");
    }

    let enhanced: Buffer;
    try {
      enhanced = await this.enhance(request.image);
    } catch (error) {
      console.warn("[OCR Backend] Image enhancement failed:", toLoggableError(error));
      return candidateFailure(this.provenance, "MalformedOutput", `Image could not be decoded: ${getErrorMessage(error)}`);
    }

    const endpoint = `${this.serviceUrl}/v1/ocr/text/upload`;
    const formData = new FormData();
    formData.append("lang", this.languages);
    formData.append("file", new Blob([new Uint8Array(enhanced)], { type: "image/png" }), "forecast.png");

    let responseText: string;
    try {
      const response = await this.fetchImpl(endpoint, { method: "POST", body: formData, signal });
      responseText = await response.text();

      if (!response.ok) {
        console.error("[OCR Backend] Error response from OCR service:", {
          endpoint,
          status: response.status,
          statusText: response.statusText,
          rawBody: responseText.substring(0, 500),
        });
        return candidateFailure(
          this.provenance,
          "BackendUnavailable",
          `OCR service failed (${response.status}): ${responseText.substring(0, 200)}`
        );
      }
    } catch (error) {
      if (isAbortError(error) || signal.aborted) {
        return candidateFailure(this.provenance, "Timeout", "OCR request aborted");
      }
      console.error("[OCR Backend] Request failed:", { endpoint, error: toLoggableError(error) });
      return candidateFailure(this.provenance, "BackendUnavailable", getErrorMessage(error));
    }

    let json: unknown;
    try {
      json = JSON.parse(responseText);
    } catch (parseError) {
      console.error("[OCR Backend] Failed to parse JSON response:", getErrorMessage(parseError));
      return candidateFailure(this.provenance, "MalformedOutput", "OCR service returned non-JSON body");
    }

    const parsed = OcrServiceResponseSchema.safeParse(json);
    if (!parsed.success) {
      return candidateFailure(this.provenance, "MalformedOutput", "OCR service response is missing text");
    }

    const sample = extractForecastFromOcrText(parsed.data.text);
    console.log("[OCR Backend] Recovered fields:", {
      confidence: parsed.data.confidence ?? null,
      textLength: parsed.data.text.length,
      waveHeights: sample.waveHeights.length,
      wavePeriods: sample.wavePeriods.length,
      wavePowers: sample.wavePowers.length,
      windSpeeds: sample.windSpeeds.length,
      tideExtremes: sample.tideExtremes.length,
    });

    return candidateSuccess(sample);
  }
}
