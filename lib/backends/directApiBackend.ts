/**
 * Direct API backend: numeric forecast and tides from Stormglass by coordinates,
 * bypassing the screenshot entirely.
 *
 * Endpoints (Authorization: <STORMGLASS_API_KEY>):
 *   GET {base}/weather/point?lat&lng&params=waveHeight,wavePeriod,windSpeed&start&end&source=sg
 *   GET {base}/tide/extremes/point?lat&lng&start&end&datum=MLLW
 *
 * The API exposes no wave power, so wavePowers is always empty here.
 * Hourly values are sampled at the canonical slots (local 05:00..23:00, every two hours).
 * Weather and tides are fetched in parallel; one of them failing still yields a
 * partial candidate.
 */

import { z } from "zod";
import type {
  CandidateResult,
  CandidateSample,
  Coordinates,
  ExtractionFailure,
  ExtractionRequest,
  TideExtreme,
} from "@/lib/forecast/types";
import { emptySample, FORECAST_SLOT_COUNT } from "@/lib/forecast/types";
import { getErrorMessage, isAbortError, toLoggableError } from "@/lib/utils/error";
import { candidateFailure, candidateSuccess, type ExtractionBackend } from "./types";
import { parseTideKind } from "./parsing";

/** Local hours of the canonical forecast slots */
export const SLOT_HOURS: readonly number[] = Array.from(
  { length: FORECAST_SLOT_COUNT },
  (_, i) => 5 + i * 2
);

const PREFERRED_SOURCE = "sg";

const SourceValues = z.record(z.string(), z.number());

const WeatherResponseSchema = z.object({
  hours: z.array(
    z.object({
      time: z.string(),
      waveHeight: SourceValues.optional(),
      wavePeriod: SourceValues.optional(),
      windSpeed: SourceValues.optional(),
    })
  ),
});

const TideResponseSchema = z.object({
  data: z.array(
    z.object({
      height: z.number(),
      time: z.string(),
      type: z.string(),
    })
  ),
});

type WeatherResponse = z.infer<typeof WeatherResponseSchema>;
type TideResponse = z.infer<typeof TideResponseSchema>;

export type DirectApiBackendOptions = {
  apiKey: string | null;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

type FetchOutcome<T> = { ok: true; data: T } | { ok: false; failure: ExtractionFailure; message: string };

export function pickSourceValue(values: Record<string, number> | undefined): number | null {
  if (!values) return null;
  const preferred = values[PREFERRED_SOURCE];
  if (Number.isFinite(preferred)) return preferred;
  const first = Object.values(values).find((value) => Number.isFinite(value));
  return first ?? null;
}

/** UTC epoch seconds bounding the local day of `date` */
export function localDayWindow(date: string, utcOffsetMinutes: number): { start: number; end: number } {
  const midnightUtcMs = Date.parse(`${date}T00:00:00Z`);
  const startMs = midnightUtcMs - utcOffsetMinutes * 60_000;
  return { start: Math.floor(startMs / 1000), end: Math.floor(startMs / 1000) + 24 * 3600 };
}

/** "HH:MM" of an ISO timestamp in the spot's local time */
export function toLocalTimeOfDay(isoTime: string, utcOffsetMinutes: number): string | null {
  const ms = Date.parse(isoTime);
  if (Number.isNaN(ms)) return null;
  return new Date(ms + utcOffsetMinutes * 60_000).toISOString().slice(11, 16);
}

export function mapWeatherToSeries(
  weather: WeatherResponse,
  utcOffsetMinutes: number
): Pick<CandidateSample, "waveHeights" | "wavePeriods" | "windSpeeds"> {
  const waveHeights: number[] = [];
  const wavePeriods: number[] = [];
  const windSpeeds: number[] = [];

  const slots = weather.hours
    .map((hour) => ({ hour, local: toLocalTimeOfDay(hour.time, utcOffsetMinutes) }))
    .filter(({ local }) => local !== null && local.endsWith(":00") && SLOT_HOURS.includes(Number(local.slice(0, 2))))
    .sort((a, b) => Date.parse(a.hour.time) - Date.parse(b.hour.time))
    .slice(0, FORECAST_SLOT_COUNT);

  for (const { hour } of slots) {
    const height = pickSourceValue(hour.waveHeight);
    const period = pickSourceValue(hour.wavePeriod);
    const wind = pickSourceValue(hour.windSpeed);
    // Slots stay aligned across series; an hour missing any value is dropped whole
    if (height === null || period === null || wind === null) continue;
    waveHeights.push(height);
    wavePeriods.push(period);
    windSpeeds.push(wind);
  }

  return { waveHeights, wavePeriods, windSpeeds };
}

export function mapTides(tides: TideResponse, utcOffsetMinutes: number): TideExtreme[] {
  const extremes: TideExtreme[] = [];
  for (const row of tides.data) {
    const kind = parseTideKind(row.type);
    const time = toLocalTimeOfDay(row.time, utcOffsetMinutes);
    if (!kind || !time) continue;
    extremes.push({ time, height: Math.round(row.height * 100) / 100, kind });
  }
  return extremes;
}

export class DirectApiBackend implements ExtractionBackend {
  readonly provenance = "DirectApi" as const;
  readonly timeoutMs: number;
  private readonly apiKey: string | null;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DirectApiBackendOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  isAvailable(): boolean {
    return !!this.apiKey && this.apiKey.trim().length > 0;
  }

  private async getJson<T>(
    url: string,
    schema: z.ZodType<T>,
    signal: AbortSignal
  ): Promise<FetchOutcome<T>> {
    try {
      const response = await this.fetchImpl(url, {
        headers: { Authorization: this.apiKey ?? "" },
        signal,
      });
      const text = await response.text();

      if (!response.ok) {
        console.error("[Stormglass] Error response:", {
          url,
          status: response.status,
          statusText: response.statusText,
          rawBody: text.substring(0, 500),
        });
        return { ok: false, failure: "BackendUnavailable", message: `Stormglass failed (${response.status})` };
      }

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (parseError) {
        return { ok: false, failure: "MalformedOutput", message: `Non-JSON body: ${getErrorMessage(parseError)}` };
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        console.warn("[Stormglass] Unexpected response shape:", { url, issues: parsed.error.issues.slice(0, 5) });
        return { ok: false, failure: "MalformedOutput", message: "Unexpected Stormglass response shape" };
      }
      return { ok: true, data: parsed.data };
    } catch (error) {
      if (isAbortError(error) || signal.aborted) {
        return { ok: false, failure: "Timeout", message: "Stormglass request aborted" };
      }
      console.error("[Stormglass] Request failed:", { url, error: toLoggableError(error) });
      return { ok: false, failure: "BackendUnavailable", message: getErrorMessage(error) };
    }
  }

  private buildUrls(spot: Coordinates, date: string, utcOffsetMinutes: number): { weather: string; tides: string } {
    const { start, end } = localDayWindow(date, utcOffsetMinutes);
    const common = new URLSearchParams({
      lat: String(spot.lat),
      lng: String(spot.lng),
      start: String(start),
      end: String(end),
    });

    const weather = new URLSearchParams(common);
    weather.set("params", "waveHeight,wavePeriod,windSpeed");
    weather.set("source", PREFERRED_SOURCE);

    const tides = new URLSearchParams(common);
    tides.set("datum", "MLLW");

    return {
      weather: `${this.baseUrl}/weather/point?${weather.toString()}`,
      tides: `${this.baseUrl}/tide/extremes/point?${tides.toString()}`,
    };
  }

  async extract(request: ExtractionRequest, signal: AbortSignal): Promise<CandidateResult> {
    if (!this.isAvailable()) {
      return candidateFailure(this.provenance, "BackendUnavailable", "STORMGLASS_API_KEY is not set");
    }
    if (!request.spot) {
      return candidateFailure(this.provenance, "BackendUnavailable", "No spot coordinates");
    }
    if (Number.isNaN(Date.parse(`${request.date}T00:00:00Z`))) {
      return candidateFailure(this.provenance, "BackendUnavailable", `Invalid date: ${request.date}`);
    }

    const offset = request.utcOffsetMinutes ?? 0;
    const urls = this.buildUrls(request.spot, request.date, offset);

    const [weather, tides] = await Promise.all([
      this.getJson(urls.weather, WeatherResponseSchema, signal),
      this.getJson(urls.tides, TideResponseSchema, signal),
    ]);

    if (!weather.ok && !tides.ok) {
      // Timeout wins over the other causes
      const failure = weather.failure === "Timeout" || tides.failure === "Timeout" ? "Timeout" : weather.failure;
      return candidateFailure(this.provenance, failure, `${weather.message}; ${tides.message}`);
    }

    const sample: CandidateSample = {
      ...emptySample("DirectApi"),
      ...(weather.ok ? mapWeatherToSeries(weather.data, offset) : {}),
      tideExtremes: tides.ok ? mapTides(tides.data, offset) : [],
    };

    console.log("[Stormglass] Built candidate:", {
      date: request.date,
      weatherOk: weather.ok,
      tidesOk: tides.ok,
      slots: sample.waveHeights.length,
      tideExtremes: sample.tideExtremes.length,
    });

    return candidateSuccess(sample);
  }
}
