/**
 * Forecast data contracts shared by the extraction backends, the
 * reconciliation engine and the presentation layer.
 */

export type Provenance = "VisionModel" | "OpticalText" | "DirectApi" | "Synthetic" | "Merged";

/** Provenance values a single extraction backend can stamp on its candidate. */
export type BackendProvenance = Extract<Provenance, "VisionModel" | "OpticalText" | "DirectApi">;

export type TideKind = "High" | "Low";

export type TideExtreme = {
  /** Local time of day, "HH:MM" (24h) */
  time: string;
  /** Meters above chart datum */
  height: number;
  kind: TideKind;
};

/** Numeric per-slot series carried by a sample. */
export type SeriesField = "waveHeights" | "wavePeriods" | "wavePowers" | "windSpeeds";

export type SampleField = SeriesField | "tideExtremes";

export const SERIES_FIELDS: readonly SeriesField[] = [
  "waveHeights",
  "wavePeriods",
  "wavePowers",
  "windSpeeds",
] as const;

export const SAMPLE_FIELDS: readonly SampleField[] = [...SERIES_FIELDS, "tideExtremes"] as const;

/** Canonical number of hourly slots a full forecast covers. Shorter series are accepted as-is. */
export const FORECAST_SLOT_COUNT = 10;

export type ForecastSample = {
  waveHeights: number[];
  wavePeriods: number[];
  wavePowers: number[];
  windSpeeds: number[];
  tideExtremes: TideExtreme[];
  provenance: Provenance;
};

/** A backend's candidate before provenance is known to be one of the backend values. */
export type CandidateSample = ForecastSample & { provenance: BackendProvenance };

export type Coordinates = {
  lat: number;
  lng: number;
};

export type ExtractionFailure = "Timeout" | "MalformedOutput" | "BackendUnavailable";

export type CandidateResult =
  | { ok: true; provenance: BackendProvenance; sample: CandidateSample }
  | { ok: false; provenance: BackendProvenance; failure: ExtractionFailure; message: string };

export type ExtractionRequest = {
  image?: Buffer;
  spot?: Coordinates;
  /** Forecast day, ISO "YYYY-MM-DD" */
  date: string;
  /** Spot's offset from UTC; slot hours and tide times are local to the spot. Defaults to 0. */
  utcOffsetMinutes?: number;
};

export function emptySample<P extends Provenance>(provenance: P): ForecastSample & { provenance: P } {
  return {
    waveHeights: [],
    wavePeriods: [],
    wavePowers: [],
    windSpeeds: [],
    tideExtremes: [],
    provenance,
  };
}

export function isFieldPopulated(sample: ForecastSample, field: SampleField): boolean {
  return sample[field].length > 0;
}
