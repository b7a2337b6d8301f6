/**
 * Plausibility checks for extracted forecast fields.
 *
 * Ranges are inclusive and only meant to reject garbled extraction
 * (a misread "40" for a 4.0 m/s breeze, a tide table row read as wave heights).
 * They are not physical limits. Callers may pass their own ranges.
 *
 * Rules:
 * - An empty series is ABSENT, not invalid. Absent fields get gap-filled later.
 * - A series is valid only if every element is finite and within range.
 * - One bad element disqualifies the whole field of that candidate, never the candidate.
 * - Tide extremes are checked for internal consistency only:
 *   heights >= 0, well-formed "HH:MM" times, no duplicate time of day.
 */

import type {
  ForecastSample,
  SampleField,
  SeriesField,
  TideExtreme,
} from "./types";
import { SERIES_FIELDS } from "./types";

export type NumericRange = {
  min: number;
  max: number;
};

export type PlausibilityRanges = Record<SeriesField, NumericRange>;

export const DEFAULT_PLAUSIBILITY_RANGES: PlausibilityRanges = {
  waveHeights: { min: 0.1, max: 6.0 },
  wavePeriods: { min: 3.0, max: 22.0 },
  wavePowers: { min: 30, max: 1600 },
  windSpeeds: { min: 0.0, max: 15.0 },
};

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isWithinRange(value: number, range: NumericRange): boolean {
  return Number.isFinite(value) && value >= range.min && value <= range.max;
}

/**
 * Validate one numeric series.
 *
 * @returns true only when the series is non-empty and every value is in range
 */
export function validateField(
  field: SeriesField,
  values: readonly number[],
  ranges: PlausibilityRanges = DEFAULT_PLAUSIBILITY_RANGES
): boolean {
  if (values.length === 0) return false;
  const range = ranges[field];
  return values.every((value) => isWithinRange(value, range));
}

export function validateTideExtremes(extremes: readonly TideExtreme[]): boolean {
  if (extremes.length === 0) return false;

  const seenTimes = new Set<string>();
  for (const extreme of extremes) {
    if (!Number.isFinite(extreme.height) || extreme.height < 0) return false;
    if (!TIME_OF_DAY_PATTERN.test(extreme.time)) return false;
    if (seenTimes.has(extreme.time)) return false;
    seenTimes.add(extreme.time);
  }
  return true;
}

export type SanitizeOutcome<S extends ForecastSample> = {
  sample: S;
  /** Fields that were present but failed validation and got cleared */
  clearedFields: SampleField[];
};

/**
 * Clear every populated field that fails validation.
 * Absent fields stay absent and are not reported.
 */
export function sanitizeSample<S extends ForecastSample>(
  sample: S,
  ranges: PlausibilityRanges = DEFAULT_PLAUSIBILITY_RANGES
): SanitizeOutcome<S> {
  const series: Record<SeriesField, number[]> = {
    waveHeights: [...sample.waveHeights],
    wavePeriods: [...sample.wavePeriods],
    wavePowers: [...sample.wavePowers],
    windSpeeds: [...sample.windSpeeds],
  };
  let tideExtremes = sample.tideExtremes.map((extreme) => ({ ...extreme }));
  const clearedFields: SampleField[] = [];

  for (const field of SERIES_FIELDS) {
    if (series[field].length > 0 && !validateField(field, series[field], ranges)) {
      series[field] = [];
      clearedFields.push(field);
    }
  }

  if (tideExtremes.length > 0 && !validateTideExtremes(tideExtremes)) {
    tideExtremes = [];
    clearedFields.push("tideExtremes");
  }

  return { sample: { ...sample, ...series, tideExtremes }, clearedFields };
}

/**
 * True when every populated field of the sample passes validation.
 * Used to assert the engine's output contract.
 */
export function isSamplePlausible(
  sample: ForecastSample,
  ranges: PlausibilityRanges = DEFAULT_PLAUSIBILITY_RANGES
): boolean {
  return sanitizeSample(sample, ranges).clearedFields.length === 0;
}
