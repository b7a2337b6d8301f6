/**
 * Recover forecast fields from OCR text of a forecast screenshot using regex patterns
 * (no AI required).
 *
 * Expected layout is one labelled row per field followed by the hourly values, plus
 * free-standing tide lines, e.g.:
 *
 *   Wave (m)     1.2  1.3  1.5
 *   Period (s)   9    9,5  10
 *   Power (kJ)   310  340  360
 *   Wind (m/s)   3.4  4.1  5.0
 *   High 06:14 1.9m
 *   Low  12:31 0.4m
 *
 * Russian labels (волна, период, мощность, ветер, прилив, отлив) and decimal commas
 * are accepted. Only the first row found for each field is used.
 */

import type { CandidateSample, SeriesField, TideExtreme } from "@/lib/forecast/types";
import { emptySample } from "@/lib/forecast/types";
import { normalizeTimeOfDay, parseDecimal, parseTideKind } from "./parsing";

/**
 * Row labels, most specific first: "wave power" and "wave period" must win over "wave".
 */
const ROW_LABELS: ReadonlyArray<[SeriesField, string]> = [
  ["wavePowers", "(?:wave\\s*)?(?:power|energy)|kj|мощность|энергия"],
  ["wavePeriods", "(?:wave\\s*|swell\\s*)?period|период"],
  ["windSpeeds", "wind(?:\\s*speed)?|ветер"],
  ["waveHeights", "wave(?:\\s*height)?s?|swell|height|высота(?:\\s*волны)?|волны|волна"],
];

const ROW_PATTERNS: ReadonlyArray<[SeriesField, RegExp]> = ROW_LABELS.map(([field, labels]) => [
  field,
  // label, optional "(unit)", optional separator, then the values
  new RegExp(`^\\s*(?:${labels})(?:\\s*\\([^)]*\\))?\\s*[:|\\-]?\\s*(.*)$`, "i"),
]);

const VALUE_PATTERN = /\d+(?:[.,]\d+)?/g;

const TIDE_PATTERN =
  /(high|low|прилив|отлив)(?:\s*tide)?\s*[:\-]?\s*(\d{1,2}[:.]\d{2})\s*[-–—,]?\s*(\d+(?:[.,]\d+)?)\s*m?/gi;

function extractValues(rest: string): number[] {
  const values: number[] = [];
  for (const token of rest.match(VALUE_PATTERN) ?? []) {
    const value = parseDecimal(token);
    if (value !== null) values.push(value);
  }
  return values;
}

export function extractSeriesFromText(text: string): Record<SeriesField, number[]> {
  const series: Record<SeriesField, number[]> = {
    waveHeights: [],
    wavePeriods: [],
    wavePowers: [],
    windSpeeds: [],
  };
  const found = new Set<SeriesField>();

  for (const line of text.split(/\r?\n/)) {
    for (const [field, pattern] of ROW_PATTERNS) {
      const match = line.match(pattern);
      if (!match) continue;
      if (!found.has(field)) {
        series[field] = extractValues(match[1] ?? "");
        found.add(field);
      }
      // A line belongs to one field only
      break;
    }
  }

  return series;
}

export function extractTidesFromText(text: string): TideExtreme[] {
  const tides: TideExtreme[] = [];
  TIDE_PATTERN.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = TIDE_PATTERN.exec(text)) !== null) {
    const kind = parseTideKind(match[1]);
    const height = parseDecimal(match[3]);
    if (!kind || height === null) continue;
    tides.push({ time: normalizeTimeOfDay(match[2]), height, kind });
  }

  return tides;
}

/**
 * Build an OpticalText candidate from OCR text. Fields with no matching row stay empty.
 */
export function extractForecastFromOcrText(text: string): CandidateSample {
  const sample = emptySample("OpticalText");
  if (!text || !text.trim()) return sample;

  return {
    ...sample,
    ...extractSeriesFromText(text),
    tideExtremes: extractTidesFromText(text),
  };
}
