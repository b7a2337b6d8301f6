/**
 * Default ReportConsumer: a compact plain-text table, one line per field.
 *
 *   Uluwatu, 2026-10-18
 *   Waves (m): 1.2 1.3
 *   Period (s): 9 9.5
 *   Power (kJ): n/a
 *   Wind (m/s): n/a
 *   Tides: High 06:14 1.9 m, Low 12:31 0.4 m
 *
 * Provenance is not shown; a Synthetic sample renders like any other.
 */

import type { ForecastSample, TideExtreme } from "@/lib/forecast/types";
import type { ReportConsumer } from "./types";

export function formatSeries(values: readonly number[]): string {
  if (values.length === 0) return "n/a";
  return values.map((value) => String(Math.round(value * 10) / 10)).join(" ");
}

export function formatTides(extremes: readonly TideExtreme[]): string {
  if (extremes.length === 0) return "n/a";
  return [...extremes]
    .sort((a, b) => a.time.localeCompare(b.time))
    .map((extreme) => `${extreme.kind} ${extreme.time} ${Math.round(extreme.height * 10) / 10} m`)
    .join(", ");
}

export class PlainTextReportConsumer implements ReportConsumer {
  present(sample: ForecastSample, spotName: string, date: string): string {
    return [
      `${spotName}, ${date}`,
      `Waves (m): ${formatSeries(sample.waveHeights)}`,
      `Period (s): ${formatSeries(sample.wavePeriods)}`,
      `Power (kJ): ${formatSeries(sample.wavePowers)}`,
      `Wind (m/s): ${formatSeries(sample.windSpeeds)}`,
      `Tides: ${formatTides(sample.tideExtremes)}`,
    ].join("\n");
  }
}
