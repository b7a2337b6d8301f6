/**
 * Candidate Quality Scorer
 *
 * Assigns a completeness/plausibility score (0..100) to one sanitized candidate.
 * Input must already have passed sanitizeSample(): invalid fields are empty here.
 *
 * ## Score Calculation
 *
 * Per field:
 * - waveHeights populated: +20, plus +10 when its max is typical (<= 5.0 m)
 * - wavePeriods populated: +20, plus +10 when its max is typical (<= 20 s)
 * - windSpeeds populated:  +20
 * - tideExtremes with at least one High and one Low: +20
 *
 * wavePowers carries no points; it is still gap-filled by the engine.
 *
 * Ties between candidates are broken by backend priority:
 * VisionModel > DirectApi > OpticalText.
 */

import type {
  BackendProvenance,
  ForecastSample,
  SampleField,
  TideExtreme,
} from "./types";

export type ScoreReason =
  | "WAVE_HEIGHTS_PRESENT"
  | "WAVE_HEIGHTS_TYPICAL"
  | "WAVE_PERIODS_PRESENT"
  | "WAVE_PERIODS_TYPICAL"
  | "WIND_SPEEDS_PRESENT"
  | "TIDES_HIGH_AND_LOW";

export type ScoringWeights = {
  populatedField: number;
  typicalBonus: number;
  tidePair: number;
  typicalWaveHeightMax: number;
  typicalWavePeriodMax: number;
};

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  populatedField: 20,
  typicalBonus: 10,
  tidePair: 20,
  typicalWaveHeightMax: 5.0,
  typicalWavePeriodMax: 20,
};

export const BACKEND_PRIORITY: readonly BackendProvenance[] = [
  "VisionModel",
  "DirectApi",
  "OpticalText",
] as const;

export type CandidateScore = {
  /** Clamped to 0..100 */
  total: number;
  /** Points each field contributed, used for field-level ranking during the merge */
  fieldScores: Record<SampleField, number>;
  reasons: ScoreReason[];
};

export function hasHighAndLow(extremes: readonly TideExtreme[]): boolean {
  return extremes.some((e) => e.kind === "High") && extremes.some((e) => e.kind === "Low");
}

/**
 * Score a single sanitized candidate. Deterministic: same sample, same score.
 */
export function scoreCandidate(
  sample: ForecastSample,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): CandidateScore {
  const reasons: ScoreReason[] = [];
  const fieldScores: Record<SampleField, number> = {
    waveHeights: 0,
    wavePeriods: 0,
    wavePowers: 0,
    windSpeeds: 0,
    tideExtremes: 0,
  };

  if (sample.waveHeights.length > 0) {
    fieldScores.waveHeights += weights.populatedField;
    reasons.push("WAVE_HEIGHTS_PRESENT");
    if (Math.max(...sample.waveHeights) <= weights.typicalWaveHeightMax) {
      fieldScores.waveHeights += weights.typicalBonus;
      reasons.push("WAVE_HEIGHTS_TYPICAL");
    }
  }

  if (sample.wavePeriods.length > 0) {
    fieldScores.wavePeriods += weights.populatedField;
    reasons.push("WAVE_PERIODS_PRESENT");
    if (Math.max(...sample.wavePeriods) <= weights.typicalWavePeriodMax) {
      fieldScores.wavePeriods += weights.typicalBonus;
      reasons.push("WAVE_PERIODS_TYPICAL");
    }
  }

  if (sample.windSpeeds.length > 0) {
    fieldScores.windSpeeds += weights.populatedField;
    reasons.push("WIND_SPEEDS_PRESENT");
  }

  if (hasHighAndLow(sample.tideExtremes)) {
    fieldScores.tideExtremes += weights.tidePair;
    reasons.push("TIDES_HIGH_AND_LOW");
  }

  const sum = Object.values(fieldScores).reduce((acc, points) => acc + points, 0);
  const total = Math.max(0, Math.min(100, sum));

  return { total, fieldScores, reasons };
}

/** Lower rank = higher priority. */
export function backendRank(provenance: BackendProvenance): number {
  return BACKEND_PRIORITY.indexOf(provenance);
}

/**
 * Comparator for Array.prototype.sort: higher score first, then backend priority.
 */
export function compareByScoreThenPriority(
  a: { score: number; provenance: BackendProvenance },
  b: { score: number; provenance: BackendProvenance }
): number {
  if (b.score !== a.score) return b.score - a.score;
  return backendRank(a.provenance) - backendRank(b.provenance);
}
