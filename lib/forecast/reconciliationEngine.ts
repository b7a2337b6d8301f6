/**
 * Multi-Source Forecast Reconciliation Engine
 *
 * Fans out to every applicable extraction backend at once, cleans each candidate field
 * by field, scores the survivors, and merges them into one ForecastSample. When nothing
 * usable comes back it returns a synthetic "typical conditions" sample instead.
 *
 * reconcile() never rejects and never returns an error value.
 *
 * ## Steps
 *
 * 1. Run all applicable backends concurrently, each bounded by its own timeout.
 *    Latency is max(timeouts), not their sum. Nothing below runs until every
 *    backend has settled.
 * 2. Drop failures. Clear every field that fails plausibility (sanitizeSample).
 *    A candidate left with no populated field does not survive.
 * 3. Score survivors (scoreCandidate) and rank by total, then backend priority.
 *    The top-ranked candidate is the base.
 * 4. Build each field from the best candidate that has it populated, ranked by that
 *    field's own score, then backend priority, then candidate total. A field missing
 *    from the base is therefore gap-filled from the next candidate that has it.
 *    Provenance is the base's own unless any field came from another candidate
 *    (then "Merged").
 * 5. No survivor => synthetic profile, provenance "Synthetic".
 *
 * Usage:
 * ```typescript
 * const engine = new ReconciliationEngine({ backends: [vision, directApi, ocr] });
 * const sample = await engine.reconcile({ image, spot, date: "2026-10-18" });
 * ```
 */

import type { ExtractionBackend } from "@/lib/backends/types";
import { runBackendWithTimeout } from "@/lib/backends/runWithTimeout";
import { toLoggableError } from "@/lib/utils/error";
import {
  DEFAULT_PLAUSIBILITY_RANGES,
  sanitizeSample,
  type PlausibilityRanges,
} from "./plausibility";
import {
  backendRank,
  compareByScoreThenPriority,
  DEFAULT_SCORING_WEIGHTS,
  scoreCandidate,
  type CandidateScore,
  type ScoringWeights,
} from "./qualityScorer";
import { synthesizeSample } from "./syntheticProfiles";
import type {
  BackendProvenance,
  CandidateResult,
  CandidateSample,
  ExtractionFailure,
  ExtractionRequest,
  ForecastSample,
  SampleField,
} from "./types";
import { emptySample, SAMPLE_FIELDS } from "./types";

export type OcrPolicy = "fallback" | "always";

export type ReconcileReason =
  | "BACKEND_SKIPPED"
  | "BACKEND_TIMEOUT"
  | "BACKEND_MALFORMED"
  | "BACKEND_UNAVAILABLE"
  | "FIELD_OUT_OF_RANGE"
  | "TIDES_INCONSISTENT"
  | "CANDIDATE_EMPTY"
  | "GAP_FILLED"
  | "ALL_SOURCES_EXHAUSTED"
  | "SYNTHETIC_FALLBACK";

export type CandidateReport = {
  provenance: BackendProvenance;
  status: "used" | "skipped" | "empty" | ExtractionFailure;
  message?: string;
  clearedFields: SampleField[];
  score: CandidateScore | null;
};

export type ReconciliationResult = {
  sample: ForecastSample;
  /** Top-ranked candidate, null for a synthetic result */
  base: BackendProvenance | null;
  /** Which backend each populated field came from */
  fieldSources: Partial<Record<SampleField, BackendProvenance>>;
  candidates: CandidateReport[];
  reasons: ReconcileReason[];
};

export type ReconciliationEngineOptions = {
  backends: ExtractionBackend[];
  /** "fallback" (default): OCR runs only when no vision backend is available */
  ocrPolicy?: OcrPolicy;
  ranges?: PlausibilityRanges;
  weights?: ScoringWeights;
  /** Random source for picking a synthetic profile */
  random?: () => number;
};

type Survivor = {
  provenance: BackendProvenance;
  sample: CandidateSample;
  score: CandidateScore;
};

const FAILURE_REASONS: Record<ExtractionFailure, ReconcileReason> = {
  Timeout: "BACKEND_TIMEOUT",
  MalformedOutput: "BACKEND_MALFORMED",
  BackendUnavailable: "BACKEND_UNAVAILABLE",
};

function pushReason(reasons: ReconcileReason[], reason: ReconcileReason): void {
  if (!reasons.includes(reason)) reasons.push(reason);
}

export class ReconciliationEngine {
  private readonly backends: ExtractionBackend[];
  private readonly ocrPolicy: OcrPolicy;
  private readonly ranges: PlausibilityRanges;
  private readonly weights: ScoringWeights;
  private readonly random: () => number;

  constructor(options: ReconciliationEngineOptions) {
    this.backends = [...options.backends];
    this.ocrPolicy = options.ocrPolicy ?? "fallback";
    this.ranges = options.ranges ?? DEFAULT_PLAUSIBILITY_RANGES;
    this.weights = options.weights ?? DEFAULT_SCORING_WEIGHTS;
    this.random = options.random ?? Math.random;
  }

  /**
   * Backends to invoke for this request. Unavailable backends are still invoked
   * (they fail fast with BackendUnavailable); only OCR is gated by policy.
   */
  selectBackends(): { applicable: ExtractionBackend[]; skipped: ExtractionBackend[] } {
    const visionReady = this.backends.some((b) => b.provenance === "VisionModel" && b.isAvailable());
    const applicable: ExtractionBackend[] = [];
    const skipped: ExtractionBackend[] = [];

    for (const backend of this.backends) {
      if (backend.provenance === "OpticalText" && this.ocrPolicy === "fallback" && visionReady) {
        skipped.push(backend);
      } else {
        applicable.push(backend);
      }
    }
    return { applicable, skipped };
  }

  async reconcile(request: ExtractionRequest): Promise<ForecastSample> {
    const result = await this.reconcileDetailed(request);
    return result.sample;
  }

  async reconcileDetailed(request: ExtractionRequest): Promise<ReconciliationResult> {
    try {
      return await this.run(request);
    } catch (error) {
      console.error("[Reconcile] Unexpected failure, falling back to synthetic sample:", toLoggableError(error));
      return this.synthesize([], ["ALL_SOURCES_EXHAUSTED", "SYNTHETIC_FALLBACK"]);
    }
  }

  private async run(request: ExtractionRequest): Promise<ReconciliationResult> {
    const reasons: ReconcileReason[] = [];
    const reports: CandidateReport[] = [];
    const { applicable, skipped } = this.selectBackends();

    for (const backend of skipped) {
      reports.push({ provenance: backend.provenance, status: "skipped", clearedFields: [], score: null });
      pushReason(reasons, "BACKEND_SKIPPED");
    }

    // Step 1: concurrent fan-out, joined only once every backend has settled
    const results: CandidateResult[] = await Promise.all(
      applicable.map((backend) => runBackendWithTimeout(backend, request))
    );

    // Step 2 + 3: clean, drop empties, score
    const survivors: Survivor[] = [];
    for (const result of results) {
      if (!result.ok) {
        reports.push({
          provenance: result.provenance,
          status: result.failure,
          message: result.message,
          clearedFields: [],
          score: null,
        });
        pushReason(reasons, FAILURE_REASONS[result.failure]);
        continue;
      }

      const { sample, clearedFields } = sanitizeSample(result.sample, this.ranges);
      if (clearedFields.includes("tideExtremes")) pushReason(reasons, "TIDES_INCONSISTENT");
      if (clearedFields.some((field) => field !== "tideExtremes")) pushReason(reasons, "FIELD_OUT_OF_RANGE");

      if (SAMPLE_FIELDS.every((field) => sample[field].length === 0)) {
        reports.push({ provenance: result.provenance, status: "empty", clearedFields, score: null });
        pushReason(reasons, "CANDIDATE_EMPTY");
        continue;
      }

      const score = scoreCandidate(sample, this.weights);
      reports.push({ provenance: result.provenance, status: "used", clearedFields, score });
      survivors.push({ provenance: result.provenance, sample, score });
    }

    // Step 5: nothing usable
    if (survivors.length === 0) {
      pushReason(reasons, "ALL_SOURCES_EXHAUSTED");
      pushReason(reasons, "SYNTHETIC_FALLBACK");
      return this.synthesize(reports, reasons);
    }

    // Step 4: rank and merge
    const ranked = [...survivors].sort((a, b) =>
      compareByScoreThenPriority(
        { score: a.score.total, provenance: a.provenance },
        { score: b.score.total, provenance: b.provenance }
      )
    );
    const base = ranked[0];
    const merged = emptySample<ForecastSample["provenance"]>(base.provenance);
    const fieldSources: Partial<Record<SampleField, BackendProvenance>> = {};

    for (const field of SAMPLE_FIELDS) {
      const source = pickFieldSource(ranked, field);
      if (!source) continue;
      fieldSources[field] = source.provenance;
      copyField(merged, source.sample, field);
    }

    const contributedByOthers = Object.values(fieldSources).some((p) => p !== base.provenance);
    if (contributedByOthers) {
      merged.provenance = "Merged";
      pushReason(reasons, "GAP_FILLED");
    }

    console.log("[Reconcile] Merged candidates:", {
      date: request.date,
      base: base.provenance,
      provenance: merged.provenance,
      scores: Object.fromEntries(ranked.map((c) => [c.provenance, c.score.total])),
      fieldSources,
      reasons,
    });

    return { sample: merged, base: base.provenance, fieldSources, candidates: reports, reasons };
  }

  private synthesize(reports: CandidateReport[], reasons: ReconcileReason[]): ReconciliationResult {
    const sample = synthesizeSample(this.random);
    console.warn("[Reconcile] No usable candidate, returning synthetic sample:", {
      candidates: reports.map((r) => ({ provenance: r.provenance, status: r.status })),
    });
    return { sample, base: null, fieldSources: {}, candidates: reports, reasons };
  }
}

/**
 * Best candidate for one field: own field score, then backend priority, then candidate total.
 * Candidates without the field populated are not considered.
 */
function pickFieldSource(ranked: Survivor[], field: SampleField): Survivor | null {
  const holders = ranked.filter((c) => c.sample[field].length > 0);
  if (holders.length === 0) return null;

  return holders.reduce((best, candidate) => {
    const byField = candidate.score.fieldScores[field] - best.score.fieldScores[field];
    if (byField !== 0) return byField > 0 ? candidate : best;
    const byPriority = backendRank(candidate.provenance) - backendRank(best.provenance);
    if (byPriority !== 0) return byPriority < 0 ? candidate : best;
    return candidate.score.total > best.score.total ? candidate : best;
  });
}

function copyField(target: ForecastSample, source: ForecastSample, field: SampleField): void {
  if (field === "tideExtremes") {
    target.tideExtremes = source.tideExtremes.map((extreme) => ({ ...extreme }));
  } else {
    target[field] = [...source[field]];
  }
}
