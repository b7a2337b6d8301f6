import type {
  BackendProvenance,
  CandidateResult,
  CandidateSample,
  ExtractionFailure,
  ExtractionRequest,
} from "@/lib/forecast/types";

/**
 * One source of candidate forecast data.
 *
 * Contract:
 * - extract() never rejects. Every failure comes back as a CandidateResult with ok=false.
 * - The engine aborts `signal` once `timeoutMs` has elapsed; implementations pass it on
 *   to their network calls.
 * - Missing credentials make the backend permanently unavailable (isAvailable() === false),
 *   and extract() returns BackendUnavailable without doing any I/O.
 */
export interface ExtractionBackend {
  readonly provenance: BackendProvenance;
  readonly timeoutMs: number;
  isAvailable(): boolean;
  extract(request: ExtractionRequest, signal: AbortSignal): Promise<CandidateResult>;
}

export function candidateSuccess(sample: CandidateSample): CandidateResult {
  return { ok: true, provenance: sample.provenance, sample };
}

export function candidateFailure(
  provenance: BackendProvenance,
  failure: ExtractionFailure,
  message: string
): CandidateResult {
  return { ok: false, provenance, failure, message };
}
