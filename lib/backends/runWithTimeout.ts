import type { CandidateResult, ExtractionRequest } from "@/lib/forecast/types";
import { getErrorMessage, isAbortError, toLoggableError } from "@/lib/utils/error";
import { candidateFailure, type ExtractionBackend } from "./types";

/**
 * Run one backend bounded by its own timeout.
 *
 * Resolves (never rejects) with:
 * - the backend's own result when it settles in time
 * - Timeout when the deadline passes first (the backend's signal is aborted)
 * - BackendUnavailable when the backend breaks its contract and throws,
 *   synchronously or by rejecting
 */
export async function runBackendWithTimeout(
  backend: ExtractionBackend,
  request: ExtractionRequest
): Promise<CandidateResult> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const deadline = new Promise<CandidateResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(
          candidateFailure(
            backend.provenance,
            "Timeout",
            `${backend.provenance} did not answer within ${backend.timeoutMs}ms`
          )
        );
      }, backend.timeoutMs);
    });

    const attempt = Promise.resolve()
      .then(() => backend.extract(request, controller.signal))
      .catch((error: unknown) => {
        if (isAbortError(error)) {
          return candidateFailure(backend.provenance, "Timeout", getErrorMessage(error));
        }
        console.error(
          `[Reconcile] ${backend.provenance} backend threw instead of returning a failure:`,
          toLoggableError(error)
        );
        return candidateFailure(backend.provenance, "BackendUnavailable", getErrorMessage(error));
      });

    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
