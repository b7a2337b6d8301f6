/**
 * Forecast Access Layer - Main Entry Point
 *
 * WIRING MAP:
 *
 * Transport (chat bot, HTTP, CLI) -> createForecastService().conversation
 *   - trigger phrase  -> onTriggerPhrase() / onMessage()
 *   - image + caption -> onImage()
 *   - any other text  -> onText() / onMessage()
 *
 * onImage() -> ReconciliationEngine.reconcile()
 *   - lib/backends/visionModelBackend.ts  (OpenAI vision)
 *   - lib/backends/opticalTextBackend.ts  (OCR service + sharp)
 *   - lib/backends/directApiBackend.ts    (Stormglass)
 *   - lib/forecast/syntheticProfiles.ts   (last resort)
 *
 * scripts/reconcileImage.ts runs the engine on one local screenshot.
 */

// Wiring
export { createForecastService } from "./createForecastService";
export type { ForecastService, ForecastServiceOverrides } from "./createForecastService";

// Engine
export { ReconciliationEngine } from "./reconciliationEngine";
export type { OcrPolicy, ReconcileReason, CandidateReport, ReconciliationResult } from "./reconciliationEngine";
export { DEFAULT_PLAUSIBILITY_RANGES, sanitizeSample, validateField, validateTideExtremes } from "./plausibility";
export { DEFAULT_SCORING_WEIGHTS, scoreCandidate } from "./qualityScorer";
export { synthesizeSample, SYNTHETIC_PROFILES } from "./syntheticProfiles";

// Session + conversation
export { SessionController } from "@/lib/session/sessionController";
export type { SessionPhase, SessionSnapshot } from "@/lib/session/sessionController";
export { ForecastConversation, FIXED_REPLIES } from "@/lib/conversation/forecastConversation";
export type { ConversationReply, ConversationReplyKind } from "@/lib/conversation/forecastConversation";

// Presentation
export { PlainTextReportConsumer } from "@/lib/report/plainTextReport";
export type { ReportConsumer } from "@/lib/report/types";

// Types
export type {
  ForecastSample,
  CandidateSample,
  Provenance,
  TideExtreme,
  ExtractionRequest,
  Coordinates,
} from "./types";
