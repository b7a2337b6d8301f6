import {
  getOcrServiceBaseUrl,
  getStormglassBaseUrl,
  getTriggerPhrases,
  getVisionModelName,
  loadForecastEnv,
} from "@/lib/config/forecast";
import { DirectApiBackend } from "@/lib/backends/directApiBackend";
import { OpticalTextBackend } from "@/lib/backends/opticalTextBackend";
import type { ExtractionBackend } from "@/lib/backends/types";
import { VisionModelBackend } from "@/lib/backends/visionModelBackend";
import { ForecastConversation } from "@/lib/conversation/forecastConversation";
import { PlainTextReportConsumer } from "@/lib/report/plainTextReport";
import type { ReportConsumer } from "@/lib/report/types";
import { SessionController } from "@/lib/session/sessionController";
import { SpotDirectory } from "@/lib/spots/spotDirectory";
import { ReconciliationEngine } from "./reconciliationEngine";

export type ForecastService = {
  conversation: ForecastConversation;
  engine: ReconciliationEngine;
  sessions: SessionController;
  spots: SpotDirectory;
  backends: ExtractionBackend[];
};

export type ForecastServiceOverrides = {
  reporter?: ReportConsumer;
  fetchImpl?: typeof fetch;
  onSessionExpire?: (conversationId: string) => void;
};

/**
 * Build the whole pipeline from environment variables.
 * Backends without credentials are still registered; they report themselves
 * unavailable and fail fast on every request.
 */
export function createForecastService(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ForecastServiceOverrides = {}
): ForecastService {
  const config = loadForecastEnv(env);

  const backends: ExtractionBackend[] = [
    new VisionModelBackend({
      apiKey: config.OPENAI_API_KEY,
      model: getVisionModelName(env),
      timeoutMs: config.VISION_TIMEOUT_MS,
    }),
    new OpticalTextBackend({
      serviceUrl: getOcrServiceBaseUrl(env),
      timeoutMs: config.OCR_TIMEOUT_MS,
      fetchImpl: overrides.fetchImpl,
    }),
    new DirectApiBackend({
      apiKey: config.STORMGLASS_API_KEY,
      baseUrl: getStormglassBaseUrl(env),
      timeoutMs: config.DIRECT_API_TIMEOUT_MS,
      fetchImpl: overrides.fetchImpl,
    }),
  ];

  const engine = new ReconciliationEngine({ backends, ocrPolicy: config.OCR_POLICY });
  const sessions = new SessionController({
    expiryMs: config.SESSION_EXPIRY_MS,
    onExpire: overrides.onSessionExpire,
  });
  const spots = new SpotDirectory();

  const conversation = new ForecastConversation({
    sessions,
    engine,
    spots,
    reporter: overrides.reporter ?? new PlainTextReportConsumer(),
    triggerPhrases: getTriggerPhrases(env),
  });

  console.log("[Forecast] Service ready:", {
    backends: backends.map((backend) => ({ provenance: backend.provenance, available: backend.isAvailable() })),
    ocrPolicy: config.OCR_POLICY,
    sessionExpiryMs: config.SESSION_EXPIRY_MS,
  });

  return { conversation, engine, sessions, spots, backends };
}
