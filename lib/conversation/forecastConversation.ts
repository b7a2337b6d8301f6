/**
 * Conversation facade: the three inbound events the transport layer calls,
 * each answered with a fixed-kind reply the transport sends back verbatim.
 *
 *   onTriggerPhrase(id)              -> "prompt"
 *   onImage(id, imageBytes, caption) -> "report" | "refusal" | "busy" | "unknown_spot"
 *   onText(id, text)                 -> "acknowledged" | "ignored"
 *
 * Only session violations and unknown spots are surfaced, and only as fixed texts.
 * Backend failures never reach this layer: the engine always returns a sample.
 */

import type { ReconciliationEngine } from "@/lib/forecast/reconciliationEngine";
import type { ReportConsumer } from "@/lib/report/types";
import type { SessionController } from "@/lib/session/sessionController";
import type { SpotDirectory } from "@/lib/spots/spotDirectory";
import { parseCaption, resolveForecastDate } from "@/lib/session/captionParser";
import { toLoggableError } from "@/lib/utils/error";

export type ConversationReplyKind =
  | "prompt"
  | "report"
  | "refusal"
  | "busy"
  | "unknown_spot"
  | "acknowledged"
  | "ignored";

export type ConversationReply = {
  kind: ConversationReplyKind;
  /** null when nothing should be sent */
  text: string | null;
};

export const FIXED_REPLIES = {
  prompt: "Send a screenshot of the forecast with a caption: <spot> [date].",
  refusal: "No forecast session is open. Send the trigger phrase first.",
  busy: "Still working on the previous screenshot, hold on.",
  unknownSpot: "Spot not recognized. Try one of: ",
  acknowledged: "Thanks! Session closed.",
} as const;

export type ForecastConversationOptions = {
  sessions: SessionController;
  engine: ReconciliationEngine;
  spots: SpotDirectory;
  reporter: ReportConsumer;
  /** Lower-case phrases that open a session, matched against whole messages */
  triggerPhrases?: string[];
  now?: () => Date;
};

export class ForecastConversation {
  private readonly sessions: SessionController;
  private readonly engine: ReconciliationEngine;
  private readonly spots: SpotDirectory;
  private readonly reporter: ReportConsumer;
  private readonly triggerPhrases: string[];
  private readonly now: () => Date;

  constructor(options: ForecastConversationOptions) {
    this.sessions = options.sessions;
    this.engine = options.engine;
    this.spots = options.spots;
    this.reporter = options.reporter;
    this.triggerPhrases = (options.triggerPhrases ?? []).map((phrase) => phrase.trim().toLowerCase());
    this.now = options.now ?? (() => new Date());
  }

  isTriggerPhrase(text: string): boolean {
    const normalized = text.trim().toLowerCase();
    return normalized.length > 0 && this.triggerPhrases.includes(normalized);
  }

  onTriggerPhrase(conversationId: string): ConversationReply {
    this.sessions.trigger(conversationId);
    return { kind: "prompt", text: FIXED_REPLIES.prompt };
  }

  /**
   * Route a plain text message: trigger phrases open a session, anything else is
   * treated by onText().
   */
  onMessage(conversationId: string, text: string): ConversationReply {
    if (this.isTriggerPhrase(text)) return this.onTriggerPhrase(conversationId);
    return this.onText(conversationId, text);
  }

  async onImage(conversationId: string, imageBytes: Buffer, captionText: string | null): Promise<ConversationReply> {
    const outcome = this.sessions.beginReconciliation(conversationId);
    if (outcome === "not_active") {
      console.log("[Conversation] Image refused, session not active:", { conversationId });
      return { kind: "refusal", text: FIXED_REPLIES.refusal };
    }
    if (outcome === "busy") {
      return { kind: "busy", text: FIXED_REPLIES.busy };
    }

    const { spotToken, dateToken } = parseCaption(captionText);
    const spot = spotToken ? this.spots.lookup(spotToken) : null;
    if (!spot) {
      this.sessions.abandonReconciliation(conversationId);
      console.log("[Conversation] Unknown spot:", { conversationId, spotToken });
      const names = this.spots.list().map((s) => s.name).join(", ");
      return { kind: "unknown_spot", text: `${FIXED_REPLIES.unknownSpot}${names}` };
    }

    const date = resolveForecastDate(dateToken, this.now(), spot.utcOffsetMinutes);

    try {
      const sample = await this.engine.reconcile({
        image: imageBytes,
        spot: spot.coordinates,
        date,
        utcOffsetMinutes: spot.utcOffsetMinutes,
      });
      const text = await this.reporter.present(sample, spot.name, date);
      this.sessions.completeReconciliation(conversationId);
      return { kind: "report", text };
    } catch (error) {
      this.sessions.abandonReconciliation(conversationId);
      console.error("[Conversation] Report could not be produced:", {
        conversationId,
        spot: spot.name,
        date,
        error: toLoggableError(error),
      });
      throw error;
    }
  }

  onText(conversationId: string, _text: string): ConversationReply {
    if (this.sessions.acknowledge(conversationId)) {
      return { kind: "acknowledged", text: FIXED_REPLIES.acknowledged };
    }
    return { kind: "ignored", text: null };
  }
}
