/**
 * Conversation Session Lifecycle Controller
 *
 * One state machine per conversation id, gating when a reconciliation may start:
 *
 *   Idle --trigger--> Active
 *   Active --image accepted--> Active (busy; a second image is rejected)
 *   Active --report delivered--> AwaitingAcknowledgement   (expiry timer armed)
 *   AwaitingAcknowledgement --any text--> Idle             (timer cancelled)
 *   AwaitingAcknowledgement --timer fires--> Idle
 *
 * Rules:
 * - A missing entry is Idle. Entries are never deleted, only reused.
 * - Every transition is synchronous, so no two writes to one key can interleave
 *   and nothing is held across an awaited network call.
 * - Each armed timer carries a generation number. A timer from an older generation
 *   is cancelled on transition and, if it fires anyway, does nothing.
 * - Expiry only governs the feedback window; it never cancels in-flight work.
 */

export type SessionPhase = "Idle" | "Active" | "AwaitingAcknowledgement";

export type SessionSnapshot = {
  phase: SessionPhase;
  lastTransitionAt: number;
  busy: boolean;
};

export type BeginOutcome = "accepted" | "not_active" | "busy";

type SessionEntry = SessionSnapshot & {
  expiryTimer: ReturnType<typeof setTimeout> | null;
  generation: number;
};

export type SessionControllerOptions = {
  /** Inactivity window of AwaitingAcknowledgement */
  expiryMs: number;
  now?: () => number;
  /** Called once after an expiry moved a session back to Idle */
  onExpire?: (conversationId: string) => void;
};

export class SessionController {
  readonly expiryMs: number;
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly now: () => number;
  private readonly onExpire?: (conversationId: string) => void;

  constructor(options: SessionControllerOptions) {
    if (!Number.isFinite(options.expiryMs) || options.expiryMs <= 0) {
      throw new Error(`expiryMs must be a positive number, got ${options.expiryMs}`);
    }
    this.expiryMs = options.expiryMs;
    this.now = options.now ?? Date.now;
    this.onExpire = options.onExpire;
  }

  getPhase(conversationId: string): SessionPhase {
    return this.sessions.get(conversationId)?.phase ?? "Idle";
  }

  getSnapshot(conversationId: string): SessionSnapshot | null {
    const entry = this.sessions.get(conversationId);
    if (!entry) return null;
    return { phase: entry.phase, lastTransitionAt: entry.lastTransitionAt, busy: entry.busy };
  }

  /**
   * Trigger phrase received.
   * Idle -> Active. Active stays Active (no reset). AwaitingAcknowledgement counts as
   * an acknowledgement followed by a fresh activation.
   */
  trigger(conversationId: string): SessionPhase {
    const entry = this.sessions.get(conversationId);
    if (entry?.phase === "Active") return "Active";

    this.transition(conversationId, "Active");
    return "Active";
  }

  /**
   * Image received. Only an Active, non-busy session may start a reconciliation.
   */
  beginReconciliation(conversationId: string): BeginOutcome {
    const entry = this.sessions.get(conversationId);
    if (!entry || entry.phase !== "Active") return "not_active";
    if (entry.busy) return "busy";

    entry.busy = true;
    return "accepted";
  }

  /**
   * Reconciliation finished and its report was delivered.
   * Active -> AwaitingAcknowledgement, expiry timer armed.
   */
  completeReconciliation(conversationId: string): boolean {
    const entry = this.sessions.get(conversationId);
    if (!entry || entry.phase !== "Active" || !entry.busy) return false;

    const next = this.transition(conversationId, "AwaitingAcknowledgement");
    this.armExpiry(conversationId, next);
    return true;
  }

  /**
   * The accepted image could not be turned into a report (unknown spot, presenter error).
   * Releases the busy flag, stays Active.
   */
  abandonReconciliation(conversationId: string): void {
    const entry = this.sessions.get(conversationId);
    if (entry) entry.busy = false;
  }

  /**
   * Free text received. AwaitingAcknowledgement -> Idle; anything else is ignored.
   */
  acknowledge(conversationId: string): boolean {
    const entry = this.sessions.get(conversationId);
    if (!entry || entry.phase !== "AwaitingAcknowledgement") return false;

    this.transition(conversationId, "Idle");
    return true;
  }

  /** Cancel every pending expiry timer (process shutdown, tests). */
  dispose(): void {
    for (const entry of this.sessions.values()) {
      this.cancelExpiry(entry);
    }
  }

  private transition(conversationId: string, phase: SessionPhase): SessionEntry {
    const existing = this.sessions.get(conversationId);
    const entry: SessionEntry = existing ?? {
      phase: "Idle",
      lastTransitionAt: this.now(),
      busy: false,
      expiryTimer: null,
      generation: 0,
    };

    this.cancelExpiry(entry);
    const from = entry.phase;
    entry.phase = phase;
    entry.lastTransitionAt = this.now();
    entry.busy = false;
    entry.generation += 1;
    this.sessions.set(conversationId, entry);

    console.log("[Session] Transition:", { conversationId, from, to: phase });
    return entry;
  }

  private armExpiry(conversationId: string, entry: SessionEntry): void {
    const generation = entry.generation;
    const timer = setTimeout(() => {
      const current = this.sessions.get(conversationId);
      if (!current || current.generation !== generation || current.phase !== "AwaitingAcknowledgement") {
        return;
      }
      current.expiryTimer = null;
      this.transition(conversationId, "Idle");
      console.log("[Session] Expired without acknowledgement:", { conversationId, expiryMs: this.expiryMs });
      this.onExpire?.(conversationId);
    }, this.expiryMs);

    // Expiry alone does not hold the process open
    timer.unref?.();
    entry.expiryTimer = timer;
  }

  private cancelExpiry(entry: SessionEntry): void {
    if (entry.expiryTimer) {
      clearTimeout(entry.expiryTimer);
      entry.expiryTimer = null;
    }
  }
}
