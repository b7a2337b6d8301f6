/**
 * Session Lifecycle Tests
 *
 * Idle -> Active -> (busy) -> AwaitingAcknowledgement -> Idle, by text or by expiry.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { SessionController } from "@/lib/session/sessionController";

const EXPIRY_MS = 300_000;

describe("SessionController", () => {
  let sessions: SessionController;
  let onExpire: Mock<(conversationId: string) => void>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    onExpire = vi.fn<(conversationId: string) => void>();
    sessions = new SessionController({ expiryMs: EXPIRY_MS, onExpire });
  });

  afterEach(() => {
    sessions.dispose();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function deliverReport(id: string): void {
    sessions.trigger(id);
    expect(sessions.beginReconciliation(id)).toBe("accepted");
    expect(sessions.completeReconciliation(id)).toBe(true);
  }

  it("treats unknown conversations as Idle", () => {
    expect(sessions.getPhase("chat-1")).toBe("Idle");
    expect(sessions.getSnapshot("chat-1")).toBeNull();
  });

  it("refuses an image while Idle", () => {
    expect(sessions.beginReconciliation("chat-1")).toBe("not_active");
  });

  it("keeps a second trigger idempotent", () => {
    sessions.trigger("chat-1");
    const first = sessions.getSnapshot("chat-1");
    vi.advanceTimersByTime(1_000);
    sessions.trigger("chat-1");

    expect(sessions.getPhase("chat-1")).toBe("Active");
    expect(sessions.getSnapshot("chat-1")).toEqual(first);
  });

  it("rejects a second image while the first is being reconciled", () => {
    sessions.trigger("chat-1");
    expect(sessions.beginReconciliation("chat-1")).toBe("accepted");
    expect(sessions.beginReconciliation("chat-1")).toBe("busy");
  });

  it("a second trigger does not clear the busy flag", () => {
    sessions.trigger("chat-1");
    sessions.beginReconciliation("chat-1");
    sessions.trigger("chat-1");
    expect(sessions.beginReconciliation("chat-1")).toBe("busy");
  });

  it("releases the busy flag when a reconciliation is abandoned", () => {
    sessions.trigger("chat-1");
    sessions.beginReconciliation("chat-1");
    sessions.abandonReconciliation("chat-1");

    expect(sessions.getPhase("chat-1")).toBe("Active");
    expect(sessions.beginReconciliation("chat-1")).toBe("accepted");
  });

  it("only completes a reconciliation that was begun", () => {
    sessions.trigger("chat-1");
    expect(sessions.completeReconciliation("chat-1")).toBe(false);
    expect(sessions.getPhase("chat-1")).toBe("Active");
  });

  it("moves to AwaitingAcknowledgement after a delivered report and back to Idle on any text", () => {
    deliverReport("chat-1");
    expect(sessions.getPhase("chat-1")).toBe("AwaitingAcknowledgement");

    expect(sessions.acknowledge("chat-1")).toBe(true);
    expect(sessions.getPhase("chat-1")).toBe("Idle");
    expect(sessions.acknowledge("chat-1")).toBe(false);
  });

  it("ignores text outside AwaitingAcknowledgement", () => {
    expect(sessions.acknowledge("chat-1")).toBe(false);
    sessions.trigger("chat-1");
    expect(sessions.acknowledge("chat-1")).toBe(false);
    expect(sessions.getPhase("chat-1")).toBe("Active");
  });

  it("expires to Idle exactly once after the inactivity window", () => {
    deliverReport("chat-1");

    vi.advanceTimersByTime(EXPIRY_MS - 1);
    expect(sessions.getPhase("chat-1")).toBe("AwaitingAcknowledgement");

    vi.advanceTimersByTime(1);
    expect(sessions.getPhase("chat-1")).toBe("Idle");
    expect(sessions.beginReconciliation("chat-1")).toBe("not_active");

    vi.advanceTimersByTime(EXPIRY_MS * 3);
    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(onExpire).toHaveBeenCalledWith("chat-1");
  });

  it("cancels the expiry when the user acknowledges first", () => {
    deliverReport("chat-1");
    vi.advanceTimersByTime(EXPIRY_MS / 2);
    sessions.acknowledge("chat-1");

    vi.advanceTimersByTime(EXPIRY_MS);
    expect(onExpire).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("a new trigger during the feedback window starts a fresh Active session", () => {
    deliverReport("chat-1");
    sessions.trigger("chat-1");
    expect(sessions.getPhase("chat-1")).toBe("Active");

    vi.advanceTimersByTime(EXPIRY_MS);
    expect(sessions.getPhase("chat-1")).toBe("Active");
    expect(onExpire).not.toHaveBeenCalled();
  });

  it("a stale timer cannot end a later feedback window early", () => {
    deliverReport("chat-1");
    vi.advanceTimersByTime(EXPIRY_MS - 10);

    sessions.trigger("chat-1");
    sessions.beginReconciliation("chat-1");
    sessions.completeReconciliation("chat-1");

    vi.advanceTimersByTime(20);
    expect(sessions.getPhase("chat-1")).toBe("AwaitingAcknowledgement");

    vi.advanceTimersByTime(EXPIRY_MS);
    expect(sessions.getPhase("chat-1")).toBe("Idle");
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it("keeps conversations independent", () => {
    deliverReport("chat-1");
    sessions.trigger("chat-2");

    vi.advanceTimersByTime(EXPIRY_MS);
    expect(sessions.getPhase("chat-1")).toBe("Idle");
    expect(sessions.getPhase("chat-2")).toBe("Active");
  });

  it("rejects a non-positive expiry", () => {
    expect(() => new SessionController({ expiryMs: 0 })).toThrow("expiryMs must be a positive number, got 0");
  });
});
