/**
 * OCR backend tests. The OCR service is a stub fetch and enhancement is the
 * identity, so sharp never sees these fake image bytes.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OpticalTextBackend } from "@/lib/backends/opticalTextBackend";

const request = { date: "2026-10-18", image: Buffer.from("fake-png") };
const identity = async (image: Buffer): Promise<Buffer> => image;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("OpticalTextBackend", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts the enhanced image and parses the recognized text", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ text: "Wave (m) 1.1 1.2\nHigh 06:14 1.9m\nLow 12:31 0.4m", confidence: 0.82 })
    );
    const backend = new OpticalTextBackend({
      serviceUrl: "http://ocr.test/",
      timeoutMs: 1_000,
      fetchImpl,
      enhance: identity,
    });

    const result = await backend.extract(request, new AbortController().signal);

    expect(result).toEqual({
      ok: true,
      provenance: "OpticalText",
      sample: {
        waveHeights: [1.1, 1.2],
        wavePeriods: [],
        wavePowers: [],
        windSpeeds: [],
        tideExtremes: [
          { time: "06:14", height: 1.9, kind: "High" },
          { time: "12:31", height: 0.4, kind: "Low" },
        ],
        provenance: "OpticalText",
      },
    });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://ocr.test/v1/ocr/text/upload");
    expect(init?.method).toBe("POST");
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get("lang")).toBe("eng+rus");
      expect(body.get("file")).toBeInstanceOf(Blob);
    }
  });

  it("is unavailable without a service URL", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const backend = new OpticalTextBackend({ serviceUrl: null, timeoutMs: 1_000, fetchImpl, enhance: identity });

    expect(backend.isAvailable()).toBe(false);
    const result = await backend.extract(request, new AbortController().signal);
    expect(result).toMatchObject({ ok: false, failure: "BackendUnavailable" });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("maps an error status to BackendUnavailable", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("overloaded", { status: 503 }));
    const backend = new OpticalTextBackend({ serviceUrl: "http://ocr.test", timeoutMs: 1_000, fetchImpl, enhance: identity });

    const result = await backend.extract(request, new AbortController().signal);
    expect(result).toEqual({
      ok: false,
      provenance: "OpticalText",
      failure: "BackendUnavailable",
      message: "OCR service failed (503): overloaded",
    });
  });

  it("maps a non-JSON body or a missing text field to MalformedOutput", async () => {
    const html = new OpticalTextBackend({
      serviceUrl: "http://ocr.test",
      timeoutMs: 1_000,
      fetchImpl: vi.fn<typeof fetch>(async () => new Response("<html>gateway</html>", { status: 200 })),
      enhance: identity,
    });
    expect(await html.extract(request, new AbortController().signal)).toMatchObject({ failure: "MalformedOutput" });

    const noText = new OpticalTextBackend({
      serviceUrl: "http://ocr.test",
      timeoutMs: 1_000,
      fetchImpl: vi.fn<typeof fetch>(async () => jsonResponse({ confidence: 0.4 })),
      enhance: identity,
    });
    expect(await noText.extract(request, new AbortController().signal)).toMatchObject({ failure: "MalformedOutput" });
  });

  it("maps an aborted request to Timeout", async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      controller.abort();
      const error = new Error("This operation was aborted");
      error.name = "AbortError";
      throw error;
    });
    const backend = new OpticalTextBackend({ serviceUrl: "http://ocr.test", timeoutMs: 1_000, fetchImpl, enhance: identity });

    const result = await backend.extract(request, controller.signal);
    expect(result).toMatchObject({ ok: false, failure: "Timeout" });
  });

  it("maps an undecodable image to MalformedOutput", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const backend = new OpticalTextBackend({
      serviceUrl: "http://ocr.test",
      timeoutMs: 1_000,
      fetchImpl,
      enhance: async () => {
        throw new Error("Input buffer contains unsupported image format");
      },
    });

    const result = await backend.extract(request, new AbortController().signal);
    expect(result).toEqual({
      ok: false,
      provenance: "OpticalText",
      failure: "MalformedOutput",
      message: "Image could not be decoded: Input buffer contains unsupported image format",
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
