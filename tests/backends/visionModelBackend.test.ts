/**
 * Vision backend tests with a stub completion client (no OpenAI calls).
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type OpenAI from "openai";
import {
  inferImageMediaType,
  parseVisionReply,
  VisionModelBackend,
  type VisionCompletionClient,
} from "@/lib/backends/visionModelBackend";
import { sanitizeSample } from "@/lib/forecast/plausibility";

type CreateFn = VisionCompletionClient["chat"]["completions"]["create"];

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const request = { date: "2026-10-18", image: PNG };

function completion(content: string | null): OpenAI.Chat.ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
  };
}

function backendWith(create: CreateFn): VisionModelBackend {
  return new VisionModelBackend({
    apiKey: "test-key",
    model: "gpt-4o-mini",
    timeoutMs: 1_000,
    client: { chat: { completions: { create } } },
  });
}

describe("parseVisionReply", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads a fenced reply with string numbers and loose tide labels", () => {
    const reply =
      'Here you go:\n```json\n{"waveHeights":["1,2",1.3],"wavePeriods":[11],"windSpeeds":null,' +
      '"tides":[{"time":"6:14","height":"1.9","kind":"HW"}]}\n```';

    expect(parseVisionReply(reply)).toEqual({
      waveHeights: [1.2, 1.3],
      wavePeriods: [11],
      wavePowers: [],
      windSpeeds: [],
      tideExtremes: [{ time: "06:14", height: 1.9, kind: "High" }],
      provenance: "VisionModel",
    });
  });

  it("rejects replies without JSON or with unknown tide kinds", () => {
    expect(parseVisionReply("I cannot read this image.")).toBeNull();
    expect(parseVisionReply('{"tides":[{"time":"06:00","height":1,"kind":"mid"}]}')).toBeNull();
  });

  it("keeps the other series when one has a null or non-numeric element", () => {
    const sample = parseVisionReply(
      '{"waveHeights":[1.2,1.3],"wavePeriods":[10,11],"windSpeeds":[3,null],"wavePowers":["big"],"tides":[]}'
    );

    expect(sample).toEqual({
      waveHeights: [1.2, 1.3],
      wavePeriods: [10, 11],
      wavePowers: [Number.NaN],
      windSpeeds: [3, Number.NaN],
      tideExtremes: [],
      provenance: "VisionModel",
    });
    expect(sample && sanitizeSample(sample)).toEqual({
      sample: {
        waveHeights: [1.2, 1.3],
        wavePeriods: [10, 11],
        wavePowers: [],
        windSpeeds: [],
        tideExtremes: [],
        provenance: "VisionModel",
      },
      clearedFields: ["wavePowers", "windSpeeds"],
    });
  });
});

describe("inferImageMediaType", () => {
  it("detects png, webp and defaults to jpeg", () => {
    expect(inferImageMediaType(PNG)).toBe("image/png");
    expect(inferImageMediaType(Buffer.from("RIFF\0\0\0\0WEBPVP8 ", "ascii"))).toBe("image/webp");
    expect(inferImageMediaType(Buffer.from([0xff, 0xd8, 0xff]))).toBe("image/jpeg");
  });
});

describe("VisionModelBackend", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends the screenshot as a data URL and returns the parsed candidate", async () => {
    const create = vi.fn<CreateFn>(async () => completion('{"waveHeights":[1.4,1.5],"windSpeeds":[3.2]}'));
    const backend = backendWith(create);
    const signal = new AbortController().signal;

    const result = await backend.extract(request, signal);

    expect(result).toEqual({
      ok: true,
      provenance: "VisionModel",
      sample: {
        waveHeights: [1.4, 1.5],
        wavePeriods: [],
        wavePowers: [],
        windSpeeds: [3.2],
        tideExtremes: [],
        provenance: "VisionModel",
      },
    });

    expect(create).toHaveBeenCalledTimes(1);
    const [body, options] = create.mock.calls[0];
    expect(body.model).toBe("gpt-4o-mini");
    expect(body.response_format).toEqual({ type: "json_object" });
    expect(body.temperature).toBe(0.1);
    expect(JSON.stringify(body.messages)).toContain(`data:image/png;base64,${PNG.toString("base64")}`);
    expect(options?.signal).toBe(signal);
  });

  it("is unavailable without an API key and makes no request", async () => {
    const backend = new VisionModelBackend({ apiKey: null, model: "gpt-4o-mini", timeoutMs: 1_000 });
    expect(backend.isAvailable()).toBe(false);

    const result = await backend.extract(request, new AbortController().signal);
    expect(result).toMatchObject({ ok: false, failure: "BackendUnavailable" });
  });

  it("treats a whitespace-only API key as unavailable", async () => {
    const backend = new VisionModelBackend({ apiKey: "   ", model: "gpt-4o-mini", timeoutMs: 1_000 });
    expect(backend.isAvailable()).toBe(false);

    const result = await backend.extract(request, new AbortController().signal);
    expect(result).toEqual({
      ok: false,
      provenance: "VisionModel",
      failure: "BackendUnavailable",
      message: "OPENAI_API_KEY is not set",
    });
  });

  it("fails fast without an image", async () => {
    const create = vi.fn<CreateFn>(async () => completion("{}"));
    const result = await backendWith(create).extract({ date: "2026-10-18" }, new AbortController().signal);

    expect(result).toMatchObject({ ok: false, failure: "BackendUnavailable", message: "No image to read" });
    expect(create).not.toHaveBeenCalled();
  });

  it("maps an aborted request to Timeout", async () => {
    const create = vi.fn<CreateFn>(async () => {
      const error = new Error("Request was aborted.");
      error.name = "APIUserAbortError";
      throw error;
    });

    const result = await backendWith(create).extract(request, new AbortController().signal);
    expect(result).toMatchObject({ ok: false, failure: "Timeout" });
  });

  it("maps API errors to BackendUnavailable", async () => {
    const create = vi.fn<CreateFn>(async () => {
      throw new Error("429 Rate limit reached");
    });

    const result = await backendWith(create).extract(request, new AbortController().signal);
    expect(result).toEqual({
      ok: false,
      provenance: "VisionModel",
      failure: "BackendUnavailable",
      message: "429 Rate limit reached",
    });
  });

  it("maps empty and unparseable replies to MalformedOutput", async () => {
    const empty = await backendWith(vi.fn<CreateFn>(async () => completion(null))).extract(
      request,
      new AbortController().signal
    );
    expect(empty).toMatchObject({ ok: false, failure: "MalformedOutput", message: "Empty response from model" });

    const prose = await backendWith(vi.fn<CreateFn>(async () => completion("Sorry, too blurry."))).extract(
      request,
      new AbortController().signal
    );
    expect(prose).toMatchObject({ ok: false, failure: "MalformedOutput" });
  });
});
