import { describe, it, expect } from "vitest";
import { formatSeries, formatTides, PlainTextReportConsumer } from "@/lib/report/plainTextReport";
import { emptySample } from "@/lib/forecast/types";

describe("plain text report", () => {
  it("formats series to one decimal and marks missing ones", () => {
    expect(formatSeries([1.25, 9, 10.04])).toBe("1.3 9 10");
    expect(formatSeries([])).toBe("n/a");
  });

  it("sorts tides by time", () => {
    expect(
      formatTides([
        { time: "12:31", height: 0.44, kind: "Low" },
        { time: "06:14", height: 1.9, kind: "High" },
      ])
    ).toBe("High 06:14 1.9 m, Low 12:31 0.4 m");
  });

  it("renders one line per field", () => {
    const sample = {
      ...emptySample("Merged"),
      waveHeights: [1.2, 1.3],
      wavePeriods: [9, 9.5],
      tideExtremes: [{ time: "06:14", height: 1.9, kind: "High" as const }],
    };

    expect(new PlainTextReportConsumer().present(sample, "Uluwatu", "2026-10-18")).toBe(
      [
        "Uluwatu, 2026-10-18",
        "Waves (m): 1.2 1.3",
        "Period (s): 9 9.5",
        "Power (kJ): n/a",
        "Wind (m/s): n/a",
        "Tides: High 06:14 1.9 m",
      ].join("\n")
    );
  });
});
