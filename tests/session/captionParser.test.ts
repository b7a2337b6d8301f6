import { describe, it, expect } from "vitest";
import { localIsoDate, parseCaption, resolveForecastDate } from "@/lib/session/captionParser";

// 2026-10-18 18:30 UTC is already 2026-10-19 02:30 in Bali (UTC+8)
const NOW = new Date("2026-10-18T18:30:00Z");
const WITA = 480;

describe("parseCaption", () => {
  it("splits on whitespace: spot first, date second", () => {
    expect(parseCaption("  uluwatu   2026-10-20  extra words ")).toEqual({
      spotToken: "uluwatu",
      dateToken: "2026-10-20",
    });
  });

  it("returns nulls for missing tokens", () => {
    expect(parseCaption("kuta")).toEqual({ spotToken: "kuta", dateToken: null });
    expect(parseCaption(null)).toEqual({ spotToken: null, dateToken: null });
    expect(parseCaption("   ")).toEqual({ spotToken: null, dateToken: null });
  });
});

describe("localIsoDate", () => {
  it("uses the calendar day at the spot", () => {
    expect(localIsoDate(NOW, WITA)).toBe("2026-10-19");
    expect(localIsoDate(NOW, 0)).toBe("2026-10-18");
  });
});

describe("resolveForecastDate", () => {
  it("defaults to today at the spot", () => {
    expect(resolveForecastDate(null, NOW, WITA)).toBe("2026-10-19");
    expect(resolveForecastDate("today", NOW, WITA)).toBe("2026-10-19");
  });

  it("understands tomorrow in English and Russian", () => {
    expect(resolveForecastDate("tomorrow", NOW, WITA)).toBe("2026-10-20");
    expect(resolveForecastDate("Завтра", NOW, WITA)).toBe("2026-10-20");
  });

  it("accepts ISO and day-first dates", () => {
    expect(resolveForecastDate("2026-11-02", NOW, WITA)).toBe("2026-11-02");
    expect(resolveForecastDate("02.11.2026", NOW, WITA)).toBe("2026-11-02");
    expect(resolveForecastDate("2/11", NOW, WITA)).toBe("2026-11-02");
  });

  it("falls back to today for impossible or unreadable dates", () => {
    expect(resolveForecastDate("31.02.2026", NOW, WITA)).toBe("2026-10-19");
    expect(resolveForecastDate("someday", NOW, WITA)).toBe("2026-10-19");
  });
});
