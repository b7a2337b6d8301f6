/**
 * Hand-authored "typical conditions" used when every extraction source fails.
 * Each profile satisfies DEFAULT_PLAUSIBILITY_RANGES and populates every field
 * (ten hourly slots, two highs and two lows).
 */

import type { ForecastSample, TideExtreme } from "./types";

export type SyntheticProfile = {
  id: string;
  waveHeights: number[];
  wavePeriods: number[];
  wavePowers: number[];
  windSpeeds: number[];
  tideExtremes: TideExtreme[];
};

export const SYNTHETIC_PROFILES: readonly SyntheticProfile[] = [
  {
    id: "small-clean",
    waveHeights: [0.8, 0.8, 0.9, 0.9, 1.0, 1.0, 0.9, 0.9, 0.8, 0.8],
    wavePeriods: [10, 10, 10.5, 10.5, 11, 11, 10.5, 10.5, 10, 10],
    wavePowers: [90, 95, 110, 115, 130, 130, 115, 110, 95, 90],
    windSpeeds: [1.5, 1.8, 2.2, 2.8, 3.4, 3.9, 4.1, 3.6, 2.9, 2.1],
    tideExtremes: [
      { time: "03:12", height: 0.4, kind: "Low" },
      { time: "09:27", height: 2.1, kind: "High" },
      { time: "15:41", height: 0.5, kind: "Low" },
      { time: "21:58", height: 2.2, kind: "High" },
    ],
  },
  {
    id: "mid-swell",
    waveHeights: [1.4, 1.5, 1.5, 1.6, 1.7, 1.7, 1.6, 1.6, 1.5, 1.5],
    wavePeriods: [12, 12, 12.5, 13, 13, 13, 12.5, 12.5, 12, 12],
    wavePowers: [320, 350, 380, 420, 460, 470, 430, 400, 360, 340],
    windSpeeds: [2.0, 2.4, 3.1, 3.8, 4.6, 5.2, 5.5, 4.9, 3.7, 2.8],
    tideExtremes: [
      { time: "04:05", height: 2.3, kind: "High" },
      { time: "10:18", height: 0.3, kind: "Low" },
      { time: "16:34", height: 2.4, kind: "High" },
      { time: "22:47", height: 0.2, kind: "Low" },
    ],
  },
  {
    id: "solid-groundswell",
    waveHeights: [2.1, 2.2, 2.3, 2.4, 2.5, 2.5, 2.4, 2.3, 2.2, 2.2],
    wavePeriods: [15, 15, 15.5, 16, 16, 16, 15.5, 15.5, 15, 15],
    wavePowers: [820, 870, 930, 990, 1050, 1060, 1000, 950, 890, 860],
    windSpeeds: [1.2, 1.6, 2.3, 3.0, 3.9, 4.4, 4.8, 4.1, 3.2, 2.4],
    tideExtremes: [
      { time: "01:46", height: 0.6, kind: "Low" },
      { time: "07:59", height: 2.0, kind: "High" },
      { time: "14:13", height: 0.7, kind: "Low" },
      { time: "20:30", height: 2.1, kind: "High" },
    ],
  },
  {
    id: "windy-short-period",
    waveHeights: [1.0, 1.1, 1.2, 1.3, 1.4, 1.4, 1.3, 1.2, 1.1, 1.1],
    wavePeriods: [7, 7, 7.5, 8, 8, 8, 7.5, 7.5, 7, 7],
    wavePowers: [60, 70, 85, 100, 115, 115, 100, 85, 70, 65],
    windSpeeds: [5.5, 6.2, 7.4, 8.6, 9.8, 10.4, 10.1, 9.0, 7.7, 6.5],
    tideExtremes: [
      { time: "05:22", height: 2.2, kind: "High" },
      { time: "11:36", height: 0.4, kind: "Low" },
      { time: "17:51", height: 2.3, kind: "High" },
      { time: "23:59", height: 0.3, kind: "Low" },
    ],
  },
];

/**
 * Pick one profile and turn it into a Synthetic sample.
 *
 * @param random - value in [0, 1); injectable so the choice is reproducible in tests
 */
export function synthesizeSample(random: () => number = Math.random): ForecastSample {
  const draw = random();
  const index = Number.isFinite(draw)
    ? Math.min(SYNTHETIC_PROFILES.length - 1, Math.max(0, Math.floor(draw * SYNTHETIC_PROFILES.length)))
    : 0;
  const profile = SYNTHETIC_PROFILES[index];

  return {
    waveHeights: [...profile.waveHeights],
    wavePeriods: [...profile.wavePeriods],
    wavePowers: [...profile.wavePowers],
    windSpeeds: [...profile.windSpeeds],
    tideExtremes: profile.tideExtremes.map((extreme) => ({ ...extreme })),
    provenance: "Synthetic",
  };
}
