/**
 * Static table of supported surf spots.
 *
 * Lookup is case-insensitive on the canonical name or any alias. Unknown names
 * return null and the conversation answers with the "spot not recognized" reply.
 */

import type { Coordinates } from "@/lib/forecast/types";

export type SurfSpot = {
  name: string;
  aliases: string[];
  coordinates: Coordinates;
  /** Local offset from UTC (Bali is WITA, UTC+8) */
  utcOffsetMinutes: number;
};

const WITA = 8 * 60;

export const SURF_SPOTS: readonly SurfSpot[] = [
  { name: "Uluwatu", aliases: ["ulu", "улувату"], coordinates: { lat: -8.815, lng: 115.087 }, utcOffsetMinutes: WITA },
  { name: "Padang Padang", aliases: ["padang", "паданг"], coordinates: { lat: -8.811, lng: 115.101 }, utcOffsetMinutes: WITA },
  { name: "Bingin", aliases: ["бингин"], coordinates: { lat: -8.805, lng: 115.113 }, utcOffsetMinutes: WITA },
  { name: "Balangan", aliases: ["баланган"], coordinates: { lat: -8.792, lng: 115.123 }, utcOffsetMinutes: WITA },
  { name: "Kuta", aliases: ["кута"], coordinates: { lat: -8.718, lng: 115.168 }, utcOffsetMinutes: WITA },
  { name: "Canggu", aliases: ["batu-bolong", "чангу"], coordinates: { lat: -8.659, lng: 115.13 }, utcOffsetMinutes: WITA },
  { name: "Keramas", aliases: ["керамас"], coordinates: { lat: -8.593, lng: 115.333 }, utcOffsetMinutes: WITA },
  { name: "Medewi", aliases: ["медеви"], coordinates: { lat: -8.419, lng: 114.805 }, utcOffsetMinutes: WITA },
  { name: "Balian", aliases: ["балиан"], coordinates: { lat: -8.503, lng: 114.966 }, utcOffsetMinutes: WITA },
];

function normalizeSpotKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

export class SpotDirectory {
  private readonly byKey = new Map<string, SurfSpot>();

  constructor(spots: readonly SurfSpot[] = SURF_SPOTS) {
    for (const spot of spots) {
      this.byKey.set(normalizeSpotKey(spot.name), spot);
      for (const alias of spot.aliases) {
        this.byKey.set(normalizeSpotKey(alias), spot);
      }
    }
  }

  lookup(name: string): SurfSpot | null {
    if (!name.trim()) return null;
    return this.byKey.get(normalizeSpotKey(name)) ?? null;
  }

  list(): SurfSpot[] {
    return Array.from(new Set(this.byKey.values()));
  }
}
