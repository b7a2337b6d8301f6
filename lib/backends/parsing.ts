/**
 * Small text helpers shared by the extraction backends.
 */

import type { TideKind } from "@/lib/forecast/types";

/**
 * Parse "1.5", "1,5" or " 1.5 m" to a number. Returns null when there is no number.
 */
export function parseDecimal(raw: string): number | null {
  const match = raw.replace(",", ".").match(/-?\d+(?:\.\d+)?/);
  if (!match) return null;
  const value = Number.parseFloat(match[0]);
  return Number.isNaN(value) ? null : value;
}

/**
 * Normalize "9:05", "09.05" or "9h05" to "09:05". Returns the trimmed input unchanged
 * when it does not look like a time, so the validator rejects it later.
 */
export function normalizeTimeOfDay(raw: string): string {
  const trimmed = raw.trim();
  const match = trimmed.match(/^(\d{1,2})\s*[:.h]\s*(\d{2})$/i);
  if (!match) return trimmed;
  return `${match[1].padStart(2, "0")}:${match[2]}`;
}

/**
 * Map loose tide labels ("high", "HW", "прилив", "low", "отлив") to a TideKind.
 */
export function parseTideKind(raw: string): TideKind | null {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "h" || /^(high|hw|прилив)/.test(normalized)) return "High";
  if (normalized === "l" || /^(low|lw|отлив)/.test(normalized)) return "Low";
  return null;
}

/**
 * Find the first well-formed JSON object embedded in free text.
 *
 * Models wrap JSON in prose or ```json fences despite instructions. Scans each "{"
 * for its balanced "}" (string-aware) and returns the first slice that parses.
 */
export function findFirstJsonObject(text: string): unknown | null {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = findBalancedEnd(text, start);
    if (end === -1) continue;
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      // not JSON from this brace; try the next one
    }
  }
  return null;
}

function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
