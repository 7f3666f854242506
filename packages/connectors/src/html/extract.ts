import type { SdgLabel } from "@sdg-harvest/shared";

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

export function cleanText(value: string | undefined | null): string | null {
  const s = (value ?? "").replace(/\s+/g, " ").trim();
  return s.length > 0 ? s : null;
}

/** First four-digit year in the text, e.g. "12 Mar 2021" -> 2021. */
export function extractYear(value: string | undefined | null): number | null {
  const match = (value ?? "").match(/\b(\d{4})\b/);
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/**
 * Parse "October 12, 2023" style dates into an ISO date (YYYY-MM-DD).
 */
export function parseLongDate(value: string | undefined | null): string | null {
  const match = (value ?? "").trim().match(/^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  const month = MONTHS.indexOf(match[1].toLowerCase());
  if (month < 0) return null;
  const day = Number.parseInt(match[2], 10);
  const year = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCMonth() !== month) return null;
  return date.toISOString().slice(0, 10);
}

/**
 * Collect SDG goal numbers from free text ("Goal 3, Goal 13" / "SDG 5").
 * Out-of-range numbers are dropped; the result is sorted and unique.
 */
export function parseSdgLabels(values: Iterable<string>): SdgLabel[] {
  const labels = new Set<SdgLabel>();
  for (const value of values) {
    for (const match of value.matchAll(/\d+/g)) {
      const n = Number.parseInt(match[0], 10);
      if (n >= 1 && n <= 17) labels.add(n);
    }
  }
  return [...labels].sort((a, b) => a - b);
}

export function isPdfUrl(url: string): boolean {
  try {
    return new URL(url).pathname.toLowerCase().endsWith(".pdf");
  } catch {
    return false;
  }
}
