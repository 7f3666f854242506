import { InvalidRangeError } from "../errors";
import type { PageRange } from "../types/run";

/**
 * Validate an inclusive page range. Throws InvalidRangeError; never touches the network.
 */
export function assertValidPageRange(range: PageRange): PageRange {
  const { start, end } = range;
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new InvalidRangeError(`Page bounds must be integers, got [${start}, ${end}]`);
  }
  if (start > Number.MAX_SAFE_INTEGER || end > Number.MAX_SAFE_INTEGER) {
    throw new InvalidRangeError(
      `Page bounds must not exceed ${Number.MAX_SAFE_INTEGER}, got [${start}, ${end}]`,
    );
  }
  if (start < 0 || end < 0) {
    throw new InvalidRangeError(`Page bounds must be non-negative, got [${start}, ${end}]`);
  }
  if (start > end) {
    throw new InvalidRangeError(`Page range start ${start} is after end ${end}`);
  }
  return { start, end };
}

/**
 * Parse CLI-style bounds ("0", "3") into a validated range.
 */
export function parsePageRange(startRaw: string, endRaw: string): PageRange {
  const start = parseBound(startRaw);
  const end = parseBound(endRaw);
  return assertValidPageRange({ start, end });
}

function parseBound(raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidRangeError(`Invalid page number: "${raw}"`);
  }
  const value = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidRangeError(`Page number out of range: "${raw}"`);
  }
  return value;
}

/** Pages of the range in increasing order, produced one at a time. */
export function* pagesOf(range: PageRange): Generator<number, void, undefined> {
  for (let page = range.start; page <= range.end; page += 1) yield page;
}
