import type { PropertyKey } from '../types/index.js';

// 8-4-4-4-12 hex digits, optionally wrapped in one pair of braces.
const GUID_REGEX = /^\{?([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})\}?$/i;
const DECIMAL_REGEX = /^\d+$/;

export const MAX_PROPERTY_IDENTIFIER = 0xffffffff;

/**
 * Returns the lower-case hyphenated form of a GUID, or undefined when the
 * input does not have five hex groups of lengths 8, 4, 4, 4 and 12.
 */
export function canonicalFormatIdentifier(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (trimmed.startsWith('{') !== trimmed.endsWith('}')) return undefined;

  const match = GUID_REGEX.exec(trimmed);
  if (!match) return undefined;
  return match.slice(1).join('-').toLowerCase();
}

export function parsePropertyIdentifier(value: unknown): number | undefined {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && DECIMAL_REGEX.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return undefined;
  }

  if (!Number.isSafeInteger(parsed) || parsed < 0 || parsed > MAX_PROPERTY_IDENTIFIER) {
    return undefined;
  }
  return parsed;
}

export function toLookupKey(key: PropertyKey): string {
  return `{${key.format_identifier}}/${key.property_identifier}`;
}

export function compareKeys(a: PropertyKey, b: PropertyKey): number {
  if (a.format_identifier !== b.format_identifier) {
    return a.format_identifier < b.format_identifier ? -1 : 1;
  }
  return a.property_identifier - b.property_identifier;
}

/**
 * Picks the most specific of several competing values: the longest one,
 * ties going to the lexicographically smallest.
 */
export function preferSpecific(values: Iterable<string>): string | undefined {
  let best: string | undefined;
  for (const value of values) {
    if (!value) continue;
    if (!best || value.length > best.length || (value.length === best.length && value < best)) {
      best = value;
    }
  }
  return best;
}

const ARTIFACT_REGEX = /[\uFEFF\u200B-\u200D\u2060]/g;

/** Strips encoding residue that scraped text tends to carry. */
export function cleanText(value: string): string {
  return value
    .replace(ARTIFACT_REGEX, '')
    .replace(/\u00A0/g, ' ')
    .replace(/\r+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function formatValueType(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`;
}
