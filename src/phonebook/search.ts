import type { CountryCode } from 'libphonenumber-js';
import type { Entry } from '../types/index.js';
import { EntryNotFoundError, ok, err, type Result } from '../utils/index.js';
import { DEFAULT_COUNTRY, normalizeName, samePhone } from './normalize.js';

const HAS_DIGIT = /\d/;

/**
 * Phone numbers match when their trimmed text is identical or, for keys with
 * a digit in them, when both normalize to the same number.
 */
export function phoneMatches(
  phoneNumber: string,
  key: string,
  defaultCountry: CountryCode = DEFAULT_COUNTRY,
): boolean {
  const needle = key.trim();
  if (!needle) return false;
  if (phoneNumber.trim() === needle) return true;
  return HAS_DIGIT.test(needle) && samePhone(phoneNumber, needle, defaultCountry);
}

/**
 * Whole-field match: the term equals the name or surname ignoring case, or
 * the phone number as `phoneMatches` compares it.
 */
export function matchesEntry(entry: Entry, term: string, defaultCountry: CountryCode = DEFAULT_COUNTRY): boolean {
  const needle = term.trim();
  if (!needle) return false;

  const lowered = normalizeName(needle);
  if (normalizeName(entry.name) === lowered || normalizeName(entry.surname) === lowered) {
    return true;
  }

  return phoneMatches(entry.phoneNumber, needle, defaultCountry);
}

/** First entry in collection order matching `term`. */
export function searchEntries(
  entries: readonly Entry[],
  term: string,
  defaultCountry: CountryCode = DEFAULT_COUNTRY,
): Result<Entry, EntryNotFoundError> {
  const match = entries.find(entry => matchesEntry(entry, term, defaultCountry));
  return match ? ok(match) : err(EntryNotFoundError.forTerm(term));
}

/** Index of the first entry whose phone number matches `phoneNumber`, or -1. */
export function findByPhone(
  entries: readonly Entry[],
  phoneNumber: string,
  defaultCountry: CountryCode = DEFAULT_COUNTRY,
): number {
  return entries.findIndex(entry => phoneMatches(entry.phoneNumber, phoneNumber, defaultCountry));
}
