import { parsePhoneNumberFromString, isSupportedCountry, type CountryCode } from 'libphonenumber-js';

export const DEFAULT_COUNTRY: CountryCode = 'US';

export function isCountryCode(value: string): value is CountryCode {
  return isSupportedCountry(value);
}

/**
 * Comparison key for a phone number: E.164 when libphonenumber can make sense
 * of it, otherwise the raw text with formatting characters stripped.
 */
export function normalizePhone(raw: string, defaultCountry: CountryCode = DEFAULT_COUNTRY): string {
  const parsed = parsePhoneNumberFromString(raw, defaultCountry);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return parsed.format('E.164');
  }
  const stripped = raw.replace(/[\s\-().]/g, '');
  return stripped || raw.trim();
}

export function samePhone(a: string, b: string, defaultCountry: CountryCode = DEFAULT_COUNTRY): boolean {
  return normalizePhone(a, defaultCountry) === normalizePhone(b, defaultCountry);
}

export function normalizeName(value: string): string {
  return value.trim().toLowerCase();
}
