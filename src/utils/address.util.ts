/**
 * Address Utility Functions
 *
 * Parsing of single-line addresses, the normalized single-line form used
 * for comparison, and the field-weighted similarity score.
 */

import { MATCHING } from '../config/constants';
import { ADDRESS_ABBREVIATIONS } from '../data/addressAbbreviations.data';

/**
 * ParsedAddress - Components recovered from free text; any may be missing
 */
export interface ParsedAddress {
  street?: string;
  city?: string;
  state?: string;
  zip?: string;
}

type ComparableField = keyof ParsedAddress;

const COMPARED_FIELDS: readonly ComparableField[] = ['street', 'city', 'state', 'zip'];

// "123 Main St, San Francisco, CA 94102"
const COMMA_STATE_ZIP = /^(.+?),\s*(.+?),\s*([A-Za-z]{2})\s+(\d{5}(?:-\d{4})?)$/;
// "123 Main St, San Francisco CA 94102"
const SPACE_STATE_ZIP = /^(.+?),\s*(.+?)\s+([A-Za-z]{2})\s+(\d{5}(?:-\d{4})?)$/;
const TRAILING_ZIP = /(\d{5}(?:-\d{4})?)$/;
// Uppercase only, so a trailing "St" is not taken for a state
const TRAILING_STATE = /(?:^|[\s,])([A-Z]{2})$/;

export const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

const splitParts = (value: string): string[] =>
  value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

const withoutTrailingComma = (value: string): string => value.replace(/[\s,]+$/, '');

/**
 * Parse a single-line address into components
 *
 * Examples:
 * parseAddress('123 Main St, San Francisco, CA 94102')
 *   -> { street: '123 Main St', city: 'San Francisco', state: 'CA', zip: '94102' }
 * parseAddress('456 Oak Ave, Oakland CA 94601')
 *   -> { street: '456 Oak Ave', city: 'Oakland', state: 'CA', zip: '94601' }
 *
 * Text that matches no pattern is returned as the street.
 */
export const parseAddress = (text: string): ParsedAddress => {
  const value = collapseWhitespace(text);
  if (!value) return {};

  for (const pattern of [COMMA_STATE_ZIP, SPACE_STATE_ZIP]) {
    const match = pattern.exec(value);
    if (match) {
      return {
        street: match[1].trim(),
        city: match[2].trim(),
        state: match[3].toUpperCase(),
        zip: match[4],
      };
    }
  }

  const result: ParsedAddress = {};
  let remainder = value;

  const zipMatch = TRAILING_ZIP.exec(remainder);
  if (zipMatch) {
    result.zip = zipMatch[1];
    remainder = withoutTrailingComma(remainder.slice(0, zipMatch.index));

    const stateMatch = TRAILING_STATE.exec(remainder);
    if (stateMatch) {
      result.state = stateMatch[1];
      remainder = withoutTrailingComma(remainder.slice(0, remainder.length - stateMatch[1].length));
    }
  }

  const parts = splitParts(remainder);
  if (parts.length > 0) {
    result.street = parts[0];
  }
  if (parts.length > 1) {
    result.city = parts.slice(1).join(', ');
  }

  return result;
};

/**
 * Single-line form "street, city, ST zip" of structured address fields
 */
export const formatAddress = (address: ParsedAddress): string => {
  const stateZip = collapseWhitespace(`${address.state ?? ''} ${address.zip ?? ''}`);

  return [address.street, address.city, stateZip]
    .map((part) => collapseWhitespace(part ?? ''))
    .filter((part) => part.length > 0)
    .join(', ');
};

/**
 * Normalize address text for comparison
 *
 * Lowercases, drops punctuation and expands abbreviations:
 * "456 Oak Ave." -> "456 oak avenue"
 */
export const normalizeAddressText = (value: string): string =>
  collapseWhitespace(value.toLowerCase().replace(/[^a-z0-9\s]/g, ' '))
    .split(' ')
    .filter((token) => token.length > 0)
    .map((token) => ADDRESS_ABBREVIATIONS.get(token) ?? token)
    .join(' ');

/**
 * Levenshtein edit distance
 */
export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }

  return previous[b.length];
};

/**
 * Edit-distance ratio, 1 - distance / longer length
 *
 * @returns 1.0 for equal strings, 0.0 when nothing lines up
 */
export const similarityRatio = (a: string, b: string): number => {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;

  return 1 - levenshteinDistance(a, b) / longest;
};

/**
 * Field-weighted similarity of two addresses
 *
 * Only fields present on both sides count; weights come from
 * MATCHING.ADDRESS_FIELD_WEIGHTS. Rounded to 4 decimals.
 *
 * @returns 0.0 - 1.0; 0.0 when no field is comparable
 */
export const compareAddresses = (a: ParsedAddress, b: ParsedAddress): number => {
  let weightedScore = 0;
  let totalWeight = 0;

  for (const field of COMPARED_FIELDS) {
    const left = normalizeAddressText(a[field] ?? '');
    const right = normalizeAddressText(b[field] ?? '');
    if (!left || !right) continue;

    const weight = MATCHING.ADDRESS_FIELD_WEIGHTS[field];
    weightedScore += similarityRatio(left, right) * weight;
    totalWeight += weight;
  }

  if (totalWeight === 0) return 0;

  return Math.round((weightedScore / totalWeight) * 10000) / 10000;
};

/**
 * Similarity of two single-line addresses
 */
export const addressSimilarity = (a: string, b: string): number =>
  compareAddresses(parseAddress(a), parseAddress(b));
