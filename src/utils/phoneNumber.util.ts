/**
 * Phone Number Utility Functions
 *
 * Submitted numbers are reduced to 10 US digits. Numbers coming back from
 * the platform may carry a +1 country code and are reduced the same way
 * before comparison.
 */

import logger from '../config/logger';
import { ERROR_MESSAGES } from '../config/constants';
import { ValidationError } from './errors.util';

/**
 * Strip everything that is not a digit
 */
export const digitsOnly = (value: string): string => value.replace(/\D/g, '');

/**
 * Normalize a submitted phone number
 *
 * - 7 digits: the default area code is prepended
 * - 10 digits: returned unchanged, so normalizing twice is a no-op
 * - anything else: ValidationError("invalid phone")
 *
 * @param phoneNumber - Phone number in any format, e.g. "(415) 555-1234"
 * @param defaultAreaCode - Area code for 7-digit local numbers
 * @returns 10-digit phone number
 */
export const normalizePhoneNumber = (phoneNumber: string, defaultAreaCode: string): string => {
  const digits = digitsOnly(phoneNumber);
  const completed = digits.length === 7 ? `${digitsOnly(defaultAreaCode)}${digits}` : digits;

  if (completed.length !== 10) {
    logger.debug({ digitCount: digits.length }, 'Rejected phone number');
    throw new ValidationError(ERROR_MESSAGES.INVALID_PHONE, 'phone');
  }

  return completed;
};

/**
 * Reduce a platform phone number to 10 digits
 *
 * Accepts "+14155551234", "1-415-555-1234" or "4155551234".
 *
 * @returns 10-digit number, or null when the value is not a US number
 */
export const canonicalPhoneNumber = (phoneNumber: string | null | undefined): string | null => {
  if (!phoneNumber) return null;

  const digits = digitsOnly(phoneNumber);
  if (digits.length === 10) return digits;
  if (digits.length === 11 && digits.startsWith('1')) return digits.slice(1);

  return null;
};

/**
 * Mask phone number for logging
 *
 * Hides the last four digits
 * Example: 4155551234 -> 415555****
 */
export const maskPhoneNumber = (phoneNumber: string): string => {
  if (!phoneNumber || phoneNumber.length < 4) {
    return '****';
  }

  return `${phoneNumber.slice(0, -4)}****`;
};
