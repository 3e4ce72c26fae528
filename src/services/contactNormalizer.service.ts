/**
 * Contact Normalizer Service
 *
 * Turns the mapped form slots into a frozen Contact. Pure: no I/O, same
 * input gives the same output.
 */

import { ADDRESS_DEFAULTS } from '../config/constants';
import type { AddressFields, Contact } from '../types/customer.types';
import type { SubmittedForm } from '../types/form.types';
import { collapseWhitespace, formatAddress, parseAddress } from '../utils/address.util';
import { ValidationError } from '../utils/errors.util';
import { normalizePhoneNumber } from '../utils/phoneNumber.util';

export interface NormalizerSettings {
  /** Prepended to 7-digit phone numbers */
  defaultAreaCode: string;
  /** Used when the address carries no state */
  defaultState: string;
}

/**
 * Split a full name: the last word is the last name, the rest the first name
 *
 * "Mary Jane Watson" -> ["Mary Jane", "Watson"], "Prince" -> ["Prince", ""]
 */
export const splitFullName = (fullName: string): [string, string] => {
  const parts = collapseWhitespace(fullName).split(' ').filter((part) => part.length > 0);

  if (parts.length === 0) return ['', ''];
  if (parts.length === 1) return [parts[0], ''];

  return [parts.slice(0, -1).join(' '), parts[parts.length - 1]];
};

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

const requireField = (value: string | undefined, field: string): string => {
  const trimmed = collapseWhitespace(value ?? '');
  if (!trimmed) {
    throw new ValidationError(`missing required field: ${field}`, field);
  }

  return trimmed;
};

/**
 * Resolve the service address from structured parts or the single-line field
 *
 * @returns null when the form carried no address at all
 */
export const normalizeAddress = (
  form: SubmittedForm,
  defaultState: string
): AddressFields | null => {
  const hasParts = Boolean(form.street || form.city || form.zip);
  const parsed = hasParts
    ? { street: form.street, city: form.city, state: form.state, zip: form.zip }
    : parseAddress(form.address ?? '');

  if (!parsed.street && !parsed.city && !parsed.zip) {
    return null;
  }

  const streetLine2 = collapseWhitespace(form.streetLine2 ?? '');

  return {
    street: collapseWhitespace(parsed.street ?? ''),
    ...(streetLine2 ? { streetLine2 } : {}),
    city: collapseWhitespace(parsed.city ?? ''),
    state: collapseWhitespace(parsed.state ?? '').toUpperCase() || defaultState,
    zip: collapseWhitespace(parsed.zip ?? ''),
    country: ADDRESS_DEFAULTS.COUNTRY,
  };
};

/**
 * Normalize the submitted contact
 *
 * @throws ValidationError when first name, last name, email or phone is
 * missing, or the phone is not a 10-digit number after area-code completion
 */
export const normalizeContact = (form: SubmittedForm, settings: NormalizerSettings): Contact => {
  const [splitFirst, splitLast] = splitFullName(form.fullName ?? '');
  const firstName = requireField(form.firstName ?? splitFirst, 'firstName');
  const lastName = requireField(form.lastName ?? splitLast, 'lastName');
  const email = normalizeEmail(requireField(form.email, 'email'));
  const phone = normalizePhoneNumber(requireField(form.phone, 'phone'), settings.defaultAreaCode);

  const address = normalizeAddress(form, settings.defaultState);

  return Object.freeze({
    firstName,
    lastName,
    email,
    phone,
    rawAddress: address ? formatAddress(address) : '',
    address: address ? Object.freeze(address) : null,
    smsConsent: form.smsConsent ?? false,
  });
};
