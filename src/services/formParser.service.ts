/**
 * Form Parser Service
 *
 * Maps submitted form fields onto the slots the lead pipeline reads.
 * Field names are matched case-insensitively by substring, so
 * "Email Address", "email" and "EMAIL" all fill the email slot.
 * The flat testing shape ({ first_name: ... }) goes through the same rules
 * with underscores read as spaces.
 */

import logger from '../config/logger';
import type {
  CustomerType,
  FieldValue,
  FormField,
  FormSubmission,
  SubmittedForm,
} from '../types/form.types';

type TextSlot =
  | 'firstName'
  | 'lastName'
  | 'fullName'
  | 'email'
  | 'phone'
  | 'street'
  | 'streetLine2'
  | 'city'
  | 'state'
  | 'zip'
  | 'address'
  | 'customerType'
  | 'preferredContact'
  | 'serviceNeeded'
  | 'requestDetails'
  | 'message';

type ListSlot = 'serviceDetails' | 'attachments';

type Slot = TextSlot | ListSlot | 'smsConsent';

interface FieldRule {
  slot: Slot;
  matches: (name: string, fieldType?: string) => boolean;
}

const includesAny = (name: string, needles: readonly string[]): boolean =>
  needles.some((needle) => name.includes(needle));

// Order matters: the first matching rule claims the field
const FIELD_RULES: readonly FieldRule[] = [
  { slot: 'firstName', matches: (name) => includesAny(name, ['first name', 'firstname']) },
  { slot: 'lastName', matches: (name) => includesAny(name, ['last name', 'lastname']) },
  { slot: 'email', matches: (name) => name.includes('email') },
  { slot: 'smsConsent', matches: (name) => name.includes('sms') && name.includes('consent') },
  { slot: 'phone', matches: (name) => name.includes('phone') },
  { slot: 'streetLine2', matches: (name) => name.includes('line 2') },
  { slot: 'street', matches: (name) => name.includes('street') },
  { slot: 'city', matches: (name) => name.includes('city') },
  { slot: 'state', matches: (name) => name.includes('state') && !name.includes('service') },
  { slot: 'zip', matches: (name) => includesAny(name, ['zip', 'postal']) },
  {
    slot: 'customerType',
    matches: (name) => includesAny(name, ['new or existing', 'are you', 'customer type']),
  },
  {
    slot: 'preferredContact',
    matches: (name) => includesAny(name, ['preferred method', 'contact method', 'preferred contact']),
  },
  { slot: 'serviceNeeded', matches: (name) => name.includes('service needed') },
  { slot: 'serviceDetails', matches: (name) => name.includes('service details') },
  { slot: 'requestDetails', matches: (name) => name.includes('request details') },
  {
    slot: 'attachments',
    matches: (name, fieldType) =>
      fieldType === 'file' || includesAny(name, ['images', 'plans', 'specs', 'attachment']),
  },
  { slot: 'address', matches: (name) => name.includes('address') },
  { slot: 'fullName', matches: (name) => name.includes('name') },
  { slot: 'message', matches: (name) => name.includes('message') },
];

const TRUTHY_ANSWERS: ReadonlySet<string> = new Set(['true', 'yes', 'y', 'on', '1']);

const isFieldList = (submission: FormSubmission): submission is readonly FormField[] =>
  Array.isArray(submission);

/**
 * Render a field value as note text
 *
 * Lists are joined with ", ", booleans become Yes/No, null becomes "".
 */
export const formatFieldValue = (value: FieldValue): string => {
  if (value === null) return '';
  if (Array.isArray(value)) {
    return value
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .join(', ');
  }
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';

  return String(value).trim();
};

const toList = (value: FieldValue): string[] => {
  if (Array.isArray(value)) {
    return value.map((item) => item.trim()).filter((item) => item.length > 0);
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  const text = formatFieldValue(value);
  return text ? [text] : [];
};

const toBoolean = (value: FieldValue): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;

  return TRUTHY_ANSWERS.has(formatFieldValue(value).toLowerCase());
};

const normalizeFieldName = (fieldName: string): string =>
  fieldName.replace(/_/g, ' ').replace(/\s+/g, ' ').trim().toLowerCase();

const findSlot = (field: FormField): Slot | null => {
  const name = normalizeFieldName(field.fieldName);
  const rule = FIELD_RULES.find((candidate) => candidate.matches(name, field.fieldType));

  return rule ? rule.slot : null;
};

/**
 * Convert either inbound shape to an ordered field list
 */
export const toFormFields = (submission: FormSubmission): FormField[] => {
  if (isFieldList(submission)) {
    return submission.map((field) => ({ ...field }));
  }

  return Object.entries(submission).map(([fieldName, fieldValue]) => ({ fieldName, fieldValue }));
};

/**
 * Parse a form submission
 *
 * The first non-empty value for a slot wins. Every field is kept in
 * rawFields, whether or not a rule claimed it.
 */
export const parseFormSubmission = (submission: FormSubmission): SubmittedForm => {
  const rawFields = toFormFields(submission);
  const text: Partial<Record<TextSlot, string>> = {};
  const lists: Record<ListSlot, string[]> = { serviceDetails: [], attachments: [] };
  let smsConsent: boolean | undefined;
  const unmatched: string[] = [];

  for (const field of rawFields) {
    const slot = findSlot(field);

    if (slot === null) {
      unmatched.push(field.fieldName);
    } else if (slot === 'smsConsent') {
      smsConsent ??= toBoolean(field.fieldValue);
    } else if (slot === 'serviceDetails' || slot === 'attachments') {
      if (lists[slot].length === 0) {
        lists[slot] = toList(field.fieldValue);
      }
    } else {
      const value = formatFieldValue(field.fieldValue);
      if (value && text[slot] === undefined) {
        text[slot] = value;
      }
    }
  }

  logger.debug(
    { fieldCount: rawFields.length, mapped: Object.keys(text), unmatched },
    'Parsed form submission'
  );

  return {
    rawFields,
    ...text,
    smsConsent,
    serviceDetails: lists.serviceDetails,
    attachments: lists.attachments,
  };
};

/**
 * Read the declared customer type
 *
 * "Existing Customer" / "Returning" -> existing, "New Customer" -> new,
 * anything else (or no answer) -> unspecified
 */
export const parseCustomerType = (answer: string | undefined): CustomerType => {
  const normalized = (answer ?? '').trim().toLowerCase();

  if (normalized.includes('existing') || normalized.includes('returning')) {
    return 'existing';
  }
  if (normalized.includes('new')) {
    return 'new';
  }

  return 'unspecified';
};
