/**
 * Form Submission Type Definitions
 *
 * Shapes of the website form payload before and after field mapping.
 */

/** Value of a single submitted form field */
export type FieldValue = string | number | boolean | string[] | null;

/**
 * FormField - One submitted field, in submission order
 */
export interface FormField {
  /** Label of the field as configured in the form widget (e.g. "Email Address") */
  fieldName: string;

  /** Submitted value; multi-selects arrive as string lists */
  fieldValue: FieldValue;

  /** Widget field type when the widget sends one (e.g. "file") */
  fieldType?: string;
}

/**
 * FlatSubmission - Simplified shape for manual testing, keyed by field name
 * (e.g. { first_name: 'Sarah', email: 'sarah@example.com' })
 */
export type FlatSubmission = Readonly<Record<string, FieldValue>>;

/** Either inbound shape accepted by the lead pipeline */
export type FormSubmission = readonly FormField[] | FlatSubmission;

/**
 * Declared answer to "Are you a new or existing customer?"
 * Unspecified is handled like New.
 */
export type CustomerType = 'existing' | 'new' | 'unspecified';

/**
 * SubmittedForm - Submission after field-name mapping
 *
 * Every slot is optional; ContactNormalizer decides what is required.
 */
export interface SubmittedForm {
  /** Every submitted field, mapped or not, in submission order */
  rawFields: readonly FormField[];

  firstName?: string;
  lastName?: string;

  /** Single "Name" field, split when first/last are absent */
  fullName?: string;

  email?: string;
  phone?: string;

  street?: string;
  streetLine2?: string;
  city?: string;
  state?: string;
  zip?: string;

  /** Single-line address field, used when no structured parts were sent */
  address?: string;

  /** Free-text answer to the new/existing customer question */
  customerType?: string;

  preferredContact?: string;
  smsConsent?: boolean;

  /** "Service Needed" single choice */
  serviceNeeded?: string;

  /** "Service Details" multi-select values */
  serviceDetails: string[];

  /** Free-text description of the request */
  requestDetails?: string;

  /** Uploaded file URLs */
  attachments: string[];

  message?: string;
}
