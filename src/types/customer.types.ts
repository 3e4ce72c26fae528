/**
 * Customer Type Definitions
 *
 * Contact, customer candidate and matching types used by the lead pipeline.
 */

/**
 * AddressFields - Structured service address
 */
export interface AddressFields {
  street: string;
  streetLine2?: string;
  city: string;
  /** Two-letter state code */
  state: string;
  zip: string;
  country: string;
}

/**
 * Contact - Normalized submitter
 *
 * Produced by ContactNormalizer and frozen; later stages only read it.
 */
export interface Contact {
  readonly firstName: string;
  readonly lastName: string;

  /** Trimmed and lowercased */
  readonly email: string;

  /** Exactly 10 digits, area code completed */
  readonly phone: string;

  /** Normalized single-line address ("" when none was submitted) */
  readonly rawAddress: string;

  /** Parsed address, null when none was submitted */
  readonly address: Readonly<AddressFields> | null;

  /** Whether the submitter agreed to SMS notifications */
  readonly smsConsent: boolean;
}

/**
 * CustomerAddress - Address already on file for a customer
 */
export interface CustomerAddress {
  addressId: string;
  street: string;
  streetLine2?: string;
  city: string;
  state: string;
  zip: string;
  country?: string;
}

/**
 * CustomerCandidate - Read-only copy of a platform customer
 *
 * Phone and email are already reduced to the same canonical form as a Contact.
 */
export interface CustomerCandidate {
  readonly customerId: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string;
  readonly email: string;
  readonly addresses: readonly CustomerAddress[];
}

export type MatchClassification = 'exact' | 'partial' | 'none';

export type MatchField = 'phone' | 'email';

interface MatchResultBase {
  /** Fields the chosen candidate matched on */
  readonly matchedOn: ReadonlySet<MatchField>;

  /** Union of both lookups, phone results first */
  readonly allCandidates: readonly CustomerCandidate[];
}

/**
 * MatchResult - Outcome of customer deduplication
 *
 * exact: both fields matched on the chosen candidate
 * partial: exactly one field matched
 * none: no candidate matched either field (matchedOn is empty)
 */
export type MatchResult =
  | (MatchResultBase & {
      readonly classification: 'exact' | 'partial';
      readonly matchedCustomerId: string;
      readonly matchedCandidate: CustomerCandidate;
    })
  | (MatchResultBase & {
      readonly classification: 'none';
    });

export type AddressAction = 'reuse' | 'createNew';

/**
 * AddressDecision - Whether to reuse an address on file or create one
 */
export interface AddressDecision {
  readonly action: AddressAction;

  /** Present only when action is reuse */
  readonly matchedAddressId?: string;

  /** Best similarity found, 0.0 - 1.0 */
  readonly similarityScore: number;
}
