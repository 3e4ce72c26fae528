/**
 * Customer Matcher Service
 *
 * Looks up existing customers by the contact's phone and email and
 * classifies the best candidate:
 * - exact: phone AND email match the same customer
 * - partial: only one of them matches
 * - none: nothing matches
 *
 * Ties go to the earliest candidate: phone lookup results first, then
 * email lookup results not already seen.
 */

import logger from '../config/logger';
import type {
  Contact,
  CustomerCandidate,
  MatchField,
  MatchResult,
} from '../types/customer.types';
import type { FieldServiceGateway } from '../types/fieldService.types';
import { maskPhoneNumber } from '../utils/phoneNumber.util';

const log = logger.child({ service: 'customer-matcher' });

/**
 * Fields on which a candidate agrees with the contact
 */
export const matchedFieldsFor = (candidate: CustomerCandidate, contact: Contact): Set<MatchField> => {
  const matched = new Set<MatchField>();

  if (candidate.phone !== '' && candidate.phone === contact.phone) {
    matched.add('phone');
  }
  if (candidate.email !== '' && candidate.email === contact.email) {
    matched.add('email');
  }

  return matched;
};

/**
 * Union of both lookups keyed by customer id, first occurrence kept
 */
export const unionCandidates = (
  phoneMatches: readonly CustomerCandidate[],
  emailMatches: readonly CustomerCandidate[]
): CustomerCandidate[] => {
  const seen = new Set<string>();
  const union: CustomerCandidate[] = [];

  for (const candidate of [...phoneMatches, ...emailMatches]) {
    if (!seen.has(candidate.customerId)) {
      seen.add(candidate.customerId);
      union.push(candidate);
    }
  }

  return union;
};


/**
 * Classify a set of candidates against the contact
 *
 * Pure; the lookups happen in findMatchingCustomer.
 */
export const classifyCandidates = (
  contact: Contact,
  candidates: readonly CustomerCandidate[]
): MatchResult => {
  let best: { candidate: CustomerCandidate; matchedOn: Set<MatchField> } | null = null;

  for (const candidate of candidates) {
    const matchedOn = matchedFieldsFor(candidate, contact);
    if (matchedOn.size > (best?.matchedOn.size ?? 0)) {
      best = { candidate, matchedOn };
    }
    if (matchedOn.size === 2) break;
  }

  if (best === null) {
    return { classification: 'none', matchedOn: new Set(), allCandidates: candidates };
  }

  return {
    classification: best.matchedOn.size === 2 ? 'exact' : 'partial',
    matchedCustomerId: best.candidate.customerId,
    matchedCandidate: best.candidate,
    matchedOn: best.matchedOn,
    allCandidates: candidates,
  };
};

/**
 * Find the existing customer for a contact
 *
 * Issues one phone lookup and one email lookup. Lookup failures propagate
 * (UpstreamError) so the caller can report the failing step.
 */
export const findMatchingCustomer = async (
  contact: Contact,
  gateway: FieldServiceGateway
): Promise<MatchResult> => {
  const phoneMatches = await gateway.findCustomersByPhone(contact.phone);
  const emailMatches = await gateway.findCustomersByEmail(contact.email);
  const candidates = unionCandidates(phoneMatches, emailMatches);

  const result = classifyCandidates(contact, candidates);

  log.info(
    {
      phoneNumber: maskPhoneNumber(contact.phone),
      byPhone: phoneMatches.length,
      byEmail: emailMatches.length,
      classification: result.classification,
      matchedCustomerId: result.classification === 'none' ? undefined : result.matchedCustomerId,
      matchedOn: [...result.matchedOn],
    },
    'Customer match classified'
  );

  return result;
};
