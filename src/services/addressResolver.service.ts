/**
 * Address Resolver Service
 *
 * Decides whether a submitted address is one the customer already has on
 * file (reuse its id) or a new one (create it). Pure comparison; the
 * orchestrator performs any creation.
 */

import logger from '../config/logger';
import { MATCHING } from '../config/constants';
import type { AddressDecision, CustomerAddress } from '../types/customer.types';
import { compareAddresses, parseAddress, type ParsedAddress } from '../utils/address.util';

const log = logger.child({ service: 'address-resolver' });

const CREATE_NEW: AddressDecision = Object.freeze({ action: 'createNew', similarityScore: 0 });

/**
 * Resolve a submitted address against addresses on file
 *
 * Reuses the most similar address when its score is >= threshold.
 * Structured fields are compared as given; a single-line address is
 * parsed first.
 *
 * @param address - Address fields, or a line such as "456 Oak Ave, SF, CA 94115"
 * @param existing - The chosen customer's addresses, in platform order
 * @param threshold - Minimum score for reuse (inclusive)
 */
export const resolveAddress = (
  address: string | ParsedAddress,
  existing: readonly CustomerAddress[],
  threshold: number = MATCHING.ADDRESS_MATCH_THRESHOLD
): AddressDecision => {
  if (existing.length === 0 || (typeof address === 'string' && address.trim() === '')) {
    return CREATE_NEW;
  }

  const target = typeof address === 'string' ? parseAddress(address) : address;
  let best: { addressId: string; score: number } | null = null;

  for (const candidate of existing) {
    const score = compareAddresses(target, candidate);
    log.debug({ addressId: candidate.addressId, score }, 'Compared address');

    if (best === null || score > best.score) {
      best = { addressId: candidate.addressId, score };
    }
  }

  if (best !== null && best.score >= threshold) {
    return { action: 'reuse', matchedAddressId: best.addressId, similarityScore: best.score };
  }

  return { action: 'createNew', similarityScore: best?.score ?? 0 };
};
