import { describe, it, expect, vi } from 'vitest';
import {
  classifyCandidates,
  findMatchingCustomer,
  matchedFieldsFor,
  unionCandidates,
} from '../services/customerMatcher.service';
import type { FieldServiceGateway } from '../types/fieldService.types';
import { UpstreamError } from '../utils/errors.util';
import { makeCandidate, makeContact } from './helpers/fixtures';
import { InMemoryGateway } from './helpers/inMemoryGateway';

const contact = makeContact({ phone: '4155551234', email: 'a@x.com' });

describe('matchedFieldsFor', () => {
  it('lists the fields a candidate shares with the contact', () => {
    const both = makeCandidate('cus_1', { phone: '4155551234', email: 'a@x.com' });
    const phoneOnly = makeCandidate('cus_2', { phone: '4155551234', email: 'b@x.com' });

    expect([...matchedFieldsFor(both, contact)]).toEqual(['phone', 'email']);
    expect([...matchedFieldsFor(phoneOnly, contact)]).toEqual(['phone']);
  });

  it('never matches on an empty value', () => {
    expect(matchedFieldsFor(makeCandidate('cus_1'), contact).size).toBe(0);
  });
});

describe('unionCandidates', () => {
  it('keeps phone results first and drops repeated ids', () => {
    const a = makeCandidate('cus_a');
    const b = makeCandidate('cus_b');
    const c = makeCandidate('cus_c');

    expect(unionCandidates([a, b], [b, c]).map((candidate) => candidate.customerId)).toEqual([
      'cus_a',
      'cus_b',
      'cus_c',
    ]);
  });
});

describe('classifyCandidates', () => {
  it('is exact when one candidate matches phone and email', () => {
    const result = classifyCandidates(contact, [
      makeCandidate('cus_a', { phone: '4155551234', email: 'a@x.com' }),
    ]);

    expect(result).toMatchObject({ classification: 'exact', matchedCustomerId: 'cus_a' });
    expect([...result.matchedOn]).toEqual(['phone', 'email']);
  });

  it('is partial when only the phone matches', () => {
    const result = classifyCandidates(contact, [
      makeCandidate('cus_a', { phone: '4155551234', email: 'other@x.com' }),
    ]);

    expect(result.classification).toBe('partial');
    expect([...result.matchedOn]).toEqual(['phone']);
  });

  it('is partial when only the email matches', () => {
    const result = classifyCandidates(contact, [
      makeCandidate('cus_a', { phone: '5105550000', email: 'a@x.com' }),
    ]);

    expect(result.classification).toBe('partial');
    expect([...result.matchedOn]).toEqual(['email']);
  });

  it('is none when nothing matches', () => {
    const result = classifyCandidates(contact, [
      makeCandidate('cus_a', { phone: '5105550000', email: 'b@x.com' }),
    ]);

    expect(result.classification).toBe('none');
    expect(result.matchedOn.size).toBe(0);
    expect(result.allCandidates).toHaveLength(1);
  });

  it('prefers a full match that appears after a partial one', () => {
    const result = classifyCandidates(contact, [
      makeCandidate('cus_partial', { phone: '4155551234' }),
      makeCandidate('cus_full', { phone: '4155551234', email: 'a@x.com' }),
    ]);

    expect(result).toMatchObject({ classification: 'exact', matchedCustomerId: 'cus_full' });
  });

  it('breaks ties by candidate order', () => {
    const result = classifyCandidates(contact, [
      makeCandidate('cus_first', { phone: '4155551234' }),
      makeCandidate('cus_second', { email: 'a@x.com' }),
    ]);

    expect(result).toMatchObject({ classification: 'partial', matchedCustomerId: 'cus_first' });
  });
});

describe('findMatchingCustomer', () => {
  it('looks up by phone then by email', async () => {
    const gateway = new InMemoryGateway([
      makeCandidate('cus_phone', { phone: '4155551234', email: 'other@x.com' }),
      makeCandidate('cus_both', { phone: '4155551234', email: 'a@x.com' }),
    ]);

    const result = await findMatchingCustomer(contact, gateway);

    expect(gateway.calls).toEqual(['findCustomersByPhone', 'findCustomersByEmail']);
    expect(result.classification).toBe('exact');
    expect(result.allCandidates.map((candidate) => candidate.customerId)).toEqual([
      'cus_phone',
      'cus_both',
    ]);
  });

  it('propagates lookup failures', async () => {
    const failure = new UpstreamError('findCustomersByEmail', 503, 'HTTP 503');
    const gateway: FieldServiceGateway = {
      findCustomersByPhone: vi.fn().mockResolvedValue([]),
      findCustomersByEmail: vi.fn().mockRejectedValue(failure),
      createCustomer: vi.fn(),
      createAddress: vi.fn(),
      createLead: vi.fn(),
    };

    await expect(findMatchingCustomer(contact, gateway)).rejects.toBe(failure);
  });
});
