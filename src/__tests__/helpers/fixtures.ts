import type { Contact, CustomerCandidate } from '../../types/customer.types';

export const makeContact = (overrides: Partial<Contact> = {}): Contact => ({
  firstName: 'Ann',
  lastName: 'Lee',
  email: 'a@x.com',
  phone: '4155551234',
  rawAddress: '',
  address: null,
  smsConsent: false,
  ...overrides,
});

export const makeCandidate = (
  customerId: string,
  overrides: Partial<Omit<CustomerCandidate, 'customerId'>> = {}
): CustomerCandidate => ({
  customerId,
  firstName: 'Ann',
  lastName: 'Lee',
  phone: '',
  email: '',
  addresses: [],
  ...overrides,
});
