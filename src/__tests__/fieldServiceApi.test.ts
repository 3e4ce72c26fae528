import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import express from 'express';
import type { FieldServiceApiConfig } from '../config/env';
import { FieldServiceStore, createFieldServiceMockApp } from '../mock-servers/fieldServiceCrm.server';
import { ErrorHandlerService } from '../services/errorHandler.service';
import { FieldServiceApiClient, toCandidate } from '../services/fieldServiceApi.service';
import { RateLimiter } from '../services/rateLimiter.service';
import type { PlatformCustomer } from '../types/fieldService.types';
import { UpstreamError } from '../utils/errors.util';
import { makeContact } from './helpers/fixtures';
import { listen, type RunningApp } from './helpers/listen';

const API_KEY = 'test-api-key';

const apiConfig = (baseUrl: string, overrides: Partial<FieldServiceApiConfig> = {}): FieldServiceApiConfig => ({
  apiKey: API_KEY,
  baseUrl,
  rateLimitDelayMs: 0,
  maxRetries: 2,
  timeoutMs: 5000,
  maxPages: 5,
  ...overrides,
});

describe('toCandidate', () => {
  it('takes the first usable phone number and lowercases the email', () => {
    const customer: PlatformCustomer = {
      id: 'cus_1',
      first_name: 'Jordan',
      last_name: null,
      email: ' Jordan.Lee@Example.com ',
      mobile_number: '555-0100',
      home_number: '+1 415 555 0177',
      work_number: '510-555-0100',
      addresses: [{ id: 'adr_1', street: '1 Elm St', city: null, state: 'CA', zip: '94607' }],
    };

    expect(toCandidate(customer)).toEqual({
      customerId: 'cus_1',
      firstName: 'Jordan',
      lastName: '',
      phone: '4155550177',
      email: 'jordan.lee@example.com',
      addresses: [
        {
          addressId: 'adr_1',
          street: '1 Elm St',
          streetLine2: undefined,
          city: '',
          state: 'CA',
          zip: '94607',
          country: undefined,
        },
      ],
    });
  });

  it('leaves phone and email empty when the platform has none', () => {
    expect(toCandidate({ id: 'cus_2' })).toMatchObject({ phone: '', email: '', addresses: [] });
  });
});

describe('FieldServiceApiClient against the mock platform', () => {
  let store: FieldServiceStore;
  let server: RunningApp;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let client: FieldServiceApiClient;

  beforeEach(async () => {
    store = new FieldServiceStore();
    server = await listen(createFieldServiceMockApp({ store, apiKey: API_KEY }));
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    client = new FieldServiceApiClient(apiConfig(server.url), new RateLimiter(0), {
      leadSource: 'Website',
      retryHandler: new ErrorHandlerService(sleep),
    });
  });

  afterEach(async () => {
    await server.close();
  });

  it('finds customers by phone digits', async () => {
    const candidates = await client.findCustomersByPhone('4155550134');

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      customerId: 'cus_seed_001',
      phone: '4155550134',
      email: 'sarah.chen@example.com',
      addresses: [
        {
          addressId: 'adr_seed_001',
          street: '456 Oak Avenue',
          city: 'San Francisco',
          state: 'CA',
          zip: '94115',
          country: 'US',
        },
      ],
    });
  });

  it('reduces a platform number with a country code', async () => {
    const candidates = await client.findCustomersByPhone('4155550177');

    expect(candidates.map((candidate) => [candidate.customerId, candidate.phone])).toEqual([
      ['cus_seed_003', '4155550177'],
    ]);
  });

  it('finds customers by email regardless of case', async () => {
    const candidates = await client.findCustomersByEmail('MIKE.PATEL@example.com');

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      customerId: 'cus_seed_002',
      email: 'mike.patel@example.com',
      phone: '5105550199',
    });
  });

  it('returns nothing for an unknown email', async () => {
    await expect(client.findCustomersByEmail('nobody@example.com')).resolves.toEqual([]);
  });

  it('follows result pages up to the configured maximum', async () => {
    const household: PlatformCustomer[] = Array.from({ length: 120 }, (_, index) => ({
      id: `cus_house_${index}`,
      mobile_number: '4155550000',
      email: `member${index}@example.com`,
    }));
    const pagedStore = new FieldServiceStore(household);
    const pagedServer = await listen(createFieldServiceMockApp({ store: pagedStore, apiKey: API_KEY }));

    try {
      const limiter = new RateLimiter(0);
      const allPages = new FieldServiceApiClient(apiConfig(pagedServer.url), limiter);
      const twoPages = new FieldServiceApiClient(apiConfig(pagedServer.url, { maxPages: 2 }), limiter);

      await expect(allPages.findCustomersByPhone('4155550000')).resolves.toHaveLength(120);
      await expect(twoPages.findCustomersByPhone('4155550000')).resolves.toHaveLength(100);
    } finally {
      await pagedServer.close();
    }
  });

  it('creates a customer with the lead source and notification consent', async () => {
    const customerId = await client.createCustomer(makeContact({ smsConsent: true }));

    expect(customerId).toMatch(/^cus_/);
    expect(store.findCustomer(customerId)).toMatchObject({
      first_name: 'Ann',
      last_name: 'Lee',
      email: 'a@x.com',
      mobile_number: '4155551234',
      notifications_enabled: true,
      lead_source: 'Website',
    });
  });

  it('creates a service address', async () => {
    const addressId = await client.createAddress('cus_seed_003', {
      street: '9 Pine St',
      city: 'San Francisco',
      state: 'CA',
      zip: '94108',
      country: 'US',
    });

    expect(store.findCustomer('cus_seed_003')?.addresses).toEqual([
      {
        id: addressId,
        type: 'service',
        street: '9 Pine St',
        city: 'San Francisco',
        state: 'CA',
        zip: '94108',
        country: 'US',
      },
    ]);
  });

  it('creates a lead with quote-only line items', async () => {
    const leadId = await client.createLead({
      customerId: 'cus_seed_001',
      addressId: 'adr_seed_001',
      employeeId: 'emp_test',
      leadSource: 'Website',
      jobType: 'Plumbing Demand Maintenance',
      lineItems: [{ description: 'Water Heater Service', details: 'No hot water', quantity: 1, unitPrice: 0 }],
      privateNote: 'note text',
    });

    expect(store.leads).toHaveLength(1);
    expect(store.leads[0]).toMatchObject({
      id: leadId,
      customer_id: 'cus_seed_001',
      address_id: 'adr_seed_001',
      assigned_employee_id: 'emp_test',
      lead_source: 'Website',
      job_type: 'Plumbing Demand Maintenance',
      line_items: [
        { name: 'Water Heater Service', description: 'No hot water', kind: 'labor', quantity: 1, unit_price: 0 },
      ],
      note: 'note text',
    });
  });

  it('omits the address on a lead without one', async () => {
    await client.createLead({
      customerId: 'cus_seed_003',
      addressId: null,
      employeeId: 'emp_test',
      leadSource: 'Website',
      jobType: 'Plumbing Estimate',
      lineItems: [],
      privateNote: '',
    });

    expect(store.leads[0].address_id).toBeUndefined();
  });

  it('retries a server error', async () => {
    store.failNext('createLead', 503);

    await client.createLead({
      customerId: 'cus_seed_001',
      addressId: null,
      employeeId: '',
      leadSource: 'Website',
      jobType: 'Plumbing Estimate',
      lineItems: [],
      privateNote: '',
    });

    expect(store.leads).toHaveLength(1);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000]);
  });

  it('waits as long as Retry-After asks on 429', async () => {
    store.failNext('searchCustomers', 429, 1, 7);

    await expect(client.findCustomersByEmail('sarah.chen@example.com')).resolves.toHaveLength(1);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([7000]);
  });

  it('gives up after the configured retries', async () => {
    store.failNext('searchCustomers', 500, 5);

    const error = await client.findCustomersByPhone('4155550134').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({
      operation: 'findCustomersByPhone',
      statusCode: 500,
      message: 'HTTP 500: injected failure for searchCustomers',
    });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('fails a client error without retrying', async () => {
    store.failNext('createCustomer', 400);

    await expect(client.createCustomer(makeContact())).rejects.toMatchObject({
      operation: 'createCustomer',
      statusCode: 400,
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports a rejected API key', async () => {
    const unauthorized = new FieldServiceApiClient(
      apiConfig(server.url, { apiKey: 'wrong-key' }),
      new RateLimiter(0),
      { retryHandler: new ErrorHandlerService(sleep) }
    );

    await expect(unauthorized.findCustomersByPhone('4155550134')).rejects.toMatchObject({
      statusCode: 401,
      message: 'HTTP 401: unauthorized',
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports an unreachable platform as a network error after retrying', async () => {
    const stopped = await listen(express());
    await stopped.close();
    const offline = new FieldServiceApiClient(apiConfig(stopped.url), new RateLimiter(0), {
      retryHandler: new ErrorHandlerService(sleep),
    });

    const error = await offline.findCustomersByPhone('4155550134').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ statusCode: null, operation: 'findCustomersByPhone' });
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('rejects a response body of the wrong shape', async () => {
    const broken = express();
    broken.get('/customers', (_req, res) => {
      res.json({ customers: 'none' });
    });
    const brokenServer = await listen(broken);

    try {
      const brokenClient = new FieldServiceApiClient(apiConfig(brokenServer.url), new RateLimiter(0), {
        retryHandler: new ErrorHandlerService(sleep),
      });

      await expect(brokenClient.findCustomersByPhone('4155550134')).rejects.toMatchObject({
        statusCode: 200,
        message: 'Unexpected response shape from field-service API (customers: Expected array, received string)',
      });
      expect(sleep).not.toHaveBeenCalled();
    } finally {
      await brokenServer.close();
    }
  });
});
