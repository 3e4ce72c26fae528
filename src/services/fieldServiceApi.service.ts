/**
 * Field-Service API Client
 *
 * HTTP implementation of FieldServiceGateway:
 * - Customer search by phone or email (paginated)
 * - Customer, service address and lead creation
 *
 * Every attempt, retries included, waits for the shared rate limiter.
 * Network errors, 429 and 5xx responses are retried; any other failure
 * surfaces at once as UpstreamError.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import logger from '../config/logger';
import { ADDRESS_DEFAULTS, ERROR_MESSAGES, LINE_ITEM_DEFAULTS } from '../config/constants';
import type { AppConfig, FieldServiceApiConfig } from '../config/env';
import type {
  AddressFields,
  Contact,
  CustomerAddress,
  CustomerCandidate,
} from '../types/customer.types';
import type {
  CreateAddressBody,
  CreateCustomerBody,
  CreateLeadBody,
  FieldServiceGateway,
  PlatformCustomer,
} from '../types/fieldService.types';
import type { GatewayOperation, LeadRequest } from '../types/lead.types';
import { UpstreamError, errorMessage, isUpstreamError } from '../utils/errors.util';
import { canonicalPhoneNumber, digitsOnly, maskPhoneNumber } from '../utils/phoneNumber.util';
import errorHandler, { type ErrorHandlerService } from './errorHandler.service';
import type { RateLimiter } from './rateLimiter.service';

const SEARCH_PAGE_SIZE = 50;
const RETRY_BASE_DELAY_MS = 1000;

const nullableText = z.string().nullish();

const addressSchema = z.object({
  id: z.string(),
  type: nullableText,
  street: nullableText,
  street_line_2: nullableText,
  city: nullableText,
  state: nullableText,
  zip: nullableText,
  country: nullableText,
});

const customerSchema = z.object({
  id: z.string(),
  first_name: nullableText,
  last_name: nullableText,
  email: nullableText,
  mobile_number: nullableText,
  home_number: nullableText,
  work_number: nullableText,
  notifications_enabled: z.boolean().optional(),
  lead_source: nullableText,
  addresses: z.array(addressSchema).optional(),
});

const customerPageSchema = z.object({
  customers: z.array(customerSchema),
  page: z.number().optional(),
  page_size: z.number().optional(),
  total_pages: z.number().optional(),
  total_items: z.number().optional(),
});

const createdSchema = z.object({ id: z.string() });

// Some API versions wrap the new address
const createdAddressSchema = z.union([
  createdSchema,
  z.object({ address: createdSchema }),
]);

export interface FieldServiceClientOptions {
  /** Lead source stamped on new customers */
  leadSource?: string;
  retryBaseDelayMs?: number;
  retryHandler?: ErrorHandlerService;
}

/**
 * Map a platform customer to a match candidate
 *
 * Phone is the first of mobile/home/work that reduces to 10 digits;
 * email is trimmed and lowercased. Missing values become "".
 */
export const toCandidate = (customer: PlatformCustomer): CustomerCandidate => {
  const phone =
    [customer.mobile_number, customer.home_number, customer.work_number]
      .map((number) => canonicalPhoneNumber(number ?? ''))
      .find((number): number is string => number !== null) ?? '';

  const addresses: CustomerAddress[] = (customer.addresses ?? []).map((address) => ({
    addressId: address.id,
    street: address.street ?? '',
    streetLine2: address.street_line_2 ?? undefined,
    city: address.city ?? '',
    state: address.state ?? '',
    zip: address.zip ?? '',
    country: address.country ?? undefined,
  }));

  return {
    customerId: customer.id,
    firstName: customer.first_name ?? '',
    lastName: customer.last_name ?? '',
    phone,
    email: (customer.email ?? '').trim().toLowerCase(),
    addresses,
  };
};

const describeResponseBody = (data: unknown): string => {
  if (typeof data === 'string') return data.trim().slice(0, 200);
  if (typeof data === 'object' && data !== null) {
    for (const key of ['error', 'message']) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string') return value;
    }
  }
  return '';
};

const parseRetryAfter = (value: unknown): number | undefined => {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
};

/**
 * Convert whatever a request threw into an UpstreamError
 */
export const toUpstreamError = (operation: GatewayOperation, error: unknown): UpstreamError => {
  if (isUpstreamError(error)) return error;

  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (!response) {
      return new UpstreamError(operation, null, `network error: ${error.message}`);
    }

    const detail = describeResponseBody(response.data);
    return new UpstreamError(
      operation,
      response.status,
      detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`,
      parseRetryAfter(response.headers['retry-after'])
    );
  }

  return new UpstreamError(operation, null, errorMessage(error));
};

export class FieldServiceApiClient implements FieldServiceGateway {
  private log = logger.child({ service: 'field-service-api' });
  private client: AxiosInstance;
  private readonly leadSource?: string;
  private readonly retryBaseDelayMs: number;
  private readonly retryHandler: ErrorHandlerService;

  constructor(
    private readonly config: FieldServiceApiConfig,
    private readonly limiter: RateLimiter,
    options: FieldServiceClientOptions = {}
  ) {
    this.leadSource = options.leadSource;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? RETRY_BASE_DELAY_MS;
    this.retryHandler = options.retryHandler ?? errorHandler;

    this.client = axios.create({
      baseURL: config.baseUrl,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      timeout: config.timeoutMs,
    });

    // Request interceptor for logging
    this.client.interceptors.request.use((request) => {
      this.log.debug({ url: request.url, method: request.method }, 'Field-service API request');
      return request;
    });

    // Response interceptor for logging
    this.client.interceptors.response.use(
      (response) => {
        this.log.debug(
          { url: response.config.url, status: response.status },
          'Field-service API response'
        );
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          this.log.error(
            { url: error.config?.url, status: error.response?.status, error: error.message },
            'Field-service API error'
          );
        }
        return Promise.reject(error);
      }
    );
  }

  async findCustomersByPhone(phone: string): Promise<CustomerCandidate[]> {
    this.log.info({ phoneNumber: maskPhoneNumber(phone) }, 'Searching customers by phone');
    return this.searchCustomers('findCustomersByPhone', digitsOnly(phone));
  }

  async findCustomersByEmail(email: string): Promise<CustomerCandidate[]> {
    this.log.info('Searching customers by email');
    return this.searchCustomers('findCustomersByEmail', email.trim().toLowerCase());
  }

  async createCustomer(contact: Contact): Promise<string> {
    const body: CreateCustomerBody = {
      first_name: contact.firstName,
      last_name: contact.lastName,
      email: contact.email,
      mobile_number: contact.phone,
      notifications_enabled: contact.smsConsent,
      lead_source: this.leadSource,
    };

    const created = await this.send(
      'createCustomer',
      { method: 'POST', url: '/customers', data: body },
      createdSchema
    );

    this.log.info({ customerId: created.id }, 'Customer created');
    return created.id;
  }

  async createAddress(customerId: string, address: AddressFields): Promise<string> {
    const body: CreateAddressBody = {
      type: ADDRESS_DEFAULTS.ADDRESS_TYPE,
      street: address.street,
      street_line_2: address.streetLine2,
      city: address.city,
      state: address.state,
      zip: address.zip,
      country: address.country || ADDRESS_DEFAULTS.COUNTRY,
    };

    const created = await this.send(
      'createAddress',
      {
        method: 'POST',
        url: `/customers/${encodeURIComponent(customerId)}/addresses`,
        data: body,
      },
      createdAddressSchema
    );

    const addressId = 'address' in created ? created.address.id : created.id;
    this.log.info({ customerId, addressId }, 'Service address created');
    return addressId;
  }

  async createLead(lead: LeadRequest): Promise<string> {
    const body: CreateLeadBody = {
      customer_id: lead.customerId,
      job_type: lead.jobType,
      lead_source: lead.leadSource,
      line_items: lead.lineItems.map((item) => ({
        name: item.description,
        description: item.details,
        kind: LINE_ITEM_DEFAULTS.KIND,
        quantity: item.quantity,
        unit_price: item.unitPrice,
      })),
      note: lead.privateNote,
    };
    if (lead.addressId !== null) {
      body.address_id = lead.addressId;
    }
    if (lead.employeeId) {
      body.assigned_employee_id = lead.employeeId;
    }

    const created = await this.send(
      'createLead',
      { method: 'POST', url: '/leads', data: body },
      createdSchema
    );

    this.log.info({ leadId: created.id, customerId: lead.customerId }, 'Lead created');
    return created.id;
  }

  /**
   * Follow search pages until the last one or the configured maximum
   */
  private async searchCustomers(
    operation: GatewayOperation,
    query: string
  ): Promise<CustomerCandidate[]> {
    const customers: PlatformCustomer[] = [];

    for (let page = 1; page <= this.config.maxPages; page++) {
      const body = await this.send(
        operation,
        { method: 'GET', url: '/customers', params: { q: query, page, page_size: SEARCH_PAGE_SIZE } },
        customerPageSchema
      );

      customers.push(...body.customers);

      if (body.customers.length === 0 || page >= (body.total_pages ?? 1)) break;
    }

    return customers.map(toCandidate);
  }

  private send<S extends z.ZodTypeAny>(
    operation: GatewayOperation,
    request: AxiosRequestConfig,
    schema: S
  ): Promise<z.infer<S>> {
    return this.retryHandler.executeWithRetry(
      () => this.limiter.schedule(() => this.attempt(operation, request, schema)),
      { operation },
      {
        maxRetries: this.config.maxRetries,
        baseDelay: this.retryBaseDelayMs,
        strategy: 'exponential',
        shouldRetry: (error) => isUpstreamError(error) && error.retryable,
        delayFor: (error) => (isUpstreamError(error) ? error.retryAfterMs : undefined),
      }
    );
  }

  private async attempt<S extends z.ZodTypeAny>(
    operation: GatewayOperation,
    request: AxiosRequestConfig,
    schema: S
  ): Promise<z.infer<S>> {
    let status: number;
    let data: unknown;

    try {
      const response = await this.client.request<unknown>(request);
      status = response.status;
      data = response.data;
    } catch (error) {
      throw toUpstreamError(operation, error);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? ` (${issue.path.join('.') || 'body'}: ${issue.message})` : '';
      throw new UpstreamError(operation, status, `${ERROR_MESSAGES.UNEXPECTED_RESPONSE}${where}`);
    }

    return parsed.data;
  }
}

/**
 * Build the client from application config
 */
export const createFieldServiceClient = (
  config: AppConfig,
  limiter: RateLimiter,
  options: Omit<FieldServiceClientOptions, 'leadSource'> = {}
): FieldServiceApiClient =>
  new FieldServiceApiClient(config.fieldService, limiter, {
    ...options,
    leadSource: config.lead.leadSource,
  });
