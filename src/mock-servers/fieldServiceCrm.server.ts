/**
 * Field-Service CRM Mock Server (Port 3005)
 *
 * Stand-in for the field-service platform REST API, for local runs and
 * client tests. Customers, addresses and leads live in memory, seeded
 * from data/customers.data.ts.
 */

import dotenv from 'dotenv';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import logger from '../config/logger';
import { ADDRESS_DEFAULTS, HTTP_STATUS, PORTS } from '../config/constants';
import { seedCustomers } from '../data/customers.data';
import { loggerFor, requestLogging } from '../middleware/requestLogger';
import type {
  PlatformAddress,
  PlatformCustomer,
  PlatformCustomerPage,
  PlatformLead,
} from '../types/fieldService.types';
import { digitsOnly } from '../utils/phoneNumber.util';

const DEFAULT_PAGE_SIZE = 10;
const MAX_PAGE_SIZE = 100;

export type MockRoute = 'searchCustomers' | 'createCustomer' | 'createAddress' | 'createLead';

interface InjectedFault {
  status: number;
  remaining: number;
  retryAfterSeconds?: number;
}

/**
 * In-memory platform records
 */
export class FieldServiceStore {
  readonly customers: PlatformCustomer[];
  readonly leads: PlatformLead[] = [];
  private faults = new Map<MockRoute, InjectedFault>();

  constructor(seed: readonly PlatformCustomer[] = seedCustomers) {
    this.customers = seed.map((customer) => structuredClone(customer));
  }

  /**
   * Customers whose phone digits contain the query digits, or whose email
   * equals the query (case-insensitive). An empty query returns everyone.
   */
  search(query: string): PlatformCustomer[] {
    const text = query.trim().toLowerCase();
    if (!text) return [...this.customers];

    if (text.includes('@')) {
      return this.customers.filter((customer) => (customer.email ?? '').trim().toLowerCase() === text);
    }

    const digits = digitsOnly(text);
    if (!digits) return [];

    return this.customers.filter((customer) =>
      [customer.mobile_number, customer.home_number, customer.work_number].some((number) =>
        digitsOnly(number ?? '').includes(digits)
      )
    );
  }

  findCustomer(customerId: string): PlatformCustomer | undefined {
    return this.customers.find((customer) => customer.id === customerId);
  }

  /**
   * Make the next `times` calls to a route fail with `status`
   */
  failNext(route: MockRoute, status: number, times = 1, retryAfterSeconds?: number): void {
    this.faults.set(route, { status, remaining: times, retryAfterSeconds });
  }

  takeFault(route: MockRoute): InjectedFault | null {
    const fault = this.faults.get(route);
    if (!fault) return null;

    fault.remaining--;
    if (fault.remaining <= 0) {
      this.faults.delete(route);
    }
    return fault;
  }
}

const optionalText = z.string().nullish();

const createCustomerSchema = z
  .object({
    first_name: optionalText,
    last_name: optionalText,
    email: optionalText,
    mobile_number: optionalText,
    home_number: optionalText,
    work_number: optionalText,
    notifications_enabled: z.boolean().optional(),
    lead_source: optionalText,
  })
  .refine(
    (body) => Boolean(body.first_name || body.last_name || body.email || body.mobile_number),
    { message: 'one of first_name, last_name, email or mobile_number is required' }
  );

const createAddressSchema = z.object({
  type: z.string().optional(),
  street: z.string().min(1, 'street is required'),
  street_line_2: optionalText,
  city: optionalText,
  state: optionalText,
  zip: optionalText,
  country: optionalText,
});

const createLeadSchema = z.object({
  customer_id: z.string().min(1, 'customer_id is required'),
  address_id: optionalText,
  assigned_employee_id: optionalText,
  lead_source: optionalText,
  job_type: optionalText,
  line_items: z
    .array(
      z.object({
        name: z.string(),
        description: z.string().optional(),
        kind: z.string(),
        quantity: z.number(),
        unit_price: z.number(),
      })
    )
    .default([]),
  note: optionalText,
});

const readPositiveInt = (value: unknown, fallback: number): number => {
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const firstIssue = (error: z.ZodError): string => error.errors[0]?.message ?? 'invalid body';

export interface MockServerOptions {
  store?: FieldServiceStore;
  /** Bearer token to require; any non-empty token when omitted */
  apiKey?: string;
}

export const createFieldServiceMockApp = (options: MockServerOptions = {}): Express => {
  const store = options.store ?? new FieldServiceStore();
  const app = express();

  // Middleware
  app.use(helmet()); // Security headers
  app.use(cors()); // Enable CORS for all origins
  app.use(express.json()); // Parse JSON request bodies
  app.use(requestLogging('field-service-crm'));

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({ status: 'healthy', service: 'field-service-crm' });
  });

  // Everything below needs a bearer token
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.header('authorization') ?? '';
    const token = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';

    if (!token || (options.apiKey !== undefined && token !== options.apiKey)) {
      loggerFor(res).warn('Rejected request without a valid bearer token');
      res.status(HTTP_STATUS.UNAUTHORIZED).json({ error: 'unauthorized' });
      return;
    }

    next();
  });

  const injectFault = (route: MockRoute, res: Response): boolean => {
    const fault = store.takeFault(route);
    if (!fault) return false;

    if (fault.retryAfterSeconds !== undefined) {
      res.setHeader('Retry-After', String(fault.retryAfterSeconds));
    }
    res.status(fault.status).json({ error: `injected failure for ${route}` });
    return true;
  };

  /**
   * GET /customers?q=&page=&page_size=
   */
  app.get('/customers', (req: Request, res: Response) => {
    if (injectFault('searchCustomers', res)) return;

    const query = typeof req.query.q === 'string' ? req.query.q : '';
    const page = readPositiveInt(req.query.page, 1);
    const pageSize = Math.min(readPositiveInt(req.query.page_size, DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE);

    const matches = store.search(query);
    const start = (page - 1) * pageSize;
    const body: PlatformCustomerPage = {
      customers: matches.slice(start, start + pageSize),
      page,
      page_size: pageSize,
      total_pages: Math.max(1, Math.ceil(matches.length / pageSize)),
      total_items: matches.length,
    };

    loggerFor(res).debug({ total: matches.length, page }, 'Customer search');
    res.status(HTTP_STATUS.OK).json(body);
  });

  /**
   * POST /customers
   */
  app.post('/customers', (req: Request, res: Response) => {
    if (injectFault('createCustomer', res)) return;

    const parsed = createCustomerSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(HTTP_STATUS.BAD_REQUEST).json({ error: firstIssue(parsed.error) });
      return;
    }

    const customer: PlatformCustomer = {
      id: `cus_${uuidv4()}`,
      ...parsed.data,
      addresses: [],
    };
    store.customers.push(customer);

    loggerFor(res).info({ customerId: customer.id }, 'Customer created');
    res.status(HTTP_STATUS.CREATED).json(customer);
  });

  /**
   * POST /customers/:customerId/addresses
   */
  app.post('/customers/:customerId/addresses', (req: Request, res: Response) => {
    if (injectFault('createAddress', res)) return;

    const customer = store.findCustomer(req.params.customerId);
    if (!customer) {
      res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'customer not found' });
      return;
    }

    const parsed = createAddressSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(HTTP_STATUS.BAD_REQUEST).json({ error: firstIssue(parsed.error) });
      return;
    }

    const address: PlatformAddress = {
      id: `adr_${uuidv4()}`,
      ...parsed.data,
      type: parsed.data.type ?? ADDRESS_DEFAULTS.ADDRESS_TYPE,
    };
    customer.addresses = [...(customer.addresses ?? []), address];

    loggerFor(res).info({ customerId: customer.id, addressId: address.id }, 'Address created');
    res.status(HTTP_STATUS.CREATED).json(address);
  });

  /**
   * POST /leads
   */
  app.post('/leads', (req: Request, res: Response) => {
    if (injectFault('createLead', res)) return;

    const parsed = createLeadSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(HTTP_STATUS.BAD_REQUEST).json({ error: firstIssue(parsed.error) });
      return;
    }

    const customer = store.findCustomer(parsed.data.customer_id);
    if (!customer) {
      res.status(HTTP_STATUS.UNPROCESSABLE_ENTITY).json({ error: 'customer_id does not exist' });
      return;
    }

    const addressId = parsed.data.address_id;
    if (addressId && !(customer.addresses ?? []).some((address) => address.id === addressId)) {
      res.status(HTTP_STATUS.UNPROCESSABLE_ENTITY).json({ error: 'address_id does not belong to customer' });
      return;
    }

    const lead: PlatformLead = {
      id: `lead_${uuidv4()}`,
      ...parsed.data,
      created_at: new Date().toISOString(),
    };
    store.leads.push(lead);

    loggerFor(res).info({ leadId: lead.id, customerId: customer.id }, 'Lead created');
    res.status(HTTP_STATUS.CREATED).json(lead);
  });

  /**
   * GET /leads
   *
   * All leads (for debugging/testing purposes)
   */
  app.get('/leads', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({ count: store.leads.length, leads: store.leads });
  });

  app.use((_req: Request, res: Response) => {
    res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'not found' });
  });

  return app;
};

/**
 * Start the server
 */
const startServer = () => {
  dotenv.config(); // Load environment variables from .env file

  const store = new FieldServiceStore();
  const app = createFieldServiceMockApp({ store, apiKey: process.env.HCP_API_KEY || undefined });

  app.listen(PORTS.MOCK_FIELD_SERVICE_CRM, () => {
    logger.info(
      {
        port: PORTS.MOCK_FIELD_SERVICE_CRM,
        service: 'field-service-crm',
        customersCount: store.customers.length,
      },
      `Field-service CRM mock started on port ${PORTS.MOCK_FIELD_SERVICE_CRM} with ${store.customers.length} customers`
    );
  });
};

// Start the server if this file is run directly
if (require.main === module) {
  startServer();
}
