/**
 * Field-Service Platform Type Definitions
 *
 * The gateway contract the lead pipeline depends on, and the wire shapes
 * of the platform REST API (snake_case, as the platform sends them).
 */

import type { AddressFields, Contact, CustomerCandidate } from './customer.types';
import type { LeadRequest } from './lead.types';

/**
 * FieldServiceGateway - Platform operations used by the lead pipeline
 *
 * Every operation rejects with UpstreamError on a non-success response.
 */
export interface FieldServiceGateway {
  findCustomersByPhone(phone: string): Promise<CustomerCandidate[]>;
  findCustomersByEmail(email: string): Promise<CustomerCandidate[]>;

  /** @returns id of the new customer */
  createCustomer(contact: Contact): Promise<string>;

  /** @returns id of the new service address */
  createAddress(customerId: string, address: AddressFields): Promise<string>;

  /** @returns id of the new lead */
  createLead(lead: LeadRequest): Promise<string>;
}

export interface PlatformAddress {
  id: string;
  type?: string | null;
  street?: string | null;
  street_line_2?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
  country?: string | null;
}

export interface PlatformCustomer {
  id: string;
  first_name?: string | null;
  last_name?: string | null;
  email?: string | null;
  mobile_number?: string | null;
  home_number?: string | null;
  work_number?: string | null;
  notifications_enabled?: boolean;
  lead_source?: string | null;
  addresses?: PlatformAddress[];
}

export interface PlatformCustomerPage {
  customers: PlatformCustomer[];
  page?: number;
  page_size?: number;
  total_pages?: number;
  total_items?: number;
}

export interface PlatformLineItem {
  name: string;
  description?: string;
  kind: string;
  quantity: number;
  unit_price: number;
}

export interface PlatformLead {
  id: string;
  customer_id: string;
  address_id?: string | null;
  assigned_employee_id?: string | null;
  lead_source?: string | null;
  job_type?: string | null;
  line_items: PlatformLineItem[];
  note?: string | null;
  created_at?: string;
}

export interface CreateCustomerBody {
  first_name: string;
  last_name: string;
  email: string;
  mobile_number: string;
  notifications_enabled: boolean;
  lead_source?: string;
}

export interface CreateAddressBody {
  type: string;
  street: string;
  street_line_2?: string;
  city: string;
  state: string;
  zip: string;
  country: string;
}

export interface CreateLeadBody {
  customer_id: string;
  address_id?: string;
  assigned_employee_id?: string;
  lead_source?: string;
  job_type: string;
  line_items: PlatformLineItem[];
  note: string;
}
