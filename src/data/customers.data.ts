/**
 * Mock Field-Service Customers
 *
 * Seed records for the mock platform server. Phone numbers are stored the
 * way the platform returns them, formatting included.
 */

import type { PlatformCustomer } from '../types/fieldService.types';

export const seedCustomers: readonly PlatformCustomer[] = [
  {
    id: 'cus_seed_001',
    first_name: 'Sarah',
    last_name: 'Chen',
    email: 'sarah.chen@example.com',
    mobile_number: '415-555-0134',
    home_number: null,
    work_number: null,
    notifications_enabled: true,
    lead_source: 'Website',
    addresses: [
      {
        id: 'adr_seed_001',
        type: 'service',
        street: '456 Oak Avenue',
        city: 'San Francisco',
        state: 'CA',
        zip: '94115',
        country: 'US',
      },
    ],
  },
  {
    id: 'cus_seed_002',
    first_name: 'Mike',
    last_name: 'Patel',
    email: 'Mike.Patel@example.com',
    mobile_number: '(510) 555-0199',
    home_number: null,
    work_number: '510-555-0100',
    notifications_enabled: false,
    lead_source: 'Referral',
    addresses: [
      {
        id: 'adr_seed_002',
        type: 'service',
        street: '12 Harbor Rd',
        city: 'Oakland',
        state: 'CA',
        zip: '94607',
        country: 'US',
      },
      {
        id: 'adr_seed_003',
        type: 'billing',
        street: '900 Broadway',
        street_line_2: 'Suite 200',
        city: 'Oakland',
        state: 'CA',
        zip: '94612',
        country: 'US',
      },
    ],
  },
  {
    id: 'cus_seed_003',
    first_name: 'Jordan',
    last_name: 'Lee',
    email: 'jordan.lee@example.com',
    mobile_number: null,
    home_number: '+1 415 555 0177',
    work_number: null,
    notifications_enabled: false,
    lead_source: 'Phone',
    addresses: [],
  },
];
