/**
 * Webhook Submission Script
 *
 * Sends a sample form submission to a running webhook server and, when the
 * mock CRM is running, lists the leads it holds afterwards:
 * 1. POST the submission to /webhook
 * 2. Print the created ids and warnings
 * 3. GET /leads from the mock CRM
 *
 * Usage: start both servers (npm run start:mock-crm, npm start with
 * HCP_BASE_URL=http://localhost:3005), then run this script.
 */

import dotenv from 'dotenv';
dotenv.config();

import axios from 'axios';
import { PORTS } from '../src/config/constants';
import type { FormField } from '../src/types/form.types';
import type { PlatformLead } from '../src/types/fieldService.types';

const WEBHOOK_URL = process.env.WEBHOOK_URL || `http://localhost:${PORTS.WEBHOOK}`;
const CRM_URL = process.env.HCP_BASE_URL || `http://localhost:${PORTS.MOCK_FIELD_SERVICE_CRM}`;
const API_KEY = process.env.HCP_API_KEY || 'test-api-key';

interface WebhookReply {
  success: boolean;
  customer_id?: string;
  lead_id?: string;
  address_id?: string | null;
  match_type?: string;
  stage?: string;
  step?: string | null;
  error?: string;
  warnings?: string[];
}

const submission: FormField[] = [
  { fieldName: 'First Name', fieldValue: 'Sarah' },
  { fieldName: 'Last Name', fieldValue: 'Chen' },
  { fieldName: 'Email', fieldValue: 'sarah.chen@example.com' },
  { fieldName: 'Phone', fieldValue: '(415) 555-0134' },
  { fieldName: 'Street Address', fieldValue: '456 Oak Ave' },
  { fieldName: 'City', fieldValue: 'San Francisco' },
  { fieldName: 'State', fieldValue: 'CA' },
  { fieldName: 'Postal / Zip Code', fieldValue: '94115' },
  { fieldName: 'Are you a new or existing customer?', fieldValue: 'Existing Customer' },
  { fieldName: 'Service Needed', fieldValue: 'Service or Repair' },
  { fieldName: 'Service Details', fieldValue: ['Water Heater', 'Drain Snaking'] },
  { fieldName: 'Service Request Details', fieldValue: 'No hot water since Tuesday.' },
  { fieldName: 'SMS Consent', fieldValue: true },
];

async function sendTestSubmission() {
  console.log('\n=== Website Lead Webhook Test ===\n');

  try {
    console.log(`Step 1: Posting ${submission.length} fields to ${WEBHOOK_URL}/webhook...`);
    const response = await axios.post<WebhookReply>(`${WEBHOOK_URL}/webhook`, submission, {
      validateStatus: () => true,
    });
    const reply = response.data;

    console.log(`  Response status: ${response.status}`);
    if (reply.success) {
      console.log(`✓ Lead created`);
      console.log(`  Customer ID: ${reply.customer_id}`);
      console.log(`  Address ID: ${reply.address_id}`);
      console.log(`  Lead ID: ${reply.lead_id}`);
      console.log(`  Match Type: ${reply.match_type}`);
    } else {
      console.log(`✗ Submission failed at ${reply.stage} (${reply.step ?? 'no platform call'})`);
      console.log(`  Error: ${reply.error}`);
    }
    for (const warning of reply.warnings ?? []) {
      console.log(`  ⚠️  ${warning}`);
    }
    console.log('');

    console.log(`Step 2: Listing leads on ${CRM_URL}...`);
    const leads = await axios.get<{ count: number; leads: PlatformLead[] }>(`${CRM_URL}/leads`, {
      headers: { Authorization: `Bearer ${API_KEY}` },
    });

    console.log(`✓ ${leads.data.count} lead(s) on the mock CRM`);
    for (const lead of leads.data.leads) {
      console.log(`  ${lead.id}: ${lead.job_type} for ${lead.customer_id} (${lead.line_items.length} line items)`);
    }
    console.log('');
  } catch (error) {
    console.error('✗ Test failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

sendTestSubmission().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
