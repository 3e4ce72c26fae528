/**
 * Lead Type Definitions
 *
 * Types for the lead assembled from a submission and the outcome reported
 * back to the webhook caller.
 */

import type { MatchClassification } from './customer.types';

/**
 * LineItem - Quote-only line on a lead; staff fill in the price later
 */
export interface LineItem {
  /** Service name shown on the lead */
  description: string;

  /** Request details or the raw unmapped service value */
  details?: string;

  quantity: number;
  unitPrice: number;
}

/**
 * LeadRequest - Everything needed to create a lead on the platform
 */
export interface LeadRequest {
  customerId: string;

  /** Service address; null when the form carried no address */
  addressId: string | null;

  /** Fixed employee every website lead is assigned to */
  employeeId: string;

  /** Fixed lead source (e.g. "Website") */
  leadSource: string;

  jobType: string;
  lineItems: LineItem[];

  /** Private audit note with every submitted field and all warnings */
  privateNote: string;
}

/** Pipeline states; failed is reachable from every step */
export type PipelineStage =
  | 'normalizing'
  | 'matching'
  | 'resolvingAddress'
  | 'assembling'
  | 'creating'
  | 'done'
  | 'failed';

/** Gateway operations, used to name the failing step */
export type GatewayOperation =
  | 'findCustomersByPhone'
  | 'findCustomersByEmail'
  | 'createCustomer'
  | 'createAddress'
  | 'createLead';

/**
 * LeadSuccess - Submission turned into a lead
 */
export interface LeadSuccess {
  status: 'done';
  customerId: string;
  addressId: string | null;
  leadId: string;
  matchType: MatchClassification;

  /** True when this submission created the customer */
  customerCreated: boolean;

  /** True when this submission created the address */
  addressCreated: boolean;

  warnings: string[];
}

/** Records already created on the platform when a submission failed */
export interface CreatedArtifacts {
  customerId?: string;
  addressId?: string;
}

/**
 * LeadFailure - Submission aborted
 *
 * Names the stage, the failing platform call (if any) and everything
 * already created upstream. Nothing is rolled back.
 */
export interface LeadFailure {
  status: 'failed';

  /** Stage the pipeline was in when it failed */
  stage: Exclude<PipelineStage, 'done' | 'failed'>;

  errorKind: 'validation' | 'upstream' | 'internal';

  /** Failing platform call, for upstream failures */
  step?: GatewayOperation;

  /** Platform HTTP status, null for network failures */
  statusCode?: number | null;

  message: string;
  created: CreatedArtifacts;
  warnings: string[];
}

export type LeadOutcome = LeadSuccess | LeadFailure;
