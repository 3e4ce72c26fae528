/**
 * Lead Assembler Service
 *
 * Maps "Service Needed" to a job type and "Service Details" to line items
 * through the static tables in data/serviceMappings.data.ts, and writes the
 * private audit note. Unrecognized values are never dropped: they fall back
 * to a generic job type / line item and produce a warning.
 */

import logger from '../config/logger';
import { LINE_ITEM_DEFAULTS } from '../config/constants';
import {
  DEFAULT_JOB_TYPE,
  FALLBACK_LINE_ITEM,
  SERVICE_DETAIL_LINE_ITEMS,
  SERVICE_NEEDED_JOB_TYPES,
} from '../data/serviceMappings.data';
import type { MatchField, MatchResult } from '../types/customer.types';
import type { FormField, SubmittedForm } from '../types/form.types';
import type { LineItem } from '../types/lead.types';
import { formatFieldValue } from './formParser.service';

const log = logger.child({ service: 'lead-assembler' });

export interface AssembledLead {
  jobType: string;
  lineItems: LineItem[];
  /** One warning per unmapped service value */
  warnings: string[];
}

const toLookupKey = (value: string): string => value.trim().toLowerCase();

const caseInsensitive = (table: ReadonlyMap<string, string>): ReadonlyMap<string, string> =>
  new Map([...table].map(([key, value]) => [toLookupKey(key), value]));

const JOB_TYPES = caseInsensitive(SERVICE_NEEDED_JOB_TYPES);
const LINE_ITEMS = caseInsensitive(SERVICE_DETAIL_LINE_ITEMS);

export const unmappedServiceWarning = (value: string, field: string, fallback: string): string =>
  `unmapped service value "${value}" in ${field}; used "${fallback}"`;

/**
 * Job type for the "Service Needed" answer
 *
 * A missing answer uses the default silently; an unrecognized one warns.
 */
export const mapJobType = (serviceNeeded: string | undefined): { jobType: string; warning?: string } => {
  if (!serviceNeeded || !serviceNeeded.trim()) {
    return { jobType: DEFAULT_JOB_TYPE };
  }

  const jobType = JOB_TYPES.get(toLookupKey(serviceNeeded));
  if (jobType) {
    return { jobType };
  }

  log.warn({ serviceNeeded }, 'No job type mapping for service needed');
  return {
    jobType: DEFAULT_JOB_TYPE,
    warning: unmappedServiceWarning(serviceNeeded, 'Service Needed', DEFAULT_JOB_TYPE),
  };
};

/**
 * One quote-only line item per selected service detail
 *
 * The request details text is attached to the first line item.
 */
export const buildLineItems = (
  serviceDetails: readonly string[],
  requestDetails?: string
): { lineItems: LineItem[]; warnings: string[] } => {
  const warnings: string[] = [];

  const lineItems = serviceDetails.map((serviceDetail, index): LineItem => {
    const mapped = LINE_ITEMS.get(toLookupKey(serviceDetail));
    const notes: string[] = [];

    if (!mapped) {
      log.warn({ serviceDetail }, 'No line item mapping for service detail');
      warnings.push(unmappedServiceWarning(serviceDetail, 'Service Details', FALLBACK_LINE_ITEM));
      notes.push(`Requested service: ${serviceDetail}`);
    }
    if (index === 0 && requestDetails) {
      notes.push(requestDetails);
    }

    return {
      description: mapped ?? FALLBACK_LINE_ITEM,
      ...(notes.length > 0 ? { details: notes.join('\n') } : {}),
      quantity: LINE_ITEM_DEFAULTS.QUANTITY,
      unitPrice: LINE_ITEM_DEFAULTS.UNIT_PRICE,
    };
  });

  return { lineItems, warnings };
};

/**
 * Job type and line items for a submission
 */
export const assembleLead = (form: SubmittedForm): AssembledLead => {
  const { jobType, warning } = mapJobType(form.serviceNeeded);
  const { lineItems, warnings } = buildLineItems(form.serviceDetails, form.requestDetails);

  return {
    jobType,
    lineItems,
    warnings: warning ? [warning, ...warnings] : warnings,
  };
};

const MATCH_FIELD_ORDER: readonly MatchField[] = ['phone', 'email'];

/**
 * Private audit note
 *
 * Example:
 * === Website Form Submission ===
 * First Name: Sarah
 * Service Details: Water Heater, Drain Snaking
 *
 * === Customer Match ===
 * Match Type: partial (phone)
 * Matched Customer: cus_123
 *
 * === Warnings ===
 * - unmapped service value "Drain Snaking" in Service Details; used "General Service Request"
 */
export const buildPrivateNote = (
  rawFields: readonly FormField[],
  match: MatchResult,
  warnings: readonly string[]
): string => {
  const lines = ['=== Website Form Submission ==='];

  for (const field of rawFields) {
    lines.push(`${field.fieldName.trim()}: ${formatFieldValue(field.fieldValue)}`);
  }

  const matchedOn = MATCH_FIELD_ORDER.filter((field) => match.matchedOn.has(field));
  lines.push('', '=== Customer Match ===');
  lines.push(
    matchedOn.length > 0
      ? `Match Type: ${match.classification} (${matchedOn.join(', ')})`
      : `Match Type: ${match.classification}`
  );
  if (match.classification !== 'none') {
    lines.push(`Matched Customer: ${match.matchedCustomerId}`);
  }

  if (warnings.length > 0) {
    lines.push('', '=== Warnings ===');
    for (const warning of warnings) {
      lines.push(`- ${warning}`);
    }
  }

  return lines.join('\n');
};
