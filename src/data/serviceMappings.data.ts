/**
 * Service Mapping Tables
 *
 * Form choices mapped to the names configured on the field-service platform.
 * Keys are the option labels of the website form; lookups are trimmed and
 * case-insensitive.
 */

/** "Service Details" option -> line item (platform service name) */
export const SERVICE_DETAIL_LINE_ITEMS: ReadonlyMap<string, string> = new Map([
  ['Toilets or Bidets', 'Toilet Repair & Replacement'],
  ['Garbage Disposal', 'Garbage Disposal Service'],
  ['Plumbing Fixtures', 'Faucet & Fixture Service'],
  ['Water Heater', 'Water Heater Service'],
  ['Boilers / Combi-Boilers', 'Boiler & Hydronics Service'],
  ['Steam / Sauna', 'Steam & Sauna Service'],
  ['Other Plumbing', 'Other Plumbing Service'],
  ['Other Heating & HVAC', 'Other Heating Service'],
]);

/** "Service Needed" option -> platform job type */
export const SERVICE_NEEDED_JOB_TYPES: ReadonlyMap<string, string> = new Map([
  ['New Installation', 'Plumbing Installation'],
  ['Service or Repair', 'Plumbing Demand Maintenance'],
  ['Renovation or Remodel', 'Plumbing Estimate'],
]);

/** Job type used when "Service Needed" is missing or unrecognized */
export const DEFAULT_JOB_TYPE = 'Plumbing Demand Maintenance';

/** Line item used for an unrecognized "Service Details" value */
export const FALLBACK_LINE_ITEM = 'General Service Request';
