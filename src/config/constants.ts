/**
 * Application Constants
 *
 * Ports, HTTP status codes, messages and matching constants used
 * throughout the service.
 */

// Server Ports
export const PORTS = {
  WEBHOOK: 8080, // Form webhook listener
  MOCK_FIELD_SERVICE_CRM: 3005, // Local stand-in for the field-service platform
} as const;

// Service identity reported on GET /
export const SERVICE_INFO = {
  NAME: 'Website Lead Intake',
  VERSION: '1.0.0',
} as const;

// Customer matching / address resolution
export const MATCHING = {
  ADDRESS_MATCH_THRESHOLD: 0.8,
  // Field weights for address similarity; zip is most distinctive
  ADDRESS_FIELD_WEIGHTS: {
    street: 0.3,
    city: 0.2,
    state: 0.1,
    zip: 0.4,
  },
} as const;

// Defaults applied to submitted addresses
export const ADDRESS_DEFAULTS = {
  COUNTRY: 'US',
  ADDRESS_TYPE: 'service',
} as const;

// Line items are quote-only; staff price them later
export const LINE_ITEM_DEFAULTS = {
  QUANTITY: 1,
  UNIT_PRICE: 0,
  KIND: 'labor',
} as const;

// Error Messages
export const ERROR_MESSAGES = {
  INVALID_PHONE: 'invalid phone',
  EMPTY_PAYLOAD: 'Empty payload',
  INVALID_PAYLOAD: 'Validation failed',
  MISSING_API_KEY: 'HCP_API_KEY is required',
  MISSING_BASE_URL: 'HCP_BASE_URL is required',
  UNEXPECTED_RESPONSE: 'Unexpected response shape from field-service API',
  ROUTE_NOT_FOUND: 'Endpoint not found',
  INTERNAL: 'Internal server error',
} as const;

// HTTP Status Codes (for clarity in code)
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
} as const;
