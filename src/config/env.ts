/**
 * Environment Configuration
 *
 * Reads process configuration once at startup. Entry points call
 * dotenv before loadConfig() so a local .env file is honored.
 */

import { ERROR_MESSAGES, MATCHING, PORTS } from './constants';

export interface FieldServiceApiConfig {
  apiKey: string;
  baseUrl: string;
  rateLimitDelayMs: number;
  maxRetries: number;
  timeoutMs: number;
  maxPages: number;
}

export interface LeadConfig {
  /** Lead source name; must already exist on the platform */
  leadSource: string;
  /** Employee every website lead is assigned to */
  assignedEmployeeId: string;
}

export interface DefaultsConfig {
  areaCode: string;
  state: string;
}

export interface AppConfig {
  port: number;
  fieldService: FieldServiceApiConfig;
  lead: LeadConfig;
  defaults: DefaultsConfig;
  addressMatchThreshold: number;
}

const readNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

/**
 * Build the application config from environment variables
 *
 * @param env - Variables to read, process.env unless given
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    port: readNumber(env.PORT, PORTS.WEBHOOK),
    fieldService: {
      apiKey: env.HCP_API_KEY || '',
      baseUrl: env.HCP_BASE_URL || 'https://api.housecallpro.com',
      rateLimitDelayMs: readNumber(env.API_RATE_LIMIT_DELAY_MS, 2000),
      maxRetries: readNumber(env.API_MAX_RETRIES, 3),
      timeoutMs: readNumber(env.API_TIMEOUT_MS, 30000),
      maxPages: readNumber(env.API_MAX_PAGES, 5),
    },
    lead: {
      leadSource: env.HCP_LEAD_SOURCE || 'Website',
      assignedEmployeeId: env.HCP_ASSIGNED_EMPLOYEE_ID || '',
    },
    defaults: {
      areaCode: env.DEFAULT_AREA_CODE || '415',
      state: env.DEFAULT_STATE || 'CA',
    },
    addressMatchThreshold: readNumber(env.ADDRESS_MATCH_THRESHOLD, MATCHING.ADDRESS_MATCH_THRESHOLD),
  };
};

/**
 * Check required configuration
 *
 * @returns The first problem found, or null when the config is usable
 */
export const validateConfig = (config: AppConfig): string | null => {
  if (!config.fieldService.apiKey) {
    return ERROR_MESSAGES.MISSING_API_KEY;
  }

  if (!config.fieldService.baseUrl) {
    return ERROR_MESSAGES.MISSING_BASE_URL;
  }

  return null;
};
