/**
 * Website Lead Webhook Server (Port 8080)
 *
 * Receives website form submissions and turns each one into a lead on the
 * field-service platform through the LeadOrchestrator.
 */

import dotenv from 'dotenv';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Server } from 'http';
import logger from '../config/logger';
import { ERROR_MESSAGES, HTTP_STATUS, SERVICE_INFO } from '../config/constants';
import { loadConfig, validateConfig } from '../config/env';
import { loggerFor, requestLogging } from '../middleware/requestLogger';
import { validateSubmission } from '../middleware/validateSubmission';
import { createFieldServiceClient } from '../services/fieldServiceApi.service';
import { LeadOrchestrator } from '../services/leadOrchestrator.service';
import { RateLimiter } from '../services/rateLimiter.service';
import type { FormSubmission } from '../types/form.types';
import type { LeadFailure, LeadOutcome } from '../types/lead.types';
import { errorMessage } from '../utils/errors.util';

export const AVAILABLE_ENDPOINTS = ['/', '/health', '/webhook', '/test'] as const;

export interface WebhookAppOptions {
  orchestrator: Pick<LeadOrchestrator, 'process'>;
  /** Current configuration problem, null when the service is usable */
  checkConfig: () => string | null;
}

const FAILURE_STATUS: Record<LeadFailure['errorKind'], number> = {
  validation: HTTP_STATUS.BAD_REQUEST,
  upstream: HTTP_STATUS.BAD_GATEWAY,
  internal: HTTP_STATUS.INTERNAL_SERVER_ERROR,
};

/**
 * Webhook response body for an outcome
 */
export const toWebhookResponse = (outcome: LeadOutcome): { status: number; body: object } => {
  if (outcome.status === 'done') {
    return {
      status: HTTP_STATUS.OK,
      body: {
        success: true,
        message: 'Lead created successfully',
        customer_id: outcome.customerId,
        lead_id: outcome.leadId,
        address_id: outcome.addressId,
        match_type: outcome.matchType,
        warnings: outcome.warnings,
      },
    };
  }

  return {
    status: FAILURE_STATUS[outcome.errorKind],
    body: {
      success: false,
      stage: outcome.stage,
      step: outcome.step ?? null,
      error: outcome.message,
      created: {
        customer_id: outcome.created.customerId ?? null,
        address_id: outcome.created.addressId ?? null,
      },
      warnings: outcome.warnings,
    },
  };
};

const statusOf = (error: unknown): number | undefined =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : undefined;

export const createWebhookApp = ({ orchestrator, checkConfig }: WebhookAppOptions): Express => {
  const app = express();

  // Middleware
  app.use(helmet()); // Security headers
  app.use(cors()); // Enable CORS for all origins
  app.use(requestLogging('lead-webhook'));
  app.use(express.json({ limit: '1mb' })); // Parse JSON request bodies

  /**
   * GET /
   *
   * Service banner
   */
  app.get('/', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      service: SERVICE_INFO.NAME,
      status: 'running',
      version: SERVICE_INFO.VERSION,
    });
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (_req: Request, res: Response) => {
    const configError = checkConfig();

    if (configError) {
      loggerFor(res).error({ error: configError }, 'Configuration error');
      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ status: 'unhealthy', error: configError });
      return;
    }

    res.status(HTTP_STATUS.OK).json({ status: 'healthy' });
  });

  /**
   * POST /webhook
   *
   * Form builder webhook. 200 with the created ids, or 400 / 502 / 500
   * naming the failed stage and any records already created.
   */
  app.post('/webhook', validateSubmission, async (req: Request, res: Response, next: NextFunction) => {
    const requestLogger = loggerFor(res);
    const submission: FormSubmission = req.body;

    try {
      const outcome = await orchestrator.process(submission, requestLogger);
      const { status, body } = toWebhookResponse(outcome);

      requestLogger.info({ status, outcome: outcome.status }, 'Webhook handled');
      res.status(status).json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /test
   *
   * Manual testing; same processing, always 200 with the full outcome
   */
  app.post('/test', validateSubmission, async (req: Request, res: Response, next: NextFunction) => {
    const submission: FormSubmission = req.body;

    try {
      const outcome = await orchestrator.process(submission, loggerFor(res));
      res.status(HTTP_STATUS.OK).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(HTTP_STATUS.NOT_FOUND).json({
      error: ERROR_MESSAGES.ROUTE_NOT_FOUND,
      available_endpoints: AVAILABLE_ENDPOINTS,
    });
  });

  /**
   * Error handling middleware
   * Malformed JSON is a 400; anything else a 500
   */
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestLogger = loggerFor(res);

    if (statusOf(err) === HTTP_STATUS.BAD_REQUEST) {
      requestLogger.warn({ error: errorMessage(err) }, 'Unreadable request body');
      res.status(HTTP_STATUS.BAD_REQUEST).json({
        success: false,
        error: ERROR_MESSAGES.INVALID_PAYLOAD,
        details: [{ field: 'body', message: errorMessage(err) }],
      });
      return;
    }

    requestLogger.error({ err }, 'Unhandled error in webhook server');
    res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({
      success: false,
      error: ERROR_MESSAGES.INTERNAL,
    });
  });

  return app;
};

/**
 * Start the server
 */
export const startServer = (): Server => {
  dotenv.config(); // Load environment variables from .env file

  const config = loadConfig();
  const configError = validateConfig(config);
  if (configError) {
    logger.fatal({ error: configError }, 'Configuration error');
    process.exit(1);
  }

  const limiter = new RateLimiter(config.fieldService.rateLimitDelayMs);
  const orchestrator = new LeadOrchestrator(createFieldServiceClient(config, limiter), {
    employeeId: config.lead.assignedEmployeeId,
    leadSource: config.lead.leadSource,
    defaultAreaCode: config.defaults.areaCode,
    defaultState: config.defaults.state,
    addressMatchThreshold: config.addressMatchThreshold,
  });

  const app = createWebhookApp({ orchestrator, checkConfig: () => validateConfig(config) });

  return app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        service: 'lead-webhook',
        baseUrl: config.fieldService.baseUrl,
        rateLimitDelayMs: config.fieldService.rateLimitDelayMs,
      },
      `${SERVICE_INFO.NAME} started on port ${config.port}`
    );
  });
};

// Start the server if this file is run directly
if (require.main === module) {
  startServer();
}
