import pino, { type Logger } from 'pino';

/**
 * Logger Configuration
 *
 * Pino logger shared by the webhook server, the lead pipeline and the
 * mock CRM server.
 *
 * Log Levels:
 * - debug: Payload shapes, per-candidate scores, outgoing API requests
 * - info: Pipeline transitions and created records
 * - warn: Partial matches, unmapped service values, retries
 * - error: Failed API calls and aborted submissions
 */

// Pretty output for local runs only; tests and production get plain JSON
const usePrettyOutput = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: usePrettyOutput
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/**
 * Create a child logger with additional context
 *
 * @param context - Fields included in every line from the child logger
 *
 * Example:
 * const requestLogger = createChildLogger({ requestId: 'req-1' });
 * requestLogger.info('Processing submission');
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
  return logger.child(context);
};

export type { Logger };

export default logger;
