import logger from '../config/logger';
import { errorMessage } from '../utils/errors.util';

export type RetryStrategy = 'exponential' | 'linear' | 'fixed';

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  strategy: RetryStrategy;
  /** Errors for which this returns false are rethrown at once */
  shouldRetry?: (error: unknown) => boolean;
  /** Delay demanded by the error itself (Retry-After); overrides the strategy */
  delayFor?: (error: unknown) => number | undefined;
}

export type ErrorContext = Record<string, unknown>;

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelay: 1000,
  strategy: 'exponential',
};

export class ErrorHandlerService {
  private log = logger.child({ service: 'error-handler' });

  constructor(
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((resolve) => setTimeout(resolve, ms))
  ) {}

  /**
   * Execute a function with automatic retry logic
   *
   * Runs fn up to maxRetries + 1 times. The last error is rethrown
   * unchanged.
   */
  async executeWithRetry<T>(
    fn: () => Promise<T>,
    context: ErrorContext = {},
    customConfig: Partial<RetryConfig> = {}
  ): Promise<T> {
    const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...customConfig };
    let attempt = 0;

    for (;;) {
      try {
        const result = await fn();

        if (attempt > 0) {
          this.log.info({ attempt, ...context }, 'Operation succeeded after retry');
        }

        return result;
      } catch (error) {
        attempt++;

        const retryable = config.shouldRetry ? config.shouldRetry(error) : true;
        const willRetry = retryable && attempt <= config.maxRetries;

        this.log.warn(
          {
            attempt,
            maxRetries: config.maxRetries,
            error: errorMessage(error),
            willRetry,
            ...context,
          },
          'Operation failed'
        );

        if (!willRetry) {
          throw error;
        }

        const delay = config.delayFor?.(error) ?? this.calculateDelay(attempt, config);

        this.log.debug({ attempt, delayMs: delay, ...context }, `Retrying in ${delay}ms`);

        await this.sleep(delay);
      }
    }
  }

  /**
   * Calculate retry delay based on strategy
   */
  calculateDelay(attempt: number, config: Pick<RetryConfig, 'baseDelay' | 'strategy'>): number {
    switch (config.strategy) {
      case 'exponential':
        return config.baseDelay * Math.pow(2, attempt - 1);
      case 'linear':
        return config.baseDelay * attempt;
      case 'fixed':
      default:
        return config.baseDelay;
    }
  }
}

// Singleton instance
const errorHandler = new ErrorHandlerService();

export default errorHandler;
