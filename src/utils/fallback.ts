/**
 * Fallback Utility
 * Ordered fallible providers, first success wins
 */

import { FallbackExhaustedError } from './errors';
import { AppLogger, LogContext, errorMessage, logger as defaultLogger } from './logger';

export interface FallbackProvider<T> {
  name: string;
  /** Resolve a value, or null when this source has nothing to offer */
  attempt: () => Promise<T | null>;
}

export interface FallbackOptions {
  /** What is being resolved, for log and error messages */
  what: string;
  logger?: AppLogger;
  context?: LogContext;
}

/**
 * Try each provider in order. A thrown error is logged as a warning and the
 * next provider runs; a null result moves on silently.
 */
export async function resolveWithFallbacks<T>(
  providers: FallbackProvider<T>[],
  options: FallbackOptions
): Promise<{ value: T; provider: string }> {
  const { what, logger = defaultLogger, context } = options;
  const attempted: string[] = [];

  for (const provider of providers) {
    attempted.push(provider.name);
    try {
      const value = await provider.attempt();
      if (value !== null) {
        return { value, provider: provider.name };
      }
      logger.debug('Fallback provider had no value', { what, provider: provider.name, ...context });
    } catch (error) {
      logger.warn('Fallback provider failed', {
        what,
        provider: provider.name,
        error: errorMessage(error),
        ...context,
      });
    }
  }

  throw new FallbackExhaustedError(what, attempted);
}
