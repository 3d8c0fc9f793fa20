/**
 * Error classification and user-facing error formatting.
 *
 * Parser replies (clarifications, witty fallbacks) are not errors and
 * never reach this module. What does: faults thrown by the command
 * executor and invalid configuration.
 */

export const COMMAND_ERROR_FALLBACK =
  '🏴‍☠️ Ahoy! I ran into a problem with that request. Try again in a moment, matey! ⚾';

/**
 * Invalid or unreadable configuration
 */
export class ConfigError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.source = source;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  return typeof error.status === 'number' ? error.status : undefined;
}

/**
 * Map an executor fault to a chat reply. Detail stays in the logs.
 */
export function formatCommandErrorForUser(error: unknown): string {
  const status = statusOf(error);
  const msg = error instanceof Error ? error.message.toLowerCase() : '';

  // Rate limiting (429)
  if (status === 429 || msg.includes('rate limit') || msg.includes('429')) {
    return "⚾ Whoa, too many requests at once! Give me a minute and try again. 🏴‍☠️";
  }

  // Timeouts
  if (msg.includes('timeout') || msg.includes('timed out') || msg.includes('etimedout')
    || (error instanceof Error && error.name === 'AbortError')) {
    return '⚾ That took too long to look up. Try again in a moment! 🏴‍☠️';
  }

  // Upstream server errors
  if ((status !== undefined && status >= 500 && status <= 599)
    || msg.includes('502') || msg.includes('503') || msg.includes('internal server error')) {
    return "🏴‍☠️ The schedule service isn't answering right now. Try again in a few minutes! ⚾";
  }

  return COMMAND_ERROR_FALLBACK;
}
