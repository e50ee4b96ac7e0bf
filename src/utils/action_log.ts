import type { Result } from 'neverthrow';
import { createChildLogger } from './logger';

type LoggableError = Error & { kind?: string };

/**
 * Logs start, success and failure of a ledger command. Failures carry the
 * error kind; the Result itself passes through untouched.
 */
export async function withActionLog<T, E extends LoggableError>(
  action: string,
  context: Record<string, unknown>,
  fn: () => Promise<Result<T, E>>
): Promise<Result<T, E>> {
  const logger = createChildLogger('action', { action });
  const startedAt = Date.now();
  logger.info(context, 'Action started');

  let result: Result<T, E>;
  try {
    result = await fn();
  } catch (error) {
    logger.error({ ...context, error }, 'Action threw');
    throw error;
  }
  const durationMs = Date.now() - startedAt;

  if (result.isOk()) {
    logger.info({ ...context, durationMs }, 'Action succeeded');
  } else {
    logger.warn(
      { ...context, durationMs, kind: result.error.kind ?? result.error.name, error: result.error.message },
      'Action failed'
    );
  }
  return result;
}
