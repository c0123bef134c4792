import type { Result } from '../../../shared/types/index';
import type { Logger } from '../../../shared/logging/logger';
import type { CrisisError } from '../domain/errors/errors';
import type { CommandContext } from '../domain/aggregates/command-context';

/**
 * 変更操作の結果を記録する。確定した操作は監査ログ、拒否はdebug
 */
export function logOutcome<T>(
  logger: Logger,
  auditEnabled: boolean,
  operation: string,
  context: CommandContext,
  result: Result<T, CrisisError>,
  fields: Record<string, unknown> = {}
): Result<T, CrisisError> {
  const entry = { operation, caller: context.caller, block: context.now, ...fields };

  if (result.success) {
    if (auditEnabled) {
      logger.info(entry, `${operation} committed`);
    } else {
      logger.debug(entry, `${operation} committed`);
    }
  } else {
    logger.debug({ ...entry, code: result.error.code }, result.error.message);
  }

  return result;
}
