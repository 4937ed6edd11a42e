import { Logger } from '@nestjs/common';
import { fail, InspectionResult } from '../../domain/types/inspection.types';

export function unexpectedFailure<T>(
  logger: Logger,
  operation: string,
  error: unknown,
): InspectionResult<T> {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(
    `${operation} raised: ${message}`,
    error instanceof Error ? error.stack : undefined,
  );
  return fail({ kind: 'Unexpected', reason: `Unexpected error: ${message}` });
}
