import { Logger } from '@nestjs/common';

export function reportBootstrapFailure(error: unknown, logger = new Logger('Bootstrap')): void {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
}
