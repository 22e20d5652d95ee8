import type { PipelineResult } from '../types.js';
import { PipelineError } from '../types.js';
import type { Logger } from '../logger.js';

export const ExitCode = {
  SUCCESS: 0,
  FATAL: 1,
  PARTIAL: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(result: PipelineResult): ExitCode {
  if (result.cancelled) return ExitCode.FATAL;
  return result.failures.length > 0 ? ExitCode.PARTIAL : ExitCode.SUCCESS;
}

function summarize(result: PipelineResult): Record<string, unknown> {
  return {
    recordsFetched: result.recordsFetched,
    pagesFetched: result.pagesFetched,
    batchesSealed: result.batchesSealed,
    batchesUploaded: result.batchesUploaded,
    rowsWritten: result.rowsWritten,
    batchesFailed: result.failures.length,
    recordsNotUploaded: result.failures.reduce((sum, f) => sum + f.recordCount, 0),
    lastCursor: result.lastCursor,
    durationMs: result.durationMs,
  };
}

export function reportResult(result: PipelineResult, logger: Logger): ExitCode {
  for (const failure of result.failures) {
    logger.error(
      { batchId: failure.batchId, recordCount: failure.recordCount, reason: failure.error.message },
      'Batch not uploaded',
    );
  }

  const code = exitCodeFor(result);
  if (code === ExitCode.SUCCESS) {
    logger.info(summarize(result), 'Ingestion complete');
  } else if (result.cancelled) {
    logger.warn(summarize(result), 'Ingestion cancelled');
  } else {
    logger.warn(summarize(result), 'Ingestion completed with failed batches');
  }
  return code;
}

export function reportFailure(err: unknown, logger: Logger): ExitCode {
  if (err instanceof PipelineError) {
    reportResult(err.result, logger);
    logger.fatal({ err: err.cause }, err.message);
  } else {
    logger.fatal({ err }, 'Fatal error');
  }
  return ExitCode.FATAL;
}
