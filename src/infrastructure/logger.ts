import pino from 'pino';

export const logger = pino({
  name: 'extraction-review',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createRunLogger(runId: string, caseId?: string) {
  return logger.child({
    runId,
    ...(caseId !== undefined && { caseId }),
  });
}
