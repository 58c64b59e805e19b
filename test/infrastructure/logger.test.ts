import { describe, it, expect } from 'vitest';
import { logger, createRunLogger } from '../../src/infrastructure/logger.js';

describe('logger', () => {
  it('has service name configured', () => {
    expect(logger.bindings().name).toBe('extraction-review');
  });
});

describe('createRunLogger', () => {
  it('creates child logger with runId', () => {
    const child = createRunLogger('run-123');
    expect(child.bindings().runId).toBe('run-123');
  });

  it('includes caseId when provided', () => {
    const bindings = createRunLogger('run-123', 'case-42').bindings();
    expect(bindings.runId).toBe('run-123');
    expect(bindings.caseId).toBe('case-42');
  });

  it('omits caseId when not provided', () => {
    expect(createRunLogger('run-123').bindings().caseId).toBeUndefined();
  });
});
