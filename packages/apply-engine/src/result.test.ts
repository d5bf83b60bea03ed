import { describe, expect, it } from 'vitest';

import type { ExecutionResult } from './contracts.js';
import { hasErrors, summarizeResult, totalChanges } from './result.js';

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    successCount: 0,
    failureCount: 0,
    skippedCount: 0,
    errors: [],
    changesApplied: [],
    validationResults: [],
    dryRun: false,
    ...overrides,
  };
}

describe('result helpers', () => {
  it('counts every processed change', () => {
    expect(totalChanges(result({ successCount: 2, failureCount: 1, skippedCount: 3 }))).toBe(6);
  });

  it('summarizes by mode and outcome', () => {
    expect(hasErrors(result())).toBe(false);
    expect(summarizeResult(result())).toBe('Execution completed successfully.');
    expect(summarizeResult(result({ failureCount: 1 }))).toBe('Execution completed with errors.');
    expect(summarizeResult(result({ dryRun: true }))).toBe('Dry-run complete. No changes were made.');
    expect(summarizeResult(result({ dryRun: true, failureCount: 2 }))).toBe(
      'Dry-run complete with errors. No changes were made.',
    );
  });
});
