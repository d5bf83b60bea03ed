import type { ExecutionResult } from './contracts.js';

export function hasErrors(result: ExecutionResult): boolean {
  return result.failureCount > 0;
}

export function totalChanges(result: ExecutionResult): number {
  return result.successCount + result.failureCount + result.skippedCount;
}

export function summarizeResult(result: ExecutionResult): string {
  if (result.dryRun) {
    return hasErrors(result)
      ? 'Dry-run complete with errors. No changes were made.'
      : 'Dry-run complete. No changes were made.';
  }
  return hasErrors(result) ? 'Execution completed with errors.' : 'Execution completed successfully.';
}
