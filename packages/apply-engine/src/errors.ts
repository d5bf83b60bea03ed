/**
 * Error taxonomy for plan execution.
 *
 * Every error raised while applying a single change is caught by the engine
 * and recorded against that change; only a missing plan escapes `execute`.
 */

export type ApplyErrorCode =
  | 'VALIDATION'
  | 'PROTECTION'
  | 'NOT_IMPLEMENTED'
  | 'REMOTE_API'
  | 'REFERENCE'
  | 'EXTERNAL_TOOL';

export interface ApplyErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class ApplyError extends Error {
  readonly code: ApplyErrorCode;
  readonly context: Record<string, unknown> | undefined;

  constructor(code: ApplyErrorCode, message: string, options: ApplyErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApplyError';
    this.code = code;
    this.context = options.context;
  }
}

export class ValidationError extends ApplyError {
  constructor(message: string, options?: ApplyErrorOptions) {
    super('VALIDATION', message, options);
    this.name = 'ValidationError';
  }
}

export class ProtectionViolationError extends ApplyError {
  constructor(message: string, options?: ApplyErrorOptions) {
    super('PROTECTION', message, options);
    this.name = 'ProtectionViolationError';
  }
}

export class NotImplementedError extends ApplyError {
  constructor(message: string, options?: ApplyErrorOptions) {
    super('NOT_IMPLEMENTED', message, options);
    this.name = 'NotImplementedError';
  }
}

export class RemoteApiError extends ApplyError {
  constructor(message: string, options?: ApplyErrorOptions) {
    super('REMOTE_API', message, options);
    this.name = 'RemoteApiError';
  }
}

export class ReferenceResolutionError extends ApplyError {
  constructor(message: string, options?: ApplyErrorOptions) {
    super('REFERENCE', message, options);
    this.name = 'ReferenceResolutionError';
  }
}

export class ExternalToolError extends ApplyError {
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, output: { stdout?: string; stderr?: string } = {}, options?: ApplyErrorOptions) {
    super('EXTERNAL_TOOL', message, options);
    this.name = 'ExternalToolError';
    this.stdout = output.stdout ?? '';
    this.stderr = output.stderr ?? '';
  }
}

export class ExternalToolNotFoundError extends ExternalToolError {
  constructor(command: string, options?: ApplyErrorOptions) {
    super(`${command} executable not found in PATH`, {}, options);
    this.name = 'ExternalToolNotFoundError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Wraps a remote failure with resource context. Errors that already carry
 * both the type and the name are returned as they are.
 */
export function formatApiError(
  resourceType: string,
  resourceName: string,
  operation: string,
  error: unknown,
): Error {
  const err = toError(error);
  if (err instanceof ApplyError && err.code !== 'REMOTE_API') {
    return err;
  }
  if (err.message.includes(resourceType) && err.message.includes(resourceName)) {
    return err;
  }
  return new RemoteApiError(
    `API error during ${operation} of ${resourceType} '${resourceName}': ${err.message}`,
    { cause: err, context: { resourceType, resourceName, operation } },
  );
}

export function actionToVerb(action: string): string {
  switch (action) {
    case 'CREATE':
      return 'created';
    case 'UPDATE':
      return 'updated';
    case 'DELETE':
      return 'deleted';
    default:
      return action.toLowerCase();
  }
}
