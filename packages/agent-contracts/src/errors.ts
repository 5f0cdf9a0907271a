/**
 * Error taxonomy.
 *
 * Only `ConfigInvalidError` is ever thrown to the caller (at startup).
 * Everything raised while a session runs is converted into a failed
 * SessionResult carrying one of these codes.
 */

export type FailureCode =
  | 'ConfigInvalid'
  | 'QuotaDenied'
  | 'InvalidHandoffTarget'
  | 'MaxHopsExceeded'
  | 'BackendError'
  | 'TimedOut'
  | 'NotApproved'
  | 'Cancelled'
  | 'QueueFull'
  | 'InternalError';

export class BatonError extends Error {
  readonly code: FailureCode;

  constructor(code: FailureCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BatonError';
    this.code = code;
  }
}

export interface ConfigIssue {
  /** Dotted path into the configuration document, or an agent name */
  path: string;
  message: string;
}

export class ConfigInvalidError extends BatonError {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    const lines = issues.map((i) => `  • ${i.path}: ${i.message}`);
    super('ConfigInvalid', `Invalid orchestrator configuration:\n${lines.join('\n')}`);
    this.name = 'ConfigInvalidError';
    this.issues = issues;
  }
}

/** Model backend failed (network, HTTP status, malformed payload) */
export class BackendError extends BatonError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('BackendError', message, options);
    this.name = 'BackendError';
    this.status = options?.status;
  }
}

export class TimedOutError extends BatonError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('TimedOut', `Invocation exceeded ${timeoutMs}ms`);
    this.name = 'TimedOutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
