/**
 * Error classes surfaced in task results.
 *
 * Each class carries a stable `kind` that callers can branch on; the
 * executor turns any thrown value into a TaskError via toTaskError().
 */

import { ConfigValidationError } from '../utils/config-schemas.js';
import { StepTimeoutError } from '../utils/timeouts.js';
import { BlockedUrlError } from '../utils/url-safety.js';
import type { StrategyTag } from './index.js';

export type ErrorKind =
  | 'resolution_failure'
  | 'pool_exhausted'
  | 'navigation_error'
  | 'timeout'
  | 'invalid_task'
  | 'unsupported_action'
  | 'invalid_config'
  | 'internal';

export interface TaskError {
  kind: ErrorKind;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export class ResolutionFailure extends Error {
  readonly kind = 'resolution_failure';

  constructor(
    public readonly logicalName: string,
    public readonly attemptedStrategies: StrategyTag[]
  ) {
    super(
      `Could not resolve "${logicalName}" (tried: ${attemptedStrategies.join(', ') || 'none'})`
    );
    this.name = 'ResolutionFailure';
  }
}

export class PoolExhaustedError extends Error {
  readonly kind = 'pool_exhausted';

  constructor(
    public readonly tabId: string,
    public readonly waitedMs: number
  ) {
    super(`No tab available for "${tabId}" after ${waitedMs}ms`);
    this.name = 'PoolExhaustedError';
  }
}

export class NavigationError extends Error {
  readonly kind = 'navigation_error';

  constructor(
    public readonly url: string,
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(`Navigation to ${url} failed: ${message}`, options);
    this.name = 'NavigationError';
  }
}

export class TaskTimeoutError extends Error {
  readonly kind = 'timeout';

  constructor(
    public readonly action: string,
    public readonly timeoutMs: number
  ) {
    super(`Task "${action}" exceeded ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

export class TaskValidationError extends Error {
  readonly kind = 'invalid_task';

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'TaskValidationError';
  }
}

export class UnsupportedActionError extends Error {
  readonly kind = 'unsupported_action';

  constructor(
    public readonly action: string,
    reason?: string
  ) {
    super(reason ? `Action "${action}" is not supported: ${reason}` : `Unknown action "${action}"`);
    this.name = 'UnsupportedActionError';
  }
}

/**
 * Map any thrown value to the wire error shape.
 */
export function toTaskError(error: unknown): TaskError {
  if (error instanceof ResolutionFailure) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: false,
      details: { logical_name: error.logicalName, attempted_strategies: error.attemptedStrategies },
    };
  }
  if (error instanceof PoolExhaustedError) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: true,
      details: { tab_id: error.tabId },
    };
  }
  if (error instanceof NavigationError) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: error.status === null || error.status >= 500,
      details: { url: error.url, status: error.status },
    };
  }
  if (error instanceof TaskTimeoutError) {
    return { kind: error.kind, message: error.message, retryable: true };
  }
  if (error instanceof StepTimeoutError) {
    return { kind: 'timeout', message: error.message, retryable: true };
  }
  if (error instanceof TaskValidationError) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: false,
      ...(error.issues.length > 0 ? { details: { issues: error.issues } } : {}),
    };
  }
  if (error instanceof BlockedUrlError) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: false,
      details: { url: error.url, category: error.category },
    };
  }
  if (error instanceof UnsupportedActionError) {
    return { kind: error.kind, message: error.message, retryable: false };
  }
  if (error instanceof ConfigValidationError) {
    return {
      kind: error.kind,
      message: error.message,
      retryable: false,
      details: { issues: error.issues },
    };
  }
  return {
    kind: 'internal',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
