/**
 * Rollout error utilities.
 *
 * Provides a consistent error type for every public surface of the
 * controller and helpers to convert lower-level failures into RolloutError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type RolloutErrorCode =
  | 'ValidationError'
  | 'NoHealthyEndpoint'
  | 'EvaluationInconclusive'
  | 'BackendOperationError'
  | 'SmokeTestFailure'
  | 'NotFound'
  | 'InvalidState'
  | 'ConfigError'
  | 'UnknownError';

/**
 * Plain error shape for JSON responses, plan records and notifications.
 */
export interface RolloutErrorShape {
  code: RolloutErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base error raised by the controller.
 */
export class RolloutError extends Error implements RolloutErrorShape {
  public readonly code: RolloutErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: RolloutErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RolloutError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): RolloutErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Malformed configuration, registration or weight table.
 */
export class ValidationError extends RolloutError {
  public readonly field?: string;

  constructor(message: string, details?: Record<string, unknown> & { field?: string }) {
    super('ValidationError', message, details);
    this.name = 'ValidationError';
    this.field = details?.field;
  }
}

/**
 * No healthy candidate for the selected version.
 */
export class NoHealthyEndpointError extends RolloutError {
  public readonly model: string;
  public readonly version?: string;

  constructor(model: string, version?: string) {
    super(
      'NoHealthyEndpoint',
      version
        ? `No healthy endpoint for model '${model}' version '${version}'`
        : `No healthy endpoint for model '${model}'`,
      { model, version }
    );
    this.name = 'NoHealthyEndpointError';
    this.model = model;
    this.version = version;
  }
}

/**
 * Too many consecutive evaluations without enough samples.
 */
export class EvaluationInconclusiveError extends RolloutError {
  public readonly planId: string;
  public readonly deferrals: number;

  constructor(planId: string, deferrals: number) {
    super(
      'EvaluationInconclusive',
      `Evaluation inconclusive after ${deferrals} deferrals (plan ${planId})`,
      { planId, deferrals }
    );
    this.name = 'EvaluationInconclusiveError';
    this.planId = planId;
    this.deferrals = deferrals;
  }
}

/**
 * Deployment backend create/delete failure.
 */
export class BackendOperationError extends RolloutError {
  public readonly operation: 'create' | 'delete';

  constructor(operation: 'create' | 'delete', message: string, cause?: unknown) {
    super('BackendOperationError', `Backend ${operation} failed: ${message}`, {
      operation,
      cause: describeCause(cause),
    });
    this.name = 'BackendOperationError';
    this.operation = operation;
  }
}

/**
 * Blue-green smoke test rejected the green deployment.
 */
export class SmokeTestFailure extends RolloutError {
  public readonly report: Record<string, unknown>;

  constructor(endpointId: string, report: Record<string, unknown>) {
    super('SmokeTestFailure', `Smoke test failed for endpoint ${endpointId}`, {
      endpointId,
      report,
    });
    this.name = 'SmokeTestFailure';
    this.report = report;
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Map unknown errors into RolloutError instances.
 *
 * @param error - Error thrown by a collaborator or the controller
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toRolloutError(
  error: unknown,
  fallbackCode: RolloutErrorCode = 'UnknownError'
): RolloutError {
  if (error instanceof RolloutError) {
    return error;
  }

  if (error instanceof Error) {
    return new RolloutError(fallbackCode, error.message);
  }

  return new RolloutError(fallbackCode, 'Unknown rollout error');
}

/**
 * Convert Zod validation error to ValidationError
 *
 * @example
 * ```typescript
 * const result = CanaryRolloutConfigSchema.safeParse({ modelName: '' });
 * if (!result.success) {
 *   throw zodErrorToValidationError(result.error);
 * }
 * // Throws: "Validation error on field 'modelName': Cannot be empty"
 * ```
 */
export function zodErrorToValidationError(error: ZodError): ValidationError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid value'}`;

  return new ValidationError(message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
