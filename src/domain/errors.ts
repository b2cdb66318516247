/**
 * Error taxonomy shared by every layer.
 *
 * Each error carries a stable `code` so HTTP handlers and remote clients can
 * map it without relying on class identity across process boundaries.
 */

export type EngineErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'VERSION_CONFLICT'
  | 'FILTER_EVALUATION'
  | 'LEASE_EXPIRED'
  | 'RESOURCE_EXCEEDED'
  | 'REGISTRATION_INVALID'
  | 'FUNCTION_NOT_FOUND';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** A source adapter gave up after exhausting its retry budget. */
export class SourceUnavailableError extends EngineError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `Source ${source} unavailable: ${message}`, options);
    this.source = source;
  }
}

export class VersionConflictError extends EngineError {
  readonly functionId: string;
  readonly expectedVersion: number | undefined;
  readonly actualVersion: number | undefined;

  constructor(functionId: string, expectedVersion?: number, actualVersion?: number) {
    super(
      'VERSION_CONFLICT',
      expectedVersion !== undefined && actualVersion !== undefined
        ? `Function ${functionId} is at version ${actualVersion}, expected ${expectedVersion}`
        : `Function ${functionId} was modified concurrently`,
    );
    this.functionId = functionId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class FilterEvaluationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FILTER_EVALUATION', message, options);
  }
}

export class LeaseExpiredError extends EngineError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('LEASE_EXPIRED', `Lease for task ${taskId} expired or is held by another worker`);
    this.taskId = taskId;
  }
}

export type LimitedResource = 'memory' | 'storage' | 'cpu';

export class ResourceExceededError extends EngineError {
  readonly resource: LimitedResource;

  constructor(resource: LimitedResource, message: string) {
    super('RESOURCE_EXCEEDED', message);
    this.resource = resource;
  }
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RegistrationInvalidError extends EngineError {
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    super(
      'REGISTRATION_INVALID',
      `Invalid function registration: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
    );
    this.issues = issues;
  }
}

export class FunctionNotFoundError extends EngineError {
  readonly functionId: string;

  constructor(functionId: string) {
    super('FUNCTION_NOT_FOUND', `Function ${functionId} not found`);
    this.functionId = functionId;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
