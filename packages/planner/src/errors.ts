/**
 * Planner error taxonomy
 *
 * Every failure the core surfaces carries a stable `code` so the HTTP layer
 * can map it without string matching.
 */

export type PlannerErrorCode = 'NOT_FOUND' | 'INVALID_INPUT' | 'UPSTREAM_UNAVAILABLE';

export class PlannerError extends Error {
  readonly code: PlannerErrorCode;

  constructor(code: PlannerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlannerError';
    this.code = code;
  }
}

export type MissingEntity = {
  entity: 'course' | 'student';
  id: string;
};

export class NotFoundError extends PlannerError {
  readonly missing: MissingEntity[];

  constructor(missing: MissingEntity[]) {
    const described = missing.map((m) => `${m.entity} "${m.id}"`).join(' and ');
    super('NOT_FOUND', `Not found: ${described}`);
    this.name = 'NotFoundError';
    this.missing = missing;
  }

  static course(id: string): NotFoundError {
    return new NotFoundError([{ entity: 'course', id }]);
  }
}

export class InvalidInputError extends PlannerError {
  readonly field: string;
  readonly issues: string[];

  constructor(field: string, issues: string[]) {
    super('INVALID_INPUT', `Invalid ${field}: ${issues.join('; ') || 'malformed value'}`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.issues = issues;
  }
}

export class UpstreamUnavailableError extends PlannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UPSTREAM_UNAVAILABLE', message, options);
    this.name = 'UpstreamUnavailableError';
  }
}

export function isPlannerError(error: unknown): error is PlannerError {
  return error instanceof PlannerError;
}
