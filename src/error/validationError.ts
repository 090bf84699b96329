import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failed @standard-schema validation: a request builder
 * missing fields, bad client options, or a response of the wrong shape.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: StandardSchemaV1.Issue[];

  /** Creates a new ValidationError; the message lists every issue as `path: message` */
  constructor(message: string, issues: StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message}; ${formatIssues(issues)}` : message, opts);

    this.issues = issues;
  }

  /** Dotted paths of every failing field, `(root)` for the value itself. */
  get paths(): string[] {
    return this.issues.map(issuePath);
  }
}

function issuePath(issue: StandardSchemaV1.Issue): string {
  if (!issue.path?.length) {
    return '(root)';
  }

  return issue.path.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
}

/**
 * Renders issues as `path: message` pairs separated by `, `.
 */
export function formatIssues(issues: readonly StandardSchemaV1.Issue[]): string {
  return issues.map((issue) => `${issuePath(issue)}: ${issue.message}`).join(', ');
}

/**
 * Type guard for {@link ValidationError} anywhere in the cause chain.
 */
export function isValidationError(error: unknown): boolean {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
