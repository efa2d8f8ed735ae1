/**
 * Resource error taxonomy
 *
 * Every failure surfaced by the registry carries a stable `code` so callers
 * can branch on the kind of failure (`instanceof` or `error.code`) instead of
 * matching message text.
 */

export type InvalidNameCode =
  | 'NAME_EMPTY'
  | 'NAME_TOO_LONG'
  | 'NAME_HYPHEN'
  | 'NAME_CONSECUTIVE_HYPHEN'
  | 'NAME_INVALID_CHARACTER';

export type ResourceErrorCode =
  | InvalidNameCode
  | 'INVALID_FRONTMATTER'
  | 'MISSING_FIELD'
  | 'INVALID_RESOURCE'
  | 'NOT_FOUND'
  | 'FILE_NOT_FOUND'
  | 'ALREADY_REGISTERED'
  | 'READ_FAILED';

export interface ResourceErrorOptions {
  resourceName?: string;
  cause?: unknown;
}

export class ResourceError extends Error {
  readonly code: ResourceErrorCode;
  readonly resourceName?: string;

  constructor(code: ResourceErrorCode, message: string, options: ResourceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ResourceError';
    this.code = code;
    this.resourceName = options.resourceName;
  }
}

export class InvalidNameError extends ResourceError {
  declare readonly code: InvalidNameCode;

  constructor(code: InvalidNameCode, name: string, message: string) {
    super(code, message, { resourceName: name });
    this.name = 'InvalidNameError';
  }
}

export class FrontmatterError extends ResourceError {
  constructor(message: string, cause?: unknown) {
    super('INVALID_FRONTMATTER', message, { cause });
    this.name = 'FrontmatterError';
  }
}

export class MissingFieldError extends ResourceError {
  readonly field: 'name' | 'description';

  constructor(field: 'name' | 'description', resourceName?: string) {
    super('MISSING_FIELD', `required field "${field}" is missing`, { resourceName });
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

export class InvalidResourceError extends ResourceError {
  constructor(message: string, resourceName?: string) {
    super('INVALID_RESOURCE', message, { resourceName });
    this.name = 'InvalidResourceError';
  }
}

export class ResourceNotFoundError extends ResourceError {
  constructor(kind: string, name: string) {
    super('NOT_FOUND', `${kind} "${name}" not found`, { resourceName: name });
    this.name = 'ResourceNotFoundError';
  }
}

export class ResourceFileNotFoundError extends ResourceError {
  constructor(fileName: string, name: string) {
    super('FILE_NOT_FOUND', `${fileName} not found for "${name}"`, { resourceName: name });
    this.name = 'ResourceFileNotFoundError';
  }
}

export class AlreadyRegisteredError extends ResourceError {
  constructor(kind: string, name: string) {
    super('ALREADY_REGISTERED', `${kind} "${name}" is already registered`, { resourceName: name });
    this.name = 'AlreadyRegisteredError';
  }
}

/**
 * Configuration problems, reported with every failing path at once.
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[]) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isResourceError(error: unknown): error is ResourceError {
  return error instanceof ResourceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
