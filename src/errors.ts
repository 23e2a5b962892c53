/**
 * A single rejected field in a request payload.
 */
export interface ValidationIssue {
  /** Dot-joined location of the field, e.g. `terragrunt.terraform.source` */
  path: string;
  message: string;
}

/**
 * Raised when a payload does not match the Terragrunt configuration schema.
 * Carries every offending field, not just the first one.
 */
export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Invalid configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Raised when a tree cannot be represented as HCL2.
 */
export class EncodingError extends Error {
  /** Location in the tree that could not be encoded */
  readonly path: string;

  constructor(message: string, path: string) {
    super(path ? `${message} (at ${path})` : message);
    this.name = 'EncodingError';
    this.path = path;
  }
}

/**
 * Raised when the destination of a generated file cannot be created or written.
 */
export class IOError extends Error {
  /** errno code reported by the filesystem, e.g. EACCES */
  readonly code: string;
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const code = errnoCode(cause);
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot write ${path}: ${reason}`, { cause });
    this.name = 'IOError';
    this.code = code;
    this.path = path;
  }
}

function errnoCode(error: unknown): string {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string') return code;
  }
  return 'EIO';
}
