/**
 * Error taxonomy for scaffold mutations.
 *
 * Every failure the engine surfaces carries a `kind` so callers can branch
 * without string matching, and the path it concerns (relative where the
 * operation knows a root, absolute otherwise).
 */

export type ScaffoldErrorKind =
  | 'NotFound'          // Expected input file or directory is absent
  | 'BlockNotFound'     // Marker or list-block opener could not be located
  | 'ConflictDetected'  // Destination already holds content during a merge
  | 'IOFailure';        // Underlying read/write/move/remove failed

/** Plain-data form of a ScaffoldError, as stored in reports */
export interface ScaffoldIssue {
  kind: ScaffoldErrorKind;
  path: string;
  message: string;
}

export class ScaffoldError extends Error {
  readonly kind: ScaffoldErrorKind;
  readonly path: string;

  constructor(kind: ScaffoldErrorKind, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScaffoldError';
    this.kind = kind;
    this.path = path;
  }

  toIssue(): ScaffoldIssue {
    return { kind: this.kind, path: this.path, message: this.message };
  }
}

export class NotFoundError extends ScaffoldError {
  constructor(path: string, what: 'file' | 'directory' | 'path' = 'path') {
    super('NotFound', path, `${capitalize(what)} not found: ${path}`);
    this.name = 'NotFoundError';
  }
}

export class BlockNotFoundError extends ScaffoldError {
  readonly opener: string;

  constructor(path: string, opener: string, detail = 'not found') {
    super('BlockNotFound', path, `Block "${opener}" ${detail} in ${path}`);
    this.name = 'BlockNotFoundError';
    this.opener = opener;
  }
}

export class ConflictError extends ScaffoldError {
  constructor(relativePath: string, detail = 'destination already exists') {
    super('ConflictDetected', relativePath, `Conflict at ${relativePath}: ${detail}`);
    this.name = 'ConflictError';
  }
}

export class IOFailureError extends ScaffoldError {
  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('IOFailure', path, message, options);
    this.name = 'IOFailureError';
  }
}

/**
 * Wrap an unknown error thrown by an fs call into an IOFailureError,
 * keeping the errno code in the message when there is one.
 */
export function toIOFailure(error: unknown, path: string, action: string): IOFailureError {
  if (error instanceof IOFailureError) {
    return error;
  }
  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : String(error);
  const message = code
    ? `Failed to ${action} ${path} (${code})`
    : `Failed to ${action} ${path}: ${detail}`;
  return new IOFailureError(path, message, { cause: error });
}

/** errno code of a Node fs error, if present */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isScaffoldError(error: unknown): error is ScaffoldError {
  return error instanceof ScaffoldError;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
