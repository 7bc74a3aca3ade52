/**
 * Error Types
 *
 * Every failure the editor raises on purpose derives from DoxeditError, so the
 * CLI can tell an expected fatal condition (print the message, exit 1) from a
 * programming error (print the stack).
 */

export class DoxeditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DoxeditError';
  }
}

/**
 * A filename or line does not have any shape the generator is known to emit.
 */
export class FormatError extends DoxeditError {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * A name that should reference a documentable entity does not.
 * The group annotator recovers from this one; everything else treats it as fatal.
 */
export class NotAnEntityError extends DoxeditError {
  constructor(entityName: string) {
    super(`not a component: ${entityName}`);
    this.name = 'NotAnEntityError';
  }
}

export class UnexpectedSyntaxError extends DoxeditError {
  constructor(message: string) {
    super(message);
    this.name = 'UnexpectedSyntaxError';
  }
}

export type FileOperation = 'read' | 'write' | 'rename' | 'list';

/**
 * The message names the operation and the path; callers decide from the
 * call site whether it is fatal.
 */
export class FileAccessError extends DoxeditError {
  constructor(operation: FileOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`cannot ${operation} ${path}: ${reason}`);
    this.name = 'FileAccessError';
  }
}

/**
 * Bad command-line arguments. The CLI prints usage and exits 1.
 */
export class UsageError extends DoxeditError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
