/**
 * Error taxonomy for the founder console.
 *
 * Store operations return outcome objects carrying these errors instead of
 * throwing; hooks turn them into toasts.
 */

/** The file chooser itself failed (not a user cancel). */
export class SelectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SelectionError';
  }
}

/** A single file broke an extension or size rule. */
export class FileValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FileValidationError';
  }
}

/** Preview generation failed for one file. Logged, never shown. */
export class ThumbnailError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ThumbnailError';
  }
}

/** Upload or record write failed while submitting the pitch deck. */
export class SubmissionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SubmissionError';
  }
}

export class RemovalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RemovalError';
  }
}

/** Object storage rejected an upload or delete. */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** A table read or write came back with a PostgREST error. */
export class RepositoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
  }
}

export function errorMessage(err: unknown, fallback = 'Unexpected error'): string {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === 'string' && err) return err;
  return fallback;
}
