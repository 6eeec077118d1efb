/**
 * Custom error classes.
 * Decoders throw ParseError; everything that talks to git throws GitError.
 */

/**
 * Base error class for all library errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git invocation fails or its result is unusable.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly args: readonly string[] = [],
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Error thrown when a decoder meets a record it cannot accept.
 * The whole decode step fails; no partial collection is returned.
 */
export class ParseError extends AppError {
  constructor(
    message: string,
    public readonly parser: 'status' | 'log' | 'branch' | 'tag' | 'stash' | 'diff' | 'remote',
    public readonly line?: string
  ) {
    super(message)
    this.name = 'ParseError'
  }
}

/**
 * Error thrown when caller input is rejected before git is run.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Error thrown when a required resource is not found.
 */
export class NotFoundError extends AppError {
  constructor(
    message: string,
    public readonly resourceType: 'branch' | 'commit' | 'tag' | 'stash' | 'remote' | 'repo'
  ) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/**
 * Get a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
