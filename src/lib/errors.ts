/**
 * Custom error classes
 * Shared by the loader, config and CLI layers so failures carry a stable code
 */

// Base error
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'AppError'
  }
}

// Plan file could not be read (missing, permission, directory, ...)
export class PlanFileUnavailableError extends AppError {
  constructor(
    public readonly filePath: string,
    message: string,
    cause?: Error
  ) {
    super(message, 'FILE_UNAVAILABLE', cause)
    this.name = 'PlanFileUnavailableError'
  }
}

// CLI flags / environment
export class ConfigLoadError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_LOAD_ERROR', cause)
    this.name = 'ConfigLoadError'
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', cause)
    this.name = 'ValidationError'
  }
}

/**
 * Type guard for AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}
