/**
 * Custom Error Classes
 * Typed errors with process exit codes
 */

export class AppError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InputPathError extends AppError {
  constructor(inputPath: string) {
    super(`Path '${inputPath}' does not exist`, 1, 'INPUT_NOT_FOUND', { inputPath });
  }
}

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 2, 'USAGE_ERROR');
  }
}

export class MetadataError extends AppError {
  constructor(imagePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read metadata ${imagePath}: ${reason}`, 1, 'METADATA_ERROR', { imagePath });
  }
}

export class FontLoadError extends AppError {
  constructor(font: string, details?: unknown) {
    super(`Font not available: ${font}`, 1, 'FONT_LOAD_ERROR', details);
  }
}

export class ProcessingError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 1, 'PROCESSING_ERROR', details);
  }
}

export class FallbackExhaustedError extends AppError {
  constructor(what: string, attempts: string[]) {
    super(`No ${what} available after trying: ${attempts.join(', ')}`, 1, 'FALLBACK_EXHAUSTED', {
      attempts,
    });
  }
}
