import type { ValidationIssue } from '../types/metadata';

export class AppError extends Error {
  code: string;

  constructor(message: string, code: string = 'APP_ERROR') {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Input cannot be read, has an unsupported extension, or output cannot be written.
 */
export class MetadataIOError extends AppError {
  filePath: string;

  constructor(message: string, filePath: string) {
    super(message, 'METADATA_IO');
    this.filePath = filePath;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
  }
}

/**
 * Raised once at the end of a strict run, carrying every issue collected.
 */
export class StrictModeError extends AppError {
  issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Strict mode: ${issues.length} validation issue(s) found`, 'STRICT_MODE_VIOLATION');
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
