export class DateUnresolvedError extends Error {
  code = 'DATE_UNRESOLVED';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DateUnresolvedError';
  }
}

export class ConversionError extends Error {
  code = 'CONVERSION_FAILED';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConversionError';
  }
}

export class SourceMissingError extends Error {
  code = 'SOURCE_MISSING';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'SourceMissingError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SetupError extends Error {
  code = 'SETUP_FAILURE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'SetupError';
  }
}

export class DocumentStorageError extends Error {
  code = 'DOCUMENT_STORAGE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocumentStorageError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
