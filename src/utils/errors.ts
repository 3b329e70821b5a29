export const ErrorCodes = {
  CONFIG: {
    INVALID_CONFIG: 'CONFIG_ERROR',
    UNSUPPORTED_LANGUAGE: 'UNSUPPORTED_LANGUAGE'
  },
  IO: {
    MALFORMED_RECORD: 'MALFORMED_RECORD',
    MESSAGE_FILE: 'MESSAGE_FILE_ERROR',
    READER_STATE: 'READER_STATE'
  },
  SYSTEM: {
    NOT_IMPLEMENTED: 'NOT_IMPLEMENTED'
  }
} as const;

// Base error class for all library errors
export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration related errors
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCodes.CONFIG.INVALID_CONFIG, message, context);
  }
}

export class LanguageNotSupportedError extends ConfigurationError {
  constructor(public readonly language: string, supported: readonly string[]) {
    super(`Language "${language}" is not supported (supported: ${supported.join(', ')})`, {
      language,
      supported: [...supported]
    });
    this.code = ErrorCodes.CONFIG.UNSUPPORTED_LANGUAGE;
  }
}

export class NotImplementedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCodes.SYSTEM.NOT_IMPLEMENTED, message, context);
  }
}

// A line of a message file that is not a JSON object
export class MalformedRecordError extends AppError {
  constructor(
    public readonly source: string,
    public readonly lineNumber: number,
    reason: string
  ) {
    super(ErrorCodes.IO.MALFORMED_RECORD, `${source}:${lineNumber}: ${reason}`, { source, lineNumber });
  }
}

export class MessageFileError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCodes.IO.MESSAGE_FILE, message, context);
  }
}

export class ReaderStateError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCodes.IO.READER_STATE, message, context);
  }
}
