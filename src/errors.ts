// Error codes
export enum ErrorCode {
  // Configuration errors
  INVALID_HOST_KEY = 'INVALID_HOST_KEY',
  UNSUPPORTED_KEY_ALGORITHM = 'UNSUPPORTED_KEY_ALGORITHM',
  MISSING_HOST_KEY = 'MISSING_HOST_KEY',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Protocol errors
  INVALID_CHANNEL_TYPE = 'INVALID_CHANNEL_TYPE',
  INPUT_NOT_ACCEPTED = 'INPUT_NOT_ACCEPTED',

  // Contract violations
  OUTPUT_ALREADY_CREATED = 'OUTPUT_ALREADY_CREATED',

  // Lifecycle errors
  ALREADY_LISTENING = 'ALREADY_LISTENING',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

// Error messages
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_HOST_KEY]: 'Invalid host key',
  [ErrorCode.UNSUPPORTED_KEY_ALGORITHM]: 'Unsupported key algorithm',
  [ErrorCode.MISSING_HOST_KEY]: 'At least one host key is required',
  [ErrorCode.INVALID_CONFIG]: 'Invalid configuration',
  [ErrorCode.INVALID_CHANNEL_TYPE]: 'Only session channels are accepted',
  [ErrorCode.INPUT_NOT_ACCEPTED]: 'Input Not Accepted',
  [ErrorCode.OUTPUT_ALREADY_CREATED]: 'Output was already created for this channel',
  [ErrorCode.ALREADY_LISTENING]: 'Server has already been started',
  [ErrorCode.INTERNAL_ERROR]: 'Internal server error'
};

export class ConsoleError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    super(message || ErrorMessages[code]);
    this.name = 'ConsoleError';
    this.code = code;
    this.details = details;
  }
}

// Error factory
export class ErrorFactory {
  static createError(code: ErrorCode, message?: string, details?: Record<string, unknown>): ConsoleError {
    return new ConsoleError(code, message, details);
  }

  static isConsoleError(error: unknown): error is ConsoleError {
    return error instanceof ConsoleError;
  }

  static invalidHostKey(reason: string): ConsoleError {
    return this.createError(
      ErrorCode.INVALID_HOST_KEY,
      `Invalid host key: ${reason}`,
      { reason }
    );
  }

  static unsupportedKeyAlgorithm(algorithm: string): ConsoleError {
    return this.createError(
      ErrorCode.UNSUPPORTED_KEY_ALGORITHM,
      `Unsupported key algorithm: ${algorithm}`,
      { algorithm }
    );
  }

  static missingHostKey(): ConsoleError {
    return this.createError(ErrorCode.MISSING_HOST_KEY);
  }

  static invalidConfig(key: string, value: unknown): ConsoleError {
    return this.createError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${key} = ${String(value)}`,
      { key, value }
    );
  }

  static invalidChannelType(channelType: string): ConsoleError {
    return this.createError(
      ErrorCode.INVALID_CHANNEL_TYPE,
      `Rejected channel of type ${channelType}`,
      { channelType }
    );
  }

  static inputNotAccepted(bytes: number): ConsoleError {
    return this.createError(
      ErrorCode.INPUT_NOT_ACCEPTED,
      ErrorMessages[ErrorCode.INPUT_NOT_ACCEPTED],
      { bytes }
    );
  }

  static outputAlreadyCreated(): ConsoleError {
    return this.createError(ErrorCode.OUTPUT_ALREADY_CREATED);
  }

  static alreadyListening(state: string): ConsoleError {
    return this.createError(
      ErrorCode.ALREADY_LISTENING,
      `Cannot listen: server is ${state}`,
      { state }
    );
  }

  static internalError(message: string, details?: Record<string, unknown>): ConsoleError {
    return this.createError(
      ErrorCode.INTERNAL_ERROR,
      `Internal error: ${message}`,
      details
    );
  }
}
