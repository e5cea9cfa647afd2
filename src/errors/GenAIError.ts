import { ErrorCodes, type GenAIErrorData } from '../types/errors.js';

export class GenAIError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenAIError';
    this.code = code;
    this.data = data;
  }

  toJSON(): GenAIErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }

  static invalidArgument(reason: string): GenAIError {
    return new GenAIError(ErrorCodes.INVALID_ARGUMENT, reason);
  }

  static decode(reason: string, details?: Record<string, unknown>): GenAIError {
    return new GenAIError(ErrorCodes.DECODE_ERROR, `Malformed response chunk: ${reason}`, details);
  }

  static transport(reason: string, cause?: unknown): GenAIError {
    return new GenAIError(ErrorCodes.TRANSPORT_ERROR, reason, undefined, { cause });
  }

  static httpStatus(status: number, statusText: string, body?: string): GenAIError {
    return new GenAIError(ErrorCodes.HTTP_ERROR, `HTTP ${status}: ${statusText}`, {
      status,
      ...(body ? { body } : {}),
    });
  }

  static timeout(timeoutMs: number): GenAIError {
    return new GenAIError(ErrorCodes.CONNECTION_TIMEOUT, `No data received for ${timeoutMs}ms`, {
      timeout: timeoutMs,
    });
  }

  static websocket(reason: string, data?: Record<string, unknown>): GenAIError {
    return new GenAIError(ErrorCodes.WEBSOCKET_ERROR, reason, data);
  }
}
