/**
 * Error types raised by the stego library
 */
export enum StegoErrorType {
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED', // Framed message does not fit the buffer
  FORMAT_ERROR = 'FORMAT_ERROR',           // Malformed or unsupported WAV container
  INVALID_CONFIG = 'INVALID_CONFIG',       // Echo delays/attenuation out of range
  INVALID_MESSAGE = 'INVALID_MESSAGE',     // Message holds characters wider than one byte
  INVALID_BUFFER = 'INVALID_BUFFER',       // Sample count does not match the format
  INVALID_REQUEST = 'INVALID_REQUEST',     // Host request failed validation
  INTERNAL_ERROR = 'INTERNAL_ERROR',       // Unexpected failure while serving a request
}

/**
 * Error thrown by the stego library
 */
export class StegoError extends Error {
  readonly type: StegoErrorType;
  cause?: Error;

  constructor(type: StegoErrorType, message: string, cause?: Error) {
    super(message);
    this.name = 'StegoError';
    this.type = type;
    this.cause = cause;
  }
}
