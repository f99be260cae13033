import { StegoError, StegoErrorType } from '../interfaces';

/**
 * Factory for creating StegoError instances with a consistent shape
 */
export class ErrorFactory {
  /**
   * Create a capacity error
   */
  static CAPACITY(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.CAPACITY_EXCEEDED, message, cause);
  }

  /**
   * Create a container format error
   */
  static FORMAT(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.FORMAT_ERROR, message, cause);
  }

  /**
   * Create an invalid configuration error
   */
  static INVALID_CONFIG(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.INVALID_CONFIG, message, cause);
  }

  /**
   * Create an invalid message error
   */
  static INVALID_MESSAGE(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.INVALID_MESSAGE, message, cause);
  }

  /**
   * Create an invalid buffer error
   */
  static INVALID_BUFFER(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.INVALID_BUFFER, message, cause);
  }

  /**
   * Create an invalid request error
   */
  static INVALID_REQUEST(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.INVALID_REQUEST, message, cause);
  }

  /**
   * Create an internal error
   */
  static INTERNAL(message: string, cause?: Error): StegoError {
    return new StegoError(StegoErrorType.INTERNAL_ERROR, message, cause);
  }
}
