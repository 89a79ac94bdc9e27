import { ErrorCode, ErrorCodes } from './error-codes';

export class AppError extends Error {
  public exitCode: number;
  public isOperational: boolean;
  public code: ErrorCode;

  constructor(message: string, code: ErrorCode, exitCode: number = 1) {
    super(message);
    this.name = 'AppError';
    this.exitCode = exitCode;
    this.isOperational = true;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: ErrorCode): AppError {
    return new AppError(message, code || ErrorCodes.INVALID_ARGUMENTS, 2);
  }

  static notFound(message: string = 'File not found', code?: ErrorCode): AppError {
    return new AppError(message, code || ErrorCodes.FILE_NOT_FOUND);
  }

  static unprocessable(message: string, code?: ErrorCode): AppError {
    return new AppError(message, code || ErrorCodes.INVALID_REPORT);
  }

  static cancelled(message: string = 'Operation cancelled', code?: ErrorCode): AppError {
    return new AppError(message, code || ErrorCodes.CONVERSION_CANCELLED);
  }
}
