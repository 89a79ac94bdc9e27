export const ErrorCodes = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
  FILE_WRITE_ERROR: 'FILE_WRITE_ERROR',
  INVALID_REPORT: 'INVALID_REPORT',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  UNKNOWN_COMMAND: 'UNKNOWN_COMMAND',
  CONVERSION_CANCELLED: 'CONVERSION_CANCELLED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
