import { ErrorCode } from '../config/types.js';
import { isRecord } from './type-guards.js';

export { ErrorCode };

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof (error as NodeJS.ErrnoException).code === 'string'
  );
}

export const NODE_ERROR_CODE_MAP: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.E_NOT_FOUND,
  ENOTDIR: ErrorCode.E_NOT_FOUND,
  EACCES: ErrorCode.E_PERMISSION_DENIED,
  EPERM: ErrorCode.E_PERMISSION_DENIED,
  EISDIR: ErrorCode.E_NOT_FILE,
  ERR_ENCODING_INVALID_ENCODED_DATA: ErrorCode.E_INVALID_ENCODING,
} as const;

export class MinigrepError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public path?: string,
    public details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'MinigrepError';
    Object.setPrototypeOf(this, MinigrepError.prototype);
  }

  static fromError(
    code: ErrorCode,
    message: string,
    originalError: unknown,
    path?: string,
    details?: Record<string, unknown>
  ): MinigrepError {
    const error = new MinigrepError(
      code,
      message,
      path,
      details,
      originalError
    );
    if (originalError instanceof Error && originalError.stack) {
      error.stack = `${String(error.stack)}\nCaused by: ${originalError.stack}`;
    }
    return error;
  }
}

export function classifyError(error: unknown): ErrorCode {
  if (error instanceof MinigrepError) {
    return error.code;
  }
  if (isNodeError(error) && error.code) {
    return NODE_ERROR_CODE_MAP[error.code] ?? ErrorCode.E_UNKNOWN;
  }
  return ErrorCode.E_UNKNOWN;
}

export function formatUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
