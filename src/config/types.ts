export interface ExecutionConfig {
  readonly query: string;
  readonly filename: string;
  readonly caseSensitive: boolean;
}

export interface SearchSummary {
  readonly linesScanned: number;
  readonly matchCount: number;
}

export const ErrorCode = {
  E_MISSING_ARGUMENTS: 'E_MISSING_ARGUMENTS',
  E_NOT_FOUND: 'E_NOT_FOUND',
  E_NOT_FILE: 'E_NOT_FILE',
  E_PERMISSION_DENIED: 'E_PERMISSION_DENIED',
  E_INVALID_ENCODING: 'E_INVALID_ENCODING',
  E_UNKNOWN: 'E_UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
