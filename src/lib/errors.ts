/** Error categories for the wr CLI */
export const ErrorCode = {
  // Config errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',

  // Command errors
  COMMAND_NOT_DEFINED: 'COMMAND_NOT_DEFINED',
  COMMAND_FAILED: 'COMMAND_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** wr error with code and optional remediation hint */
export class WrError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'WrError';
  }
}

/** Exit code used for a given error category */
export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CONFIG_VALIDATION_ERROR:
      return 3;
    default:
      return 1;
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
