import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Shape of everything `--json` prints to stdout.
 */
export type CLIResponse<T> =
  | {
      success: true;
      command: string;
      /** ISO 8601 */
      timestamp: string;
      data: T;
      metadata: Record<string, unknown>;
    }
  | {
      success: false;
      command: string;
      timestamp: string;
      error: { code: string; message: string; details?: unknown };
    };

export function createSuccessResponse<T>(command: string, data: T, metadata: Record<string, unknown>): CLIResponse<T> {
  return { success: true, command, timestamp: new Date().toISOString(), data, metadata };
}

export function createErrorResponse(command: string, error: Error, code: string, details?: unknown): CLIResponse<never> {
  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: details === undefined ? { code, message: error.message } : { code, message: error.message, details },
  };
}

// Exit code names double as the machine-readable error codes
const ERROR_CODES = new Map<number, string>(
  Object.entries(ExitCodes)
    .filter(([, exitCode]) => exitCode !== ExitCodes.SUCCESS)
    .map(([name, exitCode]): [number, string] => [exitCode, name])
);

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES.get(exitCode) ?? 'UNKNOWN_ERROR';
}
