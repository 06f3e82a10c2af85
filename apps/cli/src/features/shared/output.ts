import * as p from '@clack/prompts';
import { getLogger } from '@levy/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again.\nRun with --help for usage information.',
  NOT_FOUND: 'The scenario file was not found.\nPass a path relative to the current directory.',
  VALIDATION_ERROR: 'Fix the listed fields in the scenario file and run it again.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const duration_ms = Date.now() - this.startTime;
      const response = createSuccessResponse(command, data, { duration_ms, ...metadata });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR, details?: unknown): never {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout, not stderr, so callers can parse the response
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode, details), undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    process.exit(exitCode);
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      p.note(tip, 'Tip');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
