/**
 * Shared command plumbing: exit codes, result type and error mapping
 *
 * @module cli/lib/command
 */

import { DatasetLoadError } from '../../core/errors.js';
import type { CLILogger } from './logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommandResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
}

/**
 * Where a command sends its output. Tests capture both streams.
 */
export interface CommandIO {
  readonly logger: CLILogger;
  /** Command output (stdout) */
  readonly out: (text: string) => void;
  /** Diagnostics shown to the user (stderr) */
  readonly err: (text: string) => void;
}

export const SUCCESS: CommandResult = { success: true, exitCode: EXIT_CODES.SUCCESS };

export function failure(exitCode: ExitCode): CommandResult {
  return { success: false, exitCode };
}

/**
 * Report a command error and pick its exit code.
 * Dataset load failures print the loader diagnostic in full and nothing
 * else at the default level.
 */
export function handleCommandError(error: unknown, io: CommandIO): CommandResult {
  if (error instanceof DatasetLoadError) {
    io.err(error.getSummary());
    io.logger.debug('Command failed', { reason: 'dataset' });
    return failure(EXIT_CODES.DATA_INTEGRITY_ERROR);
  }

  const message = error instanceof Error ? error.message : String(error);
  io.err(`Error: ${message}`);
  io.logger.commandEnd(false, { error: message });
  return failure(EXIT_CODES.ERRORS);
}
