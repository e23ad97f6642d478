/**
 * Registry Command
 *
 * Fetch the public municipality registry and print it. An unreachable
 * registry prints an empty listing and exits with the warnings code.
 *
 * Usage:
 *   piggdekk registry [--format table|json|csv] [--limit n]
 *
 * @module cli/commands/registry
 */

import {
  fetchMunicipalityRegistry,
  type RegistryOptions,
} from '../../registry/municipality-registry.js';
import {
  EXIT_CODES,
  SUCCESS,
  failure,
  handleCommandError,
  type CommandIO,
  type CommandResult,
} from '../lib/command.js';
import { formatOutput, formatters, type TableColumn } from '../lib/output.js';
import { outputFormatFromFlag } from './selection.js';

export interface RegistryCommandOptions {
  readonly format?: string;
  /** Max rows to print */
  readonly limit?: number;
}

export interface RegistryContext extends CommandIO {
  readonly registry: RegistryOptions;
}

export async function runRegistry(
  options: RegistryCommandOptions,
  ctx: RegistryContext
): Promise<CommandResult> {
  ctx.logger.commandStart('registry', { ...options });

  try {
    const format = outputFormatFromFlag(options.format);
    if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 1)) {
      throw new Error(`--limit must be a positive integer, got ${options.limit}`);
    }

    const table = await fetchMunicipalityRegistry(ctx.registry);
    const rows = options.limit === undefined ? table.rows : table.rows.slice(0, options.limit);
    const columns: TableColumn[] = table.columns.map((column) => ({
      key: column,
      header: column,
      formatter: format === 'table' ? formatters.text : undefined,
    }));

    ctx.out(formatOutput(rows, format, columns));

    if (table.rows.length === 0) {
      ctx.logger.warn('Municipality registry returned no rows');
      ctx.logger.commandEnd(true, { rows: 0 });
      return failure(EXIT_CODES.WARNINGS);
    }

    ctx.logger.commandEnd(true, { rows: rows.length, total: table.rows.length });
    return SUCCESS;
  } catch (error) {
    return handleCommandError(error, ctx);
  }
}
