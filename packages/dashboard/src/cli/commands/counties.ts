/**
 * Counties Command
 *
 * Lists the county options of the merged dataset, `All` first.
 *
 * @module cli/commands/counties
 */

import type { SupportDashboard } from '../../dashboard/support-dashboard.js';
import { countyOptions } from '../../pipeline/metrics.js';
import { SUCCESS, handleCommandError, type CommandIO, type CommandResult } from '../lib/command.js';
import { formatJson } from '../lib/output.js';

export interface CountiesOptions {
  readonly json?: boolean;
}

export interface CountiesContext extends CommandIO {
  readonly dashboard: SupportDashboard;
}

export async function runCounties(
  options: CountiesOptions,
  ctx: CountiesContext
): Promise<CommandResult> {
  ctx.logger.commandStart('counties');

  try {
    const counties = countyOptions(await ctx.dashboard.load());
    ctx.out(options.json ? formatJson(counties) : counties.join('\n'));
    ctx.logger.commandEnd(true, { counties: counties.length - 1 });
    return SUCCESS;
  } catch (error) {
    return handleCommandError(error, ctx);
  }
}
