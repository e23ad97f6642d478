/**
 * Map Command
 *
 * Supported municipalities with coordinates as a GeoJSON FeatureCollection,
 * printed to stdout or written to `--out`.
 *
 * @module cli/commands/map
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { SupportDashboard } from '../../dashboard/support-dashboard.js';
import { SUCCESS, handleCommandError, type CommandIO, type CommandResult } from '../lib/command.js';
import { formatJson } from '../lib/output.js';
import { selectionFromFlags, type SelectionFlags } from './selection.js';

export interface MapOptions extends SelectionFlags {
  /** Output file; stdout when absent */
  readonly out?: string;
}

export interface MapContext extends CommandIO {
  readonly dashboard: SupportDashboard;
}

export async function runMap(options: MapOptions, ctx: MapContext): Promise<CommandResult> {
  ctx.logger.commandStart('map', { ...options });

  try {
    const snapshot = await ctx.dashboard.view(selectionFromFlags(options));
    const geojson = formatJson(snapshot.mapPoints);
    const points = snapshot.mapPoints.features.length;

    if (options.out === undefined) {
      ctx.out(geojson);
    } else {
      const target = resolve(options.out);
      await writeFile(target, `${geojson}\n`, 'utf-8');
      ctx.logger.info('Wrote map points', { path: target, points });
    }

    ctx.logger.commandEnd(true, { points });
    return SUCCESS;
  } catch (error) {
    return handleCommandError(error, ctx);
  }
}
