/**
 * Filter flags shared by `report` and `map`
 *
 * @module cli/commands/selection
 */

import {
  NO_FILTER,
  SUPPORT_FILTER_LABELS,
  parseCountySelection,
  parseSupportFilter,
  type FilterSelection,
} from '../../pipeline/filter.js';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../lib/output.js';

export interface SelectionFlags {
  readonly county?: string;
  readonly support?: string;
}

/**
 * @throws Error on an unknown support label
 */
export function selectionFromFlags(flags: SelectionFlags): FilterSelection {
  let support = NO_FILTER.support;
  if (flags.support !== undefined) {
    const parsed = parseSupportFilter(flags.support);
    if (parsed === null) {
      const labels = Object.values(SUPPORT_FILTER_LABELS).map((label) => `'${label}'`);
      throw new Error(`Unknown support filter '${flags.support}'. Expected one of ${labels.join(', ')}`);
    }
    support = parsed;
  }

  return { county: parseCountySelection(flags.county), support };
}

/**
 * @throws Error on an unknown format
 */
export function outputFormatFromFlag(value: string | undefined): OutputFormat {
  if (value === undefined) return 'table';
  if (!isOutputFormat(value)) {
    throw new Error(`Unknown output format '${value}'. Expected one of ${OUTPUT_FORMATS.join('|')}`);
  }
  return value;
}
