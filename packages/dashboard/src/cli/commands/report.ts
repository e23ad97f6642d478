/**
 * Report Command
 *
 * KPIs and the detail table for the filtered view.
 *
 * Usage:
 *   piggdekk report [options]
 *
 * Options:
 *   --county <name>     County to show (default: All)
 *   --support <label>   All | With support | Without support
 *   --format <fmt>      Output format: table|json|csv
 *
 * @module cli/commands/report
 */

import type { SupportDashboard } from '../../dashboard/support-dashboard.js';
import { formatMaxPayment, type DashboardKpis } from '../../pipeline/metrics.js';
import { SUPPORT_FILTER_LABELS, ALL_LABEL, type FilterSelection } from '../../pipeline/filter.js';
import { SUCCESS, handleCommandError, type CommandIO, type CommandResult } from '../lib/command.js';
import { formatCsv, formatJson, formatTable, formatters, type TableColumn } from '../lib/output.js';
import { outputFormatFromFlag, selectionFromFlags, type SelectionFlags } from './selection.js';

export interface ReportOptions extends SelectionFlags {
  readonly format?: string;
}

export interface ReportContext extends CommandIO {
  readonly dashboard: SupportDashboard;
}

const REPORT_COLUMNS: readonly TableColumn[] = [
  { key: 'municipality', header: 'Municipality', width: 18, formatter: formatters.truncate(18) },
  { key: 'county', header: 'County', width: 14, formatter: formatters.text },
  { key: 'has_support', header: 'Support', formatter: formatters.yesNo },
  { key: 'payment_per_tire', header: 'NOK/tire', align: 'right', formatter: formatters.number },
  { key: 'max_tires', header: 'Max tires', align: 'right', formatter: formatters.number },
  { key: 'max_total_nok', header: 'Max NOK', align: 'right', formatter: formatters.number },
  { key: 'period_start', header: 'From', formatter: formatters.text },
  { key: 'period_end', header: 'To', formatter: formatters.text },
  { key: 'service_name', header: 'Service', width: 20, formatter: formatters.text },
  { key: 'phone', header: 'Phone', formatter: formatters.text },
  { key: 'website', header: 'Website', formatter: formatters.urlDomain },
  { key: 'info_url', header: 'Info', formatter: formatters.urlDomain },
];

/** CSV keeps raw values under the column names */
const CSV_COLUMNS: readonly TableColumn[] = REPORT_COLUMNS.map(({ key }) => ({ key, header: key }));

export function describeSelection(selection: FilterSelection): string {
  return `County: ${selection.county ?? ALL_LABEL} | Support: ${SUPPORT_FILTER_LABELS[selection.support]}`;
}

export function formatKpis(kpis: DashboardKpis): string {
  return [
    `Municipalities:        ${kpis.municipalityCount}`,
    `With support:          ${kpis.supportedCount}`,
    `Max payment per tire:  ${formatMaxPayment(kpis.maxPaymentPerTire)}`,
  ].join('\n');
}

export async function runReport(options: ReportOptions, ctx: ReportContext): Promise<CommandResult> {
  ctx.logger.commandStart('report', { ...options });

  try {
    const format = outputFormatFromFlag(options.format);
    const selection = selectionFromFlags(options);
    const snapshot = await ctx.dashboard.view(selection);

    switch (format) {
      case 'json':
        ctx.out(
          formatJson({
            selection: snapshot.selection,
            kpis: snapshot.kpis,
            rows: snapshot.table,
          })
        );
        break;
      case 'csv':
        ctx.out(formatCsv(snapshot.table, CSV_COLUMNS));
        break;
      case 'table':
        ctx.out(
          [
            describeSelection(snapshot.selection),
            '',
            formatKpis(snapshot.kpis),
            '',
            formatTable(snapshot.table, REPORT_COLUMNS),
          ].join('\n')
        );
        break;
    }

    ctx.logger.commandEnd(true, { rows: snapshot.table.length });
    return SUCCESS;
  } catch (error) {
    return handleCommandError(error, ctx);
  }
}
