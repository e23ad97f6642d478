/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

export { runReport, formatKpis, describeSelection, type ReportOptions } from './report.js';
export { runCounties, type CountiesOptions } from './counties.js';
export { runMap, type MapOptions } from './map.js';
export { runRegistry, type RegistryCommandOptions } from './registry.js';
export { selectionFromFlags, outputFormatFromFlag } from './selection.js';
