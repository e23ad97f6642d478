/**
 * Piggdekk support dashboard
 *
 * Loads the municipal studded-tire support dataset and its contact list,
 * joins them on municipality and derives the dashboard views.
 *
 * @packageDocumentation
 */

// Core types
export type { CellValue, Row, DataTable, SupportRecord, ContactRecord, MergedRecord } from './core/types.js';
export { JOIN_KEY, SUPPORT_COLUMNS, CONTACT_COLUMNS, emptyTable } from './core/types.js';

// Errors
export {
  DecodeFailure,
  SchemaFailure,
  ParseFailure,
  IoFailure,
  CoercionFailure,
  DatasetReadError,
  DatasetLoadError,
  MergeError,
  type ReadFailure,
  type DatasetFailure,
  type EncodingName,
} from './core/errors.js';

// Ingestion
export {
  readDelimitedFile,
  readDelimitedFileOrThrow,
  readDelimitedBytes,
  parseDelimitedText,
  DECODE_STRATEGIES,
  CANDIDATE_DELIMITERS,
} from './ingestion/flexible-reader.js';
export {
  readSupportTable,
  readContactTable,
  createSupportLoader,
  createContactLoader,
  type DatasetLoader,
} from './ingestion/loaders.js';

// Pipeline
export { leftJoin, mergeSupportWithContacts, CONTACT_SUFFIX } from './pipeline/merge.js';
export {
  applyFilters,
  parseSupportFilter,
  parseCountySelection,
  NO_FILTER,
  SUPPORT_FILTER_LABELS,
  type FilterSelection,
  type SupportFilter,
} from './pipeline/filter.js';
export {
  computeKpis,
  countyOptions,
  displayTable,
  formatMaxPayment,
  mapPoints,
  maxPayment,
  type DashboardKpis,
} from './pipeline/metrics.js';

// Registry
export {
  fetchMunicipalityRegistry,
  DEFAULT_REGISTRY_URL,
} from './registry/municipality-registry.js';

// Dashboard service
export {
  SupportDashboard,
  SUPPORT_FILE_NAME,
  CONTACTS_FILE_NAME,
  type DashboardSnapshot,
  type SupportDashboardOptions,
} from './dashboard/support-dashboard.js';
