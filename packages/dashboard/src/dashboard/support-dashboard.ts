/**
 * Support Dashboard Service
 *
 * Composes the pipeline: memoized loaders → merge → filter → metrics.
 * Load failures from either dataset surface here exactly once, as a
 * `DatasetLoadError`; callers stop rendering on it instead of showing a
 * partial table.
 *
 * USAGE:
 * ```typescript
 * const dashboard = new SupportDashboard({ dataDir: './data' });
 * const snapshot = await dashboard.view({ county: 'Viken', support: 'with' });
 * console.log(snapshot.kpis.supportedCount);
 * ```
 *
 * @module dashboard/support-dashboard
 */

import { join } from 'node:path';
import type { FeatureCollection, Point } from 'geojson';
import type {
  ContactRecord,
  DataTable,
  MergedRecord,
  Row,
  SupportRecord,
} from '../core/types.js';
import { DatasetLoadError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import {
  createContactLoader,
  createSupportLoader,
  type DatasetLoader,
} from '../ingestion/loaders.js';
import { mergeSupportWithContacts } from '../pipeline/merge.js';
import { NO_FILTER, applyFilters, type FilterSelection } from '../pipeline/filter.js';
import {
  computeKpis,
  countyOptions,
  displayTable,
  mapPoints,
  type DashboardKpis,
  type MapPointProperties,
} from '../pipeline/metrics.js';

const log = createLogger({ module: 'dashboard' });

export const SUPPORT_FILE_NAME = 'piggdekk_support.csv';
export const CONTACTS_FILE_NAME = 'municipality_contacts.csv';

export interface SupportDashboardOptions {
  readonly dataDir: string;
  readonly supportFile?: string;
  readonly contactsFile?: string;
}

/**
 * Everything one render of the dashboard needs
 */
export interface DashboardSnapshot {
  readonly selection: FilterSelection;
  /** County options from the unfiltered merged table */
  readonly counties: readonly string[];
  readonly view: DataTable<MergedRecord>;
  readonly kpis: DashboardKpis;
  readonly mapPoints: FeatureCollection<Point, MapPointProperties>;
  readonly table: readonly Row[];
}

export class SupportDashboard {
  readonly dataDir: string;
  private readonly support: DatasetLoader<SupportRecord>;
  private readonly contacts: DatasetLoader<ContactRecord>;
  private readonly fileNames: readonly string[];

  constructor(options: SupportDashboardOptions) {
    const supportFile = options.supportFile ?? SUPPORT_FILE_NAME;
    const contactsFile = options.contactsFile ?? CONTACTS_FILE_NAME;

    this.dataDir = options.dataDir;
    this.fileNames = [supportFile, contactsFile];
    this.support = createSupportLoader(join(options.dataDir, supportFile));
    this.contacts = createContactLoader(join(options.dataDir, contactsFile));
  }

  /**
   * Build the merged table.
   *
   * @throws {DatasetLoadError} When either dataset cannot be loaded
   */
  async load(): Promise<DataTable<MergedRecord>> {
    try {
      const support = await this.support.load();
      const contacts = await this.contacts.load();
      const merged = mergeSupportWithContacts(support, contacts);

      log.debug('Built merged dataset', {
        support: support.rows.length,
        contacts: contacts.rows.length,
        merged: merged.rows.length,
      });
      return merged;
    } catch (error) {
      log.debug('Failed to build merged dataset', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DatasetLoadError(this.dataDir, this.fileNames, error);
    }
  }

  async view(selection: FilterSelection = NO_FILTER): Promise<DashboardSnapshot> {
    const merged = await this.load();
    const view = applyFilters(merged, selection);

    return {
      selection,
      counties: countyOptions(merged),
      view,
      kpis: computeKpis(view),
      mapPoints: mapPoints(view),
      table: displayTable(view),
    };
  }

  /**
   * Drop both cached datasets; the next load reads the files again
   */
  invalidate(): void {
    this.support.invalidate();
    this.contacts.invalidate();
  }
}
