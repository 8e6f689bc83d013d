import fs from 'fs/promises';
import type { Logger } from 'pino';
import type { CatalogExtractor } from './catalogExtractor.js';
import { describeError } from './errors.js';
import type { MigrationDriver } from './migrationDriver.js';
import { recordMigrationCounts, writeReport } from './report.js';
import type { ConfirmUpload, MigrationCounts, MigrationReport } from './types.js';

export type RunOutcome = 'no-products' | 'cancelled' | 'migrated' | 'migration-failed';

export interface RunResult {
  outcome: RunOutcome;
  report?: MigrationReport;
  reportPath?: string;
  counts?: MigrationCounts;
}

export interface CatalogLifecycle {
  connect(): Promise<void>;
  close(): Promise<void>;
}

export interface RunDependencies {
  extractor: Pick<CatalogExtractor, 'extract' | 'buildReport'>;
  driver: Pick<MigrationDriver, 'migrate'>;
  catalog: CatalogLifecycle;
  confirm: ConfirmUpload;
  reportsDir: string;
  stagingDir: string;
  logger: Logger;
}

export interface CleanupTargets {
  catalog: CatalogLifecycle;
  stagingDir: string;
  logger: Logger;
}

/** Closes the catalog and removes the staging tree. Safe to call more than once. */
export async function cleanupRun({ catalog, stagingDir, logger }: CleanupTargets): Promise<void> {
  await catalog.close();
  try {
    await fs.rm(stagingDir, { recursive: true, force: true });
    logger.info({ stagingDir }, 'Staging tree removed');
  } catch (error) {
    logger.error({ stagingDir, err: describeError(error) }, 'Failed to remove staging tree');
  }
}

/**
 * One full run: extraction, report, the upload decision, then the upload
 * phase. Connections and staged files are released however the run ends.
 */
export async function runMigration(deps: RunDependencies): Promise<RunResult> {
  const { extractor, driver, logger } = deps;
  try {
    // Files left behind by an interrupted run would otherwise be uploaded as staged images.
    await fs.rm(deps.stagingDir, { recursive: true, force: true });
    await deps.catalog.connect();
    logger.info('Extracting PrestaShop data');
    const extracted = await extractor.extract();
    if (!extracted) {
      logger.error('Extraction failed or found no products');
      return { outcome: 'no-products' };
    }

    const report = extractor.buildReport();
    const reportPath = await writeReport(report, deps.reportsDir);
    logger.info({ reportPath }, 'Extraction report written');

    if (!(await deps.confirm(report, reportPath))) {
      logger.info('WooCommerce migration cancelled by user');
      return { outcome: 'cancelled', report, reportPath };
    }

    const counts = await driver.migrate(report.products);
    const updated = await recordMigrationCounts(reportPath, report, counts);
    return {
      outcome: counts.successful > 0 ? 'migrated' : 'migration-failed',
      report: updated,
      reportPath,
      counts
    };
  } finally {
    await cleanupRun({ catalog: deps.catalog, stagingDir: deps.stagingDir, logger });
  }
}
