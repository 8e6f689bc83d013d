import fs from 'fs/promises';
import path from 'path';
import { formatFileStamp } from './logger.js';
import type { MigrationCounts, MigrationReport, ProductRecord, ReportSummary } from './types.js';

export function summarizeProducts(products: Record<string, ProductRecord>): ReportSummary {
  const records = Object.values(products);
  return {
    total_products: records.length,
    total_images: records.reduce((sum, record) => sum + record.images, 0),
    total_stock: records.reduce((sum, record) => sum + record.stock, 0)
  };
}

export function buildReport(products: Record<string, ProductRecord>, now: Date = new Date()): MigrationReport {
  return {
    timestamp: now.toISOString(),
    products,
    summary: summarizeProducts(products)
  };
}

export function getReportPath(reportsDir: string, now: Date = new Date()): string {
  return path.join(reportsDir, `extraction_report_${formatFileStamp(now)}.json`);
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 4), 'utf8');
}

export async function writeReport(report: MigrationReport, reportsDir: string, now: Date = new Date()): Promise<string> {
  const reportPath = getReportPath(reportsDir, now);
  await writeJson(reportPath, report);
  return reportPath;
}

/** Rewrites the report file with the upload phase's product counts. */
export async function recordMigrationCounts(
  reportPath: string,
  report: MigrationReport,
  counts: MigrationCounts
): Promise<MigrationReport> {
  const updated: MigrationReport = {
    ...report,
    summary: {
      ...report.summary,
      successful_migrations: counts.successful,
      failed_migrations: counts.failed
    }
  };
  await writeJson(reportPath, updated);
  return updated;
}
