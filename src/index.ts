#!/usr/bin/env node

import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import ora from 'ora';
import { CatalogExtractor } from './catalogExtractor.js';
import { CatalogReader } from './catalogReader.js';
import { USAGE, parseArgs, type CliOptions } from './cliArgs.js';
import { loadConfig, type MigratorConfig } from './config.js';
import { loadDotEnv } from './env.js';
import { ConfigError, describeError } from './errors.js';
import { createRunLogger } from './logger.js';
import { MigrationDriver } from './migrationDriver.js';
import { cleanupRun, runMigration, type RunResult } from './migrationRun.js';
import { RemoteFileStore } from './remoteFileStore.js';
import type { ConfirmUpload } from './types.js';
import { WooCommerceClient } from './wooCommerceClient.js';

function showBanner(config: MigratorConfig): void {
  const lines = [
    chalk.bold('PrestaShop → WooCommerce image migration'),
    '',
    `${chalk.dim('FTP')}          ${config.ftp.host}${config.ftp.basePath}`,
    `${chalk.dim('Catalog')}      ${config.catalog.host}/${config.catalog.database}`,
    `${chalk.dim('WooCommerce')}  ${config.wooCommerce.apiUrl}`
  ];
  console.log(boxen(lines.join('\n'), { padding: 1, borderColor: 'cyan', borderStyle: 'round' }));
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

function createConfirm(options: CliOptions): ConfirmUpload {
  return async (report, reportPath) => {
    const table = new Table({
      style: { head: ['cyan'] },
      colWidths: [28, 60]
    });
    table.push(
      ['📄 Extraction report', chalk.cyan(reportPath)],
      ['📦 Products extracted', chalk.green(String(report.summary.total_products))],
      ['🖼️  Images staged', chalk.green(String(report.summary.total_images))],
      ['🔢 Total stock', chalk.magenta(String(report.summary.total_stock))]
    );
    console.log('\n' + table.toString());

    if (options.assumeYes) {
      console.log(chalk.dim('  --yes given, uploading without confirmation\n'));
      return true;
    }

    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
      {
        type: 'confirm',
        name: 'proceed',
        message: chalk.bold(`Upload ${report.summary.total_products} product(s) to WooCommerce?`),
        default: false,
        prefix: '🚚'
      }
    ]);
    return proceed;
  };
}

function printResult(result: RunResult): void {
  switch (result.outcome) {
    case 'no-products':
      console.log(chalk.red('\nNo product could be extracted. Check the log file for details.'));
      return;
    case 'cancelled':
      console.log(chalk.yellow('\nMigration cancelled.'));
      return;
    case 'migrated':
    case 'migration-failed': {
      const counts = result.counts ?? { successful: 0, failed: 0 };
      const table = new Table({ style: { head: ['cyan'] }, colWidths: [28, 20] });
      table.push(
        ['✅ Products migrated', chalk.green(String(counts.successful))],
        ['❌ Products failed', counts.failed > 0 ? chalk.red(String(counts.failed)) : chalk.dim('0')]
      );
      console.log('\n' + table.toString());
      if (result.outcome === 'migrated') {
        console.log(chalk.green('Migration finished.'));
      } else {
        console.log(chalk.red('The migration failed. Check the log file for details.'));
      }
    }
  }
}

async function main(): Promise<void> {
  const startedAt = Date.now();

  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(chalk.red(describeError(error)));
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }
  if (options.help) {
    console.log(USAGE);
    return;
  }

  await loadDotEnv();

  let config: MigratorConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const { logger, logFile } = createRunLogger(config.logsDir, config.logLevel);
  logger.info({ options }, 'Migration process started');
  showBanner(config);

  const spinner = ora({ text: 'Connecting...', color: 'cyan' });
  const store = new RemoteFileStore(config.ftp, logger);
  const catalog = new CatalogReader(config.catalog, logger);
  const client = new WooCommerceClient(config.wooCommerce, { logger });
  const extractor = new CatalogExtractor(store, catalog, {
    stagingDir: config.stagingDir,
    logger,
    limit: options.limit,
    onProgress: (done, total, productId) => {
      spinner.text = `Extracting product ${productId} (${done}/${total})`;
    }
  });
  const driver = new MigrationDriver(client, logger);
  const confirm = createConfirm(options);

  const onInterrupt = (): void => {
    spinner.stop();
    logger.warn('Interrupted by user');
    console.log(chalk.yellow('\nOperation interrupted by user.'));
    void cleanupRun({ catalog, stagingDir: config.stagingDir, logger })
      .catch((error: unknown) => {
        logger.error({ err: describeError(error) }, 'Cleanup after interrupt failed');
      })
      .finally(() => {
        process.exit(130);
      });
  };
  process.once('SIGINT', onInterrupt);

  let succeeded = false;
  try {
    spinner.start('Extracting PrestaShop data...');
    const result = await runMigration({
      extractor,
      driver,
      catalog,
      confirm: async (report, reportPath) => {
        spinner.stop();
        const proceed = await confirm(report, reportPath);
        if (proceed) {
          spinner.start('Uploading images to WooCommerce...');
        }
        return proceed;
      },
      reportsDir: config.logsDir,
      stagingDir: config.stagingDir,
      logger
    });
    spinner.stop();
    printResult(result);
    succeeded = result.outcome === 'migrated' || result.outcome === 'cancelled';
  } catch (error) {
    spinner.stop();
    logger.fatal({ err: describeError(error) }, 'Migration aborted');
    console.error(chalk.red(`\nA critical error occurred: ${describeError(error)}`));
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const duration = formatDuration(Date.now() - startedAt);
  logger.info({ durationMs: Date.now() - startedAt, succeeded }, 'Migration process finished');
  if (succeeded) {
    console.log(chalk.dim(`\nDone in ${duration}. Log: ${logFile}`));
  } else {
    console.log(chalk.red(`\nFinished with errors after ${duration}. See ${logFile}`));
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Image migration failed:', error);
  process.exitCode = 1;
});
