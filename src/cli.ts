#!/usr/bin/env node
import fs from 'fs/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ZodError } from 'zod';
import { loadConfig, loadServeConfig } from './config.js';
import { DEFAULT_CATALOG_PATH, loadCatalog } from './catalog/catalog.js';
import { HttpProber } from './prober/client.js';
import { RdapClient } from './registry/rdap-client.js';
import { ReportServer } from './api/server.js';
import { runScan } from './scan-orchestrator.js';
import { ScanSetupError } from './errors.js';
import { createLogger } from './utils/logger.js';
import type { Report } from './types/report.js';

const MAX_WORKERS = 50;
const DEFAULT_LOG_DIR = 'logs';

interface ScanArgs {
  workers?: number | undefined;
  year?: number | undefined;
  quick: boolean;
  output?: string | undefined;
  catalog?: string | undefined;
  verbose: boolean;
}

interface ServeArgs {
  port?: number | undefined;
  report?: string | undefined;
}

async function scanCommand(args: ScanArgs): Promise<void> {
  const config = loadConfig({
    workers: args.workers,
    outputPath: args.output,
    catalogPath: args.catalog,
    logLevel: args.verbose ? 'debug' : undefined,
  });

  const workerCount = Math.min(config.workers, MAX_WORKERS);
  const logDir = config.logDir ?? DEFAULT_LOG_DIR;
  await fs.mkdir(logDir, { recursive: true });
  const catalog = await loadCatalog(config.catalogPath ?? DEFAULT_CATALOG_PATH);

  const prober = new HttpProber({
    timeout: config.probeTimeoutMs,
    maxRedirects: config.maxRedirects,
    maxContentBytes: config.maxContentBytes,
    userAgent: config.userAgent,
    proxyUrl: config.proxyUrl,
    logger: createLogger({ name: 'prober', level: config.logLevel, logFile: `${logDir}/prober.log` }),
  });

  const registry = new RdapClient({
    timeout: config.registryTimeoutMs,
    retryAttempts: config.registryRetryAttempts,
    retryDelay: config.registryRetryDelayMs,
    bootstrapUrl: config.rdapBootstrapUrl,
    logger: createLogger({ name: 'rdap', level: config.logLevel, logFile: `${logDir}/rdap.log` }),
  });

  console.log('\n========================================');
  console.log('   DOMAIN PROSPECTOR SCAN');
  console.log('========================================');
  console.log(`Workers: ${workerCount}`);
  console.log(`Year: ${args.year ?? 'all'}${args.quick ? ` (quick, first ${config.quickLimit} per year)` : ''}`);
  console.log(`Output: ${config.outputPath}`);
  console.log('========================================\n');

  const report = await runScan(catalog, {
    workerCount,
    yearFilter: args.year,
    quickMode: args.quick,
    quickLimit: config.quickLimit,
    outputPath: config.outputPath,
    domainDelay: config.domainDelayMs,
    prober,
    registry,
    logLevel: config.logLevel,
    logDir,
  });

  printSummary(report, config.outputPath);
}

function printSummary(report: Report, outputPath: string): void {
  console.log('\n--- Scan Summary ---');
  console.log(`Domains checked: ${report.totalDomains}`);
  for (const [status, count] of Object.entries(report.summary)) {
    console.log(`  ${status.padEnd(10)} ${count}`);
  }

  const opportunities = report.results
    .filter((record) => record.status === 'available' || record.status === 'expired' || record.status === 'for_sale')
    .slice(0, 10);

  if (opportunities.length > 0) {
    console.log('\nTop opportunities:');
    for (const record of opportunities) {
      console.log(`  ${String(record.score).padStart(2)}/10  ${record.domain} (${record.status}) ${record.recommendation.estimatedValue}`);
    }
  }

  console.log(`\nReport written to ${outputPath}`);
  console.log('--------------------\n');
}

async function serveCommand(args: ServeArgs): Promise<void> {
  const config = loadServeConfig({ port: args.port, reportPath: args.report });
  const server = new ReportServer({ port: config.port, reportPath: config.reportPath });

  const shutdown = (signal: string): void => {
    console.log(`\nReceived ${signal}, shutting down...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

function describeFailure(error: unknown): string {
  if (error instanceof ScanSetupError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof ZodError) {
    return `Invalid configuration: ${error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`;
  }
  return error instanceof Error ? error.message : 'Unknown error';
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('domain-prospector')
    .command(
      'scan',
      'Probe, classify and score the catalog',
      (command) =>
        command
          .option('workers', { type: 'number', describe: `Concurrent workers (max ${MAX_WORKERS})` })
          .option('year', { type: 'number', describe: 'Only domains that appeared in this year' })
          .option('quick', { type: 'boolean', default: false, describe: 'Only the first few domains of each year' })
          .option('output', { type: 'string', describe: 'Report file path' })
          .option('catalog', { type: 'string', describe: 'Catalog file path' })
          .option('verbose', { type: 'boolean', default: false, describe: 'Debug logging' }),
      (argv) => scanCommand(argv)
    )
    .command(
      'serve',
      'Serve the last report over HTTP',
      (command) =>
        command
          .option('port', { type: 'number', describe: 'Listen port (default 8090)' })
          .option('report', { type: 'string', describe: 'Report file path' }),
      (argv) => serveCommand(argv)
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .parseAsync();
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeFailure(error)}`);
  process.exit(1);
});
