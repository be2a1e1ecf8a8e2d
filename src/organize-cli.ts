#!/usr/bin/env node
/**
 * Downloads organizer CLI
 */

import { config } from 'dotenv';
import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import { buildCategoryTable } from './categorizer.js';
import { ConfigManager } from './config.js';
import { AppError, handleError, logger } from './logger.js';
import { organize } from './organizer.js';
import { renderConsoleSummary } from './report-renderer.js';
import { buildReportStats } from './report-stats.js';
import { writeReports } from './report-writer.js';
import { RunReport } from './types.js';

export interface CliOptions {
  dryRun: boolean;
  organizeByDate: boolean;
  help: boolean;
}

export interface CliDependencies {
  configManager?: ConfigManager;
  print?: (line: string) => void;
  now?: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: downloads-organizer [--dry-run] [--organize-by-date]

Organize the configured source folder into categorized subfolders.

Options:
  --dry-run           Simulate without moving or deleting files
  --organize-by-date  Create YYYY-MM subfolders inside each category
  -h, --help          Show this help`;

export class UsageError extends AppError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { dryRun: false, organizeByDate: false, help: false };

  for (const arg of argv) {
    switch (arg) {
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--organize-by-date':
        options.organizeByDate = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

/**
 * One line per intended action, in scan order
 */
export function describePlannedActions(report: RunReport): string[] {
  const lines: string[] = [];
  for (const outcome of report.outcomes) {
    const { disposition } = outcome;
    if (disposition.state !== 'dry-run-logged') continue;

    if (disposition.intended === 'move') {
      lines.push(`would move ${outcome.name} → ${disposition.destination}`);
    } else {
      lines.push(`would delete ${outcome.name} (duplicate of ${disposition.duplicateOf})`);
    }
  }
  return lines;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      print(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    print(USAGE);
    return EXIT_OK;
  }

  try {
    const manager = deps.configManager ?? new ConfigManager();
    const validation = manager.validate();
    if (!validation.valid) {
      throw new AppError(
        `Invalid configuration: ${validation.errors.join('; ')}`,
        'CONFIG_INVALID',
        { path: manager.getPath() }
      );
    }

    const settings = manager.getAll();
    logger.setMinLevel(settings.logLevel);
    const categoryTable = buildCategoryTable(settings.categories);
    const sourceDir = resolve(settings.sourceDir);

    print('=== Downloads Organizer ===');
    print(`Source: ${sourceDir}`);
    print(`Destination: ${resolve(sourceDir, settings.outputDirName)}`);
    if (options.dryRun) {
      print('Mode: DRY RUN (no changes)');
    }

    const report = await organize({
      sourceDir,
      categoryTable,
      outputDirName: settings.outputDirName,
      organizeByDate: options.organizeByDate,
      dryRun: options.dryRun,
      hashChunkBytes: settings.hashChunkBytes,
      now: deps.now
    });

    const stats = buildReportStats(report, { topN: settings.reportTopN });
    print('');
    print(renderConsoleSummary(stats));

    if (options.dryRun) {
      const planned = describePlannedActions(report);
      if (planned.length > 0) {
        print('');
        print('Planned actions:');
        planned.forEach(line => print(`- ${line}`));
      }
      return EXIT_OK;
    }

    const written = writeReports(stats, report.outputDir, report.startedAt);
    print('');
    print('Reports generated:');
    print(`- JSON: ${written.jsonPath}`);
    print(`- HTML: ${written.htmlPath}`);
    return EXIT_OK;
  } catch (error) {
    const appError = handleError(error, 'organize-cli');
    print(`❌ ${appError.message}`);
    return EXIT_FATAL;
  }
}

async function main(): Promise<void> {
  config({ override: false });
  process.exitCode = await runCli(process.argv.slice(2));
}

function invokedPath(): string {
  const argvPath = process.argv[1];
  if (!argvPath) return '';
  try {
    return realpathSync(argvPath);
  } catch {
    return resolve(argvPath);
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
const invokedScriptPath = invokedPath();

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main().catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = EXIT_FATAL;
  });
}
