import { lstatSync, Stats } from 'fs';
import { extname, join } from 'path';
import fg from 'fast-glob';
import { errorMessage, logger } from './logger.js';
import { FileOutcome, FileRecord } from './types.js';

const log = logger.child({ subContext: 'scanner' });

export interface ScanOptions {
  /** Top-level folder that holds organized output; never enumerated */
  outputDirName: string;
}

export interface ScanResult {
  records: FileRecord[];
  /** Entries that are not regular files or vanished while being read */
  skipped: FileOutcome[];
}

function describeSpecialEntry(stats: Stats): string | null {
  if (stats.isSymbolicLink()) return 'Symbolic link; links are not followed';
  if (stats.isFIFO()) return 'Special file (FIFO)';
  if (stats.isSocket()) return 'Special file (socket)';
  if (stats.isBlockDevice() || stats.isCharacterDevice()) return 'Special file (device)';
  return null;
}

function skippedEntry(path: string, name: string, reason: string, stats?: Stats): FileOutcome {
  return {
    path,
    name,
    size: stats?.size ?? 0,
    mtimeMs: stats?.mtimeMs ?? 0,
    category: null,
    disposition: { state: 'skipped', reason }
  };
}

/**
 * List the top level of `sourceDir` in name order. Sub-directories are
 * left alone; the output folder is excluded before any entry is read.
 */
export function scanSource(sourceDir: string, options: ScanOptions): ScanResult {
  const entries = fg.sync('*', {
    cwd: sourceDir,
    deep: 1,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    ignore: [fg.escapePath(options.outputDirName)]
  });

  const names = entries
    .map(entry => entry.name)
    .filter(name => name !== options.outputDirName)
    .sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));

  const records: FileRecord[] = [];
  const skipped: FileOutcome[] = [];

  for (const name of names) {
    const absolutePath = join(sourceDir, name);

    let stats: Stats;
    try {
      stats = lstatSync(absolutePath);
    } catch (error) {
      skipped.push(skippedEntry(absolutePath, name, `Could not read file metadata: ${errorMessage(error)}`));
      continue;
    }

    if (stats.isDirectory()) {
      log.debug(`Leaving directory in place: ${name}`);
      continue;
    }

    const special = describeSpecialEntry(stats);
    if (special) {
      skipped.push(skippedEntry(absolutePath, name, special, stats));
      continue;
    }

    records.push({
      path: absolutePath,
      name,
      size: stats.size,
      mtimeMs: stats.mtimeMs,
      extension: extname(name),
      category: ''
    });
  }

  log.debug(`Scanned ${records.length} files`, { sourceDir, skipped: skipped.length });
  return { records, skipped };
}
