import {
  accessSync,
  constants,
  copyFileSync,
  existsSync,
  lstatSync,
  mkdirSync,
  renameSync,
  statSync,
  unlinkSync
} from 'fs';
import { dirname, isAbsolute, join, parse, relative, resolve, sep } from 'path';
import { categorize } from './categorizer.js';
import { formatMonth } from './dates.js';
import { resolveDuplicates } from './duplicate-resolver.js';
import { FileHasher, hashFile as defaultHashFile } from './hasher.js';
import { FatalRunError, HashError, errorMessage, logger } from './logger.js';
import { ScanResult, scanSource } from './scanner.js';
import { CategoryTable, Disposition, FileOutcome, FileRecord, RunReport } from './types.js';

const log = logger.child({ subContext: 'organizer' });

export interface OrganizeOptions {
  sourceDir: string;
  categoryTable: CategoryTable;
  outputDirName?: string;
  organizeByDate?: boolean;
  dryRun?: boolean;
  hashChunkBytes?: number;
  hashFile?: FileHasher;
  now?: () => Date;
}

type Plan =
  | { kind: 'move'; destination: string }
  | { kind: 'delete-duplicate'; duplicateOf: string; digest: string }
  | { kind: 'skip'; reason: string };

interface RunContext {
  outputDir: string;
  organizeByDate: boolean;
  dryRun: boolean;
  hash: (filePath: string) => Promise<string>;
  /** Destinations handed out earlier in this run */
  claimed: Set<string>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function assertSourceDirectory(sourceDir: string): void {
  let isDirectory = false;
  try {
    isDirectory = statSync(sourceDir).isDirectory();
  } catch {
    throw new FatalRunError(`Source directory not found: ${sourceDir}`, 'SOURCE_NOT_FOUND', { sourceDir });
  }

  if (!isDirectory) {
    throw new FatalRunError(`Source path is not a directory: ${sourceDir}`, 'SOURCE_NOT_FOUND', { sourceDir });
  }
}

/**
 * Make sure the output root can receive files. Live runs create it;
 * dry runs only check access so nothing on disk changes.
 */
export function ensureDestinationWritable(sourceDir: string, outputDir: string, dryRun: boolean): void {
  try {
    if (existsSync(outputDir)) {
      if (!statSync(outputDir).isDirectory()) {
        throw new Error('path exists and is not a directory');
      }
      accessSync(outputDir, constants.W_OK);
    } else if (dryRun) {
      accessSync(sourceDir, constants.W_OK);
    } else {
      mkdirSync(outputDir, { recursive: true });
      accessSync(outputDir, constants.W_OK);
    }
  } catch (error) {
    throw new FatalRunError(
      `Destination is not writable: ${outputDir} (${errorMessage(error)})`,
      'DESTINATION_NOT_WRITABLE',
      { outputDir }
    );
  }
}

export function destinationFolder(record: FileRecord, outputDir: string, organizeByDate: boolean): string {
  const base = join(outputDir, record.category);
  return organizeByDate ? join(base, formatMonth(record.mtimeMs)) : base;
}

/**
 * `name_1.ext`, `name_2.ext`, … for the given attempt number
 */
export function suffixedName(fileName: string, attempt: number): string {
  const parsed = parse(fileName);
  return `${parsed.name}_${attempt}${parsed.ext}`;
}

/**
 * Whether anything, a dangling symlink included, already occupies `path`
 */
function isTaken(path: string): boolean {
  try {
    return lstatSync(path, { throwIfNoEntry: false }) !== undefined;
  } catch (error) {
    // A parent that is not a directory leaves the name free; the move reports it
    if (isErrnoException(error) && error.code === 'ENOTDIR') return false;
    throw error;
  }
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

async function ensureDigest(record: FileRecord, context: RunContext): Promise<string> {
  if (!record.digest) {
    record.digest = await context.hash(record.path);
  }
  return record.digest;
}

/**
 * Whether a file already sitting at `existingPath` has the record's content
 */
async function matchesExistingFile(
  record: FileRecord,
  existingPath: string,
  context: RunContext
): Promise<string | null> {
  const existing = lstatSync(existingPath);
  if (!existing.isFile() || existing.size !== record.size) {
    return null;
  }

  const digest = await ensureDigest(record, context);

  let existingDigest: string;
  try {
    existingDigest = await context.hash(existingPath);
  } catch (error) {
    log.debug(`Treating unreadable destination as distinct: ${existingPath}`, { reason: errorMessage(error) });
    return null;
  }

  return existingDigest === digest ? digest : null;
}

async function planMove(record: FileRecord, context: RunContext): Promise<Plan> {
  const folder = destinationFolder(record, context.outputDir, context.organizeByDate);
  if (!isInside(context.outputDir, folder)) {
    return { kind: 'skip', reason: `Destination folder is outside the output folder: ${folder}` };
  }

  let candidate = join(folder, record.name);
  let attempt = 0;

  try {
    while (context.claimed.has(candidate) || isTaken(candidate)) {
      if (!context.claimed.has(candidate) && candidate !== record.path) {
        const digest = await matchesExistingFile(record, candidate, context);
        if (digest) {
          record.duplicateOf = candidate;
          return { kind: 'delete-duplicate', duplicateOf: candidate, digest };
        }
      }

      attempt += 1;
      candidate = join(folder, suffixedName(record.name, attempt));
    }
  } catch (error) {
    return { kind: 'skip', reason: errorMessage(error) };
  }

  context.claimed.add(candidate);
  return { kind: 'move', destination: candidate };
}

function moveFile(source: string, destination: string): void {
  mkdirSync(dirname(destination), { recursive: true });
  try {
    renameSync(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    copyFileSync(source, destination, constants.COPYFILE_EXCL);
    unlinkSync(source);
  }
}

/**
 * Carry out (or, in a dry run, only record) what the plan says
 */
function applyPlan(record: FileRecord, plan: Plan, context: RunContext): Disposition {
  if (plan.kind === 'skip') {
    return { state: 'skipped', reason: plan.reason };
  }

  if (plan.kind === 'delete-duplicate') {
    if (context.dryRun) {
      return { state: 'dry-run-logged', intended: 'delete-duplicate', duplicateOf: plan.duplicateOf, digest: plan.digest };
    }
    try {
      unlinkSync(record.path);
    } catch (error) {
      return { state: 'skipped', reason: `Could not delete duplicate: ${errorMessage(error)}` };
    }
    log.debug(`Deleted duplicate ${record.name}`, { duplicateOf: plan.duplicateOf });
    return { state: 'deleted-duplicate', duplicateOf: plan.duplicateOf, digest: plan.digest };
  }

  if (context.dryRun) {
    return { state: 'dry-run-logged', intended: 'move', destination: plan.destination };
  }
  try {
    moveFile(record.path, plan.destination);
  } catch (error) {
    return { state: 'skipped', reason: `Could not move file: ${errorMessage(error)}` };
  }
  log.debug(`Moved ${record.name}`, { destination: plan.destination });
  return { state: 'moved', destination: plan.destination };
}

/**
 * Hash every record whose size is shared with another record. Content
 * can only match within a size, so the rest keep a lazy digest.
 */
async function hashSizeCollisions(
  records: FileRecord[],
  context: RunContext
): Promise<Map<string, string>> {
  const sizeCounts = new Map<number, number>();
  for (const record of records) {
    sizeCounts.set(record.size, (sizeCounts.get(record.size) ?? 0) + 1);
  }

  const failures = new Map<string, string>();
  for (const record of records) {
    if ((sizeCounts.get(record.size) ?? 0) < 2) continue;
    try {
      await ensureDigest(record, context);
    } catch (error) {
      failures.set(record.path, errorMessage(error));
    }
  }
  return failures;
}

function toOutcome(record: FileRecord, disposition: Disposition): FileOutcome {
  return {
    path: record.path,
    name: record.name,
    size: record.size,
    mtimeMs: record.mtimeMs,
    category: record.category,
    disposition
  };
}

/**
 * Organize the top level of `sourceDir` into `<outputDirName>/<category>[/<YYYY-MM>]`.
 *
 * Per-file failures end as skipped outcomes; a missing source or an
 * unwritable destination throws FatalRunError before anything is touched.
 */
export async function organize(options: OrganizeOptions): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const sourceDir = resolve(options.sourceDir);
  const outputDirName = options.outputDirName ?? 'Organized';
  const outputDir = join(sourceDir, outputDirName);
  const dryRun = options.dryRun ?? false;
  const hasher = options.hashFile ?? defaultHashFile;

  const context: RunContext = {
    outputDir,
    organizeByDate: options.organizeByDate ?? false,
    dryRun,
    hash: async filePath => {
      try {
        return await hasher(filePath, { chunkBytes: options.hashChunkBytes });
      } catch (error) {
        throw error instanceof HashError ? error : new HashError(filePath, errorMessage(error));
      }
    },
    claimed: new Set<string>()
  };

  assertSourceDirectory(sourceDir);

  let scan: ScanResult;
  try {
    scan = scanSource(sourceDir, { outputDirName });
  } catch (error) {
    throw new FatalRunError(
      `Source directory is not readable: ${sourceDir} (${errorMessage(error)})`,
      'SOURCE_NOT_READABLE',
      { sourceDir }
    );
  }

  ensureDestinationWritable(sourceDir, outputDir, dryRun);

  log.info(`Organizing ${scan.records.length} files`, { sourceDir, outputDir, dryRun });

  for (const record of scan.records) {
    record.category = categorize(record.extension, options.categoryTable);
  }

  const hashFailures = await hashSizeCollisions(scan.records, context);
  const groups = resolveDuplicates(scan.records.filter(record => !hashFailures.has(record.path)));
  const digestOf = new Map<string, string>();
  for (const group of groups) {
    for (const duplicate of group.duplicates) {
      digestOf.set(duplicate.path, group.digest);
    }
  }

  const outcomes: FileOutcome[] = [...scan.skipped];

  for (const record of scan.records) {
    let plan: Plan;
    const hashFailure = hashFailures.get(record.path);
    const duplicateDigest = digestOf.get(record.path);

    if (hashFailure) {
      plan = { kind: 'skip', reason: hashFailure };
    } else if (record.duplicateOf && duplicateDigest) {
      plan = { kind: 'delete-duplicate', duplicateOf: record.duplicateOf, digest: duplicateDigest };
    } else {
      plan = await planMove(record, context);
    }

    const disposition = applyPlan(record, plan, context);
    if (disposition.state === 'skipped') {
      log.warn(`Skipped ${record.name}: ${disposition.reason}`);
    }
    outcomes.push(toOutcome(record, disposition));
  }

  for (const outcome of scan.skipped) {
    if (outcome.disposition.state === 'skipped') {
      log.warn(`Skipped ${outcome.name}: ${outcome.disposition.reason}`);
    }
  }

  outcomes.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

  return {
    startedAt,
    finishedAt: now(),
    mode: dryRun ? 'dry-run' : 'live',
    organizeByDate: context.organizeByDate,
    sourceDir,
    outputDir,
    categories: options.categoryTable.categories,
    outcomes
  };
}
