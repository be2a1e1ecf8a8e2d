/**
 * Core types for the downloads organizer
 */

export type RunMode = 'dry-run' | 'live';

/**
 * One regular file found at the top level of the source directory.
 * `category` is assigned once during classification; `digest` is only
 * computed when content has to be compared.
 */
export interface FileRecord {
  readonly path: string;
  readonly name: string;
  readonly size: number;
  readonly mtimeMs: number;
  readonly extension: string;
  category: string;
  digest?: string;
  duplicateOf?: string;
}

/**
 * Extension lookup built once at startup. `categories` keeps the
 * configured order and ends with the fallback category.
 */
export interface CategoryTable {
  readonly extensions: ReadonlyMap<string, string>;
  readonly categories: readonly string[];
  readonly fallback: string;
}

export type Disposition =
  | { state: 'moved'; destination: string }
  | { state: 'deleted-duplicate'; duplicateOf: string; digest: string }
  | { state: 'dry-run-logged'; intended: 'move'; destination: string }
  | { state: 'dry-run-logged'; intended: 'delete-duplicate'; duplicateOf: string; digest: string }
  | { state: 'skipped'; reason: string };

export type DispositionState = Disposition['state'];

/**
 * A scanned entry with its terminal disposition. Entries that never
 * became a FileRecord (symlinks, special files) carry only name and path.
 */
export interface FileOutcome {
  path: string;
  name: string;
  size: number;
  mtimeMs: number;
  category: string | null;
  disposition: Disposition;
}

export interface RunReport {
  startedAt: Date;
  finishedAt: Date;
  mode: RunMode;
  organizeByDate: boolean;
  sourceDir: string;
  outputDir: string;
  categories: readonly string[];
  outcomes: FileOutcome[];
}

export interface ReportFileEntry {
  name: string;
  category: string;
  size: number;
  modified: string;
  destination: string;
}

export interface DuplicateEntry {
  name: string;
  path: string;
  duplicateOf: string;
  digest: string;
  bytes: number;
}

export interface SkippedEntry {
  name: string;
  path: string;
  reason: string;
}

export interface HistoricalAdditions {
  months: string[];
  series: Record<string, number[]>;
}

/**
 * Aggregate shared by every report rendering
 */
export interface ReportStats {
  metadata: {
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    mode: RunMode;
    organizeByDate: boolean;
    sourceDir: string;
    outputDir: string;
    filesScanned: number;
    filesOrganized: number;
    totalBytes: number;
    duplicatesRemoved: number;
    reclaimedBytes: number;
    filesSkipped: number;
  };
  categoryCounts: Record<string, number>;
  duplicates: DuplicateEntry[];
  largestFiles: ReportFileEntry[];
  oldestFiles: ReportFileEntry[];
  historicalAdditions: HistoricalAdditions;
  skipped: SkippedEntry[];
}
