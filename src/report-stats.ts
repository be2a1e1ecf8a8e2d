import { relative } from 'path';
import { formatMonth } from './dates.js';
import {
  DuplicateEntry,
  FileOutcome,
  HistoricalAdditions,
  ReportFileEntry,
  ReportStats,
  RunReport,
  SkippedEntry
} from './types.js';

export interface ReportStatsOptions {
  topN?: number;
}

interface OrganizedFile {
  outcome: FileOutcome;
  category: string;
  destination: string;
}

function compareText(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Files that were moved, or would have been in a dry run
 */
function organizedFiles(report: RunReport): OrganizedFile[] {
  const organized: OrganizedFile[] = [];

  for (const outcome of report.outcomes) {
    const { disposition } = outcome;
    const destination =
      disposition.state === 'moved' ||
      (disposition.state === 'dry-run-logged' && disposition.intended === 'move')
        ? disposition.destination
        : null;

    if (destination !== null && outcome.category !== null) {
      organized.push({ outcome, category: outcome.category, destination });
    }
  }

  return organized;
}

function duplicateEntries(report: RunReport): DuplicateEntry[] {
  const duplicates: DuplicateEntry[] = [];

  for (const outcome of report.outcomes) {
    const { disposition } = outcome;
    if (
      disposition.state === 'deleted-duplicate' ||
      (disposition.state === 'dry-run-logged' && disposition.intended === 'delete-duplicate')
    ) {
      duplicates.push({
        name: outcome.name,
        path: outcome.path,
        duplicateOf: disposition.duplicateOf,
        digest: disposition.digest,
        bytes: outcome.size
      });
    }
  }

  return duplicates;
}

function skippedEntries(report: RunReport): SkippedEntry[] {
  const skipped: SkippedEntry[] = [];
  for (const outcome of report.outcomes) {
    if (outcome.disposition.state === 'skipped') {
      skipped.push({ name: outcome.name, path: outcome.path, reason: outcome.disposition.reason });
    }
  }
  return skipped;
}

function toFileEntry(file: OrganizedFile, outputDir: string): ReportFileEntry {
  return {
    name: file.outcome.name,
    category: file.category,
    size: file.outcome.size,
    modified: new Date(file.outcome.mtimeMs).toISOString(),
    destination: relative(outputDir, file.destination)
  };
}

/**
 * Month-by-category counts of organized files, months ascending,
 * every category present in every series.
 */
export function buildHistoricalAdditions(
  files: Array<{ category: string; mtimeMs: number }>,
  categories: readonly string[]
): HistoricalAdditions {
  const counts = new Map<string, Map<string, number>>();

  for (const file of files) {
    const month = formatMonth(file.mtimeMs);
    const perCategory = counts.get(month) ?? new Map<string, number>();
    perCategory.set(file.category, (perCategory.get(file.category) ?? 0) + 1);
    counts.set(month, perCategory);
  }

  const months = [...counts.keys()].sort(compareText);
  const series: Record<string, number[]> = {};
  for (const category of categories) {
    series[category] = months.map(month => counts.get(month)?.get(category) ?? 0);
  }

  return { months, series };
}

/**
 * Aggregate a finished run once; every renderer reads from this.
 */
export function buildReportStats(report: RunReport, options: ReportStatsOptions = {}): ReportStats {
  const topN = options.topN ?? 10;
  const organized = organizedFiles(report);
  const duplicates = duplicateEntries(report);
  const skipped = skippedEntries(report);

  const categoryCounts: Record<string, number> = {};
  for (const category of report.categories) {
    categoryCounts[category] = 0;
  }
  for (const file of organized) {
    categoryCounts[file.category] = (categoryCounts[file.category] ?? 0) + 1;
  }

  const largestFiles = [...organized]
    .sort((left, right) => right.outcome.size - left.outcome.size || compareText(left.outcome.name, right.outcome.name))
    .slice(0, topN)
    .map(file => toFileEntry(file, report.outputDir));

  const oldestFiles = [...organized]
    .sort((left, right) => left.outcome.mtimeMs - right.outcome.mtimeMs || compareText(left.outcome.name, right.outcome.name))
    .slice(0, topN)
    .map(file => toFileEntry(file, report.outputDir));

  const historicalAdditions = buildHistoricalAdditions(
    organized.map(file => ({ category: file.category, mtimeMs: file.outcome.mtimeMs })),
    Object.keys(categoryCounts)
  );

  return {
    metadata: {
      startedAt: report.startedAt.toISOString(),
      finishedAt: report.finishedAt.toISOString(),
      durationMs: report.finishedAt.getTime() - report.startedAt.getTime(),
      mode: report.mode,
      organizeByDate: report.organizeByDate,
      sourceDir: report.sourceDir,
      outputDir: report.outputDir,
      filesScanned: report.outcomes.length,
      filesOrganized: organized.length,
      totalBytes: organized.reduce((total, file) => total + file.outcome.size, 0),
      duplicatesRemoved: duplicates.length,
      reclaimedBytes: duplicates.reduce((total, entry) => total + entry.bytes, 0),
      filesSkipped: skipped.length
    },
    categoryCounts,
    duplicates,
    largestFiles,
    oldestFiles,
    historicalAdditions,
    skipped
  };
}

