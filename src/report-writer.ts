import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { formatFileStamp } from './dates.js';
import { logger } from './logger.js';
import { renderHtmlReport, renderJsonReport } from './report-renderer.js';
import { ReportStats } from './types.js';

export interface WrittenReports {
  jsonPath: string;
  htmlPath: string;
}

export function reportBaseName(startedAt: Date): string {
  return `report_${formatFileStamp(startedAt)}`;
}

/**
 * Write `report_YYYYMMDD_HHMMSS.{json,html}` into the output folder
 */
export function writeReports(stats: ReportStats, outputDir: string, startedAt: Date): WrittenReports {
  mkdirSync(outputDir, { recursive: true });
  const baseName = reportBaseName(startedAt);
  const jsonPath = join(outputDir, `${baseName}.json`);
  const htmlPath = join(outputDir, `${baseName}.html`);

  writeFileSync(jsonPath, renderJsonReport(stats), 'utf8');
  writeFileSync(htmlPath, renderHtmlReport(stats), 'utf8');

  logger.debug('Reports written', { jsonPath, htmlPath });
  return { jsonPath, htmlPath };
}
