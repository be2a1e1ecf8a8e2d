/**
 * JSON, HTML and console renderings of a ReportStats
 */

import { formatDay } from './dates.js';
import { ReportFileEntry, ReportStats } from './types.js';

/**
 * Escape HTML special characters
 */
export function escapeHtml(value: string | number): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}

function barWidth(value: number, max: number): string {
  if (max <= 0) return '0.0%';
  return `${((value / max) * 100).toFixed(1)}%`;
}

export function renderJsonReport(stats: ReportStats): string {
  const payload = {
    metadata: stats.metadata,
    categoryCounts: stats.categoryCounts,
    duplicates: {
      count: stats.duplicates.length,
      reclaimedBytes: stats.metadata.reclaimedBytes,
      files: stats.duplicates
    },
    largestFiles: stats.largestFiles,
    oldestFiles: stats.oldestFiles,
    historicalAdditions: stats.historicalAdditions,
    skipped: stats.skipped
  };
  return `${JSON.stringify(payload, null, 2)}\n`;
}

function renderBarChart(rows: Array<[string, number]>): string {
  const max = Math.max(0, ...rows.map(([, value]) => value));
  return rows
    .map(
      ([label, value]) =>
        `      <div class="bar-row"><span class="bar-label">${escapeHtml(label)}</span>` +
        `<span class="bar" style="width: ${barWidth(value, max)}"></span>` +
        `<span class="bar-value">${escapeHtml(value)}</span></div>`
    )
    .join('\n');
}

function renderFileTable(files: ReportFileEntry[], dateColumn: 'size' | 'modified'): string {
  const header = dateColumn === 'size'
    ? '<tr><th>File</th><th>Size (MB)</th><th>Type</th><th>Path</th></tr>'
    : '<tr><th>File</th><th>Last Modified</th><th>Type</th><th>Path</th></tr>';

  const rows = files.map(file => {
    const detail = dateColumn === 'size' ? formatMegabytes(file.size) : formatDay(Date.parse(file.modified));
    return (
      `      <tr><td>${escapeHtml(file.name)}</td><td>${escapeHtml(detail)}</td>` +
      `<td>${escapeHtml(file.category)}</td><td>${escapeHtml(file.destination)}</td></tr>`
    );
  });

  return [`    <table>`, `      ${header}`, ...rows, `    </table>`].join('\n');
}

function renderHistory(stats: ReportStats): string {
  const { months, series } = stats.historicalAdditions;
  if (months.length === 0) {
    return '    <p class="empty">No files were organized.</p>';
  }

  const categories = Object.keys(series);
  const totals = months.map((_, index) =>
    categories.reduce((total, category) => total + (series[category]?.[index] ?? 0), 0)
  );
  const max = Math.max(0, ...totals);

  const header = `      <tr><th>Month</th>${categories.map(category => `<th>${escapeHtml(category)}</th>`).join('')}<th>Total</th></tr>`;
  const rows = months.map((month, index) => {
    const cells = categories.map(category => `<td>${escapeHtml(series[category]?.[index] ?? 0)}</td>`).join('');
    return (
      `      <tr><td>${escapeHtml(month)}</td>${cells}` +
      `<td><span class="bar" style="width: ${barWidth(totals[index], max)}"></span> ${escapeHtml(totals[index])}</td></tr>`
    );
  });

  return [`    <table>`, header, ...rows, `    </table>`].join('\n');
}

function renderDuplicates(stats: ReportStats): string {
  if (stats.duplicates.length === 0) {
    return '    <p class="empty">No duplicates found.</p>';
  }
  const rows = stats.duplicates.map(
    entry =>
      `      <tr><td>${escapeHtml(entry.name)}</td><td>${escapeHtml(entry.duplicateOf)}</td>` +
      `<td>${escapeHtml(formatMegabytes(entry.bytes))}</td><td><code>${escapeHtml(entry.digest.slice(0, 12))}</code></td></tr>`
  );
  return [
    '    <table>',
    '      <tr><th>File</th><th>Duplicate Of</th><th>Size (MB)</th><th>Digest</th></tr>',
    ...rows,
    '    </table>'
  ].join('\n');
}

function renderSkipped(stats: ReportStats): string {
  if (stats.skipped.length === 0) {
    return '    <p class="empty">No files were skipped.</p>';
  }
  const rows = stats.skipped.map(
    entry => `      <tr><td>${escapeHtml(entry.name)}</td><td>${escapeHtml(entry.reason)}</td></tr>`
  );
  return ['    <table>', '      <tr><th>File</th><th>Reason</th></tr>', ...rows, '    </table>'].join('\n');
}

export function renderHtmlReport(stats: ReportStats): string {
  const { metadata } = stats;
  const title = metadata.mode === 'dry-run' ? 'Organization Report (dry run)' : 'Organization Report';

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>
      body { font-family: Arial, sans-serif; margin: 2rem; }
      section { margin: 2rem 0; max-width: 900px; }
      table { border-collapse: collapse; width: 100%; }
      th, td { padding: 8px; text-align: left; border-bottom: 1px solid #ddd; }
      tr:hover { background-color: #f5f5f5; }
      .bar-row { display: flex; align-items: center; gap: 0.5rem; margin: 4px 0; }
      .bar-label { width: 8rem; }
      .bar { display: inline-block; height: 14px; background: #36A2EB; min-width: 1px; }
      .bar-value { color: #555; }
      .empty { color: #777; }
    </style>
  </head>
  <body>
    <h1>${escapeHtml(title)}</h1>
    <section>
      <h2>Summary</h2>
      <table>
        <tr><th>Source</th><td>${escapeHtml(metadata.sourceDir)}</td></tr>
        <tr><th>Destination</th><td>${escapeHtml(metadata.outputDir)}</td></tr>
        <tr><th>Started</th><td>${escapeHtml(metadata.startedAt)}</td></tr>
        <tr><th>Files scanned</th><td>${escapeHtml(metadata.filesScanned)}</td></tr>
        <tr><th>Files organized</th><td>${escapeHtml(metadata.filesOrganized)}</td></tr>
        <tr><th>Total size (MB)</th><td>${escapeHtml(formatMegabytes(metadata.totalBytes))}</td></tr>
        <tr><th>Duplicates removed</th><td>${escapeHtml(metadata.duplicatesRemoved)}</td></tr>
        <tr><th>Reclaimed (MB)</th><td>${escapeHtml(formatMegabytes(metadata.reclaimedBytes))}</td></tr>
        <tr><th>Skipped</th><td>${escapeHtml(metadata.filesSkipped)}</td></tr>
      </table>
    </section>
    <section>
      <h2>File Type Distribution</h2>
${renderBarChart(Object.entries(stats.categoryCounts))}
    </section>
    <section>
      <h2>Historical Additions</h2>
${renderHistory(stats)}
    </section>
    <section>
      <h2>Largest Files (Top ${stats.largestFiles.length})</h2>
${renderFileTable(stats.largestFiles, 'size')}
    </section>
    <section>
      <h2>Oldest Files (Top ${stats.oldestFiles.length})</h2>
${renderFileTable(stats.oldestFiles, 'modified')}
    </section>
    <section>
      <h2>Duplicates Removed</h2>
${renderDuplicates(stats)}
    </section>
    <section>
      <h2>Skipped Files</h2>
${renderSkipped(stats)}
    </section>
  </body>
</html>
`;
}

export function renderConsoleSummary(stats: ReportStats): string {
  const { metadata } = stats;
  const lines = [
    '=== Organization Summary ===',
    `Mode: ${metadata.mode}`,
    `Total files processed: ${metadata.filesOrganized}`,
    `Duplicates found/removed: ${metadata.duplicatesRemoved}`,
    `Total space used: ${formatMegabytes(metadata.totalBytes)} MB`,
    `Space reclaimed: ${formatMegabytes(metadata.reclaimedBytes)} MB`,
    `Skipped: ${metadata.filesSkipped}`,
    '',
    'File Type Breakdown:',
    ...Object.entries(stats.categoryCounts).map(([category, count]) => `- ${category}: ${count} files`)
  ];

  if (stats.skipped.length > 0) {
    lines.push('', 'Skipped Files:', ...stats.skipped.map(entry => `- ${entry.name}: ${entry.reason}`));
  }

  return lines.join('\n');
}
