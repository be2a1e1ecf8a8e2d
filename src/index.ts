export * from './types.js';
export { buildCategoryTable, categorize, isFolderName, normalizeExtension, FALLBACK_CATEGORY } from './categorizer.js';
export { hashFile, DEFAULT_HASH_CHUNK_BYTES } from './hasher.js';
export type { FileHasher, HashOptions } from './hasher.js';
export { resolveDuplicates, compareCanonicalOrder } from './duplicate-resolver.js';
export type { DuplicateGroup } from './duplicate-resolver.js';
export { scanSource } from './scanner.js';
export { organize } from './organizer.js';
export type { OrganizeOptions } from './organizer.js';
export { buildReportStats, buildHistoricalAdditions } from './report-stats.js';
export { renderJsonReport, renderHtmlReport, renderConsoleSummary } from './report-renderer.js';
export { writeReports } from './report-writer.js';
export { ConfigManager } from './config.js';
export type { OrganizerConfig, CategoryGroups } from './config.js';
export { Logger, logger, AppError, HashError, FatalRunError, handleError } from './logger.js';
