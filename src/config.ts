/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import YAML from 'js-yaml';
import { isFolderName, normalizeExtension } from './categorizer.js';
import { AppError, LogLevel, logger, parseLogLevel } from './logger.js';

/** Category name → extensions, in display order */
export type CategoryGroups = Record<string, string[]>;

export interface OrganizerConfig {
  sourceDir: string;
  outputDirName: string;
  categories: CategoryGroups;
  reportTopN: number;
  hashChunkBytes: number;
  logLevel: LogLevel;
}

const log = logger.child({ subContext: 'ConfigManager' });

export const DEFAULT_CATEGORIES_PATH = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  'config',
  'categories.yaml'
);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function parseCategoryGroups(value: unknown, origin: string): CategoryGroups {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new AppError(`Category table in ${origin} must be a mapping`, 'CONFIG_INVALID', { origin });
  }

  const groups: CategoryGroups = {};
  for (const [category, extensions] of Object.entries(value)) {
    if (!isStringArray(extensions)) {
      throw new AppError(
        `Category "${category}" in ${origin} must list extensions as strings`,
        'CONFIG_INVALID',
        { origin, category }
      );
    }
    groups[category] = [...extensions];
  }
  return groups;
}

export function loadDefaultCategories(filePath: string = DEFAULT_CATEGORIES_PATH): CategoryGroups {
  return parseCategoryGroups(YAML.load(readFileSync(filePath, 'utf-8')), filePath);
}

export function expandHome(value: string): string {
  if (value === '~') return homedir();
  if (value.startsWith('~/')) return join(homedir(), value.slice(2));
  return value;
}

export function createDefaultConfig(): OrganizerConfig {
  return {
    sourceDir: join(homedir(), 'Downloads'),
    outputDirName: 'Organized',
    categories: loadDefaultCategories(),
    reportTopN: 10,
    hashChunkBytes: 64 * 1024,
    logLevel: 'info'
  };
}

function cloneConfig(config: OrganizerConfig): OrganizerConfig {
  return structuredClone(config);
}

/**
 * Keep only recognised keys. A known key with the wrong type makes the
 * whole file unusable.
 */
function pickUserConfig(raw: unknown, origin: string): Partial<OrganizerConfig> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error(`Config root must be a mapping: ${origin}`);
  }

  const picked: Partial<OrganizerConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;

    switch (key) {
      case 'sourceDir':
      case 'outputDirName':
        if (typeof value !== 'string') throw new Error(`${key} must be a string`);
        picked[key] = value;
        break;
      case 'reportTopN':
      case 'hashChunkBytes':
        if (typeof value !== 'number') throw new Error(`${key} must be a number`);
        picked[key] = value;
        break;
      case 'logLevel':
        if (typeof value !== 'string') throw new Error('logLevel must be a string');
        picked.logLevel = parseLogLevel(value);
        break;
      case 'categories':
        picked.categories = parseCategoryGroups(value, origin);
        break;
      default:
        log.warn(`Unknown config key: ${key}`, { origin });
    }
  }
  return picked;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: OrganizerConfig;
  private configPath: string;
  /** Why an existing config file could not be used */
  private loadError: string | null = null;

  constructor(configPath: string = process.env.ORGANIZER_CONFIG || './organizer.config.yaml') {
    this.configPath = configPath;
    this.config = this.applyEnvironment(this.loadConfig());
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): OrganizerConfig {
    const defaults = createDefaultConfig();

    if (!existsSync(this.configPath)) {
      log.debug(`Config file not found: ${this.configPath}, using defaults`);
      return defaults;
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      const user = pickUserConfig(parsed, this.configPath);
      log.info(`Loaded configuration from ${this.configPath}`);

      return this.mergeConfigs(defaults, user);
    } catch (error) {
      this.loadError = error instanceof Error ? error.message : String(error);
      log.warn(`Failed to load config: ${this.loadError}`, { path: this.configPath });
      return defaults;
    }
  }

  /**
   * Merge user config with defaults (user config takes precedence).
   * Category groups merge by category name, so a user file can add or
   * redefine single categories.
   */
  private mergeConfigs(defaults: OrganizerConfig, user: Partial<OrganizerConfig>): OrganizerConfig {
    return {
      ...defaults,
      ...user,
      categories: { ...defaults.categories, ...(user.categories ?? {}) }
    };
  }

  private applyEnvironment(config: OrganizerConfig): OrganizerConfig {
    const sourceDir = process.env.ORGANIZER_SOURCE_DIR?.trim();
    const logLevel = process.env.LOG_LEVEL?.trim();

    return {
      ...config,
      sourceDir: resolve(expandHome(sourceDir || config.sourceDir)),
      logLevel: logLevel ? parseLogLevel(logLevel, config.logLevel) : config.logLevel
    };
  }

  /**
   * Get complete configuration
   */
  getAll(): OrganizerConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    if (this.loadError) {
      errors.push(`Could not load ${this.configPath}: ${this.loadError}`);
    }

    const { outputDirName, reportTopN, hashChunkBytes, categories } = this.config;

    if (!isFolderName(outputDirName)) {
      errors.push('outputDirName must be a single folder name');
    }

    if (!Number.isInteger(reportTopN) || reportTopN < 1) {
      errors.push('reportTopN must be a positive integer');
    }

    if (!Number.isInteger(hashChunkBytes) || hashChunkBytes < 1024) {
      errors.push('hashChunkBytes must be an integer of at least 1024');
    }

    const owners = new Map<string, string>();
    for (const [category, extensions] of Object.entries(categories)) {
      if (!isFolderName(category)) {
        errors.push(`Invalid category name: "${category}"`);
      }
      for (const extension of extensions) {
        const key = normalizeExtension(extension);
        if (!key) continue;
        const owner = owners.get(key);
        if (owner && owner !== category) {
          errors.push(`Extension ${extension} is listed under both ${owner} and ${category}`);
        }
        owners.set(key, category);
      }
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
