import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join, resolve } from 'path';
import { ConfigManager, expandHome, loadDefaultCategories, parseCategoryGroups } from './config.js';
import { AppError } from './logger.js';

describe('ConfigManager', () => {
  let configDir: string;
  const savedEnv = { ...process.env };

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'organizer-config-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
    process.env = { ...savedEnv };
  });

  describe('Initialization', () => {
    it('should load defaults if the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      const config = manager.getAll();

      expect(config.sourceDir).toBe(resolve(homedir(), 'Downloads'));
      expect(config.outputDirName).toBe('Organized');
      expect(config.reportTopN).toBe(10);
      expect(config.hashChunkBytes).toBe(65536);
      expect(config.categories).toEqual(loadDefaultCategories());
      expect(manager.validate()).toEqual({ valid: true, errors: [] });
    });

    it('should remember the config path', () => {
      const configPath = join(configDir, 'organizer.config.yaml');
      expect(new ConfigManager(configPath).getPath()).toBe(configPath);
    });
  });

  describe('JSON Configuration', () => {
    it('should merge custom config with defaults', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(
        configPath,
        JSON.stringify({ sourceDir: configDir, reportTopN: 5, categories: { Ebooks: ['.epub'] } })
      );

      const config = new ConfigManager(configPath).getAll();

      expect(config.sourceDir).toBe(configDir);
      expect(config.reportTopN).toBe(5);
      expect(config.outputDirName).toBe('Organized');
      expect(config.categories.Ebooks).toEqual(['.epub']);
      expect(config.categories.Images).toContain('.jpg');
    });

    it('should replace a default category by name', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ categories: { Images: ['.heic'] } }));

      const config = new ConfigManager(configPath).getAll();

      expect(config.categories.Images).toEqual(['.heic']);
    });

    it('should ignore unknown keys', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ colour: 'blue', reportTopN: 3 }));

      const manager = new ConfigManager(configPath);

      expect(manager.getAll().reportTopN).toBe(3);
      expect(Object.keys(manager.getAll())).not.toContain('colour');
      expect(manager.validate().valid).toBe(true);
    });

    it('should report a mistyped value instead of using defaults', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ sourceDir: configDir, reportTopN: 'ten' }));

      const result = new ConfigManager(configPath).validate();

      expect(result).toEqual({
        valid: false,
        errors: [`Could not load ${configPath}: reportTopN must be a number`]
      });
    });

    it('should report a file that cannot be parsed', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, '{ not json');

      const result = new ConfigManager(configPath).validate();

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].startsWith(`Could not load ${configPath}: `)).toBe(true);
    });
  });

  describe('YAML Configuration', () => {
    it('should load YAML configuration and expand the home directory', () => {
      const configPath = join(configDir, 'organizer.config.yaml');
      writeFileSync(
        configPath,
        ['sourceDir: ~/Inbox', 'outputDirName: Sorted', 'hashChunkBytes: 4096', 'logLevel: warn', ''].join('\n')
      );
      delete process.env.LOG_LEVEL;

      const config = new ConfigManager(configPath).getAll();

      expect(config.sourceDir).toBe(join(homedir(), 'Inbox'));
      expect(config.outputDirName).toBe('Sorted');
      expect(config.hashChunkBytes).toBe(4096);
      expect(config.logLevel).toBe('warn');
    });
  });

  describe('YAML Configuration errors', () => {
    it('should report a category listed as a string instead of a list', () => {
      const configPath = join(configDir, 'organizer.config.yaml');
      writeFileSync(configPath, [`sourceDir: ${configDir}`, 'categories:', '  Ebooks: .epub', ''].join('\n'));

      const result = new ConfigManager(configPath).validate();

      expect(result).toEqual({
        valid: false,
        errors: [`Could not load ${configPath}: Category "Ebooks" in ${configPath} must list extensions as strings`]
      });
    });
  });

  describe('Environment', () => {
    it('should let ORGANIZER_SOURCE_DIR override the configured folder', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ sourceDir: '/somewhere/else' }));
      process.env.ORGANIZER_SOURCE_DIR = configDir;

      expect(new ConfigManager(configPath).getAll().sourceDir).toBe(configDir);
    });

    it('should let LOG_LEVEL override the configured level', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ logLevel: 'debug' }));
      process.env.LOG_LEVEL = 'WARN';

      expect(new ConfigManager(configPath).getAll().logLevel).toBe('warn');
    });
  });

  describe('Configuration Validation', () => {
    it('should reject an extension claimed by two categories', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ categories: { Notes: ['.md'] } }));

      const result = new ConfigManager(configPath).validate();

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Extension .md is listed under both Documents and Notes']);
    });

    it('should reject an output folder name with separators', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ outputDirName: 'a/b', reportTopN: 0 }));

      const result = new ConfigManager(configPath).validate();

      expect(result.errors).toEqual([
        'outputDirName must be a single folder name',
        'reportTopN must be a positive integer'
      ]);
    });

    it('should reject category names that leave the output folder', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ categories: { '..': ['.epub'], '.': ['.mobi'] } }));

      expect(new ConfigManager(configPath).validate().errors).toEqual([
        'Invalid category name: ".."',
        'Invalid category name: "."'
      ]);
    });

    it('should reject a tiny hash chunk size', () => {
      const configPath = join(configDir, 'organizer.config.json');
      writeFileSync(configPath, JSON.stringify({ hashChunkBytes: 10 }));

      expect(new ConfigManager(configPath).validate().errors).toEqual([
        'hashChunkBytes must be an integer of at least 1024'
      ]);
    });
  });

  describe('Copies', () => {
    it('should return copies so callers cannot change the config', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.getAll().categories.Images.push('.raw');

      expect(manager.getAll().categories.Images).not.toContain('.raw');
    });
  });
});

describe('parseCategoryGroups', () => {
  it('should reject a table that is not a mapping', () => {
    expect(() => parseCategoryGroups(['.jpg'], 'test.yaml')).toThrow(AppError);
    expect(() => parseCategoryGroups(['.jpg'], 'test.yaml')).toThrow('Category table in test.yaml must be a mapping');
  });

  it('should reject non-string extensions', () => {
    expect(() => parseCategoryGroups({ Images: [1, 2] }, 'test.yaml')).toThrow(
      'Category "Images" in test.yaml must list extensions as strings'
    );
  });
});

describe('expandHome', () => {
  it('should expand a leading tilde only', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/Downloads')).toBe(join(homedir(), 'Downloads'));
    expect(expandHome('/tmp/~/x')).toBe('/tmp/~/x');
  });
});
