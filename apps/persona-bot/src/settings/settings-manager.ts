/**
 * Settings Manager
 *
 * Loads defaults, merges the settings file over them, applies environment
 * overrides, and validates the result. Values are read and written through
 * dot-separated paths such as "matrix.homeserver".
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { JsonFile } from '../persistence/json-file';
import { CONFIG } from '../utils/config';
import { SettingsError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  ChatSettings,
  DEFAULT_SETTINGS,
  ENV_OVERRIDES,
  EmulatorSettings,
  FeatureSettings,
  SecuritySettings,
  Settings,
  isSectionName,
  settingsSchema,
  settingsWarnings,
} from './schema';

const logger = createLogger('SettingsManager');

const settingsFileSchema = z.record(z.unknown());

const BACKUP_PATTERN = /^settings_backup_.*\.json$/;

type SettingsTree = Record<string, unknown>;

export interface SettingsManagerOptions {
  settingsFile?: string;
  backupDir?: string;
  backupsKept?: number;
  /** Source of environment overrides, process.env by default */
  env?: NodeJS.ProcessEnv;
  clock?: () => Date;
}

export class SettingsManager {
  private settings: Settings = structuredClone(DEFAULT_SETTINGS);
  private readonly file: JsonFile<SettingsTree>;
  private readonly backupDir: string;
  private readonly backupsKept: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly clock: () => Date;

  constructor(options: SettingsManagerOptions = {}) {
    this.file = new JsonFile(options.settingsFile ?? CONFIG.settings.file, settingsFileSchema);
    this.backupDir = path.resolve(options.backupDir ?? CONFIG.settings.backupDir);
    this.backupsKept = options.backupsKept ?? CONFIG.settings.backupsKept;
    this.env = options.env ?? process.env;
    this.clock = options.clock ?? (() => new Date());
    this.load();
  }

  get settingsFile(): string {
    return this.file.filePath;
  }

  /**
   * Rebuild settings from defaults, the settings file and the environment
   * @returns false when loading failed and defaults are in effect
   */
  load(): boolean {
    try {
      const tree: SettingsTree = structuredClone(DEFAULT_SETTINGS);

      const fromFile = this.file.read();
      if (fromFile) {
        mergeInto(tree, fromFile);
        logger.info(`Settings loaded from ${this.file.filePath}`);
      } else {
        logger.info('Using default settings (no settings file found)');
      }

      this.applyEnvironment(tree);
      this.settings = this.validate(tree);
      return true;
    } catch (error) {
      logger.error('Error loading settings', error);
      this.settings = structuredClone(DEFAULT_SETTINGS);
      return false;
    }
  }

  /**
   * Write settings to the settings file, backing up the previous file first
   */
  save(createBackup: boolean = true): boolean {
    try {
      if (createBackup && this.file.exists()) {
        this.createBackup();
      }
      this.file.write(this.settings, { sortKeys: true });
      logger.info(`Settings saved to ${this.file.filePath}`);
      return true;
    } catch (error) {
      logger.error('Error saving settings', error);
      return false;
    }
  }

  get(keyPath: string, fallback?: unknown): unknown {
    let value: unknown = this.settings;

    for (const key of keyPath.split('.')) {
      if (isPlainObject(value) && Object.prototype.hasOwnProperty.call(value, key)) {
        value = value[key];
      } else {
        return fallback;
      }
    }

    return value;
  }

  /**
   * Set one value; rejected values leave settings unchanged
   */
  set(keyPath: string, value: unknown, save: boolean = true): boolean {
    const segments = keyPath.split('.');
    if (segments.some((segment) => segment.length === 0)) {
      logger.error(`Invalid setting path: ${keyPath}`);
      return false;
    }

    try {
      const tree: SettingsTree = structuredClone(this.settings);
      if (!setPath(tree, segments, value)) {
        logger.error(`Cannot set ${keyPath}: a parent is not a section`);
        return false;
      }
      this.settings = this.validate(tree);
    } catch (error) {
      logger.error(`Invalid value for setting ${keyPath}`, error);
      return false;
    }

    logger.info(`Setting ${keyPath} updated`, { value });
    return save ? this.save() : true;
  }

  /**
   * Apply several path/value pairs; stops at the first rejected one
   */
  update(updates: Record<string, unknown>, save: boolean = true): boolean {
    for (const [keyPath, value] of Object.entries(updates)) {
      if (!this.set(keyPath, value, false)) {
        return false;
      }
    }
    return save ? this.save() : true;
  }

  resetToDefaults(section?: string, save: boolean = true): boolean {
    if (section === undefined) {
      this.settings = structuredClone(DEFAULT_SETTINGS);
      logger.info('Reset all settings to defaults');
    } else if (isSectionName(section)) {
      const tree: SettingsTree = structuredClone(this.settings);
      tree[section] = structuredClone(DEFAULT_SETTINGS[section]);
      this.settings = this.validate(tree);
      logger.info(`Reset ${section} settings to defaults`);
    } else {
      logger.error(`Unknown settings section: ${section}`);
      return false;
    }

    return save ? this.save() : true;
  }

  getAll(): Settings {
    return structuredClone(this.settings);
  }

  exportTo(exportPath: string): boolean {
    try {
      new JsonFile(exportPath, settingsFileSchema).write(this.settings, { sortKeys: true });
      logger.info(`Settings exported to ${exportPath}`);
      return true;
    } catch (error) {
      logger.error('Error exporting settings', error);
      return false;
    }
  }

  /**
   * Merge a settings file over the current settings
   */
  importFrom(importPath: string, save: boolean = true): boolean {
    try {
      const imported = new JsonFile(importPath, settingsFileSchema).read();
      if (!imported) {
        logger.error(`Import file not found: ${importPath}`);
        return false;
      }

      const tree: SettingsTree = structuredClone(this.settings);
      mergeInto(tree, imported);
      this.settings = this.validate(tree);
      logger.info(`Settings imported from ${importPath}`);
    } catch (error) {
      logger.error('Error importing settings', error);
      return false;
    }

    return save ? this.save() : true;
  }

  getEmulatorConfig(): EmulatorSettings {
    return structuredClone(this.settings.emulator);
  }

  getChatConfig(): ChatSettings {
    return structuredClone(this.settings.matrix);
  }

  getFeatures(): FeatureSettings {
    return structuredClone(this.settings.features);
  }

  getSecurityConfig(): SecuritySettings {
    return structuredClone(this.settings.security);
  }

  isUserAuthorized(userId: string): boolean {
    return this.settings.matrix.authorized_users.includes(userId);
  }

  isUserBlocked(userId: string): boolean {
    return this.settings.security.blocked_users.includes(userId);
  }

  addAuthorizedUser(userId: string, save: boolean = true): boolean {
    const users = this.settings.matrix.authorized_users;
    if (users.includes(userId)) {
      return true;
    }
    return this.set('matrix.authorized_users', [...users, userId], save);
  }

  removeAuthorizedUser(userId: string, save: boolean = true): boolean {
    const users = this.settings.matrix.authorized_users;
    if (!users.includes(userId)) {
      return true;
    }
    return this.set('matrix.authorized_users', users.filter((user) => user !== userId), save);
  }

  private validate(tree: SettingsTree): Settings {
    const result = settingsSchema.safeParse(tree);
    if (!result.success) {
      throw new SettingsError('Settings failed validation', result.error.issues);
    }

    for (const warning of settingsWarnings(result.data)) {
      logger.warn(warning);
    }
    return result.data;
  }

  private applyEnvironment(tree: SettingsTree): void {
    for (const [envVar, keyPath] of Object.entries(ENV_OVERRIDES)) {
      const raw = this.env[envVar];
      if (raw === undefined) {
        continue;
      }

      let value: string | number = raw;
      if (keyPath.endsWith('timeout') || keyPath.endsWith('interval')) {
        if (!/^-?\d+$/.test(raw.trim())) {
          logger.warn(`Ignoring non-integer ${envVar}: ${raw}`);
          continue;
        }
        value = parseInt(raw, 10);
      }

      setPath(tree, keyPath.split('.'), value);
    }
  }

  private createBackup(): void {
    try {
      fs.mkdirSync(this.backupDir, { recursive: true });

      const backupFile = path.join(this.backupDir, `settings_backup_${backupStamp(this.clock())}.json`);
      fs.copyFileSync(this.file.filePath, backupFile);
      logger.info(`Settings backup created: ${backupFile}`);

      const backups = fs.readdirSync(this.backupDir).filter((name) => BACKUP_PATTERN.test(name)).sort();
      for (const old of backups.slice(0, Math.max(0, backups.length - this.backupsKept))) {
        fs.unlinkSync(path.join(this.backupDir, old));
        logger.debug(`Removed old backup: ${old}`);
      }
    } catch (error) {
      logger.error('Error creating settings backup', error);
    }
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeInto(target: SettingsTree, source: SettingsTree): void {
  for (const [key, value] of Object.entries(source)) {
    const existing = target[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      mergeInto(existing, value);
    } else {
      target[key] = value;
    }
  }
}

function setPath(tree: SettingsTree, segments: string[], value: unknown): boolean {
  let current = tree;

  for (const key of segments.slice(0, -1)) {
    const next = current[key];
    if (next === undefined) {
      const created: SettingsTree = {};
      current[key] = created;
      current = created;
    } else if (isPlainObject(next)) {
      current = next;
    } else {
      return false;
    }
  }

  current[segments[segments.length - 1]] = value;
  return true;
}

function backupStamp(date: Date): string {
  const pad = (n: number, width: number = 2) => String(n).padStart(width, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}_` +
    pad(date.getMilliseconds(), 3)
  );
}
