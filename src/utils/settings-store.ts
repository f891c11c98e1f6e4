/**
 * Settings Store - key-value persistence for hub settings
 *
 * Provides:
 * - SettingsStore: the async key-value contract the hub persists through
 * - InMemorySettingsStore: process-local store (tests, embedding hosts)
 * - JsonFileSettingsStore: one JSON object per file, written atomically
 *   (temp file + rename) with writes serialized
 *
 * Usage:
 *   const store = new JsonFileSettingsStore('./data/settings.json');
 *   await store.set('intelligence_config', JSON.stringify(settings));
 *   const raw = await store.get('intelligence_config');
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logger } from './logger.js';

const log = logger.settings;

export interface SettingsStore {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<boolean>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class InMemorySettingsStore implements SettingsStore {
  private values: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.values.delete(key);
  }
}

/**
 * Configuration for JsonFileSettingsStore
 */
export interface JsonFileSettingsStoreConfig {
  /** Pretty-print JSON with indentation (default: true) */
  prettyPrint: boolean;

  /** JSON indentation spaces (default: 2) */
  indent: number;

  /** Create parent directories if they don't exist (default: true) */
  createDirs: boolean;
}

export const DEFAULT_JSON_FILE_STORE_CONFIG: JsonFileSettingsStoreConfig = {
  prettyPrint: true,
  indent: 2,
  createDirs: true,
};

export class JsonFileSettingsStore implements SettingsStore {
  private filePath: string;
  private config: JsonFileSettingsStoreConfig;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string, config: Partial<JsonFileSettingsStoreConfig> = {}) {
    this.filePath = path.resolve(filePath);
    this.config = { ...DEFAULT_JSON_FILE_STORE_CONFIG, ...config };
  }

  getFilePath(): string {
    return this.filePath;
  }

  async get(key: string): Promise<string | undefined> {
    await this.writeChain;
    const values = await this.readAll();
    return values[key];
  }

  async set(key: string, value: string): Promise<void> {
    await this.enqueue(async () => {
      const values = await this.readAll();
      values[key] = value;
      await this.atomicWrite(values);
    });
  }

  async delete(key: string): Promise<boolean> {
    let removed = false;
    await this.enqueue(async () => {
      const values = await this.readAll();
      if (key in values) {
        delete values[key];
        removed = true;
        await this.atomicWrite(values);
      }
    });
    return removed;
  }

  /**
   * Run a read-modify-write after every earlier one has settled
   */
  private enqueue(operation: () => Promise<void>): Promise<void> {
    const next = this.writeChain.then(operation, operation);
    this.writeChain = next.catch((error: unknown) => {
      log.debug('Previous settings write failed', { path: this.filePath, error: String(error) });
    });
    return next;
  }

  /**
   * Load the key-value object. A missing file is an empty store.
   */
  private async readAll(): Promise<Record<string, string>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      log.error(`Failed to load settings from ${this.filePath}`, { error });
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Settings file ${this.filePath} does not contain a JSON object`);
    }
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        values[key] = value;
      }
    }
    return values;
  }

  /**
   * Perform atomic write: write to temp file, then rename
   */
  private async atomicWrite(values: Record<string, string>): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;

    try {
      if (this.config.createDirs) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      }

      const content = this.config.prettyPrint
        ? JSON.stringify(values, null, this.config.indent)
        : JSON.stringify(values);

      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);

      log.debug(`Saved settings to ${this.filePath}`, { size: content.length });
    } catch (error) {
      log.error(`Failed to save settings to ${this.filePath}`, { error });

      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.debug('Temp file cleanup failed', { path: tempPath, error: String(cleanupError) });
      });

      throw error;
    }
  }
}
