/**
 * Settings Store
 *
 * Key-value settings grouped in sections (`player_settings.kitchen`,
 * `web.http_port`, ...). The gateway only reads and writes through this
 * interface; `YamlSettingsStore` persists the document as YAML.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { createLogger } from './logger';

const settingsLogger = createLogger('Settings');

export type SettingsSection = Record<string, unknown>;
export type SettingsDocument = Record<string, SettingsSection>;

const SettingsDocumentSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export interface SettingsStore {
  all(): SettingsDocument;
  has(section: string, key: string): boolean;
  get(section: string, key: string): unknown;
  set(section: string, key: string, value: unknown): void;
  save(): Promise<void>;
}

export class SettingsFileError extends Error {
  constructor(filePath: string, reason: string) {
    super(`Invalid settings file ${filePath}: ${reason}`);
    this.name = 'SettingsFileError';
  }
}

function defineEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export class YamlSettingsStore implements SettingsStore {
  private document: SettingsDocument;

  constructor(
    private readonly filePath: string,
    document: SettingsDocument = {}
  ) {
    this.document = document;
  }

  /** Read the settings file. A missing file yields an empty store. */
  static async load(filePath: string): Promise<YamlSettingsStore> {
    let contents: string;
    try {
      contents = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        settingsLogger.info(`No settings file at ${filePath}, starting empty`);
        return new YamlSettingsStore(filePath);
      }
      throw error;
    }

    const loaded: unknown = yaml.load(contents) ?? {};
    const parsed = SettingsDocumentSchema.safeParse(loaded);
    if (!parsed.success) {
      throw new SettingsFileError(filePath, 'expected a mapping of sections to mappings');
    }
    return new YamlSettingsStore(filePath, parsed.data);
  }

  all(): SettingsDocument {
    return structuredClone(this.document);
  }

  has(section: string, key: string): boolean {
    const values = this.section(section);
    return values !== undefined && Object.prototype.hasOwnProperty.call(values, key);
  }

  get(section: string, key: string): unknown {
    const values = this.section(section);
    return values !== undefined && Object.prototype.hasOwnProperty.call(values, key)
      ? values[key]
      : undefined;
  }

  set(section: string, key: string, value: unknown): void {
    let values = this.section(section);
    if (values === undefined) {
      values = {};
      defineEntry(this.document, section, values);
    }
    defineEntry(values, key, value);
  }

  /** Own sections only; names such as `__proto__` never resolve to a prototype. */
  private section(name: string): SettingsSection | undefined {
    return Object.prototype.hasOwnProperty.call(this.document, name) ? this.document[name] : undefined;
  }

  async save(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(this.filePath, yaml.dump(this.document), 'utf8');
    settingsLogger.debug(`Saved settings to ${this.filePath}`);
  }
}
