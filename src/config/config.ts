// Configuration for stylebox
//
// Priority order (lowest to highest):
// 1. Schema defaults
// 2. File config (STYLEBOX_CONFIG_FILE or an explicit path)
// 3. Env vars (including .env files from envDir)
// 4. Runtime overrides (passed to init() or set())

import { readFileSync } from 'node:fs';
import schema from './schema.json';
import { Env } from '../env.ts';
import { getLogger } from '../logging.ts';

const logger = getLogger('Config');

/**
 * Schema property definition
 */
export interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

export type ConfigSource = 'default' | 'file' | 'env' | 'runtime';

export interface ConfigInitOptions {
  /** Path of a JSON config file; falls back to STYLEBOX_CONFIG_FILE */
  configFile?: string;
  /** Directory whose .env files are loaded before env vars are read */
  envDir?: string;
  /** Runtime overrides keyed by dotted path, e.g. { 'viewport.width': 640 } */
  overrides?: Record<string, unknown>;
}

const SCHEMA: ConfigSchema = schema;

let _instance: StyleboxConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class StyleboxConfig {
  private data: Record<string, unknown> = {};
  private sources: Record<string, ConfigSource> = {};

  private constructor(fileConfig: Record<string, unknown>, overrides: Record<string, unknown>) {
    for (const [path, prop] of Object.entries(SCHEMA.properties)) {
      const { value, source } = this.resolveValue(path, prop, fileConfig, overrides);
      this.data[path] = value;
      this.sources[path] = source;
    }
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options: ConfigInitOptions = {}): StyleboxConfig {
    if (_instance) {
      throw new Error('StyleboxConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    if (options.envDir) {
      const loaded = Env.loadFiles(options.envDir);
      logger.debug('Loaded env files', { dir: options.envDir, files: loaded });
    }
    const fileConfig = this.loadConfigFile(options.configFile ?? Env.get('STYLEBOX_CONFIG_FILE'));
    _instance = new StyleboxConfig(fileConfig, options.overrides ?? {});
    return _instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): StyleboxConfig {
    return _instance ?? this.init();
  }

  static isInitialized(): boolean {
    return _instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
  }

  static getSchema(): ConfigSchema {
    return SCHEMA;
  }

  private static loadConfigFile(configPath: string | undefined): Record<string, unknown> {
    if (!configPath) return {};
    let content: string;
    try {
      content = readFileSync(configPath, 'utf8');
    } catch (error) {
      logger.warn(`Config file not readable: ${configPath}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(content);
      if (isRecord(parsed)) return parsed;
      logger.warn(`Config file is not a JSON object: ${configPath}`);
    } catch (error) {
      logger.warn(`Config file is not valid JSON: ${configPath}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  private resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>,
    overrides: Record<string, unknown>
  ): { value: unknown; source: ConfigSource } {
    const candidates: Array<[unknown, ConfigSource]> = [
      [overrides[path], 'runtime'],
      [prop.env ? this.parseEnvValue(Env.get(prop.env), prop) : undefined, 'env'],
      [this.getPath(fileConfig, path), 'file'],
    ];

    for (const [candidate, source] of candidates) {
      if (candidate === undefined) continue;
      if (this.isValid(candidate, prop)) {
        return { value: candidate, source };
      }
      logger.warn(`Ignoring invalid ${source} value for ${path}: ${JSON.stringify(candidate)}`);
    }

    return { value: prop.default, source: 'default' };
  }

  private parseEnvValue(value: string | undefined, prop: ConfigProperty): unknown {
    if (value === undefined || (value === '' && prop.type !== 'string')) return undefined;
    switch (prop.type) {
      case 'boolean':
        return value === 'true' || value === '1';
      case 'integer':
        return parseInt(value, 10);
      case 'number':
        return parseFloat(value);
      default:
        return value;
    }
  }

  private isValid(value: unknown, prop: ConfigProperty): boolean {
    switch (prop.type) {
      case 'number':
      case 'integer': {
        if (typeof value !== 'number' || !Number.isFinite(value)) return false;
        if (prop.type === 'integer' && !Number.isInteger(value)) return false;
        if (prop.minimum !== undefined && value < prop.minimum) return false;
        if (prop.maximum !== undefined && value > prop.maximum) return false;
        return true;
      }
      case 'boolean':
        return typeof value === 'boolean';
      case 'string':
        if (typeof value !== 'string') return false;
        return !prop.enum || prop.enum.includes(value);
      default:
        return true;
    }
  }

  private getPath(obj: Record<string, unknown>, path: string): unknown {
    if (path in obj) {
      return obj[path];
    }
    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /**
   * Set a value at runtime. Invalid values are rejected with a warning.
   */
  set(path: string, value: unknown): boolean {
    const prop = SCHEMA.properties[path];
    if (!prop) {
      logger.warn(`Unknown config key: ${path}`);
      return false;
    }
    if (!this.isValid(value, prop)) {
      logger.warn(`Rejected config value for ${path}: ${JSON.stringify(value)}`);
      return false;
    }
    const oldValue = this.data[path];
    this.data[path] = value;
    this.sources[path] = 'runtime';
    logger.info(`Config updated: ${path} = ${JSON.stringify(value)} (was: ${JSON.stringify(oldValue)})`);
    return true;
  }

  getValue(path: string): unknown {
    return this.data[path];
  }

  getSource(path: string): ConfigSource | undefined {
    return this.sources[path];
  }

  private _number(path: string): number {
    const value = this.data[path];
    return typeof value === 'number' ? value : 0;
  }

  // Typed getters - defaults come from schema.json via resolveValue()

  get viewportWidth(): number {
    return this._number('viewport.width');
  }

  get viewportHeight(): number {
    return this._number('viewport.height');
  }

  get layoutPasses(): number {
    return this._number('layout.passes');
  }

  get textCharWidth(): number {
    return this._number('text.charWidth');
  }

  get textLineHeight(): number {
    return this._number('text.lineHeight');
  }

  get rootFontSize(): number {
    return this._number('text.rootFontSize');
  }
}
