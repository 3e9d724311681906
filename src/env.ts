/**
 * Environment variable access.
 *
 * Use Env.get() instead of process.env throughout the codebase so tests can
 * override values without touching the real environment.
 */
import { join } from 'node:path';
import { dotenvConfig } from './deps.ts';

export class Env {
  private static overrides = new Map<string, string | undefined>();

  /**
   * Get env var value (fresh value each call).
   * Returns undefined if var is unset or empty-overridden.
   */
  static get(name: string): string | undefined {
    if (this.overrides.has(name)) {
      return this.overrides.get(name);
    }
    return process.env[name];
  }

  static has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Override a variable for the current process (undefined hides it) */
  static set(name: string, value: string | undefined): void {
    this.overrides.set(name, value);
  }

  static reset(): void {
    this.overrides.clear();
  }

  /**
   * Load `.env.local` and `.env` from a directory into the process
   * environment. Variables already set win, then `.env.local`, then `.env`.
   * Returns the files that were read.
   */
  static loadFiles(dir: string): string[] {
    const loaded: string[] = [];
    for (const file of ['.env.local', '.env']) {
      const result = dotenvConfig({ path: join(dir, file), override: false });
      if (!result.error) loaded.push(file);
    }
    return loaded;
  }
}
