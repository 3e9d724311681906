// Configuration layering: defaults, file, env and runtime overrides

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, expect, test } from 'vitest';
import { Env, StyleboxConfig } from '../mod.ts';

let dir = '';

beforeEach(() => {
  StyleboxConfig.reset();
  Env.reset();
  Env.set('STYLEBOX_CONFIG_FILE', undefined);
  dir = mkdtempSync(join(tmpdir(), 'stylebox-config-'));
});

afterEach(() => {
  StyleboxConfig.reset();
  Env.reset();
  delete process.env.STYLEBOX_VIEWPORT_HEIGHT;
  delete process.env.STYLEBOX_ROOT_FONT_SIZE;
  rmSync(dir, { recursive: true, force: true });
});

function writeConfig(content: unknown): string {
  const path = join(dir, 'stylebox.json');
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

// ===========================================================================
// Layering
// ===========================================================================

test('schema defaults apply without any source', () => {
  const config = StyleboxConfig.get();

  expect(config.viewportWidth).toBe(1200);
  expect(config.viewportHeight).toBe(800);
  expect(config.layoutPasses).toBe(1);
  expect(config.textCharWidth).toBe(0.5);
  expect(config.textLineHeight).toBe(1.2);
  expect(config.rootFontSize).toBe(16);
  expect(config.getSource('viewport.width')).toBe('default');
});

test('a config file accepts nested and dotted keys', () => {
  const configFile = writeConfig({ viewport: { height: 480 }, 'text.rootFontSize': 20 });
  const config = StyleboxConfig.init({ configFile });

  expect(config.viewportHeight).toBe(480);
  expect(config.getSource('viewport.height')).toBe('file');
  expect(config.rootFontSize).toBe(20);
});

test('the config file path can come from the environment', () => {
  Env.set('STYLEBOX_CONFIG_FILE', writeConfig({ layout: { passes: 2 } }));
  expect(StyleboxConfig.get().layoutPasses).toBe(2);
});

test('env vars beat the file and runtime overrides beat env vars', () => {
  const configFile = writeConfig({ viewport: { width: 500 } });
  Env.set('STYLEBOX_VIEWPORT_WIDTH', '600');

  expect(StyleboxConfig.init({ configFile }).viewportWidth).toBe(600);
  StyleboxConfig.reset();

  const config = StyleboxConfig.init({ configFile, overrides: { 'viewport.width': 700 } });
  expect(config.viewportWidth).toBe(700);
  expect(config.getSource('viewport.width')).toBe('runtime');
});

test('.env files in envDir feed env vars, .env.local first', () => {
  writeFileSync(join(dir, '.env'), 'STYLEBOX_VIEWPORT_HEIGHT=300\nSTYLEBOX_ROOT_FONT_SIZE=12\n');
  writeFileSync(join(dir, '.env.local'), 'STYLEBOX_VIEWPORT_HEIGHT=400\n');

  expect(Env.loadFiles(dir)).toEqual(['.env.local', '.env']);
  const config = StyleboxConfig.init({ envDir: dir });

  expect(config.viewportHeight).toBe(400);
  expect(config.rootFontSize).toBe(12);
  expect(config.getSource('viewport.height')).toBe('env');
});

// ===========================================================================
// Validation
// ===========================================================================

test('out-of-range values fall back to the next source', () => {
  Env.set('STYLEBOX_LAYOUT_PASSES', '9');
  const config = StyleboxConfig.init({ overrides: { 'text.charWidth': -1 } });

  expect(config.layoutPasses).toBe(1);
  expect(config.getSource('layout.passes')).toBe('default');
  expect(config.textCharWidth).toBe(0.5);
});

test('an unreadable or malformed file is ignored', () => {
  expect(StyleboxConfig.init({ configFile: join(dir, 'missing.json') }).viewportWidth).toBe(1200);
  StyleboxConfig.reset();
  expect(StyleboxConfig.init({ configFile: writeConfig('{ not json') }).viewportWidth).toBe(1200);
  StyleboxConfig.reset();
  expect(StyleboxConfig.init({ configFile: writeConfig('[1, 2]') }).viewportWidth).toBe(1200);
});

test('set validates against the schema', () => {
  const config = StyleboxConfig.get();

  expect(config.set('layout.passes', 3)).toBe(true);
  expect(config.layoutPasses).toBe(3);
  expect(config.set('layout.passes', 2.5)).toBe(false);
  expect(config.set('layout.passes', '2')).toBe(false);
  expect(config.set('no.such.key', 1)).toBe(false);
  expect(config.layoutPasses).toBe(3);
});

test('init refuses to run twice', () => {
  StyleboxConfig.init();
  expect(StyleboxConfig.isInitialized()).toBe(true);
  expect(() => StyleboxConfig.init()).toThrow('already initialized');
});
