/**
 * CLI Tests: configuration loading
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ConfigError,
  createDefaultConfig,
  loadConfig,
  resolveConfigPath,
  validateConfig,
} from '../../src/cli-config.js';

describe('validateConfig', () => {
  it('uses defaults for an empty document', () => {
    expect(validateConfig(null)).toEqual({
      prompt: '> ',
      maxCallDepth: Number.POSITIVE_INFINITY,
      numberPrecision: 2,
    });
  });

  it('merges given keys over defaults', () => {
    expect(validateConfig({ prompt: 'lox> ', numberPrecision: 0 })).toEqual({
      prompt: 'lox> ',
      maxCallDepth: Number.POSITIVE_INFINITY,
      numberPrecision: 0,
    });
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ colour: 'red' })).toThrow(
      'Invalid configuration: unknown key colour'
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => validateConfig(['prompt'])).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects wrong value types', () => {
    expect(() => validateConfig({ prompt: 3 })).toThrow(
      'Invalid configuration: prompt must be a string'
    );
    expect(() => validateConfig({ maxCallDepth: 0 })).toThrow(
      'Invalid configuration: maxCallDepth must be a positive integer'
    );
    expect(() => validateConfig({ numberPrecision: 2.5 })).toThrow(
      'Invalid configuration: numberPrecision must be an integer from 0 to 20'
    );
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treelox-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  it('returns defaults when no file exists', () => {
    expect(loadConfig(tempDir, {})).toEqual(createDefaultConfig());
  });

  it('reads treelox.yaml from the working directory', async () => {
    await fs.writeFile(
      path.join(tempDir, 'treelox.yaml'),
      'prompt: "lox> "\nmaxCallDepth: 50\n'
    );
    expect(loadConfig(tempDir, {})).toEqual({
      prompt: 'lox> ',
      maxCallDepth: 50,
      numberPrecision: 2,
    });
  });

  it('reads .inf as no call-depth limit', async () => {
    await fs.writeFile(path.join(tempDir, 'treelox.yaml'), 'maxCallDepth: .inf\n');
    expect(loadConfig(tempDir, {}).maxCallDepth).toBe(Number.POSITIVE_INFINITY);
  });

  it('follows TREELOX_CONFIG relative to the working directory', async () => {
    await fs.writeFile(path.join(tempDir, 'alt.yaml'), 'numberPrecision: 5\n');
    const env = { TREELOX_CONFIG: 'alt.yaml' };
    expect(resolveConfigPath(tempDir, env)).toBe(path.join(tempDir, 'alt.yaml'));
    expect(loadConfig(tempDir, env).numberPrecision).toBe(5);
  });

  it('fails when TREELOX_CONFIG names a missing file', () => {
    expect(() => loadConfig(tempDir, { TREELOX_CONFIG: 'nope.yaml' })).toThrow(
      ConfigError
    );
  });

  it('fails on malformed YAML', async () => {
    await fs.writeFile(path.join(tempDir, 'treelox.yaml'), 'prompt: [unclosed\n');
    expect(() => loadConfig(tempDir, {})).toThrow(
      /^Invalid configuration: invalid YAML/
    );
  });
});
