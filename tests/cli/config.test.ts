/**
 * CLI configuration loading
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  validateConfig,
} from '../../src/cli-config.js';

describe('validateConfig', () => {
  it('uses defaults for an empty document', () => {
    expect(validateConfig(null)).toEqual(createDefaultConfig());
    expect(validateConfig(undefined)).toEqual({
      prompt: '> ',
      exitCommand: 'exit',
      requireSemicolons: false,
      showAst: false,
    });
  });

  it('merges given keys over defaults', () => {
    expect(
      validateConfig({ prompt: 'scrawl> ', maxCallDepth: 50, showAst: true })
    ).toEqual({
      prompt: 'scrawl> ',
      exitCommand: 'exit',
      maxCallDepth: 50,
      requireSemicolons: false,
      showAst: true,
    });
  });

  it('rejects non-mappings', () => {
    expect(() => validateConfig(['prompt'])).toThrow(
      'Invalid configuration: must be a mapping'
    );
    expect(() => validateConfig('prompt')).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ colour: true })).toThrow(
      'Invalid configuration: unknown key colour'
    );
  });

  it('rejects ill-typed values', () => {
    expect(() => validateConfig({ prompt: 3 })).toThrow(
      'Invalid configuration: prompt must be a string'
    );
    expect(() => validateConfig({ showAst: 'yes' })).toThrow(
      'Invalid configuration: showAst must be a boolean'
    );
    expect(() => validateConfig({ maxCallDepth: 0 })).toThrow(
      'Invalid configuration: maxCallDepth must be a positive integer'
    );
    expect(() => validateConfig({ maxCallDepth: 1.5 })).toThrow(
      'Invalid configuration: maxCallDepth must be a positive integer'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scrawl-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', () => {
    expect(loadConfig(dir)).toEqual(createDefaultConfig());
  });

  it('reads the YAML file', () => {
    writeFileSync(
      join(dir, CONFIG_FILE_NAME),
      'prompt: "$ "\nexitCommand: quit\nrequireSemicolons: true\n'
    );

    expect(loadConfig(dir)).toEqual({
      prompt: '$ ',
      exitCommand: 'quit',
      requireSemicolons: true,
      showAst: false,
    });
  });

  it('treats an empty file as defaults', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), '');
    expect(loadConfig(dir)).toEqual(createDefaultConfig());
  });

  it('wraps YAML syntax errors', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'prompt: "unterminated\n');
    expect(() => loadConfig(dir)).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });

  it('validates the parsed document', () => {
    writeFileSync(join(dir, CONFIG_FILE_NAME), 'maxCallDepth: -2\n');
    expect(() => loadConfig(dir)).toThrow(
      'Invalid configuration: maxCallDepth must be a positive integer'
    );
  });
});
