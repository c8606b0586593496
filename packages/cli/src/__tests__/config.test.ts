/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { formatConfig, loadConfig, loadEnvConfig, mapCliToConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';

describe('Config Defaults', () => {
  it('should encode with the extended channel set', () => {
    expect(DEFAULT_CONFIG.encoding.mode).toBe('extended');
  });

  it('should decode at 0.5 without strict mode', () => {
    expect(DEFAULT_CONFIG.decode.threshold).toBe(0.5);
    expect(DEFAULT_CONFIG.decode.strict).toBe(false);
  });

  it('should write compact, colored output', () => {
    expect(DEFAULT_CONFIG.output.pretty).toBe(false);
    expect(DEFAULT_CONFIG.output.color).toBe(true);
  });

  it('should pass its own validation', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });
});

describe('Config Validation', () => {
  it('should reject an unknown encoding mode', () => {
    expect(() =>
      validateConfig({ ...DEFAULT_CONFIG, encoding: { mode: 'full' } }),
    ).toThrow(ConfigValidationError);
  });

  it('should reject thresholds outside (0, 1)', () => {
    for (const threshold of [0, 1, -0.2, 1.5]) {
      expect(() =>
        validateConfig({ ...DEFAULT_CONFIG, decode: { threshold, strict: false } }),
      ).toThrow(ConfigValidationError);
    }
  });

  it('should accept partial configs', () => {
    expect(validatePartialConfig({ decode: { strict: true } })).toEqual({
      decode: { strict: true },
    });
  });

  it('should report the path and source of each problem', () => {
    try {
      validatePartialConfig({ output: { pretty: 'yes' } }, 'test-source');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.source).toBe('test-source');
        expect(error.errors).toHaveLength(1);
        expect(error.errors[0]?.path).toBe('output.pretty');
        expect(error.format()).toContain('Configuration validation failed (test-source):');
      }
    }
  });
});

describe('loadEnvConfig', () => {
  it('should return an empty config without variables', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  it('should map variables to their sections', () => {
    const config = loadEnvConfig({
      CHESSPLANES_ENCODING: 'basic',
      CHESSPLANES_DECODE_THRESHOLD: '0.25',
      CHESSPLANES_DECODE_STRICT: 'true',
      CHESSPLANES_PRETTY: '1',
      CHESSPLANES_COLOR: 'false',
    });

    expect(config).toEqual({
      encoding: { mode: 'basic' },
      decode: { threshold: 0.25, strict: true },
      output: { pretty: true, color: false },
    });
  });

  it('should ignore empty variables', () => {
    expect(loadEnvConfig({ CHESSPLANES_ENCODING: '' })).toEqual({});
  });

  it('should reject values that do not parse', () => {
    expect(() => loadEnvConfig({ CHESSPLANES_DECODE_STRICT: 'maybe' })).toThrow(
      ConfigValidationError,
    );
    expect(() => loadEnvConfig({ CHESSPLANES_DECODE_THRESHOLD: 'half' })).toThrow(
      ConfigValidationError,
    );
  });
});

describe('mapCliToConfig', () => {
  it('should map flags to config sections', () => {
    expect(
      mapCliToConfig({ mode: 'basic', threshold: 0.7, strict: true, pretty: true, noColor: true }),
    ).toEqual({
      encoding: { mode: 'basic' },
      decode: { threshold: 0.7, strict: true },
      output: { pretty: true, color: false },
    });
  });

  it('should leave out sections without flags', () => {
    expect(mapCliToConfig({ output: 'out.json', verbose: true })).toEqual({});
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chessplanes-config-'));
    configPath = path.join(dir, 'chessplanes.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        encoding: { mode: 'basic' },
        decode: { threshold: 0.4 },
        output: { pretty: true },
      }),
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should merge file values over defaults', async () => {
    const config = await loadConfig({ config: configPath }, {});
    expect(config).toEqual({
      encoding: { mode: 'basic' },
      decode: { threshold: 0.4, strict: false },
      output: { pretty: true, color: true },
    });
  });

  it('should let environment override the file', async () => {
    const config = await loadConfig(
      { config: configPath },
      { CHESSPLANES_ENCODING: 'extended', CHESSPLANES_DECODE_THRESHOLD: '0.6' },
    );
    expect(config.encoding.mode).toBe('extended');
    expect(config.decode.threshold).toBe(0.6);
    expect(config.output.pretty).toBe(true);
  });

  it('should let flags override environment and file', async () => {
    const config = await loadConfig(
      { config: configPath, mode: 'basic', threshold: 0.9, noColor: true },
      { CHESSPLANES_ENCODING: 'extended', CHESSPLANES_DECODE_THRESHOLD: '0.6' },
    );
    expect(config.encoding.mode).toBe('basic');
    expect(config.decode.threshold).toBe(0.9);
    expect(config.output.color).toBe(false);
  });

  it('should reject an invalid config file', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ decode: { threshold: 2 } }));
    await expect(loadConfig({ config: configPath }, {})).rejects.toThrow(ConfigValidationError);
  });

  it('should reject a flag threshold outside (0, 1)', async () => {
    await expect(loadConfig({ config: configPath, threshold: 1 }, {})).rejects.toThrow(
      ConfigValidationError,
    );
  });
});

describe('formatConfig', () => {
  it('should print the configuration as indented JSON', () => {
    expect(formatConfig(DEFAULT_CONFIG)).toBe(JSON.stringify(DEFAULT_CONFIG, null, 2));
  });
});
