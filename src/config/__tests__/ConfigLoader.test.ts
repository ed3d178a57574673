import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../errors/CoverageErrors';
import logger from '../../utils/logger';
import { ConfigLoader } from '../ConfigLoader';
import { mergeWithDefaults, parseConfigObject, validateConfig } from '../ConfigValidator';
import { DEFAULT_CONFIG } from '../schema';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('ConfigValidator', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('parseConfigObject', () => {
    it('should accept a well-formed document', () => {
      expect(parseConfigObject({
        track_conditions: true,
        include_patterns: ['lua/**/*.lua'],
        threshold: 80,
        report: { formats: ['json'] },
      })).toEqual({
        track_blocks: undefined,
        track_conditions: true,
        include_patterns: ['lua/**/*.lua'],
        exclude_patterns: undefined,
        root_dir: undefined,
        threshold: 80,
        report: { formats: ['json'], output_dir: undefined },
      });
    });

    it('should treat an empty document as no settings', () => {
      expect(parseConfigObject(null)).toEqual({});
      expect(parseConfigObject(undefined)).toEqual({});
    });

    it('should reject values of the wrong type', () => {
      expect(() => parseConfigObject({ threshold: '80' })).toThrow(ConfigurationError);
      expect(() => parseConfigObject({ include_patterns: 'src/**' })).toThrow('include_patterns must be a list of strings');
      expect(() => parseConfigObject({ exclude_patterns: ['ok', 3] })).toThrow('exclude_patterns[1] must be a string');
      expect(() => parseConfigObject({ report: ['json'] })).toThrow('report must be a mapping');
      expect(() => parseConfigObject(['not', 'a', 'mapping'])).toThrow(ConfigurationError);
    });

    it('should warn about unknown keys', () => {
      parseConfigObject({ colour: 'blue' });
      expect(logger.warn).toHaveBeenCalledWith('Ignoring unknown configuration key: colour');
    });
  });

  describe('mergeWithDefaults', () => {
    it('should fill missing settings from the defaults without sharing arrays', () => {
      const merged = mergeWithDefaults({ threshold: 50, report: { output_dir: 'out' } });

      expect(merged.threshold).toBe(50);
      expect(merged.include_patterns).toEqual(DEFAULT_CONFIG.include_patterns);
      expect(merged.include_patterns).not.toBe(DEFAULT_CONFIG.include_patterns);
      expect(merged.report).toEqual({ formats: ['summary', 'lcov'], output_dir: 'out' });
    });
  });

  describe('validateConfig', () => {
    it('should reject negated and empty patterns', () => {
      expect(() => validateConfig(mergeWithDefaults({ include_patterns: ['!src/**'] })))
        .toThrow(ConfigurationError);
      expect(() => validateConfig(mergeWithDefaults({ exclude_patterns: ['  '] })))
        .toThrow('exclude_patterns[0] is empty');
    });

    it('should reject a pattern in both lists', () => {
      expect(() => validateConfig(mergeWithDefaults({ include_patterns: ['**/*.lua'], exclude_patterns: ['**/*.lua'] })))
        .toThrow('Pattern "**/*.lua" is listed in both include_patterns and exclude_patterns');
    });

    it('should reject thresholds outside 0 to 100', () => {
      expect(() => validateConfig(mergeWithDefaults({ threshold: 101 }))).toThrow(ConfigurationError);
      expect(() => validateConfig(mergeWithDefaults({ threshold: -1 }))).toThrow(ConfigurationError);
      expect(() => validateConfig(mergeWithDefaults({ threshold: Number.NaN }))).toThrow(ConfigurationError);
      expect(validateConfig(mergeWithDefaults({ threshold: 100 })).threshold).toBe(100);
    });

    it('should name the failing field', () => {
      let caught: unknown;
      try {
        validateConfig(mergeWithDefaults({ threshold: 200 }));
      } catch (error) {
        caught = error;
      }
      expect(caught instanceof ConfigurationError && caught.field).toBe('threshold');
    });
  });
});

describe('ConfigLoader', () => {
  let tempDir: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linecov-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const configPath = path.join(tempDir, 'coverage.yml');
    await fs.writeFile(configPath, content, 'utf-8');
    return configPath;
  }

  it('should load a YAML file and merge it with the defaults', async () => {
    const configPath = await writeConfig([
      'track_blocks: false',
      'include_patterns:',
      '  - "app/**/*.lua"',
      'report:',
      '  formats: [json, cobertura]',
    ].join('\n'));
    const loader = new ConfigLoader({});

    const config = await loader.load(configPath);

    expect(config.track_blocks).toBe(false);
    expect(config.include_patterns).toEqual(['app/**/*.lua']);
    expect(config.exclude_patterns).toEqual(DEFAULT_CONFIG.exclude_patterns);
    expect(config.report).toEqual({ formats: ['json', 'cobertura'], output_dir: './coverage' });
    expect(loader.getDiagnostics()).toEqual({ configSource: configPath, overridesApplied: [] });
  });

  it('should apply environment overrides on top of the file', async () => {
    const configPath = await writeConfig('threshold: 10\n');
    const loader = new ConfigLoader({
      LINECOV_INCLUDE: 'a/**/*.lua, b/**/*.lua',
      LINECOV_TRACK_CONDITIONS: '1',
      LINECOV_THRESHOLD: '75.5',
      LINECOV_FORMATS: 'lcov',
      LINECOV_OUTPUT_DIR: 'reports',
    });

    const config = await loader.load(configPath);

    expect(config.include_patterns).toEqual(['a/**/*.lua', 'b/**/*.lua']);
    expect(config.track_conditions).toBe(true);
    expect(config.threshold).toBe(75.5);
    expect(config.report).toEqual({ formats: ['lcov'], output_dir: 'reports' });
    expect(loader.getDiagnostics().overridesApplied).toEqual([
      'LINECOV_INCLUDE',
      'LINECOV_TRACK_CONDITIONS',
      'LINECOV_THRESHOLD',
      'LINECOV_FORMATS',
      'LINECOV_OUTPUT_DIR',
    ]);
  });

  it('should reject a boolean override it cannot read', async () => {
    const loader = new ConfigLoader({ LINECOV_TRACK_BLOCKS: 'yes' });

    await expect(loader.load(await writeConfig(''))).rejects.toThrow('LINECOV_TRACK_BLOCKS must be true or false, got "yes"');
  });

  it('should validate the result after overrides', async () => {
    const loader = new ConfigLoader({ LINECOV_THRESHOLD: '150' });

    await expect(loader.load(await writeConfig(''))).rejects.toThrow(ConfigurationError);
  });

  it('should fall back to defaults when the file cannot be read', async () => {
    const config = await new ConfigLoader({}).load(path.join(tempDir, 'missing.yml'));

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should reject invalid YAML', async () => {
    const configPath = await writeConfig('include_patterns: [unclosed\n');

    await expect(new ConfigLoader({}).load(configPath)).rejects.toThrow(ConfigurationError);
  });
});
