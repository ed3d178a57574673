import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { applyCliOptions, baselineAction, classifyAction, explainAction } from '../index';
import { DEFAULT_CONFIG } from '../../config/schema';
import { mergeWithDefaults } from '../../config/ConfigValidator';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('CLI index.ts', () => {
  let tempDir: string;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  const printed = () => consoleLogSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linecov-cli-'));
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => { });
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => { });
    process.exitCode = undefined;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(relative: string, content: string): Promise<string> {
    const target = path.join(tempDir, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
    return target;
  }

  describe('applyCliOptions', () => {
    it('should update config based on CLI options', () => {
      const config = applyCliOptions(mergeWithDefaults(), { threshold: '60', format: ['json'], output: 'out' });

      expect(config.threshold).toBe(60);
      expect(config.report).toEqual({ formats: ['json'], output_dir: 'out' });
    });

    it('should leave config untouched without options', () => {
      expect(applyCliOptions(mergeWithDefaults(), {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('classify', () => {
    it('should print the kind of every line', async () => {
      const file = await writeFile('a.lua', 'x = 1\n-- note\n');

      await classifyAction([file]);

      expect(printed()).toEqual([
        `File: ${file}`,
        '1 executable     | x = 1',
        '2 non-executable | -- note',
      ]);
    });

    it('should report a missing file and set the exit code', async () => {
      await classifyAction([path.join(tempDir, 'missing.lua')]);

      expect(process.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalled();
    });
  });

  describe('explain', () => {
    it('should print the deciding rule for each path', async () => {
      const config = await writeFile('coverage.yml', [
        'include_patterns: ["src/**/*.lua"]',
        'exclude_patterns: ["src/gen/**"]',
      ].join('\n'));

      await explainAction(['src/a.lua', 'src/gen/b.lua', 'docs/c.md'], { config });

      expect(printed()).toEqual([
        'src/a.lua: included (include src/**/*.lua)',
        'src/gen/b.lua: excluded (exclude src/gen/**), overrides include src/**/*.lua',
        'docs/c.md: excluded (no include pattern matched)',
      ]);
    });
  });

  describe('baseline', () => {
    it('should write zero-coverage reports and fail below the threshold', async () => {
      const root = path.join(tempDir, 'project');
      await writeFile('project/main.lua', 'x = 1\ny = 2\n');
      await writeFile('project/tests/main_spec.lua', 'assert(true)\n');
      const outputDir = path.join(tempDir, 'reports');
      const config = await writeFile('coverage.yml', [
        'threshold: 50',
        'report:',
        '  formats: [lcov]',
        `  output_dir: "${outputDir}"`,
      ].join('\n'));

      await baselineAction(root, { config });

      const lcov = await fs.readFile(path.join(outputDir, 'coverage-lcov.info'), 'utf-8');
      expect(lcov).toBe('TN:\nSF:main.lua\nFNF:0\nFNH:0\nDA:1,0\nDA:2,0\nLF:2\nLH:0\nend_of_record\n');
      expect(process.exitCode).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalledWith('\nCoverage 0% is below the threshold of 50%');
    });

    it('should pass when the threshold is met', async () => {
      const root = path.join(tempDir, 'project');
      await writeFile('project/main.lua', 'x = 1\n');

      await baselineAction(root, {
        config: path.join(tempDir, 'none.yml'),
        format: ['json'],
        output: path.join(tempDir, 'reports'),
        threshold: '0',
      });

      expect(process.exitCode).toBeUndefined();
      expect(printed()).toContain(`json report: ${path.join(tempDir, 'reports', 'coverage-json.json')}`);
    });
  });
});
