import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../errors/CoverageErrors';
import logger from '../../utils/logger';
import { FormatterRegistry } from '../FormatterRegistry';
import { LcovFormatter } from '../LcovFormatter';
import { ReportGenerator } from '../ReportGenerator';
import { buildCalcSummary } from './summaryFixture';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), debug: jest.fn(), error: jest.fn() },
}));

describe('FormatterRegistry', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should register the built-in formatters', () => {
    expect(new FormatterRegistry().getAvailableFormats()).toEqual(['cobertura', 'json', 'lcov', 'listing', 'summary']);
  });

  it('should start empty without built-ins', () => {
    const registry = new FormatterRegistry(false);
    expect(registry.getAvailableFormats()).toEqual([]);
    expect(registry.getFormatter('lcov')).toBeNull();
  });

  it('should warn when a formatter is replaced', () => {
    const registry = new FormatterRegistry();
    const replacement = new LcovFormatter();

    registry.registerFormatter(replacement);

    expect(registry.getFormatter('lcov')).toBe(replacement);
    expect(logger.warn).toHaveBeenCalledWith('Replacing report formatter: lcov');
  });
});

describe('ReportGenerator', () => {
  const summary = buildCalcSummary();
  let outputDir: string;

  beforeEach(async () => {
    outputDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'linecov-reports-')), 'nested');
  });

  afterEach(async () => {
    await fs.rm(path.dirname(outputDir), { recursive: true, force: true });
  });

  it('should write one file per requested format', async () => {
    const generator = new ReportGenerator();

    const reports = await generator.generateReports(summary, outputDir, ['lcov', 'json', 'lcov']);

    expect(reports).toEqual({
      lcov: path.join(outputDir, 'coverage-lcov.info'),
      json: path.join(outputDir, 'coverage-json.json'),
    });
    expect(await fs.readFile(reports.lcov, 'utf-8')).toBe(new LcovFormatter().render(summary));
  });

  it('should reject unknown formats before writing anything', async () => {
    const generator = new ReportGenerator();

    await expect(generator.generateReports(summary, outputDir, ['lcov', 'html'])).rejects.toThrow(ConfigurationError);
    await expect(fs.access(outputDir)).rejects.toThrow();
  });

  it('should render a single format in memory', () => {
    const generator = new ReportGenerator();

    expect(generator.render(summary, 'lcov')).toBe(new LcovFormatter().render(summary));
    expect(() => generator.render(summary, 'pdf')).toThrow('Unsupported report format(s): pdf');
  });
});
