import path from 'path';
import { ConfigurationError } from '../errors/CoverageErrors';
import { CoverageSummary } from '../models/CoverageModels';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { FormatterRegistry } from './FormatterRegistry';
import { ReportFormatter } from './ReportFormatter';

/**
 * Writes coverage reports to disk, one file per format
 */
export class ReportGenerator {
    constructor(private readonly registry: FormatterRegistry = new FormatterRegistry()) { }

    /**
     * Render `summary` in one format without writing anything
     */
    render(summary: CoverageSummary, format: string): string {
        return this.resolve([format])[0].render(summary);
    }

    /**
     * Generate reports. Every format is checked before any file is written.
     * Returns the written path per format name.
     */
    async generateReports(
        summary: CoverageSummary,
        outputDir: string,
        formats: string[]
    ): Promise<Record<string, string>> {
        const formatters = this.resolve(formats);
        const paths: Record<string, string> = {};

        for (const formatter of formatters) {
            const reportPath = path.join(outputDir, `coverage-${formatter.name}.${formatter.extension}`);
            await writeFile(reportPath, formatter.render(summary));
            logger.info(`${formatter.name} report generated: ${reportPath}`);
            paths[formatter.name] = reportPath;
        }

        return paths;
    }

    private resolve(formats: string[]): ReportFormatter[] {
        const unique = [...new Set(formats)];
        const unknown = unique.filter((format) => this.registry.getFormatter(format) === null);
        if (unknown.length > 0) {
            throw new ConfigurationError(
                `Unsupported report format(s): ${unknown.join(', ')}. Available: ${this.registry.getAvailableFormats().join(', ')}`,
                'report.formats'
            );
        }
        return unique.flatMap((format) => {
            const formatter = this.registry.getFormatter(format);
            return formatter ? [formatter] : [];
        });
    }
}
