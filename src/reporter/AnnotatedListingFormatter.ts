import { CoverageSummary, FileSummary, LineState } from '../models/CoverageModels';
import { formatPercent, padStart, ReportFormatter } from './ReportFormatter';

const MARKERS: Record<LineState, string> = {
    'covered': '+',
    'executed': '~',
    'not-executed': '-',
    'not-executable': ' ',
};

export const LISTING_LEGEND = 'Legend: + covered, ~ executed but not covered, - not executed, blank = not executable';

/**
 * Plain-text listing of every line with its state marker and execution count
 */
export class AnnotatedListingFormatter implements ReportFormatter {
    readonly name = 'listing';
    readonly extension = 'txt';

    render(summary: CoverageSummary): string {
        const sections = summary.files.map((file) => this.renderFile(file));
        return [LISTING_LEGEND, ...sections].join('\n\n') + '\n';
    }

    private renderFile(file: FileSummary): string {
        const lineWidth = String(file.totalLines).length;
        const countWidth = Math.max(1, ...file.lines.map((line) => String(line.executionCount).length));

        const rows = file.lines.map((line) => {
            // Non-executable lines only show a count when something ran there anyway
            const showCount = line.state !== 'not-executable' || line.executionCount > 0;
            const count = showCount ? padStart(line.executionCount, countWidth) : ' '.repeat(countWidth);
            const source = line.text.length > 0 ? `| ${line.text}` : '|';
            return `${padStart(line.line, lineWidth)} ${MARKERS[line.state]} ${count} ${source}`;
        });

        return [
            `File: ${file.path}`,
            `Covered ${file.coveredLines}/${file.executableLines} (${formatPercent(file.coveragePercent)}), `
                + `executed ${file.executedLines}/${file.executableLines} (${formatPercent(file.executionPercent)})`,
            ...rows,
        ].join('\n');
    }
}
