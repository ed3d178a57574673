import { CoverageMetrics, CoverageSummary } from '../models/CoverageModels';
import { formatPercent, padEnd, padStart, ReportFormatter } from './ReportFormatter';

const HEADERS = ['File', 'Lines', 'Executable', 'Executed', 'Covered', 'Executed %', 'Covered %'];

function metricsLine(label: string, metrics: CoverageMetrics): string {
    return `${label}: ${metrics.covered}/${metrics.total} (${formatPercent(metrics.pct)})`;
}

/**
 * Per-file table with totals, function/block/condition rates and anomalies
 */
export class SummaryFormatter implements ReportFormatter {
    readonly name = 'summary';
    readonly extension = 'txt';

    render(summary: CoverageSummary): string {
        const rows: string[][] = summary.files.map((file) => [
            file.path,
            String(file.totalLines),
            String(file.executableLines),
            String(file.executedLines),
            String(file.coveredLines),
            formatPercent(file.executionPercent),
            formatPercent(file.coveragePercent),
        ]);
        const total = [
            'Total',
            String(summary.totalLines),
            String(summary.executableLines),
            String(summary.executedLines),
            String(summary.coveredLines),
            formatPercent(summary.executionPercent),
            formatPercent(summary.coveragePercent),
        ];

        const widths = HEADERS.map((header, col) =>
            Math.max(header.length, total[col].length, ...rows.map((row) => row[col].length))
        );
        const formatRow = (row: string[]) => row
            .map((cell, col) => (col === 0 ? padEnd(cell, widths[col]) : padStart(cell, widths[col])))
            .join('  ');
        const rule = widths.map((width) => '-'.repeat(width)).join('  ');

        const out = [
            formatRow(HEADERS),
            rule,
            ...rows.map(formatRow),
            rule,
            formatRow(total),
            '',
            metricsLine('Functions', summary.functions),
        ];

        if (summary.blocks) {
            out.push(metricsLine('Blocks', summary.blocks));
        }
        if (summary.conditions) {
            out.push(metricsLine('Condition outcomes', summary.conditions));
        }

        const anomalies = Object.entries(summary.anomalies).filter(([, count]) => count > 0);
        if (anomalies.length > 0) {
            out.push('', 'Anomalies:');
            for (const [kind, count] of anomalies) {
                out.push(`  ${kind}: ${count}`);
            }
        }

        return out.join('\n') + '\n';
    }
}
