import { CoverageSummary } from '../models/CoverageModels';

/**
 * Turns a coverage summary into an external representation.
 *
 * Implementations must be pure: the same summary always renders the same
 * text, and the summary is never modified.
 */
export interface ReportFormatter {
    /** Name used in configuration (`report.formats`) */
    readonly name: string;
    /** File extension for reports written to disk, without the dot */
    readonly extension: string;
    render(summary: CoverageSummary): string;
}

export function padStart(value: string | number, width: number): string {
    const s = String(value);
    return ' '.repeat(Math.max(0, width - s.length)) + s;
}

export function padEnd(value: string | number, width: number): string {
    const s = String(value);
    return s + ' '.repeat(Math.max(0, width - s.length));
}

export function formatPercent(pct: number): string {
    return `${pct.toFixed(2)}%`;
}
