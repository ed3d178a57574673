import { CoverageSummary } from '../models/CoverageModels';
import { ReportFormatter } from './ReportFormatter';

/**
 * Flat, table-of-records view of a summary
 */
export interface CoverageRecords {
    sessionId: string;
    totals: {
        files: number;
        totalLines: number;
        executableLines: number;
        executedLines: number;
        coveredLines: number;
        coveragePercent: number;
        executionPercent: number;
    };
    functions: CoverageSummary['functions'];
    blocks: CoverageSummary['blocks'];
    conditions: CoverageSummary['conditions'];
    anomalies: CoverageSummary['anomalies'];
    files: Array<{
        path: string;
        totalLines: number;
        executableLines: number;
        executedLines: number;
        coveredLines: number;
        coveragePercent: number;
        executionPercent: number;
    }>;
    functionRecords: CoverageSummary['functionBreakdown'];
    blockRecords: Array<{ file: string; key: string; type: string; startLine: number; endLine: number; parentKey: string | null; depth: number; executionCount: number }>;
    conditionRecords: Array<{ file: string; line: number; index: number; trueCount: number; falseCount: number }>;
    lineRecords: Array<{ file: string; line: number; kind: string; executionCount: number; covered: boolean; state: string }>;
}

export function toRecords(summary: CoverageSummary): CoverageRecords {
    return {
        sessionId: summary.sessionId,
        totals: {
            files: summary.totalFiles,
            totalLines: summary.totalLines,
            executableLines: summary.executableLines,
            executedLines: summary.executedLines,
            coveredLines: summary.coveredLines,
            coveragePercent: summary.coveragePercent,
            executionPercent: summary.executionPercent,
        },
        functions: summary.functions,
        blocks: summary.blocks,
        conditions: summary.conditions,
        anomalies: summary.anomalies,
        files: summary.files.map((file) => ({
            path: file.path,
            totalLines: file.totalLines,
            executableLines: file.executableLines,
            executedLines: file.executedLines,
            coveredLines: file.coveredLines,
            coveragePercent: file.coveragePercent,
            executionPercent: file.executionPercent,
        })),
        functionRecords: summary.functionBreakdown,
        blockRecords: summary.files.flatMap((file) => file.blocks.map((block) => ({
            file: file.path,
            key: block.key,
            type: block.type,
            startLine: block.startLine,
            endLine: block.endLine,
            parentKey: block.parentKey,
            depth: block.depth,
            executionCount: block.executionCount,
        }))),
        conditionRecords: summary.files.flatMap((file) => file.conditions.map((condition) => ({
            file: file.path,
            ...condition,
        }))),
        lineRecords: summary.files.flatMap((file) => file.lines.map((line) => ({
            file: file.path,
            line: line.line,
            kind: line.kind,
            executionCount: line.executionCount,
            covered: line.covered,
            state: line.state,
        }))),
    };
}

export class JsonFormatter implements ReportFormatter {
    readonly name = 'json';
    readonly extension = 'json';

    render(summary: CoverageSummary): string {
        return JSON.stringify(toRecords(summary), null, 2) + '\n';
    }
}
