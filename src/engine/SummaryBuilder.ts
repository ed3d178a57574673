import { isExecutableKind } from '../classifier/LineClassifier';
import {
    AnomalyStats,
    BlockRecord,
    BlockSummary,
    CoverageMetrics,
    CoverageSummary,
    FileSummary,
    FunctionRecord,
    FunctionSummary,
    LineKind,
    LineState,
    LineSummary,
} from '../models/CoverageModels';
import { SourceFile } from './SourceFile';

export interface SummaryOptions {
    trackBlocks: boolean;
    trackConditions: boolean;
}

export type SessionAnomalyCounters = Pick<AnomalyStats, 'outOfRangeLines' | 'unregisteredFileEvents' | 'internalFaults'>;

/**
 * Percentage with two decimals; nothing to cover counts as fully covered
 */
export function percent(covered: number, total: number): number {
    return total > 0 ? Math.round((covered / total) * 10000) / 100 : 100;
}

export function createMetrics(total: number, covered: number): CoverageMetrics {
    return { total, covered, pct: percent(covered, total) };
}

export function lineState(kind: LineKind, executionCount: number, covered: boolean): LineState {
    if (!isExecutableKind(kind)) {
        return 'not-executable';
    }
    if (covered) {
        return 'covered';
    }
    return executionCount > 0 ? 'executed' : 'not-executed';
}

function summarizeLines(file: SourceFile): LineSummary[] {
    return file.lines.map((text, index) => {
        const line = index + 1;
        const kind = file.kinds[index];
        const executionCount = file.table.executionCount(line);
        const covered = file.table.isCovered(line);
        return { line, kind, text, executionCount, covered, state: lineState(kind, executionCount, covered) };
    });
}

function summarizeFunction(path: string, fn: FunctionRecord, lines: LineSummary[]): FunctionSummary {
    let executableLines = 0;
    let executedLines = 0;
    let coveredLines = 0;
    for (const line of lines.slice(fn.definedLine - 1, fn.endLine)) {
        if (line.state === 'not-executable') continue;
        executableLines++;
        if (line.executionCount > 0) executedLines++;
        if (line.covered) coveredLines++;
    }
    return {
        file: path,
        id: fn.id,
        name: fn.name,
        definedLine: fn.definedLine,
        endLine: fn.endLine,
        executionCount: fn.executionCount,
        executableLines,
        executedLines,
        coveredLines,
        coveragePercent: percent(coveredLines, executableLines),
    };
}

/**
 * Function bodies count calls; other blocks count executions of their first line
 */
function summarizeBlocks(file: SourceFile): BlockSummary[] {
    const byKey = new Map<string, BlockRecord>(file.blocks.map((block) => [block.key, block]));

    const depthOf = (block: BlockRecord): number => {
        let depth = 0;
        let parentKey = block.parentKey;
        while (parentKey !== null) {
            const parent = byKey.get(parentKey);
            if (!parent) break;
            depth++;
            parentKey = parent.parentKey;
        }
        return depth;
    };

    return file.blocks.map((block) => {
        let executionCount = file.table.executionCount(block.startLine);
        if (block.type === 'function-body') {
            const fn = file.functions.find((candidate) =>
                candidate.definedLine === block.startLine && candidate.endLine === block.endLine
            );
            executionCount = fn ? fn.executionCount : 0;
        }
        return { ...block, executionCount, depth: depthOf(block) };
    });
}

export function buildFileSummary(file: SourceFile, options: SummaryOptions): FileSummary {
    const lines = summarizeLines(file);
    let executableLines = 0;
    let executedLines = 0;
    let coveredLines = 0;
    for (const line of lines) {
        if (line.state === 'not-executable') continue;
        executableLines++;
        if (line.executionCount > 0) executedLines++;
        if (line.covered) coveredLines++;
    }

    const functions = [...file.functions]
        .sort((a, b) => a.definedLine - b.definedLine || a.id.localeCompare(b.id))
        .map((fn) => summarizeFunction(file.path, fn, lines));

    return {
        path: file.path,
        totalLines: lines.length,
        executableLines,
        executedLines,
        coveredLines,
        coveragePercent: percent(coveredLines, executableLines),
        executionPercent: percent(executedLines, executableLines),
        functions,
        blocks: options.trackBlocks ? summarizeBlocks(file) : [],
        conditions: options.trackConditions ? file.conditions : [],
        lines,
    };
}

function nonExecutableAnomalies(files: FileSummary[]): Pick<AnomalyStats, 'nonExecutableExecutions' | 'nonExecutableCovered'> {
    let nonExecutableExecutions = 0;
    let nonExecutableCovered = 0;
    for (const file of files) {
        for (const line of file.lines) {
            if (line.kind !== LineKind.NonExecutable) continue;
            nonExecutableExecutions += line.executionCount;
            if (line.covered) nonExecutableCovered++;
        }
    }
    return { nonExecutableExecutions, nonExecutableCovered };
}

export function buildSummary(
    sessionId: string,
    sourceFiles: SourceFile[],
    options: SummaryOptions,
    counters: SessionAnomalyCounters
): CoverageSummary {
    const files = [...sourceFiles]
        .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
        .map((file) => buildFileSummary(file, options));

    const sum = (pick: (file: FileSummary) => number) => files.reduce((total, file) => total + pick(file), 0);
    const executableLines = sum((file) => file.executableLines);
    const executedLines = sum((file) => file.executedLines);
    const coveredLines = sum((file) => file.coveredLines);

    const functionBreakdown = files.flatMap((file) => file.functions);
    const blocks = files.flatMap((file) => file.blocks);
    const conditions = files.flatMap((file) => file.conditions);

    return {
        sessionId,
        totalFiles: files.length,
        totalLines: sum((file) => file.totalLines),
        executableLines,
        executedLines,
        coveredLines,
        coveragePercent: percent(coveredLines, executableLines),
        executionPercent: percent(executedLines, executableLines),
        functions: createMetrics(
            functionBreakdown.length,
            functionBreakdown.filter((fn) => fn.executionCount > 0).length
        ),
        blocks: options.trackBlocks
            ? createMetrics(blocks.length, blocks.filter((block) => block.executionCount > 0).length)
            : null,
        conditions: options.trackConditions
            ? createMetrics(
                conditions.length * 2,
                conditions.reduce((total, c) => total + (c.trueCount > 0 ? 1 : 0) + (c.falseCount > 0 ? 1 : 0), 0)
            )
            : null,
        anomalies: { ...nonExecutableAnomalies(files), ...counters },
        files,
        functionBreakdown,
    };
}

/**
 * Check coverage against a threshold percentage
 */
export function meetsThreshold(summary: CoverageSummary, threshold: number): boolean {
    return summary.coveragePercent >= threshold;
}
