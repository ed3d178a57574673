/**
 * Static classification of a single source line
 */
export enum LineKind {
    Executable = 'executable',
    NonExecutable = 'non-executable',
    BlockStart = 'block-start',
    BlockEnd = 'block-end',
}

/**
 * What a report shows for a line: one fixed state for non-executable lines,
 * three for executable ones
 */
export type LineState = 'not-executable' | 'not-executed' | 'executed' | 'covered';

export type BlockType = 'branch' | 'loop' | 'function-body' | 'other';

export interface LineRecord {
    line: number;
    kind: LineKind;
    executionCount: number;
    covered: boolean;
}

/**
 * A lexical region found by static analysis. `parentKey` names the enclosing
 * block and is resolved against the file's block list when needed.
 */
export interface BlockRecord {
    key: string;
    startLine: number;
    endLine: number;
    type: BlockType;
    parentKey: string | null;
}

export interface FunctionRecord {
    id: string;
    /** Empty for anonymous functions */
    name: string;
    definedLine: number;
    endLine: number;
    executionCount: number;
    /** False for functions first seen through a call event */
    static: boolean;
}

export interface ConditionRecord {
    line: number;
    index: number;
    trueCount: number;
    falseCount: number;
}

export interface CoverageMetrics {
    total: number;
    covered: number;
    pct: number;
}

export interface LineSummary {
    line: number;
    kind: LineKind;
    text: string;
    executionCount: number;
    covered: boolean;
    state: LineState;
}

export interface FunctionSummary {
    file: string;
    id: string;
    name: string;
    definedLine: number;
    endLine: number;
    executionCount: number;
    executableLines: number;
    executedLines: number;
    coveredLines: number;
    coveragePercent: number;
}

export interface BlockSummary extends BlockRecord {
    executionCount: number;
    depth: number;
}

export interface FileSummary {
    path: string;
    totalLines: number;
    executableLines: number;
    executedLines: number;
    coveredLines: number;
    coveragePercent: number;
    executionPercent: number;
    functions: FunctionSummary[];
    blocks: BlockSummary[];
    conditions: ConditionRecord[];
    lines: LineSummary[];
}

/**
 * Executions and markings that were accepted but point at classifier drift or
 * instrumentation problems
 */
export interface AnomalyStats {
    nonExecutableExecutions: number;
    nonExecutableCovered: number;
    outOfRangeLines: number;
    unregisteredFileEvents: number;
    internalFaults: number;
}

export interface CoverageSummary {
    sessionId: string;
    totalFiles: number;
    totalLines: number;
    executableLines: number;
    executedLines: number;
    coveredLines: number;
    coveragePercent: number;
    executionPercent: number;
    functions: CoverageMetrics;
    blocks: CoverageMetrics | null;
    conditions: CoverageMetrics | null;
    anomalies: AnomalyStats;
    files: FileSummary[];
    functionBreakdown: FunctionSummary[];
}
