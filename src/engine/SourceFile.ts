import { analyze, splitLines } from '../classifier/LineClassifier';
import {
    BlockRecord,
    ConditionRecord,
    FunctionRecord,
    LineKind,
    LineRecord,
} from '../models/CoverageModels';
import { LineTable } from '../tracking/LineTable';

/**
 * Functions are keyed by name and defining line, so two definitions sharing a
 * name in one file stay separate
 */
export function functionId(path: string, name: string, line: number): string {
    return `${name || '<anonymous>'}@${path}:${line}`;
}

/**
 * A registered file: immutable source and classification plus the dynamic
 * records of one session. Re-registering builds a new instance.
 */
export class SourceFile {
    readonly lines: readonly string[];
    readonly kinds: readonly LineKind[];
    readonly blocks: readonly BlockRecord[];
    readonly table: LineTable;
    private readonly functionList: FunctionRecord[] = [];
    private readonly functionsByLine = new Map<number, FunctionRecord>();
    private readonly conditionMap = new Map<string, ConditionRecord>();

    constructor(readonly path: string, readonly source: string) {
        const analysis = analyze(source);
        this.lines = splitLines(source);
        this.kinds = analysis.kinds;
        this.blocks = analysis.blocks;
        this.table = new LineTable(this.lines.length);

        for (const fn of analysis.functions) {
            this.addFunction({
                id: functionId(path, fn.name, fn.definedLine),
                name: fn.name,
                definedLine: fn.definedLine,
                endLine: fn.endLine,
                executionCount: 0,
                static: true,
            });
        }
    }

    get functions(): readonly FunctionRecord[] {
        return this.functionList;
    }

    get conditions(): ConditionRecord[] {
        return [...this.conditionMap.values()]
            .map((condition) => ({ ...condition }))
            .sort((a, b) => a.line - b.line || a.index - b.index);
    }

    kindAt(line: number): LineKind | undefined {
        return this.table.contains(line) ? this.kinds[line - 1] : undefined;
    }

    lineRecord(line: number): LineRecord | undefined {
        const kind = this.kindAt(line);
        if (kind === undefined) {
            return undefined;
        }
        return {
            line,
            kind,
            executionCount: this.table.executionCount(line),
            covered: this.table.isCovered(line),
        };
    }

    /**
     * Count a call of the function defined on `line`. A line with no known
     * definition gets an anonymous record spanning just that line.
     */
    recordCall(line: number): FunctionRecord {
        let fn = this.functionsByLine.get(line);
        if (!fn) {
            fn = {
                id: functionId(this.path, '', line),
                name: '',
                definedLine: line,
                endLine: line,
                executionCount: 0,
                static: false,
            };
            this.addFunction(fn);
        }
        fn.executionCount++;
        return fn;
    }

    recordCondition(line: number, index: number, outcome: boolean): ConditionRecord {
        const key = `${line}:${index}`;
        let condition = this.conditionMap.get(key);
        if (!condition) {
            condition = { line, index, trueCount: 0, falseCount: 0 };
            this.conditionMap.set(key, condition);
        }
        if (outcome) {
            condition.trueCount++;
        } else {
            condition.falseCount++;
        }
        return condition;
    }

    private addFunction(fn: FunctionRecord): void {
        this.functionList.push(fn);
        // Several functions on one line: calls are attributed to the first
        if (!this.functionsByLine.has(fn.definedLine)) {
            this.functionsByLine.set(fn.definedLine, fn);
        }
    }
}
