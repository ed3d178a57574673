import { LineTableStore } from './LineTable';

export type ExecutionOutcome = 'recorded' | 'unknown-file' | 'retired-file' | 'out-of-range';

/**
 * Counts line executions. Any line of a tracked file is accepted, including
 * lines classified non-executable; callers decide what that means.
 */
export class ExecutionTracker {
    constructor(private readonly store: LineTableStore) { }

    recordExecution(path: string, line: number): ExecutionOutcome {
        const table = this.store.getTable(path);
        if (!table) {
            return 'unknown-file';
        }
        if (table.retired) {
            return 'retired-file';
        }
        if (!table.contains(line)) {
            return 'out-of-range';
        }
        table.increment(line);
        return 'recorded';
    }

    wasExecuted(path: string, line: number): boolean {
        return this.executionCount(path, line) > 0;
    }

    executionCount(path: string, line: number): number {
        const table = this.store.getTable(path);
        if (!table || !table.contains(line)) {
            return 0;
        }
        return table.executionCount(line);
    }
}
