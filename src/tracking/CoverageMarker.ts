import { LineTableStore } from './LineTable';

export type MarkOutcome =
    | 'covered'
    | 'covered-with-implicit-execution'
    | 'already-covered'
    | 'unknown-file'
    | 'retired-file'
    | 'out-of-range';

/**
 * Records that an assertion validated a line. Marking is idempotent and never
 * adds more than the single implicit execution a never-executed line needs.
 */
export class CoverageMarker {
    constructor(private readonly store: LineTableStore) { }

    markCovered(path: string, line: number): MarkOutcome {
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
        const implicit = table.markCovered(line);
        if (implicit === null) {
            return 'already-covered';
        }
        return implicit ? 'covered-with-implicit-execution' : 'covered';
    }

    wasCovered(path: string, line: number): boolean {
        const table = this.store.getTable(path);
        return table !== undefined && table.contains(line) && table.isCovered(line);
    }
}
