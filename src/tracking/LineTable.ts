/**
 * Execution counts and covered flags for one file, backed by shared memory.
 *
 * Layout: `lineCount + 1` count cells followed by `lineCount + 1` covered
 * cells, so line numbers index directly. Cell 0 flags a table retired by
 * re-registration; index 0 of the covered half is unused.
 *
 * Counts saturate at `MAX_EXECUTION_COUNT` instead of wrapping.
 */
export const MAX_EXECUTION_COUNT = 0x7fffffff;

const RETIRED_CELL = 0;

export class LineTable {
    private readonly cells: Int32Array;
    readonly lineCount: number;

    constructor(lineCount: number, buffer?: SharedArrayBuffer) {
        this.lineCount = lineCount;
        const length = 2 * (lineCount + 1);
        if (buffer && buffer.byteLength !== length * Int32Array.BYTES_PER_ELEMENT) {
            throw new RangeError(`Line table buffer of ${buffer.byteLength} bytes does not fit ${lineCount} lines`);
        }
        this.cells = new Int32Array(buffer ?? new SharedArrayBuffer(length * Int32Array.BYTES_PER_ELEMENT));
    }

    get buffer(): SharedArrayBuffer {
        const buffer = this.cells.buffer;
        if (!(buffer instanceof SharedArrayBuffer)) {
            throw new TypeError('Line table must be backed by a SharedArrayBuffer');
        }
        return buffer;
    }

    contains(line: number): boolean {
        return Number.isInteger(line) && line >= 1 && line <= this.lineCount;
    }

    private coveredIndex(line: number): number {
        return this.lineCount + 1 + line;
    }

    increment(line: number): number {
        let current = Atomics.load(this.cells, line);
        while (current < MAX_EXECUTION_COUNT) {
            const seen = Atomics.compareExchange(this.cells, line, current, current + 1);
            if (seen === current) {
                return current + 1;
            }
            current = seen;
        }
        return MAX_EXECUTION_COUNT;
    }

    /**
     * Mark the table as replaced. Holders of the old buffer see it through
     * `retired` and stop recording into it.
     */
    retire(): void {
        Atomics.store(this.cells, RETIRED_CELL, 1);
    }

    get retired(): boolean {
        return Atomics.load(this.cells, RETIRED_CELL) === 1;
    }

    /**
     * Set the covered flag. When the line has never executed, one execution is
     * recorded first so a reader never sees covered with a zero count.
     * Returns whether that implicit execution was recorded, or null when the
     * line was already covered.
     */
    markCovered(line: number): boolean | null {
        const index = this.coveredIndex(line);
        if (Atomics.load(this.cells, index) === 1) {
            return null;
        }
        const implicit = Atomics.compareExchange(this.cells, line, 0, 1) === 0;
        Atomics.store(this.cells, index, 1);
        return implicit;
    }

    executionCount(line: number): number {
        return Atomics.load(this.cells, line);
    }

    isCovered(line: number): boolean {
        return Atomics.load(this.cells, this.coveredIndex(line)) === 1;
    }
}

/**
 * Where trackers look up the table of a tracked file
 */
export interface LineTableStore {
    getTable(path: string): LineTable | undefined;
}
