import { PathFilter } from '../config/PathFilter';
import { LineRecorder } from './LineRecorder';
import { LineTable, LineTableStore } from './LineTable';
import { SessionControl } from './SessionControl';

export interface SharedFileState {
    path: string;
    lineCount: number;
    buffer: SharedArrayBuffer;
}

/**
 * Everything a worker thread needs to record into a running session.
 * Plain data: it survives `postMessage` / `workerData` and the buffers stay shared.
 */
export interface SharedTrackingState {
    sessionId: string;
    control: SharedArrayBuffer;
    include: string[];
    exclude: string[];
    rootDir?: string;
    files: SharedFileState[];
}

/**
 * Worker-side recorder for lines and assertion coverage. Writes land directly
 * in the session's shared tables, and the session's `stop()` waits for calls
 * that are in progress here.
 */
export class SharedTracker implements LineTableStore {
    private readonly tables = new Map<string, LineTable>();
    private readonly recorder: LineRecorder;

    constructor(state: SharedTrackingState) {
        for (const file of state.files) {
            this.tables.set(file.path, new LineTable(file.lineCount, file.buffer));
        }
        this.recorder = new LineRecorder({
            sessionId: state.sessionId,
            control: new SessionControl(state.control),
            filter: new PathFilter({ include: state.include, exclude: state.exclude, rootDir: state.rootDir }),
            store: this,
            crossThread: true,
        });
    }

    getTable(path: string): LineTable | undefined {
        return this.tables.get(path);
    }

    recordExecution(path: string, line: number): void {
        this.recorder.recordExecution(path, line);
    }

    markCovered(path: string, line: number): void {
        this.recorder.markCovered(path, line);
    }

    wasExecuted(path: string, line: number): boolean {
        return this.recorder.wasExecuted(path, line);
    }

    wasCovered(path: string, line: number): boolean {
        return this.recorder.wasCovered(path, line);
    }
}
