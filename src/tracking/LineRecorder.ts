import { PathFilter } from '../config/PathFilter';
import {
    isCallerError,
    SessionClosedError,
    SessionNotStartedError,
} from '../errors/CoverageErrors';
import logger from '../utils/logger';
import { CoverageMarker } from './CoverageMarker';
import { ExecutionTracker } from './ExecutionTracker';
import { LineTableStore } from './LineTable';
import { ControlSlot, SessionControl, SessionState } from './SessionControl';

type AnomalySlot = ControlSlot.OutOfRange | ControlSlot.UnregisteredFile | ControlSlot.InternalFault;

export interface LineRecorderOptions {
    sessionId: string;
    control: SessionControl;
    filter: PathFilter;
    store: LineTableStore;
    /** Count calls as in flight so `stop()` on another thread waits for them */
    crossThread: boolean;
}

/**
 * Front end shared by the session and worker-side trackers: lifecycle checks,
 * path filtering, anomaly accounting and fault containment around the
 * execution tracker and coverage marker.
 */
export class LineRecorder {
    readonly tracker: ExecutionTracker;
    readonly marker: CoverageMarker;
    private readonly reported = new Set<AnomalySlot>();

    constructor(private readonly options: LineRecorderOptions) {
        this.tracker = new ExecutionTracker(options.store);
        this.marker = new CoverageMarker(options.store);
    }

    recordExecution(path: string, line: number): void {
        this.guard('record execution', () => {
            const key = this.resolve(path);
            if (key === null) {
                return;
            }
            const outcome = this.tracker.recordExecution(key, line);
            if (outcome === 'unknown-file') {
                this.anomaly(ControlSlot.UnregisteredFile, `execution reported for unregistered file ${key}`);
            } else if (outcome === 'retired-file') {
                this.anomaly(ControlSlot.UnregisteredFile, `execution reported against a replaced registration of ${key}`);
            } else if (outcome === 'out-of-range') {
                this.anomaly(ControlSlot.OutOfRange, `execution reported for ${key}:${line}, outside the file`);
            }
        });
    }

    markCovered(path: string, line: number): void {
        this.guard('mark coverage', () => {
            const key = this.resolve(path);
            if (key === null) {
                return;
            }
            const outcome = this.marker.markCovered(key, line);
            if (outcome === 'unknown-file') {
                this.anomaly(ControlSlot.UnregisteredFile, `coverage marked for unregistered file ${key}`);
            } else if (outcome === 'retired-file') {
                this.anomaly(ControlSlot.UnregisteredFile, `coverage marked against a replaced registration of ${key}`);
            } else if (outcome === 'out-of-range') {
                this.anomaly(ControlSlot.OutOfRange, `coverage marked for ${key}:${line}, outside the file`);
            }
        });
    }

    wasExecuted(path: string, line: number): boolean {
        const key = this.resolve(path);
        return key !== null && this.tracker.wasExecuted(key, line);
    }

    wasCovered(path: string, line: number): boolean {
        const key = this.resolve(path);
        return key !== null && this.marker.wasCovered(key, line);
    }

    /**
     * Normalized key of an included path, or null when the path is filtered out
     */
    resolve(path: string): string | null {
        const decision = this.options.filter.decide(path);
        return decision.included ? decision.path : null;
    }

    /**
     * Run a tracking call: lifecycle errors reach the caller, anything else is
     * counted as an internal fault and swallowed so the program under test
     * keeps running.
     */
    guard<T>(operation: string, fn: () => T): T | undefined {
        const run = (): T | undefined => {
            this.assertRunning(operation);
            try {
                return fn();
            } catch (error) {
                if (isCallerError(error)) {
                    throw error;
                }
                this.anomaly(
                    ControlSlot.InternalFault,
                    `internal fault during ${operation}: ${error instanceof Error ? error.message : String(error)}`
                );
                return undefined;
            }
        };
        return this.options.crossThread ? this.options.control.enter(run) : run();
    }

    assertRunning(operation: string): void {
        const { control, sessionId } = this.options;
        const state = control.state;
        if (state === SessionState.Created) {
            throw new SessionNotStartedError(sessionId, operation);
        }
        if (state === SessionState.Stopped) {
            throw new SessionClosedError(sessionId, operation);
        }
    }

    private anomaly(slot: AnomalySlot, detail: string): void {
        this.options.control.count(slot);
        // Only the first of each kind is logged; these sit on hot paths
        if (!this.reported.has(slot)) {
            this.reported.add(slot);
            logger.debug(`Coverage anomaly in session ${this.options.sessionId}: ${detail}`);
        }
    }
}
