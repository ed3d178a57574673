import { v4 as uuidv4 } from 'uuid';
import { CoverageConfigInput, mergeWithDefaults, validateConfig } from '../config/ConfigValidator';
import { PathDecision, PathFilter } from '../config/PathFilter';
import { CoverageConfig } from '../config/schema';
import {
    SessionAlreadyActiveError,
    SessionClosedError,
    SessionNotStartedError,
    UnknownFileError,
} from '../errors/CoverageErrors';
import { CoverageSummary, LineRecord } from '../models/CoverageModels';
import { LineRecorder } from '../tracking/LineRecorder';
import { LineTable, LineTableStore } from '../tracking/LineTable';
import { ControlSlot, SessionControl, SessionState } from '../tracking/SessionControl';
import { SharedTrackingState } from '../tracking/SharedTracker';
import logger from '../utils/logger';
import { CallSite, CallSiteResolver, v8CallSiteResolver } from './CallSiteResolver';
import { defaultRegistry, SessionRegistry } from './SessionRegistry';
import { SourceFile } from './SourceFile';
import { buildSummary } from './SummaryBuilder';

/**
 * Events an instrumentation hook pushes into a session
 */
export type TrackingEvent =
    | { kind: 'line'; path: string; line: number }
    | { kind: 'covered'; path: string; line: number }
    | { kind: 'call'; path: string; line: number }
    | { kind: 'condition'; path: string; line: number; index: number; outcome: boolean };

export interface CoverageSessionOptions {
    registry?: SessionRegistry;
    callSiteResolver?: CallSiteResolver;
    /** Longest `stop()` waits for worker-thread calls in flight */
    stopTimeoutMs?: number;
}

const DEFAULT_STOP_TIMEOUT_MS = 1000;

/**
 * One coverage run: registered files, their line tables and function, block
 * and condition records. Lifecycle is Created → Running → Stopped; tracking
 * calls are only accepted while running and the data is read-only afterwards.
 */
export class CoverageSession implements LineTableStore {
    readonly id: string = uuidv4();
    readonly config: CoverageConfig;
    private readonly control = new SessionControl();
    private readonly filter: PathFilter;
    private readonly files = new Map<string, SourceFile>();
    private readonly recorder: LineRecorder;
    private readonly registry: SessionRegistry;
    private readonly callSiteResolver: CallSiteResolver;
    private readonly stopTimeoutMs: number;

    constructor(config: CoverageConfigInput = {}, options: CoverageSessionOptions = {}) {
        this.config = validateConfig(mergeWithDefaults(config));
        this.registry = options.registry ?? defaultRegistry;
        this.callSiteResolver = options.callSiteResolver ?? v8CallSiteResolver;
        this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
        this.filter = new PathFilter({
            include: this.config.include_patterns,
            exclude: this.config.exclude_patterns,
            rootDir: this.config.root_dir,
        });
        this.recorder = new LineRecorder({
            sessionId: this.id,
            control: this.control,
            filter: this.filter,
            store: this,
            crossThread: false,
        });
    }

    get state(): SessionState {
        return this.control.state;
    }

    start(): this {
        const state = this.control.state;
        if (state === SessionState.Stopped) {
            throw new SessionClosedError(this.id, 'start');
        }
        if (state === SessionState.Running) {
            throw new SessionAlreadyActiveError(this.id);
        }
        this.registry.claim(this);
        this.control.state = SessionState.Running;
        logger.info(`Coverage session ${this.id} started (blocks: ${this.config.track_blocks}, conditions: ${this.config.track_conditions})`);
        return this;
    }

    /**
     * Freeze the session once tracking calls already in progress on other
     * threads have finished. Waits at most `stopTimeoutMs`; calls still in
     * flight after that are logged as a warning and may land after `stop()`
     * returns.
     */
    stop(): void {
        const state = this.control.state;
        if (state === SessionState.Created) {
            throw new SessionNotStartedError(this.id, 'stop');
        }
        if (state === SessionState.Stopped) {
            logger.warn(`Coverage session ${this.id} is already stopped`);
            return;
        }

        this.control.state = SessionState.Stopped;
        const remaining = this.control.drain(this.stopTimeoutMs);
        if (remaining > 0) {
            logger.warn(
                `Coverage session ${this.id} stopped with ${remaining} tracking call(s) still in flight after ${this.stopTimeoutMs}ms; ` +
                'its summary may be incomplete and can still change'
            );
        }
        this.registry.release(this);

        logger.info(`Coverage session ${this.id} stopped: ${this.files.size} file(s) tracked`);
    }

    getTable(path: string): LineTable | undefined {
        return this.files.get(path)?.table;
    }

    /**
     * Register source text for a path. Same text again is a no-op; different
     * text replaces the classification and resets the file's records.
     * Returns false when the path is excluded.
     */
    registerFile(path: string, source: string): boolean {
        this.recorder.assertRunning('register file');
        const key = this.recorder.resolve(path);
        if (key === null) {
            logger.debug(`Not registering excluded file: ${path}`);
            return false;
        }

        const existing = this.files.get(key);
        if (existing && existing.source === source) {
            return true;
        }

        existing?.table.retire();
        this.files.set(key, new SourceFile(key, source));
        logger.debug(existing ? `Re-registered ${key}; records reset` : `Registered ${key}`);
        return true;
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

    /**
     * Count an entry into the function defined on `definedLine`
     */
    recordCall(path: string, definedLine: number): void {
        this.recorder.guard('record call', () => {
            const file = this.lookup(path);
            if (!file) {
                return;
            }
            if (!file.table.contains(definedLine)) {
                this.control.count(ControlSlot.OutOfRange);
                return;
            }
            file.recordCall(definedLine);
        });
    }

    /**
     * Count one evaluation of operand `index` of the boolean expression on `line`
     */
    recordCondition(path: string, line: number, index: number, outcome: boolean): void {
        this.recorder.guard('record condition', () => {
            if (!this.config.track_conditions) {
                return;
            }
            const file = this.lookup(path);
            if (!file) {
                return;
            }
            if (!file.table.contains(line)) {
                this.control.count(ControlSlot.OutOfRange);
                return;
            }
            file.recordCondition(line, index, outcome);
        });
    }

    dispatch(event: TrackingEvent): void {
        switch (event.kind) {
            case 'line':
                this.recordExecution(event.path, event.line);
                break;
            case 'covered':
                this.markCovered(event.path, event.line);
                break;
            case 'call':
                this.recordCall(event.path, event.line);
                break;
            case 'condition':
                this.recordCondition(event.path, event.line, event.index, event.outcome);
                break;
        }
    }

    /**
     * Entry point for assertion libraries: mark the line `stackDepth` frames
     * above the caller as covered (0 marks the caller's own line)
     */
    markCurrentLineCovered(stackDepth: number = 0): CallSite | null {
        const site = this.callSiteResolver(stackDepth + 1);
        if (site) {
            this.markCovered(site.path, site.line);
        } else {
            this.recorder.assertRunning('mark coverage');
        }
        return site;
    }

    getLineRecord(path: string, line: number): LineRecord | undefined {
        const key = this.recorder.resolve(path);
        return key === null ? undefined : this.files.get(key)?.lineRecord(line);
    }

    explainPath(path: string): PathDecision {
        return this.filter.decide(path);
    }

    trackedFiles(): string[] {
        return [...this.files.keys()].sort();
    }

    summary(): CoverageSummary {
        if (this.control.state === SessionState.Created) {
            throw new SessionNotStartedError(this.id, 'summarize');
        }
        return buildSummary(
            this.id,
            [...this.files.values()],
            { trackBlocks: this.config.track_blocks, trackConditions: this.config.track_conditions },
            {
                outOfRangeLines: this.control.read(ControlSlot.OutOfRange),
                unregisteredFileEvents: this.control.read(ControlSlot.UnregisteredFile),
                internalFaults: this.control.read(ControlSlot.InternalFault),
            }
        );
    }

    /**
     * Shared buffers for worker threads; see `SharedTracker`. Files registered
     * later are not part of the snapshot. A file re-registered with new source
     * retires its exported buffer: worker events against it are counted as
     * unregistered-file events and never reach the summary.
     */
    exportSharedState(paths?: string[]): SharedTrackingState {
        this.recorder.assertRunning('share tracking state');
        const files = paths === undefined
            ? [...this.files.values()]
            : paths.map((path) => {
                const file = this.lookup(path, false);
                if (!file) {
                    throw new UnknownFileError(path);
                }
                return file;
            });

        return {
            sessionId: this.id,
            control: this.control.buffer,
            include: [...this.config.include_patterns],
            exclude: [...this.config.exclude_patterns],
            rootDir: this.config.root_dir,
            files: files.map((file) => ({ path: file.path, lineCount: file.table.lineCount, buffer: file.table.buffer })),
        };
    }

    private lookup(path: string, countMissing: boolean = true): SourceFile | undefined {
        const key = this.recorder.resolve(path);
        if (key === null) {
            return undefined;
        }
        const file = this.files.get(key);
        if (!file && countMissing) {
            this.control.count(ControlSlot.UnregisteredFile);
        }
        return file;
    }
}
