/**
 * Session state, in-flight call count and anomaly counters in one shared
 * Int32Array, so worker threads holding the buffer see state changes and the
 * main thread sees their counters.
 */

export enum SessionState {
    Created = 0,
    Running = 1,
    Stopped = 2,
}

export enum ControlSlot {
    State = 0,
    InFlight = 1,
    OutOfRange = 2,
    UnregisteredFile = 3,
    InternalFault = 4,
}

const SLOT_COUNT = 5;

/** Upper bound for one `Atomics.wait` slice while draining */
const DRAIN_SLICE_MS = 5;

export class SessionControl {
    private readonly cells: Int32Array;

    constructor(buffer?: SharedArrayBuffer) {
        this.cells = new Int32Array(buffer ?? new SharedArrayBuffer(SLOT_COUNT * Int32Array.BYTES_PER_ELEMENT));
    }

    get buffer(): SharedArrayBuffer {
        const buffer = this.cells.buffer;
        if (!(buffer instanceof SharedArrayBuffer)) {
            throw new TypeError('Session control must be backed by a SharedArrayBuffer');
        }
        return buffer;
    }

    get state(): SessionState {
        switch (Atomics.load(this.cells, ControlSlot.State)) {
            case SessionState.Running:
                return SessionState.Running;
            case SessionState.Stopped:
                return SessionState.Stopped;
            default:
                return SessionState.Created;
        }
    }

    set state(value: SessionState) {
        Atomics.store(this.cells, ControlSlot.State, value);
    }

    count(slot: ControlSlot.OutOfRange | ControlSlot.UnregisteredFile | ControlSlot.InternalFault): number {
        return Atomics.add(this.cells, slot, 1) + 1;
    }

    read(slot: ControlSlot): number {
        return Atomics.load(this.cells, slot);
    }

    /**
     * Run `fn` as an in-flight tracking call; `drain()` waits for it
     */
    enter<T>(fn: () => T): T {
        Atomics.add(this.cells, ControlSlot.InFlight, 1);
        try {
            return fn();
        } finally {
            if (Atomics.sub(this.cells, ControlSlot.InFlight, 1) === 1) {
                Atomics.notify(this.cells, ControlSlot.InFlight);
            }
        }
    }

    /**
     * Block until no call is in flight or `timeoutMs` elapses. Returns the number
     * of calls still in flight (0 when drained).
     */
    drain(timeoutMs: number): number {
        const deadline = Date.now() + timeoutMs;
        let inFlight = Atomics.load(this.cells, ControlSlot.InFlight);
        while (inFlight > 0 && Date.now() < deadline) {
            Atomics.wait(this.cells, ControlSlot.InFlight, inFlight, DRAIN_SLICE_MS);
            inFlight = Atomics.load(this.cells, ControlSlot.InFlight);
        }
        return inFlight;
    }
}
