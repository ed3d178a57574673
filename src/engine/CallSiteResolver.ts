import { fileURLToPath } from 'url';

export interface CallSite {
    path: string;
    line: number;
}

/**
 * Resolves a source location from the current call stack. Depth 0 is the
 * function that called the resolver, 1 its caller, and so on.
 */
export type CallSiteResolver = (stackDepth: number) => CallSite | null;

const FRAME_LOCATION = /\(?([^()\s]+):(\d+):\d+\)?$/;

function parseFrame(frame: string): CallSite | null {
    const match = FRAME_LOCATION.exec(frame.trim());
    if (!match) {
        return null;
    }
    let path = match[1];
    if (path.startsWith('file://')) {
        path = fileURLToPath(path);
    }
    return { path, line: parseInt(match[2], 10) };
}

/**
 * Pick the frame at `index` (0 = innermost) out of a V8 `Error.stack` string
 */
export function callSiteFromStack(stack: string | undefined, index: number): CallSite | null {
    if (!stack || index < 0) {
        return null;
    }
    const frames = stack.split('\n').filter((line) => line.trimStart().startsWith('at '));
    const frame = frames[index];
    return frame === undefined ? null : parseFrame(frame);
}

/**
 * Default resolver for code running on V8
 */
export const v8CallSiteResolver: CallSiteResolver = (stackDepth) => {
    const previousLimit = Error.stackTraceLimit;
    Error.stackTraceLimit = Math.max(previousLimit, stackDepth + 2);
    try {
        // Frame 0 is this resolver
        return callSiteFromStack(new Error().stack, stackDepth + 1);
    } finally {
        Error.stackTraceLimit = previousLimit;
    }
};
