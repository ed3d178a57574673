export enum CoverageErrorCode {
    CONFIGURATION = 'CONFIGURATION',
    SESSION_ALREADY_ACTIVE = 'SESSION_ALREADY_ACTIVE',
    SESSION_CLOSED = 'SESSION_CLOSED',
    SESSION_NOT_STARTED = 'SESSION_NOT_STARTED',
    UNKNOWN_FILE = 'UNKNOWN_FILE',
}

export class CoverageError extends Error {
    constructor(
        message: string,
        public readonly code: CoverageErrorCode
    ) {
        super(message);
        this.name = 'CoverageError';
    }
}

/**
 * Invalid configuration: bad include/exclude rule, threshold or report format
 */
export class ConfigurationError extends CoverageError {
    constructor(message: string, public readonly field?: string) {
        super(message, CoverageErrorCode.CONFIGURATION);
        this.name = 'ConfigurationError';
    }
}

export class SessionAlreadyActiveError extends CoverageError {
    constructor(public readonly activeSessionId: string) {
        super(
            `Coverage session ${activeSessionId} is already running; stop it before starting another`,
            CoverageErrorCode.SESSION_ALREADY_ACTIVE
        );
        this.name = 'SessionAlreadyActiveError';
    }
}

/**
 * Mutation attempted after the session was stopped
 */
export class SessionClosedError extends CoverageError {
    constructor(public readonly sessionId: string, operation: string) {
        super(`Cannot ${operation}: coverage session ${sessionId} is stopped`, CoverageErrorCode.SESSION_CLOSED);
        this.name = 'SessionClosedError';
    }
}

export class SessionNotStartedError extends CoverageError {
    constructor(public readonly sessionId: string, operation: string) {
        super(`Cannot ${operation}: coverage session ${sessionId} has not been started`, CoverageErrorCode.SESSION_NOT_STARTED);
        this.name = 'SessionNotStartedError';
    }
}

export class UnknownFileError extends CoverageError {
    constructor(public readonly filePath: string) {
        super(`File was never registered in this coverage session: ${filePath}`, CoverageErrorCode.UNKNOWN_FILE);
        this.name = 'UnknownFileError';
    }
}

/**
 * Lifecycle and configuration errors are the caller's to handle; everything
 * else raised inside a tracking call is an internal fault
 */
export function isCallerError(error: unknown): boolean {
    return error instanceof ConfigurationError
        || error instanceof SessionAlreadyActiveError
        || error instanceof SessionClosedError
        || error instanceof SessionNotStartedError;
}
