import { SessionAlreadyActiveError } from '../errors/CoverageErrors';

export interface RegisteredSession {
    readonly id: string;
}

/**
 * Holds the one running session live instrumentation reports to. The process
 * shares `defaultRegistry`; tests can create their own.
 */
export class SessionRegistry {
    private active: RegisteredSession | null = null;

    get activeSession(): RegisteredSession | null {
        return this.active;
    }

    claim(session: RegisteredSession): void {
        if (this.active !== null && this.active !== session) {
            throw new SessionAlreadyActiveError(this.active.id);
        }
        this.active = session;
    }

    release(session: RegisteredSession): void {
        if (this.active === session) {
            this.active = null;
        }
    }
}

export const defaultRegistry = new SessionRegistry();
