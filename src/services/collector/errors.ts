// src/services/collector/errors.ts

/** Raised when a collector definition breaks one of its invariants. */
export class CollectorConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'CollectorConfigError';
    }
}

/** Raised when a stored session record cannot be read back. */
export class SessionStateError extends Error {
    constructor(message: string, public readonly sessionId?: string) {
        super(message);
        this.name = 'SessionStateError';
    }
}
