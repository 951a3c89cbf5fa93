/**
 * Error classes raised by the VSS model and lookup.
 */

/** The tree itself is malformed: bad JSON, bad structure, bad leaf. */
export class VssSpecError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'VssSpecError';
    }
}

/** The requested path does not exist in an otherwise valid tree. */
export class VssBranchError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'VssBranchError';
    }
}

export class TreeNotFoundError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'TreeNotFoundError';
    }
}

/** A signal name that cannot address anything (empty, or with empty keys). */
export class SignalNameError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SignalNameError';
    }
}

/** A leaf definition that cannot become a Signal. */
export class SignalDefinitionError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SignalDefinitionError';
    }
}

/** A runtime value that does not fit a signal. */
export class SignalValueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SignalValueError';
    }
}

export class UnitError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'UnitError';
    }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
