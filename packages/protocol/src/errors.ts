// =============================================================================
// FLEETLINK PROTOCOL - Errors
// =============================================================================

/**
 * A write was attempted on a channel that is closed or closing.
 */
export class ChannelClosedError extends Error {
    constructor(message = 'Channel is closed') {
        super(message);
        this.name = 'ChannelClosedError';
    }
}

/**
 * No reply arrived within the allotted time.
 */
export class RequestTimeoutError extends Error {
    constructor(what: string, readonly timeoutMs: number) {
        super(`${what} timed out after ${timeoutMs}ms`);
        this.name = 'RequestTimeoutError';
    }
}

