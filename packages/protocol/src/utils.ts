import { randomUUID } from 'crypto';

/**
 * Generate a unique id for sessions and clients.
 */
export function generateId(): string {
    return randomUUID();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string | undefined {
    const value = record[key];
    return typeof value === 'string' ? value : undefined;
}

export function readNumber(record: Record<string, unknown>, key: string): number | undefined {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(record: Record<string, unknown>, key: string): boolean | undefined {
    const value = record[key];
    return typeof value === 'boolean' ? value : undefined;
}

export function isPortNumber(value: number | undefined): value is number {
    return value !== undefined && Number.isInteger(value) && value > 0 && value <= 65535;
}

/**
 * Compile-time exhaustiveness check for discriminated unions.
 */
export function assertNever(value: never, what: string): never {
    throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Wait `ms`, returning early (without rejecting) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}
