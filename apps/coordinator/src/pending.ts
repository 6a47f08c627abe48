import { RequestTimeoutError } from '@fleetlink/protocol';

interface Waiter<T> {
    resolve: (value: T) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

/**
 * Per-session FIFO of outstanding requests. Endpoints answer in order, so each
 * answer settles the oldest waiter for that session.
 */
export class PendingReplies<T> {
    private queues = new Map<string, Waiter<T>[]>();

    wait(sessionId: string, what: string, timeoutMs: number): Promise<T> {
        return new Promise((resolve, reject) => {
            const waiter: Waiter<T> = {
                resolve,
                reject,
                timer: setTimeout(() => {
                    this.remove(sessionId, waiter);
                    reject(new RequestTimeoutError(what, timeoutMs));
                }, timeoutMs),
            };
            const queue = this.queues.get(sessionId) ?? [];
            queue.push(waiter);
            this.queues.set(sessionId, queue);
        });
    }

    /**
     * Settle the oldest waiter. Returns false when nobody was waiting.
     */
    resolveOldest(sessionId: string, value: T): boolean {
        const queue = this.queues.get(sessionId);
        const waiter = queue?.shift();
        if (!waiter) return false;

        clearTimeout(waiter.timer);
        if (queue?.length === 0) this.queues.delete(sessionId);
        waiter.resolve(value);
        return true;
    }

    rejectAll(sessionId: string, error: Error): void {
        const queue = this.queues.get(sessionId) ?? [];
        this.queues.delete(sessionId);
        for (const waiter of queue) {
            clearTimeout(waiter.timer);
            waiter.reject(error);
        }
    }

    size(sessionId: string): number {
        return this.queues.get(sessionId)?.length ?? 0;
    }

    private remove(sessionId: string, waiter: Waiter<T>): void {
        const queue = this.queues.get(sessionId);
        if (!queue) return;
        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        if (queue.length === 0) this.queues.delete(sessionId);
    }
}
