// =============================================================================
// FLEETLINK PROTOCOL - Framed Channel
// =============================================================================
// One registered coordinator↔endpoint stream. Each WebSocket text frame is one
// message. Writes are queued so a status telegram and a command reply from two
// independent activities never interleave on the same socket.
// =============================================================================

import WebSocket, { type RawData } from 'ws';
import { ChannelClosedError, RequestTimeoutError } from './errors.js';

export type FrameHandler = (frame: string) => void;
export type CloseHandler = (reason: string) => void;

/**
 * Transport seam used by both sides. Tests substitute in-memory channels.
 */
export interface FrameChannel {
    readonly remoteAddress: string;
    readonly remotePort: number;
    readonly isOpen: boolean;
    send(frame: string): Promise<void>;
    onFrame(handler: FrameHandler): void;
    onClose(handler: CloseHandler): void;
    close(): void;
}

export function rawDataToString(data: RawData): string {
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    return Buffer.from(data).toString('utf8');
}

/**
 * FrameChannel backed by a `ws` socket.
 */
export class WebSocketChannel implements FrameChannel {
    private writeTail: Promise<void> = Promise.resolve();
    private frameHandlers: FrameHandler[] = [];
    private closeHandlers: CloseHandler[] = [];
    private closed = false;

    constructor(
        private readonly socket: WebSocket,
        readonly remoteAddress: string,
        readonly remotePort: number,
    ) {
        socket.on('message', (data: RawData) => {
            const frame = rawDataToString(data);
            for (const handler of this.frameHandlers) handler(frame);
        });
        socket.on('close', (code: number) => this.markClosed(`closed (${code})`));
        socket.on('error', (err: Error) => this.markClosed(err.message));
    }

    get isOpen(): boolean {
        return !this.closed && this.socket.readyState === WebSocket.OPEN;
    }

    send(frame: string): Promise<void> {
        const write = this.writeTail.then(() => this.write(frame));
        // Keep the queue alive after a failed write; the caller still sees the rejection.
        this.writeTail = write.catch(() => undefined);
        return write;
    }

    onFrame(handler: FrameHandler): void {
        this.frameHandlers.push(handler);
    }

    onClose(handler: CloseHandler): void {
        this.closeHandlers.push(handler);
    }

    close(): void {
        if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
            this.socket.close();
        }
        this.markClosed('closed locally');
    }

    /**
     * Drop the connection without a closing handshake.
     */
    terminate(): void {
        this.socket.terminate();
        this.markClosed('terminated');
    }

    private write(frame: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.isOpen) {
                reject(new ChannelClosedError());
                return;
            }
            this.socket.send(frame, (err?: Error) => (err ? reject(err) : resolve()));
        });
    }

    private markClosed(reason: string): void {
        if (this.closed) return;
        this.closed = true;
        const handlers = this.closeHandlers;
        this.closeHandlers = [];
        for (const handler of handlers) handler(reason);
    }
}

/**
 * Open a client channel to `ws://host:port`.
 */
export function openChannel(host: string, port: number, timeoutMs: number): Promise<WebSocketChannel> {
    return new Promise((resolve, reject) => {
        const socket = new WebSocket(`ws://${host}:${port}`);

        const timer = setTimeout(() => {
            socket.terminate();
            reject(new RequestTimeoutError(`Connection to ${host}:${port}`, timeoutMs));
        }, timeoutMs);

        const onError = (err: Error) => {
            clearTimeout(timer);
            reject(err);
        };

        socket.once('error', onError);
        socket.once('open', () => {
            clearTimeout(timer);
            socket.off('error', onError);
            resolve(new WebSocketChannel(socket, host, port));
        });
    });
}

/**
 * Fire-and-forget send for notices that tolerate loss (DISCONNECT, STOP_TASK).
 * Never retried and never rejects; resolves to whether the write went through.
 */
export async function sendBestEffort(channel: FrameChannel, frame: string): Promise<boolean> {
    try {
        await channel.send(frame);
        return true;
    } catch {
        return false;
    }
}
