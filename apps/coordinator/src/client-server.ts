// =============================================================================
// FLEETLINK COORDINATOR - Public Server
// =============================================================================
// Console clients connect to the public port and send admin commands. Each
// client's commands are answered one at a time, in order.
// =============================================================================

import type { IncomingMessage } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import {
    WebSocketChannel,
    createReply,
    decodeAdminCommand,
    encodeCoordinatorFrame,
    errorMessage,
    generateId,
    type ClientInfo,
    type FrameChannel,
    type ReplyMessage,
} from '@fleetlink/protocol';
import { handleAdminCommand, type AdminDeps } from './admin.js';
import { normalizeAddress } from './endpoint-server.js';
import { logger } from './logger.js';

const TAG = 'Public';

export interface ClientServerOptions {
    host: string;
    port: number;
}

export class ClientServer {
    private wss: WebSocketServer | null = null;
    private boundPort = 0;
    private clients = new Map<string, { info: ClientInfo; channel: FrameChannel }>();

    constructor(
        private readonly deps: AdminDeps,
        private readonly options: ClientServerOptions,
    ) {}

    get port(): number {
        return this.boundPort;
    }

    get count(): number {
        return this.clients.size;
    }

    list(): ClientInfo[] {
        return Array.from(this.clients.values(), ({ info }) => ({ ...info }));
    }

    start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const wss = new WebSocketServer({ host: this.options.host, port: this.options.port });

            const onError = (err: Error) => {
                wss.close();
                reject(err);
            };

            wss.once('error', onError);
            wss.once('listening', () => {
                wss.off('error', onError);
                wss.on('error', (err: Error) => logger.error(TAG, `Server error: ${err.message}`));

                const address = wss.address();
                this.boundPort = typeof address === 'object' && address !== null ? address.port : this.options.port;
                this.wss = wss;
                logger.info(TAG, `🚀 Public server listening on ${this.options.host}:${this.boundPort}`);
                resolve(this.boundPort);
            });
            wss.on('connection', (socket: WebSocket, request: IncomingMessage) => this.accept(socket, request));
        });
    }

    async stop(): Promise<void> {
        const wss = this.wss;
        if (!wss) return;
        this.wss = null;

        for (const { channel } of Array.from(this.clients.values())) channel.close();
        for (const client of wss.clients) client.terminate();
        await new Promise<void>(resolve => wss.close(() => resolve()));
    }

    private accept(socket: WebSocket, request: IncomingMessage): void {
        const channel = new WebSocketChannel(
            socket,
            normalizeAddress(request.socket.remoteAddress),
            request.socket.remotePort ?? 0,
        );
        const info: ClientInfo = {
            id: generateId(),
            remoteAddress: channel.remoteAddress,
            remotePort: channel.remotePort,
            connectedAt: Date.now(),
            status: 'Active',
        };
        this.clients.set(info.id, { info, channel });
        logger.info(TAG, `🔌 Console client ${info.remoteAddress}:${info.remotePort} connected`);

        let queue: Promise<void> = Promise.resolve();
        channel.onFrame((frame: string) => {
            queue = queue.then(() => this.answer(channel, frame));
        });

        channel.onClose(() => {
            if (this.clients.delete(info.id)) {
                logger.info(TAG, `Console client ${info.remoteAddress}:${info.remotePort} disconnected`);
            }
        });
    }

    private async answer(channel: FrameChannel, frame: string): Promise<void> {
        const decoded = decodeAdminCommand(frame);
        let reply: ReplyMessage;
        if (decoded.ok) {
            logger.debug(TAG, `Command ${decoded.message.type} from ${channel.remoteAddress}`);
            reply = await handleAdminCommand(this.deps, decoded.message);
        } else {
            reply = createReply('Error', decoded.detail);
        }

        try {
            await channel.send(encodeCoordinatorFrame(reply));
        } catch (error) {
            logger.warn(TAG, `Reply to ${channel.remoteAddress} failed: ${errorMessage(error)}`);
            channel.close();
        }
    }
}
