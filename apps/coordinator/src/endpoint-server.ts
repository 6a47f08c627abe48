// =============================================================================
// FLEETLINK COORDINATOR - Endpoint Server
// =============================================================================
// Accepts endpoint connections on the registration port. Each connection must
// REGISTER first; after that its frames are handled one at a time, in arrival
// order. Closing the stream (or any write failure) removes the session.
// =============================================================================

import type { IncomingMessage } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import {
    ChannelClosedError,
    WebSocketChannel,
    assertNever,
    createReply,
    decodeEndpointFrame,
    decodeRegistration,
    encodeCoordinatorFrame,
    encodeRegistrationResult,
    errorMessage,
    sendBestEffort,
    type ControlMessage,
    type CoordinatorFrame,
    type EndpointFrame,
    type FrameChannel,
    type ReplyMessage,
} from '@fleetlink/protocol';
import { logger } from './logger.js';
import { PendingReplies } from './pending.js';
import type { SessionRegistry } from './sessions.js';

const TAG = 'Endpoints';

export interface EndpointServerOptions {
    host: string;
    port: number;
    registrationTimeoutMs: number;
    requestTimeoutMs: number;
}

export function normalizeAddress(address: string | undefined): string {
    if (!address) return 'unknown';
    return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

export class EndpointServer {
    private wss: WebSocketServer | null = null;
    private boundPort = 0;
    private replies = new PendingReplies<ReplyMessage>();
    private pongs = new PendingReplies<number>();

    constructor(
        private readonly sessions: SessionRegistry,
        private readonly options: EndpointServerOptions,
    ) {}

    get port(): number {
        return this.boundPort;
    }

    // -------------------------------------------------------------------------
    // Lifecycle
    // -------------------------------------------------------------------------

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
                logger.info(TAG, `🚀 Registration server listening on ${this.options.host}:${this.boundPort}`);
                resolve(this.boundPort);
            });
            wss.on('connection', (socket: WebSocket, request: IncomingMessage) => this.accept(socket, request));
        });
    }

    async stop(): Promise<void> {
        const wss = this.wss;
        if (!wss) return;
        this.wss = null;

        this.sessions.closeAll();
        for (const client of wss.clients) client.terminate();
        await new Promise<void>(resolve => wss.close(() => resolve()));
        logger.info(TAG, 'Registration server stopped');
    }

    // -------------------------------------------------------------------------
    // Connection Handler
    // -------------------------------------------------------------------------

    private accept(socket: WebSocket, request: IncomingMessage): void {
        const channel = new WebSocketChannel(
            socket,
            normalizeAddress(request.socket.remoteAddress),
            request.socket.remotePort ?? 0,
        );
        const peer = `${channel.remoteAddress}:${channel.remotePort}`;
        logger.info(TAG, `🔌 Connection from ${peer}, awaiting REGISTER...`);

        let sessionId: string | null = null;
        let decided = false;

        const registrationTimeout = setTimeout(() => {
            if (decided) return;
            decided = true;
            logger.warn(TAG, `⏰ No registration from ${peer} within ${this.options.registrationTimeoutMs}ms`);
            void this.refuse(channel, 'Registration timeout');
        }, this.options.registrationTimeoutMs);

        // One handler for the whole connection; frames are routed by registration state
        channel.onFrame((frame: string) => {
            if (sessionId) {
                this.onSessionFrame(sessionId, channel, frame);
                return;
            }
            if (decided) return;
            decided = true;
            clearTimeout(registrationTimeout);
            sessionId = this.register(channel, frame);
        });

        channel.onClose((reason: string) => {
            clearTimeout(registrationTimeout);
            if (!sessionId) return;

            const closed = new ChannelClosedError(`Session closed: ${reason}`);
            this.replies.rejectAll(sessionId, closed);
            this.pongs.rejectAll(sessionId, closed);

            const session = this.sessions.get(sessionId);
            if (session && this.sessions.unregister(sessionId)) {
                logger.connection(session.name, peer, 'disconnected');
            }
        });
    }

    private register(channel: FrameChannel, frame: string): string | null {
        const decoded = decodeRegistration(frame);
        if (!decoded.ok) {
            logger.warn(TAG, `❌ Invalid registration from ${channel.remoteAddress}: ${decoded.detail}`);
            void this.refuse(channel, decoded.detail);
            return null;
        }

        const { session, superseded } = this.sessions.register(decoded.message, channel);
        if (superseded) {
            logger.connection(superseded.name, superseded.remoteAddress, 'superseded');
        }
        logger.connection(session.name, channel.remoteAddress, 'registered');
        logger.info('Hardware', `📦 ${session.name}: ${session.hardwareDescription || 'unknown hardware'}`);

        void this.write(channel, encodeRegistrationResult({
            status: 'OK',
            detail: 'Registration successful',
            endpointId: session.id,
        }));
        return session.id;
    }

    private async refuse(channel: FrameChannel, detail: string): Promise<void> {
        await sendBestEffort(channel, encodeRegistrationResult({ status: 'FAILED', detail }));
        channel.close();
    }

    private onSessionFrame(sessionId: string, channel: FrameChannel, raw: string): void {
        this.sessions.touch(sessionId);

        const decoded = decodeEndpointFrame(raw);
        if (!decoded.ok) {
            if (decoded.reason === 'unknown') {
                logger.warn(TAG, `⚠️ ${decoded.detail} from session ${sessionId}`);
                void this.write(channel, encodeCoordinatorFrame(createReply('Error', decoded.detail)));
            } else {
                logger.warn(TAG, `⚠️ Dropping malformed frame from session ${sessionId}: ${decoded.detail}`);
            }
            return;
        }

        const reply = this.handleCommand(sessionId, decoded.message);
        if (reply) {
            void this.write(channel, encodeCoordinatorFrame(reply));
        }
    }

    // -------------------------------------------------------------------------
    // Per-session Dispatch
    // -------------------------------------------------------------------------

    /**
     * Apply one frame from a registered endpoint. Returns the frame to send back, if any.
     */
    handleCommand(sessionId: string, message: EndpointFrame): CoordinatorFrame | null {
        switch (message.type) {
            case 'PING':
                return { type: 'PONG' };

            case 'PONG':
                this.pongs.resolveOldest(sessionId, Date.now());
                return null;

            case 'STATUS_UPDATE': {
                this.sessions.updateStatus(sessionId, {
                    cpuLoad: message.cpuLoad,
                    state: message.state,
                    taskId: message.taskId,
                });
                const session = this.sessions.get(sessionId);
                if (session) logger.status(session.name, message.cpuLoad, message.state);
                return createReply('OK', 'Status updated');
            }

            case 'TASK_COMPLETED':
                this.sessions.completeTask(sessionId, message.taskId, message.result);
                logger.info(TAG, `✅ Task ${message.taskId} completed by session ${sessionId}`);
                return createReply('OK', 'Task result received');

            case 'DISCONNECT':
                logger.info(TAG, `Session ${sessionId} sent DISCONNECT`);
                this.sessions.getChannel(sessionId)?.close();
                return null;

            case 'REPLY':
                if (!this.replies.resolveOldest(sessionId, message)) {
                    logger.debug(TAG, `Unsolicited reply from session ${sessionId}: ${message.status} ${message.message}`);
                }
                return null;

            default:
                return assertNever(message, 'endpoint frame');
        }
    }

    // -------------------------------------------------------------------------
    // Coordinator-initiated Traffic
    // -------------------------------------------------------------------------

    /**
     * Send a command the endpoint does not answer (EXECUTE_TASK, STOP_TASK).
     */
    async send(sessionId: string, command: ControlMessage): Promise<void> {
        const channel = this.requireChannel(sessionId);
        try {
            await channel.send(encodeCoordinatorFrame(command));
        } catch (error) {
            channel.close();
            throw error;
        }
    }

    /**
     * Send a command and wait for the endpoint's REPLY.
     */
    async request(sessionId: string, command: ControlMessage): Promise<ReplyMessage> {
        const channel = this.requireChannel(sessionId);
        const [reply] = await Promise.all([
            this.replies.wait(sessionId, `${command.type} on session ${sessionId}`, this.options.requestTimeoutMs),
            this.write(channel, encodeCoordinatorFrame(command)),
        ]);
        return reply;
    }

    /**
     * Round-trip time of a PING in milliseconds.
     */
    async ping(sessionId: string): Promise<number> {
        const channel = this.requireChannel(sessionId);
        const started = Date.now();
        const [receivedAt] = await Promise.all([
            this.pongs.wait(sessionId, `PING on session ${sessionId}`, this.options.requestTimeoutMs),
            this.write(channel, encodeCoordinatorFrame({ type: 'PING' })),
        ]);
        return receivedAt - started;
    }

    private requireChannel(sessionId: string): FrameChannel {
        const channel = this.sessions.getChannel(sessionId);
        if (!channel) throw new Error(`Session ${sessionId} not found`);
        return channel;
    }

    /**
     * Write a frame; a failed write counts as loss of the connection.
     */
    private async write(channel: FrameChannel, frame: string): Promise<void> {
        try {
            await channel.send(frame);
        } catch (error) {
            logger.warn(TAG, `Write to ${channel.remoteAddress}:${channel.remotePort} failed: ${errorMessage(error)}`);
            channel.close();
        }
    }
}
