// =============================================================================
// FLEETLINK ENDPOINT - Connection Manager
// =============================================================================
// Holds the single registered stream to a coordinator. After registration a
// command listener answers coordinator frames in arrival order and a status
// reporter sends STATUS_UPDATE every interval. The first failed write (or the
// stream closing) drops the connection; reconnecting is the caller's decision.
// =============================================================================

import { EventEmitter } from 'events';
import {
    assertNever,
    createReply,
    decodeCoordinatorFrame,
    decodeRegistrationResult,
    encodeEndpointFrame,
    encodeRegistration,
    errorMessage,
    openChannel,
    sendBestEffort,
    sleep,
    type EndpointFrame,
    type FrameChannel,
    type RegistrationResult,
    type ReplyMessage,
} from '@fleetlink/protocol';
import type { TaskRunner } from './executor.js';
import { COLORS, log } from './logger.js';

export type TransportOpener = (host: string, port: number, timeoutMs: number) => Promise<FrameChannel>;

export interface ConnectionOptions {
    endpointName: string;
    /** Generated once per process; lets the coordinator replace only this process's stale session. */
    instanceId: string;
    hardwareDescription: string;
    acceleratorAvailable: boolean;
    /** Coordinator console port; a connect to it is redirected to `registrationPort`. */
    publicPort: number;
    registrationPort: number;
    registrationTimeoutMs: number;
    statusIntervalMs: number;
    taskRunner: TaskRunner;
    loadSampler: { readonly current: number };
    runDiagnostics: () => Promise<string>;
    lifecycle: { scheduleRestart(): boolean; scheduleShutdown(): boolean };
    openTransport?: TransportOpener;
}

export interface BackoffTiming {
    reconnectBaseDelay: number;
    reconnectMaxDelay: number;
    reconnectMultiplier: number;
}

/**
 * Delay before reconnect attempt `attempt` (0-based), capped at the maximum.
 */
export function backoffDelay(attempt: number, timing: BackoffTiming): number {
    return Math.min(
        timing.reconnectBaseDelay * Math.pow(timing.reconnectMultiplier, attempt),
        timing.reconnectMaxDelay
    );
}

export interface CoordinatorTarget {
    address: string;
    port: number;
}

/**
 * Look the coordinator up and connect, backing off between attempts until a
 * connect succeeds or `signal` aborts. A failed lookup counts as a failed attempt.
 */
export async function connectWithRetry(
    find: () => Promise<CoordinatorTarget>,
    connect: (address: string, port: number) => Promise<boolean>,
    timing: BackoffTiming,
    signal: AbortSignal,
): Promise<boolean> {
    for (let attempt = 0; !signal.aborted; attempt++) {
        try {
            const target = await find();
            if (signal.aborted) return false;
            if (await connect(target.address, target.port)) return true;
        } catch (error) {
            log('warn', 'Discovery', `Coordinator lookup failed: ${errorMessage(error)}`);
        }

        const delay = backoffDelay(attempt, timing);
        log('info', 'Reconnect', `🔄 Attempting in ${delay / 1000}s (attempt ${attempt + 1})`);
        await sleep(delay, signal);
    }
    return false;
}

interface RunningTask {
    id: string;
    controller: AbortController;
}

export interface ConnectionManager {
    on(event: 'status', listener: (connected: boolean) => void): this;
    on(event: 'message', listener: (text: string) => void): this;
    on(event: 'task', listener: (taskId: string | null) => void): this;
    emit(event: 'status', connected: boolean): boolean;
    emit(event: 'message', text: string): boolean;
    emit(event: 'task', taskId: string | null): boolean;
}

export class ConnectionManager extends EventEmitter {
    private channel: FrameChannel | null = null;
    private assignedId: string | null = null;
    private statusLoop: AbortController | null = null;
    private task: RunningTask | null = null;
    private inbox: Promise<void> = Promise.resolve();
    private transitions: Promise<unknown> = Promise.resolve();

    constructor(private readonly options: ConnectionOptions) {
        super();
    }

    get isConnected(): boolean {
        return this.channel !== null;
    }

    get currentTaskId(): string | null {
        return this.task?.id ?? null;
    }

    /** Session id assigned by the coordinator, while connected. */
    get endpointId(): string | null {
        return this.assignedId;
    }

    // -------------------------------------------------------------------------
    // Connect / Disconnect
    // -------------------------------------------------------------------------

    /**
     * Register with the coordinator at `address:port`. An existing connection is
     * torn down first. Resolves true once the coordinator accepted REGISTER.
     */
    connect(address: string, port: number): Promise<boolean> {
        return this.serialize(() => this.open(address, port));
    }

    /**
     * Send a best-effort DISCONNECT and release the stream.
     */
    disconnect(): Promise<void> {
        return this.serialize(() => this.teardown());
    }

    private serialize<T>(transition: () => Promise<T>): Promise<T> {
        const next = this.transitions.then(transition);
        this.transitions = next.catch(() => undefined);
        return next;
    }

    private async open(address: string, port: number): Promise<boolean> {
        if (this.channel) await this.teardown();

        let target = port;
        if (port === this.options.publicPort) {
            target = this.options.registrationPort;
            log('info', 'Connection', `ℹ️ Port ${port} is the coordinator's public port, registering on ${target} instead`);
        }

        log('info', 'Connection', `🔌 Connecting to ${address}:${target}...`);
        const openTransport = this.options.openTransport ?? openChannel;
        let channel: FrameChannel;
        try {
            channel = await openTransport(address, target, this.options.registrationTimeoutMs);
        } catch (error) {
            this.notice('warn', `Failed to connect to ${address}:${target}: ${errorMessage(error)}`);
            return false;
        }

        const result = await this.register(channel);
        if (!result || result.status !== 'OK') {
            channel.close();
            this.notice('warn', `Registration with ${address}:${target} failed: ${result?.detail ?? 'no reply'}`);
            return false;
        }
        return true;
    }

    /**
     * Send REGISTER and wait for exactly one reply frame. The stream is
     * activated from inside the frame handler so no later frame can slip past.
     */
    private register(channel: FrameChannel): Promise<RegistrationResult | null> {
        return new Promise((resolve) => {
            let answered = false;
            const settle = (result: RegistrationResult | null) => {
                if (answered) return;
                answered = true;
                clearTimeout(timer);
                resolve(result);
            };

            const timer = setTimeout(() => {
                log('warn', 'Connection', `⏰ No registration reply within ${this.options.registrationTimeoutMs}ms`);
                settle(null);
            }, this.options.registrationTimeoutMs);

            channel.onFrame((frame: string) => {
                if (answered) {
                    if (this.channel === channel) this.enqueue(channel, frame);
                    return;
                }
                const decoded = decodeRegistrationResult(frame);
                if (!decoded.ok) {
                    log('warn', 'Connection', `Unreadable registration reply: ${decoded.detail}`);
                    settle(null);
                    return;
                }
                if (decoded.message.status === 'OK') this.activate(channel, decoded.message);
                settle(decoded.message);
            });

            channel.onClose((reason: string) => {
                settle(null);
                this.connectionLost(channel, reason);
            });

            channel.send(encodeRegistration({
                type: 'REGISTER',
                endpointName: this.options.endpointName,
                hardwareDescription: this.options.hardwareDescription,
                acceleratorAvailable: this.options.acceleratorAvailable,
                instanceId: this.options.instanceId,
            })).catch((error: unknown) => {
                log('warn', 'Connection', `Could not send REGISTER: ${errorMessage(error)}`);
                settle(null);
            });
        });
    }

    private activate(channel: FrameChannel, result: RegistrationResult): void {
        this.channel = channel;
        this.assignedId = result.endpointId ?? null;
        this.inbox = Promise.resolve();

        const statusLoop = new AbortController();
        this.statusLoop = statusLoop;
        void this.reportStatus(channel, statusLoop.signal);

        log('info', 'Connection', `✅ Registered as ${COLORS.magenta}${this.options.endpointName}${COLORS.reset} (${this.assignedId ?? 'no id'})`);
        this.emit('message', `Connected to server ${channel.remoteAddress}:${channel.remotePort}`);
        this.emit('status', true);
    }

    private async teardown(): Promise<void> {
        const channel = this.channel;
        if (!channel) return;
        this.release();

        // Not retried: the coordinator also notices the stream closing
        await sendBestEffort(channel, encodeEndpointFrame({ type: 'DISCONNECT' }));
        channel.close();

        log('info', 'Connection', '👋 Disconnected from server');
        this.emit('message', 'Disconnected from server');
        this.emit('status', false);
    }

    /**
     * The stream closed or a write failed. Only acts on the current channel.
     */
    private connectionLost(channel: FrameChannel, reason: string): void {
        if (this.channel !== channel) return;
        this.release();
        channel.close();

        log('warn', 'Connection', `❌ Connection to server lost: ${reason}`);
        this.emit('message', 'Connection to server lost.');
        this.emit('status', false);
    }

    private release(): void {
        this.channel = null;
        this.assignedId = null;
        this.statusLoop?.abort();
        this.statusLoop = null;

        const task = this.task;
        if (task) {
            this.task = null;
            task.controller.abort();
            this.emit('task', null);
        }
    }

    // -------------------------------------------------------------------------
    // Status Reporter
    // -------------------------------------------------------------------------

    private async reportStatus(channel: FrameChannel, signal: AbortSignal): Promise<void> {
        log('info', 'Heartbeat', `⏱️ Sending status every ${this.options.statusIntervalMs / 1000}s`);
        while (!signal.aborted) {
            const frame: EndpointFrame = {
                type: 'STATUS_UPDATE',
                cpuLoad: this.options.loadSampler.current,
                state: this.task ? 'Processing' : 'Available',
                taskId: this.task?.id ?? null,
            };
            try {
                await channel.send(encodeEndpointFrame(frame));
            } catch (error) {
                this.connectionLost(channel, `status update failed: ${errorMessage(error)}`);
                return;
            }
            await sleep(this.options.statusIntervalMs, signal);
        }
    }

    // -------------------------------------------------------------------------
    // Command Listener
    // -------------------------------------------------------------------------

    /**
     * Frames are handled one at a time so replies leave in request order.
     */
    private enqueue(channel: FrameChannel, frame: string): void {
        this.inbox = this.inbox.then(() => this.handleFrame(channel, frame)).catch((error: unknown) => {
            log('error', 'Command', `Error processing message: ${errorMessage(error)}`);
        });
    }

    private async handleFrame(channel: FrameChannel, raw: string): Promise<void> {
        if (this.channel !== channel) return;

        const decoded = decodeCoordinatorFrame(raw);
        if (!decoded.ok) {
            if (decoded.reason === 'unknown') {
                this.emit('message', `Received unknown command: ${decoded.command ?? '?'}`);
                await this.write(channel, encodeEndpointFrame(createReply('Error', decoded.detail)));
            } else {
                log('warn', 'Protocol', `⚠️ Dropping malformed frame: ${decoded.detail}`);
            }
            return;
        }

        const message = decoded.message;
        switch (message.type) {
            case 'PING':
                await this.write(channel, encodeEndpointFrame({ type: 'PONG' }));
                return;

            case 'PONG':
                return;

            case 'EXECUTE_TASK':
                this.startTask(channel, message.taskId);
                return;

            case 'STOP_TASK':
                this.stopTask();
                return;

            case 'DIAGNOSTICS': {
                this.emit('message', 'Running diagnostics requested by server...');
                let reply: ReplyMessage;
                try {
                    const report = await this.options.runDiagnostics();
                    reply = createReply('OK', 'Diagnostics completed', { DiagnosticsResult: report });
                } catch (error) {
                    reply = createReply('Error', `Diagnostics failed: ${errorMessage(error)}`);
                }
                await this.write(channel, encodeEndpointFrame(reply));
                return;
            }

            case 'RESTART':
                await this.write(channel, encodeEndpointFrame(createReply('OK', 'Restart command received')));
                this.emit('message', 'Restart command received from server. Restarting...');
                this.options.lifecycle.scheduleRestart();
                return;

            case 'SHUTDOWN':
                await this.write(channel, encodeEndpointFrame(createReply('OK', 'Shutdown command received')));
                this.emit('message', 'Shutdown command received from server. Shutting down...');
                this.options.lifecycle.scheduleShutdown();
                return;

            case 'REPLY':
                if (message.status === 'Error') {
                    log('warn', 'Server', `Error: ${message.message}`);
                }
                return;

            default:
                assertNever(message, 'coordinator frame');
        }
    }

    private startTask(channel: FrameChannel, taskId: string): void {
        if (this.task) {
            log('warn', 'Task', `Ignoring EXECUTE_TASK ${taskId}: task ${this.task.id} is still running`);
            return;
        }

        const task: RunningTask = { id: taskId, controller: new AbortController() };
        this.task = task;
        log('info', 'Task', `📥 Received task ${COLORS.blue}${taskId}${COLORS.reset}`);
        this.emit('task', taskId);
        void this.runTask(channel, task);
    }

    private async runTask(channel: FrameChannel, task: RunningTask): Promise<void> {
        let result: string;
        try {
            result = await this.options.taskRunner.run(task.id, task.controller.signal);
        } catch (error) {
            result = `Task failed: ${errorMessage(error)}`;
        }

        // Stopped or disconnected: no completion for this id
        if (this.task !== task) return;

        this.task = null;
        this.emit('task', null);
        await this.write(channel, encodeEndpointFrame({ type: 'TASK_COMPLETED', taskId: task.id, result }));
        log('info', 'Task', `✅ ${task.id}: ${result}`);
        this.emit('message', `Task ${task.id} completed and result sent to server.`);
    }

    private stopTask(): void {
        const task = this.task;
        if (!task) {
            log('debug', 'Task', 'STOP_TASK received with no task running');
            return;
        }
        this.task = null;
        task.controller.abort();
        log('info', 'Task', `🛑 Task ${task.id} stopped by server`);
        this.emit('task', null);
    }

    /**
     * A failed write drops the connection.
     */
    private async write(channel: FrameChannel, frame: string): Promise<void> {
        try {
            await channel.send(frame);
        } catch (error) {
            this.connectionLost(channel, `write failed: ${errorMessage(error)}`);
        }
    }

    private notice(level: 'info' | 'warn', text: string): void {
        log(level, 'Connection', text);
        this.emit('message', text);
    }
}
