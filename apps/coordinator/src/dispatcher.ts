// =============================================================================
// FLEETLINK COORDINATOR - Dispatcher
// =============================================================================
// Coordinator-initiated commands to a single endpoint session.
// =============================================================================

import {
    RequestTimeoutError,
    createReply,
    type ReplyMessage,
    type Session,
} from '@fleetlink/protocol';
import type { EndpointServer } from './endpoint-server.js';
import { logger } from './logger.js';
import type { SessionRegistry } from './sessions.js';

const TAG = 'Dispatcher';

export class CommandDispatcher {
    constructor(
        private readonly sessions: SessionRegistry,
        private readonly server: EndpointServer,
    ) {}

    private require(sessionId: string): Session {
        const session = this.sessions.get(sessionId);
        if (!session) throw new Error(`Session ${sessionId} not found`);
        return session;
    }

    async ping(sessionId: string): Promise<number> {
        const session = this.require(sessionId);
        const rtt = await this.server.ping(sessionId);
        logger.debug(TAG, `🏓 ${session.name} answered in ${rtt}ms`);
        return rtt;
    }

    /**
     * Hand a task to an idle endpoint. An endpoint runs at most one task.
     */
    async executeTask(sessionId: string, taskId: string): Promise<void> {
        const session = this.require(sessionId);
        if (session.currentTaskId) {
            throw new Error(`Endpoint ${session.name} is already running task ${session.currentTaskId}`);
        }

        // Claim the slot before the write so an overlapping dispatch sees it
        this.sessions.setCurrentTask(sessionId, taskId);
        logger.info(TAG, `📤 Dispatching ${taskId} to ${session.name}`);
        try {
            await this.server.send(sessionId, { type: 'EXECUTE_TASK', taskId });
        } catch (error) {
            if (this.sessions.get(sessionId)?.currentTaskId === taskId) {
                this.sessions.setCurrentTask(sessionId, '');
            }
            throw error;
        }
    }

    /**
     * Ask the endpoint to abandon its task. Not acknowledged by the endpoint.
     */
    async stopTask(sessionId: string): Promise<void> {
        const session = this.require(sessionId);
        logger.info(TAG, `🛑 Stopping ${session.currentTaskId || 'idle task'} on ${session.name}`);
        await this.server.send(sessionId, { type: 'STOP_TASK' });
        this.sessions.setCurrentTask(sessionId, '');
    }

    restart(sessionId: string): Promise<ReplyMessage> {
        return this.lifecycleCommand(sessionId, 'RESTART');
    }

    shutdown(sessionId: string): Promise<ReplyMessage> {
        return this.lifecycleCommand(sessionId, 'SHUTDOWN');
    }

    /**
     * Run the endpoint's benchmark report and return its text.
     */
    async diagnostics(sessionId: string): Promise<string> {
        const session = this.require(sessionId);
        logger.info(TAG, `🩺 Requesting diagnostics from ${session.name}`);

        const reply = await this.server.request(sessionId, { type: 'DIAGNOSTICS' });
        if (reply.status === 'Error') {
            throw new Error(reply.message);
        }
        const result = reply.fields.DiagnosticsResult;
        return typeof result === 'string' ? result : '';
    }

    private async lifecycleCommand(sessionId: string, command: 'RESTART' | 'SHUTDOWN'): Promise<ReplyMessage> {
        const session = this.require(sessionId);
        logger.info(TAG, `🔁 Sending ${command} to ${session.name}`);

        try {
            return await this.server.request(sessionId, { type: command });
        } catch (error) {
            // The endpoint may exit before its acknowledgement makes it out
            if (error instanceof RequestTimeoutError) {
                return createReply('OK', `${command} command sent to endpoint (no response received)`);
            }
            throw error;
        }
    }
}
