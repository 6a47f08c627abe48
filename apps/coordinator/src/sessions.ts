// =============================================================================
// FLEETLINK COORDINATOR - Session Registry
// =============================================================================
// Tracks every registered endpoint connection. Mutated only from the event
// loop; readers get copies, never the live records.
// =============================================================================

import { EventEmitter } from 'events';
import {
    generateId,
    type EndpointState,
    type FrameChannel,
    type RegistrationRequest,
    type Session,
} from '@fleetlink/protocol';

export type RemovalReason = 'disconnected' | 'superseded';

export interface RegisterResult {
    session: Session;
    superseded: Session | null;
}

export interface StatusUpdate {
    cpuLoad: number;
    state: EndpointState;
    taskId: string | null;
}

interface SessionEntry {
    session: Session;
    channel: FrameChannel;
    // Sent by the coordinator, not yet seen in a status telegram
    dispatchedTaskId: string;
}

export interface SessionRegistry {
    on(event: 'registered', listener: (session: Session) => void): this;
    on(event: 'removed', listener: (session: Session, reason: RemovalReason) => void): this;
    on(event: 'updated', listener: (session: Session) => void): this;
    on(event: 'taskCompleted', listener: (session: Session, taskId: string, result: string) => void): this;
    emit(event: 'registered' | 'updated', session: Session): boolean;
    emit(event: 'removed', session: Session, reason: RemovalReason): boolean;
    emit(event: 'taskCompleted', session: Session, taskId: string, result: string): boolean;
}

export class SessionRegistry extends EventEmitter {
    private entries = new Map<string, SessionEntry>();

    /**
     * Create a session for a freshly registered connection. An older session
     * of the same endpoint process (same name, address and instance id) is
     * closed and replaced.
     */
    register(request: RegistrationRequest, channel: FrameChannel, now: number = Date.now()): RegisterResult {
        const name = request.endpointName || `Endpoint-${channel.remoteAddress}-${generateId().slice(0, 8)}`;
        const instanceId = request.instanceId ?? '';

        let superseded: Session | null = null;
        for (const entry of this.entries.values()) {
            const existing = entry.session;
            if (existing.name === name && existing.remoteAddress === channel.remoteAddress && existing.instanceId === instanceId) {
                superseded = { ...existing };
                this.unregister(existing.id, 'superseded');
                entry.channel.close();
                break;
            }
        }

        const session: Session = {
            id: generateId(),
            name,
            hardwareDescription: request.hardwareDescription,
            acceleratorAvailable: request.acceleratorAvailable,
            remoteAddress: channel.remoteAddress,
            remotePort: channel.remotePort,
            instanceId,
            connectedAt: now,
            lastSeenAt: now,
            state: 'Available',
            cpuLoad: 0,
            currentTaskId: '',
        };

        this.entries.set(session.id, { session, channel, dispatchedTaskId: '' });
        this.emit('registered', { ...session });
        return { session: { ...session }, superseded };
    }

    /**
     * Record activity. `lastSeenAt` never moves backwards.
     */
    touch(sessionId: string, now: number = Date.now()): boolean {
        const entry = this.entries.get(sessionId);
        if (!entry) return false;
        entry.session.lastSeenAt = Math.max(entry.session.lastSeenAt, now);
        return true;
    }

    /**
     * Apply a status telegram. A telegram written before a dispatched task
     * reached the endpoint does not clear that task.
     */
    updateStatus(sessionId: string, update: StatusUpdate): boolean {
        const entry = this.entries.get(sessionId);
        if (!entry) return false;

        const reported = update.taskId ?? '';
        entry.session.cpuLoad = update.cpuLoad;
        if (entry.dispatchedTaskId && reported !== entry.dispatchedTaskId) {
            entry.session.currentTaskId = entry.dispatchedTaskId;
            entry.session.state = 'Processing';
        } else {
            entry.dispatchedTaskId = '';
            entry.session.currentTaskId = reported;
            entry.session.state = update.state;
        }
        this.emit('updated', { ...entry.session });
        return true;
    }

    /**
     * Mark a task as dispatched (`taskId`) or cleared (`''`).
     */
    setCurrentTask(sessionId: string, taskId: string): boolean {
        const entry = this.entries.get(sessionId);
        if (!entry) return false;

        entry.dispatchedTaskId = taskId;
        entry.session.currentTaskId = taskId;
        entry.session.state = taskId ? 'Processing' : 'Available';
        this.emit('updated', { ...entry.session });
        return true;
    }

    completeTask(sessionId: string, taskId: string, result: string): boolean {
        const entry = this.entries.get(sessionId);
        if (!entry) return false;

        if (entry.dispatchedTaskId === taskId) entry.dispatchedTaskId = '';
        if (entry.session.currentTaskId === taskId) {
            entry.session.currentTaskId = '';
            entry.session.state = 'Available';
        }
        this.emit('taskCompleted', { ...entry.session }, taskId, result);
        return true;
    }

    unregister(sessionId: string, reason: RemovalReason = 'disconnected'): boolean {
        const entry = this.entries.get(sessionId);
        if (!entry) return false;

        this.entries.delete(sessionId);
        this.emit('removed', { ...entry.session }, reason);
        return true;
    }

    get(sessionId: string): Session | undefined {
        const entry = this.entries.get(sessionId);
        return entry ? { ...entry.session } : undefined;
    }

    getChannel(sessionId: string): FrameChannel | undefined {
        return this.entries.get(sessionId)?.channel;
    }

    /**
     * Look a session up by id, then by name.
     */
    find(nameOrId: string): Session | undefined {
        const byId = this.get(nameOrId);
        if (byId) return byId;

        for (const { session } of this.entries.values()) {
            if (session.name === nameOrId) return { ...session };
        }
        return undefined;
    }

    list(): Session[] {
        return Array.from(this.entries.values(), ({ session }) => ({ ...session }));
    }

    get count(): number {
        return this.entries.size;
    }

    /**
     * Close every connection. Removal happens through each channel's close handler.
     */
    closeAll(): void {
        for (const { channel } of Array.from(this.entries.values())) {
            channel.close();
        }
    }
}

export function isLive(session: Session, livenessWindowMs: number, now: number = Date.now()): boolean {
    return now - session.lastSeenAt <= livenessWindowMs;
}
