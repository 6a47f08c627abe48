// =============================================================================
// FLEETLINK COORDINATOR - Endpoint Monitor
// =============================================================================
// Tracks endpoint liveness, connection history, task counters and recent logs
// for the operator console.
// =============================================================================

import type { Session } from '@fleetlink/protocol';
import type { LogListener, LogLevel } from './logger.js';
import { isLive, type SessionRegistry } from './sessions.js';

// =============================================================================
// Types
// =============================================================================

export interface EndpointStatus {
    id: string;
    name: string;
    remoteAddress: string;
    remotePort: number;
    acceleratorAvailable: boolean;
    state: Session['state'];
    live: boolean;
    connectedAt: number;
    lastSeenAt: number;
    lastSeenAgeMs: number;
    cpuLoad: number;
    currentTaskId: string;
    tasksCompleted: number;
}

export interface LogEntry {
    timestamp: number;
    level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
    source: string;
    message: string;
}

export interface ConnectionEvent {
    sessionId: string;
    name: string;
    remoteAddress: string;
    event: 'CONNECTED' | 'DISCONNECTED';
    timestamp: number;
}

export interface LogFeed {
    subscribe(listener: LogListener): () => void;
}

const MAX_LOGS = 500;
const MAX_HISTORY = 500;

const LEVEL_NAMES: Record<LogLevel, LogEntry['level']> = {
    debug: 'DEBUG',
    info: 'INFO',
    warn: 'WARN',
    error: 'ERROR',
};

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

// =============================================================================
// Monitor
// =============================================================================

export class Monitor {
    private logBuffer: LogEntry[] = [];
    private connectionHistory: ConnectionEvent[] = [];
    private completedTasks = new Map<string, number>();

    constructor(
        private readonly sessions: SessionRegistry,
        private readonly livenessWindowMs: number,
    ) {
        sessions.on('registered', session => this.recordConnection(session));
        sessions.on('removed', session => this.recordDisconnection(session));
        sessions.on('taskCompleted', session => {
            this.completedTasks.set(session.id, (this.completedTasks.get(session.id) ?? 0) + 1);
        });
    }

    // -------------------------------------------------------------------------
    // Log Collection
    // -------------------------------------------------------------------------

    addLog(level: LogEntry['level'], source: string, message: string): void {
        this.logBuffer.push({ timestamp: Date.now(), level, source, message });

        // Trim buffer if needed
        if (this.logBuffer.length > MAX_LOGS) {
            this.logBuffer.shift();
        }
    }

    /**
     * Mirror a logger into the buffer, colour codes stripped. Returns the unsubscribe.
     */
    collect(feed: LogFeed): () => void {
        return feed.subscribe((level, tag, message) => {
            this.addLog(LEVEL_NAMES[level], tag, message.replace(ANSI_ESCAPE, ''));
        });
    }

    getLogs(options?: { level?: LogEntry['level']; source?: string; limit?: number }): LogEntry[] {
        let logs = [...this.logBuffer];

        if (options?.level) {
            logs = logs.filter(l => l.level === options.level);
        }
        if (options?.source) {
            const src = options.source;
            logs = logs.filter(l => l.source.includes(src));
        }

        const limit = options?.limit ?? 100;
        return logs.slice(-limit).reverse();
    }

    // -------------------------------------------------------------------------
    // Connection Tracking
    // -------------------------------------------------------------------------

    // The log lines for these come from the endpoint server through `collect`
    private recordConnection(session: Session): void {
        this.pushHistory(session, 'CONNECTED');
    }

    private recordDisconnection(session: Session): void {
        this.pushHistory(session, 'DISCONNECTED');
        this.completedTasks.delete(session.id);
    }

    private pushHistory(session: Session, event: ConnectionEvent['event']): void {
        this.connectionHistory.push({
            sessionId: session.id,
            name: session.name,
            remoteAddress: session.remoteAddress,
            event,
            timestamp: Date.now(),
        });
        if (this.connectionHistory.length > MAX_HISTORY) {
            this.connectionHistory.shift();
        }
    }

    getConnectionHistory(limit: number = 50): ConnectionEvent[] {
        return this.connectionHistory.slice(-limit).reverse();
    }

    // -------------------------------------------------------------------------
    // Status Queries
    // -------------------------------------------------------------------------

    getEndpointsStatus(now: number = Date.now()): EndpointStatus[] {
        return this.sessions.list().map(session => ({
            id: session.id,
            name: session.name,
            remoteAddress: session.remoteAddress,
            remotePort: session.remotePort,
            acceleratorAvailable: session.acceleratorAvailable,
            state: session.state,
            live: isLive(session, this.livenessWindowMs, now),
            connectedAt: session.connectedAt,
            lastSeenAt: session.lastSeenAt,
            lastSeenAgeMs: Math.max(0, now - session.lastSeenAt),
            cpuLoad: session.cpuLoad,
            currentTaskId: session.currentTaskId,
            tasksCompleted: this.completedTasks.get(session.id) ?? 0,
        }));
    }

    getSummary(now: number = Date.now()) {
        const endpoints = this.getEndpointsStatus(now);

        return {
            timestamp: now,
            endpoints: {
                total: endpoints.length,
                live: endpoints.filter(e => e.live).length,
                processing: endpoints.filter(e => e.state === 'Processing').length,
                accelerated: endpoints.filter(e => e.acceleratorAvailable).length,
            },
            tasksCompleted: endpoints.reduce((sum, e) => sum + e.tasksCompleted, 0),
            recentLogs: this.getLogs({ limit: 10 }),
        };
    }
}
