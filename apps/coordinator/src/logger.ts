import { config } from '@fleetlink/config';
import type { LogSink } from '@fleetlink/host';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogListener = (level: LogLevel, tag: string, message: string) => void;

const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    cyan: '\x1b[36m',
    magenta: '\x1b[35m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: COLORS.dim,
    info: COLORS.green,
    warn: COLORS.yellow,
    error: COLORS.red,
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LEVEL_PRIORITY, value);
}

class Logger implements LogSink {
    private minLevel: number;
    private listeners: LogListener[] = [];

    constructor() {
        const level = config.logging.level;
        this.minLevel = isLogLevel(level) ? LEVEL_PRIORITY[level] : LEVEL_PRIORITY.info;
    }

    /**
     * Receive every entry, below the console threshold too (the monitor keeps its own buffer).
     */
    subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    private format(level: LogLevel, tag: string, message: string): string {
        const timestamp = config.logging.timestamps
            ? `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `
            : '';
        const levelStr = `${LEVEL_COLORS[level]}[${level.toUpperCase()}]${COLORS.reset}`;
        const tagStr = `${COLORS.cyan}[${tag}]${COLORS.reset}`;
        return `${timestamp}${levelStr} ${tagStr} ${message}`;
    }

    private log(level: LogLevel, tag: string, message: string): void {
        if (LEVEL_PRIORITY[level] >= this.minLevel) {
            console.log(this.format(level, tag, message));
        }
        for (const listener of this.listeners) listener(level, tag, message);
    }

    debug(tag: string, message: string): void {
        this.log('debug', tag, message);
    }

    info(tag: string, message: string): void {
        this.log('info', tag, message);
    }

    warn(tag: string, message: string): void {
        this.log('warn', tag, message);
    }

    error(tag: string, message: string): void {
        this.log('error', tag, message);
    }

    // Convenience methods for common events
    connection(name: string, address: string, action: 'registered' | 'disconnected' | 'superseded'): void {
        const emoji = action === 'registered' ? '✅' : action === 'superseded' ? '🔁' : '❌';
        this.info('Connection', `${emoji} Endpoint ${COLORS.magenta}${name}${COLORS.reset} (${address}) ${action}`);
    }

    status(name: string, cpuLoad: number, state: string): void {
        this.debug('Status', `💓 Endpoint ${COLORS.magenta}${name}${COLORS.reset} ${state} (CPU: ${cpuLoad}%)`);
    }
}

export const logger = new Logger();
