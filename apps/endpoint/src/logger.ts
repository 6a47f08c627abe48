// =============================================================================
// FLEETLINK ENDPOINT - Logger
// =============================================================================

import { config } from '@fleetlink/config';
import type { LogSink } from '@fleetlink/host';

export const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    red: '\x1b[31m',
    cyan: '\x1b[36m',
    magenta: '\x1b[35m',
    blue: '\x1b[34m',
};

type Level = 'debug' | 'info' | 'warn' | 'error';

const PRIORITY: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLevel(value: string): value is Level {
    return Object.hasOwn(PRIORITY, value);
}

const configured: string = config.logging.level;
const threshold = isLevel(configured) ? PRIORITY[configured] : PRIORITY.info;

export function log(level: Level, tag: string, message: string): void {
    if (PRIORITY[level] < threshold) return;
    const colors = { debug: COLORS.dim, info: COLORS.green, warn: COLORS.yellow, error: COLORS.red };
    const timestamp = config.logging.timestamps ? `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} ` : '';
    const levelStr = `${colors[level]}[${level.toUpperCase()}]${COLORS.reset}`;
    const tagStr = `${COLORS.cyan}[${tag}]${COLORS.reset}`;
    console.log(`${timestamp}${levelStr} ${tagStr} ${message}`);
}

/**
 * `log` behind the LogSink interface the shared packages take.
 */
export const logger: LogSink = {
    debug: (tag, message) => log('debug', tag, message),
    info: (tag, message) => log('info', tag, message),
    warn: (tag, message) => log('warn', tag, message),
    error: (tag, message) => log('error', tag, message),
};
