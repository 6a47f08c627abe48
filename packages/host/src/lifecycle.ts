// =============================================================================
// FLEETLINK HOST - Process Lifecycle
// =============================================================================
// RESTART and SHUTDOWN are acknowledged first and carried out after a short
// delay. Either way the accelerator is released exactly once before exit.
// A restart relaunches the same command line detached and exits with the
// "please relaunch" code so a wrapper script can tell the two apart.
// =============================================================================

import { spawn } from 'child_process';
import { errorMessage } from '@fleetlink/protocol';
import type { LogSink } from './log.js';

const TAG = 'Lifecycle';

export type ExitFn = (code: number) => void;
export type RelaunchFn = (command: string, args: string[], env: NodeJS.ProcessEnv) => void;

export type LifecycleAction = 'restart' | 'shutdown';

export interface LifecycleOptions {
    log: LogSink;
    delayMs: number;
    exitCodes: { restart: number; shutdown: number };
    /** How long the relaunched process waits before binding its ports. */
    relaunchDelayMs: number;
    release: () => void;
    exit?: ExitFn;
    relaunch?: RelaunchFn;
}

function spawnDetached(command: string, args: string[], env: NodeJS.ProcessEnv): void {
    const child = spawn(command, args, { detached: true, stdio: 'ignore', env });
    child.unref();
}

export class ProcessLifecycle {
    private pending: NodeJS.Timeout | null = null;
    private scheduled: LifecycleAction | null = null;
    private released = false;

    constructor(private readonly options: LifecycleOptions) {}

    get action(): LifecycleAction | null {
        return this.scheduled;
    }

    scheduleRestart(): boolean {
        return this.schedule('restart');
    }

    scheduleShutdown(): boolean {
        return this.schedule('shutdown');
    }

    /**
     * Release held resources. Safe to call more than once.
     */
    release(): void {
        if (this.released) return;
        this.released = true;
        try {
            this.options.release();
        } catch (error) {
            this.options.log.error(TAG, `Release failed: ${errorMessage(error)}`);
        }
    }

    cancel(): void {
        if (this.pending) {
            clearTimeout(this.pending);
            this.pending = null;
            this.scheduled = null;
        }
    }

    private schedule(action: LifecycleAction): boolean {
        if (this.scheduled) {
            this.options.log.warn(TAG, `Ignoring ${action}: ${this.scheduled} already scheduled`);
            return false;
        }
        this.scheduled = action;
        this.options.log.info(TAG, `${action} in ${this.options.delayMs}ms`);
        this.pending = setTimeout(() => this.finish(action), this.options.delayMs);
        return true;
    }

    private finish(action: LifecycleAction): void {
        this.pending = null;
        this.release();

        const exit = this.options.exit ?? ((code: number) => process.exit(code));
        if (action === 'shutdown') {
            exit(this.options.exitCodes.shutdown);
            return;
        }

        const relaunch = this.options.relaunch ?? spawnDetached;
        try {
            relaunch(process.execPath, [...process.execArgv, ...process.argv.slice(1)], {
                ...process.env,
                RELAUNCH_DELAY_MS: String(this.options.relaunchDelayMs),
            });
        } catch (error) {
            this.options.log.error(TAG, `Relaunch failed: ${errorMessage(error)}`);
        }
        exit(this.options.exitCodes.restart);
    }
}
