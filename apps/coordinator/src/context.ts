import type { AcceleratorSelection } from '@fleetlink/host';
import { Monitor } from './monitor.js';
import { SessionRegistry } from './sessions.js';

/**
 * Process-wide state handed to every coordinator component.
 * The accelerator is shared read-only and disposed exactly once.
 */
export class AppContext {
    readonly sessions = new SessionRegistry();
    readonly monitor: Monitor;
    private disposed = false;

    constructor(readonly accelerator: AcceleratorSelection, livenessWindowMs: number) {
        this.monitor = new Monitor(this.sessions, livenessWindowMs);
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        this.accelerator.context?.dispose();
    }
}
