// =============================================================================
// FLEETLINK HOST - CPU Load
// =============================================================================

import os from 'os';

export interface CpuTimes {
    idle: number;
    total: number;
}

export function readCpuTimes(): CpuTimes {
    let idle = 0;
    let total = 0;

    for (const cpu of os.cpus()) {
        const { user, nice, sys, irq } = cpu.times;
        total += user + nice + sys + irq + cpu.times.idle;
        idle += cpu.times.idle;
    }

    return { idle, total };
}

/**
 * Machine-wide CPU load as a percentage, from the idle/total delta between two
 * samples. The timer is unref'd so it never keeps a process alive.
 */
export class CpuLoadSampler {
    private previous: CpuTimes;
    private load = 0;
    private timer: NodeJS.Timeout | null = null;

    constructor(private readonly read: () => CpuTimes = readCpuTimes) {
        this.previous = read();
    }

    start(intervalMs: number): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.sample(), intervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    sample(): number {
        const current = this.read();
        const totalDelta = current.total - this.previous.total;
        const idleDelta = current.idle - this.previous.idle;
        this.previous = current;

        // Identical samples carry no information; keep the last reading
        if (totalDelta > 0) {
            this.load = Math.round((1 - idleDelta / totalDelta) * 1000) / 10;
        }
        return this.load;
    }

    get current(): number {
        return this.load;
    }
}
