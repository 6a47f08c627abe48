// =============================================================================
// FLEETLINK HOST - Accelerator Selection
// =============================================================================
// Picks one compute backend per process: the first hardware device that yields
// a usable context, otherwise the CPU. The chosen context runs a small
// vector-add self-test before it is handed out.
// =============================================================================

import { exec } from 'child_process';
import { promisify } from 'util';
import os from 'os';
import { errorMessage } from '@fleetlink/protocol';
import type { LogSink } from './log.js';

const execAsync = promisify(exec);

const TAG = 'Accelerator';

export const SELF_TEST_SIZE = 1000;

export type DeviceKind = 'gpu' | 'cpu';

export interface DeviceInfo {
    id: string;
    name: string;
    kind: DeviceKind;
    provider: string;
}

/**
 * A live handle on one compute device. Created once per process, disposed once.
 */
export interface ComputeContext {
    readonly name: string;
    readonly kind: DeviceKind;
    vectorAdd(a: Float32Array, b: Float32Array): Promise<Float32Array>;
    dispose(): void;
}

export interface DeviceProvider {
    readonly name: string;
    listDevices(): Promise<DeviceInfo[]>;
    createContext(device: DeviceInfo): Promise<ComputeContext>;
}

export class AcceleratorError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AcceleratorError';
    }
}

// =============================================================================
// CPU Backend
// =============================================================================

export class CpuContext implements ComputeContext {
    readonly kind = 'cpu';
    private disposed = false;

    constructor(readonly name = 'CPU') {}

    async vectorAdd(a: Float32Array, b: Float32Array): Promise<Float32Array> {
        if (this.disposed) throw new AcceleratorError(`${this.name} context has been disposed`);
        if (a.length !== b.length) {
            throw new AcceleratorError(`Vector length mismatch: ${a.length} vs ${b.length}`);
        }
        const out = new Float32Array(a.length);
        for (let i = 0; i < a.length; i++) {
            out[i] = a[i] + b[i];
        }
        return out;
    }

    dispose(): void {
        this.disposed = true;
    }
}

export class CpuDeviceProvider implements DeviceProvider {
    readonly name = 'CPU';

    async listDevices(): Promise<DeviceInfo[]> {
        return [{ id: 'cpu-0', name: `CPU (${os.cpus().length} cores)`, kind: 'cpu', provider: this.name }];
    }

    async createContext(device: DeviceInfo): Promise<ComputeContext> {
        return new CpuContext(device.name);
    }
}

// =============================================================================
// NVIDIA Backend
// =============================================================================

/** Builds a context for a device. Supplied by whatever native binding the deployment ships. */
export type DeviceBinder = (device: DeviceInfo) => Promise<ComputeContext>;

export type CommandRunner = (command: string) => Promise<string>;

async function runCommand(command: string): Promise<string> {
    const { stdout } = await execAsync(command, { timeout: 5000 });
    return stdout;
}

export function parseNvidiaDevices(stdout: string): DeviceInfo[] {
    const devices: DeviceInfo[] = [];
    for (const line of stdout.split('\n')) {
        const [index, ...rest] = line.split(',');
        const name = rest.join(',').trim();
        if (!index || !name) continue;
        devices.push({ id: `nvidia-${index.trim()}`, name, kind: 'gpu', provider: 'NVIDIA' });
    }
    return devices;
}

export class NvidiaDeviceProvider implements DeviceProvider {
    readonly name = 'NVIDIA';

    constructor(private readonly options: { bind?: DeviceBinder; run?: CommandRunner } = {}) {}

    async listDevices(): Promise<DeviceInfo[]> {
        const run = this.options.run ?? runCommand;
        try {
            return parseNvidiaDevices(await run('nvidia-smi --query-gpu=index,name --format=csv,noheader'));
        } catch {
            // No driver or no tool on PATH: no devices
            return [];
        }
    }

    async createContext(device: DeviceInfo): Promise<ComputeContext> {
        if (!this.options.bind) {
            throw new AcceleratorError(`No compute binding available for ${device.name}`);
        }
        return this.options.bind(device);
    }
}

// =============================================================================
// Selection
// =============================================================================

export interface AcceleratorSelection {
    context: ComputeContext | null;
    accelerated: boolean;
    deviceName: string;
    selfTestPassed: boolean;
    error?: string;
}

export interface SelectOptions {
    providers: DeviceProvider[];
    cpu?: DeviceProvider;
    log: LogSink;
}

/**
 * Vector-add of `a[i] = i`, `b[i] = 2i`; every output must equal `3i`.
 */
export async function runSelfTest(context: ComputeContext, log: LogSink, size = SELF_TEST_SIZE): Promise<boolean> {
    const a = new Float32Array(size);
    const b = new Float32Array(size);
    for (let i = 0; i < size; i++) {
        a[i] = i;
        b[i] = 2 * i;
    }

    try {
        const result = await context.vectorAdd(a, b);
        for (let i = 0; i < size; i++) {
            if (result[i] !== 3 * i) {
                log.warn(TAG, `Self-test failed on ${context.name}: element ${i} is ${result[i]}, expected ${3 * i}`);
                return false;
            }
        }
        log.info(TAG, `Self-test passed on ${context.name}`);
        return true;
    } catch (error) {
        log.warn(TAG, `Self-test failed on ${context.name}: ${errorMessage(error)}`);
        return false;
    }
}

async function finish(context: ComputeContext, accelerated: boolean, log: LogSink): Promise<AcceleratorSelection> {
    const selfTestPassed = await runSelfTest(context, log);
    return {
        context,
        accelerated: accelerated && selfTestPassed,
        deviceName: context.name,
        selfTestPassed,
    };
}

export async function selectAccelerator(options: SelectOptions): Promise<AcceleratorSelection> {
    const { log } = options;

    for (const provider of options.providers) {
        let devices: DeviceInfo[];
        try {
            devices = await provider.listDevices();
        } catch (error) {
            log.warn(TAG, `${provider.name}: device enumeration failed: ${errorMessage(error)}`);
            continue;
        }

        for (const device of devices) {
            if (device.kind === 'cpu') continue;
            try {
                const context = await provider.createContext(device);
                log.info(TAG, `Using ${device.name} (${provider.name})`);
                return await finish(context, true, log);
            } catch (error) {
                log.warn(TAG, `${device.name}: context creation failed: ${errorMessage(error)}`);
            }
        }
    }

    const cpu = options.cpu ?? new CpuDeviceProvider();
    try {
        const [device] = await cpu.listDevices();
        if (!device) throw new AcceleratorError('CPU provider reported no devices');
        const context = await cpu.createContext(device);
        log.info(TAG, `No accelerator available, using ${context.name}`);
        return await finish(context, false, log);
    } catch (error) {
        const message = errorMessage(error);
        log.error(TAG, `Could not create a CPU context: ${message}`);
        return { context: null, accelerated: false, deviceName: 'None', selfTestPassed: false, error: message };
    }
}
