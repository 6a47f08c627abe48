// =============================================================================
// FLEETLINK HOST - Diagnostics
// =============================================================================
// Fixed-work benchmarks and the multi-line report answered to DIAGNOSTICS.
// The CPU benchmark runs in a worker thread so request handlers stay responsive.
// =============================================================================

import os from 'os';
import { Worker } from 'worker_threads';
import { errorMessage } from '@fleetlink/protocol';
import type { ComputeContext } from './accelerator.js';

export interface CpuBenchmarkResult {
    pi: number;
    elapsedMs: number;
}

export interface VectorBenchmarkResult {
    elements: number;
    elapsedMs: number;
    verified: boolean;
}

// Leibniz series; workerData is the iteration count
const LEIBNIZ_WORKER = `
const { parentPort, workerData } = require('worker_threads');
let sum = 0;
for (let i = 0; i < workerData; i++) {
    sum += (i % 2 === 0 ? 1 : -1) / (2 * i + 1);
}
parentPort.postMessage(4 * sum);
`;

export function runCpuBenchmark(iterations: number): Promise<CpuBenchmarkResult> {
    const started = performance.now();
    return new Promise((resolve, reject) => {
        const worker = new Worker(LEIBNIZ_WORKER, { eval: true, workerData: iterations });
        worker.once('message', (value: unknown) => {
            if (typeof value !== 'number') {
                reject(new Error('CPU benchmark returned a non-numeric result'));
                return;
            }
            resolve({ pi: value, elapsedMs: Math.round(performance.now() - started) });
        });
        worker.once('error', reject);
        worker.once('exit', (code: number) => {
            if (code !== 0) reject(new Error(`CPU benchmark worker exited with code ${code}`));
        });
    });
}

export async function runVectorBenchmark(context: ComputeContext, elements: number): Promise<VectorBenchmarkResult> {
    const a = new Float32Array(elements);
    const b = new Float32Array(elements);
    for (let i = 0; i < elements; i++) {
        a[i] = i;
        b[i] = 2 * i;
    }

    const started = performance.now();
    const result = await context.vectorAdd(a, b);
    const elapsedMs = Math.round(performance.now() - started);

    let verified = result.length === elements;
    for (let i = 0; verified && i < elements; i++) {
        verified = result[i] === a[i] + b[i];
    }
    return { elements, elapsedMs, verified };
}

export interface DiagnosticsOptions {
    accelerator: ComputeContext | null;
    cpuIterations: number;
    gpuElements: number;
    /** Host-specific lines placed after the processor count, e.g. the active session count. */
    extraLines?: string[];
}

export async function composeDiagnostics(options: DiagnosticsOptions): Promise<string> {
    const lines = [
        '=== Diagnostic Test Results ===',
        `Hostname: ${os.hostname()}`,
        `OS: ${os.type()} ${os.release()} (${os.arch()})`,
        `Processor Count: ${os.cpus().length}`,
        ...(options.extraLines ?? []),
        `Memory Usage: ${Math.round(process.memoryUsage().rss / (1024 * 1024))} MB`,
    ];

    try {
        const cpu = await runCpuBenchmark(options.cpuIterations);
        lines.push(`CPU Test: Calculated Pi = ${cpu.pi.toFixed(10)}, Time: ${cpu.elapsedMs} ms`);
    } catch (error) {
        lines.push(`CPU Test Failed: ${errorMessage(error)}`);
    }

    const { accelerator } = options;
    if (!accelerator) {
        lines.push('No GPU Accelerator Available');
        return lines.join('\n');
    }

    lines.push(`Accelerator: ${accelerator.name}`);
    try {
        const gpu = await runVectorBenchmark(accelerator, options.gpuElements);
        lines.push(`GPU Test Result: Vector add of ${gpu.elements} elements, Time: ${gpu.elapsedMs} ms, Verified: ${gpu.verified}`);
    } catch (error) {
        lines.push(`GPU Test Failed: ${errorMessage(error)}`);
    }
    return lines.join('\n');
}
