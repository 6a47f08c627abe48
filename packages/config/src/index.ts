// =============================================================================
// FLEETLINK CONFIG - Shared Configuration
// =============================================================================

import os from 'os';

export * from './settings.js';

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = parseInt(raw, 10);
    return Number.isFinite(value) ? value : fallback;
}

export const config = {
    // Coordinator network (defaults; persisted port settings override them at startup)
    coordinator: {
        name: process.env.COORDINATOR_NAME ?? os.hostname(),
        host: process.env.COORDINATOR_HOST ?? '0.0.0.0',
        serverPort: intFromEnv('SERVER_PORT', 7000),        // Public / console traffic
        beaconPort: intFromEnv('BEACON_PORT', 7001),        // Discovery datagrams
        endpointPort: intFromEnv('ENDPOINT_PORT', 7002),    // Endpoint registration
        beaconAddress: process.env.BEACON_ADDRESS ?? '255.255.255.255',
        settingsFile: process.env.SETTINGS_FILE ?? 'coordinator_config.json',
    },

    // Endpoint defaults
    endpoint: {
        name: process.env.ENDPOINT_NAME ?? os.hostname(),
        configFile: process.env.ENDPOINT_CONFIG_FILE ?? 'endpoint_config.json',
        taskDuration: intFromEnv('TASK_DURATION_MS', 5000),   // Work time of the built-in task runner (ms)
    },

    // Timing
    timing: {
        beaconInterval: 5000,          // How often the coordinator broadcasts (ms)
        beaconErrorBackoff: 1000,      // Pause after a failed beacon send (ms)
        statusInterval: 5000,          // How often endpoints send STATUS_UPDATE (ms)
        scanTimeout: 3000,             // Default discovery window (ms)
        livenessWindow: 1000,          // lastSeenAt age before an indicator goes dark (ms)
        registrationTimeout: 10000,    // Max time to receive REGISTER / its reply (ms)
        requestTimeout: 15000,         // Max wait for an endpoint's REPLY (ms)
        adminDelay: 500,               // Delay before RESTART/SHUTDOWN take effect (ms)
        relaunchWait: 2000,            // How long a relaunched process waits before binding (ms)
        cpuSampleInterval: 2000,       // CPU load sampling period (ms)
        reconnectBaseDelay: 1000,      // Initial reconnect delay (ms)
        reconnectMaxDelay: 30000,      // Maximum reconnect delay (ms)
        reconnectMultiplier: 2,        // Exponential backoff multiplier
    },

    // Process exit codes understood by wrapper scripts
    exitCodes: {
        shutdown: 0,
        fatal: 1,
        restart: 42,
    },

    // Diagnostics benchmarks (fixed work, not wall-clock bounded)
    diagnostics: {
        cpuIterations: intFromEnv('DIAG_CPU_ITERATIONS', 100_000_000),
        gpuElements: intFromEnv('DIAG_GPU_ELEMENTS', 1_000_000),
    },

    // Set by the relaunch helper so a restarted process waits for its parent to release the ports
    relaunchDelay: intFromEnv('RELAUNCH_DELAY_MS', 0),

    // Logging
    logging: {
        level: process.env.LOG_LEVEL ?? 'info',
        timestamps: true,
    },
} as const;

export type Config = typeof config;
