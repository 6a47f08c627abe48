// =============================================================================
// FLEETLINK ENDPOINT
// =============================================================================
// Worker process. Finds a coordinator by beacon (or the saved address),
// registers, reports status, and runs dispatched tasks. Reconnects with
// exponential back-off when the connection drops.
// Exit codes: 0 shutdown, 42 restart requested, 1 fatal startup error.
// =============================================================================

import 'dotenv/config';

import { config, SettingsFile, validateEndpointSettings, type EndpointSettings } from '@fleetlink/config';
import {
    CpuLoadSampler,
    NvidiaDeviceProvider,
    ProcessLifecycle,
    composeDiagnostics,
    describeHardware,
    selectAccelerator,
} from '@fleetlink/host';
import { errorMessage, generateId, sleep } from '@fleetlink/protocol';
import { ConnectionManager, connectWithRetry } from './connection.js';
import { TimedTaskRunner } from './executor.js';
import { COLORS, log, logger } from './logger.js';
import { BeaconScanner } from './scanner.js';

// -----------------------------------------------------------------------------
// Coordinator Lookup
// -----------------------------------------------------------------------------

async function findCoordinator(settings: SettingsFile<EndpointSettings>): Promise<{ address: string; port: number }> {
    const saved = settings.current;
    if (saved.autoConnect) {
        log('info', 'Discovery', `Using saved coordinator ${saved.serverAddress}:${saved.serverPort}`);
        return { address: saved.serverAddress, port: saved.serverPort };
    }

    const found = await new BeaconScanner().scan({ port: saved.beaconPort, timeoutMs: config.timing.scanTimeout });
    const [first] = found;
    if (!first) {
        log('warn', 'Discovery', `No coordinator answered, falling back to ${saved.serverAddress}:${saved.serverPort}`);
        return { address: saved.serverAddress, port: saved.serverPort };
    }

    await settings.save({ ...saved, serverAddress: first.address, serverPort: first.port });
    return { address: first.address, port: first.port };
}

// -----------------------------------------------------------------------------
// Startup
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
    log('info', 'Endpoint', '🚀 FleetLink endpoint starting...');

    if (config.relaunchDelay > 0) {
        log('info', 'Endpoint', `Relaunched, waiting ${config.relaunchDelay}ms...`);
        await sleep(config.relaunchDelay);
    }

    const settings = new SettingsFile<EndpointSettings>(config.endpoint.configFile, {
        serverAddress: '127.0.0.1',
        serverPort: config.coordinator.serverPort,
        beaconPort: config.coordinator.beaconPort,
        endpointName: config.endpoint.name,
        autoConnect: false,
    }, validateEndpointSettings);
    const loaded = await settings.load();
    if (loaded.warning) log('warn', 'Settings', loaded.warning);

    const accelerator = await selectAccelerator({ providers: [new NvidiaDeviceProvider()], log: logger });
    const sampler = new CpuLoadSampler();
    sampler.start(config.timing.cpuSampleInterval);

    const lifecycle = new ProcessLifecycle({
        log: logger,
        delayMs: config.timing.adminDelay,
        exitCodes: config.exitCodes,
        relaunchDelayMs: config.timing.relaunchWait,
        release: () => {
            sampler.stop();
            accelerator.context?.dispose();
        },
    });

    const name = loaded.settings.endpointName;
    log('info', 'Endpoint', `📛 Name: ${COLORS.magenta}${name}${COLORS.reset}`);
    log('info', 'Endpoint', `💻 Accelerator: ${accelerator.deviceName}${accelerator.accelerated ? '' : ' (not accelerated)'}`);

    const manager = new ConnectionManager({
        endpointName: name,
        instanceId: generateId(),
        hardwareDescription: describeHardware(accelerator.accelerated ? accelerator.deviceName : null),
        acceleratorAvailable: accelerator.accelerated,
        publicPort: config.coordinator.serverPort,
        registrationPort: config.coordinator.endpointPort,
        registrationTimeoutMs: config.timing.registrationTimeout,
        statusIntervalMs: config.timing.statusInterval,
        taskRunner: new TimedTaskRunner(config.endpoint.taskDuration),
        loadSampler: sampler,
        runDiagnostics: () => composeDiagnostics({
            accelerator: accelerator.context,
            cpuIterations: config.diagnostics.cpuIterations,
            gpuElements: config.diagnostics.gpuElements,
            extraLines: [`Endpoint Name: ${name}`],
        }),
        lifecycle,
    });
    manager.on('message', (text) => log('debug', 'Endpoint', text));

    // -------------------------------------------------------------------------
    // Reconnect
    // -------------------------------------------------------------------------

    const stopping = new AbortController();
    let reconnecting = false;

    const reconnect = async (): Promise<void> => {
        if (reconnecting) return;
        reconnecting = true;
        try {
            await connectWithRetry(
                () => findCoordinator(settings),
                (address, port) => manager.connect(address, port),
                config.timing,
                stopping.signal,
            );
        } finally {
            reconnecting = false;
        }
    };

    manager.on('status', (connected) => {
        if (!connected && !stopping.signal.aborted && !lifecycle.action) {
            reconnect().catch((error: unknown) => log('error', 'Reconnect', errorMessage(error)));
        }
    });

    // -------------------------------------------------------------------------
    // Graceful Shutdown
    // -------------------------------------------------------------------------

    const shutdown = async () => {
        log('info', 'Endpoint', '🛑 Shutting down...');
        stopping.abort();
        await manager.disconnect();
        lifecycle.release();
        log('info', 'Endpoint', '👋 Goodbye!');
        process.exit(config.exitCodes.shutdown);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await reconnect();
}

// -----------------------------------------------------------------------------
// Start
// -----------------------------------------------------------------------------

main().catch((error: unknown) => {
    log('error', 'Endpoint', `Fatal error: ${errorMessage(error)}`);
    process.exit(config.exitCodes.fatal);
});
