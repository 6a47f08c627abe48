// =============================================================================
// FLEETLINK COORDINATOR
// =============================================================================
// Accepts endpoint registrations, broadcasts discovery beacons, dispatches
// commands and serves the operator console.
// Exit codes: 0 shutdown, 42 restart requested, 1 fatal startup error.
// =============================================================================

import 'dotenv/config';

import { config, SettingsFile, validatePortSettings } from '@fleetlink/config';
import { NvidiaDeviceProvider, ProcessLifecycle, primaryIPv4, selectAccelerator } from '@fleetlink/host';
import { errorMessage, sleep } from '@fleetlink/protocol';
import { AppContext } from './context.js';
import { Coordinator } from './coordinator.js';
import { logger } from './logger.js';

const TAG = 'Coordinator';

async function main(): Promise<void> {
    if (config.relaunchDelay > 0) {
        logger.info(TAG, `Relaunched, waiting ${config.relaunchDelay}ms for ports to be released...`);
        await sleep(config.relaunchDelay);
    }

    // Persisted port settings override the environment defaults
    const settings = new SettingsFile(config.coordinator.settingsFile, {
        serverPort: config.coordinator.serverPort,
        beaconPort: config.coordinator.beaconPort,
        endpointPort: config.coordinator.endpointPort,
    }, validatePortSettings);
    const loaded = await settings.load();
    if (loaded.warning) logger.warn('Settings', loaded.warning);

    const accelerator = await selectAccelerator({ providers: [new NvidiaDeviceProvider()], log: logger });
    const context = new AppContext(accelerator, config.timing.livenessWindow);
    context.monitor.collect(logger);

    const lifecycle = new ProcessLifecycle({
        log: logger,
        delayMs: config.timing.adminDelay,
        exitCodes: config.exitCodes,
        relaunchDelayMs: config.timing.relaunchWait,
        release: () => context.dispose(),
    });

    const coordinator = new Coordinator(context, {
        name: config.coordinator.name,
        host: config.coordinator.host,
        advertisedAddress: primaryIPv4(),
        ports: loaded.settings,
        beaconAddress: config.coordinator.beaconAddress,
        timing: config.timing,
        diagnostics: config.diagnostics,
        settings,
        lifecycle,
    });

    try {
        await coordinator.start();
    } catch (error) {
        logger.error(TAG, errorMessage(error));
        lifecycle.release();
        process.exit(config.exitCodes.fatal);
    }

    // Graceful shutdown
    const shutdown = async () => {
        logger.info(TAG, '🛑 Shutting down...');
        await coordinator.stop();
        lifecycle.release();
        process.exit(config.exitCodes.shutdown);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
}

main().catch((error: unknown) => {
    logger.error(TAG, `Fatal: ${errorMessage(error)}`);
    process.exit(config.exitCodes.fatal);
});
