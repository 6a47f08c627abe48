// =============================================================================
// FLEETLINK COORDINATOR - Coordinator
// =============================================================================
// Wires the registration server, the public server, the dispatcher and the
// beacon around one AppContext.
// =============================================================================

import type { PortSettings, SettingsFile } from '@fleetlink/config';
import { composeDiagnostics } from '@fleetlink/host';
import {
    createUdpSocket,
    errorMessage,
    type CoordinatorAdvertisement,
    type DatagramSocketFactory,
} from '@fleetlink/protocol';
import { BeaconPublisher } from './beacon.js';
import { ClientServer } from './client-server.js';
import type { AppContext } from './context.js';
import { CommandDispatcher } from './dispatcher.js';
import { EndpointServer } from './endpoint-server.js';
import { logger } from './logger.js';
import type { SessionRegistry } from './sessions.js';

const TAG = 'Coordinator';

/**
 * A port could not be bound. The entry point reports it and exits with the fatal code.
 */
export class StartupError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'StartupError';
    }
}

export interface CoordinatorOptions {
    name: string;
    host: string;
    advertisedAddress: string;
    ports: PortSettings;
    beaconAddress: string;
    timing: {
        beaconInterval: number;
        beaconErrorBackoff: number;
        registrationTimeout: number;
        requestTimeout: number;
    };
    diagnostics: {
        cpuIterations: number;
        gpuElements: number;
    };
    settings: SettingsFile<PortSettings>;
    lifecycle: { scheduleRestart(): boolean; scheduleShutdown(): boolean };
    createSocket?: DatagramSocketFactory;
}

export class Coordinator {
    readonly endpointServer: EndpointServer;
    readonly clientServer: ClientServer;
    readonly dispatcher: CommandDispatcher;
    private readonly beacon: BeaconPublisher;
    private abort = new AbortController();
    private beaconRun: Promise<void> | null = null;

    constructor(
        readonly context: AppContext,
        private readonly options: CoordinatorOptions,
    ) {
        this.endpointServer = new EndpointServer(context.sessions, {
            host: options.host,
            port: options.ports.endpointPort,
            registrationTimeoutMs: options.timing.registrationTimeout,
            requestTimeoutMs: options.timing.requestTimeout,
        });
        this.dispatcher = new CommandDispatcher(context.sessions, this.endpointServer);
        this.clientServer = new ClientServer({
            sessions: context.sessions,
            dispatcher: this.dispatcher,
            settings: options.settings,
            lifecycle: options.lifecycle,
            runDiagnostics: () => this.runDiagnostics(),
        }, {
            host: options.host,
            port: options.ports.serverPort,
        });

        const socket = (options.createSocket ?? createUdpSocket)();
        this.beacon = new BeaconPublisher(socket, {
            port: options.ports.beaconPort,
            address: options.beaconAddress,
            intervalMs: options.timing.beaconInterval,
            errorBackoffMs: options.timing.beaconErrorBackoff,
            advertise: () => this.advertisement(),
        });
    }

    get sessions(): SessionRegistry {
        return this.context.sessions;
    }

    // -------------------------------------------------------------------------
    // Lifecycle
    // -------------------------------------------------------------------------

    async start(): Promise<void> {
        try {
            await this.endpointServer.start();
            await this.clientServer.start();
            await this.beacon.open();
        } catch (error) {
            await this.stop();
            throw new StartupError(`Coordinator failed to start: ${errorMessage(error)}`, error);
        }

        this.beaconRun = this.beacon.run(this.abort.signal);
        logger.info(TAG, `🚀 ${this.options.name} ready (accelerator: ${this.context.accelerator.deviceName})`);
    }

    async stop(): Promise<void> {
        this.abort.abort();
        await Promise.all([this.endpointServer.stop(), this.clientServer.stop()]);
        if (this.beaconRun) {
            await this.beaconRun;
            this.beaconRun = null;
        } else {
            this.beacon.close();
        }
    }

    // -------------------------------------------------------------------------
    // State for the console and the beacon
    // -------------------------------------------------------------------------

    advertisement(): CoordinatorAdvertisement {
        return {
            name: this.options.name,
            address: this.options.advertisedAddress,
            port: this.clientServer.port || this.options.ports.serverPort,
            sessionCount: this.context.sessions.count,
            clientCount: this.clientServer.count,
            accelerated: this.context.accelerator.accelerated,
            timestamp: new Date(),
        };
    }

    runDiagnostics(): Promise<string> {
        return composeDiagnostics({
            accelerator: this.context.accelerator.context,
            cpuIterations: this.options.diagnostics.cpuIterations,
            gpuElements: this.options.diagnostics.gpuElements,
            extraLines: [`Active Endpoints: ${this.context.sessions.count}`],
        });
    }
}
