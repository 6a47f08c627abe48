// =============================================================================
// FLEETLINK COORDINATOR - Beacon Publisher
// =============================================================================
// Broadcasts the coordinator's advertisement on the discovery port until the
// abort signal fires. A failed send is logged and retried after a short pause.
// =============================================================================

import {
    encodeAdvertisement,
    errorMessage,
    sleep,
    type CoordinatorAdvertisement,
    type DatagramSocket,
} from '@fleetlink/protocol';
import { logger } from './logger.js';

const TAG = 'Beacon';

export interface BeaconOptions {
    port: number;
    address: string;
    intervalMs: number;
    errorBackoffMs: number;
    advertise: () => CoordinatorAdvertisement;
}

export class BeaconPublisher {
    private opened = false;
    private sent = 0;

    constructor(
        private readonly socket: DatagramSocket,
        private readonly options: BeaconOptions,
    ) {}

    get beaconsSent(): number {
        return this.sent;
    }

    /**
     * Bind an ephemeral port and enable broadcast. Failure here is a startup fault.
     */
    async open(): Promise<void> {
        this.socket.onError((error: Error) => logger.warn(TAG, `Beacon socket error: ${error.message}`));
        await this.socket.bind(0);
        this.socket.setBroadcast(true);
        this.opened = true;
    }

    async run(signal: AbortSignal): Promise<void> {
        if (!this.opened) await this.open();
        logger.info(TAG, `📡 Broadcasting to ${this.options.address}:${this.options.port} every ${this.options.intervalMs}ms`);

        while (!signal.aborted) {
            try {
                await this.socket.send(encodeAdvertisement(this.options.advertise()), this.options.port, this.options.address);
                this.sent++;
                await sleep(this.options.intervalMs, signal);
            } catch (error) {
                logger.warn(TAG, `Beacon send failed: ${errorMessage(error)}`);
                await sleep(this.options.errorBackoffMs, signal);
            }
        }

        this.close();
        logger.info(TAG, 'Beacon stopped');
    }

    close(): void {
        this.socket.close();
    }
}
