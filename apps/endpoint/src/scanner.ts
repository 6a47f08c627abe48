// =============================================================================
// FLEETLINK ENDPOINT - Beacon Scanner
// =============================================================================
// Listens on the discovery port for coordinator advertisements. Several
// scanners on one host can share the port (address reuse).
// =============================================================================

import { EventEmitter } from 'events';
import {
    advertisementKey,
    createUdpSocket,
    decodeAdvertisement,
    sleep,
    type CoordinatorAdvertisement,
    type DatagramSender,
    type DatagramSocketFactory,
} from '@fleetlink/protocol';
import { logger } from './logger.js';

const TAG = 'Discovery';

export interface ScanOptions {
    port: number;
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface BeaconScanner {
    on(event: 'discovered', listener: (advertisement: CoordinatorAdvertisement) => void): this;
    emit(event: 'discovered', advertisement: CoordinatorAdvertisement): boolean;
}

export class BeaconScanner extends EventEmitter {
    constructor(private readonly createSocket: DatagramSocketFactory = createUdpSocket) {
        super();
    }

    /**
     * Collect advertisements for `timeoutMs` or until `signal` aborts.
     * One entry per coordinator `address:port`, in order of first sighting.
     */
    async scan(options: ScanOptions): Promise<CoordinatorAdvertisement[]> {
        const found = new Map<string, CoordinatorAdvertisement>();
        const socket = this.createSocket();

        socket.onMessage((payload: string, sender: DatagramSender) => {
            const decoded = decodeAdvertisement(payload);
            if (!decoded.ok) {
                logger.warn(TAG, `⚠️ Ignoring datagram from ${sender.address}:${sender.port}: ${decoded.detail}`);
                return;
            }

            const key = advertisementKey(decoded.message);
            if (found.has(key)) return;
            found.set(key, decoded.message);
            logger.info(TAG, `📡 Found ${decoded.message.name} at ${key} (${decoded.message.sessionCount} endpoints)`);
            this.emit('discovered', decoded.message);
        });

        socket.onError((error: Error) => logger.warn(TAG, `Discovery socket error: ${error.message}`));

        try {
            await socket.bind(options.port);
            logger.info(TAG, `🔍 Scanning port ${options.port} for ${options.timeoutMs / 1000}s...`);
            await sleep(options.timeoutMs, options.signal);
        } finally {
            socket.close();
        }

        return Array.from(found.values());
    }
}
