// =============================================================================
// FLEETLINK PROTOCOL - Common Types
// =============================================================================

import type { EndpointState } from './messages.js';

/**
 * Coordinator identity broadcast on the discovery port.
 * Rebuilt on every beacon tick, never persisted. Identity key is `address:port`.
 */
export interface CoordinatorAdvertisement {
    name: string;
    address: string;
    port: number;
    sessionCount: number;            // Registered endpoints
    clientCount: number;             // Console clients on the public port
    accelerated: boolean;
    timestamp: Date;
}

/**
 * Coordinator-side record of one registered endpoint connection.
 */
export interface Session {
    id: string;
    name: string;
    hardwareDescription: string;
    acceleratorAvailable: boolean;
    remoteAddress: string;
    remotePort: number;
    instanceId: string;              // '' when the endpoint sent none
    connectedAt: number;
    lastSeenAt: number;              // Only ever moves forward
    state: EndpointState;
    cpuLoad: number;
    currentTaskId: string;           // '' when idle
}

/**
 * Console client connected to the public port.
 */
export interface ClientInfo {
    id: string;
    remoteAddress: string;
    remotePort: number;
    connectedAt: number;
    status: 'Active';
}

/**
 * Advertisement dedup key.
 */
export function advertisementKey(ad: Pick<CoordinatorAdvertisement, 'address' | 'port'>): string {
    return `${ad.address}:${ad.port}`;
}
