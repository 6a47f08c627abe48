// =============================================================================
// FLEETLINK PROTOCOL - Datagram Socket
// =============================================================================
// Connectionless channel used by the beacon publisher and scanner.
// =============================================================================

import dgram from 'dgram';

export interface DatagramSender {
    address: string;
    port: number;
}

export type DatagramHandler = (payload: string, sender: DatagramSender) => void;

export type DatagramErrorHandler = (error: Error) => void;

/**
 * Minimal UDP surface the discovery code needs. Tests substitute an in-memory bus.
 */
export interface DatagramSocket {
    bind(port: number): Promise<void>;
    setBroadcast(enabled: boolean): void;
    send(payload: string, port: number, address: string): Promise<void>;
    onMessage(handler: DatagramHandler): void;
    /** Socket errors outside a pending `bind` or `send`. */
    onError(handler: DatagramErrorHandler): void;
    close(): void;
}

export type DatagramSocketFactory = () => DatagramSocket;

/**
 * IPv4 UDP socket with address reuse, so several scanners can share the discovery port.
 */
export class UdpSocket implements DatagramSocket {
    private closed = false;
    private errorHandlers: DatagramErrorHandler[] = [];

    constructor(private readonly socket: dgram.Socket = dgram.createSocket({ type: 'udp4', reuseAddr: true })) {
        this.socket.on('close', () => {
            this.closed = true;
        });
        // Permanent listener: an 'error' event with none attached would be thrown
        this.socket.on('error', (err: Error) => {
            for (const handler of this.errorHandlers) handler(err);
        });
    }

    bind(port: number): Promise<void> {
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            this.socket.once('error', onError);
            this.socket.bind(port, () => {
                this.socket.off('error', onError);
                resolve();
            });
        });
    }

    setBroadcast(enabled: boolean): void {
        this.socket.setBroadcast(enabled);
    }

    send(payload: string, port: number, address: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this.socket.send(Buffer.from(payload, 'utf8'), port, address, (err: Error | null) => (err ? reject(err) : resolve()));
        });
    }

    onMessage(handler: DatagramHandler): void {
        this.socket.on('message', (msg: Buffer, rinfo: dgram.RemoteInfo) => {
            handler(msg.toString('utf8'), { address: rinfo.address, port: rinfo.port });
        });
    }

    onError(handler: DatagramErrorHandler): void {
        this.errorHandlers.push(handler);
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.socket.close();
    }
}

export const createUdpSocket: DatagramSocketFactory = () => new UdpSocket();
