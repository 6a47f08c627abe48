import os from 'os';

/**
 * One-line summary sent as HardwareInfo during registration.
 */
export function describeHardware(acceleratorName: string | null): string {
    const ramGB = Math.round(os.totalmem() / (1024 * 1024 * 1024));
    return `OS: ${os.type()} ${os.release()}. CPU: ${os.cpus().length} cores. RAM: ${ramGB} GB. GPU: ${acceleratorName ?? 'None'}`;
}

/**
 * First external IPv4 address, used as the advertised coordinator address.
 */
export function primaryIPv4(): string {
    for (const addresses of Object.values(os.networkInterfaces())) {
        for (const address of addresses ?? []) {
            if (address.family === 'IPv4' && !address.internal) return address.address;
        }
    }
    return '127.0.0.1';
}
