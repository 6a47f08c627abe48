// =============================================================================
// FLEETLINK CONFIG - Persisted Settings
// =============================================================================
// Small JSON files that survive restarts: the coordinator's three ports and the
// endpoint's last server / name. Edits take effect on the next start.
// =============================================================================

import { readFile, writeFile } from 'fs/promises';

export interface PortSettings {
    serverPort: number;
    beaconPort: number;
    endpointPort: number;
}

export interface EndpointSettings {
    serverAddress: string;
    serverPort: number;
    beaconPort: number;
    endpointName: string;
    autoConnect: boolean;
}

/**
 * Returns the validated value, or a message describing the first problem.
 */
export type SettingsValidator<T> = (value: unknown) => { ok: true; value: T } | { ok: false; error: string };

export interface LoadedSettings<T> {
    settings: T;
    source: 'file' | 'defaults';
    warning?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPort(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= 65535;
}

export const validatePortSettings: SettingsValidator<PortSettings> = (value) => {
    if (!isRecord(value)) return { ok: false, error: 'settings must be an object' };
    const { serverPort, beaconPort, endpointPort } = value;
    if (!isPort(serverPort)) return { ok: false, error: 'serverPort must be an integer between 1 and 65535' };
    if (!isPort(beaconPort)) return { ok: false, error: 'beaconPort must be an integer between 1 and 65535' };
    if (!isPort(endpointPort)) return { ok: false, error: 'endpointPort must be an integer between 1 and 65535' };
    if (new Set([serverPort, beaconPort, endpointPort]).size !== 3) {
        return { ok: false, error: 'serverPort, beaconPort and endpointPort must be distinct' };
    }
    return { ok: true, value: { serverPort, beaconPort, endpointPort } };
};

export const validateEndpointSettings: SettingsValidator<EndpointSettings> = (value) => {
    if (!isRecord(value)) return { ok: false, error: 'settings must be an object' };
    const { serverAddress, serverPort, beaconPort, endpointName, autoConnect } = value;
    if (typeof serverAddress !== 'string' || serverAddress === '') {
        return { ok: false, error: 'serverAddress must be a non-empty string' };
    }
    if (!isPort(serverPort)) return { ok: false, error: 'serverPort must be an integer between 1 and 65535' };
    if (!isPort(beaconPort)) return { ok: false, error: 'beaconPort must be an integer between 1 and 65535' };
    if (typeof endpointName !== 'string' || endpointName === '') {
        return { ok: false, error: 'endpointName must be a non-empty string' };
    }
    if (typeof autoConnect !== 'boolean') return { ok: false, error: 'autoConnect must be a boolean' };
    return { ok: true, value: { serverAddress, serverPort, beaconPort, endpointName, autoConnect } };
};

/**
 * JSON settings file with defaults and validation.
 */
export class SettingsFile<T> {
    private value: T;

    constructor(
        readonly path: string,
        private readonly defaults: T,
        private readonly validate: SettingsValidator<T>,
    ) {
        this.value = defaults;
    }

    /**
     * Last loaded or saved settings.
     */
    get current(): T {
        return this.value;
    }

    /**
     * Load the file. A missing or invalid file yields the defaults, which are
     * written back so the next start finds a valid file.
     */
    async load(): Promise<LoadedSettings<T>> {
        let raw: string;
        try {
            raw = await readFile(this.path, 'utf8');
        } catch (error) {
            const err = error as NodeJS.ErrnoException;
            const warning = err.code === 'ENOENT'
                ? undefined
                : `Could not read ${this.path}: ${err.message}`;
            await this.save(this.defaults);
            return { settings: this.defaults, source: 'defaults', warning };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            await this.save(this.defaults);
            return {
                settings: this.defaults,
                source: 'defaults',
                warning: `Invalid JSON in ${this.path}: ${(error as Error).message}`,
            };
        }

        const result = this.validate(parsed);
        if (!result.ok) {
            await this.save(this.defaults);
            return { settings: this.defaults, source: 'defaults', warning: `Invalid settings in ${this.path}: ${result.error}` };
        }
        this.value = result.value;
        return { settings: result.value, source: 'file' };
    }

    /**
     * Validate and persist a replacement. Throws on invalid input.
     */
    async replace(value: unknown): Promise<T> {
        const result = this.validate(value);
        if (!result.ok) throw new Error(result.error);
        await this.save(result.value);
        return result.value;
    }

    async save(settings: T): Promise<void> {
        this.value = settings;
        await writeFile(this.path, `${JSON.stringify(settings, null, 2)}\n`, 'utf8');
    }
}
