// =============================================================================
// FLEETLINK PROTOCOL - Wire Codec
// =============================================================================
// Field:value JSON records. Commands and status telegrams carry a `Command`
// discriminator; replies carry `Status` instead. Unknown fields are ignored,
// missing required fields make a frame malformed.
// =============================================================================

import type {
    AdminCommand,
    CoordinatorFrame,
    EndpointFrame,
    RegistrationRequest,
    RegistrationResult,
    ReplyMessage,
    ReplyStatus,
} from './messages.js';
import type { CoordinatorAdvertisement } from './types.js';
import {
    assertNever,
    isPortNumber,
    isRecord,
    readBoolean,
    readNumber,
    readString,
} from './utils.js';

export type DecodeFailure = {
    ok: false;
    reason: 'malformed' | 'unknown';
    detail: string;
    command?: string;
};

export type Decoded<T> = { ok: true; message: T } | DecodeFailure;

/** Wire value for "no current task". */
export const NO_TASK = 'None';

function malformed(detail: string): DecodeFailure {
    return { ok: false, reason: 'malformed', detail };
}

function unknownCommand(command: string): DecodeFailure {
    return { ok: false, reason: 'unknown', detail: `Unknown command: ${command}`, command };
}

function parseRecord(raw: string): { ok: true; record: Record<string, unknown> } | DecodeFailure {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return malformed('not valid JSON');
    }
    return isRecord(parsed) ? { ok: true, record: parsed } : malformed('not a JSON object');
}

function serialize(record: Record<string, unknown>): string {
    return JSON.stringify(record);
}

// -----------------------------------------------------------------------------
// Replies
// -----------------------------------------------------------------------------

export function createReply(status: ReplyStatus, message: string, fields: Record<string, unknown> = {}): ReplyMessage {
    return { type: 'REPLY', status, message, fields };
}

function decodeReply(record: Record<string, unknown>): Decoded<ReplyMessage> {
    const status = readString(record, 'Status');
    if (status !== 'OK' && status !== 'Error') {
        return malformed('missing Command or Status field');
    }
    const fields: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
        if (key !== 'Status' && key !== 'Message') fields[key] = value;
    }
    return { ok: true, message: createReply(status, readString(record, 'Message') ?? '', fields) };
}

function encodeReply(reply: ReplyMessage): string {
    return serialize({ ...reply.fields, Status: reply.status, Message: reply.message });
}

// -----------------------------------------------------------------------------
// Registration
// -----------------------------------------------------------------------------

export function encodeRegistration(request: RegistrationRequest): string {
    return serialize({
        Command: 'REGISTER',
        Name: request.endpointName,
        HardwareInfo: request.hardwareDescription,
        GpuEnabled: request.acceleratorAvailable,
        InstanceId: request.instanceId,
    });
}

/**
 * Decode the first frame of an endpoint connection.
 * A missing name or hardware description decodes as '' and is filled in by the coordinator.
 */
export function decodeRegistration(raw: string): Decoded<RegistrationRequest> {
    const parsed = parseRecord(raw);
    if (!parsed.ok) return parsed;
    const { record } = parsed;

    if (readString(record, 'Command') !== 'REGISTER') {
        return malformed('Invalid registration message. Expected REGISTER command.');
    }
    if (record.Name !== undefined && typeof record.Name !== 'string') {
        return malformed('Name must be a string');
    }
    if (record.HardwareInfo !== undefined && typeof record.HardwareInfo !== 'string') {
        return malformed('HardwareInfo must be a string');
    }
    if (record.GpuEnabled !== undefined && typeof record.GpuEnabled !== 'boolean') {
        return malformed('GpuEnabled must be a boolean');
    }
    if (record.InstanceId !== undefined && typeof record.InstanceId !== 'string') {
        return malformed('InstanceId must be a string');
    }

    const instanceId = readString(record, 'InstanceId');
    return {
        ok: true,
        message: {
            type: 'REGISTER',
            endpointName: readString(record, 'Name') ?? '',
            hardwareDescription: readString(record, 'HardwareInfo') ?? '',
            acceleratorAvailable: readBoolean(record, 'GpuEnabled') ?? false,
            ...(instanceId ? { instanceId } : {}),
        },
    };
}

export function encodeRegistrationResult(result: RegistrationResult): string {
    const record: Record<string, unknown> = {
        Status: result.status === 'OK' ? 'OK' : 'Error',
        Message: result.detail,
    };
    if (result.endpointId) record.EndpointId = result.endpointId;
    return serialize(record);
}

export function decodeRegistrationResult(raw: string): Decoded<RegistrationResult> {
    const parsed = parseRecord(raw);
    if (!parsed.ok) return parsed;
    const { record } = parsed;

    const status = readString(record, 'Status');
    if (status !== 'OK' && status !== 'Error') {
        return malformed('registration reply has no Status');
    }
    return {
        ok: true,
        message: {
            status: status === 'OK' ? 'OK' : 'FAILED',
            detail: readString(record, 'Message') ?? '',
            endpointId: readString(record, 'EndpointId'),
        },
    };
}

// -----------------------------------------------------------------------------
// Coordinator → Endpoint
// -----------------------------------------------------------------------------

export function encodeCoordinatorFrame(frame: CoordinatorFrame): string {
    switch (frame.type) {
        case 'PING':
        case 'PONG':
        case 'STOP_TASK':
        case 'RESTART':
        case 'SHUTDOWN':
        case 'DIAGNOSTICS':
            return serialize({ Command: frame.type });
        case 'EXECUTE_TASK':
            return serialize({ Command: frame.type, TaskId: frame.taskId });
        case 'REPLY':
            return encodeReply(frame);
        default:
            return assertNever(frame, 'coordinator frame');
    }
}

export function decodeCoordinatorFrame(raw: string): Decoded<CoordinatorFrame> {
    const parsed = parseRecord(raw);
    if (!parsed.ok) return parsed;
    const { record } = parsed;

    const command = readString(record, 'Command');
    if (command === undefined) return decodeReply(record);

    switch (command) {
        case 'PING':
        case 'PONG':
        case 'STOP_TASK':
        case 'RESTART':
        case 'SHUTDOWN':
        case 'DIAGNOSTICS':
            return { ok: true, message: { type: command } };
        case 'EXECUTE_TASK': {
            const taskId = readString(record, 'TaskId');
            if (!taskId) return malformed('EXECUTE_TASK requires TaskId');
            return { ok: true, message: { type: 'EXECUTE_TASK', taskId } };
        }
        default:
            return unknownCommand(command);
    }
}

// -----------------------------------------------------------------------------
// Endpoint → Coordinator
// -----------------------------------------------------------------------------

export function encodeEndpointFrame(frame: EndpointFrame): string {
    switch (frame.type) {
        case 'PING':
        case 'PONG':
        case 'DISCONNECT':
            return serialize({ Command: frame.type });
        case 'STATUS_UPDATE':
            return serialize({
                Command: frame.type,
                CpuLoad: frame.cpuLoad,
                Status: frame.state,
                CurrentTask: frame.taskId ?? NO_TASK,
            });
        case 'TASK_COMPLETED':
            return serialize({ Command: frame.type, TaskId: frame.taskId, Result: frame.result });
        case 'REPLY':
            return encodeReply(frame);
        default:
            return assertNever(frame, 'endpoint frame');
    }
}

export function decodeEndpointFrame(raw: string): Decoded<EndpointFrame> {
    const parsed = parseRecord(raw);
    if (!parsed.ok) return parsed;
    const { record } = parsed;

    const command = readString(record, 'Command');
    if (command === undefined) return decodeReply(record);

    switch (command) {
        case 'PING':
        case 'PONG':
        case 'DISCONNECT':
            return { ok: true, message: { type: command } };
        case 'STATUS_UPDATE': {
            const cpuLoad = readNumber(record, 'CpuLoad');
            const state = readString(record, 'Status');
            if (cpuLoad === undefined) return malformed('STATUS_UPDATE requires numeric CpuLoad');
            if (state !== 'Available' && state !== 'Processing') {
                return malformed('STATUS_UPDATE requires Status Available or Processing');
            }
            const current = readString(record, 'CurrentTask');
            const taskId = current === undefined || current === '' || current === NO_TASK ? null : current;
            return { ok: true, message: { type: 'STATUS_UPDATE', cpuLoad, state, taskId } };
        }
        case 'TASK_COMPLETED': {
            const taskId = readString(record, 'TaskId');
            if (!taskId) return malformed('Missing task ID');
            return {
                ok: true,
                message: { type: 'TASK_COMPLETED', taskId, result: readString(record, 'Result') ?? '' },
            };
        }
        default:
            return unknownCommand(command);
    }
}

// -----------------------------------------------------------------------------
// Admin commands
// -----------------------------------------------------------------------------

export function encodeAdminCommand(command: AdminCommand): string {
    switch (command.type) {
        case 'PING':
        case 'DIAGNOSTICS':
        case 'RESTART':
        case 'SHUTDOWN':
        case 'LIST_ENDPOINTS':
        case 'GET_ENDPOINTS':
        case 'GET_SETTINGS':
            return serialize({ Command: command.type });
        case 'SET_SETTINGS':
            return serialize({
                Command: command.type,
                ServerPort: command.settings.serverPort,
                BeaconPort: command.settings.beaconPort,
                EndpointPort: command.settings.endpointPort,
            });
        case 'ENDPOINT_DIAGNOSTICS':
        case 'PING_ENDPOINT':
        case 'RESTART_ENDPOINT':
        case 'SHUTDOWN_ENDPOINT':
        case 'STOP_TASK':
            return serialize({ Command: command.type, EndpointName: command.endpoint });
        case 'EXECUTE_TASK':
            return serialize({ Command: command.type, EndpointName: command.endpoint, TaskId: command.taskId });
        default:
            return assertNever(command, 'admin command');
    }
}

export function decodeAdminCommand(raw: string): Decoded<AdminCommand> {
    const parsed = parseRecord(raw);
    if (!parsed.ok) return parsed;
    const { record } = parsed;

    const command = readString(record, 'Command');
    if (command === undefined) return malformed('Invalid command format');

    switch (command) {
        case 'PING':
        case 'DIAGNOSTICS':
        case 'RESTART':
        case 'SHUTDOWN':
        case 'LIST_ENDPOINTS':
        case 'GET_ENDPOINTS':
        case 'GET_SETTINGS':
            return { ok: true, message: { type: command } };
        case 'SET_SETTINGS': {
            const serverPort = readNumber(record, 'ServerPort');
            const beaconPort = readNumber(record, 'BeaconPort');
            const endpointPort = readNumber(record, 'EndpointPort');
            if (serverPort === undefined || beaconPort === undefined || endpointPort === undefined) {
                return malformed('SET_SETTINGS requires ServerPort, BeaconPort and EndpointPort');
            }
            return { ok: true, message: { type: command, settings: { serverPort, beaconPort, endpointPort } } };
        }
        case 'ENDPOINT_DIAGNOSTICS':
        case 'PING_ENDPOINT':
        case 'RESTART_ENDPOINT':
        case 'SHUTDOWN_ENDPOINT':
        case 'STOP_TASK': {
            const endpoint = readString(record, 'EndpointName');
            if (!endpoint) return malformed('Endpoint name not specified');
            return { ok: true, message: { type: command, endpoint } };
        }
        case 'EXECUTE_TASK': {
            const endpoint = readString(record, 'EndpointName');
            const taskId = readString(record, 'TaskId');
            if (!endpoint) return malformed('Endpoint name not specified');
            if (!taskId) return malformed('EXECUTE_TASK requires TaskId');
            return { ok: true, message: { type: command, endpoint, taskId } };
        }
        default:
            return unknownCommand(command);
    }
}

// -----------------------------------------------------------------------------
// Discovery beacon
// -----------------------------------------------------------------------------

export function encodeAdvertisement(ad: CoordinatorAdvertisement): string {
    return serialize({
        ServerName: ad.name,
        ServerIP: ad.address,
        ServerPort: ad.port,
        ClientsConnected: ad.clientCount,
        EndpointsConnected: ad.sessionCount,
        GpuEnabled: ad.accelerated,
        Timestamp: ad.timestamp.toISOString(),
    });
}

export function decodeAdvertisement(raw: string): Decoded<CoordinatorAdvertisement> {
    const parsed = parseRecord(raw);
    if (!parsed.ok) return parsed;
    const { record } = parsed;

    const address = readString(record, 'ServerIP');
    const port = readNumber(record, 'ServerPort');
    if (!address) return malformed('beacon requires ServerIP');
    if (!isPortNumber(port)) return malformed('beacon requires a valid ServerPort');

    const stamp = readString(record, 'Timestamp');
    const timestamp = stamp === undefined ? new Date() : new Date(stamp);
    if (Number.isNaN(timestamp.getTime())) return malformed('beacon Timestamp is not a date');

    return {
        ok: true,
        message: {
            name: readString(record, 'ServerName') ?? address,
            address,
            port,
            sessionCount: readNumber(record, 'EndpointsConnected') ?? 0,
            clientCount: readNumber(record, 'ClientsConnected') ?? 0,
            accelerated: readBoolean(record, 'GpuEnabled') ?? false,
            timestamp,
        },
    };
}
