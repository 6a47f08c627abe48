// =============================================================================
// FLEETLINK COORDINATOR - Admin Commands
// =============================================================================
// Commands from the operator console on the public port. Every command is
// answered with a REPLY; a failing command becomes an Error reply, never a throw.
// =============================================================================

import type { PortSettings, SettingsFile } from '@fleetlink/config';
import {
    assertNever,
    createReply,
    errorMessage,
    type AdminCommand,
    type ReplyMessage,
    type Session,
} from '@fleetlink/protocol';
import type { CommandDispatcher } from './dispatcher.js';
import { logger } from './logger.js';
import type { SessionRegistry } from './sessions.js';

export interface AdminDeps {
    sessions: SessionRegistry;
    dispatcher: Pick<CommandDispatcher, 'ping' | 'diagnostics' | 'restart' | 'shutdown' | 'executeTask' | 'stopTask'>;
    settings: SettingsFile<PortSettings>;
    lifecycle: { scheduleRestart(): boolean; scheduleShutdown(): boolean };
    runDiagnostics: () => Promise<string>;
}

/**
 * Wire shape of a session in LIST_ENDPOINTS replies.
 */
export function describeSession(session: Session): Record<string, unknown> {
    return {
        Id: session.id,
        Name: session.name,
        EndpointIP: session.remoteAddress,
        EndpointPort: session.remotePort,
        HardwareInfo: session.hardwareDescription,
        GpuEnabled: session.acceleratorAvailable,
        ConnectedAt: new Date(session.connectedAt).toISOString(),
        LastSeen: new Date(session.lastSeenAt).toISOString(),
        Status: session.state,
        CpuLoadPercent: session.cpuLoad,
        CurrentTask: session.currentTaskId || 'None',
    };
}

function findEndpoint(deps: AdminDeps, endpoint: string): Session {
    const session = deps.sessions.find(endpoint);
    if (!session) throw new Error(`Endpoint '${endpoint}' not found`);
    return session;
}

async function execute(deps: AdminDeps, command: AdminCommand): Promise<ReplyMessage> {
    switch (command.type) {
        case 'PING':
            return createReply('OK', 'Pong');

        case 'DIAGNOSTICS':
            return createReply('OK', 'Diagnostics completed', { DiagnosticsResult: await deps.runDiagnostics() });

        case 'RESTART':
            return deps.lifecycle.scheduleRestart()
                ? createReply('OK', 'Server restart initiated')
                : createReply('Error', 'A restart or shutdown is already pending');

        case 'SHUTDOWN':
            return deps.lifecycle.scheduleShutdown()
                ? createReply('OK', 'Server shutdown initiated')
                : createReply('Error', 'A restart or shutdown is already pending');

        case 'LIST_ENDPOINTS': {
            const endpoints = deps.sessions.list();
            return createReply('OK', `${endpoints.length} endpoint(s) connected`, {
                Endpoints: endpoints.map(describeSession),
            });
        }

        case 'GET_ENDPOINTS':
            return createReply('OK', `${deps.sessions.count} endpoint(s) connected`, {
                EndpointCount: deps.sessions.count,
            });

        case 'GET_SETTINGS': {
            const { serverPort, beaconPort, endpointPort } = deps.settings.current;
            return createReply('OK', 'Current settings', {
                ServerPort: serverPort,
                BeaconPort: beaconPort,
                EndpointPort: endpointPort,
            });
        }

        case 'SET_SETTINGS': {
            const saved = await deps.settings.replace(command.settings);
            logger.info('Admin', `Port settings saved: ${saved.serverPort}/${saved.beaconPort}/${saved.endpointPort}`);
            return createReply('OK', 'Settings saved. Restart the server to apply them.');
        }

        case 'ENDPOINT_DIAGNOSTICS': {
            const session = findEndpoint(deps, command.endpoint);
            const result = await deps.dispatcher.diagnostics(session.id);
            return createReply('OK', 'Diagnostics completed', { EndpointName: session.name, DiagnosticsResult: result });
        }

        case 'PING_ENDPOINT': {
            const session = findEndpoint(deps, command.endpoint);
            const rtt = await deps.dispatcher.ping(session.id);
            return createReply('OK', `Pong from ${session.name} in ${rtt}ms`, {
                EndpointName: session.name,
                RoundTripMs: rtt,
            });
        }

        case 'RESTART_ENDPOINT': {
            const session = findEndpoint(deps, command.endpoint);
            return deps.dispatcher.restart(session.id);
        }

        case 'SHUTDOWN_ENDPOINT': {
            const session = findEndpoint(deps, command.endpoint);
            return deps.dispatcher.shutdown(session.id);
        }

        case 'EXECUTE_TASK': {
            const session = findEndpoint(deps, command.endpoint);
            await deps.dispatcher.executeTask(session.id, command.taskId);
            return createReply('OK', `Task ${command.taskId} dispatched to ${session.name}`);
        }

        case 'STOP_TASK': {
            const session = findEndpoint(deps, command.endpoint);
            await deps.dispatcher.stopTask(session.id);
            return createReply('OK', `Stop requested for ${session.name}`);
        }

        default:
            return assertNever(command, 'admin command');
    }
}

export async function handleAdminCommand(deps: AdminDeps, command: AdminCommand): Promise<ReplyMessage> {
    try {
        return await execute(deps, command);
    } catch (error) {
        const message = errorMessage(error);
        logger.warn('Admin', `${command.type} failed: ${message}`);
        return createReply('Error', message);
    }
}
