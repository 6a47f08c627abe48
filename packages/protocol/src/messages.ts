// =============================================================================
// FLEETLINK PROTOCOL - Message Types
// =============================================================================
// Messages exchanged between the Coordinator and its Endpoints, plus the admin
// commands the console sends to the coordinator's public port.
// On the wire every message is one JSON text frame (see codec.ts).
// =============================================================================

// -----------------------------------------------------------------------------
// Registration
// -----------------------------------------------------------------------------

/**
 * Endpoint → Coordinator: first frame on a new connection.
 */
export interface RegistrationRequest {
    type: 'REGISTER';
    endpointName: string;
    hardwareDescription: string;
    acceleratorAvailable: boolean;
    /** Fixed for the life of one endpoint process; tells apart processes sharing a name and host. */
    instanceId?: string;
}

/**
 * Coordinator → Endpoint: answer to REGISTER. Terminal for the handshake.
 */
export interface RegistrationResult {
    status: 'OK' | 'FAILED';
    detail: string;
    endpointId?: string;
}

// -----------------------------------------------------------------------------
// Replies
// -----------------------------------------------------------------------------

export type ReplyStatus = 'OK' | 'Error';

/**
 * Bidirectional acknowledgement / error / result frame.
 * Carries a `Status` discriminator instead of `Command`.
 */
export interface ReplyMessage {
    type: 'REPLY';
    status: ReplyStatus;
    message: string;
    fields: Record<string, unknown>;     // Extra wire fields (DiagnosticsResult, Endpoints, ...)
}

// -----------------------------------------------------------------------------
// Coordinator → Endpoint
// -----------------------------------------------------------------------------

export type ControlMessage =
    | { type: 'PING' }
    | { type: 'EXECUTE_TASK'; taskId: string }
    | { type: 'STOP_TASK' }
    | { type: 'RESTART' }
    | { type: 'SHUTDOWN' }
    | { type: 'DIAGNOSTICS' };

export type ControlType = ControlMessage['type'];

// -----------------------------------------------------------------------------
// Endpoint → Coordinator
// -----------------------------------------------------------------------------

export type EndpointState = 'Available' | 'Processing';

export type StatusMessage =
    | { type: 'PONG' }
    | {
        type: 'STATUS_UPDATE';
        cpuLoad: number;              // 0-100 percentage
        state: EndpointState;
        taskId: string | null;        // null when idle ("None" on the wire)
    }
    | { type: 'TASK_COMPLETED'; taskId: string; result: string };

/**
 * Endpoint → Coordinator: explicit teardown notice. Best effort, never retried.
 */
export interface DisconnectNotice {
    type: 'DISCONNECT';
}

// -----------------------------------------------------------------------------
// Per-direction unions (what each side can read from a registered stream)
// -----------------------------------------------------------------------------

/** Frames a coordinator reads from an endpoint. Either side may PING, so PING is allowed too. */
export type EndpointFrame = StatusMessage | { type: 'PING' } | DisconnectNotice | ReplyMessage;

/** Frames an endpoint reads from its coordinator. */
export type CoordinatorFrame = ControlMessage | { type: 'PONG' } | ReplyMessage;

// -----------------------------------------------------------------------------
// Admin commands (console → coordinator public port)
// -----------------------------------------------------------------------------

export interface PortSettingsPayload {
    serverPort: number;
    beaconPort: number;
    endpointPort: number;
}

export type AdminCommand =
    | { type: 'PING' }
    | { type: 'DIAGNOSTICS' }
    | { type: 'RESTART' }
    | { type: 'SHUTDOWN' }
    | { type: 'LIST_ENDPOINTS' }
    | { type: 'GET_ENDPOINTS' }
    | { type: 'GET_SETTINGS' }
    | { type: 'SET_SETTINGS'; settings: PortSettingsPayload }
    | { type: 'ENDPOINT_DIAGNOSTICS'; endpoint: string }
    | { type: 'PING_ENDPOINT'; endpoint: string }
    | { type: 'RESTART_ENDPOINT'; endpoint: string }
    | { type: 'SHUTDOWN_ENDPOINT'; endpoint: string }
    | { type: 'EXECUTE_TASK'; endpoint: string; taskId: string }
    | { type: 'STOP_TASK'; endpoint: string };

export type AdminCommandType = AdminCommand['type'];
