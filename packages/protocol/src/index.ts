// =============================================================================
// FLEETLINK PROTOCOL
// =============================================================================
// Shared types, messages, codec and transports for coordinator/endpoint traffic.
// =============================================================================

// Messages
export * from './messages.js';

// Types
export * from './types.js';

// Wire codec
export * from './codec.js';

// Transports
export * from './channel.js';
export * from './datagram.js';

// Errors
export * from './errors.js';

// Utilities
export * from './utils.js';
