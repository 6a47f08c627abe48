// =============================================================================
// FLEETLINK HOST
// =============================================================================
// Machine-facing pieces shared by the coordinator and endpoint processes.
// =============================================================================

export * from './log.js';
export * from './accelerator.js';
export * from './diagnostics.js';
export * from './hardware.js';
export * from './load.js';
export * from './lifecycle.js';
