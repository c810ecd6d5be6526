/**
 * QKD Telemetry - Kernel
 *
 * Discrete-event timeline, optical components, channels, nodes and the
 * BB84 / Cascade protocol models the harness drives.
 */

export * from './random';
export * from './timeline';
export * from './components';
export * from './channels';
export * from './node';
export * from './bb84';
export * from './cascade';
