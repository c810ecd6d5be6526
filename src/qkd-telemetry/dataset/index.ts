/**
 * QKD Telemetry - Dataset Pipeline
 */

export * from './csv';
export * from './schema';
export * from './features';
export * from './consolidator';
