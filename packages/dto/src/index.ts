/**
 * DTO package public surface.
 * Re-exports stable enums, reason codes, record shapes and wire types. Only items exported here are published.
 */
export * from './enums';
export * from './reasons';
export * from './records';
export * from './permit';
export * from './api';
export * from './admin';
