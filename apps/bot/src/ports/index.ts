/**
 * Ports barrel export
 */

export * from './DataGateway.js';
