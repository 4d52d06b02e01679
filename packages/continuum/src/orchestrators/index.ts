/**
 * Orchestrators
 */

export * from './kernel-policy.js';
export * from './ring-orchestrator.js';
