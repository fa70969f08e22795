/**
 * Utility exports
 */

export * from './request-scheduler/index.js';
