/**
 * Type definitions barrel export
 * Re-exports all type definitions from domain-specific modules
 */

// Datasets, snapshots and listing entries
export * from './snapshot.js';

// Backend capability and health types
export * from './backend.js';

// Restore job types
export * from './job.js';

// Configuration types
export * from './config.js';
