/**
 * repairgate - shared type definitions
 */

// Repair engine data model
export * from './types/repair';

// Error classes
export * from './errors';
