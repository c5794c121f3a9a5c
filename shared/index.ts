// ============================================================================
// SHARED MODULE EXPORTS
// ============================================================================

// Export all types
export * from './types/index';

// Export error handling utilities using neverthrow
export * from './utils/errorHandler';

// Export trading date utility functions
export * from './utils/dateUtils';

// Export JSON type guards
export * from './utils/json';
