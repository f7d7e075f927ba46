/**
 * @giftaid/core
 *
 * Shared types, errors and value utilities for Gift Aid schedule building
 */

// Constants
export * from './constants.js';

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
