// Types
export * from './types/errors.js';
export * from './types/messages.js';

// Utilities
export * from './utils/logger.js';
