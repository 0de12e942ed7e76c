// Types
export * from './types/config.js';

// Errors
export * from './errors.js';

// Utils
export * from './utils/logger.js';
export * from './utils/validation.js';

// Constants
export * from './constants.js';
