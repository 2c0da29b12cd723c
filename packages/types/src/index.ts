// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Error kinds
export * from './errors.js';

// Pure utils (date, money, constants, logging)
export * from './utils/index.js';
