// Zod schemas and the types inferred from them
export * from './schemas/index.js';

// Error taxonomy
export * from './errors.js';

// Persistence contract
export * from './store/index.js';

// Pure utils (date, money, months, constants)
export * from './utils/index.js';
