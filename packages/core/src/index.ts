// Types
export * from './types/index.js';

// Validated values
export * from './values/index.js';

// Query
export * from './query/index.js';

// Store
export * from './store/index.js';

/** Version of the record layout exposed to adapters */
export const SCHEMA_VERSION = 1;
