export * from './types/index.js';
export * from './constants/index.js';
export * from './schemas/filter-selection.schema.js';
export * from './utils/date.js';
export * from './utils/validation.js';
