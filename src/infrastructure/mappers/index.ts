export * from './paginationSchemas.js';
export * from './intentSchemas.js';
export * from './entitySchemas.js';
export * from './dialogNodeSchemas.js';
export * from './messageSchemas.js';
export * from './logSchemas.js';
export * from './workspaceSchemas.js';
