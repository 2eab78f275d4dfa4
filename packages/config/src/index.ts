export * from './schemas.js';
export * from './thread-list-config.js';
