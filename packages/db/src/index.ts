export * from './enums.js';
export * from './schemas/index.js';
export * from './client.js';
export { applySchema } from './bootstrap.js';
