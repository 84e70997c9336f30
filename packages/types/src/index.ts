export * from './schemas/index.js';
export type * from './types/catalogs.js';
export type * from './types/customs-exceptions.js';
export type * from './types/errors.js';
export type * from './types/health.js';
export type * from './types/shipments.js';
export type * from './types/tracking-events.js';
export type * from './types/tracking.js';
