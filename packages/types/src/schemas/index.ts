export * from './carriers.js';
export * from './common.js';
export * from './containers.js';
export * from './customers.js';
export * from './customs.js';
export * from './errors.js';
export * from './exceptions.js';
export * from './health.js';
export * from './locations.js';
export * from './patterns.js';
export * from './shipments.js';
export * from './tracking-events.js';
export * from './tracking.js';
export * from './vessels.js';
