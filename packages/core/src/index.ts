export * from './config.js';
export * from './errors.js';
export * from './utils/bit.js';
export * from './utils/debug.js';
export * from './cache/types.js';
export * from './cache/plru.js';
export * from './cache/line_store.js';
export * from './cache/mshr.js';
export * from './cache/counters.js';
export * from './cache/response.js';
export * from './cache/controller.js';
export * from './mem/memory.js';
export * from './system/system.js';
export * from './system/driver.js';
