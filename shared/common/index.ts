export * from './layout-constants.js';
export * from './list-marker-utils.js';
