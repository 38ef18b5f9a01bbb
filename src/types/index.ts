export * from './jsonValueTypes.js';
export * from './flattenTypes.js';
