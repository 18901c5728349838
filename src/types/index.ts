export * from './property.js';
export * from './pipeline.js';
export * from './result.js';
