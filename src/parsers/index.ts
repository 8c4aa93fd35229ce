export * from './types.js';
export * from './typescript.js';
export * from './body.js';
