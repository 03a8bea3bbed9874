export * from './bytes.js';
export * from './length-prefixed.js';
