/**
 * Extension Field Module
 */

export * from './fp2.js';
export * from './fp3.js';
export * from './parse.js';
