/**
 * Curve Point Module
 */

export * from './g1.js';
export * from './g2.js';
