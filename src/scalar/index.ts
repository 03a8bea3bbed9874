/**
 * Scalar Module
 */

export * from './group-order.js';
