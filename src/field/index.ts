/**
 * Prime Field Module
 *
 * Field construction from untrusted moduli, canonical element codec and the
 * base-field arithmetic used for parameter validation.
 */

export * from './prime-field.js';
export * from './element.js';
export * from './operations.js';
export * from './serialization.js';
export * from './parse.js';
