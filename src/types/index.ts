/**
 * Type exports for valtree.
 */

export * from './common.js';
