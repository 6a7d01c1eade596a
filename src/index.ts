/**
 * valtree — Constraint evaluation with path-addressed, localizable error trees.
 *
 * This is the main entry point for the library.
 */

// Value model
export * from './types/index.js';

// Violations, error tree and error classes
export * from './errors/index.js';

// Rules and their evaluators
export * from './constraints/index.js';

// allOf / anyOf / oneOf / not over sub-validations (the schema builder
// takes the flat names)
export * as composition from './composition/index.js';
export type { Branch, CompositionResult } from './composition/index.js';

// Schema nodes, walker and builder
export * from './walker/index.js';

// Message rendering and localization
export * from './messages/index.js';

// JSON Schema documents and serialized input
export * from './bridge/index.js';

// Fastify request validation
export * from './http/index.js';

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';
