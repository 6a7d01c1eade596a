/**
 * Messages module - rendering and localization.
 */

export * from './types.js';
export {
  toMessageContext,
  renderViolation,
  substituteParams,
  formatLiteral,
} from './MessageRenderer.js';
export { DEFAULT_LOCALE, DEFAULT_MESSAGES } from './defaultMessages.js';
export {
  FluentCatalog,
  createFluentCatalog,
  loadFluentCatalog,
} from './FluentCatalog.js';
export type { FluentCatalogOptions } from './FluentCatalog.js';
