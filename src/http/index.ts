export { validatedBody, preferredLocale } from './validatedBody.js';
export type { ValidatedBodyOptions, RejectionBody } from './validatedBody.js';
