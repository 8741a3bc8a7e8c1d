import type { HandlerWrapper } from '../connectors/router.js';

/**
 * Compose wrappers from left to right (outer to inner)
 * compose(a, b, c)(handler) = a(b(c(handler)))
 */
export const compose = (...wrappers: HandlerWrapper[]): HandlerWrapper =>
  (handler) => wrappers.reduceRight((h, wrapper) => wrapper(h), handler);
