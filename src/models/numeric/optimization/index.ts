/**
 * @module optimization
 * @description Derivative-free minimizers for expensive, asynchronous cost functions
 *
 * Provides:
 * - Pattern search: coordinate compass search with step halving
 * - Nelder-Mead: downhill simplex
 */

export * from './types';
export { patternSearch } from './pattern-search';
export { nelderMead } from './nelder-mead';
