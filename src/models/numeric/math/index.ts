/**
 * @module math
 * @description Real and complex linear algebra
 */

export * from './linear-algebra';
export * from './complex';
