/**
 * @module src/models/numeric
 * @description Numerical Methods and Optimization
 *
 * Contains:
 * - Real linear algebra: vectors, 3x3 covariance and eigen decomposition
 * - Complex linear algebra: dense solves for constraint systems
 * - Optimization: pattern search, Nelder-Mead
 */

import * as math from './math';
import * as optimization from './optimization';

// Re-export as namespaces
export { math, optimization };

// Direct exports for common functions
export * from './optimization';
