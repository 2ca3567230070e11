/**
 * @module src/models
 * @description Array design models
 *
 * Organized into logical categories:
 * - geometry/: Linear-array inference from element positions
 * - excitation/: Per-element amplitude/phase state and snapshots
 * - array/: Analytic array factor
 * - synthesis/: Steering, tapers, nulls and pattern matching
 * - pattern/: Raw far-field normalization and cuts
 * - metrics/: Peak, HPBW, sidelobe level, front-to-back
 * - validation/: Graded comparison against targets
 * - numeric/: Numerical methods (math + optimization)
 */

export * as geometry from './geometry';
export * as excitation from './excitation';
export * as array from './array';
export * as synthesis from './synthesis';
export * as pattern from './pattern';
export * as metrics from './metrics';
export * as validation from './validation';
export * as numeric from './numeric';
