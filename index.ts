/**
 * @packageDocumentation
 * @module beamsmith
 *
 * Beamsmith: linear antenna-array beam design
 *
 * Infers a linear array from element positions, synthesizes per-element
 * excitations for steering, sidelobe, null and pattern-match objectives,
 * extracts cuts from simulated far fields and grades the resulting metrics.
 *
 * ## Modules
 * - `core` - Config, errors, logging, units
 * - `geometry` - Linear-array inference
 * - `excitation` - Excitation state and snapshots
 * - `array` - Analytic array factor
 * - `synthesis` - Objectives and the synthesizer
 * - `pattern` - Pattern normalization and cuts
 * - `metrics` - Figures of merit
 * - `validation` - Graded reports
 * - `numeric` - Linear algebra and derivative-free optimizers
 * - `backend` - Simulator gateway, cache, lock, reference backend
 * - `workflow` - Design chains and angle sweeps
 *
 * ## Usage Example
 * ```typescript
 * import { geometry, backend, synthesis, workflow } from 'beamsmith';
 *
 * const array = geometry.uniformLinearArray(8, 0.05);
 * const simulator = new backend.Simulator(new backend.ArrayFactorBackend(array));
 * const synthesizer = new synthesis.ExcitationSynthesizer({ simulator });
 *
 * const result = await workflow.runDesignChain(
 *     { geometry: array, objective: { kind: 'steer', thetaDeg: 20 }, frequencyHz: 3e9 },
 *     { synthesizer, simulator }
 * );
 * ```
 */

// ==================== Core ====================
export * as core from './src/core';

// ==================== Models ====================
export * as geometry from './src/models/geometry';
export * as excitation from './src/models/excitation';
export * as array from './src/models/array';
export * as synthesis from './src/models/synthesis';
export * as pattern from './src/models/pattern';
export * as metrics from './src/models/metrics';
export * as validation from './src/models/validation';

// ==================== Numerical Methods ====================
export * as numeric from './src/models/numeric';

// ==================== Backend & Workflow ====================
export * as backend from './src/backend';
export * as workflow from './src/workflow';

// ==================== Version ====================
export const VERSION = '0.1.0';
