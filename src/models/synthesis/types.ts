/**
 * @module synthesis/types
 * @description Beam-shaping objectives and synthesis results
 */

import type { CostKind, OptimizerConfig, OptimizerMethod } from '../../core/config';
import type { SynthesisError } from '../../core/errors';
import type { ExcitationState } from '../excitation/state';
import type { OptimizationStatus } from '../numeric/optimization/types';
import type { CutSpec } from '../pattern/types';
import type { TaperSpec } from './taper';

/**
 * Point the main beam at θ₀ (deg from broadside); optionally tapered
 */
export interface SteerToAngle {
    kind: 'steer';
    thetaDeg: number;
    taper?: TaperSpec;
}

/**
 * Amplitude-only taper for a sidelobe level; phases steer to `steerDeg` (default 0)
 */
export interface SidelobeTarget extends TaperSpec {
    kind: 'sidelobe';
    steerDeg?: number;
}

/**
 * Zeros of the array factor at `nullsDeg`, unity gain at `mainBeamDeg` (default 0)
 */
export interface NullPlacement {
    kind: 'nulls';
    nullsDeg: number[];
    mainBeamDeg?: number;
}

/**
 * Target pattern sampled at angles of a cut, or a function evaluated there
 */
export type PatternTarget =
    | { kind: 'sampled'; anglesDeg: number[]; values: number[] }
    | { kind: 'function'; anglesDeg: number[]; evaluate: (angleDeg: number) => number };

/**
 * Iteratively fit the simulated pattern on a cut to a target
 */
export interface PatternMatch {
    kind: 'patternMatch';
    target: PatternTarget;
    /** Cut of the simulated pattern compared with the target */
    cut: CutSpec;
    /** Backend quantity (default 'gain') */
    quantity?: string;
    /** Starting point (default uniform) */
    initial?: ExcitationState;
    method?: OptimizerMethod;
    cost?: CostKind;
    /** Per-objective overrides of the optimizer configuration */
    optimizer?: Partial<OptimizerConfig>;
}

/**
 * Beam-shaping objective (tagged variant)
 */
export type SteeringObjective = SteerToAngle | SidelobeTarget | NullPlacement | PatternMatch;

export type ObjectiveKind = SteeringObjective['kind'];

/**
 * How an iterative synthesis ended, with the best excitation found
 */
export interface OptimizationOutcome {
    status: OptimizationStatus;
    excitation: ExcitationState;
    cost: number;
    iterations: number;
    evaluations: number;
    /** Best cost after each iteration, starting with the initial point */
    history: number[];
    reason: string;
    elapsedMs: number;
    method: OptimizerMethod;
}

/**
 * Result of `ExcitationSynthesizer.synthesize`; failures are values, not throws
 */
export type SynthesisResult =
    | { ok: true; objective: ObjectiveKind; excitation: ExcitationState; outcome?: OptimizationOutcome }
    | { ok: false; objective: ObjectiveKind; error: SynthesisError };
