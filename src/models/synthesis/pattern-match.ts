/**
 * @module synthesis/pattern-match
 * @description Iterative fit of a simulated pattern cut to a target shape
 *
 * Parameters are x = [a_0 … a_{N−1}, φ_1 … φ_{N−1}]; φ_0 is held at 0 and
 * amplitudes are bounded to [minAmplitude, 1]. Each cost evaluation is one
 * simulation of the peak-normalized excitation through the `Simulator`, so
 * repeated points and scaled copies of one shape hit its cache.
 *
 * Costs (t = target / max t, a = achieved / max of the cut):
 * - nmse: Σ(a − t)² / Σt²
 * - correlation: 1 − a·t / (|a|·|t|)
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import type { CostKind, OptimizerConfig } from '../../core/config';
import { ValidationError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import type { Simulator } from '../../backend/simulator';
import { ExcitationState } from '../excitation/state';
import type { GeometryModel } from '../geometry/types';
import { MetricsCalculator } from '../metrics/calculator';
import { nelderMead, patternSearch } from '../numeric/optimization';
import type { DerivativeFreeOptions } from '../numeric/optimization';
import type { OptimizationOutcome, PatternMatch, PatternTarget } from './types';

export interface PatternMatchOptions {
    /** Optimizer defaults; the objective's own `optimizer` overrides them */
    optimizer?: OptimizerConfig;
    signal?: AbortSignal;
    loggers?: Logger[];
    /** Clock (ms) used for the wall-clock budget */
    now?: () => number;
}

/**
 * Target angles and magnitudes normalized to a peak of 1
 *
 * @throws ValidationError for empty, mismatched, non-finite or all-zero targets
 */
export function normalizeTarget(target: PatternTarget): { anglesDeg: number[]; values: number[] } {
    const anglesDeg = [...target.anglesDeg];
    const raw = target.kind === 'sampled' ? [...target.values] : anglesDeg.map(a => target.evaluate(a));
    if (anglesDeg.length === 0 || raw.length !== anglesDeg.length) {
        throw new ValidationError(
            `Target needs one value per angle, got ${anglesDeg.length} angles and ${raw.length} values`,
            { angles: anglesDeg.length, values: raw.length }
        );
    }
    if (raw.some(v => !Number.isFinite(v)) || anglesDeg.some(a => !Number.isFinite(a))) {
        throw new ValidationError('Target angles and values must be finite');
    }
    const magnitudes = raw.map(Math.abs);
    const peak = Math.max(...magnitudes);
    if (peak === 0) {
        throw new ValidationError('Target pattern is zero everywhere');
    }
    return { anglesDeg, values: magnitudes.map(v => v / peak) };
}

/**
 * Mismatch between achieved and target magnitudes (both peak-normalized)
 */
export function patternCost(kind: CostKind, achieved: readonly number[], target: readonly number[]): number {
    if (kind === 'nmse') {
        let num = 0;
        let den = 0;
        target.forEach((t, i) => {
            num += (achieved[i] - t) ** 2;
            den += t * t;
        });
        return num / den;
    }
    let dot = 0;
    let aa = 0;
    let tt = 0;
    target.forEach((t, i) => {
        dot += achieved[i] * t;
        aa += achieved[i] * achieved[i];
        tt += t * t;
    });
    return aa === 0 ? 1 : 1 - dot / Math.sqrt(aa * tt);
}

function toParameters(state: ExcitationState): number[] {
    const amplitudes = state.amplitudes;
    const peak = Math.max(...amplitudes);
    const scaled = peak > 0 ? amplitudes.map(a => a / peak) : amplitudes.map(() => 1);
    const phases = state.phases;
    return [...scaled, ...phases.slice(1).map(p => p - phases[0])];
}

/**
 * Excitation for a parameter vector, largest amplitude scaled to 1
 */
function fromParameters(geometry: GeometryModel, x: readonly number[]): ExcitationState {
    const n = geometry.count;
    return ExcitationState.fromArrays(geometry, x.slice(0, n), [0, ...x.slice(n)]).normalized();
}

/**
 * Search for the excitation whose cut best matches `objective.target`
 *
 * Never throws for a search that merely fails to reach the tolerance: the
 * outcome status says why it stopped and carries the best excitation found.
 *
 * @throws ValidationError for an unusable target
 * @throws BackendError when a simulation fails
 */
export async function matchPattern(
    geometry: GeometryModel,
    objective: PatternMatch,
    frequencyHz: number,
    simulator: Simulator,
    options: PatternMatchOptions = {}
): Promise<OptimizationOutcome> {
    const config: OptimizerConfig = {
        ...(options.optimizer ?? DEFAULT_DESIGN_CONFIG.optimizer),
        ...objective.optimizer,
    };
    const method = objective.method ?? config.method;
    const costKind = objective.cost ?? config.cost;
    const quantity = objective.quantity ?? 'gain';
    const target = normalizeTarget(objective.target);
    const calculator = new MetricsCalculator();
    const loggers = options.loggers ?? [];
    const n = geometry.count;

    const cost = async (x: number[]): Promise<number> => {
        const cut = await simulator.cut(fromParameters(geometry, x), frequencyHz, objective.cut, quantity);
        const peak = Math.max(...cut.values);
        const achieved = target.anglesDeg.map(a => (peak > 0 ? calculator.valueAt(cut, a) / peak : 0));
        return patternCost(costKind, achieved, target.values);
    };

    const search: DerivativeFreeOptions = {
        maxIterations: config.maxIterations,
        costTolerance: config.costTolerance,
        patience: config.patience,
        initialStep: config.initialStep,
        minStep: config.minStep,
        maxDurationMs: config.maxDurationMs,
        lowerBounds: [...Array<number>(n).fill(config.minAmplitude), ...Array<number>(n - 1).fill(-Infinity)],
        upperBounds: [...Array<number>(n).fill(1), ...Array<number>(n - 1).fill(Infinity)],
        signal: options.signal,
        now: options.now,
        onIteration: info => {
            for (const logger of loggers) {
                logger.logIteration(info);
            }
        },
    };

    const initial = toParameters(objective.initial ?? ExcitationState.uniform(geometry));
    const result = method === 'nelderMead'
        ? await nelderMead(cost, initial, search)
        : await patternSearch(cost, initial, search);

    return {
        status: result.status,
        excitation: fromParameters(geometry, result.solution),
        cost: result.cost,
        iterations: result.iterations,
        evaluations: result.evaluations,
        history: result.history,
        reason: result.reason,
        elapsedMs: result.elapsedMs,
        method,
    };
}
