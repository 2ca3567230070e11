/**
 * @module optimization/types
 * @description Type definitions for derivative-free optimization
 */

/**
 * Why a search stopped
 *
 * - `converged`: cost at or below the tolerance
 * - `budgetExhausted`: iteration or wall-clock budget used up
 * - `stalled`: no improvement over the patience window, or step below minimum
 * - `cancelled`: the caller aborted between evaluations
 */
export type OptimizationStatus = 'converged' | 'budgetExhausted' | 'stalled' | 'cancelled';

/**
 * Cost function evaluated asynchronously (one expensive simulation per call)
 */
export type AsyncCostFunction = (x: number[]) => Promise<number>;

/**
 * Progress report emitted after every iteration
 */
export interface IterationInfo {
    iteration: number;
    /** Cost of the point the iteration ended on */
    cost: number;
    bestCost: number;
    /** Step size (pattern search) or simplex diameter (Nelder-Mead) */
    step: number;
    evaluations: number;
}

/**
 * Options shared by the derivative-free minimizers
 */
export interface DerivativeFreeOptions {
    /** Maximum number of iterations */
    maxIterations: number;
    /** Stop as converged once the best cost is at or below this */
    costTolerance: number;
    /** Iterations without improvement before stalling */
    patience: number;
    /** Initial step per coordinate */
    initialStep: number;
    /** Step (or simplex diameter) below which the search stalls */
    minStep: number;
    /** Wall-clock budget in ms (0 = unlimited) */
    maxDurationMs: number;
    /** Per-coordinate lower bounds */
    lowerBounds?: number[];
    /** Per-coordinate upper bounds */
    upperBounds?: number[];
    /** Abort signal checked before every evaluation after the first */
    signal?: AbortSignal;
    /** Iteration callback */
    onIteration?: (info: IterationInfo) => void;
    /** Clock (ms); defaults to Date.now */
    now?: () => number;
}

/**
 * Optimization result
 */
export interface DerivativeFreeResult {
    status: OptimizationStatus;
    /** Best point found */
    solution: number[];
    /** Cost at `solution` */
    cost: number;
    /** Completed iterations */
    iterations: number;
    /** Cost function calls */
    evaluations: number;
    /** Best cost after each iteration, starting with the initial point */
    history: number[];
    /** Human-readable stop reason */
    reason: string;
    elapsedMs: number;
}
