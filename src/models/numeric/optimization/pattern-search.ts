/**
 * @module optimization/pattern-search
 * @description Coordinate pattern search (compass search).
 *
 * Each iteration polls every coordinate at ±step, keeping the first
 * improving move per coordinate. A sweep without improvement halves the step.
 *
 * Reference: Kolda, Lewis & Torczon, "Optimization by Direct Search: New
 * Perspectives on Some Classical and Modern Methods", SIAM Review 45(3), 2003.
 */

import { SearchContext, runSearch } from './search-context';
import type { AsyncCostFunction, DerivativeFreeOptions, DerivativeFreeResult } from './types';

/**
 * Minimize `costFn` from `x0` by coordinate pattern search
 *
 * @example
 * ```typescript
 * const result = await patternSearch(async x => (x[0] - 1) ** 2, [0], {
 *     maxIterations: 100, costTolerance: 1e-8, patience: 10,
 *     initialStep: 0.5, minStep: 1e-6, maxDurationMs: 0,
 * });
 * // result.status === 'converged', result.solution ≈ [1]
 * ```
 */
export async function patternSearch(
    costFn: AsyncCostFunction,
    x0: readonly number[],
    options: DerivativeFreeOptions
): Promise<DerivativeFreeResult> {
    const ctx = new SearchContext(costFn, options, x0);

    return runSearch(ctx, async () => {
        await ctx.start();
        if (ctx.converged()) {
            return ctx.result('converged', 'initial point meets the cost tolerance');
        }

        let step = options.initialStep;
        let sinceImprovement = 0;

        while (ctx.iterations < options.maxIterations) {
            ctx.checkInterrupts();

            const before = ctx.bestCost;
            let x = ctx.bestX;
            let lastCost = ctx.bestCost;

            for (let i = 0; i < x.length; i++) {
                for (const direction of [1, -1]) {
                    const candidate = [...x];
                    candidate[i] += direction * step;
                    const clamped = ctx.clamp(candidate);
                    if (clamped[i] === x[i]) continue;

                    const current = ctx.bestCost;
                    const trial = await ctx.evaluate(clamped);
                    lastCost = trial.cost;
                    if (trial.cost < current) {
                        x = trial.x;
                        break;
                    }
                }
            }

            const improved = ctx.bestCost < before;
            if (improved) {
                sinceImprovement = 0;
            } else {
                sinceImprovement++;
                step *= 0.5;
            }
            ctx.completeIteration(lastCost, step);

            if (ctx.converged()) {
                return ctx.result('converged', `cost ${ctx.bestCost.toPrecision(4)} within tolerance`);
            }
            if (step < options.minStep) {
                return ctx.result('stalled', `step ${step.toPrecision(3)} below minimum ${options.minStep}`);
            }
            if (sinceImprovement >= options.patience) {
                return ctx.result('stalled', `no improvement in ${sinceImprovement} iterations`);
            }
        }

        return ctx.result('budgetExhausted', `reached ${options.maxIterations} iterations`);
    });
}
