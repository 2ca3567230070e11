/**
 * @module optimization/nelder-mead
 * @description Nelder-Mead downhill simplex with standard coefficients
 * (reflection 1, expansion 2, contraction 0.5, shrink 0.5).
 *
 * Reference: Nelder, J. A. & Mead, R. (1965). A simplex method for function
 * minimization. The Computer Journal, 7(4), 308-313.
 */

import { axpy, norm, scale, subtract } from '../math/linear-algebra';
import { SearchContext, runSearch } from './search-context';
import type { AsyncCostFunction, DerivativeFreeOptions, DerivativeFreeResult } from './types';

const ALPHA = 1;
const GAMMA = 2;
const RHO = 0.5;
const SIGMA = 0.5;

interface Vertex {
    x: number[];
    cost: number;
}

function centroidOf(vertices: readonly Vertex[]): number[] {
    const dim = vertices[0].x.length;
    const c: number[] = new Array(dim).fill(0);
    for (const v of vertices) {
        for (let i = 0; i < dim; i++) {
            c[i] += v.x[i] / vertices.length;
        }
    }
    return c;
}

function diameter(simplex: readonly Vertex[]): number {
    let d = 0;
    for (let i = 1; i < simplex.length; i++) {
        d = Math.max(d, norm(subtract(simplex[i].x, simplex[0].x)));
    }
    return d;
}

/**
 * Minimize `costFn` from `x0` with the Nelder-Mead simplex method
 *
 * The initial simplex is x0 plus `initialStep` along each coordinate
 * (minus, for a coordinate already on its upper bound).
 * The reported step of an iteration is the simplex diameter.
 */
export async function nelderMead(
    costFn: AsyncCostFunction,
    x0: readonly number[],
    options: DerivativeFreeOptions
): Promise<DerivativeFreeResult> {
    const ctx = new SearchContext(costFn, options, x0);

    return runSearch(ctx, async () => {
        const start = ctx.bestX;
        const startCost = await ctx.start();
        if (ctx.converged()) {
            return ctx.result('converged', 'initial point meets the cost tolerance');
        }

        const simplex: Vertex[] = [{ x: start, cost: startCost }];
        for (let i = 0; i < start.length; i++) {
            const vertex = [...start];
            vertex[i] += options.initialStep;
            // Step inward from a coordinate sitting on its upper bound
            if (ctx.clamp(vertex)[i] === start[i]) {
                vertex[i] = start[i] - options.initialStep;
            }
            simplex.push(await ctx.evaluate(vertex));
        }

        let sinceImprovement = 0;

        while (ctx.iterations < options.maxIterations) {
            ctx.checkInterrupts();
            const before = ctx.bestCost;

            simplex.sort((a, b) => a.cost - b.cost);
            const best = simplex[0];
            const worst = simplex[simplex.length - 1];
            const secondWorst = simplex[simplex.length - 2];
            const centroid = centroidOf(simplex.slice(0, -1));
            const direction = subtract(centroid, worst.x);

            const reflected = await ctx.evaluate(axpy(centroid, ALPHA, direction));
            let lastCost = reflected.cost;

            if (reflected.cost < best.cost) {
                const expanded = await ctx.evaluate(axpy(centroid, GAMMA, direction));
                lastCost = expanded.cost;
                simplex[simplex.length - 1] = expanded.cost < reflected.cost ? expanded : reflected;
            } else if (reflected.cost < secondWorst.cost) {
                simplex[simplex.length - 1] = reflected;
            } else {
                // Outside contraction when the reflection beat the worst point, inside otherwise
                const outside = reflected.cost < worst.cost;
                const contracted = await ctx.evaluate(
                    axpy(centroid, outside ? RHO : -RHO, direction)
                );
                lastCost = contracted.cost;
                const reference = outside ? reflected.cost : worst.cost;

                if (contracted.cost < reference) {
                    simplex[simplex.length - 1] = contracted;
                } else {
                    for (let i = 1; i < simplex.length; i++) {
                        const shrunk = axpy(best.x, 1, scale(subtract(simplex[i].x, best.x), SIGMA));
                        simplex[i] = await ctx.evaluate(shrunk);
                        lastCost = simplex[i].cost;
                    }
                }
            }

            const size = diameter(simplex);
            sinceImprovement = ctx.bestCost < before ? 0 : sinceImprovement + 1;
            ctx.completeIteration(lastCost, size);

            if (ctx.converged()) {
                return ctx.result('converged', `cost ${ctx.bestCost.toPrecision(4)} within tolerance`);
            }
            if (size < options.minStep) {
                return ctx.result('stalled', `simplex diameter ${size.toPrecision(3)} below minimum ${options.minStep}`);
            }
            if (sinceImprovement >= options.patience) {
                return ctx.result('stalled', `no improvement in ${sinceImprovement} iterations`);
            }
        }

        return ctx.result('budgetExhausted', `reached ${options.maxIterations} iterations`);
    });
}
