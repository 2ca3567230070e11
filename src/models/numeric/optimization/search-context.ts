/**
 * @module optimization/search-context
 * @description Bookkeeping shared by the derivative-free minimizers:
 * evaluation counting, best-point tracking, bounds, budgets and cancellation.
 */

import type {
    AsyncCostFunction,
    DerivativeFreeOptions,
    DerivativeFreeResult,
    OptimizationStatus,
} from './types';

/**
 * Raised internally when the search must stop between evaluations
 */
export class StopSearch extends Error {
    constructor(readonly status: OptimizationStatus, readonly reason: string) {
        super(reason);
        this.name = 'StopSearch';
    }
}

export class SearchContext {
    readonly history: number[] = [];
    evaluations = 0;
    iterations = 0;
    bestX: number[];
    bestCost = Infinity;

    private readonly startedAt: number;
    private readonly now: () => number;

    constructor(
        private readonly costFn: AsyncCostFunction,
        private readonly options: DerivativeFreeOptions,
        x0: readonly number[]
    ) {
        this.now = options.now ?? Date.now;
        this.startedAt = this.now();
        this.bestX = this.clamp(x0);
    }

    /**
     * Clamp a point into the bounds
     */
    clamp(x: readonly number[]): number[] {
        const { lowerBounds, upperBounds } = this.options;
        return x.map((v, i) => {
            let r = v;
            if (lowerBounds && r < lowerBounds[i]) r = lowerBounds[i];
            if (upperBounds && r > upperBounds[i]) r = upperBounds[i];
            return r;
        });
    }

    /**
     * Evaluate a (clamped) point, tracking the best.
     * Checks cancellation and the time budget first, except for the very
     * first evaluation so there is always a scored point to return.
     */
    async evaluate(x: readonly number[]): Promise<{ x: number[]; cost: number }> {
        if (this.evaluations > 0) {
            this.checkInterrupts();
        }
        const point = this.clamp(x);
        const cost = await this.costFn(point);
        this.evaluations++;
        if (cost < this.bestCost) {
            this.bestCost = cost;
            this.bestX = point;
        }
        return { x: point, cost };
    }

    /**
     * Throw StopSearch when aborted or out of wall-clock budget
     */
    checkInterrupts(): void {
        if (this.options.signal?.aborted) {
            throw new StopSearch('cancelled', 'aborted by caller');
        }
        if (this.options.maxDurationMs > 0 && this.elapsed() >= this.options.maxDurationMs) {
            throw new StopSearch('budgetExhausted', `wall-clock budget of ${this.options.maxDurationMs} ms used`);
        }
    }

    /**
     * Score the starting point and open the history with its cost
     */
    async start(): Promise<number> {
        const { cost } = await this.evaluate(this.bestX);
        this.history.push(this.bestCost);
        return cost;
    }

    converged(): boolean {
        return this.bestCost <= this.options.costTolerance;
    }

    /**
     * Record a finished iteration
     */
    completeIteration(cost: number, step: number): void {
        this.iterations++;
        this.history.push(this.bestCost);
        this.options.onIteration?.({
            iteration: this.iterations,
            cost,
            bestCost: this.bestCost,
            step,
            evaluations: this.evaluations,
        });
    }

    elapsed(): number {
        return this.now() - this.startedAt;
    }

    result(status: OptimizationStatus, reason: string): DerivativeFreeResult {
        return {
            status,
            solution: [...this.bestX],
            cost: this.bestCost,
            iterations: this.iterations,
            evaluations: this.evaluations,
            history: [...this.history],
            reason,
            elapsedMs: this.elapsed(),
        };
    }
}

/**
 * Run a search body, turning StopSearch into a result and rethrowing anything else
 */
export async function runSearch(
    context: SearchContext,
    body: () => Promise<DerivativeFreeResult>
): Promise<DerivativeFreeResult> {
    try {
        return await body();
    } catch (error) {
        if (error instanceof StopSearch) {
            return context.result(error.status, error.reason);
        }
        throw error;
    }
}
