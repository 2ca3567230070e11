/**
 * Pattern Matching Tests
 * Target normalization, cost functions and the optimizer loop against the
 * in-process simulator
 */

import { describe, it, expect } from 'vitest';
import { matchPattern, normalizeTarget, patternCost, ExcitationSynthesizer } from '../src/models/synthesis';
import type { PatternMatch } from '../src/models/synthesis';
import { ArrayFactorBackend, Simulator } from '../src/backend';
import { ExcitationState } from '../src/models/excitation';
import { uniformLinearArray } from '../src/models/geometry';
import { MetricsCalculator } from '../src/models/metrics';
import { ValidationError } from '../src/core/errors';
import { MemoryLogger } from '../src/core/logging';
import { wavelength } from '../src/core/units';
import { catchError } from './test-utils';

const F = 3e9;
const geometry = uniformLinearArray(4, wavelength(F) / 2);
const CUT = { kind: 'phi', phiDeg: 0 } as const;
const ANGLES = [-60, -50, -40, -30, -20, -10, 0, 10, 20, 30, 40, 50, 60];

function simulator(): Simulator {
    return new Simulator(new ArrayFactorBackend(geometry));
}

function pencilBeam(overrides: Partial<PatternMatch> = {}): PatternMatch {
    return {
        kind: 'patternMatch',
        target: { kind: 'function', anglesDeg: ANGLES, evaluate: a => Math.cos((a * Math.PI) / 180) ** 8 },
        cut: CUT,
        ...overrides,
    };
}

describe('normalizeTarget', () => {
    it('should scale sampled magnitudes to a peak of 1', () => {
        expect(normalizeTarget({ kind: 'sampled', anglesDeg: [0, 10], values: [2, -4] })).toEqual({
            anglesDeg: [0, 10],
            values: [0.5, 1],
        });
    });

    it('should evaluate function targets at the angles', () => {
        const target = normalizeTarget({ kind: 'function', anglesDeg: [0, 30], evaluate: a => 10 - a / 10 });
        expect(target.values).toEqual([1, 0.7]);
    });

    it('should reject unusable targets', () => {
        const bad = [
            { kind: 'sampled' as const, anglesDeg: [], values: [] },
            { kind: 'sampled' as const, anglesDeg: [0, 10], values: [1] },
            { kind: 'sampled' as const, anglesDeg: [0], values: [Number.NaN] },
            { kind: 'sampled' as const, anglesDeg: [0, 10], values: [0, 0] },
        ];
        for (const target of bad) {
            expect(catchError(() => normalizeTarget(target))).toBeInstanceOf(ValidationError);
        }
    });
});

describe('patternCost', () => {
    it('should compute the normalized mean squared error', () => {
        expect(patternCost('nmse', [1, 0.5], [1, 1])).toBe(0.125);
        expect(patternCost('nmse', [1, 1], [1, 1])).toBe(0);
    });

    it('should ignore scale under the correlation cost', () => {
        expect(patternCost('correlation', [1, 0.5], [2, 1])).toBe(0);
        expect(patternCost('correlation', [1, 0], [0, 1])).toBe(1);
        expect(patternCost('correlation', [0, 0], [0, 1])).toBe(1);
    });
});

describe('matchPattern', () => {
    it('should stop at once when the starting point already matches', async () => {
        const sim = simulator();
        const reference = await sim.cut(ExcitationState.uniform(geometry), F, CUT);
        const calculator = new MetricsCalculator();
        const outcome = await matchPattern(
            geometry,
            {
                kind: 'patternMatch',
                target: { kind: 'sampled', anglesDeg: ANGLES, values: ANGLES.map(a => calculator.valueAt(reference, a)) },
                cut: CUT,
            },
            F,
            sim
        );
        expect(outcome.status).toBe('converged');
        expect(outcome.cost).toBe(0);
        expect(outcome.iterations).toBe(0);
        expect(outcome.evaluations).toBe(1);
        expect(outcome.method).toBe('patternSearch');
        expect(outcome.excitation.equals(ExcitationState.uniform(geometry))).toBe(true);
    });

    it('should converge from a perturbed start to a tapered target', async () => {
        const sim = simulator();
        const taper = ExcitationState.fromArrays(geometry, [0.5, 1, 1, 0.5], [0, 0, 0, 0]);
        const reference = await sim.cut(taper, F, CUT);
        const calculator = new MetricsCalculator();
        const outcome = await matchPattern(
            geometry,
            {
                kind: 'patternMatch',
                target: { kind: 'sampled', anglesDeg: ANGLES, values: ANGLES.map(a => calculator.valueAt(reference, a)) },
                cut: CUT,
                initial: ExcitationState.fromArrays(geometry, [1, 0.5, 0.5, 0.5], [0, 0, 0, 0]),
            },
            F,
            sim
        );

        expect(outcome.status).toBe('converged');
        expect(outcome.iterations).toBe(2);
        expect(outcome.cost).toBeLessThan(1e-3);
        expect(outcome.history).toHaveLength(3);
        expect(outcome.history[1]).toBeLessThan(outcome.history[0]);
        expect(outcome.history[2]).toBeLessThan(outcome.history[1]);

        // The search ends on [0.5, 0.75, 0.75, 0.25]; the result is rescaled to a peak of 1
        const amplitudes = outcome.excitation.amplitudes;
        expect(Math.max(...amplitudes)).toBe(1);
        expect(amplitudes[0]).toBeCloseTo(2 / 3, 12);
        expect(amplitudes[3]).toBeCloseTo(1 / 3, 12);
    });

    it('should score a mismatched start above the tolerance', async () => {
        const controller = new AbortController();
        controller.abort();
        const outcome = await matchPattern(geometry, pencilBeam(), F, simulator(), { signal: controller.signal });
        expect(outcome.cost).toBeGreaterThan(1e-3);
    });

    it('should return the starting point when cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        const outcome = await matchPattern(geometry, pencilBeam(), F, simulator(), { signal: controller.signal });
        expect(outcome.status).toBe('cancelled');
        expect(outcome.evaluations).toBe(1);
        expect(outcome.history).toHaveLength(1);
    });

    it('should log every iteration and stop on the iteration budget', async () => {
        const logger = new MemoryLogger({ design: 'match' });
        const outcome = await matchPattern(
            geometry,
            pencilBeam({ optimizer: { maxIterations: 2, patience: 10, minStep: 1e-6, costTolerance: 1e-9 } }),
            F,
            simulator(),
            { loggers: [logger] }
        );
        expect(outcome.status).toBe('budgetExhausted');
        expect(outcome.iterations).toBe(2);
        expect(outcome.history).toHaveLength(3);
        expect(outcome.history[2]).toBeLessThanOrEqual(outcome.history[0]);
        expect(logger.iterations.map(e => e.iteration)).toEqual([1, 2]);
    });

    it('should keep amplitudes inside their bounds', async () => {
        const outcome = await matchPattern(
            geometry,
            pencilBeam({ optimizer: { maxIterations: 3, minAmplitude: 0.1 } }),
            F,
            simulator()
        );
        for (const a of outcome.excitation.amplitudes) {
            expect(a).toBeGreaterThanOrEqual(0.1);
            expect(a).toBeLessThanOrEqual(1);
        }
        expect(outcome.excitation.phases[0]).toBe(0);
    });

    it('should run Nelder-Mead when asked', async () => {
        const outcome = await matchPattern(
            geometry,
            pencilBeam({ method: 'nelderMead', cost: 'correlation', optimizer: { maxIterations: 3, costTolerance: 0 } }),
            F,
            simulator()
        );
        expect(outcome.method).toBe('nelderMead');
        expect(outcome.iterations).toBe(3);
        expect(outcome.status).toBe('budgetExhausted');
    });

    it('should reuse cached simulations for repeated points', async () => {
        const sim = simulator();
        const outcome = await matchPattern(geometry, pencilBeam({ optimizer: { maxIterations: 2 } }), F, sim);
        expect(sim.stats.applies).toBeLessThanOrEqual(outcome.evaluations);
    });
});

describe('ExcitationSynthesizer pattern matching', () => {
    it('should carry the optimization outcome and log its status', async () => {
        const sim = simulator();
        const logger = new MemoryLogger({ design: 'pm' });
        const synthesizer = new ExcitationSynthesizer({ simulator: sim, loggers: [logger] });
        const controller = new AbortController();
        controller.abort();

        const result = await synthesizer.synthesize(geometry, pencilBeam(), F, { signal: controller.signal });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.outcome?.status).toBe('cancelled');
        expect(logger.syntheses[0]).toMatchObject({
            objective: 'patternMatch',
            status: 'cancelled',
            message: 'aborted by caller',
        });
        expect(logger.syntheses[0].details).toMatchObject({ evaluations: 1, iterations: 0 });
    });
});
