/**
 * Backend Tests
 * Single-slot lock, pattern cache, simulator gateway, design variables and
 * the in-process array-factor backend
 */

import { describe, it, expect } from 'vitest';
import {
    SingleSlotLock,
    PatternCache,
    DEFAULT_CACHE_ENTRIES,
    Simulator,
    ArrayFactorBackend,
    excitationToVariables,
    variablesToExcitation,
} from '../src/backend';
import type { SimulationBackend } from '../src/backend';
import { ExcitationState } from '../src/models/excitation';
import { uniformLinearArray } from '../src/models/geometry';
import { PatternDataset } from '../src/models/pattern';
import { MetricsCalculator } from '../src/models/metrics';
import { BackendError, ErrorCodes, ExcitationError, PatternError } from '../src/core/errors';
import { wavelength } from '../src/core/units';
import { RecordingBackend, catchError, deferred } from './test-utils';

const F = 3e9;
const geometry = uniformLinearArray(4, wavelength(F) / 2);

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

function dataset(value: number): PatternDataset {
    return new PatternDataset('gain', 'power', [{ frequencyHz: F, thetaDeg: 0, phiDeg: 0, value }]);
}

describe('SingleSlotLock', () => {
    it('should run tasks one at a time in call order', async () => {
        const lock = new SingleSlotLock();
        const events: string[] = [];
        const task = (name: string, ms: number) => async (): Promise<string> => {
            events.push(`start ${name}`);
            await sleep(ms);
            events.push(`end ${name}`);
            return name;
        };

        const results = await Promise.all([lock.run(task('a', 20)), lock.run(task('b', 1)), lock.run(task('c', 5))]);
        expect(results).toEqual(['a', 'b', 'c']);
        expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
    });

    it('should count waiting tasks', async () => {
        const lock = new SingleSlotLock();
        const gate = deferred();
        const first = lock.run(() => gate.promise);
        const second = lock.run(async () => 'done');
        expect(lock.waiting).toBe(2);
        await sleep(0);
        expect(lock.waiting).toBe(1);
        gate.resolve();
        await Promise.all([first, second]);
        expect(lock.waiting).toBe(0);
    });

    it('should release the slot after a failure', async () => {
        const lock = new SingleSlotLock();
        const failed = lock.run(async () => {
            throw new Error('first failed');
        });
        const next = lock.run(async () => 'second ran');
        await expect(failed).rejects.toThrow('first failed');
        await expect(next).resolves.toBe('second ran');
    });
});

describe('PatternCache', () => {
    it('should share a pending computation', async () => {
        const cache = new PatternCache();
        let computed = 0;
        const compute = async (): Promise<PatternDataset> => {
            computed++;
            await sleep(5);
            return dataset(1);
        };
        const [a, b] = await Promise.all([cache.getOrCompute('k', compute), cache.getOrCompute('k', compute)]);
        expect(computed).toBe(1);
        expect(a).toBe(b);
        expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1, hitRate: 0.5 });
    });

    it('should drop failed computations', async () => {
        const cache = new PatternCache();
        await expect(cache.getOrCompute('k', async () => {
            throw new Error('no license');
        })).rejects.toThrow('no license');
        expect(cache.has('k')).toBe(false);
        await expect(cache.getOrCompute('k', async () => dataset(2))).resolves.toBeInstanceOf(PatternDataset);
        expect(cache.has('k')).toBe(true);
    });

    it('should evict the oldest entries beyond its size', async () => {
        const cache = new PatternCache(2);
        await cache.getOrCompute('a', async () => dataset(1));
        await cache.getOrCompute('b', async () => dataset(2));
        await cache.getOrCompute('c', async () => dataset(3));
        expect(cache.size).toBe(2);
        expect(cache.has('a')).toBe(false);
        expect(cache.has('c')).toBe(true);
    });

    it('should bound its size by default', async () => {
        const cache = new PatternCache();
        for (let i = 0; i <= DEFAULT_CACHE_ENTRIES; i++) {
            await cache.getOrCompute(`k${i}`, async () => dataset(i));
        }
        expect(cache.size).toBe(DEFAULT_CACHE_ENTRIES);
        expect(cache.has('k0')).toBe(false);
        expect(cache.has(`k${DEFAULT_CACHE_ENTRIES}`)).toBe(true);
    });

    it('should reset on clear', async () => {
        const cache = new PatternCache();
        await cache.getOrCompute('a', async () => dataset(1));
        cache.clear();
        expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0, hitRate: 0 });
    });

    it('should key by content, frequency and quantity', () => {
        const a = ExcitationState.uniform(geometry);
        const b = ExcitationState.fromArrays(geometry, [1, 1, 1, 1], [0, 0, 0, 1e-13]);
        expect(PatternCache.key(a, F, 'gain')).toBe(PatternCache.key(b, F, 'gain'));
        expect(PatternCache.key(a, F, 'gain')).toBe(`${a.contentHash()}@3000000000:gain`);
        expect(PatternCache.key(a, F, 'gain')).not.toBe(PatternCache.key(a, F, 'field'));
        expect(PatternCache.key(a, F, 'gain')).not.toBe(PatternCache.key(a, 2e9, 'gain'));
    });
});

describe('Simulator', () => {
    const uniform = ExcitationState.uniform(geometry);
    const tapered = ExcitationState.fromArrays(geometry, [0.5, 1, 1, 0.5], [0, 0, 0, 0]);

    it('should normalize backend samples into a dataset', async () => {
        const simulator = new Simulator(new RecordingBackend());
        const result = await simulator.evaluate(tapered, F);
        expect(result.samples).toEqual([{ frequencyHz: F, thetaDeg: 0, phiDeg: 0, value: 3 }]);
        expect(simulator.stats).toEqual({ applies: 1, samples: 1 });
    });

    it('should serve repeated requests from the cache', async () => {
        const backend = new RecordingBackend();
        const simulator = new Simulator(backend);
        const first = await simulator.evaluate(uniform, F);
        const second = await simulator.evaluate(ExcitationState.uniform(geometry), F);
        expect(second).toBe(first);
        expect(backend.applyCount).toBe(1);
        expect(simulator.cache?.stats().hits).toBe(1);
    });

    it('should share one simulation between concurrent identical requests', async () => {
        const backend = new RecordingBackend('shared');
        const simulator = new Simulator(backend);
        await Promise.all([simulator.evaluate(uniform, F), simulator.evaluate(uniform, F)]);
        expect(backend.applyCount).toBe(1);
    });

    it('should simulate every request when caching is off', async () => {
        const backend = new RecordingBackend();
        const simulator = new Simulator(backend, { cache: false });
        await simulator.evaluate(uniform, F);
        await simulator.evaluate(uniform, F);
        expect(simulator.cache).toBeNull();
        expect(backend.applyCount).toBe(2);
    });

    it('should serialize sessions on an exclusive backend', async () => {
        const backend = new RecordingBackend('exclusive');
        const simulator = new Simulator(backend);
        const [a, b] = await Promise.all([simulator.evaluate(uniform, F), simulator.evaluate(tapered, F)]);
        expect(backend.maxActive).toBe(1);
        expect(backend.events).toEqual(['apply', 'sample', 'apply', 'sample']);
        expect(a.samples[0].value).toBe(4);
        expect(b.samples[0].value).toBe(3);
    });

    it('should overlap sessions on a shared backend', async () => {
        const backend = new RecordingBackend('shared');
        const simulator = new Simulator(backend);
        await Promise.all([simulator.evaluate(uniform, F), simulator.evaluate(tapered, F)]);
        expect(backend.maxActive).toBe(2);
    });

    it('should wrap apply failures and not cache them', async () => {
        const backend = new RecordingBackend();
        const simulator = new Simulator(backend);
        backend.failNextApply = true;

        const error = await simulator.evaluate(uniform, F).then(() => null, (e: unknown) => e);
        expect(error).toBeInstanceOf(BackendError);
        if (!(error instanceof BackendError)) return;
        expect(error.code).toBe(ErrorCodes.BACKEND_ERROR);
        expect(error.operation).toBe('apply');
        expect(error.message).toBe('Backend apply failed: session lost');
        expect(error.originalError).toBeInstanceOf(Error);

        await expect(simulator.evaluate(uniform, F)).resolves.toBeInstanceOf(PatternDataset);
        expect(backend.applyCount).toBe(2);
    });

    it('should keep serving queued sessions after a failure', async () => {
        const backend = new RecordingBackend('exclusive');
        const simulator = new Simulator(backend);
        backend.failNextApply = true;
        const [first, second] = await Promise.allSettled([simulator.evaluate(uniform, F), simulator.evaluate(tapered, F)]);
        expect(first.status).toBe('rejected');
        expect(second.status).toBe('fulfilled');
    });

    it('should wrap sampling failures', async () => {
        const backend = new ArrayFactorBackend(geometry);
        const simulator = new Simulator(backend);
        const error = await simulator.evaluate(uniform, F, 'directivity').then(() => null, (e: unknown) => e);
        expect(error).toBeInstanceOf(BackendError);
        if (!(error instanceof BackendError)) return;
        expect(error.operation).toBe('samplePattern');
        expect(error.message).toBe('Backend samplePattern failed: Unknown quantity "directivity"');
    });

    it('should pass pattern errors through unwrapped', async () => {
        const empty: SimulationBackend = {
            concurrency: 'shared',
            apply: async () => undefined,
            samplePattern: async (_frequencyHz, quantity) => ({ quantity, convention: 'canonical', units: 'linear', samples: [] }),
        };
        const simulator = new Simulator(empty);
        await expect(simulator.evaluate(uniform, F)).rejects.toBeInstanceOf(PatternError);
    });
});

describe('Design variables', () => {
    const twoElements = uniformLinearArray(2, 0.05);
    const state = ExcitationState.fromArrays(twoElements, [1, 0.5], [0, -Math.PI / 2]);

    it('should write Amp/Phase variables with units', () => {
        expect(excitationToVariables(state)).toEqual({
            Amp0: '1V',
            Phase0: '0rad',
            Amp1: '0.5V',
            Phase1: '-1.57079632679rad',
        });
    });

    it('should read variables back', () => {
        const restored = variablesToExcitation(excitationToVariables(state), twoElements);
        expect(restored.equals(state, 1e-10)).toBe(true);
    });

    it('should accept other units on the way back', () => {
        const restored = variablesToExcitation({ Amp0: '1W', Phase0: '0', Amp1: '250mV', Phase1: '30deg' }, twoElements);
        expect(restored.amplitudes).toEqual([1, 0.25]);
        expect(restored.phases[1]).toBeCloseTo(Math.PI / 6, 12);
    });

    it('should name the element of a missing variable', () => {
        const error = catchError(() => variablesToExcitation({ Amp0: '1V', Phase0: '0rad', Amp1: '1V' }, twoElements));
        expect(error).toBeInstanceOf(ExcitationError);
        if (!(error instanceof ExcitationError)) return;
        expect(error.code).toBe(ErrorCodes.EXCITATION_MISMATCH);
        expect(error.elementIds).toEqual(['E1']);
    });

    it('should name the element of an unparseable variable', () => {
        const error = catchError(() => variablesToExcitation(
            { Amp0: 'loud', Phase0: '0rad', Amp1: '1V', Phase1: '0rad' },
            twoElements
        ));
        expect(error).toBeInstanceOf(ExcitationError);
        if (!(error instanceof ExcitationError)) return;
        expect(error.code).toBe(ErrorCodes.INVALID_EXCITATION);
        expect(error.elementIds).toEqual(['E0']);
    });
});

describe('ArrayFactorBackend', () => {
    const calculator = new MetricsCalculator();
    const uniform = ExcitationState.uniform(geometry);

    it('should peak at N for a uniform broadside array', async () => {
        const simulator = new Simulator(new ArrayFactorBackend(geometry));
        const cut = await simulator.cut(uniform, F, { kind: 'phi', phiDeg: 0 });
        expect(cut.anglesDeg).toHaveLength(360);
        expect(cut.circular).toBe(true);
        expect(cut.scale).toBe('power');
        expect(calculator.valueAt(cut, 0)).toBeCloseTo(4, 12);
    });

    it('should return |AF| for the field quantity', async () => {
        const simulator = new Simulator(new ArrayFactorBackend(geometry));
        const cut = await simulator.cut(uniform, F, { kind: 'phi', phiDeg: 0 }, 'field');
        expect(cut.scale).toBe('field');
        expect(calculator.valueAt(cut, 0)).toBeCloseTo(4, 12);
    });

    it('should report values in dB when asked', async () => {
        const backend = new ArrayFactorBackend(geometry, { units: 'dB' });
        await backend.apply(uniform);
        const raw = await backend.samplePattern(F, 'gain');
        expect(raw.units).toBe('dB');
        expect(raw.samples[0].value).toBeCloseTo(10 * Math.log10(4), 12);

        const cut = await new Simulator(backend).cut(uniform, F, { kind: 'phi', phiDeg: 0 });
        expect(calculator.valueAt(cut, 0)).toBeCloseTo(4, 9);
    });

    it('should write angles in the requested convention', async () => {
        const canonical = new Simulator(new ArrayFactorBackend(geometry));
        const signed = new Simulator(new ArrayFactorBackend(geometry, { convention: 'signedTheta' }));
        const steered = ExcitationState.fromArrays(geometry, [1, 1, 1, 1], [0, -1, -2, -3]);
        const a = await canonical.cut(steered, F, { kind: 'phi', phiDeg: 0 });
        const b = await signed.cut(steered, F, { kind: 'phi', phiDeg: 0 });
        expect(b.anglesDeg).toEqual(a.anglesDeg);
        b.values.forEach((v, i) => expect(v).toBeCloseTo(a.values[i], 9));
    });

    it('should sample the θ grid and φ planes it is given', async () => {
        const backend = new ArrayFactorBackend(geometry, { thetaStepDeg: 10, phiDeg: [0, 180] });
        await backend.apply(uniform);
        const raw = await backend.samplePattern(F, 'gain');
        expect(raw.samples).toHaveLength(38);
        expect(backend.counters).toEqual({ applies: 1, samples: 1 });
    });

    it('should shade the array factor with a cosine element', async () => {
        const backend = new ArrayFactorBackend(geometry, { elementPattern: { kind: 'cosine', exponent: 1 }, phiDeg: [0] });
        await backend.apply(uniform);
        const raw = await backend.samplePattern(F, 'field');
        const at = (theta: number): number => {
            const found = raw.samples.find(s => s.thetaDeg === theta);
            if (found === undefined) throw new Error(`no sample at ${theta}`);
            return found.value;
        };
        expect(at(0)).toBeCloseTo(4, 12);
        expect(at(120)).toBe(0);
    });

    it('should repeat noise for the same seed', async () => {
        const sample = async (seed: number): Promise<number[]> => {
            const backend = new ArrayFactorBackend(geometry, { noiseStdDb: 1, seed, thetaStepDeg: 30, phiDeg: [0] });
            await backend.apply(uniform);
            return (await backend.samplePattern(F, 'gain')).samples.map(s => s.value);
        };
        expect(await sample(7)).toEqual(await sample(7));
        expect(await sample(7)).not.toEqual(await sample(8));
    });

    it('should reject bad input', async () => {
        expect(catchError(() => new ArrayFactorBackend(geometry, { thetaStepDeg: 7 }))).toBeInstanceOf(Error);
        const backend = new ArrayFactorBackend(geometry);
        await expect(backend.samplePattern(F, 'gain')).rejects.toThrow('No excitation applied');
        const other = uniformLinearArray(3, 0.05);
        await expect(backend.apply(ExcitationState.uniform(other))).rejects.toThrow(
            'Excitation has 3 elements, geometry has 4'
        );
    });
});
