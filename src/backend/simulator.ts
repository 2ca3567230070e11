/**
 * @module backend/simulator
 * @description The core's single gateway to a SimulationBackend
 *
 * - Serializes apply+sample sequences on `exclusive` backends
 * - Caches results by excitation content, frequency and quantity
 * - Wraps backend failures into `BackendError` (no retries)
 * - Normalizes raw samples into a `PatternDataset`
 */

import { toBackendError } from '../core/errors';
import type { ExcitationState } from '../models/excitation/state';
import { PatternExtractor } from '../models/pattern/extractor';
import type { CutSpec, PatternCut, PatternDataset } from '../models/pattern/types';
import { PatternCache } from './cache';
import { SingleSlotLock } from './lock';
import type { SimulationBackend } from './types';

export interface SimulatorOptions {
    extractor?: PatternExtractor;
    /** Shared cache, or false to disable caching */
    cache?: PatternCache | false;
}

export interface SimulatorCounters {
    /** Backend `apply` calls */
    applies: number;
    /** Backend `samplePattern` calls */
    samples: number;
}

export class Simulator {
    readonly extractor: PatternExtractor;
    readonly cache: PatternCache | null;
    private readonly lock = new SingleSlotLock();
    private readonly counters: SimulatorCounters = { applies: 0, samples: 0 };

    constructor(readonly backend: SimulationBackend, options: SimulatorOptions = {}) {
        this.extractor = options.extractor ?? new PatternExtractor();
        this.cache = options.cache === false ? null : options.cache ?? new PatternCache();
    }

    /**
     * Pattern of `excitation` at `frequencyHz`, from the cache when possible
     *
     * @throws BackendError when the backend fails
     * @throws PatternError when its samples cannot be normalized
     */
    evaluate(excitation: ExcitationState, frequencyHz: number, quantity: string = 'gain'): Promise<PatternDataset> {
        if (this.cache === null) {
            return this.simulate(excitation, frequencyHz, quantity);
        }
        return this.cache.getOrCompute(
            PatternCache.key(excitation, frequencyHz, quantity),
            () => this.simulate(excitation, frequencyHz, quantity)
        );
    }

    /**
     * One cut of the pattern of `excitation`
     */
    async cut(
        excitation: ExcitationState,
        frequencyHz: number,
        spec: CutSpec,
        quantity: string = 'gain'
    ): Promise<PatternCut> {
        const dataset = await this.evaluate(excitation, frequencyHz, quantity);
        return this.extractor.cut(dataset, frequencyHz, spec);
    }

    get stats(): SimulatorCounters {
        return { ...this.counters };
    }

    private simulate(excitation: ExcitationState, frequencyHz: number, quantity: string): Promise<PatternDataset> {
        const sequence = async (): Promise<PatternDataset> => {
            try {
                this.counters.applies++;
                await this.backend.apply(excitation);
            } catch (error) {
                throw toBackendError('apply', error);
            }

            let raw;
            try {
                this.counters.samples++;
                raw = await this.backend.samplePattern(frequencyHz, quantity);
            } catch (error) {
                throw toBackendError('samplePattern', error);
            }
            return this.extractor.normalize(raw);
        };

        return this.backend.concurrency === 'exclusive' ? this.lock.run(sequence) : sequence();
    }
}
