/**
 * @module backend/cache
 * @description Pattern results keyed by (excitation content hash, frequency, quantity)
 *
 * Pending requests are shared: a second request for a key that is still
 * being simulated waits on the first instead of simulating again. Failed
 * requests are dropped so a later call can try again.
 */

import type { ExcitationState } from '../models/excitation/state';
import type { PatternDataset } from '../models/pattern/types';

export interface CacheStats {
    hits: number;
    misses: number;
    size: number;
    hitRate: number;
}

/** Default bound on cached datasets */
export const DEFAULT_CACHE_ENTRIES = 1024;

export class PatternCache {
    private readonly entries = new Map<string, Promise<PatternDataset>>();
    private hits = 0;
    private misses = 0;

    /**
     * @param maxEntries - Oldest entries are evicted beyond this size
     */
    constructor(private readonly maxEntries: number = DEFAULT_CACHE_ENTRIES) { }

    static key(excitation: ExcitationState, frequencyHz: number, quantity: string): string {
        return `${excitation.contentHash()}@${frequencyHz}:${quantity}`;
    }

    /**
     * Cached result for `key`, or the result of `compute` stored under it
     */
    getOrCompute(key: string, compute: () => Promise<PatternDataset>): Promise<PatternDataset> {
        const cached = this.entries.get(key);
        if (cached) {
            this.hits++;
            return cached;
        }
        this.misses++;

        const pending = (async () => {
            try {
                return await compute();
            } catch (error) {
                this.entries.delete(key);
                throw error;
            }
        })();
        this.entries.set(key, pending);
        this.evict();
        return pending;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
        this.hits = 0;
        this.misses = 0;
    }

    stats(): CacheStats {
        const total = this.hits + this.misses;
        return {
            hits: this.hits,
            misses: this.misses,
            size: this.entries.size,
            hitRate: total > 0 ? this.hits / total : 0,
        };
    }

    private evict(): void {
        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) return;
            this.entries.delete(oldest.value);
        }
    }
}
