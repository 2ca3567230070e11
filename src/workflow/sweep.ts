/**
 * @module workflow/sweep
 * @description Independent design chains over several steering angles
 *
 * Chains run concurrently up to `concurrency`; an exclusive backend is still
 * serialized by the simulator's lock, and results come back in input order.
 * After a chain fails no further angle is started; chains already in flight
 * finish, then the sweep rejects with the first failure.
 */

import { ValidationError } from '../core/errors';
import type { TaperSpec } from '../models/synthesis/taper';
import { runDesignChain } from './chain';
import type { DesignChainContext, DesignChainRequest, DesignChainResult, DesignTargets } from './chain';

export interface SweepRequest extends Omit<DesignChainRequest, 'objective' | 'targets'> {
    anglesDeg: number[];
    taper?: TaperSpec;
    targets?: Omit<DesignTargets, 'steeringDeg'>;
    /** Chains in flight at once (default 2) */
    concurrency?: number;
}

export interface SweepEntry {
    angleDeg: number;
    result: DesignChainResult;
}

export async function sweepSteeringAngles(
    request: SweepRequest,
    context: DesignChainContext
): Promise<SweepEntry[]> {
    const { anglesDeg, taper, targets, concurrency = 2, ...shared } = request;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ValidationError(`Concurrency must be a positive integer, got ${concurrency}`, { concurrency });
    }

    const entries = new Array<SweepEntry | undefined>(anglesDeg.length);
    let next = 0;
    const failures: unknown[] = [];

    const worker = async (): Promise<void> => {
        while (failures.length === 0 && next < anglesDeg.length) {
            const index = next++;
            const angleDeg = anglesDeg[index];
            try {
                const result = await runDesignChain(
                    { ...shared, objective: { kind: 'steer', thetaDeg: angleDeg, taper }, targets },
                    context
                );
                entries[index] = { angleDeg, result };
            } catch (error) {
                failures.push(error);
            }
        }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(concurrency, anglesDeg.length); i++) {
        workers.push(worker());
    }
    await Promise.all(workers);
    if (failures.length > 0) {
        throw failures[0];
    }

    return entries.filter((entry): entry is SweepEntry => entry !== undefined);
}
