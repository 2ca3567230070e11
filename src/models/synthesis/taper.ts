/**
 * @module synthesis/taper
 * @description Amplitude tapers for a requested sidelobe level
 *
 * - Dolph-Chebyshev: equiripple sidelobes at exactly the requested level,
 *   computed by the DFT of the Chebyshev polynomial sampled on the unit circle
 * - Taylor n-bar: the first n̄ − 1 sidelobes near the requested level,
 *   decaying beyond
 *
 * ## References
 * - Dolph, C. L. (1946). A current distribution for broadside arrays.
 *   Proc. IRE, 34(6), 335-348
 * - Taylor, T. T. (1955). Design of line-source antennas for narrow
 *   beamwidth and low side lobes. IRE Trans. Antennas Propag., 3(1), 16-28
 */

import type { TaperMethod } from '../../core/config';
import { ErrorCodes, SynthesisError } from '../../core/errors';
import { degToRad } from '../../core/units';

export interface TaperSpec {
    /** Requested sidelobe level relative to the main beam (dB, < 0) */
    levelDb: number;
    method?: TaperMethod;
    /** Taylor n̄; defaults to max(4, ⌈2A² + 0.5⌉) */
    nbar?: number;
}

/**
 * Array context the feasibility checks depend on
 */
export interface TaperContext {
    spacingWavelengths: number;
    /** Steering angle from broadside (deg) */
    steerDeg: number;
    maxDynamicRangeDb: number;
}

/**
 * Dolph-Chebyshev weights, symmetric, peak 1
 *
 * @param count - Number of elements (≥ 2)
 * @param levelDb - Sidelobe level (dB); the sign is ignored
 */
export function chebyshevWeights(count: number, levelDb: number): number[] {
    const order = count - 1;
    const ratio = Math.pow(10, Math.abs(levelDb) / 20);
    const beta = Math.cosh(Math.acosh(ratio) / order);

    // Chebyshev polynomial T_order sampled at beta·cos(πk/N)
    const p: number[] = [];
    for (let k = 0; k < count; k++) {
        const x = beta * Math.cos((Math.PI * k) / count);
        if (x > 1) {
            p.push(Math.cosh(order * Math.acosh(x)));
        } else if (x < -1) {
            p.push((2 * (count % 2) - 1) * Math.cosh(order * Math.acosh(-x)));
        } else {
            p.push(Math.cos(order * Math.acos(x)));
        }
    }

    // Real part of the DFT; even lengths get a half-sample shift first
    const shift = count % 2 === 1 ? 0 : Math.PI / count;
    const dft = (m: number): number => {
        let sum = 0;
        for (let k = 0; k < count; k++) {
            sum += p[k] * Math.cos(shift * k - (2 * Math.PI * k * m) / count);
        }
        return sum;
    };

    let w: number[];
    if (count % 2 === 1) {
        const half = (count + 1) / 2;
        const right: number[] = [];
        for (let m = 0; m < half; m++) right.push(dft(m));
        w = [...right.slice(1).reverse(), ...right];
    } else {
        const half = count / 2 + 1;
        const right: number[] = [];
        for (let m = 1; m < half; m++) right.push(dft(m));
        w = [...[...right].reverse(), ...right];
    }

    const peak = Math.max(...w);
    return w.map(v => v / peak);
}

/**
 * Default Taylor n̄ for a sidelobe level
 */
export function defaultTaylorNbar(levelDb: number): number {
    const A = Math.acosh(Math.pow(10, Math.abs(levelDb) / 20)) / Math.PI;
    return Math.max(4, Math.ceil(2 * A * A + 0.5));
}

/**
 * Taylor n-bar weights, symmetric, peak 1
 */
export function taylorWeights(count: number, levelDb: number, nbar: number = defaultTaylorNbar(levelDb)): number[] {
    const B = Math.pow(10, Math.abs(levelDb) / 20);
    const A = Math.acosh(B) / Math.PI;
    const s2 = (nbar * nbar) / (A * A + (nbar - 0.5) * (nbar - 0.5));

    const Fm: number[] = [];
    for (let m = 1; m < nbar; m++) {
        let numer = m % 2 === 1 ? 1 : -1;
        for (let i = 1; i < nbar; i++) {
            numer *= 1 - (m * m) / s2 / (A * A + (i - 0.5) * (i - 0.5));
        }
        let denom = 2;
        for (let i = 1; i < nbar; i++) {
            if (i !== m) denom *= 1 - (m * m) / (i * i);
        }
        Fm.push(numer / denom);
    }

    const weight = (n: number): number => {
        let sum = 1;
        Fm.forEach((f, idx) => {
            const m = idx + 1;
            sum += 2 * f * Math.cos((2 * Math.PI * m * (n - count / 2 + 0.5)) / count);
        });
        return sum;
    };

    const w: number[] = [];
    for (let n = 0; n < count; n++) w.push(weight(n));
    const peak = Math.max(...w);
    return w.map(v => v / peak);
}

/**
 * Taper amplitudes for a sidelobe level, with feasibility checks
 *
 * @throws SynthesisError (INFEASIBLE) when the level is not below 0 dB, the
 * array has fewer than 3 elements, the main lobe does not fit in visible
 * space, a weight would be negative, or the amplitude dynamic range exceeds
 * `maxDynamicRangeDb`
 */
export function sidelobeTaper(count: number, spec: TaperSpec, context: TaperContext): number[] {
    const { levelDb } = spec;
    const method = spec.method ?? 'chebyshev';
    const fail = (message: string, details: Record<string, unknown>): never => {
        throw new SynthesisError(ErrorCodes.INFEASIBLE, 'sidelobe', message, { levelDb, count, method, ...details });
    };

    if (!Number.isFinite(levelDb) || levelDb >= 0) {
        fail(`Sidelobe level must be below 0 dB, got ${levelDb} dB`, {});
    }
    if (count < 3) {
        fail(`A ${count}-element array has no sidelobes to shape`, {});
    }

    // Main-lobe half width in ψ for the equivalent Chebyshev design must fit
    // between the beam and the nearer end of visible space
    const ratio = Math.pow(10, -levelDb / 20);
    const x0 = Math.cosh(Math.acosh(ratio) / (count - 1));
    const mainLobeHalfWidth = 2 * Math.acos(1 / x0);
    const visibleMargin = 2 * Math.PI * context.spacingWavelengths * (1 - Math.abs(Math.sin(degToRad(context.steerDeg))));
    if (mainLobeHalfWidth >= visibleMargin) {
        fail(
            `${levelDb} dB is too low for ${count} elements at ${context.spacingWavelengths.toFixed(3)} λ ` +
            `steered to ${context.steerDeg}°: the main lobe does not fit in visible space`,
            { mainLobeHalfWidth, visibleMargin, spacingWavelengths: context.spacingWavelengths, steerDeg: context.steerDeg }
        );
    }

    const raw = method === 'chebyshev'
        ? chebyshevWeights(count, levelDb)
        : taylorWeights(count, levelDb, spec.nbar);

    const negative = raw.map((w, n) => ({ w, n })).filter(({ w }) => w < -1e-12);
    if (negative.length > 0) {
        fail(`${method} taper for ${levelDb} dB needs negative weights`, { elements: negative.map(({ n }) => n) });
    }
    const weights = raw.map(w => Math.max(0, w));

    const smallest = Math.min(...weights);
    const dynamicRangeDb = smallest > 0 ? 20 * Math.log10(1 / smallest) : Infinity;
    if (dynamicRangeDb > context.maxDynamicRangeDb) {
        fail(
            `${method} taper for ${levelDb} dB spans ${dynamicRangeDb.toFixed(1)} dB of amplitude ` +
            `(limit ${context.maxDynamicRangeDb} dB)`,
            { dynamicRangeDb, limit: context.maxDynamicRangeDb }
        );
    }
    return weights;
}
