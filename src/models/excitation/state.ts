/**
 * @module excitation/state
 * @description Immutable per-element complex excitation
 *
 * Amplitudes are linear and ≥ 0; phases are radians in (−π, π].
 * Keys always match the geometry's element ids exactly. A state is never
 * edited in place: every change returns a new state.
 */

import { contentHash } from '../../core/config';
import { ErrorCodes, ExcitationError } from '../../core/errors';
import { wrapPhase } from '../../core/units';
import { cAbs, cArg, cMul, complex, expj, fromPolar } from '../numeric/math/complex';
import type { ComplexVector } from '../numeric/math/complex';
import type { GeometryModel } from '../geometry/types';

/**
 * Amplitude and phase of one element
 */
export interface ElementExcitation {
    /** Linear amplitude (≥ 0) */
    amplitude: number;
    /** Phase in radians */
    phase: number;
}

/** Digits kept when hashing, so float noise below it does not split cache entries */
const HASH_PRECISION = 1e-9;

function quantize(value: number): string {
    const q = Math.round(value / HASH_PRECISION) * HASH_PRECISION;
    return (Object.is(q, -0) ? 0 : q).toFixed(9);
}

function checkValue(id: string, value: ElementExcitation): ElementExcitation {
    if (!Number.isFinite(value.amplitude) || value.amplitude < 0) {
        throw new ExcitationError(
            ErrorCodes.INVALID_EXCITATION,
            `Element "${id}" has invalid amplitude ${value.amplitude}; amplitudes must be finite and ≥ 0`,
            [id],
            { elementId: id, amplitude: value.amplitude }
        );
    }
    if (!Number.isFinite(value.phase)) {
        throw new ExcitationError(
            ErrorCodes.INVALID_EXCITATION,
            `Element "${id}" has non-finite phase ${value.phase}`,
            [id],
            { elementId: id, phase: value.phase }
        );
    }
    return { amplitude: value.amplitude, phase: wrapPhase(value.phase) };
}

/**
 * Excitation of every element of a geometry
 *
 * @example
 * ```typescript
 * const uniform = ExcitationState.uniform(geometry);
 * const tilted = uniform.withElement('E1', { amplitude: 0.5, phase: Math.PI / 2 });
 * uniform.get('E1').amplitude; // still 1
 * ```
 */
export class ExcitationState {
    /** Element ids in physical order */
    readonly ids: readonly string[];
    private readonly values: ReadonlyMap<string, ElementExcitation>;

    private constructor(ids: readonly string[], values: Map<string, ElementExcitation>) {
        this.ids = Object.freeze([...ids]);
        this.values = values;
    }

    /**
     * Build a state from a per-id mapping
     *
     * @throws ExcitationError when ids are missing or extra, or a value is invalid
     */
    static create(
        geometry: GeometryModel,
        values: Readonly<Record<string, ElementExcitation>>
    ): ExcitationState {
        const provided = new Map(Object.entries(values));

        const missing = geometry.ids.filter(id => !provided.has(id));
        const extra = [...provided.keys()].filter(id => !geometry.has(id));
        if (missing.length > 0 || extra.length > 0) {
            throw new ExcitationError(
                ErrorCodes.EXCITATION_MISMATCH,
                `Excitation does not match the geometry (missing: [${missing.join(', ')}], extra: [${extra.join(', ')}])`,
                [...missing, ...extra],
                { missing, extra }
            );
        }

        const map = new Map<string, ElementExcitation>();
        for (const [id, value] of provided) {
            map.set(id, checkValue(id, value));
        }
        return new ExcitationState(geometry.ids, map);
    }

    /**
     * Equal amplitude and zero phase on every element
     */
    static uniform(geometry: GeometryModel, amplitude: number = 1): ExcitationState {
        return ExcitationState.fromArrays(geometry, geometry.ids.map(() => amplitude), geometry.ids.map(() => 0));
    }

    /**
     * Build a state from amplitude and phase arrays in physical order
     */
    static fromArrays(geometry: GeometryModel, amplitudes: readonly number[], phases: readonly number[]): ExcitationState {
        if (amplitudes.length !== geometry.count || phases.length !== geometry.count) {
            throw new ExcitationError(
                ErrorCodes.EXCITATION_MISMATCH,
                `Expected ${geometry.count} amplitudes and phases, got ${amplitudes.length} and ${phases.length}`,
                [],
                { expected: geometry.count, amplitudes: amplitudes.length, phases: phases.length }
            );
        }
        const map = new Map<string, ElementExcitation>();
        geometry.ids.forEach((id, n) => {
            map.set(id, checkValue(id, { amplitude: amplitudes[n], phase: phases[n] }));
        });
        return new ExcitationState(geometry.ids, map);
    }

    /**
     * Build a state from complex weights in physical order.
     * The largest amplitude is scaled to 1 and phases are referenced to element 0
     * (or to the first non-zero element when element 0 is off).
     */
    static fromComplex(geometry: GeometryModel, weights: ComplexVector): ExcitationState {
        const n = weights.real.length;
        const magnitudes = weights.real.map((re, i) => Math.hypot(re, weights.imag[i]));
        const peak = Math.max(0, ...magnitudes);
        if (!(peak > 0)) {
            throw new ExcitationError(
                ErrorCodes.INVALID_EXCITATION,
                'All complex weights are zero',
                [],
                { count: n }
            );
        }
        const referenceIndex = magnitudes.findIndex(m => m > 0);
        const reference = expj(-cArg(complex(weights.real[referenceIndex], weights.imag[referenceIndex])));

        const amplitudes: number[] = [];
        const phases: number[] = [];
        for (let i = 0; i < n; i++) {
            const w = cMul(complex(weights.real[i], weights.imag[i]), reference);
            amplitudes.push(cAbs(w) / peak);
            phases.push(magnitudes[i] > 0 ? cArg(w) : 0);
        }
        return ExcitationState.fromArrays(geometry, amplitudes, phases);
    }

    /** Number of elements */
    get count(): number {
        return this.ids.length;
    }

    /**
     * Excitation of one element
     *
     * @throws ExcitationError for an unknown id
     */
    get(id: string): ElementExcitation {
        const value = this.values.get(id);
        if (value === undefined) {
            throw new ExcitationError(ErrorCodes.EXCITATION_MISMATCH, `Unknown element "${id}"`, [id]);
        }
        return { ...value };
    }

    /** Amplitudes in physical order */
    get amplitudes(): number[] {
        return this.ids.map(id => this.get(id).amplitude);
    }

    /** Phases (rad) in physical order */
    get phases(): number[] {
        return this.ids.map(id => this.get(id).phase);
    }

    /**
     * Complex weights a·e^{jφ} in physical order
     */
    toComplex(): ComplexVector {
        const real: number[] = [];
        const imag: number[] = [];
        for (const id of this.ids) {
            const { amplitude, phase } = this.get(id);
            const w = fromPolar(amplitude, phase);
            real.push(w.real);
            imag.push(w.imag);
        }
        return { real, imag };
    }

    /**
     * New state with one element replaced
     */
    withElement(id: string, value: ElementExcitation): ExcitationState {
        if (!this.values.has(id)) {
            throw new ExcitationError(ErrorCodes.EXCITATION_MISMATCH, `Unknown element "${id}"`, [id]);
        }
        const map = new Map(this.values);
        map.set(id, checkValue(id, value));
        return new ExcitationState(this.ids, map);
    }

    /**
     * New state with every amplitude multiplied by `factor`
     */
    scaled(factor: number): ExcitationState {
        const map = new Map<string, ElementExcitation>();
        for (const id of this.ids) {
            const { amplitude, phase } = this.get(id);
            map.set(id, checkValue(id, { amplitude: amplitude * factor, phase }));
        }
        return new ExcitationState(this.ids, map);
    }

    /**
     * New state with the largest amplitude scaled to 1
     */
    normalized(): ExcitationState {
        const peak = Math.max(...this.amplitudes);
        if (!(peak > 0)) return this;
        // Divide rather than scale by 1/peak so the peak lands on exactly 1
        const map = new Map<string, ElementExcitation>();
        for (const id of this.ids) {
            const { amplitude, phase } = this.get(id);
            map.set(id, { amplitude: amplitude / peak, phase });
        }
        return new ExcitationState(this.ids, map);
    }

    /**
     * Stable hash of the content, insensitive to float noise below 1e-9
     */
    contentHash(): string {
        const canonical = this.ids
            .map(id => {
                const { amplitude, phase } = this.get(id);
                return `${id}=${quantize(amplitude)}/${quantize(phase)}`;
            })
            .join(';');
        return contentHash(canonical);
    }

    /**
     * Same ids with amplitudes and phases equal within `tolerance`
     * (phases compared on the circle)
     */
    equals(other: ExcitationState, tolerance: number = 1e-12): boolean {
        if (other.count !== this.count) return false;
        return this.ids.every(id => {
            if (!other.values.has(id)) return false;
            const a = this.get(id);
            const b = other.get(id);
            return Math.abs(a.amplitude - b.amplitude) <= tolerance
                && Math.abs(wrapPhase(a.phase - b.phase)) <= tolerance;
        });
    }

    /**
     * Flat id → { amplitude, phase } mapping in physical order
     */
    toRecord(): Record<string, ElementExcitation> {
        const record: Record<string, ElementExcitation> = {};
        for (const id of this.ids) {
            record[id] = this.get(id);
        }
        return record;
    }
}
