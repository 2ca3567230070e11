/**
 * @module pattern/types
 * @description Far-field samples, normalized datasets and 1-D cuts
 */

import type { PatternScale } from '../../core/config';

/**
 * Angle convention of raw samples
 *
 * - `canonical`: θ ∈ [0°, 180°], φ ∈ [0°, 360°)
 * - `symmetricPhi`: θ ∈ [0°, 180°], φ ∈ (−180°, 180°]
 * - `signedTheta`: θ ∈ (−180°, 180°], φ ∈ [0°, 180°)
 */
export type AngleConvention = 'canonical' | 'symmetricPhi' | 'signedTheta';

/**
 * Units of raw values
 */
export type ValueUnits = 'linear' | 'dB';

/**
 * One far-field sample (angles in degrees)
 */
export interface PatternSample {
    frequencyHz: number;
    /** Azimuth φ */
    phiDeg: number;
    /** Polar angle θ */
    thetaDeg: number;
    value: number;
}

/**
 * Raw sample as returned by a backend; `quantity` may be set per sample
 */
export interface RawSample extends PatternSample {
    quantity?: string;
}

/**
 * Raw far-field data returned by a simulation backend
 */
export interface RawPatternData {
    /** Quantity name, e.g. 'gain' */
    quantity: string;
    convention: AngleConvention;
    units: ValueUnits;
    /** 'power' (gain, directivity) or 'field' (|E|); defaults to the metrics scale */
    scale?: PatternScale;
    samples: RawSample[];
}

/**
 * Fixed-angle slice selector
 */
export type CutSpec =
    | { kind: 'phi'; phiDeg: number }
    | { kind: 'theta'; thetaDeg: number };

/**
 * Ordered 1-D cut of a pattern at a single frequency
 *
 * Values are linear. For a φ-cut, angles run over the full great circle
 * (θ on the φ half, 360° − θ on the φ + 180° half); for a θ-cut they are φ.
 * A `circular` cut covers the whole circle; an open cut is presented as one
 * contiguous, increasing window that may start below 0°.
 */
export interface PatternCut {
    anglesDeg: number[];
    values: number[];
    circular: boolean;
    scale: PatternScale;
    quantity: string;
    frequencyHz: number;
    spec: CutSpec;
}

/**
 * Normalized samples at canonical angles, one quantity, sorted by
 * (frequency, φ, θ). Never mutated; filtering returns a new dataset.
 */
export class PatternDataset {
    readonly quantity: string;
    readonly scale: PatternScale;
    readonly samples: readonly Readonly<PatternSample>[];

    constructor(quantity: string, scale: PatternScale, samples: readonly PatternSample[]) {
        this.quantity = quantity;
        this.scale = scale;
        this.samples = Object.freeze(samples.map(s => Object.freeze({ ...s })));
    }

    get size(): number {
        return this.samples.length;
    }

    /** Distinct frequencies, ascending */
    get frequencies(): number[] {
        return [...new Set(this.samples.map(s => s.frequencyHz))].sort((a, b) => a - b);
    }

    /**
     * Dataset restricted to the samples matching `predicate`
     */
    filter(predicate: (sample: Readonly<PatternSample>) => boolean): PatternDataset {
        return new PatternDataset(this.quantity, this.scale, this.samples.filter(predicate));
    }
}
