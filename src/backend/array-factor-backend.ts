/**
 * @module backend/array-factor-backend
 * @description In-process reference simulator: array factor times an element pattern
 *
 * gain(θ, φ) = |AF(u)·EF(θ, φ)|² / Σ a_n², u = direction cosine onto the array axis.
 * A uniform broadside array of N isotropic elements peaks at N.
 */

import { SeededRandom } from '../core/config';
import { degToRad } from '../core/units';
import type { ExcitationState } from '../models/excitation/state';
import type { GeometryModel } from '../models/geometry/types';
import { arrayFactorMagnitude, directionCosine } from '../models/array/array-factor';
import { fromCanonical } from '../models/pattern/angles';
import type { AngleConvention, RawPatternData, RawSample, ValueUnits } from '../models/pattern/types';
import type { Vec3 } from '../models/numeric/math/linear-algebra';
import type { BackendConcurrency, SimulationBackend } from './types';

/**
 * Element pattern: isotropic, or cos^q of the angle from `boresight`
 * (zero in the back hemisphere)
 */
export type ElementPattern =
    | { kind: 'isotropic' }
    | { kind: 'cosine'; exponent: number; boresight?: Vec3 };

export interface ArrayFactorBackendOptions {
    elementPattern?: ElementPattern;
    /** θ grid step (deg), θ ∈ [0, 180] */
    thetaStepDeg?: number;
    /** Canonical φ planes sampled (deg) */
    phiDeg?: number[];
    /** Convention of the returned angles */
    convention?: AngleConvention;
    units?: ValueUnits;
    /** Gaussian noise on every sample (dB standard deviation) */
    noiseStdDb?: number;
    seed?: number;
    /** Simulated latency of each call (ms) */
    delayMs?: number;
    concurrency?: BackendConcurrency;
}

const FLOOR = 1e-30;

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export class ArrayFactorBackend implements SimulationBackend {
    readonly concurrency: BackendConcurrency;
    private readonly elementPattern: ElementPattern;
    private readonly thetaStepDeg: number;
    private readonly phiDeg: number[];
    private readonly convention: AngleConvention;
    private readonly units: ValueUnits;
    private readonly noiseStdDb: number;
    private readonly delayMs: number;
    private readonly rng: SeededRandom;
    private current: ExcitationState | null = null;
    private applies = 0;
    private samples = 0;

    constructor(readonly geometry: GeometryModel, options: ArrayFactorBackendOptions = {}) {
        this.elementPattern = options.elementPattern ?? { kind: 'isotropic' };
        this.thetaStepDeg = options.thetaStepDeg ?? 1;
        this.phiDeg = options.phiDeg ?? [0, 90, 180, 270];
        this.convention = options.convention ?? 'canonical';
        this.units = options.units ?? 'linear';
        this.noiseStdDb = options.noiseStdDb ?? 0;
        this.delayMs = options.delayMs ?? 0;
        this.concurrency = options.concurrency ?? 'exclusive';
        this.rng = new SeededRandom(options.seed ?? 42);

        const steps = 180 / this.thetaStepDeg;
        if (!(this.thetaStepDeg > 0) || Math.abs(steps - Math.round(steps)) > 1e-9) {
            throw new Error(`thetaStepDeg must divide 180, got ${this.thetaStepDeg}`);
        }
    }

    async apply(excitation: ExcitationState): Promise<void> {
        if (excitation.count !== this.geometry.count) {
            throw new Error(`Excitation has ${excitation.count} elements, geometry has ${this.geometry.count}`);
        }
        if (this.delayMs > 0) await delay(this.delayMs);
        this.applies++;
        this.current = excitation;
    }

    async samplePattern(frequencyHz: number, quantity: string): Promise<RawPatternData> {
        if (quantity !== 'gain' && quantity !== 'field') {
            throw new Error(`Unknown quantity "${quantity}"`);
        }
        const excitation = this.current;
        if (excitation === null) {
            throw new Error('No excitation applied');
        }
        if (this.delayMs > 0) await delay(this.delayMs);
        this.samples++;

        const power = quantity === 'gain';
        const norm = excitation.amplitudes.reduce((sum, a) => sum + a * a, 0);
        const steps = Math.round(180 / this.thetaStepDeg);
        const samples: RawSample[] = [];

        for (const phi of this.phiDeg) {
            for (let i = 0; i <= steps; i++) {
                const theta = i * this.thetaStepDeg;
                const u = directionCosine(theta, phi, this.geometry.axisDirection);
                const field = arrayFactorMagnitude(this.geometry, excitation, u, frequencyHz) * this.elementField(theta, phi);
                let value = power ? (norm > 0 ? (field * field) / norm : 0) : field;
                if (this.noiseStdDb > 0) {
                    value *= Math.pow(10, this.rng.normal(0, this.noiseStdDb) / (power ? 10 : 20));
                }
                if (this.units === 'dB') {
                    value = (power ? 10 : 20) * Math.log10(Math.max(value, FLOOR));
                }
                const direction = fromCanonical({ thetaDeg: theta, phiDeg: phi }, this.convention);
                samples.push({ frequencyHz, thetaDeg: direction.thetaDeg, phiDeg: direction.phiDeg, value });
            }
        }

        return {
            quantity,
            convention: this.convention,
            units: this.units,
            scale: power ? 'power' : 'field',
            samples,
        };
    }

    /** Calls served so far */
    get counters(): { applies: number; samples: number } {
        return { applies: this.applies, samples: this.samples };
    }

    private elementField(thetaDeg: number, phiDeg: number): number {
        if (this.elementPattern.kind === 'isotropic') return 1;
        const b = this.elementPattern.boresight ?? [0, 0, 1];
        const theta = degToRad(thetaDeg);
        const phi = degToRad(phiDeg);
        const cosGamma = Math.sin(theta) * Math.cos(phi) * b[0]
            + Math.sin(theta) * Math.sin(phi) * b[1]
            + Math.cos(theta) * b[2];
        return cosGamma > 0 ? Math.pow(cosGamma, this.elementPattern.exponent) : 0;
    }
}
