/**
 * @module array/array-factor
 * @description Array factor of a linear array with arbitrary complex excitation
 *
 * AF(u) = Σ w_n · e^{j·k·x_n·u}
 * where x_n is the offset of element n from element 0 along the axis and
 * u = sin θ is the direction cosine measured from broadside.
 *
 * ## References
 * - Balanis, C. A. (2016). Antenna Theory, ch. 6
 * - Van Trees, H. L. (2002). Optimum Array Processing
 */

import { degToRad, wavenumber, wrapPhase } from '../../core/units';
import { ExcitationState } from '../excitation/state';
import type { GeometryModel } from '../geometry/types';
import { cAbs } from '../numeric/math/complex';
import type { Complex, ComplexVector } from '../numeric/math/complex';
import type { Vec3 } from '../numeric/math/linear-algebra';

/**
 * Excitation given as a state or as raw complex weights in physical order
 */
export type Weights = ExcitationState | ComplexVector;

function toWeights(excitation: Weights): ComplexVector {
    return excitation instanceof ExcitationState ? excitation.toComplex() : excitation;
}

/**
 * Complex array factor at direction cosine `u`
 *
 * @example
 * ```typescript
 * const geometry = uniformLinearArray(8, wavelength(3e9) / 2);
 * const af = arrayFactor(geometry, ExcitationState.uniform(geometry), 0, 3e9);
 * // |af| = 8 at broadside
 * ```
 */
export function arrayFactor(
    geometry: GeometryModel,
    excitation: Weights,
    u: number,
    frequencyHz: number
): Complex {
    const w = toWeights(excitation);
    const k = wavenumber(frequencyHz);
    let real = 0;
    let imag = 0;
    geometry.offsets.forEach((x, n) => {
        const psi = k * x * u;
        const c = Math.cos(psi);
        const s = Math.sin(psi);
        real += w.real[n] * c - w.imag[n] * s;
        imag += w.real[n] * s + w.imag[n] * c;
    });
    return { real, imag };
}

/**
 * |AF(u)|
 */
export function arrayFactorMagnitude(
    geometry: GeometryModel,
    excitation: Weights,
    u: number,
    frequencyHz: number
): number {
    return cAbs(arrayFactor(geometry, excitation, u, frequencyHz));
}

/**
 * |AF(u)| in dB relative to Σ|w_n| (the coherent maximum)
 */
export function arrayFactorDb(
    geometry: GeometryModel,
    excitation: Weights,
    u: number,
    frequencyHz: number
): number {
    const w = toWeights(excitation);
    const coherent = w.real.reduce((sum, re, n) => sum + Math.hypot(re, w.imag[n]), 0);
    const af = arrayFactorMagnitude(geometry, excitation, u, frequencyHz);
    return 20 * Math.log10(Math.max(af / coherent, 1e-10));
}

/**
 * Sample |AF|² over angles from broadside
 *
 * @param anglesDeg - Angles from broadside (deg)
 */
export function arrayPowerPattern(
    geometry: GeometryModel,
    excitation: Weights,
    anglesDeg: readonly number[],
    frequencyHz: number
): { anglesDeg: number[]; power: number[] } {
    const power = anglesDeg.map(a => {
        const m = arrayFactorMagnitude(geometry, excitation, Math.sin(degToRad(a)), frequencyHz);
        return m * m;
    });
    return { anglesDeg: [...anglesDeg], power };
}

/**
 * Direction cosine of a canonical (θ, φ) direction onto the array axis
 */
export function directionCosine(thetaDeg: number, phiDeg: number, axis: Readonly<Vec3>): number {
    const theta = degToRad(thetaDeg);
    const phi = degToRad(phiDeg);
    return Math.sin(theta) * Math.cos(phi) * axis[0]
        + Math.sin(theta) * Math.sin(phi) * axis[1]
        + Math.cos(theta) * axis[2];
}

/**
 * Progressive steering phases for a uniform linear array
 *
 * phase(n) = −k·d·n·sin θ₀, wrapped to (−π, π]
 */
export function steeringPhases(count: number, spacingM: number, thetaDeg: number, frequencyHz: number): number[] {
    const beta = -wavenumber(frequencyHz) * spacingM * Math.sin(degToRad(thetaDeg));
    const phases: number[] = [];
    for (let n = 0; n < count; n++) {
        phases.push(wrapPhase(n * beta));
    }
    return phases;
}

/**
 * Check for grating lobes in antenna array
 *
 * @param spacingWavelengths - Element spacing (in wavelengths)
 * @param maxScanDeg - Maximum scan angle from broadside (deg)
 * @returns Whether grating lobes enter visible space
 */
export function hasGratingLobes(spacingWavelengths: number, maxScanDeg: number): boolean {
    const maxSpacing = 1 / (1 + Math.abs(Math.sin(degToRad(maxScanDeg))));
    return spacingWavelengths > maxSpacing;
}
