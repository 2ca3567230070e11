/**
 * @module synthesis/steering
 * @description Closed-form steering and tapering of a uniform linear array
 *
 * phase(n) = −k·d·n·sin θ₀ with d the mean spacing and n the physical index,
 * wrapped to (−π, π].
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import { ValidationError } from '../../core/errors';
import { ExcitationState } from '../excitation/state';
import type { GeometryModel } from '../geometry/types';
import { steeringPhases } from '../array/array-factor';
import { sidelobeTaper } from './taper';
import type { TaperSpec } from './taper';

export interface SteerOptions {
    taper?: TaperSpec;
    maxTaperDynamicRangeDb?: number;
}

function checkAngle(thetaDeg: number): void {
    if (!Number.isFinite(thetaDeg) || Math.abs(thetaDeg) > 90) {
        throw new ValidationError(`Steering angle must lie in [−90°, 90°] from broadside, got ${thetaDeg}°`, { thetaDeg });
    }
}

/**
 * Uniform (or tapered) amplitudes with progressive steering phases
 *
 * @throws SynthesisError when the taper is infeasible
 *
 * @example
 * ```typescript
 * const state = steerToAngle(geometry, 30, 3e9);
 * state.phases; // [0, −π/2, π, π/2, 0] for 5 elements at λ/2
 * ```
 */
export function steerToAngle(
    geometry: GeometryModel,
    thetaDeg: number,
    frequencyHz: number,
    options: SteerOptions = {}
): ExcitationState {
    checkAngle(thetaDeg);
    const phases = steeringPhases(geometry.count, geometry.spacing.mean, thetaDeg, frequencyHz);
    const amplitudes = options.taper
        ? sidelobeTaper(geometry.count, options.taper, {
            spacingWavelengths: geometry.spacingInWavelengths(frequencyHz),
            steerDeg: thetaDeg,
            maxDynamicRangeDb: options.maxTaperDynamicRangeDb ?? DEFAULT_DESIGN_CONFIG.synthesis.maxTaperDynamicRangeDb,
        })
        : geometry.ids.map(() => 1);
    return ExcitationState.fromArrays(geometry, amplitudes, phases);
}

/**
 * Amplitude taper for a sidelobe level, phases steering to `steerDeg`
 */
export function sidelobeExcitation(
    geometry: GeometryModel,
    taper: TaperSpec,
    frequencyHz: number,
    steerDeg: number = 0,
    maxTaperDynamicRangeDb: number = DEFAULT_DESIGN_CONFIG.synthesis.maxTaperDynamicRangeDb
): ExcitationState {
    return steerToAngle(geometry, steerDeg, frequencyHz, { taper, maxTaperDynamicRangeDb });
}
