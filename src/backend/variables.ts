/**
 * @module backend/variables
 * @description Per-element design variables exchanged with a simulator
 *
 * Element n (physical order) is written as `Amp{n}` = "<linear>V" and
 * `Phase{n}` = "<radians>rad". Parsing goes through `core/units`, so "1W",
 * "30deg" or bare numbers are accepted on the way back.
 */

import { ErrorCodes, ExcitationError, isBeamsmithError } from '../core/errors';
import { parseAmplitude, parseAngle } from '../core/units';
import { ExcitationState } from '../models/excitation/state';
import type { GeometryModel } from '../models/geometry/types';

export type DesignVariables = Record<string, string>;

const SIGNIFICANT_DIGITS = 12;

function format(value: number): string {
    return String(Number(value.toPrecision(SIGNIFICANT_DIGITS)));
}

/**
 * @example
 * ```typescript
 * excitationToVariables(state); // { Amp0: '1V', Phase0: '0rad', Amp1: '0.5V', Phase1: '-1.5707963268rad' }
 * ```
 */
export function excitationToVariables(state: ExcitationState): DesignVariables {
    const variables: DesignVariables = {};
    const { amplitudes, phases } = state;
    amplitudes.forEach((amplitude, n) => {
        variables[`Amp${n}`] = `${format(amplitude)}V`;
        variables[`Phase${n}`] = `${format(phases[n])}rad`;
    });
    return variables;
}

function read(variables: Readonly<DesignVariables>, name: string, geometry: GeometryModel, n: number): string {
    const value = variables[name];
    if (value === undefined) {
        const id = geometry.ids[n];
        throw new ExcitationError(ErrorCodes.EXCITATION_MISMATCH, `Missing variable "${name}" for element "${id}"`, [id], {
            variable: name,
        });
    }
    return value;
}

/**
 * Parse `Amp{n}`/`Phase{n}` variables into an excitation over `geometry`
 *
 * @throws ExcitationError for missing or unparseable variables
 */
export function variablesToExcitation(variables: Readonly<DesignVariables>, geometry: GeometryModel): ExcitationState {
    const amplitudes: number[] = [];
    const phases: number[] = [];
    for (let n = 0; n < geometry.count; n++) {
        const amp = read(variables, `Amp${n}`, geometry, n);
        const phase = read(variables, `Phase${n}`, geometry, n);
        try {
            amplitudes.push(parseAmplitude(amp));
            phases.push(parseAngle(phase, 'rad'));
        } catch (error) {
            if (isBeamsmithError(error)) {
                const id = geometry.ids[n];
                throw new ExcitationError(ErrorCodes.INVALID_EXCITATION, `Element "${id}": ${error.message}`, [id], {
                    amplitude: amp,
                    phase,
                });
            }
            throw error;
        }
    }
    return ExcitationState.fromArrays(geometry, amplitudes, phases);
}
