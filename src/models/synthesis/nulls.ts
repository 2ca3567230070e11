/**
 * @module synthesis/nulls
 * @description Null placement by a constrained linear solve
 *
 * Row i of A holds e^{j·k·x_n·sin θ_i} for element n, so (A·w)_i = AF(θ_i).
 * The first row (main beam) is set to 1, every null row to 0. With M nulls
 * and N elements the system has M + 1 rows and needs M < N:
 * - M + 1 = N: exact solve
 * - M + 1 < N: minimum-norm solve w = A^H (A A^H)^{-1} b
 *
 * Reference: Van Trees, H. L. (2002). Optimum Array Processing, §3.7
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import { ErrorCodes, SynthesisError, ValidationError } from '../../core/errors';
import { degToRad, wavenumber } from '../../core/units';
import { ExcitationState } from '../excitation/state';
import type { GeometryModel } from '../geometry/types';
import { buildMatrix, expj, solveLeastNorm, solveSquare } from '../numeric/math/complex';

export interface NullPlacementOptions {
    /** Direction of the unity-gain constraint (deg from broadside) */
    mainBeamDeg?: number;
    /** Relative pivot threshold for singularity */
    singularityTolerance?: number;
}

/**
 * Excitation with array-factor zeros at `nullsDeg`
 *
 * @throws SynthesisError (OVER_CONSTRAINED) when nulls ≥ elements,
 * (SINGULAR_SYSTEM) when constraints are linearly dependent, e.g. a repeated
 * null or a null on the main beam
 */
export function placeNulls(
    geometry: GeometryModel,
    nullsDeg: readonly number[],
    frequencyHz: number,
    options: NullPlacementOptions = {}
): ExcitationState {
    const mainBeamDeg = options.mainBeamDeg ?? 0;
    const tolerance = options.singularityTolerance ?? DEFAULT_DESIGN_CONFIG.synthesis.singularityTolerance;
    const N = geometry.count;
    const M = nullsDeg.length;

    for (const angle of [mainBeamDeg, ...nullsDeg]) {
        if (!Number.isFinite(angle) || Math.abs(angle) > 90) {
            throw new ValidationError(`Null and beam directions must lie in [−90°, 90°], got ${angle}°`, { angle });
        }
    }

    if (M >= N) {
        throw new SynthesisError(
            ErrorCodes.OVER_CONSTRAINED,
            'nulls',
            `${M} nulls need at least ${M + 1} elements; the array has ${N}`,
            { nulls: M, elements: N, nullsDeg: [...nullsDeg] }
        );
    }

    const k = wavenumber(frequencyHz);
    const directions = [mainBeamDeg, ...nullsDeg];
    const A = buildMatrix(M + 1, N, (row, n) => expj(k * geometry.offsets[n] * Math.sin(degToRad(directions[row]))));
    const b = {
        real: directions.map((_, row) => (row === 0 ? 1 : 0)),
        imag: directions.map(() => 0),
    };

    const solution = M + 1 === N ? solveSquare(A, b, tolerance) : solveLeastNorm(A, b, tolerance);
    if (solution === null) {
        throw new SynthesisError(
            ErrorCodes.SINGULAR_SYSTEM,
            'nulls',
            'Null constraints are linearly dependent (repeated null, a null on the main beam, or grating-lobe aliasing)',
            { nullsDeg: [...nullsDeg], mainBeamDeg, solve: M + 1 === N ? 'exact' : 'leastNorm' }
        );
    }

    return ExcitationState.fromComplex(geometry, solution);
}
