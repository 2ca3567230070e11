/**
 * @module pattern/angles
 * @description Angle-wrap transforms between raw conventions and the canonical one
 *
 * `toCanonical` and `fromCanonical` are inverses everywhere except at the
 * poles (θ = 0°, 180°), where φ carries no information.
 */

import { PatternError } from '../../core/errors';
import { wrapDeg360 } from '../../core/units';
import type { AngleConvention } from './types';

export interface Direction {
    thetaDeg: number;
    phiDeg: number;
}

const EPS = 1e-9;

function inRange(value: number, low: number, high: number, lowOpen: boolean, highOpen: boolean): boolean {
    const aboveLow = lowOpen ? value > low + EPS : value >= low - EPS;
    const belowHigh = highOpen ? value < high - EPS : value <= high + EPS;
    return aboveLow && belowHigh;
}

/**
 * Check that a raw direction lies in the declared convention's range
 *
 * @throws PatternError when it does not
 */
export function assertConvention(direction: Direction, convention: AngleConvention): void {
    const { thetaDeg, phiDeg } = direction;
    let ok = false;
    switch (convention) {
        case 'canonical':
            ok = inRange(thetaDeg, 0, 180, false, false) && inRange(phiDeg, 0, 360, false, true);
            break;
        case 'symmetricPhi':
            ok = inRange(thetaDeg, 0, 180, false, false) && inRange(phiDeg, -180, 180, true, false);
            break;
        case 'signedTheta':
            ok = inRange(thetaDeg, -180, 180, true, false) && inRange(phiDeg, 0, 180, false, true);
            break;
    }
    if (!ok || !Number.isFinite(thetaDeg) || !Number.isFinite(phiDeg)) {
        throw new PatternError(
            `Direction (θ=${thetaDeg}°, φ=${phiDeg}°) is outside the '${convention}' convention`,
            { thetaDeg, phiDeg, convention }
        );
    }
}

/**
 * Map a raw direction to θ ∈ [0°, 180°], φ ∈ [0°, 360°)
 */
export function toCanonical(direction: Direction, convention: AngleConvention): Direction {
    const { thetaDeg, phiDeg } = direction;
    switch (convention) {
        case 'canonical':
        case 'symmetricPhi':
            return { thetaDeg, phiDeg: wrapDeg360(phiDeg) };
        case 'signedTheta':
            return thetaDeg < 0
                ? { thetaDeg: -thetaDeg, phiDeg: wrapDeg360(phiDeg + 180) }
                : { thetaDeg, phiDeg: wrapDeg360(phiDeg) };
    }
}

/**
 * Map a canonical direction back into `convention`
 */
export function fromCanonical(direction: Direction, convention: AngleConvention): Direction {
    const { thetaDeg } = direction;
    const phiDeg = wrapDeg360(direction.phiDeg);
    switch (convention) {
        case 'canonical':
            return { thetaDeg, phiDeg };
        case 'symmetricPhi':
            return { thetaDeg, phiDeg: phiDeg > 180 ? phiDeg - 360 : phiDeg };
        case 'signedTheta':
            return phiDeg >= 180
                ? { thetaDeg: thetaDeg === 0 || thetaDeg === 180 ? thetaDeg : -thetaDeg, phiDeg: phiDeg - 180 }
                : { thetaDeg, phiDeg };
    }
}

/**
 * |a − b| on the circle, in [0°, 180°]
 */
export function circularDistanceDeg(a: number, b: number): number {
    const d = wrapDeg360(a - b);
    return d > 180 ? 360 - d : d;
}
