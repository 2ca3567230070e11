/**
 * @module array
 * @description Array factor and steering helpers for linear arrays
 */

export type { Weights } from './array-factor';

export {
    arrayFactor,
    arrayFactorMagnitude,
    arrayFactorDb,
    arrayPowerPattern,
    directionCosine,
    steeringPhases,
    hasGratingLobes,
} from './array-factor';
