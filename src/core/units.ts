/**
 * @module core/units
 * @description Unit conversion and the unit-parsing boundary
 *
 * Simulators describe excitations and coordinates as unit-suffixed strings
 * ("1W", "0deg", "50mm", "2.4GHz"). Everything crossing into the core goes
 * through these parsers; the synthesis math only ever sees SI numbers.
 */

import { ValidationError } from './errors';

// ==================== Constants ====================

/** Speed of light in vacuum (m/s) */
export const SPEED_OF_LIGHT = 299_792_458;

/** Multipliers to meters */
const LENGTH_UNITS: Record<string, number> = {
    m: 1,
    meter: 1,
    meters: 1,
    cm: 1e-2,
    mm: 1e-3,
    um: 1e-6,
    in: 0.0254,
    mil: 2.54e-5,
    ft: 0.3048,
};

/** Multipliers to radians */
const ANGLE_UNITS: Record<string, number> = {
    rad: 1,
    deg: Math.PI / 180,
    '°': Math.PI / 180,
};

/** Multipliers to Hz */
const FREQUENCY_UNITS: Record<string, number> = {
    hz: 1,
    khz: 1e3,
    mhz: 1e6,
    ghz: 1e9,
    thz: 1e12,
};

/**
 * Amplitude units. Power amplitudes ('W', 'mW') are converted to the
 * equivalent voltage-like magnitude with sqrt so that all amplitudes share
 * one linear scale.
 */
const AMPLITUDE_UNITS: Record<string, (v: number) => number> = {
    '': v => v,
    v: v => v,
    mv: v => v * 1e-3,
    a: v => v,
    ma: v => v * 1e-3,
    w: v => Math.sqrt(v),
    mw: v => Math.sqrt(v * 1e-3),
};

export type LengthUnit = 'm' | 'cm' | 'mm' | 'um' | 'in' | 'mil' | 'ft';

// ==================== Parsing ====================

/**
 * Parsed numeric quantity with its (lower-cased) unit suffix
 */
export interface ParsedQuantity {
    value: number;
    unit: string;
}

const QUANTITY_PATTERN = /^\s*([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)\s*([a-zA-Z°]*)\s*$/;

/**
 * Split "2.4GHz" into { value: 2.4, unit: 'ghz' }
 *
 * @example
 * ```typescript
 * parseQuantity('0.300rad'); // { value: 0.3, unit: 'rad' }
 * parseQuantity('1.5');      // { value: 1.5, unit: '' }
 * ```
 */
export function parseQuantity(text: string): ParsedQuantity {
    const match = QUANTITY_PATTERN.exec(text);
    if (!match) {
        throw new ValidationError(`Cannot parse quantity "${text}"`, { text });
    }
    return { value: Number(match[1]), unit: match[2].toLowerCase() };
}

function convert(
    input: number | string,
    table: Record<string, number>,
    defaultUnit: string,
    kind: string
): number {
    if (typeof input === 'number') {
        if (!Number.isFinite(input)) {
            throw new ValidationError(`${kind} must be finite`, { value: input });
        }
        return input * table[defaultUnit];
    }
    const { value, unit } = parseQuantity(input);
    const factor = table[unit === '' ? defaultUnit : unit];
    if (factor === undefined) {
        throw new ValidationError(`Unknown ${kind} unit "${unit}" in "${input}"`, { text: input, unit });
    }
    return value * factor;
}

/**
 * Parse a length to meters. Bare numbers use `defaultUnit`.
 */
export function parseLength(input: number | string, defaultUnit: LengthUnit = 'm'): number {
    return convert(input, LENGTH_UNITS, defaultUnit, 'length');
}

/**
 * Parse an angle to radians. Bare numbers use `defaultUnit`.
 */
export function parseAngle(input: number | string, defaultUnit: 'rad' | 'deg' = 'rad'): number {
    return convert(input, ANGLE_UNITS, defaultUnit, 'angle');
}

/**
 * Parse a frequency to Hz. Bare numbers are Hz.
 */
export function parseFrequency(input: number | string): number {
    return convert(input, FREQUENCY_UNITS, 'hz', 'frequency');
}

/**
 * Parse an excitation amplitude to a linear magnitude.
 */
export function parseAmplitude(input: number | string): number {
    if (typeof input === 'number') {
        if (!Number.isFinite(input)) {
            throw new ValidationError('amplitude must be finite', { value: input });
        }
        return input;
    }
    const { value, unit } = parseQuantity(input);
    const toLinear = AMPLITUDE_UNITS[unit];
    if (toLinear === undefined) {
        throw new ValidationError(`Unknown amplitude unit "${unit}" in "${input}"`, { text: input, unit });
    }
    if (value < 0 && (unit === 'w' || unit === 'mw')) {
        throw new ValidationError(`Power amplitude cannot be negative: "${input}"`, { text: input });
    }
    return toLinear(value);
}

// ==================== Conversions ====================

/**
 * Convert linear power to dB
 */
export function linearToDb(linear: number): number {
    if (linear <= 0) {
        throw new ValidationError('Linear value must be positive', { value: linear });
    }
    return 10 * Math.log10(linear);
}

/**
 * Convert dB to linear power
 */
export function dbToLinear(db: number): number {
    return Math.pow(10, db / 10);
}

export function degToRad(deg: number): number {
    return (deg * Math.PI) / 180;
}

export function radToDeg(rad: number): number {
    return (rad * 180) / Math.PI;
}

/**
 * Free-space wavelength (m)
 */
export function wavelength(frequencyHz: number): number {
    if (!(frequencyHz > 0)) {
        throw new ValidationError('Frequency must be positive', { frequencyHz });
    }
    return SPEED_OF_LIGHT / frequencyHz;
}

/**
 * Free-space wavenumber k = 2πf/c (rad/m)
 */
export function wavenumber(frequencyHz: number): number {
    return (2 * Math.PI) / wavelength(frequencyHz);
}

/**
 * Wrap a phase to (−π, π]. Values within 1e-12 of −π map to +π.
 */
export function wrapPhase(phase: number): number {
    if (phase > -Math.PI + 1e-12 && phase <= Math.PI) {
        return phase;
    }
    const twoPi = 2 * Math.PI;
    let r = (((phase + Math.PI) % twoPi) + twoPi) % twoPi - Math.PI;
    if (r <= -Math.PI + 1e-12) {
        r = Math.PI;
    }
    return r;
}

/**
 * Wrap an angle in degrees to [0, 360)
 */
export function wrapDeg360(deg: number): number {
    const r = ((deg % 360) + 360) % 360;
    return r >= 360 ? 0 : r;
}

/**
 * Signed circular difference a − b in degrees, in (−180, 180]
 */
export function angleDifferenceDeg(a: number, b: number): number {
    let d = wrapDeg360(a - b);
    if (d > 180) d -= 360;
    return d;
}
