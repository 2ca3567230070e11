/**
 * @module metrics/calculator
 * @description Figures of merit of a single pattern cut
 *
 * Values are converted to dB (10·log10 for power cuts, 20·log10 for field
 * cuts) and clipped to `dbFloor` below the peak, so zero gain never yields −∞.
 *
 * ## Metrics
 * - Peak: first maximum in ascending angle order
 * - HPBW: −3 dB crossings either side of the peak, linear interpolation in dB
 * - Sidelobe level: maximum outside a window of HPBW × multiplier centered
 *   on the peak, relative to the peak; `null` when nothing lies outside
 * - Front-to-back: peak minus the (interpolated) value 180° away
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import type { MetricsConfig } from '../../core/config';
import { MetricsError } from '../../core/errors';
import { angleDifferenceDeg, wrapDeg360 } from '../../core/units';
import { circularDistanceDeg } from '../pattern/angles';
import type { PatternCut } from '../pattern/types';

/** Half-power threshold below the peak (dB) */
export const HALF_POWER_DB = 3;

export interface PeakInfo {
    index: number;
    angleDeg: number;
    /** Linear value */
    value: number;
    valueDb: number;
}

export interface HalfPowerPoints {
    /** Angle of the crossing before the peak */
    lowerDeg: number;
    /** Angle of the crossing after the peak */
    upperDeg: number;
    widthDeg: number;
}

/**
 * All metrics of a cut; undefined ones are null and explained in `issues`
 */
export interface MetricsSummary {
    peak: PeakInfo;
    hpbwDeg: number | null;
    sidelobeLevelDb: number | null;
    frontToBackDb: number | null;
    issues: string[];
}

interface Bracket {
    lower: number;
    upper: number;
    /** Fraction of the way from lower to upper */
    t: number;
}

export class MetricsCalculator {
    readonly dbFloor: number;
    readonly sidelobeWindowMultiplier: number;

    constructor(options: Partial<Pick<MetricsConfig, 'dbFloor' | 'sidelobeWindowMultiplier'>> = {}) {
        this.dbFloor = options.dbFloor ?? DEFAULT_DESIGN_CONFIG.metrics.dbFloor;
        this.sidelobeWindowMultiplier = options.sidelobeWindowMultiplier
            ?? DEFAULT_DESIGN_CONFIG.metrics.sidelobeWindowMultiplier;
    }

    /**
     * Cut values in dB, clipped to `dbFloor` below the peak
     *
     * @throws MetricsError when the cut is identically zero
     */
    toDb(cut: PatternCut): number[] {
        const factor = cut.scale === 'power' ? 10 : 20;
        const raw = cut.values.map(v => (v > 0 ? factor * Math.log10(v) : -Infinity));
        const peakDb = Math.max(...raw);
        if (!Number.isFinite(peakDb)) {
            throw new MetricsError('peak', 'Pattern is zero everywhere in the cut', { quantity: cut.quantity });
        }
        const floor = peakDb + this.dbFloor;
        return raw.map(db => Math.max(db, floor));
    }

    /**
     * Maximum of the cut; ties go to the first in ascending angle order
     */
    peak(cut: PatternCut): PeakInfo {
        const db = this.toDb(cut);
        let index = 0;
        for (let i = 1; i < db.length; i++) {
            if (db[i] > db[index]) index = i;
        }
        return { index, angleDeg: cut.anglesDeg[index], value: cut.values[index], valueDb: db[index] };
    }

    /**
     * −3 dB crossings on both sides of the peak
     *
     * @throws MetricsError when the pattern does not drop 3 dB on either side
     */
    halfPowerPoints(cut: PatternCut): HalfPowerPoints {
        const db = this.toDb(cut);
        const peak = this.peak(cut);
        const threshold = peak.valueDb - HALF_POWER_DB;

        const upper = this.walkToThreshold(cut, db, peak.index, threshold, 1);
        const lower = this.walkToThreshold(cut, db, peak.index, threshold, -1);
        if (upper === null || lower === null) {
            throw new MetricsError(
                'hpbw',
                `Pattern never drops ${HALF_POWER_DB} dB below the peak at ${peak.angleDeg}° ` +
                `on the ${upper === null ? 'upper' : 'lower'} side of the cut`,
                { peakDeg: peak.angleDeg, peakDb: peak.valueDb, circular: cut.circular }
            );
        }
        return { lowerDeg: peak.angleDeg - lower, upperDeg: peak.angleDeg + upper, widthDeg: lower + upper };
    }

    /**
     * Half-power beamwidth (deg)
     */
    halfPowerBeamwidth(cut: PatternCut): number {
        return this.halfPowerPoints(cut).widthDeg;
    }

    /**
     * Angular distance from the peak to the threshold crossing in one direction,
     * or null when the walk runs out of samples
     */
    private walkToThreshold(
        cut: PatternCut,
        db: number[],
        start: number,
        threshold: number,
        direction: 1 | -1
    ): number | null {
        const n = db.length;
        const steps = cut.circular ? n - 1 : direction === 1 ? n - 1 - start : start;
        let previous = start;
        let offset = 0;
        for (let s = 1; s <= steps; s++) {
            const current = ((start + direction * s) % n + n) % n;
            const delta = cut.circular
                ? wrapDeg360(direction * (cut.anglesDeg[current] - cut.anglesDeg[previous]))
                : Math.abs(cut.anglesDeg[current] - cut.anglesDeg[previous]);
            if (db[current] <= threshold) {
                const span = db[previous] - db[current];
                const t = span > 0 ? (db[previous] - threshold) / span : 1;
                return offset + t * delta;
            }
            offset += delta;
            previous = current;
        }
        return null;
    }

    /**
     * Largest lobe outside the main-lobe window, relative to the peak (dB)
     *
     * @returns null when no sample lies outside the window
     * @throws MetricsError when the beamwidth itself is undefined
     */
    sidelobeLevel(cut: PatternCut): number | null {
        const hpbw = this.halfPowerBeamwidth(cut);
        const db = this.toDb(cut);
        const peak = this.peak(cut);
        const halfWindow = (hpbw * this.sidelobeWindowMultiplier) / 2;

        let best = -Infinity;
        cut.anglesDeg.forEach((angle, i) => {
            const distance = cut.circular
                ? circularDistanceDeg(angle, peak.angleDeg)
                : Math.abs(angle - peak.angleDeg);
            if (distance > halfWindow && db[i] > best) best = db[i];
        });
        return Number.isFinite(best) ? best - peak.valueDb : null;
    }

    /**
     * Peak minus the value 180° away (dB)
     *
     * @throws MetricsError when the back direction is outside an open cut
     */
    frontToBack(cut: PatternCut): number {
        const peak = this.peak(cut);
        return peak.valueDb - this.dbAt(cut, peak.angleDeg + 180, 'frontToBack');
    }

    /**
     * Value at an angle in dB, interpolated linearly in dB
     */
    dbAt(cut: PatternCut, angleDeg: number, metric: string = 'dbAt'): number {
        const db = this.toDb(cut);
        const { lower, upper, t } = locate(cut, angleDeg, metric);
        return db[lower] + t * (db[upper] - db[lower]);
    }

    /**
     * Linear value at an angle, interpolated linearly
     */
    valueAt(cut: PatternCut, angleDeg: number): number {
        const { lower, upper, t } = locate(cut, angleDeg, 'valueAt');
        return cut.values[lower] + t * (cut.values[upper] - cut.values[lower]);
    }

    /**
     * Every metric at once; undefined metrics are null with the reason in `issues`
     */
    summarize(cut: PatternCut): MetricsSummary {
        const issues: string[] = [];
        const attempt = <T>(fn: () => T): T | null => {
            try {
                return fn();
            } catch (error) {
                if (error instanceof MetricsError) {
                    issues.push(`${error.metric}: ${error.message}`);
                    return null;
                }
                throw error;
            }
        };

        const peak = this.peak(cut);
        const hpbwDeg = attempt(() => this.halfPowerBeamwidth(cut));
        let sidelobeLevelDb: number | null = null;
        if (hpbwDeg !== null) {
            const issueCount = issues.length;
            sidelobeLevelDb = attempt(() => this.sidelobeLevel(cut));
            if (sidelobeLevelDb === null && issues.length === issueCount) {
                issues.push('sidelobeLevel: no samples outside the main-lobe window');
            }
        }
        const frontToBackDb = attempt(() => this.frontToBack(cut));
        return { peak, hpbwDeg, sidelobeLevelDb, frontToBackDb, issues };
    }
}

/**
 * Bracketing samples of an angle; wraps on circular cuts
 */
function locate(cut: PatternCut, angleDeg: number, metric: string): Bracket {
    const angles = cut.anglesDeg;
    const n = angles.length;
    const eps = 1e-9;

    let x = angleDeg;
    if (cut.circular) {
        x = angles[0] + wrapDeg360(angleDeg - angles[0]);
    } else {
        const candidate = [angleDeg, angleDeg - 360, angleDeg + 360]
            .find(a => a >= angles[0] - eps && a <= angles[n - 1] + eps);
        if (candidate === undefined) {
            throw new MetricsError(
                metric,
                `Angle ${angleDeg}° is outside the cut [${angles[0]}°, ${angles[n - 1]}°]`,
                { angleDeg, first: angles[0], last: angles[n - 1] }
            );
        }
        x = candidate;
    }

    for (let i = 0; i < n; i++) {
        if (Math.abs(angles[i] - x) <= eps) return { lower: i, upper: i, t: 0 };
    }
    for (let i = 0; i < n - 1; i++) {
        if (x > angles[i] && x < angles[i + 1]) {
            return { lower: i, upper: i + 1, t: (x - angles[i]) / (angles[i + 1] - angles[i]) };
        }
    }
    // Circular wrap between the last and first sample
    const span = wrapDeg360(angles[0] - angles[n - 1]);
    return { lower: n - 1, upper: 0, t: span > 0 ? wrapDeg360(x - angles[n - 1]) / span : 0 };
}

/**
 * Signed circular error of the beam peak from a target direction (deg)
 */
export function steeringErrorDeg(
    cut: PatternCut,
    targetDeg: number,
    calculator: MetricsCalculator = new MetricsCalculator()
): number {
    return angleDifferenceDeg(calculator.peak(cut).angleDeg, targetDeg);
}
