/**
 * @module pattern/extractor
 * @description Normalizes raw backend samples into a PatternDataset and slices cuts
 *
 * ## Pipeline
 * 1. Check one quantity across all samples
 * 2. Check each direction against the declared convention, map to canonical
 * 3. Convert dB values to linear (10^(v/10) for power, 10^(v/20) for field)
 * 4. Sort by (frequency, φ, θ); the first of duplicate canonical points wins
 *
 * Frequency selection is nearest-neighbour with an explicit tolerance; there
 * is no interpolation across frequency.
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import type { ExtractionConfig, PatternScale } from '../../core/config';
import { ErrorCodes, PatternError } from '../../core/errors';
import { wrapDeg360 } from '../../core/units';
import { assertConvention, circularDistanceDeg, toCanonical } from './angles';
import { PatternDataset } from './types';
import type { CutSpec, PatternCut, PatternSample, RawPatternData } from './types';

export interface ExtractorOptions extends Partial<ExtractionConfig> {
    /** Scale assumed when raw data does not declare one */
    defaultScale?: PatternScale;
}

interface CutPoint {
    angle: number;
    value: number;
}

export class PatternExtractor {
    readonly frequencyToleranceHz: number;
    readonly angleToleranceDeg: number;
    readonly maxCircularGapDeg: number;
    readonly defaultScale: PatternScale;

    constructor(options: ExtractorOptions = {}) {
        this.frequencyToleranceHz = options.frequencyToleranceHz ?? DEFAULT_DESIGN_CONFIG.extraction.frequencyToleranceHz;
        this.angleToleranceDeg = options.angleToleranceDeg ?? DEFAULT_DESIGN_CONFIG.extraction.angleToleranceDeg;
        this.maxCircularGapDeg = options.maxCircularGapDeg ?? DEFAULT_DESIGN_CONFIG.extraction.maxCircularGapDeg;
        this.defaultScale = options.defaultScale ?? DEFAULT_DESIGN_CONFIG.metrics.scale;
    }

    /**
     * Normalize raw samples to canonical angles and linear values
     *
     * @throws PatternError on empty input, mixed quantities, out-of-range
     * angles, or non-finite / negative values
     */
    normalize(raw: RawPatternData): PatternDataset {
        if (raw.samples.length === 0) {
            throw new PatternError(`Backend returned no samples for '${raw.quantity}'`, { quantity: raw.quantity });
        }
        const scale = raw.scale ?? this.defaultScale;

        const mixed = raw.samples.filter(s => s.quantity !== undefined && s.quantity !== raw.quantity);
        if (mixed.length > 0) {
            const found = [...new Set(mixed.map(s => s.quantity))];
            throw new PatternError(
                `Dataset mixes quantities: expected '${raw.quantity}', also found ${found.map(q => `'${q}'`).join(', ')}`,
                { expected: raw.quantity, found }
            );
        }

        const samples: PatternSample[] = raw.samples.map(sample => {
            if (!(sample.frequencyHz > 0) || !Number.isFinite(sample.frequencyHz)) {
                throw new PatternError(`Invalid sample frequency ${sample.frequencyHz}`, { sample });
            }
            if (!Number.isFinite(sample.value)) {
                throw new PatternError(`Non-finite sample value at θ=${sample.thetaDeg}°, φ=${sample.phiDeg}°`, { sample });
            }
            assertConvention(sample, raw.convention);
            const direction = toCanonical(sample, raw.convention);

            let value = sample.value;
            if (raw.units === 'dB') {
                value = Math.pow(10, value / (scale === 'power' ? 10 : 20));
            } else if (value < 0) {
                throw new PatternError(
                    `Negative linear ${raw.quantity} ${value} at θ=${sample.thetaDeg}°, φ=${sample.phiDeg}°`,
                    { sample }
                );
            }
            return { frequencyHz: sample.frequencyHz, thetaDeg: direction.thetaDeg, phiDeg: direction.phiDeg, value };
        });

        samples.sort((a, b) => a.frequencyHz - b.frequencyHz || a.phiDeg - b.phiDeg || a.thetaDeg - b.thetaDeg);

        const kept: PatternSample[] = [];
        for (const sample of samples) {
            const previous = kept[kept.length - 1];
            const duplicate = previous !== undefined
                && previous.frequencyHz === sample.frequencyHz
                && circularDistanceDeg(previous.phiDeg, sample.phiDeg) <= this.angleToleranceDeg
                && Math.abs(previous.thetaDeg - sample.thetaDeg) <= this.angleToleranceDeg;
            if (!duplicate) kept.push(sample);
        }

        return new PatternDataset(raw.quantity, scale, kept);
    }

    /**
     * Samples at the frequency nearest `frequencyHz`
     *
     * @throws PatternError (FREQUENCY_MISMATCH) when the nearest frequency is
     * farther than the tolerance
     */
    selectFrequency(dataset: PatternDataset, frequencyHz: number): PatternDataset {
        const available = dataset.frequencies;
        if (available.length === 0) {
            throw new PatternError('Dataset is empty', { quantity: dataset.quantity });
        }
        let nearest = available[0];
        for (const f of available) {
            if (Math.abs(f - frequencyHz) < Math.abs(nearest - frequencyHz)) nearest = f;
        }
        if (Math.abs(nearest - frequencyHz) > this.frequencyToleranceHz) {
            throw new PatternError(
                `No samples at ${frequencyHz} Hz (nearest ${nearest} Hz, tolerance ${this.frequencyToleranceHz} Hz)`,
                { requested: frequencyHz, nearest, available, tolerance: this.frequencyToleranceHz },
                ErrorCodes.FREQUENCY_MISMATCH
            );
        }
        return dataset.filter(s => s.frequencyHz === nearest);
    }

    /**
     * Extract a fixed-φ or fixed-θ cut
     */
    cut(dataset: PatternDataset, frequencyHz: number, spec: CutSpec): PatternCut {
        return spec.kind === 'phi'
            ? this.phiCut(dataset, frequencyHz, spec.phiDeg)
            : this.thetaCut(dataset, frequencyHz, spec.thetaDeg);
    }

    /**
     * Fixed φ, θ varying, mirrored across φ + 180° to cover the full circle
     */
    phiCut(dataset: PatternDataset, frequencyHz: number, phiDeg: number): PatternCut {
        const atFrequency = this.selectFrequency(dataset, frequencyHz);
        const tol = this.angleToleranceDeg;
        const mirrorPhi = phiDeg + 180;

        const points: CutPoint[] = [];
        for (const s of atFrequency.samples) {
            if (circularDistanceDeg(s.phiDeg, phiDeg) <= tol) {
                points.push({ angle: s.thetaDeg, value: s.value });
            }
        }
        for (const s of atFrequency.samples) {
            if (circularDistanceDeg(s.phiDeg, mirrorPhi) <= tol) {
                points.push({ angle: wrapDeg360(360 - s.thetaDeg), value: s.value });
            }
        }

        return this.assemble(points, {
            scale: dataset.scale,
            quantity: dataset.quantity,
            frequencyHz: atFrequency.frequencies[0],
            spec: { kind: 'phi', phiDeg },
        });
    }

    /**
     * Fixed θ, φ varying
     */
    thetaCut(dataset: PatternDataset, frequencyHz: number, thetaDeg: number): PatternCut {
        const atFrequency = this.selectFrequency(dataset, frequencyHz);
        const points: CutPoint[] = atFrequency.samples
            .filter(s => Math.abs(s.thetaDeg - thetaDeg) <= this.angleToleranceDeg)
            .map(s => ({ angle: s.phiDeg, value: s.value }));

        return this.assemble(points, {
            scale: dataset.scale,
            quantity: dataset.quantity,
            frequencyHz: atFrequency.frequencies[0],
            spec: { kind: 'theta', thetaDeg },
        });
    }

    private assemble(
        points: CutPoint[],
        meta: Pick<PatternCut, 'scale' | 'quantity' | 'frequencyHz' | 'spec'>
    ): PatternCut {
        if (points.length === 0) {
            throw new PatternError('Cut contains no samples', { ...meta });
        }
        points.sort((a, b) => a.angle - b.angle);

        const unique: CutPoint[] = [];
        for (const p of points) {
            const previous = unique[unique.length - 1];
            if (previous === undefined || p.angle - previous.angle > this.angleToleranceDeg) {
                unique.push(p);
            }
        }
        // 0° and 360° − ε are the same direction
        if (unique.length > 1 && circularDistanceDeg(unique[0].angle, unique[unique.length - 1].angle) <= this.angleToleranceDeg) {
            unique.pop();
        }

        return { ...arrangeOnCircle(unique, this.maxCircularGapDeg), ...meta };
    }
}

/**
 * Decide whether points in [0°, 360°) cover the circle; present an open set
 * as one increasing window that starts after its largest gap.
 *
 * The set is open only when its largest gap exceeds `maxGapDeg` and also
 * dominates the runner-up by more than half again.
 */
function arrangeOnCircle(points: CutPoint[], maxGapDeg: number): Pick<PatternCut, 'anglesDeg' | 'values' | 'circular'> {
    const n = points.length;
    if (n < 3) {
        return { anglesDeg: points.map(p => p.angle), values: points.map(p => p.value), circular: false };
    }

    const gaps: number[] = [];
    for (let i = 0; i < n - 1; i++) {
        gaps.push(points[i + 1].angle - points[i].angle);
    }
    gaps.push(points[0].angle + 360 - points[n - 1].angle);

    let largest = 0;
    for (let i = 1; i < n; i++) {
        if (gaps[i] > gaps[largest]) largest = i;
    }
    const runnerUp = Math.max(...gaps.filter((_, i) => i !== largest));

    if (gaps[largest] <= maxGapDeg || gaps[largest] <= 1.5 * runnerUp) {
        return { anglesDeg: points.map(p => p.angle), values: points.map(p => p.value), circular: true };
    }

    const start = (largest + 1) % n;
    const ordered = [...points.slice(start), ...points.slice(0, start).map(p => ({ angle: p.angle + 360, value: p.value }))];
    const shift = ordered[0].angle >= 180 ? -360 : 0;
    return {
        anglesDeg: ordered.map(p => p.angle + shift),
        values: ordered.map(p => p.value),
        circular: false,
    };
}

/**
 * Build a cut directly from angle/value pairs (sorted by angle)
 *
 * @throws PatternError on length mismatch, empty input or non-finite values
 */
export function createPatternCut(
    anglesDeg: readonly number[],
    values: readonly number[],
    options: Partial<Omit<PatternCut, 'anglesDeg' | 'values'>> = {}
): PatternCut {
    if (anglesDeg.length !== values.length) {
        throw new PatternError(`Cut has ${anglesDeg.length} angles but ${values.length} values`);
    }
    if (anglesDeg.length === 0) {
        throw new PatternError('Cut contains no samples');
    }
    const order = anglesDeg.map((_, i) => i).sort((a, b) => anglesDeg[a] - anglesDeg[b]);
    for (const i of order) {
        if (!Number.isFinite(anglesDeg[i]) || !Number.isFinite(values[i]) || values[i] < 0) {
            throw new PatternError(`Invalid cut sample (${anglesDeg[i]}°, ${values[i]})`);
        }
    }
    return {
        anglesDeg: order.map(i => anglesDeg[i]),
        values: order.map(i => values[i]),
        circular: options.circular ?? false,
        scale: options.scale ?? DEFAULT_DESIGN_CONFIG.metrics.scale,
        quantity: options.quantity ?? 'gain',
        frequencyHz: options.frequencyHz ?? 0,
        spec: options.spec ?? { kind: 'phi', phiDeg: 0 },
    };
}
