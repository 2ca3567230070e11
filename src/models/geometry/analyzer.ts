/**
 * @module geometry/analyzer
 * @description Infers the axis, physical ordering and spacing of a linear array
 * from unordered element coordinates.
 *
 * ## Algorithm
 * 1. Centroid and position covariance
 * 2. Principal axis = dominant eigenvector of the covariance, oriented so
 *    projections grow with input order (largest component positive when
 *    the input order gives no direction)
 * 3. Project onto the axis, reject points farther than the collinearity
 *    tolerance from it
 * 4. Sort by projection; projections closer than the tie tolerance are an error
 * 5. Gap statistics; reject deviation ratios above the configured maximum
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import type { GeometryConfig } from '../../core/config';
import { ErrorCodes, GeometryError } from '../../core/errors';
import { parseLength } from '../../core/units';
import type { LengthUnit } from '../../core/units';
import {
    covariance3,
    dominantEigenvector3,
    dot3,
    magnitude3,
    scale3,
    sub3,
} from '../numeric/math/linear-algebra';
import type { Vec3 } from '../numeric/math/linear-algebra';
import { GeometryModel } from './types';
import type { ElementPosition, RawElement, SpacingStats } from './types';

export interface AnalyzeOptions extends Partial<GeometryConfig> {
    /** Unit of bare numeric coordinates */
    lengthUnit?: LengthUnit;
}

/**
 * Fit a GeometryModel to raw element coordinates
 *
 * @throws GeometryError when there are fewer than 2 elements, duplicate ids,
 * coincident projections, non-collinear points or non-uniform spacing
 *
 * @example
 * ```typescript
 * const geometry = analyzeGeometry([
 *     { id: 'P0', position: [0, 0, 0] },
 *     { id: 'P2', position: [0, 0.1, 0] },
 *     { id: 'P1', position: ['0', '50mm', '0'] },
 * ]);
 * geometry.ids;          // ['P0', 'P1', 'P2']
 * geometry.spacing.mean; // 0.05
 * ```
 */
export function analyzeGeometry(raw: readonly RawElement[], options: AnalyzeOptions = {}): GeometryModel {
    const config: GeometryConfig = {
        collinearityToleranceM: options.collinearityToleranceM ?? DEFAULT_DESIGN_CONFIG.geometry.collinearityToleranceM,
        tieToleranceM: options.tieToleranceM ?? DEFAULT_DESIGN_CONFIG.geometry.tieToleranceM,
        maxSpacingDeviationRatio: options.maxSpacingDeviationRatio ?? DEFAULT_DESIGN_CONFIG.geometry.maxSpacingDeviationRatio,
    };
    const unit = options.lengthUnit ?? 'm';

    if (raw.length < 2) {
        throw new GeometryError(
            ErrorCodes.DEGENERATE_GEOMETRY,
            `A linear array needs at least 2 elements, got ${raw.length}`,
            { count: raw.length }
        );
    }

    const seen = new Set<string>();
    const elements: ElementPosition[] = raw.map(element => {
        if (seen.has(element.id)) {
            throw new GeometryError(
                ErrorCodes.DEGENERATE_GEOMETRY,
                `Duplicate element id "${element.id}"`,
                { elementId: element.id }
            );
        }
        seen.add(element.id);
        const [x, y, z] = element.position;
        const position: Vec3 = [parseLength(x, unit), parseLength(y, unit), parseLength(z, unit)];
        return { id: element.id, position };
    });

    const points: Vec3[] = elements.map(e => [e.position[0], e.position[1], e.position[2]]);
    const { centroid, covariance } = covariance3(points);
    const { value, vector } = dominantEigenvector3(covariance);

    if (!(value > 0) || magnitude3(vector) === 0) {
        throw new GeometryError(
            ErrorCodes.DEGENERATE_GEOMETRY,
            'All elements share one position; no array axis exists',
            { centroid }
        );
    }

    const axis = orientAlongInput(vector, points, centroid, config.tieToleranceM);

    // Projection and perpendicular residual per element
    const projected = points.map((p, i) => {
        const rel = sub3(p, centroid);
        const t = dot3(rel, axis);
        const perpendicular = magnitude3(sub3(rel, scale3(axis, t)));
        return { element: elements[i], t, perpendicular };
    });

    const offAxis = projected.filter(p => p.perpendicular > config.collinearityToleranceM);
    const maxPerpendicularError = Math.max(...projected.map(p => p.perpendicular));
    if (offAxis.length > 0) {
        throw new GeometryError(
            ErrorCodes.NON_COLLINEAR,
            `${offAxis.length} element(s) lie farther than ${config.collinearityToleranceM} m from the array axis`,
            {
                elementIds: offAxis.map(p => p.element.id),
                maxPerpendicularError,
                tolerance: config.collinearityToleranceM,
            }
        );
    }

    projected.sort((a, b) => a.t - b.t);

    const gaps: number[] = [];
    for (let i = 1; i < projected.length; i++) {
        const gap = projected[i].t - projected[i - 1].t;
        if (gap <= config.tieToleranceM) {
            throw new GeometryError(
                ErrorCodes.DEGENERATE_GEOMETRY,
                `Elements "${projected[i - 1].element.id}" and "${projected[i].element.id}" project to the same axis position`,
                {
                    elementIds: [projected[i - 1].element.id, projected[i].element.id],
                    gap,
                    tolerance: config.tieToleranceM,
                }
            );
        }
        gaps.push(gap);
    }

    const spacing = spacingStats(gaps);
    const worst = spacing.deviationRatios.reduce(
        (acc, ratio, i) => (ratio > acc.ratio ? { ratio, index: i } : acc),
        { ratio: 0, index: 0 }
    );
    if (worst.ratio > config.maxSpacingDeviationRatio) {
        throw new GeometryError(
            ErrorCodes.NON_UNIFORM_SPACING,
            `Gap between "${projected[worst.index].element.id}" and "${projected[worst.index + 1].element.id}" deviates ` +
            `${(worst.ratio * 100).toFixed(1)}% from the mean spacing (limit ${(config.maxSpacingDeviationRatio * 100).toFixed(1)}%)`,
            {
                elementIds: [projected[worst.index].element.id, projected[worst.index + 1].element.id],
                gaps,
                meanSpacing: spacing.mean,
                deviationRatio: worst.ratio,
                limit: config.maxSpacingDeviationRatio,
            }
        );
    }

    const origin = projected[0].t;
    return new GeometryModel({
        elements: projected.map(p => p.element),
        axisDirection: axis,
        centroid,
        offsets: projected.map(p => p.t - origin),
        spacing,
        maxPerpendicularError,
    });
}

/**
 * Flip the axis so element projections increase with their input index
 */
function orientAlongInput(v: Vec3, points: readonly Vec3[], centroid: Vec3, tolerance: number): Vec3 {
    let trend = 0;
    points.forEach((p, i) => {
        trend += i * dot3(sub3(p, centroid), v);
    });
    if (Math.abs(trend) > tolerance) {
        return trend < 0 ? scale3(v, -1) : v;
    }
    return canonicalSign(v);
}

/**
 * Flip a direction so its largest-magnitude component is positive
 */
function canonicalSign(v: Vec3): Vec3 {
    let largest = 0;
    for (let i = 1; i < 3; i++) {
        if (Math.abs(v[i]) > Math.abs(v[largest])) largest = i;
    }
    return v[largest] < 0 ? scale3(v, -1) : v;
}

function spacingStats(gaps: number[]): SpacingStats {
    const mean = gaps.reduce((a, b) => a + b, 0) / gaps.length;
    const deviations = gaps.map(g => Math.abs(g - mean));
    return {
        mean,
        maxDeviation: Math.max(...deviations),
        gaps,
        deviationRatios: deviations.map(d => d / mean),
    };
}

/**
 * Build an ideal uniform linear array along a coordinate axis
 *
 * Element ids default to "E0".."E{N-1}".
 */
export function uniformLinearArray(
    count: number,
    spacingM: number,
    axis: 'x' | 'y' | 'z' = 'x',
    idPrefix: string = 'E'
): GeometryModel {
    const component = { x: 0, y: 1, z: 2 }[axis];
    const raw: RawElement[] = [];
    for (let n = 0; n < count; n++) {
        const position: [number, number, number] = [0, 0, 0];
        position[component] = n * spacingM;
        raw.push({ id: `${idPrefix}${n}`, position });
    }
    return analyzeGeometry(raw);
}
