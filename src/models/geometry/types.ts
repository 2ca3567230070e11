/**
 * @module geometry/types
 * @description Element positions and the immutable linear-array geometry
 */

import { ErrorCodes, GeometryError } from '../../core/errors';
import { wavelength } from '../../core/units';
import type { Vec3 } from '../numeric/math/linear-algebra';

/**
 * Coordinate direction closest to the array axis
 */
export type CoordinateAxis = 'x' | 'y' | 'z';

/**
 * One element as handed over by the backend: a stable id and a position.
 * Coordinates may carry units ("12mm"); bare numbers use the analyzer's length unit.
 */
export interface RawElement {
    id: string;
    position: readonly [number | string, number | string, number | string];
}

/**
 * Canonical element position in meters
 */
export interface ElementPosition {
    readonly id: string;
    readonly position: Readonly<Vec3>;
}

/**
 * Inter-element spacing statistics
 */
export interface SpacingStats {
    /** Mean gap (m) */
    mean: number;
    /** Largest |gap − mean| (m) */
    maxDeviation: number;
    /** Consecutive gaps along the axis (m) */
    gaps: number[];
    /** |gap − mean| / mean for every gap */
    deviationRatios: number[];
}

/**
 * Fields of a fitted geometry
 */
export interface GeometryModelInit {
    /** Elements in physical order along the axis */
    elements: ElementPosition[];
    /** Unit vector of the array axis */
    axisDirection: Vec3;
    centroid: Vec3;
    /** Position of each element along the axis, relative to element 0 (m) */
    offsets: number[];
    spacing: SpacingStats;
    /** Largest distance of an element from the fitted axis (m) */
    maxPerpendicularError: number;
}

/**
 * Immutable linear-array geometry
 *
 * Elements are ordered by physical index along the axis (index 0 at the
 * most negative projection), not by discovery order.
 */
export class GeometryModel {
    readonly elements: readonly ElementPosition[];
    readonly axisDirection: Readonly<Vec3>;
    readonly primaryAxis: CoordinateAxis;
    readonly centroid: Readonly<Vec3>;
    readonly offsets: readonly number[];
    readonly spacing: Readonly<SpacingStats>;
    readonly maxPerpendicularError: number;

    private readonly indexById: Map<string, number>;

    constructor(init: GeometryModelInit) {
        if (init.elements.length < 2) {
            throw new GeometryError(
                ErrorCodes.DEGENERATE_GEOMETRY,
                `A linear array needs at least 2 elements, got ${init.elements.length}`,
                { count: init.elements.length }
            );
        }
        if (init.offsets.length !== init.elements.length) {
            throw new GeometryError(
                ErrorCodes.DEGENERATE_GEOMETRY,
                'Offsets and elements differ in length',
                { elements: init.elements.length, offsets: init.offsets.length }
            );
        }

        this.indexById = new Map();
        init.elements.forEach((element, index) => {
            if (this.indexById.has(element.id)) {
                throw new GeometryError(
                    ErrorCodes.DEGENERATE_GEOMETRY,
                    `Duplicate element id "${element.id}"`,
                    { elementId: element.id }
                );
            }
            this.indexById.set(element.id, index);
        });

        this.elements = Object.freeze(init.elements.map(e => Object.freeze({ id: e.id, position: e.position })));
        this.axisDirection = Object.freeze(init.axisDirection);
        this.primaryAxis = dominantCoordinate(init.axisDirection);
        this.centroid = Object.freeze(init.centroid);
        this.offsets = Object.freeze([...init.offsets]);
        this.spacing = Object.freeze({ ...init.spacing });
        this.maxPerpendicularError = init.maxPerpendicularError;
    }

    /** Number of elements */
    get count(): number {
        return this.elements.length;
    }

    /** Element ids in physical order */
    get ids(): string[] {
        return this.elements.map(e => e.id);
    }

    /**
     * Physical index of an element, or -1 when unknown
     */
    indexOf(id: string): number {
        return this.indexById.get(id) ?? -1;
    }

    has(id: string): boolean {
        return this.indexById.has(id);
    }

    /**
     * Mean spacing in wavelengths at a frequency
     */
    spacingInWavelengths(frequencyHz: number): number {
        return this.spacing.mean / wavelength(frequencyHz);
    }

    toJSON(): {
        elements: { id: string; position: number[] }[];
        primaryAxis: CoordinateAxis;
        axisDirection: number[];
        spacing: SpacingStats;
    } {
        return {
            elements: this.elements.map(e => ({ id: e.id, position: [...e.position] })),
            primaryAxis: this.primaryAxis,
            axisDirection: [...this.axisDirection],
            spacing: { ...this.spacing, gaps: [...this.spacing.gaps], deviationRatios: [...this.spacing.deviationRatios] },
        };
    }
}

/**
 * Coordinate axis with the largest |component|; the first wins a tie
 */
export function dominantCoordinate(direction: Readonly<Vec3>): CoordinateAxis {
    const axes: CoordinateAxis[] = ['x', 'y', 'z'];
    let best = 0;
    for (let i = 1; i < 3; i++) {
        if (Math.abs(direction[i]) > Math.abs(direction[best])) best = i;
    }
    return axes[best];
}
