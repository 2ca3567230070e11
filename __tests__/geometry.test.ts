/**
 * Geometry Module Tests
 * Axis fitting, physical ordering, spacing statistics and rejection of bad layouts
 */

import { describe, it, expect } from 'vitest';
import { analyzeGeometry, uniformLinearArray, GeometryModel, dominantCoordinate } from '../src/models/geometry';
import type { RawElement } from '../src/models/geometry';
import { ErrorCodes, GeometryError } from '../src/core/errors';
import { wavelength } from '../src/core/units';
import { arraysClose, catchError, isClose, pointsAlong } from './test-utils';

function expectGeometryError(fn: () => unknown, code: string): GeometryError {
    const error = catchError(fn);
    expect(error).toBeInstanceOf(GeometryError);
    if (!(error instanceof GeometryError)) throw error;
    expect(error.code).toBe(code);
    return error;
}

describe('analyzeGeometry', () => {
    describe('Rotated axis', () => {
        // y axis rotated 20° about x, then 30° about z
        const direction: [number, number, number] = [
            -Math.cos(20 * Math.PI / 180) * Math.sin(30 * Math.PI / 180),
            Math.cos(20 * Math.PI / 180) * Math.cos(30 * Math.PI / 180),
            Math.sin(20 * Math.PI / 180),
        ];
        const points = pointsAlong(5, 0.05, direction, [0.3, -0.2, 1.1]);
        const shuffled: RawElement[] = [0, 3, 1, 4, 2].map(n => ({ id: `P${n}`, position: points[n] }));

        it('should recover the physical order', () => {
            const geometry = analyzeGeometry(shuffled);
            expect(geometry.ids).toEqual(['P0', 'P1', 'P2', 'P3', 'P4']);
        });

        it('should recover the spacing', () => {
            const geometry = analyzeGeometry(shuffled);
            expect(geometry.spacing.mean).toBeCloseTo(0.05, 9);
            expect(geometry.spacing.maxDeviation).toBeLessThan(1e-9);
            expect(arraysClose([...geometry.offsets], [0, 0.05, 0.1, 0.15, 0.2], 1e-9, 1e-12)).toBe(true);
        });

        it('should fit the axis direction along the input order', () => {
            const geometry = analyzeGeometry(shuffled);
            expect(arraysClose([...geometry.axisDirection], direction, 1e-9, 1e-12)).toBe(true);
            expect(geometry.primaryAxis).toBe('y');
            expect(geometry.maxPerpendicularError).toBeLessThan(1e-12);
        });

        it('should put the centroid in the middle of the array', () => {
            const geometry = analyzeGeometry(shuffled);
            expect(arraysClose([...geometry.centroid], points[2], 1e-9, 1e-12)).toBe(true);
        });
    });

    it('should orient the axis along the input order', () => {
        const raw: RawElement[] = pointsAlong(4, 0.05, [-1, 0, 0]).map((p, n) => ({ id: `P${n}`, position: p }));
        const geometry = analyzeGeometry(raw);
        expect(geometry.ids).toEqual(['P0', 'P1', 'P2', 'P3']);
        expect(arraysClose([...geometry.axisDirection], [-1, 0, 0])).toBe(true);
        expect(geometry.primaryAxis).toBe('x');
    });

    it('should keep the input order on a rotated axis with a negative dominant component', () => {
        // y axis rotated 20° about x, then 200° about z
        const rad = Math.PI / 180;
        const direction: [number, number, number] = [
            -Math.cos(20 * rad) * Math.sin(200 * rad),
            Math.cos(20 * rad) * Math.cos(200 * rad),
            Math.sin(20 * rad),
        ];
        const raw: RawElement[] = pointsAlong(5, 0.05, direction, [0.1, 0.2, 0.3]).map((p, n) => ({ id: `P${n}`, position: p }));
        const geometry = analyzeGeometry(raw);
        expect(geometry.ids).toEqual(['P0', 'P1', 'P2', 'P3', 'P4']);
        expect(arraysClose([...geometry.axisDirection], direction, 1e-9, 1e-12)).toBe(true);
        expect(geometry.primaryAxis).toBe('y');
        expect(arraysClose([...geometry.offsets], [0, 0.05, 0.1, 0.15, 0.2], 1e-9, 1e-12)).toBe(true);
    });

    it('should fall back to a positive dominant component without an input trend', () => {
        // Projections −1, 3, −3, 1 (×0.05) weighted by input index sum to zero
        const raw: RawElement[] = [
            { id: 'A', position: [0, -0.05, 0] },
            { id: 'B', position: [0, 0.15, 0] },
            { id: 'C', position: [0, -0.15, 0] },
            { id: 'D', position: [0, 0.05, 0] },
        ];
        const geometry = analyzeGeometry(raw);
        expect(geometry.ids).toEqual(['C', 'A', 'D', 'B']);
        expect(arraysClose([...geometry.axisDirection], [0, 1, 0])).toBe(true);
    });

    it('should parse coordinates with units', () => {
        const geometry = analyzeGeometry([
            { id: 'P0', position: [0, 0, 0] },
            { id: 'P2', position: [0, '100mm', 0] },
            { id: 'P1', position: ['0', '5cm', '0'] },
        ]);
        expect(geometry.ids).toEqual(['P0', 'P1', 'P2']);
        expect(geometry.spacing.mean).toBeCloseTo(0.05, 12);
    });

    it('should apply the length unit to bare numbers', () => {
        const geometry = analyzeGeometry(
            [
                { id: 'A', position: [0, 0, 0] },
                { id: 'B', position: [0, 0, 50] },
                { id: 'C', position: [0, 0, 100] },
            ],
            { lengthUnit: 'mm' }
        );
        expect(geometry.spacing.mean).toBeCloseTo(0.05, 12);
        expect(geometry.primaryAxis).toBe('z');
    });

    it('should reject fewer than two elements', () => {
        const error = expectGeometryError(
            () => analyzeGeometry([{ id: 'A', position: [0, 0, 0] }]),
            ErrorCodes.DEGENERATE_GEOMETRY
        );
        expect(error.details).toEqual({ count: 1 });
    });

    it('should reject duplicate ids', () => {
        expectGeometryError(
            () => analyzeGeometry([
                { id: 'A', position: [0, 0, 0] },
                { id: 'A', position: [0.05, 0, 0] },
            ]),
            ErrorCodes.DEGENERATE_GEOMETRY
        );
    });

    it('should reject coincident elements', () => {
        expectGeometryError(
            () => analyzeGeometry([
                { id: 'A', position: [0, 0, 0] },
                { id: 'B', position: [0, 0, 0] },
            ]),
            ErrorCodes.DEGENERATE_GEOMETRY
        );
    });

    it('should reject two elements projecting to the same axis position', () => {
        const error = expectGeometryError(
            () => analyzeGeometry([
                { id: 'A', position: [0, 0, 0] },
                { id: 'B', position: [0.05, 0, 0] },
                { id: 'C', position: [0.05, 0, 0] },
                { id: 'D', position: [0.1, 0, 0] },
            ]),
            ErrorCodes.DEGENERATE_GEOMETRY
        );
        expect(error.message).toContain('same axis position');
    });

    it('should reject non-collinear elements', () => {
        const error = expectGeometryError(
            () => analyzeGeometry([
                { id: 'A', position: [0, 0, 0] },
                { id: 'B', position: [0.05, 0, 0] },
                { id: 'C', position: [0.1, 0.001, 0] },
                { id: 'D', position: [0.15, 0, 0] },
                { id: 'E', position: [0.2, 0, 0] },
            ]),
            ErrorCodes.NON_COLLINEAR
        );
        expect(error.message).toContain('from the array axis');
    });

    it('should accept small offsets within a looser collinearity tolerance', () => {
        const geometry = analyzeGeometry(
            [
                { id: 'A', position: [0, 0, 0] },
                { id: 'B', position: [0.05, 1e-5, 0] },
                { id: 'C', position: [0.1, 0, 0] },
            ],
            { collinearityToleranceM: 1e-4 }
        );
        expect(geometry.count).toBe(3);
        expect(geometry.maxPerpendicularError).toBeGreaterThan(0);
    });

    it('should reject non-uniform spacing', () => {
        const error = expectGeometryError(
            () => analyzeGeometry([
                { id: 'A', position: [0, 0, 0] },
                { id: 'B', position: [0.05, 0, 0] },
                { id: 'C', position: [0.1, 0, 0] },
                { id: 'D', position: [0.2, 0, 0] },
            ]),
            ErrorCodes.NON_UNIFORM_SPACING
        );
        expect(error.message).toContain('"C" and "D"');
    });
});

describe('GeometryModel', () => {
    const geometry = uniformLinearArray(4, 0.05, 'x');

    it('should build ids E0..E3 in order', () => {
        expect(geometry.ids).toEqual(['E0', 'E1', 'E2', 'E3']);
        expect(geometry.count).toBe(4);
    });

    it('should look up physical indices', () => {
        expect(geometry.indexOf('E2')).toBe(2);
        expect(geometry.indexOf('missing')).toBe(-1);
        expect(geometry.has('E3')).toBe(true);
    });

    it('should express spacing in wavelengths', () => {
        expect(isClose(geometry.spacingInWavelengths(3e9), 0.05 / wavelength(3e9))).toBe(true);
    });

    it('should be immutable', () => {
        expect(Object.isFrozen(geometry.offsets)).toBe(true);
        expect(Object.isFrozen(geometry.elements)).toBe(true);
    });

    it('should reject mismatched offsets', () => {
        expectGeometryError(
            () => new GeometryModel({
                elements: [{ id: 'A', position: [0, 0, 0] }, { id: 'B', position: [1, 0, 0] }],
                axisDirection: [1, 0, 0],
                centroid: [0.5, 0, 0],
                offsets: [0],
                spacing: { mean: 1, maxDeviation: 0, gaps: [1], deviationRatios: [0] },
                maxPerpendicularError: 0,
            }),
            ErrorCodes.DEGENERATE_GEOMETRY
        );
    });
});

describe('dominantCoordinate', () => {
    it('should pick the largest component', () => {
        expect(dominantCoordinate([0.1, -0.9, 0.2])).toBe('y');
        expect(dominantCoordinate([0, 0, 1])).toBe('z');
    });

    it('should pick the first coordinate on a tie', () => {
        expect(dominantCoordinate([Math.SQRT1_2, Math.SQRT1_2, 0])).toBe('x');
    });
});
