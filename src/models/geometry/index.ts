/**
 * @module geometry
 * @description Linear-array geometry inference
 */

export type {
    CoordinateAxis,
    RawElement,
    ElementPosition,
    SpacingStats,
    GeometryModelInit,
} from './types';

export { GeometryModel, dominantCoordinate } from './types';

export type { AnalyzeOptions } from './analyzer';

export { analyzeGeometry, uniformLinearArray } from './analyzer';
