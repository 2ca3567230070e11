/**
 * @module pattern
 * @description Far-field pattern normalization and cut extraction
 */

export type {
    AngleConvention,
    ValueUnits,
    PatternSample,
    RawSample,
    RawPatternData,
    CutSpec,
    PatternCut,
} from './types';

export { PatternDataset } from './types';

export type { Direction } from './angles';
export { toCanonical, fromCanonical, assertConvention, circularDistanceDeg } from './angles';

export type { ExtractorOptions } from './extractor';
export { PatternExtractor, createPatternCut } from './extractor';
