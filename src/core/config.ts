/**
 * @module core/config
 * @description Design configuration, canonical serialization and seeded randomness
 *
 * Every tunable of the core lives in one `DesignConfig`. Configs serialize
 * with sorted keys so that a hash of the canonical form identifies a setup.
 */

import { ValidationError } from './errors';

// Core version - should match package.json
const CORE_VERSION = '0.1.0';

// ==================== Browser-compatible Hash ====================

/**
 * Simple hash function that works in both browser and Node.js
 * Uses djb2 algorithm for fast, consistent hashing
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a 128-bit style hex digest from a string (browser-compatible)
 */
export function contentHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    const h3 = simpleHash(h1 + data);
    const h4 = simpleHash(h2 + h3);
    return h1 + h2 + h3 + h4;
}

// ==================== Types ====================

export type TaperMethod = 'chebyshev' | 'taylor';
export type OptimizerMethod = 'patternSearch' | 'nelderMead';
export type CostKind = 'nmse' | 'correlation';
export type PatternScale = 'power' | 'field';

export interface GeometryConfig {
    /** Max perpendicular distance of an element from the fitted axis (m) */
    collinearityToleranceM: number;
    /** Projected positions closer than this are a tie (m) */
    tieToleranceM: number;
    /** Max |gap − mean| / mean */
    maxSpacingDeviationRatio: number;
}

export interface SynthesisConfig {
    taperMethod: TaperMethod;
    /** Largest allowed max/min amplitude ratio of a taper (dB, 20·log10) */
    maxTaperDynamicRangeDb: number;
    /** Relative pivot threshold below which a linear system is singular */
    singularityTolerance: number;
}

export interface OptimizerConfig {
    method: OptimizerMethod;
    maxIterations: number;
    /** Cost at or below which the search has converged */
    costTolerance: number;
    /** Iterations without improvement before giving up */
    patience: number;
    /** Initial step (amplitude units / radians) */
    initialStep: number;
    /** Step below which the search has stalled */
    minStep: number;
    /** Wall-clock budget; 0 disables it */
    maxDurationMs: number;
    /** Amplitude floor applied during the search */
    minAmplitude: number;
    cost: CostKind;
}

export interface ExtractionConfig {
    frequencyToleranceHz: number;
    angleToleranceDeg: number;
    /** Largest gap (deg) a cut may have and still close the circle */
    maxCircularGapDeg: number;
}

export interface MetricsConfig {
    /** dB floor applied before any metric is computed */
    dbFloor: number;
    /** Main-lobe exclusion window = HPBW × multiplier */
    sidelobeWindowMultiplier: number;
    /** 'power' → 10·log10, 'field' → 20·log10 */
    scale: PatternScale;
}

/**
 * Complete configuration of the design core
 */
export interface DesignConfig {
    seed: number;
    geometry: GeometryConfig;
    synthesis: SynthesisConfig;
    optimizer: OptimizerConfig;
    extraction: ExtractionConfig;
    metrics: MetricsConfig;
}

/**
 * Partial input accepted by `createDesignConfig`
 */
export interface DesignConfigInput {
    seed?: number;
    geometry?: Partial<GeometryConfig>;
    synthesis?: Partial<SynthesisConfig>;
    optimizer?: Partial<OptimizerConfig>;
    extraction?: Partial<ExtractionConfig>;
    metrics?: Partial<MetricsConfig>;
}

/**
 * Validation result for DesignConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Defaults ====================

export const DEFAULT_DESIGN_CONFIG: DesignConfig = {
    seed: 42,
    geometry: {
        collinearityToleranceM: 1e-6,
        tieToleranceM: 1e-9,
        maxSpacingDeviationRatio: 0.05,
    },
    synthesis: {
        taperMethod: 'chebyshev',
        maxTaperDynamicRangeDb: 60,
        singularityTolerance: 1e-10,
    },
    optimizer: {
        method: 'patternSearch',
        maxIterations: 50,
        costTolerance: 1e-3,
        patience: 5,
        initialStep: 0.25,
        minStep: 1e-3,
        maxDurationMs: 0,
        minAmplitude: 0,
        cost: 'nmse',
    },
    extraction: {
        frequencyToleranceHz: 1,
        angleToleranceDeg: 1e-6,
        maxCircularGapDeg: 30,
    },
    metrics: {
        dbFloor: -40,
        sidelobeWindowMultiplier: 2,
        scale: 'power',
    },
};

// ==================== Factory Functions ====================

/**
 * Create a DesignConfig with defaults filled in per group
 */
export function createDesignConfig(input: DesignConfigInput = {}): DesignConfig {
    return {
        seed: input.seed ?? DEFAULT_DESIGN_CONFIG.seed,
        geometry: { ...DEFAULT_DESIGN_CONFIG.geometry, ...input.geometry },
        synthesis: { ...DEFAULT_DESIGN_CONFIG.synthesis, ...input.synthesis },
        optimizer: { ...DEFAULT_DESIGN_CONFIG.optimizer, ...input.optimizer },
        extraction: { ...DEFAULT_DESIGN_CONFIG.extraction, ...input.extraction },
        metrics: { ...DEFAULT_DESIGN_CONFIG.metrics, ...input.metrics },
    };
}

/**
 * Create a config and throw `ValidationError` if it is invalid
 */
export function resolveDesignConfig(input: DesignConfigInput = {}): DesignConfig {
    const config = createDesignConfig(input);
    const result = validateDesignConfig(config);
    if (!result.valid) {
        throw new ValidationError(`Invalid design config: ${result.errors.join('; ')}`, result);
    }
    return config;
}

// ==================== Validation ====================

/**
 * Validate a DesignConfig
 */
export function validateDesignConfig(config: DesignConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const positive = (path: string, value: number): void => {
        if (!(Number.isFinite(value) && value > 0)) {
            errors.push(`${path} must be a positive number`);
        }
    };
    const nonNegative = (path: string, value: number): void => {
        if (!(Number.isFinite(value) && value >= 0)) {
            errors.push(`${path} must be a non-negative number`);
        }
    };

    if (!Number.isInteger(config.seed)) {
        errors.push('seed must be an integer');
    }
    if (config.synthesis.taperMethod !== 'chebyshev' && config.synthesis.taperMethod !== 'taylor') {
        errors.push('synthesis.taperMethod must be "chebyshev" or "taylor"');
    }
    if (config.optimizer.method !== 'patternSearch' && config.optimizer.method !== 'nelderMead') {
        errors.push('optimizer.method must be "patternSearch" or "nelderMead"');
    }
    if (config.optimizer.cost !== 'nmse' && config.optimizer.cost !== 'correlation') {
        errors.push('optimizer.cost must be "nmse" or "correlation"');
    }
    if (config.metrics.scale !== 'power' && config.metrics.scale !== 'field') {
        errors.push('metrics.scale must be "power" or "field"');
    }

    positive('geometry.collinearityToleranceM', config.geometry.collinearityToleranceM);
    positive('geometry.tieToleranceM', config.geometry.tieToleranceM);
    positive('geometry.maxSpacingDeviationRatio', config.geometry.maxSpacingDeviationRatio);

    positive('synthesis.maxTaperDynamicRangeDb', config.synthesis.maxTaperDynamicRangeDb);
    positive('synthesis.singularityTolerance', config.synthesis.singularityTolerance);

    const opt = config.optimizer;
    if (!Number.isInteger(opt.maxIterations) || opt.maxIterations < 1) {
        errors.push('optimizer.maxIterations must be a positive integer');
    }
    if (!Number.isInteger(opt.patience) || opt.patience < 1) {
        errors.push('optimizer.patience must be a positive integer');
    }
    nonNegative('optimizer.costTolerance', opt.costTolerance);
    positive('optimizer.initialStep', opt.initialStep);
    positive('optimizer.minStep', opt.minStep);
    nonNegative('optimizer.maxDurationMs', opt.maxDurationMs);
    nonNegative('optimizer.minAmplitude', opt.minAmplitude);
    if (opt.minAmplitude >= 1) {
        errors.push('optimizer.minAmplitude must be below 1');
    }
    if (opt.minStep > opt.initialStep) {
        warnings.push('optimizer.minStep exceeds optimizer.initialStep; the search stalls immediately');
    }

    nonNegative('extraction.frequencyToleranceHz', config.extraction.frequencyToleranceHz);
    nonNegative('extraction.angleToleranceDeg', config.extraction.angleToleranceDeg);
    positive('extraction.maxCircularGapDeg', config.extraction.maxCircularGapDeg);

    if (!(config.metrics.dbFloor < 0)) {
        errors.push('metrics.dbFloor must be negative');
    }
    positive('metrics.sidelobeWindowMultiplier', config.metrics.sidelobeWindowMultiplier);
    if (config.metrics.sidelobeWindowMultiplier < 1) {
        warnings.push('metrics.sidelobeWindowMultiplier below 1 leaves part of the main lobe in the sidelobe region');
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Serialization ====================

/**
 * Serialize DesignConfig to a canonical JSON string
 *
 * Uses deterministic key ordering for consistent hashing.
 */
export function serializeDesignConfig(config: DesignConfig): string {
    return JSON.stringify(sortObjectKeys({ libraryVersion: CORE_VERSION, ...config }), null, 2);
}

/**
 * Deserialize JSON string to DesignConfig (unknown keys ignored, missing keys defaulted)
 */
export function deserializeDesignConfig(json: string): DesignConfig {
    const parsed: unknown = JSON.parse(json);
    if (!isRecord(parsed)) {
        throw new ValidationError('Invalid DesignConfig: must be an object');
    }
    const group = <T extends object>(key: keyof DesignConfig, defaults: T): Partial<T> => {
        const value = parsed[key];
        if (!isRecord(value)) return {};
        const known = Object.fromEntries(Object.entries(value).filter(([k]) => k in defaults));
        if (!isPartialOf(defaults, known)) {
            throw new ValidationError(`Invalid DesignConfig: wrong value type in "${key}"`, { group: key });
        }
        return known;
    };
    return resolveDesignConfig({
        seed: typeof parsed.seed === 'number' ? parsed.seed : undefined,
        geometry: group('geometry', DEFAULT_DESIGN_CONFIG.geometry),
        synthesis: group('synthesis', DEFAULT_DESIGN_CONFIG.synthesis),
        optimizer: group('optimizer', DEFAULT_DESIGN_CONFIG.optimizer),
        extraction: group('extraction', DEFAULT_DESIGN_CONFIG.extraction),
        metrics: group('metrics', DEFAULT_DESIGN_CONFIG.metrics),
    });
}

/**
 * Compute a hash of the DesignConfig for quick comparison
 */
export function computeConfigHash(config: DesignConfig): string {
    return contentHash(JSON.stringify(sortObjectKeys(config)));
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Generate a random sample from a normal distribution
     */
    normal(mean: number = 0, std: number = 1): number {
        // Box-Muller transform
        const u1 = Math.max(this.random(), Number.MIN_VALUE);
        const u2 = this.random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + std * z;
    }
}

// ==================== Utility Functions ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when every key of `value` carries the same primitive type as in `defaults`
 */
function isPartialOf<T extends object>(
    defaults: T,
    value: Record<string, unknown>
): value is Record<string, unknown> & Partial<T> {
    return Object.keys(value).every(key => typeof value[key] === typeof Reflect.get(defaults, key));
}

/**
 * Sort object keys recursively for deterministic serialization
 */
export function sortObjectKeys(obj: unknown): unknown {
    if (obj === null || typeof obj !== 'object') {
        return obj;
    }

    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }

    const sorted: Record<string, unknown> = {};
    const record: Record<string, unknown> = { ...obj };
    for (const key of Object.keys(record).sort()) {
        sorted[key] = sortObjectKeys(record[key]);
    }
    return sorted;
}
