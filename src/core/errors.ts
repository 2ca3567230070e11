/**
 * @module core/errors
 * @description Unified error types and error codes for the array design core
 *
 * Structural failures (geometry, excitation shape) are thrown and fail fast.
 * Synthesis failures travel as values inside `SynthesisResult`; backend
 * failures are wrapped once and propagated, never retried here.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the beamsmith core
 */
export const ErrorCodes = {
    // Geometry
    /** Fewer than two elements, duplicate ids, coincident points */
    DEGENERATE_GEOMETRY: 'DEGENERATE_GEOMETRY',
    /** Element positions are not collinear within tolerance */
    NON_COLLINEAR: 'NON_COLLINEAR',
    /** Inter-element spacing deviates beyond the allowed ratio */
    NON_UNIFORM_SPACING: 'NON_UNIFORM_SPACING',

    // Excitation
    /** Missing or extra element ids */
    EXCITATION_MISMATCH: 'EXCITATION_MISMATCH',
    /** Amplitude negative, phase not finite, unparseable value */
    INVALID_EXCITATION: 'INVALID_EXCITATION',

    // Synthesis
    /** Sidelobe target cannot be met for this array */
    INFEASIBLE: 'INFEASIBLE',
    /** More constraints than degrees of freedom */
    OVER_CONSTRAINED: 'OVER_CONSTRAINED',
    /** Linear system is singular */
    SINGULAR_SYSTEM: 'SINGULAR_SYSTEM',

    // Pattern & metrics
    /** Raw samples cannot be normalized into a dataset */
    PATTERN_ERROR: 'PATTERN_ERROR',
    /** Requested frequency not present within tolerance */
    FREQUENCY_MISMATCH: 'FREQUENCY_MISMATCH',
    /** Metric undefined for the given pattern */
    METRIC_UNDEFINED: 'METRIC_UNDEFINED',

    // External
    /** Failure surfaced by the simulation backend */
    BACKEND_ERROR: 'BACKEND_ERROR',

    // Generic
    /** Invalid argument or configuration */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the beamsmith core
 */
export class BeamsmithError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'BeamsmithError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, BeamsmithError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Geometry cannot be turned into a valid linear array
 */
export class GeometryError extends BeamsmithError {
    constructor(
        code: typeof ErrorCodes.DEGENERATE_GEOMETRY
            | typeof ErrorCodes.NON_COLLINEAR
            | typeof ErrorCodes.NON_UNIFORM_SPACING,
        message: string,
        details?: unknown
    ) {
        super(code, message, details);
        this.name = 'GeometryError';
    }
}

/**
 * Excitation state does not match the geometry or holds invalid values
 */
export class ExcitationError extends BeamsmithError {
    /** Offending element ids, when known */
    readonly elementIds: string[];

    constructor(
        code: typeof ErrorCodes.EXCITATION_MISMATCH | typeof ErrorCodes.INVALID_EXCITATION,
        message: string,
        elementIds: string[] = [],
        details?: unknown
    ) {
        super(code, message, details ?? { elementIds });
        this.name = 'ExcitationError';
        this.elementIds = elementIds;
    }
}

/**
 * Objective cannot be synthesized (infeasible, over-constrained, singular)
 */
export class SynthesisError extends BeamsmithError {
    /** Objective kind that failed */
    readonly objective: string;

    constructor(
        code: typeof ErrorCodes.INFEASIBLE
            | typeof ErrorCodes.OVER_CONSTRAINED
            | typeof ErrorCodes.SINGULAR_SYSTEM,
        objective: string,
        message: string,
        details?: unknown
    ) {
        super(code, message, details);
        this.name = 'SynthesisError';
        this.objective = objective;
    }
}

/**
 * Raw pattern samples cannot be normalized or queried
 */
export class PatternError extends BeamsmithError {
    constructor(
        message: string,
        details?: unknown,
        code: typeof ErrorCodes.PATTERN_ERROR | typeof ErrorCodes.FREQUENCY_MISMATCH = ErrorCodes.PATTERN_ERROR
    ) {
        super(code, message, details);
        this.name = 'PatternError';
    }
}

/**
 * A requested metric is undefined for the given pattern
 */
export class MetricsError extends BeamsmithError {
    /** Metric that could not be computed */
    readonly metric: string;

    constructor(metric: string, message: string, details?: unknown) {
        super(ErrorCodes.METRIC_UNDEFINED, message, details);
        this.name = 'MetricsError';
        this.metric = metric;
    }
}

/**
 * Opaque failure surfaced by the simulation backend
 */
export class BackendError extends BeamsmithError {
    /** Backend operation that failed */
    readonly operation: 'apply' | 'samplePattern';
    /** Error thrown by the backend, untouched */
    readonly originalError?: unknown;

    constructor(operation: 'apply' | 'samplePattern', message: string, originalError?: unknown) {
        super(ErrorCodes.BACKEND_ERROR, message, { operation });
        this.name = 'BackendError';
        this.operation = operation;
        this.originalError = originalError;
    }
}

/**
 * Validation error (invalid argument or configuration)
 */
export class ValidationError extends BeamsmithError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a BeamsmithError
 */
export function isBeamsmithError(error: unknown): error is BeamsmithError {
    return error instanceof BeamsmithError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isBeamsmithError(error) && error.code === code;
}

/**
 * Wrap any error into a BeamsmithError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): BeamsmithError {
    if (isBeamsmithError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new BeamsmithError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new BeamsmithError(defaultCode, String(error));
}

/**
 * Wrap a simulator failure into a BackendError (kept as-is when it already is one)
 */
export function toBackendError(operation: 'apply' | 'samplePattern', error: unknown): BackendError {
    if (error instanceof BackendError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new BackendError(operation, `Backend ${operation} failed: ${message}`, error);
}
