/**
 * @module core
 * @description Shared foundation of the design core
 *
 * ## Modules
 * - `config`: DesignConfig with defaults, validation and hashing
 * - `errors`: Error codes and typed error classes
 * - `logging`: Structured iteration/synthesis/validation logs
 * - `units`: Unit parsing and angle/phase helpers
 */

// ==================== Config ====================

export type {
    TaperMethod,
    OptimizerMethod,
    CostKind,
    PatternScale,
    GeometryConfig,
    SynthesisConfig,
    OptimizerConfig,
    ExtractionConfig,
    MetricsConfig,
    DesignConfig,
    DesignConfigInput,
    ValidationResult,
} from './config';

export {
    DEFAULT_DESIGN_CONFIG,
    createDesignConfig,
    resolveDesignConfig,
    validateDesignConfig,
    serializeDesignConfig,
    deserializeDesignConfig,
    computeConfigHash,
    contentHash,
    SeededRandom,
    sortObjectKeys,
} from './config';

// ==================== Errors ====================

export type { ErrorCode } from './errors';

export {
    ErrorCodes,
    BeamsmithError,
    GeometryError,
    ExcitationError,
    SynthesisError,
    PatternError,
    MetricsError,
    BackendError,
    ValidationError,
    isBeamsmithError,
    hasErrorCode,
    wrapError,
    toBackendError,
} from './errors';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationLogEntry,
    SynthesisLogEntry,
    ValidationLogEntry,
    LogEntry,
    Logger,
    LoggerConfig,
    EntryInput,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Units ====================

export type { LengthUnit, ParsedQuantity } from './units';

export {
    SPEED_OF_LIGHT,
    parseQuantity,
    parseLength,
    parseAngle,
    parseFrequency,
    parseAmplitude,
    linearToDb,
    dbToLinear,
    degToRad,
    radToDeg,
    wavelength,
    wavenumber,
    wrapPhase,
    wrapDeg360,
    angleDifferenceDeg,
} from './units';
