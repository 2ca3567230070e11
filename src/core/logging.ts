/**
 * @module core/logging
 * @description Structured logging for synthesis runs
 *
 * Loggers receive typed entries (optimizer iterations, synthesis summaries,
 * validation reports) with a fixed, versioned schema. Components take a
 * `loggers` array; there is no global logger.
 *
 * Browser-compatible: ConsoleLogger and MemoryLogger work in all environments.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Design (session) identifier */
    design: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * One optimizer iteration
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    iteration: number;
    /** Cost of the current point */
    cost: number;
    /** Best cost so far */
    bestCost: number;
    /** Current step size (pattern search) or simplex size (Nelder-Mead) */
    step: number;
    /** Backend evaluations so far */
    evaluations: number;
}

/**
 * Summary of one synthesis call
 */
export interface SynthesisLogEntry extends BaseLogEntry {
    logType: 'synthesis';
    objective: string;
    /** 'ok', 'failed', or an optimization status */
    status: string;
    durationMs: number;
    message?: string;
    details?: Record<string, unknown>;
}

/**
 * Graded validation of one metric
 */
export interface ValidationLogEntry extends BaseLogEntry {
    logType: 'validation';
    metric: string;
    achieved: number;
    target: number;
    grade: string;
    passed: boolean;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | SynthesisLogEntry | ValidationLogEntry;

type EntryInput<E extends LogEntry> = Omit<E, 'logType' | 'schemaVersion' | 'timestamp' | 'design'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log an optimizer iteration */
    logIteration(entry: EntryInput<IterationLogEntry>): void;
    /** Log a synthesis summary */
    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void;
    /** Log a validation report */
    logValidation(entry: EntryInput<ValidationLogEntry>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Design name recorded in every entry */
    design: string;
    /** Minimum console level */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// ==================== Console Logger (Browser-compatible) ====================

/**
 * Console Logger: Print to console
 *
 * Iterations print at 'debug', syntheses and validations at 'info';
 * failed syntheses and failed validations print at 'warn'.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private design: string;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.design = 'design';
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.design = levelOrConfig.design;
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logIteration(entry: EntryInput<IterationLogEntry>): void {
        if (this.enabled('debug')) {
            console.log(
                `[ITER] ${this.design} #${entry.iteration}: cost=${entry.cost.toFixed(5)}, ` +
                `best=${entry.bestCost.toFixed(5)}, step=${entry.step.toPrecision(3)}, evals=${entry.evaluations}`
            );
        }
    }

    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void {
        const level: LogLevel = entry.status === 'failed' ? 'warn' : 'info';
        if (this.enabled(level)) {
            const line = `[SYNTH] ${this.design} ${entry.objective}: ${entry.status} ` +
                `(${entry.durationMs.toFixed(0)} ms)${entry.message ? ` - ${entry.message}` : ''}`;
            if (level === 'warn') {
                console.warn(line);
            } else {
                console.log(line);
            }
        }
    }

    logValidation(entry: EntryInput<ValidationLogEntry>): void {
        const level: LogLevel = entry.passed ? 'info' : 'warn';
        if (this.enabled(level)) {
            const line = `[VALID] ${this.design} ${entry.metric}: achieved=${entry.achieved.toFixed(3)}, ` +
                `target=${entry.target.toFixed(3)}, grade=${entry.grade}`;
            if (level === 'warn') {
                console.warn(line);
            } else {
                console.log(line);
            }
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for attaching iteration history to reports.
 */
export class MemoryLogger implements Logger {
    private config: { design: string; schemaVersion: string };
    public iterations: IterationLogEntry[] = [];
    public syntheses: SynthesisLogEntry[] = [];
    public validations: ValidationLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            design: config.design,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            design: this.config.design,
            timestamp: Date.now(),
        };
    }

    logIteration(entry: EntryInput<IterationLogEntry>): void {
        this.iterations.push({ ...this.createBaseEntry(), logType: 'iteration', ...entry });
    }

    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void {
        this.syntheses.push({ ...this.createBaseEntry(), logType: 'synthesis', ...entry });
    }

    logValidation(entry: EntryInput<ValidationLogEntry>): void {
        this.validations.push({ ...this.createBaseEntry(), logType: 'validation', ...entry });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.syntheses, ...this.validations];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.syntheses = [];
        this.validations = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: EntryInput<IterationLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logSynthesis(entry: EntryInput<SynthesisLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logSynthesis(entry);
        }
    }

    logValidation(entry: EntryInput<ValidationLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logValidation(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(format: 'console' | 'memory', config: LoggerConfig): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}

export type { EntryInput };
