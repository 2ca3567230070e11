/**
 * @module validation/validator
 * @description Grades achieved metrics against targets
 *
 * Grade bands are fixed multiples of the tolerance applied to the absolute
 * error, so grades stay comparable across designs:
 *
 * | error            | grade     |
 * |------------------|-----------|
 * | ≤ tolerance / 2  | Excellent |
 * | ≤ tolerance      | Good      |
 * | ≤ 2 × tolerance  | Fair      |
 * | otherwise        | Poor      |
 */

import { ValidationError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import { angleDifferenceDeg } from '../../core/units';

// ==================== Types ====================

export type Grade = 'Excellent' | 'Good' | 'Fair' | 'Poor';

/** Best first */
export const GRADE_ORDER: readonly Grade[] = ['Excellent', 'Good', 'Fair', 'Poor'];

/** Band edges as multiples of the tolerance */
const GRADE_BANDS: readonly { grade: Grade; multiple: number }[] = [
    { grade: 'Excellent', multiple: 0.5 },
    { grade: 'Good', multiple: 1 },
    { grade: 'Fair', multiple: 2 },
];

/**
 * How the target is read
 *
 * - `equal`: error on both sides counts
 * - `atMost`: achieved ≤ target is on target (e.g. sidelobe level)
 * - `atLeast`: achieved ≥ target is on target (e.g. front-to-back ratio)
 */
export type TargetMode = 'equal' | 'atMost' | 'atLeast';

export interface ValidateOptions {
    /** Metric name carried into the report */
    metric?: string;
    mode?: TargetMode;
    /** Measure the error on the circle (angles in degrees) */
    circular?: boolean;
    loggers?: Logger[];
}

/**
 * Graded comparison of one metric against its target
 */
export interface ValidationReport {
    metric: string;
    achieved: number;
    target: number;
    /** achieved − target (circular difference when requested) */
    error: number;
    /** Error counted for grading, after the target mode */
    gradedError: number;
    tolerance: number;
    mode: TargetMode;
    grade: Grade;
    passed: boolean;
}

/**
 * Aggregate over several reports
 */
export interface DesignReport {
    reports: ValidationReport[];
    /** Worst grade of all reports */
    grade: Grade;
    /** Every report passed */
    passed: boolean;
    /** Metrics that failed */
    failed: string[];
    timestamp: number;
}

// ==================== Grading ====================

/**
 * Grade an absolute error against a tolerance
 */
export function gradeError(absError: number, tolerance: number): Grade {
    for (const band of GRADE_BANDS) {
        if (absError <= band.multiple * tolerance) return band.grade;
    }
    return 'Poor';
}

/**
 * Compare an achieved value against a target
 *
 * @example
 * ```typescript
 * validate(31.9, 30, 2, { metric: 'steering' }).grade; // 'Good'
 * ```
 */
export function validate(
    achieved: number,
    target: number,
    tolerance: number,
    options: ValidateOptions = {}
): ValidationReport {
    if (!(tolerance > 0) || !Number.isFinite(tolerance)) {
        throw new ValidationError(`Tolerance must be positive and finite, got ${tolerance}`, { tolerance });
    }
    if (!Number.isFinite(achieved) || !Number.isFinite(target)) {
        throw new ValidationError('Achieved and target values must be finite', { achieved, target });
    }

    const mode = options.mode ?? 'equal';
    const error = options.circular ? angleDifferenceDeg(achieved, target) : achieved - target;

    let gradedError = Math.abs(error);
    switch (mode) {
        case 'atMost':
            gradedError = Math.max(0, error);
            break;
        case 'atLeast':
            gradedError = Math.max(0, -error);
            break;
    }

    const report: ValidationReport = {
        metric: options.metric ?? 'value',
        achieved,
        target,
        error,
        gradedError,
        tolerance,
        mode,
        grade: gradeError(gradedError, tolerance),
        passed: gradedError <= tolerance,
    };

    for (const logger of options.loggers ?? []) {
        logger.logValidation({
            metric: report.metric,
            achieved,
            target,
            grade: report.grade,
            passed: report.passed,
        });
    }
    return report;
}

/**
 * Combine reports: the worst grade wins, and all must pass
 */
export function buildDesignReport(reports: ValidationReport[]): DesignReport {
    if (reports.length === 0) {
        throw new ValidationError('A design report needs at least one validation');
    }
    const worst = reports.reduce(
        (acc, r) => Math.max(acc, GRADE_ORDER.indexOf(r.grade)),
        0
    );
    return {
        reports,
        grade: GRADE_ORDER[worst],
        passed: reports.every(r => r.passed),
        failed: reports.filter(r => !r.passed).map(r => r.metric),
        timestamp: Date.now(),
    };
}

/**
 * Export a design report as JSON
 */
export function reportToJson(report: DesignReport): string {
    return JSON.stringify(report, null, 2);
}
