/**
 * @module validation
 * @description Graded validation of achieved metrics
 */

export type {
    Grade,
    TargetMode,
    ValidateOptions,
    ValidationReport,
    DesignReport,
} from './validator';

export {
    GRADE_ORDER,
    gradeError,
    validate,
    buildDesignReport,
    reportToJson,
} from './validator';
