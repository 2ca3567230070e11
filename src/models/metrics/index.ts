/**
 * @module metrics
 * @description Beam metrics from pattern cuts
 */

export type { PeakInfo, HalfPowerPoints, MetricsSummary } from './calculator';
export { MetricsCalculator, steeringErrorDeg, HALF_POWER_DB } from './calculator';
