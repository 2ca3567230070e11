/**
 * @module workflow/chain
 * @description One design pass: synthesize → simulate → extract → score → grade
 */

import type { Logger } from '../core/logging';
import type { Simulator } from '../backend/simulator';
import type { GeometryModel } from '../models/geometry/types';
import { MetricsCalculator } from '../models/metrics/calculator';
import type { MetricsSummary } from '../models/metrics/calculator';
import type { CutSpec, PatternCut } from '../models/pattern/types';
import type { ExcitationSynthesizer } from '../models/synthesis/synthesizer';
import type { SteeringObjective, SynthesisResult } from '../models/synthesis/types';
import { buildDesignReport, validate } from '../models/validation/validator';
import type { DesignReport, ValidationReport } from '../models/validation/validator';

/**
 * Targets graded after simulation; each is optional
 */
export interface DesignTargets {
    /** Main-beam direction from broadside; defaults to the objective's beam direction */
    steeringDeg?: number;
    steeringToleranceDeg?: number;
    /** Graded as "at most" */
    sidelobeLevelDb?: number;
    sidelobeToleranceDb?: number;
    hpbwDeg?: number;
    hpbwToleranceDeg?: number;
}

export interface DesignChainRequest {
    geometry: GeometryModel;
    objective: SteeringObjective;
    frequencyHz: number;
    /** Cut used for metrics (default φ = 0°) */
    cut?: CutSpec;
    quantity?: string;
    targets?: DesignTargets;
    signal?: AbortSignal;
}

export interface DesignChainContext {
    synthesizer: ExcitationSynthesizer;
    simulator: Simulator;
    calculator?: MetricsCalculator;
    loggers?: Logger[];
}

/**
 * Stages reached by one chain; later stages are absent when synthesis failed
 */
export interface DesignChainResult {
    synthesis: SynthesisResult;
    cut?: PatternCut;
    metrics?: MetricsSummary;
    report?: DesignReport;
}

const DEFAULT_STEERING_TOLERANCE_DEG = 2;
const DEFAULT_SIDELOBE_TOLERANCE_DB = 1;
const DEFAULT_HPBW_TOLERANCE_DEG = 2;

function beamDirection(objective: SteeringObjective): number | undefined {
    switch (objective.kind) {
        case 'steer':
            return objective.thetaDeg;
        case 'sidelobe':
            return objective.steerDeg ?? 0;
        case 'nulls':
            return objective.mainBeamDeg ?? 0;
        case 'patternMatch':
            return undefined;
    }
}

/**
 * @example
 * ```typescript
 * const result = await runDesignChain(
 *     { geometry, objective: { kind: 'steer', thetaDeg: 30 }, frequencyHz: 3e9 },
 *     { synthesizer, simulator }
 * );
 * result.report?.grade; // 'Excellent'
 * ```
 */
export async function runDesignChain(
    request: DesignChainRequest,
    context: DesignChainContext
): Promise<DesignChainResult> {
    const { geometry, objective, frequencyHz } = request;
    const spec = request.cut ?? { kind: 'phi', phiDeg: 0 };
    const targets = request.targets ?? {};
    const calculator = context.calculator ?? new MetricsCalculator();
    const loggers = context.loggers ?? [];

    const synthesis = await context.synthesizer.synthesize(geometry, objective, frequencyHz, { signal: request.signal });
    if (!synthesis.ok) {
        return { synthesis };
    }

    const cut = await context.simulator.cut(synthesis.excitation, frequencyHz, spec, request.quantity);
    const metrics = calculator.summarize(cut);

    const reports: ValidationReport[] = [];
    const steeringDeg = targets.steeringDeg ?? beamDirection(objective);
    if (steeringDeg !== undefined) {
        reports.push(validate(metrics.peak.angleDeg, steeringDeg, targets.steeringToleranceDeg ?? DEFAULT_STEERING_TOLERANCE_DEG, {
            metric: 'steeringAngle',
            circular: true,
            loggers,
        }));
    }
    if (targets.sidelobeLevelDb !== undefined && metrics.sidelobeLevelDb !== null) {
        reports.push(validate(metrics.sidelobeLevelDb, targets.sidelobeLevelDb, targets.sidelobeToleranceDb ?? DEFAULT_SIDELOBE_TOLERANCE_DB, {
            metric: 'sidelobeLevel',
            mode: 'atMost',
            loggers,
        }));
    }
    if (targets.hpbwDeg !== undefined && metrics.hpbwDeg !== null) {
        reports.push(validate(metrics.hpbwDeg, targets.hpbwDeg, targets.hpbwToleranceDeg ?? DEFAULT_HPBW_TOLERANCE_DEG, {
            metric: 'hpbw',
            loggers,
        }));
    }

    return {
        synthesis,
        cut,
        metrics,
        report: reports.length > 0 ? buildDesignReport(reports) : undefined,
    };
}
