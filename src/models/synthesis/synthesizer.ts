/**
 * @module synthesis/synthesizer
 * @description Routes a beam-shaping objective to its synthesis method
 *
 * Closed-form objectives (steer, sidelobe, nulls) are computed directly;
 * pattern matching runs an optimizer against the simulator. Infeasible
 * objectives come back as `{ ok: false }`; structural, validation and
 * backend errors are thrown.
 */

import { DEFAULT_DESIGN_CONFIG } from '../../core/config';
import type { DesignConfig } from '../../core/config';
import { SynthesisError, ValidationError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import type { Simulator } from '../../backend/simulator';
import type { ExcitationState } from '../excitation/state';
import type { GeometryModel } from '../geometry/types';
import { placeNulls } from './nulls';
import { matchPattern } from './pattern-match';
import { sidelobeExcitation, steerToAngle } from './steering';
import type { OptimizationOutcome, SteeringObjective, SynthesisResult } from './types';

export interface SynthesizerOptions {
    config?: DesignConfig;
    /** Required for pattern matching */
    simulator?: Simulator;
    loggers?: Logger[];
    /** Clock (ms) */
    now?: () => number;
}

export interface SynthesizeOptions {
    signal?: AbortSignal;
}

/**
 * @example
 * ```typescript
 * const synthesizer = new ExcitationSynthesizer({ simulator });
 * const result = await synthesizer.synthesize(geometry, { kind: 'steer', thetaDeg: 30 }, 3e9);
 * if (result.ok) await simulator.evaluate(result.excitation, 3e9);
 * ```
 */
export class ExcitationSynthesizer {
    readonly config: DesignConfig;
    private readonly simulator: Simulator | undefined;
    private readonly loggers: Logger[];
    private readonly now: () => number;

    constructor(options: SynthesizerOptions = {}) {
        this.config = options.config ?? DEFAULT_DESIGN_CONFIG;
        this.simulator = options.simulator;
        this.loggers = options.loggers ?? [];
        this.now = options.now ?? Date.now;
    }

    async synthesize(
        geometry: GeometryModel,
        objective: SteeringObjective,
        frequencyHz: number,
        options: SynthesizeOptions = {}
    ): Promise<SynthesisResult> {
        if (!(frequencyHz > 0) || !Number.isFinite(frequencyHz)) {
            throw new ValidationError(`Frequency must be positive, got ${frequencyHz}`, { frequencyHz });
        }
        const started = this.now();

        let solved: { excitation: ExcitationState; outcome?: OptimizationOutcome };
        try {
            solved = await this.solve(geometry, objective, frequencyHz, options);
        } catch (error) {
            if (error instanceof SynthesisError) {
                this.log(objective.kind, 'failed', started, error.message, { code: error.code });
                return { ok: false, objective: objective.kind, error };
            }
            throw error;
        }

        const { excitation, outcome } = solved;
        if (outcome) {
            this.log(objective.kind, outcome.status, started, outcome.reason, {
                cost: outcome.cost,
                iterations: outcome.iterations,
                evaluations: outcome.evaluations,
            });
        } else {
            this.log(objective.kind, 'ok', started);
        }
        return { ok: true, objective: objective.kind, excitation, outcome };
    }

    private async solve(
        geometry: GeometryModel,
        objective: SteeringObjective,
        frequencyHz: number,
        options: SynthesizeOptions
    ): Promise<{ excitation: ExcitationState; outcome?: OptimizationOutcome }> {
        const { synthesis } = this.config;
        switch (objective.kind) {
            case 'steer':
                return {
                    excitation: steerToAngle(geometry, objective.thetaDeg, frequencyHz, {
                        taper: objective.taper && {
                            ...objective.taper,
                            method: objective.taper.method ?? synthesis.taperMethod,
                        },
                        maxTaperDynamicRangeDb: synthesis.maxTaperDynamicRangeDb,
                    }),
                };
            case 'sidelobe':
                return {
                    excitation: sidelobeExcitation(
                        geometry,
                        { levelDb: objective.levelDb, method: objective.method ?? synthesis.taperMethod, nbar: objective.nbar },
                        frequencyHz,
                        objective.steerDeg ?? 0,
                        synthesis.maxTaperDynamicRangeDb
                    ),
                };
            case 'nulls':
                return {
                    excitation: placeNulls(geometry, objective.nullsDeg, frequencyHz, {
                        mainBeamDeg: objective.mainBeamDeg,
                        singularityTolerance: synthesis.singularityTolerance,
                    }),
                };
            case 'patternMatch': {
                if (this.simulator === undefined) {
                    throw new ValidationError('Pattern matching needs a simulator');
                }
                const outcome = await matchPattern(geometry, objective, frequencyHz, this.simulator, {
                    optimizer: this.config.optimizer,
                    signal: options.signal,
                    loggers: this.loggers,
                    now: this.now,
                });
                return { excitation: outcome.excitation, outcome };
            }
        }
    }

    private log(
        objective: string,
        status: string,
        started: number,
        message?: string,
        details?: Record<string, unknown>
    ): void {
        const durationMs = this.now() - started;
        for (const logger of this.loggers) {
            logger.logSynthesis({ objective, status, durationMs, message, details });
        }
    }
}
