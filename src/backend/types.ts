/**
 * @module backend/types
 * @description Contract of the external electromagnetic simulator
 */

import type { ExcitationState } from '../models/excitation/state';
import type { RawPatternData } from '../models/pattern/types';

/**
 * Whether the backend can serve several apply+sample sequences at once
 *
 * - `exclusive`: one live design session; sequences are serialized
 * - `shared`: independent sessions; sequences may overlap
 */
export type BackendConcurrency = 'exclusive' | 'shared';

/**
 * Simulation backend capability, passed explicitly to whatever needs it
 *
 * Both operations may be slow. Failures are surfaced as rejected promises
 * and wrapped into `BackendError` by the `Simulator`; they are never retried.
 */
export interface SimulationBackend {
    readonly concurrency: BackendConcurrency;
    /** Push an excitation to the live design */
    apply(excitation: ExcitationState): Promise<void>;
    /** Far-field samples for the currently applied excitation */
    samplePattern(frequencyHz: number, quantity: string): Promise<RawPatternData>;
}
