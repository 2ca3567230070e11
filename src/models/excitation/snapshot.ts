/**
 * @module excitation/snapshot
 * @description Flat JSON form of an ExcitationState and a named snapshot store
 *
 * Wire form: `{ "<element id>": { "amplitude": <linear>, "phase": <radians> }, ... }`
 * in physical order. On input, values may also be strings with units
 * ("1W", "0.5V", "30deg", "0.52rad").
 */

import { ErrorCodes, ExcitationError, isBeamsmithError } from '../../core/errors';
import { parseAmplitude, parseAngle } from '../../core/units';
import type { GeometryModel } from '../geometry/types';
import { ExcitationState } from './state';
import type { ElementExcitation } from './state';

/**
 * Flat mapping written by `serializeExcitation`
 */
export type SerializedExcitation = Record<string, { amplitude: number; phase: number }>;

/**
 * Mapping accepted on input (numbers or unit-suffixed strings)
 */
export type ExcitationInput = Record<string, { amplitude: number | string; phase: number | string }>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is number | string {
    return typeof value === 'number' || typeof value === 'string';
}

/**
 * Serialize to the flat, human-inspectable JSON mapping
 */
export function serializeExcitation(state: ExcitationState, space: number = 2): string {
    const out: SerializedExcitation = state.toRecord();
    return JSON.stringify(out, null, space);
}

/**
 * Parse one element's amplitude and phase through the unit boundary
 */
function parseElement(id: string, raw: unknown): ElementExcitation {
    if (!isRecord(raw) || !isScalar(raw.amplitude) || !isScalar(raw.phase)) {
        throw new ExcitationError(
            ErrorCodes.INVALID_EXCITATION,
            `Element "${id}" must be an object with "amplitude" and "phase"`,
            [id],
            { elementId: id, value: raw }
        );
    }
    try {
        return { amplitude: parseAmplitude(raw.amplitude), phase: parseAngle(raw.phase, 'rad') };
    } catch (error) {
        if (isBeamsmithError(error)) {
            throw new ExcitationError(
                ErrorCodes.INVALID_EXCITATION,
                `Element "${id}": ${error.message}`,
                [id],
                { elementId: id, cause: error.toJSON() }
            );
        }
        throw error;
    }
}

function parseJson(text: string, what: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new ExcitationError(
            ErrorCodes.INVALID_EXCITATION,
            `${what} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
    }
}

/**
 * Restore an ExcitationState from its JSON text or an already-parsed mapping
 *
 * @throws ExcitationError on malformed input, unparseable values, or ids that
 * do not match the geometry
 */
export function deserializeExcitation(
    input: string | ExcitationInput,
    geometry: GeometryModel
): ExcitationState {
    const data: unknown = typeof input === 'string' ? parseJson(input, 'Excitation snapshot') : input;
    if (!isRecord(data)) {
        throw new ExcitationError(ErrorCodes.INVALID_EXCITATION, 'Excitation snapshot must be a JSON object');
    }

    const values: Record<string, ElementExcitation> = {};
    for (const [id, raw] of Object.entries(data)) {
        values[id] = parseElement(id, raw);
    }
    return ExcitationState.create(geometry, values);
}

/**
 * Named excitation snapshots, kept in serialized form
 *
 * Snapshots are reloaded against a geometry, so a snapshot saved for one
 * design fails loudly when loaded into a design with different elements.
 */
export class SnapshotStore {
    private readonly snapshots = new Map<string, SerializedExcitation>();

    save(name: string, state: ExcitationState): void {
        this.snapshots.set(name, state.toRecord());
    }

    /**
     * @throws ExcitationError when no snapshot has this name or it does not fit `geometry`
     */
    load(name: string, geometry: GeometryModel): ExcitationState {
        const snapshot = this.snapshots.get(name);
        if (snapshot === undefined) {
            throw new ExcitationError(ErrorCodes.EXCITATION_MISMATCH, `No snapshot named "${name}"`, [], { name });
        }
        return deserializeExcitation(snapshot, geometry);
    }

    has(name: string): boolean {
        return this.snapshots.has(name);
    }

    delete(name: string): boolean {
        return this.snapshots.delete(name);
    }

    names(): string[] {
        return [...this.snapshots.keys()].sort();
    }

    toJSON(): Record<string, SerializedExcitation> {
        const out: Record<string, SerializedExcitation> = {};
        for (const name of this.names()) {
            const snapshot = this.snapshots.get(name);
            if (snapshot !== undefined) out[name] = snapshot;
        }
        return out;
    }

    /**
     * Rebuild a store from `JSON.stringify(store)`
     */
    static fromJSON(json: string): SnapshotStore {
        const data = parseJson(json, 'Snapshot store');
        if (!isRecord(data)) {
            throw new ExcitationError(ErrorCodes.INVALID_EXCITATION, 'Snapshot store must be a JSON object');
        }
        const store = new SnapshotStore();
        for (const [name, snapshot] of Object.entries(data)) {
            if (!isRecord(snapshot)) {
                throw new ExcitationError(
                    ErrorCodes.INVALID_EXCITATION,
                    `Snapshot "${name}" must be a JSON object`,
                    [],
                    { name }
                );
            }
            const entries: SerializedExcitation = {};
            for (const [id, raw] of Object.entries(snapshot)) {
                entries[id] = parseElement(id, raw);
            }
            store.snapshots.set(name, entries);
        }
        return store;
    }
}
