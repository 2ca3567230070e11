/**
 * Excitation Module Tests
 * ExcitationState construction, hashing, serialization and snapshots
 */

import { describe, it, expect } from 'vitest';
import {
    ExcitationState,
    serializeExcitation,
    deserializeExcitation,
    SnapshotStore,
} from '../src/models/excitation';
import { uniformLinearArray } from '../src/models/geometry';
import { ErrorCodes, ExcitationError } from '../src/core/errors';
import { arraysClose, catchError } from './test-utils';

const geometry = uniformLinearArray(3, 0.05);

function expectExcitationError(fn: () => unknown, code: string): ExcitationError {
    const error = catchError(fn);
    expect(error).toBeInstanceOf(ExcitationError);
    if (!(error instanceof ExcitationError)) throw error;
    expect(error.code).toBe(code);
    return error;
}

describe('ExcitationState', () => {
    describe('create', () => {
        it('should keep values in physical order', () => {
            const state = ExcitationState.create(geometry, {
                E2: { amplitude: 0.2, phase: 0.3 },
                E0: { amplitude: 1, phase: 0 },
                E1: { amplitude: 0.5, phase: -0.1 },
            });
            expect(state.ids).toEqual(['E0', 'E1', 'E2']);
            expect(state.amplitudes).toEqual([1, 0.5, 0.2]);
            expect(state.phases).toEqual([0, -0.1, 0.3]);
        });

        it('should report missing and extra ids', () => {
            const error = expectExcitationError(
                () => ExcitationState.create(geometry, {
                    E0: { amplitude: 1, phase: 0 },
                    E1: { amplitude: 1, phase: 0 },
                    X9: { amplitude: 1, phase: 0 },
                }),
                ErrorCodes.EXCITATION_MISMATCH
            );
            expect(error.elementIds).toEqual(['E2', 'X9']);
            expect(error.details).toEqual({ missing: ['E2'], extra: ['X9'] });
        });

        it('should reject negative amplitudes', () => {
            const error = expectExcitationError(
                () => ExcitationState.create(geometry, {
                    E0: { amplitude: 1, phase: 0 },
                    E1: { amplitude: -0.5, phase: 0 },
                    E2: { amplitude: 1, phase: 0 },
                }),
                ErrorCodes.INVALID_EXCITATION
            );
            expect(error.elementIds).toEqual(['E1']);
        });

        it('should reject non-finite phases', () => {
            expectExcitationError(
                () => ExcitationState.fromArrays(geometry, [1, 1, 1], [0, Number.NaN, 0]),
                ErrorCodes.INVALID_EXCITATION
            );
        });

        it('should wrap phases to (−π, π]', () => {
            const state = ExcitationState.fromArrays(geometry, [1, 1, 1], [3 * Math.PI / 2, -Math.PI, 2 * Math.PI]);
            expect(arraysClose(state.phases, [-Math.PI / 2, Math.PI, 0], 1e-12, 1e-12)).toBe(true);
        });
    });

    it('should build a uniform state', () => {
        const state = ExcitationState.uniform(geometry, 0.5);
        expect(state.amplitudes).toEqual([0.5, 0.5, 0.5]);
        expect(state.phases).toEqual([0, 0, 0]);
    });

    it('should reject arrays of the wrong length', () => {
        expectExcitationError(
            () => ExcitationState.fromArrays(geometry, [1, 1], [0, 0]),
            ErrorCodes.EXCITATION_MISMATCH
        );
    });

    describe('fromComplex', () => {
        it('should normalize the peak and reference phases to element 0', () => {
            const state = ExcitationState.fromComplex(geometry, {
                real: [0, 0, -2],
                imag: [1, 2, 0],
            });
            // magnitudes 1, 2, 2; phases π/2, π/2, π → 0, 0, π/2
            expect(arraysClose(state.amplitudes, [0.5, 1, 1], 1e-12, 1e-12)).toBe(true);
            expect(arraysClose(state.phases, [0, 0, Math.PI / 2], 1e-12, 1e-12)).toBe(true);
        });

        it('should reference to the first non-zero element when element 0 is off', () => {
            const state = ExcitationState.fromComplex(geometry, {
                real: [0, 0, 1],
                imag: [0, -1, 0],
            });
            expect(arraysClose(state.amplitudes, [0, 1, 1], 1e-12, 1e-12)).toBe(true);
            expect(arraysClose(state.phases, [0, 0, Math.PI / 2], 1e-12, 1e-12)).toBe(true);
        });

        it('should reject all-zero weights', () => {
            expectExcitationError(
                () => ExcitationState.fromComplex(geometry, { real: [0, 0, 0], imag: [0, 0, 0] }),
                ErrorCodes.INVALID_EXCITATION
            );
        });
    });

    it('should round-trip complex weights', () => {
        const state = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, 1, -2]);
        const again = ExcitationState.fromComplex(geometry, state.toComplex());
        expect(again.equals(state, 1e-12)).toBe(true);
    });

    it('should derive new states without mutating the original', () => {
        const state = ExcitationState.uniform(geometry);
        const changed = state.withElement('E1', { amplitude: 0.5, phase: Math.PI / 2 });
        expect(state.get('E1')).toEqual({ amplitude: 1, phase: 0 });
        expect(changed.get('E1')).toEqual({ amplitude: 0.5, phase: Math.PI / 2 });
        expect(state.scaled(2).amplitudes).toEqual([2, 2, 2]);
        expect(changed.scaled(4).normalized().amplitudes).toEqual([1, 0.5, 1]);
    });

    it('should put the largest amplitude on exactly 1', () => {
        // 0.994140625 · (1 / 0.994140625) rounds to 0.9999999999999999
        const state = ExcitationState.fromArrays(geometry, [0.5, 0.994140625, 0.25], [0, 0, 0]);
        expect(Math.max(...state.normalized().amplitudes)).toBe(1);
    });

    it('should reject unknown element ids', () => {
        const state = ExcitationState.uniform(geometry);
        expectExcitationError(() => state.get('E7'), ErrorCodes.EXCITATION_MISMATCH);
        expectExcitationError(() => state.withElement('E7', { amplitude: 1, phase: 0 }), ErrorCodes.EXCITATION_MISMATCH);
    });

    describe('contentHash', () => {
        it('should ignore float noise', () => {
            const a = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, 1, -2]);
            const b = ExcitationState.fromArrays(geometry, [1, 0.5 + 1e-13, 0.25], [0, 1, -2 - 1e-13]);
            expect(a.contentHash()).toBe(b.contentHash());
        });

        it('should change with the content', () => {
            const a = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, 1, -2]);
            const b = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, 1, -2.1]);
            expect(a.contentHash()).not.toBe(b.contentHash());
        });
    });

    it('should compare phases on the circle', () => {
        const a = ExcitationState.fromArrays(geometry, [1, 1, 1], [Math.PI, 0, 0]);
        const b = ExcitationState.fromArrays(geometry, [1, 1, 1], [-Math.PI + 1e-14, 0, 0]);
        expect(a.equals(b, 1e-12)).toBe(true);
    });
});

describe('Excitation serialization', () => {
    const state = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, -1.2, 2.5]);

    it('should round-trip through JSON', () => {
        const restored = deserializeExcitation(serializeExcitation(state), geometry);
        expect(restored.ids).toEqual(state.ids);
        for (const id of state.ids) {
            expect(restored.get(id).amplitude).toBeCloseTo(state.get(id).amplitude, 12);
            expect(restored.get(id).phase).toBeCloseTo(state.get(id).phase, 12);
        }
    });

    it('should write a flat mapping', () => {
        expect(JSON.parse(serializeExcitation(state))).toEqual({
            E0: { amplitude: 1, phase: 0 },
            E1: { amplitude: 0.5, phase: -1.2 },
            E2: { amplitude: 0.25, phase: 2.5 },
        });
    });

    it('should parse values with units', () => {
        const restored = deserializeExcitation(
            {
                E0: { amplitude: '1W', phase: '0deg' },
                E1: { amplitude: '0.25W', phase: '90deg' },
                E2: { amplitude: '500mV', phase: '0.5rad' },
            },
            geometry
        );
        expect(arraysClose(restored.amplitudes, [1, 0.5, 0.5], 1e-12, 1e-12)).toBe(true);
        expect(arraysClose(restored.phases, [0, Math.PI / 2, 0.5], 1e-12, 1e-12)).toBe(true);
    });

    it('should reject unparseable values with the element id', () => {
        const error = expectExcitationError(
            () => deserializeExcitation(
                {
                    E0: { amplitude: '1W', phase: '0deg' },
                    E1: { amplitude: 'loud', phase: '0deg' },
                    E2: { amplitude: 1, phase: 0 },
                },
                geometry
            ),
            ErrorCodes.INVALID_EXCITATION
        );
        expect(error.elementIds).toEqual(['E1']);
    });

    it('should reject invalid JSON', () => {
        expectExcitationError(() => deserializeExcitation('{not json', geometry), ErrorCodes.INVALID_EXCITATION);
        expectExcitationError(() => deserializeExcitation('[1, 2]', geometry), ErrorCodes.INVALID_EXCITATION);
    });
});

describe('SnapshotStore', () => {
    it('should save and load named snapshots', () => {
        const store = new SnapshotStore();
        const state = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, 0.1, 0.2]);
        store.save('taper', state);
        store.save('baseline', ExcitationState.uniform(geometry));

        expect(store.names()).toEqual(['baseline', 'taper']);
        expect(store.has('taper')).toBe(true);
        expect(store.load('taper', geometry).equals(state)).toBe(true);
    });

    it('should fail to load a missing snapshot', () => {
        const store = new SnapshotStore();
        expectExcitationError(() => store.load('nope', geometry), ErrorCodes.EXCITATION_MISMATCH);
    });

    it('should fail to load into a different geometry', () => {
        const store = new SnapshotStore();
        store.save('three', ExcitationState.uniform(geometry));
        expectExcitationError(() => store.load('three', uniformLinearArray(4, 0.05)), ErrorCodes.EXCITATION_MISMATCH);
    });

    it('should delete snapshots', () => {
        const store = new SnapshotStore();
        store.save('a', ExcitationState.uniform(geometry));
        expect(store.delete('a')).toBe(true);
        expect(store.delete('a')).toBe(false);
        expect(store.names()).toEqual([]);
    });

    it('should round-trip through JSON', () => {
        const store = new SnapshotStore();
        const state = ExcitationState.fromArrays(geometry, [1, 0.5, 0.25], [0, -0.4, 0.9]);
        store.save('design', state);
        const restored = SnapshotStore.fromJSON(JSON.stringify(store));
        expect(restored.names()).toEqual(['design']);
        expect(restored.load('design', geometry).equals(state, 1e-12)).toBe(true);
    });

    it('should reject malformed store JSON', () => {
        const error = expectExcitationError(() => SnapshotStore.fromJSON('{"design": '), ErrorCodes.INVALID_EXCITATION);
        expect(error.message.startsWith('Snapshot store is not valid JSON: ')).toBe(true);
        expectExcitationError(() => SnapshotStore.fromJSON('{"design": 3}'), ErrorCodes.INVALID_EXCITATION);
    });
});
