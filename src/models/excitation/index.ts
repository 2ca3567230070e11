/**
 * @module excitation
 * @description Element excitations and their saved snapshots
 */

export type { ElementExcitation } from './state';
export { ExcitationState } from './state';

export type { SerializedExcitation, ExcitationInput } from './snapshot';
export { serializeExcitation, deserializeExcitation, SnapshotStore } from './snapshot';
