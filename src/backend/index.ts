/**
 * @module backend
 * @description Simulation backend contract, cache, lock and reference simulator
 */

export * from './types';
export * from './lock';
export * from './cache';
export * from './simulator';
export * from './variables';
export * from './array-factor-backend';
