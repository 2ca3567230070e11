/**
 * @module synthesis
 * @description Excitation synthesis for steering, sidelobe, null and pattern objectives
 */

export * from './types';
export * from './taper';
export * from './steering';
export * from './nulls';
export * from './pattern-match';
export * from './synthesizer';
