export * from './chain';
export * from './sweep';
