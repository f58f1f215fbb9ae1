export * from './segmentRegistry';
export type * from './types';
