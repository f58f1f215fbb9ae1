export * from './assSchema';
export * from './styleUnifier';
export type * from './types';
