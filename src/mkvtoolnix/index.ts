export * from './mkvToolnix';
export type * from './types';
