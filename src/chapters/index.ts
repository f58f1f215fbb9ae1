export * from './chapterModel';
export * from './segmentUid';
export type * from './types';
