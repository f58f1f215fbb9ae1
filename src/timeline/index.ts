export * from './timecode';
export * from './timelineBuilder';
export type * from './types';
