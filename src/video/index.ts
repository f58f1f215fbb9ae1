export * from './ffmpeg';
export * from './encodeTemplate';
export type * from './types';
