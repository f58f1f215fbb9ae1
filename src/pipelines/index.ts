export * from './batchRunner';
export * from './jobPipeline';
export * from './mediaToolkit';
export * from './unlinkPipeline';
export type * from './types';
