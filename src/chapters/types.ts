/**
 * How a ChapterSegmentUID value is written in the chapter XML
 */
export type SegmentUidFormat = 'hex' | 'ascii';
