import type { Timecode } from '../timeline/timecode';

/**
 * A container file's own segment identity
 */
export interface SegmentInfo {
  /** Segment UID as lower-case hex */
  id: string;
  duration: Timecode;
}

export interface SegmentRegistryEntry extends SegmentInfo {
  file: string;
}

/**
 * Reads a file's segment UID and duration (mkvmerge in production)
 */
export type SegmentProbe = (file: string) => Promise<SegmentInfo | null>;
