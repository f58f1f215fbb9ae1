import type { Timecode } from './timecode';

/**
 * Values threaded through the left-to-right walk over an edition's chapters
 */
export interface ReconstructionState {
  /** Total duration of external segments placed so far */
  offset: Timecode;
  /** End of the rebuilt timeline after the last processed chapter */
  offsetEnd: Timecode;
  /** UID of the external segment the previous chapter pulled in, if any */
  lastExternalId: string | null;
  /** Original-file end time of the most recent internal chapter */
  lastInternalEnd: Timecode;
  chapterIndex: number;
  inInternalRun: boolean;
  internalRuns: number;
  externalSeen: boolean;
}

/**
 * What one chapter contributes to the rebuilt file
 */
export type TimelineSegment =
  | {
      kind: 'external';
      chapterIndex: number;
      segmentId: string;
      sourceFile: string;
      originalStart: Timecode;
      originalEnd: Timecode;
    }
  | {
      kind: 'continuation';
      chapterIndex: number;
      segmentId: string;
      originalStart: Timecode;
      originalEnd: Timecode;
    }
  | {
      kind: 'internal';
      chapterIndex: number;
      runIndex: number;
      originalStart: Timecode;
      originalEnd: Timecode;
    };

/**
 * An ordered unit of media in the final mux
 */
export type Part =
  | { kind: 'external'; sourceFile: string; segmentId: string; chapterIndex: number }
  | { kind: 'internal'; splitIndex: number; sourceFile: string };

export interface ReconstructionStep {
  state: ReconstructionState;
  segment: TimelineSegment;
  part?: Part;
  splitPoint?: Timecode;
}

export interface TimelinePlan {
  /** Flattened chapter XML with no cross-file references */
  chapterXml: string;
  /** Strictly increasing original-file timecodes to split at */
  splitPoints: Timecode[];
  segments: TimelineSegment[];
  parts: Part[];
  /** Length of the rebuilt timeline */
  duration: Timecode;
}
