import path from 'path';
import type { ChapterEntry, ChapterModel } from '../chapters/chapterModel';
import type { SegmentRegistry } from '../segments/segmentRegistry';
import { MissingSegmentError, UnlinkError } from '../utils/errors';
import type { LogSink } from '../utils/logger';
import {
  addTimecodes,
  compareTimecodes,
  formatTimecode,
  isZeroTimecode,
  subtractTimecodes,
  Timecode,
  ZERO_TIMECODE,
} from './timecode';
import type { Part, ReconstructionState, ReconstructionStep, TimelinePlan, TimelineSegment } from './types';

const ONE_SECOND: Timecode = 1_000_000_000n;

export interface TimelineContext {
  registry: SegmentRegistry;
  /** The linked file being rebuilt */
  currentFile: string;
  log?: LogSink;
}

export interface BuildTimelineOptions extends TimelineContext {
  /** 1-based edition to rebuild */
  edition: number;
  keepNonDefaultEditions: boolean;
}

export interface AssignPartsOptions {
  /** Source of internal content when no split was needed */
  originalFile: string;
  /** Numbered slices of the original, in order, when it was split */
  splitFiles: string[];
  /** Emit external segments even when their chapter does not start at zero */
  ignoreSegmentStart: boolean;
}

export function initialReconstructionState(): ReconstructionState {
  return {
    offset: ZERO_TIMECODE,
    offsetEnd: ZERO_TIMECODE,
    lastExternalId: null,
    lastInternalEnd: ZERO_TIMECODE,
    chapterIndex: 0,
    inInternalRun: false,
    internalRuns: 0,
    externalSeen: false,
  };
}

/**
 * Processes one chapter: rewrites its bounds onto the rebuilt timeline,
 * drops its segment reference and reports what it contributes.
 */
export function reconstructStep(
  state: ReconstructionState,
  entry: ChapterEntry,
  context: TimelineContext
): ReconstructionStep {
  const originalStart = entry.startTime;
  const originalEnd = entry.endTime;
  const chapterIndex = state.chapterIndex;
  const segmentId = entry.enabled ? entry.segmentUid : undefined;

  entry.removeSegmentUid();

  if (!segmentId) {
    const start = addTimecodes(originalStart, state.offset);
    const end = addTimecodes(originalEnd, state.offset);
    entry.startTime = start;
    entry.endTime = end;

    const startsRun = !state.inInternalRun;
    const runIndex = startsRun ? state.internalRuns : state.internalRuns - 1;

    return {
      state: {
        ...state,
        offsetEnd: end,
        lastExternalId: null,
        lastInternalEnd: originalEnd,
        chapterIndex: chapterIndex + 1,
        inInternalRun: true,
        internalRuns: startsRun ? state.internalRuns + 1 : state.internalRuns,
      },
      segment: { kind: 'internal', chapterIndex, runIndex, originalStart, originalEnd },
      part: startsRun
        ? { kind: 'internal', splitIndex: runIndex, sourceFile: context.currentFile }
        : undefined,
    };
  }

  if (segmentId === state.lastExternalId) {
    // Same segment as the previous chapter: follows it on the timeline, offset already advanced
    const start = state.offsetEnd;
    const end = addTimecodes(start, subtractTimecodes(originalEnd, originalStart));
    entry.startTime = start;
    entry.endTime = end;

    return {
      state: { ...state, offsetEnd: end, chapterIndex: chapterIndex + 1 },
      segment: { kind: 'continuation', chapterIndex, segmentId, originalStart, originalEnd },
    };
  }

  const resolved = context.registry.resolve(segmentId, context.currentFile);
  if (!resolved) {
    throw new MissingSegmentError([segmentId]);
  }

  const splitPoint =
    state.inInternalRun && !isZeroTimecode(state.lastInternalEnd) ? state.lastInternalEnd : undefined;

  const start = state.offsetEnd;
  const end = addTimecodes(start, subtractTimecodes(originalEnd, originalStart));
  entry.startTime = start;
  entry.endTime = end;

  context.log?.debug(
    `external ${segmentId} from ${path.basename(resolved.file)} at ${formatTimecode(start)}`
  );

  return {
    state: {
      ...state,
      offset: addTimecodes(state.offset, resolved.duration),
      offsetEnd: end,
      lastExternalId: segmentId,
      chapterIndex: chapterIndex + 1,
      inInternalRun: false,
      externalSeen: true,
    },
    segment: {
      kind: 'external',
      chapterIndex,
      segmentId,
      sourceFile: resolved.file,
      originalStart,
      originalEnd,
    },
    part: { kind: 'external', sourceFile: resolved.file, segmentId, chapterIndex },
    splitPoint,
  };
}

/**
 * Sorts and dedupes split points so they are strictly increasing
 */
export function normalizeSplitPoints(points: Timecode[]): Timecode[] {
  const sorted = [...points].sort(compareTimecodes);
  return sorted.filter((point, i) => !isZeroTimecode(point) && (i === 0 || point !== sorted[i - 1]));
}

/**
 * UIDs referenced by enabled chapters that the registry cannot resolve
 */
export function findMissingSegments(entries: ChapterEntry[], context: TimelineContext): string[] {
  const missing = new Set<string>();
  for (const entry of entries) {
    if (!entry.enabled || !entry.segmentUid) continue;
    if (!context.registry.resolve(entry.segmentUid, context.currentFile)) {
      missing.add(entry.segmentUid);
    }
  }
  return Array.from(missing);
}

/**
 * First pass: walks the chosen edition, rewrites its chapters in place and
 * returns the flattened chapter XML with split points and parts.
 */
export function buildTimeline(model: ChapterModel, options: BuildTimelineOptions): TimelinePlan {
  const { log } = options;

  if (!options.keepNonDefaultEditions) {
    const dropped = model.dropNonDefaultEditions();
    if (dropped > 0) log?.warn(`${dropped} non-default edition(s) dropped`);
  } else {
    log?.info('non-default editions kept');
  }

  const edition = model.edition(options.edition);

  const missing = findMissingSegments(edition.entries, options);
  if (missing.length > 0) {
    for (const id of missing) log?.warn(`missing segment: ${id}`);
    throw new MissingSegmentError(missing);
  }

  let state = initialReconstructionState();
  const segments: TimelineSegment[] = [];
  const parts: Part[] = [];
  const splitPoints: Timecode[] = [];

  for (const entry of edition.entries) {
    const step = reconstructStep(state, entry, options);
    state = step.state;
    segments.push(step.segment);
    if (step.part) parts.push(step.part);
    if (step.splitPoint !== undefined) splitPoints.push(step.splitPoint);

    log?.debug(
      `chapter ${step.segment.chapterIndex + 1} ${step.segment.kind}: ` +
        `${formatTimecode(entry.startTime)} - ${formatTimecode(entry.endTime)}`
    );
  }

  // Close the trailing internal run when it has to be carved out around external content
  if (state.inInternalRun && state.externalSeen && !isZeroTimecode(state.lastInternalEnd)) {
    splitPoints.push(state.lastInternalEnd);
  }

  model.selectEdition(options.edition);
  model.clearOrderedFlag();

  return {
    chapterXml: model.serialize(),
    splitPoints: normalizeSplitPoints(splitPoints),
    segments,
    parts,
    duration: state.offsetEnd,
  };
}

/**
 * Second pass: maps the walked segments to the files that make up the output,
 * in emission order.
 */
export function assignParts(segments: TimelineSegment[], options: AssignPartsOptions): string[] {
  const files: string[] = [];
  let lastRun = -1;

  for (const segment of segments) {
    switch (segment.kind) {
      case 'external':
        if (options.ignoreSegmentStart || segment.originalStart < ONE_SECOND) {
          files.push(segment.sourceFile);
        }
        break;

      case 'continuation':
        break;

      case 'internal': {
        if (segment.runIndex === lastRun) break;
        lastRun = segment.runIndex;

        if (options.splitFiles.length > 0) {
          const slice = options.splitFiles[segment.runIndex];
          if (!slice) {
            throw new UnlinkError(`Split output ${segment.runIndex + 1} was not produced`);
          }
          files.push(slice);
        } else if (files[files.length - 1] !== options.originalFile) {
          files.push(options.originalFile);
        }
        break;
      }
    }
  }

  return files;
}
