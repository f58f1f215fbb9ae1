/**
 * Error classes for the unlink pipeline.
 *
 * Every error here is scoped to a single input file: the batch runner records
 * it against that file and moves on to the next one.
 */

export const UNLINK_ERROR_CODES = [
  'MISSING_SEGMENT',
  'NO_SUCH_EDITION',
  'MALFORMED_CHAPTERS',
  'MALFORMED_TIMECODE',
  'DUPLICATE_SEGMENT',
  'EXTERNAL_TOOL_FAILURE',
  'INVALID_TEMPLATE',
  'NOT_FOUND',
  'UNKNOWN',
] as const;

export type UnlinkErrorCode = (typeof UNLINK_ERROR_CODES)[number];

export class UnlinkError extends Error {
  code: UnlinkErrorCode;

  constructor(message: string, code: UnlinkErrorCode = 'UNKNOWN') {
    super(message);
    this.name = 'UnlinkError';
    this.code = code;
  }
}

/**
 * One or more chapters reference a segment UID that no sibling file carries
 */
export class MissingSegmentError extends UnlinkError {
  segmentIds: string[];

  constructor(segmentIds: string[]) {
    super(`Missing segment(s): ${segmentIds.join(', ')}`, 'MISSING_SEGMENT');
    this.name = 'MissingSegmentError';
    this.segmentIds = segmentIds;
  }
}

export class NoSuchEditionError extends UnlinkError {
  edition: number;
  available: number;

  constructor(edition: number, available: number) {
    super(`Edition ${edition} does not exist (${available} available)`, 'NO_SUCH_EDITION');
    this.name = 'NoSuchEditionError';
    this.edition = edition;
    this.available = available;
  }
}

export class MalformedChapterStructureError extends UnlinkError {
  constructor(message: string) {
    super(`Malformed chapter structure: ${message}`, 'MALFORMED_CHAPTERS');
    this.name = 'MalformedChapterStructureError';
  }
}

export class MalformedTimecodeError extends UnlinkError {
  constructor(value: string) {
    super(`Invalid timecode: ${value}`, 'MALFORMED_TIMECODE');
    this.name = 'MalformedTimecodeError';
  }
}

/**
 * Two files in the same directory claim the same segment UID
 */
export class DuplicateSegmentError extends UnlinkError {
  segmentId: string;
  files: [string, string];

  constructor(segmentId: string, first: string, second: string) {
    super(`Segment ${segmentId} is claimed by both ${first} and ${second}`, 'DUPLICATE_SEGMENT');
    this.name = 'DuplicateSegmentError';
    this.segmentId = segmentId;
    this.files = [first, second];
  }
}

export class ExternalToolError extends UnlinkError {
  command: string;
  exitCode: number | null;
  output: string;

  constructor(command: string, exitCode: number | null, output: string, message?: string) {
    super(message ?? `Command failed with code ${exitCode}: ${command}`, 'EXTERNAL_TOOL_FAILURE');
    this.name = 'ExternalToolError';
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

/**
 * An encode template or one of its variable expressions cannot be evaluated
 */
export class TemplateError extends UnlinkError {
  constructor(message: string) {
    super(message, 'INVALID_TEMPLATE');
    this.name = 'TemplateError';
  }
}

/**
 * Reduces anything thrown by a pipeline to a serializable code and message
 */
export function describeError(error: unknown): { code: UnlinkErrorCode; message: string } {
  if (error instanceof UnlinkError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'UNKNOWN', message: error.message };
  }
  return { code: 'UNKNOWN', message: String(error) };
}
