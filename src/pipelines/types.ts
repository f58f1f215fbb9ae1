import type { Config } from '../config';
import type { AttachmentInfo, ContainerInfo, ExtractedSubtitle, MetadataEdit } from '../mkvtoolnix/types';
import type { SegmentInfo } from '../segments/types';
import type { Timecode } from '../timeline/timecode';
import type { UnlinkErrorCode } from '../utils/errors';
import type { MediaDetails } from '../video/types';

/**
 * Everything the pipeline asks of the external media tools
 */
export interface MediaToolkit {
  probeSegment(file: string): Promise<SegmentInfo | null>;
  readChapters(file: string, outputPath: string): Promise<string | null>;
  identify(file: string): Promise<ContainerInfo>;
  hasFlac(file: string): Promise<boolean>;
  splitFile(file: string, splitPoints: Timecode[], outputPattern: string): Promise<string[]>;
  extractSubtitleTracks(file: string, outputDir: string): Promise<ExtractedSubtitle[]>;
  extractAttachments(file: string, attachments: AttachmentInfo[], outputDir: string): Promise<string[]>;
  remuxSubtitles(part: string, subtitleFiles: string[], attachments: string[], output: string): Promise<void>;
  muxParts(parts: string[], chapterXmlPath: string | null, attachments: string[], output: string): Promise<void>;
  applyMetadata(file: string, edits: MetadataEdit[]): Promise<void>;
  convertFlacToAlac(input: string, output: string): Promise<void>;
  getDetails(file: string): Promise<MediaDetails>;
  reencode(input: string, videoArgs: string[], audioArgs: string[], output: string): Promise<void>;
}

export type UnlinkOptions = Pick<
  Config,
  | 'edition'
  | 'keepNonDefaultEditions'
  | 'ignoreSegmentStart'
  | 'writeChapters'
  | 'cleanup'
  | 'fixSubtitles'
  | 'playResX'
  | 'playResY'
  | 'fixVideo'
  | 'fixAudio'
  | 'fixVideoTemplate'
  | 'fixAudioTemplate'
  | 'templateVars'
  | 'tmpDir'
  | 'outputDir'
>;

export interface FileFailure {
  code: UnlinkErrorCode;
  message: string;
}

/**
 * Outcome for one input file
 */
export type UnlinkResult =
  | { status: 'unlinked'; file: string; output: string; parts: string[]; splitPoints: string[] }
  | { status: 'skipped'; file: string; reason: string }
  | { status: 'failed'; file: string; error: FileFailure };

export interface BatchSummary {
  results: UnlinkResult[];
  unlinked: number;
  skipped: number;
  failed: number;
}
