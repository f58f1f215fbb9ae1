import type { Timecode } from '../timeline/timecode';

export interface TrackInfo {
  id: number;
  /** video, audio or subtitles */
  type: string;
  codec: string;
  codecId?: string;
  language?: string;
  name?: string;
  isDefault?: boolean;
}

export interface AttachmentInfo {
  id: number;
  fileName: string;
  mimeType: string;
  size: number;
}

/**
 * What mkvmerge reports about a container
 */
export interface ContainerInfo {
  title?: string;
  /** Lower-case hex */
  segmentUid?: string;
  duration?: Timecode;
  tracks: TrackInfo[];
  attachments: AttachmentInfo[];
}

export interface ExtractedSubtitle {
  trackId: number;
  path: string;
}

/**
 * One `--edit <selector> --set <property>=<value>` pair for mkvpropedit
 */
export interface MetadataEdit {
  selector: string;
  property: string;
  value: string;
}

export interface MkvToolnixOptions {
  mkvmergePath: string;
  mkvextractPath: string;
  mkvpropeditPath: string;
  uiLocale: string;
}
