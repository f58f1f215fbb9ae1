import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { config } from '../config';
import { formatTimecode, timecodeFromNanoseconds, Timecode } from '../timeline/timecode';
import type { SegmentInfo } from '../segments/types';
import { UnlinkError } from '../utils/errors';
import { logger, LogSink } from '../utils/logger';
import { CommandRunner, readToolVersion, runCommand } from '../utils/process';
import type {
  AttachmentInfo,
  ContainerInfo,
  ExtractedSubtitle,
  MetadataEdit,
  MkvToolnixOptions,
} from './types';

const identifySchema = z.object({
  container: z
    .object({
      properties: z
        .object({
          title: z.string().optional(),
          segment_uid: z.string().optional(),
          duration: z.number().optional(),
        })
        .passthrough()
        .optional(),
    })
    .passthrough()
    .optional(),
  tracks: z
    .array(
      z.object({
        id: z.number(),
        type: z.string(),
        codec: z.string(),
        properties: z
          .object({
            codec_id: z.string().optional(),
            language: z.string().optional(),
            track_name: z.string().optional(),
            default_track: z.boolean().optional(),
          })
          .passthrough()
          .optional(),
      })
    )
    .default([]),
  attachments: z
    .array(
      z.object({
        id: z.number(),
        file_name: z.string(),
        content_type: z.string().optional(),
        size: z.number(),
      })
    )
    .default([]),
});

const ASS_CODEC_IDS = ['S_TEXT/ASS', 'S_TEXT/SSA'];
const FONT_MIME_TYPE = 'application/x-truetype-font';
// MKVToolNix exits with 1 when it wrote its output but printed warnings
const MKVTOOLNIX_WARNING_EXIT_CODES = [1];

export function defaultMkvToolnixOptions(): MkvToolnixOptions {
  return {
    mkvmergePath: config.mkvmergePath,
    mkvextractPath: config.mkvextractPath,
    mkvpropeditPath: config.mkvpropeditPath,
    uiLocale: config.uiLocale,
  };
}

/**
 * Parses `mkvmerge -J` output
 */
export function parseIdentifyOutput(json: string): ContainerInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new UnlinkError('mkvmerge returned invalid JSON', 'EXTERNAL_TOOL_FAILURE');
  }

  const parsed = identifySchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnlinkError(`Unexpected mkvmerge output: ${parsed.error.message}`, 'EXTERNAL_TOOL_FAILURE');
  }

  const properties = parsed.data.container?.properties;
  return {
    title: properties?.title,
    segmentUid: properties?.segment_uid?.toLowerCase(),
    duration: properties?.duration !== undefined ? timecodeFromNanoseconds(properties.duration) : undefined,
    tracks: parsed.data.tracks.map((track) => ({
      id: track.id,
      type: track.type,
      codec: track.codec,
      codecId: track.properties?.codec_id,
      language: track.properties?.language,
      name: track.properties?.track_name,
      isDefault: track.properties?.default_track,
    })),
    attachments: parsed.data.attachments.map((attachment) => ({
      id: attachment.id,
      fileName: attachment.file_name,
      mimeType: attachment.content_type ?? 'application/octet-stream',
      size: attachment.size,
    })),
  };
}

/**
 * mkvpropedit edits that restore the original's title and per-track
 * language, name and default flag. Tracks are numbered per type (a1, s2...).
 */
export function collectMetadataEdits(info: ContainerInfo): MetadataEdit[] {
  const edits: MetadataEdit[] = [];
  if (info.title) {
    edits.push({ selector: 'info', property: 'title', value: info.title });
  }

  const counters: Record<string, number> = {};
  for (const track of info.tracks) {
    const prefix = track.type === 'audio' ? 'a' : track.type === 'subtitles' ? 's' : null;
    if (!prefix) continue;

    counters[prefix] = (counters[prefix] ?? 0) + 1;
    const selector = `track:${prefix}${counters[prefix]}`;

    if (track.language) edits.push({ selector, property: 'language', value: track.language });
    if (track.name) edits.push({ selector, property: 'name', value: track.name });
    if (track.isDefault !== undefined) {
      edits.push({ selector, property: 'flag-default', value: track.isDefault ? '1' : '0' });
    }
  }

  return edits;
}

/**
 * `--attach-file` arguments for every attachment, declared as fonts
 */
export function attachmentArgs(attachments: string[]): string[] {
  return attachments.flatMap((file) => ['--attachment-mime-type', FONT_MIME_TYPE, '--attach-file', file]);
}

/**
 * Output files mkvmerge writes for a split pattern such as `split-%03d.mkv`
 */
export function splitOutputFiles(outputPattern: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) =>
    outputPattern.replace(/%0?(\d*)d/, (_match, width: string) =>
      String(i + 1).padStart(parseInt(width || '1', 10), '0')
    )
  );
}

/**
 * Wrapper around the mkvmerge, mkvextract and mkvpropedit binaries
 */
export class MkvToolnix {
  private options: MkvToolnixOptions;
  private run: CommandRunner;
  private log: LogSink;

  constructor(
    options: MkvToolnixOptions = defaultMkvToolnixOptions(),
    run: CommandRunner = runCommand,
    log: LogSink = logger.child('mkvtoolnix')
  ) {
    this.options = options;
    this.run = run;
    this.log = log;
  }

  /**
   * Checks if every MKVToolNix binary can be started
   */
  isAvailable(): boolean {
    return this.getVersions().every((tool) => tool.version !== null);
  }

  getVersions(): Array<{ tool: string; version: string | null }> {
    return [
      { tool: 'mkvmerge', version: readToolVersion(this.options.mkvmergePath, '--version') },
      { tool: 'mkvextract', version: readToolVersion(this.options.mkvextractPath, '--version') },
      { tool: 'mkvpropedit', version: readToolVersion(this.options.mkvpropeditPath, '--version') },
    ];
  }

  async identify(file: string): Promise<ContainerInfo> {
    const output = await this.mkvmerge(['-J', file]);
    return parseIdentifyOutput(output);
  }

  /**
   * Segment UID and duration of a container, or null when it has no UID
   */
  async probeSegment(file: string): Promise<SegmentInfo | null> {
    const info = await this.identify(file);
    if (!info.segmentUid) return null;
    return { id: info.segmentUid, duration: info.duration ?? 0n };
  }

  /**
   * Extracts the chapter XML, or returns null when the file has no chapters
   */
  async readChapters(file: string, outputPath: string): Promise<string | null> {
    await this.mkvextract([file, 'chapters', outputPath]);
    if (!fs.existsSync(outputPath)) return null;

    const xml = await fs.promises.readFile(outputPath, 'utf-8');
    return xml.trim() ? xml : null;
  }

  async hasFlac(file: string): Promise<boolean> {
    const info = await this.identify(file);
    return info.tracks.some((track) => track.type === 'audio' && /flac/i.test(track.codec));
  }

  /**
   * Splits a file at the given original-file timecodes
   * @returns The slices, in order
   */
  async splitFile(file: string, splitPoints: Timecode[], outputPattern: string): Promise<string[]> {
    if (splitPoints.length === 0) return [];

    await this.mkvmerge([
      '--no-chapters',
      '-o',
      outputPattern,
      file,
      '--split',
      `timestamps:${splitPoints.map(formatTimecode).join(',')}`,
    ]);

    const expected = splitOutputFiles(outputPattern, splitPoints.length + 1);
    const produced = expected.filter((slice) => fs.existsSync(slice));
    if (produced.length < expected.length) {
      this.log.warn(`${path.basename(file)}: expected ${expected.length} slices, got ${produced.length}`);
    }
    return produced;
  }

  /**
   * Extracts every ASS/SSA subtitle track of a file into `outputDir`
   */
  async extractSubtitleTracks(file: string, outputDir: string): Promise<ExtractedSubtitle[]> {
    const info = await this.identify(file);
    const tracks = info.tracks.filter(
      (track) => track.type === 'subtitles' && ASS_CODEC_IDS.includes(track.codecId ?? '')
    );
    if (tracks.length === 0) return [];

    const subtitles = tracks.map((track) => ({
      trackId: track.id,
      path: path.join(outputDir, `${path.basename(file)}-${track.id}.ass`),
    }));

    await this.mkvextract([file, 'tracks', ...subtitles.map((s) => `${s.trackId}:${s.path}`)]);
    return subtitles;
  }

  /**
   * Extracts attachments whose file name is not already present in `outputDir`
   * @returns Paths of the newly extracted files
   */
  async extractAttachments(file: string, attachments: AttachmentInfo[], outputDir: string): Promise<string[]> {
    const fresh = attachments.filter((attachment) => {
      const target = path.join(outputDir, attachment.fileName);
      if (fs.existsSync(target)) {
        this.log.debug(`skipping (duplicate) ${attachment.fileName}`);
        return false;
      }
      return true;
    });
    if (fresh.length === 0) return [];

    const targets = fresh.map((attachment) => path.join(outputDir, attachment.fileName));
    await this.mkvextract([
      file,
      'attachments',
      ...fresh.map((attachment, i) => `${attachment.id}:${targets[i] ?? attachment.fileName}`),
    ]);
    return targets;
  }

  /**
   * Replaces a part's subtitle tracks with the given script files
   */
  async remuxSubtitles(part: string, subtitleFiles: string[], attachments: string[], output: string): Promise<void> {
    await this.mkvmerge([
      '-o',
      output,
      '--no-chapters',
      '--no-subtitles',
      part,
      ...subtitleFiles,
      ...attachmentArgs(attachments),
    ]);
  }

  /**
   * Appends the parts into one file, optionally with a chapter file
   */
  async muxParts(
    parts: string[],
    chapterXmlPath: string | null,
    attachments: string[],
    output: string
  ): Promise<void> {
    if (parts.length === 0) {
      throw new UnlinkError('Nothing to mux');
    }

    const appended = parts.flatMap((part, i) => (i === 0 ? [part] : ['+', part]));
    await this.mkvmerge([
      '--no-chapters',
      '--no-attachments',
      ...(chapterXmlPath ? ['--chapters', chapterXmlPath] : []),
      ...attachmentArgs(attachments),
      '-o',
      output,
      ...appended,
    ]);
  }

  async applyMetadata(file: string, edits: MetadataEdit[]): Promise<void> {
    if (edits.length === 0) return;

    const args = edits.flatMap((edit) => ['--edit', edit.selector, '--set', `${edit.property}=${edit.value}`]);
    await this.run(this.options.mkvpropeditPath, ['--ui-language', this.options.uiLocale, file, ...args], {
      log: this.log,
      warningExitCodes: MKVTOOLNIX_WARNING_EXIT_CODES,
    });
  }

  private mkvmerge(args: string[]): Promise<string> {
    return this.run(this.options.mkvmergePath, ['--ui-language', this.options.uiLocale, ...args], {
      log: this.log,
      warningExitCodes: MKVTOOLNIX_WARNING_EXIT_CODES,
    });
  }

  private mkvextract(args: string[]): Promise<string> {
    return this.run(this.options.mkvextractPath, ['--ui-language', this.options.uiLocale, ...args], {
      log: this.log,
      warningExitCodes: MKVTOOLNIX_WARNING_EXIT_CODES,
    });
  }
}
