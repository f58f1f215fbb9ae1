import fs from 'fs';
import path from 'path';
import { ChapterModel } from '../chapters/chapterModel';
import { config, Config } from '../config';
import { collectMetadataEdits } from '../mkvtoolnix/mkvToolnix';
import { SegmentRegistryCache } from '../segments/segmentRegistry';
import { unifySubtitleStyles } from '../subtitles/styleUnifier';
import { formatTimecode } from '../timeline/timecode';
import { assignParts, buildTimeline } from '../timeline/timelineBuilder';
import type { TimelinePlan } from '../timeline/types';
import { UnlinkError } from '../utils/errors';
import { createWorkDirectory, listFiles, moveFile, removeWorkDirectory, WorkDirectory } from '../utils/files';
import { logger, LogSink } from '../utils/logger';
import { renderTemplate, resolveTemplateVars } from '../video/encodeTemplate';
import type { MediaToolkit, UnlinkOptions, UnlinkResult } from './types';

export function toUnlinkOptions(source: Config = config): UnlinkOptions {
  return {
    edition: source.edition,
    keepNonDefaultEditions: source.keepNonDefaultEditions,
    ignoreSegmentStart: source.ignoreSegmentStart,
    writeChapters: source.writeChapters,
    cleanup: source.cleanup,
    fixSubtitles: source.fixSubtitles,
    playResX: source.playResX,
    playResY: source.playResY,
    fixVideo: source.fixVideo,
    fixAudio: source.fixAudio,
    fixVideoTemplate: source.fixVideoTemplate,
    fixAudioTemplate: source.fixAudioTemplate,
    templateVars: source.templateVars,
    tmpDir: source.tmpDir,
    outputDir: source.outputDir,
  };
}

function unique(files: string[]): string[] {
  return Array.from(new Set(files));
}

/**
 * Rebuilds one linked Matroska file into a standalone file
 */
export class UnlinkPipeline {
  private toolkit: MediaToolkit;
  private options: UnlinkOptions;
  private registries: SegmentRegistryCache;
  private logScope?: string;

  /**
   * @param registries - Share one cache across a batch so each directory is scanned once
   * @param logScope - Prefix for the per-file log scope, e.g. the job a batch belongs to
   */
  constructor(
    toolkit: MediaToolkit,
    options: UnlinkOptions = toUnlinkOptions(),
    registries?: SegmentRegistryCache,
    logScope?: string
  ) {
    this.toolkit = toolkit;
    this.options = options;
    this.logScope = logScope;
    this.registries =
      registries ?? new SegmentRegistryCache((file) => toolkit.probeSegment(file), logger.child('segments'));
  }

  /**
   * Runs the complete pipeline for a file. Throws on any file-scoped failure.
   */
  async run(file: string): Promise<UnlinkResult> {
    const source = path.resolve(file);
    const name = path.basename(source);
    const log = logger.child(this.logScope ? `${this.logScope}/${name}` : name);

    if (!fs.existsSync(source)) {
      throw new UnlinkError(`File not found: ${source}`, 'NOT_FOUND');
    }

    const work = await createWorkDirectory(this.options.tmpDir);
    log.debug(`work directory ${work.root}`);

    try {
      // Stage 1: Read chapters and detect linking
      const originalXml = await this.toolkit.readChapters(source, path.join(work.root, 'chapters-original.xml'));
      if (!originalXml || !ChapterModel.isLinked(originalXml)) {
        log.info('not linked, skipping');
        return { status: 'skipped', file: source, reason: 'not linked' };
      }

      // Stage 2: Flatten the chapter timeline
      const plan = await this.buildPlan(source, originalXml, log);
      const chapterPath = path.join(work.root, 'chapters.xml');
      await fs.promises.writeFile(chapterPath, plan.chapterXml, 'utf-8');

      // Stage 3: Convert FLAC audio so every input can be split and appended
      const converted = await this.convertFlac(source, plan, work, log);
      const working = converted.get(source) ?? source;

      // Stage 4: Capture metadata from the original
      const edits = collectMetadataEdits(await this.toolkit.identify(source));

      // Stage 5: Collect attachments from every input
      const attachments = await this.extractAttachments(source, plan, work, log);

      // Stage 6: Split the original around the external content
      const splitFiles = await this.toolkit.splitFile(
        working,
        plan.splitPoints,
        path.join(work.parts, 'split-%03d.mkv')
      );
      if (splitFiles.length > 0) log.info(`split into ${splitFiles.length} slices`);

      // Stage 7: Order the parts
      let parts = assignParts(plan.segments, {
        originalFile: working,
        splitFiles,
        ignoreSegmentStart: this.options.ignoreSegmentStart,
      }).map((part) => converted.get(part) ?? part);
      for (const part of parts) log.debug(`part ${part}`);

      // Stage 8: Unify subtitle styles across parts
      if (this.options.fixSubtitles) {
        parts = await this.fixSubtitles(parts, attachments, work, 'parts', log);
      }

      // Stage 9: Re-encode parts
      if (this.options.fixVideo || this.options.fixAudio) {
        parts = await this.reencodeParts(parts, work, log);
      }

      // Stage 10: Build the file
      log.info('building file');
      let output = path.join(work.encodes, path.basename(source));
      await this.toolkit.muxParts(parts, this.options.writeChapters ? chapterPath : null, attachments, output);

      // Appending can leave the style catalogs of later parts behind
      if (this.options.fixSubtitles) {
        output = (await this.fixSubtitles([output], attachments, work, 'final', log))[0] ?? output;
      }

      // Stage 11: Restore metadata and publish
      await this.toolkit.applyMetadata(output, edits);

      const destination = path.resolve(this.options.outputDir, path.basename(source));
      await moveFile(output, destination);
      log.info(`written ${destination}`);

      return {
        status: 'unlinked',
        file: source,
        output: destination,
        parts,
        splitPoints: plan.splitPoints.map(formatTimecode),
      };
    } finally {
      if (this.options.cleanup) {
        await removeWorkDirectory(work);
      }
    }
  }

  private async buildPlan(source: string, originalXml: string, log: LogSink): Promise<TimelinePlan> {
    const registry = await this.registries.forFile(source);
    log.debug(`${registry.size} segment(s) in ${path.dirname(source)}`);

    return buildTimeline(ChapterModel.parse(originalXml), {
      registry,
      currentFile: source,
      edition: this.options.edition,
      keepNonDefaultEditions: this.options.keepNonDefaultEditions,
      log,
    });
  }

  /**
   * mkvmerge cannot split FLAC on arbitrary timestamps, so the original and
   * every external part carrying FLAC are rewritten as ALAC once per run.
   * @returns Map from input file to its converted copy
   */
  private async convertFlac(
    source: string,
    plan: TimelinePlan,
    work: WorkDirectory,
    log: LogSink
  ): Promise<Map<string, string>> {
    const converted = new Map<string, string>();
    const externals = plan.parts.flatMap((part) => (part.kind === 'external' ? [part.sourceFile] : []));

    for (const file of unique([source, ...externals])) {
      if (!(await this.toolkit.hasFlac(file))) continue;

      const target = path.join(work.root, `alac-${converted.size + 1}-${path.basename(file)}`);
      log.info(`${path.basename(file)} has flac, converting to alac`);
      await this.toolkit.convertFlacToAlac(file, target);
      converted.set(file, target);
    }

    return converted;
  }

  /**
   * Extracts attachments of the original and of every external part, one copy per file name
   * @returns Every attachment file to carry into the output
   */
  private async extractAttachments(
    source: string,
    plan: TimelinePlan,
    work: WorkDirectory,
    log: LogSink
  ): Promise<string[]> {
    const externals = plan.parts.flatMap((part) => (part.kind === 'external' ? [part.sourceFile] : []));

    for (const file of unique([source, ...externals])) {
      const info = await this.toolkit.identify(file);
      if (info.attachments.length === 0) continue;

      const extracted = await this.toolkit.extractAttachments(file, info.attachments, work.attachments);
      if (extracted.length > 0) log.info(`${extracted.length} attachment(s) from ${path.basename(file)}`);
    }

    return listFiles(work.attachments);
  }

  /**
   * Extracts the ASS tracks of every distinct part, gives them one shared
   * style catalog and remuxes each part with its rewritten scripts.
   * @returns The parts, with remuxed files in place of the originals
   */
  private async fixSubtitles(
    parts: string[],
    attachments: string[],
    work: WorkDirectory,
    label: string,
    log: LogSink
  ): Promise<string[]> {
    const distinct = unique(parts);
    const scripts = new Map<string, string[]>();

    for (const [i, part] of distinct.entries()) {
      const outputDir = path.join(work.subtitles, label, String(i + 1));
      await fs.promises.mkdir(outputDir, { recursive: true });

      const extracted = await this.toolkit.extractSubtitleTracks(part, outputDir);
      if (extracted.length > 0) {
        scripts.set(
          part,
          extracted.map((subtitle) => subtitle.path)
        );
      }
    }

    if (scripts.size === 0) {
      log.debug(`no ASS subtitles in ${label}`);
      return parts;
    }

    await unifySubtitleStyles(
      Array.from(scripts.values()).flat(),
      { playResX: this.options.playResX, playResY: this.options.playResY },
      log
    );

    const remuxed = new Map<string, string>();
    for (const [i, part] of distinct.entries()) {
      const subtitleFiles = scripts.get(part);
      if (!subtitleFiles) continue;

      const output = path.join(work.parts, `${label}-${i + 1}-fixsubs.mkv`);
      await this.toolkit.remuxSubtitles(part, subtitleFiles, attachments, output);
      remuxed.set(part, output);
    }

    return parts.map((part) => remuxed.get(part) ?? part);
  }

  /**
   * Re-encodes every distinct part with the configured templates
   */
  private async reencodeParts(parts: string[], work: WorkDirectory, log: LogSink): Promise<string[]> {
    const encoded = new Map<string, string>();

    for (const [i, part] of unique(parts).entries()) {
      let videoArgs = ['-c:v', 'copy'];
      let audioArgs = ['-map', '0', '-c:a', 'copy'];

      const vars = resolveTemplateVars(await this.toolkit.getDetails(part), this.options.templateVars);
      if (this.options.fixVideo) videoArgs = renderTemplate(this.options.fixVideoTemplate, vars);
      if (this.options.fixAudio) audioArgs = renderTemplate(this.options.fixAudioTemplate, vars);

      const output = path.join(work.encodes, `part-${i + 1}-fixed.mkv`);
      log.info(`encoding ${path.basename(part)}`);
      await this.toolkit.reencode(part, videoArgs, audioArgs, output);
      encoded.set(part, output);
    }

    return parts.map((part) => encoded.get(part) ?? part);
  }
}
