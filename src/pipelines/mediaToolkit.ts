import { MkvToolnix } from '../mkvtoolnix/mkvToolnix';
import { FFmpegProcessor } from '../video/ffmpeg';
import type { MediaToolkit } from './types';

/**
 * Combines the MKVToolNix and FFmpeg wrappers behind one interface
 */
export function createMediaToolkit(
  mkv: MkvToolnix = new MkvToolnix(),
  ffmpeg: FFmpegProcessor = new FFmpegProcessor()
): MediaToolkit {
  return {
    probeSegment: (file) => mkv.probeSegment(file),
    readChapters: (file, outputPath) => mkv.readChapters(file, outputPath),
    identify: (file) => mkv.identify(file),
    hasFlac: (file) => mkv.hasFlac(file),
    splitFile: (file, splitPoints, outputPattern) => mkv.splitFile(file, splitPoints, outputPattern),
    extractSubtitleTracks: (file, outputDir) => mkv.extractSubtitleTracks(file, outputDir),
    extractAttachments: (file, attachments, outputDir) => mkv.extractAttachments(file, attachments, outputDir),
    remuxSubtitles: (part, subtitleFiles, attachments, output) =>
      mkv.remuxSubtitles(part, subtitleFiles, attachments, output),
    muxParts: (parts, chapterXmlPath, attachments, output) =>
      mkv.muxParts(parts, chapterXmlPath, attachments, output),
    applyMetadata: (file, edits) => mkv.applyMetadata(file, edits),
    convertFlacToAlac: (input, output) => ffmpeg.convertFlacToAlac(input, output),
    getDetails: (file) => ffmpeg.getDetails(file),
    reencode: (input, videoArgs, audioArgs, output) => ffmpeg.reencode(input, videoArgs, audioArgs, output),
  };
}
