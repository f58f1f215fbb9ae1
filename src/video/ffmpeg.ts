import fs from 'fs';
import { z } from 'zod';
import { config } from '../config';
import { UnlinkError } from '../utils/errors';
import { logger, LogSink } from '../utils/logger';
import { CommandRunner, readToolVersion, runCommand } from '../utils/process';
import type { MediaDetails } from './types';

const probeSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
      bit_rate: z.string().optional(),
    })
    .passthrough(),
});

/**
 * FFmpeg wrapper for the audio conversion and re-encode steps
 */
export class FFmpegProcessor {
  private ffmpegPath: string;
  private run: CommandRunner;
  private log: LogSink;

  constructor(ffmpegPath?: string, run: CommandRunner = runCommand, log: LogSink = logger.child('ffmpeg')) {
    this.ffmpegPath = ffmpegPath ?? (config.ffmpegPath || 'ffmpeg');
    this.run = run;
    this.log = log;
  }

  /**
   * Gets the FFmpeg version string
   * @returns Version string or null if not available
   */
  getVersion(): string | null {
    const banner = readToolVersion(this.ffmpegPath, '-version');
    const match = banner?.match(/ffmpeg version ([^\s]+)/);
    return match?.[1] ?? null;
  }

  /**
   * Rewrites every FLAC audio track as ALAC, copying everything else.
   * mkvmerge cannot split FLAC tracks on arbitrary timestamps.
   */
  async convertFlacToAlac(inputPath: string, outputPath: string): Promise<void> {
    await this.runFFmpeg(['-y', '-i', inputPath, '-map', '0', '-c', 'copy', '-c:a', 'alac', outputPath]);
  }

  /**
   * Reads duration, overall bitrate and size of a media file
   * @returns Duration in seconds, bitrate in kb/s and size in KiB, all rounded
   */
  async getDetails(filePath: string): Promise<MediaDetails> {
    const ffprobePath = this.ffmpegPath.replace('ffmpeg', 'ffprobe');
    const output = await this.run(
      ffprobePath,
      ['-v', 'error', '-show_entries', 'format=duration,bit_rate', '-of', 'json', filePath],
      { log: this.log }
    );

    const details = parseProbeOutput(output);
    const stats = await fs.promises.stat(filePath);

    return { ...details, size: Math.round(stats.size / 1024) };
  }

  /**
   * Re-encodes a part with the given video and audio arguments
   */
  async reencode(inputPath: string, videoArgs: string[], audioArgs: string[], outputPath: string): Promise<void> {
    await this.runFFmpeg(['-y', '-i', inputPath, ...videoArgs, ...audioArgs, outputPath]);
  }

  private runFFmpeg(args: string[]): Promise<string> {
    return this.run(this.ffmpegPath, ['-hide_banner', ...args], { log: this.log });
  }
}

/**
 * Parses `ffprobe -of json` format output into rounded duration and bitrate
 */
export function parseProbeOutput(json: string): Omit<MediaDetails, 'size'> {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new UnlinkError('ffprobe returned invalid JSON', 'EXTERNAL_TOOL_FAILURE');
  }

  const parsed = probeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnlinkError(`Unexpected ffprobe output: ${parsed.error.message}`, 'EXTERNAL_TOOL_FAILURE');
  }

  const duration = parseFloat(parsed.data.format.duration ?? '');
  const bitRate = parseFloat(parsed.data.format.bit_rate ?? '');

  return {
    duration: isNaN(duration) ? 0 : Math.round(duration),
    bitrate: isNaN(bitRate) ? 0 : Math.round(bitRate / 1000),
  };
}
