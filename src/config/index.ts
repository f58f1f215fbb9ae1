import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  logLevel: LogLevelName;

  // File paths
  dataDir: string;
  jobsDir: string;
  outputDir: string;
  tmpDir: string;

  // Tools
  mkvmergePath: string;
  mkvextractPath: string;
  mkvpropeditPath: string;
  ffmpegPath: string;
  uiLocale: string;

  // Timeline reconstruction
  edition: number;
  keepNonDefaultEditions: boolean;
  ignoreSegmentStart: boolean;
  writeChapters: boolean;
  cleanup: boolean;

  // Subtitles
  fixSubtitles: boolean;
  playResX?: number;
  playResY?: number;

  // Re-encoding
  fixVideo: boolean;
  fixAudio: boolean;
  fixVideoTemplate: string;
  fixAudioTemplate: string;
  templateVars: Record<string, string>;

  // Batch
  batchConcurrency: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvOptionalNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key]?.trim().toLowerCase();
  if (value === undefined || value === '') return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(value);
}

function getEnvLogLevel(key: string, defaultValue: LogLevelName): LogLevelName {
  const value = process.env[key]?.trim().toLowerCase();
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return defaultValue;
  }
}

/**
 * Parses `name=expression` pairs separated by semicolons,
 * e.g. "minrate=bitrate*0.9;maxrate=bitrate*1.1"
 */
export function parseTemplateVars(value: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const pair of value.split(';')) {
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;

    const name = pair.slice(0, separator).trim();
    const expression = pair.slice(separator + 1).trim();
    if (name && expression) {
      vars[name] = expression;
    }
  }

  return vars;
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),
    logLevel: getEnvLogLevel('LOG_LEVEL', 'info'),

    // File paths
    dataDir,
    jobsDir: getEnvString('JOBS_DIR', `${dataDir}/jobs`),
    outputDir: getEnvString('OUTPUT_DIR', `${dataDir}/output`),
    tmpDir: getEnvString('TMP_DIR', `${dataDir}/tmp`),

    // Tools
    mkvmergePath: getEnvString('MKVMERGE_PATH') || 'mkvmerge',
    mkvextractPath: getEnvString('MKVEXTRACT_PATH') || 'mkvextract',
    mkvpropeditPath: getEnvString('MKVPROPEDIT_PATH') || 'mkvpropedit',
    ffmpegPath: getEnvString('FFMPEG_PATH') || 'ffmpeg',
    uiLocale: getEnvString('UI_LOCALE', 'en_US'),

    // Timeline reconstruction
    edition: getEnvNumber('EDITION', 1),
    keepNonDefaultEditions: getEnvBoolean('KEEP_NON_DEFAULT_EDITIONS', false),
    ignoreSegmentStart: getEnvBoolean('IGNORE_SEGMENT_START', false),
    writeChapters: getEnvBoolean('WRITE_CHAPTERS', true),
    cleanup: getEnvBoolean('CLEANUP', true),

    // Subtitles
    fixSubtitles: getEnvBoolean('FIX_SUBTITLES', true),
    playResX: getEnvOptionalNumber('PLAYRES_X'),
    playResY: getEnvOptionalNumber('PLAYRES_Y'),

    // Re-encoding
    fixVideo: getEnvBoolean('FIX_VIDEO', false),
    fixAudio: getEnvBoolean('FIX_AUDIO', false),
    fixVideoTemplate: getEnvString(
      'FIX_VIDEO_TEMPLATE',
      '-c:v libx264 -b:v {var_minrate}k -minrate {var_minrate}k -maxrate {var_maxrate}k -bufsize 1835k'
    ),
    fixAudioTemplate: getEnvString('FIX_AUDIO_TEMPLATE', '-map 0 -acodec ac3 -ab 320k'),
    templateVars: parseTemplateVars(
      getEnvString('TEMPLATE_VARS', 'minrate=bitrate*0.9;maxrate=bitrate*1.1')
    ),

    // Batch
    batchConcurrency: Math.max(1, getEnvNumber('BATCH_CONCURRENCY', 1)),
  };
}

export const config = loadConfig();
