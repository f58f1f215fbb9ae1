import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  MkvToolnix,
  attachmentArgs,
  collectMetadataEdits,
  parseIdentifyOutput,
  splitOutputFiles,
} from './mkvToolnix';
import type { CommandRunner } from '../utils/process';
import { parseTimecode } from '../timeline/timecode';

const silentLog = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

const options = {
  mkvmergePath: 'mkvmerge',
  mkvextractPath: 'mkvextract',
  mkvpropeditPath: 'mkvpropedit',
  uiLocale: 'en_US',
};

const IDENTIFY = JSON.stringify({
  container: {
    properties: {
      title: 'Episode 1',
      segment_uid: 'A1B2C3D4',
      duration: 1425512000000,
    },
  },
  tracks: [
    { id: 0, type: 'video', codec: 'AVC/H.264/MPEG-4p10', properties: { codec_id: 'V_MPEG4/ISO/AVC' } },
    {
      id: 1,
      type: 'audio',
      codec: 'FLAC',
      properties: { codec_id: 'A_FLAC', language: 'jpn', default_track: true },
    },
    {
      id: 2,
      type: 'subtitles',
      codec: 'SubStationAlpha',
      properties: { codec_id: 'S_TEXT/ASS', language: 'eng', track_name: 'Full', default_track: true },
    },
    {
      id: 3,
      type: 'subtitles',
      codec: 'SubRip/SRT',
      properties: { codec_id: 'S_TEXT/UTF8', language: 'eng', default_track: false },
    },
  ],
  attachments: [
    { id: 1, file_name: 'Font-Regular.ttf', content_type: 'application/x-truetype-font', size: 1024 },
    { id: 2, file_name: 'Font-Bold.ttf', size: 2048 },
  ],
});

describe('parseIdentifyOutput', () => {
  it('should map container, tracks and attachments', () => {
    const info = parseIdentifyOutput(IDENTIFY);

    expect(info.title).toBe('Episode 1');
    expect(info.segmentUid).toBe('a1b2c3d4');
    expect(info.duration).toBe(parseTimecode('00:23:45.512'));
    expect(info.tracks[2]).toEqual({
      id: 2,
      type: 'subtitles',
      codec: 'SubStationAlpha',
      codecId: 'S_TEXT/ASS',
      language: 'eng',
      name: 'Full',
      isDefault: true,
    });
    expect(info.attachments[1]).toEqual({
      id: 2,
      fileName: 'Font-Bold.ttf',
      mimeType: 'application/octet-stream',
      size: 2048,
    });
  });

  it('should accept files without a segment UID', () => {
    const info = parseIdentifyOutput('{"container":{"properties":{}},"tracks":[]}');

    expect(info.segmentUid).toBeUndefined();
    expect(info.attachments).toEqual([]);
  });

  it('should reject unexpected output', () => {
    expect(() => parseIdentifyOutput('not json')).toThrow('mkvmerge returned invalid JSON');
    expect(() => parseIdentifyOutput('{"tracks":[{"id":"x"}]}')).toThrow(/Unexpected mkvmerge output/);
  });
});

describe('collectMetadataEdits', () => {
  it('should number tracks per type and restore their properties', () => {
    expect(collectMetadataEdits(parseIdentifyOutput(IDENTIFY))).toEqual([
      { selector: 'info', property: 'title', value: 'Episode 1' },
      { selector: 'track:a1', property: 'language', value: 'jpn' },
      { selector: 'track:a1', property: 'flag-default', value: '1' },
      { selector: 'track:s1', property: 'language', value: 'eng' },
      { selector: 'track:s1', property: 'name', value: 'Full' },
      { selector: 'track:s1', property: 'flag-default', value: '1' },
      { selector: 'track:s2', property: 'language', value: 'eng' },
      { selector: 'track:s2', property: 'flag-default', value: '0' },
    ]);
  });
});

describe('splitOutputFiles', () => {
  it('should expand the numbered pattern', () => {
    expect(splitOutputFiles('/work/parts/split-%03d.mkv', 3)).toEqual([
      '/work/parts/split-001.mkv',
      '/work/parts/split-002.mkv',
      '/work/parts/split-003.mkv',
    ]);
  });
});

describe('attachmentArgs', () => {
  it('should declare every attachment as a font', () => {
    expect(attachmentArgs(['/work/attach/a.ttf'])).toEqual([
      '--attachment-mime-type',
      'application/x-truetype-font',
      '--attach-file',
      '/work/attach/a.ttf',
    ]);
  });
});

describe('MkvToolnix', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mkvtoolnix-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should probe segment identity through mkvmerge -J', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(IDENTIFY);
    const tools = new MkvToolnix(options, run, silentLog);

    expect(await tools.probeSegment('/media/op.mkv')).toEqual({
      id: 'a1b2c3d4',
      duration: 1425512000000n,
    });
    expect(run).toHaveBeenCalledWith('mkvmerge', ['--ui-language', 'en_US', '-J', '/media/op.mkv'], {
      log: silentLog,
      warningExitCodes: [1],
    });
  });

  it('should detect FLAC audio', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(IDENTIFY);
    const tools = new MkvToolnix(options, run, silentLog);

    expect(await tools.hasFlac('/media/episode.mkv')).toBe(true);
  });

  it('should extract only ASS subtitle tracks', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(IDENTIFY);
    const tools = new MkvToolnix(options, run, silentLog);

    const subtitles = await tools.extractSubtitleTracks('/work/parts/split-001.mkv', '/work/subtitles');

    expect(subtitles).toEqual([{ trackId: 2, path: '/work/subtitles/split-001.mkv-2.ass' }]);
    expect(run).toHaveBeenLastCalledWith(
      'mkvextract',
      ['--ui-language', 'en_US', '/work/parts/split-001.mkv', 'tracks', '2:/work/subtitles/split-001.mkv-2.ass'],
      { log: silentLog }
    );
  });

  it('should split at formatted timestamps and return the slices written', async () => {
    const pattern = path.join(dir, 'split-%03d.mkv');
    const run = vi.fn<CommandRunner>(async () => {
      await fs.promises.writeFile(path.join(dir, 'split-001.mkv'), '');
      await fs.promises.writeFile(path.join(dir, 'split-002.mkv'), '');
      return '';
    });
    const tools = new MkvToolnix(options, run, silentLog);

    const slices = await tools.splitFile('/media/episode.mkv', [parseTimecode('00:05:00')], pattern);

    expect(slices).toEqual([path.join(dir, 'split-001.mkv'), path.join(dir, 'split-002.mkv')]);
    expect(run.mock.calls[0]?.[1]).toEqual([
      '--ui-language',
      'en_US',
      '--no-chapters',
      '-o',
      pattern,
      '/media/episode.mkv',
      '--split',
      'timestamps:00:05:00.000000000',
    ]);
  });

  it('should not run mkvmerge when there is nothing to split', async () => {
    const run = vi.fn<CommandRunner>();
    const tools = new MkvToolnix(options, run, silentLog);

    expect(await tools.splitFile('/media/episode.mkv', [], '/work/split-%03d.mkv')).toEqual([]);
    expect(run).not.toHaveBeenCalled();
  });

  it('should skip attachments already extracted', async () => {
    await fs.promises.writeFile(path.join(dir, 'Font-Regular.ttf'), '');
    const run = vi.fn<CommandRunner>().mockResolvedValue('');
    const tools = new MkvToolnix(options, run, silentLog);
    const { attachments } = parseIdentifyOutput(IDENTIFY);

    const extracted = await tools.extractAttachments('/media/op.mkv', attachments, dir);

    expect(extracted).toEqual([path.join(dir, 'Font-Bold.ttf')]);
    expect(run.mock.calls[0]?.[1]).toEqual([
      '--ui-language',
      'en_US',
      '/media/op.mkv',
      'attachments',
      `2:${path.join(dir, 'Font-Bold.ttf')}`,
    ]);
  });

  it('should append parts with chapters and fonts', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue('');
    const tools = new MkvToolnix(options, run, silentLog);

    await tools.muxParts(['/a.mkv', '/b.mkv', '/c.mkv'], '/work/chapters.xml', ['/work/attach/f.ttf'], '/out.mkv');

    expect(run.mock.calls[0]?.[1]).toEqual([
      '--ui-language',
      'en_US',
      '--no-chapters',
      '--no-attachments',
      '--chapters',
      '/work/chapters.xml',
      '--attachment-mime-type',
      'application/x-truetype-font',
      '--attach-file',
      '/work/attach/f.ttf',
      '-o',
      '/out.mkv',
      '/a.mkv',
      '+',
      '/b.mkv',
      '+',
      '/c.mkv',
    ]);
  });

  it('should write every metadata edit in one mkvpropedit call', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue('');
    const tools = new MkvToolnix(options, run, silentLog);

    await tools.applyMetadata('/out.mkv', [
      { selector: 'info', property: 'title', value: 'Episode 1' },
      { selector: 'track:a1', property: 'language', value: 'jpn' },
    ]);
    await tools.applyMetadata('/out.mkv', []);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(
      'mkvpropedit',
      [
        '--ui-language',
        'en_US',
        '/out.mkv',
        '--edit',
        'info',
        '--set',
        'title=Episode 1',
        '--edit',
        'track:a1',
        '--set',
        'language=jpn',
      ],
      { log: silentLog, warningExitCodes: [1] }
    );
  });
});
