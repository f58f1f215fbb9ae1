import { Router, Request, Response } from 'express';
import { MkvToolnix } from '../mkvtoolnix';
import { FFmpegProcessor } from '../video';
import { config } from '../config';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  const mkvtoolnix = new MkvToolnix();
  const ffmpeg = new FFmpegProcessor();

  const tools = mkvtoolnix.getVersions();
  const ffmpegVersion = ffmpeg.getVersion();

  // FFmpeg is only needed for FLAC sources and re-encoding
  const mkvtoolnixOk = tools.every((tool) => tool.version !== null);
  const ffmpegNeeded = config.fixVideo || config.fixAudio;

  res.json({
    status: !mkvtoolnixOk ? 'unavailable' : ffmpegVersion || !ffmpegNeeded ? 'healthy' : 'degraded',
    services: {
      ...Object.fromEntries(
        tools.map((tool) => [tool.tool, { available: tool.version !== null, version: tool.version }])
      ),
      ffmpeg: {
        available: ffmpegVersion !== null,
        version: ffmpegVersion,
      },
    },
    config: {
      edition: config.edition,
      fixSubtitles: config.fixSubtitles,
      fixVideo: config.fixVideo,
      fixAudio: config.fixAudio,
      batchConcurrency: config.batchConcurrency,
    },
  });
});

export default router;
