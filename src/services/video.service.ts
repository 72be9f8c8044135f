import { spawn } from 'child_process';
import { mkdir } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { DecodeError } from '../utils/errors.js';
import type { VideoMetadata } from '../types/sop.types.js';

const logger = createChildLogger({ service: 'video' });

const ffprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional(),
      })
    )
    .default([]),
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
});

/**
 * Parse an ffprobe frame rate ("30/1", "30000/1001" or "29.97")
 */
export function parseFrameRate(value: string | undefined): number {
  if (!value) return 30;
  const [num, den] = value.split('/');
  const fps = den ? parseFloat(num) / parseFloat(den) : parseFloat(num);
  return Number.isFinite(fps) && fps > 0 ? fps : 30;
}

/**
 * VideoService - FFmpeg helpers for probing and frame grabs
 */
export class VideoService {
  /**
   * Get video metadata using ffprobe
   */
  async getMetadata(videoPath: string): Promise<VideoMetadata> {
    const config = getConfig();

    return new Promise((resolve, reject) => {
      const args = [
        '-v', 'quiet',
        '-print_format', 'json',
        '-show_format',
        '-show_streams',
        videoPath,
      ];

      const ffprobe = spawn(config.ffmpeg.ffprobePath, args);
      let stdout = '';
      let stderr = '';

      ffprobe.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      ffprobe.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ffprobe.on('close', (code) => {
        if (code !== 0) {
          reject(new DecodeError(`Cannot open video: ffprobe failed ${stderr.trim()}`.trim(), videoPath));
          return;
        }

        let raw: unknown;
        try {
          raw = JSON.parse(stdout);
        } catch (e) {
          reject(new DecodeError(`Failed to parse ffprobe output: ${(e as Error).message}`, videoPath));
          return;
        }

        const parsed = ffprobeOutputSchema.safeParse(raw);
        if (!parsed.success) {
          reject(new DecodeError('Unexpected ffprobe output', videoPath));
          return;
        }

        const videoStream = parsed.data.streams.find((s) => s.codec_type === 'video');
        if (!videoStream) {
          reject(new DecodeError('No video stream found', videoPath));
          return;
        }

        const duration = parseFloat(parsed.data.format?.duration ?? '0');

        resolve({
          duration: Number.isFinite(duration) ? duration : 0,
          width: videoStream.width ?? 0,
          height: videoStream.height ?? 0,
          fps: parseFrameRate(videoStream.r_frame_rate),
          codec: videoStream.codec_name ?? 'unknown',
          filename: path.basename(videoPath),
        });
      });

      ffprobe.on('error', (err) => {
        reject(new DecodeError(`ffprobe not found. Is ffmpeg installed? ${err.message}`, videoPath));
      });
    });
  }

  /**
   * Decode the frame nearest `timestamp` into a JPEG file
   */
  async extractFrame(
    videoPath: string,
    timestamp: number,
    outputPath: string,
    options: { quality?: number } = {}
  ): Promise<string> {
    const config = getConfig();
    const { quality = 2 } = options;

    await mkdir(path.dirname(outputPath), { recursive: true });

    return new Promise((resolve, reject) => {
      const args = [
        '-ss', Math.max(0, timestamp).toFixed(3),
        '-i', videoPath,
        '-frames:v', '1',
        '-q:v', quality.toString(),
        '-y',
        outputPath,
      ];

      const ffmpeg = spawn(config.ffmpeg.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });

      let stderr = '';
      ffmpeg.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ffmpeg.on('close', (code: number | null) => {
        if (code !== 0) {
          logger.debug({ videoPath, timestamp, code }, 'Frame extraction failed');
          reject(new DecodeError(`Failed to extract frame at ${timestamp}s: ${stderr.slice(-300)}`, videoPath));
          return;
        }
        resolve(outputPath);
      });

      ffmpeg.on('error', (err: Error) => {
        reject(new DecodeError(`ffmpeg not found. Is ffmpeg installed? ${err.message}`, videoPath));
      });
    });
  }

  /**
   * Check if ffmpeg is available by running -version
   */
  async checkFfmpegInstalled(): Promise<{ available: boolean; ffmpegVersion?: string; ffprobeVersion?: string; error?: string }> {
    const config = getConfig();

    const checkVersion = (cmd: string): Promise<string> => {
      return new Promise((resolve, reject) => {
        const proc = spawn(cmd, ['-version'], { stdio: ['ignore', 'pipe', 'pipe'] });
        let stdout = '';
        proc.stdout?.on('data', (data: Buffer) => {
          stdout += data.toString();
        });
        proc.on('close', (code) => {
          if (code === 0) {
            // First line reads e.g. "ffmpeg version 6.0 ..."
            const match = stdout.match(/version\s+([^\s]+)/);
            resolve(match?.[1] || 'unknown');
          } else {
            reject(new Error(`${cmd} exited with code ${code}`));
          }
        });
        proc.on('error', reject);
      });
    };

    try {
      const [ffmpegVersion, ffprobeVersion] = await Promise.all([
        checkVersion(config.ffmpeg.ffmpegPath),
        checkVersion(config.ffmpeg.ffprobePath),
      ]);
      return { available: true, ffmpegVersion, ffprobeVersion };
    } catch (error) {
      return { available: false, error: (error as Error).message };
    }
  }
}

export const videoService = new VideoService();
