import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { DecodeError, ValidationError } from '../utils/errors.js';
import { getVideoMimeType } from '../utils/mime-types.js';
import { videoService } from './video.service.js';
import type { FramePlan, SampledFrame, VideoAsset } from '../types/sop.types.js';

const logger = createChildLogger({ service: 'frame-sampler' });

/** JPEG quality for frames sent to the model and embedded in documents */
export const FRAME_JPEG_QUALITY = 85;

export interface SampleResult {
  asset: VideoAsset;
  framePlan: FramePlan;
}

/**
 * Evenly spaced timestamps, one at the centre of each of `count` equal
 * segments of the video. Strictly increasing for any positive duration.
 */
export function computeSampleTimestamps(duration: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError(`Frame count must be a positive integer, got ${count}`);
  }
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new DecodeError(`Video has zero duration`);
  }

  const timestamps: number[] = [];
  for (let i = 0; i < count; i++) {
    timestamps.push(((i + 0.5) * duration) / count);
  }
  return timestamps;
}

/**
 * FrameSamplerService - picks a bounded set of representative frames
 */
export class FrameSamplerService {
  /**
   * Sample `count` evenly spaced frames (clamped to SOP_MAX_FRAMES)
   */
  async sampleFrames(videoPath: string, count: number): Promise<SampleResult> {
    const config = getConfig();

    const metadata = await videoService.getMetadata(videoPath);
    if (metadata.duration <= 0) {
      throw new DecodeError('Video has zero duration', videoPath);
    }

    const effectiveCount = Math.min(count, config.sop.maxFrames);
    if (effectiveCount < count) {
      logger.warn({ requested: count, maxFrames: config.sop.maxFrames }, 'Frame count clamped to configured maximum');
    }

    const timestamps = computeSampleTimestamps(metadata.duration, effectiveCount);
    logger.info({ videoPath, duration: metadata.duration, count: effectiveCount }, 'Sampling frames');

    const tempDir = await this.createTempDir('frames');
    try {
      const frames: SampledFrame[] = [];
      for (const [index, timestamp] of timestamps.entries()) {
        const framePath = path.join(tempDir, `frame_${String(index + 1).padStart(3, '0')}.jpg`);
        await videoService.extractFrame(videoPath, timestamp, framePath);
        frames.push({
          timestamp,
          image: await this.downsize(framePath, videoPath),
          mimeType: 'image/jpeg',
        });
      }

      return {
        asset: {
          path: videoPath,
          mimeType: getVideoMimeType(videoPath),
          metadata,
        },
        framePlan: Object.freeze(frames.map((frame) => Object.freeze(frame))),
      };
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }

  /**
   * Grab one downsized frame at an exact timestamp. Returns null on failure.
   */
  async captureSnapshot(videoPath: string, timestamp: number): Promise<Buffer | null> {
    let tempDir: string | null = null;
    try {
      tempDir = await this.createTempDir('snapshot');
      const framePath = path.join(tempDir, 'snapshot.jpg');
      await videoService.extractFrame(videoPath, timestamp, framePath);
      return await this.downsize(framePath, videoPath);
    } catch (error) {
      logger.warn({ videoPath, timestamp, error: (error as Error).message }, 'Snapshot capture failed');
      return null;
    } finally {
      if (tempDir) {
        await rm(tempDir, { recursive: true, force: true });
      }
    }
  }

  private async downsize(framePath: string, videoPath: string): Promise<Buffer> {
    const config = getConfig();
    try {
      return await sharp(framePath)
        .resize({ width: config.sop.frameMaxWidth, withoutEnlargement: true })
        .jpeg({ quality: FRAME_JPEG_QUALITY })
        .toBuffer();
    } catch (error) {
      throw new DecodeError(`Failed to decode extracted frame: ${(error as Error).message}`, videoPath);
    }
  }

  private async createTempDir(kind: string): Promise<string> {
    const config = getConfig();
    return mkdtemp(path.join(os.tmpdir(), `${config.worker.tempDirName}-${kind}-`));
  }
}

export const frameSamplerService = new FrameSamplerService();
