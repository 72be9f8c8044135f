/**
 * SOP Pipeline
 *
 * video -> sampled frames -> prompt -> model -> parsed sections -> Markdown + PDF
 *
 * One call owns every intermediate value; nothing is shared between runs.
 * Decode and request errors propagate unchanged.
 */

import { randomUUID } from 'crypto';
import { readFile } from 'fs/promises';
import { createChildLogger } from '../utils/logger.js';
import { RequestError, ValidationError } from '../utils/errors.js';
import { PipelineTimer, type PipelineSummary } from '../utils/timer.js';
import { getImageMimeType, isSupportedImage } from '../utils/mime-types.js';
import { getConfig } from '../config/index.js';
import { providerRegistry } from '../providers/provider-registry.js';
import { frameSamplerService } from './frame-sampler.service.js';
import { buildSopRequest } from './prompt-builder.service.js';
import { parseSopResponse, resolveVocabulary } from './response-parser.service.js';
import { renderSop, type RenderedSop } from './sop-renderer.service.js';
import type { InlineImage, SopDocument } from '../types/sop.types.js';

const logger = createChildLogger({ service: 'sop-pipeline' });

export interface GenerateSopInput {
  videoPath: string;
  observations?: string;
  observationImagePath?: string;
  model?: string;
  frameCount?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface GenerateSopResult extends RenderedSop {
  runId: string;
  document: SopDocument;
  /** Frames actually sent, after clamping */
  frameCount: number;
  model: string;
  timing: PipelineSummary;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestError('Pipeline', 'Request cancelled', { code: 'REQUEST_CANCELLED' });
  }
}

async function loadObservationImage(imagePath: string): Promise<InlineImage> {
  if (!isSupportedImage(imagePath)) {
    throw new ValidationError(`Unsupported observation image type: ${imagePath}`);
  }

  try {
    return { data: await readFile(imagePath), mimeType: getImageMimeType(imagePath) };
  } catch (error) {
    throw new ValidationError(`Cannot read observation image: ${(error as Error).message}`);
  }
}

/**
 * Snapshot every distinct step timestamp that falls inside the video
 */
async function captureStepSnapshots(
  timer: PipelineTimer,
  videoPath: string,
  duration: number,
  doc: SopDocument,
  signal?: AbortSignal
): Promise<Map<number, Buffer>> {
  const snapshots = new Map<number, Buffer>();
  const timestamps = [...new Set(doc.steps.flatMap((s) => (s.timestamp !== undefined ? [s.timestamp] : [])))];

  for (const timestamp of timestamps) {
    throwIfCancelled(signal);

    if (timestamp > duration) {
      logger.warn({ timestamp, duration }, 'Step timestamp is past the end of the video, skipping snapshot');
      continue;
    }

    const image = await timer.timeOperation('snapshot_capture', () =>
      frameSamplerService.captureSnapshot(videoPath, timestamp)
    );
    if (image) {
      snapshots.set(timestamp, image);
    }
  }

  return snapshots;
}

/**
 * Run the full pipeline for one video
 */
export async function generateSop(input: GenerateSopInput): Promise<GenerateSopResult> {
  const config = getConfig();
  const runId = randomUUID();
  const timer = new PipelineTimer(runId);
  const model = input.model ?? config.apis.geminiModel;
  const { signal } = input;

  logger.info({ runId, videoPath: input.videoPath, model }, 'Starting SOP generation');

  try {
    timer.startStage('sample_frames');
    const { asset, framePlan } = await frameSamplerService.sampleFrames(
      input.videoPath,
      input.frameCount ?? config.sop.defaultFrameCount
    );
    throwIfCancelled(signal);

    timer.startStage('build_request');
    const observationImage = input.observationImagePath
      ? await loadObservationImage(input.observationImagePath)
      : undefined;
    const request = buildSopRequest({
      framePlan,
      context: input.observations,
      video: { path: asset.path, mimeType: asset.mimeType },
      observationImage,
    });

    timer.startStage('generate');
    const { provider, providerId } = providerRegistry.get('sopGeneration');
    const text = await timer.timeOperation(
      'gemini_generate',
      () => provider.generate(request, { model, timeoutMs: input.timeoutMs, signal }),
      { providerId, model }
    );
    throwIfCancelled(signal);

    timer.startStage('parse');
    const document = parseSopResponse(text, resolveVocabulary(config.sop.sectionHeaders));

    timer.startStage('snapshots');
    const snapshots = await captureStepSnapshots(timer, asset.path, asset.metadata.duration, document, signal);

    timer.startStage('render');
    const rendered = await renderSop(document, snapshots);

    const timing = timer.logSummary();
    logger.info(
      {
        runId,
        steps: document.steps.length,
        snapshots: snapshots.size,
        pageCount: rendered.pageCount,
        omittedDiagrams: rendered.omittedDiagrams.length,
      },
      'SOP generated'
    );

    return {
      runId,
      document,
      frameCount: framePlan.length,
      model,
      timing,
      ...rendered,
    };
  } catch (error) {
    timer.endStage();
    logger.error({ runId, error: (error as Error).message }, 'SOP generation failed');
    throw error;
  }
}
