import { z } from 'zod';

/**
 * Video metadata from ffprobe
 */
export interface VideoMetadata {
  duration: number;
  width: number;
  height: number;
  fps: number;
  codec: string;
  filename: string;
}

/**
 * The input video for one request. Discarded once frames are sampled.
 */
export interface VideoAsset {
  path: string;
  mimeType: string;
  metadata: VideoMetadata;
}

/**
 * A decoded frame, downsized to JPEG
 */
export interface SampledFrame {
  /** Seconds from the start of the video */
  timestamp: number;
  image: Buffer;
  mimeType: 'image/jpeg';
}

/**
 * Frames in strictly increasing timestamp order
 */
export type FramePlan = readonly SampledFrame[];

export interface InlineImage {
  data: Buffer;
  mimeType: string;
}

/**
 * Everything sent to the model for one SOP. Frozen once built.
 */
export interface SopRequest {
  readonly prompt: string;
  readonly framePlan: FramePlan;
  readonly context?: string;
  /** Full video to upload alongside the frames */
  readonly video?: { readonly path: string; readonly mimeType: string };
  readonly observationImage?: Readonly<InlineImage>;
}

/**
 * Raw model output. Untrusted.
 */
export type SopResponse = string;

export interface SopStep {
  text: string;
  /** Seconds, from a `[TIMESTAMP: MM:SS]` tag */
  timestamp?: number;
  /** Mermaid source supplied with the step */
  diagram?: string;
}

export interface SopDocument {
  title?: string;
  steps: SopStep[];
  warnings: string[];
  tools: string[];
  troubleshooting: string[];
  tips: string[];
  /** Text under the process flow heading */
  flow: string[];
  /** Mermaid sources not tied to a step (process flow) */
  diagrams: string[];
}

export const SectionKind = {
  STEPS: 'steps',
  WARNINGS: 'warnings',
  TOOLS: 'tools',
  TROUBLESHOOTING: 'troubleshooting',
  TIPS: 'tips',
  FLOW: 'flow',
} as const;

export type SectionKind = (typeof SectionKind)[keyof typeof SectionKind];

/**
 * Recognized section headers per kind, compared case-insensitively
 */
export type SectionVocabulary = Record<SectionKind, readonly string[]>;

/**
 * Snapshot images keyed by step timestamp (seconds)
 */
export type SnapshotMap = ReadonlyMap<number, Buffer>;

/**
 * Generate SOP request body schema
 */
export const generateSopSchema = z.object({
  videoPath: z.string().min(1).max(1024),
  observations: z.string().max(20000).optional(),
  observationImagePath: z.string().min(1).max(1024).optional(),
  model: z.string().min(1).max(200).optional(),
  frameCount: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().min(1000).max(900000).optional(),
});

export type GenerateSopRequest = z.infer<typeof generateSopSchema>;
