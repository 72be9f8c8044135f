/**
 * Provider Interfaces
 */

export type {
  SopGenerationProvider,
  SopGenerationOptions,
  ModelInfo,
} from './sop-generation.provider.js';
