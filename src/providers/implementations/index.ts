/**
 * Provider Implementations
 */

export {
  GeminiSopGenerationProvider,
  geminiSopGenerationProvider,
  classifyGeminiError,
  sortModels,
} from './gemini-sop-generation.provider.js';
