import { input, select, confirm, editor } from '@inquirer/prompts';
import path from 'path';

import { getConfig } from '../config/index.js';
import { providerRegistry } from '../providers/provider-registry.js';
import { generateSop } from '../services/sop-pipeline.service.js';
import { isSupportedImage, isSupportedVideo } from '../utils/mime-types.js';
import { AppError } from '../utils/errors.js';
import { writeSopOutputs } from './output.js';
import {
  printHeader,
  printStep,
  printSuccess,
  printError,
  printInfo,
  printWarn,
  printLabel,
  printDivider,
  formatFileSize,
  isValidFile,
} from './utils.js';

/**
 * Ask for a model, offering the ones the provider reports
 */
async function chooseModel(): Promise<string> {
  const config = getConfig();
  const { provider } = providerRegistry.get('sopGeneration');

  printInfo('Fetching available models...');
  const models = await provider.listModels();

  if (models.length === 0) {
    printWarn('Could not list models, using the configured default');
    return input({ message: 'Model:', default: config.apis.geminiModel });
  }

  return select({
    message: 'Select a model:',
    choices: models.map((m) => ({
      name: `${m.displayName} ${m.name === config.apis.geminiModel ? '(default)' : ''}`.trim(),
      value: m.name,
      description: m.description,
    })),
    default: models.some((m) => m.name === config.apis.geminiModel) ? config.apis.geminiModel : undefined,
    pageSize: 12,
  });
}

/**
 * Interactive SOP generation: prompts, runs the pipeline, writes sop.md and sop.pdf
 */
export async function runGenerate(): Promise<{ success: boolean; outputDir?: string }> {
  printHeader('Generate SOP');

  const config = getConfig();

  const videoPath = await input({
    message: 'Path to maintenance video:',
    validate: async (value) => {
      if (!value.trim()) return 'Video path is required';
      if (!(await isValidFile(value.trim()))) return 'File not found or not accessible';
      if (!isSupportedVideo(value.trim())) return 'Unsupported video format';
      return true;
    },
  });

  const hasObservations = await confirm({ message: 'Add technician observations?', default: true });
  const observations = hasObservations
    ? await editor({ message: 'Technician observations (saved when the editor closes):' })
    : undefined;

  const imageAnswer = await input({
    message: 'Observation image (optional, Enter to skip):',
    validate: async (value) => {
      if (!value.trim()) return true;
      if (!(await isValidFile(value.trim()))) return 'File not found or not accessible';
      if (!isSupportedImage(value.trim())) return 'Image must be PNG, JPG or WebP';
      return true;
    },
  });
  const observationImagePath = imageAnswer.trim() || undefined;

  const model = await chooseModel();

  const frameCountAnswer = await input({
    message: `Frames to sample (max ${config.sop.maxFrames}):`,
    default: String(config.sop.defaultFrameCount),
    validate: (value) => {
      const n = Number(value);
      return Number.isInteger(n) && n >= 1 ? true : 'Enter a whole number of at least 1';
    },
  });

  const outputDir = await input({
    message: 'Output directory:',
    default: path.join(process.cwd(), 'sop-output'),
  });

  printDivider();
  printStep(1, 'Sampling frames, calling the model and rendering...');
  printInfo('This can take a few minutes for long videos');

  try {
    const result = await generateSop({
      videoPath: videoPath.trim(),
      observations,
      observationImagePath,
      model,
      frameCount: Number(frameCountAnswer),
    });

    printStep(2, 'Writing output files');
    const written = await writeSopOutputs(outputDir, result);

    printDivider();
    printSuccess(`SOP generated: ${result.document.title ?? 'Untitled'}`);
    printLabel('  Steps', result.document.steps.length);
    printLabel('  Frames sent', result.frameCount);
    printLabel('  PDF pages', result.pageCount);
    printLabel('  Duration', result.timing.totalDurationFormatted);
    printLabel('  Markdown', written.markdownPath);
    printLabel('  PDF', `${written.pdfPath} (${formatFileSize(result.pdf.length)})`);

    for (const omitted of result.omittedDiagrams) {
      const where = omitted.stepIndex !== undefined ? `step ${omitted.stepIndex + 1}` : 'process flow';
      printWarn(`Diagram omitted (${where}): ${omitted.message}`);
    }

    return { success: true, outputDir: path.dirname(written.pdfPath) };
  } catch (error) {
    if (error instanceof AppError) {
      printError(`${error.code}: ${error.message}`);
    } else {
      printError((error as Error).message);
    }
    return { success: false };
  }
}

/**
 * Print the models the provider reports
 */
export async function runListModels(): Promise<void> {
  printHeader('Available Models');

  const { provider } = providerRegistry.get('sopGeneration');
  const models = await provider.listModels();

  if (models.length === 0) {
    printWarn('No models returned (check GOOGLE_AI_API_KEY and network access)');
    return;
  }

  for (const m of models) {
    printLabel(m.displayName, m.name);
  }
}
