import { createChildLogger } from '../utils/logger.js';
import { RenderError } from '../utils/errors.js';
import { diagramForStep, validateMermaid } from './diagram.service.js';
import type { SnapshotMap, SopDocument } from '../types/sop.types.js';

const logger = createChildLogger({ service: 'render-model' });

export const DEFAULT_TITLE = 'Maintenance SOP';

export interface RenderedStep {
  /** 1-based position */
  number: number;
  text: string;
  timestamp?: number;
  snapshot?: Buffer;
  /** Validated Mermaid source */
  diagram?: string;
}

/**
 * A document resolved for output: diagrams validated, snapshots attached
 */
export interface RenderModel {
  title: string;
  warnings: readonly string[];
  tools: readonly string[];
  steps: RenderedStep[];
  troubleshooting: readonly string[];
  tips: readonly string[];
  flow: readonly string[];
  diagrams: string[];
  omittedDiagrams: RenderError[];
}

function checkDiagram(source: string, stepIndex?: number): RenderError | null {
  try {
    validateMermaid(source);
    return null;
  } catch (error) {
    if (!(error instanceof RenderError)) throw error;
    return stepIndex === undefined ? error : new RenderError(error.message, error.source, stepIndex);
  }
}

/**
 * Resolve a parsed document for rendering. A malformed diagram is dropped and
 * recorded; the rest of the document is kept.
 */
export function buildRenderModel(doc: SopDocument, snapshots: SnapshotMap = new Map()): RenderModel {
  const omittedDiagrams: RenderError[] = [];

  const steps = doc.steps.map((step, index): RenderedStep => {
    const rendered: RenderedStep = { number: index + 1, text: step.text };

    if (step.timestamp !== undefined) {
      rendered.timestamp = step.timestamp;
      const snapshot = snapshots.get(step.timestamp);
      if (snapshot) rendered.snapshot = snapshot;
    }

    const diagram = diagramForStep(step);
    if (diagram !== null) {
      const failure = checkDiagram(diagram, index);
      if (failure) {
        omittedDiagrams.push(failure);
      } else {
        rendered.diagram = diagram;
      }
    }

    return rendered;
  });

  const diagrams: string[] = [];
  for (const source of doc.diagrams) {
    const failure = checkDiagram(source);
    if (failure) {
      omittedDiagrams.push(failure);
    } else {
      diagrams.push(source);
    }
  }

  if (omittedDiagrams.length > 0) {
    logger.warn(
      {
        omitted: omittedDiagrams.map((e) => ({ stepIndex: e.stepIndex, reason: e.message })),
      },
      'Omitting malformed diagrams'
    );
  }

  return {
    title: doc.title ?? DEFAULT_TITLE,
    warnings: doc.warnings,
    tools: doc.tools,
    steps,
    troubleshooting: doc.troubleshooting,
    tips: doc.tips,
    flow: doc.flow,
    diagrams,
    omittedDiagrams,
  };
}
