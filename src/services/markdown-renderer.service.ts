/**
 * Markdown Renderer
 *
 * Produces the SOP as a single Markdown document. Snapshots are inlined as
 * JPEG data URIs so the file stands alone.
 */

import { formatTimestamp } from '../utils/duration.js';
import { buildRenderModel, type RenderModel, type RenderedStep } from './render-model.js';
import type { RenderError } from '../utils/errors.js';
import type { SnapshotMap, SopDocument } from '../types/sop.types.js';

export interface MarkdownRenderOptions {
  snapshots?: SnapshotMap;
}

export interface RenderedMarkdown {
  markdown: string;
  omittedDiagrams: RenderError[];
}

export const SECTION_TITLES = {
  warnings: 'Safety Warnings',
  tools: 'Tools & Materials',
  steps: 'Step-by-Step Instructions',
  troubleshooting: 'Troubleshooting',
  tips: 'Tips',
  flow: 'Process Flow',
} as const;

function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item.replace(/\n/g, '\n  ')}`).join('\n');
}

function mermaidBlock(source: string): string {
  return ['```mermaid', source, '```'].join('\n');
}

function renderStep(step: RenderedStep): string[] {
  const blocks = [`### Step ${step.number}`];
  if (step.text) blocks.push(step.text);

  if (step.timestamp !== undefined) {
    blocks.push(`*Video time: ${formatTimestamp(step.timestamp)}*`);
  }
  if (step.snapshot) {
    blocks.push(`![Step ${step.number} snapshot](data:image/jpeg;base64,${step.snapshot.toString('base64')})`);
  }
  if (step.diagram) {
    blocks.push(mermaidBlock(step.diagram));
  }

  return blocks;
}

/**
 * Render a resolved model. Empty sections are left out.
 */
export function renderModelToMarkdown(model: RenderModel): string {
  const blocks: string[] = [`# ${model.title}`];

  const listSection = (title: string, items: readonly string[]) => {
    if (items.length === 0) return;
    blocks.push(`## ${title}`, bulletList(items));
  };

  listSection(SECTION_TITLES.warnings, model.warnings);
  listSection(SECTION_TITLES.tools, model.tools);

  if (model.steps.length > 0) {
    blocks.push(`## ${SECTION_TITLES.steps}`);
    for (const step of model.steps) {
      blocks.push(...renderStep(step));
    }
  }

  listSection(SECTION_TITLES.troubleshooting, model.troubleshooting);
  listSection(SECTION_TITLES.tips, model.tips);

  if (model.flow.length > 0 || model.diagrams.length > 0) {
    blocks.push(`## ${SECTION_TITLES.flow}`, ...model.flow, ...model.diagrams.map(mermaidBlock));
  }

  return `${blocks.join('\n\n')}\n`;
}

export function renderMarkdown(doc: SopDocument, options: MarkdownRenderOptions = {}): RenderedMarkdown {
  const model = buildRenderModel(doc, options.snapshots);
  return {
    markdown: renderModelToMarkdown(model),
    omittedDiagrams: model.omittedDiagrams,
  };
}
