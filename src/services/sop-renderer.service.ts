import { buildRenderModel } from './render-model.js';
import { renderModelToMarkdown } from './markdown-renderer.service.js';
import { renderPdf } from './pdf-renderer.service.js';
import type { RenderError } from '../utils/errors.js';
import type { SnapshotMap, SopDocument } from '../types/sop.types.js';

export interface RenderedSop {
  markdown: string;
  pdf: Buffer;
  pageCount: number;
  /** Diagrams left out because their source was malformed */
  omittedDiagrams: RenderError[];
}

/**
 * Render a parsed SOP to Markdown and PDF from one resolved model
 */
export async function renderSop(doc: SopDocument, snapshots: SnapshotMap = new Map()): Promise<RenderedSop> {
  const model = buildRenderModel(doc, snapshots);
  const { pdf, pageCount } = await renderPdf(model);

  return {
    markdown: renderModelToMarkdown(model),
    pdf,
    pageCount,
    omittedDiagrams: model.omittedDiagrams,
  };
}
