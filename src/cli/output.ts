import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { RenderedSop } from '../services/sop-renderer.service.js';

export const MARKDOWN_FILENAME = 'sop.md';
export const PDF_FILENAME = 'sop.pdf';

export interface WrittenSop {
  markdownPath: string;
  pdfPath: string;
}

/**
 * Write sop.md and sop.pdf into outputDir, creating it if needed.
 * Existing files are overwritten.
 */
export async function writeSopOutputs(outputDir: string, sop: Pick<RenderedSop, 'markdown' | 'pdf'>): Promise<WrittenSop> {
  const dir = path.resolve(outputDir);
  await mkdir(dir, { recursive: true });

  const markdownPath = path.join(dir, MARKDOWN_FILENAME);
  const pdfPath = path.join(dir, PDF_FILENAME);

  await writeFile(markdownPath, sop.markdown, 'utf8');
  await writeFile(pdfPath, sop.pdf);

  return { markdownPath, pdfPath };
}
