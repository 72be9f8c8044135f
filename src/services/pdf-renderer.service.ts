/**
 * PDF Renderer
 *
 * Lays out a resolved SOP with pdfkit:
 * - page 1: title, safety warnings, tools
 * - one page per step (snapshot and diagram source included)
 * - a closing page for troubleshooting, tips and the process flow
 *
 * The running header is drawn after layout using buffered pages.
 */

import PDFDocument from 'pdfkit';
import { createChildLogger } from '../utils/logger.js';
import { formatTimestamp } from '../utils/duration.js';
import { SECTION_TITLES } from './markdown-renderer.service.js';
import type { RenderModel, RenderedStep } from './render-model.js';

const logger = createChildLogger({ service: 'pdf-renderer' });

export const RUNNING_HEADER = 'Maintenance SOP';

const MARGIN = 50;
const TOP_MARGIN = 72;
const SNAPSHOT_FIT: [number, number] = [320, 240];

const FONTS = {
  body: 'Helvetica',
  bold: 'Helvetica-Bold',
  caption: 'Helvetica-Oblique',
  code: 'Courier',
} as const;

/**
 * Substitutes for characters the standard fonts cannot show. Their WinAnsi
 * encoding covers Latin-1 plus the Windows-1252 punctuation block.
 */
const TEXT_SUBSTITUTES: Record<string, string> = {
  '→': '->',
  '←': '<-',
  '↔': '<->',
  '⇒': '=>',
  '↑': '^',
  '↓': 'v',
  '≥': '>=',
  '≤': '<=',
  '≠': '!=',
  '≈': '~',
  '−': '-',
  '∞': 'inf',
  '√': 'sqrt',
  '\u2126': 'Ohm',
  'Ω': 'Ohm',
  'μ': 'µ',
  'Δ': 'delta',
  '℃': '°C',
  '✓': 'OK',
  '✔': 'OK',
  '✗': 'x',
  '✘': 'x',
  '⚠': '!',
  '′': "'",
  '″': '"',
};

const WINANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

function isWinAnsi(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return (
    ch === '\n' || ch === '\t' || (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WINANSI_EXTRAS.has(ch)
  );
}

/**
 * Rewrite text so the standard PDF fonts draw it: known symbols get a
 * readable substitute, anything else outside WinAnsi becomes "?"
 */
export function toWinAnsi(text: string): string {
  let out = '';
  for (const ch of text) {
    if (Object.hasOwn(TEXT_SUBSTITUTES, ch)) {
      out += TEXT_SUBSTITUTES[ch];
    } else if (isWinAnsi(ch)) {
      out += ch;
    } else {
      const compatible = ch.normalize('NFKC');
      out += [...compatible].every(isWinAnsi) ? compatible : '?';
    }
  }
  return out;
}

export interface RenderedPdf {
  pdf: Buffer;
  pageCount: number;
}

function heading(doc: PDFKit.PDFDocument, text: string, size = 14): void {
  doc.moveDown(0.5);
  doc.font(FONTS.bold).fontSize(size).text(toWinAnsi(text));
  doc.moveDown(0.3);
  doc.font(FONTS.body).fontSize(11);
}

function bulletSection(doc: PDFKit.PDFDocument, title: string, items: readonly string[]): void {
  if (items.length === 0) return;
  heading(doc, title);
  for (const item of items) {
    doc.text(`• ${toWinAnsi(item)}`, { indent: 10 });
    doc.moveDown(0.2);
  }
}

function diagramBlock(doc: PDFKit.PDFDocument, caption: string, source: string): void {
  doc.moveDown(0.5);
  doc.font(FONTS.caption).fontSize(10).text(toWinAnsi(caption));
  doc.moveDown(0.2);
  doc.font(FONTS.code).fontSize(9).text(toWinAnsi(source));
  doc.font(FONTS.body).fontSize(11);
}

function stepPage(doc: PDFKit.PDFDocument, step: RenderedStep): void {
  doc.addPage();

  const title =
    step.timestamp !== undefined ? `Step ${step.number} (${formatTimestamp(step.timestamp)})` : `Step ${step.number}`;
  heading(doc, title, 16);

  if (step.text) {
    doc.text(toWinAnsi(step.text));
  }

  if (step.snapshot) {
    doc.moveDown(0.5);
    try {
      doc.image(step.snapshot, { fit: SNAPSHOT_FIT });
    } catch (error) {
      logger.warn({ step: step.number, error: (error as Error).message }, 'Snapshot could not be embedded');
    }
  }

  if (step.diagram) {
    diagramBlock(doc, `Diagram: Step ${step.number}`, step.diagram);
  }
}

function drawRunningHeader(doc: PDFKit.PDFDocument): void {
  const range = doc.bufferedPageRange();
  for (let i = range.start; i < range.start + range.count; i++) {
    doc.switchToPage(i);
    const width = doc.page.width - MARGIN * 2;
    doc
      .font(FONTS.bold)
      .fontSize(15)
      .text(RUNNING_HEADER, MARGIN, 28, { width, align: 'center', lineBreak: false });
  }
}

/**
 * Render a resolved model to PDF bytes
 */
export async function renderPdf(model: RenderModel): Promise<RenderedPdf> {
  const doc = new PDFDocument({
    size: 'A4',
    margins: { top: TOP_MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
    bufferPages: true,
    autoFirstPage: false,
    info: { Title: model.title },
  });

  const chunks: Buffer[] = [];
  const finished = new Promise<Buffer>((resolve, reject) => {
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });

  doc.addPage();
  doc.font(FONTS.bold).fontSize(20).text(toWinAnsi(model.title));
  doc.font(FONTS.body).fontSize(11);
  bulletSection(doc, SECTION_TITLES.warnings, model.warnings);
  bulletSection(doc, SECTION_TITLES.tools, model.tools);

  for (const step of model.steps) {
    stepPage(doc, step);
  }

  const hasClosingPage =
    model.troubleshooting.length > 0 || model.tips.length > 0 || model.flow.length > 0 || model.diagrams.length > 0;

  if (hasClosingPage) {
    doc.addPage();
    bulletSection(doc, SECTION_TITLES.troubleshooting, model.troubleshooting);
    bulletSection(doc, SECTION_TITLES.tips, model.tips);

    if (model.flow.length > 0 || model.diagrams.length > 0) {
      heading(doc, SECTION_TITLES.flow);
      for (const paragraph of model.flow) {
        doc.text(toWinAnsi(paragraph));
        doc.moveDown(0.3);
      }
      model.diagrams.forEach((source, i) => {
        diagramBlock(doc, `Process flow diagram ${i + 1}`, source);
      });
    }
  }

  drawRunningHeader(doc);
  const pageCount = doc.bufferedPageRange().count;
  doc.end();

  const pdf = await finished;
  logger.debug({ pageCount, bytes: pdf.length }, 'PDF rendered');

  return { pdf, pageCount };
}
