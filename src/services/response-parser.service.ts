/**
 * Response Parser
 *
 * Turns the model's free-text SOP into a SopDocument by splitting on known
 * section headings. Parsing never throws: text without any recognized heading
 * degrades to a single Steps entry holding the whole response.
 */

import { createChildLogger } from '../utils/logger.js';
import { timeStrToSeconds } from '../utils/duration.js';
import {
  SectionKind,
  type SectionVocabulary,
  type SopDocument,
  type SopResponse,
  type SopStep,
} from '../types/sop.types.js';

const logger = createChildLogger({ service: 'response-parser' });

type TextSectionKind = Exclude<SectionKind, 'steps'>;

/**
 * Default headings, taken from the wording of the instruction prompt
 */
export const DEFAULT_SECTION_VOCABULARY: SectionVocabulary = {
  steps: ['steps', 'step-by-step instructions', 'step-by-step', 'instructions', 'procedure', 'procedure steps'],
  warnings: ['warnings', 'safety warnings', 'safety', 'safety precautions', 'cautions'],
  tools: ['tools', 'tools & materials', 'tools and materials', 'materials', 'tools required'],
  troubleshooting: ['troubleshooting', 'troubleshooting/diagnostics', 'troubleshooting & diagnostics', 'diagnostics'],
  tips: ['tips', 'tribal knowledge', 'tribal knowledge/tips', 'expert tips', 'tips & tricks'],
  flow: ['process flow', 'process flow diagram', 'flowchart', 'diagram'],
};

const SECTION_ORDER: readonly SectionKind[] = Object.values(SectionKind);

const TIMESTAMP_TAG = /\[TIMESTAMP:\s*(\d{1,2}:\d{2}(?::\d{2})?)\s*\]/gi;
const LIST_MARKER = /^(?:[-*+•]|\d+[.)])\s+/;
const HEADING_MARKER = /^#{1,6}\s+/;
const HORIZONTAL_RULE = /^([-*_])(\s*\1){2,}$/;
const FENCE = '```';

/**
 * Merge a partial override into the default vocabulary
 */
export function resolveVocabulary(override?: Partial<Record<SectionKind, readonly string[]>>): SectionVocabulary {
  return {
    steps: override?.steps ?? DEFAULT_SECTION_VOCABULARY.steps,
    warnings: override?.warnings ?? DEFAULT_SECTION_VOCABULARY.warnings,
    tools: override?.tools ?? DEFAULT_SECTION_VOCABULARY.tools,
    troubleshooting: override?.troubleshooting ?? DEFAULT_SECTION_VOCABULARY.troubleshooting,
    tips: override?.tips ?? DEFAULT_SECTION_VOCABULARY.tips,
    flow: override?.flow ?? DEFAULT_SECTION_VOCABULARY.flow,
  };
}

function normalizeHeaderText(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Reduce a candidate heading line to comparable text.
 *
 * Only lines marked as headings count: a leading `#`, emphasis around the
 * whole line, or a trailing colon. Returns null for anything else.
 */
export function normalizeHeading(line: string): string | null {
  let text = line.trim();

  const hash = HEADING_MARKER.exec(text);
  if (hash) {
    text = text.slice(hash[0].length);
  }

  const emphasized = /^(\d+[.)]\s*)?[*_]{1,3}\S/.test(text) && /\S[*_]{1,3}:?$/.test(text);
  text = text.replace(/[*_`]/g, '').trim();

  const colon = text.endsWith(':');
  if (colon) {
    text = text.slice(0, -1);
  }

  if (!hash && !emphasized && !colon) {
    return null;
  }

  return normalizeHeaderText(text.replace(/^\d+[.)]\s*/, ''));
}

/**
 * Pull the first timestamp tag out of a line and strip all tags
 */
export function extractTimestamp(text: string): { text: string; timestamp?: number } {
  let timestamp: number | undefined;
  const cleaned = text.replace(TIMESTAMP_TAG, (_match, time: string) => {
    timestamp ??= timeStrToSeconds(time);
    return '';
  });

  return {
    text: cleaned.replace(/[ \t]{2,}/g, ' ').trim(),
    ...(timestamp !== undefined ? { timestamp } : {}),
  };
}

function emptyDocument(): SopDocument {
  return {
    steps: [],
    warnings: [],
    tools: [],
    troubleshooting: [],
    tips: [],
    flow: [],
    diagrams: [],
  };
}

function cleanEntry(line: string): string {
  return line.replace(HEADING_MARKER, '').replace(LIST_MARKER, '').trim();
}

/**
 * Stateful line consumer for one response
 */
class SectionCollector {
  readonly doc = emptyDocument();
  private current: SectionKind | null = null;
  private headerCount = 0;

  constructor(private readonly headers: ReadonlyMap<string, SectionKind>) {}

  get recognizedHeaders(): number {
    return this.headerCount;
  }

  /** Returns true when the line opened a section */
  tryHeader(line: string): boolean {
    const normalized = normalizeHeading(line);
    if (normalized === null) return false;

    const kind = this.headers.get(normalized);
    if (!kind) return false;

    this.current = kind;
    this.headerCount++;
    return true;
  }

  addLine(rawLine: string): void {
    const trimmed = rawLine.trim();
    if (!trimmed || HORIZONTAL_RULE.test(trimmed)) return;

    if (this.current === null) {
      this.capturePreamble(trimmed);
      return;
    }

    const indented = /^\s/.test(rawLine);
    if (indented && this.hasEntry(this.current)) {
      this.appendToLast(this.current, trimmed);
      return;
    }

    this.addEntry(this.current, cleanEntry(trimmed));
  }

  addFence(lang: string, lines: string[]): void {
    if (this.current === null) return;

    if (lang === 'mermaid') {
      const source = lines.join('\n').trim();
      if (!source) return;

      const lastStep = this.doc.steps[this.doc.steps.length - 1];
      if (this.current === SectionKind.STEPS && lastStep && lastStep.diagram === undefined) {
        lastStep.diagram = source;
      } else {
        this.doc.diagrams.push(source);
      }
      return;
    }

    const block = [`${FENCE}${lang}`, ...lines, FENCE].join('\n');
    if (this.hasEntry(this.current)) {
      this.appendToLast(this.current, block);
    } else {
      this.addEntry(this.current, block);
    }
  }

  private capturePreamble(line: string): void {
    const title = /^#\s+(.+)$/.exec(line);
    if (title && this.doc.title === undefined) {
      this.doc.title = title[1].replace(/[*_]/g, '').trim();
    }
  }

  private hasEntry(kind: SectionKind): boolean {
    return kind === SectionKind.STEPS ? this.doc.steps.length > 0 : this.doc[kind].length > 0;
  }

  private addEntry(kind: SectionKind, text: string): void {
    if (!text) return;

    if (kind === SectionKind.STEPS) {
      const parsed = extractTimestamp(text);
      if (!parsed.text && parsed.timestamp === undefined) return;
      const step: SopStep = { text: parsed.text };
      if (parsed.timestamp !== undefined) step.timestamp = parsed.timestamp;
      this.doc.steps.push(step);
      return;
    }

    this.textSection(kind).push(text);
  }

  private appendToLast(kind: SectionKind, text: string): void {
    if (kind === SectionKind.STEPS) {
      const step = this.doc.steps[this.doc.steps.length - 1];
      const parsed = extractTimestamp(text);
      step.text = step.text ? `${step.text}\n${parsed.text}` : parsed.text;
      if (step.timestamp === undefined && parsed.timestamp !== undefined) {
        step.timestamp = parsed.timestamp;
      }
      return;
    }

    const list = this.textSection(kind);
    list[list.length - 1] = `${list[list.length - 1]}\n${text}`;
  }

  private textSection(kind: TextSectionKind): string[] {
    return this.doc[kind];
  }
}

/**
 * ResponseParserService - heading-driven splitter for model output
 */
export class ResponseParserService {
  private readonly headers: ReadonlyMap<string, SectionKind>;

  constructor(vocabulary: SectionVocabulary = DEFAULT_SECTION_VOCABULARY) {
    const headers = new Map<string, SectionKind>();
    for (const kind of SECTION_ORDER) {
      for (const header of vocabulary[kind]) {
        const key = normalizeHeaderText(header.replace(/:$/, ''));
        if (key && !headers.has(key)) {
          headers.set(key, kind);
        }
      }
    }
    this.headers = headers;
  }

  parse(text: SopResponse): SopDocument {
    const collector = new SectionCollector(this.headers);
    let fence: { lang: string; lines: string[] } | null = null;

    for (const rawLine of text.split(/\r?\n/)) {
      const trimmed = rawLine.trim();

      if (fence) {
        if (trimmed.startsWith(FENCE)) {
          collector.addFence(fence.lang, fence.lines);
          fence = null;
        } else {
          fence.lines.push(rawLine);
        }
        continue;
      }

      if (trimmed.startsWith(FENCE)) {
        fence = { lang: trimmed.slice(FENCE.length).trim().toLowerCase(), lines: [] };
        continue;
      }

      if (collector.tryHeader(trimmed)) continue;
      collector.addLine(rawLine);
    }

    // Unterminated fence runs to the end of the text
    if (fence) {
      collector.addFence(fence.lang, fence.lines);
    }

    if (collector.recognizedHeaders === 0) {
      logger.warn({ length: text.length }, 'No section headings recognized, falling back to a single Steps section');
      const whole = text.trim();
      return { ...emptyDocument(), steps: whole ? [{ text: whole }] : [] };
    }

    const doc = collector.doc;
    logger.debug(
      {
        steps: doc.steps.length,
        warnings: doc.warnings.length,
        tools: doc.tools.length,
        diagrams: doc.diagrams.length,
      },
      'Response parsed'
    );
    return doc;
  }
}

/**
 * Parse model output with the given (or default) vocabulary
 */
export function parseSopResponse(text: SopResponse, vocabulary?: SectionVocabulary): SopDocument {
  return new ResponseParserService(vocabulary).parse(text);
}
