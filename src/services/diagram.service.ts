/**
 * Diagram Service
 *
 * Derives Mermaid flowcharts from arrow-style step descriptions and checks
 * Mermaid sources before they are embedded in a document.
 */

import { RenderError } from '../utils/errors.js';
import type { SopStep } from '../types/sop.types.js';

const ARROW = /\s*(?:-->|->|=>|→)\s*/;
const FLOWCHART_DIRECTIONS = new Set(['TD', 'TB', 'BT', 'RL', 'LR']);
const DIAGRAM_TYPES = new Set([
  'flowchart',
  'graph',
  'sequenceDiagram',
  'classDiagram',
  'stateDiagram',
  'stateDiagram-v2',
  'erDiagram',
  'journey',
  'gantt',
  'pie',
  'mindmap',
  'timeline',
  'gitGraph',
]);

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set(Object.values(OPENERS));
/** A `>` right after a node id opens an asymmetric shape, `id>label]` */
const NODE_ID_CHAR = /\w/;

/** Edge operators of flowchart syntax */
const EDGE = '(?:<?-->|---|-\\.->|==>|<?--)';
const LEADING_EDGE = new RegExp(`^${EDGE}`);
const TRAILING_EDGE = new RegExp(`${EDGE}\\s*(?:\\|[^|]*\\|)?\\s*;?$`);

function escapeLabel(label: string): string {
  return label.replace(/"/g, '#quot;');
}

/**
 * Build a top-down flowchart when the text describes a directed sequence
 * ("A -> B -> C"). Returns null when fewer than two non-empty nodes exist.
 */
export function detectFlow(text: string): string | null {
  const flat = text.replace(/\s*\n\s*/g, ' ').trim();
  if (!ARROW.test(flat)) return null;

  const nodes = flat
    .split(ARROW)
    .map((segment) => segment.trim().replace(/[.;]+$/, '').trim())
    .filter((segment) => segment.length > 0);

  if (nodes.length < 2) return null;

  const lines = ['flowchart TD'];
  nodes.forEach((label, i) => {
    lines.push(`    N${i + 1}["${escapeLabel(label)}"]`);
  });
  for (let i = 1; i < nodes.length; i++) {
    lines.push(`    N${i} --> N${i + 1}`);
  }

  return lines.join('\n');
}

function stripLabels(line: string): string {
  let stripped = line.replace(/"[^"]*"/g, '');
  let previous = '';
  while (previous !== stripped) {
    previous = stripped;
    stripped = stripped.replace(/\[[^[\]]*\]|\([^()]*\)|\{[^{}]*\}|(?<=\w)>[^[\]>]*\]/g, '');
  }
  return stripped.trim();
}

function checkBalance(body: string, source: string, isFlowchart: boolean): void {
  const stack: string[] = [];
  let inQuote = false;
  let previous = '';

  for (const ch of body) {
    const before = previous;
    previous = ch;

    if (ch === '"') {
      inQuote = !inQuote;
      continue;
    }
    if (inQuote) continue;

    if (isFlowchart && ch === '>' && stack.length === 0 && NODE_ID_CHAR.test(before)) {
      stack.push(']');
    } else if (Object.hasOwn(OPENERS, ch)) {
      stack.push(OPENERS[ch]);
    } else if (CLOSERS.has(ch)) {
      if (stack.pop() !== ch) {
        throw new RenderError(`Unbalanced brackets near "${ch}"`, source);
      }
    }
  }

  if (inQuote) {
    throw new RenderError('Unbalanced quotes', source);
  }
  if (stack.length > 0) {
    throw new RenderError('Unbalanced brackets', source);
  }
}

/**
 * Reject Mermaid source that would not render
 *
 * @throws RenderError
 */
export function validateMermaid(source: string): void {
  const lines = source
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('%%'));

  if (lines.length === 0) {
    throw new RenderError('Diagram is empty', source);
  }

  const [type, direction] = lines[0].split(/\s+/);
  if (!DIAGRAM_TYPES.has(type)) {
    throw new RenderError(`Unknown diagram type "${type}"`, source);
  }

  const isFlowchart = type === 'flowchart' || type === 'graph';
  if (isFlowchart && direction !== undefined && !FLOWCHART_DIRECTIONS.has(direction.replace(/;$/, ''))) {
    throw new RenderError(`Unknown flowchart direction "${direction}"`, source);
  }

  const body = lines.slice(1);
  if (body.length === 0) {
    throw new RenderError('Diagram has no body', source);
  }

  checkBalance(body.join('\n'), source, isFlowchart);

  if (isFlowchart) {
    for (const line of body) {
      const bare = stripLabels(line);
      if (LEADING_EDGE.test(bare) || TRAILING_EDGE.test(bare)) {
        throw new RenderError(`Dangling edge: ${line}`, source);
      }
    }
  }
}

/**
 * Mermaid source for a step: its own diagram, or one derived from an arrow sequence
 */
export function diagramForStep(step: SopStep): string | null {
  return step.diagram ?? detectFlow(step.text);
}
