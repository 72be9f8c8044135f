import { describe, it, expect } from 'vitest';
import { detectFlow, validateMermaid, diagramForStep } from './diagram.service.js';
import { RenderError } from '../utils/errors.js';

describe('detectFlow', () => {
  it('should build a flowchart from an arrow sequence', () => {
    expect(detectFlow('Drain -> Remove bolts -> Seat seal.')).toBe(
      [
        'flowchart TD',
        '    N1["Drain"]',
        '    N2["Remove bolts"]',
        '    N3["Seat seal"]',
        '    N1 --> N2',
        '    N2 --> N3',
      ].join('\n')
    );
  });

  it('should accept every arrow style', () => {
    const source = detectFlow('A --> B => C → D');

    expect(source?.split('\n').filter((l) => l.includes('-->'))).toHaveLength(3);
  });

  it('should escape quotes in labels', () => {
    expect(detectFlow('Read "PSI" -> Log it')).toContain('N1["Read #quot;PSI#quot;"]');
  });

  it('should return null without two non-empty nodes', () => {
    expect(detectFlow('Open the valve')).toBeNull();
    expect(detectFlow('Open the valve ->')).toBeNull();
    expect(detectFlow('-> ->')).toBeNull();
  });

  it('should produce source that passes validation', () => {
    const source = detectFlow('Check pressure -> Bleed line -> Recheck');

    expect(source).not.toBeNull();
    expect(() => validateMermaid(source ?? '')).not.toThrow();
  });
});

describe('validateMermaid', () => {
  it('should accept a well-formed flowchart', () => {
    expect(() =>
      validateMermaid('flowchart TD\n  A[Drain] --> B{Leak?}\n  B -->|yes| C(Reseat)\n  %% comment')
    ).not.toThrow();
  });

  it('should accept other diagram types', () => {
    expect(() => validateMermaid('sequenceDiagram\n  Tech->>Pump: Start')).not.toThrow();
  });

  it('should reject an unknown diagram type', () => {
    expect(() => validateMermaid('flowchrt TD\n  A --> B')).toThrow('Unknown diagram type "flowchrt"');
  });

  it('should reject an unknown direction', () => {
    expect(() => validateMermaid('graph XY\n  A --> B')).toThrow(RenderError);
  });

  it('should reject empty source and a missing body', () => {
    expect(() => validateMermaid('   \n')).toThrow('Diagram is empty');
    expect(() => validateMermaid('flowchart TD')).toThrow('Diagram has no body');
  });

  it('should reject unbalanced brackets', () => {
    expect(() => validateMermaid('flowchart TD\n  A[Drain --> B')).toThrow('Unbalanced brackets');
    expect(() => validateMermaid('flowchart TD\n  A] --> B')).toThrow(RenderError);
  });

  it('should accept asymmetric node shapes', () => {
    expect(() => validateMermaid('flowchart TD\n  A>Flag pump] --> B[Drain]')).not.toThrow();
    expect(() => validateMermaid('flowchart LR\n  A[Check p>5 bar] --> B>Tag out]')).not.toThrow();
  });

  it('should reject an unclosed asymmetric node', () => {
    expect(() => validateMermaid('flowchart TD\n  A>Flag pump --> B')).toThrow('Unbalanced brackets');
  });

  it('should reject unbalanced quotes', () => {
    expect(() => validateMermaid('flowchart TD\n  A["Drain] --> B')).toThrow('Unbalanced quotes');
  });

  it('should reject dangling edges', () => {
    expect(() => validateMermaid('flowchart TD\n  A --> B\n  B -->')).toThrow('Dangling edge: B -->');
    expect(() => validateMermaid('flowchart TD\n  --> B')).toThrow(RenderError);
  });

  it('should carry the source on the error', () => {
    try {
      validateMermaid('bogus');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RenderError);
      expect((error as RenderError).source).toBe('bogus');
    }
  });
});

describe('diagramForStep', () => {
  it('should prefer the step diagram', () => {
    expect(diagramForStep({ text: 'A -> B', diagram: 'graph LR\n X --> Y' })).toBe('graph LR\n X --> Y');
  });

  it('should derive a diagram from the step text', () => {
    expect(diagramForStep({ text: 'A -> B' })).toContain('N1 --> N2');
    expect(diagramForStep({ text: 'Plain step' })).toBeNull();
  });
});
