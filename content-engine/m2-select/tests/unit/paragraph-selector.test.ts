import { ParagraphSelector, selectParagraphs } from '../../src/paragraph-selector.js';
import { parseMarkdown } from '../../../m1-parse/src/markdown-parser.js';
import type { Block } from '../../../m1-parse/src/types.js';

describe('ParagraphSelector', () => {
  const blocks: Block[] = [
    { kind: 'heading', level: 2, text: 'Intro' },
    { kind: 'paragraph', text: 'x'.repeat(400) },
    { kind: 'paragraph', text: 'y'.repeat(100) },
    { kind: 'paragraph', text: 'This is an important definition' },
    { kind: 'paragraph', text: '- ' + 'z'.repeat(200) },
    { kind: 'paragraph', text: '```code```' + 'w'.repeat(390) }
  ];

  describe('score', () => {
    test('should apply every heuristic term', () => {
      const scores = new ParagraphSelector().score(blocks);

      expect(scores.map(s => s.index)).toEqual([1, 2, 3, 4, 5]);
      expect(scores[0].score).toBeCloseTo(1.6);
      expect(scores[1].score).toBeCloseTo(0.25);
      expect(scores[2].score).toBeCloseTo(0.1775);
      expect(scores[3].score).toBeCloseTo(-0.295);
      expect(scores[4].score).toBeCloseTo(0);
    });

    test('should cap the length term', () => {
      const [only] = new ParagraphSelector().score([{ kind: 'paragraph', text: 'a'.repeat(2000) }]);
      expect(only.score).toBeCloseTo(1.5);
    });

    test('should honour custom weights', () => {
      const selector = new ParagraphSelector({ keywords: ['apple'], keywordBonus: 2 });
      const [only] = selector.score([{ kind: 'paragraph', text: 'An apple a day' }]);
      expect(only.score).toBeCloseTo(14 / 400 + 2 - 0.6);
    });
  });

  describe('automatic mode', () => {
    test('should keep the top paragraphs in document order', () => {
      const result = new ParagraphSelector().select(blocks, 3);

      expect(result.mode).toBe('automatic');
      expect([...result.indices]).toEqual([1, 2, 3]);
    });

    test('should break ties by document order', () => {
      const same: Block[] = [
        { kind: 'paragraph', text: 'a'.repeat(100) },
        { kind: 'paragraph', text: 'b'.repeat(100) },
        { kind: 'paragraph', text: 'c'.repeat(100) }
      ];
      expect([...selectParagraphs(same, 2)]).toEqual([0, 1]);
    });

    test('should never exceed the maximum', () => {
      for (const max of [0, 1, 2, 10]) {
        expect(selectParagraphs(blocks, max).size).toBeLessThanOrEqual(max);
      }
    });

    test('should never select a heading', () => {
      const indices = selectParagraphs(blocks, 10);
      expect(indices.has(0)).toBe(false);
      expect(indices.size).toBe(5);
    });
  });

  describe('manual mode', () => {
    test('should select exactly the directive blocks', () => {
      const doc = parseMarkdown('## Intro\n![prompt] a red triangle\nSome explanatory text.');
      const result = new ParagraphSelector().select(doc.blocks, 6);

      expect(result.mode).toBe('manual');
      expect([...result.indices]).toEqual([1]);
    });

    test('should ignore long paragraphs once a directive exists', () => {
      const mixed: Block[] = [
        { kind: 'paragraph', text: 'p'.repeat(600) },
        { kind: 'image-directive', text: 'a map' },
        { kind: 'paragraph', text: 'q'.repeat(600) },
        { kind: 'image-directive', text: 'a river' }
      ];
      expect([...selectParagraphs(mixed, 6)]).toEqual([1, 3]);
    });

    test('should keep the first directives when there are more than the maximum', () => {
      const many: Block[] = [
        { kind: 'image-directive', text: 'one' },
        { kind: 'image-directive', text: 'two' },
        { kind: 'image-directive', text: 'three' }
      ];
      expect([...selectParagraphs(many, 2)]).toEqual([0, 1]);
    });
  });
});
