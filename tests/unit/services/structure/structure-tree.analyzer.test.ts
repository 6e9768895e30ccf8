/**
 * Tests for the Structure Tree Analyzer
 */

import { describe, it, expect, vi } from 'vitest';
import {
  NESTING_RULES,
  StructureAnalyzerPresets,
  StructureTreeAnalyzer,
  isLegalChild,
} from '../../../../src/services/structure/structure-tree.analyzer';
import { ALL_SEMANTIC_TYPES, SemanticType } from '../../../../src/services/structure/model/semantic-type';
import { SemanticErrorCode } from '../../../../src/services/structure/model/error-codes';
import { ErrorCodeLedger } from '../../../../src/services/structure/model/error-ledger';
import { FigureNode } from '../../../../src/services/structure/model/figure-node';
import { ListNode } from '../../../../src/services/structure/model/list-node';
import { TableNode } from '../../../../src/services/structure/model/table-node';
import { node } from './fixtures';

vi.mock('../../../../src/lib/logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

describe('StructureTreeAnalyzer', () => {
  describe('nesting', () => {
    it('should report exactly one violation naming both roles for every illegal pair', () => {
      const analyzer = new StructureTreeAnalyzer(StructureAnalyzerPresets.nestingOnly);
      let checkedPairs = 0;

      for (const parentRole of ALL_SEMANTIC_TYPES) {
        if (!NESTING_RULES[parentRole]) continue;
        for (const childRole of ALL_SEMANTIC_TYPES) {
          if (isLegalChild(parentRole, childRole)) continue;
          checkedPairs++;

          const child = node('child', childRole, { depth: 1 });
          const result = analyzer.analyze(node('parent', parentRole, { children: [child] }));

          expect(result.errors).toHaveLength(1);
          expect(result.errors[0].code).toBe(SemanticErrorCode.UNEXPECTED_CHILD);
          expect(result.errors[0].nodeId).toBe('child');
          expect(result.errors[0].context).toEqual({ parentType: parentRole, childType: childRole });
        }
      }

      expect(checkedPairs).toBeGreaterThan(0);
    });

    it('should accept legal children', () => {
      const analyzer = new StructureTreeAnalyzer(StructureAnalyzerPresets.nestingOnly);
      const row = node('tr', SemanticType.TABLE_ROW, {
        children: [node('th', SemanticType.TABLE_HEADER), node('td', SemanticType.TABLE_CELL)],
      });

      expect(analyzer.analyze(row).errors).toEqual([]);
      expect(isLegalChild(SemanticType.SECTION, SemanticType.LIST_BODY)).toBe(true);
      expect(isLegalChild(SemanticType.DOCUMENT, SemanticType.LIST_BODY)).toBe(false);
    });
  });

  describe('duplicate ids', () => {
    const buildTree = () =>
      node('a', SemanticType.DOCUMENT, {
        children: [
          node('a', SemanticType.PARAGRAPH, { text: 'First', depth: 1 }),
          node('b', SemanticType.PARAGRAPH, { text: 'Second', depth: 1 }),
        ],
      });

    it('should report one finding for a reused id', () => {
      const result = new StructureTreeAnalyzer().analyze(buildTree());

      expect(result.errors).toEqual([
        {
          id: 'structure-1',
          code: SemanticErrorCode.DUPLICATE_ID,
          nodeId: 'a',
          role: SemanticType.PARAGRAPH,
          message: 'Duplicate node ID detected',
          pageIndex: undefined,
          context: {},
        },
      ]);
    });

    it('should produce identical findings on repeated runs', () => {
      const analyzer = new StructureTreeAnalyzer();
      const first = analyzer.analyze(buildTree());
      const second = analyzer.analyze(buildTree());

      expect(JSON.stringify(second.errors)).toBe(JSON.stringify(first.errors));
    });
  });

  describe('full analysis', () => {
    it('should accumulate findings across checks and record them in the ledger', () => {
      const paragraph = node('p', SemanticType.PARAGRAPH, { text: 'x', depth: 2 });
      const root = node('d', SemanticType.DOCUMENT, {
        children: [
          new ListNode({ id: 'l', depth: 1, children: [paragraph] }),
          new FigureNode({ id: 'f', depth: 1 }),
        ],
      });
      const ledger = new ErrorCodeLedger();

      const result = new StructureTreeAnalyzer().analyze(root, ledger);

      expect(result.errors.map(e => [e.id, e.code, e.nodeId])).toEqual([
        ['structure-1', SemanticErrorCode.UNEXPECTED_CHILD, 'p'],
        ['structure-2', SemanticErrorCode.EMPTY_ELEMENT, 'f'],
        ['structure-3', SemanticErrorCode.MISSING_ATTRIBUTE, 'f'],
      ]);
      expect(result.totalNodeCount).toBe(4);
      expect(result.maxDepth).toBe(2);
      expect(result.isValid).toBe(false);
      expect(ledger.toJSON()).toEqual({
        p: [SemanticErrorCode.UNEXPECTED_CHILD],
        f: [SemanticErrorCode.EMPTY_ELEMENT, SemanticErrorCode.MISSING_ATTRIBUTE],
      });
    });

    it('should allow container roles to be empty', () => {
      const result = new StructureTreeAnalyzer().analyze(
        node('d', SemanticType.DOCUMENT, {
          children: [node('s', SemanticType.SECTION, { depth: 1 }), node('p', SemanticType.PARAGRAPH, { depth: 1 })],
        })
      );

      expect(result.errors.map(e => [e.code, e.nodeId])).toEqual([[SemanticErrorCode.EMPTY_ELEMENT, 'p']]);
    });

    it('should accept a paragraph with alt text but no children', () => {
      const result = new StructureTreeAnalyzer().analyze(node('p', SemanticType.PARAGRAPH, { alt: 'Summary' }));

      expect(result.isValid).toBe(true);
    });

    it('should treat text of its own as content on a leaf paragraph', () => {
      const result = new StructureTreeAnalyzer().analyze(node('p', SemanticType.PARAGRAPH, { text: 'Body copy' }));

      expect(result.errors).toEqual([]);
    });
  });

  describe('required children', () => {
    const analyzer = new StructureTreeAnalyzer({
      ...StructureAnalyzerPresets.nestingOnly,
      validateNesting: false,
      validateRequiredChildren: true,
    });

    it('should require a body in each list item', () => {
      const item = node('li', SemanticType.LIST_ITEM, { children: [node('lbl', SemanticType.LIST_LABEL, { text: '1.' })] });
      const [error] = analyzer.analyze(item).errors;

      expect(error.code).toBe(SemanticErrorCode.MISSING_REQUIRED_CHILD);
      expect(error.message).toBe('List item missing required LBody child');
      expect(error.context).toEqual({ missingChild: 'LBody' });
    });

    it('should require rows in tables and cells in rows', () => {
      const table = analyzer.analyze(new TableNode({ id: 't' }));
      const row = analyzer.analyze(node('tr', SemanticType.TABLE_ROW));

      expect(table.errors.map(e => e.message)).toEqual(['Table has no rows']);
      expect(row.errors.map(e => e.context)).toEqual([{ missingChild: 'TD or TH' }]);
    });
  });

  describe('attributes', () => {
    const analyzer = new StructureTreeAnalyzer(StructureAnalyzerPresets.attributesOnly);

    it('should require a text alternative on figures', () => {
      expect(analyzer.analyze(new FigureNode({ attributes: { ActualText: 'Logo' } })).errors).toEqual([]);
      expect(analyzer.analyze(new FigureNode({ attributes: { Alt: '' } })).errors[0].context).toEqual({
        requiredAttribute: 'Alt or ActualText',
      });
    });

    it('should require content or alt text on links', () => {
      const bare = analyzer.analyze(node('a', SemanticType.LINK));
      const withText = analyzer.analyze(node('a', SemanticType.LINK, { alt: 'Home' }));

      expect(bare.errors.map(e => e.message)).toEqual(['Link has no content or Alt text']);
      expect(withText.errors).toEqual([]);
    });
  });

  describe('depth limit', () => {
    it('should flag nodes whose recorded depth exceeds the limit', () => {
      const analyzer = new StructureTreeAnalyzer({ ...StructureAnalyzerPresets.nestingOnly, maxDepth: 2 });
      const deep = node('deep', SemanticType.SPAN, { depth: 3, text: 'x' });
      const root = node('d', SemanticType.DOCUMENT, {
        children: [node('s', SemanticType.SECTION, { depth: 1, children: [node('p', SemanticType.PARAGRAPH, { depth: 2, children: [deep] })] })],
      });

      const result = analyzer.analyze(root);

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        code: SemanticErrorCode.INVALID_NESTING,
        nodeId: 'deep',
        message: 'Node exceeds maximum depth of 2',
        context: { depth: '3', maxDepth: '2' },
      });
    });
  });
});
