/**
 * Tests for the Heading Hierarchy Checker
 */

import { describe, it, expect, vi } from 'vitest';
import {
  HeadingCheckerPresets,
  HeadingHierarchyChecker,
  HeadingIssueType,
} from '../../../../src/services/structure/heading-hierarchy.checker';
import { SemanticType, headingRoleForLevel } from '../../../../src/services/structure/model/semantic-type';
import { SemanticErrorCode } from '../../../../src/services/structure/model/error-codes';
import { ErrorCodeLedger } from '../../../../src/services/structure/model/error-ledger';
import { ContentNode } from '../../../../src/services/structure/model/content-node';
import { node, text } from './fixtures';

vi.mock('../../../../src/lib/logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const documentWith = (...children: ContentNode[]) => node('doc', SemanticType.DOCUMENT, { children });

const outline = (...levels: number[]) =>
  documentWith(
    ...levels.map((level, index) =>
      node(`h${index}`, headingRoleForLevel(level), { text: `Section ${index}`, depth: 1 })
    )
  );

describe('HeadingHierarchyChecker', () => {
  const checker = new HeadingHierarchyChecker();

  it('should report nothing for a well-formed outline', () => {
    const result = checker.validate(outline(1, 2, 3, 3, 2, 3, 4, 2));

    expect(result.issues).toEqual([]);
    expect(result.isValid).toBe(true);
    expect(result.totalHeadingCount).toBe(8);
    expect(result.headingsByLevel).toEqual({ 1: 1, 2: 3, 3: 3, 4: 1 });
  });

  it('should report one skipped level with the gap size', () => {
    const result = checker.validate(outline(1, 2, 4));

    expect(result.issues).toEqual([
      {
        id: 'heading-1',
        type: HeadingIssueType.LEVEL_SKIPPED,
        severity: 'critical',
        nodeId: 'h2',
        headingLevel: 4,
        message: 'Heading level skipped from H2 to H4',
        pageIndex: undefined,
        context: { previousLevel: '2', currentLevel: '4', skippedLevels: '1' },
      },
    ]);
    expect(result.isValid).toBe(false);
  });

  it('should tag every H1 when there are several', () => {
    const result = checker.validate(outline(1, 2, 1, 3));
    const multiple = result.issues.filter(issue => issue.type === HeadingIssueType.MULTIPLE_H1);

    expect(multiple.map(issue => issue.nodeId)).toEqual(['h0', 'h2']);
    expect(multiple[0].context).toEqual({ h1Count: '2' });
    expect(multiple[0].message).toBe('Document contains multiple H1 headings (found 2)');
    expect(result.issues.map(issue => issue.type)).toEqual([
      HeadingIssueType.MULTIPLE_H1,
      HeadingIssueType.MULTIPLE_H1,
      HeadingIssueType.LEVEL_SKIPPED,
    ]);
  });

  it('should report a missing H1 on the first heading', () => {
    const ledger = new ErrorCodeLedger();
    const result = checker.validate(outline(2, 3), ledger);

    expect(result.issues.map(issue => [issue.id, issue.type, issue.severity, issue.nodeId])).toEqual([
      ['heading-1', HeadingIssueType.NO_H1, 'critical', 'h0'],
      ['heading-2', HeadingIssueType.FIRST_HEADING_NOT_H1, 'warning', 'h0'],
    ]);
    expect(result.issues[1].context).toEqual({ actualLevel: '2' });
    expect([...ledger.codesFor('h0')]).toEqual([SemanticErrorCode.HEADING_HIERARCHY_INVALID]);
  });

  it('should skip document-level checks under the basic preset', () => {
    const basic = new HeadingHierarchyChecker(HeadingCheckerPresets.basic);

    expect(basic.validate(outline(2, 3)).issues).toEqual([]);
  });

  it('should not cascade after an out-of-range heading', () => {
    const result = checker.validate(outline(1, 3, 4, 2));

    expect(result.issues.map(issue => issue.nodeId)).toEqual(['h1']);
  });

  it('should flag empty headings and their missing text', () => {
    const result = checker.validate(
      documentWith(
        node('intro', SemanticType.H1, { text: 'Intro', depth: 1 }),
        node('blank', SemanticType.H2, { depth: 1 })
      )
    );

    expect(result.issues.map(issue => [issue.type, issue.severity])).toEqual([
      [HeadingIssueType.EMPTY_HEADING, 'critical'],
      [HeadingIssueType.NON_MEANINGFUL_TEXT, 'warning'],
    ]);
    expect(result.issues[0].message).toBe('Heading H2 is empty');
    expect(result.issues[1].context).toEqual({ textLength: '0', minLength: '1' });
  });

  it('should flag placeholder heading text', () => {
    const result = checker.validate(documentWith(node('h', SemanticType.H1, { text: ' Untitled ', depth: 1 })));

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].message).toBe("Heading H1 text 'Untitled' is not meaningful");
    expect(result.issues[0].context).toEqual({ headingText: 'Untitled' });
    expect(result.isValid).toBe(true);
  });

  it('should read heading text from descendants', () => {
    const heading = node('h', SemanticType.H1, {
      depth: 1,
      children: [node('s', SemanticType.SPAN, { text: 'Overview', depth: 2 })],
    });

    expect(checker.validate(documentWith(heading)).issues).toEqual([]);
  });

  it('should resolve generic headings through the Level attribute', () => {
    const generic = (id: string, level?: number) =>
      new ContentNode({
        id,
        role: SemanticType.HEADING,
        depth: 1,
        textBlocks: text('Results'),
        attributes: level !== undefined ? { Level: level } : {},
      });

    const result = checker.validate(documentWith(generic('a'), generic('b', 2)));

    expect(result.headingsByLevel).toEqual({ 1: 1, 2: 1 });
    expect(result.issues).toEqual([]);
  });

  it('should warn when a level exceeds the configured maximum', () => {
    const shallow = new HeadingHierarchyChecker({ maxHeadingLevel: 2 });
    const result = shallow.validate(outline(1, 2, 3));

    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      type: HeadingIssueType.LEVEL_EXCEEDS_MAXIMUM,
      severity: 'warning',
      nodeId: 'h2',
      context: { actualLevel: '3', maxLevel: '2' },
    });
  });
});
