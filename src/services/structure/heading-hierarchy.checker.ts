/**
 * Heading Hierarchy Checker
 *
 * Collects headings in document order and checks the outline they form:
 * a single leading H1, no skipped levels, no empty or placeholder text.
 */

import { logger } from '../../lib/logger';
import { FindingContext, createIdSequence } from './findings';
import { AttributeKey, intAttribute } from './model/attribute-value';
import { SemanticErrorCode } from './model/error-codes';
import { ErrorCodeLedger } from './model/error-ledger';
import type { SemanticNode } from './model/semantic-node';
import { SemanticType, headingLevelOf, isHeadingRole } from './model/semantic-type';
import { collectText, walkTree } from './model/tree-traversal';

export const HeadingIssueType = {
  LEVEL_SKIPPED: 'level-skipped',
  MULTIPLE_H1: 'multiple-h1',
  NO_H1: 'no-h1',
  EMPTY_HEADING: 'empty-heading',
  FIRST_HEADING_NOT_H1: 'first-heading-not-h1',
  LEVEL_EXCEEDS_MAXIMUM: 'level-exceeds-maximum',
  NON_MEANINGFUL_TEXT: 'non-meaningful-text',
} as const;

export type HeadingIssueType = (typeof HeadingIssueType)[keyof typeof HeadingIssueType];

export type HeadingIssueSeverity = 'critical' | 'warning' | 'info';

export interface HeadingIssue {
  id: string;
  type: HeadingIssueType;
  severity: HeadingIssueSeverity;
  nodeId: string;
  headingLevel: number;
  message: string;
  pageIndex?: number;
  context: FindingContext;
}

export interface HeadingHierarchyResult {
  issues: HeadingIssue[];
  totalHeadingCount: number;
  /** Heading count keyed by resolved level. */
  headingsByLevel: Record<number, number>;
  isValid: boolean;
}

export interface HeadingCheckerOptions {
  requireSingleH1: boolean;
  checkSkippedLevels: boolean;
  checkEmptyHeadings: boolean;
  validateHeadingText: boolean;
  requireFirstH1: boolean;
  maxHeadingLevel: number;
  minHeadingTextLength: number;
}

export const HeadingCheckerPresets = {
  all: {
    requireSingleH1: true,
    checkSkippedLevels: true,
    checkEmptyHeadings: true,
    validateHeadingText: true,
    requireFirstH1: true,
    maxHeadingLevel: 6,
    minHeadingTextLength: 1,
  },
  basic: {
    requireSingleH1: false,
    checkSkippedLevels: true,
    checkEmptyHeadings: true,
    validateHeadingText: false,
    requireFirstH1: false,
    maxHeadingLevel: 6,
    minHeadingTextLength: 1,
  },
  strict: {
    requireSingleH1: true,
    checkSkippedLevels: true,
    checkEmptyHeadings: true,
    validateHeadingText: true,
    requireFirstH1: true,
    maxHeadingLevel: 6,
    minHeadingTextLength: 1,
  },
} satisfies Record<string, HeadingCheckerOptions>;

/** Placeholder texts that say nothing about the section they introduce. */
const PLACEHOLDER_TEXTS: ReadonlySet<string> = new Set([
  'heading',
  'title',
  'section',
  'chapter',
  'untitled',
  'new heading',
  'click here',
]);

const ISSUE_CODES: Record<HeadingIssueType, SemanticErrorCode> = {
  [HeadingIssueType.LEVEL_SKIPPED]: SemanticErrorCode.HEADING_LEVEL_SKIPPED,
  [HeadingIssueType.MULTIPLE_H1]: SemanticErrorCode.MULTIPLE_H1_HEADINGS,
  [HeadingIssueType.NO_H1]: SemanticErrorCode.HEADING_HIERARCHY_INVALID,
  [HeadingIssueType.EMPTY_HEADING]: SemanticErrorCode.EMPTY_HEADING,
  [HeadingIssueType.FIRST_HEADING_NOT_H1]: SemanticErrorCode.HEADING_HIERARCHY_INVALID,
  [HeadingIssueType.LEVEL_EXCEEDS_MAXIMUM]: SemanticErrorCode.HEADING_HIERARCHY_INVALID,
  [HeadingIssueType.NON_MEANINGFUL_TEXT]: SemanticErrorCode.HEADING_TEXT_NOT_MEANINGFUL,
};

interface CollectedHeading {
  node: SemanticNode;
  level: number;
}

type IssueDraft = Omit<HeadingIssue, 'id'>;

const issueFor = (
  heading: CollectedHeading,
  type: HeadingIssueType,
  severity: HeadingIssueSeverity,
  message: string,
  context: FindingContext = {}
): IssueDraft => ({
  type,
  severity,
  nodeId: heading.node.id,
  headingLevel: heading.level,
  message,
  pageIndex: heading.node.pageIndex,
  context,
});

/**
 * Level of a heading node: H1-H6 map directly; a generic `H` takes its
 * integer `Level` attribute, defaulting to 1.
 */
export function resolveHeadingLevel(node: SemanticNode): number {
  const numbered = headingLevelOf(node.role);
  if (numbered !== undefined) return numbered;
  if (node.role === SemanticType.HEADING) {
    return intAttribute(node.attributes, AttributeKey.LEVEL) ?? 1;
  }
  return 1;
}

export class HeadingHierarchyChecker {
  readonly options: HeadingCheckerOptions;

  constructor(options: Partial<HeadingCheckerOptions> = {}) {
    this.options = { ...HeadingCheckerPresets.all, ...options };
  }

  validate(root: SemanticNode, ledger?: ErrorCodeLedger): HeadingHierarchyResult {
    const headings = this.collectHeadings(root);
    const headingsByLevel: Record<number, number> = {};
    for (const { level } of headings) {
      headingsByLevel[level] = (headingsByLevel[level] ?? 0) + 1;
    }

    const drafts: IssueDraft[] = [
      ...this.checkDocumentLevel(headings, headingsByLevel[1] ?? 0),
      ...this.checkEachHeading(headings),
    ];

    const nextId = createIdSequence('heading');
    const issues = drafts.map(issue => ({ id: nextId(), ...issue }));
    for (const issue of issues) {
      ledger?.record(issue.nodeId, ISSUE_CODES[issue.type]);
    }

    logger.debug(`[HeadingHierarchyChecker] ${headings.length} headings, ${issues.length} issues`);

    return {
      issues,
      totalHeadingCount: headings.length,
      headingsByLevel,
      isValid: !issues.some(issue => issue.severity === 'critical'),
    };
  }

  private collectHeadings(root: SemanticNode): CollectedHeading[] {
    const headings: CollectedHeading[] = [];
    walkTree(root, node => {
      if (isHeadingRole(node.role)) {
        headings.push({ node, level: resolveHeadingLevel(node) });
      }
    });
    return headings;
  }

  private checkDocumentLevel(headings: CollectedHeading[], h1Count: number): IssueDraft[] {
    const issues: IssueDraft[] = [];
    const [first] = headings;

    if (this.options.requireSingleH1) {
      if (h1Count > 1) {
        for (const heading of headings.filter(h => h.level === 1)) {
          issues.push(
            issueFor(
              heading,
              HeadingIssueType.MULTIPLE_H1,
              'critical',
              `Document contains multiple H1 headings (found ${h1Count})`,
              { h1Count: String(h1Count) }
            )
          );
        }
      } else if (h1Count === 0 && first) {
        issues.push(issueFor(first, HeadingIssueType.NO_H1, 'critical', 'Document has no H1 heading'));
      }
    }

    if (this.options.requireFirstH1 && first && first.level !== 1) {
      issues.push(
        issueFor(
          first,
          HeadingIssueType.FIRST_HEADING_NOT_H1,
          'warning',
          `First heading is H${first.level}, should be H1`,
          { actualLevel: String(first.level) }
        )
      );
    }

    return issues;
  }

  private checkEachHeading(headings: CollectedHeading[]): IssueDraft[] {
    const issues: IssueDraft[] = [];
    let previousLevel: number | undefined;

    for (const heading of headings) {
      const { level } = heading;

      if (this.options.checkEmptyHeadings && !heading.node.hasContent) {
        issues.push(issueFor(heading, HeadingIssueType.EMPTY_HEADING, 'critical', `Heading H${level} is empty`));
      }

      if (this.options.validateHeadingText) {
        const textIssue = this.checkHeadingText(heading);
        if (textIssue) issues.push(textIssue);
      }

      if (this.options.checkSkippedLevels && previousLevel !== undefined && level > previousLevel + 1) {
        issues.push(
          issueFor(
            heading,
            HeadingIssueType.LEVEL_SKIPPED,
            'critical',
            `Heading level skipped from H${previousLevel} to H${level}`,
            {
              previousLevel: String(previousLevel),
              currentLevel: String(level),
              skippedLevels: String(level - previousLevel - 1),
            }
          )
        );
      }

      if (level > this.options.maxHeadingLevel) {
        issues.push(
          issueFor(
            heading,
            HeadingIssueType.LEVEL_EXCEEDS_MAXIMUM,
            'warning',
            `Heading level H${level} exceeds maximum of H${this.options.maxHeadingLevel}`,
            { actualLevel: String(level), maxLevel: String(this.options.maxHeadingLevel) }
          )
        );
      }

      previousLevel = level;
    }

    return issues;
  }

  /** At most one issue: too short wins over placeholder text. */
  private checkHeadingText(heading: CollectedHeading): IssueDraft | undefined {
    const text = collectText(heading.node).trim();
    const { minHeadingTextLength } = this.options;

    if (text.length < minHeadingTextLength) {
      return issueFor(
        heading,
        HeadingIssueType.NON_MEANINGFUL_TEXT,
        'warning',
        `Heading H${heading.level} text is too short to be meaningful`,
        { textLength: String(text.length), minLength: String(minHeadingTextLength) }
      );
    }

    if (PLACEHOLDER_TEXTS.has(text.toLowerCase())) {
      return issueFor(
        heading,
        HeadingIssueType.NON_MEANINGFUL_TEXT,
        'warning',
        `Heading H${heading.level} text '${text}' is not meaningful`,
        { headingText: text }
      );
    }

    return undefined;
  }
}

export const headingHierarchyChecker = new HeadingHierarchyChecker();
