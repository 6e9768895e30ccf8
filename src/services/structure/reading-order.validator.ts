/**
 * Reading Order Validator
 *
 * Compares the logical order of positioned nodes with their placement on
 * the page. Nodes are grouped by page; each consecutive pair is checked for
 * vertical order, reading direction on a shared line, and overlap, and the
 * page as a whole for backward jumps between columns.
 */

import { logger } from '../../lib/logger';
import type { BoundingBox } from './geometry/bounding-box';
import { FindingContext, createIdSequence, formatFixed, formatPercent } from './findings';
import { SemanticErrorCode } from './model/error-codes';
import { ErrorCodeLedger } from './model/error-ledger';
import type { SemanticNode } from './model/semantic-node';
import { isGroupingRole } from './model/semantic-type';
import { walkTree } from './model/tree-traversal';

export type ReadingDirection = 'left-to-right' | 'right-to-left';

export interface ReadingOrderOptions {
  readingDirection: ReadingDirection;
  validateColumns: boolean;
  checkOverlaps: boolean;
  /** Points the next node's top may rise above the current node's bottom. */
  verticalTolerance: number;
  /** Points of backward horizontal travel tolerated on a shared line. */
  horizontalTolerance: number;
  /** Overlap ratio (0-1) above which a pair is reported. */
  overlapThreshold: number;
  /** Minimum gap between sorted left edges that starts a new column. */
  columnGapThreshold: number;
  /** Leave grouping roles (Document, Sect, Table, TR, ...) out of the sequence. */
  ignoreGroupingNodes: boolean;
}

const STANDARD: ReadingOrderOptions = {
  readingDirection: 'left-to-right',
  validateColumns: true,
  checkOverlaps: true,
  verticalTolerance: 5,
  horizontalTolerance: 10,
  overlapThreshold: 0.1,
  columnGapThreshold: 50,
  ignoreGroupingNodes: false,
};

export const ReadingOrderPresets = {
  standard: STANDARD,
  rightToLeft: { ...STANDARD, readingDirection: 'right-to-left' },
  strict: { ...STANDARD, verticalTolerance: 2, horizontalTolerance: 5, overlapThreshold: 0.05 },
} satisfies Record<string, ReadingOrderOptions>;

export const ReadingOrderIssueType = {
  OUT_OF_ORDER: 'out-of-order',
  REVERSE_DIRECTION: 'reverse-direction',
  OVERLAPPING: 'overlapping',
  COLUMN_JUMP: 'column-jump',
} as const;

export type ReadingOrderIssueType = (typeof ReadingOrderIssueType)[keyof typeof ReadingOrderIssueType];

export type ReadingOrderIssueSeverity = 'critical' | 'warning' | 'info';

export interface ReadingOrderIssue {
  id: string;
  type: ReadingOrderIssueType;
  severity: ReadingOrderIssueSeverity;
  /** Earlier node of the pair. */
  nodeId: string;
  /** Later node of the pair; the ledger annotates this one. */
  relatedNodeId: string;
  message: string;
  pageIndex: number;
  context: FindingContext;
}

export interface ReadingOrderResult {
  issues: ReadingOrderIssue[];
  totalNodeCount: number;
  pageCount: number;
  isValid: boolean;
}

const ISSUE_CODES: Record<ReadingOrderIssueType, SemanticErrorCode> = {
  [ReadingOrderIssueType.OUT_OF_ORDER]: SemanticErrorCode.READING_ORDER_OUT_OF_SEQUENCE,
  [ReadingOrderIssueType.REVERSE_DIRECTION]: SemanticErrorCode.READING_ORDER_REVERSED,
  [ReadingOrderIssueType.OVERLAPPING]: SemanticErrorCode.CONTENT_OVERLAPPING,
  [ReadingOrderIssueType.COLUMN_JUMP]: SemanticErrorCode.COLUMN_ORDER_JUMP,
};

interface PositionedNode {
  node: SemanticNode;
  box: BoundingBox;
}

type IssueDraft = Omit<ReadingOrderIssue, 'id'>;

/**
 * Column start positions from left edges: the smallest x opens the first
 * column and every gap wider than `gapThreshold` between consecutive sorted
 * values opens another.
 */
export function detectColumns(leftEdges: readonly number[], gapThreshold: number): number[] {
  const sorted = [...leftEdges].sort((a, b) => a - b);
  const columns: number[] = [];
  let previous: number | undefined;

  for (const x of sorted) {
    if (previous === undefined || x - previous > gapThreshold) {
      columns.push(x);
    }
    previous = x;
  }

  return columns;
}

/**
 * Index of the first column starting within `gapThreshold` of `x`, else the
 * last column.
 */
export function assignColumn(x: number, columns: readonly number[], gapThreshold: number): number {
  const index = columns.findIndex(start => Math.abs(x - start) < gapThreshold);
  return index === -1 ? Math.max(columns.length - 1, 0) : index;
}

export class ReadingOrderValidator {
  readonly options: ReadingOrderOptions;

  constructor(options: Partial<ReadingOrderOptions> = {}) {
    this.options = { ...ReadingOrderPresets.standard, ...options };
  }

  validate(root: SemanticNode, ledger?: ErrorCodeLedger): ReadingOrderResult {
    const pages = this.collectByPage(root);
    const pageIndices = [...pages.keys()].sort((a, b) => a - b);

    const drafts: IssueDraft[] = [];
    let totalNodeCount = 0;
    for (const pageIndex of pageIndices) {
      const nodes = pages.get(pageIndex) ?? [];
      totalNodeCount += nodes.length;
      drafts.push(...this.validatePage(nodes, pageIndex));
    }

    const nextId = createIdSequence('reading-order');
    const issues = drafts.map(issue => ({ id: nextId(), ...issue }));
    for (const issue of issues) {
      ledger?.record(issue.relatedNodeId, ISSUE_CODES[issue.type]);
    }

    logger.debug(
      `[ReadingOrderValidator] ${totalNodeCount} nodes on ${pageIndices.length} pages, ${issues.length} issues`
    );

    return {
      issues,
      totalNodeCount,
      pageCount: pageIndices.length,
      isValid: !issues.some(issue => issue.severity === 'critical'),
    };
  }

  private collectByPage(root: SemanticNode): Map<number, PositionedNode[]> {
    const pages = new Map<number, PositionedNode[]>();
    walkTree(root, node => {
      const { box } = node;
      if (!box) return;
      if (this.options.ignoreGroupingNodes && isGroupingRole(node.role)) return;

      const nodes = pages.get(box.pageIndex);
      if (nodes) {
        nodes.push({ node, box });
      } else {
        pages.set(box.pageIndex, [{ node, box }]);
      }
    });
    return pages;
  }

  private validatePage(nodes: PositionedNode[], pageIndex: number): IssueDraft[] {
    if (nodes.length < 2) return [];

    const issues: IssueDraft[] = [];
    for (let i = 0; i < nodes.length - 1; i++) {
      const current = nodes[i];
      const next = nodes[i + 1];

      const orderIssue = this.checkSpatialOrder(current, next, pageIndex);
      if (orderIssue) issues.push(orderIssue);

      if (this.options.checkOverlaps) {
        const overlapIssue = this.checkOverlap(current, next, pageIndex);
        if (overlapIssue) issues.push(overlapIssue);
      }
    }

    if (this.options.validateColumns) {
      issues.push(...this.checkColumnOrder(nodes, pageIndex));
    }

    return issues;
  }

  private checkSpatialOrder(current: PositionedNode, next: PositionedNode, pageIndex: number): IssueDraft | undefined {
    const a = current.box;
    const b = next.box;

    // y grows upward: a positive gap means the next node starts above the current one's bottom
    const verticalGap = b.topY - a.bottomY;
    if (verticalGap > this.options.verticalTolerance) {
      return this.issue(current, next, pageIndex, ReadingOrderIssueType.OUT_OF_ORDER, 'critical',
        'Content appears out of vertical order', {
          verticalGap: formatFixed(verticalGap),
          currentBottom: formatFixed(a.bottomY),
          nextTop: formatFixed(b.topY),
        });
    }

    const sharedHeight = Math.min(a.topY, b.topY) - Math.max(a.bottomY, b.bottomY);
    if (sharedHeight <= Math.min(a.height, b.height) * 0.5) return undefined;

    const horizontalDistance =
      this.options.readingDirection === 'left-to-right' ? b.leftX - a.rightX : a.leftX - b.rightX;

    if (horizontalDistance < -this.options.horizontalTolerance) {
      return this.issue(current, next, pageIndex, ReadingOrderIssueType.REVERSE_DIRECTION, 'warning',
        'Content appears in reverse reading direction', {
          horizontalDistance: formatFixed(horizontalDistance),
          readingDirection: this.options.readingDirection,
        });
    }

    return undefined;
  }

  private checkOverlap(current: PositionedNode, next: PositionedNode, pageIndex: number): IssueDraft | undefined {
    const ratio = current.box.overlapPercentage(next.box);
    if (ratio <= this.options.overlapThreshold) return undefined;

    return this.issue(current, next, pageIndex, ReadingOrderIssueType.OVERLAPPING, 'warning',
      'Content overlaps in reading sequence', { overlapPercentage: formatPercent(ratio) });
  }

  private checkColumnOrder(nodes: PositionedNode[], pageIndex: number): IssueDraft[] {
    if (nodes.length < 3) return [];

    const columns = detectColumns(nodes.map(({ box }) => box.leftX), this.options.columnGapThreshold);
    if (columns.length < 2) return [];

    const issues: IssueDraft[] = [];
    for (let i = 0; i < nodes.length - 1; i++) {
      const fromColumn = assignColumn(nodes[i].box.leftX, columns, this.options.columnGapThreshold);
      const toColumn = assignColumn(nodes[i + 1].box.leftX, columns, this.options.columnGapThreshold);
      if (toColumn < fromColumn) {
        issues.push(
          this.issue(nodes[i], nodes[i + 1], pageIndex, ReadingOrderIssueType.COLUMN_JUMP, 'warning',
            'Reading order jumps backward across columns', {
              fromColumn: String(fromColumn),
              toColumn: String(toColumn),
            })
        );
      }
    }
    return issues;
  }

  private issue(
    current: PositionedNode,
    next: PositionedNode,
    pageIndex: number,
    type: ReadingOrderIssueType,
    severity: ReadingOrderIssueSeverity,
    message: string,
    context: FindingContext
  ): IssueDraft {
    return { type, severity, nodeId: current.node.id, relatedNodeId: next.node.id, message, pageIndex, context };
  }
}

export const readingOrderValidator = new ReadingOrderValidator();
