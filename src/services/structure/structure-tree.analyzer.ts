/**
 * Structure Tree Analyzer
 *
 * Walks a structure tree once and reports nesting, required-child,
 * attribute, emptiness, duplicate-id and depth problems.
 */

import { logger } from '../../lib/logger';
import { FindingContext, createIdSequence } from './findings';
import { SemanticErrorCode } from './model/error-codes';
import { ErrorCodeLedger } from './model/error-ledger';
import type { SemanticNode } from './model/semantic-node';
import { SemanticType } from './model/semantic-type';
import { walkTree } from './model/tree-traversal';

export interface StructureAnalyzerOptions {
  validateNesting: boolean;
  validateRequiredChildren: boolean;
  validateAttributes: boolean;
  checkEmptyElements: boolean;
  checkDuplicateIds: boolean;
  /** 0 disables the depth limit. */
  maxDepth: number;
}

export const StructureAnalyzerPresets = {
  all: {
    validateNesting: true,
    validateRequiredChildren: true,
    validateAttributes: true,
    checkEmptyElements: true,
    checkDuplicateIds: true,
    maxDepth: 0,
  },
  nestingOnly: {
    validateNesting: true,
    validateRequiredChildren: false,
    validateAttributes: false,
    checkEmptyElements: false,
    checkDuplicateIds: false,
    maxDepth: 0,
  },
  attributesOnly: {
    validateNesting: false,
    validateRequiredChildren: false,
    validateAttributes: true,
    checkEmptyElements: false,
    checkDuplicateIds: false,
    maxDepth: 0,
  },
} satisfies Record<string, StructureAnalyzerOptions>;

export interface StructureError {
  id: string;
  code: SemanticErrorCode;
  nodeId: string;
  role: SemanticType;
  message: string;
  pageIndex?: number;
  context: FindingContext;
}

export interface StructureAnalysisResult {
  errors: StructureError[];
  totalNodeCount: number;
  /** Largest recorded node depth. */
  maxDepth: number;
  isValid: boolean;
}

type ChildRule = { allowed: ReadonlySet<SemanticType> } | { forbidden: ReadonlySet<SemanticType> };

/**
 * Legal children per parent role. Parents without an entry accept any child.
 */
export const NESTING_RULES: Partial<Record<SemanticType, ChildRule>> = {
  [SemanticType.DOCUMENT]: { forbidden: new Set<SemanticType>([SemanticType.LIST_LABEL, SemanticType.LIST_BODY]) },
  [SemanticType.LIST]: { allowed: new Set<SemanticType>([SemanticType.LIST_ITEM]) },
  [SemanticType.LIST_ITEM]: {
    allowed: new Set<SemanticType>([SemanticType.LIST_LABEL, SemanticType.LIST_BODY, SemanticType.LIST]),
  },
  [SemanticType.TABLE]: {
    allowed: new Set<SemanticType>([
      SemanticType.TABLE_ROW,
      SemanticType.TABLE_HEAD,
      SemanticType.TABLE_BODY,
      SemanticType.TABLE_FOOT,
    ]),
  },
  [SemanticType.TABLE_ROW]: { allowed: new Set<SemanticType>([SemanticType.TABLE_CELL, SemanticType.TABLE_HEADER]) },
  [SemanticType.TABLE_HEAD]: { allowed: new Set<SemanticType>([SemanticType.TABLE_ROW]) },
  [SemanticType.TABLE_BODY]: { allowed: new Set<SemanticType>([SemanticType.TABLE_ROW]) },
  [SemanticType.TABLE_FOOT]: { allowed: new Set<SemanticType>([SemanticType.TABLE_ROW]) },
  [SemanticType.TOC]: { allowed: new Set<SemanticType>([SemanticType.TOC_ITEM]) },
};

export function isLegalChild(parent: SemanticType, child: SemanticType): boolean {
  const rule = NESTING_RULES[parent];
  if (!rule) return true;
  return 'allowed' in rule ? rule.allowed.has(child) : !rule.forbidden.has(child);
}

/** Roles that may legitimately have neither children nor a text alternative. */
const MAY_BE_EMPTY: ReadonlySet<SemanticType> = new Set([
  SemanticType.ARTIFACT,
  SemanticType.HEADER,
  SemanticType.FOOTER,
  SemanticType.NOTE,
  SemanticType.DOCUMENT,
  SemanticType.PART,
  SemanticType.ARTICLE,
  SemanticType.SECTION,
  SemanticType.DIV,
]);

type ErrorDraft = Omit<StructureError, 'id'>;

const draft = (
  node: SemanticNode,
  code: SemanticErrorCode,
  message: string,
  context: FindingContext = {}
): ErrorDraft => ({
  code,
  nodeId: node.id,
  role: node.role,
  message,
  pageIndex: node.pageIndex,
  context,
});

export class StructureTreeAnalyzer {
  readonly options: StructureAnalyzerOptions;

  constructor(options: Partial<StructureAnalyzerOptions> = {}) {
    this.options = { ...StructureAnalyzerPresets.all, ...options };
  }

  /** Depth checks use each node's recorded `depth`. */
  analyze(root: SemanticNode, ledger?: ErrorCodeLedger): StructureAnalysisResult {
    const drafts: ErrorDraft[] = [];
    const seenIds = new Set<string>();
    let totalNodeCount = 0;
    let maxDepth = 0;

    walkTree(root, node => {
      totalNodeCount++;
      maxDepth = Math.max(maxDepth, node.depth);
      drafts.push(...this.checkNode(node, seenIds));
    });

    const nextId = createIdSequence('structure');
    const errors = drafts.map(error => ({ id: nextId(), ...error }));
    for (const error of errors) {
      ledger?.record(error.nodeId, error.code);
    }

    logger.debug(`[StructureTreeAnalyzer] ${totalNodeCount} nodes, ${errors.length} errors`);

    return {
      errors,
      totalNodeCount,
      maxDepth,
      isValid: errors.length === 0,
    };
  }

  private checkNode(node: SemanticNode, seenIds: Set<string>): ErrorDraft[] {
    const errors: ErrorDraft[] = [];
    const { maxDepth } = this.options;
    const { depth } = node;

    if (maxDepth > 0 && depth > maxDepth) {
      errors.push(
        draft(node, SemanticErrorCode.INVALID_NESTING, `Node exceeds maximum depth of ${maxDepth}`, {
          depth: String(depth),
          maxDepth: String(maxDepth),
        })
      );
    }

    if (this.options.checkDuplicateIds) {
      if (seenIds.has(node.id)) {
        errors.push(draft(node, SemanticErrorCode.DUPLICATE_ID, 'Duplicate node ID detected'));
      } else {
        seenIds.add(node.id);
      }
    }

    if (this.options.checkEmptyElements && !MAY_BE_EMPTY.has(node.role) && !node.hasContent) {
      errors.push(
        draft(node, SemanticErrorCode.EMPTY_ELEMENT, 'Element is empty (no children or text alternative)')
      );
    }

    if (this.options.validateNesting) {
      errors.push(...this.checkNesting(node));
    }

    if (this.options.validateRequiredChildren) {
      errors.push(...this.checkRequiredChildren(node));
    }

    if (this.options.validateAttributes) {
      errors.push(...this.checkAttributes(node));
    }

    return errors;
  }

  private checkNesting(node: SemanticNode): ErrorDraft[] {
    return node.children
      .filter(child => !isLegalChild(node.role, child.role))
      .map(child =>
        draft(
          child,
          SemanticErrorCode.UNEXPECTED_CHILD,
          `Invalid child type '${child.role}' for parent '${node.role}'`,
          { parentType: node.role, childType: child.role }
        )
      );
  }

  private checkRequiredChildren(node: SemanticNode): ErrorDraft[] {
    switch (node.role) {
      case SemanticType.LIST_ITEM: {
        const hasBody = node.children.some(child => child.role === SemanticType.LIST_BODY);
        return hasBody
          ? []
          : [
              draft(node, SemanticErrorCode.MISSING_REQUIRED_CHILD, 'List item missing required LBody child', {
                missingChild: SemanticType.LIST_BODY,
              }),
            ];
      }
      case SemanticType.TABLE:
        return node.hasChildren
          ? []
          : [
              draft(node, SemanticErrorCode.MISSING_REQUIRED_CHILD, 'Table has no rows', {
                missingChild: SemanticType.TABLE_ROW,
              }),
            ];
      case SemanticType.TABLE_ROW:
        return node.hasChildren
          ? []
          : [
              draft(node, SemanticErrorCode.MISSING_REQUIRED_CHILD, 'Table row has no cells', {
                missingChild: 'TD or TH',
              }),
            ];
      default:
        return [];
    }
  }

  private checkAttributes(node: SemanticNode): ErrorDraft[] {
    if (node.role === SemanticType.FIGURE && !node.hasTextAlternative) {
      return [
        draft(node, SemanticErrorCode.MISSING_ATTRIBUTE, 'Figure missing Alt or ActualText attribute', {
          requiredAttribute: 'Alt or ActualText',
        }),
      ];
    }
    if (node.role === SemanticType.LINK && !node.hasChildren && !node.hasTextAlternative) {
      return [
        draft(node, SemanticErrorCode.MISSING_ATTRIBUTE, 'Link has no content or Alt text', {
          requiredAttribute: 'Alt or content',
        }),
      ];
    }
    return [];
  }
}

export const structureTreeAnalyzer = new StructureTreeAnalyzer();
