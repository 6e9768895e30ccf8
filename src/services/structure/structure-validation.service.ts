/**
 * Structure Validation Service
 *
 * Runs the four structure analyzers over one tree, assigns severity where
 * an analyzer leaves it open, and folds everything into a single report.
 */

import { validationConfig } from '../../config/validation.config';
import { logger } from '../../lib/logger';
import {
  FindingCategory,
  FindingContext,
  FindingSeverity,
  SeverityCounts,
  countBySeverity,
  isBlockingSeverity,
} from './findings';
import {
  HeadingCheckerOptions,
  HeadingHierarchyChecker,
  HeadingHierarchyResult,
} from './heading-hierarchy.checker';
import { SemanticErrorCode } from './model/error-codes';
import { ErrorCodeLedger } from './model/error-ledger';
import type { SemanticNode } from './model/semantic-node';
import { ReadingOrderOptions, ReadingOrderResult, ReadingOrderValidator } from './reading-order.validator';
import {
  StructureAnalysisResult,
  StructureAnalyzerOptions,
  StructureAnalyzerPresets,
  StructureError,
  StructureTreeAnalyzer,
} from './structure-tree.analyzer';
import { TableValidationResult, tableStructureValidator } from './table-structure.validator';

export interface StructureValidationOptions {
  structure?: Partial<StructureAnalyzerOptions>;
  headings?: Partial<HeadingCheckerOptions>;
  readingOrder?: Partial<ReadingOrderOptions>;
}

export interface ValidationFinding {
  id: string;
  category: FindingCategory;
  /** Analyzer-specific code or issue type. */
  code: string;
  severity: FindingSeverity;
  nodeId: string;
  relatedNodeId?: string;
  message: string;
  pageIndex?: number;
  context: FindingContext;
}

export interface TableSummary {
  tableId: string;
  rowCount: number;
  columnCount: number;
  passed: boolean;
}

export interface StructureValidationReport {
  rootId: string;
  passed: boolean;
  findings: ValidationFinding[];
  counts: SeverityCounts;
  countsByCategory: Record<FindingCategory, number>;
  structure: { totalNodeCount: number; maxDepth: number };
  headings: { totalHeadingCount: number; headingsByLevel: Record<number, number> };
  readingOrder: { totalNodeCount: number; pageCount: number };
  tables: TableSummary[];
  /** Error codes recorded per node id. */
  annotations: Record<string, SemanticErrorCode[]>;
}

const WARNING_STRUCTURE_CODES: ReadonlySet<SemanticErrorCode> = new Set<SemanticErrorCode>([
  SemanticErrorCode.EMPTY_ELEMENT,
  SemanticErrorCode.INVALID_NESTING,
]);

/**
 * Structure findings carry no severity of their own. Empty elements and the
 * depth limit are warnings; everything else is an error.
 */
export function structureSeverity(code: SemanticErrorCode): FindingSeverity {
  return WARNING_STRUCTURE_CODES.has(code) ? FindingSeverity.WARNING : FindingSeverity.ERROR;
}

export function resolveStructureOptions(overrides: Partial<StructureAnalyzerOptions> = {}): StructureAnalyzerOptions {
  return { ...StructureAnalyzerPresets.all, maxDepth: validationConfig.structure.maxDepth, ...overrides };
}

export function resolveHeadingOptions(overrides: Partial<HeadingCheckerOptions> = {}): Partial<HeadingCheckerOptions> {
  return { ...validationConfig.headings, ...overrides };
}

export function resolveReadingOrderOptions(overrides: Partial<ReadingOrderOptions> = {}): Partial<ReadingOrderOptions> {
  return { ...validationConfig.readingOrder, ...overrides };
}

const fromStructureError = (error: StructureError): ValidationFinding => ({
  id: error.id,
  category: FindingCategory.STRUCTURE,
  code: error.code,
  severity: structureSeverity(error.code),
  nodeId: error.nodeId,
  message: error.message,
  pageIndex: error.pageIndex,
  context: error.context,
});

export class StructureValidationService {
  analyzeStructure(
    root: SemanticNode,
    options?: Partial<StructureAnalyzerOptions>,
    ledger?: ErrorCodeLedger
  ): StructureAnalysisResult {
    return new StructureTreeAnalyzer(resolveStructureOptions(options)).analyze(root, ledger);
  }

  checkHeadings(
    root: SemanticNode,
    options?: Partial<HeadingCheckerOptions>,
    ledger?: ErrorCodeLedger
  ): HeadingHierarchyResult {
    return new HeadingHierarchyChecker(resolveHeadingOptions(options)).validate(root, ledger);
  }

  validateReadingOrder(
    root: SemanticNode,
    options?: Partial<ReadingOrderOptions>,
    ledger?: ErrorCodeLedger
  ): ReadingOrderResult {
    return new ReadingOrderValidator(resolveReadingOrderOptions(options)).validate(root, ledger);
  }

  validateTables(root: SemanticNode, ledger?: ErrorCodeLedger): TableValidationResult[] {
    return tableStructureValidator.validateAll(root, ledger);
  }

  /**
   * Run every analyzer over `root`. The analyzers are independent; each
   * writes to the shared ledger and none reads it.
   */
  validate(root: SemanticNode, options: StructureValidationOptions = {}): StructureValidationReport {
    const ledger = new ErrorCodeLedger();

    const structure = this.analyzeStructure(root, options.structure, ledger);
    const headings = this.checkHeadings(root, options.headings, ledger);
    const readingOrder = this.validateReadingOrder(root, options.readingOrder, ledger);
    const tables = this.validateTables(root, ledger);

    const findings: ValidationFinding[] = [
      ...structure.errors.map(fromStructureError),
      ...headings.issues.map(
        (issue): ValidationFinding => ({
          id: issue.id,
          category: FindingCategory.HEADING,
          code: issue.type,
          severity: issue.severity,
          nodeId: issue.nodeId,
          message: issue.message,
          pageIndex: issue.pageIndex,
          context: issue.context,
        })
      ),
      ...readingOrder.issues.map(
        (issue): ValidationFinding => ({
          id: issue.id,
          category: FindingCategory.READING_ORDER,
          code: issue.type,
          severity: issue.severity,
          nodeId: issue.nodeId,
          relatedNodeId: issue.relatedNodeId,
          message: issue.message,
          pageIndex: issue.pageIndex,
          context: issue.context,
        })
      ),
      ...tables.flatMap(table =>
        table.errors.map(
          (error): ValidationFinding => ({
            id: error.id,
            category: FindingCategory.TABLE,
            code: error.type,
            severity: error.severity,
            nodeId: error.nodeId,
            relatedNodeId: error.nodeId === table.tableId ? undefined : table.tableId,
            message: error.message,
            pageIndex: error.pageIndex,
            context: error.context,
          })
        )
      ),
    ];

    const counts = countBySeverity(findings);
    const passed = !findings.some(finding => isBlockingSeverity(finding.severity));

    logger.info(
      `[StructureValidationService] Validated tree ${root.id}: ${counts.total} findings ` +
        `(${counts.critical} critical, ${counts.error} errors, ${counts.warning} warnings), ` +
        `${passed ? 'passed' : 'failed'}`
    );

    return {
      rootId: root.id,
      passed,
      findings,
      counts,
      countsByCategory: {
        structure: structure.errors.length,
        heading: headings.issues.length,
        'reading-order': readingOrder.issues.length,
        table: tables.reduce((sum, table) => sum + table.errors.length, 0),
      },
      structure: { totalNodeCount: structure.totalNodeCount, maxDepth: structure.maxDepth },
      headings: { totalHeadingCount: headings.totalHeadingCount, headingsByLevel: headings.headingsByLevel },
      readingOrder: { totalNodeCount: readingOrder.totalNodeCount, pageCount: readingOrder.pageCount },
      tables: tables.map(({ tableId, rowCount, columnCount, passed: tablePassed }) => ({
        tableId,
        rowCount,
        columnCount,
        passed: tablePassed,
      })),
      annotations: ledger.toJSON(),
    };
  }
}

export const structureValidationService = new StructureValidationService();
