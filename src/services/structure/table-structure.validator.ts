/**
 * Table Structural Validator
 *
 * Checks tagged tables for header cells, a regular column count, empty
 * rows, illegal row children, and agreement with the ruling lines detected
 * on the page.
 */

import { logger } from '../../lib/logger';
import { FindingContext, createIdSequence } from './findings';
import { SemanticErrorCode } from './model/error-codes';
import { ErrorCodeLedger } from './model/error-ledger';
import type { SemanticNode } from './model/semantic-node';
import { SemanticType } from './model/semantic-type';
import { isTableCellRole, TableNode } from './model/table-node';
import { walkTree } from './model/tree-traversal';

export const TableErrorType = {
  MISSING_HEADERS: 'missing-headers',
  COLUMN_COUNT_MISMATCH: 'column-count-mismatch',
  EMPTY_ROW: 'empty-row',
  VISUAL_ROW_COUNT_MISMATCH: 'visual-row-count-mismatch',
  VISUAL_COLUMN_COUNT_MISMATCH: 'visual-column-count-mismatch',
  INVALID_CELL_TYPE: 'invalid-cell-type',
} as const;

export type TableErrorType = (typeof TableErrorType)[keyof typeof TableErrorType];

export type TableErrorSeverity = 'error' | 'warning' | 'info';

export interface TableError {
  id: string;
  type: TableErrorType;
  severity: TableErrorSeverity;
  /** The table, row or cell the error points at. */
  nodeId: string;
  tableId: string;
  message: string;
  pageIndex?: number;
  context: FindingContext;
}

export interface TableValidationResult {
  tableId: string;
  errors: TableError[];
  rowCount: number;
  columnCount: number;
  passed: boolean;
}

const ERROR_CODES: Record<TableErrorType, SemanticErrorCode> = {
  [TableErrorType.MISSING_HEADERS]: SemanticErrorCode.TABLE_MISSING_HEADERS,
  [TableErrorType.COLUMN_COUNT_MISMATCH]: SemanticErrorCode.TABLE_IRREGULAR_STRUCTURE,
  [TableErrorType.EMPTY_ROW]: SemanticErrorCode.MISSING_REQUIRED_CHILD,
  [TableErrorType.VISUAL_ROW_COUNT_MISMATCH]: SemanticErrorCode.TABLE_ROW_COUNT_MISMATCH,
  [TableErrorType.VISUAL_COLUMN_COUNT_MISMATCH]: SemanticErrorCode.TABLE_COLUMN_COUNT_MISMATCH,
  [TableErrorType.INVALID_CELL_TYPE]: SemanticErrorCode.UNEXPECTED_CHILD,
};

type ErrorDraft = Omit<TableError, 'id' | 'tableId'>;

const errorFor = (
  node: SemanticNode,
  type: TableErrorType,
  severity: TableErrorSeverity,
  message: string,
  context: FindingContext = {}
): ErrorDraft => ({ type, severity, nodeId: node.id, message, pageIndex: node.pageIndex, context });

export class TableStructureValidator {
  /**
   * Validate one table. Any node that is not a table yields a passing,
   * empty result.
   */
  validate(node: SemanticNode, ledger?: ErrorCodeLedger): TableValidationResult {
    return this.validateTable(node, createIdSequence('table'), ledger);
  }

  /** Validate every table in the tree, in document order, with ids unique across tables. */
  validateAll(root: SemanticNode, ledger?: ErrorCodeLedger): TableValidationResult[] {
    const nextId = createIdSequence('table');
    const results: TableValidationResult[] = [];
    walkTree(root, node => {
      if (node.kind === 'table') {
        results.push(this.validateTable(node, nextId, ledger));
      }
    });

    logger.debug(`[TableStructureValidator] Validated ${results.length} tables`);
    return results;
  }

  private validateTable(node: SemanticNode, nextId: () => string, ledger?: ErrorCodeLedger): TableValidationResult {
    if (node.kind !== 'table') {
      return { tableId: node.id, errors: [], rowCount: 0, columnCount: 0, passed: true };
    }

    const drafts = [
      ...this.checkHeaders(node),
      ...this.checkColumnRegularity(node),
      ...this.checkEmptyRows(node),
      ...this.checkVisualAgreement(node),
      ...this.checkCellTypes(node),
    ];

    const errors = drafts.map(error => ({ id: nextId(), tableId: node.id, ...error }));
    for (const error of errors) {
      ledger?.record(error.nodeId, ERROR_CODES[error.type]);
    }

    return {
      tableId: node.id,
      errors,
      rowCount: node.rowCount,
      columnCount: node.maxCellsPerRow,
      passed: !errors.some(error => error.severity === 'error'),
    };
  }

  private checkHeaders(table: TableNode): ErrorDraft[] {
    if (table.hasHeaders || table.rowCount <= 1) return [];
    return [
      errorFor(table, TableErrorType.MISSING_HEADERS, 'error', 'Table has more than one row but no header cells', {
        rowCount: String(table.rowCount),
      }),
    ];
  }

  private checkColumnRegularity(table: TableNode): ErrorDraft[] {
    if (table.hasConsistentColumnCount) return [];
    const counts = table.cellCountsPerRow;
    return [
      errorFor(table, TableErrorType.COLUMN_COUNT_MISMATCH, 'error', 'Table rows have differing cell counts', {
        expectedColumns: String(counts[0] ?? 0),
        rowCellCounts: counts.join(','),
      }),
    ];
  }

  private checkEmptyRows(table: TableNode): ErrorDraft[] {
    return table.allRows.flatMap((row, rowIndex) =>
      table.cellsInRow(row).length > 0
        ? []
        : [errorFor(row, TableErrorType.EMPTY_ROW, 'error', 'Table row has no cells', { rowIndex: String(rowIndex) })]
    );
  }

  private checkVisualAgreement(table: TableNode): ErrorDraft[] {
    if (!table.hasVisualBorder) return [];

    const errors: ErrorDraft[] = [];
    if (table.visualRowCount !== table.rowCount) {
      errors.push(
        errorFor(
          table,
          TableErrorType.VISUAL_ROW_COUNT_MISMATCH,
          'warning',
          `Table has ${table.rowCount} tagged rows but ${table.visualRowCount} visual rows`,
          { taggedRows: String(table.rowCount), visualRows: String(table.visualRowCount) }
        )
      );
    }

    const columns = table.maxCellsPerRow;
    if (columns > 0 && table.visualColumnCount !== columns) {
      errors.push(
        errorFor(
          table,
          TableErrorType.VISUAL_COLUMN_COUNT_MISMATCH,
          'warning',
          `Table has ${columns} tagged columns but ${table.visualColumnCount} visual columns`,
          { taggedColumns: String(columns), visualColumns: String(table.visualColumnCount) }
        )
      );
    }
    return errors;
  }

  private checkCellTypes(table: TableNode): ErrorDraft[] {
    return table.allRows.flatMap(row =>
      row.children
        .filter(child => !isTableCellRole(child.role))
        .map(child =>
          errorFor(
            child,
            TableErrorType.INVALID_CELL_TYPE,
            'error',
            `Invalid cell type '${child.role}' in table row`,
            { rowId: row.id, expected: `${SemanticType.TABLE_HEADER} or ${SemanticType.TABLE_CELL}` }
          )
        )
    );
  }
}

export const tableStructureValidator = new TableStructureValidator();
