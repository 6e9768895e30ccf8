import { SemanticErrorCode } from './error-codes';
import { AttributeKey, stringAttribute } from './attribute-value';
import { BaseSemanticNode, SemanticNode, SemanticNodeInit } from './semantic-node';
import { SemanticType } from './semantic-type';

export interface TableNodeInit extends SemanticNodeInit {
  /** x positions of detected vertical ruling lines. */
  visualBorderX?: readonly number[];
  /** y positions of detected horizontal ruling lines. */
  visualBorderY?: readonly number[];
}

const rowsOf = (group: SemanticNode | undefined): SemanticNode[] =>
  group ? group.children.filter(child => child.role === SemanticType.TABLE_ROW) : [];

export const isTableCellRole = (role: SemanticType): boolean =>
  role === SemanticType.TABLE_HEADER || role === SemanticType.TABLE_CELL;

export class TableNode extends BaseSemanticNode {
  readonly kind = 'table' as const;
  readonly visualBorderX: readonly number[];
  readonly visualBorderY: readonly number[];

  constructor(init: TableNodeInit = {}) {
    super({ ...init, role: SemanticType.TABLE });
    this.visualBorderX = [...(init.visualBorderX ?? [])].sort((a, b) => a - b);
    this.visualBorderY = [...(init.visualBorderY ?? [])].sort((a, b) => a - b);
  }

  get summary(): string | undefined {
    return stringAttribute(this.attributes, AttributeKey.SUMMARY);
  }

  get tableHead(): SemanticNode | undefined {
    return this.children.find(child => child.role === SemanticType.TABLE_HEAD);
  }

  get tableBodies(): SemanticNode[] {
    return this.children.filter(child => child.role === SemanticType.TABLE_BODY);
  }

  get tableFoot(): SemanticNode | undefined {
    return this.children.find(child => child.role === SemanticType.TABLE_FOOT);
  }

  get hasExplicitRowGroups(): boolean {
    return this.tableHead !== undefined || this.tableBodies.length > 0 || this.tableFoot !== undefined;
  }

  /** Head rows, body rows, foot rows, then rows placed directly under the table. */
  get allRows(): SemanticNode[] {
    return [
      ...rowsOf(this.tableHead),
      ...this.tableBodies.flatMap(body => rowsOf(body)),
      ...rowsOf(this.tableFoot),
      ...rowsOf(this),
    ];
  }

  get rowCount(): number {
    return this.allRows.length;
  }

  /** Rows of the table head; without one, rows made only of header cells. */
  get headerRows(): SemanticNode[] {
    const head = this.tableHead;
    if (head) return rowsOf(head);

    return this.allRows.filter(row => {
      const cells = this.cellsInRow(row);
      return cells.length > 0 && cells.every(cell => cell.role === SemanticType.TABLE_HEADER);
    });
  }

  cellsInRow(row: SemanticNode): SemanticNode[] {
    if (row.role !== SemanticType.TABLE_ROW) return [];
    return row.children.filter(child => isTableCellRole(child.role));
  }

  get allCells(): SemanticNode[] {
    return this.allRows.flatMap(row => this.cellsInRow(row));
  }

  get headerCells(): SemanticNode[] {
    return this.allCells.filter(cell => cell.role === SemanticType.TABLE_HEADER);
  }

  get dataCells(): SemanticNode[] {
    return this.allCells.filter(cell => cell.role === SemanticType.TABLE_CELL);
  }

  get cellCount(): number {
    return this.allCells.length;
  }

  get hasHeaders(): boolean {
    return this.headerCells.length > 0;
  }

  get cellCountsPerRow(): number[] {
    return this.allRows.map(row => this.cellsInRow(row).length);
  }

  get maxCellsPerRow(): number {
    return Math.max(0, ...this.cellCountsPerRow);
  }

  get hasConsistentColumnCount(): boolean {
    const [first, ...rest] = this.cellCountsPerRow;
    return first === undefined || rest.every(count => count === first);
  }

  get hasVisualBorder(): boolean {
    return this.visualBorderX.length > 0 && this.visualBorderY.length > 0;
  }

  get visualColumnCount(): number {
    return Math.max(0, this.visualBorderX.length - 1);
  }

  get visualRowCount(): number {
    return Math.max(0, this.visualBorderY.length - 1);
  }

  /** Quick structural verdict as a set of codes; the table validator gives the detailed findings. */
  validateStructure(): Set<SemanticErrorCode> {
    const codes = new Set<SemanticErrorCode>();
    if (!this.hasHeaders && this.rowCount > 1) {
      codes.add(SemanticErrorCode.TABLE_MISSING_HEADERS);
    }
    if (!this.hasConsistentColumnCount) {
      codes.add(SemanticErrorCode.TABLE_IRREGULAR_STRUCTURE);
    }
    if (this.hasVisualBorder) {
      if (this.visualRowCount !== this.rowCount) {
        codes.add(SemanticErrorCode.TABLE_ROW_COUNT_MISMATCH);
      }
      if (this.maxCellsPerRow > 0 && this.visualColumnCount !== this.maxCellsPerRow) {
        codes.add(SemanticErrorCode.TABLE_COLUMN_COUNT_MISMATCH);
      }
    }
    return codes;
  }

  withVisualBorder(xCoordinates: readonly number[], yCoordinates: readonly number[]): TableNode {
    return new TableNode({
      id: this.id,
      box: this.box,
      children: this.children,
      attributes: this.attributes,
      depth: this.depth,
      visualBorderX: xCoordinates,
      visualBorderY: yCoordinates,
    });
  }
}
