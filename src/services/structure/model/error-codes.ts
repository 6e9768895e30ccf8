/**
 * Error annotations recorded against nodes while the analyzers run.
 * Grouped by area; the groups mirror the finding categories.
 */
export const SemanticErrorCode = {
  // General structure
  MISSING_ALT_TEXT: 'MISSING_ALT_TEXT',
  EMPTY_ELEMENT: 'EMPTY_ELEMENT',
  INVALID_NESTING: 'INVALID_NESTING',
  MISSING_REQUIRED_CHILD: 'MISSING_REQUIRED_CHILD',
  UNEXPECTED_CHILD: 'UNEXPECTED_CHILD',
  INVALID_ATTRIBUTE: 'INVALID_ATTRIBUTE',
  MISSING_ATTRIBUTE: 'MISSING_ATTRIBUTE',
  DUPLICATE_ID: 'DUPLICATE_ID',

  // Tables
  TABLE_CELL_BELOW_NEXT_ROW: 'TABLE_CELL_BELOW_NEXT_ROW',
  TABLE_CELL_ABOVE_PREVIOUS_ROW: 'TABLE_CELL_ABOVE_PREVIOUS_ROW',
  TABLE_CELL_RIGHT_OF_NEXT_COLUMN: 'TABLE_CELL_RIGHT_OF_NEXT_COLUMN',
  TABLE_CELL_LEFT_OF_PREVIOUS_COLUMN: 'TABLE_CELL_LEFT_OF_PREVIOUS_COLUMN',
  TABLE_ROW_COUNT_MISMATCH: 'TABLE_ROW_COUNT_MISMATCH',
  TABLE_COLUMN_COUNT_MISMATCH: 'TABLE_COLUMN_COUNT_MISMATCH',
  TABLE_ROW_SPAN_MISMATCH: 'TABLE_ROW_SPAN_MISMATCH',
  TABLE_COL_SPAN_MISMATCH: 'TABLE_COL_SPAN_MISMATCH',
  TABLE_MISSING_HEADERS: 'TABLE_MISSING_HEADERS',
  TABLE_IRREGULAR_STRUCTURE: 'TABLE_IRREGULAR_STRUCTURE',

  // Lists
  LIST_ITEM_MISSING_LABEL: 'LIST_ITEM_MISSING_LABEL',
  LIST_ITEM_MISSING_BODY: 'LIST_ITEM_MISSING_BODY',
  LIST_INCONSISTENT_LABELS: 'LIST_INCONSISTENT_LABELS',
  LIST_LABELS_OUT_OF_SEQUENCE: 'LIST_LABELS_OUT_OF_SEQUENCE',
  LIST_NESTING_TOO_DEEP: 'LIST_NESTING_TOO_DEEP',

  // Headings
  HEADING_LEVEL_SKIPPED: 'HEADING_LEVEL_SKIPPED',
  MULTIPLE_H1_HEADINGS: 'MULTIPLE_H1_HEADINGS',
  EMPTY_HEADING: 'EMPTY_HEADING',
  HEADING_HIERARCHY_INVALID: 'HEADING_HIERARCHY_INVALID',
  HEADING_TEXT_NOT_MEANINGFUL: 'HEADING_TEXT_NOT_MEANINGFUL',

  // Figures
  FIGURE_MISSING_ALT_TEXT: 'FIGURE_MISSING_ALT_TEXT',
  FIGURE_CAPTION_NOT_ASSOCIATED: 'FIGURE_CAPTION_NOT_ASSOCIATED',
  DECORATIVE_FIGURE_NOT_ARTIFACT: 'DECORATIVE_FIGURE_NOT_ARTIFACT',
  FIGURE_INSUFFICIENT_CONTRAST: 'FIGURE_INSUFFICIENT_CONTRAST',

  // Reading order
  READING_ORDER_OUT_OF_SEQUENCE: 'READING_ORDER_OUT_OF_SEQUENCE',
  READING_ORDER_REVERSED: 'READING_ORDER_REVERSED',
  CONTENT_OVERLAPPING: 'CONTENT_OVERLAPPING',
  COLUMN_ORDER_JUMP: 'COLUMN_ORDER_JUMP',
} as const;

export type SemanticErrorCode = (typeof SemanticErrorCode)[keyof typeof SemanticErrorCode];
