export * from './findings';
export * from './geometry/bounding-box';
export { MultiBoundingBox } from './geometry/multi-bounding-box';
export { LineChunk, type LineChunkInit } from './geometry/line-chunk';
export { LinesCollection } from './geometry/lines-collection';
export * from './model/semantic-type';
export * from './model/attribute-value';
export { SemanticErrorCode } from './model/error-codes';
export { ErrorCodeLedger } from './model/error-ledger';
export type { NodeKind, SemanticNode, SemanticNodeInit } from './model/semantic-node';
export { ContentNode } from './model/content-node';
export { FigureNode } from './model/figure-node';
export { TableNode } from './model/table-node';
export { ListNode, ListKind, isOrderedListKind } from './model/list-node';
export * from './model/text-content';
export * from './model/visual-content';
export * from './model/tree-traversal';
export { structureTreeAnalyzer, StructureTreeAnalyzer, StructureAnalyzerPresets } from './structure-tree.analyzer';
export type { StructureAnalyzerOptions, StructureAnalysisResult, StructureError } from './structure-tree.analyzer';
export {
  headingHierarchyChecker,
  HeadingHierarchyChecker,
  HeadingCheckerPresets,
  HeadingIssueType,
} from './heading-hierarchy.checker';
export type { HeadingCheckerOptions, HeadingHierarchyResult, HeadingIssue } from './heading-hierarchy.checker';
export {
  readingOrderValidator,
  ReadingOrderValidator,
  ReadingOrderPresets,
  ReadingOrderIssueType,
} from './reading-order.validator';
export type { ReadingOrderOptions, ReadingOrderResult, ReadingOrderIssue } from './reading-order.validator';
export { tableStructureValidator, TableStructureValidator, TableErrorType } from './table-structure.validator';
export type { TableError, TableValidationResult } from './table-structure.validator';
export { structureValidationService, StructureValidationService } from './structure-validation.service';
export type { StructureValidationOptions, StructureValidationReport, ValidationFinding } from './structure-validation.service';
export { buildTree, kindForRole } from './tree-builder';
