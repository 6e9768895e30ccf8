/**
 * Turns the JSON node shape accepted over HTTP into engine nodes. Depth is
 * assigned by position and missing ids are generated.
 */

import type {
  BoxInput,
  ImageChunkInput,
  LineArtChunkInput,
  TextBlockInput,
  TextChunkInput,
  TreeNodeInput,
} from '../../schemas/structure.schemas';
import { AppError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';
import { BoundingBox } from './geometry/bounding-box';
import { LineChunk } from './geometry/line-chunk';
import { ContentNode } from './model/content-node';
import { FigureNode } from './model/figure-node';
import { ListNode } from './model/list-node';
import type { NodeKind, SemanticNode, SemanticNodeInit } from './model/semantic-node';
import { SemanticType, parseSemanticType } from './model/semantic-type';
import { TableNode } from './model/table-node';
import type { TextBlock, TextChunk } from './model/text-content';
import type { ImageChunk, LineArtChunk } from './model/visual-content';

const DEFAULT_FONT_SIZE = 12;
const DEFAULT_FONT_WEIGHT = 400;

/** Variant a role maps to when the input does not name one. */
export function kindForRole(role: SemanticType): NodeKind {
  switch (role) {
    case SemanticType.TABLE:
      return 'table';
    case SemanticType.LIST:
      return 'list';
    case SemanticType.FIGURE:
      return 'figure';
    default:
      return 'content';
  }
}

const toBox = (input: BoxInput): BoundingBox =>
  new BoundingBox(input.pageIndex, input.x, input.y, input.width, input.height);

const toTextChunk = (input: TextChunkInput): TextChunk => ({
  box: toBox(input.box),
  value: input.value,
  fontName: input.fontName ?? '',
  fontSize: input.fontSize ?? DEFAULT_FONT_SIZE,
  fontWeight: input.fontWeight ?? DEFAULT_FONT_WEIGHT,
  italicAngle: input.italicAngle ?? 0,
  color: input.color
    ? { r: input.color.r, g: input.color.g, b: input.color.b, a: input.color.a ?? 1 }
    : { r: 0, g: 0, b: 0, a: 1 },
});

const toTextBlock = (input: TextBlockInput): TextBlock => ({
  box: toBox(input.box),
  lines: input.lines.map(line => ({ box: toBox(line.box), chunks: line.chunks.map(toTextChunk) })),
});

const toImageChunk = (input: ImageChunkInput): ImageChunk => ({
  box: toBox(input.box),
  pixelWidth: input.pixelWidth,
  pixelHeight: input.pixelHeight,
  bitsPerComponent: input.bitsPerComponent ?? 8,
  colorSpaceName: input.colorSpaceName ?? 'DeviceRGB',
  componentCount: input.componentCount ?? 3,
  altText: input.altText,
  actualText: input.actualText,
});

const toLineArtChunk = (input: LineArtChunkInput): LineArtChunk => ({
  box: toBox(input.box),
  lines: input.lines.map(
    line =>
      new LineChunk({ pageIndex: input.box.pageIndex, start: line.start, end: line.end, lineWidth: line.lineWidth })
  ),
  altText: input.altText,
  actualText: input.actualText,
});

function buildNode(input: TreeNodeInput, depth: number, path: string): SemanticNode {
  const role = parseSemanticType(input.role);
  if (!role) {
    throw AppError.unprocessable(`Unknown structure type '${input.role}' at ${path}`, ErrorCodes.TREE_DECODE_ERROR, {
      path,
      role: input.role,
    });
  }

  const expectedKind = kindForRole(role);
  const kind = input.kind ?? expectedKind;
  if (kind !== expectedKind) {
    throw AppError.unprocessable(
      `Node kind '${kind}' cannot carry role '${role}' at ${path}`,
      ErrorCodes.TREE_DECODE_ERROR,
      { path, role, kind }
    );
  }

  const base: SemanticNodeInit = {
    id: input.id,
    box: input.box ? toBox(input.box) : undefined,
    children: (input.children ?? []).map((child, index) => buildNode(child, depth + 1, `${path}.children[${index}]`)),
    attributes: input.attributes,
    depth,
  };

  switch (kind) {
    case 'table':
      return new TableNode({
        ...base,
        visualBorderX: input.visualBorder?.xCoordinates,
        visualBorderY: input.visualBorder?.yCoordinates,
      });
    case 'list':
      return new ListNode({
        ...base,
        listKind: input.listKind,
        startNumber: input.startNumber,
        nestingLevel: input.nestingLevel,
      });
    case 'figure':
      return new FigureNode({
        ...base,
        imageChunks: input.imageChunks?.map(toImageChunk),
        lineArtChunks: input.lineArtChunks?.map(toLineArtChunk),
      });
    case 'content':
      return new ContentNode({
        ...base,
        role,
        textBlocks: input.textBlocks?.map(toTextBlock),
        dominantFontSize: input.dominantFontSize,
        dominantFontWeight: input.dominantFontWeight,
      });
  }
}

/**
 * Build the engine tree for `input`. Unknown role names and kind/role
 * conflicts raise a 422 `TREE_DECODE_ERROR` naming the offending path.
 */
export function buildTree(input: TreeNodeInput): SemanticNode {
  return buildNode(input, 0, 'tree');
}
