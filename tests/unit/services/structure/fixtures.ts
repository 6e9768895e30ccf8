import { BoundingBox } from '../../../../src/services/structure/geometry/bounding-box';
import { ContentNode } from '../../../../src/services/structure/model/content-node';
import type { SemanticNode } from '../../../../src/services/structure/model/semantic-node';
import type { SemanticType } from '../../../../src/services/structure/model/semantic-type';
import type { TextBlock, TextChunk } from '../../../../src/services/structure/model/text-content';

const BLACK = { r: 0, g: 0, b: 0, a: 1 };

export const box = (pageIndex: number, x: number, y: number, width = 100, height = 4): BoundingBox =>
  new BoundingBox(pageIndex, x, y, width, height);

export function chunk(value: string, overrides: Partial<Omit<TextChunk, 'value'>> = {}): TextChunk {
  return {
    box: new BoundingBox(0, 0, 0, 10, 10),
    value,
    fontName: 'Helvetica',
    fontSize: 12,
    fontWeight: 400,
    italicAngle: 0,
    color: BLACK,
    ...overrides,
  };
}

/** One block, one line per chunk group. */
export function textBlock(...lines: TextChunk[][]): TextBlock {
  const area = new BoundingBox(0, 0, 0, 10, 10);
  return { box: area, lines: lines.map(chunks => ({ box: area, chunks })) };
}

export const text = (value: string): TextBlock[] => [textBlock([chunk(value)])];

export function node(
  id: string,
  role: SemanticType,
  options: { children?: SemanticNode[]; depth?: number; text?: string; box?: BoundingBox; alt?: string } = {}
): ContentNode {
  return new ContentNode({
    id,
    role,
    children: options.children,
    depth: options.depth,
    box: options.box,
    textBlocks: options.text !== undefined ? text(options.text) : undefined,
    attributes: options.alt !== undefined ? { Alt: options.alt } : undefined,
  });
}
