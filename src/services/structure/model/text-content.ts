import type { BoundingBox } from '../geometry/bounding-box';

/** sRGB components in [0, 1]. */
export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface TextChunk {
  readonly box: BoundingBox;
  readonly value: string;
  readonly fontName: string;
  readonly fontSize: number;
  readonly fontWeight: number;
  readonly italicAngle: number;
  readonly color: RgbaColor;
}

export interface TextLine {
  readonly box: BoundingBox;
  readonly chunks: readonly TextChunk[];
}

export interface TextBlock {
  readonly box: BoundingBox;
  readonly lines: readonly TextLine[];
}

export type TextType = 'regular' | 'large';

export const BOLD_FONT_WEIGHT = 600;

export const lineText = (line: TextLine): string => line.chunks.map(chunk => chunk.value).join('');

export const blockText = (block: TextBlock): string => block.lines.map(lineText).join('\n');

export const blocksText = (blocks: readonly TextBlock[]): string => blocks.map(blockText).join('\n\n');

export const blockChunks = (block: TextBlock): TextChunk[] => block.lines.flatMap(line => line.chunks);

export const isBoldChunk = (chunk: TextChunk): boolean => chunk.fontWeight >= BOLD_FONT_WEIGHT;

/**
 * Large-scale text: at least 18pt, or at least 14pt and bold (weight 700+).
 */
export function isLargeText(fontSize: number, fontWeight = 400): boolean {
  return fontSize >= 18 || (fontSize >= 14 && fontWeight >= 700);
}

export interface DominantTextMetrics {
  fontSize?: number;
  fontWeight?: number;
  color?: RgbaColor;
}

const colorKey = (color: RgbaColor): string => `${color.r},${color.g},${color.b},${color.a}`;

/**
 * Picks the value carried by the most characters. On a tie the value seen
 * first wins.
 */
function mostCommon<T>(chunks: readonly TextChunk[], pick: (chunk: TextChunk) => T, key: (value: T) => string): T | undefined {
  const tally = new Map<string, { value: T; weight: number }>();
  let best: { value: T; weight: number } | undefined;

  for (const chunk of chunks) {
    const value = pick(chunk);
    const k = key(value);
    const entry = tally.get(k) ?? { value, weight: 0 };
    entry.weight += Math.max(chunk.value.length, 1);
    tally.set(k, entry);
    if (!best || entry.weight > best.weight) {
      best = entry;
    }
  }

  return best?.value;
}

export function dominantTextMetrics(blocks: readonly TextBlock[]): DominantTextMetrics {
  const chunks = blocks.flatMap(blockChunks);
  if (chunks.length === 0) return {};

  return {
    fontSize: mostCommon(chunks, chunk => chunk.fontSize, String),
    fontWeight: mostCommon(chunks, chunk => chunk.fontWeight, String),
    color: mostCommon(chunks, chunk => chunk.color, colorKey),
  };
}
