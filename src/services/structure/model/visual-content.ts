import type { BoundingBox, ContentChunk } from '../geometry/bounding-box';
import type { LineChunk } from '../geometry/line-chunk';

export interface TextAlternatives {
  readonly altText?: string;
  readonly actualText?: string;
}

export interface ImageChunk extends ContentChunk, TextAlternatives {
  readonly box: BoundingBox;
  readonly pixelWidth: number;
  readonly pixelHeight: number;
  readonly bitsPerComponent: number;
  readonly colorSpaceName: string;
  readonly componentCount: number;
}

export interface LineArtChunk extends ContentChunk, TextAlternatives {
  readonly box: BoundingBox;
  readonly lines: readonly LineChunk[];
}

export const chunkTextDescription = (chunk: TextAlternatives): string | undefined =>
  chunk.altText || chunk.actualText || undefined;

export const chunkHasTextAlternative = (chunk: TextAlternatives): boolean =>
  chunkTextDescription(chunk) !== undefined;

export const imageAspectRatio = (image: ImageChunk): number | undefined =>
  image.pixelHeight > 0 ? image.pixelWidth / image.pixelHeight : undefined;

export const isGrayscaleImage = (image: ImageChunk): boolean => image.componentCount === 1;

/** Two or more ruling lines in each direction. */
export const appearsGridLike = (art: LineArtChunk): boolean =>
  art.lines.filter(line => line.isHorizontal).length >= 2 &&
  art.lines.filter(line => line.isVertical).length >= 2;
