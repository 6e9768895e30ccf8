import type { BoundingBox } from '../geometry/bounding-box';
import { SemanticErrorCode } from './error-codes';
import { BaseSemanticNode, SemanticNode, SemanticNodeInit } from './semantic-node';
import { SemanticType } from './semantic-type';
import { ImageChunk, LineArtChunk, chunkHasTextAlternative, chunkTextDescription } from './visual-content';

export interface FigureNodeInit extends SemanticNodeInit {
  imageChunks?: readonly ImageChunk[];
  lineArtChunks?: readonly LineArtChunk[];
}

export class FigureNode extends BaseSemanticNode {
  readonly kind = 'figure' as const;
  readonly imageChunks: readonly ImageChunk[];
  readonly lineArtChunks: readonly LineArtChunk[];

  constructor(init: FigureNodeInit = {}) {
    super({ ...init, role: SemanticType.FIGURE });
    this.imageChunks = init.imageChunks ?? [];
    this.lineArtChunks = init.lineArtChunks ?? [];
  }

  get hasVisualContent(): boolean {
    return this.imageChunks.length > 0 || this.lineArtChunks.length > 0;
  }

  get imageCount(): number {
    return this.imageChunks.length;
  }

  get lineArtCount(): number {
    return this.lineArtChunks.length;
  }

  get visualElementCount(): number {
    return this.imageCount + this.lineArtCount;
  }

  /** No text alternative, no children and nothing drawn. */
  get appearsDecorative(): boolean {
    return !this.hasTextAlternative && !this.hasChildren && !this.hasVisualContent;
  }

  get caption(): SemanticNode | undefined {
    return this.children.find(child => child.role === SemanticType.CAPTION);
  }

  get captionText(): string | undefined {
    const caption = this.caption;
    if (!caption) return undefined;
    return caption.kind === 'content' ? caption.text : caption.textDescription;
  }

  /** The explicit box, else the union of the visual chunks on the first chunk's page. */
  get computedBox(): BoundingBox | undefined {
    if (this.box) return this.box;
    const [first, ...rest] = [...this.imageChunks, ...this.lineArtChunks].map(chunk => chunk.box);
    if (!first) return undefined;
    return rest.reduce<BoundingBox>((result, box) => result.union(box) ?? result, first);
  }

  get totalPixelCount(): number {
    return this.imageChunks.reduce((sum, image) => sum + image.pixelWidth * image.pixelHeight, 0);
  }

  get anyImageHasAltText(): boolean {
    return this.imageChunks.some(chunkHasTextAlternative);
  }

  get anyLineArtHasAltText(): boolean {
    return this.lineArtChunks.some(chunkHasTextAlternative);
  }

  /**
   * Own text alternative, then caption text, then the first image or line
   * art chunk that carries one.
   */
  get bestDescription(): string | undefined {
    const own = this.textDescription;
    if (own) return own;

    const captionText = this.captionText;
    if (captionText) return captionText;

    for (const chunk of [...this.imageChunks, ...this.lineArtChunks]) {
      const description = chunkTextDescription(chunk);
      if (description) return description;
    }
    return undefined;
  }

  validateAccessibility(): Set<SemanticErrorCode> {
    const codes = new Set<SemanticErrorCode>();
    if (!this.hasTextAlternative && !this.appearsDecorative) {
      codes.add(SemanticErrorCode.FIGURE_MISSING_ALT_TEXT);
    }
    return codes;
  }
}
