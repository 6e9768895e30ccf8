import { BaseSemanticNode, RoleNodeInit, SemanticNode } from './semantic-node';
import { SemanticType, headingLevelOf, headingRoleForLevel, isHeadingRole } from './semantic-type';
import {
  DominantTextMetrics,
  RgbaColor,
  TextBlock,
  TextType,
  blockChunks,
  blocksText,
  dominantTextMetrics,
  isLargeText,
} from './text-content';

export interface ContentNodeInit extends RoleNodeInit {
  textBlocks?: readonly TextBlock[];
  dominantFontSize?: number;
  dominantFontWeight?: number;
  dominantColor?: RgbaColor;
}

type FactoryInit = Omit<ContentNodeInit, 'role' | 'children'>;

/**
 * General-purpose node for every role that has no dedicated variant:
 * grouping elements, paragraphs, headings, spans, table rows and cells,
 * list items and so on.
 */
export class ContentNode extends BaseSemanticNode {
  readonly kind = 'content' as const;
  readonly textBlocks: readonly TextBlock[];

  private readonly explicitMetrics: DominantTextMetrics;
  private derivedMetrics?: DominantTextMetrics;

  constructor(init: ContentNodeInit) {
    super(init);
    this.textBlocks = init.textBlocks ?? [];
    this.explicitMetrics = {
      fontSize: init.dominantFontSize,
      fontWeight: init.dominantFontWeight,
      color: init.dominantColor,
    };
  }

  static document(children: readonly SemanticNode[], init: FactoryInit = {}): ContentNode {
    return new ContentNode({ ...init, role: SemanticType.DOCUMENT, children });
  }

  static paragraph(textBlocks: readonly TextBlock[] = [], init: FactoryInit = {}): ContentNode {
    return new ContentNode({ ...init, role: SemanticType.PARAGRAPH, textBlocks });
  }

  /** Levels outside 1-6 produce a generic `H`. */
  static heading(level: number, textBlocks: readonly TextBlock[] = [], init: FactoryInit = {}): ContentNode {
    return new ContentNode({ ...init, role: headingRoleForLevel(level), textBlocks });
  }

  static span(textBlocks: readonly TextBlock[] = [], init: FactoryInit = {}): ContentNode {
    return new ContentNode({ ...init, role: SemanticType.SPAN, textBlocks });
  }

  static caption(textBlocks: readonly TextBlock[] = [], init: FactoryInit = {}): ContentNode {
    return new ContentNode({ ...init, role: SemanticType.CAPTION, textBlocks });
  }

  get text(): string {
    return blocksText(this.textBlocks);
  }

  override get hasTextContent(): boolean {
    return this.text.trim().length > 0;
  }

  get textBlockCount(): number {
    return this.textBlocks.length;
  }

  get totalLineCount(): number {
    return this.textBlocks.reduce((sum, block) => sum + block.lines.length, 0);
  }

  get totalChunkCount(): number {
    return this.textBlocks.reduce((sum, block) => sum + blockChunks(block).length, 0);
  }

  private get metrics(): DominantTextMetrics {
    this.derivedMetrics ??= dominantTextMetrics(this.textBlocks);
    return this.derivedMetrics;
  }

  get dominantFontSize(): number | undefined {
    return this.explicitMetrics.fontSize ?? this.metrics.fontSize;
  }

  get dominantFontWeight(): number | undefined {
    return this.explicitMetrics.fontWeight ?? this.metrics.fontWeight;
  }

  get dominantColor(): RgbaColor | undefined {
    return this.explicitMetrics.color ?? this.metrics.color;
  }

  get isLargeText(): boolean {
    const fontSize = this.dominantFontSize;
    if (fontSize === undefined) return false;
    return isLargeText(fontSize, this.dominantFontWeight);
  }

  get textType(): TextType {
    return this.isLargeText ? 'large' : 'regular';
  }

  get isHeading(): boolean {
    return isHeadingRole(this.role);
  }

  get headingLevel(): number | undefined {
    return headingLevelOf(this.role);
  }
}
