import { z } from 'zod';
import type { AttributeValue } from '../services/structure/model/attribute-value';

export interface BoxInput {
  pageIndex: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ColorInput {
  r: number;
  g: number;
  b: number;
  a?: number;
}

export interface TextChunkInput {
  box: BoxInput;
  value: string;
  fontName?: string;
  fontSize?: number;
  fontWeight?: number;
  italicAngle?: number;
  color?: ColorInput;
}

export interface TextLineInput {
  box: BoxInput;
  chunks: TextChunkInput[];
}

export interface TextBlockInput {
  box: BoxInput;
  lines: TextLineInput[];
}

export interface PointInput {
  x: number;
  y: number;
}

export interface LineInput {
  start: PointInput;
  end: PointInput;
  lineWidth?: number;
}

export interface ImageChunkInput {
  box: BoxInput;
  pixelWidth: number;
  pixelHeight: number;
  bitsPerComponent?: number;
  colorSpaceName?: string;
  componentCount?: number;
  altText?: string;
  actualText?: string;
}

export interface LineArtChunkInput {
  box: BoxInput;
  lines: LineInput[];
  altText?: string;
  actualText?: string;
}

export interface TreeNodeInput {
  id?: string;
  kind?: 'content' | 'figure' | 'table' | 'list';
  role: string;
  box?: BoxInput;
  attributes?: Record<string, AttributeValue>;
  children?: TreeNodeInput[];
  textBlocks?: TextBlockInput[];
  dominantFontSize?: number;
  dominantFontWeight?: number;
  imageChunks?: ImageChunkInput[];
  lineArtChunks?: LineArtChunkInput[];
  visualBorder?: { xCoordinates: number[]; yCoordinates: number[] };
  listKind?:
    | 'unordered'
    | 'ordered-arabic'
    | 'ordered-roman-upper'
    | 'ordered-roman-lower'
    | 'ordered-alpha-upper'
    | 'ordered-alpha-lower'
    | 'ordered-circled'
    | 'unknown';
  startNumber?: number;
  nestingLevel?: number;
}

const finite = z.number().finite();

export const boxSchema = z.object({
  pageIndex: z.number().int().min(0, 'Page index must be non-negative'),
  x: finite,
  y: finite,
  width: finite,
  height: finite,
});

const colorSchema = z.object({
  r: z.number().min(0).max(1),
  g: z.number().min(0).max(1),
  b: z.number().min(0).max(1),
  a: z.number().min(0).max(1).optional(),
});

const textChunkSchema = z.object({
  box: boxSchema,
  value: z.string(),
  fontName: z.string().optional(),
  fontSize: z.number().positive().optional(),
  fontWeight: z.number().min(0).optional(),
  italicAngle: finite.optional(),
  color: colorSchema.optional(),
});

const textBlockSchema = z.object({
  box: boxSchema,
  lines: z.array(z.object({ box: boxSchema, chunks: z.array(textChunkSchema) })),
});

const pointSchema = z.object({ x: finite, y: finite });

const lineSchema = z.object({
  start: pointSchema,
  end: pointSchema,
  lineWidth: z.number().min(0).optional(),
});

const imageChunkSchema = z.object({
  box: boxSchema,
  pixelWidth: z.number().int().min(0),
  pixelHeight: z.number().int().min(0),
  bitsPerComponent: z.number().int().positive().optional(),
  colorSpaceName: z.string().optional(),
  componentCount: z.number().int().positive().optional(),
  altText: z.string().optional(),
  actualText: z.string().optional(),
});

const lineArtChunkSchema = z.object({
  box: boxSchema,
  lines: z.array(lineSchema),
  altText: z.string().optional(),
  actualText: z.string().optional(),
});

export const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(attributeValueSchema)])
);

export const treeNodeSchema: z.ZodType<TreeNodeInput> = z.lazy(() =>
  z.object({
    id: z.string().min(1).optional(),
    kind: z.enum(['content', 'figure', 'table', 'list']).optional(),
    role: z.string().min(1, 'Role is required'),
    box: boxSchema.optional(),
    attributes: z.record(attributeValueSchema).optional(),
    children: z.array(treeNodeSchema).optional(),
    textBlocks: z.array(textBlockSchema).optional(),
    dominantFontSize: z.number().positive().optional(),
    dominantFontWeight: z.number().min(0).optional(),
    imageChunks: z.array(imageChunkSchema).optional(),
    lineArtChunks: z.array(lineArtChunkSchema).optional(),
    visualBorder: z
      .object({
        xCoordinates: z.array(finite),
        yCoordinates: z.array(finite),
      })
      .optional(),
    listKind: z
      .enum([
        'unordered',
        'ordered-arabic',
        'ordered-roman-upper',
        'ordered-roman-lower',
        'ordered-alpha-upper',
        'ordered-alpha-lower',
        'ordered-circled',
        'unknown',
      ])
      .optional(),
    startNumber: z.number().int().optional(),
    nestingLevel: z.number().int().min(0).optional(),
  })
);

export const structureOptionsSchema = z
  .object({
    validateNesting: z.boolean().optional(),
    validateRequiredChildren: z.boolean().optional(),
    validateAttributes: z.boolean().optional(),
    checkEmptyElements: z.boolean().optional(),
    checkDuplicateIds: z.boolean().optional(),
    maxDepth: z.number().int().min(0).optional(),
  })
  .strict();

export const headingOptionsSchema = z
  .object({
    requireSingleH1: z.boolean().optional(),
    checkSkippedLevels: z.boolean().optional(),
    checkEmptyHeadings: z.boolean().optional(),
    validateHeadingText: z.boolean().optional(),
    requireFirstH1: z.boolean().optional(),
    maxHeadingLevel: z.number().int().min(1).optional(),
    minHeadingTextLength: z.number().int().min(0).optional(),
  })
  .strict();

export const readingOrderOptionsSchema = z
  .object({
    readingDirection: z.enum(['left-to-right', 'right-to-left']).optional(),
    validateColumns: z.boolean().optional(),
    checkOverlaps: z.boolean().optional(),
    verticalTolerance: z.number().min(0).optional(),
    horizontalTolerance: z.number().min(0).optional(),
    overlapThreshold: z.number().min(0).max(1).optional(),
    columnGapThreshold: z.number().positive().optional(),
    ignoreGroupingNodes: z.boolean().optional(),
  })
  .strict();

export const validateStructureSchema = z.object({
  tree: treeNodeSchema,
  options: z
    .object({
      structure: structureOptionsSchema.optional(),
      headings: headingOptionsSchema.optional(),
      readingOrder: readingOrderOptionsSchema.optional(),
    })
    .strict()
    .optional(),
});

export const analyzeStructureSchema = z.object({
  tree: treeNodeSchema,
  preset: z.enum(['all', 'nestingOnly', 'attributesOnly']).optional(),
  options: structureOptionsSchema.optional(),
});

export const headingsSchema = z.object({
  tree: treeNodeSchema,
  preset: z.enum(['all', 'basic', 'strict']).optional(),
  options: headingOptionsSchema.optional(),
});

export const readingOrderSchema = z.object({
  tree: treeNodeSchema,
  preset: z.enum(['standard', 'rightToLeft', 'strict']).optional(),
  options: readingOrderOptionsSchema.optional(),
});

export const tablesSchema = z.object({
  tree: treeNodeSchema,
});

export type ValidateStructureInput = z.infer<typeof validateStructureSchema>;
export type AnalyzeStructureInput = z.infer<typeof analyzeStructureSchema>;
export type HeadingsInput = z.infer<typeof headingsSchema>;
export type ReadingOrderInput = z.infer<typeof readingOrderSchema>;
export type TablesInput = z.infer<typeof tablesSchema>;
