/**
 * Structure roles of a tagged PDF document. Values are the standard
 * structure type names as they appear in the tag tree.
 */
export const SemanticType = {
  DOCUMENT: 'Document',
  PART: 'Part',
  ARTICLE: 'Art',
  SECTION: 'Sect',
  DIV: 'Div',
  PARAGRAPH: 'P',
  SPAN: 'Span',
  BLOCK_QUOTE: 'BlockQuote',
  INDEX: 'Index',

  HEADING: 'H',
  H1: 'H1',
  H2: 'H2',
  H3: 'H3',
  H4: 'H4',
  H5: 'H5',
  H6: 'H6',

  LIST: 'L',
  LIST_ITEM: 'LI',
  LIST_LABEL: 'Lbl',
  LIST_BODY: 'LBody',

  TABLE: 'Table',
  TABLE_ROW: 'TR',
  TABLE_HEADER: 'TH',
  TABLE_CELL: 'TD',
  TABLE_HEAD: 'THead',
  TABLE_BODY: 'TBody',
  TABLE_FOOT: 'TFoot',

  FIGURE: 'Figure',
  CAPTION: 'Caption',
  FORMULA: 'Formula',
  FORM: 'Form',
  CODE: 'Code',
  TITLE: 'Title',

  LINK: 'Link',
  ANNOTATION: 'Annot',
  REFERENCE: 'Reference',
  NOTE: 'Note',

  TOC: 'TOC',
  TOC_ITEM: 'TOCI',
  BIB_ENTRY: 'BibEntry',
  QUOTE: 'Quote',

  RUBY: 'Ruby',
  RUBY_BASE: 'RB',
  RUBY_TEXT: 'RT',
  RUBY_PUNCTUATION: 'RP',
  WARICHU: 'Warichu',
  WARICHU_TEXT: 'WT',
  WARICHU_PUNCTUATION: 'WP',

  ARTIFACT: 'Artifact',
  NON_STRUCT: 'NonStruct',
  PRIVATE: 'Private',
  HEADER: 'Header',
  FOOTER: 'Footer',
} as const;

export type SemanticType = (typeof SemanticType)[keyof typeof SemanticType];

export const ALL_SEMANTIC_TYPES: readonly SemanticType[] = Object.values(SemanticType);

const HEADING_LEVELS: ReadonlyMap<SemanticType, number> = new Map<SemanticType, number>([
  [SemanticType.H1, 1],
  [SemanticType.H2, 2],
  [SemanticType.H3, 3],
  [SemanticType.H4, 4],
  [SemanticType.H5, 5],
  [SemanticType.H6, 6],
]);

const HEADING_BY_LEVEL: readonly SemanticType[] = [
  SemanticType.H1,
  SemanticType.H2,
  SemanticType.H3,
  SemanticType.H4,
  SemanticType.H5,
  SemanticType.H6,
];

const roleSet = (...roles: SemanticType[]): ReadonlySet<SemanticType> => new Set(roles);

const LIST_ROLES = roleSet(
  SemanticType.LIST,
  SemanticType.LIST_ITEM,
  SemanticType.LIST_LABEL,
  SemanticType.LIST_BODY
);

const TABLE_ROLES = roleSet(
  SemanticType.TABLE,
  SemanticType.TABLE_ROW,
  SemanticType.TABLE_HEADER,
  SemanticType.TABLE_CELL,
  SemanticType.TABLE_HEAD,
  SemanticType.TABLE_BODY,
  SemanticType.TABLE_FOOT
);

const BLOCK_LEVEL_ROLES = roleSet(
  SemanticType.DOCUMENT,
  SemanticType.PART,
  SemanticType.ARTICLE,
  SemanticType.SECTION,
  SemanticType.DIV,
  SemanticType.PARAGRAPH,
  SemanticType.BLOCK_QUOTE,
  SemanticType.INDEX,
  SemanticType.HEADING,
  ...HEADING_BY_LEVEL,
  SemanticType.LIST,
  SemanticType.LIST_ITEM,
  SemanticType.LIST_BODY,
  SemanticType.TABLE,
  SemanticType.TABLE_ROW,
  SemanticType.TABLE_HEAD,
  SemanticType.TABLE_BODY,
  SemanticType.TABLE_FOOT,
  SemanticType.FIGURE,
  SemanticType.FORMULA,
  SemanticType.FORM,
  SemanticType.CODE,
  SemanticType.TOC,
  SemanticType.TOC_ITEM,
  SemanticType.BIB_ENTRY
);

const INLINE_ROLES = roleSet(
  SemanticType.SPAN,
  SemanticType.LINK,
  SemanticType.ANNOTATION,
  SemanticType.REFERENCE,
  SemanticType.NOTE,
  SemanticType.QUOTE,
  SemanticType.LIST_LABEL,
  SemanticType.TABLE_HEADER,
  SemanticType.TABLE_CELL,
  SemanticType.RUBY,
  SemanticType.RUBY_BASE,
  SemanticType.RUBY_TEXT,
  SemanticType.RUBY_PUNCTUATION,
  SemanticType.WARICHU,
  SemanticType.WARICHU_TEXT,
  SemanticType.WARICHU_PUNCTUATION
);

const PRESENTATIONAL_ROLES = roleSet(
  SemanticType.ARTIFACT,
  SemanticType.NON_STRUCT,
  SemanticType.PRIVATE,
  SemanticType.HEADER,
  SemanticType.FOOTER
);

const ALT_TEXT_ROLES = roleSet(SemanticType.FIGURE, SemanticType.FORMULA);

const GROUPING_ROLES = roleSet(
  SemanticType.DOCUMENT,
  SemanticType.PART,
  SemanticType.ARTICLE,
  SemanticType.SECTION,
  SemanticType.DIV,
  SemanticType.LIST,
  SemanticType.LIST_ITEM,
  SemanticType.TABLE,
  SemanticType.TABLE_ROW,
  SemanticType.TABLE_HEAD,
  SemanticType.TABLE_BODY,
  SemanticType.TABLE_FOOT,
  SemanticType.TOC,
  SemanticType.RUBY,
  SemanticType.WARICHU,
  SemanticType.FORM
);

export const isHeadingRole = (role: SemanticType): boolean =>
  role === SemanticType.HEADING || HEADING_LEVELS.has(role);

/** 1-6 for the numbered headings, undefined for every other role (including `H`). */
export const headingLevelOf = (role: SemanticType): number | undefined => HEADING_LEVELS.get(role);

export const headingRoleForLevel = (level: number): SemanticType =>
  HEADING_BY_LEVEL[level - 1] ?? SemanticType.HEADING;

export const isListRole = (role: SemanticType): boolean => LIST_ROLES.has(role);
export const isTableRole = (role: SemanticType): boolean => TABLE_ROLES.has(role);
export const isBlockLevelRole = (role: SemanticType): boolean => BLOCK_LEVEL_ROLES.has(role);
export const isInlineRole = (role: SemanticType): boolean => INLINE_ROLES.has(role);
export const isPresentationalRole = (role: SemanticType): boolean => PRESENTATIONAL_ROLES.has(role);
export const requiresAlternativeText = (role: SemanticType): boolean => ALT_TEXT_ROLES.has(role);
export const isGroupingRole = (role: SemanticType): boolean => GROUPING_ROLES.has(role);

export interface RoleFacts {
  isHeading: boolean;
  headingLevel?: number;
  isList: boolean;
  isTable: boolean;
  isBlockLevel: boolean;
  isInline: boolean;
  isPresentational: boolean;
  requiresAlternativeText: boolean;
  isGrouping: boolean;
}

export function roleFacts(role: SemanticType): RoleFacts {
  return {
    isHeading: isHeadingRole(role),
    headingLevel: headingLevelOf(role),
    isList: isListRole(role),
    isTable: isTableRole(role),
    isBlockLevel: isBlockLevelRole(role),
    isInline: isInlineRole(role),
    isPresentational: isPresentationalRole(role),
    requiresAlternativeText: requiresAlternativeText(role),
    isGrouping: isGroupingRole(role),
  };
}

const BY_LOWERCASE_NAME: ReadonlyMap<string, SemanticType> = new Map(
  ALL_SEMANTIC_TYPES.map((role): [string, SemanticType] => [role.toLowerCase(), role])
);

const isSemanticType = (value: string): value is SemanticType =>
  ALL_SEMANTIC_TYPES.some(role => role === value);

/**
 * Resolves a structure type name. Exact names win, then a case-insensitive
 * match. The lower-case aliases `header`, `footer` and `nonstruct` are
 * covered by the case-insensitive lookup.
 */
export function parseSemanticType(name: string): SemanticType | undefined {
  if (isSemanticType(name)) return name;
  return BY_LOWERCASE_NAME.get(name.toLowerCase());
}
