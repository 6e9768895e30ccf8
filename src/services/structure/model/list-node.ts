import { SemanticErrorCode } from './error-codes';
import { BaseSemanticNode, SemanticNode, SemanticNodeInit } from './semantic-node';
import { SemanticType } from './semantic-type';

export const ListKind = {
  UNORDERED: 'unordered',
  ORDERED_ARABIC: 'ordered-arabic',
  ORDERED_ROMAN_UPPER: 'ordered-roman-upper',
  ORDERED_ROMAN_LOWER: 'ordered-roman-lower',
  ORDERED_ALPHA_UPPER: 'ordered-alpha-upper',
  ORDERED_ALPHA_LOWER: 'ordered-alpha-lower',
  ORDERED_CIRCLED: 'ordered-circled',
  UNKNOWN: 'unknown',
} as const;

export type ListKind = (typeof ListKind)[keyof typeof ListKind];

export const isOrderedListKind = (kind: ListKind): boolean =>
  kind !== ListKind.UNORDERED && kind !== ListKind.UNKNOWN;

export const MAX_LIST_NESTING_LEVEL = 5;

export interface ListNodeInit extends SemanticNodeInit {
  listKind?: ListKind;
  startNumber?: number;
  nestingLevel?: number;
}

const firstChildWithRole = (node: SemanticNode, role: SemanticType): SemanticNode | undefined =>
  node.children.find(child => child.role === role);

const nodeText = (node: SemanticNode): string =>
  node.kind === 'content' ? node.text : (node.textDescription ?? '');

export class ListNode extends BaseSemanticNode {
  readonly kind = 'list' as const;
  readonly listKind: ListKind;
  readonly startNumber?: number;
  /** 0 for a top-level list. */
  readonly nestingLevel: number;

  constructor(init: ListNodeInit = {}) {
    super({ ...init, role: SemanticType.LIST });
    this.listKind = init.listKind ?? ListKind.UNKNOWN;
    this.startNumber = init.startNumber;
    this.nestingLevel = init.nestingLevel ?? 0;
  }

  get items(): SemanticNode[] {
    return this.children.filter(child => child.role === SemanticType.LIST_ITEM);
  }

  get itemCount(): number {
    return this.items.length;
  }

  get hasItems(): boolean {
    return this.items.length > 0;
  }

  labelFor(item: SemanticNode): SemanticNode | undefined {
    if (item.role !== SemanticType.LIST_ITEM) return undefined;
    return firstChildWithRole(item, SemanticType.LIST_LABEL);
  }

  bodyFor(item: SemanticNode): SemanticNode | undefined {
    if (item.role !== SemanticType.LIST_ITEM) return undefined;
    return firstChildWithRole(item, SemanticType.LIST_BODY);
  }

  get labels(): SemanticNode[] {
    return this.items.flatMap(item => this.labelFor(item) ?? []);
  }

  get bodies(): SemanticNode[] {
    return this.items.flatMap(item => this.bodyFor(item) ?? []);
  }

  get labelTexts(): string[] {
    return this.labels.map(nodeText);
  }

  get itemsMissingLabels(): SemanticNode[] {
    return this.items.filter(item => !this.labelFor(item));
  }

  get itemsMissingBodies(): SemanticNode[] {
    return this.items.filter(item => !this.bodyFor(item));
  }

  get allItemsHaveLabels(): boolean {
    return this.itemsMissingLabels.length === 0;
  }

  get allItemsHaveBodies(): boolean {
    return this.itemsMissingBodies.length === 0;
  }

  get hasProperStructure(): boolean {
    return this.allItemsHaveLabels && this.allItemsHaveBodies;
  }

  get isOrdered(): boolean {
    return isOrderedListKind(this.listKind);
  }

  get isUnordered(): boolean {
    return this.listKind === ListKind.UNORDERED;
  }

  /** Lists found directly inside item bodies. */
  get nestedLists(): ListNode[] {
    return this.bodies.flatMap(body => body.children.filter((child): child is ListNode => child.kind === 'list'));
  }

  get maxNestedDepth(): number {
    return this.nestedLists.reduce((deepest, nested) => Math.max(deepest, nested.maxNestedDepth), this.nestingLevel);
  }

  validateStructure(): Set<SemanticErrorCode> {
    const codes = new Set<SemanticErrorCode>();
    if (!this.allItemsHaveLabels) codes.add(SemanticErrorCode.LIST_ITEM_MISSING_LABEL);
    if (!this.allItemsHaveBodies) codes.add(SemanticErrorCode.LIST_ITEM_MISSING_BODY);
    if (this.nestingLevel > MAX_LIST_NESTING_LEVEL) codes.add(SemanticErrorCode.LIST_NESTING_TOO_DEEP);
    return codes;
  }

  withDetectedKind(listKind: ListKind, startNumber?: number): ListNode {
    return this.copy({ listKind, startNumber });
  }

  withNestingLevel(nestingLevel: number): ListNode {
    return this.copy({ nestingLevel });
  }

  private copy(changes: Pick<ListNodeInit, 'listKind' | 'startNumber' | 'nestingLevel'>): ListNode {
    return new ListNode({
      id: this.id,
      box: this.box,
      children: this.children,
      attributes: this.attributes,
      depth: this.depth,
      listKind: this.listKind,
      startNumber: this.startNumber,
      nestingLevel: this.nestingLevel,
      ...changes,
    });
  }
}
