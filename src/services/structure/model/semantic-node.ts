import { v4 as uuidv4 } from 'uuid';
import type { BoundingBox } from '../geometry/bounding-box';
import { AttributeKey, AttributeMap, nonEmptyStringAttribute, stringAttribute } from './attribute-value';
import { RoleFacts, SemanticType, roleFacts } from './semantic-type';
import type { ContentNode } from './content-node';
import type { FigureNode } from './figure-node';
import type { ListNode } from './list-node';
import type { TableNode } from './table-node';

export type NodeKind = 'content' | 'figure' | 'table' | 'list';

/**
 * Every node in a structure tree. Switch on `kind` to reach the
 * variant-specific accessors.
 */
export type SemanticNode = ContentNode | FigureNode | TableNode | ListNode;

export interface SemanticNodeInit {
  id?: string;
  box?: BoundingBox;
  children?: readonly SemanticNode[];
  attributes?: AttributeMap;
  depth?: number;
}

export interface RoleNodeInit extends SemanticNodeInit {
  role: SemanticType;
}

export abstract class BaseSemanticNode {
  abstract readonly kind: NodeKind;

  readonly id: string;
  readonly role: SemanticType;
  readonly box?: BoundingBox;
  readonly children: readonly SemanticNode[];
  readonly attributes: AttributeMap;
  /** Distance from the root; the root is 0. */
  readonly depth: number;

  protected constructor(init: RoleNodeInit) {
    this.id = init.id ?? uuidv4();
    this.role = init.role;
    this.box = init.box;
    this.children = init.children ?? [];
    this.attributes = init.attributes ?? {};
    this.depth = init.depth ?? 0;
  }

  get pageIndex(): number | undefined {
    return this.box?.pageIndex;
  }

  get hasChildren(): boolean {
    return this.children.length > 0;
  }

  get childCount(): number {
    return this.children.length;
  }

  get facts(): RoleFacts {
    return roleFacts(this.role);
  }

  get altText(): string | undefined {
    return stringAttribute(this.attributes, AttributeKey.ALT);
  }

  get actualText(): string | undefined {
    return stringAttribute(this.attributes, AttributeKey.ACTUAL_TEXT);
  }

  get language(): string | undefined {
    return stringAttribute(this.attributes, AttributeKey.LANG);
  }

  get title(): string | undefined {
    return stringAttribute(this.attributes, AttributeKey.TITLE);
  }

  get hasTextAlternative(): boolean {
    return (
      nonEmptyStringAttribute(this.attributes, AttributeKey.ALT) !== undefined ||
      nonEmptyStringAttribute(this.attributes, AttributeKey.ACTUAL_TEXT) !== undefined
    );
  }

  /** Alt text, then actual text, then title; empty strings are skipped. */
  get textDescription(): string | undefined {
    return (
      nonEmptyStringAttribute(this.attributes, AttributeKey.ALT) ??
      nonEmptyStringAttribute(this.attributes, AttributeKey.ACTUAL_TEXT) ??
      nonEmptyStringAttribute(this.attributes, AttributeKey.TITLE)
    );
  }

  /** Whether the node itself carries visible text. Only content nodes can. */
  get hasTextContent(): boolean {
    return false;
  }

  /**
   * A node counts as having content when it has children, a text
   * alternative, or text of its own.
   */
  get hasContent(): boolean {
    return this.hasChildren || this.hasTextAlternative || this.hasTextContent;
  }
}
