/**
 * Page-scoped rectangles.
 *
 * Coordinates follow PDF user space: the origin is the bottom-left corner of
 * the page and y grows upward, so `topY` is always the larger y value.
 * Operations between boxes on different pages have no result: `union` and
 * `intersection` return `undefined`, predicates return `false`, and
 * `overlapPercentage` returns 0.
 */

export interface Point {
  x: number;
  y: number;
}

export interface BoundingBoxJSON {
  pageIndex: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export class BoundingBox {
  readonly pageIndex: number;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;

  constructor(pageIndex: number, x: number, y: number, width: number, height: number) {
    this.pageIndex = pageIndex;
    // Negative extents are folded so that (x, y) is always the bottom-left corner
    this.x = width < 0 ? x + width : x;
    this.y = height < 0 ? y + height : y;
    this.width = Math.abs(width);
    this.height = Math.abs(height);
  }

  static fromEdges(pageIndex: number, leftX: number, bottomY: number, rightX: number, topY: number): BoundingBox {
    return new BoundingBox(pageIndex, leftX, bottomY, rightX - leftX, topY - bottomY);
  }

  static fromJSON(json: BoundingBoxJSON): BoundingBox {
    return new BoundingBox(json.pageIndex, json.x, json.y, json.width, json.height);
  }

  get leftX(): number {
    return this.x;
  }

  get bottomY(): number {
    return this.y;
  }

  get rightX(): number {
    return this.x + this.width;
  }

  get topY(): number {
    return this.y + this.height;
  }

  get area(): number {
    return this.width * this.height;
  }

  get center(): Point {
    return { x: this.x + this.width / 2, y: this.y + this.height / 2 };
  }

  get isEmpty(): boolean {
    return this.width === 0 || this.height === 0;
  }

  union(other: BoundingBox): BoundingBox | undefined {
    if (other.pageIndex !== this.pageIndex) return undefined;
    return BoundingBox.fromEdges(
      this.pageIndex,
      Math.min(this.leftX, other.leftX),
      Math.min(this.bottomY, other.bottomY),
      Math.max(this.rightX, other.rightX),
      Math.max(this.topY, other.topY)
    );
  }

  intersection(other: BoundingBox): BoundingBox | undefined {
    if (!this.intersects(other)) return undefined;
    return BoundingBox.fromEdges(
      this.pageIndex,
      Math.max(this.leftX, other.leftX),
      Math.max(this.bottomY, other.bottomY),
      Math.min(this.rightX, other.rightX),
      Math.min(this.topY, other.topY)
    );
  }

  /**
   * True when the two boxes share interior area. Boxes that only touch along
   * an edge, and zero-area boxes, do not intersect anything.
   */
  intersects(other: BoundingBox): boolean {
    return (
      other.pageIndex === this.pageIndex &&
      this.leftX < other.rightX &&
      other.leftX < this.rightX &&
      this.bottomY < other.topY &&
      other.bottomY < this.topY
    );
  }

  contains(other: BoundingBox): boolean {
    return (
      other.pageIndex === this.pageIndex &&
      other.leftX >= this.leftX &&
      other.rightX <= this.rightX &&
      other.bottomY >= this.bottomY &&
      other.topY <= this.topY
    );
  }

  containsPoint(point: Point): boolean {
    return (
      point.x >= this.leftX &&
      point.x <= this.rightX &&
      point.y >= this.bottomY &&
      point.y <= this.topY
    );
  }

  /**
   * Intersection area divided by the smaller of the two areas, in [0, 1].
   */
  overlapPercentage(other: BoundingBox): number {
    const overlap = this.intersection(other);
    if (!overlap) return 0;
    const minArea = Math.min(this.area, other.area);
    if (minArea <= 0) return 0;
    return overlap.area / minArea;
  }

  /**
   * Shrinks the box by `dx`/`dy` on each side; negative values grow it.
   */
  insetBy(dx: number, dy: number): BoundingBox {
    return new BoundingBox(
      this.pageIndex,
      this.x + dx,
      this.y + dy,
      Math.max(0, this.width - 2 * dx),
      Math.max(0, this.height - 2 * dy)
    );
  }

  equals(other: BoundingBox): boolean {
    return (
      other.pageIndex === this.pageIndex &&
      other.x === this.x &&
      other.y === this.y &&
      other.width === this.width &&
      other.height === this.height
    );
  }

  toJSON(): BoundingBoxJSON {
    return {
      pageIndex: this.pageIndex,
      x: this.x,
      y: this.y,
      width: this.width,
      height: this.height,
    };
  }
}

/**
 * Anything extracted from a page that occupies a rectangle on it.
 */
export interface ContentChunk {
  readonly box: BoundingBox;
}
