import { BoundingBox, Point } from './bounding-box';

/**
 * A region that may span several pages, kept as one box per fragment and
 * ordered by page index.
 */
export class MultiBoundingBox {
  readonly boxes: readonly BoundingBox[];

  constructor(boxes: readonly BoundingBox[] = []) {
    // Array.prototype.sort is stable, so fragments on one page keep their order
    this.boxes = [...boxes].sort((a, b) => a.pageIndex - b.pageIndex);
  }

  get isEmpty(): boolean {
    return this.boxes.length === 0;
  }

  get count(): number {
    return this.boxes.length;
  }

  get pageIndices(): Set<number> {
    return new Set(this.boxes.map(box => box.pageIndex));
  }

  get pageCount(): number {
    return this.pageIndices.size;
  }

  get isMultiPage(): boolean {
    return this.pageCount > 1;
  }

  get first(): BoundingBox | undefined {
    return this.boxes[0];
  }

  get last(): BoundingBox | undefined {
    return this.boxes[this.boxes.length - 1];
  }

  get totalArea(): number {
    return this.boxes.reduce((sum, box) => sum + box.area, 0);
  }

  boxesOnPage(pageIndex: number): BoundingBox[] {
    return this.boxes.filter(box => box.pageIndex === pageIndex);
  }

  unionBoxForPage(pageIndex: number): BoundingBox | undefined {
    const [first, ...rest] = this.boxesOnPage(pageIndex);
    if (!first) return undefined;
    return rest.reduce<BoundingBox>((result, box) => result.union(box) ?? result, first);
  }

  adding(box: BoundingBox | readonly BoundingBox[]): MultiBoundingBox {
    const added = box instanceof BoundingBox ? [box] : box;
    return new MultiBoundingBox([...this.boxes, ...added]);
  }

  merged(other: MultiBoundingBox): MultiBoundingBox {
    return new MultiBoundingBox([...this.boxes, ...other.boxes]);
  }

  filteredByPage(pageIndex: number): MultiBoundingBox {
    return new MultiBoundingBox(this.boxesOnPage(pageIndex));
  }

  intersects(other: BoundingBox): boolean {
    return this.boxes.some(box => box.intersects(other));
  }

  contains(other: BoundingBox): boolean {
    return this.boxes.some(box => box.contains(other));
  }

  containsPoint(point: Point, pageIndex: number): boolean {
    return this.boxesOnPage(pageIndex).some(box => box.containsPoint(point));
  }

  [Symbol.iterator](): Iterator<BoundingBox> {
    return this.boxes[Symbol.iterator]();
  }
}
