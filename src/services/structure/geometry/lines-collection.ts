import { BoundingBox, Point } from './bounding-box';
import { LineChunk } from './line-chunk';

const combineBoxes = (lines: readonly LineChunk[]): BoundingBox | undefined => {
  const [first, ...rest] = lines;
  if (!first) return undefined;
  return rest.reduce<BoundingBox>((result, line) => result.union(line.box) ?? result, first.box);
};

/**
 * Immutable set of line chunks ordered by page, with the spatial filters the
 * table border detection needs.
 */
export class LinesCollection {
  readonly lines: readonly LineChunk[];

  constructor(lines: readonly LineChunk[] = []) {
    this.lines = [...lines].sort((a, b) => a.pageIndex - b.pageIndex);
  }

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  get count(): number {
    return this.lines.length;
  }

  get pageIndices(): Set<number> {
    return new Set(this.lines.map(line => line.pageIndex));
  }

  get horizontalLines(): LineChunk[] {
    return this.lines.filter(line => line.isHorizontal);
  }

  get verticalLines(): LineChunk[] {
    return this.lines.filter(line => line.isVertical);
  }

  get axisAlignedLines(): LineChunk[] {
    return this.lines.filter(line => line.isAxisAligned);
  }

  get totalLength(): number {
    return this.lines.reduce((sum, line) => sum + line.length, 0);
  }

  get averageLineWidth(): number | undefined {
    if (this.lines.length === 0) return undefined;
    return this.lines.reduce((sum, line) => sum + line.lineWidth, 0) / this.lines.length;
  }

  /** Union of all line boxes; lines on other pages than the first are skipped. */
  get combinedBox(): BoundingBox | undefined {
    return combineBoxes(this.lines);
  }

  combinedBoxForPage(pageIndex: number): BoundingBox | undefined {
    return combineBoxes(this.linesOnPage(pageIndex));
  }

  linesOnPage(pageIndex: number): LineChunk[] {
    return this.lines.filter(line => line.pageIndex === pageIndex);
  }

  linesOverlapping(box: BoundingBox): LineChunk[] {
    return this.lines.filter(line => line.box.intersects(box));
  }

  linesNearPoint(point: Point, pageIndex: number, maxDistance: number): LineChunk[] {
    return this.linesOnPage(pageIndex).filter(line => line.distanceTo(point) <= maxDistance);
  }

  linesNearBox(box: BoundingBox, maxDistance: number): LineChunk[] {
    const expanded = box.insetBy(-maxDistance, -maxDistance);
    return this.lines.filter(line => line.box.intersects(expanded));
  }

  linesContainedIn(box: BoundingBox): LineChunk[] {
    return this.lines.filter(line => box.contains(line.box));
  }

  linesWithMinWidth(minWidth: number): LineChunk[] {
    return this.lines.filter(line => line.lineWidth >= minWidth);
  }

  linesWithMaxWidth(maxWidth: number): LineChunk[] {
    return this.lines.filter(line => line.lineWidth <= maxWidth);
  }

  linesWithMinLength(minLength: number): LineChunk[] {
    return this.lines.filter(line => line.length >= minLength);
  }

  filteredByPage(pageIndex: number): LinesCollection {
    return new LinesCollection(this.linesOnPage(pageIndex));
  }

  filterHorizontal(): LinesCollection {
    return new LinesCollection(this.horizontalLines);
  }

  filterVertical(): LinesCollection {
    return new LinesCollection(this.verticalLines);
  }

  adding(line: LineChunk | readonly LineChunk[]): LinesCollection {
    const added = line instanceof LineChunk ? [line] : line;
    return new LinesCollection([...this.lines, ...added]);
  }

  merged(other: LinesCollection): LinesCollection {
    return new LinesCollection([...this.lines, ...other.lines]);
  }

  [Symbol.iterator](): Iterator<LineChunk> {
    return this.lines[Symbol.iterator]();
  }
}
