import { BoundingBox, ContentChunk, Point } from './bounding-box';

export type ColorComponents = readonly number[];

const BLACK: ColorComponents = [0, 0, 0, 1];

export interface LineChunkInit {
  pageIndex: number;
  start: Point;
  end: Point;
  lineWidth?: number;
  strokeColor?: ColorComponents;
  /** Overrides the box derived from the endpoints. */
  box?: BoundingBox;
}

/**
 * A stroked straight segment. Table ruling lines are the main consumer.
 */
export class LineChunk implements ContentChunk {
  readonly box: BoundingBox;
  readonly start: Point;
  readonly end: Point;
  readonly lineWidth: number;
  readonly strokeColor: ColorComponents;

  constructor(init: LineChunkInit) {
    this.start = { ...init.start };
    this.end = { ...init.end };
    this.lineWidth = init.lineWidth ?? 1;
    this.strokeColor = init.strokeColor ?? BLACK;

    const half = this.lineWidth / 2;
    this.box =
      init.box ??
      BoundingBox.fromEdges(
        init.pageIndex,
        Math.min(this.start.x, this.end.x) - half,
        Math.min(this.start.y, this.end.y) - half,
        Math.max(this.start.x, this.end.x) + half,
        Math.max(this.start.y, this.end.y) + half
      );
  }

  get pageIndex(): number {
    return this.box.pageIndex;
  }

  get length(): number {
    return Math.hypot(this.end.x - this.start.x, this.end.y - this.start.y);
  }

  /** Deviation allowed before a line stops counting as axis-aligned. */
  private get alignmentTolerance(): number {
    return Math.max(this.length * 0.01, 0.5);
  }

  get isHorizontal(): boolean {
    if (this.length === 0) return true;
    return Math.abs(this.end.y - this.start.y) <= this.alignmentTolerance;
  }

  get isVertical(): boolean {
    if (this.length === 0) return true;
    return Math.abs(this.end.x - this.start.x) <= this.alignmentTolerance;
  }

  get isAxisAligned(): boolean {
    return this.isHorizontal || this.isVertical;
  }

  /** Radians, measured from the positive x axis. */
  get angle(): number {
    return Math.atan2(this.end.y - this.start.y, this.end.x - this.start.x);
  }

  get midpoint(): Point {
    return {
      x: (this.start.x + this.end.x) / 2,
      y: (this.start.y + this.end.y) / 2,
    };
  }

  /**
   * Shortest distance from `point` to the segment.
   */
  distanceTo(point: Point): number {
    const dx = this.end.x - this.start.x;
    const dy = this.end.y - this.start.y;
    const lengthSquared = dx * dx + dy * dy;
    if (lengthSquared === 0) {
      return Math.hypot(point.x - this.start.x, point.y - this.start.y);
    }

    const t = Math.max(
      0,
      Math.min(1, ((point.x - this.start.x) * dx + (point.y - this.start.y) * dy) / lengthSquared)
    );
    return Math.hypot(point.x - (this.start.x + t * dx), point.y - (this.start.y + t * dy));
  }

  /**
   * Distance from `point` to the infinite line through this segment.
   */
  perpendicularDistanceTo(point: Point): number {
    const dx = this.end.x - this.start.x;
    const dy = this.end.y - this.start.y;
    const lengthSquared = dx * dx + dy * dy;
    if (lengthSquared === 0) {
      return Math.hypot(point.x - this.start.x, point.y - this.start.y);
    }

    const cross = Math.abs((point.x - this.start.x) * dy - (point.y - this.start.y) * dx);
    return cross / Math.sqrt(lengthSquared);
  }

  isCollinearWith(other: LineChunk, tolerance = 1): boolean {
    if (other.pageIndex !== this.pageIndex) return false;
    return [
      other.perpendicularDistanceTo(this.start),
      other.perpendicularDistanceTo(this.end),
      this.perpendicularDistanceTo(other.start),
      this.perpendicularDistanceTo(other.end),
    ].every(distance => distance <= tolerance);
  }
}
