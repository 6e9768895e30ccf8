/**
 * Tests for the page geometry primitives: boxes, multi-page regions, ruling
 * lines and line collections.
 */

import { describe, it, expect } from 'vitest';
import { BoundingBox } from '../../../../src/services/structure/geometry/bounding-box';
import { MultiBoundingBox } from '../../../../src/services/structure/geometry/multi-bounding-box';
import { LineChunk } from '../../../../src/services/structure/geometry/line-chunk';
import { LinesCollection } from '../../../../src/services/structure/geometry/lines-collection';

describe('BoundingBox', () => {
  it('should fold negative extents into a bottom-left origin', () => {
    const box = new BoundingBox(0, 10, 20, -4, -6);

    expect(box.toJSON()).toEqual({ pageIndex: 0, x: 6, y: 14, width: 4, height: 6 });
    expect(box.rightX).toBe(10);
    expect(box.topY).toBe(20);
  });

  it('should compute union, intersection and overlap on the same page', () => {
    const a = new BoundingBox(0, 0, 0, 10, 10);
    const b = new BoundingBox(0, 5, 5, 10, 10);

    expect(a.union(b)?.toJSON()).toEqual({ pageIndex: 0, x: 0, y: 0, width: 15, height: 15 });
    expect(a.intersection(b)?.toJSON()).toEqual({ pageIndex: 0, x: 5, y: 5, width: 5, height: 5 });
    expect(a.overlapPercentage(b)).toBe(0.25);
    expect(a.intersects(b)).toBe(true);
  });

  it('should return no result for operations across pages', () => {
    const a = new BoundingBox(0, 0, 0, 10, 10);
    const b = new BoundingBox(1, 0, 0, 10, 10);

    expect(a.union(b)).toBeUndefined();
    expect(a.intersection(b)).toBeUndefined();
    expect(a.intersects(b)).toBe(false);
    expect(a.contains(b)).toBe(false);
    expect(a.overlapPercentage(b)).toBe(0);
  });

  it('should not treat boxes that only share an edge as intersecting', () => {
    const a = new BoundingBox(0, 0, 0, 10, 10);
    const b = new BoundingBox(0, 10, 0, 5, 5);

    expect(a.intersects(b)).toBe(false);
    expect(a.overlapPercentage(b)).toBe(0);
  });

  it('should check containment of boxes and points', () => {
    const outer = new BoundingBox(0, 0, 0, 10, 10);

    expect(outer.contains(new BoundingBox(0, 2, 2, 3, 3))).toBe(true);
    expect(outer.contains(new BoundingBox(0, 8, 8, 3, 3))).toBe(false);
    expect(outer.containsPoint({ x: 10, y: 0 })).toBe(true);
    expect(outer.containsPoint({ x: 10.5, y: 0 })).toBe(false);
  });

  it('should inset and report center and emptiness', () => {
    const box = new BoundingBox(0, 0, 0, 10, 10);

    expect(box.insetBy(2, 1).toJSON()).toEqual({ pageIndex: 0, x: 2, y: 1, width: 6, height: 8 });
    expect(box.center).toEqual({ x: 5, y: 5 });
    expect(box.isEmpty).toBe(false);
    expect(new BoundingBox(0, 0, 0, 0, 10).isEmpty).toBe(true);
  });
});

describe('MultiBoundingBox', () => {
  const fragments = [
    new BoundingBox(2, 0, 0, 5, 5),
    new BoundingBox(0, 0, 0, 10, 10),
    new BoundingBox(1, 0, 0, 2, 2),
    new BoundingBox(0, 20, 0, 10, 10),
  ];

  it('should order fragments by page and keep page-local order', () => {
    const region = new MultiBoundingBox(fragments);

    expect(region.boxes.map(box => box.pageIndex)).toEqual([0, 0, 1, 2]);
    expect(region.first?.x).toBe(0);
    expect(region.boxes[1].x).toBe(20);
    expect(region.last?.pageIndex).toBe(2);
  });

  it('should report page statistics', () => {
    const region = new MultiBoundingBox(fragments);

    expect(region.count).toBe(4);
    expect(region.pageCount).toBe(3);
    expect(region.isMultiPage).toBe(true);
    expect(region.totalArea).toBe(25 + 100 + 4 + 100);
  });

  it('should union the fragments of one page', () => {
    const region = new MultiBoundingBox(fragments);

    expect(region.unionBoxForPage(0)?.toJSON()).toEqual({ pageIndex: 0, x: 0, y: 0, width: 30, height: 10 });
    expect(region.unionBoxForPage(5)).toBeUndefined();
  });

  it('should answer spatial queries per page', () => {
    const region = new MultiBoundingBox(fragments);

    expect(region.containsPoint({ x: 25, y: 5 }, 0)).toBe(true);
    expect(region.containsPoint({ x: 25, y: 5 }, 1)).toBe(false);
    expect(region.intersects(new BoundingBox(1, 1, 1, 5, 5))).toBe(true);
    expect(region.filteredByPage(2).count).toBe(1);
  });

  it('should return new instances when adding boxes', () => {
    const region = new MultiBoundingBox();
    const grown = region.adding(new BoundingBox(3, 0, 0, 1, 1));

    expect(region.isEmpty).toBe(true);
    expect(grown.count).toBe(1);
    expect(grown.merged(new MultiBoundingBox(fragments)).count).toBe(5);
  });
});

describe('LineChunk', () => {
  it('should derive its box from the endpoints and line width', () => {
    const line = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 100, y: 0 }, lineWidth: 2 });

    expect(line.box.toJSON()).toEqual({ pageIndex: 0, x: -1, y: -1, width: 102, height: 2 });
    expect(line.length).toBe(100);
    expect(line.midpoint).toEqual({ x: 50, y: 0 });
  });

  it('should tolerate a small slope when classifying orientation', () => {
    const nearlyFlat = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 100, y: 0.8 } });
    const diagonal = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 10, y: 1 } });

    expect(nearlyFlat.isHorizontal).toBe(true);
    expect(nearlyFlat.isVertical).toBe(false);
    expect(diagonal.isHorizontal).toBe(false);
    expect(diagonal.isAxisAligned).toBe(false);
  });

  it('should treat a zero-length line as both horizontal and vertical', () => {
    const dot = new LineChunk({ pageIndex: 0, start: { x: 3, y: 4 }, end: { x: 3, y: 4 } });

    expect(dot.isHorizontal).toBe(true);
    expect(dot.isVertical).toBe(true);
    expect(dot.distanceTo({ x: 0, y: 0 })).toBe(5);
  });

  it('should clamp point distance to the segment', () => {
    const line = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 100, y: 0 } });

    expect(line.distanceTo({ x: 50, y: 3 })).toBe(3);
    expect(line.distanceTo({ x: -3, y: 4 })).toBe(5);
    expect(line.perpendicularDistanceTo({ x: -3, y: 4 })).toBe(4);
  });

  it('should detect collinear lines only on the same page', () => {
    const a = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 10, y: 0 } });
    const b = new LineChunk({ pageIndex: 0, start: { x: 20, y: 0.5 }, end: { x: 30, y: 0.5 } });
    const c = new LineChunk({ pageIndex: 1, start: { x: 20, y: 0 }, end: { x: 30, y: 0 } });

    expect(a.isCollinearWith(b)).toBe(true);
    expect(a.isCollinearWith(b, 0.25)).toBe(false);
    expect(a.isCollinearWith(c)).toBe(false);
  });
});

describe('LinesCollection', () => {
  const horizontal = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 100, y: 0 } });
  const vertical = new LineChunk({ pageIndex: 0, start: { x: 0, y: 0 }, end: { x: 0, y: 50 } });
  const secondPage = new LineChunk({ pageIndex: 1, start: { x: 0, y: 10 }, end: { x: 50, y: 10 }, lineWidth: 3 });
  const collection = new LinesCollection([secondPage, horizontal, vertical]);

  it('should split lines by orientation and page', () => {
    expect(collection.horizontalLines).toHaveLength(2);
    expect(collection.verticalLines).toEqual([vertical]);
    expect(collection.linesOnPage(1)).toEqual([secondPage]);
    expect(collection.lines[0]).toBe(horizontal);
  });

  it('should aggregate length and width', () => {
    expect(collection.totalLength).toBe(200);
    expect(collection.averageLineWidth).toBeCloseTo(5 / 3);
    expect(new LinesCollection().averageLineWidth).toBeUndefined();
  });

  it('should combine boxes of one page', () => {
    expect(collection.combinedBoxForPage(0)?.toJSON()).toEqual({
      pageIndex: 0,
      x: -0.5,
      y: -0.5,
      width: 101,
      height: 51,
    });
  });

  it('should find lines near a point', () => {
    expect(collection.linesNearPoint({ x: 50, y: 5 }, 0, 5)).toEqual([horizontal]);
    expect(collection.linesNearPoint({ x: 50, y: 5 }, 1, 5)).toEqual([secondPage]);
  });

  it('should filter by width and length', () => {
    expect(collection.linesWithMinWidth(2)).toEqual([secondPage]);
    expect(collection.linesWithMinLength(60)).toEqual([horizontal]);
    expect(collection.filterVertical().count).toBe(1);
  });
});
