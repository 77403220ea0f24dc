import { describe, expect, it } from 'vitest';
import {
  distToPolyline,
  distToSegment,
  distance,
  ellipseRing,
  flattenCubic,
  normalizeRect,
  pointInRing,
  rayIntersectionPoint,
  rectCorners,
  rectsIntersect,
  segmentIntersection,
  toLocal,
  toScene,
} from './geometry';

describe('distances', () => {
  it('measures point to point', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it('clamps to the segment ends', () => {
    expect(distToSegment({ x: 5, y: 5 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
    expect(distToSegment({ x: 15, y: 0 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
  });

  it('treats a degenerate segment as a point', () => {
    expect(distToSegment({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 0, y: 0 })).toBe(5);
  });

  it('takes the nearest polyline segment', () => {
    const pts = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
    ];
    expect(distToPolyline({ x: 12, y: 5 }, pts)).toBe(2);
    expect(distToPolyline({ x: 0, y: 0 }, [])).toBe(Infinity);
  });
});

describe('placement transforms', () => {
  const pl = { pos: { x: 10, y: 20 }, scale: 2, rotation: 90 };

  it('scales, rotates, then translates', () => {
    const p = toScene({ x: 1, y: 0 }, pl);
    expect(p.x).toBeCloseTo(10);
    expect(p.y).toBeCloseTo(22);
  });

  it('inverts toScene', () => {
    const back = toLocal(toScene({ x: 3, y: -4 }, pl), pl);
    expect(back.x).toBeCloseTo(3);
    expect(back.y).toBeCloseTo(-4);
  });
});

describe('rects', () => {
  it('normalizes from any two corners', () => {
    expect(normalizeRect({ x: 10, y: 5 }, { x: 2, y: 8 })).toEqual({ x: 2, y: 5, w: 8, h: 3 });
  });

  it('counts touching edges as intersecting', () => {
    expect(rectsIntersect({ x: 0, y: 0, w: 10, h: 10 }, { x: 10, y: 0, w: 5, h: 5 })).toBe(true);
    expect(rectsIntersect({ x: 0, y: 0, w: 10, h: 10 }, { x: 11, y: 0, w: 5, h: 5 })).toBe(false);
  });
});

describe('rings', () => {
  const square = rectCorners({ x: -10, y: -10, w: 20, h: 20 });

  it('tests containment with even-odd', () => {
    expect(pointInRing({ x: 0, y: 0 }, square)).toBe(true);
    expect(pointInRing({ x: 15, y: 0 }, square)).toBe(false);
  });

  it('samples a circle starting at angle zero', () => {
    const ring = ellipseRing(0, 0, 10, 4);
    expect(ring).toHaveLength(4);
    expect(ring[0].x).toBeCloseTo(10);
    expect(ring[1].y).toBeCloseTo(10);
    expect(ring[2].x).toBeCloseTo(-10);
    expect(ring[3].y).toBeCloseTo(-10);
  });

  it('flattens a cubic through its end points', () => {
    const pts = flattenCubic({ x: 0, y: 0 }, { x: 0, y: 10 }, { x: 10, y: 10 }, { x: 10, y: 0 }, 8);
    expect(pts).toHaveLength(9);
    expect(pts[0]).toEqual({ x: 0, y: 0 });
    expect(pts[8]).toEqual({ x: 10, y: 0 });
  });
});

describe('segmentIntersection', () => {
  it('finds crossing segments', () => {
    const ip = segmentIntersection({ a: { x: 0, y: 0 }, b: { x: 10, y: 10 } }, { a: { x: 0, y: 10 }, b: { x: 10, y: 0 } });
    expect(ip).toEqual({ x: 5, y: 5 });
  });

  it('returns null for parallel or disjoint segments', () => {
    expect(segmentIntersection({ a: { x: 0, y: 0 }, b: { x: 10, y: 0 } }, { a: { x: 0, y: 1 }, b: { x: 10, y: 1 } })).toBeNull();
    expect(segmentIntersection({ a: { x: 0, y: 0 }, b: { x: 1, y: 1 } }, { a: { x: 5, y: 0 }, b: { x: 5, y: 10 } })).toBeNull();
  });
});

describe('rayIntersectionPoint', () => {
  const square = rectCorners({ x: -10, y: -10, w: 20, h: 20 });

  it('returns the nearest crossing along the ray', () => {
    const hit = rayIntersectionPoint([square], { x: 50, y: 0 }, { x: 0, y: 0 }, { x: 0, y: 0 });
    expect(hit?.x).toBeCloseTo(10);
    expect(hit?.y).toBeCloseTo(0);
  });

  it('aims at the fallback centre when the target sits on the origin', () => {
    const box = rectCorners({ x: -10, y: 20, w: 20, h: 20 });
    const hit = rayIntersectionPoint([box], { x: 0, y: 0 }, { x: 0.5, y: 0 }, { x: 0, y: 30 });
    expect(hit?.x).toBeCloseTo(0);
    expect(hit?.y).toBeCloseTo(20);
  });

  it('returns null when there is no direction at all', () => {
    expect(rayIntersectionPoint([square], { x: 0, y: 0 }, { x: 0, y: 0 }, { x: 0, y: 0 })).toBeNull();
  });

  it('returns null when the ray misses', () => {
    expect(rayIntersectionPoint([square], { x: 50, y: 0 }, { x: 100, y: 0 }, { x: 0, y: 0 })).toBeNull();
  });
});
