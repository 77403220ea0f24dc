export type Point = { x: number; y: number };

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Position, uniform scale and rotation (degrees) that map mark-local space into scene space. */
export interface Placement {
  pos: Point;
  scale: number;
  rotation: number;
}

/** Closed ring of vertices; the last vertex connects back to the first. */
export type Ring = Point[];

export interface Segment {
  a: Point;
  b: Point;
}

const RAY_LENGTH = 10000;
const DEGENERATE_DIRECTION = 2;

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function distToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const len2 = dx * dx + dy * dy;
  if (len2 === 0) return Math.hypot(p.x - a.x, p.y - a.y);
  let t = ((p.x - a.x) * dx + (p.y - a.y) * dy) / len2;
  t = Math.max(0, Math.min(1, t));
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
}

export function distToPolyline(p: Point, pts: Point[]): number {
  if (pts.length === 0) return Infinity;
  if (pts.length === 1) return distance(p, pts[0]);
  let best = Infinity;
  for (let i = 0; i < pts.length - 1; i++) {
    best = Math.min(best, distToSegment(p, pts[i], pts[i + 1]));
  }
  return best;
}

export function toScene(local: Point, pl: Placement): Point {
  const rad = (pl.rotation * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const sx = local.x * pl.scale;
  const sy = local.y * pl.scale;
  return {
    x: pl.pos.x + sx * cos - sy * sin,
    y: pl.pos.y + sx * sin + sy * cos,
  };
}

export function toLocal(scene: Point, pl: Placement): Point {
  const rad = (pl.rotation * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const dx = scene.x - pl.pos.x;
  const dy = scene.y - pl.pos.y;
  const s = pl.scale === 0 ? 1 : pl.scale;
  return {
    x: (dx * cos + dy * sin) / s,
    y: (-dx * sin + dy * cos) / s,
  };
}

export function rectCenter(r: Rect): Point {
  return { x: r.x + r.w / 2, y: r.y + r.h / 2 };
}

export function rectCorners(r: Rect): Ring {
  return [
    { x: r.x, y: r.y },
    { x: r.x + r.w, y: r.y },
    { x: r.x + r.w, y: r.y + r.h },
    { x: r.x, y: r.y + r.h },
  ];
}

export function boundsOf(pts: Point[]): Rect {
  if (pts.length === 0) return { x: 0, y: 0, w: 0, h: 0 };
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of pts) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  return { x: minX, y: minY, w: maxX - minX, h: maxY - minY };
}

export function rectsIntersect(a: Rect, b: Rect): boolean {
  return a.x <= b.x + b.w && b.x <= a.x + a.w && a.y <= b.y + b.h && b.y <= a.y + a.h;
}

export function normalizeRect(a: Point, b: Point): Rect {
  return { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y), w: Math.abs(b.x - a.x), h: Math.abs(b.y - a.y) };
}

export function rectContains(r: Rect, p: Point): boolean {
  return p.x >= r.x && p.x <= r.x + r.w && p.y >= r.y && p.y <= r.y + r.h;
}

/** Even-odd point-in-polygon test. */
export function pointInRing(p: Point, ring: Ring): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if ((a.y > p.y) !== (b.y > p.y) && p.x < ((b.x - a.x) * (p.y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  }
  return inside;
}

export function ellipseRing(cx: number, cy: number, r: number, segments = 64): Ring {
  const ring: Ring = [];
  for (let i = 0; i < segments; i++) {
    const t = (i / segments) * Math.PI * 2;
    ring.push({ x: cx + r * Math.cos(t), y: cy + r * Math.sin(t) });
  }
  return ring;
}

export function flattenCubic(p0: Point, c1: Point, c2: Point, p3: Point, steps = 24): Point[] {
  const pts: Point[] = [];
  for (let i = 0; i <= steps; i++) {
    const t = i / steps;
    const u = 1 - t;
    pts.push({
      x: u * u * u * p0.x + 3 * u * u * t * c1.x + 3 * u * t * t * c2.x + t * t * t * p3.x,
      y: u * u * u * p0.y + 3 * u * u * t * c1.y + 3 * u * t * t * c2.y + t * t * t * p3.y,
    });
  }
  return pts;
}

export function ringSegments(ring: Ring): Segment[] {
  const segs: Segment[] = [];
  const n = ring.length;
  if (n < 2) return segs;
  for (let i = 0; i < n; i++) segs.push({ a: ring[i], b: ring[(i + 1) % n] });
  return segs;
}

/** Intersection of two bounded segments, or null when they miss or are parallel. */
export function segmentIntersection(s1: Segment, s2: Segment): Point | null {
  const rx = s1.b.x - s1.a.x;
  const ry = s1.b.y - s1.a.y;
  const sx = s2.b.x - s2.a.x;
  const sy = s2.b.y - s2.a.y;
  const denom = rx * sy - ry * sx;
  if (Math.abs(denom) < 1e-12) return null;
  const qpx = s2.a.x - s1.a.x;
  const qpy = s2.a.y - s1.a.y;
  const t = (qpx * sy - qpy * sx) / denom;
  const u = (qpx * ry - qpy * rx) / denom;
  if (t < 0 || t > 1 || u < 0 || u > 1) return null;
  return { x: s1.a.x + t * rx, y: s1.a.y + t * ry };
}

/**
 * Nearest point where a ray from `origin` toward `toward` crosses the outline.
 * When `toward` sits on top of `origin` the ray aims at `fallbackCenter` instead.
 * Hits at the origin itself are ignored.
 */
export function rayIntersectionPoint(outline: Ring[], origin: Point, toward: Point, fallbackCenter: Point): Point | null {
  let dx = toward.x - origin.x;
  let dy = toward.y - origin.y;
  if (Math.abs(dx) + Math.abs(dy) < DEGENERATE_DIRECTION) {
    dx = fallbackCenter.x - origin.x;
    dy = fallbackCenter.y - origin.y;
  }
  const len = Math.hypot(dx, dy);
  if (len < 1e-6) return null;

  const ray: Segment = {
    a: origin,
    b: { x: origin.x + (dx / len) * RAY_LENGTH, y: origin.y + (dy / len) * RAY_LENGTH },
  };

  let best: Point | null = null;
  let bestDist = Infinity;
  for (const ring of outline) {
    for (const edge of ringSegments(ring)) {
      const ip = segmentIntersection(ray, edge);
      if (!ip) continue;
      const d = distance(origin, ip);
      if (d > 1e-6 && d < bestDist) {
        best = ip;
        bestDist = d;
      }
    }
  }
  return best;
}
