import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { Point, Rect } from './geometry';
import { boundsOf, distToPolyline, rectsIntersect } from './geometry';
import { MIN_MEMO_LINE_LENGTH, MIN_MEMO_PATH_SIZE, STROKE_HIT_TOLERANCE } from './editorConfig';

/**
 * Memo strokes are scribbles over the plan. They are not defects: no numbering, no
 * leader line, no defect record, and they never appear in the saved item list.
 * Their points are stored directly in scene space.
 */

export interface MemoLine {
  kind: 'memoLine';
  id: string;
  p1: Point;
  p2: Point;
}

export interface MemoFreePath {
  kind: 'memoPath';
  id: string;
  points: Point[];
}

export type MemoMark = MemoLine | MemoFreePath;

export type MemoRecord =
  | { type: 'memo_line'; p1: [number, number]; p2: [number, number] }
  | { type: 'memo_free'; pts: [number, number][] };

const XYZ = z.tuple([z.number(), z.number()]);

const MemoRecordZ = z.discriminatedUnion('type', [
  z.object({ type: z.literal('memo_line'), p1: XYZ, p2: XYZ }),
  z.object({ type: z.literal('memo_free'), pts: z.array(XYZ) }),
]);

export function createMemoLine(at: Point): MemoLine {
  return { kind: 'memoLine', id: nanoid(), p1: { ...at }, p2: { ...at } };
}

export function createMemoPath(at: Point): MemoFreePath {
  return { kind: 'memoPath', id: nanoid(), points: [{ ...at }] };
}

/** Appends without decimation; every pointer move becomes a vertex. */
export function addPathPoint(memo: MemoFreePath, p: Point): void {
  memo.points.push({ ...p });
}

export function memoPoints(memo: MemoMark): Point[] {
  return memo.kind === 'memoLine' ? [memo.p1, memo.p2] : memo.points;
}

export function memoBounds(memo: MemoMark): Rect {
  return boundsOf(memoPoints(memo));
}

export function hitTestMemo(memo: MemoMark, p: Point, tolerance = STROKE_HIT_TOLERANCE): boolean {
  return distToPolyline(p, memoPoints(memo)) <= tolerance;
}

export function memoIntersectsRect(memo: MemoMark, r: Rect): boolean {
  return rectsIntersect(memoBounds(memo), r);
}

/** Single-click jitter produces strokes too small to keep. */
export function isUndersizedMemo(memo: MemoMark): boolean {
  if (memo.kind === 'memoLine') {
    return Math.hypot(memo.p2.x - memo.p1.x, memo.p2.y - memo.p1.y) < MIN_MEMO_LINE_LENGTH;
  }
  const b = memoBounds(memo);
  return b.w < MIN_MEMO_PATH_SIZE && b.h < MIN_MEMO_PATH_SIZE;
}

export function memoToRecord(memo: MemoMark): MemoRecord {
  if (memo.kind === 'memoLine') {
    return { type: 'memo_line', p1: [memo.p1.x, memo.p1.y], p2: [memo.p2.x, memo.p2.y] };
  }
  return { type: 'memo_free', pts: memo.points.map((p): [number, number] => [p.x, p.y]) };
}

/** Returns null for unknown or malformed records, and for free paths without points. */
export function memoFromRecord(raw: unknown): MemoMark | null {
  const parsed = MemoRecordZ.safeParse(raw);
  if (!parsed.success) return null;
  const rec = parsed.data;
  if (rec.type === 'memo_line') {
    return { kind: 'memoLine', id: nanoid(), p1: { x: rec.p1[0], y: rec.p1[1] }, p2: { x: rec.p2[0], y: rec.p2[1] } };
  }
  if (rec.pts.length === 0) return null;
  return { kind: 'memoPath', id: nanoid(), points: rec.pts.map(([x, y]) => ({ x, y })) };
}
