import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { Placement, Point, Rect, Ring } from './geometry';
import {
  boundsOf,
  distToPolyline,
  ellipseRing,
  flattenCubic,
  pointInRing,
  rectCenter,
  rectContains,
  rectCorners,
  toLocal,
  toScene,
} from './geometry';
import type { MemoMark } from './memo';
import {
  CIRCLE_MAX_SCALE,
  CIRCLE_MIN_SCALE,
  CREATE_DRAG_MARGIN,
  DEFAULT_MEMBER,
  DEFAULT_NOTE_TEXT,
  LABEL_FONT_SIZE,
  LABEL_MARGIN_X,
  LABEL_MARGIN_Y,
  NOTE_FONT_SIZE,
  STROKE_HIT_TOLERANCE,
} from './editorConfig';

// ─── defect record ──────────────────────────────────────────────────────────

export interface DefectSize {
  width_mm: string;
  length_m: string;
  count_ea: string;
}

export interface DefectInfo {
  member: string;
  location: string;
  defect_type: string;
  size: DefectSize;
  /** true = progressing (O), false = stable (X) */
  progress: boolean;
  remark: string;
}

export function defaultDefectInfo(member = DEFAULT_MEMBER): DefectInfo {
  return {
    member,
    location: '',
    defect_type: '',
    size: { width_mm: '', length_m: '', count_ea: '' },
    progress: false,
    remark: '',
  };
}

// ─── marks ──────────────────────────────────────────────────────────────────

/** Leader line: `p1` always equals `anchor`, `p2` is the terminus on the owner's outline. */
export interface LeaderLine {
  anchor: Point;
  p1: Point;
  p2: Point;
  /** 0.4 while previewing a drag-create, 1 once committed */
  opacity: number;
}

export interface MarkLabel {
  text: string;
}

/** Circles carry a numeric id; older files may hold strings such as "D-12". */
export type DisplayId = number | string | null;

interface MarkBase extends Placement {
  /** Stable internal id, assigned at construction and never reused. */
  id: string;
  visible: boolean;
  displayId: DisplayId;
  label: MarkLabel | null;
}

export interface CircleMark extends MarkBase {
  kind: 'circle';
  radius: number;
  defectInfo: DefectInfo | null;
  leader: LeaderLine | null;
}

export interface SquareMark extends MarkBase {
  kind: 'square';
  size: number;
  leader: LeaderLine | null;
}

export interface TriangleMark extends MarkBase {
  kind: 'triangle';
  size: number;
  leader: LeaderLine | null;
}

export interface SCurveMark extends MarkBase {
  kind: 'scurve';
  w: number;
  h: number;
  midRadius: number;
  curve: number;
  leader: LeaderLine | null;
}

export interface NoteText extends MarkBase {
  kind: 'text';
  text: string;
  fontSize: number;
}

/** Marks that persist into the defect item list. */
export type DefectMark = CircleMark | SquareMark | TriangleMark | SCurveMark | NoteText;
export type LeaderOwner = CircleMark | SquareMark | TriangleMark | SCurveMark;
export type Mark = DefectMark | MemoMark;

export type ShapeTool = 'circle' | 'rect' | 'tri' | 's' | 'text';

export const DEFAULT_CIRCLE_RADIUS = 18;
export const DEFAULT_SQUARE_SIZE = 36;
export const DEFAULT_TRIANGLE_SIZE = 40;
export const DEFAULT_SCURVE = { w: 43, h: 55, midRadius: 8, curve: 0.9 } as const;

export function isSerializableMark(m: Mark): m is DefectMark {
  return m.kind !== 'memoLine' && m.kind !== 'memoPath';
}

export function hasLeaderLine(m: Mark): m is LeaderOwner {
  return m.kind === 'circle' || m.kind === 'square' || m.kind === 'triangle' || m.kind === 'scurve';
}

export function hasLabel(m: Mark): m is DefectMark & { label: MarkLabel } {
  return isSerializableMark(m) && m.label !== null;
}

function base(center: Point): Omit<MarkBase, 'displayId'> {
  return { id: nanoid(), pos: { ...center }, scale: 1, rotation: 0, visible: true, label: null };
}

export function createCircleMark(center: Point, radius = DEFAULT_CIRCLE_RADIUS): CircleMark {
  return { ...base(center), kind: 'circle', radius, displayId: null, defectInfo: null, leader: null };
}

export function createSquareMark(center: Point, size = DEFAULT_SQUARE_SIZE): SquareMark {
  return { ...base(center), kind: 'square', size, displayId: null, leader: null };
}

export function createTriangleMark(center: Point, size = DEFAULT_TRIANGLE_SIZE): TriangleMark {
  return { ...base(center), kind: 'triangle', size, displayId: null, leader: null };
}

export function createSCurveMark(center: Point, w: number = DEFAULT_SCURVE.w, h: number = DEFAULT_SCURVE.h): SCurveMark {
  return {
    ...base(center),
    kind: 'scurve',
    w,
    h,
    midRadius: DEFAULT_SCURVE.midRadius,
    curve: DEFAULT_SCURVE.curve,
    displayId: null,
    leader: null,
  };
}

export function createNoteText(topLeft: Point, text = DEFAULT_NOTE_TEXT): NoteText {
  return { ...base(topLeft), kind: 'text', text, fontSize: NOTE_FONT_SIZE, displayId: null };
}

export function createShapeForTool(tool: ShapeTool, at: Point): DefectMark {
  switch (tool) {
    case 'circle':
      return createCircleMark(at);
    case 'rect':
      return createSquareMark(at);
    case 'tri':
      return createTriangleMark(at);
    case 's':
      return createSCurveMark(at);
    case 'text':
      return createNoteText(at);
  }
}

export function setCircleDisplayId(circle: CircleMark, n: number): void {
  circle.displayId = n;
}

/** Applies a scale and returns the value that actually took effect. Circles saturate at their bounds. */
export function setMarkScale(mark: DefectMark, s: number): number {
  let next = s;
  if (mark.kind === 'circle') next = Math.min(CIRCLE_MAX_SCALE, Math.max(CIRCLE_MIN_SCALE, s));
  if (!(next > 0)) return mark.scale;
  mark.scale = next;
  return next;
}

// ─── geometry ───────────────────────────────────────────────────────────────

/** Approximate rendered size of a line of text (no font metrics outside the DOM). */
export function textBoxSize(text: string, fontSize: number): { w: number; h: number } {
  return { w: Math.max(1, text.length) * fontSize * 0.6 + 4, h: fontSize * 1.5 };
}

function scurvePolyline(m: SCurveMark): Point[] {
  const top = -m.h / 2;
  const w2 = m.w / 2;
  return flattenCubic(
    { x: 0, y: top },
    { x: -w2 * m.curve, y: top + m.h * 0.25 },
    { x: w2 * m.curve, y: top + m.h * 0.75 },
    { x: 0, y: m.h / 2 }
  );
}

export function triangleVertices(size: number): Ring {
  const h = (size * Math.sqrt(3)) / 2;
  return [
    { x: 0, y: -h / 2 },
    { x: -size / 2, y: h / 2 },
    { x: size / 2, y: h / 2 },
  ];
}

export function localBounds(mark: DefectMark): Rect {
  switch (mark.kind) {
    case 'circle':
      return { x: -mark.radius, y: -mark.radius, w: mark.radius * 2, h: mark.radius * 2 };
    case 'square':
      return { x: -mark.size / 2, y: -mark.size / 2, w: mark.size, h: mark.size };
    case 'triangle':
      return boundsOf(triangleVertices(mark.size));
    case 'scurve':
      return { x: -mark.w / 2, y: -mark.h / 2, w: mark.w, h: mark.h };
    case 'text': {
      const { w, h } = textBoxSize(mark.text, mark.fontSize);
      return { x: 0, y: 0, w, h };
    }
  }
}

/** Closed rings in mark-local space that describe the shape's boundary. */
export function localOutline(mark: DefectMark): Ring[] {
  switch (mark.kind) {
    case 'circle':
      return [ellipseRing(0, 0, mark.radius)];
    case 'square':
      return [rectCorners(localBounds(mark))];
    case 'triangle':
      return [triangleVertices(mark.size)];
    case 'scurve':
      return [scurvePolyline(mark), ellipseRing(0, 0, mark.midRadius, 32)];
    case 'text':
      return [rectCorners(localBounds(mark))];
  }
}

export function sceneOutline(mark: DefectMark): Ring[] {
  return localOutline(mark).map((ring) => ring.map((p) => toScene(p, mark)));
}

export function sceneBounds(mark: DefectMark): Rect {
  return boundsOf(rectCorners(localBounds(mark)).map((p) => toScene(p, mark)));
}

export function sceneBoundsCenter(mark: DefectMark): Point {
  return toScene(rectCenter(localBounds(mark)), mark);
}

/** Drag-creates shorter than this (press → release) are discarded. */
export function minCreateDistance(mark: DefectMark): number {
  const r = localBounds(mark);
  return Math.max(r.w, r.h) + CREATE_DRAG_MARGIN;
}

export function labelSize(text: string): { w: number; h: number } {
  return { w: Math.max(1, text.length) * LABEL_FONT_SIZE * 0.6, h: LABEL_FONT_SIZE * 1.4 };
}

/** Label box in mark-local space, hanging off the bottom-right of the bounding box. */
export function labelLocalRect(mark: DefectMark): Rect | null {
  if (!mark.label) return null;
  const r = localBounds(mark);
  const size = labelSize(mark.label.text);
  return { x: r.x + r.w + LABEL_MARGIN_X, y: r.y + r.h - size.h + LABEL_MARGIN_Y, w: size.w, h: size.h };
}

export type MarkHit = 'body' | 'label';

/** Pointer hit-test in scene space. Labels are children of their mark, so they hit as the mark. */
export function hitTestMark(mark: DefectMark, p: Point): MarkHit | null {
  if (!mark.visible) return null;
  const local = toLocal(p, mark);
  const lr = labelLocalRect(mark);
  if (lr && rectContains(lr, local)) return 'label';
  switch (mark.kind) {
    case 'circle':
      return Math.hypot(local.x, local.y) <= mark.radius ? 'body' : null;
    case 'square':
    case 'text':
      return rectContains(localBounds(mark), local) ? 'body' : null;
    case 'triangle':
      return pointInRing(local, triangleVertices(mark.size)) ? 'body' : null;
    case 'scurve': {
      if (Math.hypot(local.x, local.y) <= mark.midRadius) return 'body';
      return distToPolyline(local, scurvePolyline(mark)) * mark.scale <= STROKE_HIT_TOLERANCE ? 'body' : null;
    }
  }
}

// ─── records ────────────────────────────────────────────────────────────────

export type XY = [number, number];

export interface MarkRecord {
  type: string;
  x: number;
  y: number;
  scale: number;
  rotation: number;
  internal_id: string | null;
  display_id: DisplayId;
  defect_info?: DefectInfo;
  line?: { p1: XY; p2: XY };
  radius?: number;
  size?: number;
  w?: number;
  h?: number;
  text?: string;
}

const MARK_TYPE_NAMES = {
  circle: 'CircleMark',
  square: 'SquareMark',
  triangle: 'TriangleMark',
  scurve: 'SCurveMark',
  text: 'NoteText',
} as const satisfies Record<DefectMark['kind'], string>;

const FieldTextZ = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v == null ? '' : String(v)));

export const DefectInfoZ = z.object({
  member: FieldTextZ,
  location: FieldTextZ,
  defect_type: FieldTextZ,
  size: z
    .object({ width_mm: FieldTextZ, length_m: FieldTextZ, count_ea: FieldTextZ })
    .nullish()
    .transform((s) => s ?? { width_mm: '', length_m: '', count_ea: '' }),
  progress: z.boolean().nullish().transform((v) => v ?? false),
  remark: FieldTextZ,
});

const XYZ = z.tuple([z.number(), z.number()]);

const MarkRecordBaseZ = z.object({
  x: z.number().default(0),
  y: z.number().default(0),
  scale: z.number().positive().default(1),
  rotation: z.number().default(0),
  internal_id: z.string().nullish(),
  display_id: z.union([z.number(), z.string()]).nullish(),
  defect_info: z.unknown().optional(),
  line: z.object({ p1: XYZ, p2: XYZ }).nullish(),
});

const PositiveZ = z.number().positive();

/** Type tag → parser. Anything not listed here is dropped on restore. */
const MARK_REGISTRY: Record<string, (raw: unknown) => DefectMark | null> = {
  CircleMark: (raw) => {
    const r = MarkRecordBaseZ.extend({ radius: PositiveZ.default(DEFAULT_CIRCLE_RADIUS) }).safeParse(raw);
    return r.success ? createCircleMark({ x: r.data.x, y: r.data.y }, r.data.radius) : null;
  },
  SquareMark: (raw) => {
    const r = MarkRecordBaseZ.extend({ size: PositiveZ.default(DEFAULT_SQUARE_SIZE) }).safeParse(raw);
    return r.success ? createSquareMark({ x: r.data.x, y: r.data.y }, r.data.size) : null;
  },
  TriangleMark: (raw) => {
    const r = MarkRecordBaseZ.extend({ size: PositiveZ.default(DEFAULT_TRIANGLE_SIZE) }).safeParse(raw);
    return r.success ? createTriangleMark({ x: r.data.x, y: r.data.y }, r.data.size) : null;
  },
  SCurveMark: (raw) => {
    const r = MarkRecordBaseZ.extend({
      w: PositiveZ.default(DEFAULT_SCURVE.w),
      h: PositiveZ.default(DEFAULT_SCURVE.h),
    }).safeParse(raw);
    return r.success ? createSCurveMark({ x: r.data.x, y: r.data.y }, r.data.w, r.data.h) : null;
  },
  NoteText: (raw) => {
    const r = MarkRecordBaseZ.extend({ text: z.string().default('') }).safeParse(raw);
    return r.success ? createNoteText({ x: r.data.x, y: r.data.y }, r.data.text) : null;
  },
};
MARK_REGISTRY.SCurveWithMidCircle = MARK_REGISTRY.SCurveMark;

export function isKnownMarkType(type: string): boolean {
  return Object.prototype.hasOwnProperty.call(MARK_REGISTRY, type);
}

export function markToRecord(mark: DefectMark): MarkRecord {
  const rec: MarkRecord = {
    type: MARK_TYPE_NAMES[mark.kind],
    x: mark.pos.x,
    y: mark.pos.y,
    scale: mark.scale,
    rotation: mark.rotation,
    internal_id: mark.id,
    display_id: mark.displayId,
  };
  if (hasLeaderLine(mark) && mark.leader) {
    rec.line = { p1: [mark.leader.p1.x, mark.leader.p1.y], p2: [mark.leader.p2.x, mark.leader.p2.y] };
  }
  switch (mark.kind) {
    case 'circle':
      if (mark.defectInfo) rec.defect_info = { ...mark.defectInfo, size: { ...mark.defectInfo.size } };
      rec.radius = mark.radius;
      break;
    case 'square':
    case 'triangle':
      rec.size = mark.size;
      break;
    case 'scurve':
      rec.w = mark.w;
      rec.h = mark.h;
      break;
    case 'text':
      rec.text = mark.text;
      break;
  }
  return rec;
}

export interface RestoredMark {
  mark: DefectMark;
  /** Persisted leader endpoints; the controller reattaches the line from these. */
  line: { p1: Point; p2: Point } | null;
}

/**
 * Rebuilds the shape, transform, ids and defect record of a persisted mark. Leader
 * line and label are left detached. Returns null for unknown types and malformed
 * fields.
 */
export function markFromRecord(raw: unknown): RestoredMark | null {
  const head = MarkRecordBaseZ.extend({ type: z.string() }).safeParse(raw);
  if (!head.success) return null;
  const parse = MARK_REGISTRY[head.data.type];
  if (!parse) return null;
  const mark = parse(raw);
  if (!mark) return null;

  const rec = head.data;
  if (rec.internal_id) mark.id = rec.internal_id;
  mark.rotation = rec.rotation;
  setMarkScale(mark, rec.scale);

  mark.displayId = rec.display_id ?? null;
  if (mark.kind === 'circle') {
    const info = DefectInfoZ.safeParse(rec.defect_info ?? {});
    mark.defectInfo = info.success ? info.data : defaultDefectInfo('');
  }

  const line = rec.line ? { p1: { x: rec.line.p1[0], y: rec.line.p1[1] }, p2: { x: rec.line.p2[0], y: rec.line.p2[1] } } : null;
  return { mark, line };
}
