import type { Point, Rect } from './geometry';
import { distance, normalizeRect, rectsIntersect } from './geometry';
import type { CircleMark, DefectInfo, DefectMark, Mark, MarkHit, MarkRecord, ShapeTool } from './marks';
import {
  createCircleMark,
  createShapeForTool,
  defaultDefectInfo,
  hasLeaderLine,
  hitTestMark,
  isSerializableMark,
  markFromRecord,
  markToRecord,
  minCreateDistance,
  sceneBounds,
  sceneBoundsCenter,
  setCircleDisplayId,
  setMarkScale,
} from './marks';
import type { MemoMark, MemoRecord } from './memo';
import {
  addPathPoint,
  createMemoLine,
  createMemoPath,
  hitTestMemo,
  isUndersizedMemo,
  memoFromRecord,
  memoIntersectsRect,
  memoToRecord,
} from './memo';
import {
  beginAttach,
  cancelAttach,
  confirmAttach,
  moveAnchor,
  recomputeLeaderGeometry,
  restoreAttach,
} from './leaderLine';
import { createDeadlineTimer } from './deadline';
import { createHistory } from './history';
import {
  ANCHOR_HANDLE_RADIUS_PX,
  EDIT_END_DEBOUNCE_MS,
  PRESS_HOLD_MS,
  WHEEL_PAN_FACTOR,
  WHEEL_SCALE_STEP,
  WHEEL_ZOOM_STEP,
} from './editorConfig';

export type EditMode = 'select' | 'areaSelect';
export type DragMode = 'none' | 'create' | 'move' | 'moveAnchor';
export type EditorTool = 'memo_line' | 'memo_free' | ShapeTool;

export function isBasicTool(tool: EditorTool): tool is ShapeTool {
  return tool !== 'memo_line' && tool !== 'memo_free';
}

export interface Modifiers {
  ctrl: boolean;
  shift: boolean;
}

const NO_MODIFIERS: Modifiers = { ctrl: false, shift: false };

/** Pointer input in scene coordinates. Wheel deltas follow the DOM sign: negative is away from the user. */
export type Intent =
  | { type: 'press'; at: Point; mods?: Modifiers }
  | { type: 'move'; at: Point; pressed?: boolean }
  | { type: 'release'; at: Point }
  | { type: 'doubleClick'; at: Point }
  | { type: 'wheel'; at: Point; deltaX?: number; deltaY: number; mods?: Modifiers };

/** Collaborator that owns the document state outside the canvas. */
export interface EditorHost {
  markDirty(): void;
  /** Zoom relative to the fitted view; 1 means fitted. */
  setZoom(zoom: number): void;
}

export type EditorEvent =
  | { type: 'dirtyChanged'; dirty: boolean }
  | { type: 'saveRequested'; defects: DefectMapping }
  | { type: 'requestOpenDefectDetail'; circleId: string };

export interface BackgroundImage {
  path: string;
  width: number;
  height: number;
}

export interface SceneSnapshot {
  image_path: string | null;
  items: MarkRecord[];
  memos: MemoRecord[];
  version: 1;
}

export interface DefectSet {
  items: MarkRecord[];
}

/** Saved form: records keyed by their internal id. */
export type DefectMapping = Record<string, MarkRecord>;

export interface ViewTransform {
  scale: number;
  tx: number;
  ty: number;
}

export interface Viewport {
  width: number;
  height: number;
}

export type InlineEdit = { kind: 'label' | 'text'; id: string };

type DragState =
  | { mode: 'none' }
  | { mode: 'create'; pressAt: Point; id: string }
  | { mode: 'move'; id: string; grab: Point; moved: boolean }
  | { mode: 'moveAnchor'; id: string; moved: boolean };

export interface DefectInfoPatch extends Partial<Omit<DefectInfo, 'size'>> {
  size?: Partial<DefectInfo['size']>;
}

export interface FaultEditorOptions {
  host: EditorHost;
  now?: () => number;
}

export interface FaultEditorHandle {
  dispatch(intent: Intent): void;
  tick(now?: number): void;

  openImage(image: BackgroundImage): void;
  getBackground(): BackgroundImage | null;
  loadDefects(defects: unknown): void;
  getDefects(): DefectSet;
  save(): DefectMapping;
  isDirty(): boolean;

  getMarks(): Mark[];
  getMark(id: string): Mark | undefined;
  getSelectedIds(): string[];
  getDragMode(): DragMode;
  getEditMode(): EditMode;
  setEditMode(mode: EditMode): void;
  getTool(): EditorTool;
  setTool(tool: EditorTool): void;
  getHoverAnchor(): { id: string; at: Point } | null;
  getRubberBand(): Rect | null;
  getNextDefectIndex(): number;

  deleteSelected(): void;
  renumberCircleIds(): void;
  resetDragState(): void;

  captureSnapshot(): SceneSnapshot;
  restoreSnapshot(snapshot: SceneSnapshot): void;
  undo(): void;
  redo(): void;
  canUndo(): boolean;
  canRedo(): boolean;

  showDetailFor(circleId: string): void;
  hideDetail(): void;
  getDetailCircleId(): string | null;
  updateDefectInfo(circleId: string, patch: DefectInfoPatch): void;
  getInlineEdit(): InlineEdit | null;
  beginLabelEdit(id: string): void;
  commitLabelEdit(id: string, text: string): void;
  beginTextEdit(id: string): void;
  commitTextEdit(id: string, text: string): void;
  cancelInlineEdit(): void;

  getView(): ViewTransform;
  getZoom(): number;
  fitView(viewport: Viewport): void;
  resetView(): void;
  screenToScene(p: Point): Point;

  on(listener: (event: EditorEvent) => void): () => void;
  subscribe(listener: () => void): () => void;
  getVersion(): number;
}

/** Numeric tail of a display id: 7 → 7, "D-12" → 12, anything else → null. */
export function displayIdNumber(id: DefectMark['displayId']): number | null {
  if (typeof id === 'number') return Number.isFinite(id) ? id : null;
  if (typeof id !== 'string') return null;
  const tail = id.split('-').pop() ?? '';
  return /^\s*[+-]?\d+\s*$/.test(tail) ? Number.parseInt(tail, 10) : null;
}

function readDefectRecords(defects: unknown): unknown[] {
  if (typeof defects !== 'object' || defects === null) return [];
  if (Array.isArray(defects)) return defects;
  const items: unknown = Reflect.get(defects, 'items');
  if (Array.isArray(items)) return items;
  return Object.values(defects);
}

export function createFaultEditor({ host, now = () => performance.now() }: FaultEditorOptions): FaultEditorHandle {
  const marks = new Map<string, Mark>();
  const selected = new Set<string>();
  const listeners = new Set<(event: EditorEvent) => void>();
  const renderers = new Set<() => void>();

  let background: BackgroundImage | null = null;
  let editMode: EditMode = 'select';
  let tool: EditorTool = 'circle';
  let drag: DragState = { mode: 'none' };
  let pressing = false;
  let pendingPress: Point | null = null;
  let band: { from: Point; to: Point } | null = null;
  let hoverAnchor: { id: string; at: Point } | null = null;
  let nextDefectIndex = 1;
  let detailCircleId: string | null = null;
  let inlineEdit: InlineEdit | null = null;
  let dirty = false;
  let version = 0;

  let view: ViewTransform = { scale: 1, tx: 0, ty: 0 };
  let baseScale = 1;
  let viewport: Viewport | null = null;

  const pressTimer = createDeadlineTimer(PRESS_HOLD_MS);
  const editEndTimer = createDeadlineTimer(EDIT_END_DEBOUNCE_MS);

  const emit = (event: EditorEvent) => {
    for (const l of listeners) l(event);
  };

  const changed = () => {
    version++;
    for (const r of renderers) r();
  };

  const markDirty = () => {
    host.markDirty();
    if (!dirty) {
      dirty = true;
      emit({ type: 'dirtyChanged', dirty: true });
    }
    changed();
  };

  const setClean = () => {
    if (dirty) {
      dirty = false;
      emit({ type: 'dirtyChanged', dirty: false });
    }
  };

  // ─── scene queries ──────────────────────────────────────────────────────

  const defectMarks = (): DefectMark[] => {
    const out: DefectMark[] = [];
    for (const m of marks.values()) if (isSerializableMark(m)) out.push(m);
    return out;
  };

  const circles = (): CircleMark[] => {
    const out: CircleMark[] = [];
    for (const m of marks.values()) if (m.kind === 'circle') out.push(m);
    return out;
  };

  const findCircle = (id: string): CircleMark | null => {
    const m = marks.get(id);
    return m && m.kind === 'circle' ? m : null;
  };

  const creatingId = () => (drag.mode === 'create' ? drag.id : null);

  type SceneHit = { kind: 'mark'; mark: DefectMark; part: MarkHit } | { kind: 'memo'; memo: MemoMark };

  /** Topmost visible item under `p`; later insertions are drawn on top. */
  const hitAt = (p: Point): SceneHit | null => {
    const all = [...marks.values()];
    for (let i = all.length - 1; i >= 0; i--) {
      const m = all[i];
      if (isSerializableMark(m)) {
        const part = hitTestMark(m, p);
        if (part) return { kind: 'mark', mark: m, part };
      } else if (hitTestMemo(m, p)) {
        return { kind: 'memo', memo: m };
      }
    }
    return null;
  };

  /** Every hit mark counts, not only the topmost item. */
  const canCreateAt = (p: Point, exclude: string | null = null): boolean =>
    !defectMarks().some((m) => m.id !== exclude && hitTestMark(m, p) !== null);

  const sceneDistFromPx = (px: number) => px / (view.scale || 1);

  const calcNextDefectIndex = (): number => {
    let max = 0;
    for (const m of defectMarks()) {
      const n = displayIdNumber(m.displayId);
      if (n !== null) max = Math.max(max, n);
    }
    return max + 1;
  };

  const renumberCircleIds = () => {
    const numbered = circles().filter((c): c is CircleMark & { displayId: number } => typeof c.displayId === 'number');
    numbered.sort((a, b) => a.displayId - b.displayId);
    numbered.forEach((c, i) => {
      if (c.displayId !== i + 1) setCircleDisplayId(c, i + 1);
    });
  };

  const initDefectFor = (mark: DefectMark) => {
    if (mark.kind !== 'circle') return;
    setCircleDisplayId(mark, nextDefectIndex);
    nextDefectIndex++;
    mark.defectInfo = defaultDefectInfo();
    mark.label = { text: mark.defectInfo.member };
  };

  // ─── history ────────────────────────────────────────────────────────────

  const captureSnapshot = (): SceneSnapshot => {
    const skip = creatingId();
    const items: MarkRecord[] = [];
    const memos: MemoRecord[] = [];
    for (const m of marks.values()) {
      if (m.id === skip) continue;
      if (isSerializableMark(m)) items.push(markToRecord(m));
      else memos.push(memoToRecord(m));
    }
    return { image_path: background?.path ?? null, items, memos, version: 1 };
  };

  const restoreItem = (raw: unknown) => {
    const restored = markFromRecord(raw);
    if (!restored) {
      const type: unknown = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'type') : undefined;
      console.warn('[faultEditor] dropped unreadable mark record', type);
      return;
    }
    const { mark, line } = restored;
    if (mark.kind === 'circle') {
      if (mark.displayId) mark.label = { text: mark.defectInfo?.member ?? '' };
    } else if (mark.displayId) {
      mark.label = { text: String(mark.displayId) };
    }
    if (line && hasLeaderLine(mark)) restoreAttach(mark, line.p1);
    marks.set(mark.id, mark);
  };

  const clearScene = () => {
    marks.clear();
    selected.clear();
    drag = { mode: 'none' };
    pressTimer.stop();
    pressing = false;
    pendingPress = null;
    band = null;
    hoverAnchor = null;
    inlineEdit = null;
  };

  const restoreSnapshot = (snapshot: SceneSnapshot) => {
    const keepDetail = detailCircleId;
    clearScene();
    for (const rec of snapshot.items) restoreItem(rec);
    for (const rec of snapshot.memos) {
      const memo = memoFromRecord(rec);
      if (memo) marks.set(memo.id, memo);
      else console.warn('[faultEditor] dropped unreadable memo record');
    }
    nextDefectIndex = calcNextDefectIndex();
    detailCircleId = keepDetail && findCircle(keepDetail) ? keepDetail : null;
    changed();
  };

  const history = createHistory<SceneSnapshot>({
    capture: captureSnapshot,
    restore: restoreSnapshot,
    onChange: markDirty,
  });

  /** Closes a coalesced session still waiting on its deadline before a new gesture starts. */
  const flushPendingEdit = () => {
    if (!editEndTimer.isActive()) return;
    editEndTimer.stop();
    history.endEdit();
  };

  /**
   * Records `apply` as its own undo step. A session already open for a gesture is
   * closed around the step and reopened, so the gesture still lands as one step.
   */
  const commitStep = (apply: () => void) => {
    const reopen = history.isEditing();
    if (reopen) history.endEdit();
    history.beginEdit();
    apply();
    history.endEdit();
    if (reopen) history.beginEdit();
  };

  // ─── drag state machine ─────────────────────────────────────────────────

  const resetDragState = () => {
    drag = { mode: 'none' };
    pressTimer.stop();
    pressing = false;
    pendingPress = null;
    band = null;
  };

  /** Drops a creation in progress along with its edit session. */
  const discardCreation = () => {
    const id = creatingId();
    if (id === null) return;
    const m = marks.get(id);
    if (m && hasLeaderLine(m)) cancelAttach(m);
    marks.delete(id);
    history.abortEdit();
  };

  const updateHover = (p: Point) => {
    const radius = sceneDistFromPx(ANCHOR_HANDLE_RADIUS_PX);
    let best: { id: string; at: Point } | null = null;
    let bestDist = Infinity;
    for (const m of marks.values()) {
      if (!hasLeaderLine(m) || !m.leader) continue;
      const d = distance(p, m.leader.anchor);
      if (d < radius && d < bestDist) {
        best = { id: m.id, at: { ...m.leader.anchor } };
        bestDist = d;
      }
    }
    const prev = hoverAnchor;
    hoverAnchor = best;
    if (prev?.id !== best?.id || (best !== null && prev !== null && distance(prev.at, best.at) > 0)) changed();
  };

  const toggleSelected = (id: string) => {
    if (selected.has(id)) selected.delete(id);
    else selected.add(id);
  };

  const selectOnly = (id: string) => {
    selected.clear();
    selected.add(id);
  };

  const beginDragCreate = () => {
    if (tool !== 'circle' || drag.mode !== 'none' || editMode !== 'select') return;
    if (!pressing || !pendingPress) return;
    history.beginEdit();
    const at = pendingPress;
    pressing = false;
    pendingPress = null;

    const circle = createCircleMark(at);
    circle.visible = false;
    circle.displayId = nextDefectIndex;
    beginAttach(circle, at);
    marks.set(circle.id, circle);
    drag = { mode: 'create', pressAt: at, id: circle.id };
    changed();
  };

  const onPress = (at: Point, mods: Modifiers) => {
    if (!background) return;
    flushPendingEdit();

    if (hoverAnchor) {
      const target = marks.get(hoverAnchor.id);
      if (target && hasLeaderLine(target) && target.leader) {
        if (distance(at, target.leader.anchor) <= sceneDistFromPx(ANCHOR_HANDLE_RADIUS_PX)) {
          history.beginEdit();
          drag = { mode: 'moveAnchor', id: target.id, moved: false };
          changed();
          return;
        }
      }
    }

    const hit = hitAt(at);

    if (hit?.kind === 'memo') {
      if (editMode === 'areaSelect' || mods.ctrl || mods.shift) toggleSelected(hit.memo.id);
      else selectOnly(hit.memo.id);
      changed();
      return;
    }

    if (editMode === 'areaSelect') {
      if (hit) toggleSelected(hit.mark.id);
      else {
        selected.clear();
        band = { from: at, to: at };
      }
      changed();
      return;
    }

    selected.clear();

    if (hit) {
      selected.add(hit.mark.id);
      history.beginEdit();
      drag = { mode: 'move', id: hit.mark.id, grab: { x: hit.mark.pos.x - at.x, y: hit.mark.pos.y - at.y }, moved: false };
      changed();
      return;
    }

    if (tool === 'memo_line' || tool === 'memo_free') {
      pressTimer.stop();
      pressing = false;
      pendingPress = null;
      history.beginEdit();
      const memo = tool === 'memo_line' ? createMemoLine(at) : createMemoPath(at);
      marks.set(memo.id, memo);
      drag = { mode: 'create', pressAt: at, id: memo.id };
      changed();
      return;
    }

    pressing = true;
    pendingPress = { ...at };
    pressTimer.start(now());
    changed();
  };

  const onMove = (at: Point, pressed: boolean) => {
    if (band) {
      band = { from: band.from, to: at };
      changed();
      return;
    }

    switch (drag.mode) {
      case 'none':
        updateHover(at);
        return;

      case 'moveAnchor': {
        const m = marks.get(drag.id);
        if (!m || !hasLeaderLine(m)) return;
        moveAnchor(m, at);
        drag.moved = true;
        hoverAnchor = { id: m.id, at: { ...at } };
        changed();
        return;
      }

      case 'move': {
        const m = marks.get(drag.id);
        if (!m || !isSerializableMark(m)) return;
        const next = { x: at.x + drag.grab.x, y: at.y + drag.grab.y };
        if (next.x === m.pos.x && next.y === m.pos.y) return;
        m.pos = next;
        drag.moved = true;
        if (hasLeaderLine(m)) recomputeLeaderGeometry(m);
        changed();
        return;
      }

      case 'create': {
        const m = marks.get(drag.id);
        if (!m) return;
        if (m.kind === 'memoLine') {
          m.p2 = { ...at };
        } else if (m.kind === 'memoPath') {
          addPathPoint(m, at);
        } else if (m.kind === 'circle' && pressed) {
          m.pos = { ...at };
          m.visible = true;
          recomputeLeaderGeometry(m);
        } else {
          return;
        }
        changed();
        return;
      }
    }
  };

  const onRelease = (at: Point) => {
    if (band) {
      const r = normalizeRect(band.from, at);
      selected.clear();
      for (const m of marks.values()) {
        const hits = isSerializableMark(m) ? m.visible && rectsIntersect(sceneBounds(m), r) : memoIntersectsRect(m, r);
        if (hits) selected.add(m.id);
      }
      band = null;
      changed();
      return;
    }

    const current = drag;

    if (current.mode === 'create') {
      const m = marks.get(current.id);
      if (m && !isSerializableMark(m)) {
        if (isUndersizedMemo(m)) {
          discardCreation();
          resetDragState();
          changed();
          return;
        }
        resetDragState();
        history.endEdit();
        markDirty();
        return;
      }
    }

    if (current.mode === 'move' || current.mode === 'moveAnchor') {
      const m = marks.get(current.id);
      if (current.mode === 'move' && m && hasLeaderLine(m)) recomputeLeaderGeometry(m);
      editEndTimer.start(now());
      resetDragState();
      if (current.moved) markDirty();
      else changed();
      return;
    }

    pressTimer.stop();
    pressing = false;
    pendingPress = null;

    if (current.mode === 'create') {
      const m = marks.get(current.id);
      if (!m || !isSerializableMark(m)) {
        resetDragState();
        return;
      }
      const tooShort = m.kind !== 'text' && distance(current.pressAt, at) < minCreateDistance(m);
      if (tooShort || !canCreateAt(current.pressAt, m.id)) {
        discardCreation();
        resetDragState();
        changed();
        return;
      }
      m.pos = { ...at };
      m.visible = true;
      if (hasLeaderLine(m)) confirmAttach(m);
      initDefectFor(m);
      resetDragState();
      history.endEdit();
      markDirty();
      return;
    }

    resetDragState();
    changed();
  };

  const routeDoubleClick = (hit: { mark: DefectMark; part: MarkHit }) => {
    const { mark, part } = hit;
    if (mark.kind === 'text') {
      beginTextEdit(mark.id);
      return;
    }
    if (mark.kind !== 'circle') return;
    if (part === 'label') {
      beginLabelEdit(mark.id);
      return;
    }
    emit({ type: 'requestOpenDefectDetail', circleId: mark.id });
  };

  const onDoubleClick = (at: Point) => {
    pressTimer.stop();
    pressing = false;
    pendingPress = null;
    if (!background) return;

    const hit = hitAt(at);
    if (hit?.kind === 'mark') {
      routeDoubleClick(hit);
      return;
    }
    if (!isBasicTool(tool) || editMode !== 'select' || !canCreateAt(at)) return;

    history.beginEdit();
    const mark = createShapeForTool(tool, at);
    marks.set(mark.id, mark);
    initDefectFor(mark);
    selectOnly(mark.id);
    history.endEdit();
    markDirty();
  };

  const zoomBy = (factor: number) => {
    const cx = (viewport?.width ?? 0) / 2;
    const cy = (viewport?.height ?? 0) / 2;
    view = {
      scale: view.scale * factor,
      tx: cx - (cx - view.tx) * factor,
      ty: cy - (cy - view.ty) * factor,
    };
    host.setZoom(view.scale / baseScale);
    changed();
  };

  const onWheel = (deltaX: number, deltaY: number, mods: Modifiers) => {
    if (deltaY === 0 && deltaX === 0) return;
    const grow = deltaY < 0;

    if (mods.ctrl) {
      const targets = [...selected].map((id) => marks.get(id)).filter((m): m is DefectMark => !!m && isSerializableMark(m));
      if (targets.length === 0) return;
      if (!history.isEditing()) history.beginEdit();
      const factor = grow ? WHEEL_SCALE_STEP : 1 / WHEEL_SCALE_STEP;
      for (const m of targets) {
        // Scale about the bounding-box centre; notes are anchored at their top-left.
        const before = sceneBoundsCenter(m);
        setMarkScale(m, m.scale * factor);
        const after = sceneBoundsCenter(m);
        m.pos = { x: m.pos.x + before.x - after.x, y: m.pos.y + before.y - after.y };
        if (hasLeaderLine(m)) recomputeLeaderGeometry(m);
      }
      editEndTimer.start(now());
      changed();
      return;
    }

    if (mods.shift) {
      zoomBy(grow ? WHEEL_ZOOM_STEP : 1 / WHEEL_ZOOM_STEP);
      return;
    }

    view = { ...view, tx: view.tx - deltaX * WHEEL_PAN_FACTOR, ty: view.ty - deltaY * WHEEL_PAN_FACTOR };
    changed();
  };

  // ─── detail / label editing ─────────────────────────────────────────────

  function beginLabelEdit(id: string) {
    const c = findCircle(id);
    if (!c || !c.label) return;
    inlineEdit = { kind: 'label', id };
    changed();
  }

  function beginTextEdit(id: string) {
    const m = marks.get(id);
    if (!m || m.kind !== 'text') return;
    inlineEdit = { kind: 'text', id };
    changed();
  }

  const fitToViewport = () => {
    if (!background || !viewport) return;
    const s = Math.min(viewport.width / background.width, viewport.height / background.height);
    if (!(s > 0) || !Number.isFinite(s)) return;
    baseScale = s;
    view = {
      scale: s,
      tx: (viewport.width - background.width * s) / 2,
      ty: (viewport.height - background.height * s) / 2,
    };
    host.setZoom(1);
    changed();
  };

  return {
    dispatch(intent) {
      switch (intent.type) {
        case 'press':
          onPress(intent.at, intent.mods ?? NO_MODIFIERS);
          return;
        case 'move':
          onMove(intent.at, intent.pressed ?? true);
          return;
        case 'release':
          onRelease(intent.at);
          return;
        case 'doubleClick':
          onDoubleClick(intent.at);
          return;
        case 'wheel':
          onWheel(intent.deltaX ?? 0, intent.deltaY, intent.mods ?? NO_MODIFIERS);
          return;
      }
    },

    tick(at = now()) {
      if (pressTimer.poll(at)) beginDragCreate();
      if (editEndTimer.poll(at)) {
        history.endEdit();
        changed();
      }
    },

    openImage(image) {
      editEndTimer.stop();
      history.abortEdit();
      clearScene();
      detailCircleId = null;
      background = { ...image };
      nextDefectIndex = 1;
      history.resetBaseline(captureSnapshot());
      fitToViewport();
      changed();
    },

    getBackground: () => background,

    loadDefects(defects) {
      editEndTimer.stop();
      history.abortEdit();
      clearScene();
      detailCircleId = null;
      for (const rec of readDefectRecords(defects)) restoreItem(rec);
      nextDefectIndex = calcNextDefectIndex();
      history.resetBaseline(captureSnapshot());
      setClean();
      changed();
    },

    getDefects: () => ({ items: defectMarks().map(markToRecord) }),

    save() {
      flushPendingEdit();
      const defects: DefectMapping = {};
      for (const m of defectMarks()) defects[m.id] = markToRecord(m);
      history.resetBaseline(captureSnapshot());
      emit({ type: 'saveRequested', defects });
      setClean();
      changed();
      return defects;
    },

    isDirty: () => dirty,

    getMarks: () => [...marks.values()],
    getMark: (id) => marks.get(id),
    getSelectedIds: () => [...selected],
    getDragMode: () => drag.mode,
    getEditMode: () => editMode,

    setEditMode(mode) {
      if (mode === editMode) return;
      discardCreation();
      resetDragState();
      editMode = mode;
      changed();
    },

    getTool: () => tool,

    setTool(next) {
      if (next === tool) return;
      discardCreation();
      resetDragState();
      tool = next;
      changed();
    },

    getHoverAnchor: () => hoverAnchor,
    getRubberBand: () => (band ? normalizeRect(band.from, band.to) : null),
    getNextDefectIndex: () => nextDefectIndex,

    deleteSelected() {
      if (selected.size === 0) return;
      flushPendingEdit();
      history.beginEdit();
      for (const id of selected) {
        marks.delete(id);
        if (detailCircleId === id) detailCircleId = null;
        if (hoverAnchor?.id === id) hoverAnchor = null;
        if (inlineEdit?.id === id) inlineEdit = null;
      }
      renumberCircleIds();
      nextDefectIndex = calcNextDefectIndex();
      selected.clear();
      history.endEdit();
      markDirty();
    },

    renumberCircleIds() {
      renumberCircleIds();
      changed();
    },

    resetDragState() {
      resetDragState();
      changed();
    },

    captureSnapshot,
    restoreSnapshot,

    undo() {
      flushPendingEdit();
      history.undo();
    },

    redo() {
      flushPendingEdit();
      history.redo();
    },

    canUndo: () => history.canUndo(),
    canRedo: () => history.canRedo(),

    showDetailFor(circleId) {
      if (!findCircle(circleId)) return;
      selectOnly(circleId);
      detailCircleId = circleId;
      changed();
    },

    hideDetail() {
      if (detailCircleId === null) return;
      detailCircleId = null;
      changed();
    },

    getDetailCircleId: () => detailCircleId,

    updateDefectInfo(circleId, patch) {
      const c = findCircle(circleId);
      if (!c) return;
      if (!history.isEditing()) history.beginEdit();
      const info = c.defectInfo ?? defaultDefectInfo('');
      const { size, ...rest } = patch;
      c.defectInfo = { ...info, ...rest, size: { ...info.size, ...size } };
      if (c.label) c.label.text = c.defectInfo.member;
      else if (c.displayId !== null) c.label = { text: c.defectInfo.member };
      editEndTimer.start(now());
      markDirty();
    },

    getInlineEdit: () => inlineEdit,
    beginLabelEdit,

    commitLabelEdit(id, text) {
      if (inlineEdit?.kind !== 'label' || inlineEdit.id !== id) return;
      inlineEdit = null;
      const c = findCircle(id);
      const label = c?.label;
      if (!c || !label || (label.text === text && c.defectInfo?.member === text)) {
        changed();
        return;
      }
      commitStep(() => {
        c.defectInfo = { ...(c.defectInfo ?? defaultDefectInfo('')), member: text };
        label.text = text;
      });
      markDirty();
    },

    beginTextEdit,

    commitTextEdit(id, text) {
      if (inlineEdit?.kind !== 'text' || inlineEdit.id !== id) return;
      inlineEdit = null;
      const m = marks.get(id);
      if (!m || m.kind !== 'text' || m.text === text) {
        changed();
        return;
      }
      commitStep(() => {
        m.text = text;
      });
      markDirty();
    },

    cancelInlineEdit() {
      if (!inlineEdit) return;
      inlineEdit = null;
      changed();
    },

    getView: () => view,
    getZoom: () => view.scale / baseScale,

    fitView(next) {
      viewport = { ...next };
      fitToViewport();
    },

    resetView() {
      fitToViewport();
      host.setZoom(1);
    },

    screenToScene: (p) => ({ x: (p.x - view.tx) / view.scale, y: (p.y - view.ty) / view.scale }),

    on(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    subscribe(listener) {
      renderers.add(listener);
      return () => {
        renderers.delete(listener);
      };
    },

    getVersion: () => version,
  };
}
