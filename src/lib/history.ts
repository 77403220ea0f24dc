/**
 * Undo/redo over whole-scene snapshots.
 *
 * The undo stack always holds at least the baseline (the state at load or last
 * save); its top is the current state. An edit session opened with `beginEdit` and
 * closed with `endEdit` pushes one snapshot, and only if the scene actually changed.
 */

export interface HistoryOptions<S> {
  capture: () => S;
  /** Tears the scene down and rebuilds it from `snapshot`. */
  restore: (snapshot: S) => void;
  /** Called when a snapshot is pushed and after every undo/redo. */
  onChange: () => void;
}

export interface HistoryHandle<S> {
  beginEdit(): void;
  endEdit(): void;
  abortEdit(): void;
  isEditing(): boolean;
  undo(): void;
  redo(): void;
  resetBaseline(snapshot: S): void;
  canUndo(): boolean;
  canRedo(): boolean;
  /** Entries on the undo stack, baseline included. */
  depth(): number;
}

export function structurallyEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((v, i) => structurallyEqual(v, b[i]));
  }
  const ka = Object.keys(a).filter((k) => Reflect.get(a, k) !== undefined);
  const kb = Object.keys(b).filter((k) => Reflect.get(b, k) !== undefined);
  if (ka.length !== kb.length) return false;
  return ka.every((k) => Object.prototype.hasOwnProperty.call(b, k) && structurallyEqual(Reflect.get(a, k), Reflect.get(b, k)));
}

export function createHistory<S>({ capture, restore, onChange }: HistoryOptions<S>): HistoryHandle<S> {
  const undoStack: S[] = [];
  const redoStack: S[] = [];
  let editing = false;
  let replaying = false;

  const replay = (snapshot: S) => {
    replaying = true;
    try {
      restore(snapshot);
    } finally {
      replaying = false;
    }
    editing = false;
    onChange();
  };

  return {
    beginEdit() {
      if (replaying) return;
      editing = true;
    },

    endEdit() {
      if (replaying || !editing) return;
      editing = false;
      const snapshot = capture();
      const top = undoStack[undoStack.length - 1];
      if (undoStack.length > 0 && structurallyEqual(top, snapshot)) return;
      undoStack.push(snapshot);
      redoStack.length = 0;
      onChange();
    },

    abortEdit() {
      if (replaying) return;
      editing = false;
    },

    isEditing: () => editing,

    undo() {
      if (undoStack.length < 2) return;
      const current = undoStack.pop();
      if (current === undefined) return;
      redoStack.push(current);
      replay(undoStack[undoStack.length - 1]);
    },

    redo() {
      const next = redoStack.pop();
      if (next === undefined) return;
      undoStack.push(next);
      replay(next);
    },

    resetBaseline(snapshot) {
      undoStack.length = 0;
      redoStack.length = 0;
      undoStack.push(snapshot);
      editing = false;
    },

    canUndo: () => undoStack.length >= 2,
    canRedo: () => redoStack.length > 0,
    depth: () => undoStack.length,
  };
}
