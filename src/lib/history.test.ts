import { describe, expect, it, vi } from 'vitest';
import { createHistory, structurallyEqual } from './history';

function setup() {
  const scene = { value: 0 };
  const onChange = vi.fn();
  const history = createHistory<number>({
    capture: () => scene.value,
    restore: (s) => {
      scene.value = s;
    },
    onChange,
  });
  history.resetBaseline(0);
  return { scene, history, onChange };
}

describe('structurallyEqual', () => {
  it('compares nested values and ignores undefined keys', () => {
    expect(structurallyEqual({ a: [1, { b: 2 }], c: undefined }, { a: [1, { b: 2 }] })).toBe(true);
    expect(structurallyEqual({ a: [1, 2] }, { a: [1, 3] })).toBe(false);
    expect(structurallyEqual([1], { 0: 1 })).toBe(false);
  });
});

describe('createHistory', () => {
  it('pushes one entry per changed edit session', () => {
    const { scene, history, onChange } = setup();
    history.beginEdit();
    scene.value = 1;
    history.endEdit();
    expect(history.depth()).toBe(2);
    expect(onChange).toHaveBeenCalledTimes(1);

    history.beginEdit();
    history.endEdit();
    expect(history.depth()).toBe(2);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('ignores endEdit without a session', () => {
    const { scene, history } = setup();
    scene.value = 5;
    history.endEdit();
    expect(history.depth()).toBe(1);
  });

  it('undoes and redoes as inverses', () => {
    const { scene, history } = setup();
    for (const v of [1, 2]) {
      history.beginEdit();
      scene.value = v;
      history.endEdit();
    }
    history.undo();
    expect(scene.value).toBe(1);
    history.undo();
    expect(scene.value).toBe(0);
    history.undo();
    expect(scene.value).toBe(0);
    expect(history.canUndo()).toBe(false);

    history.redo();
    history.redo();
    expect(scene.value).toBe(2);
    expect(history.canRedo()).toBe(false);
  });

  it('clears redo on a new edit', () => {
    const { scene, history } = setup();
    history.beginEdit();
    scene.value = 1;
    history.endEdit();
    history.undo();
    history.beginEdit();
    scene.value = 7;
    history.endEdit();
    expect(history.canRedo()).toBe(false);
  });

  it('does not record sessions opened during a replay', () => {
    const scene = { value: 0 };
    const history = createHistory<number>({
      capture: () => scene.value,
      restore: (s) => {
        history.beginEdit();
        scene.value = s;
        history.endEdit();
      },
      onChange: () => {},
    });
    history.resetBaseline(0);
    history.beginEdit();
    scene.value = 1;
    history.endEdit();
    history.undo();
    expect(history.depth()).toBe(1);
    expect(history.isEditing()).toBe(false);
  });

  it('drops an aborted session', () => {
    const { scene, history } = setup();
    history.beginEdit();
    scene.value = 3;
    history.abortEdit();
    history.endEdit();
    expect(history.depth()).toBe(1);
  });
});
