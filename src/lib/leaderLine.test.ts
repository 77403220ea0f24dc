import { describe, expect, it } from 'vitest';
import { distance } from './geometry';
import { createCircleMark, createSquareMark } from './marks';
import { beginAttach, cancelAttach, confirmAttach, leaderTerminus, moveAnchor, restoreAttach, updateAttachPreview } from './leaderLine';

describe('leader lines', () => {
  it('previews straight to the pointer at reduced opacity', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    beginAttach(c, { x: 10, y: 10 });
    expect(c.leader?.opacity).toBe(0.4);
    updateAttachPreview(c, { x: 40, y: 50 });
    expect(c.leader?.p1).toEqual({ x: 10, y: 10 });
    expect(c.leader?.p2).toEqual({ x: 40, y: 50 });
  });

  it('ends on the outline once confirmed', () => {
    const s = createSquareMark({ x: 100, y: 100 });
    beginAttach(s, { x: 200, y: 100 });
    confirmAttach(s);
    expect(s.leader?.opacity).toBe(1);
    expect(s.leader?.p1).toEqual({ x: 200, y: 100 });
    expect(s.leader?.p2.x).toBeCloseTo(118);
    expect(s.leader?.p2.y).toBeCloseTo(100);
  });

  it('meets a circle at its radius', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    restoreAttach(c, { x: 100, y: 0 });
    const p2 = c.leader?.p2;
    if (!p2) throw new Error('expected a leader');
    expect(distance(p2, c.pos)).toBeCloseTo(18);
  });

  it('falls back to the centre when the anchor sits on it', () => {
    const c = createCircleMark({ x: 30, y: 40 });
    expect(leaderTerminus(c, { x: 30, y: 40 })).toEqual({ x: 30, y: 40 });
  });

  it('moves only the anchor end when the anchor is dragged', () => {
    const s = createSquareMark({ x: 100, y: 100 });
    restoreAttach(s, { x: 200, y: 100 });
    moveAnchor(s, { x: 100, y: 0 });
    expect(s.leader?.anchor).toEqual({ x: 100, y: 0 });
    expect(s.leader?.p1).toEqual({ x: 100, y: 0 });
    expect(s.leader?.p2.x).toBeCloseTo(100);
    expect(s.leader?.p2.y).toBeCloseTo(82);
  });

  it('detaches on cancel', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    beginAttach(c, { x: 5, y: 5 });
    cancelAttach(c);
    expect(c.leader).toBeNull();
  });
});
