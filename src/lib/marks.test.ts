import { describe, expect, it } from 'vitest';
import {
  createCircleMark,
  createNoteText,
  createSCurveMark,
  createShapeForTool,
  createSquareMark,
  defaultDefectInfo,
  hasLabel,
  hitTestMark,
  isKnownMarkType,
  labelLocalRect,
  markFromRecord,
  markToRecord,
  minCreateDistance,
  sceneBounds,
  setMarkScale,
} from './marks';

describe('factories', () => {
  it('maps each tool to its shape', () => {
    const at = { x: 0, y: 0 };
    expect(createShapeForTool('circle', at).kind).toBe('circle');
    expect(createShapeForTool('rect', at).kind).toBe('square');
    expect(createShapeForTool('tri', at).kind).toBe('triangle');
    expect(createShapeForTool('s', at).kind).toBe('scurve');
    expect(createShapeForTool('text', at).kind).toBe('text');
  });

  it('reports labels only on marks that carry one', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    expect(hasLabel(c)).toBe(false);
    c.label = { text: 'Wall' };
    expect(hasLabel(c)).toBe(true);
  });

  it('starts new notes with the default text', () => {
    expect(createNoteText({ x: 0, y: 0 }).text).toBe('Defect');
  });
});

describe('setMarkScale', () => {
  it('saturates circles at their bounds', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    expect(setMarkScale(c, 5)).toBe(2.5);
    expect(c.scale).toBe(2.5);
    expect(setMarkScale(c, 0.1)).toBe(0.6);
    expect(c.scale).toBe(0.6);
  });

  it('leaves other shapes unclamped but rejects non-positive scales', () => {
    const s = createSquareMark({ x: 0, y: 0 });
    expect(setMarkScale(s, 4)).toBe(4);
    expect(setMarkScale(s, 0)).toBe(4);
    expect(s.scale).toBe(4);
  });
});

describe('geometry', () => {
  it('needs a drag longer than the larger side plus margin', () => {
    expect(minCreateDistance(createCircleMark({ x: 0, y: 0 }))).toBe(46);
    expect(minCreateDistance(createSCurveMark({ x: 0, y: 0 }))).toBe(65);
  });

  it('hangs the label off the bottom-right corner', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    c.label = { text: 'Wall' };
    const r = labelLocalRect(c);
    expect(r?.x).toBeCloseTo(24);
    expect(r?.y).toBeCloseTo(0.4);
    expect(r?.w).toBeCloseTo(33.6);
    expect(r?.h).toBeCloseTo(19.6);
  });

  it('scales scene bounds with the mark', () => {
    const s = createSquareMark({ x: 100, y: 100 });
    s.scale = 2;
    expect(sceneBounds(s)).toEqual({ x: 64, y: 64, w: 72, h: 72 });
  });
});

describe('hitTestMark', () => {
  it('distinguishes body, label and miss', () => {
    const c = createCircleMark({ x: 100, y: 100 });
    c.label = { text: 'Wall' };
    expect(hitTestMark(c, { x: 110, y: 100 })).toBe('body');
    expect(hitTestMark(c, { x: 130, y: 110 })).toBe('label');
    expect(hitTestMark(c, { x: 100, y: 140 })).toBeNull();
  });

  it('ignores hidden marks', () => {
    const c = createCircleMark({ x: 0, y: 0 });
    c.visible = false;
    expect(hitTestMark(c, { x: 0, y: 0 })).toBeNull();
  });

  it('hits an S-curve on its mid circle or near its stroke only', () => {
    const s = createSCurveMark({ x: 0, y: 0 });
    expect(hitTestMark(s, { x: 0, y: 0 })).toBe('body');
    expect(hitTestMark(s, { x: 0, y: -27 })).toBe('body');
    expect(hitTestMark(s, { x: 20, y: -25 })).toBeNull();
  });
});

describe('records', () => {
  it('round-trips a circle with its defect record', () => {
    const c = createCircleMark({ x: 50, y: 60 });
    c.displayId = 3;
    c.scale = 1.5;
    c.rotation = 30;
    c.defectInfo = { ...defaultDefectInfo(), location: 'Roof' };

    const restored = markFromRecord(markToRecord(c));
    expect(restored?.line).toBeNull();
    const m = restored?.mark;
    expect(m?.kind).toBe('circle');
    if (m?.kind !== 'circle') return;
    expect(m.id).toBe(c.id);
    expect(m.pos).toEqual({ x: 50, y: 60 });
    expect(m.displayId).toBe(3);
    expect(m.scale).toBe(1.5);
    expect(m.rotation).toBe(30);
    expect(m.defectInfo).toEqual(c.defectInfo);
  });

  it('writes the current S-curve tag and reads the legacy one', () => {
    expect(markToRecord(createSCurveMark({ x: 0, y: 0 })).type).toBe('SCurveMark');
    const restored = markFromRecord({ type: 'SCurveWithMidCircle', x: 1, y: 2, w: 40, h: 50 });
    expect(restored?.mark.kind).toBe('scurve');
    expect(isKnownMarkType('SCurveWithMidCircle')).toBe(true);
  });

  it('drops unknown types and malformed fields', () => {
    expect(markFromRecord({ type: 'HexagonMark', x: 0, y: 0 })).toBeNull();
    expect(markFromRecord({ type: 'CircleMark', x: 'left' })).toBeNull();
    expect(markFromRecord('CircleMark')).toBeNull();
    expect(isKnownMarkType('HexagonMark')).toBe(false);
  });

  it('keeps prefixed display ids as stored', () => {
    const circle = markFromRecord({ type: 'CircleMark', display_id: 'D-4' });
    expect(circle?.mark.displayId).toBe('D-4');
    const square = markFromRecord({ type: 'SquareMark', display_id: 'D-4' });
    expect(square?.mark.displayId).toBe('D-4');
  });

  it('clamps a stored circle scale and fills defaults', () => {
    const restored = markFromRecord({ type: 'CircleMark', scale: 10 });
    expect(restored?.mark.scale).toBe(2.5);
    expect(restored?.mark.pos).toEqual({ x: 0, y: 0 });
  });

  it('coerces numeric defect fields to text', () => {
    const restored = markFromRecord({
      type: 'CircleMark',
      display_id: 1,
      defect_info: { member: 'Beam', size: { width_mm: 0.3, length_m: 2, count_ea: null } },
    });
    const m = restored?.mark;
    if (m?.kind !== 'circle') throw new Error('expected a circle');
    expect(m.defectInfo).toEqual({
      member: 'Beam',
      location: '',
      defect_type: '',
      size: { width_mm: '0.3', length_m: '2', count_ea: '' },
      progress: false,
      remark: '',
    });
  });

  it('returns the persisted leader endpoints', () => {
    const restored = markFromRecord({ type: 'SquareMark', x: 10, y: 10, line: { p1: [0, 0], p2: [5, 5] } });
    expect(restored?.line).toEqual({ p1: { x: 0, y: 0 }, p2: { x: 5, y: 5 } });
  });
});
