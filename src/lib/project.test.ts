import { describe, expect, it } from 'vitest';
import type { SubPart } from './project';
import {
  LEGACY_INSPECTION_KEY,
  ProjectFileError,
  addInspection,
  addPart,
  addSubPart,
  copyInspection,
  createEmptyProject,
  deletePart,
  getInspectionDefects,
  latestInspectionKey,
  listInspections,
  newId,
  normalizeSubpartInspections,
  parseProject,
  renameInspection,
  setInspectionDefects,
} from './project';

function subPart(inspections: SubPart['inspections'] = {}): SubPart {
  return { id: 'sp', name: 'S1', image_path: 'img_1', inspections };
}

describe('newId', () => {
  it('prefixes ten hex characters', () => {
    expect(newId('part')).toMatch(/^part_[0-9a-f]{10}$/);
  });
});

describe('parseProject', () => {
  it('lifts a part that holds its own plan into one sub-part', () => {
    const project = parseProject({
      id: 'p1',
      building: { name: 'Bldg' },
      parts: [{ id: 'a', name: 'Level 1', image_path: 'img_a', defects: { m1: { type: 'CircleMark' } } }],
    });
    const [part] = project.parts;
    expect(part.subparts).toHaveLength(1);
    const [sub] = part.subparts;
    expect(sub.name).toBe('Level 1');
    expect(sub.image_path).toBe('img_a');
    expect(sub.inspections[LEGACY_INSPECTION_KEY].defects).toEqual({ m1: { type: 'CircleMark' } });
    expect(project.building).toEqual({ name: 'Bldg', address: '', location: '', memo: '', photos: [] });
  });

  it('moves sub-part defects under the default inspection', () => {
    const project = parseProject({
      parts: [{ name: 'P', subparts: [{ id: 's', name: 'S', image_path: 'i', defects: { m2: { x: 1 } } }] }],
    });
    const sub = project.parts[0].subparts[0];
    expect(Object.keys(sub.inspections)).toEqual([LEGACY_INSPECTION_KEY]);
    expect(sub.inspections[LEGACY_INSPECTION_KEY]).toEqual({ name: LEGACY_INSPECTION_KEY, start_date: '', defects: { m2: { x: 1 } } });
  });

  it('moves records of an inspection entry without a defects key', () => {
    const project = parseProject({
      parts: [
        {
          name: 'P',
          subparts: [
            {
              name: 'S',
              inspections: {
                spring: { name: 'Spring', start_date: '2024-03-01', end_date: '2024-03-05', m1: { type: 'CircleMark' } },
                empty: null,
              },
            },
          ],
        },
      ],
    });
    const { inspections } = project.parts[0].subparts[0];
    expect(inspections.spring).toEqual({
      name: 'Spring',
      start_date: '2024-03-01',
      end_date: '2024-03-05',
      defects: { m1: { type: 'CircleMark' } },
    });
    expect(inspections.empty).toEqual({ name: 'empty', start_date: '', defects: {} });
  });

  it('assigns ids that are missing', () => {
    const project = parseProject({ parts: [{ name: 'P', subparts: [] }] });
    expect(project.id).toMatch(/^proj_/);
    expect(project.parts[0].id).toMatch(/^part_/);
  });

  it('reports the offending field', () => {
    expect(() => parseProject({ parts: 'x' })).toThrow(ProjectFileError);
    expect(() => parseProject({ parts: 'x' })).toThrow(/^Invalid project file: parts: /);
  });
});

describe('normalizeSubpartInspections', () => {
  it('keeps canonical entries as they are', () => {
    const sp = subPart({ a: { name: 'A', start_date: '2024-01-01', defects: { m: {} } } });
    normalizeSubpartInspections(sp);
    expect(sp.inspections.a).toEqual({ name: 'A', start_date: '2024-01-01', defects: { m: {} } });
  });
});

describe('inspections', () => {
  it('creates inspections on first access', () => {
    const sp = subPart();
    expect(getInspectionDefects(sp, 'x')).toEqual({});
    setInspectionDefects(sp, 'x', { m1: { type: 'CircleMark' } });
    expect(sp.inspections.x.defects).toEqual({ m1: { type: 'CircleMark' } });
  });

  it('copies defects deeply and refuses to overwrite', () => {
    const sp = subPart({ a: { name: 'A', start_date: '2024-01-01', defects: { m: { note: 'one' } } } });
    copyInspection(sp, 'a', 'b', { name: 'B', start_date: '2024-06-01' });
    expect(sp.inspections.b.name).toBe('B');
    expect(sp.inspections.b.start_date).toBe('2024-06-01');
    expect(sp.inspections.b.defects).toEqual({ m: { note: 'one' } });
    expect(sp.inspections.b.defects).not.toBe(sp.inspections.a.defects);
    expect(() => copyInspection(sp, 'a', 'b')).toThrow('inspection already exists: b');
  });

  it('validates new inspections', () => {
    const sp = subPart();
    const id = addInspection(sp, { name: 'Autumn', start_date: '2024-10-01', end_date: '' });
    expect(id).toMatch(/^insp_/);
    expect(sp.inspections[id]).toEqual({ name: 'Autumn', start_date: '2024-10-01', defects: {} });
    expect(() => addInspection(sp, { name: '  ', start_date: '2024-10-01' })).toThrow('Inspection name is required');
    expect(() => addInspection(sp, { name: 'X', start_date: '10/01/2024' })).toThrow('Start date is required');
  });

  it('drops the end date when renamed without one', () => {
    const sp = subPart({ a: { name: 'A', start_date: '2024-01-01', end_date: '2024-01-09', defects: {} } });
    renameInspection(sp, 'a', { name: ' Winter ', start_date: '2024-01-02', end_date: '' });
    expect(sp.inspections.a).toEqual({ name: 'Winter', start_date: '2024-01-02', defects: {} });
  });

  it('lists keys in order and picks the latest by start date', () => {
    const sp = subPart({
      c: { name: 'C', start_date: '2024-05-01', defects: {} },
      a: { name: 'A', start_date: '2024-05-01', defects: {} },
      b: { name: 'B', start_date: '2023-12-31', defects: {} },
    });
    expect(listInspections(sp)).toEqual(['a', 'b', 'c']);
    expect(latestInspectionKey(sp)).toBe('c');
    expect(latestInspectionKey(subPart())).toBeNull();
  });
});

describe('parts', () => {
  it('adds and removes parts and sub-parts', () => {
    const project = createEmptyProject({ name: 'Bldg' });
    const part = addPart(project, ' Level 2 ');
    const sub = addSubPart(part, 'North', 'img_9');
    expect(part.name).toBe('Level 2');
    expect(sub).toEqual({ id: sub.id, name: 'North', image_path: 'img_9', inspections: {} });
    deletePart(project, part.id);
    expect(project.parts).toEqual([]);
  });
});
