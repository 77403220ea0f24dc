// @vitest-environment node
import 'fake-indexeddb/auto';
import { describe, expect, it } from 'vitest';
import {
  deletePlanImages,
  deleteProject,
  exportProjectFile,
  getImage,
  importProjectFile,
  loadIndex,
  loadProject,
  putImage,
  saveIndex,
  saveProject,
} from './persistence';
import { ProjectFileError, addPart, addSubPart, createEmptyProject, setInspectionDefects } from './project';

function sampleProject() {
  const project = createEmptyProject({ name: 'Bldg' });
  const part = addPart(project, 'Level 1');
  const sub = addSubPart(part, 'East', 'img_east');
  setInspectionDefects(sub, 'DEFAULT', { m1: { type: 'CircleMark', x: 10, y: 20, display_id: 1 } });
  return project;
}

describe('persistence', () => {
  it('starts with an empty index and stores it', async () => {
    expect(await loadIndex()).toEqual({});
    await saveIndex({ proj_a: 'Tower A' });
    expect(await loadIndex()).toEqual({ proj_a: 'Tower A' });
  });

  it('saves, loads and deletes a project', async () => {
    const project = sampleProject();
    await saveProject(project);
    expect(await loadProject(project.id)).toEqual(project);

    await deleteProject(project);
    await expect(loadProject(project.id)).rejects.toThrow(`Project ${project.id} not found`);
  });

  it('removes plan images along with their project', async () => {
    const project = sampleProject();
    const image = { name: 'east.png', type: 'image/png', bytes: new ArrayBuffer(2) };
    await putImage('img_east', image);
    await putImage('img_other', image);
    await saveProject(project);

    await deleteProject(project);
    expect(await getImage('img_east')).toBeUndefined();
    expect(await getImage('img_other')).toBeDefined();
  });

  it('removes the images of deleted sub-parts', async () => {
    const project = sampleProject();
    await putImage('img_east', { name: 'east.png', type: 'image/png', bytes: new ArrayBuffer(2) });
    await deletePlanImages(project.parts[0].subparts);
    expect(await getImage('img_east')).toBeUndefined();
  });

  it('rejects an unknown project id', async () => {
    await expect(loadProject('proj_missing')).rejects.toBeInstanceOf(ProjectFileError);
  });

  it('round-trips image bytes', async () => {
    const bytes = new ArrayBuffer(4);
    new Uint8Array(bytes).set([1, 2, 3, 4]);
    await putImage('img_1', { name: 'plan.png', type: 'image/png', bytes });
    const image = await getImage('img_1');
    expect(image?.name).toBe('plan.png');
    expect(image?.type).toBe('image/png');
    expect(Array.from(new Uint8Array(image?.bytes ?? new ArrayBuffer(0)))).toEqual([1, 2, 3, 4]);
    expect(await getImage('img_none')).toBeUndefined();
  });
});

describe('project files', () => {
  it('exports indented JSON and imports it back', () => {
    const project = sampleProject();
    const text = exportProjectFile(project);
    expect(text.split('\n')[1]).toBe(`  "id": "${project.id}",`);
    expect(importProjectFile(text)).toEqual(project);
  });

  it('wraps JSON syntax errors', () => {
    let caught: unknown;
    try {
      importProjectFile('{ not json');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProjectFileError);
    if (!(caught instanceof ProjectFileError)) return;
    expect(caught.message).toBe('Project file is not valid JSON');
    expect(caught.cause).toBeInstanceOf(SyntaxError);
  });
});
