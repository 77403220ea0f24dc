/**
 * Projects, the project index and plan images are kept in IndexedDB so a browser
 * session survives a reload. Project files move in and out as JSON.
 */

import { z } from 'zod';
import type { Project, SubPart } from './project';
import { ProjectFileError, parseProject } from './project';

const DB_NAME = 'PlanDefectMarker';
const DB_VERSION = 1;
const PROJECTS = 'projects';
const IMAGES = 'images';
const META = 'meta';
const INDEX_KEY = 'index';

type StoreName = typeof PROJECTS | typeof IMAGES | typeof META;

/** id → display name */
export type ProjectIndex = Record<string, string>;

export interface StoredImage {
  name: string;
  type: string;
  bytes: ArrayBuffer;
}

const ProjectIndexZ = z.record(z.string());

const StoredImageZ = z.object({
  name: z.string(),
  type: z.string(),
  bytes: z.instanceof(ArrayBuffer),
});

function openDB(): Promise<IDBDatabase> {
  return new Promise((resolve, reject) => {
    const req = indexedDB.open(DB_NAME, DB_VERSION);
    req.onerror = () => reject(req.error);
    req.onsuccess = () => resolve(req.result);
    req.onupgradeneeded = () => {
      const db = req.result;
      for (const name of [PROJECTS, IMAGES, META]) {
        if (!db.objectStoreNames.contains(name)) db.createObjectStore(name);
      }
    };
  });
}

function get(store: StoreName, key: string): Promise<unknown> {
  return openDB().then(
    (db) =>
      new Promise((resolve, reject) => {
        const t = db.transaction(store, 'readonly');
        const req = t.objectStore(store).get(key);
        req.onerror = () => reject(req.error);
        req.onsuccess = () => resolve(req.result);
        t.oncomplete = () => db.close();
      })
  );
}

function put(store: StoreName, key: string, value: unknown): Promise<void> {
  return openDB().then(
    (db) =>
      new Promise((resolve, reject) => {
        const t = db.transaction(store, 'readwrite');
        t.objectStore(store).put(value, key);
        t.onerror = () => reject(t.error);
        t.oncomplete = () => {
          db.close();
          resolve();
        };
      })
  );
}

function remove(store: StoreName, key: string): Promise<void> {
  return openDB().then(
    (db) =>
      new Promise((resolve, reject) => {
        const t = db.transaction(store, 'readwrite');
        t.objectStore(store).delete(key);
        t.onerror = () => reject(t.error);
        t.oncomplete = () => {
          db.close();
          resolve();
        };
      })
  );
}

export async function loadIndex(): Promise<ProjectIndex> {
  const raw = await get(META, INDEX_KEY).catch((e: unknown) => {
    throw new ProjectFileError('Could not read the project index', { cause: e });
  });
  if (raw === undefined) return {};
  const parsed = ProjectIndexZ.safeParse(raw);
  if (!parsed.success) throw new ProjectFileError('Project index is corrupt', { cause: parsed.error });
  return parsed.data;
}

export function saveIndex(index: ProjectIndex): Promise<void> {
  return put(META, INDEX_KEY, { ...index });
}

export async function loadProject(id: string): Promise<Project> {
  const raw = await get(PROJECTS, id).catch((e: unknown) => {
    throw new ProjectFileError(`Could not read project ${id}`, { cause: e });
  });
  if (raw === undefined) throw new ProjectFileError(`Project ${id} not found`);
  return parseProject(raw);
}

export function saveProject(project: Project): Promise<void> {
  return put(PROJECTS, project.id, structuredClone(project));
}

/** Removes the project record along with the plan image of every sub-part. */
export async function deleteProject(project: Project): Promise<void> {
  await deletePlanImages(project.parts.flatMap((p) => p.subparts));
  await remove(PROJECTS, project.id);
}

export function putImage(key: string, image: StoredImage): Promise<void> {
  return put(IMAGES, key, image);
}

export async function getImage(key: string): Promise<StoredImage | undefined> {
  const raw = await get(IMAGES, key);
  if (raw === undefined) return undefined;
  const parsed = StoredImageZ.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[persistence] image ${key} is unreadable`, parsed.error.issues);
    return undefined;
  }
  return parsed.data;
}

export async function deletePlanImages(subparts: SubPart[]): Promise<void> {
  for (const sp of subparts) {
    if (sp.image_path) await remove(IMAGES, sp.image_path);
  }
}

export function exportProjectFile(project: Project): string {
  return JSON.stringify(project, null, 2);
}

export function importProjectFile(text: string): Project {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ProjectFileError('Project file is not valid JSON', { cause: e });
  }
  return parseProject(raw);
}
