import { customAlphabet } from 'nanoid';
import { z } from 'zod';

/**
 * Project → Part → SubPart → inspections → defects.
 *
 * A sub-part is one plan image; each inspection on it holds one defect set keyed by
 * the marks' internal ids. Defect records stay opaque here and are validated when
 * the editor loads them.
 */

export type DefectRecords = Record<string, unknown>;

export interface BuildingInfo {
  name: string;
  address: string;
  location: string;
  memo: string;
  photos: string[];
}

export interface Inspection {
  name: string;
  /** yyyy-MM-dd */
  start_date: string;
  end_date?: string;
  defects: DefectRecords;
}

export interface SubPart {
  id: string;
  name: string;
  /** Key of the plan image in the image store. */
  image_path: string;
  inspections: Record<string, Inspection>;
}

export interface Part {
  id: string;
  name: string;
  subparts: SubPart[];
}

export interface Project {
  id: string;
  building: BuildingInfo;
  parts: Part[];
}

export const LEGACY_INSPECTION_KEY = 'DEFAULT';

export class ProjectFileError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProjectFileError';
  }
}

const hexId = customAlphabet('0123456789abcdef', 10);

export function newId(prefix: string): string {
  return `${prefix}_${hexId()}`;
}

// ─── schema ─────────────────────────────────────────────────────────────────

const TextZ = z.string().nullish().transform((v) => v ?? '');
const RecordsZ = z.record(z.unknown()).nullish();

const BuildingZ = z
  .object({
    name: TextZ,
    address: TextZ,
    location: TextZ,
    memo: TextZ,
    photos: z.array(z.string()).nullish().transform((v) => v ?? []),
  })
  .nullish();

const RawSubPartZ = z.object({
  id: z.string().optional(),
  name: TextZ,
  image_path: TextZ,
  inspections: z.record(z.record(z.unknown()).nullable()).nullish(),
  defects: RecordsZ,
});

const RawPartZ = z.object({
  id: z.string().optional(),
  name: TextZ,
  subparts: z.array(RawSubPartZ).optional(),
  image_path: TextZ,
  defects: RecordsZ,
});

const RawProjectZ = z.object({
  id: z.string().optional(),
  building: BuildingZ,
  parts: z.array(RawPartZ).nullish(),
});

export const InspectionMetaZ = z.object({
  name: z.string().trim().min(1, 'Inspection name is required'),
  start_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Start date is required (yyyy-MM-dd)'),
  end_date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional()
    .or(z.literal('').transform(() => undefined)),
});

export type InspectionMeta = z.input<typeof InspectionMetaZ>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

// ─── migration ──────────────────────────────────────────────────────────────

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * One inspection entry in canonical form. Entries from before inspections carried a
 * `defects` key held the defect records directly; those records move under `defects`.
 */
function normalizeInspection(key: string, raw: Record<string, unknown> | null | undefined): Inspection {
  const entry = raw ?? {};
  const text = (k: string) => {
    const v = entry[k];
    return typeof v === 'string' ? v : '';
  };

  let defects: DefectRecords;
  if ('defects' in entry) {
    defects = isPlainObject(entry.defects) ? { ...entry.defects } : {};
  } else {
    defects = {};
    for (const [k, v] of Object.entries(entry)) if (isPlainObject(v)) defects[k] = v;
  }

  const inspection: Inspection = { name: text('name') || key, start_date: text('start_date'), defects };
  const end = text('end_date');
  if (end) inspection.end_date = end;
  return inspection;
}

export function normalizeSubpartInspections(sp: SubPart): void {
  for (const [key, entry] of Object.entries(sp.inspections)) {
    sp.inspections[key] = normalizeInspection(key, { ...entry });
  }
}

function legacyInspections(defects: DefectRecords | null | undefined): Record<string, Inspection> {
  return { [LEGACY_INSPECTION_KEY]: normalizeInspection(LEGACY_INSPECTION_KEY, { defects: { ...(defects ?? {}) } }) };
}

/** Validates a project file and lifts every older layout into the current one. */
export function parseProject(raw: unknown): Project {
  const parsed = RawProjectZ.safeParse(raw);
  if (!parsed.success) {
    throw new ProjectFileError(`Invalid project file: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  const d = parsed.data;

  const parts: Part[] = (d.parts ?? []).map((p) => {
    let subparts: SubPart[];
    if (p.subparts) {
      subparts = p.subparts.map((sp) => {
        const inspections: Record<string, Inspection> = {};
        for (const [key, entry] of Object.entries(sp.inspections ?? {})) {
          inspections[key] = normalizeInspection(key, entry);
        }
        const migrated = sp.defects != null && Object.keys(inspections).length === 0;
        return {
          id: sp.id ?? newId('subpart'),
          name: sp.name,
          image_path: sp.image_path,
          inspections: migrated ? legacyInspections(sp.defects) : inspections,
        };
      });
    } else {
      // Oldest layout: the part itself held the plan and its defects.
      subparts = [{ id: newId('subpart'), name: p.name, image_path: p.image_path, inspections: legacyInspections(p.defects) }];
    }
    return { id: p.id ?? newId('part'), name: p.name, subparts };
  });

  const building: BuildingInfo = d.building ?? { name: '', address: '', location: '', memo: '', photos: [] };
  return { id: d.id ?? newId('proj'), building, parts };
}

export function createEmptyProject(building: Partial<BuildingInfo> = {}): Project {
  return {
    id: newId('proj'),
    building: { name: '', address: '', location: '', memo: '', photos: [], ...building },
    parts: [],
  };
}

// ─── inspections ────────────────────────────────────────────────────────────

export function ensureInspection(sp: SubPart, key: string): Inspection {
  const existing = sp.inspections[key];
  if (existing) return existing;
  const created = normalizeInspection(key, {});
  sp.inspections[key] = created;
  return created;
}

export function listInspections(sp: SubPart): string[] {
  return Object.keys(sp.inspections).sort();
}

export function getInspectionDefects(sp: SubPart, key: string): DefectRecords {
  return ensureInspection(sp, key).defects;
}

export function setInspectionDefects(sp: SubPart, key: string, defects: DefectRecords): void {
  ensureInspection(sp, key).defects = { ...defects };
}

export function copyInspection(sp: SubPart, src: string, dst: string, meta?: InspectionMeta): void {
  if (dst in sp.inspections) throw new Error(`inspection already exists: ${dst}`);
  const source = ensureInspection(sp, src);
  const copy: Inspection = structuredClone(source);
  if (meta) Object.assign(copy, InspectionMetaZ.parse(meta));
  sp.inspections[dst] = copy;
}

/** Adds an inspection under a fresh id. Throws a ZodError when the name or start date is missing. */
export function addInspection(sp: SubPart, meta: InspectionMeta): string {
  const { name, start_date, end_date } = InspectionMetaZ.parse(meta);
  const id = newId('insp');
  sp.inspections[id] = end_date ? { name, start_date, end_date, defects: {} } : { name, start_date, defects: {} };
  return id;
}

export function renameInspection(sp: SubPart, key: string, meta: InspectionMeta): void {
  const insp = sp.inspections[key];
  if (!insp) return;
  const { name, start_date, end_date } = InspectionMetaZ.parse(meta);
  insp.name = name;
  insp.start_date = start_date;
  if (end_date) insp.end_date = end_date;
  else delete insp.end_date;
}

export function deleteInspection(sp: SubPart, key: string): void {
  delete sp.inspections[key];
}

/** Latest by start date, ties broken by key. */
export function latestInspectionKey(sp: SubPart): string | null {
  let best: string | null = null;
  for (const key of Object.keys(sp.inspections)) {
    if (best === null) {
      best = key;
      continue;
    }
    const a = sp.inspections[key].start_date;
    const b = sp.inspections[best].start_date;
    if (a > b || (a === b && key > best)) best = key;
  }
  return best;
}

// ─── parts ──────────────────────────────────────────────────────────────────

export function findPart(project: Project, partId: string): Part | undefined {
  return project.parts.find((p) => p.id === partId);
}

export function findSubPart(part: Part, subpartId: string): SubPart | undefined {
  return part.subparts.find((s) => s.id === subpartId);
}

export function addPart(project: Project, name: string): Part {
  const part: Part = { id: newId('part'), name: name.trim(), subparts: [] };
  project.parts.push(part);
  return part;
}

export function renamePart(project: Project, partId: string, name: string): void {
  const part = findPart(project, partId);
  if (part) part.name = name.trim();
}

export function deletePart(project: Project, partId: string): void {
  project.parts = project.parts.filter((p) => p.id !== partId);
}

export function addSubPart(part: Part, name: string, imagePath: string): SubPart {
  const sub: SubPart = { id: newId('subpart'), name: name.trim(), image_path: imagePath, inspections: {} };
  part.subparts.push(sub);
  return sub;
}

export function renameSubPart(part: Part, subpartId: string, name: string): void {
  const sub = findSubPart(part, subpartId);
  if (sub) sub.name = name.trim();
}

export function deleteSubPart(part: Part, subpartId: string): void {
  part.subparts = part.subparts.filter((s) => s.id !== subpartId);
}
