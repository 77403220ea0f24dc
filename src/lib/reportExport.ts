/**
 * Report documents are HWPX files (a zip of OWPML XML). Each report starts from a
 * template that carries literal placeholders in `Contents/section0.xml`; rendering
 * swaps those for XML-escaped values and re-zips the archive.
 */

import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';
import type { Part, Project, SubPart } from './project';
import { latestInspectionKey } from './project';
import { DefectInfoZ } from './marks';
import { displayIdNumber } from './faultEditor';

export type ReportKind = 'visualInspection' | 'defectDrawing';

export class ReportTemplateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportTemplateError';
  }
}

export interface DefectRow {
  no: number;
  location: string;
  member: string;
  defect_type: string;
  width_mm: number;
  length_m: number;
  count: number;
  progress: 'O' | 'X';
  note: string;
}

export interface ReportFile {
  fileName: string;
  bytes: Uint8Array;
}

/** Resolves a template archive, or null when none is installed. */
export type TemplateSource = (kind: ReportKind) => Promise<Uint8Array | null>;

export const PLACEHOLDERS = {
  title: '__TITLE__',
  subHeader: '__SUB_HEADER__',
  table: '__TABLE_JSON__',
  image: '__IMAGE_PATH__',
} as const;

const SECTION_ENTRY = 'contents/section0.xml';

const TABLE_COLUMNS = ['No', 'Location', 'Member', 'Type', 'Width (mm)', 'Length (m)', 'Count (EA)', 'Progress (O/X)', 'Remark'];

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function toNumber(text: string, fallback: number): number {
  const n = Number.parseFloat(text);
  return Number.isFinite(n) ? n : fallback;
}

function circleRecords(defects: Record<string, unknown>): { displayId: number | null; info: unknown }[] {
  const out: { displayId: number | null; info: unknown }[] = [];
  for (const rec of Object.values(defects)) {
    if (typeof rec !== 'object' || rec === null) continue;
    if (Reflect.get(rec, 'type') !== 'CircleMark') continue;
    const id: unknown = Reflect.get(rec, 'display_id');
    out.push({
      displayId: typeof id === 'number' || typeof id === 'string' ? displayIdNumber(id) : null,
      info: Reflect.get(rec, 'defect_info'),
    });
  }
  return out;
}

/** One row per circle, in display-id order; unnumbered circles follow in stored order. */
export function extractDefectRows(defects: Record<string, unknown>): DefectRow[] {
  const records = circleRecords(defects);
  const ordered = records
    .map((r, i) => ({ ...r, i }))
    .sort((a, b) => (a.displayId ?? Infinity) - (b.displayId ?? Infinity) || a.i - b.i);

  return ordered.map((r, idx) => {
    const parsed = DefectInfoZ.safeParse(r.info ?? {});
    if (!parsed.success) console.warn('[reportExport] unreadable defect info on row', idx + 1);
    const info = parsed.success ? parsed.data : DefectInfoZ.parse({});
    return {
      no: idx + 1,
      location: info.location,
      member: info.member,
      defect_type: info.defect_type,
      width_mm: toNumber(info.size.width_mm, 0),
      length_m: toNumber(info.size.length_m, 0),
      count: Math.trunc(toNumber(info.size.count_ea, 1)) || 1,
      progress: info.progress ? 'O' : 'X',
      note: info.remark,
    };
  });
}

export function baseFileName(project: Project, part: Part, sub: SubPart): string {
  return `${project.building.name || 'Project'}-${part.name || 'Part'}-${sub.name || 'SubPart'}`;
}

/** Copies the template archive with every placeholder in the section body replaced. */
export function renderTemplate(template: Uint8Array, replacements: Record<string, string>): Uint8Array {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(template);
  } catch (e) {
    throw new ReportTemplateError('Report template is not a readable HWPX archive', { cause: e });
  }

  const section = Object.keys(entries).find((name) => name.toLowerCase().endsWith(SECTION_ENTRY));
  if (!section) throw new ReportTemplateError(`Report template has no ${SECTION_ENTRY}`);

  let xml = strFromU8(entries[section]);
  for (const [key, value] of Object.entries(replacements)) {
    xml = xml.split(key).join(escapeXml(value));
  }
  return zipSync({ ...entries, [section]: strToU8(xml) });
}

async function requireTemplate(source: TemplateSource, kind: ReportKind): Promise<Uint8Array> {
  const template = await source(kind);
  if (!template) throw new ReportTemplateError(`Report template not found: ${kind}`);
  return template;
}

export async function exportVisualInspection(project: Project, part: Part, sub: SubPart, source: TemplateSource): Promise<ReportFile> {
  const key = latestInspectionKey(sub);
  const inspection = key === null ? null : sub.inspections[key];
  const rows = extractDefectRows(inspection?.defects ?? {});
  const table = { columns: TABLE_COLUMNS, rows };

  const bytes = renderTemplate(await requireTemplate(source, 'visualInspection'), {
    [PLACEHOLDERS.title]: '3.1.7 Visual inspection defects',
    [PLACEHOLDERS.subHeader]: `[${part.name} ${sub.name}] (${inspection?.name || key || ''})`,
    [PLACEHOLDERS.table]: JSON.stringify(table, null, 2),
  });
  return { fileName: `${baseFileName(project, part, sub)}-visual-inspection.hwpx`, bytes };
}

export async function exportDefectDrawing(project: Project, part: Part, sub: SubPart, source: TemplateSource): Promise<ReportFile> {
  const bytes = renderTemplate(await requireTemplate(source, 'defectDrawing'), {
    [PLACEHOLDERS.title]: 'Defect drawing',
    [PLACEHOLDERS.subHeader]: `[${part.name} ${sub.name}]`,
    [PLACEHOLDERS.image]: sub.image_path,
  });
  return { fileName: `${baseFileName(project, part, sub)}-defect-drawing.hwpx`, bytes };
}

/** Templates served beside the app under /templates. */
export const fetchTemplate: TemplateSource = async (kind) => {
  const name = kind === 'visualInspection' ? 'visual_inspection_template.hwpx' : 'defect_drawing_template.hwpx';
  const res = await fetch(`${import.meta.env.BASE_URL}templates/${name}`);
  if (!res.ok) return null;
  return new Uint8Array(await res.arrayBuffer());
};
