import { useRef, useState } from 'react';
import type { Part, Project, SubPart } from '../lib/project';
import {
  InspectionMetaZ,
  addInspection,
  addPart,
  copyInspection,
  deleteInspection,
  deletePart,
  deleteSubPart,
  findPart,
  findSubPart,
  listInspections,
  newId,
  renameInspection,
  renamePart,
  renameSubPart,
} from '../lib/project';
import { isImageFile } from '../lib/imageFile';

export interface BrowserSelection {
  partId: string | null;
  subpartId: string | null;
  inspectionKey: string | null;
}

interface ProjectBrowserProps {
  project: Project;
  selection: BrowserSelection;
  onSelect: (selection: BrowserSelection) => void;
  /** Applies `mutate` to a copy of the project synchronously, then persists it. */
  onChange: (mutate: (draft: Project) => void) => void;
  onAddSubPart: (partId: string, name: string, image: File) => void;
  /** Sub-parts that left the project, so their plan images can go too. */
  onSubPartsRemoved: (subparts: SubPart[]) => void;
  onEditDefects: () => void;
  onExportReports: () => void;
}

const rowClass = 'flex items-center gap-1 px-2 py-1 rounded cursor-pointer text-sm';
const smallBtn = 'px-1.5 py-0.5 text-[11px] rounded border border-slate-600/70 text-slate-300 hover:bg-slate-700/80';
const inputClass = 'w-full px-2 py-1 text-xs bg-slate-800 border border-slate-700 rounded text-white focus:border-blue-500 focus:outline-none';

function rowState(selected: boolean) {
  return selected ? 'bg-blue-600/30 text-white' : 'text-slate-300 hover:bg-slate-800';
}

function InspectionForm({ onSubmit, onCancel }: { onSubmit: (meta: { name: string; start_date: string; end_date?: string }) => void; onCancel: () => void }) {
  const [name, setName] = useState('');
  const [start, setStart] = useState('');
  const [end, setEnd] = useState('');
  const [error, setError] = useState<string | null>(null);

  const submit = () => {
    const parsed = InspectionMetaZ.safeParse({ name, start_date: start, end_date: end });
    if (!parsed.success) {
      setError(parsed.error.issues[0]?.message ?? 'Invalid inspection');
      return;
    }
    onSubmit(parsed.data);
  };

  return (
    <div className="space-y-1 p-2 border border-slate-700 rounded bg-slate-900" aria-label="New inspection">
      <input className={inputClass} aria-label="Inspection name" placeholder="Name" value={name} onChange={(e) => setName(e.target.value)} />
      <input className={inputClass} aria-label="Start date" type="date" value={start} onChange={(e) => setStart(e.target.value)} />
      <input className={inputClass} aria-label="End date" type="date" value={end} onChange={(e) => setEnd(e.target.value)} />
      {error && <p role="alert" className="text-[11px] text-red-400">{error}</p>}
      <div className="flex gap-1 justify-end">
        <button className={smallBtn} onClick={onCancel}>Cancel</button>
        <button className={smallBtn} onClick={submit}>Add</button>
      </div>
    </div>
  );
}

export default function ProjectBrowser({ project, selection, onSelect, onChange, onAddSubPart, onSubPartsRemoved, onEditDefects, onExportReports }: ProjectBrowserProps) {
  const fileRef = useRef<HTMLInputElement>(null);
  const pendingPartRef = useRef<string | null>(null);
  const [addingInspection, setAddingInspection] = useState(false);

  const part: Part | undefined = selection.partId ? findPart(project, selection.partId) : undefined;
  const sub: SubPart | undefined = part && selection.subpartId ? findSubPart(part, selection.subpartId) : undefined;

  const withSubPart = (draft: Project, fn: (sp: SubPart) => void) => {
    const p = part && findPart(draft, part.id);
    const sp = p && sub ? findSubPart(p, sub.id) : undefined;
    if (sp) fn(sp);
  };

  const handleAddPart = () => {
    const name = window.prompt('Part name');
    if (!name?.trim()) return;
    let id: string | null = null;
    onChange((draft) => {
      id = addPart(draft, name).id;
    });
    onSelect({ partId: id, subpartId: null, inspectionKey: null });
  };

  const handlePickImage = (partId: string) => {
    pendingPartRef.current = partId;
    fileRef.current?.click();
  };

  const handleImageChosen = (file: File | undefined) => {
    const partId = pendingPartRef.current;
    pendingPartRef.current = null;
    if (!file || !partId) return;
    if (!isImageFile(file)) {
      window.alert('Choose an image file for the plan.');
      return;
    }
    const name = window.prompt('Sub-part name', file.name.replace(/\.[^.]+$/, ''));
    if (!name?.trim()) return;
    onAddSubPart(partId, name, file);
  };

  const handleAddInspection = (meta: { name: string; start_date: string; end_date?: string }) => {
    let key: string | null = null;
    onChange((draft) =>
      withSubPart(draft, (sp) => {
        key = addInspection(sp, meta);
      })
    );
    setAddingInspection(false);
    onSelect({ ...selection, inspectionKey: key });
  };

  const handleCopyInspection = () => {
    const src = selection.inspectionKey;
    if (!sub || !src) {
      window.alert('Select an inspection to copy.');
      return;
    }
    const name = window.prompt('Name for the copy', `${sub.inspections[src]?.name ?? src} (copy)`);
    if (!name?.trim()) return;
    const dst = newId('insp');
    onChange((draft) => withSubPart(draft, (sp) => copyInspection(sp, src, dst, { name, start_date: sp.inspections[src]?.start_date ?? '' })));
    onSelect({ ...selection, inspectionKey: dst });
  };

  const handleRenameInspection = (key: string) => {
    const insp = sub?.inspections[key];
    if (!insp) return;
    const name = window.prompt('Inspection name', insp.name);
    if (!name?.trim()) return;
    const meta = { name, start_date: insp.start_date, end_date: insp.end_date ?? '' };
    if (!InspectionMetaZ.safeParse(meta).success) {
      window.alert('This inspection needs a start date (yyyy-MM-dd).');
      return;
    }
    onChange((draft) => withSubPart(draft, (sp) => renameInspection(sp, key, meta)));
  };

  const handleEditDefects = () => {
    if (!sub || !selection.inspectionKey) {
      window.alert('Select an inspection before editing defects.');
      return;
    }
    onEditDefects();
  };

  return (
    <aside className="w-72 shrink-0 flex flex-col gap-3 p-3 border-r border-slate-800 bg-slate-950/60 overflow-y-auto" aria-label="Project browser">
      <input ref={fileRef} type="file" accept="image/*" className="hidden" onChange={(e) => handleImageChosen(e.target.files?.[0])} />

      {/* ─── parts ─── */}
      <section>
        <div className="flex items-center justify-between mb-1">
          <h2 className="text-xs font-semibold uppercase tracking-wide text-slate-500">Parts</h2>
          <button className={smallBtn} onClick={handleAddPart}>+ Part</button>
        </div>
        {project.parts.length === 0 && <p className="text-xs text-slate-600">No parts yet.</p>}
        {project.parts.map((p) => (
          <div key={p.id}>
            <div className={`${rowClass} ${rowState(p.id === selection.partId && !selection.subpartId)}`} onClick={() => onSelect({ partId: p.id, subpartId: null, inspectionKey: null })}>
              <span className="flex-1 truncate font-medium">{p.name || '(unnamed)'}</span>
              <button
                className={smallBtn}
                onClick={(e) => {
                  e.stopPropagation();
                  const name = window.prompt('Part name', p.name);
                  if (name?.trim()) onChange((draft) => renamePart(draft, p.id, name));
                }}
              >
                Rename
              </button>
              <button
                className={smallBtn}
                onClick={(e) => {
                  e.stopPropagation();
                  if (!window.confirm(`Delete part "${p.name}" and its sub-parts?`)) return;
                  onChange((draft) => deletePart(draft, p.id));
                  onSubPartsRemoved(p.subparts);
                  if (selection.partId === p.id) onSelect({ partId: null, subpartId: null, inspectionKey: null });
                }}
              >
                Delete
              </button>
            </div>
            <div className="ml-3">
              {p.subparts.map((s) => (
                <div
                  key={s.id}
                  className={`${rowClass} ${rowState(s.id === selection.subpartId)}`}
                  onClick={() => onSelect({ partId: p.id, subpartId: s.id, inspectionKey: null })}
                >
                  <span className="flex-1 truncate">{s.name || '(unnamed)'}</span>
                  <button
                    className={smallBtn}
                    onClick={(e) => {
                      e.stopPropagation();
                      const name = window.prompt('Sub-part name', s.name);
                      if (!name?.trim()) return;
                      onChange((draft) => {
                        const dp = findPart(draft, p.id);
                        if (dp) renameSubPart(dp, s.id, name);
                      });
                    }}
                  >
                    Rename
                  </button>
                  <button
                    className={smallBtn}
                    onClick={(e) => {
                      e.stopPropagation();
                      if (!window.confirm(`Delete sub-part "${s.name}"?`)) return;
                      onChange((draft) => {
                        const dp = findPart(draft, p.id);
                        if (dp) deleteSubPart(dp, s.id);
                      });
                      onSubPartsRemoved([s]);
                      if (selection.subpartId === s.id) onSelect({ partId: p.id, subpartId: null, inspectionKey: null });
                    }}
                  >
                    Delete
                  </button>
                </div>
              ))}
              <button className={`${smallBtn} mt-0.5`} onClick={() => handlePickImage(p.id)}>
                + Sub-part
              </button>
            </div>
          </div>
        ))}
      </section>

      {/* ─── inspections ─── */}
      {sub && (
        <section>
          <div className="flex items-center justify-between mb-1">
            <h2 className="text-xs font-semibold uppercase tracking-wide text-slate-500">Inspections</h2>
            <div className="flex gap-1">
              <button className={smallBtn} onClick={() => setAddingInspection(true)}>+ New</button>
              <button className={smallBtn} onClick={handleCopyInspection}>Copy</button>
            </div>
          </div>
          {addingInspection && <InspectionForm onSubmit={handleAddInspection} onCancel={() => setAddingInspection(false)} />}
          {listInspections(sub).map((key) => {
            const insp = sub.inspections[key];
            return (
              <div key={key} className={`${rowClass} ${rowState(key === selection.inspectionKey)}`} onClick={() => onSelect({ ...selection, inspectionKey: key })}>
                <span className="flex-1 truncate">
                  {insp.name}
                  <span className="ml-1 text-[11px] text-slate-500">{insp.start_date}{insp.end_date ? ` ~ ${insp.end_date}` : ''}</span>
                </span>
                <button
                  className={smallBtn}
                  onClick={(e) => {
                    e.stopPropagation();
                    handleRenameInspection(key);
                  }}
                >
                  Rename
                </button>
                <button
                  className={smallBtn}
                  onClick={(e) => {
                    e.stopPropagation();
                    if (!window.confirm(`Delete inspection "${insp.name}"?`)) return;
                    onChange((draft) => withSubPart(draft, (sp) => deleteInspection(sp, key)));
                    if (selection.inspectionKey === key) onSelect({ ...selection, inspectionKey: null });
                  }}
                >
                  Delete
                </button>
              </div>
            );
          })}
        </section>
      )}

      <div className="mt-auto flex flex-col gap-1.5">
        <button className="px-3 py-2 rounded bg-blue-600 hover:bg-blue-500 text-white text-sm font-medium" onClick={handleEditDefects}>
          Edit defects
        </button>
        <button className="px-3 py-2 rounded border border-slate-600 text-slate-300 hover:bg-slate-800 text-sm" disabled={!sub} onClick={onExportReports}>
          Export reports
        </button>
      </div>
    </aside>
  );
}
