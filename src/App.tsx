import { useCallback, useEffect, useRef, useState } from 'react';
import FaultCanvas from './components/FaultCanvas';
import DefectDetailPanel from './components/DefectDetailPanel';
import ToolStrip from './components/ToolStrip';
import ProjectBrowser, { type BrowserSelection } from './components/ProjectBrowser';
import StatusBar from './components/StatusBar';
import { useFaultEditor } from './hooks/useFaultEditor';
import type { Project, SubPart } from './lib/project';
import { ProjectFileError, addSubPart, createEmptyProject, findPart, findSubPart, getInspectionDefects, newId, setInspectionDefects } from './lib/project';
import type { ProjectIndex } from './lib/persistence';
import { deletePlanImages, deleteProject, exportProjectFile, getImage, importProjectFile, loadIndex, loadProject, putImage, saveIndex, saveProject } from './lib/persistence';
import { downloadBytes, imageSize, isProjectFile, objectUrlFor, toStoredImage } from './lib/imageFile';
import { ReportTemplateError, exportDefectDrawing, exportVisualInspection, fetchTemplate } from './lib/reportExport';

const EMPTY_SELECTION: BrowserSelection = { partId: null, subpartId: null, inspectionKey: null };

interface EditingSession {
  partId: string;
  subpartId: string;
  inspectionKey: string;
}

function reportError(context: string, e: unknown) {
  console.error(`[app] ${context}`, e);
  const detail = e instanceof ProjectFileError || e instanceof ReportTemplateError ? `\n\n${e.message}` : '';
  window.alert(`${context}.${detail}`);
}

function isTyping(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  return target.tagName === 'INPUT' || target.tagName === 'TEXTAREA' || target.tagName === 'SELECT' || target.isContentEditable;
}

export default function App() {
  const importRef = useRef<HTMLInputElement>(null);
  const imageUrlRef = useRef<string | null>(null);

  const [index, setIndex] = useState<ProjectIndex>({});
  const [project, setProject] = useState<Project | null>(null);
  const [selection, setSelection] = useState<BrowserSelection>(EMPTY_SELECTION);
  const [editing, setEditing] = useState<EditingSession | null>(null);
  const [imageUrl, setImageUrl] = useState<string | null>(null);

  // Latest values for handlers that outlive a render (editor events, async loads).
  const projectRef = useRef(project);
  projectRef.current = project;
  const editingRef = useRef(editing);
  editingRef.current = editing;

  const { editor, version, dirty, zoom } = useFaultEditor();

  // ─── project state ──────────────────────────────────────────────────────

  const persist = useCallback((next: Project) => {
    projectRef.current = next;
    setProject(next);
    saveProject(next).catch((e: unknown) => reportError('Could not save the project', e));
  }, []);

  const mutate = useCallback(
    (fn: (draft: Project) => void) => {
      const current = projectRef.current;
      if (!current) return;
      const draft = structuredClone(current);
      fn(draft);
      persist(draft);
    },
    [persist]
  );

  const updateIndex = useCallback((next: ProjectIndex) => {
    setIndex(next);
    saveIndex(next).catch((e: unknown) => reportError('Could not save the project index', e));
  }, []);

  const confirmDiscard = useCallback(() => !editor.isDirty() || window.confirm('Discard unsaved defect changes?'), [editor]);

  const closeEditor = useCallback(() => {
    setEditing(null);
    if (imageUrlRef.current) URL.revokeObjectURL(imageUrlRef.current);
    imageUrlRef.current = null;
    setImageUrl(null);
  }, []);

  useEffect(() => {
    loadIndex()
      .then(setIndex)
      .catch((e: unknown) => reportError('Could not read the project index', e));
  }, []);

  useEffect(
    () => () => {
      if (imageUrlRef.current) URL.revokeObjectURL(imageUrlRef.current);
    },
    []
  );

  // Saved defect sets land in the inspection that is open in the editor.
  useEffect(
    () =>
      editor.on((event) => {
        if (event.type !== 'saveRequested') return;
        const session = editingRef.current;
        if (!session) return;
        mutate((draft) => {
          const part = findPart(draft, session.partId);
          const sub = part && findSubPart(part, session.subpartId);
          if (sub) setInspectionDefects(sub, session.inspectionKey, event.defects);
        });
      }),
    [editor, mutate]
  );

  const openProject = (id: string) => {
    if (!confirmDiscard()) return;
    loadProject(id)
      .then((p) => {
        persist(p);
        setSelection(EMPTY_SELECTION);
        closeEditor();
      })
      .catch((e: unknown) => reportError('Could not open the project', e));
  };

  const handleNewProject = () => {
    const name = window.prompt('Building name');
    if (!name?.trim()) return;
    if (!confirmDiscard()) return;
    const p = createEmptyProject({ name: name.trim() });
    persist(p);
    updateIndex({ ...index, [p.id]: p.building.name });
    setSelection(EMPTY_SELECTION);
    closeEditor();
  };

  const handleImport = (file: File | undefined) => {
    if (!file) return;
    if (!isProjectFile(file)) {
      window.alert('Choose a .json project file.');
      return;
    }
    if (!confirmDiscard()) return;
    file
      .text()
      .then((text) => {
        const p = importProjectFile(text);
        persist(p);
        updateIndex({ ...index, [p.id]: p.building.name || file.name });
        setSelection(EMPTY_SELECTION);
        closeEditor();
      })
      .catch((e: unknown) => reportError('Could not import the project file', e));
  };

  const handleExport = () => {
    if (!project) return;
    downloadBytes(`${project.building.name || 'project'}.json`, exportProjectFile(project), 'application/json');
  };

  const handleDeleteProject = () => {
    if (!project) return;
    if (!window.confirm(`Delete project "${project.building.name}"? This cannot be undone.`)) return;
    const rest = { ...index };
    delete rest[project.id];
    deleteProject(project).catch((e: unknown) => reportError('Could not delete the project', e));
    updateIndex(rest);
    setProject(null);
    projectRef.current = null;
    setSelection(EMPTY_SELECTION);
    closeEditor();
  };

  const handleAddSubPart = (partId: string, name: string, image: File) => {
    const key = newId('img');
    toStoredImage(image)
      .then((stored) => putImage(key, stored))
      .then(() =>
        mutate((draft) => {
          const part = findPart(draft, partId);
          if (part) addSubPart(part, name, key);
        })
      )
      .catch((e: unknown) => reportError('Could not store the plan image', e));
  };

  const handleSubPartsRemoved = (subparts: SubPart[]) => {
    deletePlanImages(subparts).catch((e: unknown) => reportError('Could not delete the plan image', e));
  };

  const handleSelect = (next: BrowserSelection) => {
    setSelection(next);
  };

  // ─── editor session ─────────────────────────────────────────────────────

  const handleEditDefects = () => {
    const { partId, subpartId, inspectionKey } = selection;
    const part = project && partId ? findPart(project, partId) : undefined;
    const sub = part && subpartId ? findSubPart(part, subpartId) : undefined;
    if (!part || !sub || !inspectionKey) return;
    if (!confirmDiscard()) return;

    getImage(sub.image_path)
      .then(async (stored) => {
        if (!stored) {
          window.alert('The plan image for this sub-part is missing.');
          return;
        }
        const url = objectUrlFor(stored);
        const size = await imageSize(url);
        if (imageUrlRef.current) URL.revokeObjectURL(imageUrlRef.current);
        imageUrlRef.current = url;
        setImageUrl(url);
        editor.openImage({ path: sub.image_path, width: size.width, height: size.height });
        editor.loadDefects(getInspectionDefects(sub, inspectionKey));
        setEditing({ partId: part.id, subpartId: sub.id, inspectionKey });
      })
      .catch((e: unknown) => reportError('Could not open the plan image', e));
  };

  const handleSave = useCallback(() => {
    if (!editingRef.current) return;
    if (!editor.isDirty()) {
      window.alert('No changes to save.');
      return;
    }
    editor.save();
  }, [editor]);

  const handleExportReports = () => {
    const part = project && selection.partId ? findPart(project, selection.partId) : undefined;
    const sub = part && selection.subpartId ? findSubPart(part, selection.subpartId) : undefined;
    if (!project || !part || !sub) return;
    Promise.all([exportVisualInspection(project, part, sub, fetchTemplate), exportDefectDrawing(project, part, sub, fetchTemplate)])
      .then((files) => {
        for (const f of files) downloadBytes(f.fileName, f.bytes, 'application/hwp+zip');
      })
      .catch((e: unknown) => reportError('Could not export the reports', e));
  };

  const closeDetail = useCallback(() => editor.hideDetail(), [editor]);

  // Keyboard shortcuts
  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      const typing = isTyping(e.target);
      const isMeta = e.metaKey || e.ctrlKey;
      const key = e.key.toLowerCase();

      if (isMeta && key === 's') {
        e.preventDefault();
        handleSave();
        return;
      }
      if (typing || !editingRef.current) return;

      if (isMeta && key === 'z' && !e.shiftKey) {
        e.preventDefault();
        editor.undo();
        return;
      }
      if (isMeta && (key === 'y' || (key === 'z' && e.shiftKey))) {
        e.preventDefault();
        editor.redo();
        return;
      }
      if (isMeta && key === '0') {
        e.preventDefault();
        editor.resetView();
        return;
      }
      if (e.key === 'Delete' || e.key === 'Backspace') {
        e.preventDefault();
        editor.deleteSelected();
        return;
      }
      if (e.key === 'Escape') editor.hideDetail();
    };
    window.addEventListener('keydown', onKeyDown);
    return () => window.removeEventListener('keydown', onKeyDown);
  }, [editor, handleSave]);

  const editingPart = project && editing ? findPart(project, editing.partId) : undefined;
  const editingSub = editingPart && editing ? findSubPart(editingPart, editing.subpartId) : undefined;
  const editingInspection = editingSub && editing ? editingSub.inspections[editing.inspectionKey] : undefined;
  const context = editingSub
    ? `${project?.building.name ?? ''} / ${editingPart?.name ?? ''} / ${editingSub.name} / ${editingInspection?.name ?? ''}`
    : 'No plan open';
  const detailId = editor.getDetailCircleId();

  return (
    <div className="h-screen flex flex-col overflow-hidden">
      {/* Header */}
      <header className="border-b border-slate-800 bg-slate-950/80 backdrop-blur-sm sticky top-0 z-50">
        <div className="px-6 py-3 flex items-center justify-between gap-4">
          <h1 className="text-lg font-bold text-white tracking-tight">
            Plan<span className="text-red-400">Defect</span>Marker
          </h1>

          <div className="flex items-center gap-2">
            <select
              aria-label="Project"
              value={project?.id ?? ''}
              onChange={(e) => e.target.value && openProject(e.target.value)}
              className="bg-slate-800 border border-slate-700 text-white text-xs rounded-md px-2 py-1.5 cursor-pointer outline-none hover:border-slate-500 focus:border-blue-500 transition-colors"
            >
              <option value="">Select a project…</option>
              {Object.entries(index).map(([id, name]) => (
                <option key={id} value={id}>{name}</option>
              ))}
            </select>
            <button className="px-3 py-1.5 rounded-md bg-blue-600 hover:bg-blue-500 text-white text-xs font-medium" onClick={handleNewProject}>New</button>
            <button className="px-3 py-1.5 rounded-md border border-slate-700 text-slate-300 hover:bg-slate-800 text-xs" onClick={() => importRef.current?.click()}>Import</button>
            <button className="px-3 py-1.5 rounded-md border border-slate-700 text-slate-300 hover:bg-slate-800 text-xs disabled:opacity-40" disabled={!project} onClick={handleExport}>Export</button>
            <button className="px-3 py-1.5 rounded-md border border-slate-700 text-red-300 hover:bg-slate-800 text-xs disabled:opacity-40" disabled={!project} onClick={handleDeleteProject}>Delete</button>
            <input
              ref={importRef}
              type="file"
              accept=".json,application/json"
              className="hidden"
              onChange={(e) => {
                handleImport(e.target.files?.[0]);
                e.target.value = '';
              }}
            />
          </div>
        </div>
      </header>

      {/* Main content */}
      <main className="flex-1 min-h-0 flex">
        {project && (
          <ProjectBrowser
            project={project}
            selection={selection}
            onSelect={handleSelect}
            onChange={mutate}
            onAddSubPart={handleAddSubPart}
            onSubPartsRemoved={handleSubPartsRemoved}
            onEditDefects={handleEditDefects}
            onExportReports={handleExportReports}
          />
        )}
        <div className="flex-1 min-w-0 flex flex-col">
          <div className="p-2">
            <ToolStrip
              tool={editor.getTool()}
              onToolChange={editor.setTool}
              editMode={editor.getEditMode()}
              onEditModeChange={editor.setEditMode}
              canUndo={editor.canUndo()}
              canRedo={editor.canRedo()}
              onUndo={editor.undo}
              onRedo={editor.redo}
              onDelete={editor.deleteSelected}
              onSave={handleSave}
              dirty={dirty}
            />
          </div>
          <FaultCanvas editor={editor} version={version} imageUrl={editing ? imageUrl : null} />
          {detailId && <DefectDetailPanel editor={editor} circleId={detailId} onClose={closeDetail} />}
        </div>
      </main>

      <StatusBar
        dirty={dirty}
        zoom={zoom}
        selectedCount={editor.getSelectedIds().length}
        markCount={editor.getMarks().length}
        nextDefectIndex={editor.getNextDefectIndex()}
        context={context}
      />
    </div>
  );
}
