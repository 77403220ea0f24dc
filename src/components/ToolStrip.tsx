import type { ReactNode } from 'react';
import type { EditMode, EditorTool } from '../lib/faultEditor';

interface ToolStripProps {
  tool: EditorTool;
  onToolChange: (tool: EditorTool) => void;
  editMode: EditMode;
  onEditModeChange: (mode: EditMode) => void;
  canUndo: boolean;
  canRedo: boolean;
  onUndo: () => void;
  onRedo: () => void;
  onDelete: () => void;
  onSave: () => void;
  dirty: boolean;
}

const btnClass = 'w-9 h-9 flex items-center justify-center rounded border transition-colors shrink-0 disabled:opacity-40 disabled:cursor-not-allowed';

function activeClass(selected: boolean) {
  if (selected) return 'bg-blue-600/80 border-blue-500 text-white';
  return 'border-slate-600/70 text-slate-400 hover:text-slate-200 hover:bg-slate-700/80';
}

/** Memo tools draw blue, defect shapes red, matching the canvas. */
function toolClass(tool: EditorTool, selected: boolean) {
  const memo = tool === 'memo_line' || tool === 'memo_free';
  if (selected) return memo ? 'bg-blue-600/80 border-blue-500 text-white' : 'bg-red-600/80 border-red-500 text-white';
  return memo
    ? 'border-slate-600/70 text-blue-400 hover:text-blue-300 hover:bg-slate-700/80'
    : 'border-slate-600/70 text-red-400 hover:text-red-300 hover:bg-slate-700/80';
}

const iconClass = 'w-4.5 h-4.5';

const TOOLS: { tool: EditorTool; label: string; icon: ReactNode }[] = [
  {
    tool: 'circle',
    label: 'Circle defect (hold and drag for a leader line)',
    icon: (
      <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
        <circle cx="12" cy="12" r="7" />
      </svg>
    ),
  },
  {
    tool: 'rect',
    label: 'Square',
    icon: (
      <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
        <rect x="5" y="5" width="14" height="14" />
      </svg>
    ),
  },
  {
    tool: 'tri',
    label: 'Triangle',
    icon: (
      <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
        <path d="M12 4L20 19H4Z" strokeLinejoin="round" />
      </svg>
    ),
  },
  {
    tool: 's',
    label: 'S-curve',
    icon: (
      <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
        <path d="M12 3C4 8 20 16 12 21" strokeLinecap="round" />
        <circle cx="12" cy="12" r="2.5" />
      </svg>
    ),
  },
  {
    tool: 'text',
    label: 'Note text',
    icon: <span className="text-[15px] font-bold leading-none tracking-tight select-none">Aa</span>,
  },
  {
    tool: 'memo_line',
    label: 'Memo line',
    icon: (
      <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2.5}>
        <path d="M4 20L20 4" strokeLinecap="round" />
      </svg>
    ),
  },
  {
    tool: 'memo_free',
    label: 'Memo freehand',
    icon: (
      <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
        <path d="M3 17c3-6 5 2 8-3s5-8 10-4" strokeLinecap="round" strokeLinejoin="round" />
      </svg>
    ),
  },
];

export default function ToolStrip({
  tool,
  onToolChange,
  editMode,
  onEditModeChange,
  canUndo,
  canRedo,
  onUndo,
  onRedo,
  onDelete,
  onSave,
  dirty,
}: ToolStripProps) {
  return (
    <div className="flex items-center gap-0.5 p-1 bg-slate-900/75 border border-slate-600/60 rounded-lg" role="toolbar" aria-label="Editor tools">
      {TOOLS.map((t) => (
        <button
          key={t.tool}
          onClick={() => onToolChange(t.tool)}
          className={`${btnClass} ${toolClass(t.tool, tool === t.tool)}`}
          data-tooltip={t.label}
          aria-label={t.label}
          aria-pressed={tool === t.tool}
        >
          {t.icon}
        </button>
      ))}

      {/* Divider */}
      <div className="w-px h-6 bg-slate-700/60 mx-1" />

      <button
        onClick={() => onEditModeChange(editMode === 'select' ? 'areaSelect' : 'select')}
        className={`${btnClass} ${activeClass(editMode === 'areaSelect')}`}
        data-tooltip="Area select"
        aria-label="Area select"
        aria-pressed={editMode === 'areaSelect'}
      >
        <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
          <rect x="4" y="4" width="16" height="16" strokeDasharray="3 2" />
        </svg>
      </button>

      <div className="w-px h-6 bg-slate-700/60 mx-1" />

      <button onClick={onUndo} disabled={!canUndo} className={`${btnClass} ${activeClass(false)}`} data-tooltip="Undo (Ctrl+Z)" aria-label="Undo">
        <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
          <path strokeLinecap="round" strokeLinejoin="round" d="M9 15 3 9m0 0 6-6M3 9h12a6 6 0 0 1 0 12h-3" />
        </svg>
      </button>
      <button onClick={onRedo} disabled={!canRedo} className={`${btnClass} ${activeClass(false)}`} data-tooltip="Redo (Ctrl+Y)" aria-label="Redo">
        <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
          <path strokeLinecap="round" strokeLinejoin="round" d="m15 15 6-6m0 0-6-6m6 6H9a6 6 0 0 0 0 12h3" />
        </svg>
      </button>
      <button onClick={onDelete} className={`${btnClass} ${activeClass(false)}`} data-tooltip="Delete selection (Del)" aria-label="Delete selection">
        <svg className={iconClass} fill="none" stroke="currentColor" viewBox="0 0 24 24" strokeWidth={2}>
          <path strokeLinecap="round" strokeLinejoin="round" d="M6 7h12M9 7V4h6v3m-8 0 1 13h8l1-13" />
        </svg>
      </button>

      <div className="w-px h-6 bg-slate-700/60 mx-1" />

      <button
        onClick={onSave}
        className={`px-3 h-9 rounded border text-xs font-medium transition-colors ${dirty ? 'bg-emerald-600 border-emerald-500 text-white hover:bg-emerald-500' : 'border-slate-600/70 text-slate-400 hover:bg-slate-700/80'}`}
        data-tooltip="Save (Ctrl+S)"
      >
        Save
      </button>
    </div>
  );
}
