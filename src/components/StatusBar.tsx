interface StatusBarProps {
  dirty: boolean;
  zoom: number;
  selectedCount: number;
  markCount: number;
  nextDefectIndex: number;
  context: string;
}

export default function StatusBar({ dirty, zoom, selectedCount, markCount, nextDefectIndex, context }: StatusBarProps) {
  return (
    <footer className="border-t border-slate-800 py-1.5 px-4 flex items-center gap-4 text-xs text-slate-500" aria-label="Status">
      <span className="flex-1 truncate">{context}</span>
      <span>{markCount} marks</span>
      <span>{selectedCount} selected</span>
      <span>next #{nextDefectIndex}</span>
      <span>{Math.round(zoom * 100)}%</span>
      <span className={dirty ? 'text-amber-400' : 'text-slate-600'}>{dirty ? 'Unsaved changes' : 'Saved'}</span>
    </footer>
  );
}
