import { useEffect, useRef, useSyncExternalStore } from 'react';
import type { DefectInfoPatch, FaultEditorHandle } from '../lib/faultEditor';
import { defaultDefectInfo } from '../lib/marks';

interface DefectDetailPanelProps {
  editor: FaultEditorHandle;
  circleId: string;
  /** Called on a pointer press outside the panel. */
  onClose: () => void;
}

const inputClass = 'w-full px-2 py-1 text-sm bg-white border border-slate-300 rounded text-slate-900 focus:border-blue-500 focus:outline-none';
const labelClass = 'text-xs font-semibold text-slate-700 shrink-0';

/** Non-modal editor for one circle's defect record. Every keystroke is committed. */
export default function DefectDetailPanel({ editor, circleId, onClose }: DefectDetailPanelProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const memberRef = useRef<HTMLInputElement>(null);
  const locationRef = useRef<HTMLInputElement>(null);
  const typeRef = useRef<HTMLInputElement>(null);
  useSyncExternalStore(editor.subscribe, editor.getVersion);

  const mark = editor.getMark(circleId);
  const info = mark?.kind === 'circle' ? mark.defectInfo ?? defaultDefectInfo('') : null;

  useEffect(() => {
    const onMouseDown = (e: MouseEvent) => {
      if (e.target instanceof Node && containerRef.current?.contains(e.target)) return;
      onClose();
    };
    document.addEventListener('mousedown', onMouseDown);
    return () => document.removeEventListener('mousedown', onMouseDown);
  }, [onClose]);

  // Focus the first field still to be filled in when the panel opens for a circle.
  useEffect(() => {
    const target = [memberRef, locationRef, typeRef].find((r) => !r.current?.value.trim());
    target?.current?.focus();
  }, [circleId]);

  if (!info) return null;

  const commit = (patch: DefectInfoPatch) => editor.updateDefectInfo(circleId, patch);

  return (
    <div ref={containerRef} role="dialog" aria-label="Defect details" className="shrink-0 bg-slate-50 border-t border-slate-400 px-3 py-2.5 space-y-2">
      <div className="flex items-center gap-2">
        <label className={labelClass} htmlFor="defect-member">Member</label>
        <input id="defect-member" ref={memberRef} className={`${inputClass} flex-[2]`} placeholder="e.g. Wall" value={info.member} onChange={(e) => commit({ member: e.target.value })} />
        <label className={`${labelClass} ml-3`} htmlFor="defect-location">Location</label>
        <input id="defect-location" ref={locationRef} className={`${inputClass} flex-[3]`} placeholder="e.g. Stairwell" value={info.location} onChange={(e) => commit({ location: e.target.value })} />
      </div>
      <div className="flex items-center gap-2">
        <label className={labelClass} htmlFor="defect-type">Type</label>
        <input id="defect-type" ref={typeRef} className={`${inputClass} flex-[3]`} placeholder="e.g. Vertical crack" value={info.defect_type} onChange={(e) => commit({ defect_type: e.target.value })} />
        <label className={`${labelClass} ml-3`} htmlFor="defect-width">Width</label>
        <input id="defect-width" className={`${inputClass} flex-1`} placeholder="mm" value={info.size.width_mm} onChange={(e) => commit({ size: { width_mm: e.target.value } })} />
        <label className={labelClass} htmlFor="defect-length">Length</label>
        <input id="defect-length" className={`${inputClass} flex-1`} placeholder="m" value={info.size.length_m} onChange={(e) => commit({ size: { length_m: e.target.value } })} />
        <label className={labelClass} htmlFor="defect-count">Count</label>
        <input id="defect-count" className={`${inputClass} flex-1`} placeholder="EA" value={info.size.count_ea} onChange={(e) => commit({ size: { count_ea: e.target.value } })} />
      </div>
      <label className="flex items-center gap-1.5 cursor-pointer w-fit">
        <input type="checkbox" checked={info.progress} onChange={(e) => commit({ progress: e.target.checked })} className="accent-blue-500 cursor-pointer" />
        <span className="text-xs text-slate-700">Progressing (O)</span>
      </label>
      <div className="space-y-1">
        <label className={labelClass} htmlFor="defect-remark">Remark</label>
        <textarea id="defect-remark" rows={3} className={inputClass} value={info.remark} onChange={(e) => commit({ remark: e.target.value })} />
      </div>
    </div>
  );
}
