/**
 * FaultCanvas renders the editor scene as SVG over the plan image and turns pointer
 * input into editor intents.
 *
 * Coordinate system
 * ─────────────────
 * Marks live in scene space (plan image pixels). The view maps scene → screen as
 * `screen = scene * scale + (tx, ty)`; pointer positions are taken relative to the
 * container and mapped back through `editor.screenToScene` before dispatch.
 */

import { useEffect, useRef, useState } from 'react';
import type { FaultEditorHandle } from '../lib/faultEditor';
import type { Point } from '../lib/geometry';
import { toScene } from '../lib/geometry';
import type { DefectMark, Mark } from '../lib/marks';
import { hasLabel, hasLeaderLine, isSerializableMark, labelLocalRect, localBounds, triangleVertices } from '../lib/marks';
import { ID_FONT_SIZE, LABEL_FONT_SIZE } from '../lib/editorConfig';

const MARK_COLOR = '#ef4444';
const MEMO_COLOR = '#2563eb';
const SELECT_COLOR = '#f59e0b';
const STROKE_PX = 2;
const HANDLE_R = 4;

interface FaultCanvasProps {
  editor: FaultEditorHandle;
  /** Re-render key from useFaultEditor. */
  version: number;
  imageUrl: string | null;
}

function scurvePath(m: Extract<DefectMark, { kind: 'scurve' }>): string {
  const top = -m.h / 2;
  const w2 = m.w / 2;
  return `M 0 ${top} C ${-w2 * m.curve} ${top + m.h * 0.25} ${w2 * m.curve} ${top + m.h * 0.75} 0 ${m.h / 2}`;
}

function MarkShape({ mark, stroke }: { mark: DefectMark; stroke: number }) {
  switch (mark.kind) {
    case 'circle':
      return (
        <>
          <circle r={mark.radius} fill="rgba(255,255,255,0.6)" stroke={MARK_COLOR} strokeWidth={stroke} />
          {mark.displayId !== null && (
            <text textAnchor="middle" dominantBaseline="central" fontSize={ID_FONT_SIZE} fontWeight="700" fill={MARK_COLOR} style={{ userSelect: 'none' }}>
              {mark.displayId}
            </text>
          )}
        </>
      );
    case 'square':
      return <rect x={-mark.size / 2} y={-mark.size / 2} width={mark.size} height={mark.size} fill="none" stroke={MARK_COLOR} strokeWidth={stroke} />;
    case 'triangle':
      return <polygon points={triangleVertices(mark.size).map((p) => `${p.x},${p.y}`).join(' ')} fill="none" stroke={MARK_COLOR} strokeWidth={stroke} />;
    case 'scurve':
      return (
        <>
          <path d={scurvePath(mark)} fill="none" stroke={MARK_COLOR} strokeWidth={stroke} />
          <circle r={mark.midRadius} fill="none" stroke={MARK_COLOR} strokeWidth={stroke} />
        </>
      );
    case 'text':
      return (
        <text x={2} y={mark.fontSize * 1.1} fontSize={mark.fontSize} fill={MARK_COLOR} style={{ userSelect: 'none' }}>
          {mark.text}
        </text>
      );
  }
}

function MemoShape({ mark, stroke, selected }: { mark: Mark; stroke: number; selected: boolean }) {
  const color = selected ? SELECT_COLOR : MEMO_COLOR;
  if (mark.kind === 'memoLine') {
    return <line x1={mark.p1.x} y1={mark.p1.y} x2={mark.p2.x} y2={mark.p2.y} stroke={color} strokeWidth={stroke} strokeLinecap="round" />;
  }
  if (mark.kind === 'memoPath') {
    return <polyline points={mark.points.map((p) => `${p.x},${p.y}`).join(' ')} fill="none" stroke={color} strokeWidth={stroke} strokeLinejoin="round" strokeLinecap="round" />;
  }
  return null;
}

export default function FaultCanvas({ editor, version, imageUrl }: FaultCanvasProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const fittedRef = useRef<string | null>(null);
  const [size, setSize] = useState({ width: 0, height: 0 });
  const [draft, setDraft] = useState('');

  const background = editor.getBackground();
  const view = editor.getView();
  const marks = editor.getMarks();
  const selected = new Set(editor.getSelectedIds());
  const hover = editor.getHoverAnchor();
  const band = editor.getRubberBand();
  const inlineEdit = editor.getInlineEdit();
  const stroke = STROKE_PX / view.scale;

  useEffect(() => {
    const el = containerRef.current;
    if (!el) return;
    const ro = new ResizeObserver((entries) => {
      const { width, height } = entries[0].contentRect;
      if (width > 0 && height > 0) setSize({ width, height });
    });
    ro.observe(el);
    return () => ro.disconnect();
  }, []);

  // Fit once per image, as soon as the container has a size.
  useEffect(() => {
    if (!background || size.width === 0) return;
    if (fittedRef.current === background.path) return;
    fittedRef.current = background.path;
    editor.fitView(size);
  }, [editor, background, size]);

  // React's wheel listener is passive; zoom and pan need preventDefault.
  useEffect(() => {
    const el = containerRef.current;
    if (!el) return;
    const onWheel = (e: WheelEvent) => {
      e.preventDefault();
      const rect = el.getBoundingClientRect();
      const at = editor.screenToScene({ x: e.clientX - rect.left, y: e.clientY - rect.top });
      editor.dispatch({ type: 'wheel', at, deltaX: e.deltaX, deltaY: e.deltaY, mods: { ctrl: e.ctrlKey || e.metaKey, shift: e.shiftKey } });
    };
    el.addEventListener('wheel', onWheel, { passive: false });
    return () => el.removeEventListener('wheel', onWheel);
  }, [editor]);

  useEffect(() => {
    if (!inlineEdit) return;
    const m = editor.getMark(inlineEdit.id);
    if (!m) return;
    if (inlineEdit.kind === 'text' && m.kind === 'text') setDraft(m.text);
    else if (hasLabel(m)) setDraft(m.label.text);
  }, [editor, inlineEdit]);

  const scenePoint = (e: React.PointerEvent | React.MouseEvent): Point => {
    const rect = containerRef.current?.getBoundingClientRect();
    return editor.screenToScene({ x: e.clientX - (rect?.left ?? 0), y: e.clientY - (rect?.top ?? 0) });
  };

  const toScreen = (p: Point): Point => ({ x: p.x * view.scale + view.tx, y: p.y * view.scale + view.ty });

  const commitInline = () => {
    if (!inlineEdit) return;
    if (inlineEdit.kind === 'label') editor.commitLabelEdit(inlineEdit.id, draft);
    else editor.commitTextEdit(inlineEdit.id, draft);
  };

  const inlineInput = (() => {
    if (!inlineEdit) return null;
    const m = editor.getMark(inlineEdit.id);
    if (!m || !isSerializableMark(m)) return null;
    const local = inlineEdit.kind === 'label' ? labelLocalRect(m) : localBounds(m);
    if (!local) return null;
    const at = toScreen(toScene({ x: local.x, y: local.y }, m));
    const fontSize = (inlineEdit.kind === 'label' ? LABEL_FONT_SIZE : m.kind === 'text' ? m.fontSize : LABEL_FONT_SIZE) * view.scale * m.scale;
    return (
      <input
        autoFocus
        type="text"
        aria-label={inlineEdit.kind === 'label' ? 'Edit label' : 'Edit text'}
        value={draft}
        onChange={(e) => setDraft(e.target.value)}
        onKeyDown={(e) => {
          if (e.key === 'Enter') commitInline();
          if (e.key === 'Escape') editor.cancelInlineEdit();
        }}
        onBlur={commitInline}
        onPointerDown={(e) => e.stopPropagation()}
        style={{
          position: 'absolute',
          left: at.x,
          top: at.y,
          fontSize,
          color: MARK_COLOR,
          background: 'rgba(255,255,255,0.85)',
          border: 'none',
          outline: '1px dashed rgba(0,0,0,0.4)',
          padding: '0 2px',
          minWidth: 60,
        }}
      />
    );
  })();

  return (
    <div
      ref={containerRef}
      data-version={version}
      className="relative flex-1 min-h-0 overflow-hidden bg-slate-200 select-none"
      onPointerDown={(e) => {
        if (e.button !== 0) return;
        e.currentTarget.setPointerCapture(e.pointerId);
        editor.dispatch({ type: 'press', at: scenePoint(e), mods: { ctrl: e.ctrlKey || e.metaKey, shift: e.shiftKey } });
      }}
      onPointerMove={(e) => editor.dispatch({ type: 'move', at: scenePoint(e), pressed: (e.buttons & 1) === 1 })}
      onPointerUp={(e) => {
        if (e.button !== 0) return;
        editor.dispatch({ type: 'release', at: scenePoint(e) });
      }}
      onDoubleClick={(e) => editor.dispatch({ type: 'doubleClick', at: scenePoint(e) })}
    >
      {!background && (
        <div className="absolute inset-0 flex items-center justify-center text-sm text-slate-500">Open a sub-part with a plan image to start marking.</div>
      )}
      <svg width="100%" height="100%" className={editor.getDragMode() === 'move' ? 'cursor-grabbing' : 'cursor-crosshair'}>
        <g transform={`translate(${view.tx} ${view.ty}) scale(${view.scale})`}>
          {background && imageUrl && <image href={imageUrl} x={0} y={0} width={background.width} height={background.height} />}

          {/* Leader lines sit beneath every mark */}
          {marks.map((m) =>
            hasLeaderLine(m) && m.leader && m.visible ? (
              <line
                key={`leader-${m.id}`}
                x1={m.leader.p1.x}
                y1={m.leader.p1.y}
                x2={m.leader.p2.x}
                y2={m.leader.p2.y}
                stroke={MARK_COLOR}
                strokeWidth={stroke}
                opacity={m.leader.opacity}
              />
            ) : null
          )}

          {marks.map((m) => {
            if (!isSerializableMark(m)) return <MemoShape key={m.id} mark={m} stroke={stroke} selected={selected.has(m.id)} />;
            if (!m.visible) return null;
            const isSel = selected.has(m.id);
            const b = localBounds(m);
            const lr = labelLocalRect(m);
            const editingLabel = inlineEdit?.id === m.id;
            return (
              <g key={m.id} transform={`translate(${m.pos.x} ${m.pos.y}) rotate(${m.rotation}) scale(${m.scale})`}>
                {!(editingLabel && m.kind === 'text') && <MarkShape mark={m} stroke={stroke / m.scale} />}
                {lr && hasLabel(m) && !editingLabel && (
                  <text x={lr.x} y={lr.y + lr.h * 0.8} fontSize={LABEL_FONT_SIZE} fill={MARK_COLOR} style={{ userSelect: 'none' }}>
                    {m.label.text}
                  </text>
                )}
                {isSel && (
                  <rect x={b.x} y={b.y} width={b.w} height={b.h} fill="none" stroke={SELECT_COLOR} strokeWidth={stroke / m.scale} strokeDasharray={`${4 / view.scale} ${3 / view.scale}`} />
                )}
              </g>
            );
          })}

          {hover && <circle cx={hover.at.x} cy={hover.at.y} r={HANDLE_R / view.scale} fill="white" stroke={MARK_COLOR} strokeWidth={stroke} />}

          {band && <rect x={band.x} y={band.y} width={band.w} height={band.h} fill="rgba(59,130,246,0.12)" stroke="#3b82f6" strokeWidth={stroke} />}
        </g>
      </svg>
      {inlineInput}
    </div>
  );
}
