import { useEffect, useState, useSyncExternalStore } from 'react';
import type { EditorHost, FaultEditorHandle } from '../lib/faultEditor';
import { createFaultEditor } from '../lib/faultEditor';
import { TICK_INTERVAL_MS } from '../lib/editorConfig';

export interface FaultEditorBinding {
  editor: FaultEditorHandle;
  /** Bumps on every scene change; use as a render key. */
  version: number;
  dirty: boolean;
  /** Current zoom relative to the fitted view. */
  zoom: number;
}

/**
 * Owns one editor for the lifetime of the component and drives its deadline timers.
 * `onOpenDetail` fires when the user double-clicks a circle body.
 */
export function useFaultEditor(onOpenDetail?: (circleId: string) => void): FaultEditorBinding {
  const [dirty, setDirty] = useState(false);
  const [zoom, setZoom] = useState(1);

  const [editor] = useState(() => {
    const host: EditorHost = {
      markDirty: () => setDirty(true),
      setZoom,
    };
    return createFaultEditor({ host });
  });

  const version = useSyncExternalStore(editor.subscribe, editor.getVersion);

  useEffect(() => {
    const id = window.setInterval(() => editor.tick(), TICK_INTERVAL_MS);
    return () => window.clearInterval(id);
  }, [editor]);

  useEffect(
    () =>
      editor.on((event) => {
        if (event.type === 'dirtyChanged') setDirty(event.dirty);
        if (event.type === 'requestOpenDefectDetail') {
          editor.showDetailFor(event.circleId);
          onOpenDetail?.(event.circleId);
        }
      }),
    [editor, onOpenDetail]
  );

  return { editor, version, dirty, zoom };
}
