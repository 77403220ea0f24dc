import { afterEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import type { Project } from '../lib/project';
import { addPart, addSubPart, createEmptyProject } from '../lib/project';
import type { BrowserSelection } from './ProjectBrowser';
import ProjectBrowser from './ProjectBrowser';

function setup(inspectionKey: string | null = null) {
  const project = createEmptyProject({ name: 'Bldg' });
  const part = addPart(project, 'Level 1');
  const sub = addSubPart(part, 'East', 'img_east');
  const draft: Project = structuredClone(project);
  const selection: BrowserSelection = { partId: part.id, subpartId: sub.id, inspectionKey };
  const onChange = vi.fn((mutate: (d: Project) => void) => mutate(draft));
  const onSelect = vi.fn();
  const onEditDefects = vi.fn();
  const onSubPartsRemoved = vi.fn();
  render(
    <ProjectBrowser
      project={project}
      selection={selection}
      onSelect={onSelect}
      onChange={onChange}
      onAddSubPart={vi.fn()}
      onSubPartsRemoved={onSubPartsRemoved}
      onEditDefects={onEditDefects}
      onExportReports={vi.fn()}
    />
  );
  return { draft, sub, onChange, onSelect, onEditDefects, onSubPartsRemoved };
}

afterEach(() => {
  cleanup();
  vi.restoreAllMocks();
});

describe('ProjectBrowser', () => {
  it('asks for a name before adding an inspection', () => {
    const { onChange } = setup();
    fireEvent.click(screen.getByRole('button', { name: '+ New' }));
    fireEvent.click(screen.getByRole('button', { name: 'Add' }));
    expect(screen.getByRole('alert').textContent).toBe('Inspection name is required');
    expect(onChange).not.toHaveBeenCalled();
  });

  it('adds an inspection and selects it', () => {
    const { draft, onSelect } = setup();
    fireEvent.click(screen.getByRole('button', { name: '+ New' }));
    fireEvent.change(screen.getByLabelText('Inspection name'), { target: { value: 'Autumn' } });
    fireEvent.change(screen.getByLabelText('Start date'), { target: { value: '2024-10-01' } });
    fireEvent.click(screen.getByRole('button', { name: 'Add' }));

    const inspections = draft.parts[0].subparts[0].inspections;
    const keys = Object.keys(inspections);
    expect(keys).toHaveLength(1);
    expect(inspections[keys[0]]).toEqual({ name: 'Autumn', start_date: '2024-10-01', defects: {} });
    expect(onSelect).toHaveBeenLastCalledWith(expect.objectContaining({ inspectionKey: keys[0] }));
  });

  it('needs a selected inspection to edit defects', () => {
    const alert = vi.spyOn(window, 'alert').mockImplementation(() => {});
    const { onEditDefects } = setup();
    fireEvent.click(screen.getByRole('button', { name: 'Edit defects' }));
    expect(alert).toHaveBeenCalledWith('Select an inspection before editing defects.');
    expect(onEditDefects).not.toHaveBeenCalled();
  });

  it('opens the editor when an inspection is selected', () => {
    const { onEditDefects } = setup('insp_1');
    fireEvent.click(screen.getByRole('button', { name: 'Edit defects' }));
    expect(onEditDefects).toHaveBeenCalledTimes(1);
  });

  it('hands a deleted sub-part back so its image can be removed', () => {
    vi.spyOn(window, 'confirm').mockReturnValue(true);
    const { draft, sub, onSubPartsRemoved } = setup();
    const [, subDelete] = screen.getAllByRole('button', { name: 'Delete' });
    fireEvent.click(subDelete);
    expect(draft.parts[0].subparts).toEqual([]);
    expect(onSubPartsRemoved).toHaveBeenCalledWith([sub]);
  });
});
