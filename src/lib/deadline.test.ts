import { describe, expect, it } from 'vitest';
import { createDeadlineTimer } from './deadline';

describe('createDeadlineTimer', () => {
  it('fires once at its deadline', () => {
    const t = createDeadlineTimer(500);
    t.start(1000);
    expect(t.poll(1499)).toBe(false);
    expect(t.poll(1500)).toBe(true);
    expect(t.poll(1600)).toBe(false);
    expect(t.isActive()).toBe(false);
  });

  it('restarts from the latest start', () => {
    const t = createDeadlineTimer(300);
    t.start(0);
    t.start(200);
    expect(t.poll(300)).toBe(false);
    expect(t.poll(500)).toBe(true);
  });

  it('never fires once stopped', () => {
    const t = createDeadlineTimer(100);
    t.start(0);
    t.stop();
    expect(t.isActive()).toBe(false);
    expect(t.poll(1000)).toBe(false);
  });
});
