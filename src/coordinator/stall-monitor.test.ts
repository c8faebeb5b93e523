import { describe, expect, it } from 'vitest';
import { makeItem, MINUTE } from './fixtures';
import { StallMonitor } from './stall-monitor';

const NOW = 100 * 60 * MINUTE;

describe('StallMonitor', () => {
  const monitor = new StallMonitor(60);

  it('should report an item active for 61 minutes but not one active for 59', () => {
    const slow = makeItem({ id: 'slow', status: 'active', startedAt: NOW - 61 * MINUTE });
    const fine = makeItem({ id: 'fine', status: 'active', startedAt: NOW - 59 * MINUTE });

    const stalled = monitor.findStalled([slow, fine], NOW);
    expect(stalled).toEqual([
      { id: 'slow', description: 'work slow', startedAt: NOW - 61 * MINUTE, elapsedMinutes: 61, agent: null },
    ]);
  });

  it('should use a strict comparison at the threshold', () => {
    const edge = makeItem({ id: 'edge', status: 'active', startedAt: NOW - 60 * MINUTE });
    expect(monitor.isStalled(edge, NOW)).toBe(false);
    expect(monitor.isStalled(edge, NOW + 1)).toBe(true);
  });

  it('should ignore items that are not active', () => {
    const queued = makeItem({ id: 'q', startedAt: NOW - 120 * MINUTE });
    expect(monitor.findStalled([queued], NOW)).toEqual([]);
  });

  it('should accept a threshold per call and sort oldest first', () => {
    const a = makeItem({ id: 'a', status: 'active', startedAt: NOW - 20 * MINUTE });
    const b = makeItem({ id: 'b', status: 'active', startedAt: NOW - 30 * MINUTE });
    expect(monitor.findStalled([a, b], NOW, 10 * MINUTE).map((report) => report.id)).toEqual(['b', 'a']);
  });

  it('should not change the items it reports', () => {
    const slow = makeItem({ id: 'slow', status: 'active', startedAt: NOW - 90 * MINUTE });
    monitor.findStalled([slow], NOW);
    expect(slow.status).toBe('active');
  });
});
