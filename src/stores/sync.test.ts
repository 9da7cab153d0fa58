import { afterEach, describe, expect, it, vi } from 'vitest';
import { createSyncStatusStore } from './sync';

describe('createSyncStatusStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('holds the syncing state for a minimum time before leaving it', () => {
    vi.useFakeTimers();
    const status = createSyncStatusStore();

    status.setStatus('syncing');
    vi.advanceTimersByTime(200);
    status.setStatus('idle');
    expect(status.get().status).toBe('syncing');

    vi.advanceTimersByTime(299);
    expect(status.get().status).toBe('syncing');
    vi.advanceTimersByTime(1);
    expect(status.get().status).toBe('idle');
  });

  it('keeps only the latest sync errors', () => {
    const status = createSyncStatusStore();
    for (let i = 0; i < 12; i++) {
      status.addSyncError({
        entityKey: `users/u${i}`,
        operation: 'set',
        code: 'unavailable',
        message: 'down',
        timestamp: '2024-01-01T00:00:00.000Z'
      });
    }
    const keys = status.get().syncErrors.map((e) => e.entityKey);
    expect(keys).toHaveLength(10);
    expect(keys[0]).toBe('users/u2');
    expect(keys[9]).toBe('users/u11');

    status.clearSyncErrors();
    expect(status.get().syncErrors).toEqual([]);
  });

  it('clears the friendly error once idle', () => {
    const status = createSyncStatusStore();
    status.setStatus('error');
    status.setError('Could not reach the server', 'unavailable: down');
    expect(status.get().lastError).toBe('Could not reach the server');

    status.setStatus('idle');
    expect(status.get().lastError).toBeNull();
    expect(status.get().lastErrorDetails).toBe('unavailable: down');
  });
});
