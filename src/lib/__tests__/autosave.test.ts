import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAutosaver } from '../autosave';

describe('createAutosaver', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs only the latest save per key after the delay', async () => {
    const autosaver = createAutosaver<'name' | 'tagline'>(vi.fn(), 1000);
    const first = vi.fn().mockResolvedValue(undefined);
    const second = vi.fn().mockResolvedValue(undefined);

    autosaver.schedule('name', first);
    await vi.advanceTimersByTimeAsync(500);
    autosaver.schedule('name', second);
    await vi.advanceTimersByTimeAsync(999);
    expect(second).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(autosaver.pendingKeys()).toEqual([]);
  });

  it('debounces keys independently', async () => {
    const autosaver = createAutosaver<'name' | 'tagline'>(vi.fn(), 1000);
    const name = vi.fn().mockResolvedValue(undefined);
    const tagline = vi.fn().mockResolvedValue(undefined);

    autosaver.schedule('name', name);
    autosaver.schedule('tagline', tagline);
    expect(autosaver.pendingKeys()).toEqual(['name', 'tagline']);

    await vi.advanceTimersByTimeAsync(1000);
    expect(name).toHaveBeenCalledTimes(1);
    expect(tagline).toHaveBeenCalledTimes(1);
  });

  it('reports failures through onError', async () => {
    const onError = vi.fn();
    const autosaver = createAutosaver<'name'>(onError, 1000);
    const err = new Error('offline');

    autosaver.schedule('name', () => Promise.reject(err));
    await vi.advanceTimersByTimeAsync(1000);

    expect(onError).toHaveBeenCalledWith('name', err);
  });

  it('flush runs pending saves immediately', async () => {
    const autosaver = createAutosaver<'name'>(vi.fn(), 1000);
    const save = vi.fn().mockResolvedValue(undefined);

    autosaver.schedule('name', save);
    await autosaver.flush();
    expect(save).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(save).toHaveBeenCalledTimes(1);
  });

  it('cancel drops pending saves', async () => {
    const autosaver = createAutosaver<'name'>(vi.fn(), 1000);
    const save = vi.fn().mockResolvedValue(undefined);

    autosaver.schedule('name', save);
    autosaver.cancel();
    await vi.advanceTimersByTimeAsync(1000);

    expect(save).not.toHaveBeenCalled();
  });
});
