import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProfileStore } from '../profile';
import { EMPTY_PROFILE, type ProfileRepository } from '@/lib/repositories/profile';
import type { AvatarStorage } from '@/lib/storage';

function fakeRepository(): ProfileRepository {
  return {
    load: vi.fn().mockResolvedValue({ ...EMPTY_PROFILE, companyName: 'Acme' }),
    save: vi.fn().mockResolvedValue(undefined),
  };
}

function fakeAvatarStorage(): AvatarStorage {
  return { uploadAvatar: vi.fn().mockResolvedValue('https://storage.test/avatars/u1/avatar_1.png') };
}

function setup(repository = fakeRepository(), storage = fakeAvatarStorage()) {
  const store = createProfileStore({
    userId: 'u1',
    repository,
    storage,
    autosaveDelayMs: 1000,
    now: () => new Date('2024-04-01T09:00:00.000Z'),
  });
  return { store, repository, storage };
}

describe('profile store', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('loads stored fields', async () => {
    const { store } = setup();
    await store.getState().load();
    expect(store.getState().fields.companyName).toBe('Acme');
    expect(store.getState().status).toBe('idle');
  });

  it('autosaves a burst of edits once with the latest value', async () => {
    const { store, repository } = setup();

    store.getState().updateField('tagline', 'Pay');
    store.getState().updateField('tagline', 'Payments');
    store.getState().updateField('tagline', 'Payments for everyone');
    await vi.advanceTimersByTimeAsync(1000);

    expect(repository.save).toHaveBeenCalledTimes(1);
    expect(repository.save).toHaveBeenCalledWith('u1', { tagline: 'Payments for everyone' });
    expect(store.getState().dirty).toEqual([]);
    expect(store.getState().lastSavedAt).toBe('2024-04-01T09:00:00.000Z');
  });

  it('saveAll writes every dirty field and cancels pending autosaves', async () => {
    const { store, repository } = setup();

    store.getState().updateField('companyName', 'Acme Labs');
    store.getState().updateField('fundingGoal', 250000);
    const outcome = await store.getState().saveAll();
    await vi.advanceTimersByTimeAsync(1000);

    expect(outcome).toEqual({ type: 'saved', fields: ['companyName', 'fundingGoal'] });
    expect(repository.save).toHaveBeenCalledTimes(1);
    expect(repository.save).toHaveBeenCalledWith('u1', { companyName: 'Acme Labs', fundingGoal: 250000 });
  });

  it('keeps fields dirty when a save fails', async () => {
    const repository = fakeRepository();
    vi.mocked(repository.save).mockRejectedValueOnce(new Error('offline'));
    const { store } = setup(repository);

    store.getState().updateField('region', 'EU');
    const outcome = await store.getState().saveField('region');

    expect(outcome.type).toBe('failed');
    expect(store.getState().dirty).toEqual(['region']);
    expect(store.getState().error).toBe('offline');
  });

  it('stores the uploaded avatar url on the profile', async () => {
    const { store, repository } = setup();

    const outcome = await store.getState().uploadAvatar(new File(['x'], 'me.png'));

    expect(outcome).toEqual({ type: 'uploaded', avatarUrl: 'https://storage.test/avatars/u1/avatar_1.png' });
    expect(repository.save).toHaveBeenCalledWith('u1', {
      avatarUrl: 'https://storage.test/avatars/u1/avatar_1.png',
    });
    expect(store.getState().fields.avatarUrl).toBe('https://storage.test/avatars/u1/avatar_1.png');
  });

  it('dispose drops pending autosaves', async () => {
    const { store, repository } = setup();

    store.getState().updateField('industry', 'Fintech');
    store.getState().dispose();
    await vi.advanceTimersByTimeAsync(1000);

    expect(repository.save).not.toHaveBeenCalled();
  });
});
