import { createStore } from 'zustand/vanilla';
import { createAutosaver } from '@/lib/autosave';
import { errorMessage } from '@/lib/errors';
import { EMPTY_PROFILE, type ProfileRepository } from '@/lib/repositories/profile';
import type { AvatarStorage } from '@/lib/storage';
import type { EditableProfileField, ProfileField, ProfileFields } from '@/types/profile';

export type ProfileSaveOutcome = { type: 'saved'; fields: ProfileField[] } | { type: 'failed'; error: Error };

export type AvatarOutcome =
  | { type: 'busy' }
  | { type: 'uploaded'; avatarUrl: string }
  | { type: 'failed'; error: Error };

export interface ProfileDeps {
  userId: string;
  repository: ProfileRepository;
  storage: AvatarStorage;
  autosaveDelayMs?: number;
  now?: () => Date;
}

export interface ProfileState {
  fields: ProfileFields;
  dirty: ProfileField[];
  status: 'idle' | 'loading' | 'uploading';
  saving: boolean;
  lastSavedAt: string | null;
  error: string | null;

  load: () => Promise<void>;
  /** Updates local state and schedules a debounced save of that field. */
  updateField: <F extends EditableProfileField>(field: F, value: ProfileFields[F]) => void;
  saveField: (field: ProfileField) => Promise<ProfileSaveOutcome>;
  /** Writes every dirty field in one upsert. */
  saveAll: () => Promise<ProfileSaveOutcome>;
  uploadAvatar: (file: File) => Promise<AvatarOutcome>;
  /** Cancels pending autosaves; call when the session ends. */
  dispose: () => void;
}

function copyField<K extends ProfileField>(target: Partial<ProfileFields>, source: ProfileFields, key: K) {
  target[key] = source[key];
}

export function pickFields(fields: ProfileFields, keys: ProfileField[]): Partial<ProfileFields> {
  const patch: Partial<ProfileFields> = {};
  for (const key of keys) copyField(patch, fields, key);
  return patch;
}

export function createProfileStore(deps: ProfileDeps) {
  const now = deps.now ?? (() => new Date());

  return createStore<ProfileState>()((set, get) => {
    const autosaver = createAutosaver<ProfileField>((field, err) => {
      console.error(`[profile] Autosave of ${field} failed:`, errorMessage(err));
    }, deps.autosaveDelayMs);

    async function write(keys: ProfileField[]): Promise<ProfileSaveOutcome> {
      if (keys.length === 0) return { type: 'saved', fields: [] };

      set({ saving: true });
      try {
        await deps.repository.save(deps.userId, pickFields(get().fields, keys));
        set((s) => ({
          dirty: s.dirty.filter((k) => !keys.includes(k)),
          lastSavedAt: now().toISOString(),
          error: null,
        }));
        return { type: 'saved', fields: keys };
      } catch (err) {
        const message = errorMessage(err, 'Failed to save profile');
        set({ error: message });
        return { type: 'failed', error: err instanceof Error ? err : new Error(message) };
      } finally {
        set({ saving: false });
      }
    }

    async function autosave(field: ProfileField) {
      const outcome = await write([field]);
      if (outcome.type === 'failed') throw outcome.error;
    }

    return {
      fields: EMPTY_PROFILE,
      dirty: [],
      status: 'idle',
      saving: false,
      lastSavedAt: null,
      error: null,

      load: async () => {
        set({ status: 'loading', error: null });
        try {
          const stored = await deps.repository.load(deps.userId);
          set({ fields: stored ?? EMPTY_PROFILE, dirty: [] });
        } catch (err) {
          const message = errorMessage(err, 'Failed to load profile');
          console.error('[profile]', message);
          set({ error: message });
        } finally {
          set({ status: 'idle' });
        }
      },

      updateField: (field, value) => {
        set((s) => ({
          fields: { ...s.fields, [field]: value },
          dirty: s.dirty.includes(field) ? s.dirty : [...s.dirty, field],
        }));
        autosaver.schedule(field, () => autosave(field));
      },

      saveField: (field) => write([field]),

      saveAll: async () => {
        autosaver.cancel();
        return write(get().dirty);
      },

      uploadAvatar: async (file) => {
        if (get().status !== 'idle') return { type: 'busy' };
        set({ status: 'uploading', error: null });

        try {
          const avatarUrl = await deps.storage.uploadAvatar({ file, userId: deps.userId });
          await deps.repository.save(deps.userId, { avatarUrl });
          set((s) => ({ fields: { ...s.fields, avatarUrl }, lastSavedAt: now().toISOString() }));
          return { type: 'uploaded', avatarUrl };
        } catch (err) {
          const message = errorMessage(err, 'Failed to upload avatar');
          console.error('[profile]', message);
          set({ error: message });
          return { type: 'failed', error: err instanceof Error ? err : new Error(message) };
        } finally {
          set({ status: 'idle' });
        }
      },

      dispose: () => autosaver.cancel(),
    };
  });
}

export type ProfileStore = ReturnType<typeof createProfileStore>;
