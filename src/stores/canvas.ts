import { createStore } from 'zustand/vanilla';
import { createAutosaver } from '@/lib/autosave';
import { canvasFromUnknown, completionPercentage, emptyCanvas } from '@/lib/canvas-rules';
import { CANVAS_SECTION_KEYS } from '@/lib/constants';
import { errorMessage } from '@/lib/errors';
import type { CanvasRepository } from '@/lib/repositories/canvas';
import type { CanvasSectionKey, CanvasSections } from '@/types/canvas';

export type CanvasSaveOutcome = { type: 'saved' } | { type: 'failed'; error: Error };

export interface CanvasDeps {
  userId: string;
  repository: CanvasRepository;
  autosaveDelayMs?: number;
  now?: () => Date;
}

export interface CanvasState {
  canvasId: string | null;
  sections: CanvasSections;
  dirty: CanvasSectionKey[];
  loading: boolean;
  saving: boolean;
  lastSavedAt: string | null;
  error: string | null;

  load: () => Promise<void>;
  updateSection: (key: CanvasSectionKey, value: string) => void;
  saveSection: (key: CanvasSectionKey) => Promise<CanvasSaveOutcome>;
  saveAll: () => Promise<CanvasSaveOutcome>;
  /** Replaces every section; keys missing from `data` become empty. */
  importCanvas: (data: Record<string, unknown>) => Promise<CanvasSaveOutcome>;
  clearAll: () => Promise<CanvasSaveOutcome>;
  dispose: () => void;
}

export function createCanvasStore(deps: CanvasDeps) {
  const now = deps.now ?? (() => new Date());

  return createStore<CanvasState>()((set, get) => {
    const autosaver = createAutosaver<CanvasSectionKey>((key, err) => {
      console.error(`[canvas] Autosave of ${key} failed:`, errorMessage(err));
    }, deps.autosaveDelayMs);

    // Saves run one at a time so the first write can create the row
    let queue: Promise<unknown> = Promise.resolve();
    // Created row not yet on users.bmc_id; retried before the next write completes
    let unlinkedId: string | null = null;

    function persist(keys: readonly CanvasSectionKey[]): Promise<CanvasSaveOutcome> {
      const run = queue.then(() => write(keys));
      queue = run;
      return run;
    }

    async function write(keys: readonly CanvasSectionKey[]): Promise<CanvasSaveOutcome> {
      const { sections, canvasId } = get();
      const percent = completionPercentage(sections);

      set({ saving: true });
      try {
        if (canvasId) {
          const patch: Partial<CanvasSections> = {};
          for (const key of keys) patch[key] = sections[key];
          await deps.repository.update(canvasId, patch, percent);
        } else {
          const id = await deps.repository.create(sections, percent);
          unlinkedId = id;
          set({ canvasId: id });
        }

        if (unlinkedId) {
          await deps.repository.link(deps.userId, unlinkedId);
          unlinkedId = null;
        }

        set((s) => ({
          dirty: s.dirty.filter((k) => !keys.includes(k)),
          lastSavedAt: now().toISOString(),
          error: null,
        }));
        return { type: 'saved' };
      } catch (err) {
        const message = errorMessage(err, 'Failed to save canvas');
        set({ error: message });
        return { type: 'failed', error: err instanceof Error ? err : new Error(message) };
      } finally {
        set({ saving: false });
      }
    }

    async function autosave(key: CanvasSectionKey) {
      const outcome = await persist([key]);
      if (outcome.type === 'failed') throw outcome.error;
    }

    function replaceAll(sections: CanvasSections): Promise<CanvasSaveOutcome> {
      autosaver.cancel();
      set({ sections, dirty: [...CANVAS_SECTION_KEYS] });
      return persist(CANVAS_SECTION_KEYS);
    }

    return {
      canvasId: null,
      sections: emptyCanvas(),
      dirty: [],
      loading: false,
      saving: false,
      lastSavedAt: null,
      error: null,

      load: async () => {
        set({ loading: true, error: null });
        try {
          const record = await deps.repository.load(deps.userId);
          if (record) unlinkedId = null;
          set(
            record
              ? { canvasId: record.id, sections: record.sections, dirty: [] }
              : { canvasId: unlinkedId, sections: emptyCanvas(), dirty: [] },
          );
        } catch (err) {
          const message = errorMessage(err, 'Failed to load canvas');
          console.error('[canvas]', message);
          set({ error: message });
        } finally {
          set({ loading: false });
        }
      },

      updateSection: (key, value) => {
        set((s) => ({
          sections: { ...s.sections, [key]: value },
          dirty: s.dirty.includes(key) ? s.dirty : [...s.dirty, key],
        }));
        autosaver.schedule(key, () => autosave(key));
      },

      saveSection: (key) => persist([key]),

      saveAll: async () => {
        autosaver.cancel();
        const dirty = get().dirty;
        if (dirty.length === 0) return { type: 'saved' };
        return persist(dirty);
      },

      importCanvas: (data) => replaceAll(canvasFromUnknown(data)),

      clearAll: () => replaceAll(emptyCanvas()),

      dispose: () => autosaver.cancel(),
    };
  });
}

export type CanvasStore = ReturnType<typeof createCanvasStore>;
