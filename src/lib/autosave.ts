import { AUTOSAVE_DELAY_MS } from './constants';

export interface Autosaver<K extends string> {
  /** Replaces any pending save for `key` and restarts its timer. */
  schedule(key: K, save: () => Promise<void>): void;
  /** Runs every pending save now, in scheduling order. */
  flush(): Promise<void>;
  /** Drops pending saves without running them. */
  cancel(): void;
  pendingKeys(): K[];
}

/**
 * Per-key debounce. Each key keeps only its latest save; a failed save is
 * reported through `onError` and not retried.
 */
export function createAutosaver<K extends string>(
  onError: (key: K, err: unknown) => void,
  delayMs: number = AUTOSAVE_DELAY_MS,
): Autosaver<K> {
  const pending = new Map<K, { timer: ReturnType<typeof setTimeout>; save: () => Promise<void> }>();

  async function run(key: K, save: () => Promise<void>) {
    try {
      await save();
    } catch (err) {
      onError(key, err);
    }
  }

  return {
    schedule(key, save) {
      const existing = pending.get(key);
      if (existing) {
        clearTimeout(existing.timer);
        pending.delete(key);
      }

      const timer = setTimeout(() => {
        pending.delete(key);
        void run(key, save);
      }, delayMs);
      pending.set(key, { timer, save });
    },

    async flush() {
      const queued = [...pending.entries()];
      pending.clear();
      for (const [key, { timer, save }] of queued) {
        clearTimeout(timer);
        await run(key, save);
      }
    },

    cancel() {
      pending.forEach(({ timer }) => clearTimeout(timer));
      pending.clear();
    },

    pendingKeys: () => [...pending.keys()],
  };
}
