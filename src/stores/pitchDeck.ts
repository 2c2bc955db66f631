import { createStore } from 'zustand/vanilla';
import { RemovalError, SelectionError, SubmissionError, errorMessage } from '@/lib/errors';
import type { FilePicker } from '@/lib/file-picker';
import { getExtension, partitionFiles, pitchDeckRules, type ValidationRules } from '@/lib/file-validation';
import { baseName } from '@/lib/format';
import type { PitchDeckRecord, PitchDeckRepository } from '@/lib/repositories/pitch-deck';
import type { PitchDeckStorage } from '@/lib/storage';
import { iconThumbnail, resolveThumbnail, type Thumbnailer } from '@/lib/thumbnails';
import type { Confirm } from '@/types/confirm';
import type {
  PitchDeckEntry,
  RejectedFile,
  RemoteObject,
  SubmissionState,
  ThumbnailResult,
  WorkflowStatus,
} from '@/types/pitch-deck';

export type LoadOutcome =
  | { type: 'busy' }
  | { type: 'loaded'; fileCount: number }
  | { type: 'failed'; error: Error };

export type SelectOutcome =
  | { type: 'busy' }
  | { type: 'locked' }
  | { type: 'cancelled' }
  | { type: 'failed'; error: SelectionError }
  | { type: 'rejected'; rejected: RejectedFile[] }
  | { type: 'staged'; entries: PitchDeckEntry[]; rejected: RejectedFile[] };

export type StageOutcome =
  | { type: 'busy' }
  | { type: 'locked' }
  | { type: 'rejected'; rejected: RejectedFile[] }
  | { type: 'staged'; entries: PitchDeckEntry[]; rejected: RejectedFile[] };

export type RemoveOutcome =
  | { type: 'busy' }
  | { type: 'locked' }
  | { type: 'cancelled' }
  | { type: 'failed'; error: RemovalError }
  | { type: 'removed'; entry: PitchDeckEntry };

export type SubmitOutcome =
  | { type: 'busy' }
  | { type: 'already-submitted' }
  | { type: 'nothing-to-submit' }
  | { type: 'failed'; error: SubmissionError }
  | { type: 'submitted'; submittedAt: string; uploadedCount: number };

export interface PitchDeckDeps {
  userId: string;
  picker: FilePicker;
  thumbnailer: Thumbnailer;
  storage: PitchDeckStorage;
  repository: PitchDeckRepository;
  confirm: Confirm;
  rules?: ValidationRules;
  now?: () => Date;
}

export interface PitchDeckState {
  status: WorkflowStatus;
  entries: PitchDeckEntry[];
  submission: SubmissionState;
  /** pitch_decks.id once a record exists */
  pitchDeckId: string | null;
  /** Rejections from the most recent selection */
  lastRejected: RejectedFile[];

  load: () => Promise<LoadOutcome>;
  /** Chooser → validation → staging, as one guarded operation */
  selectAndStage: () => Promise<SelectOutcome>;
  /** Validates and stages files that arrived without the chooser (drag and drop). */
  stage: (files: File[]) => Promise<StageOutcome>;
  removeFile: (index: number) => Promise<RemoveOutcome>;
  submit: () => Promise<SubmitOutcome>;
  /** Drops all local state. Ignored while an operation is in flight. */
  reset: () => boolean;
}

const NOT_SUBMITTED: SubmissionState = { isSubmitted: false, submittedAt: null };

let entrySeq = 0;
function nextEntryId(): string {
  entrySeq += 1;
  return `deck-${entrySeq}`;
}

interface PendingUpload {
  entry: PitchDeckEntry;
  file: File;
}

/** Entries with a local file that has not reached storage yet */
export function pendingUploads(entries: PitchDeckEntry[]): PendingUpload[] {
  const pending: PendingUpload[] = [];
  for (const entry of entries) {
    if (entry.file && !entry.remote) pending.push({ entry, file: entry.file });
  }
  return pending;
}

export function isBusy(state: Pick<PitchDeckState, 'status'>): boolean {
  return state.status !== 'idle';
}

/** Stored files come back without a local handle and with a generic icon. */
export function entriesFromRecord(record: PitchDeckRecord): PitchDeckEntry[] {
  return record.objects.map((remote, i) => {
    const fileName = record.originalNames[i] || baseName(remote.storagePath) || baseName(remote.url);
    const extension = getExtension(fileName);
    return {
      id: nextEntryId(),
      fileName,
      extension,
      sizeBytes: null,
      file: null,
      remote,
      thumbnail: iconThumbnail(extension),
    };
  });
}

export function createPitchDeckStore(deps: PitchDeckDeps) {
  const rules = deps.rules ?? pitchDeckRules;
  const now = deps.now ?? (() => new Date());

  async function thumbnailFor(file: File): Promise<ThumbnailResult> {
    try {
      return await deps.thumbnailer.generate(file);
    } catch (err) {
      return { ok: false, reason: errorMessage(err, 'Thumbnail generation threw') };
    }
  }

  /** One thumbnail at a time, in input order. A failed preview never drops the file. */
  async function buildEntries(files: File[]): Promise<PitchDeckEntry[]> {
    const entries: PitchDeckEntry[] = [];
    for (const file of files) {
      const extension = getExtension(file.name);
      const result = await thumbnailFor(file);
      if (!result.ok) {
        console.warn('[pitch-deck] Thumbnail fallback for', file.name, '-', result.reason);
      }
      entries.push({
        id: nextEntryId(),
        fileName: file.name,
        extension,
        sizeBytes: file.size,
        file,
        remote: null,
        thumbnail: resolveThumbnail(result, extension),
      });
    }
    return entries;
  }

  async function discardUploads(objects: RemoteObject[]) {
    try {
      await deps.storage.deletePitchDeckFiles(objects.map((o) => o.storagePath));
    } catch (err) {
      console.error('[pitch-deck] Could not remove uploaded files after failed save:', errorMessage(err));
    }
  }

  return createStore<PitchDeckState>()((set, get) => {
    async function stageFiles(files: File[]): Promise<PitchDeckEntry[]> {
      set({ status: 'staging' });
      const entries = await buildEntries(files);
      set((s) => ({ entries: [...s.entries, ...entries] }));
      console.log('[pitch-deck] Staged', entries.length, 'file(s)');
      return entries;
    }

    async function validateAndStage(files: File[]): Promise<StageOutcome> {
      const { accepted, rejected } = partitionFiles(files, rules);
      set({ lastRejected: rejected });
      if (accepted.length === 0) return { type: 'rejected', rejected };

      const entries = await stageFiles(accepted);
      return { type: 'staged', entries, rejected };
    }

    return {
      status: 'idle',
      entries: [],
      submission: NOT_SUBMITTED,
      pitchDeckId: null,
      lastRejected: [],

      load: async () => {
        if (isBusy(get())) return { type: 'busy' };
        set({ status: 'loading' });

        try {
          const record = await deps.repository.load(deps.userId);
          if (!record) {
            set({ entries: [], submission: NOT_SUBMITTED, pitchDeckId: null });
            return { type: 'loaded', fileCount: 0 };
          }

          const entries = entriesFromRecord(record);
          set({ entries, submission: record.submission, pitchDeckId: record.id });
          return { type: 'loaded', fileCount: entries.length };
        } catch (err) {
          console.error('[pitch-deck] Failed to load pitch deck:', errorMessage(err));
          set({ entries: [], submission: NOT_SUBMITTED, pitchDeckId: null });
          return { type: 'failed', error: err instanceof Error ? err : new Error(errorMessage(err)) };
        } finally {
          set({ status: 'idle' });
        }
      },

      selectAndStage: async () => {
        if (isBusy(get())) return { type: 'busy' };
        if (get().submission.isSubmitted) return { type: 'locked' };
        set({ status: 'selecting' });

        try {
          let picked: File[] | null;
          try {
            picked = await deps.picker.pickFiles({
              multiple: true,
              allowedExtensions: rules.allowedExtensions,
            });
          } catch (err) {
            const error = new SelectionError(`Error selecting files: ${errorMessage(err)}`, {
              cause: err,
            });
            console.error('[pitch-deck]', error.message);
            return { type: 'failed', error };
          }

          if (!picked || picked.length === 0) return { type: 'cancelled' };
          return await validateAndStage(picked);
        } finally {
          set({ status: 'idle' });
        }
      },

      stage: async (files) => {
        if (isBusy(get())) return { type: 'busy' };
        if (get().submission.isSubmitted) return { type: 'locked' };

        try {
          return await validateAndStage(files);
        } finally {
          set({ status: 'idle' });
        }
      },

      removeFile: async (index) => {
        if (isBusy(get())) return { type: 'busy' };
        if (get().submission.isSubmitted) return { type: 'locked' };

        const entry = Number.isInteger(index) ? get().entries[index] : undefined;
        if (!entry) {
          return { type: 'failed', error: new RemovalError(`No file at position ${index}`) };
        }

        set({ status: 'removing' });
        try {
          const accepted = await deps.confirm({
            title: 'Delete File',
            message: `Are you sure you want to delete "${entry.fileName}"?`,
            confirmLabel: 'Delete',
            variant: 'danger',
          });
          if (!accepted) return { type: 'cancelled' };

          set((s) => ({ entries: s.entries.filter((e) => e.id !== entry.id) }));
          console.log('[pitch-deck] Removed', entry.fileName);
          return { type: 'removed', entry };
        } finally {
          set({ status: 'idle' });
        }
      },

      submit: async () => {
        if (isBusy(get())) return { type: 'busy' };

        const { submission, entries, pitchDeckId } = get();
        if (submission.isSubmitted) return { type: 'already-submitted' };

        const pending = pendingUploads(entries);
        if (pending.length === 0) return { type: 'nothing-to-submit' };

        set({ status: 'submitting' });
        try {
          const uploaded = await deps.storage.uploadPitchDeckFiles({
            files: pending.map((p) => p.file),
            userId: deps.userId,
            pitchDeckId,
            rules,
          });

          const remoteById = new Map<string, RemoteObject>();
          pending.forEach((p, i) => {
            const object = uploaded.objects[i];
            if (object) remoteById.set(p.entry.id, object);
          });

          const nextEntries = entries.map((e) => {
            const remote = remoteById.get(e.id);
            return remote ? { ...e, remote } : e;
          });
          const stored = nextEntries.flatMap((e) => (e.remote ? [{ remote: e.remote, name: e.fileName }] : []));
          const submittedAt = now().toISOString();

          let id: string;
          try {
            id = await deps.repository.saveSubmission({
              userId: deps.userId,
              pitchDeckId,
              objects: stored.map((s) => s.remote),
              originalNames: stored.map((s) => s.name),
              submittedAt,
            });
          } catch (err) {
            await discardUploads(uploaded.objects);
            throw err;
          }

          set({
            entries: nextEntries,
            submission: { isSubmitted: true, submittedAt },
            pitchDeckId: id,
          });
          console.log('[pitch-deck] Submitted', pending.length, 'file(s)');
          return { type: 'submitted', submittedAt, uploadedCount: pending.length };
        } catch (err) {
          const error = new SubmissionError(`Failed to submit pitch deck: ${errorMessage(err)}`, {
            cause: err,
          });
          console.error('[pitch-deck]', error.message);
          return { type: 'failed', error };
        } finally {
          set({ status: 'idle' });
        }
      },

      reset: () => {
        if (isBusy(get())) return false;
        set({ entries: [], submission: NOT_SUBMITTED, pitchDeckId: null, lastRejected: [] });
        return true;
      },
    };
  });
}

export type PitchDeckStore = ReturnType<typeof createPitchDeckStore>;
