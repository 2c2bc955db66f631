import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createPitchDeckStore, type PitchDeckDeps } from '../pitchDeck';
import type { FilePicker } from '@/lib/file-picker';
import type { PitchDeckRepository } from '@/lib/repositories/pitch-deck';
import type { PitchDeckStorage } from '@/lib/storage';
import { createValidationRules } from '@/lib/file-validation';
import type { Thumbnailer } from '@/lib/thumbnails';

function makeFile(name: string, size = 1024): File {
  const file = new File(['x'], name);
  Object.defineProperty(file, 'size', { value: size });
  return file;
}

function pickerReturning(files: File[] | null): FilePicker {
  return { pickFiles: vi.fn().mockResolvedValue(files) };
}

const iconThumbnailer: Thumbnailer = {
  generate: async () => ({ ok: true, thumbnail: { kind: 'icon', icon: 'document' } }),
};

function fakeStorage(): PitchDeckStorage & { deleted: string[][] } {
  const deleted: string[][] = [];
  return {
    deleted,
    uploadPitchDeckFiles: vi.fn(async ({ files, userId }: { files: File[]; userId: string }) => ({
      objects: files.map((f, i) => ({
        storagePath: `${userId}/temp_${i}_1.${f.name.split('.').pop() ?? ''}`,
        url: `https://storage.test/${f.name}`,
      })),
      originalNames: files.map((f) => f.name),
    })),
    deletePitchDeckFiles: vi.fn(async (paths: string[]) => {
      deleted.push(paths);
    }),
  };
}

function fakeRepository(): PitchDeckRepository {
  return {
    load: vi.fn().mockResolvedValue(null),
    saveSubmission: vi.fn().mockResolvedValue('pd-1'),
  };
}

function setup(overrides: Partial<PitchDeckDeps> = {}) {
  const storage = fakeStorage();
  const repository = fakeRepository();
  const deps: PitchDeckDeps = {
    userId: 'u1',
    picker: pickerReturning(null),
    thumbnailer: iconThumbnailer,
    storage,
    repository,
    confirm: vi.fn().mockResolvedValue(true),
    now: () => new Date('2024-03-01T10:00:00.000Z'),
    ...overrides,
  };
  return { store: createPitchDeckStore(deps), storage, repository, deps };
}

describe('pitch deck store', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('selectAndStage', () => {
    it('stages valid files and reports rejected ones', async () => {
      const { store } = setup({
        picker: pickerReturning([makeFile('deck.pdf'), makeFile('demo.mp4'), makeFile('notes.txt')]),
      });

      const outcome = await store.getState().selectAndStage();

      expect(outcome.type).toBe('staged');
      const state = store.getState();
      expect(state.entries.map((e) => e.fileName)).toEqual(['deck.pdf', 'demo.mp4']);
      expect(state.entries.every((e) => e.remote === null)).toBe(true);
      expect(state.lastRejected).toEqual([
        {
          fileName: 'notes.txt',
          reason: 'Invalid pitch deck file type. Allowed: pdf, mp4, avi, mov, mkv, wmv',
        },
      ]);
      expect(state.status).toBe('idle');
    });

    it('returns cancelled when the chooser is dismissed', async () => {
      const { store } = setup({ picker: pickerReturning(null) });

      expect(await store.getState().selectAndStage()).toEqual({ type: 'cancelled' });
      expect(store.getState().entries).toEqual([]);
    });

    it('wraps chooser failures in a SelectionError', async () => {
      const picker: FilePicker = { pickFiles: vi.fn().mockRejectedValue(new Error('denied')) };
      const { store } = setup({ picker });

      const outcome = await store.getState().selectAndStage();

      expect(outcome.type).toBe('failed');
      if (outcome.type === 'failed') {
        expect(outcome.error.name).toBe('SelectionError');
        expect(outcome.error.message).toBe('Error selecting files: denied');
      }
      expect(store.getState().status).toBe('idle');
    });

    it('still stages a file whose thumbnail throws', async () => {
      const thumbnailer: Thumbnailer = { generate: vi.fn().mockRejectedValue(new Error('decoder crashed')) };
      const { store } = setup({ picker: pickerReturning([makeFile('demo.mp4')]), thumbnailer });

      await store.getState().selectAndStage();

      const [entry] = store.getState().entries;
      expect(entry?.fileName).toBe('demo.mp4');
      expect(entry?.thumbnail).toEqual({ kind: 'icon', icon: 'video' });
    });

    it('stages nothing when every chosen file is rejected', async () => {
      const { store } = setup({ picker: pickerReturning([makeFile('notes.txt')]) });

      const outcome = await store.getState().selectAndStage();

      const rejected = [
        {
          fileName: 'notes.txt',
          reason: 'Invalid pitch deck file type. Allowed: pdf, mp4, avi, mov, mkv, wmv',
        },
      ];
      expect(outcome).toEqual({ type: 'rejected', rejected });
      expect(store.getState().entries).toEqual([]);
      expect(store.getState().lastRejected).toEqual(rejected);
      expect(store.getState().status).toBe('idle');
    });

    it('keeps selection order when only one thumbnail fails', async () => {
      const thumbnailer: Thumbnailer = {
        generate: vi.fn(async (file: File) => {
          if (file.name === 'demo.mp4') throw new Error('decoder crashed');
          return { ok: true as const, thumbnail: { kind: 'document' as const, imageUrl: 'data:image/png;base64,AA' } };
        }),
      };
      const { store } = setup({
        picker: pickerReturning([makeFile('deck.pdf'), makeFile('demo.mp4')]),
        thumbnailer,
      });

      const outcome = await store.getState().selectAndStage();

      expect(outcome.type).toBe('staged');
      const entries = store.getState().entries;
      expect(entries.map((e) => e.fileName)).toEqual(['deck.pdf', 'demo.mp4']);
      expect(entries[0]?.thumbnail).toEqual({ kind: 'document', imageUrl: 'data:image/png;base64,AA' });
      expect(entries[1]?.thumbnail).toEqual({ kind: 'icon', icon: 'video' });
    });

    it('refuses to start while another operation runs', async () => {
      let release: (files: File[] | null) => void = () => {};
      const picker: FilePicker = {
        pickFiles: () =>
          new Promise((resolve) => {
            release = resolve;
          }),
      };
      const { store } = setup({ picker });

      const first = store.getState().selectAndStage();
      expect(store.getState().status).toBe('selecting');
      expect(await store.getState().selectAndStage()).toEqual({ type: 'busy' });
      expect(await store.getState().submit()).toEqual({ type: 'busy' });

      release(null);
      expect(await first).toEqual({ type: 'cancelled' });
      expect(store.getState().status).toBe('idle');
    });
  });

  describe('stage', () => {
    it('validates dropped files and stages the rest', async () => {
      const { store } = setup();

      const outcome = await store.getState().stage([makeFile('notes.txt'), makeFile('deck.pdf')]);

      expect(outcome.type).toBe('staged');
      if (outcome.type === 'staged') {
        expect(outcome.entries.map((e) => e.fileName)).toEqual(['deck.pdf']);
        expect(outcome.rejected.map((r) => r.fileName)).toEqual(['notes.txt']);
      }
      expect(store.getState().lastRejected.map((r) => r.fileName)).toEqual(['notes.txt']);
    });

    it('returns busy for a drop during a selection and leaves state alone', async () => {
      let release: (files: File[] | null) => void = () => {};
      const picker: FilePicker = {
        pickFiles: () =>
          new Promise((resolve) => {
            release = resolve;
          }),
      };
      const { store } = setup({ picker });

      const selecting = store.getState().selectAndStage();
      const outcome = await store.getState().stage([makeFile('notes.txt'), makeFile('deck.pdf')]);

      expect(outcome).toEqual({ type: 'busy' });
      expect(store.getState().lastRejected).toEqual([]);
      expect(store.getState().entries).toEqual([]);

      release(null);
      await selecting;
    });
  });

  describe('removeFile', () => {
    it('removes the entry at the index and keeps the rest in order', async () => {
      const { store } = setup();
      await store.getState().stage([makeFile('a.pdf'), makeFile('b.pdf'), makeFile('c.pdf')]);

      const outcome = await store.getState().removeFile(1);

      expect(outcome.type).toBe('removed');
      expect(store.getState().entries.map((e) => e.fileName)).toEqual(['a.pdf', 'c.pdf']);
    });

    it('asks for confirmation with the file name', async () => {
      const confirm = vi.fn().mockResolvedValue(false);
      const { store } = setup({ confirm });
      await store.getState().stage([makeFile('a.pdf')]);

      expect(await store.getState().removeFile(0)).toEqual({ type: 'cancelled' });
      expect(confirm).toHaveBeenCalledWith({
        title: 'Delete File',
        message: 'Are you sure you want to delete "a.pdf"?',
        confirmLabel: 'Delete',
        variant: 'danger',
      });
      expect(store.getState().entries).toHaveLength(1);
    });

    it('fails for an index out of range', async () => {
      const { store } = setup();
      await store.getState().stage([makeFile('a.pdf')]);

      const outcome = await store.getState().removeFile(3);

      expect(outcome.type).toBe('failed');
      if (outcome.type === 'failed') expect(outcome.error.message).toBe('No file at position 3');
    });
  });

  describe('submit', () => {
    it('does nothing when no files are staged', async () => {
      const { store, storage, repository } = setup();

      expect(await store.getState().submit()).toEqual({ type: 'nothing-to-submit' });
      expect(storage.uploadPitchDeckFiles).not.toHaveBeenCalled();
      expect(repository.saveSubmission).not.toHaveBeenCalled();
    });

    it('uploads, records and locks the deck', async () => {
      const { store, repository } = setup();
      await store.getState().stage([makeFile('deck.pdf'), makeFile('demo.mp4')]);

      const outcome = await store.getState().submit();

      expect(outcome).toEqual({
        type: 'submitted',
        submittedAt: '2024-03-01T10:00:00.000Z',
        uploadedCount: 2,
      });
      expect(repository.saveSubmission).toHaveBeenCalledWith({
        userId: 'u1',
        pitchDeckId: null,
        objects: [
          { storagePath: 'u1/temp_0_1.pdf', url: 'https://storage.test/deck.pdf' },
          { storagePath: 'u1/temp_1_1.mp4', url: 'https://storage.test/demo.mp4' },
        ],
        originalNames: ['deck.pdf', 'demo.mp4'],
        submittedAt: '2024-03-01T10:00:00.000Z',
      });

      const state = store.getState();
      expect(state.submission).toEqual({ isSubmitted: true, submittedAt: '2024-03-01T10:00:00.000Z' });
      expect(state.pitchDeckId).toBe('pd-1');
      expect(state.entries.every((e) => e.remote !== null)).toBe(true);

      expect(await store.getState().submit()).toEqual({ type: 'already-submitted' });
      expect(await store.getState().removeFile(0)).toEqual({ type: 'locked' });
      expect(await store.getState().stage([makeFile('late.pdf')])).toEqual({ type: 'locked' });
    });

    it('uploads under the same rules the store validated with', async () => {
      const rules = createValidationRules('notes', ['txt'], 1024);
      const { store, storage } = setup({ rules });
      await store.getState().stage([makeFile('notes.txt')]);

      await store.getState().submit();

      expect(storage.uploadPitchDeckFiles).toHaveBeenCalledWith(expect.objectContaining({ rules }));
    });

    it('leaves staging untouched when the upload fails', async () => {
      const { store, storage, repository } = setup();
      vi.mocked(storage.uploadPitchDeckFiles).mockRejectedValueOnce(new Error('network down'));
      await store.getState().stage([makeFile('deck.pdf')]);
      const before = store.getState().entries;

      const outcome = await store.getState().submit();

      expect(outcome.type).toBe('failed');
      if (outcome.type === 'failed') {
        expect(outcome.error.message).toBe('Failed to submit pitch deck: network down');
      }
      expect(repository.saveSubmission).not.toHaveBeenCalled();
      expect(store.getState().entries).toBe(before);
      expect(store.getState().submission.isSubmitted).toBe(false);
    });

    it('removes uploaded objects when the record write fails', async () => {
      const { store, storage, repository } = setup();
      vi.mocked(repository.saveSubmission).mockRejectedValueOnce(new Error('row locked'));
      await store.getState().stage([makeFile('deck.pdf')]);

      const outcome = await store.getState().submit();

      expect(outcome.type).toBe('failed');
      expect(storage.deleted).toEqual([['u1/temp_0_1.pdf']]);
      expect(store.getState().entries[0]?.remote).toBeNull();
      expect(store.getState().submission).toEqual({ isSubmitted: false, submittedAt: null });
    });
  });

  describe('load', () => {
    it('restores a submitted record with original names', async () => {
      const repository = fakeRepository();
      vi.mocked(repository.load).mockResolvedValueOnce({
        id: 'pd-9',
        objects: [
          { storagePath: 'u1/pd-9_0_5.pdf', url: 'https://storage.test/a' },
          { storagePath: 'u1/pd-9_1_5.mp4', url: 'https://storage.test/b' },
        ],
        originalNames: ['Investor Deck.pdf', null],
        submission: { isSubmitted: true, submittedAt: '2024-02-01T00:00:00.000Z' },
      });
      const { store } = setup({ repository });

      expect(await store.getState().load()).toEqual({ type: 'loaded', fileCount: 2 });

      const state = store.getState();
      expect(state.entries.map((e) => e.fileName)).toEqual(['Investor Deck.pdf', 'pd-9_1_5.mp4']);
      expect(state.entries[1]?.thumbnail).toEqual({ kind: 'icon', icon: 'video' });
      expect(state.pitchDeckId).toBe('pd-9');
      expect(state.submission.submittedAt).toBe('2024-02-01T00:00:00.000Z');
    });
  });

  it('reset clears everything when idle', async () => {
    const { store } = setup();
    await store.getState().stage([makeFile('deck.pdf')]);

    expect(store.getState().reset()).toBe(true);
    expect(store.getState().entries).toEqual([]);
  });
});
