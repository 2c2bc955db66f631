import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  buildPitchDeckPath,
  createObjectStorage,
  getContentType,
  type StorageBucket,
} from '../storage';
import { StorageError } from '../errors';
import { createValidationRules } from '../file-validation';

interface FakeBucket extends StorageBucket {
  objects: Map<string, File>;
  failOn: Set<string>;
  removeCalls: string[][];
}

function createFakeBucket(name: string): FakeBucket {
  const objects = new Map<string, File>();
  const failOn = new Set<string>();
  const removeCalls: string[][] = [];

  return {
    objects,
    failOn,
    removeCalls,
    async upload(path, file) {
      if (failOn.has(file.name)) return { error: { message: 'quota exceeded' } };
      objects.set(path, file);
      return { error: null };
    },
    async remove(paths) {
      removeCalls.push(paths);
      for (const path of paths) objects.delete(path);
      return { error: null };
    },
    getPublicUrl(path) {
      return { data: { publicUrl: `https://storage.test/${name}/${path}` } };
    },
  };
}

function makeFile(name: string, size = 10): File {
  const file = new File(['x'], name);
  Object.defineProperty(file, 'size', { value: size });
  return file;
}

describe('storage paths', () => {
  it('falls back to a temp prefix without a pitch deck id', () => {
    expect(
      buildPitchDeckPath({ userId: 'u1', pitchDeckId: null, index: 2, extension: 'pdf', timestamp: 99 }),
    ).toBe('u1/temp_2_99.pdf');
  });

  it('maps extensions to content types', () => {
    expect(getContentType('MOV')).toBe('video/quicktime');
    expect(getContentType('bin')).toBe('application/octet-stream');
  });
});

describe('createObjectStorage', () => {
  let buckets: Record<string, FakeBucket>;

  beforeEach(() => {
    buckets = {
      'pitch-deck-files': createFakeBucket('pitch-deck-files'),
      avatars: createFakeBucket('avatars'),
    };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function storage() {
    return createObjectStorage((name) => {
      const bucket = buckets[name];
      if (!bucket) throw new Error(`unknown bucket ${name}`);
      return bucket;
    }, () => 1000);
  }

  it('uploads files in order and returns their public urls', async () => {
    const result = await storage().uploadPitchDeckFiles({
      files: [makeFile('deck.pdf'), makeFile('demo.mp4')],
      userId: 'u1',
      pitchDeckId: 'pd-1',
    });

    expect(result).toEqual({
      objects: [
        { storagePath: 'u1/pd-1_0_1000.pdf', url: 'https://storage.test/pitch-deck-files/u1/pd-1_0_1000.pdf' },
        { storagePath: 'u1/pd-1_1_1000.mp4', url: 'https://storage.test/pitch-deck-files/u1/pd-1_1_1000.mp4' },
      ],
      originalNames: ['deck.pdf', 'demo.mp4'],
    });
  });

  it('removes earlier uploads when a later one fails', async () => {
    const bucket = buckets['pitch-deck-files'];
    bucket?.failOn.add('demo.mp4');

    await expect(
      storage().uploadPitchDeckFiles({
        files: [makeFile('deck.pdf'), makeFile('demo.mp4')],
        userId: 'u1',
        pitchDeckId: null,
      }),
    ).rejects.toThrow('Failed to upload pitch deck files: demo.mp4: quota exceeded');

    expect(bucket?.removeCalls).toEqual([['u1/temp_0_1000.pdf']]);
    expect(bucket?.objects.size).toBe(0);
  });

  it('rejects an empty upload', async () => {
    await expect(
      storage().uploadPitchDeckFiles({ files: [], userId: 'u1', pitchDeckId: null }),
    ).rejects.toBeInstanceOf(StorageError);
  });

  it('re-validates files before uploading', async () => {
    await expect(
      storage().uploadPitchDeckFiles({ files: [makeFile('notes.txt')], userId: 'u1', pitchDeckId: null }),
    ).rejects.toThrow('Failed to upload pitch deck files: Invalid pitch deck file type');
    expect(buckets['pitch-deck-files']?.objects.size).toBe(0);
  });

  it('validates against the rules it is given', async () => {
    const notesRules = createValidationRules('notes', ['txt'], 1024);

    const result = await storage().uploadPitchDeckFiles({
      files: [makeFile('notes.txt')],
      userId: 'u1',
      pitchDeckId: null,
      rules: notesRules,
    });
    expect(result.objects.map((o) => o.storagePath)).toEqual(['u1/temp_0_1000.txt']);

    await expect(
      storage().uploadPitchDeckFiles({
        files: [makeFile('deck.pdf')],
        userId: 'u1',
        pitchDeckId: null,
        rules: notesRules,
      }),
    ).rejects.toThrow('Failed to upload pitch deck files: Invalid notes file type. Allowed: txt');
  });

  it('uploads avatars to their own bucket', async () => {
    const url = await storage().uploadAvatar({ file: makeFile('me.PNG'), userId: 'u1' });

    expect(url).toBe('https://storage.test/avatars/u1/avatar_1000.png');
    expect(buckets.avatars?.objects.has('u1/avatar_1000.png')).toBe(true);
  });

  it('rejects oversize avatars without touching storage', async () => {
    await expect(
      storage().uploadAvatar({ file: makeFile('me.png', 6 * 1024 * 1024), userId: 'u1' }),
    ).rejects.toThrow('Failed to upload avatar: Avatar file too large');
    expect(buckets.avatars?.objects.size).toBe(0);
  });
});
