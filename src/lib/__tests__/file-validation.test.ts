/**
 * File Validation Tests
 *
 * Covers the extension/size rules applied before staging:
 * - Case-insensitive extension matching
 * - Size limits (100MB pitch deck, 5MB avatar)
 * - Independent per-file partitioning
 */

import { describe, it, expect } from 'vitest';
import {
  avatarRules,
  createValidationRules,
  getExtension,
  partitionFiles,
  pitchDeckRules,
} from '../file-validation';
import { FileValidationError } from '../errors';

// Helper to create mock File objects
function createMockFile(name: string, size: number, type = ''): File {
  const file = new File([''], name, { type });
  Object.defineProperty(file, 'size', { value: size });
  return file;
}

describe('getExtension', () => {
  it('lower-cases the last extension', () => {
    expect(getExtension('Deck.Final.PDF')).toBe('pdf');
  });

  it('returns empty for names without one', () => {
    expect(getExtension('README')).toBe('');
    expect(getExtension('.gitignore')).toBe('');
    expect(getExtension('trailing.')).toBe('');
  });
});

describe('pitchDeckRules', () => {
  it('accepts documents and videos regardless of case', () => {
    expect(() => pitchDeckRules.validate(createMockFile('deck.PDF', 1024))).not.toThrow();
    expect(() => pitchDeckRules.validate(createMockFile('demo.Mov', 1024))).not.toThrow();
  });

  it('rejects unsupported extensions', () => {
    expect(() => pitchDeckRules.validate(createMockFile('notes.txt', 10))).toThrow(
      'Invalid pitch deck file type. Allowed: pdf, mp4, avi, mov, mkv, wmv',
    );
  });

  it('accepts a file exactly at the limit', () => {
    const file = createMockFile('deck.pdf', 100 * 1024 * 1024);
    expect(() => pitchDeckRules.validate(file)).not.toThrow();
  });

  it('rejects a file one byte over the limit', () => {
    const file = createMockFile('deck.pdf', 100 * 1024 * 1024 + 1);
    expect(() => pitchDeckRules.validate(file)).toThrow(
      'Pitch deck file too large (100.0 MB). Maximum size is 100MB',
    );
  });

  it('throws FileValidationError', () => {
    expect(() => pitchDeckRules.validate(createMockFile('x.exe', 1))).toThrow(FileValidationError);
  });
});

describe('avatarRules', () => {
  it('caps avatars at 5MB', () => {
    const file = createMockFile('me.png', 6 * 1024 * 1024);
    expect(() => avatarRules.validate(file)).toThrow(
      'Avatar file too large (6.0 MB). Maximum size is 5MB',
    );
  });

  it('rejects documents', () => {
    expect(() => avatarRules.validate(createMockFile('me.pdf', 1))).toThrow(
      'Invalid avatar file type. Allowed: jpg, jpeg, png, gif, webp',
    );
  });
});

describe('partitionFiles', () => {
  it('keeps accepted files in order and reports each rejection', () => {
    const files = [
      createMockFile('deck.pdf', 2048),
      createMockFile('notes.txt', 10),
      createMockFile('demo.mp4', 4096),
    ];

    const { accepted, rejected } = partitionFiles(files, pitchDeckRules);

    expect(accepted.map((f) => f.name)).toEqual(['deck.pdf', 'demo.mp4']);
    expect(rejected).toEqual([
      {
        fileName: 'notes.txt',
        reason: 'Invalid pitch deck file type. Allowed: pdf, mp4, avi, mov, mkv, wmv',
      },
    ]);
  });

  it('rethrows errors that are not validation failures', () => {
    const rules = createValidationRules('test', ['pdf'], 10);
    const broken = {
      ...rules,
      validate: () => {
        throw new TypeError('boom');
      },
    };
    expect(() => partitionFiles([createMockFile('a.pdf', 1)], broken)).toThrow(TypeError);
  });
});
