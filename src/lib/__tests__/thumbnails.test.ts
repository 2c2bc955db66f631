import { describe, it, expect, vi } from 'vitest';
import { createThumbnailer, resolveThumbnail, thumbnailStrategy } from '../thumbnails';

function makeFile(name: string): File {
  return new File(['x'], name);
}

describe('thumbnailStrategy', () => {
  it('routes by extension', () => {
    expect(thumbnailStrategy('PDF')).toBe('document-preview');
    expect(thumbnailStrategy('mkv')).toBe('video-frame');
    expect(thumbnailStrategy('txt')).toBe('generic-icon');
  });
});

describe('createThumbnailer', () => {
  it('renders the first page of documents', async () => {
    const renderFirstPage = vi.fn().mockResolvedValue('data:image/png;base64,AAA');
    const thumbnailer = createThumbnailer({
      document: { renderFirstPage },
      video: { extractFrame: vi.fn() },
    });

    const result = await thumbnailer.generate(makeFile('deck.pdf'));

    expect(renderFirstPage).toHaveBeenCalledWith(expect.any(File), 200);
    expect(result).toEqual({
      ok: true,
      thumbnail: { kind: 'document', imageUrl: 'data:image/png;base64,AAA' },
    });
  });

  it('reports a failure when the renderer throws', async () => {
    const thumbnailer = createThumbnailer({
      document: { renderFirstPage: vi.fn().mockRejectedValue(new Error('corrupt')) },
      video: { extractFrame: vi.fn() },
    });

    const result = await thumbnailer.generate(makeFile('deck.pdf'));

    expect(result).toEqual({ ok: false, reason: 'Document preview failed: corrupt' });
    expect(resolveThumbnail(result, 'pdf')).toEqual({ kind: 'icon', icon: 'document' });
  });

  it('treats a missing video frame as a failure', async () => {
    const extractFrame = vi.fn().mockResolvedValue(null);
    const thumbnailer = createThumbnailer({
      document: { renderFirstPage: vi.fn() },
      video: { extractFrame },
    });

    const result = await thumbnailer.generate(makeFile('demo.mp4'));

    expect(extractFrame).toHaveBeenCalledWith(expect.any(File), 200, 0.75);
    expect(result).toEqual({ ok: false, reason: 'No video frame could be extracted' });
  });

  it('uses a generic icon for other files', async () => {
    const thumbnailer = createThumbnailer({
      document: { renderFirstPage: vi.fn() },
      video: { extractFrame: vi.fn() },
    });

    expect(await thumbnailer.generate(makeFile('notes.txt'))).toEqual({
      ok: true,
      thumbnail: { kind: 'icon', icon: 'unknown' },
    });
  });
});
