import { DOCUMENT_EXTENSIONS, THUMBNAIL_MAX_WIDTH, THUMBNAIL_QUALITY, VIDEO_EXTENSIONS } from './constants';
import { errorMessage } from './errors';
import { getExtension } from './file-validation';
import type { FileIcon, Thumbnail, ThumbnailResult } from '@/types/pitch-deck';

/** Renders page 1 of a document to an image URL. Throws on failure. */
export interface DocumentRenderer {
  renderFirstPage(file: File, maxWidth: number): Promise<string>;
}

/** Grabs one frame of a video as an image URL; null when no frame could be decoded. */
export interface VideoFrameExtractor {
  extractFrame(file: File, maxWidth: number, quality: number): Promise<string | null>;
}

export interface Thumbnailer {
  generate(file: File): Promise<ThumbnailResult>;
}

export type ThumbnailStrategy = 'document-preview' | 'video-frame' | 'generic-icon';

const DOCUMENT_SET: ReadonlySet<string> = new Set(DOCUMENT_EXTENSIONS);
const VIDEO_SET: ReadonlySet<string> = new Set(VIDEO_EXTENSIONS);

export function thumbnailStrategy(extension: string): ThumbnailStrategy {
  const ext = extension.toLowerCase();
  if (DOCUMENT_SET.has(ext)) return 'document-preview';
  if (VIDEO_SET.has(ext)) return 'video-frame';
  return 'generic-icon';
}

export function iconFor(extension: string): FileIcon {
  const ext = extension.toLowerCase();
  if (DOCUMENT_SET.has(ext)) return 'document';
  if (VIDEO_SET.has(ext)) return 'video';
  return 'unknown';
}

export function iconThumbnail(extension: string): Thumbnail {
  return { kind: 'icon', icon: iconFor(extension) };
}

/** Failed previews degrade to the extension's generic icon. */
export function resolveThumbnail(result: ThumbnailResult, extension: string): Thumbnail {
  return result.ok ? result.thumbnail : iconThumbnail(extension);
}

export function createThumbnailer(renderers: {
  document: DocumentRenderer;
  video: VideoFrameExtractor;
}): Thumbnailer {
  return {
    async generate(file) {
      const ext = getExtension(file.name);

      switch (thumbnailStrategy(ext)) {
        case 'document-preview':
          try {
            const imageUrl = await renderers.document.renderFirstPage(file, THUMBNAIL_MAX_WIDTH);
            return { ok: true, thumbnail: { kind: 'document', imageUrl } };
          } catch (err) {
            return { ok: false, reason: `Document preview failed: ${errorMessage(err)}` };
          }

        case 'video-frame':
          try {
            const imageUrl = await renderers.video.extractFrame(
              file,
              THUMBNAIL_MAX_WIDTH,
              THUMBNAIL_QUALITY,
            );
            if (!imageUrl) return { ok: false, reason: 'No video frame could be extracted' };
            return { ok: true, thumbnail: { kind: 'video', imageUrl } };
          } catch (err) {
            return { ok: false, reason: `Video frame extraction failed: ${errorMessage(err)}` };
          }

        case 'generic-icon':
          return { ok: true, thumbnail: iconThumbnail(ext) };
      }
    },
  };
}
