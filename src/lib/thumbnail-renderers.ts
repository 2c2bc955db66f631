import { ThumbnailError } from './errors';
import type { DocumentRenderer, VideoFrameExtractor } from './thumbnails';

/**
 * Browser renderers behind the Thumbnailer interface.
 * pdf.js is imported lazily so it stays out of the main chunk.
 */
export const pdfRenderer: DocumentRenderer = {
  async renderFirstPage(file, maxWidth) {
    const pdfjs = await import('pdfjs-dist');
    if (!pdfjs.GlobalWorkerOptions.workerSrc) {
      const worker = await import('pdfjs-dist/build/pdf.worker.min.mjs?url');
      pdfjs.GlobalWorkerOptions.workerSrc = worker.default;
    }

    const data = await file.arrayBuffer();
    const doc = await pdfjs.getDocument({ data }).promise;

    try {
      const page = await doc.getPage(1);
      const unscaled = page.getViewport({ scale: 1 });
      const viewport = page.getViewport({ scale: maxWidth / unscaled.width });

      const canvas = document.createElement('canvas');
      canvas.width = Math.floor(viewport.width);
      canvas.height = Math.floor(viewport.height);
      const context = canvas.getContext('2d');
      if (!context) throw new ThumbnailError('Canvas 2D context unavailable');

      await page.render({ canvasContext: context, viewport }).promise;
      return canvas.toDataURL('image/png');
    } finally {
      await doc.destroy();
    }
  },
};

/** A decode that neither seeks nor errors within this window falls back to the icon */
export const VIDEO_FRAME_TIMEOUT_MS = 5000;

export function createVideoFrameExtractor(timeoutMs: number = VIDEO_FRAME_TIMEOUT_MS): VideoFrameExtractor {
  return {
    extractFrame(file, maxWidth, quality) {
      return new Promise((resolve, reject) => {
        const objectUrl = URL.createObjectURL(file);
        const video = document.createElement('video');
        video.preload = 'auto';
        video.muted = true;
        video.playsInline = true;

        let settled = false;
        const finish = (settle: () => void) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          URL.revokeObjectURL(objectUrl);
          video.removeAttribute('src');
          video.load();
          settle();
        };

        const timer = setTimeout(() => {
          console.warn('[pitch-deck] Video frame timed out for', file.name);
          finish(() => resolve(null));
        }, timeoutMs);

        video.addEventListener(
          'loadeddata',
          () => {
            // First second, or the midpoint of very short clips
            video.currentTime = Number.isFinite(video.duration) ? Math.min(1, video.duration / 2) : 0;
          },
          { once: true },
        );

        video.addEventListener(
          'seeked',
          () => {
            if (!video.videoWidth || !video.videoHeight) {
              finish(() => resolve(null));
              return;
            }

            const scale = Math.min(1, maxWidth / video.videoWidth);
            const canvas = document.createElement('canvas');
            canvas.width = Math.round(video.videoWidth * scale);
            canvas.height = Math.round(video.videoHeight * scale);
            const context = canvas.getContext('2d');
            if (!context) {
              finish(() => resolve(null));
              return;
            }

            context.drawImage(video, 0, 0, canvas.width, canvas.height);
            const imageUrl = canvas.toDataURL('image/jpeg', quality);
            finish(() => resolve(imageUrl));
          },
          { once: true },
        );

        video.addEventListener(
          'error',
          () => finish(() => reject(new ThumbnailError(`Could not decode ${file.name}`))),
          { once: true },
        );

        video.src = objectUrl;
      });
    },
  };
}

export const videoFrameExtractor = createVideoFrameExtractor();
