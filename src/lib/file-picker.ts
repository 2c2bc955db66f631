export interface PickFilesOptions {
  multiple: boolean;
  /** Extensions without the dot */
  allowedExtensions: readonly string[];
}

/** Resolves null when the user dismisses the chooser. */
export interface FilePicker {
  pickFiles(options: PickFilesOptions): Promise<File[] | null>;
}

/** Grace period after the window regains focus for a late `change` event */
export const DISMISS_SETTLE_MS = 500;

/**
 * Native file chooser via a detached <input type="file">.
 * Settles on `change` or `cancel`; browsers without `cancel` are caught by the
 * window regaining focus with no files chosen.
 */
export function createBrowserFilePicker(settleMs: number = DISMISS_SETTLE_MS): FilePicker {
  return {
    pickFiles({ multiple, allowedExtensions }) {
      return new Promise((resolve) => {
        const input = document.createElement('input');
        input.type = 'file';
        input.multiple = multiple;
        input.accept = allowedExtensions.map((ext) => `.${ext}`).join(',');

        let settled = false;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const settle = (files: File[] | null) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          window.removeEventListener('focus', onFocus);
          resolve(files);
        };

        const selectedFiles = () => {
          const files = input.files ? Array.from(input.files) : [];
          return files.length > 0 ? files : null;
        };

        function onFocus() {
          timer = setTimeout(() => settle(selectedFiles()), settleMs);
        }

        input.addEventListener('change', () => settle(selectedFiles()), { once: true });
        input.addEventListener('cancel', () => settle(null), { once: true });

        input.click();
        window.addEventListener('focus', onFocus, { once: true });
      });
    },
  };
}

export const browserFilePicker = createBrowserFilePicker();
