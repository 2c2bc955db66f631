import {
  AVATAR_EXTENSIONS,
  AVATAR_MAX_BYTES,
  PITCH_DECK_EXTENSIONS,
  PITCH_DECK_MAX_BYTES,
} from './constants';
import { FileValidationError } from './errors';
import { formatSize } from './format';
import type { RejectedFile } from '@/types/pitch-deck';

/**
 * Extension/size rules for one kind of upload.
 * `validate` throws FileValidationError on the first violation.
 */
export interface ValidationRules {
  label: string;
  allowedExtensions: readonly string[];
  maxSizeBytes: number;
  validate: (file: File) => void;
}

/** Lower-cased extension without the dot; '' when the name has none. */
export function getExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) return '';
  return fileName.slice(dot + 1).toLowerCase();
}

export function createValidationRules(
  label: string,
  allowedExtensions: readonly string[],
  maxSizeBytes: number,
): ValidationRules {
  const maxMb = Math.floor(maxSizeBytes / (1024 * 1024));

  return {
    label,
    allowedExtensions,
    maxSizeBytes,
    validate(file) {
      const ext = getExtension(file.name);
      if (!allowedExtensions.includes(ext)) {
        throw new FileValidationError(
          `Invalid ${label} file type. Allowed: ${allowedExtensions.join(', ')}`,
        );
      }

      if (file.size > maxSizeBytes) {
        throw new FileValidationError(
          `${capitalize(label)} file too large (${formatSize(file.size)}). Maximum size is ${maxMb}MB`,
        );
      }
    },
  };
}

export const pitchDeckRules = createValidationRules(
  'pitch deck',
  PITCH_DECK_EXTENSIONS,
  PITCH_DECK_MAX_BYTES,
);

export const avatarRules = createValidationRules('avatar', AVATAR_EXTENSIONS, AVATAR_MAX_BYTES);

/**
 * Run every file through the rules independently.
 * One bad file never blocks the rest.
 */
export function partitionFiles(
  files: File[],
  rules: ValidationRules,
): { accepted: File[]; rejected: RejectedFile[] } {
  const accepted: File[] = [];
  const rejected: RejectedFile[] = [];

  for (const file of files) {
    try {
      rules.validate(file);
      accepted.push(file);
    } catch (err) {
      if (!(err instanceof FileValidationError)) throw err;
      rejected.push({ fileName: file.name, reason: err.message });
    }
  }

  return { accepted, rejected };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
